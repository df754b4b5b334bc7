/**
 * Public exports for the buffer module.
 */

export { ColumnBuffer, columnBufferFromArray } from "./column-buffer.ts";
