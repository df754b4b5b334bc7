/**
 * Error module - exports all tabula error types.
 */

export { TabulaError } from "./base.ts";
export { CastError } from "./cast-error.ts";
export { ColumnNotFoundError } from "./column-not-found.ts";
export { DivisionByZeroError } from "./division-by-zero.ts";
export { DuplicateColumnError } from "./duplicate-column.ts";
export { IndexOutOfBoundsError } from "./index-out-of-bounds.ts";
export { InvalidOperationError } from "./invalid-operation.ts";
export { ParseError } from "./parse-error.ts";
export { ShapeError } from "./shape-error.ts";
export { TypeMismatchError } from "./type-mismatch.ts";
