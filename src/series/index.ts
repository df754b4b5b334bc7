/**
 * Series module.
 * Typed, nullable columns and their elementwise operations.
 */

export type { ArithmeticOp } from "./arithmetic.ts";
export { DEFAULT_NA_VALUES, type ParseOptions } from "./cast.ts";
export type { CompareOp } from "./compare.ts";
export { type IndexRange, type ParallelOptions, parallelMap, partitionRanges } from "./parallel.ts";
export { type Cell, hasKind, type Mask, maskIndices, Series } from "./series.ts";
export { StringAccessor } from "./string-accessor.ts";
