/**
 * tabula - typed, nullable, in-memory columnar data engine
 *
 * Main entry point for the library.
 */

// Re-export buffer
export { ColumnBuffer, columnBufferFromArray } from "./buffer/index.ts";
// Re-export configuration
export {
	configure,
	type EngineConfig,
	type EngineConfigInput,
	getConfig,
	resetConfig,
} from "./config.ts";
// Re-export DataFrame
export {
	type AggSpec,
	DataFrame,
	type Group,
	GroupBy,
	joinFrames,
	type Row,
	type SortBy,
} from "./dataframe/index.ts";
// Re-export errors
export {
	CastError,
	ColumnNotFoundError,
	DivisionByZeroError,
	DuplicateColumnError,
	IndexOutOfBoundsError,
	InvalidOperationError,
	ParseError,
	ShapeError,
	TabulaError,
	TypeMismatchError,
} from "./errors/index.ts";
// Re-export engines
export {
	type AggFn,
	asc,
	computeJoinIndices,
	desc,
	type JoinConfig,
	type JoinIndices,
	JoinType,
	type SortKey,
	sortIndices,
} from "./ops/index.ts";
// Re-export Series
export {
	type ArithmeticOp,
	type Cell,
	type CompareOp,
	DEFAULT_NA_VALUES,
	hasKind,
	type Mask,
	type ParallelOptions,
	type ParseOptions,
	Series,
	StringAccessor,
} from "./series/index.ts";
// Re-export types
export * from "./types/index.ts";
// Re-export logging
export { createLogger, isDebugMode, Logger } from "./utils/logger.ts";
