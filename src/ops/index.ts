/**
 * Engines: sorting, grouping, joining.
 */

export {
	AGG_FUNCTIONS,
	type AggFn,
	type AggState,
	AvgState,
	CountState,
	createAggState,
	FirstState,
	LastState,
	MaxState,
	MinState,
	SumState,
	supportsInput,
} from "./agg-state.ts";
export {
	aggregateColumn,
	type GroupPartition,
	groupSizes,
	keyColumnsOf,
	partitionRows,
} from "./groupby.ts";
export {
	computeJoinIndices,
	type JoinConfig,
	type JoinIndices,
	JoinType,
	keyNames,
} from "./join.ts";
export { hashKey, KeyHashTable, type KeyValue, keysEqual, readKey } from "./key-hasher.ts";
export {
	asc,
	compareRows,
	compareValues,
	desc,
	isSortedBuffer,
	type SortColumn,
	type SortKey,
	sortIndices,
} from "./sort.ts";
