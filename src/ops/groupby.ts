/**
 * GroupBy engine.
 *
 * Partitions row indices by key tuple. Groups are numbered in the order
 * their key first appears, so the output order is deterministic and
 * independent of hashing. A null key cell is a value of its own and
 * equals other nulls in the same position.
 */

import { ColumnBuffer } from "../buffer/column-buffer.ts";
import { DTypeKind } from "../types/dtypes.ts";
import { createLogger } from "../utils/logger.ts";
import { type AggFn, createAggState } from "./agg-state.ts";
import { hashKey, KeyHashTable, type KeyValue, keysEqual, readKey } from "./key-hasher.ts";

const log = createLogger("groupby");

/** Rows of each group, groups in first-seen order */
export interface GroupPartition {
	/** Key tuple of each group */
	keys: KeyValue[][];
	/** Member row indices of each group, ascending */
	rows: number[][];
}

/** Partition `length` rows by the tuple of `keyColumns` */
export function partitionRows(keyColumns: readonly ColumnBuffer[], length: number): GroupPartition {
	const table = new KeyHashTable(Math.min(length, 1 << 16));
	const keys: KeyValue[][] = [];
	const rows: number[][] = [];

	for (let row = 0; row < length; row++) {
		const key = readKey(keyColumns, row);
		const gid = table.getOrInsert(hashKey(key), (g) => keysEqual(keys[g], key), true, keys.length);
		if (gid === keys.length) {
			keys.push(key);
			rows.push([row]);
		} else {
			rows[gid].push(row);
		}
	}

	log.debug(`partitioned ${length} rows into ${keys.length} group(s)`);
	return { keys, rows };
}

/** One output row per group holding that group's key cells */
export function keyColumnsOf(keyColumns: readonly ColumnBuffer[], partition: GroupPartition): ColumnBuffer[] {
	const firstRows = partition.rows.map((members) => members[0]);
	return keyColumns.map((column) => column.gather(firstRows));
}

/** Aggregate one column per group */
export function aggregateColumn(column: ColumnBuffer, partition: GroupPartition, fn: AggFn): ColumnBuffer {
	const state = createAggState(fn, column.kind);
	const out = new ColumnBuffer(state.outputDType, partition.rows.length);

	for (const members of partition.rows) {
		state.reset();
		for (const row of members) {
			state.accumulate(column.getValue(row));
		}
		out.appendValue(state.result());
	}
	return out;
}

/** Member count of each group */
export function groupSizes(partition: GroupPartition): ColumnBuffer<DTypeKind.UInt32> {
	return ColumnBuffer.from(
		DTypeKind.UInt32,
		partition.rows.map((members) => members.length),
		partition.rows.length,
	);
}
