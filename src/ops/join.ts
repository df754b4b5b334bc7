/**
 * Join engine.
 *
 * Hash-based join of two row sets. The right side is always the build
 * side: its key tuples are indexed first, then the left side is probed in
 * original row order. Duplicate keys are legal and every matching pair is
 * produced. A key tuple containing a null never matches.
 */

import type { ColumnBuffer } from "../buffer/column-buffer.ts";
import { createLogger } from "../utils/logger.ts";
import { hashKey, KeyHashTable, type KeyValue, keysEqual, readKey } from "./key-hasher.ts";

const log = createLogger("join");

/** Join type */
export enum JoinType {
	Inner = "inner",
	Left = "left",
	Right = "right",
	Outer = "outer",
}

/** Join configuration */
export interface JoinConfig {
	/** Key column(s) of the left table */
	leftOn: string | readonly string[];
	/** Key column(s) of the right table. Default: same as `leftOn` */
	rightOn?: string | readonly string[];
	joinType?: JoinType;
	/**
	 * Suffix appended to right-hand columns whose name is already taken.
	 * Without it a name collision fails with DuplicateColumn.
	 */
	suffix?: string;
}

/**
 * Matched row pairs. A null index marks the side that has no row:
 * `left[i] === null` for unmatched right rows and vice versa.
 */
export interface JoinIndices {
	left: (number | null)[];
	right: (number | null)[];
}

interface BuildSide {
	table: KeyHashTable;
	keys: KeyValue[][];
	/** Right rows per distinct key, in row order */
	rows: number[][];
}

function hasNull(key: readonly KeyValue[]): boolean {
	for (const value of key) {
		if (value === null) return true;
	}
	return false;
}

function buildHashTable(columns: readonly ColumnBuffer[], length: number): BuildSide {
	const table = new KeyHashTable(Math.min(length, 1 << 16));
	const keys: KeyValue[][] = [];
	const rows: number[][] = [];

	for (let row = 0; row < length; row++) {
		const key = readKey(columns, row);
		if (hasNull(key)) continue;

		const gid = table.getOrInsert(hashKey(key), (g) => keysEqual(keys[g], key), true, keys.length);
		if (gid === keys.length) {
			keys.push(key);
			rows.push([row]);
		} else {
			rows[gid].push(row);
		}
	}
	return { table, keys, rows };
}

/**
 * Compute the row pairs of a join.
 *
 * Output order: left rows in probe order, each followed by its right
 * matches in right row order (unmatched left rows get a null partner for
 * left and outer joins). Right and outer joins then append the right rows
 * that never matched, in right row order.
 */
export function computeJoinIndices(
	leftKeys: readonly ColumnBuffer[],
	leftLength: number,
	rightKeys: readonly ColumnBuffer[],
	rightLength: number,
	joinType: JoinType,
): JoinIndices {
	const build = buildHashTable(rightKeys, rightLength);
	const keepLeft = joinType === JoinType.Left || joinType === JoinType.Outer;
	const keepRight = joinType === JoinType.Right || joinType === JoinType.Outer;
	const rightMatched = keepRight ? new Uint8Array(rightLength) : null;

	const left: (number | null)[] = [];
	const right: (number | null)[] = [];

	for (let row = 0; row < leftLength; row++) {
		const key = readKey(leftKeys, row);
		const gid = hasNull(key)
			? -1
			: build.table.getOrInsert(hashKey(key), (g) => keysEqual(build.keys[g], key), false, -1);

		if (gid === -1) {
			if (keepLeft) {
				left.push(row);
				right.push(null);
			}
			continue;
		}

		for (const match of build.rows[gid]) {
			left.push(row);
			right.push(match);
			if (rightMatched !== null) rightMatched[match] = 1;
		}
	}

	if (rightMatched !== null) {
		for (let row = 0; row < rightLength; row++) {
			if (rightMatched[row] === 0) {
				left.push(null);
				right.push(row);
			}
		}
	}

	log.debug(`${joinType} join: ${leftLength} x ${rightLength} rows -> ${left.length} rows`);
	return { left, right };
}

/** Normalize a key spec to a list of names */
export function keyNames(on: string | readonly string[]): string[] {
	return typeof on === "string" ? [on] : [...on];
}
