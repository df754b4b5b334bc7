/**
 * Sort engine.
 *
 * Computes one stable permutation of row indices from a list of sort keys
 * and leaves it to the caller to apply that permutation to every column.
 * Nulls go after all values whatever the direction unless a key asks for
 * `nullsFirst`. NaN orders above every other number.
 */

import type { ColumnBuffer } from "../buffer/column-buffer.ts";
import type { Scalar } from "../types/dtypes.ts";
import { createLogger } from "../utils/logger.ts";

const log = createLogger("sort");

/** Sort order specification */
export interface SortKey {
	column: string;
	descending?: boolean;
	nullsFirst?: boolean;
}

export function asc(column: string): SortKey {
	return { column, descending: false };
}

export function desc(column: string): SortKey {
	return { column, descending: true };
}

/** A sort key resolved against its column */
export interface SortColumn {
	buffer: ColumnBuffer;
	descending: boolean;
	nullsFirst: boolean;
}

/**
 * Total order over two non-null values of the same kind.
 * Returns negative if a < b, positive if a > b, 0 if equal.
 */
export function compareValues(a: Scalar, b: Scalar): number {
	if (typeof a === "number" && typeof b === "number") {
		const nanA = Number.isNaN(a);
		const nanB = Number.isNaN(b);
		if (nanA || nanB) return nanA === nanB ? 0 : nanA ? 1 : -1;
		return a < b ? -1 : a > b ? 1 : 0;
	}
	if (typeof a === "boolean" && typeof b === "boolean") {
		return a === b ? 0 : a ? 1 : -1;
	}
	if (typeof a === "bigint" && typeof b === "bigint") {
		return a < b ? -1 : a > b ? 1 : 0;
	}
	if (typeof a === "string" && typeof b === "string") {
		return a < b ? -1 : a > b ? 1 : 0;
	}
	// mixed families never share a column
	return 0;
}

/** Compare two rows key by key */
export function compareRows(keys: readonly SortColumn[], rowA: number, rowB: number): number {
	for (let k = 0; k < keys.length; k++) {
		const key = keys[k];
		const valA = key.buffer.getScalar(rowA);
		const valB = key.buffer.getScalar(rowB);

		if (valA === null && valB === null) continue;
		if (valA === null) return key.nullsFirst ? -1 : 1;
		if (valB === null) return key.nullsFirst ? 1 : -1;

		const cmp = compareValues(valA, valB);
		if (cmp !== 0) return key.descending ? -cmp : cmp;
	}
	return 0;
}

/**
 * Stable permutation ordering `length` rows by `keys`.
 * Rows equal on every key keep their original relative order.
 */
export function sortIndices(keys: readonly SortColumn[], length: number): Uint32Array {
	const perm: number[] = new Array(length);
	for (let i = 0; i < length; i++) perm[i] = i;

	perm.sort((a, b) => compareRows(keys, a, b) || a - b);

	log.debug(`sorted ${length} rows on ${keys.length} key(s)`);
	return Uint32Array.from(perm);
}

/**
 * Linear monotonicity check under the same order `sortIndices` uses.
 * Advisory only; nothing calls it implicitly.
 */
export function isSortedBuffer(buffer: ColumnBuffer, descending = false): boolean {
	const keys: SortColumn[] = [{ buffer, descending, nullsFirst: false }];
	for (let i = 1; i < buffer.length; i++) {
		if (compareRows(keys, i - 1, i) > 0) return false;
	}
	return true;
}
