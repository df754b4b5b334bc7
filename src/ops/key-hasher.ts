/**
 * Key hashing shared by GroupBy and Join.
 *
 * A key is the tuple of one row's cells across the key columns. Keys are
 * hashed with FNV-1a and looked up in a flat open-addressing table that
 * stores only a cached hash and a group id per slot; the key tuples
 * themselves live with the caller.
 *
 * Key equality: null equals null, NaN equals NaN, otherwise `===`.
 */

import type { ColumnBuffer } from "../buffer/column-buffer.ts";
import type { Scalar } from "../types/dtypes.ts";

export type KeyValue = Scalar | null;

/** FNV-1a hash constants */
const FNV_OFFSET_BASIS = 2166136261;
const FNV_PRIME = 16777619;

/** Module-level singleton for float hashing (avoid per-call allocation) */
const _hashBuf = new ArrayBuffer(8);
const _hashView = new DataView(_hashBuf);

function fnvInt32(v: number, seed = FNV_OFFSET_BASIS): number {
	let hash = seed;
	hash ^= (v >>> 0) & 0xff;
	hash = Math.imul(hash, FNV_PRIME);
	hash ^= (v >>> 8) & 0xff;
	hash = Math.imul(hash, FNV_PRIME);
	hash ^= (v >>> 16) & 0xff;
	hash = Math.imul(hash, FNV_PRIME);
	hash ^= (v >>> 24) & 0xff;
	hash = Math.imul(hash, FNV_PRIME);
	return hash >>> 0;
}

/**
 * Hash a single value using FNV-1a.
 * Returns a 32-bit hash code.
 */
function hashValue(value: KeyValue): number {
	if (value === null) {
		return 0; // Null hashes to 0
	}

	switch (typeof value) {
		case "boolean":
			return value ? 0x9e3779b1 : 0x7f4a7c15;
		case "string": {
			let hash = FNV_OFFSET_BASIS;
			for (let i = 0; i < value.length; i++) {
				hash ^= value.charCodeAt(i);
				hash = Math.imul(hash, FNV_PRIME);
			}
			return hash >>> 0;
		}
		case "bigint": {
			// Hash bigint by combining high and low 32 bits
			const low = Number(value & 0xffffffffn);
			const high = Number((value >> 32n) & 0xffffffffn);
			return hashCombine(fnvInt32(low), high);
		}
		default:
			if (Number.isInteger(value) && Math.abs(value) <= 0x7fffffff) {
				return fnvInt32(value | 0);
			}
			// canonical NaN so every NaN lands in the same bucket
			_hashView.setFloat64(0, Number.isNaN(value) ? Number.NaN : value, true);
			return hashCombine(fnvInt32(_hashView.getUint32(0, true)), _hashView.getUint32(4, true));
	}
}

/**
 * Combine two hash values.
 */
function hashCombine(h1: number, h2: number): number {
	let hash = h1;
	hash ^= h2 + 0x9e3779b9 + (hash << 6) + (hash >> 2);
	return hash >>> 0;
}

/**
 * Hash multiple values into a single hash code.
 */
export function hashKey(values: readonly KeyValue[]): number {
	if (values.length === 0) return 0;
	if (values.length === 1) return hashValue(values[0]);

	let hash = FNV_OFFSET_BASIS;
	for (const value of values) {
		hash = hashCombine(hash, hashValue(value));
	}
	return hash >>> 0;
}

function valuesEqual(a: KeyValue, b: KeyValue): boolean {
	if (a === b) return true;
	return typeof a === "number" && typeof b === "number" && Number.isNaN(a) && Number.isNaN(b);
}

/**
 * Check if two keys are equal.
 */
export function keysEqual(a: readonly KeyValue[], b: readonly KeyValue[]): boolean {
	if (a.length !== b.length) return false;
	for (let i = 0; i < a.length; i++) {
		if (!valuesEqual(a[i], b[i])) return false;
	}
	return true;
}

/** Read the key tuple of `row` across `columns` */
export function readKey(columns: readonly ColumnBuffer[], row: number): KeyValue[] {
	const key: KeyValue[] = new Array(columns.length);
	for (let c = 0; c < columns.length; c++) {
		key[c] = columns[c].getScalar(row);
	}
	return key;
}

/** Sentinel for an empty slot */
const EMPTY = -1;

/**
 * Hash table for key lookup.
 *
 * Uses flat TypedArrays (Uint32Array for hashes, Int32Array for group ids)
 * instead of one JS object per slot.
 * Collision resolution: open addressing with linear probing.
 */
export class KeyHashTable {
	/** Cached hash per slot */
	private hashes: Uint32Array;
	/** Group ID per slot (-1 = empty) */
	private groupIds: Int32Array;

	private size = 0;
	private capacity: number;
	private readonly loadFactor = 0.75;

	constructor(initialCapacity = 16) {
		this.capacity = Math.max(16, nextPowerOf2(initialCapacity));
		this.hashes = new Uint32Array(this.capacity);
		this.groupIds = new Int32Array(this.capacity).fill(EMPTY);
	}

	getSize(): number {
		return this.size;
	}

	/**
	 * Look up a key or insert it.
	 *
	 * @param hash The 32-bit hash of the key
	 * @param matches Returns true if the key being looked up equals the key of group `gid`
	 * @param insertIfMissing If true, associates the key with `nextGroupId` and returns it.
	 * @param nextGroupId The group ID to use if the key is inserted.
	 * @returns The group ID of the key, or -1 if not found and `insertIfMissing` is false.
	 */
	getOrInsert(
		hash: number,
		matches: (gid: number) => boolean,
		insertIfMissing: boolean,
		nextGroupId: number,
	): number {
		if (insertIfMissing && this.size >= this.capacity * this.loadFactor) {
			this.resize();
		}

		const cap = this.capacity;
		let idx = hash & (cap - 1);

		while (true) {
			const gid = this.groupIds[idx];
			if (gid === EMPTY) {
				if (insertIfMissing) {
					this.hashes[idx] = hash;
					this.groupIds[idx] = nextGroupId;
					this.size++;
					return nextGroupId;
				}
				return -1;
			}
			if (this.hashes[idx] === hash && matches(gid)) {
				return gid;
			}
			idx = (idx + 1) & (cap - 1); // linear probing
		}
	}

	/**
	 * Clear all entries (reuse existing arrays without realloc).
	 */
	clear(): void {
		this.groupIds.fill(EMPTY);
		this.hashes.fill(0);
		this.size = 0;
	}

	private resize(): void {
		const oldGroupIds = this.groupIds;
		const oldHashes = this.hashes;
		const oldCap = this.capacity;

		this.capacity *= 2;
		this.hashes = new Uint32Array(this.capacity);
		this.groupIds = new Int32Array(this.capacity).fill(EMPTY);
		this.size = 0;

		const cap = this.capacity;

		for (let i = 0; i < oldCap; i++) {
			const gid = oldGroupIds[i];
			if (gid !== EMPTY) {
				const hash = oldHashes[i];
				let idx = hash & (cap - 1);

				while (this.groupIds[idx] !== EMPTY) {
					idx = (idx + 1) & (cap - 1);
				}

				this.hashes[idx] = hash;
				this.groupIds[idx] = gid;
				this.size++;
			}
		}
	}
}

/**
 * Get the next power of 2 >= n.
 */
function nextPowerOf2(n: number): number {
	return 2 ** Math.ceil(Math.log2(Math.max(n, 1)));
}
