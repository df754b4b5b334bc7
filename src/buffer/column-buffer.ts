/**
 * ColumnBuffer: contiguous value storage with a parallel validity vector.
 *
 * - Fixed-width kinds live in a TypedArray, booleans in a Uint8Array (0/1),
 *   strings and list cells in plain arrays.
 * - List cells are copied on the way in and on the way out through `get`,
 *   so no caller holds a reference into the buffer.
 * - `validity[i] === 1` marks a present value. The value slot of a null
 *   is zeroed but carries no meaning.
 * - Storing into a TypedArray follows its conversion rules: integer slots
 *   wrap to the element width, float32 slots round.
 */

import { InvalidOperationError } from "../errors/index.ts";
import type { Series } from "../series/series.ts";
import {
	allocateStorage,
	type BigIntTypedArray,
	DTypeKind,
	type DTypeToTS,
	isScalar,
	type NumberTypedArray,
	type Scalar,
	type Value,
} from "../types/dtypes.ts";
import { ErrorCode } from "../types/error.ts";

type Storage =
	| { family: "number"; data: NumberTypedArray }
	| { family: "bigint"; data: BigIntTypedArray }
	| { family: "boolean"; data: Uint8Array }
	| { family: "string"; data: string[] }
	| { family: "list"; data: Array<Series | undefined> };

const MIN_CAPACITY = 16;

function createStorage(kind: DTypeKind, capacity: number): Storage {
	if (kind === DTypeKind.String) {
		return { family: "string", data: [] };
	}
	if (kind === DTypeKind.List) {
		return { family: "list", data: [] };
	}
	if (kind === DTypeKind.Boolean) {
		return { family: "boolean", data: new Uint8Array(capacity) };
	}
	const data = allocateStorage(kind, capacity);
	if (data instanceof BigInt64Array || data instanceof BigUint64Array) {
		return { family: "bigint", data };
	}
	return { family: "number", data };
}

function invariant(detail: string): InvalidOperationError {
	return new InvalidOperationError("ColumnBuffer", detail, undefined, ErrorCode.InvalidState);
}

export class ColumnBuffer<K extends DTypeKind = DTypeKind> {
	readonly kind: K;
	private storage: Storage;
	private validity: Uint8Array;
	private _length = 0;
	private _capacity: number;

	constructor(kind: K, capacity = MIN_CAPACITY) {
		this.kind = kind;
		this._capacity = Math.max(capacity, 1);
		this.storage = createStorage(kind, this._capacity);
		this.validity = new Uint8Array(this._capacity);
	}

	/**
	 * Build a buffer from optional values without range checks.
	 * Callers validate first when the values come from outside.
	 */
	static from<K extends DTypeKind>(
		kind: K,
		values: Iterable<DTypeToTS<K> | null | undefined>,
		sizeHint = MIN_CAPACITY,
	): ColumnBuffer<K> {
		const buffer = new ColumnBuffer(kind, sizeHint);
		for (const value of values) {
			buffer.append(value ?? null);
		}
		return buffer;
	}

	get length(): number {
		return this._length;
	}

	get capacity(): number {
		return this._capacity;
	}

	isNull(index: number): boolean {
		return this.validity[index] === 0;
	}

	isValid(index: number): boolean {
		return this.validity[index] === 1;
	}

	nullCount(): number {
		let count = 0;
		for (let i = 0; i < this._length; i++) {
			if (this.validity[i] === 0) count++;
		}
		return count;
	}

	/** Value at `index`, or null. Bounds are the caller's responsibility. */
	get(index: number): DTypeToTS<K> | null {
		if (this.validity[index] === 0) return null;
		const value = this.readSlot(index);
		// storage family is fixed by `kind` at construction
		return (isScalar(value) ? value : value.clone()) as DTypeToTS<K>;
	}

	/** Untyped read used by the engines that copy cells across buffers */
	getValue(index: number): Value | null {
		if (this.validity[index] === 0) return null;
		return this.readSlot(index);
	}

	/**
	 * Untyped read used by the engines that work on flat kinds.
	 * Callers reject list columns first.
	 */
	getScalar(index: number): Scalar | null {
		const value = this.getValue(index);
		if (value === null || isScalar(value)) return value;
		throw invariant(`list cell ${index} read as a scalar`);
	}

	append(value: DTypeToTS<K> | null): void {
		this.appendValue(value);
	}

	/**
	 * Append a value whose family must match the buffer's.
	 * A mismatch means an engine produced a value of the wrong kind.
	 */
	appendValue(value: Value | null): void {
		if (this._length === this._capacity) {
			this.grow(this._length + 1);
		}
		this.writeAt(this._length, value);
		this._length++;
	}

	appendScalar(value: Scalar | null): void {
		this.appendValue(value);
	}

	appendNull(): void {
		this.appendValue(null);
	}

	/** Overwrite an existing slot */
	set(index: number, value: DTypeToTS<K> | null): void {
		if (index < 0 || index >= this._length) {
			throw invariant(`set(${index}) outside length ${this._length}`);
		}
		this.writeAt(index, value);
	}

	clear(): void {
		this.storage = createStorage(this.kind, this._capacity);
		this.validity = new Uint8Array(this._capacity);
		this._length = 0;
	}

	/** New buffer holding the rows at `indices`, in that order */
	gather(indices: ArrayLike<number>): ColumnBuffer<K> {
		const out = new ColumnBuffer(this.kind, indices.length);
		for (let i = 0; i < indices.length; i++) {
			out.appendValue(this.getValue(indices[i]));
		}
		return out;
	}

	/** Like gather, with null entries producing null rows */
	gatherOptional(indices: ReadonlyArray<number | null>): ColumnBuffer<K> {
		const out = new ColumnBuffer(this.kind, indices.length);
		for (const idx of indices) {
			out.appendValue(idx === null ? null : this.getValue(idx));
		}
		return out;
	}

	slice(start: number, end: number = this._length): ColumnBuffer<K> {
		const from = Math.max(0, Math.floor(start));
		const to = Math.min(this._length, Math.floor(end));
		const out = new ColumnBuffer(this.kind, Math.max(to - from, 1));
		for (let i = from; i < to; i++) {
			out.appendValue(this.getValue(i));
		}
		return out;
	}

	clone(): ColumnBuffer<K> {
		return this.slice(0, this._length);
	}

	/** Replace contents with another buffer of the same kind */
	replaceWith(other: ColumnBuffer<K>): void {
		if (other.kind !== this.kind) {
			throw invariant(`cannot adopt ${other.kind} storage into ${this.kind} buffer`);
		}
		this.storage = other.storage;
		this.validity = other.validity;
		this._length = other._length;
		this._capacity = other._capacity;
	}

	private readSlot(index: number): Value {
		const s = this.storage;
		switch (s.family) {
			case "list": {
				const cell = s.data[index];
				if (cell === undefined) throw invariant(`list slot ${index} is empty but marked valid`);
				return cell;
			}
			case "boolean":
				return s.data[index] === 1;
			case "string":
				return s.data[index];
			case "number":
				return s.data[index];
			case "bigint":
				return s.data[index];
		}
	}

	private writeAt(index: number, value: Value | null): void {
		const s = this.storage;
		if (value === null) {
			this.validity[index] = 0;
			switch (s.family) {
				case "string":
					s.data[index] = "";
					break;
				case "list":
					s.data[index] = undefined;
					break;
				case "bigint":
					s.data[index] = 0n;
					break;
				default:
					s.data[index] = 0;
			}
			return;
		}

		switch (s.family) {
			case "number":
				if (typeof value !== "number") break;
				s.data[index] = value;
				this.validity[index] = 1;
				return;
			case "bigint":
				if (typeof value !== "bigint") break;
				s.data[index] = value;
				this.validity[index] = 1;
				return;
			case "boolean":
				if (typeof value !== "boolean") break;
				s.data[index] = value ? 1 : 0;
				this.validity[index] = 1;
				return;
			case "string":
				if (typeof value !== "string") break;
				s.data[index] = value;
				this.validity[index] = 1;
				return;
			case "list":
				if (isScalar(value)) break;
				s.data[index] = value.clone();
				this.validity[index] = 1;
				return;
		}
		throw invariant(`${typeof value} value written to ${this.kind} storage`);
	}

	private grow(minCapacity: number): void {
		const capacity = Math.max(minCapacity, this._capacity * 2, MIN_CAPACITY);
		const next = createStorage(this.kind, capacity);
		const prev = this.storage;
		const n = this._length;

		if (prev.family === "number" && next.family === "number") {
			next.data.set(prev.data.subarray(0, n));
		} else if (prev.family === "bigint" && next.family === "bigint") {
			next.data.set(prev.data.subarray(0, n));
		} else if (prev.family === "boolean" && next.family === "boolean") {
			next.data.set(prev.data.subarray(0, n));
		} else if (prev.family === "string" && next.family === "string") {
			next.data = prev.data;
		} else if (prev.family === "list" && next.family === "list") {
			next.data = prev.data;
		} else {
			throw invariant("storage family changed while growing");
		}

		const validity = new Uint8Array(capacity);
		validity.set(this.validity.subarray(0, n));

		this.storage = next;
		this.validity = validity;
		this._capacity = capacity;
	}
}

/** Build a buffer from a plain array of optional values */
export function columnBufferFromArray<K extends DTypeKind>(
	kind: K,
	values: ReadonlyArray<DTypeToTS<K> | null | undefined>,
): ColumnBuffer<K> {
	return ColumnBuffer.from(kind, values, values.length);
}
