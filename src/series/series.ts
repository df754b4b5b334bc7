/**
 * Series: a named, typed, nullable column.
 *
 * A Series owns one ColumnBuffer. Every derived Series (arithmetic,
 * cast, filter, take, ...) gets fresh storage; only `push`, `clear`,
 * `rename`, `sort` and `fillNullInPlace` mutate in place.
 *
 * A list Series holds one Series per cell. All non-null cells share one
 * inner dtype; list Series do not sort, compare or take part in
 * arithmetic.
 */

import { ColumnBuffer } from "../buffer/column-buffer.ts";
import {
	IndexOutOfBoundsError,
	ShapeError,
	TypeMismatchError,
} from "../errors/index.ts";
import { compareValues, isSortedBuffer, type SortColumn, sortIndices } from "../ops/sort.ts";
import {
	DTypeKind,
	type DTypeToTS,
	isFloatDType,
	isNumericDType,
	isScalar,
	type Scalar,
	type Value,
} from "../types/dtypes.ts";
import { ErrorCode, fail, ok, type Result } from "../types/error.ts";
import { formatTable } from "../utils/display.ts";
import { arithmetic, type ArithmeticOp } from "./arithmetic.ts";
import { castBuffer, type ParseOptions, parseBuffer } from "./cast.ts";
import { type CompareOp, compare } from "./compare.ts";
import { checkValue } from "./convert.ts";
import { type ParallelOptions, parallelMap } from "./parallel.ts";
import { StringAccessor } from "./string-accessor.ts";

/** Optional cell value of a Series of kind K */
export type Cell<K extends DTypeKind> = DTypeToTS<K> | null;

/** Boolean Series used to select rows */
export type Mask = Series<DTypeKind.Boolean>;

export class Series<K extends DTypeKind = DTypeKind> {
	private _name: string;
	private readonly data: ColumnBuffer<K>;

	/** Wrap an existing buffer. The Series takes ownership of it. */
	constructor(name: string, data: ColumnBuffer<K>) {
		this._name = name;
		this.data = data;
	}

	/** Build from non-null values */
	static from<K extends DTypeKind>(
		name: string,
		kind: K,
		values: ReadonlyArray<DTypeToTS<K>>,
	): Result<Series<K>> {
		return Series.fromOptions(name, kind, values);
	}

	/** Build from values where `null` (or `undefined`) marks a missing cell */
	static fromOptions<K extends DTypeKind>(
		name: string,
		kind: K,
		values: ReadonlyArray<DTypeToTS<K> | null | undefined>,
	): Result<Series<K>> {
		return Series.fromValues(name, kind, values);
	}

	/** Build from values of unchecked type, as handed over by an adapter */
	static fromValues<K extends DTypeKind>(
		name: string,
		kind: K,
		values: ReadonlyArray<unknown>,
	): Result<Series<K>> {
		const buffer = new ColumnBuffer(kind, values.length);
		for (const value of values) {
			const checked = checkValue(kind, value);
			if (checked.error !== ErrorCode.None) return checked;
			const inner = checkInnerDtype(buffer, checked.value, "construct");
			if (inner.error !== ErrorCode.None) return inner;
			buffer.appendValue(checked.value);
		}
		if (buffer.length !== values.length) {
			return fail(new ShapeError(`Series '${name}'`, values.length, buffer.length));
		}
		return ok(new Series(name, buffer));
	}

	/** Empty Series for incremental population with `push` */
	static empty<K extends DTypeKind>(name: string, kind: K): Series<K> {
		return new Series(name, new ColumnBuffer(kind));
	}

	/** Parse raw text cells, as produced by a reader, into `kind` */
	static parse<K extends DTypeKind>(
		name: string,
		kind: K,
		cells: ReadonlyArray<string | null | undefined>,
		options?: ParseOptions,
	): Result<Series<K>> {
		const parsed = parseBuffer(kind, cells, options);
		if (parsed.error !== ErrorCode.None) return parsed;
		return ok(new Series(name, parsed.value));
	}

	get name(): string {
		return this._name;
	}

	get dtype(): K {
		return this.data.kind;
	}

	get length(): number {
		return this.data.length;
	}

	/** Dtype shared by the cells of a list Series; null otherwise or while every cell is null */
	get innerDtype(): DTypeKind | null {
		return listInnerDtype(this.data);
	}

	/** Backing storage. Engines read through it; treat it as read-only. */
	get buffer(): ColumnBuffer<K> {
		return this.data;
	}

	isEmpty(): boolean {
		return this.data.length === 0;
	}

	/* ACCESS
	/*-----------------------------------------------------
	/* Single values, iteration, materialization
	/* ==================================================== */

	get(index: number): Result<Cell<K>> {
		if (!Number.isInteger(index) || index < 0 || index >= this.data.length) {
			return fail(new IndexOutOfBoundsError(index, 0, this.data.length - 1));
		}
		return ok(this.data.get(index));
	}

	*values(): IterableIterator<Cell<K>> {
		for (let i = 0; i < this.data.length; i++) {
			yield this.data.get(i);
		}
	}

	[Symbol.iterator](): IterableIterator<Cell<K>> {
		return this.values();
	}

	/**
	 * Non-null values in order. The returned iterable is lazy and can be
	 * iterated any number of times.
	 */
	iterValid(): Iterable<DTypeToTS<K>> {
		const data = this.data;
		return {
			*[Symbol.iterator]() {
				for (let i = 0; i < data.length; i++) {
					const value = data.get(i);
					if (value !== null) yield value;
				}
			},
		};
	}

	toArray(): Cell<K>[] {
		return Array.from(this.values());
	}

	/* NULLS
	/*-----------------------------------------------------
	/* Validity masks and fills
	/* ==================================================== */

	isNull(): Mask {
		const out = new ColumnBuffer(DTypeKind.Boolean, this.data.length);
		for (let i = 0; i < this.data.length; i++) out.append(this.data.isNull(i));
		return new Series(`${this._name}_is_null`, out);
	}

	notNull(): Mask {
		const out = new ColumnBuffer(DTypeKind.Boolean, this.data.length);
		for (let i = 0; i < this.data.length; i++) out.append(this.data.isValid(i));
		return new Series(`${this._name}_not_null`, out);
	}

	nullCount(): number {
		return this.data.nullCount();
	}

	/** New Series with nulls replaced by `value` */
	fillNull(value: DTypeToTS<K>): Result<Series<K>> {
		const checked = checkValue(this.dtype, value, "fillNull");
		if (checked.error !== ErrorCode.None) return checked;
		const inner = checkInnerDtype(this.data, checked.value, "fillNull");
		if (inner.error !== ErrorCode.None) return inner;

		const out = new ColumnBuffer(this.dtype, this.data.length);
		for (let i = 0; i < this.data.length; i++) {
			out.appendValue(this.data.isNull(i) ? checked.value : this.data.getValue(i));
		}
		return ok(new Series(this._name, out));
	}

	fillNullInPlace(value: DTypeToTS<K>): Result<void> {
		const filled = this.fillNull(value);
		if (filled.error !== ErrorCode.None) return filled;
		this.data.replaceWith(filled.value.data);
		return ok(undefined);
	}

	/* MUTATION
	/*-----------------------------------------------------
	/* In-place operations
	/* ==================================================== */

	push(value: Cell<K>): Result<void> {
		const checked = checkValue(this.dtype, value, "push");
		if (checked.error !== ErrorCode.None) return checked;
		const inner = checkInnerDtype(this.data, checked.value, "push");
		if (inner.error !== ErrorCode.None) return inner;
		this.data.appendValue(checked.value);
		return ok(undefined);
	}

	clear(): void {
		this.data.clear();
	}

	rename(name: string): void {
		this._name = name;
	}

	withName(name: string): Series<K> {
		return new Series(name, this.data.clone());
	}

	/** Stable in-place sort; nulls end up last in either direction */
	sort(descending = false): Result<void> {
		if (this.dtype === DTypeKind.List) {
			return fail(new TypeMismatchError("sort", this.dtype, ["a flat Series"]));
		}
		const keys: SortColumn[] = [{ buffer: this.data, descending, nullsFirst: false }];
		const perm = sortIndices(keys, this.data.length);
		this.data.replaceWith(this.data.gather(perm));
		return ok(undefined);
	}

	/** List Series have no order and report false */
	isSorted(descending = false): boolean {
		if (this.dtype === DTypeKind.List) return false;
		return isSortedBuffer(this.data, descending);
	}

	/* ARITHMETIC
	/*-----------------------------------------------------
	/* Elementwise, null-propagating
	/* ==================================================== */

	add(other: Series<K> | Scalar): Result<Series<K>> {
		return this.arith("add", other);
	}

	sub(other: Series<K> | Scalar): Result<Series<K>> {
		return this.arith("sub", other);
	}

	mul(other: Series<K> | Scalar): Result<Series<K>> {
		return this.arith("mul", other);
	}

	div(other: Series<K> | Scalar): Result<Series<K>> {
		return this.arith("div", other);
	}

	rem(other: Series<K> | Scalar): Result<Series<K>> {
		return this.arith("rem", other);
	}

	private arith(op: ArithmeticOp, other: Series<K> | Scalar): Result<Series<K>> {
		const operand = other instanceof Series ? other.data : other;
		const result = arithmetic(op, this.data, operand, this._name);
		if (result.error !== ErrorCode.None) return result;
		return ok(new Series(this.derivedName(op, other), result.value));
	}

	/* COMPARISON
	/*-----------------------------------------------------
	/* Produce masks; null operands compare false
	/* ==================================================== */

	gt(other: Series<K> | Scalar): Result<Mask> {
		return this.cmp("gt", other);
	}

	lt(other: Series<K> | Scalar): Result<Mask> {
		return this.cmp("lt", other);
	}

	ge(other: Series<K> | Scalar): Result<Mask> {
		return this.cmp("ge", other);
	}

	le(other: Series<K> | Scalar): Result<Mask> {
		return this.cmp("le", other);
	}

	eq(other: Series<K> | Scalar): Result<Mask> {
		return this.cmp("eq", other);
	}

	ne(other: Series<K> | Scalar): Result<Mask> {
		return this.cmp("ne", other);
	}

	private cmp(op: CompareOp, other: Series<K> | Scalar): Result<Mask> {
		const operand = other instanceof Series ? other.data : other;
		const result = compare(op, this.data, operand);
		if (result.error !== ErrorCode.None) return result;
		return ok(new Series(this.derivedName(op, other), result.value));
	}

	private derivedName(op: string, other: Series<K> | Scalar): string {
		return other instanceof Series ? `${this._name}_${op}_${other._name}` : `${this._name}_${op}`;
	}

	/* FLOAT CHECKS
	/* ==================================================== */

	isNan(): Result<Mask> {
		return this.floatMask("isNan", "is_nan", (v) => Number.isNaN(v));
	}

	isNotNan(): Result<Mask> {
		return this.floatMask("isNotNan", "is_not_nan", (v) => !Number.isNaN(v));
	}

	isInfinite(): Result<Mask> {
		return this.floatMask("isInfinite", "is_infinite", (v) => v === Infinity || v === -Infinity);
	}

	/** Null cells stay null */
	private floatMask(operation: string, suffix: string, test: (value: number) => boolean): Result<Mask> {
		if (!isFloatDType(this.dtype)) {
			return fail(new TypeMismatchError(operation, this.dtype, ["float32", "float64"]));
		}
		const out = new ColumnBuffer(DTypeKind.Boolean, this.data.length);
		for (let i = 0; i < this.data.length; i++) {
			const value = this.data.getScalar(i);
			out.append(typeof value === "number" ? test(value) : null);
		}
		return ok(new Series(`${this._name}_${suffix}`, out));
	}

	/* REDUCTIONS
	/*-----------------------------------------------------
	/* Nulls are skipped; an all-null Series reduces to null
	/* ==================================================== */

	/**
	 * Total of the non-null values, without wrapping to the column's width:
	 * a number for 32-bit-and-smaller and float kinds, a bigint for 64-bit
	 * integer kinds.
	 */
	sum(): Result<number | bigint | null> {
		if (!isNumericDType(this.dtype)) {
			return fail(new TypeMismatchError("sum", this.dtype, ["a numeric Series"]));
		}
		let acc: number | bigint | null = null;
		for (const value of this.iterValidScalars()) {
			if (typeof value === "number") acc = (typeof acc === "number" ? acc : 0) + value;
			else if (typeof value === "bigint") acc = (typeof acc === "bigint" ? acc : 0n) + value;
		}
		return ok(acc);
	}

	mean(): Result<number | null> {
		if (!isNumericDType(this.dtype)) {
			return fail(new TypeMismatchError("mean", this.dtype, ["a numeric Series"]));
		}
		let total = 0;
		let count = 0;
		for (const value of this.iterValidScalars()) {
			total += Number(value);
			count++;
		}
		return ok(count === 0 ? null : total / count);
	}

	min(): Result<DTypeToTS<K> | null> {
		return this.extreme("min", -1);
	}

	max(): Result<DTypeToTS<K> | null> {
		return this.extreme("max", 1);
	}

	private extreme(operation: string, sign: 1 | -1): Result<DTypeToTS<K> | null> {
		if (this.dtype === DTypeKind.Boolean || this.dtype === DTypeKind.List) {
			return fail(new TypeMismatchError(operation, this.dtype, ["a numeric or string Series"]));
		}
		let best: Scalar | null = null;
		let bestIndex = -1;
		for (let i = 0; i < this.data.length; i++) {
			const value = this.data.getScalar(i);
			if (value === null || (typeof value === "number" && Number.isNaN(value))) continue;
			if (best === null || compareValues(value, best) === sign) {
				best = value;
				bestIndex = i;
			}
		}
		return ok(bestIndex === -1 ? null : this.data.get(bestIndex));
	}

	all(): Result<boolean> {
		return this.boolReduce("all", true);
	}

	any(): Result<boolean> {
		return this.boolReduce("any", false);
	}

	/** `all` stops at the first false, `any` at the first true */
	private boolReduce(operation: string, identity: boolean): Result<boolean> {
		if (this.dtype !== DTypeKind.Boolean) {
			return fail(new TypeMismatchError(operation, this.dtype, ["a boolean Series"]));
		}
		for (const value of this.iterValidScalars()) {
			if (value !== identity) return ok(!identity);
		}
		return ok(identity);
	}

	private *iterValidScalars(): IterableIterator<Scalar> {
		for (let i = 0; i < this.data.length; i++) {
			const value = this.data.getScalar(i);
			if (value !== null) yield value;
		}
	}

	/* TRANSFORMS
	/*-----------------------------------------------------
	/* Cast, map, row selection
	/* ==================================================== */

	/** Exact conversion to `target`; nulls stay null */
	cast<T extends DTypeKind>(target: T): Result<Series<T>> {
		const result = castBuffer(this.data, target);
		if (result.error !== ErrorCode.None) return result;
		return ok(new Series(this._name, result.value));
	}

	/** Map every cell (null included) to a cell of kind `kind` */
	apply<U extends DTypeKind>(
		kind: U,
		fn: (value: Cell<K>, index: number) => Cell<U>,
	): Result<Series<U>> {
		const mapped: Cell<U>[] = new Array(this.data.length);
		for (let i = 0; i < this.data.length; i++) {
			mapped[i] = fn(this.data.get(i), i);
		}
		return Series.fromOptions(this._name, kind, mapped);
	}

	/**
	 * Same result as `apply`, with contiguous index ranges computed by
	 * separate workers. `fn` must not depend on evaluation order.
	 */
	async parApply<U extends DTypeKind>(
		kind: U,
		fn: (value: Cell<K>, index: number) => Cell<U>,
		options?: ParallelOptions,
	): Promise<Result<Series<U>>> {
		const data = this.data;
		const mapped = await parallelMap(data.length, (i) => fn(data.get(i), i), options);
		return Series.fromOptions(this._name, kind, mapped);
	}

	/** Rows where the mask is true; a null mask cell excludes the row */
	filter(mask: Mask): Result<Series<K>> {
		if (mask.length !== this.data.length) {
			return fail(new ShapeError("filter mask", this.data.length, mask.length));
		}
		return ok(new Series(this._name, this.data.gather(maskIndices(mask))));
	}

	take(indices: ArrayLike<number>): Result<Series<K>> {
		for (let i = 0; i < indices.length; i++) {
			const idx = indices[i];
			if (!Number.isInteger(idx) || idx < 0 || idx >= this.data.length) {
				return fail(new IndexOutOfBoundsError(idx, 0, this.data.length - 1));
			}
		}
		return ok(new Series(this._name, this.data.gather(indices)));
	}

	head(n = 5): Series<K> {
		return this.slice(0, Math.max(0, Math.floor(n)));
	}

	tail(n = 5): Series<K> {
		return this.slice(Math.max(0, this.data.length - Math.max(0, Math.floor(n))));
	}

	slice(start: number, end?: number): Series<K> {
		return new Series(this._name, this.data.slice(start, end));
	}

	clone(): Series<K> {
		return new Series(this._name, this.data.clone());
	}

	/* STRINGS
	/* ==================================================== */

	/** String operations; each fails with TypeMismatch on non-string Series */
	get str(): StringAccessor {
		return new StringAccessor(this._name, this.data);
	}

	/* EQUALITY & DISPLAY
	/* ==================================================== */

	/** Same name, kind and cells (NaN equals NaN) */
	equals(other: Series): boolean {
		return this._name === other._name && this.equalsData(other);
	}

	/** Same kind and cells, ignoring the name; list cells compare by their data */
	equalsData(other: Series): boolean {
		if (this.dtype !== other.dtype || this.length !== other.length) return false;
		for (let i = 0; i < this.data.length; i++) {
			if (!cellsEqual(this.data.getValue(i), other.data.getValue(i))) return false;
		}
		return true;
	}

	toString(): string {
		return formatTable(
			[{ header: this._name, dtype: this.dtype, buffer: this.data }],
			this.data.length,
			`[${this.data.length} rows]`,
		);
	}

	print(): void {
		console.log(this.toString());
	}
}

/** Row indices where a mask is true */
export function maskIndices(mask: Mask): number[] {
	const indices: number[] = [];
	for (let i = 0; i < mask.length; i++) {
		if (mask.buffer.get(i) === true) indices.push(i);
	}
	return indices;
}

function cellsEqual(a: Value | null, b: Value | null): boolean {
	if (a === b) return true;
	if (a === null || b === null) return false;
	if (typeof a === "number" && typeof b === "number") return Number.isNaN(a) && Number.isNaN(b);
	if (isScalar(a) || isScalar(b)) return false;
	return a.equalsData(b);
}

/** Inner dtype of a list buffer: that of its first non-null cell */
function listInnerDtype(buffer: ColumnBuffer): DTypeKind | null {
	if (buffer.kind !== DTypeKind.List) return null;
	for (let i = 0; i < buffer.length; i++) {
		const cell = buffer.getValue(i);
		if (cell !== null && !isScalar(cell)) return cell.dtype;
	}
	return null;
}

/** A cell entering a list buffer must match the inner dtype already there */
function checkInnerDtype(buffer: ColumnBuffer, value: Value | null, operation: string): Result<void> {
	if (value === null || isScalar(value)) return ok(undefined);
	const inner = listInnerDtype(buffer);
	if (inner !== null && value.dtype !== inner) {
		return fail(new TypeMismatchError(operation, `list[${value.dtype}]`, [`list[${inner}]`]));
	}
	return ok(undefined);
}

/** Narrow a Series to a known kind */
export function hasKind<K extends DTypeKind>(series: Series, kind: K): series is Series<K> {
	return series.dtype === kind;
}
