import {
	ColumnNotFoundError,
	DuplicateColumnError,
	IndexOutOfBoundsError,
	ShapeError,
	TypeMismatchError,
} from "../errors/index.ts";
import { type JoinConfig, JoinType } from "../ops/join.ts";
import { type SortColumn, type SortKey, sortIndices } from "../ops/sort.ts";
import { type ParallelOptions, parallelMap } from "../series/parallel.ts";
import { maskIndices, hasKind, type Mask, Series } from "../series/series.ts";
import { DTypeKind, type Value } from "../types/dtypes.ts";
import { ErrorCode, fail, ok, type Result } from "../types/error.ts";
import { formatTable } from "../utils/display.ts";
import { GroupBy } from "./groupby.ts";
import { joinFrames } from "./join.ts";

/** One row as a plain object, keyed by column name */
export type Row = Record<string, Value | null>;

/** A sort key by name or a full SortKey */
export type SortBy = string | SortKey;

/**
 * DataFrame - an ordered collection of equal-length, uniquely named Series.
 *
 * The frame owns its columns. Every operation that reorders or selects
 * rows (filter, sort, select, head, join, groupby) returns a new frame
 * with freshly copied storage; only `addColumn`, `dropColumn` and
 * `renameColumn` change a frame in place. Column accessors hand out
 * copies, so mutating a returned Series never touches the frame.
 *
 * @example
 * ```ts
 * const df = unwrap(DataFrame.fromArrays(
 *   { id: [1, 2, 3], city: ["Oslo", "Lima", null] },
 *   { id: DTypeKind.Int32, city: DTypeKind.String },
 * ));
 * const adults = unwrap(df.filter(unwrap(unwrap(df.column("id")).gt(1))));
 * ```
 */
export class DataFrame {
	/** @internal Insertion order is column order */
	private readonly _columns = new Map<string, Series>();
	private _height = 0;

	// Factory Methods
	// ===============================================================

	static empty(): DataFrame {
		return new DataFrame();
	}

	/** Build from Series, copying each; names must be unique and lengths equal */
	static fromSeries(columns: readonly Series[]): Result<DataFrame> {
		const df = new DataFrame();
		for (const series of columns) {
			const added = df.addColumn(series);
			if (added.error !== ErrorCode.None) return added;
		}
		return ok(df);
	}

	/**
	 * Build from column arrays and a schema. Columns appear in schema order;
	 * values are validated against their column's kind.
	 */
	static fromArrays(
		data: Readonly<Record<string, ReadonlyArray<unknown>>>,
		schema: Readonly<Record<string, DTypeKind>>,
	): Result<DataFrame> {
		const df = new DataFrame();
		for (const [name, kind] of Object.entries(schema)) {
			const values = data[name];
			if (values === undefined) {
				return fail(new ColumnNotFoundError(name, Object.keys(data)));
			}
			const series = Series.fromValues(name, kind, values);
			if (series.error !== ErrorCode.None) return series;
			const added = df.adopt(series.value);
			if (added.error !== ErrorCode.None) return added;
		}
		return ok(df);
	}

	// Shape & Schema
	// ===============================================================

	get height(): number {
		return this._height;
	}

	get width(): number {
		return this._columns.size;
	}

	/** [rows, columns] */
	shape(): [rows: number, cols: number] {
		return [this._height, this._columns.size];
	}

	get columnNames(): string[] {
		return [...this._columns.keys()];
	}

	get dtypes(): DTypeKind[] {
		return this.ownColumns().map((s) => s.dtype);
	}

	get schema(): Record<string, DTypeKind> {
		const schema: Record<string, DTypeKind> = {};
		for (const [name, series] of this._columns) schema[name] = series.dtype;
		return schema;
	}

	/** Copies of the columns, in column order */
	get columns(): Series[] {
		return this.ownColumns().map((s) => s.clone());
	}

	/** @internal The frame's own Series, in column order. Callers must not mutate them. */
	ownColumns(): Series[] {
		return [...this._columns.values()];
	}

	isEmpty(): boolean {
		return this._height === 0;
	}

	// Column Access
	// ===============================================================

	/** Copy of the named column */
	column(name: string): Result<Series> {
		const found = this.ownColumn(name);
		if (found.error !== ErrorCode.None) return found;
		return ok(found.value.clone());
	}

	/** @internal The frame's own Series. Callers must not mutate it. */
	ownColumn(name: string): Result<Series> {
		const series = this._columns.get(name);
		if (series === undefined) {
			return fail(new ColumnNotFoundError(name, this.columnNames));
		}
		return ok(series);
	}

	/** Copy of a column typed as `kind`; fails with TypeMismatch if its dtype differs */
	downcastColumn<K extends DTypeKind>(name: string, kind: K): Result<Series<K>> {
		const found = this.ownColumn(name);
		if (found.error !== ErrorCode.None) return found;
		const series = found.value;
		if (!hasKind(series, kind)) {
			return fail(new TypeMismatchError("downcastColumn", series.dtype, [kind]));
		}
		return ok(series.clone());
	}

	columnAt(index: number): Result<Series> {
		const series = this.ownColumns()[index];
		if (!Number.isInteger(index) || series === undefined) {
			return fail(new IndexOutOfBoundsError(index, 0, this._columns.size - 1));
		}
		return ok(series.clone());
	}

	// Column Mutation
	// ===============================================================

	/**
	 * Add a copy of `series` as the last column. An empty frame adopts the
	 * series' length.
	 */
	addColumn(series: Series): Result<void> {
		return this.adopt(series.clone());
	}

	/** Remove a column and return it */
	dropColumn(name: string): Result<Series> {
		const found = this.ownColumn(name);
		if (found.error !== ErrorCode.None) return found;
		this._columns.delete(name);
		if (this._columns.size === 0) this._height = 0;
		return found;
	}

	/** Rename in place, keeping the column's position */
	renameColumn(from: string, to: string): Result<void> {
		const found = this.ownColumn(from);
		if (found.error !== ErrorCode.None) return found;
		if (from === to) return ok(undefined);
		if (this._columns.has(to)) {
			return fail(new DuplicateColumnError(to, "renameColumn"));
		}

		const entries = [...this._columns.entries()];
		this._columns.clear();
		for (const [name, series] of entries) {
			if (name === from) {
				series.rename(to);
				this._columns.set(to, series);
			} else {
				this._columns.set(name, series);
			}
		}
		return ok(undefined);
	}

	/** Take ownership of `series` without copying */
	private adopt(series: Series): Result<void> {
		if (this._columns.has(series.name)) {
			return fail(new DuplicateColumnError(series.name, "addColumn"));
		}
		if (this._columns.size > 0 && series.length !== this._height) {
			return fail(new ShapeError(`column '${series.name}'`, this._height, series.length));
		}
		if (this._columns.size === 0) this._height = series.length;
		this._columns.set(series.name, series);
		return ok(undefined);
	}

	// Projection & Row Selection
	// ===============================================================

	/** New frame with the requested columns, in the requested order */
	select(names: readonly string[]): Result<DataFrame> {
		const picked: Series[] = [];
		for (const name of names) {
			const found = this.ownColumn(name);
			if (found.error !== ErrorCode.None) return found;
			picked.push(found.value);
		}
		return DataFrame.fromSeries(picked);
	}

	/** New frame without the named columns */
	drop(names: readonly string[]): Result<DataFrame> {
		for (const name of names) {
			const found = this.ownColumn(name);
			if (found.error !== ErrorCode.None) return found;
		}
		const excluded = new Set(names);
		return DataFrame.fromSeries(this.ownColumns().filter((s) => !excluded.has(s.name)));
	}

	/**
	 * Rows where `mask` is true, in original order. A null mask cell
	 * excludes its row.
	 */
	filter(mask: Mask): Result<DataFrame> {
		if (mask.length !== this._height) {
			return fail(new ShapeError("filter mask", this._height, mask.length));
		}
		return ok(this.takeUnchecked(maskIndices(mask)));
	}

	/**
	 * Same result as `filter`, with the columns gathered by separate
	 * workers.
	 */
	async parFilter(mask: Mask, options?: ParallelOptions): Promise<Result<DataFrame>> {
		if (mask.length !== this._height) {
			return fail(new ShapeError("filter mask", this._height, mask.length));
		}
		const indices = maskIndices(mask);
		const columns = this.ownColumns();
		const gathered = await parallelMap(
			columns.length,
			(c) => new Series(columns[c].name, columns[c].buffer.gather(indices)),
			options,
		);

		const df = new DataFrame();
		for (const series of gathered) df._columns.set(series.name, series);
		df._height = indices.length;
		return ok(df);
	}

	/** First `n` rows; a fractional `n` rounds down */
	head(n = 5): DataFrame {
		return this.sliceRows(0, Math.max(0, Math.floor(n)));
	}

	/** Last `n` rows; a fractional `n` rounds down */
	tail(n = 5): DataFrame {
		return this.sliceRows(Math.max(0, this._height - Math.max(0, Math.floor(n))), this._height);
	}

	private sliceRows(start: number, end: number): DataFrame {
		const df = new DataFrame();
		for (const series of this._columns.values()) {
			df._columns.set(series.name, series.slice(start, end));
		}
		const first = df.ownColumns()[0];
		df._height = first === undefined ? 0 : first.length;
		return df;
	}

	/** @internal Gather the same rows from every column */
	takeUnchecked(indices: ArrayLike<number>): DataFrame {
		const df = new DataFrame();
		for (const series of this._columns.values()) {
			df._columns.set(series.name, new Series(series.name, series.buffer.gather(indices)));
		}
		df._height = indices.length;
		return df;
	}

	// Sorting
	// ===============================================================

	/**
	 * Stable sort by one or more keys. One permutation is computed from all
	 * keys (earlier keys take priority) and applied to every column. Nulls
	 * sort last in either direction unless a key sets `nullsFirst`.
	 *
	 * `descending` applies to keys given by name; a SortKey carries its own.
	 */
	sort(by: SortBy | readonly SortBy[], descending: boolean | readonly boolean[] = false): Result<DataFrame> {
		const keys: readonly SortBy[] = isSortByList(by) ? by : [by];
		if (typeof descending !== "boolean" && descending.length !== keys.length) {
			return fail(new ShapeError("sort directions", keys.length, descending.length));
		}

		const resolved: SortColumn[] = [];
		for (let k = 0; k < keys.length; k++) {
			const key = keys[k];
			const spec: SortKey =
				typeof key === "string"
					? { column: key, descending: typeof descending === "boolean" ? descending : descending[k] }
					: key;
			const found = this.ownColumn(spec.column);
			if (found.error !== ErrorCode.None) return found;
			if (found.value.dtype === DTypeKind.List) {
				return fail(new TypeMismatchError("sort", found.value.dtype, ["a flat column"]));
			}
			resolved.push({
				buffer: found.value.buffer,
				descending: spec.descending ?? false,
				nullsFirst: spec.nullsFirst ?? false,
			});
		}

		return ok(this.takeUnchecked(sortIndices(resolved, this._height)));
	}

	// Grouping & Joins
	// ===============================================================

	groupby(keys: string | readonly string[]): Result<GroupBy> {
		return GroupBy.create(this, typeof keys === "string" ? [keys] : keys);
	}

	join(right: DataFrame, config: JoinConfig): Result<DataFrame> {
		return joinFrames(this, right, config);
	}

	innerJoin(right: DataFrame, on: string | readonly string[], rightOn?: string | readonly string[]): Result<DataFrame> {
		return joinFrames(this, right, { leftOn: on, rightOn, joinType: JoinType.Inner });
	}

	leftJoin(right: DataFrame, on: string | readonly string[], rightOn?: string | readonly string[]): Result<DataFrame> {
		return joinFrames(this, right, { leftOn: on, rightOn, joinType: JoinType.Left });
	}

	rightJoin(right: DataFrame, on: string | readonly string[], rightOn?: string | readonly string[]): Result<DataFrame> {
		return joinFrames(this, right, { leftOn: on, rightOn, joinType: JoinType.Right });
	}

	outerJoin(right: DataFrame, on: string | readonly string[], rightOn?: string | readonly string[]): Result<DataFrame> {
		return joinFrames(this, right, { leftOn: on, rightOn, joinType: JoinType.Outer });
	}

	// Rows & Display
	// ===============================================================

	*rows(): IterableIterator<Row> {
		const columns = this.ownColumns();
		for (let i = 0; i < this._height; i++) {
			const row: Row = {};
			for (const series of columns) {
				row[series.name] = series.buffer.get(i);
			}
			yield row;
		}
	}

	toArray(): Row[] {
		return Array.from(this.rows());
	}

	toString(): string {
		return formatTable(
			this.ownColumns().map((s) => ({ header: s.name, dtype: s.dtype, buffer: s.buffer })),
			this._height,
			`[${this._height} rows × ${this._columns.size} columns]`,
		);
	}

	print(): void {
		console.log(this.toString());
	}
}

function isSortByList(by: SortBy | readonly SortBy[]): by is readonly SortBy[] {
	return Array.isArray(by);
}
