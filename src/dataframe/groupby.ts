import type { ColumnBuffer } from "../buffer/column-buffer.ts";
import { DuplicateColumnError, InvalidOperationError, TypeMismatchError } from "../errors/index.ts";
import { AGG_FUNCTIONS, type AggFn, supportsInput } from "../ops/agg-state.ts";
import {
	aggregateColumn,
	type GroupPartition,
	groupSizes,
	keyColumnsOf,
	partitionRows,
} from "../ops/groupby.ts";
import type { KeyValue } from "../ops/key-hasher.ts";
import { Series } from "../series/series.ts";
import { DTypeKind, isNumericDType } from "../types/dtypes.ts";
import { ErrorCode, fail, ok, type Result } from "../types/error.ts";
import { DataFrame } from "./dataframe.ts";

/** Aggregations per column for `agg` */
export type AggSpec = Readonly<Record<string, AggFn | readonly AggFn[]>>;

/** One group: its key tuple and member rows */
export interface Group {
	key: KeyValue[];
	rows: number[];
}

/**
 * GroupBy - Split-Apply-Combine operations.
 *
 * Groups a DataFrame by one or more columns. Every aggregation returns a
 * new DataFrame with one row per group, groups in the order their key
 * first appears, key columns first.
 *
 * @example
 * ```ts
 * df.groupby("category").value.agg({ price: "mean", quantity: ["sum", "max"] })
 * ```
 */
export class GroupBy {
	private readonly df: DataFrame;
	private readonly keyNames: string[];
	private readonly keyColumns: ColumnBuffer[];
	private readonly partition: GroupPartition;

	private constructor(df: DataFrame, keyNames: string[], keyColumns: ColumnBuffer[]) {
		this.df = df;
		this.keyNames = keyNames;
		this.keyColumns = keyColumns;
		this.partition = partitionRows(keyColumns, df.height);
	}

	static create(df: DataFrame, keys: readonly string[]): Result<GroupBy> {
		if (keys.length === 0) {
			return fail(new InvalidOperationError("groupby", "requires at least one key column"));
		}
		const seen = new Set<string>();
		const keyColumns: ColumnBuffer[] = [];
		for (const name of keys) {
			if (seen.has(name)) return fail(new DuplicateColumnError(name, "groupby"));
			seen.add(name);
			const found = df.ownColumn(name);
			if (found.error !== ErrorCode.None) return found;
			if (found.value.dtype === DTypeKind.List) {
				return fail(new TypeMismatchError("groupby", found.value.dtype, ["a flat key column"]));
			}
			keyColumns.push(found.value.buffer);
		}
		return ok(new GroupBy(df, [...keys], keyColumns));
	}

	/** Number of groups */
	get size(): number {
		return this.partition.keys.length;
	}

	/** Copy of every group's key and member rows */
	groups(): Group[] {
		return this.partition.keys.map((key, g) => ({ key: [...key], rows: [...this.partition.rows[g]] }));
	}

	/** Rows per group, in a uint32 `count` column */
	count(): Result<DataFrame> {
		return this.build([new Series("count", groupSizes(this.partition))]);
	}

	sum(): Result<DataFrame> {
		return this.numeric("sum");
	}

	mean(): Result<DataFrame> {
		return this.numeric("mean");
	}

	min(): Result<DataFrame> {
		return this.numeric("min");
	}

	max(): Result<DataFrame> {
		return this.numeric("max");
	}

	/**
	 * Aggregate chosen columns. A single function keeps the column's name;
	 * a list yields `<column>_<fn>` columns. `count` counts non-null cells.
	 * Fails with InvalidAggregation when a function does not apply to the
	 * column's dtype.
	 */
	agg(spec: AggSpec): Result<DataFrame> {
		const out: Series[] = [];
		for (const [name, fns] of Object.entries(spec)) {
			const found = this.df.ownColumn(name);
			if (found.error !== ErrorCode.None) return found;
			const column = found.value;

			const list: readonly AggFn[] = typeof fns === "string" ? [fns] : fns;
			for (const fn of list) {
				if (!AGG_FUNCTIONS.includes(fn)) {
					return fail(
						new InvalidOperationError(
							"agg",
							`got unknown aggregation '${fn}'`,
							`valid options: ${AGG_FUNCTIONS.join(", ")}`,
							ErrorCode.InvalidAggregation,
						),
					);
				}
				if (!supportsInput(fn, column.dtype)) {
					return fail(
						new InvalidOperationError(
							"agg",
							`cannot apply '${fn}' to ${column.dtype} column '${name}'`,
							"cast the column first or pick another aggregation",
							ErrorCode.InvalidAggregation,
						),
					);
				}
				const outName = typeof fns === "string" ? name : `${name}_${fn}`;
				out.push(new Series(outName, aggregateColumn(column.buffer, this.partition, fn)));
			}
		}
		return this.build(out);
	}

	/** Apply `fn` to every non-key numeric column; other columns are dropped */
	private numeric(fn: AggFn): Result<DataFrame> {
		const keys = new Set(this.keyNames);
		const out: Series[] = [];
		for (const column of this.df.ownColumns()) {
			if (keys.has(column.name) || !isNumericDType(column.dtype)) continue;
			out.push(new Series(column.name, aggregateColumn(column.buffer, this.partition, fn)));
		}
		return this.build(out);
	}

	private build(aggregated: readonly Series[]): Result<DataFrame> {
		const keys = keyColumnsOf(this.keyColumns, this.partition).map(
			(buffer, i) => new Series(this.keyNames[i], buffer),
		);
		return DataFrame.fromSeries([...keys, ...aggregated]);
	}
}
