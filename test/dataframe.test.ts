/**
 * Tests for DataFrame construction, projection and row selection
 */

import { describe, expect, it } from "vitest";
import { DataFrame } from "../src/dataframe/dataframe.ts";
import { ColumnNotFoundError } from "../src/errors/index.ts";
import { Series } from "../src/series/series.ts";
import { DTypeKind } from "../src/types/dtypes.ts";
import { ErrorCode, unwrap } from "../src/types/error.ts";
import { frame, values } from "./helpers.ts";

function people(): DataFrame {
	return frame(
		{ id: [1, 2, 3, 4], name: ["ann", "bob", null, "dee"], score: [9.5, 7, 8, null] },
		{ id: DTypeKind.Int32, name: DTypeKind.String, score: DTypeKind.Float64 },
	);
}

describe("DataFrame", () => {
	describe("construction", () => {
		it("should build columns in schema order", () => {
			const df = people();

			expect(df.shape()).toEqual([4, 3]);
			expect(df.columnNames).toEqual(["id", "name", "score"]);
			expect(df.dtypes).toEqual([DTypeKind.Int32, DTypeKind.String, DTypeKind.Float64]);
			expect(df.schema).toEqual({ id: "int32", name: "string", score: "float64" });
		});

		it("should fail when the schema names a missing array", () => {
			const result = DataFrame.fromArrays({ a: [1] }, { a: DTypeKind.Int32, b: DTypeKind.Int32 });
			expect(result.error).toBe(ErrorCode.UnknownColumn);
		});

		it("should fail on arrays of different length", () => {
			const result = DataFrame.fromArrays({ a: [1, 2], b: [1] }, { a: DTypeKind.Int32, b: DTypeKind.Int32 });
			expect(result.error).toBe(ErrorCode.ShapeMismatch);
		});

		it("should fail on duplicate Series names", () => {
			const a = unwrap(Series.from("a", DTypeKind.Int32, [1]));
			expect(DataFrame.fromSeries([a, a]).error).toBe(ErrorCode.DuplicateColumn);
		});
	});

	describe("columns", () => {
		it("should adopt the first column's length", () => {
			const df = DataFrame.empty();
			expect(df.isEmpty()).toBe(true);

			expect(df.addColumn(unwrap(Series.from("a", DTypeKind.Int32, [1, 2]))).error).toBe(ErrorCode.None);
			expect(df.height).toBe(2);

			const short = unwrap(Series.from("b", DTypeKind.Int32, [1]));
			expect(df.addColumn(short).error).toBe(ErrorCode.ShapeMismatch);

			const dup = unwrap(Series.from("a", DTypeKind.Int32, [3, 4]));
			expect(df.addColumn(dup).error).toBe(ErrorCode.DuplicateColumn);
			expect(df.width).toBe(1);
		});

		it("should copy an added Series", () => {
			const df = DataFrame.empty();
			const s = unwrap(Series.from("a", DTypeKind.Int32, [1, 2]));
			unwrap(df.addColumn(s));

			s.push(3);

			expect(unwrap(df.column("a")).length).toBe(2);
		});

		it("should hand out copies that leave the frame aligned", () => {
			const df = frame({ id: [3, 1, 2], name: ["c", "a", "b"] }, { id: DTypeKind.Int32, name: DTypeKind.String });
			const byId = unwrap(df.groupby("id"));

			const id = unwrap(df.column("id"));
			unwrap(id.sort());
			unwrap(id.push(9));
			unwrap(unwrap(df.columnAt(1)).push("z"));
			unwrap(unwrap(df.downcastColumn("id", DTypeKind.Int32)).push(7));
			df.columns[0].clear();

			expect(id.toArray()).toEqual([1, 2, 3, 9]);
			expect(df.toArray()).toEqual([
				{ id: 3, name: "c" },
				{ id: 1, name: "a" },
				{ id: 2, name: "b" },
			]);
			expect(df.height).toBe(3);
			expect(df.columns.map((s) => s.length)).toEqual([3, 3]);
			expect(byId.groups().map((g) => g.rows)).toEqual([[0], [1], [2]]);
			expect(values(unwrap(byId.count()), "id")).toEqual([3, 1, 2]);
		});

		it("should report unknown columns with the available names", () => {
			const result = people().column("age");

			expect(result.error).toBe(ErrorCode.UnknownColumn);
			if (result.error !== ErrorCode.None) {
				expect(result.reason).toBeInstanceOf(ColumnNotFoundError);
				expect(result.reason?.hint).toBe("available columns are: 'id', 'name', 'score'");
			}
		});

		it("should downcast to the column's kind only", () => {
			const df = people();
			const id = unwrap(df.downcastColumn("id", DTypeKind.Int32));

			expect(unwrap(id.sum())).toBe(10);
			expect(df.downcastColumn("id", DTypeKind.Int64).error).toBe(ErrorCode.TypeMismatch);
		});

		it("should access columns by position", () => {
			const df = people();
			expect(unwrap(df.columnAt(1)).name).toBe("name");
			expect(df.columnAt(3).error).toBe(ErrorCode.IndexOutOfBounds);
		});

		it("should rename in place and keep the position", () => {
			const df = people();

			unwrap(df.renameColumn("name", "who"));

			expect(df.columnNames).toEqual(["id", "who", "score"]);
			expect(df.renameColumn("who", "id").error).toBe(ErrorCode.DuplicateColumn);
		});

		it("should drop a column and return it", () => {
			const df = people();
			const dropped = unwrap(df.dropColumn("score"));

			expect(dropped.name).toBe("score");
			expect(df.columnNames).toEqual(["id", "name"]);
			expect(df.dropColumn("score").error).toBe(ErrorCode.UnknownColumn);
		});
	});

	describe("projection", () => {
		it("should select columns in the requested order", () => {
			const selected = unwrap(people().select(["score", "id"]));
			expect(selected.columnNames).toEqual(["score", "id"]);
			expect(selected.height).toBe(4);
		});

		it("should fail to select an unknown column", () => {
			expect(people().select(["id", "nope"]).error).toBe(ErrorCode.UnknownColumn);
		});

		it("should drop the named columns", () => {
			expect(unwrap(people().drop(["name"])).columnNames).toEqual(["id", "score"]);
		});
	});

	describe("filter", () => {
		it("should keep rows where the mask is true", () => {
			const df = people();
			const mask = unwrap(unwrap(df.downcastColumn("score", DTypeKind.Float64)).gt(7.5));
			const filtered = unwrap(df.filter(mask));

			expect(filtered.height).toBe(2);
			expect(values(filtered, "id")).toEqual([1, 3]);
			expect(values(filtered, "name")).toEqual(["ann", null]);
		});

		it("should reject a mask of another length", () => {
			const mask = unwrap(Series.from("m", DTypeKind.Boolean, [true]));
			expect(people().filter(mask).error).toBe(ErrorCode.ShapeMismatch);
		});

		it("should give the same rows when filtering in parallel", async () => {
			const df = people();
			const mask = unwrap(Series.fromOptions("m", DTypeKind.Boolean, [true, null, true, false]));

			const parallel = unwrap(await df.parFilter(mask, { workers: 2, batchSize: 1 }));

			expect(parallel.toArray()).toEqual(unwrap(df.filter(mask)).toArray());
			expect(parallel.toArray()).toEqual([
				{ id: 1, name: "ann", score: 9.5 },
				{ id: 3, name: null, score: 8 },
			]);
			expect(parallel.height).toBe(2);
		});

		it("should reject a parallel filter mask of another length", async () => {
			const mask = unwrap(Series.from("m", DTypeKind.Boolean, [true]));
			expect((await people().parFilter(mask)).error).toBe(ErrorCode.ShapeMismatch);
		});

		it("should copy storage", () => {
			const df = people();
			const mask = unwrap(Series.from("m", DTypeKind.Boolean, [true, true, true, true]));
			const filtered = unwrap(df.filter(mask));

			unwrap(unwrap(filtered.column("name")).fillNullInPlace("cy"));

			expect(values(df, "name")).toEqual(["ann", "bob", null, "dee"]);
		});
	});

	describe("head and tail", () => {
		it("should take rows from either end", () => {
			const df = people();

			expect(values(df.head(2), "id")).toEqual([1, 2]);
			expect(values(df.tail(1), "id")).toEqual([4]);
			expect(df.head(10).height).toBe(4);
			expect(df.tail(0).height).toBe(0);
		});

		it("should round a fractional row count down", () => {
			const df = people();
			const top = df.head(1.5);

			expect(top.height).toBe(1);
			expect(top.columns.map((s) => s.length)).toEqual([1, 1, 1]);
			expect(values(df.tail(2.7), "id")).toEqual([3, 4]);
			expect(df.tail(2.7).height).toBe(2);
		});
	});

	describe("rows", () => {
		it("should materialize rows as objects", () => {
			expect(people().head(2).toArray()).toEqual([
				{ id: 1, name: "ann", score: 9.5 },
				{ id: 2, name: "bob", score: 7 },
			]);
		});

		it("should end the rendered table with its shape", () => {
			const lines = people().toString().split("\n");
			expect(lines[lines.length - 1]).toBe("[4 rows × 3 columns]");
		});
	});
});
