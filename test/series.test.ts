/**
 * Tests for Series construction, access, nulls, sorting and reductions
 */

import { describe, expect, it } from "vitest";
import { Series } from "../src/series/series.ts";
import { DTypeKind } from "../src/types/dtypes.ts";
import { ErrorCode, unwrap } from "../src/types/error.ts";

describe("Series", () => {
	describe("construction", () => {
		it("should build from values", () => {
			const s = unwrap(Series.from("a", DTypeKind.Int32, [1, 2, 3]));

			expect(s.name).toBe("a");
			expect(s.dtype).toBe(DTypeKind.Int32);
			expect(s.length).toBe(3);
			expect(unwrap(s.get(1))).toBe(2);
		});

		it("should mark null and undefined as missing", () => {
			const s = unwrap(Series.fromOptions("a", DTypeKind.Float64, [1.5, null, undefined]));

			expect(s.nullCount()).toBe(2);
			expect(s.toArray()).toEqual([1.5, null, null]);
		});

		it("should reject out-of-range integers", () => {
			const result = Series.from("a", DTypeKind.UInt8, [300]);
			expect(result.error).toBe(ErrorCode.CastFailed);
		});

		it("should reject values of the wrong type", () => {
			const result = Series.fromValues("a", DTypeKind.Int32, [1, "x"]);
			expect(result.error).toBe(ErrorCode.TypeMismatch);
		});

		it("should accept integral numbers for 64-bit columns", () => {
			const s = unwrap(Series.fromValues("a", DTypeKind.Int64, [5, 6n]));
			expect(s.toArray()).toEqual([5n, 6n]);
		});

		it("should start empty and grow with push", () => {
			const s = Series.empty("s", DTypeKind.String);
			expect(s.isEmpty()).toBe(true);

			expect(s.push("x").error).toBe(ErrorCode.None);
			expect(s.push(null).error).toBe(ErrorCode.None);
			expect(s.toArray()).toEqual(["x", null]);
		});

		it("should reject a push that does not fit", () => {
			const s = Series.empty("s", DTypeKind.Int8);
			expect(s.push(128).error).toBe(ErrorCode.CastFailed);
			expect(s.length).toBe(0);
		});
	});

	describe("access", () => {
		const s = unwrap(Series.fromOptions("a", DTypeKind.Int32, [1, null, 3]));

		it("should fail on an index out of range", () => {
			expect(s.get(3).error).toBe(ErrorCode.IndexOutOfBounds);
			expect(s.get(-1).error).toBe(ErrorCode.IndexOutOfBounds);
		});

		it("should return null for a missing cell", () => {
			expect(unwrap(s.get(1))).toBeNull();
		});

		it("should iterate valid values more than once", () => {
			const valid = s.iterValid();
			expect([...valid]).toEqual([1, 3]);
			expect([...valid]).toEqual([1, 3]);
		});

		it("should iterate every cell", () => {
			expect([...s]).toEqual([1, null, 3]);
		});
	});

	describe("nulls", () => {
		it("should build null masks", () => {
			const s = unwrap(Series.fromOptions("a", DTypeKind.Int32, [1, null, 3]));
			const isNull = s.isNull();
			const notNull = s.notNull();

			expect(isNull.name).toBe("a_is_null");
			expect(isNull.toArray()).toEqual([false, true, false]);
			expect(notNull.name).toBe("a_not_null");
			expect(notNull.toArray()).toEqual([true, false, true]);
		});

		it("should fill nulls into a new Series", () => {
			const s = unwrap(Series.fromOptions("a", DTypeKind.Int32, [1, null, 3]));
			const filled = unwrap(s.fillNull(0));

			expect(filled.toArray()).toEqual([1, 0, 3]);
			expect(s.toArray()).toEqual([1, null, 3]);
		});

		it("should fill nulls in place", () => {
			const s = unwrap(Series.fromOptions("a", DTypeKind.String, [null, "b"]));
			expect(s.fillNullInPlace("z").error).toBe(ErrorCode.None);
			expect(s.toArray()).toEqual(["z", "b"]);
		});

		it("should reject a fill value that does not fit", () => {
			const s = unwrap(Series.fromOptions("a", DTypeKind.UInt8, [null]));
			expect(s.fillNull(-1).error).toBe(ErrorCode.CastFailed);
		});
	});

	describe("sort", () => {
		it("should sort ascending and descending in place", () => {
			const s = unwrap(Series.from("a", DTypeKind.Int32, [3, 1, 4, 1, 5]));

			s.sort();
			expect(s.toArray()).toEqual([1, 1, 3, 4, 5]);
			expect(s.isSorted()).toBe(true);

			s.sort(true);
			expect(s.toArray()).toEqual([5, 4, 3, 1, 1]);
			expect(s.isSorted(true)).toBe(true);
			expect(s.isSorted()).toBe(false);
		});

		it("should keep nulls last in either direction", () => {
			const s = unwrap(Series.fromOptions("a", DTypeKind.Int32, [2, null, 1]));

			s.sort();
			expect(s.toArray()).toEqual([1, 2, null]);
			s.sort(true);
			expect(s.toArray()).toEqual([2, 1, null]);
		});

		it("should order NaN above every number", () => {
			const s = unwrap(Series.from("f", DTypeKind.Float64, [Number.NaN, 1, -1]));
			s.sort();
			expect(s.toArray()).toEqual([-1, 1, Number.NaN]);
		});

		it("should sort strings by code unit", () => {
			const s = unwrap(Series.from("s", DTypeKind.String, ["b", "B", "a"]));
			s.sort();
			expect(s.toArray()).toEqual(["B", "a", "b"]);
		});
	});

	describe("reductions", () => {
		const s = unwrap(Series.fromOptions("a", DTypeKind.Int32, [1, null, 3]));

		it("should skip nulls", () => {
			expect(unwrap(s.sum())).toBe(4);
			expect(unwrap(s.mean())).toBe(2);
			expect(unwrap(s.min())).toBe(1);
			expect(unwrap(s.max())).toBe(3);
		});

		it("should reduce an all-null Series to null", () => {
			const empty = unwrap(Series.fromOptions("a", DTypeKind.Float64, [null, null]));
			expect(unwrap(empty.sum())).toBeNull();
			expect(unwrap(empty.mean())).toBeNull();
			expect(unwrap(empty.max())).toBeNull();
		});

		it("should sum narrow integers without wrapping", () => {
			const bytes = unwrap(Series.from("b", DTypeKind.UInt8, [200, 100]));
			expect(unwrap(bytes.sum())).toBe(300);
		});

		it("should sum 64-bit integers as bigint", () => {
			const big = unwrap(Series.from("b", DTypeKind.Int64, [1n, 2n]));
			expect(unwrap(big.sum())).toBe(3n);
		});

		it("should skip NaN in min and max", () => {
			const f = unwrap(Series.from("f", DTypeKind.Float64, [2, Number.NaN, -1]));
			expect(unwrap(f.min())).toBe(-1);
			expect(unwrap(f.max())).toBe(2);
		});

		it("should reject sum on strings", () => {
			const str = unwrap(Series.from("s", DTypeKind.String, ["a"]));
			expect(str.sum().error).toBe(ErrorCode.TypeMismatch);
		});

		it("should reduce booleans with all and any", () => {
			const b = unwrap(Series.fromOptions("b", DTypeKind.Boolean, [true, null, false]));
			expect(unwrap(b.all())).toBe(false);
			expect(unwrap(b.any())).toBe(true);
			expect(s.all().error).toBe(ErrorCode.TypeMismatch);
		});
	});

	describe("float checks", () => {
		it("should flag NaN and infinity, leaving nulls null", () => {
			const f = unwrap(Series.fromOptions("f", DTypeKind.Float64, [1, Number.NaN, null, -Infinity]));

			const nan = unwrap(f.isNan());
			expect(nan.name).toBe("f_is_nan");
			expect(nan.toArray()).toEqual([false, true, null, false]);
			expect(unwrap(f.isNotNan()).toArray()).toEqual([true, false, null, true]);
			expect(unwrap(f.isInfinite()).toArray()).toEqual([false, false, null, true]);
		});

		it("should reject integer Series", () => {
			const i = unwrap(Series.from("i", DTypeKind.Int32, [1]));
			expect(i.isNan().error).toBe(ErrorCode.TypeMismatch);
		});
	});

	describe("row selection", () => {
		const s = unwrap(Series.from("a", DTypeKind.Int32, [10, 20, 30, 40]));

		it("should filter by mask, dropping null mask cells", () => {
			const mask = unwrap(Series.fromOptions("m", DTypeKind.Boolean, [true, null, false, true]));
			expect(unwrap(s.filter(mask)).toArray()).toEqual([10, 40]);
		});

		it("should reject a mask of another length", () => {
			const mask = unwrap(Series.from("m", DTypeKind.Boolean, [true]));
			expect(s.filter(mask).error).toBe(ErrorCode.ShapeMismatch);
		});

		it("should take rows in the given order", () => {
			expect(unwrap(s.take([3, 0, 0])).toArray()).toEqual([40, 10, 10]);
			expect(s.take([4]).error).toBe(ErrorCode.IndexOutOfBounds);
		});

		it("should slice from either end", () => {
			expect(s.head(2).toArray()).toEqual([10, 20]);
			expect(s.tail(1).toArray()).toEqual([40]);
			expect(s.slice(1, 3).toArray()).toEqual([20, 30]);
			expect(s.head(10).length).toBe(4);
		});

		it("should round fractional bounds down", () => {
			expect(s.head(1.5).toArray()).toEqual([10]);
			expect(s.tail(1.5).toArray()).toEqual([40]);
			expect(s.slice(0.5, 2.5).toArray()).toEqual([10, 20]);
		});
	});

	describe("equality", () => {
		it("should compare names and cells", () => {
			const a = unwrap(Series.from("a", DTypeKind.Float64, [1, Number.NaN]));
			const b = a.withName("b");

			expect(a.equals(a.clone())).toBe(true);
			expect(a.equals(b)).toBe(false);
			expect(a.equalsData(b)).toBe(true);
		});

		it("should treat different kinds as unequal", () => {
			const a = unwrap(Series.from("a", DTypeKind.Int32, [1]));
			const b = unwrap(Series.from("a", DTypeKind.Int64, [1n]));
			expect(a.equalsData(b)).toBe(false);
		});
	});

	describe("toString", () => {
		it("should render a boxed table with a dtype row", () => {
			const s = unwrap(Series.fromOptions("a", DTypeKind.Int32, [1, null]));

			expect(s.toString().split("\n")).toEqual([
				"┌───────┐",
				"│   a   │",
				"│ int32 │",
				"├───────┤",
				"│     1 │",
				"│  null │",
				"└───────┘",
				"[2 rows]",
			]);
		});
	});
});
