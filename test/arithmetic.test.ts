/**
 * Tests for elementwise arithmetic and comparison
 */

import { describe, expect, it } from "vitest";
import { DivisionByZeroError } from "../src/errors/index.ts";
import { Series } from "../src/series/series.ts";
import { DTypeKind } from "../src/types/dtypes.ts";
import { ErrorCode, unwrap } from "../src/types/error.ts";

describe("Arithmetic", () => {
	it("should propagate nulls from either side", () => {
		const a = unwrap(Series.fromOptions("a", DTypeKind.Int32, [1, null, 3, 4]));
		const b = unwrap(Series.fromOptions("b", DTypeKind.Int32, [10, 20, null, 40]));

		const sum = unwrap(a.add(b));
		expect(sum.name).toBe("a_add_b");
		expect(sum.toArray()).toEqual([11, null, null, 44]);
	});

	it("should broadcast a scalar operand", () => {
		const a = unwrap(Series.from("a", DTypeKind.Float64, [1.5, 2.5]));
		const out = unwrap(a.mul(2));

		expect(out.name).toBe("a_mul");
		expect(out.toArray()).toEqual([3, 5]);
	});

	it("should fail on operands of different length", () => {
		const a = unwrap(Series.from("a", DTypeKind.Int32, [1, 2]));
		const b = unwrap(Series.from("b", DTypeKind.Int32, [1]));
		expect(a.add(b).error).toBe(ErrorCode.ShapeMismatch);
	});

	it("should fail on operands of different kinds", () => {
		// a Series typed only as Series carries no static kind
		const a: Series = unwrap(Series.from("a", DTypeKind.Int32, [1]));
		const b = unwrap(Series.from("b", DTypeKind.Float64, [1]));
		expect(a.sub(b).error).toBe(ErrorCode.TypeMismatch);
	});

	it("should reject a scalar the column cannot hold", () => {
		const a = unwrap(Series.from("a", DTypeKind.Int32, [1]));
		expect(a.add(1.5).error).toBe(ErrorCode.CastFailed);
		expect(a.add("x").error).toBe(ErrorCode.TypeMismatch);
	});

	it("should reject non-numeric columns", () => {
		const s = unwrap(Series.from("s", DTypeKind.String, ["a"]));
		expect(s.add("b").error).toBe(ErrorCode.TypeMismatch);
	});

	describe("integers", () => {
		it("should wrap to the column width", () => {
			const i8 = unwrap(Series.from("a", DTypeKind.Int8, [100]));
			const u8 = unwrap(Series.from("b", DTypeKind.UInt8, [0]));
			const i32 = unwrap(Series.from("c", DTypeKind.Int32, [65536]));

			expect(unwrap(i8.add(100)).toArray()).toEqual([-56]);
			expect(unwrap(u8.sub(1)).toArray()).toEqual([255]);
			expect(unwrap(i32.mul(65536)).toArray()).toEqual([0]);
		});

		it("should truncate division toward zero", () => {
			const a = unwrap(Series.from("a", DTypeKind.Int32, [7, -7]));
			expect(unwrap(a.div(2)).toArray()).toEqual([3, -3]);
			expect(unwrap(a.rem(3)).toArray()).toEqual([1, -1]);
		});

		it("should fail on a zero divisor", () => {
			const a = unwrap(Series.from("a", DTypeKind.Int32, [4, 5]));
			const b = unwrap(Series.from("b", DTypeKind.Int32, [2, 0]));

			const result = a.div(b);
			expect(result.error).toBe(ErrorCode.DivisionByZero);
			if (result.error !== ErrorCode.None) {
				expect(result.reason).toBeInstanceOf(DivisionByZeroError);
				if (result.reason instanceof DivisionByZeroError) {
					expect(result.reason.index).toBe(1);
				}
			}
		});

		it("should skip the divisor check on null rows", () => {
			const a = unwrap(Series.fromOptions("a", DTypeKind.Int32, [1, null]));
			const b = unwrap(Series.from("b", DTypeKind.Int32, [1, 0]));
			expect(unwrap(a.div(b)).toArray()).toEqual([1, null]);
		});

		it("should compute on 64-bit integers exactly", () => {
			const a = unwrap(Series.from("a", DTypeKind.Int64, [2n ** 60n, 5n]));

			expect(unwrap(a.add(1n)).toArray()).toEqual([2n ** 60n + 1n, 6n]);
			expect(unwrap(a.div(2n)).toArray()).toEqual([2n ** 59n, 2n]);
			expect(a.rem(0n).error).toBe(ErrorCode.DivisionByZero);
		});
	});

	describe("floats", () => {
		it("should follow IEEE division by zero", () => {
			const a = unwrap(Series.from("a", DTypeKind.Float64, [1, -1, 0]));
			expect(unwrap(a.div(0)).toArray()).toEqual([Infinity, -Infinity, Number.NaN]);
		});
	});
});

describe("Comparison", () => {
	it("should compare against a scalar, null rows giving false", () => {
		const a = unwrap(Series.fromOptions("a", DTypeKind.Int32, [1, null, 3]));
		const mask = unwrap(a.gt(1));

		expect(mask.name).toBe("a_gt");
		expect(mask.dtype).toBe(DTypeKind.Boolean);
		expect(mask.toArray()).toEqual([false, false, true]);
		expect(mask.nullCount()).toBe(0);
	});

	it("should compare two columns", () => {
		const a = unwrap(Series.from("a", DTypeKind.Int32, [1, 2, 3]));
		const b = unwrap(Series.from("b", DTypeKind.Int32, [3, 2, 1]));

		expect(unwrap(a.eq(b)).name).toBe("a_eq_b");
		expect(unwrap(a.eq(b)).toArray()).toEqual([false, true, false]);
		expect(unwrap(a.le(b)).toArray()).toEqual([true, true, false]);
		expect(unwrap(a.ne(b)).toArray()).toEqual([true, false, true]);
	});

	it("should never find NaN equal", () => {
		const a = unwrap(Series.from("a", DTypeKind.Float64, [Number.NaN]));
		expect(unwrap(a.eq(Number.NaN)).toArray()).toEqual([false]);
		expect(unwrap(a.ne(Number.NaN)).toArray()).toEqual([true]);
	});

	it("should compare strings lexicographically", () => {
		const s = unwrap(Series.from("s", DTypeKind.String, ["a", "c"]));
		expect(unwrap(s.lt("b")).toArray()).toEqual([true, false]);
		expect(unwrap(s.ge("c")).toArray()).toEqual([false, true]);
	});

	it("should compare 64-bit integers with bigint scalars", () => {
		const a = unwrap(Series.from("a", DTypeKind.UInt64, [1n, 9n]));
		expect(unwrap(a.gt(5n)).toArray()).toEqual([false, true]);
	});

	it("should accept number scalars against 64-bit integer columns", () => {
		const a = unwrap(Series.from("a", DTypeKind.Int64, [1n, 5n, 9n]));

		expect(unwrap(a.gt(1)).toArray()).toEqual(unwrap(a.gt(1n)).toArray());
		expect(unwrap(a.gt(1)).toArray()).toEqual([false, true, true]);
		expect(unwrap(a.eq(5)).toArray()).toEqual([false, true, false]);
		expect(unwrap(a.lt(5.5)).toArray()).toEqual([true, true, false]);
		expect(unwrap(a.eq(5.5)).toArray()).toEqual([false, false, false]);
	});

	it("should accept bigint scalars against number columns", () => {
		const a = unwrap(Series.from("a", DTypeKind.Int32, [1, 2]));
		expect(unwrap(a.eq(2n)).toArray()).toEqual([false, true]);
		expect(unwrap(a.lt(2n)).toArray()).toEqual([true, false]);
	});

	it("should reject a scalar of another family", () => {
		const a = unwrap(Series.from("a", DTypeKind.Int32, [1]));
		expect(a.eq("1").error).toBe(ErrorCode.TypeMismatch);
	});
});
