/**
 * Tests for partitioned parApply
 */

import { describe, expect, it } from "vitest";
import { parallelMap, partitionRanges } from "../src/series/parallel.ts";
import { type Cell, Series } from "../src/series/series.ts";
import { DTypeKind } from "../src/types/dtypes.ts";
import { ErrorCode, unwrap } from "../src/types/error.ts";

describe("partitionRanges", () => {
	it("should cover the index space with contiguous ranges", () => {
		expect(partitionRanges(10, 3)).toEqual([
			{ start: 0, end: 4 },
			{ start: 4, end: 7 },
			{ start: 7, end: 10 },
		]);
	});

	it("should not create more ranges than elements", () => {
		expect(partitionRanges(2, 8)).toEqual([
			{ start: 0, end: 1 },
			{ start: 1, end: 2 },
		]);
		expect(partitionRanges(0, 4)).toEqual([{ start: 0, end: 0 }]);
	});
});

describe("parApply", () => {
	const values: (number | null)[] = Array.from({ length: 1000 }, (_, i) => (i % 7 === 0 ? null : i * 0.5));
	const s = unwrap(Series.fromOptions("x", DTypeKind.Float64, values));
	const double = (v: Cell<DTypeKind.Float64>) => (v === null ? null : v * 2);

	it("should match apply for any worker count", async () => {
		const expected = unwrap(s.apply(DTypeKind.Float64, double));

		for (const workers of [1, 3, 8]) {
			const actual = unwrap(await s.parApply(DTypeKind.Float64, double, { workers, batchSize: 16 }));
			expect(actual.equals(expected)).toBe(true);
		}
	});

	it("should keep index order across workers", async () => {
		const small = unwrap(Series.from("x", DTypeKind.Int32, [0, 0, 0, 0, 0, 0, 0]));
		const indexed = unwrap(await small.parApply(DTypeKind.Int32, (_, i) => i, { workers: 3, batchSize: 1 }));
		expect(indexed.toArray()).toEqual([0, 1, 2, 3, 4, 5, 6]);
	});

	it("should validate mapped values against the output kind", async () => {
		const result = await s.parApply(DTypeKind.UInt8, () => 300, { workers: 2 });
		expect(result.error).toBe(ErrorCode.CastFailed);
	});

	it("should map an empty Series", async () => {
		const empty = Series.empty("e", DTypeKind.Int32);
		const out = unwrap(await empty.parApply(DTypeKind.Int32, (v) => v, { workers: 4 }));
		expect(out.length).toBe(0);
	});
});

describe("parallelMap", () => {
	it("should return results in index order", async () => {
		expect(await parallelMap(5, (i) => i * i, { workers: 2, batchSize: 1 })).toEqual([0, 1, 4, 9, 16]);
	});
});
