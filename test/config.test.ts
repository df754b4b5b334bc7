/**
 * Tests for engine configuration and debug logging
 */

import { afterEach, describe, expect, it, vi } from "vitest";
import { configure, getConfig, resetConfig } from "../src/config.ts";
import { Series } from "../src/series/series.ts";
import { DTypeKind } from "../src/types/dtypes.ts";
import { ErrorCode, unwrap } from "../src/types/error.ts";
import { createLogger } from "../src/utils/logger.ts";

describe("configure", () => {
	afterEach(() => {
		resetConfig();
	});

	it("should start from the defaults", () => {
		const config = getConfig();

		expect(config.parallelBatchSize).toBe(4096);
		expect(config.display).toEqual({ maxRows: 10, maxColWidth: 20, nullMarker: "null" });
		expect(config.parallelism).toBeGreaterThanOrEqual(1);
	});

	it("should merge partial display settings", () => {
		unwrap(configure({ display: { maxRows: 4 } }));

		expect(getConfig().display.maxRows).toBe(4);
		expect(getConfig().display.nullMarker).toBe("null");
	});

	it("should keep the previous settings when validation fails", () => {
		unwrap(configure({ parallelism: 2 }));

		expect(configure({ parallelism: 0 }).error).toBe(ErrorCode.InvalidArgument);
		expect(configure({ parallelBatchSize: 1.5 }).error).toBe(ErrorCode.InvalidArgument);
		expect(getConfig().parallelism).toBe(2);
	});

	it("should elide the middle rows of long tables", () => {
		unwrap(configure({ display: { maxRows: 2, nullMarker: "-" } }));
		const s = unwrap(Series.fromOptions("a", DTypeKind.Int32, [null, 2, 3, 4, 5]));

		expect(s.toString().split("\n")).toEqual([
			"┌───────┐",
			"│   a   │",
			"│ int32 │",
			"├───────┤",
			"│     - │",
			"│   ... │",
			"│     5 │",
			"└───────┘",
			"[5 rows]",
		]);
	});
});

describe("Logger", () => {
	it("should write debug output when forced on", () => {
		const spy = vi.spyOn(console, "debug").mockImplementation(() => {});

		createLogger("test", true).debug("hello");

		expect(spy).toHaveBeenCalledWith("[test]", "hello");
		spy.mockRestore();
	});
});
