import { ColumnBuffer } from "../buffer/column-buffer.ts";
import { CastError, ParseError } from "../errors/index.ts";
import { DTypeKind } from "../types/dtypes.ts";
import { fail, ok, type Result } from "../types/error.ts";
import { convertScalar } from "./convert.ts";

/** Cells treated as missing when parsing text */
export const DEFAULT_NA_VALUES: readonly string[] = ["", "null", "NA"];

export interface ParseOptions {
	/** Cells that become null. Default: "", "null", "NA" */
	naValues?: readonly string[];
}

/**
 * Convert every value to `target`. Nulls stay null; the first value
 * that is not exactly representable fails the whole cast. A list column
 * only casts to list.
 */
export function castBuffer<T extends DTypeKind>(source: ColumnBuffer, target: T): Result<ColumnBuffer<T>> {
	const out = new ColumnBuffer(target, source.length);
	if (source.kind === DTypeKind.List || target === DTypeKind.List) {
		if (source.kind !== target) {
			return fail(new CastError(`${source.kind} column`, target));
		}
		for (let i = 0; i < source.length; i++) out.appendValue(source.getValue(i));
		return ok(out);
	}
	for (let i = 0; i < source.length; i++) {
		const value = source.getScalar(i);
		if (value === null) {
			out.appendNull();
			continue;
		}
		const converted = convertScalar(value, target);
		if (converted === undefined) {
			return fail(new CastError(value, target));
		}
		out.appendScalar(converted);
	}
	return ok(out);
}

/** Parse raw text cells, as handed over by a reader, into `kind` */
export function parseBuffer<K extends DTypeKind>(
	kind: K,
	cells: ReadonlyArray<string | null | undefined>,
	options: ParseOptions = {},
): Result<ColumnBuffer<K>> {
	const naValues = new Set(options.naValues ?? DEFAULT_NA_VALUES);
	const out = new ColumnBuffer(kind, cells.length);

	for (let i = 0; i < cells.length; i++) {
		const cell = cells[i];
		if (cell === null || cell === undefined || naValues.has(cell)) {
			out.appendNull();
			continue;
		}
		const value = convertScalar(cell, kind);
		if (value === undefined) {
			return fail(new ParseError(kind, cell, `row ${i}: add the cell to naValues to read it as null`));
		}
		out.appendScalar(value);
	}
	return ok(out);
}
