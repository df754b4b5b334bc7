/**
 * Scalar validation and conversion between kinds.
 *
 * `checkValue` guards values entering a column from outside (constructors,
 * scalar operands, fill values). `convertScalar` implements exact casts:
 * a conversion either preserves the value or reports it unrepresentable.
 */

import { CastError, TypeMismatchError } from "../errors/index.ts";
import {
	BIGINT_RANGES,
	DTypeKind,
	dtypeFamily,
	INTEGER_RANGES,
	type Scalar,
	type Value,
} from "../types/dtypes.ts";
import { fail, ok, type Result } from "../types/error.ts";
import { Series } from "./series.ts";

const INTEGER_TEXT = /^[+-]?\d+$/;
const FLOAT_TEXT = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function describe(value: unknown): string {
	if (value === null) return "null";
	if (Array.isArray(value)) return "array";
	return typeof value;
}

function fitsNumber(kind: DTypeKind, value: number): boolean {
	const range = INTEGER_RANGES[kind];
	if (range !== undefined) {
		return Number.isInteger(value) && value >= range.min && value <= range.max;
	}
	if (kind === DTypeKind.Float32) {
		return Number.isNaN(value) || Math.fround(value) === value;
	}
	return true;
}

function fitsBigInt(kind: DTypeKind, value: bigint): boolean {
	const range = BIGINT_RANGES[kind];
	return range !== undefined && value >= range.min && value <= range.max;
}

/**
 * Validate a value for storage in a column of `kind`.
 * The JS type must match the kind's family; integers must be in range.
 * Numbers headed for float32 are accepted and rounded on store.
 * List columns take Series cells; their inner dtypes are checked by the
 * list column itself.
 */
export function checkValue(kind: DTypeKind, value: unknown, operation = "construct"): Result<Value | null> {
	if (value === null || value === undefined) return ok(null);

	switch (dtypeFamily(kind)) {
		case "string":
			if (typeof value === "string") return ok(value);
			break;
		case "boolean":
			if (typeof value === "boolean") return ok(value);
			break;
		case "bigint":
			if (typeof value === "bigint") {
				return fitsBigInt(kind, value) ? ok(value) : fail(new CastError(value, kind));
			}
			if (typeof value === "number") {
				if (!Number.isInteger(value)) return fail(new CastError(value, kind));
				const big = BigInt(value);
				return fitsBigInt(kind, big) ? ok(big) : fail(new CastError(value, kind));
			}
			break;
		case "number":
			if (typeof value === "number") {
				if (kind === DTypeKind.Float32 || fitsNumber(kind, value)) return ok(value);
				return fail(new CastError(value, kind));
			}
			break;
		case "list":
			if (value instanceof Series) return ok(value);
			break;
	}
	return fail(new TypeMismatchError(operation, describe(value), [`a ${kind} value`]));
}

function parseNumberText(text: string): number | undefined {
	const trimmed = text.trim();
	if (trimmed === "NaN") return Number.NaN;
	if (trimmed === "inf" || trimmed === "+inf" || trimmed === "Infinity") return Number.POSITIVE_INFINITY;
	if (trimmed === "-inf" || trimmed === "-Infinity") return Number.NEGATIVE_INFINITY;
	return FLOAT_TEXT.test(trimmed) ? Number(trimmed) : undefined;
}

function toNumberKind(kind: DTypeKind, value: Scalar): number | undefined {
	let n: number;
	switch (typeof value) {
		case "number":
			n = value;
			break;
		case "bigint":
			n = Number(value);
			if (BigInt(Math.trunc(n)) !== value) return undefined;
			break;
		case "boolean":
			n = value ? 1 : 0;
			break;
		default: {
			const parsed = INTEGER_RANGES[kind] !== undefined && INTEGER_TEXT.test(value.trim())
				? Number(value.trim())
				: parseNumberText(value);
			if (parsed === undefined) return undefined;
			n = parsed;
		}
	}
	return fitsNumber(kind, n) ? n : undefined;
}

function toBigIntKind(kind: DTypeKind, value: Scalar): bigint | undefined {
	let big: bigint;
	switch (typeof value) {
		case "bigint":
			big = value;
			break;
		case "number":
			if (!Number.isInteger(value)) return undefined;
			big = BigInt(value);
			break;
		case "boolean":
			big = value ? 1n : 0n;
			break;
		default: {
			const trimmed = value.trim();
			if (!INTEGER_TEXT.test(trimmed)) return undefined;
			big = BigInt(trimmed);
		}
	}
	return fitsBigInt(kind, big) ? big : undefined;
}

function toBoolean(value: Scalar): boolean | undefined {
	switch (typeof value) {
		case "boolean":
			return value;
		case "number":
			return value === 1 ? true : value === 0 ? false : undefined;
		case "bigint":
			return value === 1n ? true : value === 0n ? false : undefined;
		default: {
			const lowered = value.trim().toLowerCase();
			return lowered === "true" ? true : lowered === "false" ? false : undefined;
		}
	}
}

/**
 * Convert a non-null value to `target`, or `undefined` when the value is
 * not exactly representable there. Nothing converts to or from a list.
 */
export function convertScalar(value: Scalar, target: DTypeKind): Scalar | undefined {
	switch (dtypeFamily(target)) {
		case "string":
			return typeof value === "string" ? value : String(value);
		case "boolean":
			return toBoolean(value);
		case "bigint":
			return toBigIntKind(target, value);
		case "number":
			return toNumberKind(target, value);
		case "list":
			return undefined;
	}
}
