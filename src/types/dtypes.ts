/**
 * Data type tags.
 *
 * Every column carries one `DTypeKind` at runtime. The tag selects the
 * backing storage (a TypedArray, or a plain array for strings) and the
 * TypeScript value type seen through the public API.
 */

import type { Series } from "../series/series.ts";

/** Runtime type tag of a column */
export enum DTypeKind {
	Int8 = "int8",
	Int16 = "int16",
	Int32 = "int32",
	Int64 = "int64",
	UInt8 = "uint8",
	UInt16 = "uint16",
	UInt32 = "uint32",
	UInt64 = "uint64",
	Float32 = "float32",
	Float64 = "float64",
	Boolean = "boolean",
	String = "string",
	/** Cells are Series sharing one inner dtype */
	List = "list",
}

/** 64-bit integer kinds hold `bigint` values */
export type BigIntKind = DTypeKind.Int64 | DTypeKind.UInt64;

export type FloatKind = DTypeKind.Float32 | DTypeKind.Float64;

export type NumericKind = Exclude<DTypeKind, DTypeKind.Boolean | DTypeKind.String | DTypeKind.List>;

/** TypeScript value type for each kind */
export interface DTypeValueMap {
	[DTypeKind.Int8]: number;
	[DTypeKind.Int16]: number;
	[DTypeKind.Int32]: number;
	[DTypeKind.Int64]: bigint;
	[DTypeKind.UInt8]: number;
	[DTypeKind.UInt16]: number;
	[DTypeKind.UInt32]: number;
	[DTypeKind.UInt64]: bigint;
	[DTypeKind.Float32]: number;
	[DTypeKind.Float64]: number;
	[DTypeKind.Boolean]: boolean;
	[DTypeKind.String]: string;
	[DTypeKind.List]: Series;
}

export type DTypeToTS<K extends DTypeKind> = DTypeValueMap[K];

/** Cell value of a flat (non-list) column */
export type Scalar = number | bigint | boolean | string;

/** Any cell value a column can hold */
export type Value = Scalar | Series;

export function isScalar(value: Value): value is Scalar {
	return typeof value !== "object";
}

export type NumberTypedArray =
	| Int8Array
	| Int16Array
	| Int32Array
	| Uint8Array
	| Uint16Array
	| Uint32Array
	| Float32Array
	| Float64Array;

export type BigIntTypedArray = BigInt64Array | BigUint64Array;

/** Storage family, used to dispatch per-variant behaviour */
export type DTypeFamily = "number" | "bigint" | "boolean" | "string" | "list";

/** Inclusive value range of the 32-bit-and-smaller integer kinds */
export const INTEGER_RANGES: Readonly<Partial<Record<DTypeKind, { readonly min: number; readonly max: number }>>> = {
	[DTypeKind.Int8]: { min: -128, max: 127 },
	[DTypeKind.Int16]: { min: -32768, max: 32767 },
	[DTypeKind.Int32]: { min: -2147483648, max: 2147483647 },
	[DTypeKind.UInt8]: { min: 0, max: 255 },
	[DTypeKind.UInt16]: { min: 0, max: 65535 },
	[DTypeKind.UInt32]: { min: 0, max: 4294967295 },
};

/** Inclusive value range of the 64-bit integer kinds */
export const BIGINT_RANGES: Readonly<Partial<Record<DTypeKind, { readonly min: bigint; readonly max: bigint }>>> = {
	[DTypeKind.Int64]: { min: -(2n ** 63n), max: 2n ** 63n - 1n },
	[DTypeKind.UInt64]: { min: 0n, max: 2n ** 64n - 1n },
};

export function isBigIntDType(kind: DTypeKind): kind is BigIntKind {
	return kind === DTypeKind.Int64 || kind === DTypeKind.UInt64;
}

export function isFloatDType(kind: DTypeKind): kind is FloatKind {
	return kind === DTypeKind.Float32 || kind === DTypeKind.Float64;
}

export function isNumericDType(kind: DTypeKind): kind is NumericKind {
	return kind !== DTypeKind.Boolean && kind !== DTypeKind.String && kind !== DTypeKind.List;
}

/** Storage family of a kind */
export function dtypeFamily(kind: DTypeKind): DTypeFamily {
	if (kind === DTypeKind.String) return "string";
	if (kind === DTypeKind.List) return "list";
	if (kind === DTypeKind.Boolean) return "boolean";
	if (isBigIntDType(kind)) return "bigint";
	return "number";
}

/** Allocate zeroed storage of the given capacity */
export function allocateStorage(
	kind: Exclude<DTypeKind, DTypeKind.String | DTypeKind.List>,
	capacity: number,
): NumberTypedArray | BigIntTypedArray {
	switch (kind) {
		case DTypeKind.Int8:
			return new Int8Array(capacity);
		case DTypeKind.Int16:
			return new Int16Array(capacity);
		case DTypeKind.Int32:
			return new Int32Array(capacity);
		case DTypeKind.Int64:
			return new BigInt64Array(capacity);
		case DTypeKind.UInt8:
		case DTypeKind.Boolean:
			return new Uint8Array(capacity);
		case DTypeKind.UInt16:
			return new Uint16Array(capacity);
		case DTypeKind.UInt32:
			return new Uint32Array(capacity);
		case DTypeKind.UInt64:
			return new BigUint64Array(capacity);
		case DTypeKind.Float32:
			return new Float32Array(capacity);
		case DTypeKind.Float64:
			return new Float64Array(capacity);
	}
}
