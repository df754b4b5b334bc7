/**
 * Aggregation state interface.
 *
 * Each aggregation function has a state object that accumulates the values
 * of one group and produces the group's result. Nulls are skipped; a group
 * without any non-null value yields null (count yields 0).
 */

import { DTypeKind, isBigIntDType, isNumericDType, isScalar, type Scalar, type Value } from "../types/dtypes.ts";
import { compareValues } from "./sort.ts";

/** Aggregation function names */
export type AggFn = "sum" | "mean" | "min" | "max" | "count" | "first" | "last";

export const AGG_FUNCTIONS: readonly AggFn[] = ["sum", "mean", "min", "max", "count", "first", "last"];

/** Aggregation state for accumulating one group */
export interface AggState {
	/** Reset state for a new group */
	reset(): void;

	/** Accumulate a value (null values are skipped) */
	accumulate(value: Value | null): void;

	/** Get the current aggregated result */
	result(): Value | null;

	/** Output data type */
	readonly outputDType: DTypeKind;
}

/** Sum aggregation: float64 for number kinds, the input kind for 64-bit integers */
export class SumState implements AggState {
	private sum = 0;
	private bigSum = 0n;
	private hasValue = false;
	readonly outputDType: DTypeKind;

	constructor(inputDType: DTypeKind) {
		this.outputDType = isBigIntDType(inputDType) ? inputDType : DTypeKind.Float64;
	}

	reset(): void {
		this.sum = 0;
		this.bigSum = 0n;
		this.hasValue = false;
	}

	accumulate(value: Value | null): void {
		if (typeof value === "number") {
			this.sum += value;
			this.hasValue = true;
		} else if (typeof value === "bigint") {
			this.bigSum += value;
			this.hasValue = true;
		}
	}

	result(): number | bigint | null {
		if (!this.hasValue) return null;
		return this.outputDType === DTypeKind.Float64 ? this.sum : this.bigSum;
	}
}

/** Average aggregation */
export class AvgState implements AggState {
	private sum = 0;
	private count = 0;
	readonly outputDType = DTypeKind.Float64;

	reset(): void {
		this.sum = 0;
		this.count = 0;
	}

	accumulate(value: Value | null): void {
		if (typeof value !== "number" && typeof value !== "bigint") return;
		this.sum += Number(value);
		this.count++;
	}

	result(): number | null {
		return this.count > 0 ? this.sum / this.count : null;
	}
}

/** Count of non-null values */
export class CountState implements AggState {
	private count = 0;
	readonly outputDType = DTypeKind.UInt32;

	reset(): void {
		this.count = 0;
	}

	accumulate(value: Value | null): void {
		if (value !== null) {
			this.count++;
		}
	}

	result(): number {
		return this.count;
	}
}

/** Smallest (sign -1) or largest (sign 1) value; NaN is skipped */
class ExtremeState implements AggState {
	private best: Scalar | null = null;
	readonly outputDType: DTypeKind;
	private readonly sign: 1 | -1;

	constructor(inputDType: DTypeKind, sign: 1 | -1) {
		this.outputDType = inputDType;
		this.sign = sign;
	}

	reset(): void {
		this.best = null;
	}

	accumulate(value: Value | null): void {
		if (value === null || !isScalar(value)) return;
		if (typeof value === "number" && Number.isNaN(value)) return;
		if (this.best === null || compareValues(value, this.best) === this.sign) {
			this.best = value;
		}
	}

	result(): Scalar | null {
		return this.best;
	}
}

/** Min aggregation */
export class MinState extends ExtremeState {
	constructor(inputDType: DTypeKind) {
		super(inputDType, -1);
	}
}

/** Max aggregation */
export class MaxState extends ExtremeState {
	constructor(inputDType: DTypeKind) {
		super(inputDType, 1);
	}
}

/** First non-null value */
export class FirstState implements AggState {
	private first: Value | null = null;
	readonly outputDType: DTypeKind;

	constructor(inputDType: DTypeKind) {
		this.outputDType = inputDType;
	}

	reset(): void {
		this.first = null;
	}

	accumulate(value: Value | null): void {
		if (this.first === null && value !== null) {
			this.first = value;
		}
	}

	result(): Value | null {
		return this.first;
	}
}

/** Last non-null value */
export class LastState implements AggState {
	private last: Value | null = null;
	readonly outputDType: DTypeKind;

	constructor(inputDType: DTypeKind) {
		this.outputDType = inputDType;
	}

	reset(): void {
		this.last = null;
	}

	accumulate(value: Value | null): void {
		if (value !== null) {
			this.last = value;
		}
	}

	result(): Value | null {
		return this.last;
	}
}

/** Whether `fn` accepts a column of `kind` */
export function supportsInput(fn: AggFn, kind: DTypeKind): boolean {
	switch (fn) {
		case "sum":
		case "mean":
			return isNumericDType(kind);
		case "min":
		case "max":
			return kind !== DTypeKind.Boolean && kind !== DTypeKind.List;
		case "count":
		case "first":
		case "last":
			return true;
	}
}

/** Factory function to create aggregation state */
export function createAggState(fn: AggFn, inputDType: DTypeKind): AggState {
	switch (fn) {
		case "sum":
			return new SumState(inputDType);
		case "mean":
			return new AvgState();
		case "count":
			return new CountState();
		case "min":
			return new MinState(inputDType);
		case "max":
			return new MaxState(inputDType);
		case "first":
			return new FirstState(inputDType);
		case "last":
			return new LastState(inputDType);
	}
}
