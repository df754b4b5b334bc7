import { ErrorCode } from "../types/error.ts";
import { TabulaError } from "./base.ts";

/**
 * Error returned when a value is not exactly representable in the target type.
 */
export class CastError extends TabulaError {
	readonly value: string;
	readonly target: string;

	constructor(value: unknown, target: string) {
		super(ErrorCode.CastFailed, "cast failed", "use a wider target type or clean the values first");
		this.name = "CastError";
		this.value = String(value);
		this.target = target;
	}

	protected override _getExpression(): string {
		return `cast(${this.target})`;
	}

	protected override _getDetail(): string {
		return `value '${this.value}' is not representable as ${this.target}`;
	}
}
