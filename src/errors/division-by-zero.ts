import { ErrorCode } from "../types/error.ts";
import { TabulaError } from "./base.ts";

/**
 * Error returned when an integral column is divided by zero.
 */
export class DivisionByZeroError extends TabulaError {
	readonly column: string;
	readonly index: number;

	constructor(column: string, index: number) {
		super(ErrorCode.DivisionByZero, "division by zero", "cast to a float type for IEEE division");
		this.name = "DivisionByZeroError";
		this.column = column;
		this.index = index;
	}

	protected override _getExpression(): string {
		return `${this.column}.div(...)`;
	}

	protected override _getDetail(): string {
		return `zero divisor at row ${this.index}`;
	}
}
