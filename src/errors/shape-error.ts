import { ErrorCode } from "../types/error.ts";
import { TabulaError } from "./base.ts";

/**
 * Error returned when two lengths that must agree do not.
 */
export class ShapeError extends TabulaError {
	readonly expected: number;
	readonly found: number;
	readonly subject: string;

	constructor(subject: string, expected: number, found: number) {
		super(ErrorCode.ShapeMismatch, "length mismatch", `'${subject}' must have length ${expected}`);
		this.name = "ShapeError";
		this.subject = subject;
		this.expected = expected;
		this.found = found;
	}

	protected override _getExpression(): string {
		return this.subject;
	}

	protected override _getDetail(): string {
		return `expected length ${this.expected}, found ${this.found}`;
	}
}
