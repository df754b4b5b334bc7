import { ErrorCode } from "../types/error.ts";
import { TabulaError } from "./base.ts";

/**
 * Error returned when an operation is called on an incompatible type.
 */
export class TypeMismatchError extends TabulaError {
	readonly operation: string;
	readonly actualType: string;
	readonly expectedTypes: string[];

	constructor(operation: string, actualType: string, expectedTypes: string[]) {
		const expected = expectedTypes.join(" or ");
		const hint = `'${operation}' requires ${expected}`;

		super(ErrorCode.TypeMismatch, "type mismatch", hint);
		this.name = "TypeMismatchError";
		this.operation = operation;
		this.actualType = actualType;
		this.expectedTypes = expectedTypes;
	}

	protected override _getExpression(): string {
		return `series.${this.operation}()`;
	}

	protected override _getDetail(): string {
		return `cannot call '${this.operation}()' on ${this.actualType}`;
	}
}
