import { ErrorCode, type FailureCode } from "../types/error.ts";
import { TabulaError } from "./base.ts";

/**
 * Error for an operation that cannot be performed with the given arguments.
 */
export class InvalidOperationError extends TabulaError {
	readonly operation: string;
	readonly reason: string;

	constructor(
		operation: string,
		reason: string,
		hint?: string,
		code: FailureCode = ErrorCode.InvalidArgument,
	) {
		super(code, "invalid operation", hint);
		this.name = "InvalidOperationError";
		this.operation = operation;
		this.reason = reason;
	}

	protected override _getExpression(): string {
		return `${this.operation}(...)`;
	}

	protected override _getDetail(): string {
		return `'${this.operation}' ${this.reason}`;
	}
}
