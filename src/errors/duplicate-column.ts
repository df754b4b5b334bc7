import { ErrorCode } from "../types/error.ts";
import { TabulaError } from "./base.ts";

/**
 * Error returned when a column name is already taken.
 */
export class DuplicateColumnError extends TabulaError {
	readonly column: string;
	readonly operation: string;

	constructor(column: string, operation: string) {
		super(ErrorCode.DuplicateColumn, "duplicate column", "column names must be unique; rename one side first");
		this.name = "DuplicateColumnError";
		this.column = column;
		this.operation = operation;
	}

	protected override _getExpression(): string {
		return `${this.operation}('${this.column}')`;
	}

	protected override _getDetail(): string {
		return `column '${this.column}' already exists`;
	}
}
