import { ErrorCode } from "../types/error.ts";
import { TabulaError } from "./base.ts";

/**
 * Error returned when text cannot be parsed into the requested type.
 */
export class ParseError extends TabulaError {
	readonly what: string;
	readonly value: string;

	constructor(what: string, value: string, hint?: string) {
		super(ErrorCode.ParseError, "parse error", hint);
		this.name = "ParseError";
		this.what = what;
		this.value = value;
	}

	protected override _getExpression(): string {
		return `parse ${this.what}`;
	}

	protected override _getDetail(): string {
		return `failed to parse ${this.what} from '${this.value}'`;
	}
}
