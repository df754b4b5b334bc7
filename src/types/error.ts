/**
 * Error codes and the Result type.
 *
 * Fallible operations return a Result instead of throwing. A failed
 * Result always carries a code and usually a `reason` error with the
 * details (column names, lengths, offending values).
 */

import { TabulaError } from "../errors/base.ts";

export enum ErrorCode {
	None = 0,
	/** Lengths disagree (ShapeError / LengthMismatch) */
	ShapeMismatch,
	DuplicateColumn,
	/** ColumnNotFound */
	UnknownColumn,
	TypeMismatch,
	/** Value not representable in the target type */
	CastFailed,
	/** UnsupportedAggregation */
	InvalidAggregation,
	/** Integral division by zero */
	DivisionByZero,
	IndexOutOfBounds,
	ParseError,
	InvalidArgument,
	/** Internal invariant violated */
	InvalidState,
}

export const ERROR_MESSAGES: Readonly<Record<ErrorCode, string>> = {
	[ErrorCode.None]: "no error",
	[ErrorCode.ShapeMismatch]: "length mismatch",
	[ErrorCode.DuplicateColumn]: "duplicate column",
	[ErrorCode.UnknownColumn]: "column not found",
	[ErrorCode.TypeMismatch]: "type mismatch",
	[ErrorCode.CastFailed]: "cast failed",
	[ErrorCode.InvalidAggregation]: "unsupported aggregation",
	[ErrorCode.DivisionByZero]: "division by zero",
	[ErrorCode.IndexOutOfBounds]: "index out of bounds",
	[ErrorCode.ParseError]: "parse error",
	[ErrorCode.InvalidArgument]: "invalid argument",
	[ErrorCode.InvalidState]: "invalid internal state",
};

export function getErrorMessage(code: ErrorCode): string {
	return ERROR_MESSAGES[code];
}

export type FailureCode = Exclude<ErrorCode, ErrorCode.None>;

export interface Ok<T> {
	readonly error: ErrorCode.None;
	readonly value: T;
}

export interface Err {
	readonly error: FailureCode;
	readonly value: undefined;
	readonly reason?: TabulaError;
}

export type Result<T> = Ok<T> | Err;

export function ok<T>(value: T): Ok<T> {
	return { error: ErrorCode.None, value };
}

export function err(code: FailureCode, reason?: TabulaError): Err {
	return reason === undefined
		? { error: code, value: undefined }
		: { error: code, value: undefined, reason };
}

/** Failed Result from a detailed error */
export function fail(reason: TabulaError): Err {
	return { error: reason.code, value: undefined, reason };
}

export function isOk<T>(result: Result<T>): result is Ok<T> {
	return result.error === ErrorCode.None;
}

export function isErr<T>(result: Result<T>): result is Err {
	return result.error !== ErrorCode.None;
}

/** Convert a failed Result into the error it describes */
export function toError(result: Err): TabulaError {
	return result.reason ?? new TabulaError(result.error, getErrorMessage(result.error));
}

/**
 * Return the value of a successful Result, or throw the failure's error.
 */
export function unwrap<T>(result: Result<T>): T {
	if (result.error !== ErrorCode.None) {
		throw toError(result);
	}
	return result.value;
}

export function unwrapOr<T>(result: Result<T>, fallback: T): T {
	return result.error === ErrorCode.None ? result.value : fallback;
}

export function mapResult<T, U>(result: Result<T>, fn: (value: T) => U): Result<U> {
	return result.error === ErrorCode.None ? ok(fn(result.value)) : result;
}

export function andThen<T, U>(result: Result<T>, fn: (value: T) => Result<U>): Result<U> {
	return result.error === ErrorCode.None ? fn(result.value) : result;
}
