/**
 * Elementwise arithmetic kernels.
 *
 * Operands are a column and either a same-kind column of equal length or
 * a scalar. A null on either side yields null. Integer results wrap to the
 * column's width; integer division truncates, and integer `div`/`rem`
 * reject a zero divisor.
 */

import { ColumnBuffer } from "../buffer/column-buffer.ts";
import { DivisionByZeroError, ShapeError, TypeMismatchError } from "../errors/index.ts";
import { DTypeKind, isFloatDType, isNumericDType, type Scalar, type Value } from "../types/dtypes.ts";
import { ErrorCode, fail, ok, type Result } from "../types/error.ts";
import { checkValue } from "./convert.ts";

export type ArithmeticOp = "add" | "sub" | "mul" | "div" | "rem";

/** Either a column or a single value broadcast over every row */
export type Operand<K extends DTypeKind> = ColumnBuffer<K> | Scalar;

type NumberKernel = (a: number, b: number) => number;
type BigIntKernel = (a: bigint, b: bigint) => bigint;

function numberKernel(op: ArithmeticOp, kind: DTypeKind): NumberKernel {
	switch (op) {
		case "add":
			return (a, b) => a + b;
		case "sub":
			return (a, b) => a - b;
		case "mul":
			// plain multiplication loses low bits past 2^53
			if (kind === DTypeKind.Int32 || kind === DTypeKind.UInt32) return Math.imul;
			return (a, b) => a * b;
		case "div":
			return isFloatDType(kind) ? (a, b) => a / b : (a, b) => Math.trunc(a / b);
		case "rem":
			return (a, b) => a % b;
	}
}

function bigintKernel(op: ArithmeticOp): BigIntKernel {
	switch (op) {
		case "add":
			return (a, b) => a + b;
		case "sub":
			return (a, b) => a - b;
		case "mul":
			return (a, b) => a * b;
		case "div":
			return (a, b) => a / b;
		case "rem":
			return (a, b) => a % b;
	}
}

/**
 * Validate operands. Returns the scalar (already checked against the
 * column's kind) or the right-hand column.
 */
function resolveOperand<K extends DTypeKind>(
	operation: string,
	left: ColumnBuffer<K>,
	right: Operand<K>,
): Result<ColumnBuffer<K> | Value | null> {
	if (!(right instanceof ColumnBuffer)) {
		return checkValue(left.kind, right, operation);
	}
	if (right.kind !== left.kind) {
		return fail(new TypeMismatchError(operation, right.kind, [`a ${left.kind} column`]));
	}
	if (right.length !== left.length) {
		return fail(new ShapeError(`${operation} operand`, left.length, right.length));
	}
	return ok(right);
}

export function arithmetic<K extends DTypeKind>(
	op: ArithmeticOp,
	left: ColumnBuffer<K>,
	right: Operand<K>,
	label: string,
): Result<ColumnBuffer<K>> {
	if (!isNumericDType(left.kind)) {
		return fail(new TypeMismatchError(op, left.kind, ["a numeric column"]));
	}

	const resolved = resolveOperand(op, left, right);
	if (resolved.error !== ErrorCode.None) return resolved;
	const operand = resolved.value;

	const integral = !isFloatDType(left.kind);
	const numFn = numberKernel(op, left.kind);
	const bigFn = bigintKernel(op);
	const out = new ColumnBuffer(left.kind, left.length);

	for (let i = 0; i < left.length; i++) {
		const a = left.getScalar(i);
		const b = operand instanceof ColumnBuffer ? operand.getScalar(i) : operand;
		if (a === null || b === null) {
			out.appendNull();
			continue;
		}

		if (typeof a === "number" && typeof b === "number") {
			if (integral && b === 0 && (op === "div" || op === "rem")) {
				return fail(new DivisionByZeroError(label, i));
			}
			out.appendScalar(numFn(a, b));
		} else if (typeof a === "bigint" && typeof b === "bigint") {
			if (b === 0n && (op === "div" || op === "rem")) {
				return fail(new DivisionByZeroError(label, i));
			}
			out.appendScalar(bigFn(a, b));
		} else {
			return fail(new TypeMismatchError(op, typeof b, [`a ${left.kind} value`]));
		}
	}
	return ok(out);
}
