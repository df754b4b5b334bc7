import { ColumnBuffer } from "../buffer/column-buffer.ts";
import { ShapeError, TypeMismatchError } from "../errors/index.ts";
import { DTypeKind, dtypeFamily, type Scalar } from "../types/dtypes.ts";
import { fail, ok, type Result } from "../types/error.ts";

export type CompareOp = "gt" | "lt" | "ge" | "le" | "eq" | "ne";

type Comparable = number | bigint | string;

function comparable(value: Scalar): Comparable {
	return typeof value === "boolean" ? (value ? 1 : 0) : value;
}

function evaluate(op: CompareOp, a: Comparable, b: Comparable): boolean {
	switch (op) {
		case "gt":
			return a > b;
		case "lt":
			return a < b;
		case "ge":
			return a >= b;
		case "le":
			return a <= b;
		case "eq":
			return a === b;
		case "ne":
			return a !== b;
	}
}

/**
 * Bring a scalar operand into the column's family. Integral numbers meet
 * 64-bit columns as bigint and exact bigints meet number columns as
 * numbers. Other numeric operands keep their value: `<` and `>` order a
 * number against a bigint, `===` never equates them.
 */
function coerceOperand(kind: DTypeKind, value: Scalar): Scalar | undefined {
	const family = dtypeFamily(kind);
	if (family === typeof value) return value;
	if (family === "bigint" && typeof value === "number") {
		return Number.isInteger(value) ? BigInt(value) : value;
	}
	if (family === "number" && typeof value === "bigint") {
		const n = Number(value);
		return Number.isFinite(n) && BigInt(n) === value ? n : value;
	}
	return undefined;
}

/**
 * Elementwise comparison producing a mask. A null on either side gives
 * false at that row. Numbers compare with IEEE semantics, so NaN is never
 * equal to anything.
 */
export function compare(
	op: CompareOp,
	left: ColumnBuffer,
	right: ColumnBuffer | Scalar,
): Result<ColumnBuffer<DTypeKind.Boolean>> {
	if (left.kind === DTypeKind.List) {
		return fail(new TypeMismatchError(op, left.kind, ["a flat column"]));
	}
	let scalar: Scalar | undefined;
	if (right instanceof ColumnBuffer) {
		if (right.kind !== left.kind) {
			return fail(new TypeMismatchError(op, right.kind, [`a ${left.kind} column`]));
		}
		if (right.length !== left.length) {
			return fail(new ShapeError(`${op} operand`, left.length, right.length));
		}
	} else {
		scalar = coerceOperand(left.kind, right);
		if (scalar === undefined) {
			return fail(new TypeMismatchError(op, typeof right, [`a ${dtypeFamily(left.kind)} value`]));
		}
	}

	const out = new ColumnBuffer(DTypeKind.Boolean, left.length);
	for (let i = 0; i < left.length; i++) {
		const a = left.getScalar(i);
		const b = right instanceof ColumnBuffer ? right.getScalar(i) : scalar;
		if (a === null || b === null || b === undefined) {
			out.append(false);
			continue;
		}
		out.append(evaluate(op, comparable(a), comparable(b)));
	}
	return ok(out);
}
