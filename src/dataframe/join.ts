import { ColumnBuffer } from "../buffer/column-buffer.ts";
import { DuplicateColumnError, InvalidOperationError, TypeMismatchError } from "../errors/index.ts";
import { computeJoinIndices, type JoinConfig, JoinType, keyNames } from "../ops/join.ts";
import { Series } from "../series/series.ts";
import { DTypeKind } from "../types/dtypes.ts";
import { ErrorCode, fail, ok, type Result } from "../types/error.ts";
import { DataFrame } from "./dataframe.ts";

function resolveKeys(df: DataFrame, names: readonly string[]): Result<Series[]> {
	const columns: Series[] = [];
	for (const name of names) {
		const found = df.ownColumn(name);
		if (found.error !== ErrorCode.None) return found;
		columns.push(found.value);
	}
	return ok(columns);
}

/** Left key cell, or the right key cell on rows with no left partner */
function coalesceKey(
	left: ColumnBuffer,
	right: ColumnBuffer,
	leftRows: readonly (number | null)[],
	rightRows: readonly (number | null)[],
): ColumnBuffer {
	const out = new ColumnBuffer(left.kind, leftRows.length);
	for (let i = 0; i < leftRows.length; i++) {
		const l = leftRows[i];
		const r = rightRows[i];
		out.appendScalar(l !== null ? left.getScalar(l) : r !== null ? right.getScalar(r) : null);
	}
	return out;
}

/**
 * Hash join of two frames.
 *
 * Output columns: every left column in order (key columns carry the right
 * key's value on right-only rows), then the right columns other than its
 * keys. A right column whose name is already taken fails with
 * DuplicateColumn unless `config.suffix` is set.
 */
export function joinFrames(left: DataFrame, right: DataFrame, config: JoinConfig): Result<DataFrame> {
	const joinType = config.joinType ?? JoinType.Inner;
	const leftNames = keyNames(config.leftOn);
	const rightNames = keyNames(config.rightOn ?? config.leftOn);

	if (leftNames.length === 0 || leftNames.length !== rightNames.length) {
		return fail(
			new InvalidOperationError(
				"join",
				`needs the same non-zero number of keys on both sides (got ${leftNames.length} and ${rightNames.length})`,
			),
		);
	}

	const leftKeys = resolveKeys(left, leftNames);
	if (leftKeys.error !== ErrorCode.None) return leftKeys;
	const rightKeys = resolveKeys(right, rightNames);
	if (rightKeys.error !== ErrorCode.None) return rightKeys;

	for (let k = 0; k < leftNames.length; k++) {
		const lk = leftKeys.value[k];
		const rk = rightKeys.value[k];
		if (lk.dtype !== rk.dtype) {
			return fail(new TypeMismatchError(`join on '${lk.name}'`, rk.dtype, [lk.dtype]));
		}
		if (lk.dtype === DTypeKind.List) {
			return fail(new TypeMismatchError(`join on '${lk.name}'`, lk.dtype, ["a flat key column"]));
		}
	}

	// Output names, checked before any rows are gathered
	const taken = new Set(left.columnNames);
	const rightKeySet = new Set(rightNames);
	const rightOut: Array<{ series: Series; name: string }> = [];
	for (const series of right.ownColumns()) {
		if (rightKeySet.has(series.name)) continue;
		let name = series.name;
		if (taken.has(name)) {
			if (config.suffix === undefined || taken.has(name + config.suffix)) {
				return fail(new DuplicateColumnError(name, "join"));
			}
			name += config.suffix;
		}
		taken.add(name);
		rightOut.push({ series, name });
	}

	const indices = computeJoinIndices(
		leftKeys.value.map((s) => s.buffer),
		left.height,
		rightKeys.value.map((s) => s.buffer),
		right.height,
		joinType,
	);

	const columns: Series[] = [];
	for (const series of left.ownColumns()) {
		const k = leftNames.indexOf(series.name);
		const buffer =
			k === -1
				? series.buffer.gatherOptional(indices.left)
				: coalesceKey(series.buffer, rightKeys.value[k].buffer, indices.left, indices.right);
		columns.push(new Series(series.name, buffer));
	}
	for (const { series, name } of rightOut) {
		columns.push(new Series(name, series.buffer.gatherOptional(indices.right)));
	}

	return DataFrame.fromSeries(columns);
}
