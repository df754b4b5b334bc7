import type { ColumnBuffer } from "../buffer/column-buffer.ts";
import { getConfig } from "../config.ts";
import { isScalar, type Value } from "../types/dtypes.ts";

/** One column of a rendered table */
export interface DisplayColumn {
	header: string;
	dtype: string;
	buffer: ColumnBuffer;
}

/**
 * Formats a value for display.
 */
export function formatValue(value: unknown, nullMarker = getConfig().display.nullMarker): string {
	if (value === null || value === undefined) {
		return nullMarker;
	}
	if (typeof value === "number") {
		if (Number.isNaN(value)) return "NaN";
		return Number.isInteger(value) || !Number.isFinite(value) ? String(value) : value.toFixed(4);
	}
	return String(value);
}

/** Like formatValue, with list cells rendered inline as `[a, b, c]` */
export function formatCell(value: Value | null, nullMarker = getConfig().display.nullMarker): string {
	if (value === null || isScalar(value)) return formatValue(value, nullMarker);
	return `[${value.toArray().map((inner) => formatCell(inner, nullMarker)).join(", ")}]`;
}

/**
 * Centers text within a given width.
 */
export function padCenter(str: string, width: number): string {
	const totalPad = Math.max(0, width - str.length);
	const leftPad = Math.floor(totalPad / 2);
	const rightPad = totalPad - leftPad;
	return " ".repeat(leftPad) + str + " ".repeat(rightPad);
}

function truncate(text: string, width: number): string {
	return text.length > width ? `${text.slice(0, width - 1)}…` : text;
}

function formatRow(columns: readonly DisplayColumn[], rowIndex: number, widths: number[]): string {
	const cells: string[] = [];
	for (let j = 0; j < columns.length; j++) {
		const value = truncate(formatCell(columns[j].buffer.getValue(rowIndex)), widths[j]);
		cells.push(` ${value.padStart(widths[j], " ")} `);
	}
	return `│${cells.join("│")}│`;
}

/** Rows to render: everything, or the first and last halves of `maxRows` */
function visibleRows(rowCount: number, maxRows: number): { head: number[]; tail: number[] } {
	const all = (from: number, to: number) => Array.from({ length: to - from }, (_, i) => from + i);
	if (rowCount <= maxRows) return { head: all(0, rowCount), tail: [] };
	const half = Math.floor(maxRows / 2);
	return { head: all(0, half), tail: all(rowCount - half, rowCount) };
}

/**
 * Formats columns as a box-drawing table with a dtype row under the
 * headers and a footer line.
 */
export function formatTable(columns: readonly DisplayColumn[], rowCount: number, footer: string): string {
	const { maxRows, maxColWidth } = getConfig().display;
	const { head, tail } = visibleRows(rowCount, maxRows);

	// Calculate column widths from the rows actually shown
	const widths = columns.map((c) => Math.min(maxColWidth, Math.max(c.header.length, c.dtype.length, 1)));
	for (const i of [...head, ...tail]) {
		for (let j = 0; j < columns.length; j++) {
			const value = formatCell(columns[j].buffer.getValue(i));
			widths[j] = Math.min(maxColWidth, Math.max(widths[j], value.length));
		}
	}

	const lines: string[] = [];
	lines.push(`┌${widths.map((w) => "─".repeat(w + 2)).join("┬")}┐`);
	lines.push(`│${columns.map((c, i) => ` ${padCenter(truncate(c.header, widths[i]), widths[i])} `).join("│")}│`);
	lines.push(`│${columns.map((c, i) => ` ${padCenter(truncate(c.dtype, widths[i]), widths[i])} `).join("│")}│`);
	lines.push(`├${widths.map((w) => "─".repeat(w + 2)).join("┼")}┤`);

	for (const i of head) lines.push(formatRow(columns, i, widths));
	if (tail.length > 0) {
		lines.push(`│${widths.map((w) => ` ${"...".padStart(w, " ")} `).join("│")}│`);
		for (const i of tail) lines.push(formatRow(columns, i, widths));
	}

	lines.push(`└${widths.map((w) => "─".repeat(w + 2)).join("┴")}┘`);
	lines.push(footer);
	return lines.join("\n");
}
