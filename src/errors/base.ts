import { ErrorCode } from "../types/error.ts";

/**
 * Base error class for all tabula errors.
 * Carries the ErrorCode of the failed operation and renders a
 * compiler-style report with location tracking and hints.
 */
export class TabulaError extends Error {
	readonly code: Exclude<ErrorCode, ErrorCode.None>;
	readonly hint?: string;
	readonly location?: { file: string; line: number; column: number };

	constructor(code: Exclude<ErrorCode, ErrorCode.None>, message: string, hint?: string) {
		super(message);
		this.name = "TabulaError";
		this.code = code;
		this.hint = hint;
		this.location = this._extractLocation();
	}

	private _extractLocation(): { file: string; line: number; column: number } | undefined {
		const stack = this.stack;
		if (!stack) return undefined;

		const lines = stack.split("\n");
		for (const line of lines) {
			if (line.includes("node_modules") || line.includes("/errors/")) continue;

			const match =
				line.match(/at .+? \((.+?):(\d+):(\d+)\)/) || line.match(/at (.+?):(\d+):(\d+)/);

			if (match) {
				return {
					file: match[1],
					line: Number.parseInt(match[2], 10),
					column: Number.parseInt(match[3], 10),
				};
			}
		}
		return undefined;
	}

	format(): string {
		const lines: string[] = [];

		const loc = this.location
			? ` at ${this.location.file.split("/").slice(-1)[0]}:${this.location.line}:${this.location.column}`
			: "";

		lines.push(`error: ${this.message}${loc}`);
		lines.push(`  --> ${this._getExpression()}`);
		lines.push("   |");
		lines.push(`   └── ${this._getDetail()}`);

		if (this.hint) {
			lines.push("");
			lines.push(`help: ${this.hint}`);
		}

		return lines.join("\n");
	}

	protected _getExpression(): string {
		return "(expression)";
	}

	protected _getDetail(): string {
		return this.message;
	}
}
