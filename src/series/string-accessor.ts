/**
 * String operations on a Series, reached through `series.str`.
 *
 * Every method fails with TypeMismatch unless the Series holds strings.
 * Null cells stay null in the result.
 */

import { ColumnBuffer } from "../buffer/column-buffer.ts";
import { TypeMismatchError } from "../errors/index.ts";
import { DTypeKind, type DTypeToTS } from "../types/dtypes.ts";
import { fail, ok, type Result } from "../types/error.ts";
import { Series } from "./series.ts";

const encoder = new TextEncoder();

const LEADING_WS = /^\s+/;
const TRAILING_WS = /\s+$/;

export class StringAccessor {
	constructor(
		private readonly name: string,
		private readonly source: ColumnBuffer,
	) {}

	/** UTF-8 byte length of each value */
	len(): Result<Series<DTypeKind.UInt32>> {
		return this.map("len", `${this.name}_len`, DTypeKind.UInt32, (s) => encoder.encode(s).length);
	}

	toUppercase(): Result<Series<DTypeKind.String>> {
		return this.map("toUppercase", `${this.name}_upper`, DTypeKind.String, (s) => s.toUpperCase());
	}

	toLowercase(): Result<Series<DTypeKind.String>> {
		return this.map("toLowercase", `${this.name}_lower`, DTypeKind.String, (s) => s.toLowerCase());
	}

	contains(pattern: string): Result<Series<DTypeKind.Boolean>> {
		return this.map("contains", `${this.name}_contains_${pattern}`, DTypeKind.Boolean, (s) =>
			s.includes(pattern),
		);
	}

	startsWith(prefix: string): Result<Series<DTypeKind.Boolean>> {
		return this.map("startsWith", `${this.name}_startswith_${prefix}`, DTypeKind.Boolean, (s) =>
			s.startsWith(prefix),
		);
	}

	endsWith(suffix: string): Result<Series<DTypeKind.Boolean>> {
		return this.map("endsWith", `${this.name}_endswith_${suffix}`, DTypeKind.Boolean, (s) =>
			s.endsWith(suffix),
		);
	}

	/** Replace every occurrence of `pattern` */
	replace(pattern: string, replacement: string): Result<Series<DTypeKind.String>> {
		return this.map("replace", `${this.name}_replace`, DTypeKind.String, (s) =>
			s.replaceAll(pattern, replacement),
		);
	}

	strip(): Result<Series<DTypeKind.String>> {
		return this.map("strip", `${this.name}_strip`, DTypeKind.String, (s) => s.trim());
	}

	lstrip(): Result<Series<DTypeKind.String>> {
		return this.map("lstrip", `${this.name}_lstrip`, DTypeKind.String, (s) => s.replace(LEADING_WS, ""));
	}

	rstrip(): Result<Series<DTypeKind.String>> {
		return this.map("rstrip", `${this.name}_rstrip`, DTypeKind.String, (s) => s.replace(TRAILING_WS, ""));
	}

	private map<U extends DTypeKind>(
		operation: string,
		name: string,
		kind: U,
		fn: (value: string) => DTypeToTS<U>,
	): Result<Series<U>> {
		if (this.source.kind !== DTypeKind.String) {
			return fail(new TypeMismatchError(`str.${operation}`, this.source.kind, ["a string Series"]));
		}
		const out = new ColumnBuffer(kind, this.source.length);
		for (let i = 0; i < this.source.length; i++) {
			const value = this.source.getScalar(i);
			out.append(typeof value === "string" ? fn(value) : null);
		}
		return ok(new Series(name, out));
	}
}
