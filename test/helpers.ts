/**
 * Test helpers.
 */

import { DataFrame } from "../src/dataframe/dataframe.ts";
import type { Series } from "../src/series/series.ts";
import type { DTypeKind } from "../src/types/dtypes.ts";
import { unwrap } from "../src/types/error.ts";

/** Build a DataFrame or throw */
export function frame(
	data: Record<string, ReadonlyArray<unknown>>,
	schema: Record<string, DTypeKind>,
): DataFrame {
	return unwrap(DataFrame.fromArrays(data, schema));
}

/** Column values as a plain array */
export function values(df: DataFrame, name: string): unknown[] {
	const series: Series = unwrap(df.column(name));
	return series.toArray();
}
