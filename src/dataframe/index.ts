/**
 * DataFrame module.
 */

export { DataFrame, type Row, type SortBy } from "./dataframe.ts";
export { type AggSpec, type Group, GroupBy } from "./groupby.ts";
export { joinFrames } from "./join.ts";
