/**
 * Column scope passed to callable row selectors.
 *
 * `f.price` is `col("price")`, so a selector can be written as
 * `(f) => f.price.gt(100)`.
 */

import { ColumnRef } from "./builders.ts";

export type ColumnScope = Readonly<Record<string, ColumnRef>>;

const target: ColumnScope = {};

export const f: ColumnScope = new Proxy(target, {
	get(_target, prop) {
		return typeof prop === "string" ? new ColumnRef(prop) : undefined;
	},
	has(_target, prop) {
		return typeof prop === "string";
	},
});
