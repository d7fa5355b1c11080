/**
 * Classification of `rows` selectors.
 *
 * Maps an arbitrary value to one of a handful of normalized shapes that
 * `makeRowFilter` knows how to turn into a node. Nothing here depends on the
 * frame being selected from.
 */

import { NdArray, type NumericTypedArray, isNumericTypedArray } from "../buffer/ndarray.ts";
import { Frame } from "../dataframe/frame.ts";
import { TypeMismatchError } from "../errors/index.ts";
import { type Expr, isExpr } from "../expr/ast.ts";
import { ColumnRef } from "../expr/builders.ts";
import type { ColumnScope } from "../expr/scope.ts";
import { Range, Slice } from "../rowindex/slice.ts";

/** Explicit "every row" selector. */
export const ALL_ROWS: unique symbol = Symbol("rowframe.allRows");

/** A single element of a list selector. */
export type RowElement = number | Slice | Range;

export type RowSelector =
	| undefined
	| null
	| typeof ALL_ROWS
	| RowElement
	| Iterable<RowElement>
	| NdArray
	| NumericTypedArray
	| Frame
	| Expr
	| ColumnRef
	| ((f: ColumnScope) => RowSelector);

export type ClassifiedSelector =
	| { readonly kind: "all" }
	| { readonly kind: "list"; readonly elements: readonly unknown[]; readonly fromGenerator: boolean }
	| { readonly kind: "array"; readonly array: NdArray }
	| { readonly kind: "frame"; readonly frame: Frame }
	| { readonly kind: "function"; readonly invoke: (scope: ColumnScope) => unknown }
	| { readonly kind: "expr"; readonly expr: Expr }
	| { readonly kind: "unknown"; readonly value: unknown };

/**
 * Classify a `rows` selector.
 * Throws TypeMismatchError for boolean literals, which would otherwise be
 * indistinguishable from the rows 0 and 1.
 */
export function classifySelector(rows: unknown): ClassifiedSelector {
	if (rows === undefined || rows === null || rows === ALL_ROWS) {
		return { kind: "all" };
	}

	if (typeof rows === "boolean") {
		throw new TypeMismatchError(
			"Boolean value cannot be used as a `rows` selector",
			String(rows),
			"use a bool column, a boolean NdArray or a filter expression to select by mask",
		);
	}

	if (typeof rows === "number") {
		return Number.isInteger(rows) ? single(rows) : { kind: "unknown", value: rows };
	}
	if (rows instanceof Slice || rows instanceof Range) return single(rows);

	if (typeof rows === "function") {
		const fn = rows;
		return { kind: "function", invoke: (scope) => Reflect.apply(fn, undefined, [scope]) };
	}
	if (typeof rows !== "object") return { kind: "unknown", value: rows };

	if (rows instanceof NdArray) return { kind: "array", array: rows };
	if (isNumericTypedArray(rows)) return { kind: "array", array: NdArray.fromTypedArray(rows) };
	if (rows instanceof Frame) return { kind: "frame", frame: rows };
	if (rows instanceof ColumnRef) return { kind: "expr", expr: rows.toExpr() };
	if (isExpr(rows)) return { kind: "expr", expr: rows };

	if (Array.isArray(rows)) return { kind: "list", elements: rows, fromGenerator: false };
	if (rows instanceof Set) return { kind: "list", elements: Array.from(rows), fromGenerator: false };
	if (isIterator(rows)) return { kind: "list", elements: Array.from(rows), fromGenerator: true };

	return { kind: "unknown", value: rows };
}

function single(element: RowElement): ClassifiedSelector {
	return { kind: "list", elements: [element], fromGenerator: false };
}

/** Generators and other one-shot iterators. */
function isIterator(value: object): value is IterableIterator<unknown> {
	return (
		"next" in value &&
		typeof value.next === "function" &&
		Symbol.iterator in value &&
		typeof value[Symbol.iterator] === "function"
	);
}
