/**
 * makeRowFilter: resolve a `rows` selector into a row filter node.
 *
 * Lists of integers, slices and ranges are normalized against the row count
 * of the engine's frame and collapsed into the simplest node that describes
 * them: All, Slice, Array, or MultiSlice. Arrays and single-column frames
 * become column nodes, expressions become FilterExpr nodes, and a callable
 * is invoked once with the column scope and its result resolved in turn.
 */

import { Column } from "../buffer/column.ts";
import type { NdArray } from "../buffer/ndarray.ts";
import { Frame } from "../dataframe/frame.ts";
import { TypeMismatchError, ValueConstraintError } from "../errors/index.ts";
import { f } from "../expr/scope.ts";
import { Range, Slice, normalizeRange, normalizeSlice } from "../rowindex/slice.ts";
import { DTypeKind } from "../types/dtypes.ts";
import { plural, repr } from "../utils/format.ts";
import type { EvaluationEngine } from "./engine.ts";
import {
	allNode,
	arrayNode,
	booleanColumnNode,
	createFilterExprNode,
	integerColumnNode,
	multiSliceNode,
	sliceNode,
} from "./nodes.ts";
import { classifySelector } from "./selector.ts";
import type { RFNode } from "./types.ts";

/**
 * Resolve `rows` against the engine's frame.
 *
 * Throws TypeMismatchError when the selector has the wrong shape and
 * ValueConstraintError when a value does not fit the frame.
 */
export function makeRowFilter(rows: unknown, engine: EvaluationEngine): RFNode {
	const node = resolve(rows, engine, false);
	engine.logger.debug({ node: node.type, nrows: engine.nrows }, "rowfilter_resolved");
	return node;
}

function resolve(rows: unknown, engine: EvaluationEngine, nested: boolean): RFNode {
	const selector = classifySelector(rows);
	switch (selector.kind) {
		case "all":
			return allNode(engine);

		case "list":
			return fromList(selector.elements, selector.fromGenerator, engine);

		case "array":
			return fromFrame(frameFromArray(selector.array, engine.nrows), engine);

		case "frame":
			return fromFrame(selector.frame, engine);

		case "function":
			if (nested) throw unexpected(rows, nested);
			return resolve(selector.invoke(f), engine, true);

		case "expr":
			return createFilterExprNode(engine, selector.expr);

		case "unknown":
			throw unexpected(rows, nested);
	}
}

function unexpected(rows: unknown, nested: boolean): TypeMismatchError {
	const message = nested
		? `Unexpected result produced by the \`rows\` function: ${repr(rows)}`
		: `Unexpected \`rows\` argument: ${repr(rows)}`;
	return new TypeMismatchError(
		message,
		"rows",
		"rows accepts integers, slices, ranges, lists of those, masks, index columns, expressions and functions",
	);
}

// ===============================================================
// Lists of integers, slices and ranges
// ===============================================================

function fromList(elements: readonly unknown[], fromGenerator: boolean, engine: EvaluationEngine): RFNode {
	const nrows = engine.nrows;
	const bases: number[] = [];
	const counts: number[] = [];
	const steps: number[] = [];

	elements.forEach((elem, i) => {
		const where = `rows[${i}]`;

		if (typeof elem === "number" && Number.isInteger(elem)) {
			if (elem < -nrows || elem >= nrows) {
				throw new ValueConstraintError(
					`Row \`${elem}\` is invalid for a frame with ${plural(nrows, "row")}`,
					where,
					{ position: i },
				);
			}
			bases.push(((elem % nrows) + nrows) % nrows);
			return;
		}

		if (elem instanceof Slice || elem instanceof Range) {
			if (!elem.isIntegerValued()) {
				throw new ValueConstraintError(`\`${elem}\` is not integer-valued`, where, { position: i });
			}
			const triple = elem instanceof Slice ? normalizeSlice(elem, nrows) : normalizeRange(elem, nrows);
			if (triple === null) {
				throw new ValueConstraintError(
					`Invalid ${elem} for a frame with ${plural(nrows, "row")}`,
					where,
					{ position: i },
				);
			}
			const [start, count, step] = triple;
			if (count === 0) return;
			if (count === 1) {
				bases.push(start);
				return;
			}
			while (counts.length < bases.length) {
				counts.push(1);
				steps.push(1);
			}
			bases.push(start);
			counts.push(count);
			steps.push(step);
			return;
		}

		const message = fromGenerator
			? `Invalid row selector ${repr(elem)} generated at position ${i}`
			: `Invalid row selector ${repr(elem)} at element ${i} of the \`rows\` list`;
		throw new ValueConstraintError(message, where, { position: i });
	});

	if (counts.length === 0) {
		if (bases.length === 1) {
			const [row] = bases;
			return row === 0 && nrows === 1 ? allNode(engine) : sliceNode(engine, row, 1, 1);
		}
		return arrayNode(engine, bases);
	}

	if (bases.length === 1) {
		const [start] = bases;
		const [count] = counts;
		const [step] = steps;
		return start === 0 && count === nrows && step === 1
			? allNode(engine)
			: sliceNode(engine, start, count, step);
	}

	return multiSliceNode(engine, bases, counts, steps);
}

// ===============================================================
// Arrays and single-column frames
// ===============================================================

/** Convert a flat numeric array into a single-column frame. */
function frameFromArray(array: NdArray, nrows: number): Frame {
	const { shape } = array;
	const flat = shape.length === 1 || (shape.length === 2 && Math.min(...shape) === 1);
	if (!flat) {
		throw new ValueConstraintError(
			`Only a one-dimensional array can be used as a \`rows\` selector, got ${array}`,
			"rows",
			{ hint: "a 2-D array is accepted when one of its dimensions is 1" },
		);
	}

	if (array.isBoolean()) {
		if (array.size !== nrows) {
			throw new ValueConstraintError(
				`Cannot apply a boolean array of length ${array.size} to a frame with ${plural(nrows, "row")}`,
				"rows",
			);
		}
		return Frame.fromColumns({ rows: Column.bool(Array.from(array.data, Boolean)) });
	}

	if (array.isInteger()) {
		return Frame.fromColumns({ rows: Column.int32(Array.from(array.data, Number)) });
	}

	throw new ValueConstraintError(
		`An array of dtype ${array.dtype} cannot be used as a \`rows\` selector`,
		"rows",
		{ hint: "use a bool mask or an integer array of row positions" },
	);
}

function fromFrame(frame: Frame, engine: EvaluationEngine): RFNode {
	const nrows = engine.nrows;
	if (frame.ncols !== 1) {
		throw new ValueConstraintError(
			`Only a single-column frame can be used as a \`rows\` selector, got ${plural(frame.ncols, "column")}`,
			"rows",
		);
	}

	const kind = frame.dtypes[0];
	if (kind === DTypeKind.Bool) {
		if (frame.nrows !== nrows) {
			throw new ValueConstraintError(
				`\`rows\` frame has ${plural(frame.nrows, "row")}, but applied to a frame with ${plural(nrows, "row")}`,
				"rows",
			);
		}
		return booleanColumnNode(engine, frame);
	}
	if (kind === DTypeKind.Int32) {
		return integerColumnNode(engine, frame);
	}

	throw new TypeMismatchError(
		`A column of type ${kind} cannot be used as a \`rows\` selector`,
		`rows<${kind}>`,
		"use a bool mask or an int32 column of row positions",
	);
}
