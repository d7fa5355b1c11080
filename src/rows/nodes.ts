/**
 * Row filter node constructors and execution.
 *
 * Each node computes a *source* index in the coordinates of the rows visible
 * in the target frame; `composeFinalRowIndex` turns it into the *final*
 * index over storage positions. FilterExpr composes on its own and Sorted
 * bypasses composition entirely.
 */

import type { Frame } from "../dataframe/frame.ts";
import { IndexOutOfBoundsError, InvalidOperationError } from "../errors/index.ts";
import { RowIndex } from "../rowindex/row-index.ts";
import { DTypeKind } from "../types/dtypes.ts";
import { composeFinalRowIndex } from "./compose.ts";
import { type EvaluationEngine, PENDING_ROWINDEX, type SourceRowIndex } from "./engine.ts";
import { filterFinalRowIndex } from "./filter-expr.ts";
import type { SortNode } from "./sort-node.ts";
import {
	type AllNode,
	type ArrayNode,
	type BooleanColumnNode,
	type IntegerColumnNode,
	type MultiSliceNode,
	type RFNode,
	RFNodeType,
	type SliceNode,
	type SortedNode,
} from "./types.ts";

export { createFilterExprNode } from "./filter-expr.ts";

// ===============================================================
// Constructors
// ===============================================================

export function allNode(engine: EvaluationEngine): AllNode {
	return { type: RFNodeType.All, engine, inverse: false, executed: false };
}

/**
 * Slice node over `start + k*step` for `k` in `[0, count)`.
 * An invalid triple is a programming error in the caller.
 */
export function sliceNode(engine: EvaluationEngine, start: number, count: number, step: number): SliceNode {
	if (start < 0 || count < 0 || (count > 0 && start + (count - 1) * step < 0)) {
		throw new InvalidOperationError("sliceNode", `received invalid slice (${start}, ${count}, ${step})`);
	}
	return { type: RFNodeType.Slice, engine, start, count, step, inverse: false, executed: false };
}

export function arrayNode(engine: EvaluationEngine, positions: readonly number[]): ArrayNode {
	return { type: RFNodeType.Array, engine, positions, inverse: false, executed: false };
}

export function multiSliceNode(
	engine: EvaluationEngine,
	bases: readonly number[],
	counts: readonly number[],
	steps: readonly number[],
): MultiSliceNode {
	return { type: RFNodeType.MultiSlice, engine, bases, counts, steps, inverse: false, executed: false };
}

export function booleanColumnNode(engine: EvaluationEngine, column: Frame): BooleanColumnNode {
	if (column.ncols !== 1 || column.nrows !== engine.nrows || column.dtypes[0] !== DTypeKind.Bool) {
		throw new InvalidOperationError(
			"booleanColumnNode",
			`requires a (${engine.nrows} x 1) bool frame, got ${column}`,
		);
	}
	return { type: RFNodeType.BooleanColumn, engine, column, inverse: false, executed: false };
}

export function integerColumnNode(engine: EvaluationEngine, column: Frame): IntegerColumnNode {
	if (column.ncols !== 1 || column.dtypes[0] !== DTypeKind.Int32) {
		throw new InvalidOperationError("integerColumnNode", `requires a single int32 column, got ${column}`);
	}
	return { type: RFNodeType.IntegerColumn, engine, column, inverse: false, executed: false };
}

export function sortedNode(engine: EvaluationEngine, sort: SortNode): SortedNode {
	if (sort.frame !== engine.frame) {
		throw new InvalidOperationError("sortedNode", "requires a SortNode built over the engine's frame");
	}
	return { type: RFNodeType.Sorted, engine, sort, inverse: false, executed: false };
}

// ===============================================================
// Negation and execution
// ===============================================================

/** Toggle selection of the complement. */
export function negate(node: RFNode): void {
	if (node.type === RFNodeType.Sorted) {
		throw new InvalidOperationError("negate", "is not supported for sorted row filters");
	}
	node.inverse = !node.inverse;
}

/**
 * Compute the node's source and final indices and write them into its
 * engine. Nothing is written when computing either index fails.
 */
export function executeRowFilter(node: RFNode): void {
	if (node.executed) {
		throw new InvalidOperationError("executeRowFilter", `was called twice on a ${node.type} row filter`);
	}
	const { engine } = node;

	let source: SourceRowIndex;
	let final: RowIndex | null;
	let target = engine.targetRowIndex;
	switch (node.type) {
		case RFNodeType.FilterExpr:
			source = PENDING_ROWINDEX;
			final = filterFinalRowIndex(node);
			break;
		case RFNodeType.Sorted:
			source = PENDING_ROWINDEX;
			final = node.sort.makeRowIndex();
			target = node.sort.frame.rowIndex;
			break;
		default: {
			const ri = makeSourceRowIndex(node);
			source = ri;
			final = composeFinalRowIndex(ri, node.inverse, engine);
		}
	}

	node.executed = true;
	engine.setSourceRowIndex(source);
	engine.setFinalRowIndex(final, target);
	engine.logger.debug(
		{
			node: node.type,
			nrows: engine.nrows,
			inverse: node.inverse,
			selected: final === null ? engine.frame.storageRowCount : final.length,
		},
		"rowfilter_executed",
	);
}

/** Source index for the variants that use the shared composition rule. */
function makeSourceRowIndex(
	node: Exclude<RFNode, { type: RFNodeType.FilterExpr | RFNodeType.Sorted }>,
): RowIndex | null {
	switch (node.type) {
		case RFNodeType.All:
			return null;
		case RFNodeType.Slice:
			return RowIndex.fromSlice(node.start, node.count, node.step);
		case RFNodeType.Array:
			return RowIndex.fromArray(node.positions);
		case RFNodeType.MultiSlice:
			return RowIndex.fromSliceList(node.bases, node.counts, node.steps);
		case RFNodeType.BooleanColumn:
			return RowIndex.fromColumn(node.column.materialize().columnAt(0));
		case RFNodeType.IntegerColumn: {
			const ri = RowIndex.fromColumn(node.column.materialize().columnAt(0));
			const nrows = node.engine.nrows;
			if (ri.max >= nrows) {
				throw new IndexOutOfBoundsError(
					`The data column contains index ${ri.max} which is not allowed for a Frame with ${nrows} rows`,
					ri.max,
					nrows,
				);
			}
			return ri;
		}
	}
}
