/**
 * Row filter node types.
 *
 * A row filter node is the resolved form of a `rows` selector. The variant
 * set is closed; `executeRowFilter` dispatches over it.
 */

import type { Frame } from "../dataframe/frame.ts";
import type { Expr } from "../expr/ast.ts";
import type { EvaluationEngine } from "./engine.ts";
import type { SortNode } from "./sort-node.ts";

export enum RFNodeType {
	All = "all",
	Slice = "slice",
	Array = "array",
	MultiSlice = "multislice",
	BooleanColumn = "bool_column",
	IntegerColumn = "int_column",
	FilterExpr = "filter_expr",
	Sorted = "sorted",
}

interface RFNodeBase {
	readonly engine: EvaluationEngine;
	/** Select the complement of the rows this node describes */
	inverse: boolean;
	executed: boolean;
}

export interface AllNode extends RFNodeBase {
	readonly type: RFNodeType.All;
}

export interface SliceNode extends RFNodeBase {
	readonly type: RFNodeType.Slice;
	readonly start: number;
	readonly count: number;
	readonly step: number;
}

export interface ArrayNode extends RFNodeBase {
	readonly type: RFNodeType.Array;
	readonly positions: readonly number[];
}

/**
 * Slices `(bases[i], counts[i], steps[i])`. `counts` and `steps` may be
 * shorter than `bases`; missing trailing entries are 1.
 */
export interface MultiSliceNode extends RFNodeBase {
	readonly type: RFNodeType.MultiSlice;
	readonly bases: readonly number[];
	readonly counts: readonly number[];
	readonly steps: readonly number[];
}

export interface BooleanColumnNode extends RFNodeBase {
	readonly type: RFNodeType.BooleanColumn;
	/** Single bool column with as many rows as the target */
	readonly column: Frame;
}

export interface IntegerColumnNode extends RFNodeBase {
	readonly type: RFNodeType.IntegerColumn;
	/** Single int32 column of row positions */
	readonly column: Frame;
}

export interface FilterExprNode extends RFNodeBase {
	readonly type: RFNodeType.FilterExpr;
	readonly expr: Expr;
	/** Generated function name, set when the engine compiles */
	readonly fnName: string | null;
}

export interface SortedNode extends RFNodeBase {
	readonly type: RFNodeType.Sorted;
	readonly sort: SortNode;
}

export type RFNode =
	| AllNode
	| SliceNode
	| ArrayNode
	| MultiSliceNode
	| BooleanColumnNode
	| IntegerColumnNode
	| FilterExprNode
	| SortedNode;
