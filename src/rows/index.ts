/**
 * Public exports for row filter resolution.
 */

export { composeFinalRowIndex } from "./compose.ts";
export { type EngineOptions, EvaluationEngine, PENDING_ROWINDEX, type SourceRowIndex } from "./engine.ts";
export { filterFinalRowIndex, generateFilterCode } from "./filter-expr.ts";
export { makeRowFilter } from "./make-rowfilter.ts";
export {
	allNode,
	arrayNode,
	booleanColumnNode,
	createFilterExprNode,
	executeRowFilter,
	integerColumnNode,
	multiSliceNode,
	negate,
	sliceNode,
	sortedNode,
} from "./nodes.ts";
export { ALL_ROWS, type ClassifiedSelector, classifySelector, type RowElement, type RowSelector } from "./selector.ts";
export { SortNode, type SortOptions } from "./sort-node.ts";
export {
	type AllNode,
	type ArrayNode,
	type BooleanColumnNode,
	type FilterExprNode,
	type IntegerColumnNode,
	type MultiSliceNode,
	type RFNode,
	RFNodeType,
	type SliceNode,
	type SortedNode,
} from "./types.ts";
