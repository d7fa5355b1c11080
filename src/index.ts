/**
 * rowframe - row selector resolution for columnar frames
 *
 * Main entry point for the library.
 */

// Re-export storage
export { Column, type ColumnData, type Value } from "./buffer/column.ts";
export { NdArray, type NdDType, type NumericTypedArray } from "./buffer/ndarray.ts";
export { SelectionBufferPool, selectionPool } from "./buffer/selection-pool.ts";
// Re-export code generation
export { CodeGenerator } from "./codegen/code-generator.ts";
export { type BoundColumn, LoopBuilder } from "./codegen/loop-builder.ts";
export type { CodegenNode, FilterFunction } from "./codegen/types.ts";
// Re-export configuration and logging
export { DEFAULT_LOG_LEVEL, getConfig, loadConfig, type LogLevel, type RowframeConfig } from "./config.ts";
export { createLogger, getLogger, type Logger } from "./logger.ts";
// Re-export frames and the query surface
export { Frame } from "./dataframe/frame.ts";
export { deleteRows, query, type SelectOptions, selectRows, sortRows, trySelectRows } from "./dataframe/query.ts";
// Re-export errors
export {
	ColumnNotFoundError,
	IndexOutOfBoundsError,
	InvalidOperationError,
	RowframeError,
	TypeMismatchError,
	ValueConstraintError,
} from "./errors/index.ts";
// Re-export expressions
export { type Expr, ExprType, formatExpr, isExpr, type LiteralValue } from "./expr/ast.ts";
export { and, between, ColumnRef, col, lit, not, type Operand, or, toExpr } from "./expr/builders.ts";
export { emitExpr } from "./expr/codegen.ts";
export { evaluateExpr } from "./expr/evaluate.ts";
export { type InferredType, inferExprType } from "./expr/infer.ts";
export { type ColumnScope, f } from "./expr/scope.ts";
// Re-export row indices
export { RowIndex } from "./rowindex/row-index.ts";
export { normalizeRange, normalizeSlice, Range, range, Slice, type SliceTriple, slice } from "./rowindex/slice.ts";
// Re-export row filters
export * from "./rows/index.ts";
// Re-export types
export { DTypeKind, isNumericDType } from "./types/dtypes.ts";
export { err, ok, type Result, unwrap } from "./types/result.ts";
