/**
 * FilterExpr node: rows where a boolean expression is true.
 *
 * Eager engines evaluate the expression into a bool column over the rows
 * visible through `currentRowIndex`. Compiling engines register the node
 * with the code generator at construction and later read the positions from
 * the generated function. Either way the positions are relative to the
 * visible rows, so the node inverts and uplifts them itself.
 */

import type { CodeGenerator } from "../codegen/code-generator.ts";
import { TypeMismatchError } from "../errors/index.ts";
import { type Expr, formatExpr } from "../expr/ast.ts";
import { emitExpr } from "../expr/codegen.ts";
import { evaluateExpr } from "../expr/evaluate.ts";
import { inferExprType } from "../expr/infer.ts";
import { RowIndex } from "../rowindex/row-index.ts";
import { DTypeKind } from "../types/dtypes.ts";
import { composeFinalRowIndex } from "./compose.ts";
import type { EvaluationEngine } from "./engine.ts";
import { type FilterExprNode, RFNodeType } from "./types.ts";

export function createFilterExprNode(engine: EvaluationEngine, expr: Expr): FilterExprNode {
	const type = inferExprType(expr, engine.frame);
	if (type !== DTypeKind.Bool) {
		throw new TypeMismatchError(
			`Filter expression must be bool, got ${type}`,
			formatExpr(expr),
			"use a comparison such as f.x > 0 as the `rows` selector",
		);
	}

	const codegen = engine.codegen;
	const fnName = codegen === null ? null : codegen.makeVariableName("make_rowindex");
	const node: FilterExprNode = {
		type: RFNodeType.FilterExpr,
		engine,
		expr,
		fnName,
		inverse: false,
		executed: false,
	};

	if (codegen !== null && fnName !== null) {
		codegen.addNode({
			name: fnName,
			generate: (gen) => generateFilterCode(node, fnName, gen),
		});
	}
	return node;
}

/** Final index of a filter node: matching rows, inverted, then uplifted. */
export function filterFinalRowIndex(node: FilterExprNode): RowIndex | null {
	const { engine } = node;
	let matched: RowIndex;
	if (engine.codegen !== null && node.fnName !== null) {
		matched = RowIndex.fromFilterFunction(engine.codegen.getResult(node.fnName), engine.nrows);
	} else {
		const mask = evaluateExpr(node.expr, engine.frame, engine.currentRowIndex);
		matched = RowIndex.fromColumn(mask);
	}
	return composeFinalRowIndex(matched, node.inverse, engine);
}

/**
 * Emit the generated filter: collect every visible row `i` whose expression
 * value is true into `out`, and the count into `nOuts[0]`.
 */
export function generateFilterCode(node: FilterExprNode, fnName: string, gen: CodeGenerator): void {
	const loop = gen.createLoop(node.engine.frame, fnName);
	const cond = emitExpr(node.expr, loop);
	loop.addToPreamble("let j = 0;");
	loop.addToMainLoop(`if (${cond} === true) {`);
	loop.addToMainLoop("\tout[j++] = i;");
	loop.addToMainLoop("}");
	loop.addToEpilogue("nOuts[0] = j;");
	loop.setExtraArgs(["out", "nOuts"]);
	loop.generate();
}
