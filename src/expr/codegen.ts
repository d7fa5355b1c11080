/**
 * Expression code emission for generated row loops.
 *
 * `emitExpr` appends statements to the loop body that compute the
 * expression for the current row and returns the name of the local holding
 * the result (a value, or null). Semantics match evaluate.ts.
 */

import type { LoopBuilder } from "../codegen/loop-builder.ts";
import { DTypeKind } from "../types/dtypes.ts";
import { type Expr, ExprType, type LiteralValue } from "./ast.ts";

const COMPARISON_OPS: Readonly<Record<string, string>> = {
	[ExprType.Eq]: "===",
	[ExprType.Neq]: "!==",
	[ExprType.Lt]: "<",
	[ExprType.Lte]: "<=",
	[ExprType.Gt]: ">",
	[ExprType.Gte]: ">=",
};

const ARITHMETIC_OPS: Readonly<Record<string, string>> = {
	[ExprType.Add]: "+",
	[ExprType.Sub]: "-",
	[ExprType.Mul]: "*",
	[ExprType.Div]: "/",
	[ExprType.Mod]: "%",
};

export function emitExpr(expr: Expr, loop: LoopBuilder): string {
	const v = loop.makeTemp();
	const emit = (rhs: string) => loop.addToMainLoop(`const ${v} = ${rhs};`);

	switch (expr.type) {
		case ExprType.Column: {
			const c = loop.bindColumn(expr.name);
			const read = c.kind === DTypeKind.Bool ? `${c.data}[r] === 1` : `${c.data}[r]`;
			emit(`${c.validity} === null || ${c.validity}[r] === 1 ? ${read} : null`);
			return v;
		}

		case ExprType.Literal:
			emit(literalSource(expr.value));
			return v;

		case ExprType.Eq:
		case ExprType.Neq:
		case ExprType.Lt:
		case ExprType.Lte:
		case ExprType.Gt:
		case ExprType.Gte: {
			const a = emitExpr(expr.left, loop);
			const b = emitExpr(expr.right, loop);
			emit(`${a} === null || ${b} === null ? null : ${a} ${COMPARISON_OPS[expr.type]} ${b}`);
			return v;
		}

		case ExprType.Between: {
			const x = emitExpr(expr.expr, loop);
			const lo = emitExpr(expr.low, loop);
			const hi = emitExpr(expr.high, loop);
			emit(`${x} === null || ${lo} === null || ${hi} === null ? null : ${lo} <= ${x} && ${x} <= ${hi}`);
			return v;
		}

		case ExprType.IsNull:
			emit(`${emitExpr(expr.expr, loop)} === null`);
			return v;

		case ExprType.IsNotNull:
			emit(`${emitExpr(expr.expr, loop)} !== null`);
			return v;

		case ExprType.IsIn: {
			const set = loop.makeTemp("set");
			loop.addToPreamble(`const ${set} = [${expr.values.map(literalSource).join(", ")}];`);
			const x = emitExpr(expr.expr, loop);
			emit(`${x} === null ? null : ${set}.includes(${x})`);
			return v;
		}

		case ExprType.And:
		case ExprType.Or: {
			const operands = expr.exprs.map((e) => emitExpr(e, loop));
			const [first, ...rest] = operands;
			let acc = first;
			for (const next of rest) {
				const t = loop.makeTemp();
				loop.addToMainLoop(
					expr.type === ExprType.And
						? `const ${t} = ${acc} === false || ${next} === false ? false : ${acc} === null || ${next} === null ? null : true;`
						: `const ${t} = ${acc} === true || ${next} === true ? true : ${acc} === null || ${next} === null ? null : false;`,
				);
				acc = t;
			}
			emit(acc);
			return v;
		}

		case ExprType.Not: {
			const x = emitExpr(expr.expr, loop);
			emit(`${x} === null ? null : !${x}`);
			return v;
		}

		case ExprType.Add:
		case ExprType.Sub:
		case ExprType.Mul:
		case ExprType.Div:
		case ExprType.Mod: {
			const a = emitExpr(expr.left, loop);
			const b = emitExpr(expr.right, loop);
			const op = ARITHMETIC_OPS[expr.type];
			const zeroGuard = expr.type === ExprType.Div || expr.type === ExprType.Mod ? ` || ${b} === 0` : "";
			emit(`${a} === null || ${b} === null${zeroGuard} ? null : ${a} ${op} ${b}`);
			return v;
		}

		case ExprType.Neg: {
			const x = emitExpr(expr.expr, loop);
			emit(`${x} === null ? null : -${x}`);
			return v;
		}
	}
}

/** JavaScript source for a literal value. */
function literalSource(value: LiteralValue): string {
	if (typeof value === "string") return JSON.stringify(value);
	return String(value);
}
