/**
 * Eager expression evaluation.
 *
 * Evaluates an expression over the rows of a frame addressed by a RowIndex
 * and materializes the result as a Column. Nulls propagate through
 * comparisons and arithmetic; and/or use three-valued logic; division or
 * modulo by zero yields null. Integer results that leave the int32 range
 * are returned as a float64 column.
 *
 * The generated-code path in codegen.ts follows exactly these semantics.
 */

import { Column, isInt32, type Value } from "../buffer/column.ts";
import type { Frame } from "../dataframe/frame.ts";
import { TypeMismatchError } from "../errors/index.ts";
import type { RowIndex } from "../rowindex/row-index.ts";
import { DTypeKind } from "../types/dtypes.ts";
import { type Expr, ExprType, formatExpr } from "./ast.ts";
import { inferExprType } from "./infer.ts";

interface EvalContext {
	readonly frame: Frame;
	/** Storage positions of the rows being evaluated */
	readonly positions: ArrayLike<number>;
}

/**
 * Evaluate `expr` over `frame`'s storage rows addressed by `rowIndex`
 * (every storage row when null).
 */
export function evaluateExpr(expr: Expr, frame: Frame, rowIndex: RowIndex | null): Column {
	const kind = inferExprType(expr, frame);
	const positions = rowIndex === null ? identity(frame.storageRowCount) : rowIndex.toArray();
	const values = evalValues(expr, { frame, positions });
	if (kind === "null") return Column.fromValues(DTypeKind.Bool, values);
	if (kind === DTypeKind.Int32 && values.some((v) => typeof v === "number" && !isInt32(v))) {
		return Column.fromValues(DTypeKind.Float64, values);
	}
	return Column.fromValues(kind, values);
}

function identity(n: number): Int32Array {
	const out = new Int32Array(n);
	for (let i = 0; i < n; i++) out[i] = i;
	return out;
}

function evalValues(expr: Expr, ctx: EvalContext): Value[] {
	const n = ctx.positions.length;

	switch (expr.type) {
		case ExprType.Column: {
			const column = ctx.frame.column(expr.name);
			const out: Value[] = new Array(n);
			for (let i = 0; i < n; i++) out[i] = column.get(ctx.positions[i]);
			return out;
		}

		case ExprType.Literal:
			return new Array<Value>(n).fill(expr.value);

		case ExprType.Eq:
		case ExprType.Neq:
		case ExprType.Lt:
		case ExprType.Lte:
		case ExprType.Gt:
		case ExprType.Gte: {
			const op = expr.type;
			return zip(evalValues(expr.left, ctx), evalValues(expr.right, ctx), (a, b) => {
				if (op === ExprType.Eq) return a === b;
				if (op === ExprType.Neq) return a !== b;
				const c = compare(a, b, expr);
				switch (op) {
					case ExprType.Lt:
						return c < 0;
					case ExprType.Lte:
						return c <= 0;
					case ExprType.Gt:
						return c > 0;
					case ExprType.Gte:
						return c >= 0;
				}
			});
		}

		case ExprType.Between: {
			const x = evalValues(expr.expr, ctx);
			const lo = evalValues(expr.low, ctx);
			const hi = evalValues(expr.high, ctx);
			return x.map((v, i) => {
				const l = lo[i];
				const h = hi[i];
				if (v === null || l === null || h === null) return null;
				return compare(l, v, expr) <= 0 && compare(v, h, expr) <= 0;
			});
		}

		case ExprType.IsNull:
			return evalValues(expr.expr, ctx).map((v) => v === null);

		case ExprType.IsNotNull:
			return evalValues(expr.expr, ctx).map((v) => v !== null);

		case ExprType.IsIn: {
			const values = expr.values;
			return evalValues(expr.expr, ctx).map((v) => (v === null ? null : values.includes(v)));
		}

		case ExprType.And:
		case ExprType.Or: {
			const isAnd = expr.type === ExprType.And;
			const operands = expr.exprs.map((e) => evalValues(e, ctx));
			return operands.reduce((acc, next) =>
				zipNullable(acc, next, (a, b) => (isAnd ? kleeneAnd(a, b) : kleeneOr(a, b))),
			);
		}

		case ExprType.Not:
			return evalValues(expr.expr, ctx).map((v) => (v === null ? null : !v));

		case ExprType.Add:
		case ExprType.Sub:
		case ExprType.Mul:
		case ExprType.Div:
		case ExprType.Mod: {
			const op = expr.type;
			return zip(evalValues(expr.left, ctx), evalValues(expr.right, ctx), (a, b) => {
				const x = num(a, expr);
				const y = num(b, expr);
				switch (op) {
					case ExprType.Add:
						return x + y;
					case ExprType.Sub:
						return x - y;
					case ExprType.Mul:
						return x * y;
					case ExprType.Div:
						return y === 0 ? null : x / y;
					case ExprType.Mod:
						return y === 0 ? null : x % y;
				}
			});
		}

		case ExprType.Neg:
			return evalValues(expr.expr, ctx).map((v) => (v === null ? null : -num(v, expr)));
	}
}

/** Combine two columns of values; null on either side yields null. */
function zip(a: Value[], b: Value[], fn: (x: Value, y: Value) => Value): Value[] {
	return a.map((x, i) => {
		const y = b[i];
		return x === null || y === null ? null : fn(x, y);
	});
}

function zipNullable(a: Value[], b: Value[], fn: (x: Value, y: Value) => Value): Value[] {
	return a.map((x, i) => fn(x, b[i]));
}

function kleeneAnd(a: Value, b: Value): Value {
	if (a === false || b === false) return false;
	if (a === null || b === null) return null;
	return true;
}

function kleeneOr(a: Value, b: Value): Value {
	if (a === true || b === true) return true;
	if (a === null || b === null) return null;
	return false;
}

function compare(a: Value, b: Value, expr: Expr): number {
	if (typeof a === "number" && typeof b === "number") return a < b ? -1 : a > b ? 1 : a === b ? 0 : Number.NaN;
	if (typeof a === "string" && typeof b === "string") return a < b ? -1 : a > b ? 1 : 0;
	throw new TypeMismatchError(`Cannot order ${typeof a} and ${typeof b} values`, formatExpr(expr));
}

function num(v: Value, expr: Expr): number {
	if (typeof v !== "number") {
		throw new TypeMismatchError(`Expected a number, got ${typeof v}`, formatExpr(expr));
	}
	return v;
}
