/**
 * Expression type inference against a frame's columns.
 */

import { isInt32 } from "../buffer/column.ts";
import type { Frame } from "../dataframe/frame.ts";
import { InvalidOperationError, TypeMismatchError } from "../errors/index.ts";
import { DTypeKind, isNumericDType } from "../types/dtypes.ts";
import { type Expr, ExprType, formatExpr, type LiteralValue } from "./ast.ts";

/** Result type of an expression; "null" for an untyped null literal. */
export type InferredType = DTypeKind | "null";

/**
 * Infer the result type of `expr` when evaluated over `frame`.
 * Throws ColumnNotFoundError for unknown columns and TypeMismatchError for
 * operands of the wrong type.
 */
export function inferExprType(expr: Expr, frame: Frame): InferredType {
	switch (expr.type) {
		case ExprType.Column:
			return frame.column(expr.name).kind;

		case ExprType.Literal:
			return literalType(expr.value);

		case ExprType.Eq:
		case ExprType.Neq: {
			const left = inferExprType(expr.left, frame);
			const right = inferExprType(expr.right, frame);
			if (!comparable(left, right)) throw operandMismatch(expr, [left, right], "operands of one type");
			return DTypeKind.Bool;
		}

		case ExprType.Lt:
		case ExprType.Lte:
		case ExprType.Gt:
		case ExprType.Gte: {
			const left = inferExprType(expr.left, frame);
			const right = inferExprType(expr.right, frame);
			if (!comparable(left, right) || left === DTypeKind.Bool || right === DTypeKind.Bool) {
				throw operandMismatch(expr, [left, right], "numeric or string operands");
			}
			return DTypeKind.Bool;
		}

		case ExprType.Between: {
			const types = [expr.expr, expr.low, expr.high].map((e) => inferExprType(e, frame));
			if (!types.every(numericOrNull)) throw operandMismatch(expr, types, "numeric operands");
			return DTypeKind.Bool;
		}

		case ExprType.IsNull:
		case ExprType.IsNotNull:
			inferExprType(expr.expr, frame);
			return DTypeKind.Bool;

		case ExprType.IsIn: {
			const inner = inferExprType(expr.expr, frame);
			for (const v of expr.values) {
				const t = literalType(v);
				if (!comparable(inner, t)) throw operandMismatch(expr, [inner, t], "values of the column's type");
			}
			return DTypeKind.Bool;
		}

		case ExprType.And:
		case ExprType.Or: {
			if (expr.exprs.length === 0) {
				throw new InvalidOperationError(expr.type, "requires at least one operand");
			}
			const types = expr.exprs.map((e) => inferExprType(e, frame));
			if (!types.every(boolOrNull)) throw operandMismatch(expr, types, "bool operands");
			return DTypeKind.Bool;
		}

		case ExprType.Not: {
			const inner = inferExprType(expr.expr, frame);
			if (!boolOrNull(inner)) throw operandMismatch(expr, [inner], "a bool operand");
			return DTypeKind.Bool;
		}

		case ExprType.Add:
		case ExprType.Sub:
		case ExprType.Mul:
		case ExprType.Mod:
		case ExprType.Div: {
			const left = inferExprType(expr.left, frame);
			const right = inferExprType(expr.right, frame);
			if (!numericOrNull(left) || !numericOrNull(right)) {
				throw operandMismatch(expr, [left, right], "numeric operands");
			}
			if (expr.type === ExprType.Div) return DTypeKind.Float64;
			return left === DTypeKind.Float64 || right === DTypeKind.Float64 ? DTypeKind.Float64 : DTypeKind.Int32;
		}

		case ExprType.Neg: {
			const inner = inferExprType(expr.expr, frame);
			if (!numericOrNull(inner)) throw operandMismatch(expr, [inner], "a numeric operand");
			return inner === "null" ? DTypeKind.Int32 : inner;
		}

		default:
			throw new TypeMismatchError(
				`Unsupported expression node ${JSON.stringify(unknownType(expr))}`,
				"(expression)",
			);
	}
}

export function literalType(value: LiteralValue): InferredType {
	if (value === null) return "null";
	if (typeof value === "boolean") return DTypeKind.Bool;
	if (typeof value === "string") return DTypeKind.String;
	return Number.isInteger(value) && isInt32(value) ? DTypeKind.Int32 : DTypeKind.Float64;
}

function numericOrNull(t: InferredType): boolean {
	return t === "null" || isNumericDType(t);
}

function boolOrNull(t: InferredType): boolean {
	return t === "null" || t === DTypeKind.Bool;
}

function comparable(a: InferredType, b: InferredType): boolean {
	if (a === "null" || b === "null" || a === b) return true;
	return isNumericDType(a) && isNumericDType(b);
}

function operandMismatch(expr: Expr, actual: readonly InferredType[], expected: string): TypeMismatchError {
	return new TypeMismatchError(
		`Operator '${expr.type}' requires ${expected}, got ${actual.join(", ")}`,
		formatExpr(expr),
	);
}

/** Read the discriminant of a node that fell through the exhaustive switch. */
function unknownType(expr: never): unknown {
	const node: unknown = expr;
	return typeof node === "object" && node !== null && "type" in node ? node.type : node;
}
