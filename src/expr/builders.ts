/**
 * Expression builders for fluent DSL.
 *
 * These functions create expression AST nodes with a chainable API.
 * The ColumnRef class provides method chaining for column operations.
 */

import {
	type ArithmeticExpr,
	type BetweenExpr,
	type ColumnExpr,
	type ComparisonExpr,
	type Expr,
	ExprType,
	type IsInExpr,
	type LiteralExpr,
	type LiteralValue,
	type LogicalExpr,
	type NegExpr,
	type NotExpr,
	type NullCheckExpr,
} from "./ast.ts";

/** Anything the builders accept as an operand. */
export type Operand = Expr | ColumnRef | LiteralValue;

/**
 * Wrapper class providing fluent API for column expressions.
 * Methods return Expr objects, not new ColumnRef instances.
 */
export class ColumnRef {
	private readonly expr: ColumnExpr;

	constructor(name: string) {
		this.expr = { type: ExprType.Column, name };
	}

	get name(): string {
		return this.expr.name;
	}

	/** Get the underlying expression */
	toExpr(): ColumnExpr {
		return this.expr;
	}

	// Comparison operators
	eq(other: Operand): ComparisonExpr {
		return { type: ExprType.Eq, left: this.expr, right: toExpr(other) };
	}

	neq(other: Operand): ComparisonExpr {
		return { type: ExprType.Neq, left: this.expr, right: toExpr(other) };
	}

	lt(other: Operand): ComparisonExpr {
		return { type: ExprType.Lt, left: this.expr, right: toExpr(other) };
	}

	lte(other: Operand): ComparisonExpr {
		return { type: ExprType.Lte, left: this.expr, right: toExpr(other) };
	}

	gt(other: Operand): ComparisonExpr {
		return { type: ExprType.Gt, left: this.expr, right: toExpr(other) };
	}

	gte(other: Operand): ComparisonExpr {
		return { type: ExprType.Gte, left: this.expr, right: toExpr(other) };
	}

	between(low: Operand, high: Operand): BetweenExpr {
		return between(this, low, high);
	}

	isNull(): NullCheckExpr {
		return { type: ExprType.IsNull, expr: this.expr };
	}

	isNotNull(): NullCheckExpr {
		return { type: ExprType.IsNotNull, expr: this.expr };
	}

	isIn(values: readonly LiteralValue[]): IsInExpr {
		return { type: ExprType.IsIn, expr: this.expr, values };
	}

	// Arithmetic operators
	add(other: Operand): ArithmeticExpr {
		return { type: ExprType.Add, left: this.expr, right: toExpr(other) };
	}

	sub(other: Operand): ArithmeticExpr {
		return { type: ExprType.Sub, left: this.expr, right: toExpr(other) };
	}

	mul(other: Operand): ArithmeticExpr {
		return { type: ExprType.Mul, left: this.expr, right: toExpr(other) };
	}

	div(other: Operand): ArithmeticExpr {
		return { type: ExprType.Div, left: this.expr, right: toExpr(other) };
	}

	mod(other: Operand): ArithmeticExpr {
		return { type: ExprType.Mod, left: this.expr, right: toExpr(other) };
	}

	neg(): NegExpr {
		return { type: ExprType.Neg, expr: this.expr };
	}

	toString(): string {
		return `f.${this.expr.name}`;
	}
}

/**
 * Create a column reference expression.
 *
 * Usage:
 *   col("name")              // Returns ColumnRef with fluent methods
 *   col("age").gt(18)        // Returns ComparisonExpr
 *   col("price").mul(1.1)    // Returns ArithmeticExpr
 */
export function col(name: string): ColumnRef {
	return new ColumnRef(name);
}

/**
 * Create a literal expression.
 */
export function lit(value: LiteralValue): LiteralExpr {
	return { type: ExprType.Literal, value };
}

/**
 * Convert a value or ColumnRef to an Expr.
 */
export function toExpr(value: Operand): Expr {
	if (
		value === null ||
		typeof value === "number" ||
		typeof value === "string" ||
		typeof value === "boolean"
	) {
		return lit(value);
	}
	if (value instanceof ColumnRef) {
		return value.toExpr();
	}
	return value;
}

// Logical combinators

/**
 * Logical AND of multiple expressions.
 */
export function and(...exprs: (Expr | ColumnRef)[]): LogicalExpr {
	return { type: ExprType.And, exprs: exprs.map(toExpr) };
}

/**
 * Logical OR of multiple expressions.
 */
export function or(...exprs: (Expr | ColumnRef)[]): LogicalExpr {
	return { type: ExprType.Or, exprs: exprs.map(toExpr) };
}

/**
 * Logical NOT of an expression.
 */
export function not(expr: Expr | ColumnRef): NotExpr {
	return { type: ExprType.Not, expr: toExpr(expr) };
}

/**
 * Check if value is between low and high (inclusive).
 */
export function between(
	expr: Expr | ColumnRef | string,
	low: Operand,
	high: Operand,
): BetweenExpr {
	return {
		type: ExprType.Between,
		expr: typeof expr === "string" ? col(expr).toExpr() : toExpr(expr),
		low: toExpr(low),
		high: toExpr(high),
	};
}
