/**
 * Expression AST for filter predicates and computed columns.
 *
 * Expressions are plain data objects (no class instances).
 * They are either evaluated eagerly over a frame or emitted as
 * generated code by the compiled filter strategy.
 */

/** Expression node types */
export enum ExprType {
	// Leaf nodes
	Column = "col",
	Literal = "lit",

	// Comparison operators
	Eq = "eq",
	Neq = "neq",
	Lt = "lt",
	Lte = "lte",
	Gt = "gt",
	Gte = "gte",
	Between = "between",
	IsNull = "is_null",
	IsNotNull = "is_not_null",
	IsIn = "is_in",

	// Logical operators
	And = "and",
	Or = "or",
	Not = "not",

	// Arithmetic operators
	Add = "add",
	Sub = "sub",
	Mul = "mul",
	Div = "div",
	Mod = "mod",
	Neg = "neg",
}

export type LiteralValue = number | string | boolean | null;

/** Column reference */
export interface ColumnExpr {
	readonly type: ExprType.Column;
	readonly name: string;
}

/** Literal value */
export interface LiteralExpr {
	readonly type: ExprType.Literal;
	readonly value: LiteralValue;
}

/** Binary comparison */
export interface ComparisonExpr {
	readonly type:
		| ExprType.Eq
		| ExprType.Neq
		| ExprType.Lt
		| ExprType.Lte
		| ExprType.Gt
		| ExprType.Gte;
	readonly left: Expr;
	readonly right: Expr;
}

/** Between (inclusive range) */
export interface BetweenExpr {
	readonly type: ExprType.Between;
	readonly expr: Expr;
	readonly low: Expr;
	readonly high: Expr;
}

/** Null check */
export interface NullCheckExpr {
	readonly type: ExprType.IsNull | ExprType.IsNotNull;
	readonly expr: Expr;
}

/** Membership in a fixed set of literals */
export interface IsInExpr {
	readonly type: ExprType.IsIn;
	readonly expr: Expr;
	readonly values: readonly LiteralValue[];
}

/** Logical AND/OR */
export interface LogicalExpr {
	readonly type: ExprType.And | ExprType.Or;
	readonly exprs: readonly Expr[];
}

/** Logical NOT */
export interface NotExpr {
	readonly type: ExprType.Not;
	readonly expr: Expr;
}

/** Binary arithmetic */
export interface ArithmeticExpr {
	readonly type:
		| ExprType.Add
		| ExprType.Sub
		| ExprType.Mul
		| ExprType.Div
		| ExprType.Mod;
	readonly left: Expr;
	readonly right: Expr;
}

/** Unary negation */
export interface NegExpr {
	readonly type: ExprType.Neg;
	readonly expr: Expr;
}

/** Union of all expression types */
export type Expr =
	| ColumnExpr
	| LiteralExpr
	| ComparisonExpr
	| BetweenExpr
	| NullCheckExpr
	| IsInExpr
	| LogicalExpr
	| NotExpr
	| ArithmeticExpr
	| NegExpr;

const EXPR_TYPES: ReadonlySet<string> = new Set(Object.values(ExprType));

/**
 * Check whether an arbitrary value is shaped like an expression node.
 * Only the discriminant is checked; operands are validated during type
 * inference.
 */
export function isExpr(value: unknown): value is Expr {
	return (
		typeof value === "object" &&
		value !== null &&
		"type" in value &&
		typeof value.type === "string" &&
		EXPR_TYPES.has(value.type)
	);
}

/** Format expression as string (for debugging and error messages) */
export function formatExpr(expr: Expr): string {
	switch (expr.type) {
		case ExprType.Column:
			return `f.${expr.name}`;
		case ExprType.Literal:
			return formatLiteral(expr.value);
		case ExprType.Eq:
		case ExprType.Neq:
		case ExprType.Lt:
		case ExprType.Lte:
		case ExprType.Gt:
		case ExprType.Gte:
		case ExprType.Add:
		case ExprType.Sub:
		case ExprType.Mul:
		case ExprType.Div:
		case ExprType.Mod:
			return `(${formatExpr(expr.left)} ${expr.type} ${formatExpr(expr.right)})`;
		case ExprType.Between:
			return `(${formatExpr(expr.expr)} between ${formatExpr(expr.low)} and ${formatExpr(expr.high)})`;
		case ExprType.IsNull:
			return `(${formatExpr(expr.expr)} is null)`;
		case ExprType.IsNotNull:
			return `(${formatExpr(expr.expr)} is not null)`;
		case ExprType.IsIn:
			return `${formatExpr(expr.expr)}.isIn([${expr.values.map(formatLiteral).join(", ")}])`;
		case ExprType.And:
			return `(${expr.exprs.map(formatExpr).join(" and ")})`;
		case ExprType.Or:
			return `(${expr.exprs.map(formatExpr).join(" or ")})`;
		case ExprType.Not:
			return `(not ${formatExpr(expr.expr)})`;
		case ExprType.Neg:
			return `(-${formatExpr(expr.expr)})`;
	}
}

function formatLiteral(value: LiteralValue): string {
	return typeof value === "string" ? JSON.stringify(value) : String(value);
}
