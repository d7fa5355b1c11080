import { describe, expect, it } from "vitest";
import { Column } from "../src/buffer/column.ts";
import { Frame } from "../src/dataframe/frame.ts";
import { InvalidOperationError, TypeMismatchError } from "../src/errors/index.ts";
import { ExprType, formatExpr, isExpr } from "../src/expr/ast.ts";
import { and, col, lit, not, or } from "../src/expr/builders.ts";
import { evaluateExpr } from "../src/expr/evaluate.ts";
import { inferExprType } from "../src/expr/infer.ts";
import { f } from "../src/expr/scope.ts";
import { RowIndex } from "../src/rowindex/row-index.ts";
import { DTypeKind } from "../src/types/dtypes.ts";
import { makeFrame10 } from "./test-utils.ts";

const values = (c: Column) => Array.from({ length: c.length }, (_, i) => c.get(i));

describe("inferExprType", () => {
	const frame = makeFrame10();

	it("types leaves", () => {
		expect(inferExprType(f.x.toExpr(), frame)).toBe(DTypeKind.Int32);
		expect(inferExprType(lit(1.5), frame)).toBe(DTypeKind.Float64);
		expect(inferExprType(lit("a"), frame)).toBe(DTypeKind.String);
		expect(inferExprType(lit(null), frame)).toBe("null");
	});

	it("types predicates as bool", () => {
		expect(inferExprType(f.x.gt(1), frame)).toBe(DTypeKind.Bool);
		expect(inferExprType(f.name.eq("r1"), frame)).toBe(DTypeKind.Bool);
		expect(inferExprType(and(f.flag, f.y.isNull()), frame)).toBe(DTypeKind.Bool);
	});

	it("types arithmetic", () => {
		expect(inferExprType(f.x.add(1), frame)).toBe(DTypeKind.Int32);
		expect(inferExprType(f.x.add(1.5), frame)).toBe(DTypeKind.Float64);
		expect(inferExprType(f.x.div(2), frame)).toBe(DTypeKind.Float64);
		expect(inferExprType({ type: ExprType.Neg, expr: lit(null) }, frame)).toBe(DTypeKind.Int32);
	});

	it("rejects mismatched operands", () => {
		expect(() => inferExprType(f.name.gt(1), frame)).toThrow(TypeMismatchError);
		expect(() => inferExprType(f.flag.lt(true), frame)).toThrow(
			"Operator 'lt' requires numeric or string operands, got bool, bool",
		);
		expect(() => inferExprType(not(f.x), frame)).toThrow("Operator 'not' requires a bool operand, got int32");
		expect(() => inferExprType(f.name.isIn([1]), frame)).toThrow(TypeMismatchError);
		expect(() => inferExprType(f.x.between("a", 2), frame)).toThrow(TypeMismatchError);
		expect(() => inferExprType(f.name.mul(2), frame)).toThrow(TypeMismatchError);
	});

	it("rejects empty and/or", () => {
		expect(() => inferExprType(and(), frame)).toThrow(InvalidOperationError);
	});
});

describe("evaluateExpr", () => {
	const frame = makeFrame10();

	it("propagates nulls through comparisons", () => {
		expect(values(evaluateExpr(f.y.gt(25), frame, null))).toEqual([
			false,
			false,
			false,
			true,
			null,
			true,
			true,
			true,
			true,
			true,
		]);
	});

	it("evaluates only the rows of the given index", () => {
		const c = evaluateExpr(f.x.mul(2), frame, RowIndex.fromSlice(1, 5, 2));
		expect(c.kind).toBe(DTypeKind.Int32);
		expect(values(c)).toEqual([2, 6, 10, 14, 18]);
	});

	it("keeps int32 results and widens the ones that overflow", () => {
		const big = Frame.fromColumns({ a: Column.int32([2147483647, -2147483648]) });
		const sum = evaluateExpr(f.a.add(1), big, RowIndex.fromArray([0]));
		expect(sum.kind).toBe(DTypeKind.Float64);
		expect(values(sum)).toEqual([2147483648]);
		expect(evaluateExpr(f.a.neg(), big, RowIndex.fromArray([1])).kind).toBe(DTypeKind.Float64);
		expect(evaluateExpr(f.a.sub(1), big, RowIndex.fromArray([0])).kind).toBe(DTypeKind.Int32);
	});

	it("yields null for division by zero", () => {
		const c = evaluateExpr(f.x.div(0), frame, RowIndex.fromArray([3]));
		expect(c.kind).toBe(DTypeKind.Float64);
		expect(values(c)).toEqual([null]);
	});

	it("uses three-valued and/or", () => {
		const rows = RowIndex.fromArray([0, 1]);
		expect(values(evaluateExpr(and(f.flag, lit(null)), frame, rows))).toEqual([null, false]);
		expect(values(evaluateExpr(or(f.flag, lit(null)), frame, rows))).toEqual([true, null]);
	});

	it("evaluates a bare null as a bool column", () => {
		const c = evaluateExpr(lit(null), frame, RowIndex.fromArray([0, 1]));
		expect(c.kind).toBe(DTypeKind.Bool);
		expect(values(c)).toEqual([null, null]);
	});

	it("checks membership", () => {
		expect(values(evaluateExpr(f.name.isIn(["r2", "r0"]), frame, RowIndex.fromSlice(0, 3, 1)))).toEqual([
			true,
			false,
			true,
		]);
	});
});

describe("expression helpers", () => {
	it("formats expressions", () => {
		expect(formatExpr(and(f.x.gt(1), f.name.eq("a")))).toBe('((f.x gt 1) and (f.name eq "a"))');
		expect(formatExpr(f.y.isNull())).toBe("(f.y is null)");
	});

	it("recognizes expression nodes", () => {
		expect(isExpr(f.x.gt(1))).toBe(true);
		expect(isExpr({ type: "nope" })).toBe(false);
		expect(isExpr(col("x"))).toBe(false);
	});

	it("exposes columns through the scope", () => {
		expect(f.price.name).toBe("price");
		expect(String(f.price)).toBe("f.price");
		expect("anything" in f).toBe(true);
	});
});
