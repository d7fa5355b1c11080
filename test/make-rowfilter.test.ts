/**
 * Tests for makeRowFilter - selector classification and node collapse
 */

import { describe, expect, it } from "vitest";
import { Column } from "../src/buffer/column.ts";
import { NdArray } from "../src/buffer/ndarray.ts";
import { Frame } from "../src/dataframe/frame.ts";
import {
	IndexOutOfBoundsError,
	TypeMismatchError,
	ValueConstraintError,
} from "../src/errors/index.ts";
import { col } from "../src/expr/builders.ts";
import { f } from "../src/expr/scope.ts";
import { range, slice } from "../src/rowindex/slice.ts";
import { EvaluationEngine } from "../src/rows/engine.ts";
import { makeRowFilter } from "../src/rows/make-rowfilter.ts";
import { executeRowFilter } from "../src/rows/nodes.ts";
import { ALL_ROWS } from "../src/rows/selector.ts";
import { RFNodeType } from "../src/rows/types.ts";
import { captureLogger, engineFor, makeFrame10 } from "./test-utils.ts";

const resolve = (rows: unknown, frame: Frame = makeFrame10()) => makeRowFilter(rows, engineFor(frame));

function catchError(fn: () => unknown): unknown {
	try {
		fn();
	} catch (e) {
		return e;
	}
	throw new Error("expected an error");
}

describe("makeRowFilter", () => {
	describe("scenarios", () => {
		it("[-1] is the unit slice at the last row", () => {
			expect(resolve([-1])).toMatchObject({ type: RFNodeType.Slice, start: 9, count: 1, step: 1 });
		});

		it("slice(2, 8, 2) is Slice(2, 3, 2)", () => {
			expect(resolve(slice(2, 8, 2))).toMatchObject({ type: RFNodeType.Slice, start: 2, count: 3, step: 2 });
		});

		it("integers followed by a slice make a MultiSlice", () => {
			expect(resolve([0, 1, 2, 5, slice(7, 10, 1)])).toMatchObject({
				type: RFNodeType.MultiSlice,
				bases: [0, 1, 2, 5, 7],
				counts: [1, 1, 1, 1, 3],
				steps: [1, 1, 1, 1, 1],
			});
		});

		it("a boolean array of the wrong length is rejected", () => {
			const mask = NdArray.bool(new Array(9).fill(true));
			const e = catchError(() => resolve(mask));
			expect(e).toBeInstanceOf(ValueConstraintError);
			expect(e).toHaveProperty("message", "Cannot apply a boolean array of length 9 to a frame with 10 rows");
		});

		it("an integer column referencing row 10 fails on a 10-row frame", () => {
			const rows = Frame.fromColumns({ i: Column.int32([1, 10]) });
			const node = resolve(rows);
			expect(node.type).toBe(RFNodeType.IntegerColumn);

			const e = catchError(() => executeRowFilter(node));
			expect(e).toBeInstanceOf(IndexOutOfBoundsError);
			expect(e).toBeInstanceOf(ValueConstraintError);
			expect(e).toHaveProperty(
				"message",
				"The data column contains index 10 which is not allowed for a Frame with 10 rows",
			);
			expect(e).toHaveProperty("index", 10);
			expect(e).toHaveProperty("rowCount", 10);
		});

		it("true is a type mismatch", () => {
			expect(() => resolve(true)).toThrow(TypeMismatchError);
			expect(() => resolve(false)).toThrow("Boolean value cannot be used as a `rows` selector");
		});
	});

	describe("absent selectors", () => {
		it.each([undefined, null, ALL_ROWS])("%s selects all rows", (rows) => {
			expect(resolve(rows).type).toBe(RFNodeType.All);
		});
	});

	describe("integers", () => {
		it("normalizes every valid integer to a unit slice", () => {
			for (let e = -10; e < 10; e++) {
				expect(resolve(e)).toMatchObject({ type: RFNodeType.Slice, start: (e + 10) % 10, count: 1, step: 1 });
			}
		});

		it("rejects out-of-range integers", () => {
			expect(() => resolve([10])).toThrow("Row `10` is invalid for a frame with 10 rows");
			expect(() => resolve(-11)).toThrow("Row `-11` is invalid for a frame with 10 rows");
		});

		it("collapses [0] on a single-row frame to All", () => {
			const one = Frame.fromColumns({ x: Column.int32([7]) });
			expect(resolve([0], one).type).toBe(RFNodeType.All);
		});

		it("keeps lists of integers as arrays", () => {
			expect(resolve([3, 1, 3])).toMatchObject({ type: RFNodeType.Array, positions: [3, 1, 3] });
			expect(resolve(new Set([2, 5]))).toMatchObject({ type: RFNodeType.Array, positions: [2, 5] });
			expect(resolve([])).toMatchObject({ type: RFNodeType.Array, positions: [] });
		});
	});

	describe("slices and ranges", () => {
		it("collapses a full forward slice to All", () => {
			expect(resolve(slice(0, 10, 1)).type).toBe(RFNodeType.All);
			expect(resolve(slice()).type).toBe(RFNodeType.All);
			expect(resolve(range(10)).type).toBe(RFNodeType.All);
		});

		it("does not collapse a reversed full slice", () => {
			expect(resolve(slice(null, null, -1))).toMatchObject({
				type: RFNodeType.Slice,
				start: 9,
				count: 10,
				step: -1,
			});
		});

		it("drops empty slices and degenerates unit slices to bases", () => {
			expect(resolve([slice(5, 2), 3])).toMatchObject({ type: RFNodeType.Slice, start: 3, count: 1, step: 1 });
			expect(resolve([slice(4, 5)])).toMatchObject({ type: RFNodeType.Slice, start: 4, count: 1, step: 1 });
			expect(resolve([1, slice(4, 5)])).toMatchObject({ type: RFNodeType.Array, positions: [1, 4] });
		});

		it("leaves trailing bases without counts", () => {
			expect(resolve([slice(0, 3), 5])).toMatchObject({
				type: RFNodeType.MultiSlice,
				bases: [0, 5],
				counts: [3],
				steps: [1],
			});
		});

		it("pads counts and steps before each multi-row slice", () => {
			expect(resolve([2, slice(5, 8), slice(null, null, -4)])).toMatchObject({
				type: RFNodeType.MultiSlice,
				bases: [2, 5, 9],
				counts: [1, 3, 3],
				steps: [1, 1, -4],
			});
		});

		it("accepts zero-step slices", () => {
			expect(resolve([slice(3, 4, 0)])).toMatchObject({ type: RFNodeType.Slice, start: 3, count: 4, step: 0 });
		});

		it("resolves ranges as literal rows", () => {
			expect(resolve(range(-3, 0))).toMatchObject({ type: RFNodeType.Slice, start: 7, count: 3, step: 1 });
		});

		it("rejects non-integer bounds", () => {
			expect(() => resolve([slice(0.5, 3)])).toThrow("`slice(0.5, 3, null)` is not integer-valued");
		});

		it("rejects ranges outside the frame", () => {
			expect(() => resolve([range(5, 15)])).toThrow("Invalid range(5, 15) for a frame with 10 rows");
		});
	});

	describe("invalid list elements", () => {
		it("names the element and its position", () => {
			const e = catchError(() => resolve([3, "x"]));
			expect(e).toBeInstanceOf(ValueConstraintError);
			expect(e).toHaveProperty("message", 'Invalid row selector "x" at element 1 of the `rows` list');
			expect(e).toHaveProperty("position", 1);
		});

		it("words generator errors differently", () => {
			function* rows() {
				yield 1;
				yield 2.5;
			}
			expect(() => resolve(rows())).toThrow("Invalid row selector 2.5 generated at position 1");
		});

		it("materializes generators", () => {
			function* rows() {
				yield 4;
				yield slice(6, 9);
			}
			expect(resolve(rows())).toMatchObject({
				type: RFNodeType.MultiSlice,
				bases: [4, 6],
				counts: [1, 3],
				steps: [1, 1],
			});
		});
	});

	describe("arrays", () => {
		it("turns a matching boolean array into a BooleanColumn", () => {
			const node = resolve(NdArray.bool(new Array(10).fill(false)));
			expect(node.type).toBe(RFNodeType.BooleanColumn);
		});

		it("turns integer typed arrays into an IntegerColumn", () => {
			const node = resolve(new Int32Array([3, 1]));
			expect(node.type).toBe(RFNodeType.IntegerColumn);
			if (node.type === RFNodeType.IntegerColumn) {
				expect(node.column.getValues("rows")).toEqual([3, 1]);
			}
		});

		it("flattens two-dimensional arrays with a unit axis", () => {
			const mask = new NdArray(new Array(10).fill(true), [10, 1], "bool");
			expect(resolve(mask).type).toBe(RFNodeType.BooleanColumn);
		});

		it("rejects other shapes and dtypes", () => {
			const square = NdArray.fromTypedArray(new Int32Array([0, 1, 2, 3]), [2, 2]);
			expect(() => resolve(square)).toThrow(ValueConstraintError);
			expect(() => resolve(new Float64Array([1, 2]))).toThrow(
				"An array of dtype float64 cannot be used as a `rows` selector",
			);
		});

		it("rejects positions beyond int32", () => {
			const e = catchError(() => resolve(new Uint32Array([7, 4294967295])));
			expect(e).toBeInstanceOf(ValueConstraintError);
			expect(e).toMatchObject({
				message: "Value 4294967295 at position 1 is outside the int32 range",
				position: 1,
			});
		});
	});

	describe("frames", () => {
		it("rejects multi-column frames", () => {
			const rows = Frame.fromColumns({ a: Column.int32([1]), b: Column.int32([2]) });
			expect(() => resolve(rows)).toThrow(
				"Only a single-column frame can be used as a `rows` selector, got 2 columns",
			);
		});

		it("rejects bool frames of the wrong length", () => {
			const rows = Frame.fromColumns({ m: Column.bool(new Array(9).fill(true)) });
			expect(() => resolve(rows)).toThrow("`rows` frame has 9 rows, but applied to a frame with 10 rows");
		});

		it("cannot hold an index that would wrap to a valid row", () => {
			// 2^32 + 3 would otherwise be stored as row 3
			expect(() => resolve(Frame.fromColumns({ i: Column.int32([4294967299]) }))).toThrow(
				"Value 4294967299 at position 0 is outside the int32 range",
			);
			expect(() => Column.int32([-2147483649])).toThrow(ValueConstraintError);
			expect(Column.int32([-2147483648, 2147483647]).get(1)).toBe(2147483647);
		});

		it("rejects columns of other types", () => {
			const rows = Frame.fromColumns({ s: Column.string(["a"]) });
			expect(() => resolve(rows)).toThrow(TypeMismatchError);
		});
	});

	describe("expressions and functions", () => {
		it("turns expressions into FilterExpr nodes", () => {
			expect(resolve(f.x.gt(3)).type).toBe(RFNodeType.FilterExpr);
			expect(resolve(col("flag")).type).toBe(RFNodeType.FilterExpr);
		});

		it("rejects non-boolean expressions", () => {
			expect(() => resolve(col("x"))).toThrow("Filter expression must be bool, got int32");
		});

		it("resolves a function's result like the result itself", () => {
			const direct = resolve([1, slice(4, 7)]);
			const viaFunction = resolve(() => [1, slice(4, 7)]);
			expect(viaFunction).toMatchObject({
				type: direct.type,
				bases: [1, 4],
				counts: [1, 3],
				steps: [1, 1],
			});
		});

		it("passes the column scope to the function", () => {
			expect(resolve((scope: typeof f) => scope.flag).type).toBe(RFNodeType.FilterExpr);
		});

		it("rejects a function returning a function", () => {
			const e = catchError(() => resolve(() => () => 1));
			expect(e).toBeInstanceOf(TypeMismatchError);
			expect(String(e)).toContain("Unexpected result produced by the `rows` function");
		});

		it("names the offending value", () => {
			expect(() => resolve(() => "abc")).toThrow('Unexpected result produced by the `rows` function: "abc"');
			expect(() => resolve("abc")).toThrow('Unexpected `rows` argument: "abc"');
			expect(() => resolve(1.5)).toThrow("Unexpected `rows` argument: 1.5");
		});
	});

	it("logs the resolved node at debug level", () => {
		const { logger, records } = captureLogger();
		makeRowFilter([2], new EvaluationEngine(makeFrame10(), { logger }));
		expect(records()).toHaveLength(1);
		expect(records()[0]).toMatchObject({
			level: 20,
			service: "rowframe",
			node: "slice",
			nrows: 10,
			msg: "rowfilter_resolved",
		});
	});
});
