/**
 * Tests for the row selection entry points
 */

import { describe, expect, it } from "vitest";
import { Column } from "../src/buffer/column.ts";
import { Frame } from "../src/dataframe/frame.ts";
import { deleteRows, query, selectRows, sortRows, trySelectRows } from "../src/dataframe/query.ts";
import { ValueConstraintError } from "../src/errors/index.ts";
import { col } from "../src/expr/builders.ts";
import { f } from "../src/expr/scope.ts";
import { RowIndex } from "../src/rowindex/row-index.ts";
import { range, slice } from "../src/rowindex/slice.ts";
import { DTypeKind } from "../src/types/dtypes.ts";
import { unwrap } from "../src/types/result.ts";
import { captureLogger, makeFrame10, positions, silentLogger } from "./test-utils.ts";

const quiet = { logger: silentLogger };

describe("selectRows", () => {
	it("returns a view over the selected rows", () => {
		const view = selectRows(makeFrame10(), [1, 3], quiet);
		expect(view.isView).toBe(true);
		expect(view.getValues("x")).toEqual([1, 3]);
	});

	it("returns the frame's rows unchanged for an absent selector", () => {
		const frame = makeFrame10();
		const view = selectRows(frame, undefined, quiet);
		expect(view.isView).toBe(false);
		expect(view.nrows).toBe(10);
	});

	it("selects from views", () => {
		const inner = selectRows(makeFrame10(), slice(2, 8), quiet);
		const outer = selectRows(inner, [0, -1], quiet);
		expect(outer.getValues("x")).toEqual([2, 7]);
		expect(positions(outer)).toEqual([2, 7]);
	});

	it("negates on request", () => {
		expect(selectRows(makeFrame10(), range(2, 10), { ...quiet, negate: true }).getValues("x")).toEqual([0, 1]);
	});

	it("accepts functions of the column scope", () => {
		const eager = selectRows(makeFrame10(), (s) => s.flag, quiet);
		const compiled = selectRows(makeFrame10(), (s) => s.flag, { ...quiet, compile: true });
		expect(eager.getValues("x")).toEqual([0, 2, 4, 6, 8]);
		expect(compiled.getValues("x")).toEqual([0, 2, 4, 6, 8]);
	});

	it("logs resolution and execution", () => {
		const { logger, records } = captureLogger();
		selectRows(makeFrame10(), 4, { logger });
		expect(records().map((r) => r.msg)).toEqual(["rowfilter_resolved", "rowfilter_executed"]);
	});
});

describe("trySelectRows", () => {
	it("wraps the selected frame", () => {
		const result = trySelectRows(makeFrame10(), [5], quiet);
		expect(unwrap(result).getValues("name")).toEqual(["r5"]);
	});

	it("returns rowframe errors", () => {
		const result = trySelectRows(makeFrame10(), [10], quiet);
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error).toBeInstanceOf(ValueConstraintError);
			expect(result.error.message).toBe("Row `10` is invalid for a frame with 10 rows");
		}
	});

	it("rethrows other errors", () => {
		expect(() =>
			trySelectRows(
				makeFrame10(),
				() => {
					throw new Error("boom");
				},
				quiet,
			),
		).toThrow("boom");
	});
});

describe("deleteRows", () => {
	it("keeps the rows not selected", () => {
		expect(deleteRows(makeFrame10(), slice(0, 8), quiet).getValues("x")).toEqual([8, 9]);
	});

	it("partitions the rows together with selectRows", () => {
		const frame = makeFrame10();
		for (const compile of [false, true]) {
			const kept = positions(selectRows(frame, f.y.gt(25), { ...quiet, compile }));
			const dropped = positions(deleteRows(frame, f.y.gt(25), { ...quiet, compile }));
			expect(kept).toEqual([3, 5, 6, 7, 8, 9]);
			expect(dropped).toEqual([0, 1, 2, 4]);
		}
	});

	it("selects everything when deleting the negation", () => {
		expect(deleteRows(makeFrame10(), [0], { ...quiet, negate: true }).getValues("x")).toEqual([0]);
	});
});

describe("query", () => {
	it("evaluates columns over the selected rows", () => {
		const out = query(makeFrame10(), f.x.lt(3), { double: f.x.mul(2), name: col("name") }, quiet);
		expect(out.isView).toBe(false);
		expect(out.toRecords()).toEqual([
			{ double: 0, name: "r0" },
			{ double: 2, name: "r1" },
			{ double: 4, name: "r2" },
		]);
	});

	it("evaluates through views", () => {
		const view = makeFrame10().withRowIndex(RowIndex.fromSlice(1, 5, 2));
		expect(query(view, [0, 2], { x: f.x }, quiet).toRecords()).toEqual([{ x: 1 }, { x: 5 }]);
	});

	it("widens integer results that overflow int32", () => {
		const frame = Frame.fromColumns({ a: Column.int32([2000000000, 5]) });
		const out = query(frame, null, { s: col("a").add(col("a")), n: f.a.neg() }, quiet);
		expect(out.dtypes).toEqual([DTypeKind.Float64, DTypeKind.Int32]);
		expect(out.toRecords()).toEqual([
			{ s: 4000000000, n: -2000000000 },
			{ s: 10, n: -5 },
		]);
	});

	it("materializes the selection when no columns are given", () => {
		const out = query(makeFrame10(), [7, 2], {}, quiet);
		expect(out.isView).toBe(false);
		expect(out.getValues("name")).toEqual(["r7", "r2"]);
	});
});

describe("sortRows", () => {
	it("orders rows by a column", () => {
		const sorted = sortRows(makeFrame10(), "y", { ...quiet, descending: true });
		expect(sorted.getValues("y")).toEqual([90, 80, 70, 60, 50, 30, 20, 10, 0, null]);
	});

	it("can be selected from", () => {
		const sorted = sortRows(makeFrame10(), "x", { ...quiet, descending: true });
		expect(selectRows(sorted, [0, 1], quiet).getValues("x")).toEqual([9, 8]);
	});

	it("sorts strings", () => {
		const frame = Frame.fromColumns({ s: makeFrame10().column("name") });
		const sorted = sortRows(selectRows(frame, [3, 1, 2], quiet), "s", quiet);
		expect(sorted.getValues("s")).toEqual(["r1", "r2", "r3"]);
	});
});
