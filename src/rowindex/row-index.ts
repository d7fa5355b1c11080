/**
 * RowIndex - immutable addressing of a subset (or permutation) of rows.
 *
 * Two stored representations:
 * - slice: positions `start + i*step` for `i` in `[0, count)`
 * - array: an explicit ordered Int32Array of positions
 *
 * Slice-lists, boolean/integer columns and compiled filter functions are all
 * materialized into one of these two on construction.
 */

import type { Column } from "../buffer/column.ts";
import { selectionPool } from "../buffer/selection-pool.ts";
import type { FilterFunction } from "../codegen/types.ts";
import {
	IndexOutOfBoundsError,
	InvalidOperationError,
	TypeMismatchError,
	ValueConstraintError,
} from "../errors/index.ts";
import { DTypeKind } from "../types/dtypes.ts";

type RowIndexData =
	| { readonly kind: "slice"; readonly start: number; readonly count: number; readonly step: number }
	| { readonly kind: "array"; readonly indices: Int32Array };

export class RowIndex {
	private readonly data: RowIndexData;

	private constructor(data: RowIndexData) {
		this.data = data;
	}

	/** Slice index over `[start + i*step for i in range(count)]`. */
	static fromSlice(start: number, count: number, step: number): RowIndex {
		if (start < 0 || count < 0 || (count > 0 && start + (count - 1) * step < 0)) {
			throw new InvalidOperationError(
				"RowIndex.fromSlice",
				`received invalid slice (${start}, ${count}, ${step})`,
			);
		}
		return new RowIndex({ kind: "slice", start, count, step });
	}

	/** Index with no rows. */
	static empty(): RowIndex {
		return RowIndex.fromSlice(0, 0, 1);
	}

	static fromArray(positions: ArrayLike<number>): RowIndex {
		const indices = new Int32Array(positions.length);
		for (let i = 0; i < positions.length; i++) {
			const p = positions[i];
			if (!Number.isInteger(p) || p < 0) {
				throw new ValueConstraintError(
					`Row position ${p} at element ${i} is not a non-negative integer`,
					`rowindex[${i}]`,
				);
			}
			indices[i] = p;
		}
		return new RowIndex({ kind: "array", indices });
	}

	/**
	 * Index from a list of slices `(bases[i], counts[i], steps[i])`.
	 * `counts` and `steps` may be shorter than `bases`; missing entries are 1.
	 */
	static fromSliceList(
		bases: readonly number[],
		counts: readonly number[],
		steps: readonly number[],
	): RowIndex {
		if (counts.length !== steps.length || counts.length > bases.length) {
			throw new InvalidOperationError(
				"RowIndex.fromSliceList",
				`received mismatched lists (bases=${bases.length}, counts=${counts.length}, steps=${steps.length})`,
			);
		}
		const positions: number[] = [];
		for (let i = 0; i < bases.length; i++) {
			const base = bases[i];
			const count = i < counts.length ? counts[i] : 1;
			const step = i < steps.length ? steps[i] : 1;
			if (base < 0 || count < 0 || (count > 0 && base + (count - 1) * step < 0)) {
				throw new InvalidOperationError(
					"RowIndex.fromSliceList",
					`received invalid slice (${base}, ${count}, ${step}) at element ${i}`,
				);
			}
			for (let k = 0; k < count; k++) {
				positions.push(base + k * step);
			}
		}
		return RowIndex.fromArray(positions);
	}

	/**
	 * Index from a column.
	 * - bool column: positions of `true` values (nulls are not selected)
	 * - int32 column: the values themselves, in order
	 */
	static fromColumn(column: Column): RowIndex {
		if (column.kind === DTypeKind.Bool) {
			const positions: number[] = [];
			for (let i = 0; i < column.length; i++) {
				if (column.get(i) === true) positions.push(i);
			}
			return new RowIndex({ kind: "array", indices: Int32Array.from(positions) });
		}

		if (column.kind === DTypeKind.Int32) {
			const indices = new Int32Array(column.length);
			for (let i = 0; i < column.length; i++) {
				const v = column.get(i);
				if (typeof v !== "number") {
					throw new ValueConstraintError(
						`Row index column contains a missing value at row ${i}`,
						`column[${i}]`,
					);
				}
				if (v < 0) {
					throw new ValueConstraintError(
						`Row index column contains negative value ${v} at row ${i}`,
						`column[${i}]`,
					);
				}
				indices[i] = v;
			}
			return new RowIndex({ kind: "array", indices });
		}

		throw new TypeMismatchError(
			`Cannot build a row index from a ${column.kind} column`,
			`column<${column.kind}>`,
			"use a bool mask or an int32 column of row positions",
		);
	}

	/**
	 * Index from a compiled filter function run over rows `[0, nrows)`.
	 * The function writes matching positions into `out` and their number
	 * into `nOuts[0]`.
	 */
	static fromFilterFunction(fn: FilterFunction, nrows: number): RowIndex {
		return selectionPool.borrow(nrows, (out) => {
			const nOuts = new Uint32Array(1);
			fn(0, nrows, out, nOuts);
			if (nOuts[0] > nrows) {
				throw new InvalidOperationError(
					"RowIndex.fromFilterFunction",
					`filter reported ${nOuts[0]} matches for ${nrows} rows`,
				);
			}
			return new RowIndex({ kind: "array", indices: Int32Array.from(out.subarray(0, nOuts[0])) });
		});
	}

	get length(): number {
		return this.data.kind === "slice" ? this.data.count : this.data.indices.length;
	}

	/** Largest referenced position, or -1 for an empty index. */
	get max(): number {
		const d = this.data;
		if (d.kind === "slice") {
			if (d.count === 0) return -1;
			return d.step >= 0 ? d.start + (d.count - 1) * d.step : d.start;
		}
		let max = -1;
		for (let i = 0; i < d.indices.length; i++) {
			if (d.indices[i] > max) max = d.indices[i];
		}
		return max;
	}

	isSlice(): boolean {
		return this.data.kind === "slice";
	}

	/** `[start, count, step]` for slice indices, null otherwise. */
	sliceTriple(): readonly [number, number, number] | null {
		const d = this.data;
		return d.kind === "slice" ? [d.start, d.count, d.step] : null;
	}

	get(i: number): number {
		const d = this.data;
		return d.kind === "slice" ? d.start + i * d.step : d.indices[i];
	}

	toArray(): Int32Array {
		const d = this.data;
		if (d.kind === "array") return d.indices.slice();
		const out = new Int32Array(d.count);
		for (let i = 0; i < d.count; i++) out[i] = d.start + i * d.step;
		return out;
	}

	/**
	 * Reinterpret this index's positions as relative to `parent`.
	 * The result addresses the same rows as positions in parent's own source.
	 */
	uplift(parent: RowIndex): RowIndex {
		const max = this.max;
		if (max >= parent.length) {
			throw new IndexOutOfBoundsError(
				`Cannot uplift: position ${max} is outside a parent index of ${parent.length} rows`,
				max,
				parent.length,
			);
		}
		const a = this.data;
		const p = parent.data;
		if (a.kind === "slice" && p.kind === "slice") {
			if (a.count === 0) return RowIndex.empty();
			return new RowIndex({
				kind: "slice",
				start: p.start + a.start * p.step,
				count: a.count,
				step: a.step * p.step,
			});
		}
		const n = this.length;
		const indices = new Int32Array(n);
		for (let i = 0; i < n; i++) indices[i] = parent.get(this.get(i));
		return new RowIndex({ kind: "array", indices });
	}

	/**
	 * Complement over `[0, n)`: every position not in this index, ascending.
	 */
	inverse(n: number): RowIndex {
		const max = this.max;
		if (max >= n) {
			throw new IndexOutOfBoundsError(
				`Cannot invert: position ${max} is outside a frame of ${n} rows`,
				max,
				n,
			);
		}
		const taken = new Uint8Array(n);
		for (let i = 0; i < this.length; i++) taken[this.get(i)] = 1;

		const positions: number[] = [];
		for (let i = 0; i < n; i++) {
			if (taken[i] === 0) positions.push(i);
		}
		if (positions.length === n) return RowIndex.fromSlice(0, n, 1);
		return new RowIndex({ kind: "array", indices: Int32Array.from(positions) });
	}

	/** True when both indices address the same positions in the same order. */
	equals(other: RowIndex): boolean {
		if (this.length !== other.length) return false;
		for (let i = 0; i < this.length; i++) {
			if (this.get(i) !== other.get(i)) return false;
		}
		return true;
	}

	toString(): string {
		const d = this.data;
		if (d.kind === "slice") return `RowIndex(slice ${d.start}, ${d.count}, ${d.step})`;
		return `RowIndex(array [${Array.from(d.indices.subarray(0, 10)).join(", ")}${d.indices.length > 10 ? ", ..." : ""}])`;
	}
}
