/**
 * Slice and Range row selectors, and their normalization against a row count.
 *
 * `Slice` follows stop-exclusive slice semantics with `null` meaning "default"
 * and negative bounds counting from the end. `Range` is a literal sequence of
 * row numbers.
 */

import { ValueConstraintError } from "../errors/index.ts";
import { plural } from "../utils/format.ts";

/** Normalized slice: `[start, count, step]`. */
export type SliceTriple = readonly [start: number, count: number, step: number];

const EMPTY: SliceTriple = [0, 0, 1];

export class Slice {
	readonly start: number | null;
	readonly stop: number | null;
	readonly step: number | null;

	constructor(start: number | null = null, stop: number | null = null, step: number | null = null) {
		this.start = start;
		this.stop = stop;
		this.step = step;
	}

	isIntegerValued(): boolean {
		return [this.start, this.stop, this.step].every((x) => x === null || Number.isInteger(x));
	}

	toString(): string {
		const fmt = (x: number | null) => (x === null ? "null" : String(x));
		return `slice(${fmt(this.start)}, ${fmt(this.stop)}, ${fmt(this.step)})`;
	}
}

export class Range {
	readonly start: number;
	readonly stop: number;
	readonly step: number;

	constructor(start: number, stop: number, step = 1) {
		if (step === 0) {
			throw new ValueConstraintError("range() step must not be zero", `range(${start}, ${stop}, 0)`);
		}
		this.start = start;
		this.stop = stop;
		this.step = step;
	}

	get length(): number {
		const span = this.step > 0 ? this.stop - this.start : this.start - this.stop;
		return span > 0 ? Math.ceil(span / Math.abs(this.step)) : 0;
	}

	isIntegerValued(): boolean {
		return Number.isInteger(this.start) && Number.isInteger(this.stop) && Number.isInteger(this.step);
	}

	toString(): string {
		return this.step === 1 ? `range(${this.start}, ${this.stop})` : `range(${this.start}, ${this.stop}, ${this.step})`;
	}
}

/** Build a slice; pass null for an open bound. */
export function slice(start: number | null = null, stop: number | null = null, step: number | null = null): Slice {
	return new Slice(start, stop, step);
}

export function range(stop: number): Range;
export function range(start: number, stop: number, step?: number): Range;
export function range(a: number, b?: number, step = 1): Range {
	return b === undefined ? new Range(0, a, 1) : new Range(a, b, step);
}

/**
 * Resolve a slice against `n` rows.
 *
 * A zero step means "row `start` repeated `stop` times"; it requires
 * `0 <= start < n` and `stop > 0`.
 */
export function normalizeSlice(s: Slice, n: number): SliceTriple {
	const step = s.step ?? 1;

	if (step === 0) {
		const { start, stop: count } = s;
		if (start === null || count === null || start < 0 || count <= 0) {
			throw new ValueConstraintError(`Invalid ${s}`, String(s), {
				hint: "a zero-step slice is slice(row, count, 0)",
			});
		}
		if (start >= n) {
			throw new ValueConstraintError(`${s} is invalid for a frame with ${plural(n, "row")}`, String(s));
		}
		return [start, count, 0];
	}

	let start: number;
	let count: number;
	if (step > 0) {
		start = clampPositive(s.start ?? 0, n);
		const stop = clampPositive(s.stop ?? n, n);
		count = stop > start ? Math.floor((stop - start + step - 1) / step) : 0;
	} else {
		start = clampNegative(s.start ?? n - 1, n);
		const stop = s.stop === null ? -1 : clampNegative(s.stop, n);
		count = start > stop ? Math.floor((start - stop - step - 1) / -step) : 0;
	}
	return count === 0 ? EMPTY : [start, count, step];
}

/** Bound for a positive-step slice: clamped into `[0, n]`. */
function clampPositive(x: number, n: number): number {
	const v = x < 0 ? x + n : x;
	return Math.min(Math.max(v, 0), n);
}

/** Bound for a negative-step slice: clamped into `[-1, n-1]`. */
function clampNegative(x: number, n: number): number {
	const v = x < 0 ? x + n : x;
	return Math.min(Math.max(v, -1), n - 1);
}

/**
 * Resolve a range of literal row numbers against `n` rows.
 * An all-negative range counts from the end. Returns null if any element
 * would fall outside `[0, n)`.
 */
export function normalizeRange(r: Range, n: number): SliceTriple | null {
	const count = r.length;
	if (count === 0) return EMPTY;

	let first = r.start;
	let last = r.start + (count - 1) * r.step;
	if (first < 0 && last < 0) {
		first += n;
		last += n;
	}
	if (first < 0 || first >= n || last < 0 || last >= n) return null;
	return [first, count, r.step];
}
