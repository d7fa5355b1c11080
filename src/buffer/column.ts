/**
 * Column: a single typed column of frame storage.
 *
 * Values live in a TypedArray (or a string array for string columns) with an
 * optional validity mask. A null validity mask means every value is present.
 */

import { TypeMismatchError, ValueConstraintError } from "../errors/index.ts";
import { DTypeKind } from "../types/dtypes.ts";

/** A single cell value as seen by expressions and callers. */
export type Value = number | boolean | string | null;

/** Backing storage for each dtype. Booleans are stored as 0/1 bytes. */
export type ColumnData = Uint8Array | Int32Array | Float64Array | string[];

const INT32_MIN = -0x80000000;
const INT32_MAX = 0x7fffffff;

export class Column {
	readonly kind: DTypeKind;
	readonly data: ColumnData;
	/** 1 = value present, 0 = null. Null when the column has no nulls. */
	readonly validity: Uint8Array | null;

	constructor(kind: DTypeKind, data: ColumnData, validity: Uint8Array | null = null) {
		this.kind = kind;
		this.data = data;
		this.validity = validity;
	}

	get length(): number {
		return this.data.length;
	}

	isNull(index: number): boolean {
		return this.validity !== null && this.validity[index] === 0;
	}

	get(index: number): Value {
		if (this.isNull(index)) return null;
		const raw = this.data[index];
		if (this.kind === DTypeKind.Bool) return raw === 1;
		return raw;
	}

	/** Gather the values at the given storage positions into a new column. */
	take(positions: ArrayLike<number>): Column {
		const values: Value[] = new Array(positions.length);
		for (let i = 0; i < positions.length; i++) {
			values[i] = this.get(positions[i]);
		}
		return Column.fromValues(this.kind, values);
	}

	static bool(values: readonly (boolean | null)[]): Column {
		return Column.fromValues(DTypeKind.Bool, values);
	}

	static int32(values: readonly (number | null)[]): Column {
		return Column.fromValues(DTypeKind.Int32, values);
	}

	static float64(values: readonly (number | null)[]): Column {
		return Column.fromValues(DTypeKind.Float64, values);
	}

	static string(values: readonly (string | null)[]): Column {
		return Column.fromValues(DTypeKind.String, values);
	}

	/**
	 * Build a column of the given kind from plain values.
	 * Throws TypeMismatchError if a value does not fit the kind.
	 */
	static fromValues(kind: DTypeKind, values: readonly Value[]): Column {
		const n = values.length;
		let validity: Uint8Array | null = null;
		const markNull = (i: number) => {
			if (validity === null) validity = new Uint8Array(n).fill(1);
			validity[i] = 0;
		};

		switch (kind) {
			case DTypeKind.Bool: {
				const data = new Uint8Array(n);
				for (let i = 0; i < n; i++) {
					const v = values[i];
					if (v === null) markNull(i);
					else if (typeof v === "boolean") data[i] = v ? 1 : 0;
					else throw mismatch(kind, v, i);
				}
				return new Column(kind, data, validity);
			}
			case DTypeKind.Int32:
			case DTypeKind.Float64: {
				const data = kind === DTypeKind.Int32 ? new Int32Array(n) : new Float64Array(n);
				for (let i = 0; i < n; i++) {
					const v = values[i];
					if (v === null) markNull(i);
					else if (typeof v !== "number" || (kind === DTypeKind.Int32 && !Number.isInteger(v))) {
						throw mismatch(kind, v, i);
					} else if (kind === DTypeKind.Int32 && !isInt32(v)) {
						throw new ValueConstraintError(
							`Value ${v} at position ${i} is outside the int32 range`,
							`column<int32>[${i}]`,
							{ hint: "use a float64 column for larger values", position: i },
						);
					} else data[i] = v;
				}
				return new Column(kind, data, validity);
			}
			case DTypeKind.String: {
				const data: string[] = new Array(n);
				for (let i = 0; i < n; i++) {
					const v = values[i];
					if (v === null) {
						markNull(i);
						data[i] = "";
					} else if (typeof v === "string") data[i] = v;
					else throw mismatch(kind, v, i);
				}
				return new Column(kind, data, validity);
			}
		}
	}
}

export function isInt32(v: number): boolean {
	return v >= INT32_MIN && v <= INT32_MAX;
}

function mismatch(kind: DTypeKind, value: Value, index: number): TypeMismatchError {
	return new TypeMismatchError(
		`Value ${JSON.stringify(value)} at position ${index} cannot be stored in a ${kind} column`,
		`column<${kind}>[${index}]`,
	);
}
