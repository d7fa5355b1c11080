/**
 * NdArray: a minimal n-dimensional numeric array accepted as a row selector.
 *
 * JavaScript has no boolean TypedArray, so boolean masks are expressed as an
 * NdArray with dtype "bool". Integer TypedArrays passed directly as selectors
 * are wrapped with `NdArray.fromTypedArray`.
 */

export type NdDType =
	| "bool"
	| "int8"
	| "int16"
	| "int32"
	| "uint8"
	| "uint16"
	| "uint32"
	| "float32"
	| "float64";

export type NumericTypedArray =
	| Int8Array
	| Int16Array
	| Int32Array
	| Uint8Array
	| Uint8ClampedArray
	| Uint16Array
	| Uint32Array
	| Float32Array
	| Float64Array;

export class NdArray {
	readonly data: ArrayLike<number | boolean>;
	readonly shape: readonly number[];
	readonly dtype: NdDType;

	constructor(data: ArrayLike<number | boolean>, shape: readonly number[], dtype: NdDType) {
		this.data = data;
		this.shape = shape;
		this.dtype = dtype;
	}

	get ndim(): number {
		return this.shape.length;
	}

	get size(): number {
		return this.shape.reduce((a, b) => a * b, 1);
	}

	isBoolean(): boolean {
		return this.dtype === "bool";
	}

	isInteger(): boolean {
		return this.dtype !== "bool" && this.dtype !== "float32" && this.dtype !== "float64";
	}

	/** One-dimensional boolean array. */
	static bool(values: readonly boolean[]): NdArray {
		return new NdArray(values, [values.length], "bool");
	}

	static fromTypedArray(array: NumericTypedArray, shape?: readonly number[]): NdArray {
		return new NdArray(array, shape ?? [array.length], typedArrayDType(array));
	}

	toString(): string {
		return `NdArray<${this.dtype}>(shape=[${this.shape.join(", ")}])`;
	}
}

export function typedArrayDType(array: NumericTypedArray): NdDType {
	if (array instanceof Int8Array) return "int8";
	if (array instanceof Int16Array) return "int16";
	if (array instanceof Int32Array) return "int32";
	if (array instanceof Uint8Array || array instanceof Uint8ClampedArray) return "uint8";
	if (array instanceof Uint16Array) return "uint16";
	if (array instanceof Uint32Array) return "uint32";
	if (array instanceof Float32Array) return "float32";
	return "float64";
}

/** Narrow an unknown value to one of the numeric TypedArrays. */
export function isNumericTypedArray(value: unknown): value is NumericTypedArray {
	return (
		value instanceof Int8Array ||
		value instanceof Int16Array ||
		value instanceof Int32Array ||
		value instanceof Uint8Array ||
		value instanceof Uint8ClampedArray ||
		value instanceof Uint16Array ||
		value instanceof Uint32Array ||
		value instanceof Float32Array ||
		value instanceof Float64Array
	);
}
