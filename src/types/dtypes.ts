/**
 * DType kind identifiers for frame columns.
 */
export enum DTypeKind {
	Bool = "bool",
	Int32 = "int32",
	Float64 = "float64",
	String = "string",
}

/** Check whether a dtype takes part in arithmetic and ordering. */
export function isNumericDType(kind: DTypeKind): boolean {
	return kind === DTypeKind.Int32 || kind === DTypeKind.Float64;
}
