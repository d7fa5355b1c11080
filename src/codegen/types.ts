/**
 * Generated code types.
 *
 * These types are shared between the code generator, the row index and the
 * filter node that emits loop fragments.
 */

import type { CodeGenerator } from "./code-generator.ts";

/**
 * Compiled row filter.
 * Scans rows `[row0, row1)`, writing the position of every matching row to
 * `out` and the number of matches to `nOuts[0]`.
 */
export type FilterFunction = (
	row0: number,
	row1: number,
	out: Uint32Array,
	nOuts: Uint32Array,
) => void;

/**
 * A participant in code generation. Registered nodes are asked to emit
 * their code when the generator runs.
 */
export interface CodegenNode {
	/** Name of the function the node will generate */
	readonly name: string;
	generate(gen: CodeGenerator): void;
}
