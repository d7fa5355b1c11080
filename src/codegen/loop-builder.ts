/**
 * Loop builder: assembles one generated function that iterates over the
 * visible rows of a frame.
 *
 * Callers contribute source fragments for three places:
 * - preamble: before the loop
 * - main loop: once per row, with `i` the visible row and `r` its storage
 *   position
 * - epilogue: after the loop
 *
 * The builder owns iteration, view mapping, column binding and temporary
 * naming, then compiles the assembled source with `new Function`.
 */

import type { Column } from "../buffer/column.ts";
import type { Frame } from "../dataframe/frame.ts";
import { InvalidOperationError } from "../errors/index.ts";
import type { DTypeKind } from "../types/dtypes.ts";
import type { CodeGenerator } from "./code-generator.ts";

/** Names a generated column access resolves to. */
export interface BoundColumn {
	/** Variable holding the column's data array */
	readonly data: string;
	/** Variable holding the validity mask (null when the column has no nulls) */
	readonly validity: string;
	readonly kind: DTypeKind;
}

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

export class LoopBuilder {
	readonly name: string;
	private readonly gen: CodeGenerator;
	private readonly frame: Frame;
	private readonly preamble: string[] = [];
	private readonly mainloop: string[] = [];
	private readonly epilogue: string[] = [];
	private extraArgs: readonly string[] = [];
	private readonly columns: Column[] = [];
	private readonly bound = new Map<string, BoundColumn>();
	private tempCounter = 0;
	private generated = false;

	constructor(gen: CodeGenerator, frame: Frame, name: string) {
		if (!IDENTIFIER.test(name)) {
			throw new InvalidOperationError("LoopBuilder", `received invalid function name '${name}'`);
		}
		this.gen = gen;
		this.frame = frame;
		this.name = name;
	}

	addToPreamble(line: string): void {
		this.preamble.push(line);
	}

	addToMainLoop(line: string): void {
		this.mainloop.push(line);
	}

	addToEpilogue(line: string): void {
		this.epilogue.push(line);
	}

	/** Parameters the generated function takes after `row0, row1`. */
	setExtraArgs(args: readonly string[]): void {
		for (const arg of args) {
			if (!IDENTIFIER.test(arg)) {
				throw new InvalidOperationError("LoopBuilder.setExtraArgs", `received invalid parameter '${arg}'`);
			}
		}
		this.extraArgs = args;
	}

	/** Fresh local variable name. */
	makeTemp(prefix = "v"): string {
		return `${prefix}${++this.tempCounter}`;
	}

	/**
	 * Make a frame column available inside the loop.
	 * Throws ColumnNotFoundError for unknown names.
	 */
	bindColumn(name: string): BoundColumn {
		const existing = this.bound.get(name);
		if (existing) return existing;

		const column = this.frame.column(name);
		const slot = this.columns.length;
		this.columns.push(column);
		const binding: BoundColumn = {
			data: `c${slot}`,
			validity: `c${slot}v`,
			kind: column.kind,
		};
		this.bound.set(name, binding);
		return binding;
	}

	/** Full source of the generated module, for inspection. */
	source(): string {
		const lines: string[] = ['"use strict";'];
		this.columns.forEach((_, slot) => {
			lines.push(`const c${slot} = columns[${slot}].data;`);
			lines.push(`const c${slot}v = columns[${slot}].validity;`);
		});
		lines.push(`return function ${this.name}(${["row0", "row1", ...this.extraArgs].join(", ")}) {`);
		for (const line of this.preamble) lines.push(`\t${line}`);
		lines.push("\tfor (let i = row0; i < row1; i++) {");
		lines.push("\t\tconst r = rowmap === null ? i : rowmap[i];");
		for (const line of this.mainloop) lines.push(`\t\t${line}`);
		lines.push("\t}");
		for (const line of this.epilogue) lines.push(`\t${line}`);
		lines.push("};");
		return lines.join("\n");
	}

	/** Compile the assembled function and hand it to the generator. */
	generate(): void {
		if (this.generated) {
			throw new InvalidOperationError("LoopBuilder.generate", `was already called for '${this.name}'`);
		}
		this.generated = true;

		const source = this.source();
		const factory = new Function("columns", "rowmap", source);
		const rowmap = this.frame.rowIndex === null ? null : this.frame.rowIndex.toArray();
		const compiled: unknown = factory(this.columns, rowmap);
		if (typeof compiled !== "function") {
			throw new InvalidOperationError("LoopBuilder.generate", `produced no function for '${this.name}'`);
		}

		this.gen.addFunction(
			this.name,
			(row0, row1, out, nOuts) => {
				compiled(row0, row1, out, nOuts);
			},
			source,
		);
	}
}
