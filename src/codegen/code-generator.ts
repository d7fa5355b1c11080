/**
 * Code generator used by the compiled row filter strategy.
 *
 * Nodes reserve a function name and register themselves while a selection is
 * being resolved. `generate()` then asks every registered node to emit its
 * code; each node builds a loop with `createLoop` and compiles it. After
 * that, compiled functions are looked up by name.
 */

import type { Frame } from "../dataframe/frame.ts";
import { InvalidOperationError } from "../errors/index.ts";
import type { Logger } from "../logger.ts";
import { LoopBuilder } from "./loop-builder.ts";
import type { CodegenNode, FilterFunction } from "./types.ts";

interface GeneratedFunction {
	readonly fn: FilterFunction;
	readonly source: string;
}

export class CodeGenerator {
	private readonly logger: Logger;
	private readonly nodes: CodegenNode[] = [];
	private readonly functions = new Map<string, GeneratedFunction>();
	private readonly reserved = new Set<string>();
	private counter = 0;
	private generated = false;

	constructor(logger: Logger) {
		this.logger = logger;
	}

	/** Reserve a unique function name starting with `prefix`. */
	makeVariableName(prefix: string): string {
		const name = `${prefix}_${++this.counter}`;
		this.reserved.add(name);
		return name;
	}

	addNode(node: CodegenNode): void {
		if (this.generated) {
			throw new InvalidOperationError("CodeGenerator.addNode", "was called after generate()");
		}
		if (!this.reserved.has(node.name)) {
			throw new InvalidOperationError("CodeGenerator.addNode", `received unreserved name '${node.name}'`);
		}
		this.nodes.push(node);
	}

	get nodeCount(): number {
		return this.nodes.length;
	}

	createLoop(frame: Frame, name: string): LoopBuilder {
		return new LoopBuilder(this, frame, name);
	}

	/** Called by LoopBuilder once a function has been compiled. */
	addFunction(name: string, fn: FilterFunction, source: string): void {
		if (this.functions.has(name)) {
			throw new InvalidOperationError("CodeGenerator.addFunction", `received duplicate function '${name}'`);
		}
		this.functions.set(name, { fn, source });
	}

	/** Emit and compile code for every registered node. */
	generate(): void {
		if (this.generated) return;
		this.generated = true;
		for (const node of this.nodes) {
			node.generate(this);
			this.logger.debug({ fn: node.name }, "rowfilter_compiled");
		}
	}

	get isGenerated(): boolean {
		return this.generated;
	}

	getResult(name: string): FilterFunction {
		return this.lookup(name).fn;
	}

	getSource(name: string): string {
		return this.lookup(name).source;
	}

	private lookup(name: string): GeneratedFunction {
		const entry = this.functions.get(name);
		if (entry === undefined) {
			throw new InvalidOperationError(
				"CodeGenerator.getResult",
				`found no compiled function '${name}'`,
				"call generate() before executing compiled row filters",
			);
		}
		return entry;
	}
}
