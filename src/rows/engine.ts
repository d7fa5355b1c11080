/**
 * Evaluation context for one row-selection operation.
 *
 * Holds the target frame, the output slots written by a row filter node and
 * the `currentRowIndex` read by expression evaluation later in the same
 * operation. A `CodeGenerator` is attached when the compiled strategy is in
 * effect.
 */

import { CodeGenerator } from "../codegen/code-generator.ts";
import type { Frame } from "../dataframe/frame.ts";
import { InvalidOperationError } from "../errors/index.ts";
import { getLogger, type Logger } from "../logger.ts";
import type { RowIndex } from "../rowindex/row-index.ts";

/** Source slot marker for nodes whose index is only known at execution. */
export const PENDING_ROWINDEX: unique symbol = Symbol("rowframe.pendingRowIndex");

export type SourceRowIndex = RowIndex | null | typeof PENDING_ROWINDEX;

export interface EngineOptions {
	/** Resolve filter expressions through generated code */
	compile?: boolean;
	logger?: Logger;
}

export class EvaluationEngine {
	readonly frame: Frame;
	readonly logger: Logger;
	readonly codegen: CodeGenerator | null;
	/** Selection in effect for expression evaluation (storage positions) */
	currentRowIndex: RowIndex | null;

	private source: SourceRowIndex = null;
	private final: RowIndex | null = null;
	private finalSet = false;
	private target: RowIndex | null;

	constructor(frame: Frame, options: EngineOptions = {}) {
		this.frame = frame;
		this.logger = options.logger ?? getLogger();
		this.codegen = options.compile ? new CodeGenerator(this.logger) : null;
		this.currentRowIndex = frame.rowIndex;
		this.target = frame.rowIndex;
	}

	/** Visible rows of the target frame */
	get nrows(): number {
		return this.frame.nrows;
	}

	/** Index the target frame already carries, null when it is not a view */
	get targetRowIndex(): RowIndex | null {
		return this.target;
	}

	get sourceRowIndex(): SourceRowIndex {
		return this.source;
	}

	get finalRowIndex(): RowIndex | null {
		if (!this.finalSet) {
			throw new InvalidOperationError("EvaluationEngine.finalRowIndex", "was read before a row filter executed");
		}
		return this.final;
	}

	get hasFinalRowIndex(): boolean {
		return this.finalSet;
	}

	setSourceRowIndex(ri: SourceRowIndex): void {
		this.source = ri;
	}

	/** Record the final index and the target index it was composed against. */
	setFinalRowIndex(ri: RowIndex | null, target: RowIndex | null): void {
		this.final = ri;
		this.target = target;
		this.finalSet = true;
		this.currentRowIndex = ri;
	}

	/** View of the target frame's storage through the final index. */
	resultFrame(): Frame {
		return this.frame.withRowIndex(this.finalRowIndex);
	}
}
