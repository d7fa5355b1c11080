/**
 * Row selection entry points.
 *
 * Each call builds one EvaluationEngine for the frame, resolves the `rows`
 * selector into a node, compiles registered nodes when the compiled
 * strategy is on, executes the node and returns a view over the final
 * index.
 */

import type { Column } from "../buffer/column.ts";
import { getConfig } from "../config.ts";
import { RowframeError } from "../errors/index.ts";
import type { Expr } from "../expr/ast.ts";
import { ColumnRef } from "../expr/builders.ts";
import { evaluateExpr } from "../expr/evaluate.ts";
import type { Logger } from "../logger.ts";
import { EvaluationEngine } from "../rows/engine.ts";
import { makeRowFilter } from "../rows/make-rowfilter.ts";
import { executeRowFilter, negate, sortedNode } from "../rows/nodes.ts";
import type { RowSelector } from "../rows/selector.ts";
import { SortNode, type SortOptions } from "../rows/sort-node.ts";
import { err, ok, type Result } from "../types/result.ts";
import { Frame } from "./frame.ts";

export interface SelectOptions {
	/** Select the rows the selector does not describe */
	negate?: boolean;
	/** Resolve filter expressions through generated code (default from config) */
	compile?: boolean;
	logger?: Logger;
}

function createEngine(frame: Frame, options: SelectOptions): EvaluationEngine {
	return new EvaluationEngine(frame, {
		compile: options.compile ?? getConfig().compile,
		logger: options.logger,
	});
}

/** Resolve and execute `rows` on a fresh engine. */
function run(frame: Frame, rows: RowSelector, options: SelectOptions): EvaluationEngine {
	const engine = createEngine(frame, options);
	const node = makeRowFilter(rows, engine);
	if (options.negate) negate(node);
	engine.codegen?.generate();
	executeRowFilter(node);
	return engine;
}

/**
 * View of the rows of `frame` described by `rows`.
 *
 * @example
 * selectRows(df, [0, slice(5, 8)]);
 * selectRows(df, (f) => f.price.gt(100));
 */
export function selectRows(frame: Frame, rows: RowSelector, options: SelectOptions = {}): Frame {
	return run(frame, rows, options).resultFrame();
}

/** `selectRows` returning RowframeErrors as a Result instead of throwing. */
export function trySelectRows(
	frame: Frame,
	rows: RowSelector,
	options: SelectOptions = {},
): Result<Frame, RowframeError> {
	try {
		return ok(selectRows(frame, rows, options));
	} catch (e) {
		if (e instanceof RowframeError) return err(e);
		throw e;
	}
}

/** View of every row of `frame` that `rows` does not describe. */
export function deleteRows(frame: Frame, rows: RowSelector, options: SelectOptions = {}): Frame {
	return selectRows(frame, rows, { ...options, negate: !options.negate });
}

/**
 * Evaluate `columns` over the rows described by `rows`.
 * The result owns its storage.
 */
export function query(
	frame: Frame,
	rows: RowSelector,
	columns: Readonly<Record<string, Expr | ColumnRef>>,
	options: SelectOptions = {},
): Frame {
	const engine = run(frame, rows, options);
	const out: Record<string, Column> = {};
	for (const [name, value] of Object.entries(columns)) {
		const expr = value instanceof ColumnRef ? value.toExpr() : value;
		out[name] = evaluateExpr(expr, frame, engine.currentRowIndex);
	}
	if (Object.keys(out).length === 0) {
		return engine.resultFrame().materialize();
	}
	return Frame.fromColumns(out);
}

/**
 * View of the visible rows of `frame` ordered by `column`.
 * Sorting is stable; nulls go last unless `nullsFirst` is set.
 */
export function sortRows(
	frame: Frame,
	column: string,
	options: SortOptions & Pick<SelectOptions, "logger"> = {},
): Frame {
	const engine = createEngine(frame, { compile: false, logger: options.logger });
	const node = sortedNode(engine, new SortNode(frame, column, options));
	executeRowFilter(node);
	return engine.resultFrame();
}
