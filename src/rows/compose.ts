import { RowIndex } from "../rowindex/row-index.ts";
import type { EvaluationEngine } from "./engine.ts";

/**
 * Final index for a node given its source index.
 *
 * A null source selects every row: the target index itself, or nothing when
 * inverted. Otherwise the source is inverted over the visible rows first and
 * only then uplifted onto the target index.
 */
export function composeFinalRowIndex(
	source: RowIndex | null,
	inverse: boolean,
	engine: EvaluationEngine,
): RowIndex | null {
	const target = engine.targetRowIndex;
	if (source === null) {
		return inverse ? RowIndex.empty() : target;
	}
	const selected = inverse ? source.inverse(engine.nrows) : source;
	return target === null ? selected : selected.uplift(target);
}
