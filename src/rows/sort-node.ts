/**
 * Sort computation behind the Sorted row filter node.
 *
 * Orders the visible rows of a frame by one column. The sort is stable;
 * nulls go last unless `nullsFirst` is set, in either direction. NaN always
 * follows the other numbers.
 */

import type { Value } from "../buffer/column.ts";
import type { Frame } from "../dataframe/frame.ts";
import { RowIndex } from "../rowindex/row-index.ts";

export interface SortOptions {
	descending?: boolean;
	nullsFirst?: boolean;
}

export class SortNode {
	readonly frame: Frame;
	readonly columnName: string;
	readonly descending: boolean;
	readonly nullsFirst: boolean;

	constructor(frame: Frame, columnName: string, options: SortOptions = {}) {
		// Fail on unknown columns before anything executes
		frame.columnIndex(columnName);
		this.frame = frame;
		this.columnName = columnName;
		this.descending = options.descending ?? false;
		this.nullsFirst = options.nullsFirst ?? false;
	}

	/** Storage positions of the visible rows in sorted order. */
	makeRowIndex(): RowIndex {
		const column = this.frame.column(this.columnName);
		const n = this.frame.nrows;
		const positions: number[] = new Array(n);
		for (let i = 0; i < n; i++) positions[i] = this.frame.storagePosition(i);

		const sign = this.descending ? -1 : 1;
		const nullOrder = this.nullsFirst ? -1 : 1;
		positions.sort((a, b) => {
			const x = column.get(a);
			const y = column.get(b);
			if (x === null || y === null) {
				if (x === y) return 0;
				return x === null ? nullOrder : -nullOrder;
			}
			const xn = Number.isNaN(x);
			const yn = Number.isNaN(y);
			if (xn || yn) return xn === yn ? 0 : xn ? 1 : -1;
			return sign * compareValues(x, y);
		});
		return RowIndex.fromArray(positions);
	}
}

/** Order of two non-null, non-NaN values of one column. */
function compareValues(a: Exclude<Value, null>, b: Exclude<Value, null>): number {
	if (typeof a === "number" && typeof b === "number") {
		return a < b ? -1 : a > b ? 1 : 0;
	}
	if (typeof a === "boolean" && typeof b === "boolean") {
		return Number(a) - Number(b);
	}
	const sa = String(a);
	const sb = String(b);
	return sa < sb ? -1 : sa > sb ? 1 : 0;
}
