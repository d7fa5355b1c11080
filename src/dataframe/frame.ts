/**
 * Frame: named columns plus an optional RowIndex.
 *
 * A frame without a RowIndex owns its rows directly. A frame with one is a
 * *view*: its visible rows are `rowIndex.get(0..nrows)` positions into the
 * shared column storage. Views never copy column data.
 */

import type { Column, Value } from "../buffer/column.ts";
import { ColumnNotFoundError, IndexOutOfBoundsError, ValueConstraintError } from "../errors/index.ts";
import type { RowIndex } from "../rowindex/row-index.ts";
import type { DTypeKind } from "../types/dtypes.ts";

export class Frame {
	private readonly columns: readonly Column[];
	private readonly columnNames: readonly string[];
	private readonly columnMap: ReadonlyMap<string, number>;
	/** Row count of the underlying storage */
	readonly storageRowCount: number;
	/** Positions into storage, or null when every storage row is visible */
	readonly rowIndex: RowIndex | null;

	private constructor(names: readonly string[], columns: readonly Column[], storageRowCount: number, rowIndex: RowIndex | null) {
		this.columnNames = names;
		this.columns = columns;
		this.columnMap = new Map(names.map((name, i) => [name, i]));
		this.storageRowCount = storageRowCount;
		this.rowIndex = rowIndex;
	}

	/**
	 * Create a frame from named columns of equal length.
	 */
	static fromColumns(columns: Readonly<Record<string, Column>>): Frame {
		const names = Object.keys(columns);
		const cols = names.map((name) => columns[name]);
		const nrows = cols.length > 0 ? cols[0].length : 0;
		cols.forEach((c, i) => {
			if (c.length !== nrows) {
				throw new ValueConstraintError(
					`Column '${names[i]}' has ${c.length} rows, expected ${nrows}`,
					`Frame.fromColumns({ ${names[i]} })`,
				);
			}
		});
		return new Frame(names, cols, nrows, null);
	}

	/** Number of visible rows */
	get nrows(): number {
		return this.rowIndex === null ? this.storageRowCount : this.rowIndex.length;
	}

	get ncols(): number {
		return this.columns.length;
	}

	get names(): readonly string[] {
		return this.columnNames;
	}

	get isView(): boolean {
		return this.rowIndex !== null;
	}

	/** Column kinds in column order */
	get dtypes(): DTypeKind[] {
		return this.columns.map((c) => c.kind);
	}

	columnIndex(name: string): number {
		const idx = this.columnMap.get(name);
		if (idx === undefined) {
			throw new ColumnNotFoundError(name, [...this.columnNames]);
		}
		return idx;
	}

	/** Storage column by name (all storage rows, not only visible ones) */
	column(name: string): Column {
		return this.columns[this.columnIndex(name)];
	}

	columnAt(index: number): Column {
		const c = this.columns[index];
		if (c === undefined) {
			throw new IndexOutOfBoundsError(`Column ${index} does not exist`, index, this.columns.length);
		}
		return c;
	}

	/** Storage position of visible row `i` */
	storagePosition(i: number): number {
		return this.rowIndex === null ? i : this.rowIndex.get(i);
	}

	/**
	 * A frame sharing this frame's storage with a different RowIndex.
	 * `rowIndex` addresses storage positions; null makes every row visible.
	 */
	withRowIndex(rowIndex: RowIndex | null): Frame {
		if (rowIndex !== null && rowIndex.max >= this.storageRowCount) {
			throw new IndexOutOfBoundsError(
				`RowIndex references row ${rowIndex.max} of a storage with ${this.storageRowCount} rows`,
				rowIndex.max,
				this.storageRowCount,
			);
		}
		return new Frame(this.columnNames, this.columns, this.storageRowCount, rowIndex);
	}

	/** Visible values of one column */
	getValues(name: string): Value[] {
		const column = this.column(name);
		const out: Value[] = new Array(this.nrows);
		for (let i = 0; i < out.length; i++) out[i] = column.get(this.storagePosition(i));
		return out;
	}

	/** Copy the visible rows into a frame that owns its storage. */
	materialize(): Frame {
		if (this.rowIndex === null) return this;
		const positions = this.rowIndex.toArray();
		return new Frame(
			this.columnNames,
			this.columns.map((c) => c.take(positions)),
			positions.length,
			null,
		);
	}

	toRecords(): Record<string, Value>[] {
		const records: Record<string, Value>[] = [];
		for (let i = 0; i < this.nrows; i++) {
			const pos = this.storagePosition(i);
			const record: Record<string, Value> = {};
			this.columnNames.forEach((name, c) => {
				record[name] = this.columns[c].get(pos);
			});
			records.push(record);
		}
		return records;
	}

	toString(): string {
		return `Frame(${this.nrows} x ${this.ncols}${this.isView ? ", view" : ""})`;
	}
}
