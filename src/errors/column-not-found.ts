import { RowframeError } from './base';

/**
 * Error thrown when an expression references a non-existent column.
 */
export class ColumnNotFoundError extends RowframeError {
  readonly column: string;
  readonly available: string[];

  constructor(column: string, available: string[]) {
    const hint = available.length > 0
      ? `available columns are: ${available.map(c => `'${c}'`).join(', ')}`
      : 'Frame has no columns';

    super(`column '${column}' does not exist in Frame`, hint);
    this.name = 'ColumnNotFoundError';
    this.column = column;
    this.available = available;
  }

  protected override _getSummary(): string {
    return 'column not found';
  }

  protected override _getExpression(): string {
    return `f.${this.column}`;
  }
}
