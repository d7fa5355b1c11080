import { ValueConstraintError } from './value-constraint';

/**
 * Error thrown when a row position falls outside the frame it addresses.
 */
export class IndexOutOfBoundsError extends ValueConstraintError {
  readonly index: number;
  readonly rowCount: number;

  constructor(message: string, index: number, rowCount: number) {
    const hint = rowCount > 0
      ? `valid range is 0 to ${rowCount - 1}`
      : 'frame is empty';

    super(message, `row[${index}]`, { hint });
    this.name = 'IndexOutOfBoundsError';
    this.index = index;
    this.rowCount = rowCount;
  }

  protected override _getSummary(): string {
    return 'index out of bounds';
  }
}
