import { RowframeError } from './base';

/**
 * Error thrown when a value has the wrong shape or type for where it is used:
 * a boolean used as a row selector, a string column used as a row index,
 * a non-boolean filter expression.
 */
export class TypeMismatchError extends RowframeError {
  readonly expression: string;

  constructor(message: string, expression: string, hint?: string) {
    super(message, hint);
    this.name = 'TypeMismatchError';
    this.expression = expression;
  }

  protected override _getSummary(): string {
    return 'type mismatch';
  }

  protected override _getExpression(): string {
    return this.expression;
  }
}
