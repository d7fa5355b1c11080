import { RowframeError } from './base';

/**
 * Error thrown when a value has an acceptable type but is out of range or
 * inconsistent with the frame it is applied to.
 */
export class ValueConstraintError extends RowframeError {
  readonly expression: string;
  /** Position of the offending element within a list selector, when known */
  readonly position?: number;

  constructor(message: string, expression: string, options: { hint?: string; position?: number } = {}) {
    super(message, options.hint);
    this.name = 'ValueConstraintError';
    this.expression = expression;
    this.position = options.position;
  }

  protected override _getSummary(): string {
    return 'invalid value';
  }

  protected override _getExpression(): string {
    return this.expression;
  }
}
