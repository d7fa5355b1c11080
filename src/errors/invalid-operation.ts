import { RowframeError } from './base';

/**
 * Error thrown when an operation cannot be performed in the current state.
 * These signal misuse of the internal API rather than a bad user request.
 */
export class InvalidOperationError extends RowframeError {
  readonly operation: string;
  readonly reason: string;

  constructor(operation: string, reason: string, hint?: string) {
    super(`'${operation}' ${reason}`, hint);
    this.name = 'InvalidOperationError';
    this.operation = operation;
    this.reason = reason;
  }

  protected override _getSummary(): string {
    return 'invalid operation';
  }

  protected override _getExpression(): string {
    return `${this.operation}(...)`;
  }
}
