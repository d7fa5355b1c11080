/**
 * Error module - exports all rowframe error types.
 */

export { RowframeError } from './base';
export { ColumnNotFoundError } from './column-not-found';
export { IndexOutOfBoundsError } from './index-out-of-bounds';
export { InvalidOperationError } from './invalid-operation';
export { TypeMismatchError } from './type-mismatch';
export { ValueConstraintError } from './value-constraint';
