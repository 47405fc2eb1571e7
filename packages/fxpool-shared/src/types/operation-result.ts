import type { FxPoolError } from '../errors/index.js';

/**
 * Outcome of a state-mutating compound operation
 *
 * Failures carry the typed error; a failed operation has left no effects.
 */
export type OperationResult<T> = OperationSuccess<T> | OperationFailure;

export interface OperationSuccess<T> {
  success: true;
  data: T;
}

export interface OperationFailure {
  success: false;
  error: FxPoolError;
}

export function operationSuccess<T>(data: T): OperationSuccess<T> {
  return { success: true, data };
}

export function operationFailure(error: FxPoolError): OperationFailure {
  return { success: false, error };
}
