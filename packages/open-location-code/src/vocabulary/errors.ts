/**
 * Plus Code Errors
 *
 * Every failure in this package is an input-validation failure, so each
 * error carries its kind and the input that caused it.
 */

import type { PlusCodeErrorKind } from './keywords'

export class PlusCodeError extends Error {
  readonly kind: PlusCodeErrorKind
  readonly input: unknown

  constructor(kind: PlusCodeErrorKind, message: string, input: unknown) {
    super(message)
    this.name = 'PlusCodeError'
    this.kind = kind
    this.input = input
  }
}

/**
 * Result of a fallible operation.
 * Same shape as a zod safeParse result.
 */
export type PlusCodeResult<T> =
  | { success: true; data: T }
  | { success: false; error: PlusCodeError }

export function ok<T>(data: T): PlusCodeResult<T> {
  return { success: true, data }
}

export function fail<T>(error: PlusCodeError): PlusCodeResult<T> {
  return { success: false, error }
}

/**
 * Unwrap a result, throwing its error on failure
 */
export function unwrap<T>(result: PlusCodeResult<T>): T {
  if (!result.success) {
    throw result.error
  }
  return result.data
}
