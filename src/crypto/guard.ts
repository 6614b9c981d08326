/**
 * jwt-codec - Primitive Guard
 * Exclusive handle around a single keyed primitive
 */

import { JWTError, JWT_ERRORS, JWT_ERROR_MESSAGE_HELPERS } from '../types';

/**
 * Owns a primitive and lets one operation at a time touch it.
 *
 * The hold lasts for the whole single-shot update + finalize call and is
 * released in `finally`, also when the primitive throws. A second `use`
 * while the first is still running (a primitive that calls back into its
 * own capability) fails with `primitive_failure`.
 */
export class PrimitiveGuard<T> {
  private held = false;

  constructor(
    private readonly primitive: T,
    private readonly label: string
  ) {}

  get isHeld(): boolean {
    return this.held;
  }

  use<R>(operation: (primitive: T) => R): R {
    if (this.held) {
      throw new JWTError(JWT_ERRORS.PRIMITIVE_FAILURE, JWT_ERROR_MESSAGE_HELPERS.primitiveBusy(this.label));
    }

    this.held = true;
    try {
      return operation(this.primitive);
    } finally {
      this.held = false;
    }
  }
}
