/**
 * jwt-codec - Primitive Guard Tests
 */

import { describe, it, expect } from 'vitest';
import { PrimitiveGuard } from '../../src/crypto/guard';
import { JWTError, JWT_ERRORS } from '../../src/types';

describe('PrimitiveGuard', () => {
  it('should hand the primitive to the operation and return its result', () => {
    const guard = new PrimitiveGuard({ value: 21 }, 'HS256');
    expect(guard.use((p) => p.value * 2)).toBe(42);
  });

  it('should be held only while the operation runs', () => {
    const guard = new PrimitiveGuard({}, 'HS256');
    let heldInside = false;

    guard.use(() => {
      heldInside = guard.isHeld;
    });

    expect(heldInside).toBe(true);
    expect(guard.isHeld).toBe(false);
  });

  it('should release the hold when the operation throws', () => {
    const guard = new PrimitiveGuard({}, 'HS256');

    expect(() =>
      guard.use(() => {
        throw new Error('boom');
      })
    ).toThrow('boom');
    expect(guard.isHeld).toBe(false);
    expect(guard.use(() => 'again')).toBe('again');
  });

  it('should refuse re-entrant use', () => {
    const guard = new PrimitiveGuard({}, 'RS256');
    let inner: unknown;

    guard.use(() => {
      try {
        guard.use(() => 'nested');
      } catch (err) {
        inner = err;
      }
    });

    expect(inner).toBeInstanceOf(JWTError);
    if (inner instanceof JWTError) {
      expect(inner.errorCode).toBe(JWT_ERRORS.PRIMITIVE_FAILURE);
      expect(inner.message).toBe('RS256 primitive is already in use');
    }
    expect(guard.isHeld).toBe(false);
  });
});
