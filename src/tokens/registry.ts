/**
 * jwt-codec - Algorithm Registry
 * Immutable mapping from algorithm identifier to signing capability
 */

import { timingSafeEqual } from '../crypto';
import { PrimitiveGuard } from '../crypto/guard';
import { SUPPORTED_ALGORITHMS, isJWTAlgorithm, isMacAlgorithm } from '../crypto/AlgorithmConfig';
import { JWTError, JWT_ERRORS, JWT_ERROR_MESSAGE_HELPERS } from '../types';
import type {
  JWTAlgorithm,
  KeyMaterialProvider,
  MacAlgorithm,
  MacPrimitive,
  SignatureAlgorithm,
  SignaturePrimitive,
} from '../types';

// ============================================================================
// SIGNING CAPABILITIES
// ============================================================================

interface CapabilityOperations {
  /** Produce the raw signature over the signing input */
  sign(input: Buffer): Buffer;
  /** Check a raw signature against the signing input */
  verify(signature: Buffer, input: Buffer): boolean;
}

export interface MacCapability extends CapabilityOperations {
  readonly kind: 'mac';
  readonly algorithm: MacAlgorithm;
}

export interface SignatureCapability extends CapabilityOperations {
  readonly kind: 'signature';
  readonly algorithm: SignatureAlgorithm;
}

/**
 * What the registry hands out for an algorithm. Closed over the two
 * primitive families; switch on `kind` to tell them apart.
 */
export type SigningCapability = MacCapability | SignatureCapability;

/**
 * Run one primitive call under its guard. Anything the primitive throws
 * that is not already a JWTError becomes `primitive_failure`.
 */
function runGuarded<T, R>(guard: PrimitiveGuard<T>, algorithm: JWTAlgorithm, operation: (primitive: T) => R): R {
  try {
    return guard.use(operation);
  } catch (error) {
    if (error instanceof JWTError) {
      throw error;
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new JWTError(JWT_ERRORS.PRIMITIVE_FAILURE, JWT_ERROR_MESSAGE_HELPERS.primitiveFailed(algorithm, reason), {
      cause: error,
    });
  }
}

/**
 * MAC capability: both directions recompute the MAC; verify compares in
 * constant time.
 */
export function createMacCapability(primitive: MacPrimitive): MacCapability {
  const { algorithm } = primitive;
  const guard = new PrimitiveGuard(primitive, algorithm);

  return Object.freeze({
    kind: 'mac' as const,
    algorithm,
    sign: (input: Buffer) => runGuarded(guard, algorithm, (mac) => mac.digest(input)),
    verify: (signature: Buffer, input: Buffer) =>
      runGuarded(guard, algorithm, (mac) => timingSafeEqual(signature, mac.digest(input))),
  });
}

/**
 * Signature capability: signs with the private key, verifies with the
 * public key.
 */
export function createSignatureCapability(primitive: SignaturePrimitive): SignatureCapability {
  const { algorithm } = primitive;
  const guard = new PrimitiveGuard(primitive, algorithm);

  return Object.freeze({
    kind: 'signature' as const,
    algorithm,
    sign: (input: Buffer) => runGuarded(guard, algorithm, (signer) => signer.sign(input)),
    verify: (signature: Buffer, input: Buffer) =>
      runGuarded(guard, algorithm, (signer) => signer.verify(input, signature)),
  });
}

// ============================================================================
// REGISTRY
// ============================================================================

/**
 * Algorithm registry built once per security context.
 *
 * Construction probes the provider for every requested algorithm. An
 * algorithm the provider cannot serve is left out and its error kept for
 * `unavailable()`; it only turns into `algorithm_not_supported` when a
 * token actually asks for it. Nothing can be added or removed afterwards,
 * so lookups are safe from any number of codecs.
 *
 * @example
 * ```typescript
 * const registry = new AlgorithmRegistry(KeyStore.fromSecret('test-secret'));
 * registry.has(JWTAlgorithm.HS256); // true
 * registry.has(JWTAlgorithm.RS256); // false: no key pair configured
 * ```
 */
export class AlgorithmRegistry {
  private readonly capabilities: ReadonlyMap<JWTAlgorithm, SigningCapability>;
  private readonly failures: ReadonlyMap<JWTAlgorithm, Error>;

  constructor(provider: KeyMaterialProvider, algorithms: readonly JWTAlgorithm[] = SUPPORTED_ALGORITHMS) {
    const capabilities = new Map<JWTAlgorithm, SigningCapability>();
    const failures = new Map<JWTAlgorithm, Error>();

    for (const algorithm of algorithms) {
      if (capabilities.has(algorithm) || failures.has(algorithm)) {
        continue;
      }
      try {
        capabilities.set(algorithm, probe(provider, algorithm));
      } catch (error) {
        failures.set(algorithm, error instanceof Error ? error : new Error(String(error)));
      }
    }

    this.capabilities = capabilities;
    this.failures = failures;
  }

  /**
   * Capability for an algorithm, or undefined when it is not registered.
   * Matching is exact and case-sensitive.
   */
  lookup(algorithm: string): SigningCapability | undefined {
    if (!isJWTAlgorithm(algorithm)) {
      return undefined;
    }
    return this.capabilities.get(algorithm);
  }

  has(algorithm: string): boolean {
    return this.lookup(algorithm) !== undefined;
  }

  /**
   * Registered algorithms, in probe order
   */
  algorithms(): JWTAlgorithm[] {
    return [...this.capabilities.keys()];
  }

  /**
   * Why each omitted algorithm could not be registered
   */
  unavailable(): ReadonlyMap<JWTAlgorithm, Error> {
    return this.failures;
  }
}

function probe(provider: KeyMaterialProvider, algorithm: JWTAlgorithm): SigningCapability {
  if (isMacAlgorithm(algorithm)) {
    return createMacCapability(provider.getMacPrimitive(algorithm));
  }
  return createSignatureCapability(provider.getSignaturePrimitive(algorithm));
}
