/**
 * @fileoverview jwt-codec
 * @module jwt-codec
 * @description Compact token signing and verification for the three-segment
 * `header.payload.signature` format used by stateless authentication assertions.
 *
 * The package consists of four parts:
 * - **Crypto Utilities**: Base64URL transform, JSON segments and native Node.js primitives
 * - **Key Store**: key-material provider built from a shared secret and/or a key pair
 * - **Registry**: immutable mapping from algorithm identifier to signing capability
 * - **Codec**: `encode` / `decode` / `verify` over the registry
 *
 * @example
 * ```typescript
 * import { JWT, KeyStore } from 'jwt-codec';
 *
 * const jwt = new JWT(new KeyStore({ secret: 'test-secret' }));
 * const token = jwt.encode({ sub: 'alice', admin: true });
 * const claims = jwt.decode(token);
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// TYPES & CONSTANTS
// ============================================================================

export * from './types';

export {
  KeyType,
  HashAlgorithm,
  ECCurve,
  ALGORITHM_CONFIG,
  MAC_ALGORITHMS,
  SIGNATURE_ALGORITHMS,
  SUPPORTED_ALGORITHMS,
  isJWTAlgorithm,
  isMacAlgorithm,
} from './crypto/AlgorithmConfig';

export type { AlgorithmConfig } from './crypto/AlgorithmConfig';

// ============================================================================
// CRYPTO UTILITIES
// ============================================================================

export {
  // Base64URL encoding/decoding
  base64urlEscape,
  base64urlUnescape,
  base64urlEncode,
  base64urlDecode,
  encodeJSON,
  encodeJSONObject,
  decodeJSON,

  // Primitives
  hmac,
  sign,
  verify,
  timingSafeEqual,
} from './crypto';

export { PrimitiveGuard } from './crypto/guard';

// ============================================================================
// KEY STORE
// ============================================================================

export { KeyStore } from './crypto/key-store';
export type { KeyStoreOptions } from './crypto/key-store';

// ============================================================================
// REGISTRY & CODEC
// ============================================================================

export {
  AlgorithmRegistry,
  createMacCapability,
  createSignatureCapability,
  JWT,
} from './tokens';

export type {
  SigningCapability,
  MacCapability,
  SignatureCapability,
} from './tokens';

// ============================================================================
// VERSION
// ============================================================================

/**
 * @constant VERSION
 * @description Current version of jwt-codec
 */
export const VERSION = '1.0.0';
