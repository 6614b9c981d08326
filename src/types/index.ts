/**
 * jwt-codec - Core Types
 *
 * This module defines the types, constants and error helpers shared by the
 * registry, the token codec, the key store and the CLI. It is the canonical
 * source of truth for:
 *
 * - supported algorithm identifiers and their families
 * - token header / payload / decoded-token shapes
 * - the key-material provider contract and its primitives
 * - standardized error codes and the `JWTError` class
 */

import type { KeyObject } from 'crypto';

// ============================================================================
// ALGORITHMS
// ============================================================================

/**
 * Supported signing algorithms.
 *
 * - `HS*`: HMAC with a shared secret
 * - `RS*`: RSASSA-PKCS1-v1_5
 * - `PS*`: RSASSA-PSS (salt length equal to the hash length)
 * - `ES*`: ECDSA over P-256 / P-384 / P-521
 */
export enum JWTAlgorithm {
  // HMAC
  HS256 = 'HS256',
  HS384 = 'HS384',
  HS512 = 'HS512',
  // RSA (PKCS#1 v1.5)
  RS256 = 'RS256',
  RS384 = 'RS384',
  RS512 = 'RS512',
  // RSA-PSS
  PS256 = 'PS256',
  PS384 = 'PS384',
  PS512 = 'PS512',
  // ECDSA
  ES256 = 'ES256',
  ES384 = 'ES384',
  ES512 = 'ES512',
}

/** Algorithms backed by a shared-secret MAC. */
export type MacAlgorithm = JWTAlgorithm.HS256 | JWTAlgorithm.HS384 | JWTAlgorithm.HS512;

/** Algorithms backed by a public/private key pair. */
export type SignatureAlgorithm = Exclude<JWTAlgorithm, MacAlgorithm>;

/**
 * Algorithm used by `encode` when the caller names none.
 */
export const DEFAULT_ALGORITHM = JWTAlgorithm.HS256;

/**
 * Fixed `typ` header value.
 */
export const TOKEN_TYPE = 'JWT' as const;

// ============================================================================
// TOKEN STRUCTURES
// ============================================================================

/**
 * Header written by `encode`. Key order is `typ` then `alg`.
 */
export interface JWTHeader {
  typ: typeof TOKEN_TYPE;
  alg: JWTAlgorithm;
}

/**
 * Header as read back from a token. Nothing about it is trusted until the
 * signature has been checked, so every field is loosely typed.
 */
export interface DecodedHeader {
  alg?: unknown;
  typ?: unknown;
  [key: string]: unknown;
}

/**
 * Claims carried by a token. Opaque to the codec beyond being a JSON object.
 */
export type JWTPayload = Record<string, unknown>;

/**
 * Result of `decodeComplete`.
 */
export interface DecodedToken {
  header: DecodedHeader;
  payload: JWTPayload;
  /** The raw signature segment, still base64url-encoded. */
  signature: string;
}

/**
 * Result of the non-throwing `verify`.
 */
export type VerificationResult =
  | { valid: true; header: DecodedHeader; payload: JWTPayload }
  | { valid: false; error: JWTError };

// ============================================================================
// KEY MATERIAL
// ============================================================================

/**
 * Keyed MAC primitive. `digest` is a single-shot update + finalize.
 */
export interface MacPrimitive {
  readonly algorithm: MacAlgorithm;
  digest(data: Buffer): Buffer;
}

/**
 * Keyed signature primitive. `verify` checks against the public key.
 */
export interface SignaturePrimitive {
  readonly algorithm: SignatureAlgorithm;
  sign(data: Buffer): Buffer;
  verify(data: Buffer, signature: Buffer): boolean;
}

/**
 * Source of ready-to-use primitives. Throwing from either method means the
 * algorithm is unsupported with the configured keys.
 */
export interface KeyMaterialProvider {
  getMacPrimitive(algorithm: MacAlgorithm): MacPrimitive;
  getSignaturePrimitive(algorithm: SignatureAlgorithm): SignaturePrimitive;
}

/**
 * Key input accepted by the key store: PEM text, PEM bytes or a `KeyObject`.
 */
export type KeyInput = string | Buffer | KeyObject;

// ============================================================================
// ERROR TYPES
// ============================================================================

/**
 * Error codes. Each maps to a key (`JWT_ERROR_KEYS`) and an HTTP status
 * (`JWT_ERROR_STATUS`) a caller can hand straight to its transport.
 */
export type JWTErrorCode =
  | 'JWT-400-01' // malformed_token
  | 'JWT-400-02' // algorithm_not_supported
  | 'JWT-401-01' // signature_invalid
  | 'JWT-500-01' // key_unavailable
  | 'JWT-500-02'; // primitive_failure

export const JWT_ERRORS = {
  MALFORMED_TOKEN: 'JWT-400-01' as const,
  ALGORITHM_NOT_SUPPORTED: 'JWT-400-02' as const,
  SIGNATURE_INVALID: 'JWT-401-01' as const,
  KEY_UNAVAILABLE: 'JWT-500-01' as const,
  PRIMITIVE_FAILURE: 'JWT-500-02' as const,
} as const;

export const JWT_ERROR_MESSAGES = {
  TOKEN_MUST_HAVE_3_PARTS: 'Token must have 3 parts',
  INVALID_BASE64URL: 'Invalid base64url segment',
  INVALID_SEGMENT_LENGTH: 'Invalid base64url segment length',
  NON_CANONICAL_BASE64URL: 'Non-canonical base64url segment',
  INVALID_JSON: 'Segment is not valid JSON',
  NOT_AN_OBJECT: 'Segment must encode a JSON object',
  PAYLOAD_NOT_SERIALIZABLE: 'Payload cannot be serialized to JSON',
  PAYLOAD_NOT_AN_OBJECT: 'Payload must serialize to a JSON object',
  ALGORITHM_MISSING: 'Token header has no alg',
  SIGNATURE_VERIFICATION_FAILED: 'Signature verification failed',
  SECRET_NOT_CONFIGURED: 'No secret configured',
  KEY_NOT_CONFIGURED: 'No key pair configured',
  PRIVATE_KEY_NOT_CONFIGURED: 'Private key not configured',
  KEY_PAIR_MISMATCH: 'Public key does not belong to the private key',
} as const;

export const JWT_ERROR_MESSAGE_HELPERS = {
  algorithmNotSupported: (alg: string): string => `Algorithm not supported: ${alg}`,
  keyTypeMismatch: (alg: string, keyType: string): string =>
    `Key of type ${keyType} cannot be used for ${alg}`,
  primitiveFailed: (alg: string, reason: string): string => `${alg} primitive failed: ${reason}`,
  primitiveBusy: (alg: string): string => `${alg} primitive is already in use`,
} as const;

export const JWT_ERROR_KEYS: Record<JWTErrorCode, string> = {
  'JWT-400-01': 'malformed_token',
  'JWT-400-02': 'algorithm_not_supported',
  'JWT-401-01': 'signature_invalid',
  'JWT-500-01': 'key_unavailable',
  'JWT-500-02': 'primitive_failure',
};

export const JWT_ERROR_STATUS: Record<JWTErrorCode, number> = {
  'JWT-400-01': 400,
  'JWT-400-02': 400,
  'JWT-401-01': 401,
  'JWT-500-01': 500,
  'JWT-500-02': 500,
};

/**
 * Structured error thrown by every part of the codec.
 *
 * Carries a stable code plus the derived key and HTTP status, so callers can
 * tell the failure classes apart without matching on messages.
 */
export class JWTError extends Error {
  public readonly errorCode: JWTErrorCode;
  public readonly errorKey: string;
  public readonly httpStatus: number;
  public readonly timestamp: number;

  constructor(code: JWTErrorCode, message?: string, options?: { cause?: unknown }) {
    super(message || JWT_ERROR_KEYS[code], options);
    this.name = 'JWTError';
    this.errorCode = code;
    this.errorKey = JWT_ERROR_KEYS[code];
    this.httpStatus = JWT_ERROR_STATUS[code];
    this.timestamp = Math.floor(Date.now() / 1000);
  }

  toJSON() {
    return {
      error: this.errorKey,
      error_code: this.errorCode,
      message: this.message,
      timestamp: this.timestamp,
    };
  }
}

/**
 * Narrow an unknown value to a JWTError with the given code.
 */
export function isJWTError(error: unknown, code?: JWTErrorCode): error is JWTError {
  return error instanceof JWTError && (code === undefined || error.errorCode === code);
}
