// ============================================================================
// CRYPTOGRAPHIC CONSTANTS
// ============================================================================

import { JWTAlgorithm } from '../types';
import type { MacAlgorithm, SignatureAlgorithm } from '../types';
import * as crypto from 'crypto';

/**
 * @enum KeyType
 * @description Key families an algorithm can be bound to.
 */
export enum KeyType {
  SECRET = 'secret',
  RSA = 'rsa',
  RSA_PSS = 'rsa-pss',
  EC = 'ec',
}

/**
 * @enum HashAlgorithm
 * @description Hash algorithms used by the signing primitives.
 */
export enum HashAlgorithm {
  SHA256 = 'sha256',
  SHA384 = 'sha384',
  SHA512 = 'sha512',
}

/**
 * @enum ECCurve
 * @description Named curves, as reported by `KeyObject.asymmetricKeyDetails`.
 */
export enum ECCurve {
  P256 = 'prime256v1',
  P384 = 'secp384r1',
  P521 = 'secp521r1',
}

/**
 * @constant SALT_LENGTHS
 * @description Salt lengths for RSA-PSS algorithms.
 */
export const SALT_LENGTHS: Readonly<Record<JWTAlgorithm.PS256 | JWTAlgorithm.PS384 | JWTAlgorithm.PS512, number>> = {
  [JWTAlgorithm.PS256]: 32,
  [JWTAlgorithm.PS384]: 48,
  [JWTAlgorithm.PS512]: 64,
} as const;

// ============================================================================
// ALGORITHM CONFIGURATION
// ============================================================================

/**
 * @interface AlgorithmConfig
 * @description Parameters for one algorithm.
 */
export interface AlgorithmConfig {
  type: KeyType;
  hash: HashAlgorithm;
  curve?: ECCurve;
  padding?: number;
  saltLength?: number;
}

/**
 * @constant ALGORITHM_CONFIG
 * @description Key family, hash, curve and padding for every supported algorithm.
 */
export const ALGORITHM_CONFIG: Readonly<Record<JWTAlgorithm, AlgorithmConfig>> = {
  [JWTAlgorithm.HS256]: { type: KeyType.SECRET, hash: HashAlgorithm.SHA256 },
  [JWTAlgorithm.HS384]: { type: KeyType.SECRET, hash: HashAlgorithm.SHA384 },
  [JWTAlgorithm.HS512]: { type: KeyType.SECRET, hash: HashAlgorithm.SHA512 },
  [JWTAlgorithm.RS256]: { type: KeyType.RSA, hash: HashAlgorithm.SHA256, padding: crypto.constants.RSA_PKCS1_PADDING },
  [JWTAlgorithm.RS384]: { type: KeyType.RSA, hash: HashAlgorithm.SHA384, padding: crypto.constants.RSA_PKCS1_PADDING },
  [JWTAlgorithm.RS512]: { type: KeyType.RSA, hash: HashAlgorithm.SHA512, padding: crypto.constants.RSA_PKCS1_PADDING },
  [JWTAlgorithm.PS256]: { type: KeyType.RSA_PSS, hash: HashAlgorithm.SHA256, padding: crypto.constants.RSA_PKCS1_PSS_PADDING, saltLength: SALT_LENGTHS[JWTAlgorithm.PS256] },
  [JWTAlgorithm.PS384]: { type: KeyType.RSA_PSS, hash: HashAlgorithm.SHA384, padding: crypto.constants.RSA_PKCS1_PSS_PADDING, saltLength: SALT_LENGTHS[JWTAlgorithm.PS384] },
  [JWTAlgorithm.PS512]: { type: KeyType.RSA_PSS, hash: HashAlgorithm.SHA512, padding: crypto.constants.RSA_PKCS1_PSS_PADDING, saltLength: SALT_LENGTHS[JWTAlgorithm.PS512] },
  [JWTAlgorithm.ES256]: { type: KeyType.EC, hash: HashAlgorithm.SHA256, curve: ECCurve.P256 },
  [JWTAlgorithm.ES384]: { type: KeyType.EC, hash: HashAlgorithm.SHA384, curve: ECCurve.P384 },
  [JWTAlgorithm.ES512]: { type: KeyType.EC, hash: HashAlgorithm.SHA512, curve: ECCurve.P521 },
} as const;

/**
 * @constant MAC_ALGORITHMS
 * @description Symmetric algorithms, in registry probe order.
 */
export const MAC_ALGORITHMS: readonly MacAlgorithm[] = [
  JWTAlgorithm.HS256,
  JWTAlgorithm.HS384,
  JWTAlgorithm.HS512,
];

/**
 * @constant SIGNATURE_ALGORITHMS
 * @description Asymmetric algorithms, in registry probe order.
 */
export const SIGNATURE_ALGORITHMS: readonly SignatureAlgorithm[] = [
  JWTAlgorithm.RS256,
  JWTAlgorithm.RS384,
  JWTAlgorithm.RS512,
  JWTAlgorithm.PS256,
  JWTAlgorithm.PS384,
  JWTAlgorithm.PS512,
  JWTAlgorithm.ES256,
  JWTAlgorithm.ES384,
  JWTAlgorithm.ES512,
];

/**
 * @constant SUPPORTED_ALGORITHMS
 * @description Every algorithm the registry knows how to probe.
 */
export const SUPPORTED_ALGORITHMS: readonly JWTAlgorithm[] = [...MAC_ALGORITHMS, ...SIGNATURE_ALGORITHMS];

const ALGORITHM_NAMES: ReadonlySet<string> = new Set<string>(Object.values(JWTAlgorithm));
const MAC_ALGORITHM_NAMES: ReadonlySet<string> = new Set<string>(MAC_ALGORITHMS);

/**
 * Check whether a string is a known algorithm identifier (case-sensitive).
 */
export function isJWTAlgorithm(value: unknown): value is JWTAlgorithm {
  return typeof value === 'string' && ALGORITHM_NAMES.has(value);
}

export function isMacAlgorithm(algorithm: JWTAlgorithm): algorithm is MacAlgorithm {
  return MAC_ALGORITHM_NAMES.has(algorithm);
}
