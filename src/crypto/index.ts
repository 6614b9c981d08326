/**
 * jwt-codec - Crypto Utilities
 * Base64URL transform, JSON segments and native Node.js primitives
 */

import * as crypto from 'crypto';
import { JWTError, JWT_ERRORS, JWT_ERROR_MESSAGES } from '../types';
import type { MacAlgorithm, SignatureAlgorithm } from '../types';
import { ALGORITHM_CONFIG, KeyType } from './AlgorithmConfig';

// ============================================================================
// BASE64URL UTILITIES
// ============================================================================

const BASE64URL_PATTERN = /^[A-Za-z0-9_-]*$/;

/**
 * Turn standard base64 into base64url: `+` to `-`, `/` to `_`, no padding.
 */
export function base64urlEscape(base64: string): string {
  return base64.replace(/\+/g, '-').replace(/\//g, '_').replace(/=/g, '');
}

/**
 * Turn base64url back into padded standard base64.
 *
 * A length of 1 mod 4 cannot come out of any encoder and is rejected.
 */
export function base64urlUnescape(str: string): string {
  if (!BASE64URL_PATTERN.test(str)) {
    throw new JWTError(JWT_ERRORS.MALFORMED_TOKEN, JWT_ERROR_MESSAGES.INVALID_BASE64URL);
  }

  const remainder = str.length % 4;
  if (remainder === 1) {
    throw new JWTError(JWT_ERRORS.MALFORMED_TOKEN, JWT_ERROR_MESSAGES.INVALID_SEGMENT_LENGTH);
  }

  const padding = remainder === 0 ? '' : '='.repeat(4 - remainder);
  return str.replace(/-/g, '+').replace(/_/g, '/') + padding;
}

/**
 * Encode buffer to base64url
 */
export function base64urlEncode(data: Buffer | string): string {
  const buffer = typeof data === 'string' ? Buffer.from(data, 'utf8') : data;
  return base64urlEscape(buffer.toString('base64'));
}

/**
 * Decode base64url to buffer.
 *
 * Only the canonical encoding is accepted: unused bits in the last
 * character must be zero, so each byte string has exactly one segment.
 */
export function base64urlDecode(str: string): Buffer {
  const decoded = Buffer.from(base64urlUnescape(str), 'base64');
  if (base64urlEncode(decoded) !== str) {
    throw new JWTError(JWT_ERRORS.MALFORMED_TOKEN, JWT_ERROR_MESSAGES.NON_CANONICAL_BASE64URL);
  }
  return decoded;
}

function stringifyJSON(obj: unknown): string {
  let json: string | undefined;
  try {
    json = JSON.stringify(obj);
  } catch (error) {
    throw new JWTError(JWT_ERRORS.MALFORMED_TOKEN, JWT_ERROR_MESSAGES.PAYLOAD_NOT_SERIALIZABLE, { cause: error });
  }
  if (json === undefined) {
    throw new JWTError(JWT_ERRORS.MALFORMED_TOKEN, JWT_ERROR_MESSAGES.PAYLOAD_NOT_SERIALIZABLE);
  }
  return json;
}

/**
 * Encode object to base64url JSON
 */
export function encodeJSON(obj: unknown): string {
  return base64urlEncode(stringifyJSON(obj));
}

/**
 * Like `encodeJSON`, but the serialized value must be a JSON object.
 * Checked on the JSON text, since `toJSON()` may turn an object into anything.
 */
export function encodeJSONObject(obj: unknown): string {
  const json = stringifyJSON(obj);
  if (!json.startsWith('{')) {
    throw new JWTError(JWT_ERRORS.MALFORMED_TOKEN, JWT_ERROR_MESSAGES.PAYLOAD_NOT_AN_OBJECT);
  }
  return base64urlEncode(json);
}

/**
 * Decode a base64url JSON segment that must hold an object
 */
export function decodeJSON(str: string): Record<string, unknown> {
  const text = base64urlDecode(str).toString('utf8');

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new JWTError(JWT_ERRORS.MALFORMED_TOKEN, JWT_ERROR_MESSAGES.INVALID_JSON, { cause: error });
  }

  if (!isJsonObject(parsed)) {
    throw new JWTError(JWT_ERRORS.MALFORMED_TOKEN, JWT_ERROR_MESSAGES.NOT_AN_OBJECT);
  }
  return parsed;
}

export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ============================================================================
// MAC
// ============================================================================

/**
 * Compute an HMAC over `data`
 */
export function hmac(data: Buffer, secret: crypto.KeyObject, algorithm: MacAlgorithm): Buffer {
  const config = ALGORITHM_CONFIG[algorithm];
  return crypto.createHmac(config.hash, secret).update(data).digest();
}

/**
 * Constant-time byte comparison. Differing lengths compare unequal.
 */
export function timingSafeEqual(a: Buffer, b: Buffer): boolean {
  if (a.length !== b.length) {
    return false;
  }
  return crypto.timingSafeEqual(a, b);
}

// ============================================================================
// SIGNING
// ============================================================================

/**
 * Sign data with private key
 */
export function sign(data: Buffer, privateKey: crypto.KeyObject, algorithm: SignatureAlgorithm): Buffer {
  const config = ALGORITHM_CONFIG[algorithm];

  if (config.type === KeyType.EC) {
    // JWS wants r||s, not DER
    return crypto.sign(config.hash, data, { key: privateKey, dsaEncoding: 'ieee-p1363' });
  }
  return crypto.sign(config.hash, data, {
    key: privateKey,
    padding: config.padding,
    saltLength: config.saltLength,
  });
}

/**
 * Verify signature with public key
 */
export function verify(
  data: Buffer,
  signature: Buffer,
  publicKey: crypto.KeyObject,
  algorithm: SignatureAlgorithm
): boolean {
  const config = ALGORITHM_CONFIG[algorithm];

  try {
    if (config.type === KeyType.EC) {
      return crypto.verify(config.hash, data, { key: publicKey, dsaEncoding: 'ieee-p1363' }, signature);
    }
    return crypto.verify(
      config.hash,
      data,
      {
        key: publicKey,
        padding: config.padding,
        saltLength: config.saltLength,
      },
      signature
    );
  } catch {
    // signature bytes the key cannot even parse
    return false;
  }
}
