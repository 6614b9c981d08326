/**
 * jwt-codec - Key Store
 * In-process key-material provider backed by Node.js KeyObjects
 */

import * as crypto from 'crypto';
import { JWTError, JWT_ERRORS, JWT_ERROR_MESSAGES, JWT_ERROR_MESSAGE_HELPERS } from '../types';
import type {
  KeyInput,
  KeyMaterialProvider,
  MacAlgorithm,
  MacPrimitive,
  SignatureAlgorithm,
  SignaturePrimitive,
} from '../types';
import { ALGORITHM_CONFIG, KeyType } from './AlgorithmConfig';
import { hmac, sign, verify } from './index';

export interface KeyStoreOptions {
  /** Shared secret for HS256 / HS384 / HS512 (UTF-8 string or raw bytes) */
  secret?: string | Buffer;
  /** Private key for signing (PEM or KeyObject) */
  privateKey?: KeyInput;
  /** Public key for verification; derived from the private key when omitted */
  publicKey?: KeyInput;
}

/**
 * Key material for one security context.
 *
 * Hands out primitives bound to the configured secret or key pair and
 * throws `key_unavailable` for algorithms the keys cannot serve, which the
 * registry reads as "unsupported".
 *
 * @example
 * ```typescript
 * const keys = new KeyStore({
 *   secret: process.env.JWT_SECRET,
 *   privateKey: fs.readFileSync('signing-key.pem', 'utf8'),
 * });
 * const jwt = new JWT(keys);
 * ```
 */
export class KeyStore implements KeyMaterialProvider {
  private readonly secret?: crypto.KeyObject;
  private readonly privateKey?: crypto.KeyObject;
  private readonly publicKey?: crypto.KeyObject;
  private readonly pairMatches: boolean;

  constructor(options: KeyStoreOptions = {}) {
    if (options.secret !== undefined && options.secret.length > 0) {
      const bytes = typeof options.secret === 'string' ? Buffer.from(options.secret, 'utf8') : options.secret;
      this.secret = crypto.createSecretKey(bytes);
    }

    if (options.privateKey !== undefined) {
      this.privateKey = toPrivateKey(options.privateKey);
    }

    if (options.publicKey !== undefined) {
      this.publicKey = toPublicKey(options.publicKey);
    } else if (this.privateKey) {
      this.publicKey = crypto.createPublicKey(this.privateKey);
    }

    this.pairMatches = !this.privateKey || !this.publicKey || isKeyPair(this.privateKey, this.publicKey);
  }

  /**
   * Key store holding only a shared secret
   */
  static fromSecret(secret: string | Buffer): KeyStore {
    return new KeyStore({ secret });
  }

  getMacPrimitive(algorithm: MacAlgorithm): MacPrimitive {
    const secret = this.secret;
    if (!secret) {
      throw new JWTError(JWT_ERRORS.KEY_UNAVAILABLE, JWT_ERROR_MESSAGES.SECRET_NOT_CONFIGURED);
    }

    return {
      algorithm,
      digest: (data: Buffer) => hmac(data, secret, algorithm),
    };
  }

  getSignaturePrimitive(algorithm: SignatureAlgorithm): SignaturePrimitive {
    const publicKey = this.publicKey;
    if (!publicKey) {
      throw new JWTError(JWT_ERRORS.KEY_UNAVAILABLE, JWT_ERROR_MESSAGES.KEY_NOT_CONFIGURED);
    }
    if (!this.pairMatches) {
      throw new JWTError(JWT_ERRORS.KEY_UNAVAILABLE, JWT_ERROR_MESSAGES.KEY_PAIR_MISMATCH);
    }
    assertKeyFits(publicKey, algorithm);

    const privateKey = this.privateKey;
    if (privateKey) {
      assertKeyFits(privateKey, algorithm);
    }

    return {
      algorithm,
      sign: (data: Buffer) => {
        if (!privateKey) {
          throw new JWTError(JWT_ERRORS.KEY_UNAVAILABLE, JWT_ERROR_MESSAGES.PRIVATE_KEY_NOT_CONFIGURED);
        }
        return sign(data, privateKey, algorithm);
      },
      verify: (data: Buffer, signature: Buffer) => verify(data, signature, publicKey, algorithm),
    };
  }
}

// ============================================================================
// KEY HELPERS
// ============================================================================

function toPrivateKey(input: KeyInput): crypto.KeyObject {
  if (input instanceof crypto.KeyObject) {
    if (input.type !== 'private') {
      throw new JWTError(JWT_ERRORS.KEY_UNAVAILABLE, `Expected a private key, got ${input.type}`);
    }
    return input;
  }
  return crypto.createPrivateKey(input);
}

function toPublicKey(input: KeyInput): crypto.KeyObject {
  if (input instanceof crypto.KeyObject) {
    if (input.type === 'secret') {
      throw new JWTError(JWT_ERRORS.KEY_UNAVAILABLE, 'Expected a public key, got secret');
    }
    return input.type === 'private' ? crypto.createPublicKey(input) : input;
  }
  return crypto.createPublicKey(input);
}

function isKeyPair(privateKey: crypto.KeyObject, publicKey: crypto.KeyObject): boolean {
  const derived = crypto.createPublicKey(privateKey).export({ type: 'spki', format: 'der' });
  return derived.equals(publicKey.export({ type: 'spki', format: 'der' }));
}

/**
 * Throw unless the key family (and curve, for EC) matches the algorithm.
 */
function assertKeyFits(key: crypto.KeyObject, algorithm: SignatureAlgorithm): void {
  const config = ALGORITHM_CONFIG[algorithm];
  const keyType = key.asymmetricKeyType ?? 'unknown';

  let fits: boolean;
  switch (config.type) {
    case KeyType.RSA:
      fits = keyType === 'rsa';
      break;
    case KeyType.RSA_PSS:
      fits = keyType === 'rsa' || keyType === 'rsa-pss';
      break;
    case KeyType.EC:
      fits = keyType === 'ec' && key.asymmetricKeyDetails?.namedCurve === config.curve;
      break;
    default:
      fits = false;
  }

  if (!fits) {
    const described = keyType === 'ec' ? `ec (${key.asymmetricKeyDetails?.namedCurve ?? 'unknown curve'})` : keyType;
    throw new JWTError(JWT_ERRORS.KEY_UNAVAILABLE, JWT_ERROR_MESSAGE_HELPERS.keyTypeMismatch(algorithm, described));
  }
}
