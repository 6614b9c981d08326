/**
 * jwt-codec - Token Codec
 * Encode (sign) and decode (verify) compact header.payload.signature tokens
 */

import { base64urlDecode, base64urlEncode, decodeJSON, encodeJSON, encodeJSONObject } from '../crypto';
import {
  DEFAULT_ALGORITHM,
  JWTError,
  JWT_ERRORS,
  JWT_ERROR_MESSAGES,
  JWT_ERROR_MESSAGE_HELPERS,
  TOKEN_TYPE,
} from '../types';
import type {
  DecodedHeader,
  DecodedToken,
  JWTAlgorithm,
  JWTHeader,
  JWTPayload,
  KeyMaterialProvider,
  VerificationResult,
} from '../types';
import { AlgorithmRegistry } from './registry';
import type { SigningCapability } from './registry';

/**
 * Token codec.
 *
 * Build it from a key-material provider, or from an existing registry when
 * several codecs should share one set of primitives.
 *
 * @example
 * ```typescript
 * const jwt = new JWT(KeyStore.fromSecret('test-secret'));
 *
 * const token = jwt.encode({ sub: 'user-1', admin: true });
 * const claims = jwt.decode(token);            // verified
 * const peek = jwt.decode(token, true);        // not verified, inspection only
 * ```
 */
export class JWT {
  readonly registry: AlgorithmRegistry;

  constructor(source: AlgorithmRegistry | KeyMaterialProvider) {
    this.registry = source instanceof AlgorithmRegistry ? source : new AlgorithmRegistry(source);
  }

  // ==========================================================================
  // ENCODING
  // ==========================================================================

  /**
   * Sign a payload and return the compact token.
   *
   * @throws JWTError `algorithm_not_supported` when the algorithm is not registered,
   * `malformed_token` when the payload does not serialize to a JSON object
   */
  encode(payload: JWTPayload, algorithm: JWTAlgorithm | string = DEFAULT_ALGORITHM): string {
    const capability = this.requireCapability(algorithm);

    const header: JWTHeader = {
      typ: TOKEN_TYPE,
      alg: capability.algorithm,
    };

    const headerSegment = encodeJSON(header);
    const payloadSegment = encodeJSONObject(payload);
    const signingInput = `${headerSegment}.${payloadSegment}`;

    const signature = capability.sign(Buffer.from(signingInput, 'utf8'));

    return `${signingInput}.${base64urlEncode(signature)}`;
  }

  // ==========================================================================
  // DECODING
  // ==========================================================================

  /**
   * Return the payload of a token, verifying its signature unless
   * `noVerify` is set. Skipping verification is for inspection only: the
   * result must not drive trust decisions.
   */
  decode(token: string, noVerify: boolean = false): JWTPayload {
    return this.decodeComplete(token, noVerify).payload;
  }

  /**
   * Like `decode`, but also returns the header and the raw signature segment.
   */
  decodeComplete(token: string, noVerify: boolean = false): DecodedToken {
    const segments = token.split('.');
    if (segments.length !== 3) {
      throw new JWTError(JWT_ERRORS.MALFORMED_TOKEN, JWT_ERROR_MESSAGES.TOKEN_MUST_HAVE_3_PARTS);
    }
    const [headerSegment, payloadSegment, signatureSegment] = segments;

    const header: DecodedHeader = decodeJSON(headerSegment);

    if (!noVerify) {
      this.verifySegments(header, headerSegment, payloadSegment, signatureSegment);
    }

    // after the signature check, so payload tampering surfaces as signature_invalid
    const payload: JWTPayload = decodeJSON(payloadSegment);

    return {
      header,
      payload,
      signature: signatureSegment,
    };
  }

  /**
   * Verify a token without throwing for token problems.
   */
  verify(token: string): VerificationResult {
    try {
      const { header, payload } = this.decodeComplete(token);
      return { valid: true, header, payload };
    } catch (error) {
      if (error instanceof JWTError) {
        return { valid: false, error };
      }
      throw error;
    }
  }

  // ==========================================================================
  // INTERNALS
  // ==========================================================================

  private verifySegments(
    header: DecodedHeader,
    headerSegment: string,
    payloadSegment: string,
    signatureSegment: string
  ): void {
    if (typeof header.alg !== 'string') {
      throw new JWTError(JWT_ERRORS.ALGORITHM_NOT_SUPPORTED, JWT_ERROR_MESSAGES.ALGORITHM_MISSING);
    }
    const capability = this.requireCapability(header.alg);

    // the received segments, never a re-serialization of the parsed JSON
    const signingInput = Buffer.from(`${headerSegment}.${payloadSegment}`, 'utf8');
    const signature = base64urlDecode(signatureSegment);

    if (!capability.verify(signature, signingInput)) {
      throw new JWTError(JWT_ERRORS.SIGNATURE_INVALID, JWT_ERROR_MESSAGES.SIGNATURE_VERIFICATION_FAILED);
    }
  }

  private requireCapability(algorithm: string): SigningCapability {
    const capability = this.registry.lookup(algorithm);
    if (!capability) {
      throw new JWTError(JWT_ERRORS.ALGORITHM_NOT_SUPPORTED, JWT_ERROR_MESSAGE_HELPERS.algorithmNotSupported(algorithm));
    }
    return capability;
  }
}
