/**
 * jwt-codec - Crypto Utilities Tests
 */

import { describe, it, expect, beforeAll } from 'vitest';
import * as crypto from 'crypto';
import {
  base64urlEscape,
  base64urlUnescape,
  base64urlEncode,
  base64urlDecode,
  encodeJSON,
  encodeJSONObject,
  decodeJSON,
  hmac,
  sign,
  verify,
  timingSafeEqual,
} from '../../src/crypto';
import { JWTAlgorithm, JWTError, JWT_ERRORS } from '../../src/types';

function expectJWTError(fn: () => unknown, code: string, message?: string): void {
  let caught: unknown;
  try {
    fn();
  } catch (err) {
    caught = err;
  }
  expect(caught).toBeInstanceOf(JWTError);
  if (caught instanceof JWTError) {
    expect(caught.errorCode).toBe(code);
    if (message !== undefined) {
      expect(caught.message).toBe(message);
    }
  }
}

describe('Base64URL Utilities', () => {
  describe('base64urlEscape', () => {
    it('should substitute URL-unsafe characters and strip padding', () => {
      expect(base64urlEscape('+/8=')).toBe('-_8');
      expect(base64urlEscape('++++')).toBe('----');
      expect(base64urlEscape('YQ==')).toBe('YQ');
    });
  });

  describe('base64urlUnescape', () => {
    it('should restore padding for each valid length class', () => {
      expect(base64urlUnescape('')).toBe('');
      expect(base64urlUnescape('YQ')).toBe('YQ==');
      expect(base64urlUnescape('YWI')).toBe('YWI=');
      expect(base64urlUnescape('YWJj')).toBe('YWJj');
    });

    it('should substitute characters back', () => {
      expect(base64urlUnescape('-_8')).toBe('+/8=');
    });

    it('should reject a length of 1 mod 4', () => {
      expectJWTError(() => base64urlUnescape('a'), JWT_ERRORS.MALFORMED_TOKEN, 'Invalid base64url segment length');
      expectJWTError(() => base64urlUnescape('abcde'), JWT_ERRORS.MALFORMED_TOKEN, 'Invalid base64url segment length');
    });

    it('should reject characters outside the base64url alphabet', () => {
      expectJWTError(() => base64urlUnescape('ab+c'), JWT_ERRORS.MALFORMED_TOKEN, 'Invalid base64url segment');
      expectJWTError(() => base64urlUnescape('ab/c'), JWT_ERRORS.MALFORMED_TOKEN, 'Invalid base64url segment');
      expectJWTError(() => base64urlUnescape('YQ=='), JWT_ERRORS.MALFORMED_TOKEN, 'Invalid base64url segment');
      expectJWTError(() => base64urlUnescape('ab c'), JWT_ERRORS.MALFORMED_TOKEN, 'Invalid base64url segment');
    });
  });

  describe('base64urlEncode', () => {
    it('should encode string to base64url', () => {
      expect(base64urlEncode('Hello, World!')).toBe('SGVsbG8sIFdvcmxkIQ');
    });

    it('should encode buffer to base64url', () => {
      expect(base64urlEncode(Buffer.from('Test Data'))).toBe('VGVzdCBEYXRh');
    });

    it('should use the URL-safe alphabet', () => {
      expect(base64urlEncode(Buffer.from([0xfb, 0xff]))).toBe('-_8');
      expect(base64urlEncode(Buffer.from([0xfb, 0xef, 0xbe]))).toBe('----');
    });

    it('should handle empty input', () => {
      expect(base64urlEncode('')).toBe('');
    });
  });

  describe('base64urlDecode', () => {
    it('should decode each padding class', () => {
      expect(base64urlDecode('YQ').toString('utf8')).toBe('a');
      expect(base64urlDecode('YWI').toString('utf8')).toBe('ab');
      expect(base64urlDecode('YWJj').toString('utf8')).toBe('abc');
    });

    it('should reject non-canonical trailing bits', () => {
      expectJWTError(() => base64urlDecode('YR'), JWT_ERRORS.MALFORMED_TOKEN, 'Non-canonical base64url segment');
      expectJWTError(() => base64urlDecode('YWJ'), JWT_ERRORS.MALFORMED_TOKEN, 'Non-canonical base64url segment');
    });

    it('should decode URL-safe characters', () => {
      expect(base64urlDecode('-_8')).toEqual(Buffer.from([0xfb, 0xff]));
    });
  });

  describe('round trip', () => {
    const lengths = [0, 1, 2, 3, 4, 5, 16, 255];
    const expectedEncodedLengths = [0, 2, 3, 4, 6, 7, 22, 340];

    lengths.forEach((length, i) => {
      const bytes = Buffer.from(Array.from({ length }, (_, j) => (j * 37 + 11) % 256));

      it(`should round trip ${length} bytes`, () => {
        const encoded = base64urlEncode(bytes);
        expect(encoded).toHaveLength(expectedEncodedLengths[i]);
        expect(encoded.length % 4).not.toBe(1);
        expect(base64urlDecode(encoded)).toEqual(bytes);
      });

      it(`should unescape(escape(base64)) back to standard base64 for ${length} bytes`, () => {
        const standard = bytes.toString('base64');
        const restored = base64urlUnescape(base64urlEscape(standard));
        expect(restored).toBe(standard);
        expect(Buffer.from(restored, 'base64')).toEqual(bytes);
      });
    });
  });

  describe('encodeJSON / decodeJSON', () => {
    it('should encode and decode JSON objects', () => {
      const obj = { foo: 'bar', num: 42, arr: [1, 2, 3] };
      expect(decodeJSON(encodeJSON(obj))).toEqual(obj);
    });

    it('should encode compactly in insertion order', () => {
      expect(encodeJSON({ typ: 'JWT', alg: 'HS256' })).toBe('eyJ0eXAiOiJKV1QiLCJhbGciOiJIUzI1NiJ9');
    });

    it('should handle special characters in JSON', () => {
      const obj = { message: 'Hello "World"\nNew Line', emoji: '🔐' };
      expect(decodeJSON(encodeJSON(obj))).toEqual(obj);
    });

    it('should reject values JSON cannot serialize', () => {
      expectJWTError(() => encodeJSON({ n: BigInt(1) }), JWT_ERRORS.MALFORMED_TOKEN, 'Payload cannot be serialized to JSON');
      expectJWTError(() => encodeJSON(undefined), JWT_ERRORS.MALFORMED_TOKEN, 'Payload cannot be serialized to JSON');
    });

    it('should require the serialized value to be an object', () => {
      expect(encodeJSONObject({ typ: 'JWT', alg: 'HS256' })).toBe('eyJ0eXAiOiJKV1QiLCJhbGciOiJIUzI1NiJ9');
      expectJWTError(() => encodeJSONObject([1, 2]), JWT_ERRORS.MALFORMED_TOKEN, 'Payload must serialize to a JSON object');
      expectJWTError(() => encodeJSONObject({ toJSON: () => 42 }), JWT_ERRORS.MALFORMED_TOKEN, 'Payload must serialize to a JSON object');
    });

    it('should reject text that is not JSON', () => {
      expectJWTError(() => decodeJSON(base64urlEncode('not json')), JWT_ERRORS.MALFORMED_TOKEN, 'Segment is not valid JSON');
    });

    it('should reject JSON that is not an object', () => {
      expectJWTError(() => decodeJSON(base64urlEncode('[1,2]')), JWT_ERRORS.MALFORMED_TOKEN, 'Segment must encode a JSON object');
      expectJWTError(() => decodeJSON(base64urlEncode('"text"')), JWT_ERRORS.MALFORMED_TOKEN, 'Segment must encode a JSON object');
      expectJWTError(() => decodeJSON(base64urlEncode('null')), JWT_ERRORS.MALFORMED_TOKEN, 'Segment must encode a JSON object');
    });

    it('should reject invalid base64url', () => {
      expectJWTError(() => decodeJSON('@@@@'), JWT_ERRORS.MALFORMED_TOKEN);
    });
  });
});

describe('MAC', () => {
  it('should compute HMAC-SHA256 with a secret key', () => {
    const secret = crypto.createSecretKey(Buffer.from('test-secret'));
    const mac = hmac(Buffer.from('abc'), secret, JWTAlgorithm.HS256);
    expect(mac.toString('hex')).toBe('e4c4dadd6571f81a7b019d216db1ef3877b0c88faabc56a66f8897ee32857593');
  });

  it('should produce digests of the hash length', () => {
    const secret = crypto.createSecretKey(Buffer.from('test-secret'));
    expect(hmac(Buffer.from('abc'), secret, JWTAlgorithm.HS384)).toHaveLength(48);
    expect(hmac(Buffer.from('abc'), secret, JWTAlgorithm.HS512)).toHaveLength(64);
  });

  describe('timingSafeEqual', () => {
    it('should compare equal buffers', () => {
      expect(timingSafeEqual(Buffer.from('abc'), Buffer.from('abc'))).toBe(true);
    });

    it('should reject different contents', () => {
      expect(timingSafeEqual(Buffer.from('abc'), Buffer.from('abd'))).toBe(false);
    });

    it('should reject different lengths without throwing', () => {
      expect(timingSafeEqual(Buffer.from('abc'), Buffer.from('abcd'))).toBe(false);
      expect(timingSafeEqual(Buffer.alloc(0), Buffer.from('a'))).toBe(false);
    });
  });
});

describe('Signing and Verification', () => {
  let rsa: crypto.KeyPairKeyObjectResult;
  let otherRsa: crypto.KeyPairKeyObjectResult;
  let ec256: crypto.KeyPairKeyObjectResult;
  let ec521: crypto.KeyPairKeyObjectResult;
  const data = Buffer.from('test data to sign');

  beforeAll(() => {
    rsa = crypto.generateKeyPairSync('rsa', { modulusLength: 2048 });
    otherRsa = crypto.generateKeyPairSync('rsa', { modulusLength: 2048 });
    ec256 = crypto.generateKeyPairSync('ec', { namedCurve: 'prime256v1' });
    ec521 = crypto.generateKeyPairSync('ec', { namedCurve: 'secp521r1' });
  });

  it('should sign and verify with RS256', () => {
    const signature = sign(data, rsa.privateKey, JWTAlgorithm.RS256);
    expect(signature).toHaveLength(256);
    expect(verify(data, signature, rsa.publicKey, JWTAlgorithm.RS256)).toBe(true);
  });

  it('should produce deterministic RS256 signatures', () => {
    expect(sign(data, rsa.privateKey, JWTAlgorithm.RS256)).toEqual(sign(data, rsa.privateKey, JWTAlgorithm.RS256));
  });

  it('should sign and verify with PS256', () => {
    const signature = sign(data, rsa.privateKey, JWTAlgorithm.PS256);
    expect(verify(data, signature, rsa.publicKey, JWTAlgorithm.PS256)).toBe(true);
  });

  it('should produce r||s signatures for ES256 and ES512', () => {
    const es256 = sign(data, ec256.privateKey, JWTAlgorithm.ES256);
    const es512 = sign(data, ec521.privateKey, JWTAlgorithm.ES512);
    expect(es256).toHaveLength(64);
    expect(es512).toHaveLength(132);
    expect(verify(data, es256, ec256.publicKey, JWTAlgorithm.ES256)).toBe(true);
    expect(verify(data, es512, ec521.publicKey, JWTAlgorithm.ES512)).toBe(true);
  });

  it('should reject a signature from another key', () => {
    const signature = sign(data, otherRsa.privateKey, JWTAlgorithm.RS256);
    expect(verify(data, signature, rsa.publicKey, JWTAlgorithm.RS256)).toBe(false);
  });

  it('should reject tampered data', () => {
    const signature = sign(data, rsa.privateKey, JWTAlgorithm.RS256);
    expect(verify(Buffer.from('tampered data'), signature, rsa.publicKey, JWTAlgorithm.RS256)).toBe(false);
  });

  it('should return false for signatures of the wrong shape', () => {
    expect(verify(data, Buffer.from('short'), ec256.publicKey, JWTAlgorithm.ES256)).toBe(false);
    expect(verify(data, Buffer.alloc(0), rsa.publicKey, JWTAlgorithm.RS256)).toBe(false);
  });
});
