/**
 * @fileoverview Token Registry and Codec
 * @module tokens
 * @description Algorithm registry and the compact `header.payload.signature` codec.
 *
 * @example
 * ```typescript
 * import { AlgorithmRegistry, JWT } from 'jwt-codec';
 *
 * // One registry per security context, shared by as many codecs as needed
 * const registry = new AlgorithmRegistry(keyStore);
 * const jwt = new JWT(registry);
 *
 * const token = jwt.encode({ sub: 'user-1' }, 'HS512');
 * const payload = jwt.decode(token);
 * ```
 */

/**
 * @namespace Registry
 * @description Signing capabilities and the immutable algorithm registry
 */
export * from './registry';

/**
 * @namespace Codec
 * @description Token encoding, decoding and verification
 */
export * from './jwt';
