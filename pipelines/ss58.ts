/**
 * SS58: 32-byte keys are the account id; secp256k1 keys are hashed to one
 * with blake2b256(X ‖ Y).
 */

import { DEFAULT_SS58_PREFIX, PUBLIC_KEY_LENGTHS } from '../constants';
import { blake2b256 } from '../core/crypto';
import { ss58Encode } from '../core/ss58';
import type { PipelineParams } from '../types';
import { encodeOrThrow, toRawSecp256k1Key } from './keys';
import { numberParam } from './params';

export function deriveSs58Address(key: Uint8Array, params: PipelineParams): string {
  const accountId = key.length === PUBLIC_KEY_LENGTHS.ED25519
    ? key
    : blake2b256(toRawSecp256k1Key(key));
  const prefix = numberParam(params, 'prefix', DEFAULT_SS58_PREFIX);
  return encodeOrThrow('SS58', () => ss58Encode(prefix, accountId));
}
