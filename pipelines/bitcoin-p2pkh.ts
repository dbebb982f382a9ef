/**
 * Bitcoin-family P2PKH: Base58Check(version, hash160(X ‖ Y))
 */

import { DEFAULT_VERSION_BYTE } from '../constants';
import { base58CheckEncode } from '../core/base58check';
import { hash160 } from '../core/crypto';
import type { PipelineParams } from '../types';
import { encodeOrThrow, toRawSecp256k1Key } from './keys';
import { numberParam } from './params';

export function deriveP2pkhAddress(key: Uint8Array, params: PipelineParams): string {
  const payload = hash160(toRawSecp256k1Key(key));
  const version = numberParam(params, 'version_byte', DEFAULT_VERSION_BYTE);
  return encodeOrThrow('Base58Check', () => base58CheckEncode(version, payload));
}
