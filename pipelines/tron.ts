/**
 * Tron: Base58Check(0x41, last 20 bytes of keccak256(X ‖ Y))
 */

import { TRON_VERSION_BYTE } from '../constants';
import { base58CheckEncode } from '../core/base58check';
import { keccak256 } from '../core/crypto';
import type { PipelineParams } from '../types';
import { toRawSecp256k1Key } from './keys';

export function deriveTronAddress(key: Uint8Array, _params: PipelineParams): string {
  const payload = keccak256(toRawSecp256k1Key(key)).slice(-20);
  return base58CheckEncode(TRON_VERSION_BYTE, payload);
}
