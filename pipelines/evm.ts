/**
 * EVM: last 20 bytes of keccak256(X ‖ Y), "0x"-prefixed lowercase hex
 */

import { keccak256 } from '../core/crypto';
import { bytesToHex } from '../core/utils';
import type { PipelineParams } from '../types';
import { toRawSecp256k1Key } from './keys';

export function deriveEvmAddress(key: Uint8Array, _params: PipelineParams): string {
  const hash = keccak256(toRawSecp256k1Key(key));
  return '0x' + bytesToHex(hash.slice(-20));
}
