/**
 * Bitcoin-family Bech32: hash160(X ‖ Y) regrouped into 5-bit groups under the HRP.
 * The payload carries no witness version.
 */

import { DEFAULT_HRPS } from '../constants';
import { encodeBech32Bytes } from '../core/bech32';
import { hash160 } from '../core/crypto';
import type { PipelineParams } from '../types';
import { encodeOrThrow, toRawSecp256k1Key } from './keys';
import { stringParam } from './params';

export function deriveBitcoinBech32Address(key: Uint8Array, params: PipelineParams): string {
  const payload = hash160(toRawSecp256k1Key(key));
  const hrp = stringParam(params, 'hrp', DEFAULT_HRPS.bitcoin_bech32);
  return encodeOrThrow('Bech32', () => encodeBech32Bytes(hrp, payload));
}
