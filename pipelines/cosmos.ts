/**
 * Cosmos: first 20 bytes of sha256(32-byte key), Bech32 under the chain HRP
 */

import { DEFAULT_HRPS } from '../constants';
import { encodeBech32Bytes } from '../core/bech32';
import { sha256 } from '../core/crypto';
import type { PipelineParams } from '../types';
import { encodeOrThrow, requireEd25519Key } from './keys';
import { stringParam } from './params';

export function deriveCosmosAddress(key: Uint8Array, params: PipelineParams): string {
  const payload = sha256(requireEd25519Key(key)).slice(0, 20);
  const hrp = stringParam(params, 'hrp', DEFAULT_HRPS.cosmos);
  return encodeOrThrow('Bech32', () => encodeBech32Bytes(hrp, payload));
}
