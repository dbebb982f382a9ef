/**
 * Cardano (enterprise-style): header byte ‖ first 28 bytes of sha3_256(key), Bech32
 */

import { DEFAULT_CARDANO_HEADER, DEFAULT_HRPS } from '../constants';
import { encodeBech32Bytes } from '../core/bech32';
import { sha3_256 } from '../core/crypto';
import type { PipelineParams } from '../types';
import { encodeOrThrow, requireEd25519Key } from './keys';
import { numberParam, stringParam } from './params';

export function deriveCardanoAddress(key: Uint8Array, params: PipelineParams): string {
  const payload = sha3_256(requireEd25519Key(key)).slice(0, 28);
  const header = numberParam(params, 'header', DEFAULT_CARDANO_HEADER);
  const hrp = stringParam(params, 'hrp', DEFAULT_HRPS.cardano);

  const bytes = new Uint8Array(1 + payload.length);
  bytes[0] = header & 0xff;
  bytes.set(payload, 1);
  return encodeOrThrow('Bech32', () => encodeBech32Bytes(hrp, bytes));
}
