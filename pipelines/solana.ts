/**
 * Solana: the raw 32-byte key in Base58
 */

import { base58Encode } from '../core/utils';
import type { PipelineParams } from '../types';
import { requireEd25519Key } from './keys';

export function deriveSolanaAddress(key: Uint8Array, _params: PipelineParams): string {
  return base58Encode(requireEd25519Key(key));
}
