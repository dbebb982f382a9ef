/**
 * Derivation Pipeline Dispatcher
 * Maps pipeline ids from chain definitions to address derivation functions
 */

import { IdentifyError } from '../types';
import type { PipelineParams } from '../types';
import { deriveBitcoinBech32Address } from './bitcoin-bech32';
import { deriveP2pkhAddress } from './bitcoin-p2pkh';
import { deriveCardanoAddress } from './cardano';
import { deriveCosmosAddress } from './cosmos';
import { deriveEvmAddress } from './evm';
import { deriveSolanaAddress } from './solana';
import { deriveSs58Address } from './ss58';
import { deriveTronAddress } from './tron';
import type { AddressPipeline } from './types';

export const PIPELINES: Readonly<Record<string, AddressPipeline>> = {
  evm: deriveEvmAddress,
  bitcoin_p2pkh: deriveP2pkhAddress,
  bitcoin_bech32: deriveBitcoinBech32Address,
  cosmos: deriveCosmosAddress,
  solana: deriveSolanaAddress,
  ss58: deriveSs58Address,
  cardano: deriveCardanoAddress,
  tron: deriveTronAddress,
};

export function isKnownPipeline(id: string): boolean {
  return Object.prototype.hasOwnProperty.call(PIPELINES, id);
}

/**
 * Derive an address from public key bytes
 * @throws IdentifyError UNKNOWN_PIPELINE, INVALID_KEY_LENGTH, DECOMPRESSION_FAILED or ENCODING_ERROR
 */
export function executePipeline(pipelineId: string, key: Uint8Array, params: PipelineParams = {}): string {
  const pipeline = isKnownPipeline(pipelineId) ? PIPELINES[pipelineId] : undefined;
  if (!pipeline) {
    throw new IdentifyError(`Unknown pipeline: ${pipelineId}`, 'UNKNOWN_PIPELINE');
  }
  return pipeline(key, params);
}

export { numberParam, stringParam, stringListParam } from './params';
export { toRawSecp256k1Key, requireEd25519Key } from './keys';
export type { AddressPipeline } from './types';
export {
  deriveBitcoinBech32Address,
  deriveP2pkhAddress,
  deriveCardanoAddress,
  deriveCosmosAddress,
  deriveEvmAddress,
  deriveSolanaAddress,
  deriveSs58Address,
  deriveTronAddress,
};
