import type { PipelineParams } from '../types';

/**
 * Pure derivation from public key bytes to a chain-specific address
 */
export type AddressPipeline = (key: Uint8Array, params: PipelineParams) => string;
