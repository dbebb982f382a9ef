/**
 * Chain Matcher
 *
 * Pairs the classifier's possibilities with registry chains. Address matches
 * must pass both the coarse signature filter and full structural validation;
 * public-key matches only need the chain's curve.
 */

import { signatureFromCharacteristics, signatureFromFormat, signatureMatches } from '../input/signature';
import { validateRawAddress } from '../registry/metadata';
import type { ChainRegistry } from '../registry/ChainRegistry';
import type {
  AddressMatch,
  ChainMatch,
  ChainMetadata,
  InputCharacteristics,
  InputPossibility,
  PublicKeyMatch,
  PublicKeyPossibility,
} from '../types';
import type { CategorySignature } from '../input/signature';

/**
 * First address format of the chain that accepts the input
 */
export function matchAddress(
  chain: ChainMetadata,
  input: string,
  chars: InputCharacteristics,
  observed: CategorySignature = signatureFromCharacteristics(chars),
): AddressMatch | null {
  for (const format of chain.addressFormats) {
    if (signatureMatches(signatureFromFormat(format), observed) && validateRawAddress(format, input, chars)) {
      return { kind: 'address', chain, format };
    }
  }
  return null;
}

/**
 * One match per derivation pipeline bound to the chain, when its curve fits
 */
export function matchPublicKey(
  chain: ChainMetadata,
  possibilities: readonly InputPossibility[],
  registry: ChainRegistry,
  observed: CategorySignature,
): PublicKeyMatch[] {
  const config = registry.getChainConfig(chain.id);
  if (!config || config.requires_stake_key) return [];

  const possibility = possibilities.find(
    (p): p is PublicKeyPossibility => p.kind === 'publicKey' && p.keyType === chain.curve,
  );
  if (!possibility) return [];

  const declaredFormat = chain.publicKeyFormats.find((f) => signatureMatches(signatureFromFormat(f), observed));
  const bindings = [
    { pipeline: config.address_pipeline, params: config.address_params },
    ...config.additional_pipelines,
  ];

  return bindings.map((binding): PublicKeyMatch => ({
    kind: 'publicKey',
    chain,
    possibility,
    pipeline: binding.pipeline,
    params: binding.params,
    declaredFormat,
  }));
}

export function matchChains(
  input: string,
  chars: InputCharacteristics,
  possibilities: readonly InputPossibility[],
  registry: ChainRegistry,
): ChainMatch[] {
  const observed = signatureFromCharacteristics(chars);
  const couldBeAddress = possibilities.some((p) => p.kind === 'address');
  const matches: ChainMatch[] = [];

  for (const chain of registry.chains) {
    if (couldBeAddress) {
      const match = matchAddress(chain, input, chars, observed);
      if (match) matches.push(match);
    }
    matches.push(...matchPublicKey(chain, possibilities, registry, observed));
  }

  return matches;
}
