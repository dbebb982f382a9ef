/**
 * Tests for identification/matcher.ts
 */

import { describe, it, expect } from 'vitest';
import { matchAddress, matchChains, matchPublicKey } from '../../../identification/matcher';
import { classifyInput } from '../../../input/classifier';
import { extractCharacteristics } from '../../../input/characteristics';
import { signatureFromCharacteristics } from '../../../input/signature';
import { ChainRegistry } from '../../../registry/ChainRegistry';
import type { ChainMetadata } from '../../../types';

import { createTestLoader } from '../../fixtures/definitions';
import {
  BASE58CHECK_VECTORS,
  ED25519_KEY,
  SECP256K1_DERIVED,
  SECP256K1_KEY,
} from '../../fixtures/test-vectors';

const registry = ChainRegistry.create({
  loader: createTestLoader(['testeth', 'testbtc', 'testdot', 'testada']),
  logger: () => {},
});

function chain(id: string): ChainMetadata {
  const found = registry.getChain(id);
  if (!found) throw new Error(`missing test chain ${id}`);
  return found;
}

function analyze(input: string) {
  const chars = extractCharacteristics(input);
  return { chars, possibilities: classifyInput(input, chars), observed: signatureFromCharacteristics(chars) };
}

describe('matchAddress()', () => {
  it('should return the first accepting format', () => {
    const input = SECP256K1_DERIVED.bitcoinBech32;
    const match = matchAddress(chain('testbtc'), input, extractCharacteristics(input));
    expect(match?.format.encoding).toBe('bech32');
    expect(match?.chain.id).toBe('testbtc');
  });

  it('should return null when no format accepts', () => {
    const input = BASE58CHECK_VECTORS[2].address;
    expect(matchAddress(chain('testbtc'), input, extractCharacteristics(input))).toBeNull();
  });
});

describe('matchPublicKey()', () => {
  it('should bind every pipeline of a chain whose curve fits', () => {
    const { possibilities, observed } = analyze(SECP256K1_KEY.compressed);
    const matches = matchPublicKey(chain('testbtc'), possibilities, registry, observed);
    expect(matches.map((m) => [m.pipeline, m.params])).toEqual([
      ['bitcoin_p2pkh', { version_byte: 0, p2sh_version_byte: 5 }],
      ['bitcoin_bech32', { hrp: 'bc' }],
    ]);
  });

  it('should attach the declared key format the input satisfies', () => {
    const { possibilities, observed } = analyze('0x' + SECP256K1_KEY.compressed);
    const [match] = matchPublicKey(chain('testeth'), possibilities, registry, observed);
    expect(match.declaredFormat?.exactLength).toBe(68);
  });

  it('should match without a declared format', () => {
    const { possibilities, observed } = analyze(SECP256K1_KEY.compressed);
    const [match] = matchPublicKey(chain('testeth'), possibilities, registry, observed);
    expect(match.declaredFormat).toBeUndefined();
  });

  it('should skip chains on another curve', () => {
    const { possibilities, observed } = analyze(SECP256K1_KEY.compressed);
    expect(matchPublicKey(chain('testdot'), possibilities, registry, observed)).toEqual([]);
  });

  it('should skip chains that need a stake key', () => {
    const { possibilities, observed } = analyze(ED25519_KEY);
    expect(matchPublicKey(chain('testada'), possibilities, registry, observed)).toEqual([]);
    expect(matchPublicKey(chain('testdot'), possibilities, registry, observed)).toHaveLength(1);
  });
});

describe('matchChains()', () => {
  it('should walk chains in registry order', () => {
    const input = SECP256K1_KEY.compressed;
    const { chars, possibilities } = analyze(input);
    const matches = matchChains(input, chars, possibilities, registry);
    expect(matches.map((m) => `${m.kind}:${m.chain.id}`)).toEqual([
      'publicKey:testeth',
      'publicKey:testbtc',
      'publicKey:testbtc',
    ]);
  });

  it('should only try address formats when the input could be an address', () => {
    const input = BASE58CHECK_VECTORS[0].address;
    const { chars, possibilities } = analyze(input);
    const matches = matchChains(input, chars, possibilities, registry);
    expect(matches.map((m) => `${m.kind}:${m.chain.id}`)).toEqual(['address:testbtc']);
  });
});
