/**
 * Definition Loaders
 *
 * The registry reads chain and curve definitions through a loader so that
 * callers can supply their own. Loaders return raw JSON values; parsing and
 * validation happen in the registry.
 */

import metadataIndex from '../metadata/index.json';
import secp256k1Curve from '../metadata/curves/secp256k1.json';
import ed25519Curve from '../metadata/curves/ed25519.json';
import sr25519Curve from '../metadata/curves/sr25519.json';
import ethereumChain from '../metadata/chains/ethereum.json';
import polygonChain from '../metadata/chains/polygon.json';
import bscChain from '../metadata/chains/bsc.json';
import avalancheChain from '../metadata/chains/avalanche.json';
import arbitrumChain from '../metadata/chains/arbitrum.json';
import optimismChain from '../metadata/chains/optimism.json';
import baseChain from '../metadata/chains/base.json';
import fantomChain from '../metadata/chains/fantom.json';
import celoChain from '../metadata/chains/celo.json';
import gnosisChain from '../metadata/chains/gnosis.json';
import bitcoinChain from '../metadata/chains/bitcoin.json';
import litecoinChain from '../metadata/chains/litecoin.json';
import dogecoinChain from '../metadata/chains/dogecoin.json';
import solanaChain from '../metadata/chains/solana.json';
import tronChain from '../metadata/chains/tron.json';
import cosmosHubChain from '../metadata/chains/cosmos_hub.json';
import osmosisChain from '../metadata/chains/osmosis.json';
import junoChain from '../metadata/chains/juno.json';
import akashChain from '../metadata/chains/akash.json';
import stargazeChain from '../metadata/chains/stargaze.json';
import secretNetworkChain from '../metadata/chains/secret_network.json';
import terraChain from '../metadata/chains/terra.json';
import kavaChain from '../metadata/chains/kava.json';
import regenChain from '../metadata/chains/regen.json';
import sentinelChain from '../metadata/chains/sentinel.json';
import polkadotChain from '../metadata/chains/polkadot.json';
import kusamaChain from '../metadata/chains/kusama.json';
import substrateChain from '../metadata/chains/substrate.json';
import cardanoChain from '../metadata/chains/cardano.json';

// =============================================================================
// Types
// =============================================================================

export interface DefinitionLoader {
  /** Raw metadata index (`curves`, `pipelines.addresses`, `chains`) */
  loadIndex(): unknown;
  /** @throws when the chain is not available */
  loadChain(id: string): unknown;
  /** @throws when the curve is not available */
  loadCurve(id: string): unknown;
}

// =============================================================================
// Bundled Definitions
// =============================================================================

const BUNDLED_CURVES: Readonly<Record<string, unknown>> = {
  secp256k1: secp256k1Curve,
  ed25519: ed25519Curve,
  sr25519: sr25519Curve,
};

const BUNDLED_CHAINS: Readonly<Record<string, unknown>> = {
  ethereum: ethereumChain,
  polygon: polygonChain,
  bsc: bscChain,
  avalanche: avalancheChain,
  arbitrum: arbitrumChain,
  optimism: optimismChain,
  base: baseChain,
  fantom: fantomChain,
  celo: celoChain,
  gnosis: gnosisChain,
  bitcoin: bitcoinChain,
  litecoin: litecoinChain,
  dogecoin: dogecoinChain,
  solana: solanaChain,
  tron: tronChain,
  cosmos_hub: cosmosHubChain,
  osmosis: osmosisChain,
  juno: junoChain,
  akash: akashChain,
  stargaze: stargazeChain,
  secret_network: secretNetworkChain,
  terra: terraChain,
  kava: kavaChain,
  regen: regenChain,
  sentinel: sentinelChain,
  polkadot: polkadotChain,
  kusama: kusamaChain,
  substrate: substrateChain,
  cardano: cardanoChain,
};

function lookup(table: Readonly<Record<string, unknown>>, kind: string, id: string): unknown {
  if (!Object.prototype.hasOwnProperty.call(table, id)) {
    throw new Error(`No ${kind} definition for "${id}"`);
  }
  return table[id];
}

/**
 * Serves the definitions shipped with the package
 */
export class BundledDefinitionLoader implements DefinitionLoader {
  loadIndex(): unknown {
    return metadataIndex;
  }

  loadChain(id: string): unknown {
    return lookup(BUNDLED_CHAINS, 'chain', id);
  }

  loadCurve(id: string): unknown {
    return lookup(BUNDLED_CURVES, 'curve', id);
  }
}

/**
 * Serves definitions held in memory, for custom chain sets and tests
 */
export class InMemoryDefinitionLoader implements DefinitionLoader {
  constructor(
    private readonly index: unknown,
    private readonly chains: Readonly<Record<string, unknown>>,
    private readonly curves: Readonly<Record<string, unknown>> = BUNDLED_CURVES,
  ) {}

  loadIndex(): unknown {
    return this.index;
  }

  loadChain(id: string): unknown {
    return lookup(this.chains, 'chain', id);
  }

  loadCurve(id: string): unknown {
    return lookup(this.curves, 'curve', id);
  }
}
