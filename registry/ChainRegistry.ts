/**
 * Chain Registry
 *
 * Holds the chain metadata every identification runs against. Built once,
 * on first access, from the configured definition loader and never mutated
 * afterwards.
 */

import { IdentifyError } from '../types';
import type { ChainConfig, ChainMetadata, CurveDefinition, Logger, LogLevel } from '../types';
import { convertChainConfig } from './chain-converter';
import { parseChainConfig, parseCurveDefinition, parseMetadataIndex } from './definitions';
import { BundledDefinitionLoader } from './loader';
import type { DefinitionLoader } from './loader';

// =============================================================================
// Types
// =============================================================================

export interface ChainRegistryConfig {
  /** Definition source (default: definitions bundled with the package) */
  loader?: DefinitionLoader;
  /** Log debug-level diagnostics to the console (default: false) */
  debug?: boolean;
  /** Receives all diagnostics instead of the console */
  logger?: Logger;
}

/**
 * A chain or curve left out of the registry, and why
 */
export interface SkippedDefinition {
  readonly kind: 'chain' | 'curve';
  readonly id: string;
  readonly reason: string;
}

// =============================================================================
// Registry Implementation
// =============================================================================

/**
 * Chain Registry
 *
 * Chains that fail to load or convert are skipped with a warning; the rest
 * of the registry stays usable. Only a missing or malformed index is fatal.
 *
 * @example
 * ```ts
 * ChainRegistry.configure({ loader: new FileDefinitionLoader('./metadata') });
 *
 * const registry = ChainRegistry.getInstance();
 * registry.getChainConfig('bitcoin')?.address_pipeline; // 'bitcoin_p2pkh'
 * ```
 */
export class ChainRegistry {
  private static instance: ChainRegistry | null = null;
  private static config: ChainRegistryConfig = {};

  readonly chains: readonly ChainMetadata[];
  readonly skipped: readonly SkippedDefinition[];

  private readonly configsById: ReadonlyMap<string, ChainConfig>;
  private readonly curvesById: ReadonlyMap<string, CurveDefinition>;
  private readonly debug: boolean;
  private readonly logger: Logger | null;

  private constructor(options: ChainRegistryConfig) {
    this.debug = options.debug ?? false;
    this.logger = options.logger ?? null;

    const loader = options.loader ?? new BundledDefinitionLoader();
    const skipped: SkippedDefinition[] = [];
    const index = parseMetadataIndex(loader.loadIndex());

    const curves = new Map<string, CurveDefinition>();
    for (const id of index.curves) {
      try {
        curves.set(id, parseCurveDefinition(loader.loadCurve(id)));
      } catch (error) {
        skipped.push(this.skip('curve', id, error));
      }
    }

    const chains: ChainMetadata[] = [];
    const configs = new Map<string, ChainConfig>();
    for (const id of index.chains) {
      try {
        const config = parseChainConfig(loader.loadChain(id));
        const metadata = convertChainConfig(config);
        chains.push(metadata);
        configs.set(config.id, Object.freeze(config));
      } catch (error) {
        skipped.push(this.skip('chain', id, error));
      }
    }

    this.chains = Object.freeze(chains);
    this.skipped = Object.freeze(skipped);
    this.configsById = configs;
    this.curvesById = curves;

    this.log('debug', `Loaded ${chains.length} chains (${skipped.length} definitions skipped)`);
  }

  /**
   * Get the process-wide registry, building it on first access
   */
  static getInstance(): ChainRegistry {
    if (!ChainRegistry.instance) {
      ChainRegistry.instance = new ChainRegistry(ChainRegistry.config);
    }
    return ChainRegistry.instance;
  }

  /**
   * Set options for the process-wide registry.
   * Discards an already-built instance so the next access rebuilds with these options.
   */
  static configure(options: ChainRegistryConfig): void {
    ChainRegistry.config = { ...options };
    ChainRegistry.instance = null;
  }

  /**
   * Build a standalone registry, independent of the process-wide instance
   */
  static create(options: ChainRegistryConfig = {}): ChainRegistry {
    return new ChainRegistry(options);
  }

  /**
   * Reset the singleton instance and its options (useful for testing)
   */
  static resetInstance(): void {
    ChainRegistry.instance = null;
    ChainRegistry.config = {};
  }

  // ===========================================================================
  // Lookup Methods
  // ===========================================================================

  /**
   * Definition for a chain id, used to resolve derivation pipelines
   */
  getChainConfig(id: string): ChainConfig | undefined {
    return this.configsById.get(id);
  }

  getChain(id: string): ChainMetadata | undefined {
    return this.chains.find((chain) => chain.id === id);
  }

  getCurve(id: string): CurveDefinition | undefined {
    return this.curvesById.get(id);
  }

  // ===========================================================================
  // Diagnostics
  // ===========================================================================

  /**
   * Route a diagnostic to the configured logger, or to the console.
   * Debug and info messages reach the console only with `debug` enabled.
   */
  log(level: LogLevel, message: string, data?: unknown): void {
    if (this.logger) {
      this.logger(level, message, data);
      return;
    }
    if (level === 'warn' || level === 'error') {
      console.warn(`[ChainRegistry] ${message}`, ...(data === undefined ? [] : [data]));
    } else if (this.debug) {
      console.log(`[ChainRegistry] ${message}`, ...(data === undefined ? [] : [data]));
    }
  }

  private skip(kind: SkippedDefinition['kind'], id: string, error: unknown): SkippedDefinition {
    const reason = error instanceof Error ? error.message : String(error);
    this.log('warn', `Skipping ${kind} "${id}": ${reason}`, error instanceof IdentifyError ? error.code : undefined);
    return { kind, id, reason };
  }
}
