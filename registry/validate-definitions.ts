/**
 * Definition Consistency Checks
 *
 * Cross-checks chain definitions against curve definitions and the pipeline
 * index. Not needed for identification itself; intended for tooling and CI
 * over custom definition sets.
 */

import { isKnownPipeline } from '../pipelines';
import type { ChainConfig, CurveDefinition, MetadataIndex } from '../types';
import { parseChainConfig, parseCurveDefinition, parseMetadataIndex } from './definitions';
import type { DefinitionLoader } from './loader';

export interface DefinitionIssue {
  /** Chain or curve id the issue belongs to, absent for index-level issues */
  readonly id?: string;
  readonly message: string;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function validateDefinitions(loader: DefinitionLoader): DefinitionIssue[] {
  const issues: DefinitionIssue[] = [];

  let index: MetadataIndex;
  try {
    index = parseMetadataIndex(loader.loadIndex());
  } catch (error) {
    return [{ message: errorMessage(error) }];
  }

  for (const pipeline of index.pipelines.addresses) {
    if (!isKnownPipeline(pipeline)) {
      issues.push({ id: pipeline, message: `Index lists unknown pipeline "${pipeline}"` });
    }
  }

  const curves = new Map<string, CurveDefinition>();
  for (const id of index.curves) {
    try {
      const curve = parseCurveDefinition(loader.loadCurve(id));
      curves.set(curve.id, curve);
    } catch (error) {
      issues.push({ id, message: errorMessage(error) });
    }
  }

  for (const id of index.chains) {
    let chain: ChainConfig;
    try {
      chain = parseChainConfig(loader.loadChain(id));
    } catch (error) {
      issues.push({ id, message: errorMessage(error) });
      continue;
    }

    if (chain.id !== id) {
      issues.push({ id, message: `Definition declares id "${chain.id}"` });
    }

    const curve = curves.get(chain.curve);
    if (!curve) {
      issues.push({ id, message: `Unknown curve "${chain.curve}"` });
      continue;
    }

    const pipelines = [chain.address_pipeline, ...chain.additional_pipelines.map((b) => b.pipeline)];
    for (const pipeline of pipelines) {
      if (!index.pipelines.addresses.includes(pipeline)) {
        issues.push({ id, message: `Pipeline "${pipeline}" is not listed in the index` });
      } else if (!curve.compatible_pipelines.includes(pipeline)) {
        issues.push({ id, message: `Pipeline "${pipeline}" is not compatible with curve "${curve.id}"` });
      }
    }
  }

  return issues;
}
