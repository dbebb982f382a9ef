/**
 * Typed reads from free-form pipeline parameters
 */

import type { PipelineParams } from '../types';

export function numberParam(params: PipelineParams, key: string, fallback: number): number;
export function numberParam(params: PipelineParams, key: string): number | undefined;
export function numberParam(params: PipelineParams, key: string, fallback?: number): number | undefined {
  const value = params[key];
  return typeof value === 'number' && Number.isInteger(value) ? value : fallback;
}

export function stringParam(params: PipelineParams, key: string, fallback: string): string {
  const value = params[key];
  return typeof value === 'string' && value.length > 0 ? value : fallback;
}

/**
 * String list under `listKey`, or the single string under `singleKey`
 */
export function stringListParam(
  params: PipelineParams,
  singleKey: string,
  listKey: string,
  fallback: readonly string[],
): string[] {
  const single = params[singleKey];
  if (typeof single === 'string' && single.length > 0) return [single];

  const list = params[listKey];
  if (Array.isArray(list)) {
    const strings = list.filter((v): v is string => typeof v === 'string' && v.length > 0);
    if (strings.length > 0) return strings;
  }
  return [...fallback];
}
