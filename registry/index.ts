export { ChainRegistry } from './ChainRegistry';
export type { ChainRegistryConfig, SkippedDefinition } from './ChainRegistry';
export { BundledDefinitionLoader, InMemoryDefinitionLoader } from './loader';
export type { DefinitionLoader } from './loader';
export { convertChainConfig, addressFormatsForPipeline, parseEncoding, parseKeyType } from './chain-converter';
export { parseChainConfig, parseCurveDefinition, parseMetadataIndex } from './definitions';
export { validateRawAddress, lengthSatisfied } from './metadata';
export { validateDefinitions } from './validate-definitions';
export type { DefinitionIssue } from './validate-definitions';
