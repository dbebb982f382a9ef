export { FileDefinitionLoader, createFileDefinitionLoader } from './FileDefinitionLoader';
export type { FileDefinitionLoaderConfig } from './FileDefinitionLoader';
