/**
 * File Definition Loader for Node.js
 * Reads chain and curve definitions from a metadata directory:
 *
 *   <dir>/index.json
 *   <dir>/chains/<id>.json
 *   <dir>/curves/<id>.json
 */

import * as fs from 'fs';
import * as path from 'path';
import type { DefinitionLoader } from '../../../registry';

export interface FileDefinitionLoaderConfig {
  /** Metadata directory */
  dataDir: string;
  /** Index file name (default: 'index.json') */
  indexFileName?: string;
}

export class FileDefinitionLoader implements DefinitionLoader {
  private readonly dataDir: string;
  private readonly indexPath: string;

  constructor(config: FileDefinitionLoaderConfig | string) {
    if (typeof config === 'string') {
      this.dataDir = config;
      this.indexPath = path.join(config, 'index.json');
    } else {
      this.dataDir = config.dataDir;
      this.indexPath = path.join(config.dataDir, config.indexFileName ?? 'index.json');
    }
  }

  loadIndex(): unknown {
    return this.readJson(this.indexPath);
  }

  loadChain(id: string): unknown {
    return this.readJson(this.definitionPath('chains', id));
  }

  loadCurve(id: string): unknown {
    return this.readJson(this.definitionPath('curves', id));
  }

  private definitionPath(kind: 'chains' | 'curves', id: string): string {
    // Ids come from the index file; keep them from escaping the directory
    if (id !== path.basename(id)) {
      throw new Error(`Invalid definition id: ${id}`);
    }
    return path.join(this.dataDir, kind, `${id}.json`);
  }

  private readJson(filePath: string): unknown {
    const content = fs.readFileSync(filePath, 'utf-8');
    try {
      return JSON.parse(content);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to parse ${filePath}: ${message}`);
    }
  }
}

export function createFileDefinitionLoader(config: FileDefinitionLoaderConfig | string): FileDefinitionLoader {
  return new FileDefinitionLoader(config);
}
