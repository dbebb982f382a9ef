/**
 * Tests for impl/nodejs/definitions/FileDefinitionLoader.ts
 * Reads the metadata directory shipped with the package
 */

import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'url';
import { FileDefinitionLoader, createFileDefinitionLoader } from '../../../../impl/nodejs';
import { BundledDefinitionLoader } from '../../../../registry/loader';
import { ChainRegistry } from '../../../../registry/ChainRegistry';
import { validateDefinitions } from '../../../../registry/validate-definitions';

const METADATA_DIR = fileURLToPath(new URL('../../../../metadata', import.meta.url));

describe('FileDefinitionLoader', () => {
  it('should read the same definitions as the bundled loader', () => {
    const files = new FileDefinitionLoader(METADATA_DIR);
    const bundled = new BundledDefinitionLoader();

    expect(files.loadIndex()).toEqual(bundled.loadIndex());
    expect(files.loadChain('bitcoin')).toEqual(bundled.loadChain('bitcoin'));
    expect(files.loadCurve('sr25519')).toEqual(bundled.loadCurve('sr25519'));
  });

  it('should accept an options object', () => {
    const loader = createFileDefinitionLoader({ dataDir: METADATA_DIR, indexFileName: 'index.json' });
    expect(validateDefinitions(loader)).toEqual([]);
  });

  it('should back a registry', () => {
    const registry = ChainRegistry.create({ loader: new FileDefinitionLoader(METADATA_DIR) });
    expect(registry.chains).toHaveLength(29);
  });

  it('should reject ids that leave the directory', () => {
    const loader = new FileDefinitionLoader(METADATA_DIR);
    expect(() => loader.loadChain('../index')).toThrow('Invalid definition id: ../index');
  });

  it('should throw for a missing definition', () => {
    const loader = new FileDefinitionLoader(METADATA_DIR);
    expect(() => loader.loadChain('ghost')).toThrow('ENOENT');
  });
});
