import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { pathToFileURL } from 'node:url';
import { fileResource, mimeTypeFor, scanDirectory, textResource } from '../../src/server/resources.js';
import { InternalError } from '../../src/protocol/errors.js';
import { createTempDir } from '../helpers/test-fixtures.js';

describe('resources', () => {
  let root: string;

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  beforeEach(() => {
    root = createTempDir();
    mkdirSync(join(root, 'data'));
    mkdirSync(join(root, '.hidden'));
    writeFileSync(join(root, 'readme.md'), '# Title');
    writeFileSync(join(root, 'data', 'orders.csv'), 'id,total\n1,9.5\n');
    writeFileSync(join(root, 'data', 'logo.png'), Buffer.from([0x89, 0x50, 0x4e, 0x47]));
    writeFileSync(join(root, '.hidden', 'secret.txt'), 'skip me');
    writeFileSync(join(root, '.env'), 'skip me too');
  });

  it('should pick mime types by extension', () => {
    expect(mimeTypeFor('a/b.JSON')).toBe('application/json');
    expect(mimeTypeFor('notes.md')).toBe('text/markdown');
    expect(mimeTypeFor('blob.bin')).toBe('application/octet-stream');
  });

  it('should expose every visible file sorted by path', async () => {
    const providers = await scanDirectory(root, { maxFileSize: 1024 });

    expect(providers.map(p => p.resource.name)).toEqual(['data/logo.png', 'data/orders.csv', 'readme.md']);
    expect(providers[2].resource).toEqual({
      uri: pathToFileURL(join(root, 'readme.md')).href,
      name: 'readme.md',
      mimeType: 'text/markdown',
    });
  });

  it('should read text files as text and binary files as base64', async () => {
    const [logo, orders] = await scanDirectory(root, { maxFileSize: 1024 });

    expect(await orders.read()).toEqual({
      uri: orders.resource.uri,
      mimeType: 'text/csv',
      text: 'id,total\n1,9.5\n',
    });
    expect(await logo.read()).toEqual({
      uri: logo.resource.uri,
      mimeType: 'image/png',
      blob: 'iVBORw==',
    });
  });

  it('should refuse to read a file over the size cap', async () => {
    const provider = fileResource(join(root, 'data', 'orders.csv'), 'orders.csv', 4);
    await expect(provider.read()).rejects.toBeInstanceOf(InternalError);
  });

  it('should serve in-memory text resources', async () => {
    const provider = textResource('mem://schema', 'schema', 'CREATE TABLE t (id int)', {
      description: 'Table layout',
      mimeType: 'application/sql',
    });

    expect(provider.resource).toEqual({
      uri: 'mem://schema', name: 'schema', mimeType: 'application/sql', description: 'Table layout',
    });
    expect(await provider.read()).toEqual({ uri: 'mem://schema', mimeType: 'application/sql', text: 'CREATE TABLE t (id int)' });
  });
});
