/**
 * Resource providers — what `resources/list` pages over and `resources/read` returns.
 */

import { readdir, readFile, stat } from 'node:fs/promises';
import { extname, join, relative, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import { InternalError } from '../protocol/errors.js';
import type { Resource, ResourceContents } from '../protocol/types.js';
import { silentLogger, type Logger } from '../utils/logger.js';

export interface ResourceProvider {
  readonly resource: Resource;
  read(): Promise<ResourceContents>;
}

const MIME_TYPES: Record<string, string> = {
  '.txt': 'text/plain',
  '.md': 'text/markdown',
  '.json': 'application/json',
  '.jsonl': 'application/jsonl',
  '.csv': 'text/csv',
  '.tsv': 'text/tab-separated-values',
  '.sql': 'application/sql',
  '.yaml': 'application/yaml',
  '.yml': 'application/yaml',
  '.html': 'text/html',
  '.xml': 'application/xml',
  '.ts': 'text/x-typescript',
  '.js': 'text/javascript',
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.parquet': 'application/vnd.apache.parquet',
};

export function mimeTypeFor(path: string): string {
  return MIME_TYPES[extname(path).toLowerCase()] ?? 'application/octet-stream';
}

function isTextMime(mimeType: string): boolean {
  return mimeType.startsWith('text/')
    || mimeType === 'application/json'
    || mimeType === 'application/jsonl'
    || mimeType === 'application/sql'
    || mimeType === 'application/yaml'
    || mimeType === 'application/xml';
}

/** In-memory text resource. */
export function textResource(
  uri: string,
  name: string,
  text: string,
  opts: { description?: string; mimeType?: string } = {},
): ResourceProvider {
  const mimeType = opts.mimeType ?? 'text/plain';
  return {
    resource: {
      uri,
      name,
      mimeType,
      ...(opts.description ? { description: opts.description } : {}),
    },
    read: async () => ({ uri, mimeType, text }),
  };
}

/** A file on disk, read on demand so large roots cost nothing until asked for. */
export function fileResource(path: string, name: string, maxFileSize: number): ResourceProvider {
  const uri = pathToFileURL(path).href;
  const mimeType = mimeTypeFor(path);

  return {
    resource: { uri, name, mimeType },
    read: async () => {
      const info = await stat(path);
      if (info.size > maxFileSize) {
        throw new InternalError(`Resource too large: ${uri} (${info.size} bytes, limit ${maxFileSize})`);
      }
      const data = await readFile(path);
      return isTextMime(mimeType)
        ? { uri, mimeType, text: data.toString('utf-8') }
        : { uri, mimeType, blob: data.toString('base64') };
    },
  };
}

/**
 * Expose every regular file under `root` as a `file://` resource, ordered by
 * relative path so pages are stable between calls. Dot-entries are skipped.
 */
export async function scanDirectory(
  root: string,
  opts: { maxFileSize: number; logger?: Logger },
): Promise<ResourceProvider[]> {
  const logger = opts.logger ?? silentLogger;
  const base = resolve(root);
  const files: string[] = [];

  const walk = async (dir: string): Promise<void> => {
    const entries = await readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      if (entry.name.startsWith('.')) continue;
      const full = join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(full);
      } else if (entry.isFile()) {
        files.push(full);
      }
    }
  };

  await walk(base);
  files.sort();

  logger.debug(`Scanned ${base}: ${files.length} file(s)`);
  return files.map(f => fileResource(f, relative(base, f).split('\\').join('/'), opts.maxFileSize));
}
