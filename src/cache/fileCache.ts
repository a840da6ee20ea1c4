import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { CacheClient, CacheEntry, CacheWriteInput } from './cache.js';

interface MetadataFile {
  storedAt: string;
  metadata?: Record<string, unknown>;
}

export interface FileCacheOptions {
  baseDir?: string | undefined;
}

const SAFE_SEGMENT = /^[A-Za-z0-9_-]+$/;

export class FileCache implements CacheClient {
  private readonly baseDir: string;

  constructor(options: FileCacheOptions = {}) {
    this.baseDir = options.baseDir ?? '.cache';
  }

  async read(namespace: string, checksum: string): Promise<CacheEntry | null> {
    const { bodyPath, metaPath } = this.paths(namespace, checksum);

    try {
      const [body, metaRaw] = await Promise.all([
        fs.readFile(bodyPath, 'utf8'),
        fs.readFile(metaPath, 'utf8'),
      ]);
      const meta = parseMetadata(metaRaw, metaPath);
      const entry: CacheEntry = {
        checksum,
        body,
        storedAt: meta.storedAt,
        ...(meta.metadata ? { metadata: meta.metadata } : {}),
      };
      return entry;
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }

      throw error;
    }
  }

  async write(namespace: string, entry: CacheWriteInput): Promise<void> {
    const { dir, bodyPath, metaPath } = this.paths(namespace, entry.checksum);
    await fs.mkdir(dir, { recursive: true });

    const metadata: MetadataFile = { storedAt: new Date().toISOString() };
    if (entry.metadata) {
      metadata.metadata = entry.metadata;
    }

    // The body goes last: a reader that finds it also finds the metadata.
    await fs.writeFile(metaPath, JSON.stringify(metadata, null, 2), 'utf8');
    await fs.writeFile(bodyPath, entry.body, 'utf8');
  }

  private paths(namespace: string, checksum: string) {
    if (!SAFE_SEGMENT.test(namespace) || !SAFE_SEGMENT.test(checksum)) {
      throw new Error(`Invalid cache path segment: ${namespace}/${checksum}`);
    }
    const dir = path.join(this.baseDir, namespace);
    return {
      dir,
      bodyPath: path.join(dir, `${checksum}.body`),
      metaPath: path.join(dir, `${checksum}.meta.json`),
    };
  }
}

function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

function parseMetadata(raw: string, metaPath: string): MetadataFile {
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== 'object' || parsed === null || !('storedAt' in parsed) || typeof parsed.storedAt !== 'string') {
    throw new Error(`Cache metadata at ${metaPath} has no storedAt timestamp.`);
  }
  const meta: MetadataFile = { storedAt: parsed.storedAt };
  if ('metadata' in parsed && isRecord(parsed.metadata)) {
    meta.metadata = parsed.metadata;
  }
  return meta;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
