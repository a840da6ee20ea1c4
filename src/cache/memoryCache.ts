import type { CacheClient, CacheEntry, CacheWriteInput } from './cache.js';

/** Process-local cache client. Backs `--ephemeral-cache` runs and tests. */
export class MemoryCache implements CacheClient {
  private readonly entries = new Map<string, CacheEntry>();

  async read(namespace: string, checksum: string): Promise<CacheEntry | null> {
    const entry = this.entries.get(`${namespace}/${checksum}`);
    return entry ? { ...entry } : null;
  }

  async write(namespace: string, entry: CacheWriteInput): Promise<void> {
    this.entries.set(`${namespace}/${entry.checksum}`, {
      checksum: entry.checksum,
      body: entry.body,
      storedAt: new Date().toISOString(),
      ...(entry.metadata ? { metadata: { ...entry.metadata } } : {}),
    });
  }

  get size(): number {
    return this.entries.size;
  }
}
