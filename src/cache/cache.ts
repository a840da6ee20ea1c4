export interface CacheEntry {
  checksum: string;
  storedAt: string;
  metadata?: Record<string, unknown>;
  body: string;
}

export interface CacheWriteInput {
  checksum: string;
  body: string;
  metadata?: Record<string, unknown> | undefined;
}

/**
 * Key-value persistence for completed responses. Implementations need no
 * locking beyond what their storage guarantees for independent keys; there is
 * no eviction at this layer.
 */
export interface CacheClient {
  read(namespace: string, checksum: string): Promise<CacheEntry | null>;
  write(namespace: string, entry: CacheWriteInput): Promise<void>;
}
