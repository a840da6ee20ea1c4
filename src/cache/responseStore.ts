import type { CacheClient } from './cache.js';
import type { Logger } from '../utils/logger.js';
import { checksumOfText } from '../utils/hash.js';

/**
 * The same key was written with a different value. Fingerprints are meant to
 * make that impossible, so each occurrence is reported to operators.
 */
export interface CacheAnomaly {
  namespace: string;
  key: string;
  previousDigest: string;
  nextDigest: string;
  observedAt: string;
}

export type PutOutcome = 'stored' | 'unchanged' | 'replaced';

export interface ResponseStoreOptions {
  namespace?: string | undefined;
  logger?: Logger | undefined;
  onAnomaly?: ((anomaly: CacheAnomaly) => void) | undefined;
}

export class ResponseStore {
  private readonly namespace: string;
  private readonly logger: Logger | undefined;
  private readonly onAnomaly: ((anomaly: CacheAnomaly) => void) | undefined;
  private readonly observed: CacheAnomaly[] = [];

  constructor(private readonly cache: CacheClient, options: ResponseStoreOptions = {}) {
    this.namespace = options.namespace ?? 'responses';
    this.logger = options.logger;
    this.onAnomaly = options.onAnomaly;
  }

  async get(key: string): Promise<string | null> {
    const entry = await this.cache.read(this.namespace, key);
    return entry ? entry.body : null;
  }

  /**
   * Idempotent for equal values. A different value under an existing key is
   * recorded as an anomaly and the newer value replaces the stored one.
   */
  async put(key: string, value: string, metadata?: Record<string, unknown>): Promise<PutOutcome> {
    const existing = await this.cache.read(this.namespace, key);
    if (existing && existing.body === value) {
      return 'unchanged';
    }

    if (existing) {
      const anomaly: CacheAnomaly = {
        namespace: this.namespace,
        key,
        previousDigest: checksumOfText(existing.body).slice(0, 12),
        nextDigest: checksumOfText(value).slice(0, 12),
        observedAt: new Date().toISOString(),
      };
      this.observed.push(anomaly);
      this.logger?.(
        `Cache anomaly for ${this.namespace}/${key}: stored value ${anomaly.previousDigest} differs from ${anomaly.nextDigest}. Keeping the newer value.`,
      );
      this.onAnomaly?.(anomaly);
    }

    await this.cache.write(this.namespace, {
      checksum: key,
      body: value,
      metadata,
    });
    return existing ? 'replaced' : 'stored';
  }

  get anomalies(): readonly CacheAnomaly[] {
    return this.observed;
  }
}
