import type { ResponseStore } from '../cache/responseStore.js';
import { InputError, PermanentProviderError } from '../errors.js';
import type { EmbeddingProvider } from '../providers/provider.js';
import { callWithRetry, type RetryPolicy } from '../resilience/retry.js';
import { runWithTimeout } from '../resilience/timeout.js';
import { checksumFrom } from '../utils/hash.js';
import type { Logger } from '../utils/logger.js';

export interface EmbedderOptions {
  batchSize: number;
  retry: Omit<RetryPolicy, 'deadline' | 'maxAttempts'>;
  defaultTimeoutMs: number;
  logger?: Logger | undefined;
  sleep?: ((ms: number, signal?: AbortSignal) => Promise<void>) | undefined;
}

export interface EmbedOptions {
  signal?: AbortSignal | undefined;
  maxWaitMs?: number | undefined;
}

/**
 * Embeds texts through the provider, reusing vectors already in the store.
 * Only texts missing from the store are sent, de-duplicated and in batches.
 */
export class Embedder {
  constructor(
    private readonly provider: EmbeddingProvider,
    private readonly store: ResponseStore,
    private readonly options: EmbedderOptions,
  ) {}

  async embed(texts: readonly string[], options: EmbedOptions = {}): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }
    texts.forEach((text, index) => {
      if (text.trim().length === 0) {
        throw new InputError(`Text ${index} is empty; embeddings need content.`);
      }
    });

    const maxWaitMs = options.maxWaitMs ?? this.options.defaultTimeoutMs;
    const deadline = Date.now() + maxWaitMs;
    const vectors = new Map<string, number[]>();
    const missing: string[] = [];

    for (const text of new Set(texts)) {
      const stored = await this.store.get(this.keyFor(text));
      if (stored === null) {
        missing.push(text);
      } else {
        vectors.set(text, parseVector(stored));
      }
    }

    if (missing.length > 0) {
      this.options.logger?.(
        `Embedding ${missing.length} of ${texts.length} texts with ${this.provider.identity.deployment} (${vectors.size} cached).`,
      );
    }

    for (let start = 0; start < missing.length; start += this.options.batchSize) {
      const batch = missing.slice(start, start + this.options.batchSize);
      const remainingMs = deadline - Date.now();
      const embedded = await this.embedBatch(batch, Math.max(1, remainingMs), deadline, options.signal);
      for (const [index, text] of batch.entries()) {
        const vector = embedded[index];
        if (!vector) {
          continue;
        }
        vectors.set(text, vector);
        await this.store.put(this.keyFor(text), JSON.stringify(vector), {
          deployment: this.provider.identity.deployment,
          dimensions: vector.length,
        });
      }
    }

    return texts.map((text) => {
      const vector = vectors.get(text);
      if (!vector) {
        throw new PermanentProviderError(`No embedding was produced for text "${text.slice(0, 40)}".`);
      }
      return vector;
    });
  }

  private async embedBatch(
    batch: string[],
    maxWaitMs: number,
    deadline: number,
    signal: AbortSignal | undefined,
  ): Promise<number[][]> {
    let lastError: unknown;
    const vectors = await runWithTimeout(
      (batchSignal) =>
        callWithRetry(
          (attemptSignal) => this.provider.invokeEmbedding(batch, attemptSignal),
          { ...this.options.retry, deadline },
          {
            signal: batchSignal,
            label: `${this.provider.identity.kind} embedding batch`,
            logger: this.options.logger,
            sleep: this.options.sleep,
            onRetry: (event) => {
              lastError = event.error;
            },
          },
        ),
      maxWaitMs,
      { signal, label: 'embedding batch', cause: () => lastError },
    );

    if (vectors.length !== batch.length) {
      throw new PermanentProviderError(`Expected ${batch.length} embeddings, received ${vectors.length}.`);
    }
    for (const vector of vectors) {
      if (vector.length !== this.provider.dimensions) {
        throw new PermanentProviderError(
          `Embedding has ${vector.length} dimensions; the configured dimensionality is ${this.provider.dimensions}.`,
        );
      }
    }
    return vectors;
  }

  private keyFor(text: string): string {
    return checksumFrom({ type: 'embedding', provider: this.provider.identity, text });
  }
}

function parseVector(raw: string): number[] {
  const parsed: unknown = JSON.parse(raw);
  if (!Array.isArray(parsed) || !parsed.every((value): value is number => typeof value === 'number')) {
    throw new Error('Stored embedding is not a numeric array.');
  }
  return parsed;
}
