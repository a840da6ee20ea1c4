import { FileCache } from './cache/fileCache.js';
import { MemoryCache } from './cache/memoryCache.js';
import type { CacheClient } from './cache/cache.js';
import { ResponseStore, type CacheAnomaly } from './cache/responseStore.js';
import type { RelayConfig } from './config/config.js';
import { Embedder } from './embedding/embedder.js';
import { createEmbeddingProvider, createTextProvider } from './providers/index.js';
import type { EmbeddingProvider, TextProvider } from './providers/provider.js';
import { QueryDispatcher } from './query/dispatcher.js';
import type { Retriever } from './retrieval/segmentRetriever.js';
import type { Logger } from './utils/logger.js';

export interface RelayOptions {
  ephemeralCache?: boolean | undefined;
  retriever?: Retriever | undefined;
  logger?: Logger | undefined;
  warn?: Logger | undefined;
  /** Overrides the configured backends; tests and embedders of the library pass their own. */
  textProvider?: TextProvider | undefined;
  embeddingProvider?: EmbeddingProvider | undefined;
  cache?: CacheClient | undefined;
}

export interface Relay {
  dispatcher: QueryDispatcher;
  embedder: Embedder;
  responses: ResponseStore;
  embeddings: ResponseStore;
}

/** Wires the configured backends, cache and components together. */
export function createRelay(config: RelayConfig, options: RelayOptions = {}): Relay {
  const cache = options.cache ?? (options.ephemeralCache ? new MemoryCache() : new FileCache({ baseDir: config.cacheDir }));
  const onAnomaly = (anomaly: CacheAnomaly) => {
    options.warn?.(`Cache anomaly recorded for ${anomaly.namespace}/${anomaly.key.slice(0, 12)} at ${anomaly.observedAt}.`);
  };
  const responses = new ResponseStore(cache, { namespace: 'responses', logger: options.logger, onAnomaly });
  const embeddings = new ResponseStore(cache, { namespace: 'embeddings', logger: options.logger, onAnomaly });

  const dispatcher = new QueryDispatcher({
    config,
    provider: options.textProvider ?? createTextProvider(config.provider),
    store: responses,
    retriever: options.retriever,
    logger: options.logger,
  });

  const embedder = new Embedder(options.embeddingProvider ?? createEmbeddingProvider(config.embedding), embeddings, {
    batchSize: config.embedding.batchSize,
    retry: {
      baseDelayMs: config.retry.baseDelayMs,
      maxDelayMs: config.retry.maxDelayMs,
      attemptTimeoutMs: config.retry.attemptTimeoutMs,
    },
    defaultTimeoutMs: config.timeouts.defaultMs,
    logger: options.logger,
  });

  return { dispatcher, embedder, responses, embeddings };
}
