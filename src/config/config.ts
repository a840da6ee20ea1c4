import type { FingerprintOptions } from '../query/fingerprint.js';
import type { ProviderKind } from '../providers/provider.js';
import type { ModelParameters } from '../types/index.js';

export interface BackendConfig {
  kind: ProviderKind;
  apiKey: string;
  /** Base URL for openai/gemini, resource endpoint for azure. */
  endpoint: string | undefined;
  apiVersion: string | undefined;
  deployment: string;
}

export interface EmbeddingConfig extends BackendConfig {
  dimensions: number;
  batchSize: number;
}

export interface RetryConfig {
  baseDelayMs: number;
  maxDelayMs: number;
  attemptTimeoutMs: number;
}

export interface TimeoutConfig {
  defaultMs: number;
  maxMs: number;
}

export type BypassStrategy = 'canned' | 'direct';

export interface BypassConfig {
  strategy: BypassStrategy;
  response: string;
}

export interface RelayConfig {
  readonly provider: Readonly<BackendConfig>;
  readonly embedding: Readonly<EmbeddingConfig>;
  readonly model: Readonly<ModelParameters>;
  readonly retry: Readonly<RetryConfig>;
  readonly timeouts: Readonly<TimeoutConfig>;
  readonly maxConcurrentDocuments: number;
  readonly cacheDir: string;
  readonly bypass: Readonly<BypassConfig>;
  readonly fingerprint: Readonly<FingerprintOptions>;
}

/** Values that command-line flags may override on top of the environment. */
export interface ConfigOverrides {
  timeoutSeconds?: string | undefined;
  concurrency?: string | undefined;
  cacheDir?: string | undefined;
}

export type Environment = Readonly<Record<string, string | undefined>>;

const DEFAULT_BYPASS_RESPONSE =
  'Hello! Ask me a question about the processed documents and I will search them for an answer.';

const DEFAULT_DEPLOYMENTS: Record<ProviderKind, { text: string; embedding: string; dimensions: number }> = {
  azure: { text: 'gpt-4o', embedding: 'text-embedding-3-large', dimensions: 3072 },
  openai: { text: 'gpt-4o-mini', embedding: 'text-embedding-3-large', dimensions: 3072 },
  gemini: { text: 'gemini-2.0-flash', embedding: 'text-embedding-004', dimensions: 768 },
};

// setTimeout fires immediately for delays above a signed 32-bit millisecond count.
const MAX_TIMER_MS = 2_147_483_647;

export const GEMINI_OPENAI_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta/openai/';

/**
 * Builds the relay configuration once at startup. The result is frozen and
 * passed to the components that need it; nothing reads the environment later.
 */
export function loadConfig(env: Environment, overrides: ConfigOverrides = {}): RelayConfig {
  const kind = parseProviderKind(env.LLM_PROVIDER);
  const defaults = DEFAULT_DEPLOYMENTS[kind];

  const provider = buildTextBackend(kind, env, defaults.text);
  const embedding: EmbeddingConfig = {
    ...buildEmbeddingBackend(kind, env, provider, defaults.embedding),
    dimensions: parsePositiveInteger(
      kind === 'gemini' ? env.GEMINI_EMBEDDING_DIM : env.EMBEDDING_DIM,
      defaults.dimensions,
      kind === 'gemini' ? 'GEMINI_EMBEDDING_DIM' : 'EMBEDDING_DIM',
    ),
    batchSize: parsePositiveInteger(env.EMBEDDING_BATCH_SIZE, 20, 'EMBEDDING_BATCH_SIZE'),
  };

  const defaultMs =
    parsePositiveNumber(overrides.timeoutSeconds ?? env.QUERY_TIMEOUT_SECONDS, 60, 'QUERY_TIMEOUT_SECONDS') * 1000;
  const maxMs = parsePositiveNumber(env.QUERY_MAX_TIMEOUT_SECONDS, 300, 'QUERY_MAX_TIMEOUT_SECONDS') * 1000;
  requireTimerRange(maxMs, 'QUERY_MAX_TIMEOUT_SECONDS', 1000);
  if (defaultMs > maxMs) {
    throw new Error('QUERY_TIMEOUT_SECONDS must not exceed QUERY_MAX_TIMEOUT_SECONDS.');
  }

  const baseDelayMs = parsePositiveInteger(env.RETRY_BASE_DELAY_MS, 1000, 'RETRY_BASE_DELAY_MS');
  const maxDelayMs = parsePositiveInteger(env.RETRY_MAX_DELAY_MS, 30000, 'RETRY_MAX_DELAY_MS');
  requireTimerRange(maxDelayMs, 'RETRY_MAX_DELAY_MS', 1);
  if (baseDelayMs > maxDelayMs) {
    throw new Error('RETRY_BASE_DELAY_MS must not exceed RETRY_MAX_DELAY_MS.');
  }
  const attemptTimeoutMs = parseNonNegativeNumber(env.RETRY_ATTEMPT_TIMEOUT_MS, 0, 'RETRY_ATTEMPT_TIMEOUT_MS');
  requireTimerRange(attemptTimeoutMs, 'RETRY_ATTEMPT_TIMEOUT_MS', 1);

  return deepFreeze({
    provider,
    embedding,
    model: {
      temperature: parseNonNegativeNumber(env.LLM_TEMPERATURE, 0, 'LLM_TEMPERATURE'),
      maxTokens: parsePositiveInteger(env.LLM_MAX_TOKENS, 4000, 'LLM_MAX_TOKENS'),
      topP: parseNonNegativeNumber(env.LLM_TOP_P, 1, 'LLM_TOP_P'),
    },
    retry: {
      baseDelayMs,
      maxDelayMs,
      attemptTimeoutMs,
    },
    timeouts: { defaultMs, maxMs },
    maxConcurrentDocuments: parsePositiveInteger(
      overrides.concurrency ?? env.MAX_CONCURRENT_FILES,
      2,
      'MAX_CONCURRENT_FILES',
    ),
    cacheDir: overrides.cacheDir?.trim() || env.CACHE_DIR?.trim() || '.cache',
    bypass: {
      strategy: parseBypassStrategy(env.BYPASS_STRATEGY),
      response: env.BYPASS_RESPONSE?.trim() || DEFAULT_BYPASS_RESPONSE,
    },
    fingerprint: {
      collapseWhitespace: parseBoolean(env.FINGERPRINT_COLLAPSE_WHITESPACE, 'FINGERPRINT_COLLAPSE_WHITESPACE'),
      caseInsensitive: parseBoolean(env.FINGERPRINT_CASE_INSENSITIVE, 'FINGERPRINT_CASE_INSENSITIVE'),
    },
  });
}

function buildTextBackend(kind: ProviderKind, env: Environment, defaultDeployment: string): BackendConfig {
  switch (kind) {
    case 'azure':
      return {
        kind,
        apiKey: requireValue(env, 'LLM_BINDING_API_KEY'),
        endpoint: requireValue(env, 'LLM_BINDING_HOST'),
        apiVersion: env.AZURE_OPENAI_API_VERSION?.trim() || '2024-12-01-preview',
        deployment: env.AZURE_OPENAI_DEPLOYMENT?.trim() || defaultDeployment,
      };
    case 'gemini':
      return {
        kind,
        apiKey: requireValue(env, 'GEMINI_API_KEY'),
        endpoint: env.LLM_BINDING_HOST?.trim() || GEMINI_OPENAI_BASE_URL,
        apiVersion: undefined,
        deployment: env.GEMINI_MODEL?.trim() || defaultDeployment,
      };
    case 'openai':
      return {
        kind,
        apiKey: requireValue(env, 'OPENAI_API_KEY'),
        endpoint: env.LLM_BINDING_HOST?.trim() || undefined,
        apiVersion: undefined,
        deployment: env.OPENAI_MODEL?.trim() || defaultDeployment,
      };
  }
}

function buildEmbeddingBackend(
  kind: ProviderKind,
  env: Environment,
  text: BackendConfig,
  defaultDeployment: string,
): BackendConfig {
  switch (kind) {
    case 'azure':
      return {
        kind,
        apiKey: env.EMBEDDING_BINDING_API_KEY?.trim() || text.apiKey,
        endpoint: env.EMBEDDING_BINDING_HOST?.trim() || text.endpoint,
        apiVersion: env.AZURE_EMBEDDING_API_VERSION?.trim() || '2024-02-01',
        deployment: env.AZURE_EMBEDDING_DEPLOYMENT?.trim() || defaultDeployment,
      };
    case 'gemini':
      return {
        ...text,
        deployment: env.GEMINI_EMBEDDING_MODEL?.trim() || defaultDeployment,
      };
    case 'openai':
      return {
        ...text,
        apiKey: env.EMBEDDING_BINDING_API_KEY?.trim() || text.apiKey,
        endpoint: env.EMBEDDING_BINDING_HOST?.trim() || text.endpoint,
        deployment: env.OPENAI_EMBEDDING_MODEL?.trim() || defaultDeployment,
      };
  }
}

function requireTimerRange(ms: number, name: string, unitMs: number): void {
  if (ms > MAX_TIMER_MS) {
    throw new Error(`${name} must not exceed ${Math.floor(MAX_TIMER_MS / unitMs)}.`);
  }
}

function requireValue(env: Environment, name: string): string {
  const value = env[name]?.trim();
  if (!value) {
    throw new Error(`${name} is missing from the environment.`);
  }
  return value;
}

function parseProviderKind(value: string | undefined): ProviderKind {
  const normalized = value?.trim().toLowerCase() || 'azure';
  if (normalized === 'azure' || normalized === 'openai' || normalized === 'gemini') {
    return normalized;
  }
  throw new Error(`LLM_PROVIDER must be one of azure, openai, gemini (got "${value}").`);
}

function parseBypassStrategy(value: string | undefined): BypassStrategy {
  const normalized = value?.trim().toLowerCase() || 'canned';
  if (normalized === 'canned' || normalized === 'direct') {
    return normalized;
  }
  throw new Error(`BYPASS_STRATEGY must be "canned" or "direct" (got "${value}").`);
}

function parseBoolean(value: string | undefined, name: string): boolean {
  const normalized = value?.trim().toLowerCase();
  if (!normalized) {
    return false;
  }
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }
  throw new Error(`${name} must be a boolean (got "${value}").`);
}

function parsePositiveInteger(value: string | undefined, fallback: number, name: string): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }

  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 1) {
    throw new Error(`${name} must be a positive number.`);
  }
  return Math.floor(parsed);
}

function parsePositiveNumber(value: string | undefined, fallback: number, name: string): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }

  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`${name} must be a positive number.`);
  }
  return parsed;
}

function parseNonNegativeNumber(value: string | undefined, fallback: number, name: string): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }

  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`${name} must be zero or a positive number.`);
  }
  return parsed;
}

function deepFreeze<T extends object>(value: T): T {
  for (const child of Object.values(value)) {
    if (child !== null && typeof child === 'object' && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}
