import OpenAI, { AzureOpenAI } from 'openai';
import type { BackendConfig, EmbeddingConfig } from '../config/config.js';
import { OpenAiEmbeddingProvider, OpenAiTextProvider } from './openai.js';
import type { EmbeddingProvider, ProviderIdentity, TextProvider } from './provider.js';

export type { EmbeddingProvider, ProviderIdentity, ProviderKind, TextInvocation, TextProvider } from './provider.js';

export function createTextProvider(config: BackendConfig): TextProvider {
  return new OpenAiTextProvider(createClient(config), identityOf(config));
}

export function createEmbeddingProvider(config: EmbeddingConfig): EmbeddingProvider {
  return new OpenAiEmbeddingProvider(createClient(config), identityOf(config), config.dimensions);
}

/**
 * Every backend speaks the OpenAI wire format; only the client setup differs.
 * SDK retries are off because the relay's retry controller owns retries.
 */
function createClient(config: BackendConfig): OpenAI {
  switch (config.kind) {
    case 'azure':
      return new AzureOpenAI({
        apiKey: config.apiKey,
        ...(config.endpoint ? { endpoint: config.endpoint } : {}),
        ...(config.apiVersion ? { apiVersion: config.apiVersion } : {}),
        deployment: config.deployment,
        maxRetries: 0,
      });
    case 'gemini':
    case 'openai':
      return new OpenAI({
        apiKey: config.apiKey,
        ...(config.endpoint ? { baseURL: config.endpoint } : {}),
        maxRetries: 0,
      });
  }
}

function identityOf(config: BackendConfig): ProviderIdentity {
  return {
    kind: config.kind,
    deployment: config.deployment,
    ...(config.apiVersion ? { apiVersion: config.apiVersion } : {}),
  };
}
