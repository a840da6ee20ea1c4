import type { ChatTurn, ModelParameters } from '../types/index.js';

export type ProviderKind = 'openai' | 'azure' | 'gemini';

/** Identifies the backend an answer came from; folded into cache keys. */
export interface ProviderIdentity {
  kind: ProviderKind;
  deployment: string;
  apiVersion?: string | undefined;
}

export interface TextInvocation {
  prompt: string;
  systemPrompt?: string | undefined;
  /** Earlier turns, sent between the system prompt and the prompt. */
  history?: readonly ChatTurn[] | undefined;
  parameters: ModelParameters;
}

/**
 * Text generation capability. Implementations must pass `signal` to the
 * underlying transport so an abort actually stops the request.
 */
export interface TextProvider {
  readonly identity: ProviderIdentity;
  invokeText(invocation: TextInvocation, signal: AbortSignal): Promise<string>;
}

export interface EmbeddingProvider {
  readonly identity: ProviderIdentity;
  readonly dimensions: number;
  invokeEmbedding(batch: readonly string[], signal: AbortSignal): Promise<number[][]>;
}
