import OpenAI from 'openai';
import { PermanentProviderError, RateLimitError, TransientProviderError } from '../errors.js';
import type { EmbeddingProvider, ProviderIdentity, TextInvocation, TextProvider } from './provider.js';

const PERMANENT_STATUSES = new Set([400, 401, 403, 404, 422]);

export class OpenAiTextProvider implements TextProvider {
  constructor(private readonly client: OpenAI, readonly identity: ProviderIdentity) {}

  async invokeText(invocation: TextInvocation, signal: AbortSignal): Promise<string> {
    const messages = [
      ...(invocation.systemPrompt ? [{ role: 'system' as const, content: invocation.systemPrompt }] : []),
      ...(invocation.history ?? []).map((turn) =>
        turn.role === 'assistant'
          ? { role: 'assistant' as const, content: turn.content }
          : { role: 'user' as const, content: turn.content },
      ),
      { role: 'user' as const, content: invocation.prompt },
    ];

    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.identity.deployment,
          messages,
          temperature: invocation.parameters.temperature,
          max_tokens: invocation.parameters.maxTokens,
          top_p: invocation.parameters.topP,
        },
        { signal },
      );
      const content = response.choices[0]?.message.content;
      if (content === null || content === undefined) {
        throw new TransientProviderError(`${this.identity.kind} returned an empty completion.`);
      }
      return content;
    } catch (error) {
      throw translateProviderError(error, signal);
    }
  }
}

export class OpenAiEmbeddingProvider implements EmbeddingProvider {
  constructor(
    private readonly client: OpenAI,
    readonly identity: ProviderIdentity,
    readonly dimensions: number,
  ) {}

  async invokeEmbedding(batch: readonly string[], signal: AbortSignal): Promise<number[][]> {
    try {
      const response = await this.client.embeddings.create(
        { model: this.identity.deployment, input: [...batch], encoding_format: 'float' },
        { signal },
      );
      return [...response.data].sort((a, b) => a.index - b.index).map((item) => item.embedding);
    } catch (error) {
      throw translateProviderError(error, signal);
    }
  }
}

/**
 * Maps SDK failures onto the relay's error taxonomy. An abort requested
 * through `signal` is rethrown as the signal's reason so callers see the
 * timeout or cancellation that caused it.
 */
export function translateProviderError(error: unknown, signal?: AbortSignal): unknown {
  if (signal?.aborted) {
    return signal.reason;
  }
  if (error instanceof RateLimitError || error instanceof TransientProviderError || error instanceof PermanentProviderError) {
    return error;
  }
  if (error instanceof OpenAI.APIUserAbortError) {
    return error;
  }
  if (error instanceof OpenAI.APIConnectionError) {
    return new TransientProviderError(`Provider unreachable: ${error.message}`, { cause: error });
  }
  if (error instanceof OpenAI.APIError) {
    const status = error.status;
    if (status === 429) {
      if (error.code === 'insufficient_quota') {
        return new PermanentProviderError(`Provider quota exhausted: ${error.message}`, { status, cause: error });
      }
      return new RateLimitError(`Provider rate limited the request: ${error.message}`, {
        retryAfterMs: parseRetryAfter(error.headers?.get('retry-after') ?? null),
        cause: error,
      });
    }
    if (status !== undefined && PERMANENT_STATUSES.has(status)) {
      return new PermanentProviderError(`Provider rejected the request (${status}): ${error.message}`, {
        status,
        cause: error,
      });
    }
    return new TransientProviderError(`Provider error${status !== undefined ? ` ${status}` : ''}: ${error.message}`, {
      cause: error,
    });
  }
  return error;
}

export function parseRetryAfter(value: string | null): number | undefined {
  if (!value) {
    return undefined;
  }
  const seconds = Number(value);
  if (Number.isFinite(seconds) && seconds >= 0) {
    return Math.round(seconds * 1000);
  }
  const date = Date.parse(value);
  if (Number.isNaN(date)) {
    return undefined;
  }
  return Math.max(0, date - Date.now());
}
