import { describe, expect, it, vi } from 'vitest';
import type { CacheClient, CacheEntry } from '../cache/cache.js';
import { MemoryCache } from '../cache/memoryCache.js';
import { ResponseStore } from '../cache/responseStore.js';
import { loadConfig, type Environment } from '../config/config.js';
import { InputError, PermanentProviderError, RateLimitError, TimeoutError } from '../errors.js';
import type { ProviderIdentity, TextInvocation, TextProvider } from '../providers/provider.js';
import { SegmentRetriever } from '../retrieval/segmentRetriever.js';
import { sleep } from '../utils/sleep.js';
import { QueryDispatcher } from './dispatcher.js';

type Responder = (invocation: TextInvocation, signal: AbortSignal, call: number) => Promise<string>;

class FakeTextProvider implements TextProvider {
  readonly identity: ProviderIdentity = { kind: 'openai', deployment: 'fake-model' };
  readonly invocations: TextInvocation[] = [];
  readonly signals: AbortSignal[] = [];

  constructor(private readonly respond: Responder) {}

  invokeText(invocation: TextInvocation, signal: AbortSignal): Promise<string> {
    this.invocations.push(invocation);
    this.signals.push(signal);
    return this.respond(invocation, signal, this.invocations.length);
  }
}

const BASE_ENV: Environment = {
  LLM_PROVIDER: 'openai',
  OPENAI_API_KEY: 'test-secret',
  RETRY_BASE_DELAY_MS: '10',
  RETRY_MAX_DELAY_MS: '100',
};

class SlowCache extends MemoryCache {
  constructor(private readonly readDelayMs: number) {
    super();
  }

  async read(namespace: string, checksum: string): Promise<CacheEntry | null> {
    await sleep(this.readDelayMs);
    return super.read(namespace, checksum);
  }
}

function setup(
  respond: Responder,
  env: Environment = {},
  retriever?: SegmentRetriever,
  cache: CacheClient = new MemoryCache(),
) {
  const config = loadConfig({ ...BASE_ENV, ...env });
  const provider = new FakeTextProvider(respond);
  const store = new ResponseStore(cache);
  const delays: number[] = [];
  const dispatcher = new QueryDispatcher({
    config,
    provider,
    store,
    retriever,
    sleep: async (ms) => {
      delays.push(ms);
    },
  });
  return { config, provider, store, delays, dispatcher };
}

describe('QueryDispatcher', () => {
  it('answers a greeting with the canned reply and no provider call', async () => {
    const { config, provider, dispatcher } = setup(async () => 'unused');

    const result = await dispatcher.dispatch({ rawText: 'hello', corpusVersion: 'v1' });

    expect(result.mode).toBe('bypass');
    expect(result.source).toBe('bypass');
    expect(result.key).toBeNull();
    expect(result.text).toBe(config.bypass.response);
    expect(provider.invocations).toHaveLength(0);
  });

  it('sends a greeting to the provider without context under the direct strategy', async () => {
    const { provider, dispatcher } = setup(async () => 'Hi there!', { BYPASS_STRATEGY: 'direct' });

    const result = await dispatcher.dispatch({ rawText: 'hello', corpusVersion: 'v1' });

    expect(result.text).toBe('Hi there!');
    expect(result.source).toBe('provider');
    expect(provider.invocations[0]?.prompt).toBe('hello');
    expect(provider.invocations[0]?.systemPrompt).toBe(
      'Reply briefly and conversationally. Do not invent document content.',
    );
  });

  it('calls the provider once and serves the repeat from the cache', async () => {
    const { provider, dispatcher } = setup(async () => 'Thermal and optical sensors differ in range.');

    const first = await dispatcher.dispatch({ rawText: 'Compare sensor types', corpusVersion: 'v1' });
    const second = await dispatcher.dispatch({ rawText: 'Compare sensor types', corpusVersion: 'v1' });

    expect(first.mode).toBe('hybrid');
    expect(first.source).toBe('provider');
    expect(second.source).toBe('cache');
    expect(second.text).toBe(first.text);
    expect(second.key).toBe(first.key);
    expect(provider.invocations).toHaveLength(1);
  });

  it('keys answers on the corpus version', async () => {
    const { provider, dispatcher } = setup(async (_invocation, _signal, call) => `answer ${call}`);

    const before = await dispatcher.dispatch({ rawText: 'Compare sensor types', corpusVersion: 'v1' });
    const after = await dispatcher.dispatch({ rawText: 'Compare sensor types', corpusVersion: 'v2' });

    expect(before.text).toBe('answer 1');
    expect(after.text).toBe('answer 2');
    expect(after.key).not.toBe(before.key);
    expect(provider.invocations).toHaveLength(2);
  });

  it('respects a pinned mode', async () => {
    const { dispatcher } = setup(async () => 'Document-wide summary.');

    const result = await dispatcher.dispatch({ rawText: 'hello', mode: 'naive', corpusVersion: 'v1' });

    expect(result.mode).toBe('naive');
    expect(result.source).toBe('provider');
  });

  it('retries two rate limits with backoff and returns the third answer', async () => {
    const { provider, delays, dispatcher } = setup(async (_invocation, _signal, call) => {
      if (call <= 2) {
        throw new RateLimitError('slow down');
      }
      return 'third time lucky';
    });

    const result = await dispatcher.dispatch({ rawText: 'What is the warranty period?', corpusVersion: 'v1' });

    expect(result.text).toBe('third time lucky');
    expect(result.source).toBe('provider');
    expect(provider.invocations).toHaveLength(3);
    expect(delays).toEqual([10, 20]);
  });

  it('shares one provider call between concurrent identical questions', async () => {
    let release: (value: string) => void = () => undefined;
    const answer = new Promise<string>((resolve) => {
      release = resolve;
    });
    const { provider, dispatcher } = setup(() => answer);

    const pending = Array.from({ length: 5 }, () =>
      dispatcher.dispatch({ rawText: 'Compare sensor types', corpusVersion: 'v1' }),
    );
    await vi.waitFor(() => expect(provider.invocations).toHaveLength(1));
    release('shared answer');
    const results = await Promise.all(pending);

    expect(results.map((result) => result.text)).toEqual(Array(5).fill('shared answer'));
    expect(results.filter((result) => result.source === 'provider')).toHaveLength(1);
    expect(results.filter((result) => result.source === 'shared')).toHaveLength(4);
    expect(provider.invocations).toHaveLength(1);
  });

  it('does not cache a failure', async () => {
    const { provider, store, dispatcher } = setup(async (_invocation, _signal, call) => {
      if (call === 1) {
        throw new PermanentProviderError('bad request', { status: 400 });
      }
      return 'recovered answer';
    });

    await expect(dispatcher.dispatch({ rawText: 'Compare sensor types', corpusVersion: 'v1' })).rejects.toBeInstanceOf(
      PermanentProviderError,
    );
    const retry = await dispatcher.dispatch({ rawText: 'Compare sensor types', corpusVersion: 'v1' });

    expect(retry.text).toBe('recovered answer');
    expect(retry.source).toBe('provider');
    expect(provider.invocations).toHaveLength(2);
    expect(retry.key === null ? null : await store.get(retry.key)).toBe('recovered answer');
  });

  it('times out at the caller deadline and aborts the provider call', async () => {
    const { provider, dispatcher } = setup(() => new Promise<string>(() => undefined));

    const error = await dispatcher
      .dispatch({ rawText: 'Compare sensor types', corpusVersion: 'v1', maxWaitMs: 30 })
      .catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(TimeoutError);
    expect(error).toHaveProperty('message', 'hybrid query timed out after 30ms');
    expect(provider.signals[0]?.aborted).toBe(true);
    expect(provider.signals[0]?.reason).toBe(error);
  });

  it('counts cache lookups against the caller deadline', async () => {
    const { dispatcher } = setup(
      () => sleep(5).then(() => 'too late'),
      {},
      undefined,
      new SlowCache(20),
    );

    const error = await dispatcher
      .dispatch({ rawText: 'Compare sensor types', corpusVersion: 'v1', maxWaitMs: 30 })
      .catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(TimeoutError);
    expect(error).toHaveProperty('message', 'hybrid query timed out after 30ms');
  });

  it('sends the conversation history and keys answers on it', async () => {
    const { provider, dispatcher } = setup(async (_invocation, _signal, call) => `answer ${call}`);
    const history = [
      { role: 'user' as const, content: 'Which sensors ship today?' },
      { role: 'assistant' as const, content: 'Thermal ones.' },
    ];

    const withHistory = await dispatcher.dispatch({ rawText: 'And the others?', corpusVersion: 'v1', history });
    const without = await dispatcher.dispatch({ rawText: 'And the others?', corpusVersion: 'v1' });

    expect(provider.invocations[0]?.history).toEqual(history);
    expect(withHistory.key).not.toBe(without.key);
    expect(without.text).toBe('answer 2');
  });

  it('rejects an empty history turn', async () => {
    const { dispatcher } = setup(async () => 'unused');

    await expect(
      dispatcher.dispatch({
        rawText: 'And the others?',
        corpusVersion: 'v1',
        history: [{ role: 'user', content: ' ' }],
      }),
    ).rejects.toThrow(new InputError('History turn 0 is empty.'));
  });

  it('rejects empty questions and non-positive deadlines before any call', async () => {
    const { provider, dispatcher } = setup(async () => 'unused');

    await expect(dispatcher.dispatch({ rawText: '   ', corpusVersion: 'v1' })).rejects.toBeInstanceOf(InputError);
    await expect(
      dispatcher.dispatch({ rawText: 'Compare sensor types', corpusVersion: 'v1', maxWaitMs: 0 }),
    ).rejects.toThrow('maxWaitMs must be a positive number (got 0).');
    expect(provider.invocations).toHaveLength(0);
  });

  it('puts retrieved excerpts into the prompt', async () => {
    const retriever = new SegmentRetriever([
      { id: 's1', text: 'Sensor types include thermal and optical.', page: 3, source: 'manual.pdf' },
      { id: 's2', text: 'Shipping takes five days.' },
    ]);
    const { provider, dispatcher } = setup(async () => 'Thermal and optical.', {}, retriever);

    await dispatcher.dispatch({ rawText: 'Compare sensor types', corpusVersion: retriever.version });

    expect(provider.invocations[0]?.systemPrompt).toBe('Answer in hybrid mode. Always cite specific document sources.');
    expect(provider.invocations[0]?.prompt).toBe(
      'Document excerpts:\n[manual.pdf, p. 3]\nSensor types include thermal and optical.\n\nQuestion:\nCompare sensor types',
    );
  });
});
