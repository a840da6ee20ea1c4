import type { RelayConfig } from '../config/config.js';
import { InputError, TimeoutError } from '../errors.js';
import type { ResponseStore } from '../cache/responseStore.js';
import type { TextProvider } from '../providers/provider.js';
import type { Retriever } from '../retrieval/segmentRetriever.js';
import { callWithRetry } from '../resilience/retry.js';
import { runWithTimeout } from '../resilience/timeout.js';
import type { ChatTurn, DispatchResult, ModelParameters, QueryMode, QueryRequest } from '../types/index.js';
import type { Logger } from '../utils/logger.js';
import { truncate } from '../utils/text.js';
import { fingerprint, normalizeQuestion } from './fingerprint.js';
import { resolveMode, type ModeSelectorOptions } from './modeSelector.js';
import { buildQueryPrompt } from './prompt.js';
import { SingleFlight } from './singleFlight.js';

export interface QueryDispatcherDependencies {
  config: RelayConfig;
  provider: TextProvider;
  store: ResponseStore;
  retriever?: Retriever | undefined;
  modeSelector?: ModeSelectorOptions | undefined;
  logger?: Logger | undefined;
  sleep?: ((ms: number, signal?: AbortSignal) => Promise<void>) | undefined;
}

export interface DispatchOptions {
  signal?: AbortSignal | undefined;
}

interface FlightCall {
  key: string;
  mode: QueryMode;
  question: string;
  parameters: ModelParameters;
  history: readonly ChatTurn[];
  /** The caller's budget, counted from when `dispatch` was entered. */
  maxWaitMs: number;
  startedAt: number;
  signal: AbortSignal;
}

interface FlightOutcome {
  text: string;
  fromCache: boolean;
}

/**
 * Runs one question through mode selection, the response cache and, on a
 * miss, a single shared provider call per cache key guarded by the timeout
 * supervisor and the retry controller. Failures are never cached.
 */
export class QueryDispatcher {
  private readonly flights: SingleFlight<FlightOutcome>;
  private readonly logger: Logger | undefined;

  constructor(private readonly deps: QueryDispatcherDependencies) {
    this.logger = deps.logger;
    this.flights = new SingleFlight<FlightOutcome>({ logger: deps.logger });
  }

  async dispatch(request: QueryRequest, options: DispatchOptions = {}): Promise<DispatchResult> {
    const startedAt = Date.now();
    const { config } = this.deps;

    if (request.rawText.trim().length === 0) {
      throw new InputError('Question text is empty.');
    }
    options.signal?.throwIfAborted();
    const maxWaitMs = this.resolveMaxWait(request.maxWaitMs);

    const mode = resolveMode(request.rawText, request.mode, this.deps.modeSelector);
    this.logger?.(`"${truncate(request.rawText.trim(), 60)}" -> ${mode} mode`);

    if (mode === 'bypass' && config.bypass.strategy === 'canned') {
      return { text: config.bypass.response, mode, key: null, source: 'bypass', elapsedMs: Date.now() - startedAt };
    }

    const question = normalizeQuestion(request.rawText, config.fingerprint);
    const parameters = this.resolveParameters(request.parameters);
    const history = resolveHistory(request.history);
    const corpusVersion = mode === 'bypass' ? 'none' : request.corpusVersion;
    const key = fingerprint(
      {
        mode,
        rawText: question,
        corpusVersion,
        parameters: { ...parameters, provider: this.deps.provider.identity },
        history,
      },
      config.fingerprint,
    );

    const cached = await this.deps.store.get(key);
    if (cached !== null) {
      return { text: cached, mode, key, source: 'cache', elapsedMs: Date.now() - startedAt };
    }

    const remainingMs = Math.max(1, startedAt + maxWaitMs - Date.now());
    const ticket = this.flights.join(
      key,
      (signal) => this.execute({ key, mode, question, parameters, history, maxWaitMs, startedAt, signal }),
      { signal: options.signal, joinTimeoutMs: remainingMs },
    );
    const outcome = await ticket.result;

    let source: DispatchResult['source'] = 'shared';
    if (ticket.isOwner) {
      source = outcome.fromCache ? 'cache' : 'provider';
    }
    return { text: outcome.text, mode, key, source, elapsedMs: Date.now() - startedAt };
  }

  private async execute(call: FlightCall): Promise<FlightOutcome> {
    // A flight for this key may have stored its answer between our lookup and our claim.
    const stored = await this.deps.store.get(call.key);
    if (stored !== null) {
      return { text: stored, fromCache: true };
    }

    const deadline = call.startedAt + call.maxWaitMs;
    let lastError: unknown;

    const text = await this.supervise(call, () => lastError, (signal) =>
      this.answer(call, signal, deadline, (error) => {
        lastError = error;
      }),
    );

    await this.deps.store.put(call.key, text, {
      mode: call.mode,
      provider: this.deps.provider.identity.kind,
      deployment: this.deps.provider.identity.deployment,
    });
    return { text, fromCache: false };
  }

  private async supervise(
    call: FlightCall,
    lastError: () => unknown,
    operation: (signal: AbortSignal) => Promise<string>,
  ): Promise<string> {
    try {
      return await runWithTimeout(operation, call.maxWaitMs, {
        signal: call.signal,
        label: `${call.mode} query`,
        cause: lastError,
        startedAt: call.startedAt,
      });
    } catch (error) {
      if (error instanceof TimeoutError) {
        this.logger?.(`${call.mode} query ${call.key.slice(0, 12)} gave up after ${error.elapsedMs}ms.`);
      }
      throw error;
    }
  }

  private async answer(
    call: FlightCall,
    signal: AbortSignal,
    deadline: number,
    onRetry: (error: unknown) => void,
  ): Promise<string> {
    const { retry } = this.deps.config;
    const context =
      this.deps.retriever && call.mode !== 'bypass'
        ? await this.deps.retriever.retrieve(call.question, call.mode, signal)
        : [];
    const prompt = buildQueryPrompt(call.question, call.mode, context);

    return callWithRetry(
      (attemptSignal) =>
        this.deps.provider.invokeText({ ...prompt, history: call.history, parameters: call.parameters }, attemptSignal),
      {
        baseDelayMs: retry.baseDelayMs,
        maxDelayMs: retry.maxDelayMs,
        attemptTimeoutMs: retry.attemptTimeoutMs,
        deadline,
      },
      {
        signal,
        label: `${this.deps.provider.identity.kind} ${call.mode} query`,
        logger: this.logger,
        sleep: this.deps.sleep,
        onRetry: (event) => onRetry(event.error),
      },
    );
  }

  private resolveParameters(requested: QueryRequest['parameters']): ModelParameters {
    const defaults = this.deps.config.model;
    return {
      temperature: requested?.temperature ?? defaults.temperature,
      maxTokens: requested?.maxTokens ?? defaults.maxTokens,
      topP: requested?.topP ?? defaults.topP,
    };
  }

  private resolveMaxWait(requested: number | undefined): number {
    const { defaultMs, maxMs } = this.deps.config.timeouts;
    if (requested === undefined) {
      return defaultMs;
    }
    if (!Number.isFinite(requested) || requested <= 0) {
      throw new InputError(`maxWaitMs must be a positive number (got ${requested}).`);
    }
    return Math.min(requested, maxMs);
  }
}

function resolveHistory(history: QueryRequest['history']): readonly ChatTurn[] {
  const turns = history ?? [];
  turns.forEach((turn, index) => {
    if (turn.content.trim().length === 0) {
      throw new InputError(`History turn ${index} is empty.`);
    }
  });
  return turns;
}
