export const QUERY_MODES = ['bypass', 'local', 'global', 'hybrid', 'naive'] as const;

export type QueryMode = (typeof QUERY_MODES)[number];

export interface ModelParameters {
  temperature: number;
  maxTokens: number;
  topP: number;
}

/** An earlier exchange in the conversation, sent ahead of the question. */
export interface ChatTurn {
  role: 'user' | 'assistant';
  content: string;
}

export interface QueryRequest {
  readonly rawText: string;
  /** Pins the mode. Left out, the mode selector decides. */
  readonly mode?: QueryMode | undefined;
  readonly corpusVersion: string;
  readonly maxWaitMs?: number | undefined;
  readonly parameters?: Readonly<Partial<ModelParameters>> | undefined;
  readonly history?: readonly ChatTurn[] | undefined;
}

/**
 * Where a dispatched answer came from. `shared` means the caller joined a call
 * that another caller had already started for the same key.
 */
export type ResponseSource = 'cache' | 'provider' | 'shared' | 'bypass';

export interface DispatchResult {
  text: string;
  mode: QueryMode;
  key: string | null;
  source: ResponseSource;
  elapsedMs: number;
}

/** One structured text record emitted by the document layout pipeline. */
export interface TextSegment {
  id: string;
  text: string;
  page?: number | undefined;
  source?: string | undefined;
}

export function isQueryMode(value: string): value is QueryMode {
  return (QUERY_MODES as readonly string[]).includes(value);
}
