import type { ChatTurn, QueryMode } from '../types/index.js';
import { checksumFrom } from '../utils/hash.js';
import { collapseWhitespace } from '../utils/text.js';

// Bump when the key layout changes so old entries stop matching.
const FINGERPRINT_VERSION = 2;

export interface FingerprintInput {
  mode: QueryMode;
  rawText: string;
  corpusVersion: string;
  parameters: Readonly<Record<string, unknown>>;
  history?: readonly ChatTurn[] | undefined;
}

/**
 * Whitespace and case are folded only when the provider ignores them too;
 * otherwise two prompts the provider answers differently would share a key.
 */
export interface FingerprintOptions {
  collapseWhitespace?: boolean | undefined;
  caseInsensitive?: boolean | undefined;
}

export function normalizeQuestion(rawText: string, options: FingerprintOptions = {}): string {
  let text = options.collapseWhitespace ? collapseWhitespace(rawText) : rawText.trim();
  if (options.caseInsensitive) {
    text = text.toLowerCase();
  }
  return text;
}

export function fingerprint(input: FingerprintInput, options: FingerprintOptions = {}): string {
  return checksumFrom({
    version: FINGERPRINT_VERSION,
    mode: input.mode,
    text: normalizeQuestion(input.rawText, options),
    corpusVersion: input.corpusVersion,
    parameters: input.parameters,
    history: (input.history ?? []).map((turn) => ({ role: turn.role, content: turn.content })),
  });
}
