import { InputError } from '../errors.js';
import type { QueryMode } from '../types/index.js';
import { tokenize } from '../utils/text.js';

export const CONVERSATIONAL_MARKERS: readonly string[] = ['hello', 'hi', 'hey', 'test', 'ping', 'thanks', 'thank you'];

export interface ModeSelectorOptions {
  markers?: readonly string[] | undefined;
  /** Text shorter than this (after normalization) is answered without retrieval. */
  minQuestionLength?: number | undefined;
  /** Short texts up to this many words are treated as conversational when they contain a marker. */
  shortTextWords?: number | undefined;
  defaultMode?: QueryMode | undefined;
}

/**
 * Picks the execution mode for a question.
 *
 * Greetings, explicit test markers and very short strings are routed to
 * `bypass`. Short text that merely contains a marker ("test results?") is
 * ambiguous and also goes to `bypass`: the selector favours speed over
 * completeness there. Callers who need retrieval for such text should pin a
 * mode instead.
 */
export function selectMode(rawText: string, options: ModeSelectorOptions = {}): QueryMode {
  const markers = options.markers ?? CONVERSATIONAL_MARKERS;
  const minQuestionLength = options.minQuestionLength ?? 3;
  const shortTextWords = options.shortTextWords ?? 3;

  const words = tokenize(requireText(rawText));
  const normalized = words.join(' ');

  if (normalized.length < minQuestionLength) {
    return 'bypass';
  }
  if (markers.includes(normalized)) {
    return 'bypass';
  }
  if (words.length <= shortTextWords && words.some((word) => markers.includes(word))) {
    return 'bypass';
  }

  return options.defaultMode ?? 'hybrid';
}

export function resolveMode(rawText: string, pinned?: QueryMode, options: ModeSelectorOptions = {}): QueryMode {
  if (pinned) {
    requireText(rawText);
    return pinned;
  }
  return selectMode(rawText, options);
}

function requireText(rawText: string): string {
  if (rawText.trim().length === 0) {
    throw new InputError('Question text is empty.');
  }
  return rawText;
}
