import type { QueryMode, TextSegment } from '../types/index.js';
import { checksumFrom } from '../utils/hash.js';
import { approximateTokenCount, tokenize } from '../utils/text.js';

export interface Retriever {
  /** Opaque token that changes whenever the underlying corpus changes. */
  readonly version: string;
  retrieve(question: string, mode: QueryMode, signal: AbortSignal): Promise<TextSegment[]>;
}

export const MODE_TOKEN_BUDGETS: Readonly<Record<QueryMode, number>> = {
  bypass: 0,
  local: 1500,
  hybrid: 3000,
  global: 6000,
  naive: 3000,
};

export interface SegmentRetrieverOptions {
  budgets?: Partial<Record<QueryMode, number>> | undefined;
}

/**
 * Serves context from segments already extracted by the layout pipeline.
 * `naive` keeps document order; every other mode ranks segments by how many
 * question terms they share, then fills the mode's token budget.
 */
export class SegmentRetriever implements Retriever {
  readonly version: string;
  private readonly budgets: Record<QueryMode, number>;

  constructor(private readonly segments: readonly TextSegment[], options: SegmentRetrieverOptions = {}) {
    this.budgets = { ...MODE_TOKEN_BUDGETS, ...options.budgets };
    // Covers everything that reaches the prompt, so answers keyed on it never outlive an edit.
    this.version = checksumFrom({ segments, budgets: this.budgets }).slice(0, 16);
  }

  async retrieve(question: string, mode: QueryMode, signal: AbortSignal): Promise<TextSegment[]> {
    signal.throwIfAborted();
    const budget = this.budgets[mode];
    if (budget <= 0 || this.segments.length === 0) {
      return [];
    }

    const ordered = mode === 'naive' ? [...this.segments] : this.rank(question);
    const selected: TextSegment[] = [];
    let used = 0;
    for (const segment of ordered) {
      const cost = approximateTokenCount(segment.text);
      if (used + cost > budget) {
        continue;
      }
      selected.push(segment);
      used += cost;
    }
    return selected;
  }

  private rank(question: string): TextSegment[] {
    const terms = new Set(tokenize(question).filter((term) => term.length > 2));
    const scored = this.segments.map((segment, position) => {
      let score = 0;
      for (const word of new Set(tokenize(segment.text))) {
        if (terms.has(word)) {
          score += 1;
        }
      }
      return { segment, score, position };
    });
    return scored
      .filter((entry) => entry.score > 0)
      .sort((a, b) => b.score - a.score || a.position - b.position)
      .map((entry) => entry.segment);
  }
}
