import type { QueryMode, TextSegment } from '../types/index.js';

export interface QueryPrompt {
  systemPrompt: string;
  prompt: string;
}

export function buildQueryPrompt(question: string, mode: QueryMode, context: readonly TextSegment[]): QueryPrompt {
  if (mode === 'bypass') {
    return {
      systemPrompt: 'Reply briefly and conversationally. Do not invent document content.',
      prompt: question,
    };
  }

  const systemPrompt = `Answer in ${mode} mode. Always cite specific document sources.`;
  if (context.length === 0) {
    return {
      systemPrompt,
      prompt: `No document excerpts matched this question. Say so if you cannot answer.\n\nQuestion:\n${question}`,
    };
  }

  const excerpts = context.map((segment) => `[${describeSource(segment)}]\n${segment.text}`).join('\n\n');
  return {
    systemPrompt,
    prompt: `Document excerpts:\n${excerpts}\n\nQuestion:\n${question}`,
  };
}

function describeSource(segment: TextSegment): string {
  const parts = [segment.source ?? segment.id];
  if (segment.page !== undefined) {
    parts.push(`p. ${segment.page}`);
  }
  return parts.join(', ');
}
