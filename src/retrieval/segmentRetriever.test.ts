import { describe, expect, it } from 'vitest';
import type { TextSegment } from '../types/index.js';
import { SegmentRetriever } from './segmentRetriever.js';

const SEGMENTS: TextSegment[] = [
  { id: 'a', text: 'Thermal sensors measure heat.' },
  { id: 'b', text: 'Optical sensors detect light and thermal glare.' },
  { id: 'c', text: 'Shipping takes five days.' },
];

const signal = new AbortController().signal;

describe('SegmentRetriever', () => {
  it('ranks segments by shared question terms and drops unrelated ones', async () => {
    const retriever = new SegmentRetriever(SEGMENTS);
    const result = await retriever.retrieve('thermal optical sensors', 'local', signal);
    expect(result.map((segment) => segment.id)).toEqual(['b', 'a']);
  });

  it('keeps document order in naive mode', async () => {
    const retriever = new SegmentRetriever(SEGMENTS);
    const result = await retriever.retrieve('thermal optical sensors', 'naive', signal);
    expect(result.map((segment) => segment.id)).toEqual(['a', 'b', 'c']);
  });

  it('skips segments that do not fit the mode budget', async () => {
    const retriever = new SegmentRetriever(SEGMENTS, { budgets: { local: 10 } });
    const result = await retriever.retrieve('thermal optical sensors', 'local', signal);
    expect(result.map((segment) => segment.id)).toEqual(['a']);
  });

  it('returns nothing for bypass', async () => {
    const retriever = new SegmentRetriever(SEGMENTS);
    expect(await retriever.retrieve('thermal optical sensors', 'bypass', signal)).toEqual([]);
  });

  it('derives a version that changes with the corpus', () => {
    const original = new SegmentRetriever(SEGMENTS);
    const same = new SegmentRetriever(SEGMENTS.map((segment) => ({ ...segment })));
    const edited = new SegmentRetriever([...SEGMENTS.slice(0, 2), { id: 'c', text: 'Shipping takes six days.' }]);

    expect(original.version).toHaveLength(16);
    expect(same.version).toBe(original.version);
    expect(edited.version).not.toBe(original.version);
  });

  it('changes the version when only a page, a source or a budget changes', () => {
    const original = new SegmentRetriever(SEGMENTS);
    const paged = new SegmentRetriever(SEGMENTS.map((segment) => ({ ...segment, page: 1 })));
    const sourced = new SegmentRetriever(SEGMENTS.map((segment) => ({ ...segment, source: 'manual.pdf' })));
    const rebudgeted = new SegmentRetriever(SEGMENTS, { budgets: { local: 10 } });

    const versions = new Set([original.version, paged.version, sourced.version, rebudgeted.version]);
    expect(versions.size).toBe(4);
  });

  it('stops when the signal has already aborted', async () => {
    const controller = new AbortController();
    controller.abort(new Error('gone'));
    const retriever = new SegmentRetriever(SEGMENTS);
    await expect(retriever.retrieve('thermal', 'local', controller.signal)).rejects.toThrow('gone');
  });
});
