import { describe, expect, it } from 'vitest';
import { jot, parseJson } from './jot.js';

const segment = jot.object({
  id: jot.string({ nonEmpty: true }),
  text: jot.string(),
  page: jot.optional(jot.number({ integer: true })),
});

describe('jot', () => {
  it('parses a matching value and drops unknown keys', () => {
    expect(segment.parse({ id: 's1', text: 'Body', page: 2, extra: true })).toEqual({ id: 's1', text: 'Body', page: 2 });
  });

  it('treats null as an absent optional value', () => {
    expect(segment.parse({ id: 's1', text: 'Body', page: null }).page).toBeUndefined();
  });

  it('names the failing path', () => {
    const list = jot.array(segment);
    expect(() => list.parse([{ id: 's1', text: 'ok' }, { id: '', text: 'x' }], 'segments')).toThrow(
      'segments[1].id must not be empty',
    );
    expect(() => list.parse([{ id: 's1', text: 'ok', page: 1.5 }], 'segments')).toThrow(
      'segments[0].page must be an integer',
    );
  });
});

describe('parseJson', () => {
  it('reports malformed JSON with its label', () => {
    expect(() => parseJson(jot.array(jot.string()), '[oops', 'questions')).toThrow(/^questions is not valid JSON: /);
  });

  it('validates parsed JSON against the schema', () => {
    expect(parseJson(jot.array(jot.string({ nonEmpty: true })), '["a", "b"]', 'questions')).toEqual(['a', 'b']);
    expect(() => parseJson(jot.array(jot.string()), '{"a": 1}', 'questions')).toThrow('questions must be an array');
  });
});
