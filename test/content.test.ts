import { describe, expect, it } from 'vitest';

import {
  createBlobContent,
  createImageContent,
  createTextContent,
  isContentItem,
  normalizeContent,
  normalizePromptMessages
} from '../src/core/content';

describe('normalizeContent', () => {
  it('turns scalars into a single text item', () => {
    expect(normalizeContent('hello')).toEqual([{ type: 'text', text: 'hello' }]);
    expect(normalizeContent(5)).toEqual([{ type: 'text', text: '5' }]);
    expect(normalizeContent(false)).toEqual([{ type: 'text', text: 'false' }]);
  });

  it('returns nothing for undefined and for an empty list', () => {
    expect(normalizeContent(undefined)).toEqual([]);
    expect(normalizeContent([])).toEqual([]);
  });

  it('passes content items through', () => {
    const image = createImageContent('aGk=');
    const blob = createBlobContent('AAE=', 'application/octet-stream');
    expect(normalizeContent(image)).toEqual([image]);
    expect(normalizeContent([createTextContent('a'), blob])).toEqual([{ type: 'text', text: 'a' }, blob]);
  });

  it('renders other values as JSON text', () => {
    expect(normalizeContent({ sum: 3 })).toEqual([{ type: 'text', text: '{"sum":3}' }]);
    expect(normalizeContent(null)).toEqual([{ type: 'text', text: 'null' }]);
    expect(normalizeContent([1, 2])).toEqual([{ type: 'text', text: '[1,2]' }]);
  });
});

describe('isContentItem', () => {
  it('requires the fields of each variant', () => {
    expect(isContentItem({ type: 'text', text: 'x' })).toBe(true);
    expect(isContentItem({ type: 'image', data: 'x' })).toBe(false);
    expect(isContentItem({ type: 'audio', data: 'x', mimeType: 'audio/wav' })).toBe(false);
  });
});

describe('normalizePromptMessages', () => {
  it('wraps a string in one user message', () => {
    expect(normalizePromptMessages('Summarize this')).toEqual([
      { role: 'user', content: { type: 'text', text: 'Summarize this' } }
    ]);
  });

  it('normalizes the content of role entries', () => {
    expect(
      normalizePromptMessages([
        { role: 'assistant', content: 'Sure' },
        { role: 'user', content: { type: 'text', text: 'Go on' } }
      ])
    ).toEqual([
      { role: 'assistant', content: { type: 'text', text: 'Sure' } },
      { role: 'user', content: { type: 'text', text: 'Go on' } }
    ]);
  });

  it('returns no messages for null', () => {
    expect(normalizePromptMessages(null)).toEqual([]);
  });
});
