/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import {
  CONTEXT_DELIMITER,
  augmentInput,
  buildContextBlock,
  parseContextSections,
  splitContext,
} from './context.js';

describe('context blocks', () => {
  it('labels outputs and drops ones too short to help', () => {
    const block = buildContextBlock([
      { tool: 'wikipedia_search', text: 'Topic: a long enough summary.' },
      { tool: 'news_fetcher', text: 'short' },
      { tool: 'arxiv_summarizer', text: '  Paper A: findings about the topic.  ' },
    ]);

    expect(block).toBe(
      '[wikipedia_search]: Topic: a long enough summary.\n\n[arxiv_summarizer]: Paper A: findings about the topic.',
    );
  });

  it('appends the block after the fixed delimiter', () => {
    expect(augmentInput('What is AI?', '[wikipedia_search]: AI is a field.')).toBe(
      `What is AI?${CONTEXT_DELIMITER}[wikipedia_search]: AI is a field.`,
    );
  });

  it('leaves the input untouched when there is no context', () => {
    expect(augmentInput('What is AI?', '')).toBe('What is AI?');
  });

  it('splits an augmented input back into question and context', () => {
    const augmented = augmentInput('What is AI?', '[wikipedia_search]: AI is a field.');

    expect(splitContext(augmented)).toEqual({
      question: 'What is AI?',
      context: '[wikipedia_search]: AI is a field.',
    });
    expect(splitContext('plain question')).toEqual({ question: 'plain question', context: '' });
  });

  it('parses labelled sections, keeping multi-line bodies together', () => {
    const context = '[wikipedia_search]: Line one.\nLine two.\n\n[news_fetcher]: Headline today.';

    expect(parseContextSections(context)).toEqual([
      { tool: 'wikipedia_search', text: 'Line one.\nLine two.' },
      { tool: 'news_fetcher', text: 'Headline today.' },
    ]);
  });
});
