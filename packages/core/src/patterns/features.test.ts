/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import { classifyQuery, extractQueryFeatures, featureSimilarity, jaccard } from './features.js';

describe('extractQueryFeatures', () => {
  it('extracts type, keyword domains, question flag and word count', () => {
    expect(extractQueryFeatures('Explain AI in healthcare')).toEqual({
      type: 'explanation',
      keywords: ['ai'],
      hasQuestion: false,
      length: 4,
    });
  });

  it('returns keyword domains sorted and de-duplicated', () => {
    expect(extractQueryFeatures('Find the latest research papers on neural networks and their data').keywords).toEqual(
      ['ai', 'analysis', 'news', 'science'],
    );
  });

  it('flags questions', () => {
    const features = extractQueryFeatures('How do transformers implement attention?');
    expect(features.hasQuestion).toBe(true);
    expect(features.type).toBe('how-to');
  });

  it('matches whole words only', () => {
    expect(classifyQuery('Show me the trends')).toBe('general');
    expect(extractQueryFeatures('Said the maintainer').keywords).toEqual([]);
  });

  it('applies type rules in order', () => {
    expect(classifyQuery('What trend explains the papers?')).toBe('explanation');
    expect(classifyQuery('Analyze sentiment around the launch')).toBe('analysis');
    expect(classifyQuery('Research battery chemistry')).toBe('research');
    expect(classifyQuery('Tell me a story')).toBe('general');
  });

  it('counts zero words for blank input', () => {
    expect(extractQueryFeatures('   ').length).toBe(0);
  });
});

describe('jaccard', () => {
  it('is 0 when either side is empty', () => {
    expect(jaccard([], [])).toBe(0);
    expect(jaccard(['ai'], [])).toBe(0);
  });

  it('divides the intersection by the union', () => {
    expect(jaccard(['ai', 'news'], ['ai', 'science', 'news'])).toBeCloseTo(2 / 3);
  });
});

describe('featureSimilarity', () => {
  it('weights type, keywords and question form 0.4 / 0.4 / 0.2', () => {
    const a = extractQueryFeatures('Explain AI in healthcare');
    const b = extractQueryFeatures('Explain machine learning in medicine');
    const c = extractQueryFeatures('What is the latest AI news?');

    expect(featureSimilarity(a, b)).toBe(1);
    // same type, keywords {ai} vs {ai, news}, question flag differs
    expect(featureSimilarity(a, c)).toBe(0.6);
  });

  it('gives type and question credit even without keywords', () => {
    const a = extractQueryFeatures('Tell me a story');
    const b = extractQueryFeatures('Sing me a song');

    expect(featureSimilarity(a, b)).toBe(0.6);
  });
});
