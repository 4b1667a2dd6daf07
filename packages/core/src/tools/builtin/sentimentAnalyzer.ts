/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { readFileSync } from 'node:fs';
import { splitContext } from '../../coordination/context.js';
import { isRecord, stringArray } from '../../utils/guards.js';
import { requireAsset } from '../../utils/packageAssets.js';
import type { ToolHandler } from '../tools.js';

export interface SentimentLexicon {
  positive: string[];
  negative: string[];
  negators: string[];
}

export interface SentimentScore {
  label: 'positive' | 'negative' | 'neutral';
  /** (positive - negative) / matched terms, in [-1, 1] */
  score: number;
  positive: number;
  negative: number;
  words: number;
}

const NEUTRAL_BAND = 0.2;

export function loadSentimentLexicon(path = requireAsset('tools', 'builtin', 'sentiment-lexicon.json')): SentimentLexicon {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf8'));
  if (!isRecord(raw)) {
    throw new Error(`Sentiment lexicon ${path} is not an object`);
  }
  return {
    positive: stringArray(raw.positive),
    negative: stringArray(raw.negative),
    negators: stringArray(raw.negators),
  };
}

/** Lexicon scoring; a negator directly before a term flips it. */
export function scoreSentiment(text: string, lexicon: SentimentLexicon): SentimentScore {
  const positive = new Set(lexicon.positive);
  const negative = new Set(lexicon.negative);
  const negators = new Set(lexicon.negators);
  const tokens = text.toLowerCase().match(/[a-z']+/g) ?? [];

  let pos = 0;
  let neg = 0;
  tokens.forEach((token, i) => {
    const polarity = positive.has(token) ? 1 : negative.has(token) ? -1 : 0;
    if (polarity === 0) return;
    const flipped = i > 0 && negators.has(tokens[i - 1]) ? -polarity : polarity;
    if (flipped > 0) pos++;
    else neg++;
  });

  const matched = pos + neg;
  const score = matched === 0 ? 0 : Math.round(((pos - neg) / matched) * 100) / 100;
  const label = score > NEUTRAL_BAND ? 'positive' : score < -NEUTRAL_BAND ? 'negative' : 'neutral';
  return { label, score, positive: pos, negative: neg, words: tokens.length };
}

/** Scores the gathered context, or the step's own input when there is none. */
export function createSentimentAnalyzer(lexicon: SentimentLexicon = loadSentimentLexicon()): ToolHandler {
  return async (input) => {
    const { question, context } = splitContext(input);
    const text = context.trim() || question.trim();
    if (!text) {
      throw new Error('sentiment_analyzer received no text');
    }
    const result = scoreSentiment(text, lexicon);
    return (
      `Sentiment: ${result.label} (score ${result.score.toFixed(2)}; ` +
      `${result.positive} positive, ${result.negative} negative terms in ${result.words} words)`
    );
  };
}
