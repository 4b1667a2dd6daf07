/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { KeywordDomain, QueryFeatures, QueryType } from '../interfaces/orchestration.js';

// First matching rule wins.
const TYPE_RULES: ReadonlyArray<[QueryType, string[]]> = [
  ['explanation', ['what', 'explain', 'define']],
  ['how-to', ['how', 'implement', 'create']],
  ['analysis', ['analyze', 'sentiment', 'trend']],
  ['research', ['research', 'find', 'papers']],
];

// Alphabetical, so extracted keyword lists come out sorted.
const KEYWORD_DOMAINS: ReadonlyArray<[KeywordDomain, string[]]> = [
  ['ai', ['ai', 'artificial intelligence', 'machine learning', 'deep learning', 'neural']],
  ['analysis', ['analyze', 'sentiment', 'trend', 'pattern', 'data']],
  ['news', ['news', 'recent', 'latest', 'current', 'update']],
  ['science', ['research', 'study', 'scientific', 'academic', 'paper']],
  ['technical', ['how', 'technical', 'implement', 'code', 'algorithm']],
];

const SIMILARITY_WEIGHTS = { type: 0.4, keywords: 0.4, question: 0.2 } as const;

function escapeRegExp(term: string): string {
  return term.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Whole-word (or whole-phrase) match, case-insensitive. */
export function mentions(text: string, term: string): boolean {
  return new RegExp(`\\b${escapeRegExp(term)}\\b`, 'i').test(text);
}

export function classifyQuery(query: string): QueryType {
  for (const [type, terms] of TYPE_RULES) {
    if (terms.some((term) => mentions(query, term))) return type;
  }
  return 'general';
}

export function extractQueryFeatures(query: string): QueryFeatures {
  const keywords = KEYWORD_DOMAINS.filter(([, terms]) => terms.some((term) => mentions(query, term))).map(
    ([domain]) => domain,
  );
  const words = query.trim().split(/\s+/).filter((word) => word.length > 0);
  return {
    type: classifyQuery(query),
    keywords,
    hasQuestion: query.includes('?'),
    length: words.length,
  };
}

/** |a ∩ b| / |a ∪ b|, or 0 when either set is empty. */
export function jaccard<T>(a: readonly T[], b: readonly T[]): number {
  if (a.length === 0 || b.length === 0) return 0;
  const left = new Set(a);
  const right = new Set(b);
  let shared = 0;
  for (const item of left) {
    if (right.has(item)) shared++;
  }
  return shared / (left.size + right.size - shared);
}

export function featureSimilarity(a: QueryFeatures, b: QueryFeatures): number {
  const score =
    SIMILARITY_WEIGHTS.type * (a.type === b.type ? 1 : 0) +
    SIMILARITY_WEIGHTS.keywords * jaccard(a.keywords, b.keywords) +
    SIMILARITY_WEIGHTS.question * (a.hasQuestion === b.hasQuestion ? 1 : 0);
  return Math.round(score * 10_000) / 10_000;
}
