/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { randomUUID } from 'node:crypto';
import type { Pattern, PatternMatch, PlanSnapshot } from '../interfaces/orchestration.js';
import { extractQueryFeatures, featureSimilarity } from './features.js';

export const DEFAULT_MATCH_LIMIT = 5;

/**
 * Append-only memory of plans that worked. Entries are never mutated or
 * evicted.
 */
export interface PatternStore {
  store(query: string, plan: PlanSnapshot, score: number): Promise<Pattern>;
  /** Best matches first; equal similarity resolves to the newer pattern. */
  findSimilar(query: string, limit?: number): Promise<PatternMatch[]>;
  all(): Promise<Pattern[]>;
}

export function createPattern(
  query: string,
  plan: PlanSnapshot,
  score: number,
  now: Date = new Date(),
): Pattern {
  return {
    id: randomUUID(),
    query,
    queryFeatures: extractQueryFeatures(query),
    plan: {
      query: plan.query,
      steps: plan.steps.map((step) => ({ ...step })),
      revision: plan.revision,
    },
    score,
    timestamp: now.toISOString(),
  };
}

/** `patterns` in insertion order. */
export function rankPatterns(
  patterns: readonly Pattern[],
  query: string,
  limit: number = DEFAULT_MATCH_LIMIT,
): PatternMatch[] {
  const features = extractQueryFeatures(query);
  return patterns
    .map((pattern, order) => ({ pattern, order, similarity: featureSimilarity(features, pattern.queryFeatures) }))
    .sort((a, b) => b.similarity - a.similarity || b.order - a.order)
    .slice(0, Math.max(0, limit))
    .map(({ pattern, similarity }) => ({ pattern, similarity }));
}

export class InMemoryPatternStore implements PatternStore {
  private readonly patterns: Pattern[] = [];

  constructor(seed: readonly Pattern[] = []) {
    this.patterns.push(...seed);
  }

  async store(query: string, plan: PlanSnapshot, score: number): Promise<Pattern> {
    const pattern = createPattern(query, plan, score);
    this.patterns.push(pattern);
    return pattern;
  }

  async findSimilar(query: string, limit?: number): Promise<PatternMatch[]> {
    return rankPatterns(this.patterns, query, limit);
  }

  async all(): Promise<Pattern[]> {
    return [...this.patterns];
  }
}
