/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { OrchestratorOutput, PlanStep } from '@duelplan/core';

export const QUERY = 'Explain AI in healthcare';

function step(tool: string): PlanStep {
  return { tool, purpose: `Run ${tool} on the query`, input: QUERY };
}

/** A run that needed one revision and one self-correction pass */
export function sampleOutput(overrides: Partial<OrchestratorOutput> = {}): OrchestratorOutput {
  const revised = [step('wikipedia_search'), step('news_fetcher'), step('qa_engine')];
  return {
    sessionId: '00000000-0000-4000-8000-000000000001',
    query: QUERY,
    status: 'completed_with_issues',
    finalAnswer: 'AI supports triage and imaging.\n\nDegraded sections:\n- news_fetcher: quota exceeded',
    planHistory: [
      {
        iteration: 1,
        plan: { query: QUERY, revision: 0, steps: [step('qa_engine')] },
        score: 55,
        approved: false,
        issues: ['Plan lacks a general-knowledge source'],
      },
      { iteration: 2, plan: { query: QUERY, revision: 1, steps: revised }, score: 85, approved: true, issues: [] },
    ],
    executionRecords: [
      { step: 1, tool: 'wikipedia_search', input: QUERY, status: 'success', output: 'AI reads scans.', retryCount: 1, durationMs: 4 },
      { step: 2, tool: 'news_fetcher', input: QUERY, status: 'error', error: 'quota exceeded', retryCount: 1, durationMs: 2 },
      { step: 3, tool: 'qa_engine', input: QUERY, status: 'success', output: 'AI supports triage and imaging.', retryCount: 1, durationMs: 6 },
    ],
    executedPlan: revised,
    selfCorrectionUsed: true,
    patternStored: false,
    iterations: 2,
    finalScore: 85,
    approved: true,
    warnings: ['model planning unavailable (timeout: Operation timeout after 30000ms); using rule-based planning'],
    durationMs: 1234,
    ...overrides,
  };
}
