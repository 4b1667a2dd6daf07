/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import { formatMarkdown, formatSummary } from './summary.js';
import { QUERY, sampleOutput } from './utils/testOutput.js';

describe('formatSummary', () => {
  it('reports loop evolution, execution and the answer', () => {
    expect(formatSummary(sampleOutput())).toBe(
      [
        `Query: ${QUERY}`,
        'Status: completed_with_issues (score 85/100, approved, 2 iterations)',
        '',
        'Plan evolution:',
        '  v1 rejected, score 55: qa_engine',
        '      - Plan lacks a general-knowledge source',
        '  v2 approved, score 85: wikipedia_search -> news_fetcher -> qa_engine',
        '',
        'Execution:',
        '  1. wikipedia_search: ok (retries 1)',
        '  2. news_fetcher: failed (retries 1): quota exceeded',
        '  3. qa_engine: ok (retries 1)',
        'Self-correction: used',
        'Pattern stored: no',
        '',
        'Warnings:',
        '  - model planning unavailable (timeout: Operation timeout after 30000ms); using rule-based planning',
        '',
        'Answer:',
        'AI supports triage and imaging.',
        '',
        'Degraded sections:',
        '- news_fetcher: quota exceeded',
        '',
        'Finished in 1234ms',
      ].join('\n'),
    );
  });

  it('reports a rejected run with a stalled revision', () => {
    const base = sampleOutput();
    const plan = { query: QUERY, revision: 0, steps: base.executedPlan.filter((s) => s.tool !== 'news_fetcher') };
    const output = sampleOutput({
      status: 'rejected',
      finalAnswer: '',
      planHistory: [
        { iteration: 1, plan, score: 40, approved: false, issues: [] },
        { iteration: 2, plan: { ...plan, revision: 1 }, score: 40, approved: false, issues: [], stalled: true },
      ],
      executionRecords: [],
      executedPlan: [],
      selfCorrectionUsed: false,
      iterations: 1,
      finalScore: 40,
      approved: false,
      warnings: [],
      patternMatched: { id: 'pattern-1', query: 'Explain AI in medicine', similarity: 0.8333 },
      error: { code: 'PLAN_REJECTED', message: 'Plan scored 40, below the rejection threshold of 50' },
      durationMs: 12,
    });

    expect(formatSummary(output)).toBe(
      [
        `Query: ${QUERY}`,
        'Status: rejected (score 40/100, not approved, 1 iteration)',
        'Pattern: reused "Explain AI in medicine" (similarity 0.83)',
        '',
        'Plan evolution:',
        '  v1 rejected, score 40: wikipedia_search -> qa_engine',
        '  v2 stalled, score 40: wikipedia_search -> qa_engine',
        '',
        'Error: PLAN_REJECTED: Plan scored 40, below the rejection threshold of 50',
        '',
        'Finished in 12ms',
      ].join('\n'),
    );
  });
});

describe('formatMarkdown', () => {
  it('renders the plan history and execution as tables', () => {
    const lines = formatMarkdown(sampleOutput()).split('\n');

    expect(lines[0]).toBe('# duelplan report');
    expect(lines).toContain(`**Query:** ${QUERY}`);
    expect(lines).toContain('| 1 | rejected | 55 | qa_engine | Plan lacks a general-knowledge source |');
    expect(lines).toContain('| 2 | approved | 85 | wikipedia_search -> news_fetcher -> qa_engine |  |');
    expect(lines).toContain('| 2 | news_fetcher | error | 1 | quota exceeded |');
    expect(lines).toContain('| 3 | qa_engine | success | 1 |  |');
    expect(lines.slice(-5)).toEqual(['AI supports triage and imaging.', '', 'Degraded sections:', '- news_fetcher: quota exceeded', '']);
  });

  it('keeps table cells on one line', () => {
    const markdown = formatMarkdown(
      sampleOutput({
        executionRecords: [
          {
            step: 2,
            tool: 'news_fetcher',
            input: QUERY,
            status: 'error',
            error: 'HTTP 503\n  retry later | gave up',
            retryCount: 1,
            durationMs: 3,
          },
        ],
      }),
    );

    expect(markdown.split('\n')).toContain('| 2 | news_fetcher | error | 1 | HTTP 503 retry later \\| gave up |');
  });

  it('lists the error of a run that never executed', () => {
    const markdown = formatMarkdown(
      sampleOutput({
        status: 'error',
        planHistory: [],
        executionRecords: [],
        warnings: [],
        finalAnswer: '',
        error: { code: 'INVALID_QUERY', message: 'Query must be a non-empty string' },
      }),
    );

    expect(markdown).toBe(
      [
        '# duelplan report',
        '',
        `**Query:** ${QUERY}`,
        '',
        '**Status:** error (score 85/100, approved, 2 iterations)',
        '',
        '## Error',
        '',
        '`INVALID_QUERY`: Query must be a non-empty string',
        '',
      ].join('\n'),
    );
  });
});
