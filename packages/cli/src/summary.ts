/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { ExecutionRecord, OrchestratorOutput, PlanHistoryEntry } from '@duelplan/core';

function stepChain(entry: PlanHistoryEntry): string {
  return entry.plan.steps.map((step) => step.tool).join(' -> ') || '(no steps)';
}

function verdict(entry: PlanHistoryEntry): string {
  if (entry.stalled) return 'stalled';
  return entry.approved ? 'approved' : 'rejected';
}

function recordLine(record: ExecutionRecord): string {
  const head = `${record.step}. ${record.tool}`;
  return record.status === 'success'
    ? `${head}: ok (retries ${record.retryCount})`
    : `${head}: failed (retries ${record.retryCount}): ${record.error}`;
}

function headline(output: OrchestratorOutput): string {
  const approval = output.approved ? 'approved' : 'not approved';
  const iterations = output.iterations === 1 ? '1 iteration' : `${output.iterations} iterations`;
  return `${output.status} (score ${output.finalScore}/100, ${approval}, ${iterations})`;
}

/** Plain-text report of one run for the terminal. */
export function formatSummary(output: OrchestratorOutput): string {
  const lines = [`Query: ${output.query}`, `Status: ${headline(output)}`];
  if (output.patternMatched) {
    const { query, similarity } = output.patternMatched;
    lines.push(`Pattern: reused "${query}" (similarity ${similarity.toFixed(2)})`);
  }

  if (output.planHistory.length > 0) {
    lines.push('', 'Plan evolution:');
    for (const entry of output.planHistory) {
      lines.push(`  v${entry.iteration} ${verdict(entry)}, score ${entry.score}: ${stepChain(entry)}`);
      lines.push(...entry.issues.map((issue) => `      - ${issue}`));
    }
  }

  if (output.executionRecords.length > 0) {
    lines.push('', 'Execution:');
    lines.push(...output.executionRecords.map((record) => `  ${recordLine(record)}`));
    lines.push(`Self-correction: ${output.selfCorrectionUsed ? 'used' : 'not needed'}`);
    lines.push(`Pattern stored: ${output.patternStored ? 'yes' : 'no'}`);
  }

  if (output.warnings.length > 0) {
    lines.push('', 'Warnings:', ...output.warnings.map((warning) => `  - ${warning}`));
  }
  if (output.error) {
    lines.push('', `Error: ${output.error.code}: ${output.error.message}`);
  }
  if (output.finalAnswer) {
    lines.push('', 'Answer:', output.finalAnswer);
  }
  lines.push('', `Finished in ${output.durationMs}ms`);
  return lines.join('\n');
}

function cell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\s*\n\s*/g, ' ');
}

/** Markdown report written by `--out`. */
export function formatMarkdown(output: OrchestratorOutput): string {
  const lines = [
    '# duelplan report',
    '',
    `**Query:** ${output.query}`,
    '',
    `**Status:** ${headline(output)}`,
  ];

  if (output.planHistory.length > 0) {
    lines.push('', '## Plan evolution', '', '| Version | Verdict | Score | Steps | Issues |', '| --- | --- | --- | --- | --- |');
    for (const entry of output.planHistory) {
      lines.push(
        `| ${entry.iteration} | ${verdict(entry)} | ${entry.score} | ${cell(stepChain(entry))} | ${cell(entry.issues.join('; '))} |`,
      );
    }
  }

  if (output.executionRecords.length > 0) {
    lines.push('', '## Execution', '', '| Step | Tool | Status | Retries | Error |', '| --- | --- | --- | --- | --- |');
    for (const record of output.executionRecords) {
      const error = record.status === 'error' ? cell(record.error) : '';
      lines.push(`| ${record.step} | ${record.tool} | ${record.status} | ${record.retryCount} | ${error} |`);
    }
  }

  if (output.warnings.length > 0) {
    lines.push('', '## Warnings', '', ...output.warnings.map((warning) => `- ${warning}`));
  }
  if (output.error) {
    lines.push('', '## Error', '', `\`${output.error.code}\`: ${output.error.message}`);
  }
  if (output.finalAnswer) {
    lines.push('', '## Answer', '', output.finalAnswer);
  }
  return `${lines.join('\n')}\n`;
}
