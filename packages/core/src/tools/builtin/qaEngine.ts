/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { parseContextSections, splitContext } from '../../coordination/context.js';
import { callModel, type ModelClient } from '../../core/modelClient.js';
import { duelLog } from '../../utils/duelLogger.js';
import type { ToolHandler } from '../tools.js';
import { truncate } from './http.js';

const QA_SYSTEM_PROMPT =
  'You answer questions using only the labelled context sections provided. ' +
  'Cite the source tool in brackets when you use a section. If the context does not cover part of the question, say so plainly.';

const MAX_SECTION_CHARS = 600;

/** Stitches the gathered sections into an answer when no model can write one. */
export function extractiveAnswer(question: string, context: string): string {
  const sections = parseContextSections(context);
  if (sections.length === 0) {
    throw new Error('qa_engine has no gathered context to answer from');
  }
  const body = sections.map((section) => `- ${section.tool}: ${truncate(section.text, MAX_SECTION_CHARS)}`);
  return `Answer to "${question.trim()}" compiled from ${sections.length} source(s):\n\n${body.join('\n')}`;
}

export function createQaEngine(model: ModelClient | undefined, timeoutMs: number): ToolHandler {
  return async (input) => {
    const { question, context } = splitContext(input);
    const outcome = await callModel(
      model,
      {
        system: QA_SYSTEM_PROMPT,
        prompt: `Question: ${question.trim()}\n\nContext:\n${context || '(no context gathered)'}\n\nAnswer:`,
      },
      timeoutMs,
    );
    if (outcome.ok) {
      return outcome.text.trim();
    }
    duelLog('EXECUTOR', `qa_engine model ${outcome.reason}: ${outcome.message}; answering extractively`);
    return extractiveAnswer(question, context);
  };
}
