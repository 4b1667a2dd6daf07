/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export const CONTEXT_DELIMITER = '|||CONTEXT:';

/** Outputs at or below this length carry no usable context. */
const MIN_CONTEXT_OUTPUT = 10;

export interface ContextSection {
  tool: string;
  text: string;
}

export function buildContextBlock(sections: readonly ContextSection[]): string {
  return sections
    .filter((section) => section.text.trim().length > MIN_CONTEXT_OUTPUT)
    .map((section) => `[${section.tool}]: ${section.text.trim()}`)
    .join('\n\n');
}

export function augmentInput(input: string, contextBlock: string): string {
  return contextBlock ? `${input}${CONTEXT_DELIMITER}${contextBlock}` : input;
}

/** Inverse of augmentInput. */
export function splitContext(text: string): { question: string; context: string } {
  const at = text.indexOf(CONTEXT_DELIMITER);
  if (at < 0) return { question: text, context: '' };
  return {
    question: text.slice(0, at),
    context: text.slice(at + CONTEXT_DELIMITER.length),
  };
}

export function parseContextSections(context: string): ContextSection[] {
  const sections: ContextSection[] = [];
  const header = /^\[([\w-]+)\]: /gm;
  const starts: Array<{ tool: string; index: number; body: number }> = [];
  for (let match = header.exec(context); match; match = header.exec(context)) {
    starts.push({ tool: match[1], index: match.index, body: match.index + match[0].length });
  }
  starts.forEach((start, i) => {
    const end = i + 1 < starts.length ? starts[i + 1].index : context.length;
    sections.push({ tool: start.tool, text: context.slice(start.body, end).trim() });
  });
  return sections;
}
