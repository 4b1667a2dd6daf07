/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { getText, toSearchQuery, truncate } from './http.js';

const ARXIV_URL = 'https://export.arxiv.org/api/query';
const MAX_RESULTS = 3;

const ENTITIES: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
  '&apos;': "'",
};

function clean(text: string): string {
  return text.replace(/&(?:amp|lt|gt|quot|apos|#39);/g, (entity) => ENTITIES[entity] ?? entity).replace(/\s+/g, ' ').trim();
}

function tag(entry: string, name: string): string {
  const match = new RegExp(`<${name}[^>]*>([\\s\\S]*?)</${name}>`).exec(entry);
  return match ? clean(match[1]) : '';
}

/** Titles and abstracts from an arXiv Atom feed. */
export function parseArxivFeed(xml: string): Array<{ title: string; summary: string }> {
  return [...xml.matchAll(/<entry>([\s\S]*?)<\/entry>/g)]
    .map((match) => ({ title: tag(match[1], 'title'), summary: tag(match[1], 'summary') }))
    .filter((paper) => paper.title.length > 0);
}

export async function arxivSummarizer(input: string, signal: AbortSignal): Promise<string> {
  const query = toSearchQuery(input);
  if (!query) throw new Error('arxiv_summarizer needs a non-empty query');

  const params = new URLSearchParams({
    search_query: `all:${query}`,
    start: '0',
    max_results: String(MAX_RESULTS),
  });
  const papers = parseArxivFeed(await getText(`${ARXIV_URL}?${params}`, signal));
  if (papers.length === 0) {
    throw new Error(`No arXiv papers found for "${query}"`);
  }
  const lines = papers.map((paper) => `- ${paper.title}: ${truncate(paper.summary, 400)}`);
  return `arXiv papers for "${query}":\n${lines.join('\n')}`;
}
