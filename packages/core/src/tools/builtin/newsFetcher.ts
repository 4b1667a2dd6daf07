/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { isRecord, stringOr } from '../../utils/guards.js';
import type { ToolHandler } from '../tools.js';
import { getJson, toSearchQuery, truncate } from './http.js';

const NEWS_URL = 'https://newsapi.org/v2/everything';
const PAGE_SIZE = 5;

function describeArticle(article: unknown): string | undefined {
  if (!isRecord(article)) return undefined;
  const title = stringOr(article.title, '').trim();
  if (!title) return undefined;
  const source = isRecord(article.source) ? stringOr(article.source.name, '') : '';
  const description = stringOr(article.description, '').trim();
  const label = source ? `${title} (${source})` : title;
  return description ? `- ${label}: ${truncate(description, 300)}` : `- ${label}`;
}

export function createNewsFetcher(apiKey: string | undefined): ToolHandler {
  return async (input, signal) => {
    if (!apiKey) {
      throw new Error('news_fetcher not available: NEWS_API_KEY is not set');
    }
    const query = toSearchQuery(input);
    const params = new URLSearchParams({
      q: query,
      pageSize: String(PAGE_SIZE),
      sortBy: 'publishedAt',
      language: 'en',
    });
    const body = await getJson(`${NEWS_URL}?${params}`, signal, { 'X-Api-Key': apiKey });
    if (!isRecord(body) || body.status !== 'ok' || !Array.isArray(body.articles)) {
      const message = isRecord(body) ? stringOr(body.message, 'unexpected response') : 'unexpected response';
      throw new Error(`news_fetcher failed: ${message}`);
    }
    const lines = body.articles
      .map(describeArticle)
      .filter((line): line is string => line !== undefined);
    if (lines.length === 0) {
      throw new Error(`No news articles found for "${query}"`);
    }
    return `Recent news for "${query}":\n${lines.join('\n')}`;
  };
}
