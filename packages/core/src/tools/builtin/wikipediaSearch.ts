/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { isRecord, stringOr } from '../../utils/guards.js';
import { getJson, toSearchQuery } from './http.js';

const SEARCH_URL = 'https://en.wikipedia.org/w/api.php';
const SUMMARY_URL = 'https://en.wikipedia.org/api/rest_v1/page/summary/';

function firstTitle(body: unknown): string | undefined {
  if (!isRecord(body) || !isRecord(body.query) || !Array.isArray(body.query.search)) {
    return undefined;
  }
  const [hit] = body.query.search;
  return isRecord(hit) && typeof hit.title === 'string' ? hit.title : undefined;
}

export async function wikipediaSearch(input: string, signal: AbortSignal): Promise<string> {
  const query = toSearchQuery(input);
  if (!query) throw new Error('wikipedia_search needs a non-empty query');

  const params = new URLSearchParams({
    action: 'query',
    list: 'search',
    srsearch: query,
    srlimit: '1',
    format: 'json',
    origin: '*',
  });
  const title = firstTitle(await getJson(`${SEARCH_URL}?${params}`, signal));
  if (!title) {
    throw new Error(`No Wikipedia article found for "${query}"`);
  }

  const summary = await getJson(`${SUMMARY_URL}${encodeURIComponent(title.replace(/ /g, '_'))}`, signal);
  const extract = isRecord(summary) ? stringOr(summary.extract, '').trim() : '';
  if (!extract) {
    throw new Error(`Wikipedia article "${title}" has no summary`);
  }
  return `${title}: ${extract}`;
}
