/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { splitContext } from '../../coordination/context.js';

const USER_AGENT = 'duelplan/0.1 (tool pipeline)';
const MAX_QUERY_CHARS = 300;

async function request(url: string, signal: AbortSignal, headers: Record<string, string>): Promise<Response> {
  const response = await fetch(url, { signal, headers: { 'User-Agent': USER_AGENT, ...headers } });
  if (!response.ok) {
    throw new Error(`HTTP ${response.status} from ${new URL(url).host}`);
  }
  return response;
}

export async function getJson(
  url: string,
  signal: AbortSignal,
  headers: Record<string, string> = {},
): Promise<unknown> {
  const response = await request(url, signal, { Accept: 'application/json', ...headers });
  const body: unknown = await response.json();
  return body;
}

export async function getText(url: string, signal: AbortSignal): Promise<string> {
  const response = await request(url, signal, {});
  return response.text();
}

/** The search phrase a source tool should use for a (possibly augmented) step input. */
export function toSearchQuery(input: string): string {
  const { question } = splitContext(input);
  return question
    .replace(/^(?:summarize|explain|describe)\s*:\s*/i, '')
    .replace(/\s+/g, ' ')
    .trim()
    .slice(0, MAX_QUERY_CHARS);
}

export function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 3).trimEnd()}...` : text;
}
