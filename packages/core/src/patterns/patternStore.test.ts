/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { PlanSnapshot } from '../interfaces/orchestration.js';
import { InMemoryPatternStore, createPattern, rankPatterns } from './patternStore.js';
import { JsonlPatternStore } from './jsonlPatternStore.js';
import { createEventCapture, warningMessages } from '../utils/testHelpers.js';

const plan = (query: string): PlanSnapshot => ({
  query,
  revision: 0,
  steps: [
    { tool: 'wikipedia_search', purpose: 'Gather background on the topic', input: query },
    { tool: 'qa_engine', purpose: 'Synthesize the final answer', input: query },
  ],
});

describe('rankPatterns', () => {
  it('orders by similarity and prefers newer patterns on ties', () => {
    const older = createPattern('Explain AI in healthcare', plan('Explain AI in healthcare'), 90, new Date('2025-01-01T00:00:00Z'));
    const unrelated = createPattern('Tell me a story', plan('Tell me a story'), 80);
    const newer = createPattern('Explain neural networks', plan('Explain neural networks'), 85, new Date('2025-02-01T00:00:00Z'));

    const matches = rankPatterns([older, unrelated, newer], 'Explain deep learning');

    expect(matches.map((m) => m.pattern.id)).toEqual([newer.id, older.id, unrelated.id]);
    expect(matches.map((m) => m.similarity)).toEqual([1, 1, 0.2]);
  });

  it('honours the limit', () => {
    const patterns = [1, 2, 3].map((n) => createPattern(`Explain AI part ${n}`, plan('q'), 90));
    expect(rankPatterns(patterns, 'Explain AI', 2)).toHaveLength(2);
  });
});

describe('InMemoryPatternStore', () => {
  it('stores patterns with extracted features', async () => {
    const store = new InMemoryPatternStore();

    const pattern = await store.store('Explain AI in healthcare', plan('Explain AI in healthcare'), 90);

    expect(pattern.queryFeatures).toEqual({ type: 'explanation', keywords: ['ai'], hasQuestion: false, length: 4 });
    expect(pattern.score).toBe(90);
    expect(await store.all()).toEqual([pattern]);
  });

  it('finds similar patterns', async () => {
    const store = new InMemoryPatternStore();
    await store.store('Explain AI in healthcare', plan('Explain AI in healthcare'), 90);

    const [match] = await store.findSimilar('Explain machine learning in finance');

    expect(match.similarity).toBe(1);
    expect(match.pattern.query).toBe('Explain AI in healthcare');
  });
});

describe('JsonlPatternStore', () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'duelplan-patterns-'));
    file = join(dir, 'nested', 'patterns.jsonl');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('returns nothing before the file exists', async () => {
    await expect(new JsonlPatternStore(file).all()).resolves.toEqual([]);
  });

  it('appends one JSON line per pattern and reads them back', async () => {
    const store = new JsonlPatternStore(file);

    const first = await store.store('Explain AI in healthcare', plan('Explain AI in healthcare'), 90);
    const second = await store.store('Research battery chemistry', plan('Research battery chemistry'), 75);

    const lines = (await readFile(file, 'utf8')).trimEnd().split('\n');
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[0]).id).toBe(first.id);
    expect(await new JsonlPatternStore(file).all()).toEqual([first, second]);
  });

  it('serializes concurrent appends into whole lines', async () => {
    const store = new JsonlPatternStore(file);

    await Promise.all(
      Array.from({ length: 10 }, (_, i) => store.store(`Explain topic ${i}`, plan(`Explain topic ${i}`), 80)),
    );

    const lines = (await readFile(file, 'utf8')).trimEnd().split('\n');
    expect(lines).toHaveLength(10);
    expect(lines.map((line) => JSON.parse(line).query)).toEqual(
      Array.from({ length: 10 }, (_, i) => `Explain topic ${i}`),
    );
  });

  it('skips malformed and invalid lines with a warning', async () => {
    const { bus, events } = createEventCapture();
    const good = createPattern('Explain AI in healthcare', plan('Explain AI in healthcare'), 90);
    await writeFile(
      join(dir, 'patterns.jsonl'),
      [JSON.stringify(good), '{"id": "broken"', JSON.stringify({ id: 'x', query: 'q' }), ''].join('\n'),
    );
    const store = new JsonlPatternStore(join(dir, 'patterns.jsonl'), bus);

    const patterns = await store.all();

    expect(patterns).toEqual([good]);
    const warnings = warningMessages(events);
    expect(warnings).toHaveLength(2);
    expect(warnings[0]).toBe(`skipping malformed pattern line 2 in ${join(dir, 'patterns.jsonl')}`);
    expect(warnings[1]).toMatch(/^skipping invalid pattern line 3 in .*: \(root\) must have required property/);
  });
});
