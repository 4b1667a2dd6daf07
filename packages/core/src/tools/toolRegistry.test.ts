/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ToolRegistry, loadToolManifest } from './toolRegistry.js';
import type { ToolDescriptor } from './tools.js';
import { RegistryConfigurationError } from '../utils/errors.js';
import { createTestRegistry, echoTool, failingTool } from '../utils/testHelpers.js';

const source = (name: string, extra: Partial<ToolDescriptor> = {}): ToolDescriptor => ({
  name,
  description: `${name} tool`,
  kind: 'source',
  critical: false,
  ...extra,
});

describe('ToolRegistry', () => {
  it('invokes a registered tool', async () => {
    const registry = new ToolRegistry().register(source('echo'), echoTool('echo'));

    await expect(registry.invoke('echo', 'hello')).resolves.toEqual({
      ok: true,
      output: 'echo result for hello',
    });
  });

  it('reports unknown tools as not available', async () => {
    await expect(new ToolRegistry().invoke('ghost', 'x')).resolves.toEqual({
      ok: false,
      error: "Tool 'ghost' not available",
    });
  });

  it('turns thrown errors into failed results', async () => {
    const registry = new ToolRegistry().register(source('broken'), failingTool('upstream 502'));

    await expect(registry.invoke('broken', 'x')).resolves.toEqual({ ok: false, error: 'upstream 502' });
  });

  it('times out slow tools and aborts their signal', async () => {
    let seen: AbortSignal | undefined;
    const registry = new ToolRegistry({ timeoutMs: 20 }).register(source('slow'), (_input, signal) => {
      seen = signal;
      return new Promise<string>(() => {});
    });

    const result = await registry.invoke('slow', 'x');

    expect(result).toEqual({ ok: false, error: "Tool 'slow' timed out after 20ms" });
    expect(seen?.aborted).toBe(true);
  });

  it('only reports fallbacks that are registered', () => {
    const registry = new ToolRegistry()
      .register(source('news', { fallback: 'wiki' }), echoTool('news'))
      .register(source('papers', { fallback: 'missing' }), echoTool('papers'))
      .register(source('wiki'), echoTool('wiki'));

    expect(registry.fallbackFor('news')).toBe('wiki');
    expect(registry.fallbackFor('papers')).toBeUndefined();
    expect(registry.fallbackFor('wiki')).toBeUndefined();
  });

  it('always treats synthesis and general knowledge as critical', () => {
    const registry = createTestRegistry();

    expect(registry.isCritical('qa_engine')).toBe(true);
    expect(registry.isCritical('wikipedia_search')).toBe(true);
    expect(registry.isCritical('news_fetcher')).toBe(false);
    expect(registry.isCritical('ghost')).toBe(false);
  });

  describe('validate', () => {
    it('accepts the bundled tool set', () => {
      expect(() => createTestRegistry().validate()).not.toThrow();
    });

    it('rejects a registry without the synthesis tool', () => {
      const registry = createTestRegistry({}, ['qa_engine']);

      expect(() => registry.validate()).toThrow(RegistryConfigurationError);
      expect(() => registry.validate()).toThrow('Required tool(s) not registered: qa_engine');
    });

    it('rejects a fallback that points at nothing', () => {
      const registry = createTestRegistry({}, ['wikipedia_search']).register(
        { name: 'wikipedia_search', description: 'wiki', kind: 'source', critical: true, fallback: 'encyclopedia' },
        echoTool('wikipedia_search'),
      );

      expect(() => registry.validate()).toThrow(
        "Tool 'wikipedia_search' falls back to unregistered tool 'encyclopedia'",
      );
    });
  });
});

describe('loadToolManifest', () => {
  it('loads the bundled descriptors', () => {
    const descriptors = loadToolManifest();

    expect(descriptors.map((d) => d.name)).toEqual([
      'wikipedia_search',
      'arxiv_summarizer',
      'news_fetcher',
      'sentiment_analyzer',
      'qa_engine',
    ]);
    expect(descriptors.find((d) => d.name === 'news_fetcher')?.fallback).toBe('wikipedia_search');
    expect(descriptors.find((d) => d.name === 'qa_engine')?.kind).toBe('synthesis');
  });

  it('rejects a manifest that does not match the schema', () => {
    const dir = mkdtempSync(join(tmpdir(), 'duelplan-manifest-'));
    const path = join(dir, 'manifest.json');
    writeFileSync(path, JSON.stringify({ tools: [{ name: 'x', kind: 'oracle' }] }));

    expect(() => loadToolManifest(path)).toThrow(RegistryConfigurationError);
  });
});
