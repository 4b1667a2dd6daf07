/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import fs from 'node:fs/promises';
import * as os from 'node:os';
import path from 'node:path';
import { builtinModules } from 'node:module';
import { fileURLToPath } from 'node:url';
import { OrchestratorEventBus, type Config, type OrchestratorOutput } from '@duelplan/core';
import { EXIT_USAGE, USAGE, UsageError, parseCliArgs, runCli, type CliIO, type OrchestratorFactory } from './cli.js';
import { formatMarkdown, formatSummary } from './summary.js';
import { QUERY, sampleOutput } from './utils/testOutput.js';

const ENV = {
  GEMINI_API_KEY: 'test-secret',
  NEWS_API_KEY: 'test-news-key',
  DUELPLAN_PATTERN_FILE: '/tmp/duelplan-cli-test/patterns.jsonl',
};

describe('parseCliArgs', () => {
  it('joins positionals into the query and reads numeric flags', () => {
    expect(parseCliArgs(['Explain', 'AI', 'in', 'healthcare', '--json', '--max-iterations', '3'])).toEqual({
      query: QUERY,
      json: true,
      out: undefined,
      eventsPort: undefined,
      maxIterations: 3,
      maxRetries: undefined,
      debug: false,
      help: false,
    });
  });

  it('requires a query', () => {
    expect(() => parseCliArgs(['--json'])).toThrow(new UsageError('A query is required'));
  });

  it('accepts --help without a query', () => {
    expect(parseCliArgs(['-h'])).toMatchObject({ query: '', help: true });
  });

  it.each([
    [['q', '--max-retries', 'lots'], '--max-retries expects an integer between 0 and 10, got "lots"'],
    [['q', '--max-iterations', '11'], '--max-iterations expects an integer between 0 and 10, got "11"'],
    [['q', '--events-port', '70000'], '--events-port expects an integer between 0 and 65535, got "70000"'],
  ])('rejects %j', (argv, message) => {
    expect(() => parseCliArgs(argv)).toThrow(new UsageError(message));
  });

  it('rejects unknown options', () => {
    expect(() => parseCliArgs(['q', '--verbose'])).toThrow(UsageError);
  });
});

describe('runCli', () => {
  let stdout: string[];
  let stderr: string[];
  let bus: OrchestratorEventBus;
  let configs: Config[];
  let run: Mock<(query: string) => Promise<OrchestratorOutput>>;
  let factory: OrchestratorFactory;

  function io(overrides: Partial<CliIO> = {}): CliIO {
    return {
      env: ENV,
      cwd: process.cwd(),
      stdout: (text) => stdout.push(text),
      stderr: (text) => stderr.push(text),
      ...overrides,
    };
  }

  beforeEach(() => {
    stdout = [];
    stderr = [];
    configs = [];
    bus = new OrchestratorEventBus();
    run = vi.fn<(query: string) => Promise<OrchestratorOutput>>().mockResolvedValue(sampleOutput());
    factory = (config) => {
      configs.push(config);
      return { bus, run };
    };
  });

  it('prints the summary and exits cleanly for a degraded run', async () => {
    const code = await runCli([QUERY], io(), factory);

    expect(code).toBe(0);
    expect(run).toHaveBeenCalledWith(QUERY);
    expect(stdout).toEqual([formatSummary(sampleOutput())]);
    expect(stderr).toEqual([]);
  });

  it('prints the full output as JSON', async () => {
    await runCli([QUERY, '--json'], io(), factory);

    expect(JSON.parse(stdout[0])).toEqual(sampleOutput());
  });

  it('exits with 2 when the plan is rejected', async () => {
    run.mockResolvedValue(sampleOutput({ status: 'rejected' }));

    expect(await runCli([QUERY], io(), factory)).toBe(2);
  });

  it('exits with 1 when the run errors', async () => {
    run.mockResolvedValue(sampleOutput({ status: 'error' }));

    expect(await runCli([QUERY], io(), factory)).toBe(1);
  });

  it('lets flags override the environment', async () => {
    const env = { ...ENV, DUELPLAN_MAX_ITERATIONS: '3', DUELPLAN_MAX_RETRIES: '4' };

    await runCli([QUERY, '--max-iterations', '0'], io({ env }), factory);

    expect(configs[0].getMaxIterations()).toBe(0);
    expect(configs[0].getMaxRetries()).toBe(4);
    expect(configs[0].getApiKey()).toBe('test-secret');
  });

  it('prints usage for bad arguments without running', async () => {
    const code = await runCli([], io(), factory);

    expect(code).toBe(EXIT_USAGE);
    expect(stderr).toEqual([`A query is required\n\n${USAGE}`]);
    expect(run).not.toHaveBeenCalled();
  });

  it('prints usage for --help', async () => {
    expect(await runCli(['--help'], io(), factory)).toBe(0);
    expect(stdout).toEqual([USAGE]);
  });

  it('reports invalid configuration', async () => {
    const code = await runCli([QUERY], io({ env: { ...ENV, DUELPLAN_APPROVAL_THRESHOLD: 'high' } }), factory);

    expect(code).toBe(1);
    expect(stderr).toEqual(['Configuration error: DUELPLAN_APPROVAL_THRESHOLD must be numeric, got "high"']);
    expect(configs).toEqual([]);
  });

  it('prints startup warnings before running', async () => {
    await runCli([QUERY], io({ env: { DUELPLAN_PATTERN_FILE: ENV.DUELPLAN_PATTERN_FILE } }), factory);

    expect(stderr).toEqual([
      'GEMINI_API_KEY is not set. Planning, critique and synthesis will use rule-based fallbacks.',
      'NEWS_API_KEY is not set. news_fetcher steps will fall back to wikipedia_search.',
    ]);
  });

  it('echoes loop transitions in debug mode and stops afterwards', async () => {
    run.mockImplementation(async () => {
      bus.publish({
        ts: 1,
        type: 'loop-transition',
        payload: { from: 'PROPOSING', to: 'CRITIQUING', event: 'proposed', iteration: 1 },
      });
      return sampleOutput();
    });

    await runCli([QUERY, '--debug'], io(), factory);

    expect(configs[0].getDebugMode()).toBe(true);
    expect(stderr).toEqual(['[loop] PROPOSING -> CRITIQUING on proposed (plan version 1)']);
    expect(bus.listenerCount('loop-transition')).toBe(0);
  });

  describe('--out', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), 'duelplan-cli-'));
    });

    afterEach(async () => {
      await fs.rm(dir, { recursive: true, force: true });
    });

    it('writes a markdown report relative to the working directory', async () => {
      const code = await runCli([QUERY, '--out', 'reports/run.md'], io({ cwd: dir }), factory);

      const target = path.join(dir, 'reports', 'run.md');
      expect(code).toBe(0);
      expect(await fs.readFile(target, 'utf8')).toBe(formatMarkdown(sampleOutput()));
      expect(stderr).toEqual([`Report written to ${target}`]);
    });

    it('fails when the report cannot be written', async () => {
      const blocker = path.join(dir, 'taken');
      await fs.writeFile(blocker, 'not a directory');

      const code = await runCli([QUERY, '--out', 'taken/run.md'], io({ cwd: dir }), factory);

      expect(code).toBe(1);
      expect(stdout).toHaveLength(1);
      expect(stderr).toHaveLength(1);
      expect(stderr[0].startsWith(`Could not write report to ${path.join(blocker, 'run.md')}: `)).toBe(true);
    });
  });
});

describe('module imports', () => {
  it('names Node built-ins with the node: scheme', async () => {
    const srcDir = path.dirname(fileURLToPath(import.meta.url));
    const bare = new Set(builtinModules);

    for (const file of ['cli.ts', 'index.ts', 'summary.ts', path.join('utils', 'userStartupWarnings.ts')]) {
      const source = await fs.readFile(path.join(srcDir, file), 'utf8');
      const specifiers = [...source.matchAll(/from '([^']+)'/g)].map((match) => match[1]);
      expect(specifiers.filter((specifier) => bare.has(specifier))).toEqual([]);
    }
  });
});
