/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import { parseArgs } from 'node:util';
import {
  Config,
  ConfigError,
  createOrchestrator,
  getErrorMessage,
  startEventBusGateway,
  type Orchestrator,
  type OrchestratorEventBus,
  type RunStatus,
} from '@duelplan/core';
import { formatMarkdown, formatSummary } from './summary.js';
import { getUserStartupWarnings } from './utils/userStartupWarnings.js';

export const USAGE = `Usage: duelplan "<query>" [options]

Options:
  --json                 print the full run output as JSON
  --out <file.md>        also write a markdown report
  --events-port <port>   stream events over WebSocket while the query runs
  --max-iterations <n>   revisions the planning loop may make
  --max-retries <n>      self-correction passes after the first
  --debug                echo planning loop transitions to stderr
  -h, --help             show this message`;

export const EXIT_USAGE = 64;

const EXIT_CODES: Record<RunStatus, number> = {
  completed: 0,
  completed_with_issues: 0,
  rejected: 2,
  error: 1,
};

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export interface CliOptions {
  query: string;
  json: boolean;
  out?: string;
  eventsPort?: number;
  maxIterations?: number;
  maxRetries?: number;
  debug: boolean;
  help: boolean;
}

export interface CliIO {
  env: NodeJS.ProcessEnv;
  cwd: string;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

export type OrchestratorFactory = (config: Config) => Pick<Orchestrator, 'bus' | 'run'>;

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        json: { type: 'boolean', default: false },
        out: { type: 'string' },
        'events-port': { type: 'string' },
        'max-iterations': { type: 'string' },
        'max-retries': { type: 'string' },
        debug: { type: 'boolean', default: false },
        help: { type: 'boolean', short: 'h', default: false },
      },
      allowPositionals: true,
    });
  } catch (error) {
    throw new UsageError(getErrorMessage(error));
  }
}

function parseCount(flag: string, raw: string | undefined, max: number): number | undefined {
  if (raw === undefined) return undefined;
  const value = /^\d+$/.test(raw) ? Number(raw) : NaN;
  if (!Number.isInteger(value) || value > max) {
    throw new UsageError(`--${flag} expects an integer between 0 and ${max}, got "${raw}"`);
  }
  return value;
}

export function parseCliArgs(argv: string[]): CliOptions {
  const { values, positionals } = readArgs(argv);
  const help = values.help === true;
  const query = positionals.join(' ').trim();
  if (!query && !help) {
    throw new UsageError('A query is required');
  }

  return {
    query,
    json: values.json === true,
    out: values.out,
    eventsPort: parseCount('events-port', values['events-port'], 65535),
    maxIterations: parseCount('max-iterations', values['max-iterations'], 10),
    maxRetries: parseCount('max-retries', values['max-retries'], 10),
    debug: values.debug === true,
    help,
  };
}

function echoTransitions(bus: OrchestratorEventBus, write: (text: string) => void): () => void {
  return bus.subscribe('loop-transition', (evt) => {
    if (evt.type !== 'loop-transition') return;
    const { from, to, event, iteration } = evt.payload;
    write(`[loop] ${from} -> ${to} on ${event} (plan version ${iteration})`);
  });
}

/** Runs one query from the command line and resolves to the process exit code. */
export async function runCli(
  argv: string[],
  io: CliIO,
  factory: OrchestratorFactory = createOrchestrator,
): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      io.stderr(`${error.message}\n\n${USAGE}`);
      return EXIT_USAGE;
    }
    throw error;
  }
  if (options.help) {
    io.stdout(USAGE);
    return 0;
  }

  let config: Config;
  try {
    config = Config.fromEnv(io.env, {
      maxIterations: options.maxIterations,
      maxRetries: options.maxRetries,
      debugMode: options.debug || undefined,
    });
  } catch (error) {
    if (error instanceof ConfigError) {
      io.stderr(`Configuration error: ${error.message}`);
      return EXIT_CODES.error;
    }
    throw error;
  }

  for (const warning of await getUserStartupWarnings(io.cwd, io.env)) {
    io.stderr(warning);
  }

  const orchestrator = factory(config);
  const gateway = options.eventsPort === undefined ? undefined : startEventBusGateway(orchestrator.bus, options.eventsPort);
  const stopEcho = config.getDebugMode() ? echoTransitions(orchestrator.bus, io.stderr) : undefined;
  try {
    const output = await orchestrator.run(options.query);
    io.stdout(options.json ? JSON.stringify(output, null, 2) : formatSummary(output));

    if (options.out) {
      const target = path.resolve(io.cwd, options.out);
      try {
        await fs.mkdir(path.dirname(target), { recursive: true });
        await fs.writeFile(target, formatMarkdown(output), 'utf8');
        io.stderr(`Report written to ${target}`);
      } catch (error) {
        io.stderr(`Could not write report to ${target}: ${getErrorMessage(error)}`);
        return EXIT_CODES.error;
      }
    }
    return EXIT_CODES[output.status];
  } finally {
    stopEcho?.();
    gateway?.close();
  }
}
