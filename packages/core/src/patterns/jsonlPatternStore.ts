/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { ValidateFunction } from 'ajv';
import type { OrchestratorEventBus } from '../event-bus/bus.js';
import { AgentType } from '../event-bus/types.js';
import type { Pattern, PatternMatch, PlanSnapshot } from '../interfaces/orchestration.js';
import { duelLog } from '../utils/duelLogger.js';
import { isNodeError } from '../utils/errors.js';
import { compileSchemaFile, formatErrors } from '../utils/jsonValidator.js';
import { createPattern, rankPatterns, type PatternStore } from './patternStore.js';

let patternValidator: ValidateFunction<Pattern> | undefined;

function isPattern(value: unknown): value is Pattern {
  patternValidator ??= compileSchemaFile<Pattern>('pattern.schema.json');
  return patternValidator(value);
}

/**
 * Pattern store backed by a JSON Lines file, one pattern per line.
 *
 * Appends from one instance are serialized through a promise chain, and each
 * append writes a whole line, so concurrent runs sharing the instance never
 * interleave partial records. Lines that fail to parse or validate are
 * skipped on read.
 */
export class JsonlPatternStore implements PatternStore {
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(
    private readonly filePath: string,
    private readonly bus?: OrchestratorEventBus,
  ) {}

  get location(): string {
    return this.filePath;
  }

  async store(query: string, plan: PlanSnapshot, score: number): Promise<Pattern> {
    const pattern = createPattern(query, plan, score);
    const line = JSON.stringify(pattern) + '\n';

    const write = this.writeQueue.then(() => this.append(line));
    // keep the chain alive after a failed write; the caller still sees the error
    this.writeQueue = write.catch(() => undefined);
    await write;

    duelLog('PATTERNS', `stored pattern ${pattern.id} (${pattern.queryFeatures.type}, score ${score})`);
    return pattern;
  }

  async findSimilar(query: string, limit?: number): Promise<PatternMatch[]> {
    return rankPatterns(await this.all(), query, limit);
  }

  async all(): Promise<Pattern[]> {
    // wait for queued appends from this instance
    await this.writeQueue;

    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isNodeError(error) && error.code === 'ENOENT') return [];
      throw error;
    }

    const patterns: Pattern[] = [];
    content.split('\n').forEach((line, index) => {
      if (!line.trim()) return;
      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch {
        this.warn(`skipping malformed pattern line ${index + 1} in ${this.filePath}`);
        return;
      }
      if (isPattern(parsed)) {
        patterns.push(parsed);
      } else {
        this.warn(
          `skipping invalid pattern line ${index + 1} in ${this.filePath}: ${formatErrors(patternValidator?.errors).join('; ')}`,
        );
      }
    });
    return patterns;
  }

  private async append(line: string): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.appendFile(this.filePath, line, 'utf8');
  }

  private warn(message: string): void {
    duelLog('PATTERNS', message);
    this.bus?.publish({ ts: Date.now(), type: 'warning', payload: { agent: AgentType.ORCHESTRATOR, message } });
  }
}
