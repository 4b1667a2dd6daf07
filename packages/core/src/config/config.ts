/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { ConfigError } from '../utils/errors.js';

export const DEFAULT_MODEL = 'gemini-2.5-flash';
export const DEFAULT_PATTERN_FILE = '.duelplan/patterns.jsonl';

export interface ConfigParameters {
  apiKey?: string;
  model?: string;
  modelTimeoutMs?: number;
  toolTimeoutMs?: number;
  approvalThreshold?: number;
  rejectionThreshold?: number;
  similarityThreshold?: number;
  maxIterations?: number;
  maxRetries?: number;
  patternFile?: string;
  promptDir?: string;
  newsApiKey?: string;
  debugMode?: boolean;
}

function requireInteger(name: string, value: number, min: number, max: number): number {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ConfigError(`${name} must be an integer between ${min} and ${max}, got ${value}`);
  }
  return value;
}

function requireRatio(name: string, value: number): number {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new ConfigError(`${name} must be a number between 0 and 1, got ${value}`);
  }
  return value;
}

function parseNumber(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new ConfigError(`${key} must be numeric, got "${raw}"`);
  }
  return value;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim() !== '' ? value.trim() : undefined;
}

/**
 * Policy constants and credentials for one orchestrator process.
 * Thresholds are tunable; nothing in the pipeline assumes the defaults.
 */
export class Config {
  private readonly apiKey: string | undefined;
  private readonly model: string;
  private readonly modelTimeoutMs: number;
  private readonly toolTimeoutMs: number;
  private readonly approvalThreshold: number;
  private readonly rejectionThreshold: number;
  private readonly similarityThreshold: number;
  private readonly maxIterations: number;
  private readonly maxRetries: number;
  private readonly patternFile: string;
  private readonly promptDir: string | undefined;
  private readonly newsApiKey: string | undefined;
  private readonly debugMode: boolean;

  constructor(params: ConfigParameters = {}) {
    this.apiKey = params.apiKey;
    this.model = params.model ?? DEFAULT_MODEL;
    this.modelTimeoutMs = requireInteger('modelTimeoutMs', params.modelTimeoutMs ?? 30_000, 1, 600_000);
    this.toolTimeoutMs = requireInteger('toolTimeoutMs', params.toolTimeoutMs ?? 60_000, 1, 600_000);
    this.approvalThreshold = requireInteger('approvalThreshold', params.approvalThreshold ?? 70, 0, 100);
    this.rejectionThreshold = requireInteger('rejectionThreshold', params.rejectionThreshold ?? 50, 0, 100);
    this.similarityThreshold = requireRatio('similarityThreshold', params.similarityThreshold ?? 0.7);
    this.maxIterations = requireInteger('maxIterations', params.maxIterations ?? 2, 0, 10);
    this.maxRetries = requireInteger('maxRetries', params.maxRetries ?? 2, 0, 10);
    this.patternFile = params.patternFile ?? DEFAULT_PATTERN_FILE;
    this.promptDir = params.promptDir;
    this.newsApiKey = params.newsApiKey;
    this.debugMode = params.debugMode ?? false;

    if (this.rejectionThreshold > this.approvalThreshold) {
      throw new ConfigError(
        `rejectionThreshold (${this.rejectionThreshold}) must not exceed approvalThreshold (${this.approvalThreshold})`,
      );
    }
  }

  static fromEnv(env: NodeJS.ProcessEnv = process.env, overrides: ConfigParameters = {}): Config {
    return new Config({
      apiKey: nonEmpty(env.GEMINI_API_KEY),
      model: nonEmpty(env.DUELPLAN_MODEL),
      modelTimeoutMs: parseNumber(env, 'DUELPLAN_MODEL_TIMEOUT_MS'),
      toolTimeoutMs: parseNumber(env, 'DUELPLAN_TOOL_TIMEOUT_MS'),
      approvalThreshold: parseNumber(env, 'DUELPLAN_APPROVAL_THRESHOLD'),
      rejectionThreshold: parseNumber(env, 'DUELPLAN_REJECTION_THRESHOLD'),
      similarityThreshold: parseNumber(env, 'DUELPLAN_SIMILARITY_THRESHOLD'),
      maxIterations: parseNumber(env, 'DUELPLAN_MAX_ITERATIONS'),
      maxRetries: parseNumber(env, 'DUELPLAN_MAX_RETRIES'),
      patternFile: nonEmpty(env.DUELPLAN_PATTERN_FILE),
      promptDir: nonEmpty(env.DUELPLAN_PROMPT_DIR),
      newsApiKey: nonEmpty(env.NEWS_API_KEY),
      debugMode: env.DUELPLAN_DEBUG === '1',
      ...stripUndefined(overrides),
    });
  }

  getApiKey(): string | undefined {
    return this.apiKey;
  }

  getModel(): string {
    return this.model;
  }

  getModelTimeoutMs(): number {
    return this.modelTimeoutMs;
  }

  getToolTimeoutMs(): number {
    return this.toolTimeoutMs;
  }

  getApprovalThreshold(): number {
    return this.approvalThreshold;
  }

  getRejectionThreshold(): number {
    return this.rejectionThreshold;
  }

  getSimilarityThreshold(): number {
    return this.similarityThreshold;
  }

  getMaxIterations(): number {
    return this.maxIterations;
  }

  getMaxRetries(): number {
    return this.maxRetries;
  }

  getPatternFile(): string {
    return this.patternFile;
  }

  getPromptDir(): string | undefined {
    return this.promptDir;
  }

  getNewsApiKey(): string | undefined {
    return this.newsApiKey;
  }

  getDebugMode(): boolean {
    return this.debugMode;
  }
}

function stripUndefined(params: ConfigParameters): ConfigParameters {
  const out: ConfigParameters = {};
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) {
      Object.assign(out, { [key]: value });
    }
  }
  return out;
}
