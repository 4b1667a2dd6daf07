/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import { Config, DEFAULT_MODEL, DEFAULT_PATTERN_FILE } from './config.js';
import { ConfigError } from '../utils/errors.js';

describe('Config', () => {
  it('uses the documented defaults', () => {
    const config = new Config();

    expect(config.getApiKey()).toBeUndefined();
    expect(config.getModel()).toBe(DEFAULT_MODEL);
    expect(config.getModelTimeoutMs()).toBe(30_000);
    expect(config.getToolTimeoutMs()).toBe(60_000);
    expect(config.getApprovalThreshold()).toBe(70);
    expect(config.getRejectionThreshold()).toBe(50);
    expect(config.getSimilarityThreshold()).toBe(0.7);
    expect(config.getMaxIterations()).toBe(2);
    expect(config.getMaxRetries()).toBe(2);
    expect(config.getPatternFile()).toBe(DEFAULT_PATTERN_FILE);
    expect(config.getPromptDir()).toBeUndefined();
    expect(config.getDebugMode()).toBe(false);
  });

  it('rejects a rejection threshold above the approval threshold', () => {
    expect(() => new Config({ approvalThreshold: 40, rejectionThreshold: 60 })).toThrow(
      'rejectionThreshold (60) must not exceed approvalThreshold (40)',
    );
  });

  it.each([
    [{ approvalThreshold: 101 }, 'approvalThreshold must be an integer between 0 and 100, got 101'],
    [{ maxIterations: 1.5 }, 'maxIterations must be an integer between 0 and 10, got 1.5'],
    [{ maxRetries: -1 }, 'maxRetries must be an integer between 0 and 10, got -1'],
    [{ modelTimeoutMs: 0 }, 'modelTimeoutMs must be an integer between 1 and 600000, got 0'],
    [{ similarityThreshold: 1.2 }, 'similarityThreshold must be a number between 0 and 1, got 1.2'],
  ])('rejects out-of-range values %o', (params, message) => {
    expect(() => new Config(params)).toThrow(new ConfigError(message));
  });

  describe('fromEnv', () => {
    it('reads credentials and policy from the environment', () => {
      const config = Config.fromEnv({
        GEMINI_API_KEY: 'test-secret',
        DUELPLAN_MODEL: 'gemini-2.5-pro',
        DUELPLAN_APPROVAL_THRESHOLD: '80',
        DUELPLAN_MAX_ITERATIONS: '3',
        DUELPLAN_SIMILARITY_THRESHOLD: '0.5',
        DUELPLAN_PATTERN_FILE: '/tmp/patterns.jsonl',
        NEWS_API_KEY: 'test-news-key',
        DUELPLAN_DEBUG: '1',
      });

      expect(config.getApiKey()).toBe('test-secret');
      expect(config.getModel()).toBe('gemini-2.5-pro');
      expect(config.getApprovalThreshold()).toBe(80);
      expect(config.getMaxIterations()).toBe(3);
      expect(config.getSimilarityThreshold()).toBe(0.5);
      expect(config.getPatternFile()).toBe('/tmp/patterns.jsonl');
      expect(config.getNewsApiKey()).toBe('test-news-key');
      expect(config.getDebugMode()).toBe(true);
    });

    it('treats blank variables as unset', () => {
      const config = Config.fromEnv({ GEMINI_API_KEY: '  ', DUELPLAN_MAX_RETRIES: '' });

      expect(config.getApiKey()).toBeUndefined();
      expect(config.getMaxRetries()).toBe(2);
    });

    it('rejects a non-numeric threshold', () => {
      expect(() => Config.fromEnv({ DUELPLAN_REJECTION_THRESHOLD: 'high' })).toThrow(
        'DUELPLAN_REJECTION_THRESHOLD must be numeric, got "high"',
      );
    });

    it('lets explicit overrides win over the environment', () => {
      const config = Config.fromEnv(
        { DUELPLAN_MAX_ITERATIONS: '3', DUELPLAN_MAX_RETRIES: '4' },
        { maxIterations: 0, maxRetries: undefined },
      );

      expect(config.getMaxIterations()).toBe(0);
      expect(config.getMaxRetries()).toBe(4);
    });
  });
});
