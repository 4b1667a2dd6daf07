/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { GoogleGenAI } from '@google/genai';
import { withRetries, withTimeout } from '../coordination/recovery.js';
import { TimeoutError, getErrorMessage } from '../utils/errors.js';

export interface ModelRequest {
  /** role instructions */
  system?: string;
  prompt: string;
  /** aborted when the caller stops waiting */
  signal?: AbortSignal;
}

/**
 * Text-completion capability shared by the planner, the critic and the
 * synthesis tool. Implementations throw on transport failure.
 */
export interface ModelClient {
  readonly name: string;
  complete(request: ModelRequest): Promise<string>;
}

export type ModelOutcome =
  | { ok: true; text: string }
  | { ok: false; reason: 'unavailable' | 'timeout' | 'error'; message: string };

/**
 * Calls the model with a bounded wait and folds every non-success into a
 * value, so callers branch instead of catching.
 */
export async function callModel(
  client: ModelClient | undefined,
  request: ModelRequest,
  timeoutMs: number,
): Promise<ModelOutcome> {
  if (!client) {
    return { ok: false, reason: 'unavailable', message: 'no model configured' };
  }
  const controller = new AbortController();
  try {
    const text = await withTimeout(client.complete({ ...request, signal: controller.signal }), timeoutMs);
    if (!text.trim()) {
      return { ok: false, reason: 'error', message: 'empty response from model' };
    }
    return { ok: true, text };
  } catch (error) {
    if (error instanceof TimeoutError) {
      controller.abort();
      return { ok: false, reason: 'timeout', message: error.message };
    }
    return { ok: false, reason: 'error', message: getErrorMessage(error) };
  }
}

/** Transient failures are retried once; an aborted request signal cancels the call and any retry. */
export class GeminiModelClient implements ModelClient {
  readonly name: string;
  private readonly ai: GoogleGenAI;
  private readonly maxRetries: number;

  constructor(apiKey: string, model: string, maxRetries = 1) {
    this.ai = new GoogleGenAI({ apiKey });
    this.name = model;
    this.maxRetries = maxRetries;
  }

  async complete(request: ModelRequest): Promise<string> {
    const response = await withRetries(
      () =>
        this.ai.models.generateContent({
          model: this.name,
          contents: request.prompt,
          config: {
            systemInstruction: request.system,
            temperature: 0.2,
            abortSignal: request.signal,
          },
        }),
      this.maxRetries,
      500,
      request.signal,
    );
    const text = response.text;
    if (!text) {
      throw new Error('Empty response from model');
    }
    return text;
  }
}
