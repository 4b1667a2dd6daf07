/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { TimeoutError } from '../utils/errors.js';

/** Promise.race wrapper that rejects with a TimeoutError after `ms` milliseconds */
export function withTimeout<T>(promise: Promise<T>, ms = 60_000): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(ms)), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Calls `fn` until it resolves, at most `maxRetries + 1` times.
 * Non-Error rejections are rethrown as Error with the same message.
 * Once `signal` is aborted no further attempt is made.
 */
export async function withRetries<T>(
  fn: () => Promise<T>,
  maxRetries: number,
  delayMs = 0,
  signal?: AbortSignal,
): Promise<T> {
  let lastError = new Error('no attempt was made');
  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));
      if (signal?.aborted) break;
      if (attempt < maxRetries && delayMs > 0) {
        await sleep(delayMs);
      }
    }
  }
  throw lastError;
}
