/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import { duelLog } from './duelLogger.js';
import { getErrorMessage, isNodeError } from './errors.js';

/**
 * Loads a prompt override (`<promptDir>/<fileName>`). Returns null when no
 * directory is configured or the file is absent, so callers fall back to
 * their built-in prompt.
 */
export async function loadPrompt(promptDir: string | undefined, fileName: string): Promise<string | null> {
  if (!promptDir) return null;
  const fullPath = path.resolve(promptDir, fileName);
  try {
    const content = (await fs.readFile(fullPath, 'utf-8')).trim();
    return content || null;
  } catch (error) {
    if (!isNodeError(error) || error.code !== 'ENOENT') {
      duelLog('ORCHESTRATOR', `could not read prompt ${fullPath}: ${getErrorMessage(error)}`);
    }
    return null;
  }
}
