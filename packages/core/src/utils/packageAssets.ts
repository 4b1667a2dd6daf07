/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { existsSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

const here = dirname(fileURLToPath(import.meta.url)); // e.g. …/core/src/utils

/**
 * Locates a data file shipped beside the sources (schemas, manifests,
 * lexicons). Works from `src/` and from a compiled `dist/`, which does not
 * carry the JSON files itself.
 */
export function resolveAsset(...segments: string[]): string | undefined {
  const candidatePaths = [
    resolve(here, '..', ...segments),               // src/utils -> src/...
    resolve(here, '..', '..', 'src', ...segments),  // dist/utils -> src/...
  ];
  return candidatePaths.find((candidate) => existsSync(candidate));
}

export function requireAsset(...segments: string[]): string {
  const path = resolveAsset(...segments);
  if (!path) {
    throw new Error(`Asset "${segments.join('/')}" not found`);
  }
  return path;
}
