/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import fs from 'node:fs/promises';
import * as os from 'node:os';
import path from 'node:path';

interface StartupContext {
  workspaceRoot: string;
  env: NodeJS.ProcessEnv;
}

type WarningCheck = {
  id: string;
  check: (context: StartupContext) => Promise<string | null>;
};

function isSet(value: string | undefined): boolean {
  return value !== undefined && value.trim() !== '';
}

const apiKeyCheck: WarningCheck = {
  id: 'api-key',
  check: async ({ env }) =>
    isSet(env.GEMINI_API_KEY)
      ? null
      : 'GEMINI_API_KEY is not set. Planning, critique and synthesis will use rule-based fallbacks.',
};

const newsKeyCheck: WarningCheck = {
  id: 'news-api-key',
  check: async ({ env }) =>
    isSet(env.NEWS_API_KEY) ? null : 'NEWS_API_KEY is not set. news_fetcher steps will fall back to wikipedia_search.',
};

// Patterns are stored relative to the working directory unless DUELPLAN_PATTERN_FILE says otherwise
const homeDirectoryCheck: WarningCheck = {
  id: 'home-directory',
  check: async ({ workspaceRoot, env }) => {
    if (isSet(env.DUELPLAN_PATTERN_FILE)) return null;
    try {
      const [workspaceRealPath, homeRealPath] = await Promise.all([
        fs.realpath(workspaceRoot),
        fs.realpath(os.homedir()),
      ]);

      if (workspaceRealPath === homeRealPath) {
        return 'You are running duelplan in your home directory. Learned patterns will be stored under ~/.duelplan; set DUELPLAN_PATTERN_FILE to keep them elsewhere.';
      }
      return null;
    } catch (_err: unknown) {
      return 'Could not verify the current directory due to a file system error.';
    }
  },
};

const rootDirectoryCheck: WarningCheck = {
  id: 'root-directory',
  check: async ({ workspaceRoot, env }) => {
    if (isSet(env.DUELPLAN_PATTERN_FILE)) return null;
    try {
      const workspaceRealPath = await fs.realpath(workspaceRoot);
      const errorMessage =
        'Warning: You are running duelplan in the root directory. Learned patterns would be written to /.duelplan; set DUELPLAN_PATTERN_FILE or run from a project directory.';

      // the root is its own parent on every platform
      if (path.dirname(workspaceRealPath) === workspaceRealPath) {
        return errorMessage;
      }
      if (process.platform === 'win32' && /^[A-Za-z]:\\?$/.test(workspaceRealPath)) {
        return errorMessage;
      }
      return null;
    } catch (_err: unknown) {
      return 'Could not verify the current directory due to a file system error.';
    }
  },
};

const WARNING_CHECKS: readonly WarningCheck[] = [
  apiKeyCheck,
  newsKeyCheck,
  homeDirectoryCheck,
  rootDirectoryCheck,
];

export async function getUserStartupWarnings(
  workspaceRoot: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<string[]> {
  const results = await Promise.all(
    WARNING_CHECKS.map((check) => check.check({ workspaceRoot, env })),
  );
  return results.filter((msg): msg is string => msg !== null);
}
