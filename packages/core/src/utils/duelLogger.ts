/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export type DuelPhase =
  | 'ORCHESTRATOR'
  | 'PLANNER'
  | 'CRITIC'
  | 'EXECUTOR'
  | 'PATTERNS';

const COLOR: Record<DuelPhase, string> = {
  ORCHESTRATOR: '\x1b[36m', // cyan
  PLANNER: '\x1b[35m',      // magenta
  CRITIC: '\x1b[31m',       // red
  EXECUTOR: '\x1b[33m',     // yellow
  PATTERNS: '\x1b[32m',     // green
};

function stamp(): string {
  return new Date().toISOString().split('T')[1].slice(0, 8);
}

export function duelLog(phase: DuelPhase, msg: string): void {
  if (process.env.DUELPLAN_DEBUG !== '1') return;
  console.log(`${COLOR[phase]}[${stamp()}] [${phase}] ${msg}\x1b[0m`);
}

/** Degraded-mode notices go to stderr unless DUELPLAN_QUIET=1. */
export function duelWarn(phase: DuelPhase, msg: string): void {
  if (process.env.DUELPLAN_QUIET === '1') return;
  console.error(`\x1b[33m[${stamp()}] [${phase}] warning: ${msg}\x1b[0m`);
}
