/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { OrchestratorEventBus } from '../event-bus/bus.js';
import type { AgentType } from '../event-bus/types.js';

/**
 * Agent execution context
 */
export interface AgentContext<TInput = unknown> {
  input: TInput;
  bus: OrchestratorEventBus;
}

/**
 * Agent execution result
 */
export interface AgentResult<TOutput = unknown> {
  ok: boolean;          // success flag
  output?: TOutput;     // present when ok === true
  error?: string;       // present when ok === false
}

export interface OrchestrationAgent<TIn, TOut> {
  readonly id: AgentType;
  run(ctx: AgentContext<TIn>): Promise<AgentResult<TOut>>;
}
