/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/** identity of an orchestration agent */
export enum AgentType {
  PLANNER = 'PLANNER',
  CRITIC = 'CRITIC',
  EXECUTOR = 'EXECUTOR',
  ORCHESTRATOR = 'ORCHESTRATOR',
}

export interface AgentLifecyclePayload {
  id: AgentType;
}

export interface ProgressPayload {
  agent: AgentType;
  stage: string;           // e.g. "critique" or "step 2/4"
  percent: number;         // rounded integer 0-100
}

export interface WarningPayload {
  agent: AgentType;
  message: string;
}

export interface ErrorPayload {
  agent: AgentType;
  step?: number;           // present if a tool step failed
  message: string;
  details?: unknown;
}

export interface LoopTransitionPayload {
  from: string;
  to: string;
  event: string;
  iteration: number;
}

export interface EventPayloadMap {
  log: string;
  progress: ProgressPayload;
  'agent-start': AgentLifecyclePayload;
  'agent-end': AgentLifecyclePayload;
  warning: WarningPayload;
  error: ErrorPayload;
  'loop-transition': LoopTransitionPayload;
}

export type OrchestratorEventType = keyof EventPayloadMap;

export const EVENT_TYPES: readonly OrchestratorEventType[] = [
  'log',
  'progress',
  'agent-start',
  'agent-end',
  'warning',
  'error',
  'loop-transition',
];

export type OrchestratorEvent<K extends OrchestratorEventType = OrchestratorEventType> = {
  [P in K]: { ts: number; type: P; payload: EventPayloadMap[P] };
}[K];

export type OrchestratorEventHandler = (evt: OrchestratorEvent) => void;
