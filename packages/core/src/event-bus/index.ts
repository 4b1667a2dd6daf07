/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export type {
  OrchestratorEvent,
  OrchestratorEventType,
  OrchestratorEventHandler,
  EventPayloadMap,
  ProgressPayload,
  WarningPayload,
  ErrorPayload,
  LoopTransitionPayload,
  AgentLifecyclePayload,
} from './types.js';
export { AgentType, EVENT_TYPES } from './types.js';

export { OrchestratorEventBus } from './bus.js';
export { startEventBusGateway } from './wsGateway.js';
