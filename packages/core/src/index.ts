/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export * from './config/config.js';
export * from './event-bus/index.js';
export * from './interfaces/orchestration.js';
export type { AgentContext, AgentResult, OrchestrationAgent } from './agents/agent.js';
export * from './agents/planner.js';
export * from './agents/critic.js';
export { keywordPlan, normalizePlanSteps, repairPlanSteps, adaptPatternSteps, stepFor } from './agents/planRules.js';
export * from './coordination/loopState.js';
export * from './coordination/adversarialLoop.js';
export * from './coordination/executionEngine.js';
export * from './coordination/context.js';
export * from './coordination/recovery.js';
export * from './core/modelClient.js';
export * from './core/orchestrator.js';
export * from './patterns/features.js';
export * from './patterns/patternStore.js';
export * from './patterns/jsonlPatternStore.js';
export * from './tools/tools.js';
export * from './tools/toolRegistry.js';
export { createBuiltinToolRegistry, type BuiltinToolOptions } from './tools/builtin/index.js';
export * from './utils/structuredOutput.js';
export * from './utils/errors.js';
export { duelLog, duelWarn, type DuelPhase } from './utils/duelLogger.js';
