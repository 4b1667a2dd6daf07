/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/* ------------------------------------------------------------------ */
/* Plans                                                              */
/* ------------------------------------------------------------------ */

export interface PlanStep {
  /** registered tool name */
  tool: string;
  /** why the step exists; diagnostic only */
  purpose: string;
  input: string;
}

/**
 * An ordered tool-call plan for one query. After normalization `steps` is
 * non-empty and its last element calls the synthesis tool.
 */
export interface Plan {
  readonly query: string;
  steps: PlanStep[];
  revision: number;
  /** score of the revision this one replaced */
  priorScore?: number;
  reasoning: string;
}

/** The persisted, comparison-friendly part of a Plan. */
export interface PlanSnapshot {
  query: string;
  steps: PlanStep[];
  revision: number;
}

export function snapshotPlan(plan: Plan): PlanSnapshot {
  return {
    query: plan.query,
    steps: plan.steps.map((step) => ({ ...step })),
    revision: plan.revision,
  };
}

export function sameSteps(a: readonly PlanStep[], b: readonly PlanStep[]): boolean {
  return (
    a.length === b.length &&
    a.every(
      (step, i) =>
        step.tool === b[i].tool && step.input === b[i].input && step.purpose === b[i].purpose,
    )
  );
}

/* ------------------------------------------------------------------ */
/* Critique                                                           */
/* ------------------------------------------------------------------ */

export type CritiqueDimension =
  | 'relevance'
  | 'completeness'
  | 'redundancy'
  | 'terminalSynthesis'
  | 'ordering';

export interface CritiqueResult {
  approved: boolean;
  /** integer in [0, 100] */
  score: number;
  issues: string[];
  suggestions: string[];
  source: 'model' | 'rules';
  /** per-dimension points (0-20 each), rule-based critiques only */
  dimensions?: Record<CritiqueDimension, number>;
}

export interface PlanHistoryEntry {
  /** 1-based plan version */
  iteration: number;
  plan: PlanSnapshot;
  score: number;
  approved: boolean;
  issues: string[];
  /** set when this revision repeated its predecessor and was not critiqued */
  stalled?: boolean;
}

/* ------------------------------------------------------------------ */
/* Execution                                                          */
/* ------------------------------------------------------------------ */

interface ExecutionRecordBase {
  /** 1-based position in the executed plan */
  step: number;
  tool: string;
  /** step input before context augmentation */
  input: string;
  retryCount: number;
  durationMs: number;
}

export interface SuccessRecord extends ExecutionRecordBase {
  status: 'success';
  output: string;
}

export interface ErrorRecord extends ExecutionRecordBase {
  status: 'error';
  error: string;
}

export type ExecutionRecord = SuccessRecord | ErrorRecord;

/* ------------------------------------------------------------------ */
/* Pattern memory                                                     */
/* ------------------------------------------------------------------ */

export type QueryType = 'explanation' | 'how-to' | 'analysis' | 'research' | 'general';

export type KeywordDomain = 'ai' | 'science' | 'news' | 'analysis' | 'technical';

export interface QueryFeatures {
  type: QueryType;
  /** sorted, duplicate-free */
  keywords: KeywordDomain[];
  hasQuestion: boolean;
  /** word count */
  length: number;
}

export interface Pattern {
  id: string;
  query: string;
  queryFeatures: QueryFeatures;
  plan: PlanSnapshot;
  score: number;
  /** ISO-8601 */
  timestamp: string;
}

export interface PatternMatch {
  pattern: Pattern;
  similarity: number;
}

/* ------------------------------------------------------------------ */
/* Orchestrator output                                                */
/* ------------------------------------------------------------------ */

export type RunStatus = 'completed' | 'completed_with_issues' | 'rejected' | 'error';

export type RunErrorCode =
  | 'INVALID_QUERY'
  | 'REGISTRY_MISCONFIGURED'
  | 'PLAN_REJECTED'
  | 'INTERNAL_ERROR';

export interface OrchestratorOutput {
  sessionId: string;
  query: string;
  status: RunStatus;
  finalAnswer: string;
  planHistory: PlanHistoryEntry[];
  executionRecords: ExecutionRecord[];
  /** plan the engine finished with, after any self-correction */
  executedPlan: PlanStep[];
  selfCorrectionUsed: boolean;
  patternMatched?: { id: string; query: string; similarity: number };
  patternStored: boolean;
  iterations: number;
  finalScore: number;
  approved: boolean;
  warnings: string[];
  error?: { code: RunErrorCode; message: string };
  durationMs: number;
}
