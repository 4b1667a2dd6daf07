/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { randomUUID } from 'node:crypto';
import type { Config } from '../config/config.js';
import { OrchestratorEventBus } from '../event-bus/bus.js';
import { AgentType } from '../event-bus/types.js';
import { CriticAgent } from '../agents/critic.js';
import { PlannerAgent } from '../agents/planner.js';
import { AdversarialLoop } from '../coordination/adversarialLoop.js';
import { ExecutionEngine, type ExecutionReport } from '../coordination/executionEngine.js';
import {
  snapshotPlan,
  type OrchestratorOutput,
  type Plan,
  type RunErrorCode,
} from '../interfaces/orchestration.js';
import { JsonlPatternStore } from '../patterns/jsonlPatternStore.js';
import type { PatternStore } from '../patterns/patternStore.js';
import { createBuiltinToolRegistry } from '../tools/builtin/index.js';
import type { ToolRegistry } from '../tools/toolRegistry.js';
import { SYNTHESIS_TOOL } from '../tools/tools.js';
import { duelLog, duelWarn } from '../utils/duelLogger.js';
import { RegistryConfigurationError, getErrorMessage } from '../utils/errors.js';
import { GeminiModelClient, type ModelClient } from './modelClient.js';

/** share of successful steps a run needs before its plan is remembered */
export const PATTERN_SUCCESS_RATE = 0.8;

export interface OrchestratorDependencies {
  registry: ToolRegistry;
  patternStore: PatternStore;
  model?: ModelClient;
  bus?: OrchestratorEventBus;
}

/**
 * One query end to end: validate, refine the plan adversarially, execute
 * with self-correction, compose the answer and remember plans that worked.
 * A run never throws; failures come back in `status` and `error`.
 */
export class Orchestrator {
  readonly id = AgentType.ORCHESTRATOR;
  readonly bus: OrchestratorEventBus;
  private readonly config: Config;
  private readonly registry: ToolRegistry;
  private readonly patternStore: PatternStore;
  private readonly loop: AdversarialLoop;
  private readonly engine: ExecutionEngine;

  constructor(config: Config, deps: OrchestratorDependencies) {
    this.config = config;
    this.bus = deps.bus ?? new OrchestratorEventBus();
    this.registry = deps.registry;
    this.patternStore = deps.patternStore;

    const modelOptions = {
      model: deps.model,
      modelTimeoutMs: config.getModelTimeoutMs(),
      promptDir: config.getPromptDir(),
    };
    const planner = new PlannerAgent(this.bus, this.registry, this.patternStore, {
      ...modelOptions,
      similarityThreshold: config.getSimilarityThreshold(),
    });
    const critic = new CriticAgent(this.bus, this.registry, {
      ...modelOptions,
      approvalThreshold: config.getApprovalThreshold(),
    });
    this.loop = new AdversarialLoop(this.bus, planner, critic, {
      maxIterations: config.getMaxIterations(),
      rejectionThreshold: config.getRejectionThreshold(),
    });
    this.engine = new ExecutionEngine(this.bus, this.registry);
  }

  async run(query: string): Promise<OrchestratorOutput> {
    const started = Date.now();
    const warnings: string[] = [];
    const unsubscribe = this.bus.subscribe('warning', (evt) => {
      if (evt.type === 'warning') warnings.push(evt.payload.message);
    });

    const output: OrchestratorOutput = {
      sessionId: randomUUID(),
      query,
      status: 'error',
      finalAnswer: '',
      planHistory: [],
      executionRecords: [],
      executedPlan: [],
      selfCorrectionUsed: false,
      patternStored: false,
      iterations: 0,
      finalScore: 0,
      approved: false,
      warnings,
      durationMs: 0,
    };
    const fail = (code: RunErrorCode, message: string): OrchestratorOutput => {
      output.status = code === 'PLAN_REJECTED' ? 'rejected' : 'error';
      output.error = { code, message };
      this.bus.publish({ ts: Date.now(), type: 'error', payload: { agent: this.id, message: `${code}: ${message}` } });
      return output;
    };

    this.bus.publish({ ts: Date.now(), type: 'agent-start', payload: { id: this.id } });
    try {
      const trimmed = query.trim();
      if (!trimmed) {
        return fail('INVALID_QUERY', 'Query must be a non-empty string');
      }
      output.query = trimmed;

      try {
        this.registry.validate();
      } catch (error) {
        if (error instanceof RegistryConfigurationError) {
          return fail('REGISTRY_MISCONFIGURED', error.message);
        }
        throw error;
      }

      this.bus.publish({ ts: Date.now(), type: 'log', payload: `session ${output.sessionId}: ${trimmed}` });
      const outcome = await this.loop.refine(trimmed);
      output.planHistory = outcome.history;
      output.iterations = outcome.iterations;
      output.finalScore = outcome.finalScore;
      output.approved = outcome.approved;
      const match = outcome.initialProposal.patternMatch;
      if (match) {
        output.patternMatched = { id: match.pattern.id, query: match.pattern.query, similarity: match.similarity };
      }

      if (outcome.rejectedForExecution) {
        return fail(
          'PLAN_REJECTED',
          `Plan scored ${outcome.finalScore}, below the rejection threshold of ${this.config.getRejectionThreshold()}`,
        );
      }

      const report = await this.engine.execute(outcome.plan, this.config.getMaxRetries());
      output.executionRecords = report.records;
      output.executedPlan = report.executedPlan;
      output.selfCorrectionUsed = report.selfCorrectionUsed;
      output.finalAnswer = composeAnswer(report);

      const successes = report.records.filter((record) => record.status === 'success').length;
      const successRate = report.records.length > 0 ? successes / report.records.length : 0;
      if (outcome.approved && successRate >= PATTERN_SUCCESS_RATE) {
        output.patternStored = await this.remember(trimmed, outcome.plan, outcome.finalScore);
      }

      output.status = outcome.approved && successes === report.records.length ? 'completed' : 'completed_with_issues';
      duelLog('ORCHESTRATOR', `${output.status}: ${successes}/${report.records.length} steps, score ${output.finalScore}`);
      return output;
    } catch (error) {
      return fail('INTERNAL_ERROR', getErrorMessage(error));
    } finally {
      unsubscribe();
      output.durationMs = Date.now() - started;
      this.bus.publish({ ts: Date.now(), type: 'agent-end', payload: { id: this.id } });
    }
  }

  private async remember(query: string, plan: Plan, score: number): Promise<boolean> {
    try {
      await this.patternStore.store(query, snapshotPlan(plan), score);
      return true;
    } catch (error) {
      const message = `could not store pattern: ${getErrorMessage(error)}`;
      duelWarn('PATTERNS', message);
      this.bus.publish({ ts: Date.now(), type: 'warning', payload: { agent: this.id, message } });
      return false;
    }
  }
}

/**
 * The synthesis output, noting degraded sections; without one, the gathered
 * outputs labelled by tool with every missing section listed.
 */
export function composeAnswer(report: ExecutionReport): string {
  const failures = report.records.flatMap((record) => (record.status === 'error' ? [record] : []));
  const synthesis = report.records
    .filter((record) => record.tool === SYNTHESIS_TOOL && record.status === 'success')
    .pop();

  if (synthesis && synthesis.status === 'success') {
    if (failures.length === 0) return synthesis.output;
    const degraded = failures.map((record) => `- ${record.tool}: ${record.error}`).join('\n');
    return `${synthesis.output}\n\nDegraded sections:\n${degraded}`;
  }

  const gathered = report.records.flatMap((record) =>
    record.status === 'success' ? [`[${record.tool}]: ${record.output}`] : [],
  );
  const missing = failures.map((record) => `[${record.tool}] missing: ${record.error}`);
  if (!report.records.some((record) => record.tool === SYNTHESIS_TOOL)) {
    missing.push(`[${SYNTHESIS_TOOL}] missing: synthesis step did not run`);
  }
  return [...gathered, ...missing].join('\n\n');
}

/** Orchestrator wired to the built-in tools, the configured model and a JSONL pattern file. */
export function createOrchestrator(config: Config, bus: OrchestratorEventBus = new OrchestratorEventBus()): Orchestrator {
  const apiKey = config.getApiKey();
  const model = apiKey ? new GeminiModelClient(apiKey, config.getModel()) : undefined;
  const registry = createBuiltinToolRegistry({
    model,
    modelTimeoutMs: config.getModelTimeoutMs(),
    toolTimeoutMs: config.getToolTimeoutMs(),
    newsApiKey: config.getNewsApiKey(),
  });
  const patternStore = new JsonlPatternStore(config.getPatternFile(), bus);
  return new Orchestrator(config, { registry, patternStore, model, bus });
}
