/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { OrchestratorEventBus } from '../event-bus/bus.js';
import { AgentType } from '../event-bus/types.js';
import type { ExecutionRecord, Plan, PlanStep } from '../interfaces/orchestration.js';
import type { ToolRegistry } from '../tools/toolRegistry.js';
import { SYNTHESIS_TOOL } from '../tools/tools.js';
import { stepFor } from '../agents/planRules.js';
import { duelLog } from '../utils/duelLogger.js';
import { augmentInput, buildContextBlock, type ContextSection } from './context.js';

export type CorrectionAction = 'substituted' | 'kept' | 'dropped' | 'appended';

export interface ExecutionCorrection {
  /** pass whose failures prompted the change (0-based) */
  pass: number;
  /** 1-based position in that pass's plan; 0 for an appended step */
  step: number;
  tool: string;
  action: CorrectionAction;
  replacement?: string;
  error?: string;
}

export interface ExecutionReport {
  /** records of the last pass */
  records: ExecutionRecord[];
  passes: number;
  /** steps of the last pass */
  executedPlan: PlanStep[];
  selfCorrectionUsed: boolean;
  corrections: ExecutionCorrection[];
}

/**
 * Runs plan steps in order, feeding earlier outputs to the synthesis and
 * analysis tools, and re-runs a corrected plan after a pass with failures.
 */
export class ExecutionEngine {
  readonly id = AgentType.EXECUTOR;
  private readonly bus: OrchestratorEventBus;
  private readonly registry: ToolRegistry;

  constructor(bus: OrchestratorEventBus, registry: ToolRegistry) {
    this.bus = bus;
    this.registry = registry;
  }

  async execute(plan: Plan, maxRetries = 2): Promise<ExecutionReport> {
    this.bus.publish({ ts: Date.now(), type: 'agent-start', payload: { id: this.id } });
    try {
      let steps = plan.steps.map((step) => ({ ...step }));
      const corrections: ExecutionCorrection[] = [];
      let records: ExecutionRecord[] = [];
      let pass = 0;

      for (;;) {
        records = await this.runPass(steps, pass);
        const failures = records.filter((record) => record.status === 'error').length;
        duelLog('EXECUTOR', `pass ${pass + 1}: ${records.length - failures}/${records.length} steps succeeded`);
        if (failures === 0 || pass >= maxRetries) break;

        const corrected = this.correct(steps, records, plan.query, pass);
        corrections.push(...corrected.corrections);
        steps = corrected.steps;
        pass++;
      }

      return {
        records,
        passes: pass + 1,
        executedPlan: steps,
        selfCorrectionUsed: pass > 0,
        corrections,
      };
    } finally {
      this.bus.publish({ ts: Date.now(), type: 'agent-end', payload: { id: this.id } });
    }
  }

  private async runPass(steps: readonly PlanStep[], pass: number): Promise<ExecutionRecord[]> {
    const records: ExecutionRecord[] = [];
    const gathered: ContextSection[] = [];

    for (const [index, step] of steps.entries()) {
      this.bus.publish({
        ts: Date.now(),
        type: 'progress',
        payload: {
          agent: this.id,
          stage: `pass ${pass + 1} step ${index + 1}/${steps.length}`,
          percent: Math.round((index / steps.length) * 100),
        },
      });

      const kind = this.registry.kindOf(step.tool);
      const input =
        kind === 'synthesis' || kind === 'analysis'
          ? augmentInput(step.input, buildContextBlock(gathered))
          : step.input;

      const started = Date.now();
      const result = await this.registry.invoke(step.tool, input);
      const base = { step: index + 1, tool: step.tool, input: step.input, retryCount: pass, durationMs: Date.now() - started };

      if (result.ok) {
        records.push({ ...base, status: 'success', output: result.output });
        gathered.push({ tool: step.tool, text: result.output });
      } else {
        records.push({ ...base, status: 'error', error: result.error });
        duelLog('EXECUTOR', `step ${index + 1} (${step.tool}) failed: ${result.error}`);
        this.bus.publish({
          ts: Date.now(),
          type: 'error',
          payload: { agent: this.id, step: index + 1, message: result.error },
        });
      }
    }
    return records;
  }

  /**
   * Failed steps take their registered fallback; failed critical steps stay
   * for another attempt; other failed steps are dropped. Synthesis stays last.
   */
  private correct(
    steps: readonly PlanStep[],
    records: readonly ExecutionRecord[],
    query: string,
    pass: number,
  ): { steps: PlanStep[]; corrections: ExecutionCorrection[] } {
    const corrections: ExecutionCorrection[] = [];
    const next: PlanStep[] = [];

    steps.forEach((step, index) => {
      const record = records[index];
      if (!record || record.status === 'success') {
        next.push({ ...step });
        return;
      }
      const base = { pass, step: index + 1, tool: step.tool, error: record.error };
      const fallback = this.registry.fallbackFor(step.tool);
      if (fallback) {
        next.push({ ...step, tool: fallback });
        corrections.push({ ...base, action: 'substituted', replacement: fallback });
      } else if (this.registry.isCritical(step.tool)) {
        next.push({ ...step });
        corrections.push({ ...base, action: 'kept' });
      } else {
        corrections.push({ ...base, action: 'dropped' });
      }
    });

    if (next.length === 0 || next[next.length - 1].tool !== SYNTHESIS_TOOL) {
      next.push(stepFor(SYNTHESIS_TOOL, query));
      corrections.push({ pass, step: 0, tool: SYNTHESIS_TOOL, action: 'appended' });
    }

    for (const correction of corrections) {
      duelLog(
        'EXECUTOR',
        `correction: ${correction.action} ${correction.tool}${correction.replacement ? ` -> ${correction.replacement}` : ''}`,
      );
    }
    return { steps: next, corrections };
  }
}
