/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { AgentContext, AgentResult, OrchestrationAgent } from './agent.js';
import type { OrchestratorEventBus } from '../event-bus/bus.js';
import { AgentType } from '../event-bus/types.js';
import type { CritiqueResult, Plan, PatternMatch, PlanStep } from '../interfaces/orchestration.js';
import { sameSteps } from '../interfaces/orchestration.js';
import { callModel, type ModelClient, type ModelOutcome } from '../core/modelClient.js';
import type { PatternStore } from '../patterns/patternStore.js';
import type { ToolRegistry } from '../tools/toolRegistry.js';
import { recoverPlan } from '../utils/structuredOutput.js';
import { loadPrompt } from '../utils/promptLoader.js';
import { duelLog, duelWarn } from '../utils/duelLogger.js';
import { getErrorMessage } from '../utils/errors.js';
import {
  adaptPatternSteps,
  keywordPlan,
  normalizePlanSteps,
  repairPlanSteps,
  toPlanStep,
} from './planRules.js';

export interface PlanRequest {
  query: string;
  /** present together with `critique` when asking for a revision */
  priorPlan?: Plan;
  critique?: CritiqueResult;
}

export type ProposalSource = 'model' | 'pattern' | 'rules' | 'repair';

export interface Proposal {
  plan: Plan;
  source: ProposalSource;
  /** best stored pattern at or above the similarity threshold */
  patternMatch?: PatternMatch;
  /** the model was wanted but could not be used */
  degraded: boolean;
}

export interface PlannerOptions {
  model?: ModelClient;
  modelTimeoutMs?: number;
  similarityThreshold?: number;
  promptDir?: string;
}

const DEFAULT_PLANNER_PROMPT = `You plan information-gathering workflows. Given a user query and a list of tools,
return a JSON object {"steps": [{"tool": "...", "purpose": "...", "input": "..."}], "reasoning": "..."}.
Use only the listed tools. Gather information first; the final step must be "qa_engine"
with the original query as input. Return JSON only.`;

const DEFAULT_REVISION_PROMPT = `You revise information-gathering plans after review. Address every issue and
suggestion below and return a JSON object {"steps": [{"tool": "...", "purpose": "...", "input": "..."}],
"reasoning": "..."}. Use only the listed tools and end with "qa_engine". Return JSON only.`;

/**
 * Generator half of the adversarial loop. Prefers the model, then a stored
 * pattern, then keyword rules; revisions fall back to critique-driven repair.
 */
export class PlannerAgent implements OrchestrationAgent<PlanRequest, Proposal> {
  readonly id = AgentType.PLANNER;
  private readonly bus: OrchestratorEventBus;
  private readonly registry: ToolRegistry;
  private readonly patterns: PatternStore;
  private readonly model?: ModelClient;
  private readonly modelTimeoutMs: number;
  private readonly similarityThreshold: number;
  private readonly promptDir?: string;

  constructor(bus: OrchestratorEventBus, registry: ToolRegistry, patterns: PatternStore, options: PlannerOptions = {}) {
    this.bus = bus;
    this.registry = registry;
    this.patterns = patterns;
    this.model = options.model;
    this.modelTimeoutMs = options.modelTimeoutMs ?? 30_000;
    this.similarityThreshold = options.similarityThreshold ?? 0.7;
    this.promptDir = options.promptDir;
  }

  async run(ctx: AgentContext<PlanRequest>): Promise<AgentResult<Proposal>> {
    this.bus.publish({ ts: Date.now(), type: 'agent-start', payload: { id: this.id } });
    try {
      const { priorPlan, critique } = ctx.input;
      const proposal =
        priorPlan && critique
          ? await this.revise(ctx.input.query, priorPlan, critique)
          : await this.fresh(ctx.input.query);
      this.progress('done', 100);
      duelLog('PLANNER', `revision ${proposal.plan.revision} from ${proposal.source}: ${proposal.plan.steps.map((s) => s.tool).join(' -> ')}`);
      return { ok: true, output: proposal };
    } catch (error) {
      this.bus.publish({
        ts: Date.now(),
        type: 'error',
        payload: { agent: this.id, message: getErrorMessage(error), details: error instanceof Error ? error.stack : undefined },
      });
      return { ok: false, error: `Planning failed: ${getErrorMessage(error)}` };
    } finally {
      this.bus.publish({ ts: Date.now(), type: 'agent-end', payload: { id: this.id } });
    }
  }

  /** Same as `run` but throws instead of returning `{ ok: false }`. */
  async propose(request: PlanRequest): Promise<Proposal> {
    const result = await this.run({ input: request, bus: this.bus });
    if (!result.ok || !result.output) {
      throw new Error(result.error ?? 'Planning failed');
    }
    return result.output;
  }

  private async fresh(query: string): Promise<Proposal> {
    this.progress('pattern lookup', 10);
    const patternMatch = await this.bestPattern(query);
    if (patternMatch) {
      duelLog('PATTERNS', `matched "${patternMatch.pattern.query}" (${patternMatch.similarity})`);
    }

    this.progress('model planning', 30);
    const outcome = await callModel(
      this.model,
      { system: await this.prompt('planner.md', DEFAULT_PLANNER_PROMPT), prompt: this.freshPrompt(query, patternMatch) },
      this.modelTimeoutMs,
    );
    const modelSteps = this.stepsFrom(outcome, query);
    if (modelSteps) {
      return {
        plan: { query, steps: modelSteps.steps, revision: 0, reasoning: modelSteps.reasoning },
        source: 'model',
        patternMatch,
        degraded: false,
      };
    }

    const degraded = this.model !== undefined;
    if (degraded) {
      this.warn(`model planning unavailable (${describeFailure(outcome)}); using rule-based planning`);
    }
    this.progress('rule-based planning', 60);

    if (patternMatch) {
      return {
        plan: {
          query,
          steps: this.normalize(adaptPatternSteps(patternMatch, query), query),
          revision: 0,
          reasoning: `Adapted from stored pattern for "${patternMatch.pattern.query}" (similarity ${patternMatch.similarity})`,
        },
        source: 'pattern',
        patternMatch,
        degraded,
      };
    }

    const { kind, steps } = keywordPlan(query);
    return {
      plan: { query, steps: this.normalize(steps, query), revision: 0, reasoning: `Keyword-based ${kind} plan` },
      source: 'rules',
      degraded,
    };
  }

  private async revise(query: string, prior: Plan, critique: CritiqueResult): Promise<Proposal> {
    this.progress('model revision', 30);
    const outcome = await callModel(
      this.model,
      {
        system: await this.prompt('planner-revision.md', DEFAULT_REVISION_PROMPT),
        prompt: this.revisionPrompt(query, prior, critique),
      },
      this.modelTimeoutMs,
    );
    const revised = this.stepsFrom(outcome, query);
    const next = { query, revision: prior.revision + 1, priorScore: critique.score };

    if (revised && !sameSteps(revised.steps, prior.steps)) {
      return { plan: { ...next, steps: revised.steps, reasoning: revised.reasoning }, source: 'model', degraded: false };
    }

    const degraded = this.model !== undefined && !outcome.ok;
    if (degraded) {
      this.warn(`model revision unavailable (${describeFailure(outcome)}); repairing plan from critique`);
    } else if (revised) {
      duelLog('PLANNER', 'model returned the prior plan unchanged; repairing from critique');
    }
    this.progress('rule-based repair', 60);

    const { steps, applied } = repairPlanSteps(prior.steps, critique, query, this.registry);
    return {
      plan: {
        ...next,
        steps,
        reasoning: `Rule-based repair: ${applied.length > 0 ? applied.join(', ') : 'no applicable changes'}`,
      },
      source: 'repair',
      degraded,
    };
  }

  private async bestPattern(query: string): Promise<PatternMatch | undefined> {
    try {
      const matches = await this.patterns.findSimilar(query);
      return matches.find((match) => match.similarity >= this.similarityThreshold);
    } catch (error) {
      this.warn(`pattern lookup failed: ${getErrorMessage(error)}`);
      return undefined;
    }
  }

  /** Normalized model steps, or undefined when the model gave nothing usable. */
  private stepsFrom(outcome: ModelOutcome, query: string): { steps: PlanStep[]; reasoning: string } | undefined {
    if (!outcome.ok) return undefined;
    const recovered = recoverPlan(outcome.text);
    if (recovered.strategy !== 'direct' || recovered.defaultedKeys.length > 0) {
      duelLog('PLANNER', `plan recovered via ${recovered.strategy}; defaulted: ${recovered.defaultedKeys.join(', ') || 'none'}`);
    }
    const proposed = recovered.value.steps.flatMap((entry) => {
      const step = toPlanStep(entry);
      return step ? [step] : [];
    });
    if (!proposed.some((step) => this.registry.has(step.tool))) {
      if (proposed.length > 0 || recovered.recoveredWithDefaults) {
        this.warn('model plan contained no usable steps');
      }
      return undefined;
    }
    return { steps: this.normalize(proposed, query), reasoning: recovered.value.reasoning };
  }

  private normalize(steps: readonly PlanStep[], query: string): PlanStep[] {
    const normalized = normalizePlanSteps(steps, query, this.registry);
    for (const tool of normalized.droppedTools) {
      this.warn(`dropped step with unknown tool '${tool}'`);
    }
    return normalized.steps;
  }

  private toolCatalog(): string {
    return this.registry
      .list()
      .map((tool) => `- ${tool.name} (${tool.kind}): ${tool.description}`)
      .join('\n');
  }

  private freshPrompt(query: string, match: PatternMatch | undefined): string {
    const hint = match
      ? `\n\nA plan that worked for the similar query "${match.pattern.query}":\n${JSON.stringify(match.pattern.plan.steps, null, 2)}`
      : '';
    return `Available tools:\n${this.toolCatalog()}\n\nQuery: "${query}"${hint}\n\nPlan:`;
  }

  private revisionPrompt(query: string, prior: Plan, critique: CritiqueResult): string {
    const list = (items: string[]): string => (items.length > 0 ? items.map((item) => `- ${item}`).join('\n') : '- (none)');
    return `Available tools:
${this.toolCatalog()}

Query: "${query}"

Previous plan (score ${critique.score}/100):
${JSON.stringify(prior.steps, null, 2)}

Issues:
${list(critique.issues)}

Suggestions:
${list(critique.suggestions)}

Revised plan:`;
  }

  private async prompt(fileName: string, fallback: string): Promise<string> {
    return (await loadPrompt(this.promptDir, fileName)) ?? fallback;
  }

  private progress(stage: string, percent: number): void {
    this.bus.publish({ ts: Date.now(), type: 'progress', payload: { agent: this.id, stage, percent } });
  }

  private warn(message: string): void {
    duelWarn('PLANNER', message);
    this.bus.publish({ ts: Date.now(), type: 'warning', payload: { agent: this.id, message } });
  }
}

function describeFailure(outcome: ModelOutcome): string {
  return outcome.ok ? 'no usable steps' : `${outcome.reason}: ${outcome.message}`;
}
