/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { AgentContext, AgentResult, OrchestrationAgent } from './agent.js';
import type { OrchestratorEventBus } from '../event-bus/bus.js';
import { AgentType } from '../event-bus/types.js';
import type { CritiqueDimension, CritiqueResult, Plan, PlanStep } from '../interfaces/orchestration.js';
import { callModel, type ModelClient } from '../core/modelClient.js';
import type { ToolRegistry } from '../tools/toolRegistry.js';
import { GENERAL_KNOWLEDGE_TOOL, SYNTHESIS_TOOL } from '../tools/tools.js';
import { recoverCritique } from '../utils/structuredOutput.js';
import { loadPrompt } from '../utils/promptLoader.js';
import { duelLog, duelWarn } from '../utils/duelLogger.js';
import { getErrorMessage } from '../utils/errors.js';

export interface CriticOptions {
  model?: ModelClient;
  modelTimeoutMs?: number;
  approvalThreshold?: number;
  promptDir?: string;
}

const DIMENSION_POINTS = 20;
// a dimension scoring below this contributes an issue
const WEAK_DIMENSION = 16;
const MIN_PURPOSE_LENGTH = 15;
const VAGUE_PURPOSE = /placeholder|tbd/i;

const DEFAULT_CRITIC_PROMPT = `You review information-gathering plans before they run. Score the plan from 0 to 100
on relevance to the query, completeness of coverage, redundancy, ending with the "qa_engine"
synthesis step, and ordering (all gathering before synthesis). Return a JSON object
{"approved": true|false, "score": 0-100, "issues": ["..."], "suggestions": ["..."]}. Return JSON only.`;

interface Finding {
  issue: string;
  suggestion: string;
}

const FINDINGS = {
  empty: {
    issue: 'Plan has no steps',
    suggestion: 'Add foundational sources such as wikipedia_search before synthesis',
  },
  synthesisOnly: {
    issue: 'Plan relies on synthesis alone without gathering information',
    suggestion: 'Add foundational sources such as wikipedia_search before synthesis',
  },
  vague: {
    issue: 'Some steps have vague or placeholder purposes',
    suggestion: 'Give every step a specific purpose tied to the query',
  },
  redundant: {
    issue: 'Plan contains redundant steps',
    suggestion: 'Remove redundant duplicate steps',
  },
  missingSynthesis: {
    issue: 'Missing synthesis step at the end of the plan',
    suggestion: `End the plan with ${SYNTHESIS_TOOL} to synthesize the answer`,
  },
  misordered: {
    issue: 'Information-gathering steps run after synthesis',
    suggestion: 'Move all information-gathering steps before the synthesis step',
  },
} satisfies Record<string, Finding>;

function incompleteCoverage(sources: number): Finding {
  return {
    issue: `Incomplete coverage: only ${sources} information source(s)`,
    suggestion: 'Add more comprehensive coverage with news_fetcher or arxiv_summarizer',
  };
}

function repeats(keys: readonly string[]): number {
  return keys.length - new Set(keys).size;
}

/**
 * Deterministic five-dimension review. Each dimension is worth 20 points;
 * a weak dimension adds its issue and suggestion.
 */
export function ruleBasedCritique(plan: Plan, registry: ToolRegistry, approvalThreshold: number): CritiqueResult {
  const steps: readonly PlanStep[] = plan.steps;
  const isSource = (step: PlanStep): boolean => registry.kindOf(step.tool) === 'source';
  const sourceCount = steps.filter(isSource).length;
  const findings: Finding[] = [];

  // relevance
  let relevance = 0;
  const vagueSteps = steps.filter(
    (step) => step.purpose.trim().length < MIN_PURPOSE_LENGTH || VAGUE_PURPOSE.test(step.purpose),
  ).length;
  const synthesisOnly = steps.length > 0 && steps.every((step) => step.tool === SYNTHESIS_TOOL);
  if (steps.length > 0) {
    relevance = Math.max(0, DIMENSION_POINTS - 4 * vagueSteps - (synthesisOnly ? 6 : 0));
  }
  if (relevance < WEAK_DIMENSION) {
    if (steps.length === 0) findings.push(FINDINGS.empty);
    if (synthesisOnly) findings.push(FINDINGS.synthesisOnly);
    if (vagueSteps > 0) findings.push(FINDINGS.vague);
  }

  // completeness
  let completeness = 0;
  if (steps.length > 0) {
    completeness = sourceCount >= 3 ? 20 : sourceCount === 2 ? 16 : sourceCount === 1 ? 12 : 8;
  }
  if (completeness < WEAK_DIMENSION && steps.length > 0) {
    findings.push(incompleteCoverage(sourceCount));
  }

  // redundancy
  const repeatableTools = new Set([SYNTHESIS_TOOL, GENERAL_KNOWLEDGE_TOOL]);
  const repeatedTools = repeats(steps.filter((step) => !repeatableTools.has(step.tool)).map((step) => step.tool));
  const repeatedPairs = repeats(steps.map((step) => `${step.tool}\u0000${step.input}`));
  const redundancy = Math.max(0, DIMENSION_POINTS - 5 * repeatedTools - 5 * repeatedPairs);
  if (redundancy < WEAK_DIMENSION) findings.push(FINDINGS.redundant);

  // terminal synthesis
  const terminalSynthesis = steps.length > 0 && steps[steps.length - 1].tool === SYNTHESIS_TOOL ? DIMENSION_POINTS : 0;
  if (terminalSynthesis === 0) findings.push(FINDINGS.missingSynthesis);

  // ordering
  const firstSynthesis = steps.findIndex((step) => step.tool === SYNTHESIS_TOOL);
  const lateSources = firstSynthesis < 0 ? 0 : steps.slice(firstSynthesis + 1).filter(isSource).length;
  const ordering = Math.max(0, DIMENSION_POINTS - 5 * lateSources);
  if (ordering < WEAK_DIMENSION) findings.push(FINDINGS.misordered);

  const dimensions: Record<CritiqueDimension, number> = {
    relevance,
    completeness,
    redundancy,
    terminalSynthesis,
    ordering,
  };
  const score = relevance + completeness + redundancy + terminalSynthesis + ordering;
  return {
    approved: score >= approvalThreshold,
    score,
    issues: findings.map((finding) => finding.issue),
    suggestions: [...new Set(findings.map((finding) => finding.suggestion))],
    source: 'rules',
    dimensions,
  };
}

/**
 * Discriminator half of the adversarial loop. Never mutates the plan it
 * reviews.
 */
export class CriticAgent implements OrchestrationAgent<Plan, CritiqueResult> {
  readonly id = AgentType.CRITIC;
  private readonly bus: OrchestratorEventBus;
  private readonly registry: ToolRegistry;
  private readonly model?: ModelClient;
  private readonly modelTimeoutMs: number;
  private readonly approvalThreshold: number;
  private readonly promptDir?: string;

  constructor(bus: OrchestratorEventBus, registry: ToolRegistry, options: CriticOptions = {}) {
    this.bus = bus;
    this.registry = registry;
    this.model = options.model;
    this.modelTimeoutMs = options.modelTimeoutMs ?? 30_000;
    this.approvalThreshold = options.approvalThreshold ?? 70;
    this.promptDir = options.promptDir;
  }

  async run(ctx: AgentContext<Plan>): Promise<AgentResult<CritiqueResult>> {
    this.bus.publish({ ts: Date.now(), type: 'agent-start', payload: { id: this.id } });
    try {
      const result = await this.evaluate(ctx.input);
      this.bus.publish({ ts: Date.now(), type: 'progress', payload: { agent: this.id, stage: 'critique', percent: 100 } });
      duelLog('CRITIC', `revision ${ctx.input.revision}: ${result.score}/100 ${result.approved ? 'approved' : 'rejected'} (${result.source})`);
      return { ok: true, output: result };
    } catch (error) {
      this.bus.publish({
        ts: Date.now(),
        type: 'error',
        payload: { agent: this.id, message: getErrorMessage(error) },
      });
      return { ok: false, error: `Critique failed: ${getErrorMessage(error)}` };
    } finally {
      this.bus.publish({ ts: Date.now(), type: 'agent-end', payload: { id: this.id } });
    }
  }

  async critique(plan: Plan): Promise<CritiqueResult> {
    const result = await this.run({ input: plan, bus: this.bus });
    if (!result.ok || !result.output) {
      throw new Error(result.error ?? 'Critique failed');
    }
    return result.output;
  }

  private async evaluate(plan: Plan): Promise<CritiqueResult> {
    if (!this.model) {
      return ruleBasedCritique(plan, this.registry, this.approvalThreshold);
    }

    this.bus.publish({ ts: Date.now(), type: 'progress', payload: { agent: this.id, stage: 'model critique', percent: 30 } });
    const system = (await loadPrompt(this.promptDir, 'critic.md')) ?? DEFAULT_CRITIC_PROMPT;
    const outcome = await callModel(this.model, { system, prompt: this.critiquePrompt(plan) }, this.modelTimeoutMs);
    if (!outcome.ok) {
      this.warn(`model critique unavailable (${outcome.reason}: ${outcome.message}); using rule-based critique`);
      return ruleBasedCritique(plan, this.registry, this.approvalThreshold);
    }

    const recovered = recoverCritique(outcome.text);
    if (recovered.recoveredWithDefaults || recovered.defaultedKeys.includes('score')) {
      this.warn('model critique could not be read; using rule-based critique');
      return ruleBasedCritique(plan, this.registry, this.approvalThreshold);
    }
    if (recovered.strategy !== 'direct' || recovered.defaultedKeys.length > 0) {
      duelLog('CRITIC', `critique recovered via ${recovered.strategy}; defaulted: ${recovered.defaultedKeys.join(', ') || 'none'}`);
    }

    const score = Math.min(100, Math.max(0, Math.round(recovered.value.score)));
    // an explicit rejection stands; approval, stated or not, must clear the threshold
    const modelApproves = recovered.defaultedKeys.includes('approved') || recovered.value.approved;
    return {
      approved: modelApproves && score >= this.approvalThreshold,
      score,
      issues: recovered.value.issues,
      suggestions: recovered.value.suggestions,
      source: 'model',
    };
  }

  private critiquePrompt(plan: Plan): string {
    const tools = this.registry
      .list()
      .map((tool) => `- ${tool.name} (${tool.kind})`)
      .join('\n');
    return `Available tools:
${tools}

Query: "${plan.query}"

Plan (revision ${plan.revision}):
${JSON.stringify(plan.steps, null, 2)}

Approve only if the score is at least ${this.approvalThreshold}.

Critique:`;
  }

  private warn(message: string): void {
    duelWarn('CRITIC', message);
    this.bus.publish({ ts: Date.now(), type: 'warning', payload: { agent: this.id, message } });
  }
}
