/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { CritiqueResult, PatternMatch, PlanStep } from '../interfaces/orchestration.js';
import { mentions } from '../patterns/features.js';
import type { ToolRegistry } from '../tools/toolRegistry.js';
import { GENERAL_KNOWLEDGE_TOOL, SYNTHESIS_TOOL } from '../tools/tools.js';
import { isRecord, stringOr } from '../utils/guards.js';

const PURPOSES: Readonly<Record<string, string>> = {
  wikipedia_search: 'Gather foundational background on the topic',
  news_fetcher: 'Collect recent news coverage of the topic',
  arxiv_summarizer: 'Find relevant academic research papers',
  sentiment_analyzer: 'Assess the sentiment of the gathered coverage',
  qa_engine: 'Synthesize a comprehensive answer from the gathered sources',
};

export function stepFor(tool: string, input: string): PlanStep {
  return { tool, purpose: PURPOSES[tool] ?? `Run ${tool} for the query`, input };
}

/** Reads one model-proposed step; anything without a tool name is discarded. */
export function toPlanStep(entry: unknown): PlanStep | undefined {
  if (!isRecord(entry)) return undefined;
  const tool = stringOr(entry.tool, '').trim();
  if (!tool) return undefined;
  return {
    tool,
    purpose: stringOr(entry.purpose, '').trim(),
    input: stringOr(entry.input, '').trim(),
  };
}

export interface NormalizedSteps {
  steps: PlanStep[];
  droppedTools: string[];
}

/**
 * Enforces the plan invariant: registered tools only, no empty inputs, no
 * consecutive duplicate tool+input pairs, exactly one synthesis step, last.
 */
export function normalizePlanSteps(
  steps: readonly PlanStep[],
  query: string,
  registry: ToolRegistry,
): NormalizedSteps {
  const droppedTools: string[] = [];
  const known: PlanStep[] = [];
  for (const step of steps) {
    if (!registry.has(step.tool)) {
      droppedTools.push(step.tool);
      continue;
    }
    known.push({
      tool: step.tool,
      purpose: step.purpose.trim() || stepFor(step.tool, query).purpose,
      input: step.input.trim() || query,
    });
  }

  const gathered: PlanStep[] = [];
  for (const step of known) {
    if (step.tool === SYNTHESIS_TOOL) continue;
    const previous = gathered[gathered.length - 1];
    if (previous && previous.tool === step.tool && previous.input === step.input) continue;
    gathered.push(step);
  }

  const synthesis = known.filter((step) => step.tool === SYNTHESIS_TOOL).pop() ?? stepFor(SYNTHESIS_TOOL, query);
  return { steps: [...gathered, synthesis], droppedTools };
}

/* ------------------------------------------------------------------ */
/* Keyword plans                                                       */
/* ------------------------------------------------------------------ */

export type KeywordPlanKind = 'research' | 'summary' | 'analysis';

// Checked in this order; research is also the default.
const KEYWORD_PLANS: ReadonlyArray<[KeywordPlanKind, string[], string[]]> = [
  [
    'research',
    ['research', 'explore', 'investigate', 'find out', 'report', 'document'],
    ['wikipedia_search', 'news_fetcher', 'arxiv_summarizer'],
  ],
  [
    'summary',
    ['summarize', 'summary', 'overview', 'brief', 'explain', 'what is', 'define'],
    ['wikipedia_search'],
  ],
  [
    'analysis',
    ['analyze', 'analyse', 'sentiment', 'trend', 'trends', 'opinion'],
    ['news_fetcher', 'sentiment_analyzer'],
  ],
];

export function keywordPlanKind(query: string): KeywordPlanKind {
  const hit = KEYWORD_PLANS.find(([, terms]) => terms.some((term) => mentions(query, term)));
  return hit ? hit[0] : 'research';
}

/** Deterministic plan from query keywords; synthesis always appended last. */
export function keywordPlan(query: string): { kind: KeywordPlanKind; steps: PlanStep[] } {
  const kind = keywordPlanKind(query);
  const plan = KEYWORD_PLANS.find(([candidate]) => candidate === kind);
  const tools = plan ? plan[2] : [GENERAL_KNOWLEDGE_TOOL];
  return { kind, steps: [...tools, SYNTHESIS_TOOL].map((tool) => stepFor(tool, query)) };
}

/** A stored pattern's steps, re-targeted at a new query. */
export function adaptPatternSteps(match: PatternMatch, query: string): PlanStep[] {
  const previous = match.pattern.query;
  return match.pattern.plan.steps.map((step) => ({
    tool: step.tool,
    purpose: step.purpose,
    input: previous && step.input.includes(previous) ? step.input.split(previous).join(query) : query,
  }));
}

/* ------------------------------------------------------------------ */
/* Critique-driven repair                                              */
/* ------------------------------------------------------------------ */

const SOURCE_ORDER = ['wikipedia_search', 'news_fetcher', 'arxiv_summarizer'];
const MIN_SOURCES_FOR_COVERAGE = 3;

interface RepairRule {
  applies: RegExp;
  label: string;
  apply: (ctx: RepairContext) => void;
}

interface RepairContext {
  sources: PlanStep[];
  query: string;
  registry: ToolRegistry;
}

function ensureTool(ctx: RepairContext, tool: string, position: 'start' | 'end'): void {
  if (!ctx.registry.has(tool) || ctx.sources.some((step) => step.tool === tool)) return;
  const step = stepFor(tool, ctx.query);
  ctx.sources = position === 'start' ? [step, ...ctx.sources] : [...ctx.sources, step];
}

const REPAIR_RULES: readonly RepairRule[] = [
  {
    applies: /redundan|duplicate|repeated/,
    label: 'removed repeated tools',
    apply: (ctx) => {
      const seen = new Set<string>();
      ctx.sources = ctx.sources.filter((step) => !seen.has(step.tool) && Boolean(seen.add(step.tool)));
    },
  },
  {
    applies: /wikipedia|foundational|background|general knowledge/,
    label: 'added general knowledge lookup',
    apply: (ctx) => ensureTool(ctx, GENERAL_KNOWLEDGE_TOOL, 'start'),
  },
  {
    applies: /arxiv|academic|scholarly|research paper/,
    label: 'added academic sources',
    apply: (ctx) => ensureTool(ctx, 'arxiv_summarizer', 'end'),
  },
  {
    applies: /news|recent|current|latest/,
    label: 'added recent news',
    apply: (ctx) => ensureTool(ctx, 'news_fetcher', 'end'),
  },
  {
    applies: /sentiment|opinion/,
    label: 'added sentiment analysis',
    apply: (ctx) => ensureTool(ctx, 'sentiment_analyzer', 'end'),
  },
  {
    applies: /incomplete|coverage|comprehensive|more sources|additional sources/,
    label: 'broadened coverage',
    apply: (ctx) => {
      for (const tool of SOURCE_ORDER) {
        const sourceCount = ctx.sources.filter((step) => ctx.registry.kindOf(step.tool) === 'source').length;
        if (sourceCount >= MIN_SOURCES_FOR_COVERAGE) break;
        ensureTool(ctx, tool, tool === GENERAL_KNOWLEDGE_TOOL ? 'start' : 'end');
      }
    },
  },
];

/**
 * Rule-based revision used when the model cannot revise: each rule whose
 * trigger appears in the critique's issues or suggestions is applied in turn.
 * A critique no rule understands yields the prior steps unchanged.
 */
export function repairPlanSteps(
  prior: readonly PlanStep[],
  critique: CritiqueResult,
  query: string,
  registry: ToolRegistry,
): { steps: PlanStep[]; applied: string[] } {
  const text = [...critique.issues, ...critique.suggestions].join(' ').toLowerCase();
  const ctx: RepairContext = {
    sources: prior.filter((step) => step.tool !== SYNTHESIS_TOOL).map((step) => ({ ...step })),
    query,
    registry,
  };

  const applied: string[] = [];
  for (const rule of REPAIR_RULES) {
    if (!rule.applies.test(text)) continue;
    const before = JSON.stringify(ctx.sources);
    rule.apply(ctx);
    if (JSON.stringify(ctx.sources) !== before) applied.push(rule.label);
  }

  const synthesis = prior.filter((step) => step.tool === SYNTHESIS_TOOL).pop() ?? stepFor(SYNTHESIS_TOOL, query);
  return { steps: normalizePlanSteps([...ctx.sources, synthesis], query, registry).steps, applied };
}
