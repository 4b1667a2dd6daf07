/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { Ajv, type SchemaObject, type ValidateFunction } from 'ajv';
import { isRecord, stringArray, stringOr } from './guards.js';

/* ------------------------------------------------------------------ */
/* Contracts                                                          */
/* ------------------------------------------------------------------ */

export type FieldKind = 'string' | 'number' | 'boolean' | 'array';
export type FieldValue = string | number | boolean | unknown[];

/** Expected top-level keys of a model response and the kind of each. */
export type ShapeContract = Readonly<Record<string, FieldKind>>;

export const PLAN_SHAPE = {
  steps: 'array',
  reasoning: 'string',
} as const satisfies ShapeContract;

export const CRITIQUE_SHAPE = {
  approved: 'boolean',
  score: 'number',
  issues: 'array',
  suggestions: 'array',
} as const satisfies ShapeContract;

export type RecoveryStrategy =
  | 'direct'
  | 'stripped'
  | 'span'
  | 'balanced'
  | 'repaired'
  | 'defaults';

export interface RecoveryResult {
  /** exactly the contract keys, each of its declared kind */
  value: Record<string, FieldValue>;
  strategy: RecoveryStrategy;
  /** every field came from its default */
  recoveredWithDefaults: boolean;
  defaultedKeys: string[];
}

/* ------------------------------------------------------------------ */
/* Text-level strategies                                              */
/* ------------------------------------------------------------------ */

const PREAMBLE = /^(?:here is|here's|here are|sure|certainly|of course|okay|ok)\b[^{[]*/i;
const FENCE = /```[A-Za-z]*[ \t]*\r?\n?([\s\S]*?)```/;
// each start scans to the end of the text at worst
const MAX_SCAN_STARTS = 50;

function stripWrappers(raw: string): string {
  let text = raw.trim();
  const fence = FENCE.exec(text);
  if (fence) {
    text = fence[1].trim();
  }
  text = text.replace(PREAMBLE, '');
  // drop a trailing courtesy sentence
  const last = Math.max(text.lastIndexOf('}'), text.lastIndexOf(']'));
  if (last >= 0) {
    text = text.slice(0, last + 1);
  }
  return text.trim();
}

function outerSpan(text: string): string | undefined {
  const first = text.indexOf('{');
  const last = text.lastIndexOf('}');
  return first >= 0 && last > first ? text.slice(first, last + 1) : undefined;
}

/** Every brace-balanced `{...}` region, one per opening brace, string-aware. */
function balancedObjects(text: string): string[] {
  const found: string[] = [];
  let starts = 0;
  for (
    let start = text.indexOf('{');
    start >= 0 && starts < MAX_SCAN_STARTS;
    start = text.indexOf('{', start + 1), starts++
  ) {
    let depth = 0;
    let inString = false;
    let escaped = false;
    for (let i = start; i < text.length; i++) {
      const ch = text[i];
      if (inString) {
        if (escaped) escaped = false;
        else if (ch === '\\') escaped = true;
        else if (ch === '"') inString = false;
        continue;
      }
      if (ch === '"') inString = true;
      else if (ch === '{') depth++;
      else if (ch === '}' && --depth === 0) {
        found.push(text.slice(start, i + 1));
        break;
      }
    }
  }
  return found;
}

/** Syntax repairs for the usual near-JSON a model emits. */
export function repairJson(text: string): string {
  return text
    .replace(/([{[,:]\s*)'([^'\\]*)'/g, (_m, lead: string, inner: string) => lead + JSON.stringify(inner))
    .replace(/,(\s*[}\]])/g, '$1')
    .replace(/\bTrue\b/g, 'true')
    .replace(/\bFalse\b/g, 'false')
    .replace(/\bNone\b/g, 'null')
    .replace(/([{,]\s*)([A-Za-z_][\w-]*)(\s*:)/g, '$1"$2"$3');
}

function tryParseObject(text: string): Record<string, unknown> | undefined {
  try {
    const parsed: unknown = JSON.parse(text);
    return isRecord(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
}

function contractHits(record: Record<string, unknown>, contract: ShapeContract): number {
  return Object.keys(contract).filter((key) => key in record).length;
}

interface Parsed {
  record: Record<string, unknown>;
  strategy: RecoveryStrategy;
}

function parseStructured(raw: string, contract: ShapeContract): Parsed | undefined {
  const stripped = stripWrappers(raw);
  const span = outerSpan(stripped);
  const balanced = balancedObjects(raw);

  const attempts: Array<[RecoveryStrategy, string[]]> = [
    ['direct', [raw.trim()]],
    ['stripped', [stripped]],
    ['span', span ? [span] : []],
    ['balanced', balanced],
  ];

  for (const [strategy, texts] of attempts) {
    const best = pickBest(texts, contract, (text) => tryParseObject(text));
    if (best) return { record: best, strategy };
  }

  const repairable = [...new Set(attempts.flatMap(([, texts]) => texts))];
  const repaired = pickBest(repairable, contract, (text) => tryParseObject(repairJson(text)));
  return repaired ? { record: repaired, strategy: 'repaired' } : undefined;
}

/** First parseable candidate carrying the most contract keys. */
function pickBest(
  texts: string[],
  contract: ShapeContract,
  parse: (text: string) => Record<string, unknown> | undefined,
): Record<string, unknown> | undefined {
  let best: Record<string, unknown> | undefined;
  let bestHits = -1;
  for (const text of texts) {
    const record = parse(text);
    if (!record) continue;
    const hits = contractHits(record, contract);
    if (hits > bestHits) {
      best = record;
      bestHits = hits;
    }
  }
  return best;
}

/* ------------------------------------------------------------------ */
/* Field-level conformance                                            */
/* ------------------------------------------------------------------ */

// coerceTypes accepts "85" for numbers and "true" for booleans
const ajv = new Ajv({ allErrors: true, coerceTypes: true, strict: false });
const validators = new Map<ShapeContract, ValidateFunction>();

function validatorFor(contract: ShapeContract): ValidateFunction {
  let validate = validators.get(contract);
  if (!validate) {
    const properties: Record<string, { type: FieldKind }> = {};
    for (const [key, kind] of Object.entries(contract)) {
      properties[key] = { type: kind };
    }
    const schema: SchemaObject = { type: 'object', properties };
    validate = ajv.compile(schema);
    validators.set(contract, validate);
  }
  return validate;
}

export function defaultFor(kind: FieldKind): FieldValue {
  switch (kind) {
    case 'string':
      return '';
    case 'number':
      return 0;
    case 'boolean':
      return false;
    case 'array':
      return [];
  }
}

function asField(value: unknown, kind: FieldKind): FieldValue | undefined {
  switch (kind) {
    case 'string':
      return typeof value === 'string' ? value : undefined;
    case 'number':
      return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
    case 'boolean':
      return typeof value === 'boolean' ? value : undefined;
    case 'array':
      return Array.isArray(value) ? value : undefined;
  }
}

/** "/score" -> "score" */
function topLevelKey(instancePath: string): string | undefined {
  const segment = instancePath.split('/')[1];
  return segment ? segment.replace(/~1/g, '/').replace(/~0/g, '~') : undefined;
}

function conform(
  record: Record<string, unknown>,
  contract: ShapeContract,
): { value: Record<string, FieldValue>; defaultedKeys: string[] } {
  const candidate: Record<string, unknown> = {};
  const defaulted = new Set<string>();
  for (const key of Object.keys(contract)) {
    const field = record[key];
    if (field === undefined || field === null) defaulted.add(key);
    else candidate[key] = field;
  }

  const validate = validatorFor(contract);
  if (!validate(candidate)) {
    for (const error of validate.errors ?? []) {
      const key = topLevelKey(error.instancePath);
      if (key) defaulted.add(key);
    }
  }

  const value: Record<string, FieldValue> = {};
  for (const [key, kind] of Object.entries(contract)) {
    const field = defaulted.has(key) ? undefined : asField(candidate[key], kind);
    if (field === undefined) {
      defaulted.add(key);
      value[key] = defaultFor(kind);
    } else {
      value[key] = field;
    }
  }
  return { value, defaultedKeys: Object.keys(contract).filter((key) => defaulted.has(key)) };
}

/* ------------------------------------------------------------------ */
/* Public API                                                         */
/* ------------------------------------------------------------------ */

/**
 * Turns untrusted model text into a record holding exactly the contract's
 * keys. Never throws: unusable input yields all defaults.
 */
export function recover(rawText: string, contract: ShapeContract): RecoveryResult {
  const keys = Object.keys(contract);
  const parsed = parseStructured(rawText, contract);
  if (!parsed) {
    const value: Record<string, FieldValue> = {};
    for (const [key, kind] of Object.entries(contract)) value[key] = defaultFor(kind);
    return { value, strategy: 'defaults', recoveredWithDefaults: true, defaultedKeys: keys };
  }

  const { value, defaultedKeys } = conform(parsed.record, contract);
  return {
    value,
    strategy: parsed.strategy,
    recoveredWithDefaults: defaultedKeys.length === keys.length,
    defaultedKeys,
  };
}

export interface Recovered<T> extends Omit<RecoveryResult, 'value'> {
  value: T;
}

export interface PlanShape {
  steps: unknown[];
  reasoning: string;
}

export interface CritiqueShape {
  approved: boolean;
  score: number;
  issues: string[];
  suggestions: string[];
}

export function recoverPlan(rawText: string): Recovered<PlanShape> {
  const result = recover(rawText, PLAN_SHAPE);
  const steps = result.value.steps;
  return {
    ...result,
    value: {
      steps: Array.isArray(steps) ? steps : [],
      reasoning: stringOr(result.value.reasoning, ''),
    },
  };
}

export function recoverCritique(rawText: string): Recovered<CritiqueShape> {
  const result = recover(rawText, CRITIQUE_SHAPE);
  const { approved, score } = result.value;
  return {
    ...result,
    value: {
      approved: approved === true,
      score: typeof score === 'number' ? score : 0,
      issues: stringArray(result.value.issues),
      suggestions: stringArray(result.value.suggestions),
    },
  };
}
