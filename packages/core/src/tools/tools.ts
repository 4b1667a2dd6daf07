/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export const SYNTHESIS_TOOL = 'qa_engine';
export const GENERAL_KNOWLEDGE_TOOL = 'wikipedia_search';

/**
 * `source` tools gather information, `analysis` tools work on what was
 * gathered, and the single `synthesis` tool writes the final answer.
 */
export type ToolKind = 'source' | 'analysis' | 'synthesis';

export interface ToolDescriptor {
  name: string;
  description: string;
  kind: ToolKind;
  /** tool to substitute when this one fails */
  fallback?: string;
  /** failed critical steps are kept for retry rather than dropped */
  critical: boolean;
}

export type ToolHandler = (input: string, signal: AbortSignal) => Promise<string>;

export type ToolResult =
  | { ok: true; output: string }
  | { ok: false; error: string };
