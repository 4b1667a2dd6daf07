/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { readFileSync } from 'node:fs';
import { withTimeout } from '../coordination/recovery.js';
import { RegistryConfigurationError, TimeoutError, getErrorMessage } from '../utils/errors.js';
import { validateJson } from '../utils/jsonValidator.js';
import { requireAsset } from '../utils/packageAssets.js';
import { isRecord } from '../utils/guards.js';
import {
  GENERAL_KNOWLEDGE_TOOL,
  SYNTHESIS_TOOL,
  type ToolDescriptor,
  type ToolHandler,
  type ToolKind,
  type ToolResult,
} from './tools.js';

interface RegisteredTool {
  descriptor: ToolDescriptor;
  handler: ToolHandler;
}

export interface ToolRegistryOptions {
  /** per-invocation bound; defaults to 60s */
  timeoutMs?: number;
}

/**
 * Named tools with their fallback and criticality policy. Invocation never
 * throws: failures, unknown names and timeouts come back as `{ ok: false }`.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();
  private readonly timeoutMs: number;

  constructor(options: ToolRegistryOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 60_000;
  }

  register(descriptor: ToolDescriptor, handler: ToolHandler): this {
    this.tools.set(descriptor.name, { descriptor, handler });
    return this;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  get(name: string): ToolDescriptor | undefined {
    return this.tools.get(name)?.descriptor;
  }

  list(): ToolDescriptor[] {
    return [...this.tools.values()].map((tool) => tool.descriptor);
  }

  kindOf(name: string): ToolKind | undefined {
    return this.get(name)?.kind;
  }

  /** Registered fallback for `name`, if any. */
  fallbackFor(name: string): string | undefined {
    const fallback = this.get(name)?.fallback;
    return fallback && this.has(fallback) ? fallback : undefined;
  }

  /** The synthesis and general-knowledge tools are always critical. */
  isCritical(name: string): boolean {
    if (name === SYNTHESIS_TOOL || name === GENERAL_KNOWLEDGE_TOOL) return true;
    return this.get(name)?.critical ?? false;
  }

  /**
   * Throws RegistryConfigurationError when a run could not complete its
   * contract with this registry.
   */
  validate(): void {
    const missing = [SYNTHESIS_TOOL, GENERAL_KNOWLEDGE_TOOL].filter((name) => !this.has(name));
    if (missing.length > 0) {
      throw new RegistryConfigurationError(`Required tool(s) not registered: ${missing.join(', ')}`);
    }
    if (this.kindOf(SYNTHESIS_TOOL) !== 'synthesis') {
      throw new RegistryConfigurationError(`Tool '${SYNTHESIS_TOOL}' must be registered as a synthesis tool`);
    }
    for (const { descriptor } of this.tools.values()) {
      if (descriptor.fallback && !this.has(descriptor.fallback)) {
        throw new RegistryConfigurationError(
          `Tool '${descriptor.name}' falls back to unregistered tool '${descriptor.fallback}'`,
        );
      }
    }
  }

  async invoke(name: string, input: string): Promise<ToolResult> {
    const tool = this.tools.get(name);
    if (!tool) {
      return { ok: false, error: `Tool '${name}' not available` };
    }

    const controller = new AbortController();
    try {
      const output = await withTimeout(tool.handler(input, controller.signal), this.timeoutMs);
      return { ok: true, output };
    } catch (error) {
      if (error instanceof TimeoutError) {
        controller.abort();
        return { ok: false, error: `Tool '${name}' timed out after ${this.timeoutMs}ms` };
      }
      return { ok: false, error: getErrorMessage(error) };
    }
  }
}

function toDescriptor(entry: unknown): ToolDescriptor {
  if (!isRecord(entry)) {
    throw new RegistryConfigurationError('Tool manifest entry must be an object');
  }
  const { name, description, kind, fallback, critical } = entry;
  if (
    typeof name !== 'string' ||
    typeof description !== 'string' ||
    (kind !== 'source' && kind !== 'analysis' && kind !== 'synthesis') ||
    typeof critical !== 'boolean'
  ) {
    throw new RegistryConfigurationError(`Tool manifest entry is malformed: ${JSON.stringify(entry)}`);
  }
  return typeof fallback === 'string'
    ? { name, description, kind, fallback, critical }
    : { name, description, kind, critical };
}

/** Reads tool descriptors from a manifest file (defaults to the bundled one). */
export function loadToolManifest(manifestPath?: string): ToolDescriptor[] {
  const path = manifestPath ?? requireAsset('tools', 'manifest.json');
  const manifest: unknown = JSON.parse(readFileSync(path, 'utf8'));
  const validation = validateJson(manifest, 'manifest.schema.json');
  if (!validation.ok || !isRecord(manifest) || !Array.isArray(manifest.tools)) {
    throw new RegistryConfigurationError(
      `Invalid tool manifest ${path}: ${(validation.errors ?? []).join('; ')}`,
    );
  }
  return manifest.tools.map(toDescriptor);
}
