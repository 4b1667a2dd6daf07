/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { vi, type Mock } from 'vitest';
import { splitContext } from '../coordination/context.js';
import type { ModelClient, ModelRequest } from '../core/modelClient.js';
import { OrchestratorEventBus } from '../event-bus/bus.js';
import type { OrchestratorEvent, OrchestratorEventType } from '../event-bus/types.js';
import { ToolRegistry, loadToolManifest } from '../tools/toolRegistry.js';
import type { ToolHandler } from '../tools/tools.js';

type Complete = (request: ModelRequest) => Promise<string>;

/**
 * Model that answers from a script, one entry per call; an Error entry
 * rejects. The last entry repeats once the script runs out.
 */
export function createScriptedModel(responses: Array<string | Error>): {
  model: ModelClient;
  complete: Mock<Complete>;
} {
  let call = 0;
  const complete = vi.fn<Complete>().mockImplementation(async () => {
    const next = responses[Math.min(call, responses.length - 1)];
    call++;
    if (next instanceof Error) throw next;
    return next;
  });
  return { model: { name: 'scripted-model', complete }, complete };
}

/** Model that always answers with `text` */
export function createSuccessfulModel(text: string): ModelClient {
  return createScriptedModel([text]).model;
}

/** Model that always rejects */
export function createFailingModel(error: Error = new Error('503 Service Unavailable')): ModelClient {
  return createScriptedModel([error]).model;
}

/** Model whose calls never settle; pair with a short timeout */
export function createHangingModel(): ModelClient {
  return { name: 'hanging-model', complete: () => new Promise<string>(() => {}) };
}

/**
 * Create a fresh event bus and capture all published events
 */
export function createEventCapture(): {
  bus: OrchestratorEventBus;
  events: OrchestratorEvent[];
  getEventTypes: () => OrchestratorEventType[];
  getEventsByType: (type: OrchestratorEventType) => OrchestratorEvent[];
  reset: () => void;
} {
  const bus = new OrchestratorEventBus();
  const events: OrchestratorEvent[] = [];

  const originalPublish = bus.publish.bind(bus);
  vi.spyOn(bus, 'publish').mockImplementation((event) => {
    events.push({ ...event });
    return originalPublish(event);
  });

  return {
    bus,
    events,
    getEventTypes: () => events.map((e) => e.type),
    getEventsByType: (type) => events.filter((e) => e.type === type),
    reset: () => {
      events.length = 0;
    },
  };
}

export function warningMessages(events: OrchestratorEvent[]): string[] {
  return events.flatMap((e) => (e.type === 'warning' ? [e.payload.message] : []));
}

/** Deterministic handler that echoes the tool name and the step's question. */
export function echoTool(name: string): ToolHandler {
  return async (input) => `${name} result for ${splitContext(input).question}`;
}

export function failingTool(message: string): ToolHandler {
  return async () => {
    throw new Error(message);
  };
}

/**
 * Registry with the bundled manifest's descriptors and in-process handlers:
 * echo tools unless overridden. `omit` leaves tools unregistered.
 */
export function createTestRegistry(
  overrides: Record<string, ToolHandler> = {},
  omit: string[] = [],
): ToolRegistry {
  const registry = new ToolRegistry({ timeoutMs: 1_000 });
  for (const descriptor of loadToolManifest()) {
    if (omit.includes(descriptor.name)) continue;
    registry.register(descriptor, overrides[descriptor.name] ?? echoTool(descriptor.name));
  }
  return registry;
}
