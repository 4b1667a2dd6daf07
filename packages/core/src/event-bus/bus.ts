/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type {
  OrchestratorEvent,
  OrchestratorEventHandler,
  OrchestratorEventType,
} from './types.js';

export class OrchestratorEventBus {
  private _handlers = new Map<OrchestratorEventType, OrchestratorEventHandler[]>();

  /** Handlers receive the event union; narrow on `evt.type` to read the payload. */
  subscribe(type: OrchestratorEventType, h: OrchestratorEventHandler): () => void {
    const handlers = this._handlers.get(type) ?? [];
    handlers.push(h);
    this._handlers.set(type, handlers);

    // Return unsubscribe function
    return () => {
      const index = handlers.indexOf(h);
      if (index > -1) {
        handlers.splice(index, 1);
      }
    };
  }

  publish(evt: OrchestratorEvent): void {
    // Handlers run synchronously, in subscription order
    const handlers = this._handlers.get(evt.type);
    if (handlers) {
      for (const handler of [...handlers]) {
        handler(evt);
      }
    }
  }

  listenerCount(type?: OrchestratorEventType): number {
    if (type) return this._handlers.get(type)?.length ?? 0;
    let total = 0;
    for (const handlers of this._handlers.values()) total += handlers.length;
    return total;
  }
}
