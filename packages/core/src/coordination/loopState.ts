/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { OrchestratorEventBus } from '../event-bus/bus.js';

export enum LoopState {
  PROPOSING = 'PROPOSING',
  CRITIQUING = 'CRITIQUING',
  APPROVED = 'APPROVED',
  REVISING = 'REVISING',
  EXHAUSTED = 'EXHAUSTED',
}

export type LoopEvent = 'proposed' | 'approve' | 'revise' | 'exhaust' | 'repropose' | 'stall';

const TRANSITIONS: Record<LoopState, Partial<Record<LoopEvent, LoopState>>> = {
  [LoopState.PROPOSING]: {
    proposed: LoopState.CRITIQUING,
    stall: LoopState.EXHAUSTED,
  },
  [LoopState.CRITIQUING]: {
    approve: LoopState.APPROVED,
    revise: LoopState.REVISING,
    exhaust: LoopState.EXHAUSTED,
  },
  [LoopState.REVISING]: {
    repropose: LoopState.PROPOSING,
  },
  [LoopState.APPROVED]: {},
  [LoopState.EXHAUSTED]: {},
};

export function advance(current: LoopState, event: LoopEvent): LoopState {
  const next = TRANSITIONS[current][event];
  if (next === undefined) {
    throw new Error(`illegal transition: ${event} from ${current}`);
  }
  return next;
}

export function isTerminal(state: LoopState): boolean {
  return state === LoopState.APPROVED || state === LoopState.EXHAUSTED;
}

export class LoopStateMachine {
  private current: LoopState = LoopState.PROPOSING;
  private readonly bus: OrchestratorEventBus;
  private iteration = 1;

  constructor(bus: OrchestratorEventBus) {
    this.bus = bus;
  }

  state(): LoopState {
    return this.current;
  }

  /** 1-based plan version currently in play */
  planVersion(): number {
    return this.iteration;
  }

  fire(event: LoopEvent): LoopState {
    const from = this.current;
    const to = advance(from, event);
    this.current = to;
    if (event === 'repropose') this.iteration++;

    this.bus.publish({
      ts: Date.now(),
      type: 'loop-transition',
      payload: { from, to, event, iteration: this.iteration },
    });
    return to;
  }
}
