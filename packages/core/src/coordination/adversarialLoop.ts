/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { OrchestratorEventBus } from '../event-bus/bus.js';
import type { CriticAgent } from '../agents/critic.js';
import type { PlannerAgent, Proposal } from '../agents/planner.js';
import {
  sameSteps,
  snapshotPlan,
  type CritiqueResult,
  type Plan,
  type PlanHistoryEntry,
} from '../interfaces/orchestration.js';
import { duelLog } from '../utils/duelLogger.js';
import { LoopState, LoopStateMachine } from './loopState.js';

export interface AdversarialLoopOptions {
  /** revisions allowed after the first proposal; defaults to 2 */
  maxIterations?: number;
  /** unapproved plans scoring below this are not executed; defaults to 50 */
  rejectionThreshold?: number;
}

export interface LoopOutcome {
  /** the approved plan, or the highest-scoring critiqued plan when none was approved */
  plan: Plan;
  critique: CritiqueResult;
  approved: boolean;
  finalScore: number;
  history: PlanHistoryEntry[];
  iterations: number;
  finalState: LoopState.APPROVED | LoopState.EXHAUSTED;
  stalled: boolean;
  rejectedForExecution: boolean;
  /** the first proposal, carrying any pattern match */
  initialProposal: Proposal;
  /** some planning step ran without the model it wanted */
  degraded: boolean;
}

/**
 * Planner ⇄ critic refinement. Terminates on approval, on a spent revision
 * budget, or when a revision repeats its predecessor.
 */
export class AdversarialLoop {
  private readonly bus: OrchestratorEventBus;
  private readonly planner: PlannerAgent;
  private readonly critic: CriticAgent;
  private readonly maxIterations: number;
  private readonly rejectionThreshold: number;

  constructor(bus: OrchestratorEventBus, planner: PlannerAgent, critic: CriticAgent, options: AdversarialLoopOptions = {}) {
    this.bus = bus;
    this.planner = planner;
    this.critic = critic;
    this.maxIterations = options.maxIterations ?? 2;
    this.rejectionThreshold = options.rejectionThreshold ?? 50;
  }

  async refine(query: string): Promise<LoopOutcome> {
    const machine = new LoopStateMachine(this.bus);
    const history: PlanHistoryEntry[] = [];

    const initialProposal = await this.planner.propose({ query });
    let degraded = initialProposal.degraded;
    let plan = initialProposal.plan;
    machine.fire('proposed');

    let critique = await this.critic.critique(plan);
    // earliest plan wins a tie
    let best = { plan, critique };
    let stalled = false;
    for (;;) {
      if (critique.score > best.critique.score) {
        best = { plan, critique };
      }
      history.push({
        iteration: machine.planVersion(),
        plan: snapshotPlan(plan),
        score: critique.score,
        approved: critique.approved,
        issues: [...critique.issues],
      });

      if (critique.approved) {
        machine.fire('approve');
        break;
      }
      if (machine.planVersion() >= this.maxIterations + 1) {
        machine.fire('exhaust');
        break;
      }

      machine.fire('revise');
      const revision = await this.planner.propose({ query, priorPlan: plan, critique });
      degraded = degraded || revision.degraded;
      machine.fire('repropose');

      if (sameSteps(revision.plan.steps, plan.steps)) {
        history.push({
          iteration: machine.planVersion(),
          plan: snapshotPlan(revision.plan),
          score: critique.score,
          approved: false,
          issues: [...critique.issues],
          stalled: true,
        });
        machine.fire('stall');
        stalled = true;
        duelLog('ORCHESTRATOR', `revision ${revision.plan.revision} repeated its predecessor; stopping`);
        break;
      }

      plan = revision.plan;
      machine.fire('proposed');
      critique = await this.critic.critique(plan);
    }

    const finalState = machine.state() === LoopState.APPROVED ? LoopState.APPROVED : LoopState.EXHAUSTED;
    const approved = finalState === LoopState.APPROVED;
    const chosen = approved ? { plan, critique } : best;
    const rejectedForExecution = !approved && chosen.critique.score < this.rejectionThreshold;
    duelLog(
      'ORCHESTRATOR',
      `loop ${finalState.toLowerCase()} after ${history.length} plan version(s); score ${chosen.critique.score}${rejectedForExecution ? ', rejected' : ''}`,
    );

    return {
      plan: chosen.plan,
      critique: chosen.critique,
      approved,
      finalScore: chosen.critique.score,
      history,
      iterations: history.length,
      finalState,
      stalled,
      rejectedForExecution,
      initialProposal,
      degraded,
    };
  }
}
