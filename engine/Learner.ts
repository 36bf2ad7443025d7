/*
 * Copyright 2025 The Carpocratian Church of Commonality and Equality, Inc.
 *
 * Licensed under the Apache License, Version 2.0 (the "License");
 * you may not use this file except in compliance with the License.
 * You may obtain a copy of the License at
 *
 *      http://www.apache.org/licenses/LICENSE-2.0
 *
 * Unless required by applicable law or agreed to in writing, software
 * distributed under the License is distributed on an "AS IS" BASIS,
 * WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
 * See the License for the specific language governing permissions and
 * limitations under the License.
 */
/*
 * engine/Learner.ts
 * Tabular Q-learning over structured actions.
 */
import { actionKey, enumerateActions } from "./actions.js";
import { Action, CARD_ORDER, CHAMBERS, Observation } from "./types.js";

export interface QLearnerOptions {
  /** Learning rate (default: 0.1) */
  alpha?: number;
  /** Discount factor (default: 0.95) */
  gamma?: number;
}

/**
 * Key an observation down to what a tabular learner can generalise over:
 * target, hand composition, claim size, shots until the bullet, players left.
 */
export function stateKey(obs: Observation): string {
  const hand = CARD_ORDER.map(card => obs.hand.filter(c => c === card).length).join("");
  const bullet = obs.revolver.chambers.indexOf(true);
  const shotsLeft = (bullet - obs.revolver.position + CHAMBERS) % CHAMBERS;
  const alive = obs.alive.filter(Boolean).length;
  return `${obs.roundTarget}|${hand}|${obs.claim?.count ?? 0}|${shotsLeft}|${alive}`;
}

export class QLearner {
  readonly alpha: number;
  readonly gamma: number;
  private readonly table = new Map<string, Map<string, number>>();
  private _updates = 0;

  constructor({ alpha = 0.1, gamma = 0.95 }: QLearnerOptions = {}) {
    this.alpha = alpha;
    this.gamma = gamma;
  }

  get size(): number {
    return this.table.size;
  }

  get updates(): number {
    return this._updates;
  }

  value(obs: Observation, action: Action): number {
    return this.table.get(stateKey(obs))?.get(actionKey(action)) ?? 0;
  }

  /**
   * Highest-valued action; ties go to the earliest in `actions`.
   */
  best(obs: Observation, actions: readonly Action[]): Action | null {
    let best: Action | null = null;
    let bestValue = -Infinity;
    for (const action of actions) {
      const v = this.value(obs, action);
      if (v > bestValue) {
        best = action;
        bestValue = v;
      }
    }
    return best;
  }

  /**
   * One-step Q-learning backup.
   * @param next - the acting player's next observation, or null if terminal
   */
  update(prior: Observation, action: Action, reward: number, next: Observation | null): void {
    const target = reward + this.gamma * this.maxValue(next);
    const current = this.value(prior, action);

    const key = stateKey(prior);
    let row = this.table.get(key);
    if (!row) {
      row = new Map<string, number>();
      this.table.set(key, row);
    }
    row.set(actionKey(action), current + this.alpha * (target - current));
    this._updates++;
  }

  toJSON(): Record<string, Record<string, number>> {
    const out: Record<string, Record<string, number>> = {};
    for (const [state, row] of this.table) {
      out[state] = Object.fromEntries(row);
    }
    return out;
  }

  private maxValue(next: Observation | null): number {
    if (!next || next.phase === "game_over") return 0;
    const actions = enumerateActions(next.hand, next.claim, next.roundTarget);
    if (actions.length === 0) return 0;
    return Math.max(...actions.map(a => this.value(next, a)));
  }
}
