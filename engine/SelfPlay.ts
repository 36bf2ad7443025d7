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
/**
 * Self-Play Training Loop
 *
 * Every seat is driven by the same epsilon-greedy policy and shares one
 * Q-table. A seat's transition is held open from its action until its next
 * turn (or elimination, or the end of the game) so that rewards earned on
 * other players' turns are credited to it.
 */

import { Emitter } from "../core/events.js";
import { RandomSource, toRandomSource } from "../core/random.js";
import { GameSession } from "./GameSession.js";
import { QLearner } from "./Learner.js";
import { EpsilonGreedyPolicy } from "./Policy.js";
import { Action, Observation } from "./types.js";

// ============================================================================
// Types
// ============================================================================

export interface SelfPlayConfig {
  numPlayers?: number;
  seed?: number | null;
  random?: RandomSource | null;
  /** Learning rate (default: 0.1) */
  alpha?: number;
  /** Discount factor (default: 0.95) */
  gamma?: number;
  /** Starting exploration rate (default: 1) */
  epsilon?: number;
  /** Multiplied into epsilon after each episode (default: 0.995) */
  epsilonDecay?: number;
  /** Floor for epsilon (default: 0.05) */
  minEpsilon?: number;
  /** Steps before an episode is truncated (default: 500) */
  maxSteps?: number;
}

export interface TrainingOptions {
  /** Episodes between returns to the event loop (default: 100) */
  yieldEvery?: number;
}

export interface EpisodeStats {
  episode: number;
  steps: number;
  winner: number | null;
  truncated: boolean;
  challenges: number;
  eliminations: number;
  rewards: number[];
  epsilon: number;
}

export interface TrainingSummary {
  episodes: number;
  wins: number[];
  draws: number;
  truncated: number;
  avgSteps: number;
  avgChallenges: number;
  states: number;
  updates: number;
  finalEpsilon: number;
}

export interface TrainerEvents {
  "episode:end": EpisodeStats;
  "training:complete": TrainingSummary;
}

interface Pending {
  obs: Observation;
  action: Action;
  reward: number;
}

// ============================================================================
// SelfPlayTrainer
// ============================================================================

export class SelfPlayTrainer extends Emitter<TrainerEvents> {
  readonly learner: QLearner;
  readonly policy: EpsilonGreedyPolicy;
  readonly session: GameSession;
  private config: Required<Omit<SelfPlayConfig, "seed" | "random">>;
  private _epsilon: number;
  private episodes = 0;

  constructor(config: SelfPlayConfig = {}) {
    super();

    this.config = {
      numPlayers: config.numPlayers ?? 4,
      alpha: config.alpha ?? 0.1,
      gamma: config.gamma ?? 0.95,
      epsilon: config.epsilon ?? 1,
      epsilonDecay: config.epsilonDecay ?? 0.995,
      minEpsilon: config.minEpsilon ?? 0.05,
      maxSteps: config.maxSteps ?? 500,
    };

    const random = toRandomSource(config.random ?? config.seed);
    this.learner = new QLearner({ alpha: this.config.alpha, gamma: this.config.gamma });
    this.policy = new EpsilonGreedyPolicy(this.learner, random);
    this.session = new GameSession({ numPlayers: this.config.numPlayers, random });
    this._epsilon = this.config.epsilon;
  }

  get epsilon(): number {
    return this._epsilon;
  }

  /**
   * Play one full game, learning as it goes.
   */
  playEpisode(): EpisodeStats {
    const session = this.session;
    const n = this.config.numPlayers;
    session.reset(n);

    const pending = new Map<number, Pending>();
    const totals = new Array<number>(n).fill(0);
    let steps = 0;
    let challenges = 0;
    let eliminations = 0;
    let truncated = false;

    while (!session.isOver) {
      if (steps >= this.config.maxSteps) {
        truncated = true;
        break;
      }

      const actor = session.activePlayer;
      const obs = session.observe(actor);

      const open = pending.get(actor);
      if (open) {
        this.learner.update(open.obs, open.action, open.reward, obs);
        pending.delete(actor);
      }

      if (this.policy.enumerateLegalActions(obs).length === 0) {
        truncated = true;
        break;
      }

      const action = this.policy.selectAction(obs, this._epsilon);
      const result = session.step(action);
      steps++;
      if (action.type === "challenge") challenges++;

      pending.set(actor, { obs, action, reward: 0 });
      result.info.rewards.forEach((reward, i) => {
        totals[i] += reward;
        const open = pending.get(i);
        if (open) open.reward += reward;
      });

      for (const player of result.info.eliminated) {
        eliminations++;
        this.close(pending, player, null);
      }
    }

    // Flush whatever is still open
    for (const player of [...pending.keys()]) {
      this.close(pending, player, session.isOver ? null : session.observe(player));
    }

    const stats: EpisodeStats = {
      episode: ++this.episodes,
      steps,
      winner: session.gameWinner,
      truncated,
      challenges,
      eliminations,
      rewards: totals,
      epsilon: this._epsilon,
    };

    this._epsilon = Math.max(this.config.minEpsilon, this._epsilon * this.config.epsilonDecay);
    this.emit("episode:end", stats);
    return stats;
  }

  /**
   * Play `episodes` games. Every `yieldEvery` episodes control returns to
   * the event loop, so timers (progress spinners) get to run.
   * @throws RangeError if `episodes` is not a positive integer
   */
  async train(episodes: number, { yieldEvery = 100 }: TrainingOptions = {}): Promise<TrainingSummary> {
    if (!Number.isInteger(episodes) || episodes < 1) {
      throw new RangeError(`Episode count must be a positive integer, got ${episodes}`);
    }
    if (!Number.isInteger(yieldEvery) || yieldEvery < 1) {
      throw new RangeError(`yieldEvery must be a positive integer, got ${yieldEvery}`);
    }

    const wins = new Array<number>(this.config.numPlayers).fill(0);
    let draws = 0;
    let truncated = 0;
    let steps = 0;
    let challenges = 0;

    for (let e = 0; e < episodes; e++) {
      const stats = this.playEpisode();
      steps += stats.steps;
      challenges += stats.challenges;
      if (stats.truncated) truncated++;
      else if (stats.winner === null) draws++;
      else wins[stats.winner]++;

      if ((e + 1) % yieldEvery === 0 && e + 1 < episodes) {
        await new Promise<void>(resolve => setImmediate(resolve));
      }
    }

    const summary: TrainingSummary = {
      episodes,
      wins,
      draws,
      truncated,
      avgSteps: steps / episodes,
      avgChallenges: challenges / episodes,
      states: this.learner.size,
      updates: this.learner.updates,
      finalEpsilon: this._epsilon,
    };
    this.emit("training:complete", summary);
    return summary;
  }

  private close(pending: Map<number, Pending>, player: number, next: Observation | null): void {
    const open = pending.get(player);
    if (!open) return;
    this.learner.update(open.obs, open.action, open.reward, next);
    pending.delete(player);
  }
}
