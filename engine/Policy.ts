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
 * engine/Policy.ts
 */
import { RandomSource, pickOne } from "../core/random.js";
import { enumerateActions } from "./actions.js";
import { NoLegalActionError } from "./errors.js";
import { QLearner } from "./Learner.js";
import { Action, Observation } from "./types.js";

/**
 * Epsilon-greedy over the learner's values: explore with probability
 * `explorationRate`, otherwise take the best known action.
 */
export class EpsilonGreedyPolicy {
  readonly learner: QLearner;
  private readonly random: RandomSource;

  constructor(learner: QLearner, random: RandomSource = Math.random) {
    this.learner = learner;
    this.random = random;
  }

  enumerateLegalActions(obs: Observation): Action[] {
    if (obs.phase === "game_over") return [];
    return enumerateActions(obs.hand, obs.claim, obs.roundTarget);
  }

  /**
   * @throws NoLegalActionError when the observation offers nothing to do
   */
  selectAction(obs: Observation, explorationRate: number): Action {
    const actions = this.enumerateLegalActions(obs);
    if (actions.length === 0) {
      throw new NoLegalActionError(obs.player);
    }
    if (this.random() < explorationRate) {
      return pickOne(this.random, actions);
    }
    return this.learner.best(obs, actions) ?? actions[0];
  }
}
