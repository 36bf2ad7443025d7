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
 * Liar's Revolver
 * Barrel exports for the engine, the RL environment and the learner.
 */

export { mulberry32, shuffleArray, toRandomSource } from "./core/random.js";
export type { RandomSource } from "./core/random.js";
export { Emitter } from "./core/events.js";
export type { Listener } from "./core/events.js";

export * from "./engine/types.js";
export { ConfigurationError, IllegalMoveError, NoLegalActionError, GameError } from "./engine/errors.js";
export type { GameErrorCode } from "./engine/errors.js";
export { buildDeck, composeDeck, DECK_SIZE } from "./engine/Deck.js";
export { RevolverMechanic } from "./engine/Revolver.js";
export {
  enumerateActions,
  combinations,
  actionKey,
  actionsEqual,
  canonicalCards,
  countMatching,
  describeAction,
  play,
  CHALLENGE,
  PLAY_DEVIL,
} from "./engine/actions.js";
export { GameSession, REWARDS, removeCards } from "./engine/GameSession.js";
export type { GameSessionConfig, SessionEvents } from "./engine/GameSession.js";
export { QLearner, stateKey } from "./engine/Learner.js";
export type { QLearnerOptions } from "./engine/Learner.js";
export { EpsilonGreedyPolicy } from "./engine/Policy.js";
export { SelfPlayTrainer } from "./engine/SelfPlay.js";
export type { SelfPlayConfig, EpisodeStats, TrainingSummary, TrainingOptions } from "./engine/SelfPlay.js";

export { AECEnvironment } from "./interface/PettingZoo.js";
export type { AECStepResult } from "./interface/PettingZoo.js";
export { normalize } from "./interface/Gym.js";
export type { Features, ActionID, Space, Info } from "./interface/Gym.js";
export type { LiarsRevolverAECConfig } from "./interface/LiarsRevolverAEC.js";
export {
  LiarsRevolverAEC,
  encodeAction,
  decodeAction,
  ACTION_SPACE_SIZE,
} from "./interface/LiarsRevolverAEC.js";
