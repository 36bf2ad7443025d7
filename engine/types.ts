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
 * engine/types.ts
 */

export const RANKS = ["Ace", "King", "Queen"] as const;
export type Rank = (typeof RANKS)[number];

export type Card = Rank | "Joker" | "Devil";

/** Canonical card ordering, used wherever a sequence of cards must be stable. */
export const CARD_ORDER: readonly Card[] = ["Ace", "King", "Queen", "Joker", "Devil"];

export const HAND_SIZE = 5;
export const CHAMBERS = 6;
export const MAX_PLAY = 3;

export interface Claim {
  count: number;
  target: Rank;
  claimant: number;
}

export type Action =
  | { type: "challenge" }
  | { type: "play_devil" }
  | { type: "play"; count: number; cards: Card[] };

export type PlayAction = Extract<Action, { type: "play" }>;

export type Phase = "awaiting_play" | "awaiting_challenge_or_raise" | "game_over";

export interface RevolverView {
  chambers: boolean[];
  position: number;
}

export interface PlayerState {
  hand: Card[];
  alive: boolean;
}

/**
 * Everything one player is allowed to see.
 */
export interface Observation {
  player: number;
  hand: Card[];
  revolver: RevolverView;
  claim: Claim | null;
  roundTarget: Rank;
  alive: boolean[];
  handSizes: number[];
  currentPlayer: number;
  pileSize: number;
  phase: Phase;
}

export interface StepInfo {
  /** Reward earned by every player on this step, by player index. */
  rewards: number[];
  eliminated: number[];
  winner: number | null;
  challenge: ChallengeOutcome | null;
}

export interface StepResult {
  observation: Observation;
  reward: number;
  done: boolean;
  info: StepInfo;
}

export interface Pull {
  player: number;
  fired: boolean;
  retribution: boolean;
}

export interface ChallengeOutcome {
  challenger: number;
  claimant: number;
  slice: Card[];
  valid: number;
  claimed: number;
  /** True when the claim was a lie and the claimant is pulled. */
  succeeded: boolean;
  devilRevealed: boolean;
  pulls: Pull[];
}

/** Full, serialisable session state. */
export interface GameSnapshot {
  numPlayers: number;
  players: PlayerState[];
  revolvers: RevolverView[];
  pile: Card[];
  claim: Claim | null;
  roundTarget: Rank;
  currentPlayer: number;
  roundNumber: number;
  winner: number | null;
  over: boolean;
}
