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
 * Liar's Revolver PettingZoo AEC Environment
 *
 * Observation space (per player):
 * - Own hand (count of each card type)
 * - Own revolver (chambers, firing position one-hot)
 * - Active claim (count, claimant one-hot)
 * - Round target (one-hot)
 * - Alive flags and hand sizes of every player
 * - Am I current player, pile size
 *
 * Action space:
 * - 0: Call "Liar!"
 * - 1: Play the Devil
 * - 2-9: Play (target cards, Jokers) = (1,0) (0,1) (2,0) (1,1) (0,2) (3,0) (2,1) (1,2)
 */

import { AECEnvironment } from "./PettingZoo.js";
import { ActionID, Features, Space, normalize } from "./Gym.js";
import { GameSession } from "../engine/GameSession.js";
import { CHALLENGE, PLAY_DEVIL, describeAction, play } from "../engine/actions.js";
import { RandomSource } from "../core/random.js";
import { Action, CARD_ORDER, CHAMBERS, Card, HAND_SIZE, MAX_PLAY, RANKS, Rank, StepResult } from "../engine/types.js";
import { DECK_SIZE } from "../engine/Deck.js";

// ============================================================================
// Configuration
// ============================================================================

export interface LiarsRevolverAECConfig {
  /** Number of players (default: 4) */
  numPlayers?: number;
  /** Random seed */
  seed?: number | null;
  /** Random source, overrides seed */
  random?: RandomSource | null;
  /** Truncate the episode after this many steps (default: 500) */
  maxSteps?: number;
}

// ============================================================================
// Action Encoding
// ============================================================================

/** [target cards, Jokers] for each play id, starting at id 2. */
const PLAY_SHAPES: ReadonlyArray<readonly [number, number]> = [
  [1, 0], [0, 1],
  [2, 0], [1, 1], [0, 2],
  [3, 0], [2, 1], [1, 2],
];

const FIRST_PLAY_ID = 2;

export const ACTION_SPACE_SIZE = FIRST_PLAY_ID + PLAY_SHAPES.length; // 10

/**
 * Discrete id for an action, relative to the round target.
 * @returns null for plays that are not target cards and Jokers only
 */
export function encodeAction(action: Action, roundTarget: Rank): ActionID | null {
  switch (action.type) {
    case "challenge":
      return 0;
    case "play_devil":
      return 1;
    case "play": {
      const targets = action.cards.filter(c => c === roundTarget).length;
      const jokers = action.cards.filter(c => c === "Joker").length;
      if (targets + jokers !== action.cards.length) return null;
      const index = PLAY_SHAPES.findIndex(([t, j]) => t === targets && j === jokers);
      return index < 0 ? null : FIRST_PLAY_ID + index;
    }
  }
}

export function decodeAction(id: ActionID, roundTarget: Rank): Action {
  if (id === 0) return CHALLENGE;
  if (id === 1) return PLAY_DEVIL;

  const shape = PLAY_SHAPES[id - FIRST_PLAY_ID];
  if (!Number.isInteger(id) || !shape) {
    throw new RangeError(`Unknown action id: ${id}`);
  }
  const [targets, jokers] = shape;
  const cards: Card[] = [
    ...new Array<Card>(targets).fill(roundTarget),
    ...new Array<Card>(jokers).fill("Joker"),
  ];
  return play(cards);
}

// ============================================================================
// LiarsRevolverAEC Class
// ============================================================================

export class LiarsRevolverAEC extends AECEnvironment {
  private readonly session: GameSession;
  private config: Required<LiarsRevolverAECConfig>;
  private steps = 0;
  private lastAction: string | null = null;

  constructor(config: LiarsRevolverAECConfig = {}) {
    super();

    this.config = {
      numPlayers: config.numPlayers ?? 4,
      seed: config.seed ?? null,
      random: config.random ?? null,
      maxSteps: config.maxSteps ?? 500,
    };

    this.session = new GameSession({
      numPlayers: this.config.numPlayers,
      seed: this.config.seed,
      random: this.config.random,
    });

    // Seats and flags follow the engine through resets and restores
    this.session.on("game:reset", () => this.syncFromSession());
    this.session.on("game:restored", () => this.syncFromSession());
    this.syncFromSession();
  }

  /** The underlying engine, for inspection and state injection. */
  get game(): GameSession {
    return this.session;
  }

  // === Spaces ===

  observationSpace(_agent: string): Space {
    const n = this.session.numPlayers;
    const totalSize =
      CARD_ORDER.length + // hand composition
      CHAMBERS +          // chambers
      CHAMBERS +          // firing position
      1 +                 // claim count
      n +                 // claimant
      RANKS.length +      // round target
      n +                 // alive
      n +                 // hand sizes
      1 +                 // am I current player
      1;                  // pile size

    return {
      shape: [totalSize],
      low: new Array<number>(totalSize).fill(0),
      high: new Array<number>(totalSize).fill(1),
    };
  }

  actionSpace(_agent: string): Space {
    return { shape: [1], n: ACTION_SPACE_SIZE };
  }

  // === Core Loop ===

  async reset(seed?: number): Promise<void> {
    this.session.reset(this.config.numPlayers, seed);
  }

  observe(agent: string): Features {
    const obs = this.session.observe(this.getPlayerIndex(agent));
    const n = this.session.numPlayers;
    const features: number[] = [];

    for (const card of CARD_ORDER) {
      features.push(obs.hand.filter(c => c === card).length / HAND_SIZE);
    }

    for (const loaded of obs.revolver.chambers) features.push(loaded ? 1 : 0);
    for (let i = 0; i < CHAMBERS; i++) features.push(obs.revolver.position === i ? 1 : 0);

    features.push(obs.claim ? obs.claim.count / MAX_PLAY : 0);
    for (let i = 0; i < n; i++) features.push(obs.claim?.claimant === i ? 1 : 0);

    for (const rank of RANKS) features.push(obs.roundTarget === rank ? 1 : 0);

    for (const alive of obs.alive) features.push(alive ? 1 : 0);
    for (const size of obs.handSizes) features.push(normalize(size, 0, HAND_SIZE));

    features.push(obs.currentPlayer === obs.player ? 1 : 0);
    features.push(normalize(obs.pileSize, 0, DECK_SIZE));

    return features;
  }

  actionMask(agent: string): boolean[] {
    const mask = new Array<boolean>(ACTION_SPACE_SIZE).fill(false);
    if (this.session.isOver || this.getPlayerIndex(agent) !== this.session.activePlayer) {
      return mask;
    }

    const target = this.session.observe(this.session.activePlayer).roundTarget;
    for (const action of this.session.legalActions()) {
      const id = encodeAction(action, target);
      if (id !== null) mask[id] = true;
    }
    return mask;
  }

  async step(action: ActionID): Promise<void> {
    const actor = this.session.activePlayer;
    const target = this.session.observe(actor).roundTarget;
    const decoded = decodeAction(action, target);

    const result = this.session.step(decoded);
    this.steps++;
    this.lastAction = `Player ${actor} ${describeAction(decoded)}`;

    this.applyResult(result);
  }

  private applyResult(result: StepResult): void {
    const { info } = result;
    const agents = this.possibleAgents;

    this.clearStepRewards();
    info.rewards.forEach((reward, i) => {
      if (reward !== 0) this.addReward(agents[i], reward);
    });

    if (result.done) {
      for (const agent of agents) this.terminate(agent);
    } else {
      for (const player of info.eliminated) this.terminate(agents[player]);
      if (this.steps >= this.config.maxSteps) this.truncateAll();
      else this.markStalled();
    }

    const phase = this.session.phase;
    for (const agent of agents) {
      this.setInfo(agent, {
        lastAction: this.lastAction,
        phase,
        winner: info.winner,
        eliminated: [...info.eliminated],
        challenge: info.challenge,
      });
    }

    this.select(agents[this.session.activePlayer]);
  }

  // === Rendering ===

  render(): void {
    const snap = this.session.snapshot();
    console.log("\n" + "=".repeat(50));
    console.log("LIAR'S REVOLVER");
    console.log("=".repeat(50));
    console.log(`Round: ${snap.roundNumber} | Target: ${snap.roundTarget} | Pile: ${snap.pile.length} cards`);

    if (snap.claim) {
      console.log(`Claim: ${snap.claim.count}x ${snap.claim.target} (by Player ${snap.claim.claimant})`);
    } else {
      console.log("No claim yet");
    }

    console.log("\nPlayers:");
    snap.players.forEach((p, i) => {
      const marker = i === snap.currentPlayer ? "→ " : "  ";
      const status = p.alive ? "" : " [OUT]";
      const { position } = snap.revolvers[i];
      console.log(`${marker}Player ${i}: ${p.hand.join(" ")} | chamber ${position + 1}/${CHAMBERS}${status}`);
    });

    if (this.lastAction) {
      console.log(`\nLast: ${this.lastAction}`);
    }
    if (snap.winner !== null) {
      console.log(`\n*** PLAYER ${snap.winner} WINS ***`);
    }
  }

  close(): void {
    this.session.removeAllListeners();
  }

  // === Helpers ===

  /** Seats, statuses and selection rebuilt from the engine's current state. */
  private syncFromSession(): void {
    const n = this.session.numPlayers;
    this.steps = 0;
    this.lastAction = null;
    this.resetState(Array.from({ length: n }, (_, i) => `player_${i}`));

    for (let i = 0; i < n; i++) {
      if (this.session.isOver || !this.session.isAlive(i)) this.terminate(`player_${i}`);
    }
    this.markStalled();
    this.select(`player_${this.session.activePlayer}`);
  }

  /** Truncate when the player to act has nothing to play and no claim to call. */
  private markStalled(): void {
    if (this.session.isOver || this.session.legalActions().length > 0) return;
    this.truncateAll();
  }

  private getPlayerIndex(agent: string): number {
    const index = this.possibleAgents.indexOf(agent);
    if (index < 0) {
      throw new RangeError(`Unknown agent: ${agent}`);
    }
    return index;
  }

  /**
   * Get action names for display
   */
  getActionNames(): string[] {
    return [
      "Liar!",
      "Play Devil",
      ...PLAY_SHAPES.map(([t, j]) => `Play ${t} target + ${j} Joker`),
    ];
  }
}

export default LiarsRevolverAEC;
