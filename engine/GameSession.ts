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
 * Liar's Revolver - the turn state machine
 *
 * Each round names a target rank (Ace, King or Queen). On their turn a player
 * either plays 1-3 cards face down, claiming they all match the target, or
 * calls "Liar!" on the previous claim. The loser of a challenge pulls the
 * trigger of their own revolver. A revealed Devil card makes everyone else
 * pull as well. Last player standing wins.
 */

import { Emitter } from "../core/events.js";
import { RandomSource, mulberry32, pickOne, toRandomSource } from "../core/random.js";
import { cardsOf, countMatching, enumerateActions } from "./actions.js";
import { assertTableSize, buildDeck } from "./Deck.js";
import { ConfigurationError, IllegalMoveError } from "./errors.js";
import { RevolverMechanic } from "./Revolver.js";
import {
  Action,
  CARD_ORDER,
  CHAMBERS,
  Card,
  ChallengeOutcome,
  Claim,
  GameSnapshot,
  MAX_PLAY,
  Observation,
  Phase,
  Pull,
  RANKS,
  Rank,
  StepResult,
} from "./types.js";

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_PLAYERS = 4;

/** Reward contract handed to learners. */
export const REWARDS = {
  play: 10,
  devilBonus: 20,
  challengeKill: 50,
  selfElimination: -100,
  retributionSurvival: 30,
  win: 200,
} as const;

// ============================================================================
// Types
// ============================================================================

export interface GameSessionConfig {
  numPlayers?: number;
  seed?: number | null;
  /** Overrides `seed`; every random draw in the game comes from here. */
  random?: RandomSource | null;
}

export interface SessionEvents {
  "game:reset": { numPlayers: number; roundTarget: Rank };
  "game:restored": { numPlayers: number; currentPlayer: number };
  "card:played": { player: number; cards: Card[]; claim: Claim };
  "revolver:pulled": Pull;
  "player:eliminated": { player: number; retribution: boolean };
  "challenge:resolved": ChallengeOutcome;
  "round:started": { roundNumber: number; roundTarget: Rank; currentPlayer: number };
  "game:over": { winner: number | null; roundNumber: number };
}

// ============================================================================
// GameSession Class
// ============================================================================

export class GameSession extends Emitter<SessionEvents> {
  private config: Required<GameSessionConfig>;
  private random: RandomSource;
  private revolvers: RevolverMechanic;

  private _numPlayers = 0;
  private hands: Card[][] = [];
  private pile: Card[] = [];
  private claim: Claim | null = null;
  private roundTarget: Rank = "Ace";
  private currentPlayer = 0;
  private roundNumber = 1;
  private winner: number | null = null;
  private over = false;

  /**
   * @throws ConfigurationError if the player count cannot be dealt
   */
  constructor(config: GameSessionConfig = {}) {
    super();

    this.config = {
      numPlayers: config.numPlayers ?? DEFAULT_PLAYERS,
      seed: config.seed ?? null,
      random: config.random ?? null,
    };

    this.random = toRandomSource(this.config.random ?? this.config.seed);
    this.revolvers = new RevolverMechanic(this.random);
    this.reset();
  }

  // === Lifecycle ===

  /**
   * Start a new game: draw a target, deal, arm every revolver.
   * @returns the observation of the first player to act
   */
  reset(numPlayers?: number, seed?: number): Observation {
    const n = numPlayers ?? this.config.numPlayers;
    assertTableSize(n);

    if (seed !== undefined) {
      this.random = mulberry32(seed);
    }

    this._numPlayers = n;
    this.config.numPlayers = n;
    this.roundTarget = pickOne(this.random, RANKS);
    this.hands = buildDeck(this.roundTarget, n, this.random);

    this.revolvers = new RevolverMechanic(this.random);
    for (let i = 0; i < n; i++) this.revolvers.arm(i);

    this.pile = [];
    this.claim = null;
    this.currentPlayer = 0;
    this.roundNumber = 1;
    this.winner = null;
    this.over = false;

    this.emit("game:reset", { numPlayers: n, roundTarget: this.roundTarget });
    return this.observe(this.currentPlayer);
  }

  /**
   * Replace the whole state, bypassing randomness. Used for replays and
   * for setting up exact positions.
   * @throws ConfigurationError if the snapshot is inconsistent
   */
  restore(snapshot: GameSnapshot): void {
    validateSnapshot(snapshot);

    const revolvers = new RevolverMechanic(this.random);
    snapshot.revolvers.forEach((view, i) => {
      revolvers.load(i, view, !snapshot.players[i].alive);
    });

    this._numPlayers = snapshot.numPlayers;
    this.hands = snapshot.players.map(p => [...p.hand]);
    this.revolvers = revolvers;
    this.pile = [...snapshot.pile];
    this.claim = snapshot.claim ? { ...snapshot.claim } : null;
    this.roundTarget = snapshot.roundTarget;
    this.currentPlayer = snapshot.currentPlayer;
    this.roundNumber = snapshot.roundNumber;
    this.winner = snapshot.winner;
    this.over = snapshot.over;

    this.emit("game:restored", { numPlayers: this._numPlayers, currentPlayer: this.currentPlayer });
  }

  snapshot(): GameSnapshot {
    return {
      numPlayers: this._numPlayers,
      players: this.hands.map((hand, i) => ({ hand: [...hand], alive: this.isAlive(i) })),
      revolvers: this.hands.map((_, i) => this.revolvers.view(i)),
      pile: [...this.pile],
      claim: this.claim ? { ...this.claim } : null,
      roundTarget: this.roundTarget,
      currentPlayer: this.currentPlayer,
      roundNumber: this.roundNumber,
      winner: this.winner,
      over: this.over,
    };
  }

  // === Queries ===

  get numPlayers(): number {
    return this._numPlayers;
  }

  get activePlayer(): number {
    return this.currentPlayer;
  }

  get isOver(): boolean {
    return this.over;
  }

  get gameWinner(): number | null {
    return this.winner;
  }

  get phase(): Phase {
    if (this.over) return "game_over";
    return this.claim ? "awaiting_challenge_or_raise" : "awaiting_play";
  }

  isAlive(player: number): boolean {
    return !this.revolvers.isEliminated(player);
  }

  aliveCount(): number {
    let count = 0;
    for (let i = 0; i < this._numPlayers; i++) if (this.isAlive(i)) count++;
    return count;
  }

  /**
   * What `player` can see: their own cards and revolver, public table state.
   */
  observe(player: number): Observation {
    if (!Number.isInteger(player) || player < 0 || player >= this._numPlayers) {
      throw new RangeError(`No such player: ${player}`);
    }
    return {
      player,
      hand: [...this.hands[player]],
      revolver: this.revolvers.view(player),
      claim: this.claim ? { ...this.claim } : null,
      roundTarget: this.roundTarget,
      alive: this.hands.map((_, i) => this.isAlive(i)),
      handSizes: this.hands.map(h => h.length),
      currentPlayer: this.currentPlayer,
      pileSize: this.pile.length,
      phase: this.phase,
    };
  }

  /**
   * Legal actions for the player to act. Empty once the game is over.
   */
  legalActions(): Action[] {
    if (this.over) return [];
    return enumerateActions(this.hands[this.currentPlayer], this.claim, this.roundTarget);
  }

  // === Actions ===

  /**
   * Apply an action for the player whose turn it is.
   * @throws IllegalMoveError with the session unchanged
   */
  step(action: Action): StepResult {
    if (this.over) {
      throw new IllegalMoveError("Game is over");
    }
    if (action.type === "challenge") {
      return this.handleChallenge(this.currentPlayer);
    }
    return this.handlePlay(this.currentPlayer, action);
  }

  private handlePlay(player: number, action: Exclude<Action, { type: "challenge" }>): StepResult {
    const cards = cardsOf(action);
    const count = action.type === "play" ? action.count : 1;

    if (!Number.isInteger(count) || count < 1 || count > MAX_PLAY) {
      throw new IllegalMoveError(`Play count must be 1-${MAX_PLAY}, got ${count}`);
    }
    if (cards.length !== count) {
      throw new IllegalMoveError(`Claimed ${count} cards but played ${cards.length}`);
    }
    const remaining = removeCards(this.hands[player], cards);
    if (!remaining) {
      throw new IllegalMoveError(`Player ${player} does not hold [${cards.join(", ")}]`);
    }

    this.hands[player] = remaining;
    this.pile.push(...cards);
    this.claim = { count, target: this.roundTarget, claimant: player };
    this.advanceTurn(player);

    const rewards = this.zeroRewards();
    rewards[player] = REWARDS.play + (cards.includes("Devil") ? REWARDS.devilBonus : 0);

    this.emit("card:played", { player, cards: [...cards], claim: { ...this.claim } });

    return {
      observation: this.observe(this.currentPlayer),
      reward: rewards[player],
      done: false,
      info: { rewards, eliminated: [], winner: null, challenge: null },
    };
  }

  private handleChallenge(challenger: number): StepResult {
    const claim = this.claim;
    if (!claim) {
      throw new IllegalMoveError("There is no claim to challenge");
    }

    const slice = this.pile.slice(this.pile.length - claim.count);
    const valid = countMatching(slice, claim.target);
    const succeeded = valid < claim.count;
    const devilRevealed = slice.includes("Devil");
    const loser = succeeded ? claim.claimant : challenger;

    const rewards = this.zeroRewards();
    const pulls: Pull[] = [this.pullTrigger(loser, false)];

    if (pulls[0].fired) {
      rewards[challenger] += succeeded ? REWARDS.challengeKill : REWARDS.selfElimination;
    }

    // Retribution: everyone else still standing, in turn order after the loser
    if (devilRevealed) {
      for (let offset = 1; offset < this._numPlayers; offset++) {
        const player = (loser + offset) % this._numPlayers;
        if (!this.isAlive(player)) continue;
        const pull = this.pullTrigger(player, true);
        pulls.push(pull);
        if (!pull.fired) rewards[player] += REWARDS.retributionSurvival;
      }
    }

    const outcome: ChallengeOutcome = {
      challenger,
      claimant: claim.claimant,
      slice,
      valid,
      claimed: claim.count,
      succeeded,
      devilRevealed,
      pulls,
    };
    this.emit("challenge:resolved", outcome);

    this.pile = [];
    this.claim = null;
    this.roundTarget = pickOne(this.random, RANKS);
    this.roundNumber++;

    if (this.aliveCount() <= 1) {
      this.finish(challenger, rewards);
    } else {
      this.advanceTurn(challenger);
      this.emit("round:started", {
        roundNumber: this.roundNumber,
        roundTarget: this.roundTarget,
        currentPlayer: this.currentPlayer,
      });
    }

    return {
      observation: this.observe(this.currentPlayer),
      reward: rewards[challenger],
      done: this.over,
      info: {
        rewards,
        eliminated: pulls.filter(p => p.fired).map(p => p.player),
        winner: this.winner,
        challenge: outcome,
      },
    };
  }

  // === Helpers ===

  private pullTrigger(player: number, retribution: boolean): Pull {
    const fired = this.revolvers.pull(player);
    const pull: Pull = { player, fired, retribution };
    this.emit("revolver:pulled", pull);
    if (fired) this.emit("player:eliminated", { player, retribution });
    return pull;
  }

  private finish(lastActor: number, rewards: number[]): void {
    const survivors: number[] = [];
    for (let i = 0; i < this._numPlayers; i++) if (this.isAlive(i)) survivors.push(i);

    this.over = true;
    this.winner = survivors.length === 1 ? survivors[0] : null;
    this.currentPlayer = this.winner ?? lastActor;
    if (this.winner !== null) rewards[this.winner] += REWARDS.win;

    this.emit("game:over", { winner: this.winner, roundNumber: this.roundNumber });
  }

  private advanceTurn(from: number): void {
    for (let offset = 1; offset <= this._numPlayers; offset++) {
      const next = (from + offset) % this._numPlayers;
      if (this.isAlive(next)) {
        this.currentPlayer = next;
        return;
      }
    }
  }

  private zeroRewards(): number[] {
    return new Array<number>(this._numPlayers).fill(0);
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Remove `cards` from `hand` as a multiset.
 * @returns the remaining hand, or null if any card is missing
 */
export function removeCards(hand: readonly Card[], cards: readonly Card[]): Card[] | null {
  const remaining = [...hand];
  for (const card of cards) {
    const index = remaining.indexOf(card);
    if (index < 0) return null;
    remaining.splice(index, 1);
  }
  return remaining;
}

function validateSnapshot(s: GameSnapshot): void {
  const fail = (message: string): never => {
    throw new ConfigurationError(`Invalid game state: ${message}`);
  };
  const isCard = (card: Card): boolean => CARD_ORDER.includes(card);

  if (!Number.isInteger(s.numPlayers) || s.numPlayers < 2) fail(`numPlayers ${s.numPlayers}`);
  if (s.players.length !== s.numPlayers) fail(`expected ${s.numPlayers} players, got ${s.players.length}`);
  if (s.revolvers.length !== s.numPlayers) fail(`expected ${s.numPlayers} revolvers, got ${s.revolvers.length}`);
  if (!RANKS.includes(s.roundTarget)) fail(`round target ${s.roundTarget}`);

  s.players.forEach((p, i) => {
    if (!p.hand.every(isCard)) fail(`player ${i} holds an unknown card`);
  });
  if (!s.pile.every(isCard)) fail("pile holds an unknown card");

  s.revolvers.forEach((r, i) => {
    if (r.chambers.length !== CHAMBERS || r.chambers.filter(Boolean).length !== 1) {
      fail(`revolver ${i} must have ${CHAMBERS} chambers and one bullet`);
    }
    if (!Number.isInteger(r.position) || r.position < 0 || r.position >= CHAMBERS) {
      fail(`revolver ${i} firing position ${r.position}`);
    }
  });

  if (s.currentPlayer < 0 || s.currentPlayer >= s.numPlayers) fail(`current player ${s.currentPlayer}`);
  if (!s.over && !s.players[s.currentPlayer].alive) fail(`current player ${s.currentPlayer} is eliminated`);

  if (s.claim) {
    const { count, claimant } = s.claim;
    if (!Number.isInteger(count) || count < 1 || count > MAX_PLAY) fail(`claim count ${count}`);
    if (claimant < 0 || claimant >= s.numPlayers) fail(`claimant ${claimant}`);
    if (s.pile.length < count) fail(`claim of ${count} with ${s.pile.length} cards on the pile`);
  }
}
