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
 * engine/Deck.ts
 */
import { RandomSource, shuffleArray } from "../core/random.js";
import { ConfigurationError } from "./errors.js";
import { Card, HAND_SIZE, RANKS, Rank } from "./types.js";

const NON_TARGET_COPIES = 6;
const TARGET_COPIES = 5;
const JOKERS = 2;
const DEVILS = 1;

export const DECK_SIZE = 2 * NON_TARGET_COPIES + TARGET_COPIES + JOKERS + DEVILS; // 20

/**
 * The unshuffled multiset for one round: the target rank is one card short
 * of the other two, which makes room for the Devil.
 */
export function composeDeck(roundTarget: Rank): Card[] {
  const deck: Card[] = [];
  for (const rank of RANKS) {
    const copies = rank === roundTarget ? TARGET_COPIES : NON_TARGET_COPIES;
    for (let i = 0; i < copies; i++) deck.push(rank);
  }
  for (let i = 0; i < JOKERS; i++) deck.push("Joker");
  for (let i = 0; i < DEVILS; i++) deck.push("Devil");
  return deck;
}

export function assertTableSize(numPlayers: number): void {
  if (!Number.isInteger(numPlayers) || numPlayers * HAND_SIZE !== DECK_SIZE) {
    throw new ConfigurationError(
      `Cannot deal ${DECK_SIZE} cards to ${numPlayers} players: ` +
        `need exactly ${DECK_SIZE / HAND_SIZE} players with ${HAND_SIZE} cards each`
    );
  }
}

/**
 * Build, shuffle and deal a round's deck. The deck is fully consumed.
 * @returns one hand per player
 * @throws ConfigurationError if the deck does not divide evenly
 */
export function buildDeck(roundTarget: Rank, numPlayers: number, random: RandomSource): Card[][] {
  assertTableSize(numPlayers);

  const deck = shuffleArray(composeDeck(roundTarget), random);
  const hands: Card[][] = Array.from({ length: numPlayers }, () => []);
  deck.forEach((card, i) => hands[i % numPlayers].push(card));
  return hands;
}
