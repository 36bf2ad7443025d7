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
 * Legal action enumeration.
 *
 * Plays are built from the target-rank cards and Jokers in a hand. Cards of
 * the same rank are interchangeable, so every play is reduced to its rank
 * multiset and each multiset is offered once.
 */

import { Action, CARD_ORDER, Card, Claim, MAX_PLAY, PlayAction, Rank } from "./types.js";

/*━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━
  CARD HELPERS
━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━*/

export function compareCards(a: Card, b: Card): number {
  return CARD_ORDER.indexOf(a) - CARD_ORDER.indexOf(b);
}

/** Sorted copy; the input is left alone. */
export function canonicalCards(cards: readonly Card[]): Card[] {
  return [...cards].sort(compareCards);
}

/** Does this card satisfy a claim on `target`? Jokers are wild. */
export function matchesTarget(card: Card, target: Rank): boolean {
  return card === target || card === "Joker";
}

export function countMatching(cards: readonly Card[], target: Rank): number {
  return cards.reduce((n, card) => n + (matchesTarget(card, target) ? 1 : 0), 0);
}

/**
 * Every k-subset of `pool` by position, in lexicographic index order.
 * Iterative, so the sequence can be restarted by calling again.
 */
export function* combinations<T>(pool: readonly T[], k: number): Generator<T[], void, unknown> {
  const n = pool.length;
  if (k < 0 || k > n) return;

  const idx = Array.from({ length: k }, (_, i) => i);
  while (true) {
    yield idx.map(i => pool[i]);

    // Rightmost index that can still move forward
    let i = k - 1;
    while (i >= 0 && idx[i] === n - k + i) i--;
    if (i < 0) return;

    idx[i]++;
    for (let j = i + 1; j < k; j++) idx[j] = idx[j - 1] + 1;
  }
}

/*━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━
  ACTIONS
━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━*/

export const CHALLENGE: Action = { type: "challenge" };
export const PLAY_DEVIL: Action = { type: "play_devil" };

export function play(cards: readonly Card[]): PlayAction {
  return { type: "play", count: cards.length, cards: canonicalCards(cards) };
}

/**
 * Stable string identity for an action. Two plays of the same rank
 * multiset share a key regardless of card order.
 */
export function actionKey(action: Action): string {
  switch (action.type) {
    case "challenge":
      return "challenge";
    case "play_devil":
      return "devil";
    case "play":
      return `play:${action.count}:${canonicalCards(action.cards).join(",")}`;
  }
}

export function actionsEqual(a: Action, b: Action): boolean {
  return actionKey(a) === actionKey(b);
}

export function describeAction(action: Action): string {
  switch (action.type) {
    case "challenge":
      return "calls Liar!";
    case "play_devil":
      return "plays the Devil";
    case "play":
      return `plays ${action.count} [${action.cards.join(", ")}]`;
  }
}

/** The cards an action moves from hand to pile. */
export function cardsOf(action: Action): Card[] {
  switch (action.type) {
    case "challenge":
      return [];
    case "play_devil":
      return ["Devil"];
    case "play":
      return [...action.cards];
  }
}

/**
 * Enumerate every legal action for a hand.
 *
 * - Challenge is offered whenever a claim is active.
 * - Holding the Devil forces it: it is the only play offered.
 * - Otherwise one play per rank multiset of target cards and Jokers, for
 *   every size from the active claim's count (or 1) up to three.
 *
 * The result depends only on the multiset of cards in `hand`.
 */
export function enumerateActions(hand: readonly Card[], claim: Claim | null, roundTarget: Rank): Action[] {
  const actions: Action[] = [];

  if (claim) actions.push(CHALLENGE);

  if (hand.includes("Devil")) {
    actions.push(PLAY_DEVIL);
    return actions;
  }

  const pool = canonicalCards(hand.filter(card => matchesTarget(card, roundTarget)));
  const minSize = claim ? Math.max(1, claim.count) : 1;

  for (let size = minSize; size <= Math.min(MAX_PLAY, pool.length); size++) {
    const seen = new Set<string>();
    for (const combo of combinations(pool, size)) {
      const action = play(combo);
      const key = actionKey(action);
      if (seen.has(key)) continue;
      seen.add(key);
      actions.push(action);
    }
  }

  return actions;
}
