#!/usr/bin/env node
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
 * Test suite for EpsilonGreedyPolicy and QLearner
 * Tests: state keys, Q-learning backups, greedy and exploring selection
 */

import { EpsilonGreedyPolicy } from '../engine/Policy.js';
import { QLearner, stateKey } from '../engine/Learner.js';
import { actionKey, play } from '../engine/actions.js';
import { NoLegalActionError } from '../engine/errors.js';
import { Observation } from '../engine/types.js';
import { RandomSource } from '../core/random.js';

// Test helpers
let testCount = 0;
let passCount = 0;
let failCount = 0;

function test(name: string, fn: () => void) {
  testCount++;
  try {
    fn();
    passCount++;
    console.log(`✓ ${name}`);
  } catch (err) {
    failCount++;
    console.error(`✗ ${name}`);
    console.error(`  ${err instanceof Error ? err.message : String(err)}`);
  }
}

function assert(condition: boolean, message: string) {
  if (!condition) {
    throw new Error(message || 'Assertion failed');
  }
}

function assertEquals<T>(actual: T, expected: T, message?: string) {
  if (actual !== expected) {
    throw new Error(message || `Expected ${String(expected)}, got ${String(actual)}`);
  }
}

function assertDeepEquals(actual: unknown, expected: unknown, message?: string) {
  const a = JSON.stringify(actual);
  const e = JSON.stringify(expected);
  if (a !== e) {
    throw new Error(message ? `${message}: expected ${e}, got ${a}` : `Expected ${e}, got ${a}`);
  }
}

function assertThrows(fn: () => unknown, errorClass: new (...args: never[]) => Error, message: string) {
  try {
    fn();
  } catch (err) {
    if (err instanceof errorClass) return;
    throw new Error(`${message}: threw ${err instanceof Error ? err.name : String(err)}`);
  }
  throw new Error(`${message}: did not throw`);
}

/** Player 0 to act, target Ace, bullet two pulls away, one player out. */
function observation(overrides: Partial<Observation> = {}): Observation {
  return {
    player: 0,
    hand: ['Ace', 'Joker', 'King', 'King', 'Queen'],
    revolver: { chambers: [false, false, false, true, false, false], position: 1 },
    claim: null,
    roundTarget: 'Ace',
    alive: [true, true, true, false],
    handSizes: [5, 5, 5, 5],
    currentPlayer: 0,
    pileSize: 0,
    phase: 'awaiting_play',
    ...overrides,
  };
}

/** Replays the given values in order. */
function scripted(values: number[]): RandomSource {
  let i = 0;
  return () => values[i++ % values.length];
}

console.log('\n🧪 Testing Policy and Learner\n');
console.log('═'.repeat(60));

// ============================================================================
// STATE KEYS
// ============================================================================

console.log('\n🔑 State Key Tests\n');

test('State key: target, hand counts, claim, shots to the bullet, players left', () => {
  assertEquals(stateKey(observation()), 'Ace|12110|0|2|3', 'Key');
});

test('State key ignores card order and reflects the claim', () => {
  const shuffled = observation({ hand: ['Queen', 'King', 'Joker', 'King', 'Ace'] });
  assertEquals(stateKey(shuffled), stateKey(observation()), 'Order-free');

  const claimed = observation({ claim: { count: 2, target: 'Ace', claimant: 3 } });
  assertEquals(stateKey(claimed), 'Ace|12110|2|2|3', 'Claim count');
});

test('Bullet under the hammer means zero shots left', () => {
  const obs = observation({ revolver: { chambers: [false, false, false, true, false, false], position: 3 } });
  assertEquals(stateKey(obs), 'Ace|12110|0|0|3', 'Zero shots');
});

// ============================================================================
// Q-LEARNING
// ============================================================================

console.log('\n📈 Q-Learning Tests\n');

test('Terminal backups move halfway to the reward at alpha 0.5', () => {
  const learner = new QLearner({ alpha: 0.5, gamma: 0.9 });
  const obs = observation();
  const action = play(['Ace']);

  learner.update(obs, action, 10, null);
  assertEquals(learner.value(obs, action), 5, 'First backup');

  learner.update(obs, action, 10, null);
  assertEquals(learner.value(obs, action), 7.5, 'Second backup');
  assertEquals(learner.updates, 2, 'Two updates');
  assertEquals(learner.size, 1, 'One state');
});

test('Backups bootstrap from the best next action', () => {
  const learner = new QLearner({ alpha: 0.5, gamma: 0.9 });
  const next = observation({ roundTarget: 'King', hand: ['King', 'Joker', 'Queen', 'Queen', 'Ace'] });
  learner.update(next, play(['King', 'Joker']), 4, null);
  assertEquals(learner.value(next, play(['King', 'Joker'])), 2, 'Next state value');

  const obs = observation();
  learner.update(obs, play(['Ace']), 0, next);
  assertEquals(learner.value(obs, play(['Ace'])), 0.9, '0.5 * 0.9 * 2');
});

test('A game-over next state contributes nothing', () => {
  const learner = new QLearner({ alpha: 0.5, gamma: 0.9 });
  const next = observation({ roundTarget: 'King', hand: ['King', 'Joker', 'Queen', 'Queen', 'Ace'] });
  learner.update(next, play(['King', 'Joker']), 4, null);

  const obs = observation();
  learner.update(obs, play(['Ace']), 0, { ...next, phase: 'game_over' });
  assertEquals(learner.value(obs, play(['Ace'])), 0, 'No bootstrap');
});

test('Q-table serialises by state and action key', () => {
  const learner = new QLearner({ alpha: 0.5 });
  learner.update(observation(), play(['Joker']), 10, null);

  assertDeepEquals(learner.toJSON(), { 'Ace|12110|0|2|3': { 'play:1:Joker': 5 } }, 'Table');
});

// ============================================================================
// POLICY
// ============================================================================

console.log('\n🎯 Policy Tests\n');

test('Legal actions come from the observed hand', () => {
  const policy = new EpsilonGreedyPolicy(new QLearner());
  const keys = policy.enumerateLegalActions(observation()).map(actionKey);

  assertDeepEquals(keys, ['play:1:Ace', 'play:1:Joker', 'play:2:Ace,Joker'], 'Actions');
  assertDeepEquals(policy.enumerateLegalActions(observation({ phase: 'game_over' })), [], 'Nothing after the game');
});

test('Greedy selection takes the highest value', () => {
  const learner = new QLearner({ alpha: 0.5 });
  learner.update(observation(), play(['Joker']), 10, null);
  const policy = new EpsilonGreedyPolicy(learner, () => 0.5);

  assertEquals(actionKey(policy.selectAction(observation(), 0)), 'play:1:Joker', 'Best action');
});

test('Ties go to the first enumerated action', () => {
  const policy = new EpsilonGreedyPolicy(new QLearner(), () => 0.5);
  assertEquals(actionKey(policy.selectAction(observation(), 0)), 'play:1:Ace', 'First action');
});

test('Exploration picks uniformly from the legal actions', () => {
  const learner = new QLearner({ alpha: 0.5 });
  learner.update(observation(), play(['Joker']), 10, null);
  const policy = new EpsilonGreedyPolicy(learner, scripted([0, 0.99]));

  assertEquals(actionKey(policy.selectAction(observation(), 1)), 'play:2:Ace,Joker', 'Last of three');
});

test('An empty legal set is an error', () => {
  const policy = new EpsilonGreedyPolicy(new QLearner());
  const stuck = observation({ hand: ['King', 'King', 'Queen', 'Queen', 'King'] });

  assertThrows(() => policy.selectAction(stuck, 0), NoLegalActionError, 'No plays, no claim');

  try {
    policy.selectAction(stuck, 0);
  } catch (err) {
    assert(err instanceof NoLegalActionError, 'Error class');
    if (err instanceof NoLegalActionError) {
      assertEquals(err.player, 0, 'Player on the error');
      assertEquals(err.message, 'Player 0 has no legal action', 'Message');
    }
  }
});

test('A stuck hand can still call a claim', () => {
  const policy = new EpsilonGreedyPolicy(new QLearner(), () => 0.5);
  const obs = observation({
    hand: ['King', 'King', 'Queen', 'Queen', 'King'],
    claim: { count: 1, target: 'Ace', claimant: 2 },
  });

  assertEquals(actionKey(policy.selectAction(obs, 0)), 'challenge', 'Challenge');
});

// ============================================================================
// RESULTS
// ============================================================================

console.log('\n' + '═'.repeat(60));
console.log(`\n📊 Test Results: ${passCount}/${testCount} passed\n`);

if (failCount === 0) {
  console.log('🎉 All policy tests passed!\n');
  process.exit(0);
} else {
  console.log(`❌ ${failCount} tests failed\n`);
  process.exit(1);
}
