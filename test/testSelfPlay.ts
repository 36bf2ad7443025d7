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
 * Test suite for SelfPlayTrainer
 * Tests: episode accounting, events, epsilon schedule, truncation,
 * returning to the event loop between batches
 */

import { SelfPlayTrainer, EpisodeStats, TrainingSummary } from '../engine/SelfPlay.js';

// Test helpers
let testCount = 0;
let passCount = 0;
let failCount = 0;

const tests: Array<{ name: string; fn: () => void | Promise<void> }> = [];

function test(name: string, fn: () => void | Promise<void>) {
  tests.push({ name, fn });
}

async function runTests() {
  for (const { name, fn } of tests) {
    testCount++;
    try {
      await fn();
      passCount++;
      console.log(`✓ ${name}`);
    } catch (err) {
      failCount++;
      console.error(`✗ ${name}`);
      console.error(`  ${err instanceof Error ? err.message : String(err)}`);
    }
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

async function assertRejects(fn: () => Promise<unknown>, errorClass: new (...args: never[]) => Error, message: string) {
  try {
    await fn();
  } catch (err) {
    if (err instanceof errorClass) return;
    throw new Error(`${message}: threw ${err instanceof Error ? err.name : String(err)}`);
  }
  throw new Error(`${message}: did not throw`);
}

console.log('\n🧪 Testing SelfPlayTrainer\n');
console.log('═'.repeat(60));

test('Every episode ends in a win, a wipe-out or a truncation', async () => {
  const trainer = new SelfPlayTrainer({ seed: 5 });
  const summary = await trainer.train(20);

  const wins = summary.wins.reduce((a, b) => a + b, 0);
  assertEquals(summary.episodes, 20, 'Episodes');
  assertEquals(summary.wins.length, 4, 'One tally per player');
  assertEquals(wins + summary.draws + summary.truncated, 20, 'Outcomes add up');
  assert(summary.updates > 0, 'Learner was updated');
  assertEquals(summary.states, trainer.learner.size, 'States match the table');
  assertEquals(summary.updates, trainer.learner.updates, 'Updates match the learner');
});

test('Episodes are reported in order', async () => {
  const trainer = new SelfPlayTrainer({ seed: 6 });
  const seen: EpisodeStats[] = [];
  const completed: TrainingSummary[] = [];

  trainer.on('episode:end', stats => seen.push(stats));
  trainer.on('training:complete', summary => completed.push(summary));
  await trainer.train(20);

  assertDeepEquals(
    seen.map(s => s.episode),
    Array.from({ length: 20 }, (_, i) => i + 1),
    'Episode numbers'
  );
  assertEquals(completed.length, 1, 'One completion event');
  for (const stats of seen) {
    assert(stats.truncated || stats.eliminations >= 3, `Episode ${stats.episode}: game ended early`);
  }
});

test('Timers run between batches of episodes', async () => {
  const trainer = new SelfPlayTrainer({ seed: 4 });
  let played = 0;
  const ticks: number[] = [];
  trainer.on('episode:end', () => played++);

  const timer = setInterval(() => ticks.push(played), 0);
  try {
    await trainer.train(60, { yieldEvery: 5 });
  } finally {
    clearInterval(timer);
  }

  assert(ticks.length > 0, 'Timer never ran during training');
  assert(ticks.every(n => n % 5 === 0 && n > 0 && n < 60), `Timer ran mid-batch: [${ticks.join(', ')}]`);
});

test('An immediate queued before training runs after the first batch', async () => {
  const trainer = new SelfPlayTrainer({ seed: 4 });
  let played = 0;
  let seenByImmediate = -1;
  trainer.on('episode:end', () => played++);

  setImmediate(() => {
    seenByImmediate = played;
  });
  await trainer.train(12, { yieldEvery: 4 });

  assertEquals(seenByImmediate, 4, 'Episodes played before the event loop ran');
});

test('Epsilon decays each episode down to its floor', async () => {
  const trainer = new SelfPlayTrainer({ seed: 7, epsilon: 1, epsilonDecay: 0.5, minEpsilon: 0.1 });
  const seen: number[] = [];
  trainer.on('episode:end', stats => seen.push(stats.epsilon));

  const summary = await trainer.train(4);

  assertDeepEquals(seen, [1, 0.5, 0.25, 0.125], 'Epsilon during each episode');
  assertEquals(summary.finalEpsilon, 0.1, 'Clamped to the floor');
  assertEquals(trainer.epsilon, 0.1, 'Trainer epsilon');
});

test('Episodes stop at the step limit', async () => {
  const trainer = new SelfPlayTrainer({ seed: 8, maxSteps: 3 });
  const seen: EpisodeStats[] = [];
  trainer.on('episode:end', stats => seen.push(stats));
  await trainer.train(10);

  for (const stats of seen) {
    assert(stats.steps <= 3, `Episode ${stats.episode} ran ${stats.steps} steps`);
    if (stats.steps === 3) {
      assert(stats.truncated || stats.eliminations >= 3, `Episode ${stats.episode}: neither truncated nor over`);
    }
  }
});

test('Episode stats agree with the session events', () => {
  const trainer = new SelfPlayTrainer({ seed: 9 });
  let played = 0;
  let eliminated = 0;
  trainer.session.on('card:played', () => played++);
  trainer.session.on('player:eliminated', () => eliminated++);
  const stats = trainer.playEpisode();

  assertEquals(stats.rewards.length, 4, 'One total per player');
  assertEquals(played + stats.challenges, stats.steps, 'Each step is a play or a challenge');
  assertEquals(eliminated, stats.eliminations, 'Eliminations');
  assertEquals(stats.winner, trainer.session.gameWinner, 'Winner');
});

test('Training needs at least one episode and a positive batch', async () => {
  const trainer = new SelfPlayTrainer({ seed: 1 });
  await assertRejects(() => trainer.train(0), RangeError, 'Zero episodes');
  await assertRejects(() => trainer.train(1.5), RangeError, 'Fractional episodes');
  await assertRejects(() => trainer.train(5, { yieldEvery: 0 }), RangeError, 'Zero batch');
});

// ============================================================================
// RESULTS
// ============================================================================

runTests().then(() => {
  console.log('\n' + '═'.repeat(60));
  console.log(`\n📊 Test Results: ${passCount}/${testCount} passed\n`);

  if (failCount === 0) {
    console.log('🎉 All self-play tests passed!\n');
    process.exit(0);
  } else {
    console.log(`❌ ${failCount} tests failed\n`);
    process.exit(1);
  }
});
