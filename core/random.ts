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
 * core/random.ts
 */

/** A pseudorandom source yielding floats in [0, 1). */
export type RandomSource = () => number;

/**
 * Small, fast seeded PRNG. Not cryptographically secure.
 */
export function mulberry32(seed: number): RandomSource {
  let state = seed >>> 0;
  return function () {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Resolve a seed or source into a RandomSource.
 * No seed falls back to Math.random.
 */
export function toRandomSource(seedOrSource?: number | RandomSource | null): RandomSource {
  if (typeof seedOrSource === "function") return seedOrSource;
  if (typeof seedOrSource === "number") return mulberry32(seedOrSource);
  return Math.random;
}

/** Integer in [0, n). */
export function randomInt(random: RandomSource, n: number): number {
  return Math.min(n - 1, Math.floor(random() * n));
}

export function pickOne<T>(random: RandomSource, items: readonly T[]): T {
  if (items.length === 0) {
    throw new Error("Cannot pick from an empty list");
  }
  return items[randomInt(random, items.length)];
}

/**
 * Fisher-Yates shuffle, in place. Returns the same array for chaining.
 */
export function shuffleArray<T>(arr: T[], seedOrSource?: number | RandomSource | null): T[] {
  const random = toRandomSource(seedOrSource);
  for (let i = arr.length - 1; i > 0; i--) {
    const j = randomInt(random, i + 1);
    [arr[i], arr[j]] = [arr[j], arr[i]];
  }
  return arr;
}
