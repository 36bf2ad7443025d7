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
 * interface/Gym.ts
 * Numeric spaces shared by the RL environments.
 * Compatible with OpenAI Gym / PettingZoo API paradigms.
 */

/** Flat numeric feature vector handed to a learner. */
export type Features = number[];
export type ActionID = number;

export type Info = Record<string, unknown>;

export interface Space {
  shape: number[];
  low?: number[];
  high?: number[];
  n?: number; // For discrete spaces
}

/**
 * Helper to normalize values to 0-1 range.
 */
export function normalize(val: number, min: number, max: number): number {
  if (max === min) return 0;
  return (val - min) / (max - min);
}
