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
 * engine/Revolver.ts
 */
import { RandomSource, randomInt } from "../core/random.js";
import { CHAMBERS, RevolverView } from "./types.js";

interface Cylinder {
  chambers: boolean[];
  position: number;
}

/**
 * One six-chamber revolver per player, each holding a single bullet.
 * The cylinder turns one chamber on every pull, fired or not, and is
 * never re-armed for the rest of the game.
 */
export class RevolverMechanic {
  private readonly random: RandomSource;
  private readonly cylinders = new Map<number, Cylinder>();
  private readonly eliminated = new Set<number>();

  constructor(random: RandomSource) {
    this.random = random;
  }

  arm(playerId: number): void {
    if (this.cylinders.has(playerId)) {
      throw new Error(`Revolver for player ${playerId} is already armed`);
    }
    const chambers = new Array<boolean>(CHAMBERS).fill(false);
    chambers[randomInt(this.random, CHAMBERS)] = true;
    this.cylinders.set(playerId, { chambers, position: 0 });
  }

  /**
   * Install a known cylinder, bypassing randomness.
   */
  load(playerId: number, view: RevolverView, eliminated = false): void {
    const loaded = view.chambers.filter(Boolean).length;
    if (view.chambers.length !== CHAMBERS || loaded !== 1) {
      throw new Error(`Revolver needs ${CHAMBERS} chambers with exactly one bullet`);
    }
    if (!Number.isInteger(view.position) || view.position < 0 || view.position >= CHAMBERS) {
      throw new Error(`Firing position out of range: ${view.position}`);
    }
    this.cylinders.set(playerId, { chambers: [...view.chambers], position: view.position });
    if (eliminated) this.eliminated.add(playerId);
    else this.eliminated.delete(playerId);
  }

  /**
   * Fire the chamber under the hammer, then rotate the cylinder.
   * @returns true if the player was eliminated
   */
  pull(playerId: number): boolean {
    const cylinder = this.cylinder(playerId);
    const fired = cylinder.chambers[cylinder.position];
    cylinder.position = (cylinder.position + 1) % CHAMBERS;
    if (fired) this.eliminated.add(playerId);
    return fired;
  }

  isEliminated(playerId: number): boolean {
    return this.eliminated.has(playerId);
  }

  view(playerId: number): RevolverView {
    const cylinder = this.cylinder(playerId);
    return { chambers: [...cylinder.chambers], position: cylinder.position };
  }

  private cylinder(playerId: number): Cylinder {
    const cylinder = this.cylinders.get(playerId);
    if (!cylinder) {
      throw new Error(`No revolver armed for player ${playerId}`);
    }
    return cylinder;
  }
}
