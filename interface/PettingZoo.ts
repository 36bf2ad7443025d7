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
 * interface/PettingZoo.ts
 * Agent-environment cycle base for turn-based games.
 * https://pettingzoo.farama.org/api/aec/
 */

import { ActionID, Features, Info, Space } from "./Gym.js";

/**
 * What the selected agent sees from `last()`.
 */
export interface AECStepResult {
  observation: Features;
  reward: number;
  terminated: boolean;
  truncated: boolean;
  info: Info;
}

interface AgentRecord {
  /** Reward from the most recent step only. */
  reward: number;
  /** Reward since this agent last called `last()`. */
  pending: number;
  terminated: boolean;
  truncated: boolean;
  info: Info;
}

/**
 * Bookkeeping shared by AEC environments: one record per seat, the agent
 * to act, and the read-and-clear reward handoff of `last()`.
 *
 * ```typescript
 * for (const agent of env.agentIteration()) {
 *   await env.step(policy(env.observe(agent), env.actionMask(agent)));
 * }
 * ```
 */
export abstract class AECEnvironment {
  private seats: string[] = [];
  private records = new Map<string, AgentRecord>();
  private selected = "";

  abstract observationSpace(agent: string): Space;
  abstract actionSpace(agent: string): Space;
  abstract actionMask(agent: string): boolean[];
  abstract reset(seed?: number): Promise<void>;
  abstract observe(agent: string): Features;
  abstract step(action: ActionID): Promise<void>;
  abstract render(): void;
  abstract close(): void;

  get possibleAgents(): string[] {
    return [...this.seats];
  }

  /** Seats still in the episode: neither terminated nor truncated. */
  get agents(): string[] {
    return this.seats.filter(agent => {
      const r = this.record(agent);
      return !r.terminated && !r.truncated;
    });
  }

  agentSelection(): string {
    return this.selected;
  }

  /**
   * Observation, accumulated reward and status of the selected agent.
   * Clears that agent's accumulated reward.
   */
  last(): AECStepResult {
    const r = this.record(this.selected);
    const result: AECStepResult = {
      observation: this.observe(this.selected),
      reward: r.pending,
      terminated: r.terminated,
      truncated: r.truncated,
      info: { ...r.info },
    };
    r.pending = 0;
    return result;
  }

  rewards(): Record<string, number> {
    return this.collect(r => r.reward);
  }

  cumulativeRewards(): Record<string, number> {
    return this.collect(r => r.pending);
  }

  terminations(): Record<string, boolean> {
    return this.collect(r => r.terminated);
  }

  truncations(): Record<string, boolean> {
    return this.collect(r => r.truncated);
  }

  infos(): Record<string, Info> {
    return this.collect(r => ({ ...r.info }));
  }

  /** Yields the selected agent until it leaves the episode. */
  *agentIteration(): Generator<string, void, unknown> {
    while (this.agents.includes(this.selected)) {
      yield this.selected;
    }
  }

  // === For subclasses ===

  protected resetState(agents: string[]): void {
    this.seats = [...agents];
    this.records = new Map<string, AgentRecord>();
    for (const agent of agents) {
      this.records.set(agent, { reward: 0, pending: 0, terminated: false, truncated: false, info: {} });
    }
    this.selected = agents[0] ?? "";
  }

  /** Per-step rewards start from zero on every step. */
  protected clearStepRewards(): void {
    for (const r of this.records.values()) r.reward = 0;
  }

  protected addReward(agent: string, reward: number): void {
    const r = this.record(agent);
    r.reward += reward;
    r.pending += reward;
  }

  protected terminate(agent: string): void {
    this.record(agent).terminated = true;
  }

  protected truncateAll(): void {
    for (const r of this.records.values()) r.truncated = true;
  }

  protected setInfo(agent: string, info: Info): void {
    this.record(agent).info = info;
  }

  protected select(agent: string): void {
    this.record(agent);
    this.selected = agent;
  }

  private record(agent: string): AgentRecord {
    const r = this.records.get(agent);
    if (!r) {
      throw new RangeError(`Unknown agent: ${agent}`);
    }
    return r;
  }

  private collect<T>(pick: (r: AgentRecord) => T): Record<string, T> {
    const out: Record<string, T> = {};
    for (const agent of this.seats) out[agent] = pick(this.record(agent));
    return out;
  }
}
