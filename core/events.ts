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
 * core/events.ts
 */
import { EventEmitter } from "events";

export type Listener<T> = (payload: T) => void;

/**
 * Typed event emitter. `Events` maps each event name to its payload type.
 */
export class Emitter<Events extends object> {
  private readonly _emitter = new EventEmitter();

  on<K extends keyof Events & string>(type: K, listener: Listener<Events[K]>): this {
    this._emitter.on(type, listener);
    return this;
  }

  off<K extends keyof Events & string>(type: K, listener: Listener<Events[K]>): this {
    this._emitter.off(type, listener);
    return this;
  }

  emit<K extends keyof Events & string>(type: K, payload: Events[K]): boolean {
    return this._emitter.emit(type, payload);
  }

  listenerCount<K extends keyof Events & string>(type: K): number {
    return this._emitter.listenerCount(type);
  }

  removeAllListeners(): this {
    this._emitter.removeAllListeners();
    return this;
  }
}
