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
 * engine/errors.ts
 */

export type GameErrorCode = "CONFIGURATION" | "ILLEGAL_MOVE" | "NO_LEGAL_ACTION";

export class GameError extends Error {
  readonly code: GameErrorCode;

  constructor(code: GameErrorCode, message: string) {
    super(message);
    this.name = "GameError";
    this.code = code;
  }
}

/** Raised before any round starts when the table cannot be dealt. */
export class ConfigurationError extends GameError {
  constructor(message: string) {
    super("CONFIGURATION", message);
    this.name = "ConfigurationError";
  }
}

/** Raised by step(); the session is left exactly as it was. */
export class IllegalMoveError extends GameError {
  constructor(message: string) {
    super("ILLEGAL_MOVE", message);
    this.name = "IllegalMoveError";
  }
}

export class NoLegalActionError extends GameError {
  readonly player: number;

  constructor(player: number) {
    super("NO_LEGAL_ACTION", `Player ${player} has no legal action`);
    this.name = "NoLegalActionError";
    this.player = player;
  }
}
