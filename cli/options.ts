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
 * cli/options.ts
 * Flag parsing shared by the commands.
 */
import { ConfigurationError } from "../engine/errors.js";

export function readNumber(args: string[], i: number, flag: string): number {
  const raw = args[i];
  const value = raw === undefined ? NaN : Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`Option ${flag} expects a number, got ${raw ?? "nothing"}`);
  }
  return value;
}

export function readInteger(args: string[], i: number, flag: string): number {
  const value = readNumber(args, i, flag);
  if (!Number.isInteger(value)) {
    throw new ConfigurationError(`Option ${flag} expects an integer, got ${value}`);
  }
  return value;
}

export function readRate(args: string[], i: number, flag: string): number {
  const value = readNumber(args, i, flag);
  if (value < 0 || value > 1) {
    throw new ConfigurationError(`Option ${flag} must be between 0 and 1, got ${value}`);
  }
  return value;
}

export function readString(args: string[], i: number, flag: string): string {
  const value = args[i];
  if (value === undefined || value.startsWith("-")) {
    throw new ConfigurationError(`Option ${flag} expects a value`);
  }
  return value;
}
