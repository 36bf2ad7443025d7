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
 * Play Command
 *
 * Optionally trains a policy by self-play, then narrates one game played
 * greedily by that policy in every seat.
 */

import chalk from 'chalk';
import ora from 'ora';
import { SelfPlayTrainer } from '../../engine/SelfPlay.js';
import { GameSession } from '../../engine/GameSession.js';
import { describeAction } from '../../engine/actions.js';
import { ConfigurationError } from '../../engine/errors.js';
import { readInteger, readRate } from '../options.js';
import { narrate } from '../narrate.js';

export interface PlayOptions {
  numPlayers: number;
  seed: number | null;
  trainEpisodes: number;
  epsilon: number;
  maxSteps: number;
}

export function parsePlayArgs(args: string[]): PlayOptions | null {
  const options: PlayOptions = {
    numPlayers: 4,
    seed: null,
    trainEpisodes: 0,
    epsilon: 0,
    maxSteps: 500,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--help':
      case '-h':
        return null;

      case '--players':
      case '-n':
        options.numPlayers = readInteger(args, ++i, arg);
        break;

      case '--seed':
      case '-s':
        options.seed = readInteger(args, ++i, arg);
        break;

      case '--train':
      case '-t':
        options.trainEpisodes = readInteger(args, ++i, arg);
        break;

      case '--epsilon':
        options.epsilon = readRate(args, ++i, arg);
        break;

      case '--max-steps':
        options.maxSteps = readInteger(args, ++i, arg);
        break;

      default:
        throw new ConfigurationError(`Unknown option: ${arg}`);
    }
  }

  if (options.trainEpisodes < 0) {
    throw new ConfigurationError(`--train cannot be negative, got ${options.trainEpisodes}`);
  }

  return options;
}

function showHelp(): void {
  console.log(`
Liar's Revolver - Narrated Game

USAGE:
  liars-revolver play [options]

OPTIONS:
  -n, --players <num>   Players at the table (default: 4)
  -s, --seed <num>      Random seed
  -t, --train <num>     Self-play episodes before the game (default: 0)
      --epsilon <rate>  Exploration rate during the game (default: 0)
      --max-steps <num> Stop after this many steps (default: 500)
  -h, --help            Show this help message
`);
}

export async function runPlay(args: string[]): Promise<void> {
  const options = parsePlayArgs(args);
  if (!options) {
    showHelp();
    return;
  }

  const trainer = new SelfPlayTrainer({ numPlayers: options.numPlayers, seed: options.seed });

  if (options.trainEpisodes > 0) {
    const spinner = ora(`Self-play warm-up: ${options.trainEpisodes} episodes...`).start();
    await trainer.train(options.trainEpisodes);
    spinner.succeed(`Warm-up done, ${trainer.learner.size} states learned`);
  }

  const session = new GameSession({
    numPlayers: options.numPlayers,
    seed: options.seed === null ? null : options.seed + 1,
  });
  const detach = narrate(session);
  session.reset();

  let steps = 0;
  while (!session.isOver && steps < options.maxSteps) {
    const obs = session.observe(session.activePlayer);
    if (trainer.policy.enumerateLegalActions(obs).length === 0) {
      console.log(chalk.yellow(`\n⚠️  Player ${obs.player} has nothing to play and nothing to challenge. Table stalls.`));
      break;
    }
    const action = trainer.policy.selectAction(obs, options.epsilon);
    console.log(chalk.gray(`  (Player ${obs.player} ${describeAction(action)})`));
    session.step(action);
    steps++;
  }

  if (!session.isOver && steps >= options.maxSteps) {
    console.log(chalk.yellow(`\n⏱️  Stopped after ${steps} steps`));
  }
  detach();
}
