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
 * Train Command
 *
 * Runs self-play Q-learning and reports progress on the console.
 */

import chalk from 'chalk';
import ora from 'ora';
import boxen from 'boxen';
import { writeFile } from 'fs/promises';
import { SelfPlayTrainer, TrainingSummary } from '../../engine/SelfPlay.js';
import { ConfigurationError } from '../../engine/errors.js';
import { readInteger, readRate, readString } from '../options.js';

export interface TrainOptions {
  episodes: number;
  numPlayers: number;
  seed: number | null;
  alpha: number;
  gamma: number;
  epsilon: number;
  epsilonDecay: number;
  minEpsilon: number;
  maxSteps: number;
  reportEvery: number;
  save: string | null;
}

/**
 * @returns null when help was requested
 * @throws ConfigurationError on an unknown or malformed option
 */
export function parseTrainArgs(args: string[]): TrainOptions | null {
  const options: TrainOptions = {
    episodes: 1000,
    numPlayers: 4,
    seed: null,
    alpha: 0.1,
    gamma: 0.95,
    epsilon: 1,
    epsilonDecay: 0.995,
    minEpsilon: 0.05,
    maxSteps: 500,
    reportEvery: 100,
    save: null,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--help':
      case '-h':
        return null;

      case '--episodes':
      case '-e':
        options.episodes = readInteger(args, ++i, arg);
        break;

      case '--players':
      case '-n':
        options.numPlayers = readInteger(args, ++i, arg);
        break;

      case '--seed':
      case '-s':
        options.seed = readInteger(args, ++i, arg);
        break;

      case '--alpha':
        options.alpha = readRate(args, ++i, arg);
        break;

      case '--gamma':
        options.gamma = readRate(args, ++i, arg);
        break;

      case '--epsilon':
        options.epsilon = readRate(args, ++i, arg);
        break;

      case '--decay':
        options.epsilonDecay = readRate(args, ++i, arg);
        break;

      case '--min-epsilon':
        options.minEpsilon = readRate(args, ++i, arg);
        break;

      case '--max-steps':
        options.maxSteps = readInteger(args, ++i, arg);
        break;

      case '--report-every':
        options.reportEvery = readInteger(args, ++i, arg);
        break;

      case '--save':
      case '-o':
        options.save = readString(args, ++i, arg);
        break;

      default:
        throw new ConfigurationError(`Unknown option: ${arg}`);
    }
  }

  if (options.episodes < 1) {
    throw new ConfigurationError(`--episodes must be at least 1, got ${options.episodes}`);
  }
  if (options.reportEvery < 1) {
    throw new ConfigurationError(`--report-every must be at least 1, got ${options.reportEvery}`);
  }
  return options;
}

function showHelp(): void {
  console.log(`
Liar's Revolver - Self-Play Training

USAGE:
  liars-revolver train [options]

OPTIONS:
  -e, --episodes <num>     Episodes to play (default: 1000)
  -n, --players <num>      Players at the table (default: 4)
  -s, --seed <num>         Random seed
      --alpha <rate>       Learning rate (default: 0.1)
      --gamma <rate>       Discount factor (default: 0.95)
      --epsilon <rate>     Starting exploration rate (default: 1)
      --decay <rate>       Epsilon decay per episode (default: 0.995)
      --min-epsilon <rate> Exploration floor (default: 0.05)
      --max-steps <num>    Truncate an episode after this many steps (default: 500)
      --report-every <num> Progress update interval in episodes (default: 100)
  -o, --save <file>        Write the learned Q-table as JSON
  -h, --help               Show this help message
`);
}

export function formatSummary(summary: TrainingSummary): string {
  const winRates = summary.wins
    .map((w, i) => `  Player ${i}: ${w} wins (${((w / summary.episodes) * 100).toFixed(1)}%)`)
    .join('\n');

  return [
    `Episodes:        ${summary.episodes}`,
    `Avg steps:       ${summary.avgSteps.toFixed(1)}`,
    `Avg challenges:  ${summary.avgChallenges.toFixed(1)}`,
    `No survivor:     ${summary.draws}`,
    `Truncated:       ${summary.truncated}`,
    `States learned:  ${summary.states}`,
    `Updates:         ${summary.updates}`,
    `Final epsilon:   ${summary.finalEpsilon.toFixed(3)}`,
    '',
    winRates,
  ].join('\n');
}

export async function runTrain(args: string[]): Promise<void> {
  const options = parseTrainArgs(args);
  if (!options) {
    showHelp();
    return;
  }

  const trainer = new SelfPlayTrainer({
    numPlayers: options.numPlayers,
    seed: options.seed,
    alpha: options.alpha,
    gamma: options.gamma,
    epsilon: options.epsilon,
    epsilonDecay: options.epsilonDecay,
    minEpsilon: options.minEpsilon,
    maxSteps: options.maxSteps,
  });

  const spinner = ora(`Training for ${options.episodes} episodes...`).start();
  let recentWins = 0;

  trainer.on('episode:end', (stats) => {
    if (stats.winner !== null) recentWins++;
    if (stats.episode % options.reportEvery === 0) {
      spinner.text =
        `Episode ${stats.episode}/${options.episodes} ` +
        chalk.gray(`ε=${stats.epsilon.toFixed(3)} decided=${recentWins}/${options.reportEvery}`);
      recentWins = 0;
    }
  });

  let summary: TrainingSummary;
  try {
    summary = await trainer.train(options.episodes, { yieldEvery: options.reportEvery });
  } catch (error) {
    spinner.fail('Training failed');
    throw error;
  }
  spinner.succeed(`Trained on ${options.episodes} episodes`);

  console.log(boxen(formatSummary(summary), {
    title: chalk.bold.cyan('Training Summary'),
    padding: 1,
    margin: 1,
    borderStyle: 'round',
    borderColor: 'cyan'
  }));

  if (options.save) {
    await writeFile(options.save, JSON.stringify(trainer.learner.toJSON(), null, 2), 'utf8');
    console.log(chalk.green(`✓ Q-table written to ${options.save}`));
  }
}
