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
 * Liar's Revolver CLI
 *
 * Usage:
 *   liars-revolver <command> [options]
 *
 * Commands:
 *   train    Self-play Q-learning with progress reporting
 *   play     Narrate one game, optionally after a training warm-up
 *
 * Examples:
 *   liars-revolver train --episodes 5000 --seed 42
 *   liars-revolver play --train 2000 --seed 7
 */

import chalk from 'chalk';
import { runTrain } from './commands/train.js';
import { runPlay } from './commands/play.js';

const VERSION = '0.1.0';

function showHelp(): void {
  console.log(`
Liar's Revolver CLI v${VERSION}

USAGE:
  liars-revolver <command> [options]

COMMANDS:
  train     Train a shared Q-table by self-play
  play      Narrate one game played by the policy

OPTIONS:
  -h, --help      Show this help message
  -v, --version   Show version number

EXAMPLES:
  liars-revolver train                          # 1000 episodes, 4 players
  liars-revolver train -e 5000 -s 42 -o q.json  # Seeded run, save the table
  liars-revolver play -t 2000                   # Warm up, then watch a game

For command-specific help:
  liars-revolver <command> --help
`);
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  if (args.length === 0 || args[0] === '--help' || args[0] === '-h') {
    showHelp();
    return;
  }

  if (args[0] === '--version' || args[0] === '-v') {
    console.log(`liars-revolver v${VERSION}`);
    return;
  }

  const command = args[0];
  const commandArgs = args.slice(1);

  switch (command) {
    case 'train':
      await runTrain(commandArgs);
      break;

    case 'play':
      await runPlay(commandArgs);
      break;

    default:
      console.error(chalk.red(`Unknown command: ${command}`));
      console.error('Run "liars-revolver --help" for usage information.');
      process.exit(1);
  }
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(chalk.red(`Fatal error: ${message}`));
  process.exit(1);
});
