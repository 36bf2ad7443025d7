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
 * cli/narrate.ts
 * Turns session events into console lines.
 */
import chalk from 'chalk';
import { GameSession, SessionEvents } from '../engine/GameSession.js';
import { Listener } from '../core/events.js';

type Write = (line: string) => void;

/**
 * Subscribe to a session and describe every event.
 * @returns a function that detaches the narrator
 */
export function narrate(session: GameSession, write: Write = console.log): () => void {
  const onReset: Listener<SessionEvents['game:reset']> = ({ numPlayers, roundTarget }) => {
    write(chalk.bold(`\n🃏 New game, ${numPlayers} players. Target: ${roundTarget}`));
  };

  const onPlayed: Listener<SessionEvents['card:played']> = ({ player, cards, claim }) => {
    const devil = cards.includes('Devil') ? chalk.red(' 😈') : '';
    write(`  Player ${player} plays ${claim.count} card(s) claiming ${claim.target}${devil}`);
  };

  const onResolved: Listener<SessionEvents['challenge:resolved']> = (outcome) => {
    const verdict = outcome.succeeded
      ? chalk.yellow(`LIE! (${outcome.valid}/${outcome.claimed} valid)`)
      : chalk.green(`honest (${outcome.valid}/${outcome.claimed} valid)`);
    write(`  Player ${outcome.challenger} calls Liar on Player ${outcome.claimant}: [${outcome.slice.join(', ')}] ${verdict}`);
    if (outcome.devilRevealed) write(chalk.red('  😈 The Devil is revealed, everyone else pulls the trigger'));
  };

  const onPulled: Listener<SessionEvents['revolver:pulled']> = ({ player, fired }) => {
    write(fired ? chalk.red(`    💥 Player ${player} is eliminated`) : chalk.gray(`    *click* Player ${player} survives`));
  };

  const onRound: Listener<SessionEvents['round:started']> = ({ roundNumber, roundTarget, currentPlayer }) => {
    write(chalk.cyan(`\n— Round ${roundNumber}: target ${roundTarget}, Player ${currentPlayer} to act`));
  };

  const onOver: Listener<SessionEvents['game:over']> = ({ winner, roundNumber }) => {
    write(winner === null
      ? chalk.bold.red(`\n☠️  Nobody survived (round ${roundNumber})`)
      : chalk.bold.green(`\n🏆 Player ${winner} wins after ${roundNumber - 1} showdowns`));
  };

  session
    .on('game:reset', onReset)
    .on('card:played', onPlayed)
    .on('challenge:resolved', onResolved)
    .on('revolver:pulled', onPulled)
    .on('round:started', onRound)
    .on('game:over', onOver);

  return () => {
    session
      .off('game:reset', onReset)
      .off('card:played', onPlayed)
      .off('challenge:resolved', onResolved)
      .off('revolver:pulled', onPulled)
      .off('round:started', onRound)
      .off('game:over', onOver);
  };
}
