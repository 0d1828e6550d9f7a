#!/usr/bin/env node
/**
 * Backgammon self-play CLI
 *
 * Plays a series of games between the computer player and a random or
 * computer opponent and prints the results.
 * Usage: backgammon-selfplay [options]
 */

import chalk from 'chalk';
import meow from 'meow';
import { parseSelfPlayConfig, SelfPlayConfig } from './BackgammonConfig.js';
import { BackgammonEngine } from './BackgammonEngine.js';
import { isBackgammonError } from './BackgammonErrors.js';
import { BackgammonEvaluator } from './BackgammonEvaluator.js';
import { setDebugLogging } from './BackgammonLogger.js';
import { formatTurnMove } from './BackgammonMoves.js';
import { BackgammonPlayer, ComputerPlayer, RandomPlayer } from './BackgammonPlayers.js';
import { BackgammonAI } from './BackgammonAI.js';
import { createDefaultRng, createSeededRng, Rng } from './BackgammonRandom.js';
import { GameRecord, GameResultKind, Player } from './types.js';

const cli = meow(`
  Usage
    $ backgammon-selfplay [options]

  Options
    --games, -g       Number of games to play (default: 1)
    --iterations, -i  UCB1 iterations per move (default: 120)
    --seed, -s        Seed for dice and rollouts
    --opponent, -o    Opponent of player 0: ai | random (default: random)
    --cube            Enable the doubling cube
    --max-turns       Stop a game after this many turns (default: no cap)
    --verbose, -v     Print every turn
    --debug           Print search and generator diagnostics

  Examples
    $ backgammon-selfplay --games 10 --seed 42
    $ backgammon-selfplay --opponent ai --iterations 60 --cube -v
`, {
  importMeta: import.meta,
  flags: {
    games: { type: 'number', shortFlag: 'g' },
    iterations: { type: 'number', shortFlag: 'i' },
    seed: { type: 'number', shortFlag: 's' },
    opponent: { type: 'string', shortFlag: 'o' },
    cube: { type: 'boolean', default: false },
    maxTurns: { type: 'number' },
    verbose: { type: 'boolean', shortFlag: 'v', default: false },
    debug: { type: 'boolean', default: false },
  },
});

// =============================================================================
// Game Setup
// =============================================================================

function rngFor(config: SelfPlayConfig, game: number, stream: number): Rng {
  return config.seed === undefined ? createDefaultRng() : createSeededRng(config.seed + game * 3 + stream);
}

function createComputer(id: Player, config: SelfPlayConfig, game: number): ComputerPlayer {
  const ai = new BackgammonAI({ iterations: config.iterations }, { rng: rngFor(config, game, 1 + id) });
  return new ComputerPlayer(id, undefined, ai);
}

function createOpponent(config: SelfPlayConfig, game: number): BackgammonPlayer {
  if (config.opponent === 'ai') {
    return createComputer(1, config, game);
  }
  return new RandomPlayer(1, rngFor(config, game, 2), config.cube ? new BackgammonEvaluator() : null);
}

function playGame(config: SelfPlayConfig, game: number): GameRecord {
  const engine = new BackgammonEngine(createComputer(0, config, game), createOpponent(config, game), {
    rng: rngFor(config, game, 0),
    config: { enableCube: config.cube, maxTurns: config.maxTurns },
  });

  const record = engine.play();

  if (config.verbose) {
    for (const [index, turn] of record.history.entries()) {
      const move = turn.move ? formatTurnMove(turn.move) : chalk.gray('no move');
      console.log(`  ${String(index + 1).padStart(3)}. P${turn.player} [${turn.dice.join(' ')}] ${move}`);
    }
  }
  return record;
}

// =============================================================================
// Main
// =============================================================================

function main(): void {
  const config = parseSelfPlayConfig({
    games: cli.flags.games,
    iterations: cli.flags.iterations,
    seed: cli.flags.seed,
    opponent: cli.flags.opponent,
    cube: cli.flags.cube,
    maxTurns: cli.flags.maxTurns,
    verbose: cli.flags.verbose,
    debug: cli.flags.debug,
  });
  setDebugLogging(config.debug);

  console.log(chalk.bold(`\n🎲 Backgammon self-play: ${config.games} game(s), computer vs ${config.opponent}\n`));

  const wins: [number, number] = [0, 0];
  const points: [number, number] = [0, 0];
  const kinds: Record<GameResultKind, number> = { WIN: 0, GAMMON: 0, BACKGAMMON: 0, DROP: 0 };
  let totalTurns = 0;
  let unfinished = 0;

  for (let game = 0; game < config.games; game++) {
    if (config.verbose) console.log(chalk.cyan(`Game ${game + 1}`));

    const startTime = Date.now();
    const record = playGame(config, game);
    const elapsed = Date.now() - startTime;
    totalTurns += record.turns;

    if (record.result) {
      const { winner, kind } = record.result;
      wins[winner]++;
      points[winner] += record.result.points;
      kinds[kind]++;
      const label = winner === 0 ? chalk.green('computer') : chalk.yellow(config.opponent);
      console.log(
        `Game ${game + 1}: ${label} wins ${record.result.points} (${kind}) in ${record.turns} turns, ${elapsed}ms`
      );
    } else {
      unfinished++;
      console.log(chalk.gray(`Game ${game + 1}: stopped after ${record.turns} turns`));
    }
  }

  console.log(chalk.bold('\nSummary'));
  console.log(`  computer:  ${wins[0]} wins, ${points[0]} points`);
  console.log(`  ${config.opponent.padEnd(9)}: ${wins[1]} wins, ${points[1]} points`);
  console.log(
    `  gammons: ${kinds.GAMMON}, backgammons: ${kinds.BACKGAMMON}, drops: ${kinds.DROP}`
  );
  console.log(`  average turns: ${(totalTurns / config.games).toFixed(1)}`);
  if (unfinished > 0) {
    console.log(`  unfinished: ${unfinished}`);
  }
}

try {
  main();
} catch (error) {
  if (isBackgammonError(error)) {
    console.error(chalk.red(`❌ ${error.code}: ${error.message}`));
  } else {
    console.error(chalk.red('❌ Error:'), error);
  }
  process.exitCode = 1;
}
