/**
 * Game engine tests: dice, turns, cube, full games and undo
 */

import { describe, it, expect } from 'vitest';
import { BackgammonEngine, createBackgammonEngine } from '../src/backgammon/BackgammonEngine.js';
import { BackgammonErrorCode, EmptyUndo } from '../src/backgammon/BackgammonErrors.js';
import { createSingleMove, createTurnMove } from '../src/backgammon/BackgammonMoves.js';
import type { BackgammonPlayer } from '../src/backgammon/BackgammonPlayers.js';
import { RandomPlayer } from '../src/backgammon/BackgammonPlayers.js';
import { SeededRandom } from '../src/backgammon/BackgammonRandom.js';
import { BackgammonState } from '../src/backgammon/BackgammonState.js';
import type { Player, TurnMove } from '../src/backgammon/types.js';
import { thrown } from './helpers.js';

/** Player with fixed cube answers that always plays the first legal move */
class StubPlayer implements BackgammonPlayer {
  readonly name: string;
  offers = 0;

  constructor(
    readonly id: Player,
    private readonly answers: { offer: boolean; accept: boolean },
    private readonly move?: TurnMove | null
  ) {
    this.name = `Stub ${id}`;
  }

  selectMove(moves: readonly TurnMove[]): TurnMove | null {
    if (this.move !== undefined) return this.move;
    return moves.length > 0 ? moves[0] : null;
  }

  offerDouble(): boolean {
    this.offers++;
    return this.answers.offer;
  }

  acceptDouble(): boolean {
    return this.answers.accept;
  }
}

function randomEngine(seed: number, debug: boolean = true): BackgammonEngine {
  return createBackgammonEngine(
    new RandomPlayer(0, new SeededRandom(seed + 1)),
    new RandomPlayer(1, new SeededRandom(seed + 2)),
    { rng: new SeededRandom(seed), state: new BackgammonState(undefined, 0, debug) }
  );
}

// =============================================================================
// Dice
// =============================================================================

describe('Dice', () => {
  it('should let the higher start die move first', () => {
    const engine = randomEngine(11);
    const [d0, d1] = engine.rollStartDice();
    expect(d0).not.toBe(d1);
    expect(engine.turn).toBe(d0 > d1 ? 0 : 1);
  });

  it('should expand doubles when rolling', () => {
    const engine = randomEngine(12);
    for (let i = 0; i < 30; i++) {
      const dice = engine.rollDice();
      expect(dice.length === 2 || (dice.length === 4 && dice.every((d) => d === dice[0]))).toBe(true);
      expect(dice.every((d) => d >= 1 && d <= 6)).toBe(true);
      expect(engine.dice).toEqual(dice);
    }
  });
});

// =============================================================================
// Turns and Games
// =============================================================================

describe('BackgammonEngine games', () => {
  it('should stop at the turn cap', () => {
    const engine = randomEngine(21);
    const record = engine.play(5);

    expect(record.result).toBeNull();
    expect(record.turns).toBe(5);
    expect(record.history).toHaveLength(5);
    expect(record.cubeValue).toBe(1);
  });

  it('should alternate players between turns', () => {
    const engine = randomEngine(22);
    const record = engine.play(6);
    for (let i = 1; i < record.history.length; i++) {
      expect(record.history[i].player).not.toBe(record.history[i - 1].player);
    }
  });

  it('should play a random game to the end', () => {
    const engine = randomEngine(23, false);
    const record = engine.play(2000);
    const result = record.result;
    if (!result) throw new Error('game did not finish');

    expect(engine.state.borneOff(result.winner)).toBe(15);
    expect(result.cubeValue).toBe(1);
    expect(result.points).toBe({ WIN: 1, GAMMON: 2, BACKGAMMON: 3, DROP: 1 }[result.kind]);
    expect(record.turns).toBe(record.history.length);
  });

  it('should undo every move back to the start', () => {
    const engine = randomEngine(24);
    engine.play(4);

    while (engine.undo.moveCount > 0) {
      expect(engine.undoLastMove()).not.toBeNull();
    }
    expect(engine.state.toPositionList()).toEqual([
      [[6, 5], [8, 3], [13, 5], [24, 2]],
      [[1, 2], [12, 5], [17, 3], [19, 5]],
    ]);

    expect(engine.undoLastMove()).toBeNull();
    expect(engine.state.equals(new BackgammonState(undefined, engine.state.turn))).toBe(true);
    expect(thrown(() => engine.undoLastMove())).toBeInstanceOf(EmptyUndo);
  });

  it('should reject an illegal choice', () => {
    const illegal = createTurnMove([createSingleMove(0, 1, 0, 'NORMAL', 1)]);
    const engine = new BackgammonEngine(
      new StubPlayer(0, { offer: false, accept: true }, illegal),
      new StubPlayer(1, { offer: false, accept: true }),
      { rng: new SeededRandom(31), config: { startRoll: false } }
    );
    expect(thrown(() => engine.playTurn())).toMatchObject({ code: BackgammonErrorCode.MOVE_INVALID });
  });

  it('should reject a pass while moves exist', () => {
    const engine = new BackgammonEngine(
      new StubPlayer(0, { offer: false, accept: true }, null),
      new StubPlayer(1, { offer: false, accept: true }),
      { rng: new SeededRandom(32), config: { startRoll: false } }
    );
    expect(thrown(() => engine.playTurn())).toMatchObject({ code: BackgammonErrorCode.MOVE_INVALID });
  });
});

describe('BackgammonEngine config', () => {
  it('should reject an invalid config', () => {
    const players = [new RandomPlayer(0, new SeededRandom(1)), new RandomPlayer(1, new SeededRandom(2))] as const;
    expect(thrown(() => new BackgammonEngine(...players, { config: { maxTurns: -1 } }))).toMatchObject({
      code: BackgammonErrorCode.CONFIG_INVALID,
    });
    expect(thrown(() => new BackgammonEngine(...players, { config: { maxTurns: 2.5 } }))).toMatchObject({
      code: BackgammonErrorCode.CONFIG_INVALID,
    });
  });
});

// =============================================================================
// Doubling Cube
// =============================================================================

describe('Doubling cube', () => {
  it('should end the game when a double is dropped', () => {
    const engine = new BackgammonEngine(
      new StubPlayer(0, { offer: true, accept: true }),
      new StubPlayer(1, { offer: true, accept: false }),
      { rng: new SeededRandom(41), config: { startRoll: false, enableCube: true } }
    );
    const record = engine.play();

    expect(record.result).toEqual({ winner: 0, points: 1, cubeValue: 1, kind: 'DROP' });
    expect(record.turns).toBe(0);
  });

  it('should double and pass the cube on a take', () => {
    const doubler = new StubPlayer(0, { offer: true, accept: true });
    const engine = new BackgammonEngine(doubler, new StubPlayer(1, { offer: false, accept: true }), {
      rng: new SeededRandom(42),
      config: { startRoll: false },
    });

    expect(engine.offerDouble()).toEqual({ offered: true, accepted: true, result: null });
    expect(engine.cubeValue).toBe(2);
    expect(engine.cubeOwner).toBe(1);

    expect(engine.offerDouble()).toEqual({ offered: false, accepted: null, result: null });
    expect(doubler.offers).toBe(1);
    expect(engine.cubeValue).toBe(2);
  });

  it('should let the cube owner redouble', () => {
    const engine = new BackgammonEngine(
      new StubPlayer(0, { offer: true, accept: true }),
      new StubPlayer(1, { offer: true, accept: true }),
      { rng: new SeededRandom(43), config: { startRoll: false } }
    );
    engine.offerDouble();
    engine.playTurn();
    expect(engine.turn).toBe(1);

    expect(engine.offerDouble()).toEqual({ offered: true, accepted: true, result: null });
    expect(engine.cubeValue).toBe(4);
    expect(engine.cubeOwner).toBe(0);
  });
});
