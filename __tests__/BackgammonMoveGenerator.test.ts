/**
 * Turn move generation tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { createSingleMove, createTurnMove, formatSingleMove, turnMoveKey } from '../src/backgammon/BackgammonMoves.js';
import { BackgammonMoveGenerator, generateLegalMoves, MoveTree } from '../src/backgammon/BackgammonMoveGenerator.js';
import { BackgammonState } from '../src/backgammon/BackgammonState.js';
import { position } from './helpers.js';

// =============================================================================
// Single Moves
// =============================================================================

describe('Single move generation', () => {
  let generator: BackgammonMoveGenerator;

  beforeEach(() => {
    generator = new BackgammonMoveGenerator();
  });

  it('should generate normal moves from every start point', () => {
    const moves = generator.generateSingleMoves(new BackgammonState(), 1);
    expect(moves).toEqual([
      createSingleMove(0, 6, 5, 'NORMAL', 1),
      createSingleMove(0, 8, 7, 'NORMAL', 1),
      createSingleMove(0, 24, 23, 'NORMAL', 1),
    ]);
  });

  it('should mark hits', () => {
    const state = position([[13, 1], [6, 14]], [[10, 1], [19, 14]]);
    expect(generator.generateSingleMoves(state, 3)).toEqual([
      createSingleMove(0, 6, 3, 'NORMAL', 3),
      createSingleMove(0, 13, 10, 'HIT', 3),
    ]);
  });

  it('should only bear off the rearmost stone on an overshoot', () => {
    const three = position([[4, 1], [5, 1], [6, 1], [-1, 12]], [[19, 15]]);
    expect(generator.generateSingleMoves(three, 6)).toEqual([createSingleMove(0, 6, 0, 'BEAR_OFF', 6)]);

    const two = position([[4, 1], [5, 1], [-1, 13]], [[19, 15]]);
    expect(generator.generateSingleMoves(two, 6)).toEqual([createSingleMove(0, 5, 0, 'BEAR_OFF', 6)]);
  });

  it('should bear off to 25 for player 1', () => {
    const state = position([[6, 15]], [[20, 1], [21, 1], [-1, 13]], 1);
    expect(generator.generateSingleMoves(state, 6)).toEqual([createSingleMove(1, 20, 25, 'BEAR_OFF', 6)]);
  });

  it('should find no move when every entry point is blocked', () => {
    const state = position(
      [[25, 2], [6, 13]],
      [[19, 2], [20, 2], [21, 2], [22, 2], [23, 2], [24, 2], [-1, 3]]
    );
    expect(generator.anyMoveLeft(state, [6, 5])).toBe(false);
    expect(generateLegalMoves(state, [6, 5])).toEqual([]);
  });
});

// =============================================================================
// Turn Moves
// =============================================================================

describe('Turn move generation', () => {
  it('should enter from the bar before anything else', () => {
    const state = position([[25, 1], [13, 14]], [[22, 2], [19, 13]]);
    const moves = generateLegalMoves(state, [3, 4]);
    expect(moves).toEqual([
      [createSingleMove(0, 25, 21, 'NORMAL', 4), createSingleMove(0, 13, 10, 'NORMAL', 3)],
      [createSingleMove(0, 25, 21, 'NORMAL', 4), createSingleMove(0, 21, 18, 'NORMAL', 3)],
    ]);
    expect(generateLegalMoves(state, [3, 3])).toEqual([]);
  });

  it('should keep only the larger die when one die can be played', () => {
    const state = position([[13, 1], [-1, 14]], [[2, 2], [19, 13]]);
    expect(generateLegalMoves(state, [5, 6])).toEqual([[createSingleMove(0, 13, 7, 'NORMAL', 6)]]);
  });

  it('should play the smaller die when the larger one is blocked', () => {
    const state = position([[13, 1], [-1, 14]], [[7, 2], [2, 2], [19, 11]]);
    expect(generateLegalMoves(state, [6, 5])).toEqual([[createSingleMove(0, 13, 8, 'NORMAL', 5)]]);
  });

  it('should use both dice whenever possible', () => {
    const moves = generateLegalMoves(new BackgammonState(), [3, 1]);
    expect(moves.length).toBeGreaterThan(0);
    expect(moves.every((m) => m.length === 2)).toBe(true);

    const pointMaking = turnMoveKey([createSingleMove(0, 8, 5, 'NORMAL', 3), createSingleMove(0, 6, 5, 'NORMAL', 1)]);
    expect(moves.map(turnMoveKey)).toContain(pointMaking);
  });

  it('should play doubles four times', () => {
    const moves = generateLegalMoves(new BackgammonState(), [1, 1]);
    expect(moves.length).toBeGreaterThan(0);
    expect(moves.every((m) => m.length === 4 && m.every((s) => s.die === 1))).toBe(true);
  });

  it('should leave the state unchanged', () => {
    const state = new BackgammonState(undefined, 0, true);
    const before = state.copy();
    generateLegalMoves(state, [6, 6]);
    expect(state.equals(before)).toBe(true);
    expect(state.hash).toBe(before.hash);
  });

  it('should not return duplicate sequences', () => {
    const moves = generateLegalMoves(new BackgammonState(), [6, 4]);
    const keys = moves.map(turnMoveKey);
    expect(new Set(keys).size).toBe(keys.length);
  });

  it('should report search statistics', () => {
    const generator = new BackgammonMoveGenerator();
    generator.generateLegalMoves(new BackgammonState(), [2, 2]);
    const stats = generator.getStats();
    expect(stats.nodes).toBeGreaterThan(0);
    expect(stats.leaves).toBeGreaterThan(0);
    expect(stats.ttHits).toBeGreaterThan(0);
    expect(stats.ttSize).toBeGreaterThan(0);
  });
});

// =============================================================================
// Move Tree
// =============================================================================

describe('MoveTree', () => {
  const a = createSingleMove(0, 13, 8, 'NORMAL', 5);
  const b = createSingleMove(0, 8, 5, 'NORMAL', 3);
  const c = createSingleMove(0, 13, 10, 'NORMAL', 3);
  const d = createSingleMove(0, 6, 1, 'HIT', 5);

  const tree = new MoveTree([createTurnMove([a, b]), createTurnMove([a, c]), createTurnMove([d])]);

  it('should iterate complete paths', () => {
    expect([...tree.iterPaths()]).toEqual([[a, b], [a, c], [d]]);
    expect(tree.size).toBe(3);
  });

  it('should list options after a prefix', () => {
    expect(tree.options()).toEqual([a, d]);
    expect(tree.options([a])).toEqual([b, c]);
    expect(tree.options([d])).toEqual([]);
    expect(tree.options([b])).toEqual([]);
  });

  it('should step through every node', () => {
    const steps = [...tree.iterPathsStepwise()];
    expect(steps).toHaveLength(5);
    expect(steps[0]).toEqual({ path: [], options: [a, d] });
    expect(steps[1]).toEqual({ path: [a], options: [b, c] });
    expect(steps[2]).toEqual({ path: [a, b], options: [] });
  });

  it('should render an indented tree', () => {
    const indent = ' '.repeat(8);
    expect(tree.toString()).toBe(
      [formatSingleMove(a), indent + formatSingleMove(b), indent + formatSingleMove(c), formatSingleMove(d)].join('\n')
    );
    expect(tree.toString().split('\n')[1]).toBe(`${indent} 8 >  5 (3, NORMAL)`);
  });

  it('should yield one empty path for an empty tree', () => {
    const empty = new MoveTree([]);
    expect([...empty.iterPaths()]).toEqual([[]]);
    expect(empty.size).toBe(0);
    expect(empty.toString()).toBe('');
  });

  it('should share prefixes of generated moves', () => {
    const state = position([[25, 1], [13, 14]], [[22, 2], [19, 13]]);
    const generated = new MoveTree(generateLegalMoves(state, [3, 4]));
    expect(generated.options()).toEqual([createSingleMove(0, 25, 21, 'NORMAL', 4)]);
    expect(generated.size).toBe(2);
  });
});
