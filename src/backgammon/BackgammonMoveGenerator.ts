/**
 * BackgammonMoveGenerator - Legal turn move generation
 *
 * Depth-first search over the remaining dice. Each node tries every distinct
 * remaining die that has at least one legal single move; a node where no die
 * can be played is a leaf, and its path is one complete turn move. Identical
 * sub-problems (same position, same remaining dice) are expanded once per
 * call through a transposition set.
 *
 * The state is mutated during the search and restored exactly on return.
 */

import { indicesFromBits } from './BackgammonBits.js';
import { BEAR_OFF_ANCHOR, DIRECTION } from './BackgammonBoard.js';
import { createLogger } from './BackgammonLogger.js';
import { createSingleMove, createTurnMove, formatSingleMove, singleMoveKey } from './BackgammonMoves.js';
import {
  allowedStartPointsMask,
  bearOffTarget,
  bearingOffAllowed,
  filterTurnMoves,
  generateLegalMask,
  hittableTarget,
  isLegalTarget,
  processDice,
} from './BackgammonRules.js';
import type { BackgammonState } from './BackgammonState.js';
import type { GeneratorStats, SingleMove, TurnMove } from './types.js';

const log = createLogger('MoveGenerator');

// =============================================================================
// Move Generator
// =============================================================================

export class BackgammonMoveGenerator {
  private stats: GeneratorStats = this.initStats();

  /** Every legal single move of the active player with one die */
  generateSingleMoves(state: BackgammonState, die: number): SingleMove[] {
    const player = state.turn;
    const legalMask = generateLegalMask(state, die);
    const canBearOff = bearingOffAllowed(state);
    const moves: SingleMove[] = [];

    for (const start of indicesFromBits(allowedStartPointsMask(state))) {
      const target = start + die * DIRECTION[player];

      if (state.isOnBoard(target) && isLegalTarget(legalMask, target)) {
        const type = hittableTarget(state, target) ? 'HIT' : 'NORMAL';
        moves.push(createSingleMove(player, start, target, type, die));
      } else if (canBearOff && bearOffTarget(state, start, target, die)) {
        moves.push(createSingleMove(player, start, BEAR_OFF_ANCHOR[player], 'BEAR_OFF', die));
      }
    }

    return moves;
  }

  anyMoveLeft(state: BackgammonState, dice: readonly number[]): boolean {
    for (const die of new Set(dice)) {
      if (this.generateSingleMoves(state, die).length > 0) return true;
    }
    return false;
  }

  /**
   * All complete turn moves for the given (already expanded) dice, unfiltered.
   * Empty when no die can be played at all.
   */
  generateAllTurnMoves(state: BackgammonState, dice: readonly number[]): TurnMove[] {
    this.stats = this.initStats();
    const turnMoves: TurnMove[] = [];
    const visited = new Set<string>();
    const path: SingleMove[] = [];

    const dfs = (remaining: readonly number[]): void => {
      this.stats.nodes++;

      const options: Array<[number, SingleMove[]]> = [];
      for (const die of new Set(remaining)) {
        const moves = this.generateSingleMoves(state, die);
        if (moves.length > 0) options.push([die, moves]);
      }

      if (options.length === 0) {
        this.stats.leaves++;
        if (path.length > 0) turnMoves.push(createTurnMove(path));
        return;
      }

      const key = `${state.hash}:${[...remaining].sort((a, b) => a - b).join(',')}`;
      if (visited.has(key)) {
        this.stats.ttHits++;
        return;
      }
      visited.add(key);

      for (const [die, moves] of options) {
        const rest = [...remaining];
        rest.splice(rest.indexOf(die), 1);

        for (const move of moves) {
          state.applyMove(move);
          path.push(move);
          dfs(rest);
          path.pop();
          state.undoMove(move);
        }
      }
    };

    dfs(dice);

    this.stats.ttSize = visited.size;
    visited.clear();

    log.debug(
      `${turnMoves.length} turn moves for [${dice.join(', ')}]`,
      `nodes=${this.stats.nodes} leaves=${this.stats.leaves} ttHits=${this.stats.ttHits}`
    );
    return turnMoves;
  }

  /** Expand the dice, generate and keep only the sequences the rules allow */
  generateLegalMoves(state: BackgammonState, dice: readonly number[]): TurnMove[] {
    return filterTurnMoves(this.generateAllTurnMoves(state, processDice(dice)));
  }

  private initStats(): GeneratorStats {
    return {
      nodes: 0,
      leaves: 0,
      ttHits: 0,
      ttSize: 0,
    };
  }

  /**
   * Statistics of the last generation call
   */
  getStats(): GeneratorStats {
    return { ...this.stats };
  }
}

const defaultGenerator = new BackgammonMoveGenerator();

/**
 * Legal turn moves of the active player for a two-dice roll.
 * An empty list means the player cannot move.
 */
export function generateLegalMoves(state: BackgammonState, dice: readonly number[]): TurnMove[] {
  return defaultGenerator.generateLegalMoves(state, dice);
}

// =============================================================================
// Move Tree
// =============================================================================

export interface MoveTreeNode {
  move: SingleMove;
  children: Map<string, MoveTreeNode>;
}

/** A step of `MoveTree.iterPathsStepwise` */
export interface MoveTreeStep {
  path: SingleMove[];
  /** Next choices after `path`; empty once the path is complete */
  options: SingleMove[];
}

/**
 * Prefix tree over turn moves, for choosing a turn one single move at a time.
 */
export class MoveTree {
  readonly root: Map<string, MoveTreeNode> = new Map();

  constructor(turnMoves: readonly TurnMove[]) {
    for (const turnMove of turnMoves) {
      let level = this.root;
      for (const move of turnMove) {
        const key = singleMoveKey(move);
        let node = level.get(key);
        if (!node) {
          node = { move, children: new Map() };
          level.set(key, node);
        }
        level = node.children;
      }
    }
  }

  /** Every root-to-leaf path. An empty tree yields one empty path */
  *iterPaths(): Generator<SingleMove[]> {
    yield* walkPaths(this.root, []);
  }

  /** Every node in depth-first order together with its next options */
  *iterPathsStepwise(): Generator<MoveTreeStep> {
    yield* walkSteps(this.root, []);
  }

  /** Next single moves after `path`; empty when the prefix is complete or unknown */
  options(path: readonly SingleMove[] = []): SingleMove[] {
    let level = this.root;
    for (const move of path) {
      const node = level.get(singleMoveKey(move));
      if (!node) return [];
      level = node.children;
    }
    return [...level.values()].map((node) => node.move);
  }

  /** Number of complete paths */
  get size(): number {
    return countLeaves(this.root);
  }

  toString(): string {
    const lines: string[] = [];
    const render = (level: Map<string, MoveTreeNode>, indent: string): void => {
      for (const node of level.values()) {
        lines.push(indent + formatSingleMove(node.move));
        render(node.children, indent + ' '.repeat(8));
      }
    };
    render(this.root, '');
    return lines.join('\n');
  }
}

function* walkPaths(level: Map<string, MoveTreeNode>, path: SingleMove[]): Generator<SingleMove[]> {
  if (level.size === 0) {
    yield path;
    return;
  }
  for (const node of level.values()) {
    yield* walkPaths(node.children, [...path, node.move]);
  }
}

function* walkSteps(level: Map<string, MoveTreeNode>, path: SingleMove[]): Generator<MoveTreeStep> {
  const options = [...level.values()].map((node) => node.move);
  yield { path, options };
  for (const node of level.values()) {
    yield* walkSteps(node.children, [...path, node.move]);
  }
}

function countLeaves(level: Map<string, MoveTreeNode>): number {
  let count = 0;
  for (const node of level.values()) {
    count += node.children.size === 0 ? 1 : countLeaves(node.children);
  }
  return count;
}
