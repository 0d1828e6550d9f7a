/**
 * BackgammonRules - Move legality and game-over rules
 *
 * R1-R8 are free functions over the active player's view of a state. The
 * `RULES` table keeps each rule's id and description next to it for tracing.
 *
 * @module backgammon/BackgammonRules
 */

import { isBitSet, removeFromMask, setAllBits, setBit, shiftMask } from './BackgammonBits.js';
import {
  BAR_FIELD,
  BEAR_OFF_ANCHOR,
  DIRECTION,
  FULL_BOARD_MASK,
  HOME_END,
  HOME_MASK,
  HOME_START,
  NUM_OF_ALL_STONES,
  OUTSIDE_HOME_MASK,
  PLAYERS,
  opponentOf,
} from './BackgammonBoard.js';
import { createLogger } from './BackgammonLogger.js';
import type { BackgammonState } from './BackgammonState.js';
import type { GameResult, GameResultKind, TurnMove } from './types.js';

const log = createLogger('Rules');

// =============================================================================
// R1 - R5: Single Move Legality
// =============================================================================

/** R1: stones on the bar must re-enter before anything else moves */
export function allowedStartPointsMask(state: BackgammonState): number {
  const bar = BAR_FIELD[state.turn];
  if (state.numOfStones(bar, state.turn) > 0) {
    return setBit(bar);
  }
  return state.occupiedMask(state.turn);
}

/** R2: bearing off needs every stone in the home board */
export function bearingOffAllowed(state: BackgammonState): boolean {
  return (OUTSIDE_HOME_MASK[state.turn] & state.occupiedMask(state.turn)) === 0;
}

/** Home points farther from the bear-off anchor than `start` hold no own stone */
function noStoneBehind(state: BackgammonState, start: number): boolean {
  const player = state.turn;
  const behind = player === 0
    ? removeFromMask(HOME_MASK[0], setAllBits(HOME_START[0], start))
    : removeFromMask(HOME_MASK[1], setAllBits(start, HOME_END[1]));
  return (state.occupiedMask(player) & behind) === 0;
}

/**
 * R3: may a stone on `start` bear off to `target` with `die`?
 *
 * Landing exactly on the anchor is always fine. Overshooting is only allowed
 * from the rearmost stone, and only when no home stone bears off exactly.
 */
export function bearOffTarget(state: BackgammonState, start: number, target: number, die: number): boolean {
  const player = state.turn;
  const anchor = BEAR_OFF_ANCHOR[player];

  if (target === anchor) return true;

  const overshoot = player === 0 ? target < anchor : target > anchor;
  if (!overshoot || !noStoneBehind(state, start)) return false;

  for (let point = HOME_START[player]; point <= HOME_END[player]; point++) {
    if (state.numOfStones(point, player) > 0 && point + die * DIRECTION[player] === anchor) {
      return false;
    }
  }
  return true;
}

/** R4: a lone opponent stone can be hit */
export function hittableTarget(state: BackgammonState, point: number): boolean {
  return state.numOfStones(point, state.opp) === 1;
}

/** R5: on-board targets reachable with `die` from R1's start points */
export function generateLegalMask(state: BackgammonState, die: number): number {
  const shifted = shiftMask(allowedStartPointsMask(state), die * DIRECTION[state.turn]) & FULL_BOARD_MASK;
  return removeFromMask(shifted, state.blockedMask(state.turn));
}

export function isLegalTarget(legalMask: number, target: number): boolean {
  return isBitSet(target, legalMask);
}

// =============================================================================
// R6 - R7: Dice and Turn Filtering
// =============================================================================

/** R6: a double is played four times */
export function processDice(dice: readonly number[]): number[] {
  if (dice.length === 2 && dice[0] === dice[1]) {
    return [dice[0], dice[0], dice[0], dice[0]];
  }
  return [...dice];
}

/**
 * R7: keep the sequences that use the most dice. If only one die can be
 * played, it must be the larger one whenever that one is playable.
 */
export function filterTurnMoves(turnMoves: readonly TurnMove[]): TurnMove[] {
  if (turnMoves.length === 0) return [];

  const maxLength = Math.max(...turnMoves.map((m) => m.length));
  const longest = turnMoves.filter((m) => m.length === maxLength);

  if (maxLength !== 1) return longest;

  const biggest = Math.max(...longest.map((m) => m[0].die));
  return longest.filter((m) => m[0].die === biggest);
}

// =============================================================================
// R8: Game Over
// =============================================================================

const RESULT_MULTIPLIER: Record<Exclude<GameResultKind, 'DROP'>, number> = {
  WIN: 1,
  GAMMON: 2,
  BACKGAMMON: 3,
};

/**
 * R8: the game ends when a player has borne off all stones.
 * @returns null while the game is running
 */
export function gameOver(state: BackgammonState, cubeValue: number): GameResult | null {
  for (const winner of PLAYERS) {
    if (state.borneOff(winner) !== NUM_OF_ALL_STONES) continue;

    const loser = opponentOf(winner);
    const gammon = state.borneOff(loser) === 0;
    const stranded = state.barCount(loser) > 0 || (state.occupiedMask(loser) & HOME_MASK[winner]) !== 0;

    const kind: Exclude<GameResultKind, 'DROP'> = gammon && stranded ? 'BACKGAMMON' : gammon ? 'GAMMON' : 'WIN';
    return {
      winner,
      points: RESULT_MULTIPLIER[kind] * cubeValue,
      cubeValue,
      kind,
    };
  }
  return null;
}

// =============================================================================
// Rule Table
// =============================================================================

/** Argument tuple per rule */
export interface RuleArgs {
  R1: [state: BackgammonState];
  R2: [state: BackgammonState];
  R3: [state: BackgammonState, start: number, target: number, die: number];
  R4: [state: BackgammonState, point: number];
  R5: [state: BackgammonState, die: number];
  R6: [dice: readonly number[]];
  R7: [turnMoves: readonly TurnMove[]];
  R8: [state: BackgammonState, cubeValue: number];
}

/** Result type per rule */
export interface RuleResults {
  R1: number;
  R2: boolean;
  R3: boolean;
  R4: boolean;
  R5: number;
  R6: number[];
  R7: TurnMove[];
  R8: GameResult | null;
}

export type RuleId = keyof RuleArgs;

export interface RuleEntry<K extends RuleId> {
  id: K;
  description: string;
  check: (...args: RuleArgs[K]) => RuleResults[K];
}

export const RULES: { readonly [K in RuleId]: RuleEntry<K> } = {
  R1: {
    id: 'R1',
    description: 'Player must re-enter stones from the bar before moving any other stones.',
    check: allowedStartPointsMask,
  },
  R2: {
    id: 'R2',
    description: 'Player may bear off only if all stones are in their home board.',
    check: bearingOffAllowed,
  },
  R3: {
    id: 'R3',
    description: 'Checks if a move can bear off including overshoot logic.',
    check: bearOffTarget,
  },
  R4: {
    id: 'R4',
    description: 'Target point with exactly one opponent stone may be hit.',
    check: hittableTarget,
  },
  R5: {
    id: 'R5',
    description: 'Generate legal target mask for a die.',
    check: generateLegalMask,
  },
  R6: {
    id: 'R6',
    description: 'Process dice, expand doubles to four moves.',
    check: processDice,
  },
  R7: {
    id: 'R7',
    description: 'Filter turn moves to enforce maximum moves and highest die usage.',
    check: filterTurnMoves,
  },
  R8: {
    id: 'R8',
    description: 'Check if game is over and return the result if so.',
    check: gameOver,
  },
};

/** Evaluate a rule through the table and log its result at debug level */
export function debugRule<K extends RuleId>(id: K, ...args: RuleArgs[K]): RuleResults[K] {
  const rule: RuleEntry<K> = RULES[id];
  const result = rule.check(...args);
  log.debug(`Rule ${rule.id}: ${rule.description} ->`, result);
  return result;
}
