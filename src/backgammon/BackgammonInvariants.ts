/**
 * BackgammonInvariants - Full consistency checks for a game state
 *
 * Run by the state after every mutation in debug mode, and by tests.
 *
 * @module backgammon/BackgammonInvariants
 */

import { bitsFromIndices } from './BackgammonBits.js';
import { BAR_FIELD, BOARD_END, BOARD_SIZE, BOARD_START, NUM_OF_ALL_STONES, PLAYERS, opponentOf } from './BackgammonBoard.js';
import { BackgammonErrorCode, InvariantViolation } from './BackgammonErrors.js';
import { computeZobristHash } from './BackgammonZobrist.js';
import type { Player, StateView } from './types.js';

function pointsWhere(state: StateView, test: (point: number) => boolean): number {
  const points: number[] = [];
  for (let point = 0; point < BOARD_SIZE; point++) {
    if (test(point)) points.push(point);
  }
  return bitsFromIndices(points);
}

/** Occupancy mask of `player` recomputed from the board */
export function expectedOccupiedMask(state: StateView, player: Player): number {
  return pointsWhere(state, (point) => state.numOfStones(point, player) > 0);
}

/** Blocked mask of `player` (opponent holds 2+) recomputed from the board */
export function expectedBlockedMask(state: StateView, player: Player): number {
  const opp = opponentOf(player);
  return pointsWhere(state, (point) => state.numOfStones(point, opp) >= 2);
}

export function assertStoneInvariant(state: StateView, where: string = ''): void {
  for (const player of PLAYERS) {
    let onBoard = 0;
    for (let point = BOARD_START; point <= BOARD_END; point++) {
      onBoard += state.numOfStones(point, player);
    }
    const bar = state.numOfStones(BAR_FIELD[player], player);
    const off = state.borneOff(player);
    const total = onBoard + bar + off;

    if (total !== NUM_OF_ALL_STONES) {
      throw new InvariantViolation(
        BackgammonErrorCode.STATE_STONE_COUNT,
        `Player ${player} has ${total}/${NUM_OF_ALL_STONES} stones at ${where}`,
        { player, where, onBoard, bar, off }
      );
    }
  }
}

export function assertMaskInvariant(state: StateView, where: string = ''): void {
  for (const player of PLAYERS) {
    const occupied = expectedOccupiedMask(state, player);
    if (state.occupiedMask(player) !== occupied) {
      throw new InvariantViolation(
        BackgammonErrorCode.STATE_MASK_DESYNC,
        `Occupied mask mismatch for player ${player} at ${where}`,
        { player, where, current: state.occupiedMask(player).toString(2), expected: occupied.toString(2) }
      );
    }

    const blocked = expectedBlockedMask(state, player);
    if (state.blockedMask(player) !== blocked) {
      throw new InvariantViolation(
        BackgammonErrorCode.STATE_MASK_DESYNC,
        `Blocked mask mismatch for player ${player} at ${where}`,
        { player, where, current: state.blockedMask(player).toString(2), expected: blocked.toString(2) }
      );
    }
  }
}

export function assertHashInvariant(state: StateView, where: string = ''): void {
  const expected = computeZobristHash(state);
  if (state.hash !== expected) {
    throw new InvariantViolation(
      BackgammonErrorCode.STATE_HASH_DESYNC,
      `Zobrist hash mismatch at ${where}`,
      { where, current: state.hash.toString(16), expected: expected.toString(16) }
    );
  }
}

export function assertStateInvariant(state: StateView, where: string = ''): void {
  assertStoneInvariant(state, where);
  assertMaskInvariant(state, where);
  assertHashInvariant(state, where);
}
