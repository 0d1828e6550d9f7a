/**
 * BackgammonBoard - Static board geometry
 *
 * Points 1..24 are playable. Index 0 and 25 are anchors: player 0 bears off
 * to 0 and re-enters from 25, player 1 bears off to 25 and re-enters from 0.
 *
 * @module backgammon/BackgammonBoard
 */

import { setAllBits, setBit } from './BackgammonBits.js';
import type { Player, PositionList } from './types.js';

export const BOARD_START = 1;
export const BOARD_END = 24;

/** Slots in the board array, anchors included */
export const BOARD_SIZE = 26;

/** Bar anchor per player */
export const BAR_FIELD: readonly [number, number] = [25, 0];

/** Bear-off anchor per player */
export const BEAR_OFF_ANCHOR: readonly [number, number] = [0, 25];

/** Position-list point marking borne-off stones */
export const BORNE_OFF_POINT = -1;

/** Home board range per player */
export const HOME_START: readonly [number, number] = [1, 19];
export const HOME_END: readonly [number, number] = [6, 24];

/** Playable points 1..24 */
export const FULL_BOARD_MASK = setAllBits(BOARD_START, BOARD_END);

export const HOME_MASK: readonly [number, number] = [
  setAllBits(HOME_START[0], HOME_END[0]),
  setAllBits(HOME_START[1], HOME_END[1]),
];

/** Everything a player may not bear off with: points outside home plus the own bar */
export const OUTSIDE_HOME_MASK: readonly [number, number] = [
  (HOME_MASK[0] ^ FULL_BOARD_MASK) | setBit(BAR_FIELD[0]),
  (HOME_MASK[1] ^ FULL_BOARD_MASK) | setBit(BAR_FIELD[1]),
];

export const NUM_OF_ALL_STONES = 15;

/** Sign of a player's stones in the board array */
export const STONE: readonly [number, number] = [-1, 1];

/** Movement direction per player */
export const DIRECTION: readonly [number, number] = [-1, 1];

export const PLAYERS: readonly Player[] = [0, 1];

/** Standard starting layout */
export const DEFAULT_POSITIONS: PositionList = [
  [[24, 2], [13, 5], [8, 3], [6, 5]],
  [[1, 2], [12, 5], [17, 3], [19, 5]],
];

export function opponentOf(player: Player): Player {
  return player === 0 ? 1 : 0;
}
