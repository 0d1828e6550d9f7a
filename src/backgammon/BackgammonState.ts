/**
 * BackgammonState - Mutable game state with incremental hashing
 *
 * Holds the 26-slot board, borne-off counters, per-player occupancy and
 * blocked masks, the active player and a 64-bit Zobrist hash. Every stone
 * primitive updates counts, masks and hash together.
 *
 * Apply/undo pairs must be strictly nested: undo moves in the reverse order
 * they were applied. Searches that need to diverge work on `copy()`.
 */

import { clearBit, removeFromMask, setBit } from './BackgammonBits.js';
import {
  BAR_FIELD,
  BEAR_OFF_ANCHOR,
  BOARD_END,
  BOARD_SIZE,
  BOARD_START,
  BORNE_OFF_POINT,
  DEFAULT_POSITIONS,
  NUM_OF_ALL_STONES,
  PLAYERS,
  STONE,
  opponentOf,
} from './BackgammonBoard.js';
import { BackgammonError, BackgammonErrorCode, InvalidPosition } from './BackgammonErrors.js';
import { assertStateInvariant, expectedBlockedMask, expectedOccupiedMask } from './BackgammonInvariants.js';
import { computeZobristHash, getBorneOffKey, getPointKey, getTurnKey } from './BackgammonZobrist.js';
import type { ActiveMasks, Player, PointCount, PositionList, SingleMove, StateView, TurnMove } from './types.js';

export class BackgammonState implements StateView {
  private readonly cells: Int8Array = new Int8Array(BOARD_SIZE);
  private readonly offCounts: [number, number] = [0, 0];
  private readonly occMasks: [number, number] = [0, 0];
  private readonly blockedMasks: [number, number] = [0, 0];
  private activePlayer: Player;
  private zobrist: bigint = 0n;

  /** Validate all invariants after every mutation */
  readonly debug: boolean;

  constructor(positions: PositionList = DEFAULT_POSITIONS, startPlayer: Player = 0, debug: boolean = false) {
    this.debug = debug;
    this.activePlayer = startPlayer;
    this.placeStonesFromList(positions);
    this.recomputeMasks();
    this.recomputeHash();
    this.check('constructor');
  }

  static fromPositionList(positions: PositionList, startPlayer: Player = 0, debug: boolean = false): BackgammonState {
    return new BackgammonState(positions, startPlayer, debug);
  }

  // ===========================================================================
  // Accessors
  // ===========================================================================

  get board(): ArrayLike<number> {
    return this.cells;
  }

  get turn(): Player {
    return this.activePlayer;
  }

  get opp(): Player {
    return opponentOf(this.activePlayer);
  }

  get hash(): bigint {
    return this.zobrist;
  }

  /** Masks from the active player's point of view */
  get masks(): ActiveMasks {
    const turn = this.activePlayer;
    const opp = this.opp;
    return {
      occupied: this.occMasks[turn],
      blocked: this.blockedMasks[turn],
      hittable: removeFromMask(this.occMasks[opp], this.blockedMasks[turn]),
      unprotected: removeFromMask(this.occMasks[turn], this.blockedMasks[opp]),
    };
  }

  occupiedMask(player: Player): number {
    return this.occMasks[player];
  }

  blockedMask(player: Player): number {
    return this.blockedMasks[player];
  }

  borneOff(player: Player): number {
    return this.offCounts[player];
  }

  barCount(player: Player): number {
    return this.numOfStones(BAR_FIELD[player], player);
  }

  isOnBoard(point: number): boolean {
    return point >= BOARD_START && point <= BOARD_END;
  }

  /** Stones of `player` on `point`; 0 when empty or held by the opponent */
  numOfStones(point: number, player: Player): number {
    const value = this.cells[point] * STONE[player];
    return value > 0 ? value : 0;
  }

  /** Sum of stone count times distance to the bear-off anchor, bar included */
  pipCount(player: Player): number {
    const anchor = BEAR_OFF_ANCHOR[player];
    let pips = 0;
    for (let point = 0; point < BOARD_SIZE; point++) {
      pips += this.numOfStones(point, player) * Math.abs(point - anchor);
    }
    return pips;
  }

  // ===========================================================================
  // Stone Primitives
  // ===========================================================================

  private addStone(point: number, player: Player): void {
    const oldCount = this.numOfStones(point, player);
    this.cells[point] += STONE[player];
    const newCount = this.numOfStones(point, player);

    this.zobrist ^= getPointKey(point, player, oldCount) ^ getPointKey(point, player, newCount);
    this.updateMasksAt(point);
  }

  private removeStone(point: number, player: Player): void {
    const oldCount = this.numOfStones(point, player);
    if (oldCount === 0) {
      throw new BackgammonError(
        BackgammonErrorCode.MOVE_INVALID,
        `Player ${player} has no stone on point ${point}`,
        { point, player }
      );
    }
    this.cells[point] -= STONE[player];
    const newCount = this.numOfStones(point, player);

    this.zobrist ^= getPointKey(point, player, oldCount) ^ getPointKey(point, player, newCount);
    this.updateMasksAt(point);
  }

  private updateMasksAt(point: number): void {
    for (const player of PLAYERS) {
      this.occMasks[player] = this.numOfStones(point, player) > 0
        ? setBit(point, this.occMasks[player])
        : clearBit(point, this.occMasks[player]);

      this.blockedMasks[player] = this.numOfStones(point, opponentOf(player)) >= 2
        ? setBit(point, this.blockedMasks[player])
        : clearBit(point, this.blockedMasks[player]);
    }
  }

  // ===========================================================================
  // Moves
  // ===========================================================================

  moveStone(from: number, to: number, player: Player): void {
    this.removeStone(from, player);
    this.addStone(to, player);
    this.check('moveStone');
  }

  undoStoneMove(from: number, to: number, player: Player): void {
    this.moveStone(to, from, player);
  }

  /** Send the opponent's blot on `to` to its bar, then move onto `to` */
  hitStone(from: number, to: number, player: Player): void {
    const opp = opponentOf(player);
    this.moveStone(to, BAR_FIELD[opp], opp);
    this.moveStone(from, to, player);
  }

  /** Reverse of `hitStone`: the mover leaves first, then the blot returns */
  undoHitStone(from: number, to: number, player: Player): void {
    const opp = opponentOf(player);
    this.undoStoneMove(from, to, player);
    this.undoStoneMove(to, BAR_FIELD[opp], opp);
  }

  bearOff(point: number, player: Player): void {
    const oldCount = this.offCounts[player];
    this.removeStone(point, player);
    this.offCounts[player] = oldCount + 1;

    this.zobrist ^= getBorneOffKey(player, oldCount) ^ getBorneOffKey(player, oldCount + 1);
    this.check('bearOff');
  }

  undoBearOff(point: number, player: Player): void {
    const oldCount = this.offCounts[player];
    if (oldCount === 0) {
      throw new BackgammonError(
        BackgammonErrorCode.MOVE_INVALID,
        `Player ${player} has no borne-off stone to return`,
        { point, player }
      );
    }
    this.offCounts[player] = oldCount - 1;
    this.addStone(point, player);

    this.zobrist ^= getBorneOffKey(player, oldCount) ^ getBorneOffKey(player, oldCount - 1);
    this.check('undoBearOff');
  }

  /**
   * Apply a single move
   * @returns false when no move was given
   */
  applyMove(move: SingleMove | null | undefined): boolean {
    if (!move) return false;

    switch (move.type) {
      case 'NORMAL':
        this.moveStone(move.from, move.to, move.player);
        break;
      case 'HIT':
        this.hitStone(move.from, move.to, move.player);
        break;
      case 'BEAR_OFF':
        this.bearOff(move.from, move.player);
        break;
    }
    return true;
  }

  /** Undo a single move. Only valid for the most recently applied move */
  undoMove(move: SingleMove): void {
    switch (move.type) {
      case 'NORMAL':
        this.undoStoneMove(move.from, move.to, move.player);
        break;
      case 'HIT':
        this.undoHitStone(move.from, move.to, move.player);
        break;
      case 'BEAR_OFF':
        this.undoBearOff(move.from, move.player);
        break;
    }
  }

  applyTurnMove(turnMove: TurnMove): void {
    for (const move of turnMove) {
      this.applyMove(move);
    }
  }

  undoTurnMove(turnMove: TurnMove): void {
    for (let i = turnMove.length - 1; i >= 0; i--) {
      this.undoMove(turnMove[i]);
    }
  }

  // ===========================================================================
  // Turn
  // ===========================================================================

  switchTurn(): void {
    const next = this.opp;
    this.zobrist ^= getTurnKey(this.activePlayer) ^ getTurnKey(next);
    this.activePlayer = next;
  }

  setTurn(player: Player): void {
    if (player !== this.activePlayer) {
      this.switchTurn();
    }
  }

  // ===========================================================================
  // Setup / Copy
  // ===========================================================================

  /** Independent deep copy */
  copy(): BackgammonState {
    const clone = new BackgammonState(DEFAULT_POSITIONS, this.activePlayer, this.debug);
    clone.restoreFrom(this);
    return clone;
  }

  /** Replace board, counters, turn, masks and hash wholesale with `other`'s */
  restoreFrom(other: BackgammonState): void {
    this.cells.set(other.cells);
    this.offCounts[0] = other.offCounts[0];
    this.offCounts[1] = other.offCounts[1];
    this.occMasks[0] = other.occMasks[0];
    this.occMasks[1] = other.occMasks[1];
    this.blockedMasks[0] = other.blockedMasks[0];
    this.blockedMasks[1] = other.blockedMasks[1];
    this.activePlayer = other.activePlayer;
    this.zobrist = other.zobrist;
    this.recomputeMasks();
    this.check('restoreFrom');
  }

  /** Rebuild all masks from the board */
  recomputeMasks(): void {
    for (const player of PLAYERS) {
      this.occMasks[player] = expectedOccupiedMask(this, player);
      this.blockedMasks[player] = expectedBlockedMask(this, player);
    }
  }

  recomputeHash(): void {
    this.zobrist = computeZobristHash(this);
  }

  private placeStonesFromList(positions: PositionList): void {
    this.cells.fill(0);
    this.offCounts[0] = 0;
    this.offCounts[1] = 0;

    for (const player of PLAYERS) {
      let total = 0;
      for (const [point, count] of positions[player]) {
        if (!Number.isInteger(count) || count < 0) {
          throw new InvalidPosition(`Invalid stone count ${count} for player ${player}`, { player, point, count });
        }
        // a player's bear-off anchor is the opponent's bar
        const slot = Number.isInteger(point) && point >= 0 && point < BOARD_SIZE && point !== BEAR_OFF_ANCHOR[player];
        if (point === BORNE_OFF_POINT) {
          this.offCounts[player] += count;
        } else if (slot) {
          if (this.numOfStones(point, opponentOf(player)) > 0) {
            throw new InvalidPosition(`Point ${point} is held by both players`, { player, point });
          }
          this.cells[point] += count * STONE[player];
        } else {
          throw new InvalidPosition(`Invalid point ${point} for player ${player}`, { player, point });
        }
        total += count;
      }

      if (total !== NUM_OF_ALL_STONES) {
        throw new InvalidPosition(
          `Player ${player} has ${total} stones, expected ${NUM_OF_ALL_STONES}`,
          { player, total }
        );
      }
    }
  }

  // ===========================================================================
  // Serialization
  // ===========================================================================

  /** Per player `[point, count]` pairs, bar anchors included, `[-1, n]` for borne off */
  toPositionList(): [PointCount[], PointCount[]] {
    const positions: [PointCount[], PointCount[]] = [[], []];
    for (let point = 0; point < BOARD_SIZE; point++) {
      const stones = this.cells[point];
      if (stones < 0) {
        positions[0].push([point, -stones]);
      } else if (stones > 0) {
        positions[1].push([point, stones]);
      }
    }
    for (const player of PLAYERS) {
      if (this.offCounts[player] > 0) {
        positions[player].push([BORNE_OFF_POINT, this.offCounts[player]]);
      }
    }
    return positions;
  }

  equals(other: BackgammonState): boolean {
    if (this.activePlayer !== other.activePlayer) return false;
    if (this.offCounts[0] !== other.offCounts[0] || this.offCounts[1] !== other.offCounts[1]) return false;
    for (let point = 0; point < BOARD_SIZE; point++) {
      if (this.cells[point] !== other.cells[point]) return false;
    }
    return true;
  }

  // ===========================================================================
  // Debug
  // ===========================================================================

  private check(where: string): void {
    if (this.debug) {
      assertStateInvariant(this, where);
    }
  }
}
