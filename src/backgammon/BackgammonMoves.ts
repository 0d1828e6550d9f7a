/**
 * BackgammonMoves - Immutable move records
 *
 * Single moves and turn moves are frozen plain values compared by value.
 * `singleMoveKey` / `turnMoveKey` give stable string keys for maps and sets.
 *
 * @module backgammon/BackgammonMoves
 */

import type { Player, SingleMove, SingleMoveType, TurnMove } from './types.js';

export function createSingleMove(
  player: Player,
  from: number,
  to: number,
  type: SingleMoveType,
  die: number
): SingleMove {
  return Object.freeze({ player, from, to, type, die });
}

/** Copy a sequence of single moves into a frozen turn move */
export function createTurnMove(moves: Iterable<SingleMove>): TurnMove {
  return Object.freeze([...moves]);
}

export function singleMovesEqual(a: SingleMove, b: SingleMove): boolean {
  return (
    a.player === b.player &&
    a.from === b.from &&
    a.to === b.to &&
    a.type === b.type &&
    a.die === b.die
  );
}

export function turnMovesEqual(a: TurnMove, b: TurnMove): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (!singleMovesEqual(a[i], b[i])) return false;
  }
  return true;
}

export function singleMoveKey(move: SingleMove): string {
  return `${move.player}:${move.from}:${move.to}:${move.type}:${move.die}`;
}

export function turnMoveKey(move: TurnMove): string {
  return move.map(singleMoveKey).join('|');
}

/** e.g. `13 >  8 (5, NORMAL)` */
export function formatSingleMove(move: SingleMove): string {
  return `${String(move.from).padStart(2)} > ${String(move.to).padStart(2)} (${move.die}, ${move.type})`;
}

export function formatTurnMove(move: TurnMove): string {
  return move.map(formatSingleMove).join(' | ');
}

/** Dice values consumed by a turn move, in play order */
export function diceUsed(move: TurnMove): number[] {
  return move.map((m) => m.die);
}
