/**
 * BackgammonZobrist - 64-bit Zobrist keys for backgammon positions
 *
 * One key per (point, player, stone count), per (player, borne-off count)
 * and per active player. Keys are BigInt and generated from a fixed seed, so
 * hashes are identical across runs.
 *
 * The key for a count of 0 is 0n: an empty point contributes nothing, which
 * keeps the incrementally maintained hash equal to `computeZobristHash`.
 *
 * @module backgammon/BackgammonZobrist
 */

import { BOARD_SIZE, PLAYERS } from './BackgammonBoard.js';
import type { Player, StateView } from './types.js';

// =============================================================================
// Types
// =============================================================================

export interface ZobristKeys {
  /** [point 0..25][player][count 0..15] */
  points: bigint[][][];
  /** [player][borne-off count 0..15] */
  borneOff: bigint[][];
  /** [player] - XORed in for the active player */
  turn: bigint[];
}

/** Highest stone count a single slot can hold */
const MAX_COUNT = 15;

// =============================================================================
// Random Number Generation
// =============================================================================

/** xorshift64* over BigInt, seeded for reproducible keys */
class PRNG {
  private state: bigint;

  constructor(seed: bigint = 0x12345678abcdef01n) {
    this.state = seed;
  }

  next(): bigint {
    let x = this.state;
    x ^= x >> 12n;
    x ^= (x << 25n) & 0xffffffffffffffffn;
    x ^= x >> 27n;
    this.state = x;
    return (x * 0x2545f4914f6cdd1dn) & 0xffffffffffffffffn;
  }
}

// =============================================================================
// Key Generation
// =============================================================================

function generateZobristKeys(): ZobristKeys {
  const rng = new PRNG(0x9e3779b97f4a7c15n);

  const countKeys = (): bigint[] => {
    const keys: bigint[] = [0n];
    for (let count = 1; count <= MAX_COUNT; count++) {
      keys.push(rng.next());
    }
    return keys;
  };

  const points: bigint[][][] = [];
  for (let point = 0; point < BOARD_SIZE; point++) {
    points.push([countKeys(), countKeys()]);
  }

  const borneOff = [countKeys(), countKeys()];
  const turn = [rng.next(), rng.next()];

  return { points, borneOff, turn };
}

const ZOBRIST_KEYS = generateZobristKeys();

// =============================================================================
// Key Access
// =============================================================================

export function getPointKey(point: number, player: Player, count: number): bigint {
  return ZOBRIST_KEYS.points[point][player][count];
}

export function getBorneOffKey(player: Player, count: number): bigint {
  return ZOBRIST_KEYS.borneOff[player][count];
}

export function getTurnKey(player: Player): bigint {
  return ZOBRIST_KEYS.turn[player];
}

// =============================================================================
// Hash Computation
// =============================================================================

/**
 * Full recomputation from the board. Used on load and to verify the
 * incremental hash.
 */
export function computeZobristHash(state: Omit<StateView, 'hash'>): bigint {
  let hash = 0n;

  for (let point = 0; point < BOARD_SIZE; point++) {
    for (const player of PLAYERS) {
      const count = state.numOfStones(point, player);
      if (count > 0) {
        hash ^= getPointKey(point, player, count);
      }
    }
  }

  for (const player of PLAYERS) {
    hash ^= getBorneOffKey(player, state.borneOff(player));
  }

  hash ^= getTurnKey(state.turn);
  return hash;
}

export function verifyHash(state: StateView): boolean {
  return computeZobristHash(state) === state.hash;
}

export function getZobristKeys(): Readonly<ZobristKeys> {
  return ZOBRIST_KEYS;
}
