/**
 * Shared test fixtures
 */

import { BackgammonState } from '../src/backgammon/BackgammonState.js';
import type { Player, PointCount } from '../src/backgammon/types.js';

/** Debug-mode state from per-player point lists */
export function position(p0: PointCount[], p1: PointCount[], turn: Player = 0): BackgammonState {
  return new BackgammonState([p0, p1], turn, true);
}

/** The value `fn` throws */
export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}
