/**
 * BackgammonEvaluator - Heuristic position evaluation
 *
 * Weighted sum of bear-off progress, home board presence, blots, made points
 * and pip count, squashed with tanh into (-0.5, 0.5). A finished game adds
 * its terminal bonus before squashing. Every term is symmetric: swapping the
 * players negates the score.
 *
 * Scores are memoised per player by Zobrist hash for the evaluator's lifetime.
 */

import { countBits, indicesFromBits, removeFromMask } from './BackgammonBits.js';
import { FULL_BOARD_MASK, HOME_MASK, opponentOf } from './BackgammonBoard.js';
import { parseEvaluatorConfig } from './BackgammonConfig.js';
import { gameOver } from './BackgammonRules.js';
import type { BackgammonState } from './BackgammonState.js';
import {
  EvaluationBreakdown,
  EvaluatorConfig,
  GAME_OVER_SCORE,
  Player,
  StateView,
} from './types.js';

/** Squashed scores stay within +-SCORE_AMPLITUDE */
const SCORE_AMPLITUDE = 0.5;

// =============================================================================
// Helpers
// =============================================================================

/** Points 1..24 holding exactly one stone of `player` */
export function countBlots(state: StateView, player: Player): number {
  const occupied = state.occupiedMask(player) & FULL_BOARD_MASK;
  return countBits(removeFromMask(occupied, state.blockedMask(opponentOf(player))));
}

/** Stones of `player` in their home board */
export function countHomeStones(state: StateView, player: Player): number {
  let stones = 0;
  for (const point of indicesFromBits(state.occupiedMask(player) & HOME_MASK[player])) {
    stones += state.numOfStones(point, player);
  }
  return stones;
}

/** Points 1..24 `player` holds with two or more stones */
export function countBlockades(state: StateView, player: Player): number {
  return countBits(state.blockedMask(opponentOf(player)) & FULL_BOARD_MASK);
}

// =============================================================================
// BackgammonEvaluator Class
// =============================================================================

export class BackgammonEvaluator {
  private config: EvaluatorConfig;
  private readonly cache: [Map<bigint, number>, Map<bigint, number>] = [new Map(), new Map()];

  constructor(config: Partial<EvaluatorConfig> = {}) {
    this.config = parseEvaluatorConfig(config);
  }

  /**
   * Evaluate a position
   * @returns score in (-0.5, 0.5), positive when `player` stands better
   */
  evaluate(state: BackgammonState, player: Player): number {
    const cached = this.cache[player].get(state.hash);
    if (cached !== undefined) {
      return cached;
    }

    const score = this.getEvaluationBreakdown(state, player).total;
    this.cache[player].set(state.hash, score);
    return score;
  }

  /**
   * Every weighted term for `player`. Not cached.
   */
  getEvaluationBreakdown(state: BackgammonState, player: Player): EvaluationBreakdown {
    const opp = opponentOf(player);
    const { weightBearOff, weightHome, weightBlots, weightBlockades, weightPip, normalization } = this.config;

    let terminal = 0;
    const result = gameOver(state, 1);
    if (result && result.kind !== 'DROP') {
      const bonus = GAME_OVER_SCORE[result.kind];
      terminal = result.winner === player ? bonus : -bonus;
    }

    const bearOff = weightBearOff * (state.borneOff(player) - state.borneOff(opp));
    const home = weightHome * (countHomeStones(state, player) - countHomeStones(state, opp));
    const blots = -weightBlots * countBlots(state, player) + weightBlots * countBlots(state, opp);
    const blockades = weightBlockades * (countBlockades(state, player) - countBlockades(state, opp));
    const pip = -weightPip * state.pipCount(player) + weightPip * state.pipCount(opp);

    const raw = terminal + bearOff + home + blots + blockades + pip;
    const total = SCORE_AMPLITUDE * Math.tanh(raw / normalization);

    return { terminal, bearOff, home, blots, blockades, pip, raw, total };
  }

  // ===========================================================================
  // Cube Heuristics
  // ===========================================================================

  /** Offer once 10+ stones are home or the bear-off has started */
  offerDoubleHeuristic(state: StateView, player: Player): boolean {
    return countHomeStones(state, player) >= 10 || state.borneOff(player) > 0;
  }

  /** Refuse when the opponent is well into a bear-off */
  acceptDoubleHeuristic(state: StateView, player: Player): boolean {
    const opp = opponentOf(player);
    return !(state.borneOff(opp) >= 3 && countHomeStones(state, opp) >= 12);
  }

  // ===========================================================================
  // Cache
  // ===========================================================================

  clearCache(): void {
    this.cache[0].clear();
    this.cache[1].clear();
  }

  get cacheSize(): number {
    return this.cache[0].size + this.cache[1].size;
  }

  getConfig(): EvaluatorConfig {
    return { ...this.config };
  }
}
