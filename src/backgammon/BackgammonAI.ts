/**
 * BackgammonAI - UCB1 move selection with random rollouts
 *
 * Every candidate turn move starts with its static evaluation as one visit.
 * Each iteration picks the candidate with the highest UCB1 score, plays it,
 * lets both sides play random legal moves for a few plies, evaluates the
 * result for the mover and takes everything back. Rollouts deepen as a
 * candidate collects visits.
 *
 * The root state is mutated in place and checked against its hash after
 * every iteration.
 */

import { parseAIConfig } from './BackgammonConfig.js';
import { BackgammonError, BackgammonErrorCode, InvariantViolation } from './BackgammonErrors.js';
import { BackgammonEvaluator } from './BackgammonEvaluator.js';
import { createLogger } from './BackgammonLogger.js';
import { BackgammonMoveGenerator } from './BackgammonMoveGenerator.js';
import { formatTurnMove } from './BackgammonMoves.js';
import { createDefaultRng, createSeededRng, Rng } from './BackgammonRandom.js';
import { gameOver } from './BackgammonRules.js';
import type { BackgammonState } from './BackgammonState.js';
import {
  AIConfig,
  CandidateStats,
  Player,
  SelectionStats,
  SingleMove,
  TurnMove,
} from './types.js';

const log = createLogger('AI');

export interface BackgammonAIOptions {
  evaluator?: BackgammonEvaluator;
  /** Overrides `config.seed` */
  rng?: Rng;
}

/** UCB1 score of a candidate */
export function ucb1(value: number, visits: number, totalVisits: number, exploration: number = 1.0): number {
  return value / visits + exploration * Math.sqrt(Math.log(totalVisits + 1) / visits);
}

// =============================================================================
// BackgammonAI Class
// =============================================================================

export class BackgammonAI {
  private config: AIConfig;
  private evaluator: BackgammonEvaluator;
  private generator: BackgammonMoveGenerator;
  private rng: Rng;

  private stats: SelectionStats = this.initStats();
  private candidates: CandidateStats[] = [];

  constructor(config?: Partial<AIConfig>, options: BackgammonAIOptions = {}) {
    this.config = parseAIConfig(config);
    this.evaluator = options.evaluator ?? new BackgammonEvaluator();
    this.generator = new BackgammonMoveGenerator();
    this.rng = options.rng ?? this.createRng();
  }

  private createRng(): Rng {
    return this.config.seed !== undefined ? createSeededRng(this.config.seed) : createDefaultRng();
  }

  /**
   * Pick the turn move for the active player.
   * The state is unchanged on return.
   */
  selectMove(state: BackgammonState, legalMoves: readonly TurnMove[]): TurnMove {
    if (legalMoves.length === 0) {
      throw new BackgammonError(BackgammonErrorCode.SEARCH_NO_MOVES, 'No legal moves to select from');
    }

    const startTime = Date.now();
    this.stats = this.initStats();
    this.stats.candidates = legalMoves.length;

    if (legalMoves.length === 1) {
      this.candidates = [{ move: legalMoves[0], value: 0, visits: 0 }];
      return legalMoves[0];
    }

    const player = state.turn;
    const rootHash = state.hash;
    const { iterations, minRolloutDepth, maxRolloutDepth, depthScale, exploration } = this.config;

    this.candidates = legalMoves.map((move) => {
      state.applyTurnMove(move);
      const value = this.evaluator.evaluate(state, player);
      state.undoTurnMove(move);
      return { move, value, visits: 1 };
    });

    for (let i = 0; i < iterations; i++) {
      const totalVisits = this.candidates.reduce((sum, c) => sum + c.visits, 0);

      let best = this.candidates[0];
      let bestScore = -Infinity;
      for (const candidate of this.candidates) {
        const score = ucb1(candidate.value, candidate.visits, totalVisits, exploration);
        if (score > bestScore) {
          bestScore = score;
          best = candidate;
        }
      }

      const depth = Math.min(
        maxRolloutDepth,
        minRolloutDepth + Math.floor((best.visits / depthScale) * (maxRolloutDepth - minRolloutDepth))
      );

      state.applyTurnMove(best.move);
      state.switchTurn();
      const reward = this.rollout(state, depth, player);
      state.undoTurnMove(best.move);
      state.setTurn(player);

      best.value += reward;
      best.visits++;
      this.stats.iterations++;

      if (state.hash !== rootHash) {
        throw new InvariantViolation(
          BackgammonErrorCode.SEARCH_ROOT_MODIFIED,
          'Root state was modified during move selection',
          { iteration: i, expected: rootHash.toString(16), actual: state.hash.toString(16) }
        );
      }
    }

    let chosen = this.candidates[0];
    for (const candidate of this.candidates) {
      if (candidate.value / candidate.visits > chosen.value / chosen.visits) {
        chosen = candidate;
      }
    }

    this.stats.time = Date.now() - startTime;
    log.debug(
      `Selected ${formatTurnMove(chosen.move)}`,
      `avg=${(chosen.value / chosen.visits).toFixed(4)} visits=${chosen.visits}`,
      `rollouts=${this.stats.rollouts} plies=${this.stats.plies} time=${this.stats.time}ms`
    );
    return chosen.move;
  }

  /**
   * Play random legal turns for up to `depth` plies starting with the side to
   * move, evaluate for `player`, then take every move back.
   */
  private rollout(state: BackgammonState, depth: number, player: Player): number {
    this.stats.rollouts++;
    const applied: SingleMove[] = [];

    for (let ply = 0; ply < depth; ply++) {
      if (gameOver(state, 1)) break;

      const dice = [this.rng.rollDie(), this.rng.rollDie()];
      const moves = this.generator.generateLegalMoves(state, dice);
      if (moves.length > 0) {
        for (const move of this.rng.choice(moves)) {
          state.applyMove(move);
          applied.push(move);
        }
      }
      state.switchTurn();
      this.stats.plies++;
    }

    const reward = this.evaluator.evaluate(state, player);

    for (let i = applied.length - 1; i >= 0; i--) {
      state.undoMove(applied[i]);
    }
    return reward;
  }

  private initStats(): SelectionStats {
    return {
      candidates: 0,
      iterations: 0,
      rollouts: 0,
      plies: 0,
      time: 0,
    };
  }

  /**
   * Statistics of the last selection
   */
  getStats(): SelectionStats {
    return { ...this.stats };
  }

  /**
   * Per-candidate totals of the last selection, in legal move order
   */
  getCandidateStats(): CandidateStats[] {
    return this.candidates.map((c) => ({ ...c }));
  }

  getEvaluator(): BackgammonEvaluator {
    return this.evaluator;
  }

  setConfig(config: Partial<AIConfig>): void {
    const reseed = config.seed !== undefined && config.seed !== this.config.seed;
    this.config = parseAIConfig({ ...this.config, ...config });
    if (reseed) {
      this.rng = this.createRng();
    }
  }

  getConfig(): AIConfig {
    return { ...this.config };
  }

  clearCache(): void {
    this.evaluator.clearCache();
  }
}

/**
 * Create a move selector
 */
export function createBackgammonAI(config?: Partial<AIConfig>, options?: BackgammonAIOptions): BackgammonAI {
  return new BackgammonAI(config, options);
}
