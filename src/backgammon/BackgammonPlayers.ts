/**
 * BackgammonPlayers - Move and cube decision makers driven by the engine
 */

import { BackgammonAI } from './BackgammonAI.js';
import type { BackgammonEvaluator } from './BackgammonEvaluator.js';
import { createDefaultRng, Rng } from './BackgammonRandom.js';
import type { BackgammonState } from './BackgammonState.js';
import { AIConfig, Player, TurnMove } from './types.js';

export interface BackgammonPlayer {
  readonly id: Player;
  readonly name: string;
  /**
   * Choose one of `moves` for the position in `state`.
   * @returns null when `moves` is empty
   */
  selectMove(moves: readonly TurnMove[], state: BackgammonState, dice: readonly number[]): TurnMove | null;
  offerDouble(cubeValue: number, state: BackgammonState): boolean;
  acceptDouble(cubeValue: number, state: BackgammonState): boolean;
}

// =============================================================================
// Random Player
// =============================================================================

/**
 * Uniformly random moves. Cube decisions use the evaluator's heuristics
 * when one is given, otherwise it never doubles and always takes.
 */
export class RandomPlayer implements BackgammonPlayer {
  readonly name: string;

  constructor(
    readonly id: Player,
    private readonly rng: Rng = createDefaultRng(),
    private readonly evaluator: BackgammonEvaluator | null = null
  ) {
    this.name = `Random player ${id}`;
  }

  selectMove(moves: readonly TurnMove[]): TurnMove | null {
    if (moves.length === 0) return null;
    return this.rng.choice(moves);
  }

  offerDouble(_cubeValue: number, state: BackgammonState): boolean {
    return this.evaluator ? this.evaluator.offerDoubleHeuristic(state, this.id) : false;
  }

  acceptDouble(_cubeValue: number, state: BackgammonState): boolean {
    return this.evaluator ? this.evaluator.acceptDoubleHeuristic(state, this.id) : true;
  }
}

// =============================================================================
// Computer Player
// =============================================================================

export class ComputerPlayer implements BackgammonPlayer {
  readonly name: string;
  readonly ai: BackgammonAI;

  constructor(readonly id: Player, config?: Partial<AIConfig>, ai?: BackgammonAI) {
    this.name = `Computer player ${id}`;
    this.ai = ai ?? new BackgammonAI(config);
  }

  selectMove(moves: readonly TurnMove[], state: BackgammonState): TurnMove | null {
    if (moves.length === 0) return null;
    return this.ai.selectMove(state, moves);
  }

  offerDouble(_cubeValue: number, state: BackgammonState): boolean {
    return this.ai.getEvaluator().offerDoubleHeuristic(state, this.id);
  }

  acceptDouble(_cubeValue: number, state: BackgammonState): boolean {
    return this.ai.getEvaluator().acceptDoubleHeuristic(state, this.id);
  }
}
