/**
 * BackgammonEngine - Drives a game between two players
 *
 * Owns the authoritative state, the dice, the doubling cube and the undo
 * history. Players only ever see copies of the state.
 */

import { opponentOf } from './BackgammonBoard.js';
import { parseEngineConfig } from './BackgammonConfig.js';
import { BackgammonError, BackgammonErrorCode } from './BackgammonErrors.js';
import { createLogger } from './BackgammonLogger.js';
import { BackgammonMoveGenerator } from './BackgammonMoveGenerator.js';
import { formatTurnMove, turnMoveKey } from './BackgammonMoves.js';
import type { BackgammonPlayer } from './BackgammonPlayers.js';
import { createDefaultRng, Rng } from './BackgammonRandom.js';
import { gameOver, processDice } from './BackgammonRules.js';
import { BackgammonState } from './BackgammonState.js';
import { BackgammonUndo } from './BackgammonUndo.js';
import {
  CubeDecision,
  EngineConfig,
  GameRecord,
  GameResult,
  Player,
  SingleMove,
  TurnMove,
  TurnRecord,
} from './types.js';

const log = createLogger('Engine');

export interface BackgammonEngineOptions {
  /** Starting position; the standard layout when omitted */
  state?: BackgammonState;
  rng?: Rng;
  config?: Partial<EngineConfig>;
  undo?: BackgammonUndo;
}

// =============================================================================
// BackgammonEngine Class
// =============================================================================

export class BackgammonEngine {
  readonly state: BackgammonState;
  readonly players: readonly [BackgammonPlayer, BackgammonPlayer];
  readonly undo: BackgammonUndo;

  private config: EngineConfig;
  private rng: Rng;
  private generator = new BackgammonMoveGenerator();

  private _dice: number[] = [];
  private _cubeValue = 1;
  /** null while the cube is in the middle */
  private _cubeOwner: Player | null = null;
  private history: TurnRecord[] = [];

  constructor(player0: BackgammonPlayer, player1: BackgammonPlayer, options: BackgammonEngineOptions = {}) {
    this.players = [player0, player1];
    this.state = options.state ?? new BackgammonState();
    this.rng = options.rng ?? createDefaultRng();
    this.config = parseEngineConfig(options.config);
    this.undo = options.undo ?? new BackgammonUndo();
  }

  // ===========================================================================
  // Accessors
  // ===========================================================================

  get turn(): Player {
    return this.state.turn;
  }

  get currentPlayer(): BackgammonPlayer {
    return this.players[this.state.turn];
  }

  /** Dice of the current turn, doubles already expanded */
  get dice(): readonly number[] {
    return this._dice;
  }

  get cubeValue(): number {
    return this._cubeValue;
  }

  get cubeOwner(): Player | null {
    return this._cubeOwner;
  }

  getHistory(): TurnRecord[] {
    return [...this.history];
  }

  // ===========================================================================
  // Dice
  // ===========================================================================

  /**
   * One die per player, doubles re-rolled. The higher die moves first.
   * @returns [die of player 0, die of player 1]
   */
  rollStartDice(): [number, number] {
    let d0 = this.rng.rollDie();
    let d1 = this.rng.rollDie();
    while (d0 === d1) {
      d0 = this.rng.rollDie();
      d1 = this.rng.rollDie();
    }
    this.state.setTurn(d0 > d1 ? 0 : 1);
    return [d0, d1];
  }

  rollDice(): number[] {
    this._dice = processDice([this.rng.rollDie(), this.rng.rollDie()]);
    return [...this._dice];
  }

  /** Legal turn moves for the current dice */
  legalMoves(): TurnMove[] {
    return this.generator.generateLegalMoves(this.state, this._dice);
  }

  gameResult(): GameResult | null {
    return gameOver(this.state, this._cubeValue);
  }

  // ===========================================================================
  // Doubling Cube
  // ===========================================================================

  /**
   * Let the active player double if they may hold the cube. A refused double
   * ends the game for the current cube value.
   */
  offerDouble(): CubeDecision {
    const turn = this.state.turn;
    if (this._cubeOwner !== null && this._cubeOwner !== turn) {
      return { offered: false, accepted: null, result: null };
    }

    const player = this.players[turn];
    const opponent = this.players[opponentOf(turn)];

    if (!player.offerDouble(this._cubeValue, this.state.copy())) {
      return { offered: false, accepted: null, result: null };
    }

    if (!opponent.acceptDouble(this._cubeValue, this.state.copy())) {
      log.debug(`Player ${turn} doubled, player ${opponentOf(turn)} dropped at cube ${this._cubeValue}`);
      return {
        offered: true,
        accepted: false,
        result: { winner: turn, points: this._cubeValue, cubeValue: this._cubeValue, kind: 'DROP' },
      };
    }

    this._cubeValue *= 2;
    this._cubeOwner = opponentOf(turn);
    log.debug(`Player ${turn} doubled, cube now ${this._cubeValue}`);
    return { offered: true, accepted: true, result: null };
  }

  // ===========================================================================
  // Turns
  // ===========================================================================

  /**
   * Roll, let the active player choose, apply and pass the turn.
   */
  playTurn(): TurnRecord {
    const player = this.state.turn;
    const dice = this.rollDice();
    const moves = this.legalMoves();

    let chosen: TurnMove | null = null;
    if (moves.length > 0) {
      chosen = this.currentPlayer.selectMove(moves, this.state.copy(), dice);
      if (chosen === null) {
        throw new BackgammonError(
          BackgammonErrorCode.MOVE_INVALID,
          `${this.currentPlayer.name} passed with ${moves.length} legal moves`,
          { player, dice }
        );
      }
      const key = turnMoveKey(chosen);
      if (!moves.some((m) => turnMoveKey(m) === key)) {
        throw new BackgammonError(
          BackgammonErrorCode.MOVE_INVALID,
          `${this.currentPlayer.name} chose an illegal move: ${formatTurnMove(chosen)}`,
          { player, dice }
        );
      }

      for (const move of chosen) {
        this.state.applyMove(move);
        this.undo.recordMove(move);
      }
    }

    log.debug(`Player ${player} [${dice.join(', ')}]: ${chosen ? formatTurnMove(chosen) : 'no move'}`);

    const record: TurnRecord = { player, dice, move: chosen };
    this.history.push(record);
    this.state.switchTurn();
    return record;
  }

  /**
   * Play until the game ends or the turn cap is reached.
   * @param maxTurns - overrides `config.maxTurns`; 0 means no cap
   */
  play(maxTurns: number = this.config.maxTurns): GameRecord {
    if (this.config.startRoll) {
      this.rollStartDice();
    }
    this.undo.recordSnapshot(this.state);

    let result = this.gameResult();
    let turns = 0;

    while (!result) {
      if (maxTurns > 0 && turns >= maxTurns) break;

      if (this.config.enableCube) {
        const decision = this.offerDouble();
        if (decision.result) {
          result = decision.result;
          break;
        }
      }

      this.playTurn();
      turns++;
      result = this.gameResult();
    }

    if (result) {
      log.debug(`Player ${result.winner} wins ${result.points} (${result.kind}) after ${turns} turns`);
    }

    return {
      result,
      turns,
      history: this.getHistory(),
      cubeValue: this._cubeValue,
    };
  }

  // ===========================================================================
  // Undo
  // ===========================================================================

  /**
   * Take back the newest single move, or restore the newest snapshot.
   * The turn is not changed.
   */
  undoLastMove(): SingleMove | null {
    return this.undo.undoLastMove(this.state);
  }
}

/**
 * Create a game engine
 */
export function createBackgammonEngine(
  player0: BackgammonPlayer,
  player1: BackgammonPlayer,
  options?: BackgammonEngineOptions
): BackgammonEngine {
  return new BackgammonEngine(player0, player1, options);
}
