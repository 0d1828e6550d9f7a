/**
 * Backgammon Module Type Definitions
 *
 * Shared types, configuration interfaces and defaults for the backgammon
 * rules engine, move generator, evaluator and move selector.
 */

// =============================================================================
// Core Types
// =============================================================================

/** Player index. Player 0 moves from 24 down to 1, player 1 from 1 up to 24 */
export type Player = 0 | 1;

/** Atomic move kinds */
export type SingleMoveType = 'NORMAL' | 'HIT' | 'BEAR_OFF';

/** A single atomic move: one stone, one die */
export interface SingleMove {
  readonly player: Player;
  /** Start point (the bar anchor when re-entering) */
  readonly from: number;
  /** Target point (the bear-off anchor when bearing off) */
  readonly to: number;
  readonly type: SingleMoveType;
  readonly die: number;
}

/** Ordered sequence of single moves played with one dice roll (0..4 entries) */
export type TurnMove = readonly SingleMove[];

/** A `[point, count]` pair. Point -1 marks borne-off stones */
export type PointCount = readonly [point: number, count: number];

/** Serialized position: one list of point counts per player */
export type PositionList = readonly [readonly PointCount[], readonly PointCount[]];

// =============================================================================
// Game Results
// =============================================================================

/** How a game ended. DROP is a refused double */
export type GameResultKind = 'WIN' | 'GAMMON' | 'BACKGAMMON' | 'DROP';

/** Game result */
export interface GameResult {
  winner: Player;
  /** Multiplier times cube value */
  points: number;
  cubeValue: number;
  kind: GameResultKind;
}

/** Outcome of a doubling offer */
export interface CubeDecision {
  offered: boolean;
  /** null while nothing was offered */
  accepted: boolean | null;
  /** Set when a refused double ends the game */
  result: GameResult | null;
}

// =============================================================================
// State View
// =============================================================================

/**
 * Read-only view of a game state. Invariant checks and the Zobrist
 * recomputation work against this so they do not depend on the state class.
 */
export interface StateView {
  /** Signed stone counts, index 0..25. Negative = player 0, positive = player 1 */
  readonly board: ArrayLike<number>;
  readonly turn: Player;
  readonly hash: bigint;
  borneOff(player: Player): number;
  occupiedMask(player: Player): number;
  blockedMask(player: Player): number;
  numOfStones(point: number, player: Player): number;
}

/** Masks of the active player */
export interface ActiveMasks {
  /** Points holding at least one own stone */
  occupied: number;
  /** Points the opponent holds with two or more stones */
  blocked: number;
  /** Opponent blots the active player may hit */
  hittable: number;
  /** Own stones not protected by a made point */
  unprotected: number;
}

// =============================================================================
// Evaluation Types
// =============================================================================

/** Per-term evaluation, each already weighted and from the evaluated player's view */
export interface EvaluationBreakdown {
  /** Terminal bonus or penalty (0 while the game runs) */
  terminal: number;
  bearOff: number;
  home: number;
  blots: number;
  blockades: number;
  pip: number;
  /** Sum of all terms before squashing */
  raw: number;
  /** Final squashed score in (-0.5, 0.5) */
  total: number;
}

// =============================================================================
// Search Types
// =============================================================================

/** Turn-move generation statistics for the last generation call */
export interface GeneratorStats {
  /** DFS nodes visited */
  nodes: number;
  /** Leaves reached (including empty paths) */
  leaves: number;
  /** Sub-problems skipped by the transposition table */
  ttHits: number;
  /** Entries held by the transposition table before it was cleared */
  ttSize: number;
}

/** Move selection statistics for the last `selectMove` call */
export interface SelectionStats {
  candidates: number;
  iterations: number;
  rollouts: number;
  /** Simulated plies across all rollouts */
  plies: number;
  time: number;
}

/** Per-candidate search statistics */
export interface CandidateStats {
  move: TurnMove;
  value: number;
  visits: number;
}

// =============================================================================
// Engine Types
// =============================================================================

/** One played turn */
export interface TurnRecord {
  player: Player;
  dice: number[];
  /** null when no legal move existed */
  move: TurnMove | null;
}

/** A finished (or capped) game */
export interface GameRecord {
  /** null when the turn cap was reached first */
  result: GameResult | null;
  turns: number;
  history: TurnRecord[];
  cubeValue: number;
}

// =============================================================================
// Configuration Types
// =============================================================================

/** Evaluator weights */
export interface EvaluatorConfig {
  weightBearOff: number;
  weightHome: number;
  weightBlots: number;
  weightBlockades: number;
  weightPip: number;
  /** Divisor applied before tanh */
  normalization: number;
}

/** Move selector configuration */
export interface AIConfig {
  /** UCB1 iterations per selection */
  iterations: number;
  minRolloutDepth: number;
  maxRolloutDepth: number;
  /** Visit count at which rollout depth reaches its maximum */
  depthScale: number;
  /** UCB1 exploration constant */
  exploration: number;
  /** Seed for the rollout RNG. Omit for a time-based seed */
  seed?: number;
}

/** Undo manager capacities */
export interface UndoConfig {
  maxMoves: number;
  maxSnapshots: number;
}

/** Game engine configuration */
export interface EngineConfig {
  enableCube: boolean;
  /** Cap on played turns. 0 = no cap */
  maxTurns: number;
  /** Roll one die each to decide who starts */
  startRoll: boolean;
}

// =============================================================================
// Defaults
// =============================================================================

/** Default evaluator weights */
export const DEFAULT_EVALUATOR_CONFIG: EvaluatorConfig = {
  weightBearOff: 15,
  weightHome: 2,
  weightBlots: 3,
  weightBlockades: 1,
  weightPip: 0.1,
  normalization: 225,
};

/** Default move selector configuration */
export const DEFAULT_AI_CONFIG: AIConfig = {
  iterations: 120,
  minRolloutDepth: 2,
  maxRolloutDepth: 7,
  depthScale: 10,
  exploration: 1.0,
};

/** Default undo capacities */
export const DEFAULT_UNDO_CONFIG: UndoConfig = {
  maxMoves: 100,
  maxSnapshots: 10,
};

/** Default engine configuration */
export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  enableCube: false,
  maxTurns: 0,
  startRoll: true,
};

/** Terminal bonus per result kind */
export const GAME_OVER_SCORE: Record<Exclude<GameResultKind, 'DROP'>, number> = {
  WIN: 0.6,
  GAMMON: 0.8,
  BACKGAMMON: 1.0,
};
