/**
 * Backgammon Module
 *
 * Backgammon core with:
 * - Bitmask board state with incremental Zobrist hashing
 * - Rule engine and legal turn-move generation
 * - Hybrid undo history
 * - Heuristic evaluation and UCB1 rollout move selection
 * - Game engine with doubling cube
 *
 * @module backgammon
 */

// State
export { BackgammonState } from './BackgammonState.js';
export {
  computeZobristHash,
  verifyHash,
  getZobristKeys,
} from './BackgammonZobrist.js';
export {
  assertStateInvariant,
  assertStoneInvariant,
  assertMaskInvariant,
  assertHashInvariant,
} from './BackgammonInvariants.js';

// Board and bit utilities
export * from './BackgammonBoard.js';
export {
  bitsFromIndices,
  indicesFromBits,
  setBit,
  clearBit,
  isBitSet,
  setAllBits,
  shiftMask,
  removeFromMask,
  countBits,
  maskIntersectionCount,
} from './BackgammonBits.js';

// Moves
export {
  createSingleMove,
  createTurnMove,
  singleMovesEqual,
  turnMovesEqual,
  singleMoveKey,
  turnMoveKey,
  formatSingleMove,
  formatTurnMove,
  diceUsed,
} from './BackgammonMoves.js';

// Rules
export {
  allowedStartPointsMask,
  bearingOffAllowed,
  bearOffTarget,
  hittableTarget,
  generateLegalMask,
  processDice,
  filterTurnMoves,
  gameOver,
  debugRule,
  RULES,
} from './BackgammonRules.js';
export type { RuleId, RuleArgs, RuleResults, RuleEntry } from './BackgammonRules.js';

// Move generation
export {
  BackgammonMoveGenerator,
  generateLegalMoves,
  MoveTree,
} from './BackgammonMoveGenerator.js';
export type { MoveTreeNode, MoveTreeStep } from './BackgammonMoveGenerator.js';

// Undo
export { BackgammonUndo, BoundedBuffer } from './BackgammonUndo.js';

// Evaluation and search
export {
  BackgammonEvaluator,
  countBlots,
  countHomeStones,
  countBlockades,
} from './BackgammonEvaluator.js';
export { BackgammonAI, createBackgammonAI, ucb1 } from './BackgammonAI.js';
export type { BackgammonAIOptions } from './BackgammonAI.js';

// Players and engine
export { RandomPlayer, ComputerPlayer } from './BackgammonPlayers.js';
export type { BackgammonPlayer } from './BackgammonPlayers.js';
export { BackgammonEngine, createBackgammonEngine } from './BackgammonEngine.js';
export type { BackgammonEngineOptions } from './BackgammonEngine.js';

// Randomness
export { SeededRandom, createSeededRng, createDefaultRng } from './BackgammonRandom.js';
export type { Rng } from './BackgammonRandom.js';

// Configuration
export {
  EvaluatorConfigSchema,
  AIConfigSchema,
  UndoConfigSchema,
  EngineConfigSchema,
  SelfPlayConfigSchema,
  parseEvaluatorConfig,
  parseAIConfig,
  parseUndoConfig,
  parseEngineConfig,
  parseSelfPlayConfig,
} from './BackgammonConfig.js';
export type { SelfPlayConfig } from './BackgammonConfig.js';

// Errors and logging
export {
  BackgammonError,
  BackgammonErrorCode,
  InvariantViolation,
  InvalidPosition,
  EmptyUndo,
  isBackgammonError,
} from './BackgammonErrors.js';
export type { BackgammonErrorJSON } from './BackgammonErrors.js';
export { createLogger, setDebugLogging, setLoggingEnabled, isDebugEnabled } from './BackgammonLogger.js';
export type { BackgammonLogger } from './BackgammonLogger.js';

// Types
export type {
  Player,
  SingleMoveType,
  SingleMove,
  TurnMove,
  PointCount,
  PositionList,
  GameResultKind,
  GameResult,
  CubeDecision,
  StateView,
  ActiveMasks,
  EvaluationBreakdown,
  GeneratorStats,
  SelectionStats,
  CandidateStats,
  TurnRecord,
  GameRecord,
  EvaluatorConfig,
  AIConfig,
  UndoConfig,
  EngineConfig,
} from './types.js';

// Constants
export {
  DEFAULT_EVALUATOR_CONFIG,
  DEFAULT_AI_CONFIG,
  DEFAULT_UNDO_CONFIG,
  DEFAULT_ENGINE_CONFIG,
  GAME_OVER_SCORE,
} from './types.js';
