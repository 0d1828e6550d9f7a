/**
 * BackgammonErrors - Structured error types for the backgammon core
 *
 * Invariant violations and invalid construction are fatal for the operation
 * that raised them. Having no legal move is not an error: generators return
 * empty lists for that.
 *
 * @module backgammon/BackgammonErrors
 */

// =============================================================================
// Error Codes
// =============================================================================

export enum BackgammonErrorCode {
  /** Stones on board + bar + borne off is not 15 */
  STATE_STONE_COUNT = 'STATE_STONE_COUNT',
  /** Occupancy or blocked mask does not match the board */
  STATE_MASK_DESYNC = 'STATE_MASK_DESYNC',
  /** Incremental Zobrist hash does not match a recomputation */
  STATE_HASH_DESYNC = 'STATE_HASH_DESYNC',
  /** Starting position rejected at construction */
  STATE_INVALID_POSITION = 'STATE_INVALID_POSITION',

  UNDO_EMPTY = 'UNDO_EMPTY',
  UNDO_NO_SNAPSHOT = 'UNDO_NO_SNAPSHOT',

  /** Root position differs after a search iteration */
  SEARCH_ROOT_MODIFIED = 'SEARCH_ROOT_MODIFIED',
  SEARCH_NO_MOVES = 'SEARCH_NO_MOVES',

  /** A move cannot be applied to the current board */
  MOVE_INVALID = 'MOVE_INVALID',

  CONFIG_INVALID = 'CONFIG_INVALID',
}

// =============================================================================
// Base Error Class
// =============================================================================

export class BackgammonError extends Error {
  readonly code: BackgammonErrorCode;
  readonly context: Record<string, unknown>;

  constructor(code: BackgammonErrorCode, message: string, context: Record<string, unknown> = {}) {
    super(message);
    this.name = 'BackgammonError';
    this.code = code;
    this.context = context;
    Object.setPrototypeOf(this, BackgammonError.prototype);
  }

  toJSON(): BackgammonErrorJSON {
    return {
      error: true,
      type: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

export interface BackgammonErrorJSON {
  error: true;
  type: string;
  code: string;
  message: string;
  context: Record<string, unknown>;
}

// =============================================================================
// Specific Error Classes
// =============================================================================

/**
 * State corruption detected by debug validation or by the search's root
 * hash check. Never recoverable: the state must be discarded.
 */
export class InvariantViolation extends BackgammonError {
  constructor(code: BackgammonErrorCode, message: string, context: Record<string, unknown> = {}) {
    super(code, message, context);
    this.name = 'InvariantViolation';
    Object.setPrototypeOf(this, InvariantViolation.prototype);
  }
}

/** A supplied position with the wrong stone totals or overlapping points */
export class InvalidPosition extends BackgammonError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(BackgammonErrorCode.STATE_INVALID_POSITION, message, context);
    this.name = 'InvalidPosition';
    Object.setPrototypeOf(this, InvalidPosition.prototype);
  }
}

export class EmptyUndo extends BackgammonError {
  constructor(
    message: string,
    code: BackgammonErrorCode = BackgammonErrorCode.UNDO_EMPTY,
    context: Record<string, unknown> = {}
  ) {
    super(code, message, context);
    this.name = 'EmptyUndo';
    Object.setPrototypeOf(this, EmptyUndo.prototype);
  }
}

export function isBackgammonError(err: unknown): err is BackgammonError {
  return err instanceof BackgammonError;
}
