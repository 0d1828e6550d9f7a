/**
 * BackgammonUndo - Hybrid undo history
 *
 * Keeps a bounded history of single moves for step-wise undo, and a bounded
 * stack of full state copies as a fallback once the move history is empty.
 * Both drop their oldest entry when full.
 */

import { parseUndoConfig } from './BackgammonConfig.js';
import { BackgammonError, BackgammonErrorCode, EmptyUndo } from './BackgammonErrors.js';
import type { BackgammonState } from './BackgammonState.js';
import type { SingleMove, UndoConfig } from './types.js';

// =============================================================================
// Bounded Buffer
// =============================================================================

/** Fixed-capacity LIFO over a ring; pushing onto a full buffer evicts the oldest item */
export class BoundedBuffer<T> {
  private readonly items: Array<T | undefined>;
  private head = 0;
  private count = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new BackgammonError(
        BackgammonErrorCode.CONFIG_INVALID,
        `Buffer capacity must be a positive integer, got ${capacity}`,
        { capacity }
      );
    }
    this.items = new Array<T | undefined>(capacity);
  }

  get size(): number {
    return this.count;
  }

  push(item: T): void {
    this.items[(this.head + this.count) % this.capacity] = item;
    if (this.count < this.capacity) {
      this.count++;
    } else {
      this.head = (this.head + 1) % this.capacity;
    }
  }

  /** Remove and return the newest item */
  pop(): T | undefined {
    if (this.count === 0) return undefined;
    const index = (this.head + this.count - 1) % this.capacity;
    const item = this.items[index];
    this.items[index] = undefined;
    this.count--;
    return item;
  }

  peek(): T | undefined {
    if (this.count === 0) return undefined;
    return this.items[(this.head + this.count - 1) % this.capacity];
  }

  clear(): void {
    this.items.fill(undefined);
    this.head = 0;
    this.count = 0;
  }

  /** Oldest first */
  toArray(): T[] {
    const out: T[] = [];
    for (let i = 0; i < this.count; i++) {
      const item = this.items[(this.head + i) % this.capacity];
      if (item !== undefined) out.push(item);
    }
    return out;
  }
}

// =============================================================================
// Undo Manager
// =============================================================================

export class BackgammonUndo {
  private readonly moves: BoundedBuffer<SingleMove>;
  private readonly snapshots: BoundedBuffer<BackgammonState>;

  constructor(config: Partial<UndoConfig> = {}) {
    const { maxMoves, maxSnapshots } = parseUndoConfig(config);
    this.moves = new BoundedBuffer(maxMoves);
    this.snapshots = new BoundedBuffer(maxSnapshots);
  }

  get moveCount(): number {
    return this.moves.size;
  }

  get snapshotCount(): number {
    return this.snapshots.size;
  }

  recordMove(move: SingleMove | null | undefined): void {
    if (!move) {
      throw new BackgammonError(BackgammonErrorCode.MOVE_INVALID, 'Cannot record a missing move');
    }
    this.moves.push(move);
  }

  /**
   * Undo the newest recorded move. Falls back to the newest snapshot when no
   * move is left.
   * @returns the undone move, or null when a snapshot was restored
   */
  undoLastMove(state: BackgammonState): SingleMove | null {
    const move = this.moves.pop();
    if (move) {
      state.undoMove(move);
      return move;
    }
    if (this.snapshots.size > 0) {
      this.undoLastSnapshot(state);
      return null;
    }
    throw new EmptyUndo('Nothing to undo');
  }

  /** Store an independent copy of `state` */
  recordSnapshot(state: BackgammonState): void {
    this.snapshots.push(state.copy());
  }

  undoLastSnapshot(state: BackgammonState): void {
    const snapshot = this.snapshots.pop();
    if (!snapshot) {
      throw new EmptyUndo('No snapshots available', BackgammonErrorCode.UNDO_NO_SNAPSHOT);
    }
    state.restoreFrom(snapshot);
  }

  clear(): void {
    this.moves.clear();
    this.snapshots.clear();
  }
}
