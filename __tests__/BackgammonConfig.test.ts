/**
 * Configuration, error and logger tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  parseAIConfig,
  parseEngineConfig,
  parseEvaluatorConfig,
  parseSelfPlayConfig,
  parseUndoConfig,
} from '../src/backgammon/BackgammonConfig.js';
import {
  BackgammonError,
  BackgammonErrorCode,
  EmptyUndo,
  InvalidPosition,
  isBackgammonError,
} from '../src/backgammon/BackgammonErrors.js';
import { createLogger, isDebugEnabled, setDebugLogging, setLoggingEnabled } from '../src/backgammon/BackgammonLogger.js';
import {
  DEFAULT_AI_CONFIG,
  DEFAULT_ENGINE_CONFIG,
  DEFAULT_EVALUATOR_CONFIG,
} from '../src/backgammon/types.js';
import { thrown } from './helpers.js';

// =============================================================================
// Config Parsing
// =============================================================================

describe('Config parsing', () => {
  it('should return the defaults for empty input', () => {
    expect(parseEvaluatorConfig(undefined)).toEqual(DEFAULT_EVALUATOR_CONFIG);
    expect(parseAIConfig({})).toEqual(DEFAULT_AI_CONFIG);
    expect(parseEngineConfig(null)).toEqual(DEFAULT_ENGINE_CONFIG);
  });

  it('should merge partial input over the defaults', () => {
    expect(parseUndoConfig({ maxMoves: 5 })).toEqual({ maxMoves: 5, maxSnapshots: 10 });
    expect(parseAIConfig({ iterations: 10, seed: 3 })).toEqual({ ...DEFAULT_AI_CONFIG, iterations: 10, seed: 3 });
  });

  it('should reject invalid values', () => {
    const error = thrown(() => parseAIConfig({ iterations: -1 }));
    expect(error).toBeInstanceOf(BackgammonError);
    expect(error).toMatchObject({ code: BackgammonErrorCode.CONFIG_INVALID });
    expect(thrown(() => parseEvaluatorConfig({ normalization: 0 }))).toMatchObject({
      code: BackgammonErrorCode.CONFIG_INVALID,
    });
    expect(thrown(() => parseUndoConfig({ maxSnapshots: 1.5 }))).toMatchObject({
      code: BackgammonErrorCode.CONFIG_INVALID,
    });
  });

  it('should reject unknown keys', () => {
    expect(() => parseEngineConfig({ cube: true })).toThrow(/Invalid engine config/);
  });

  it('should reject an inverted rollout depth range', () => {
    expect(() => parseAIConfig({ minRolloutDepth: 8 })).toThrow(/minRolloutDepth 8 exceeds maxRolloutDepth 7/);
  });

  it('should fill self-play defaults', () => {
    expect(parseSelfPlayConfig({ games: 3 })).toEqual({
      games: 3,
      iterations: 120,
      opponent: 'random',
      cube: false,
      maxTurns: 0,
      verbose: false,
      debug: false,
    });
  });

  it('should reject an unknown opponent', () => {
    expect(thrown(() => parseSelfPlayConfig({ opponent: 'human' }))).toMatchObject({
      code: BackgammonErrorCode.CONFIG_INVALID,
    });
  });
});

// =============================================================================
// Errors
// =============================================================================

describe('Errors', () => {
  it('should serialize to JSON', () => {
    const error = new EmptyUndo('Nothing to undo');
    expect(error.toJSON()).toEqual({
      error: true,
      type: 'EmptyUndo',
      code: 'UNDO_EMPTY',
      message: 'Nothing to undo',
      context: {},
    });
  });

  it('should keep the class hierarchy', () => {
    const error = new InvalidPosition('bad', { point: 30 });
    expect(error).toBeInstanceOf(InvalidPosition);
    expect(error).toBeInstanceOf(BackgammonError);
    expect(error).toBeInstanceOf(Error);
    expect(error.code).toBe(BackgammonErrorCode.STATE_INVALID_POSITION);
    expect(isBackgammonError(error)).toBe(true);
    expect(isBackgammonError(new Error('plain'))).toBe(false);
  });
});

// =============================================================================
// Logger
// =============================================================================

describe('Logger', () => {
  afterEach(() => {
    setDebugLogging(false);
    setLoggingEnabled(true);
    vi.restoreAllMocks();
  });

  it('should prefix messages with the scope', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    createLogger('Test').info('hello', 1);
    expect(spy).toHaveBeenCalledWith('[Test]', 'hello', 1);
  });

  it('should only print debug output when enabled', () => {
    const spy = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const log = createLogger('Test');

    log.debug('hidden');
    expect(spy).not.toHaveBeenCalled();

    setDebugLogging(true);
    expect(isDebugEnabled()).toBe(true);
    log.debug('shown');
    expect(spy).toHaveBeenCalledWith('[Test]', 'shown');
  });

  it('should silence everything when logging is disabled', () => {
    const spy = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    setLoggingEnabled(false);
    setDebugLogging(true);
    expect(isDebugEnabled()).toBe(false);
    createLogger('Test').warn('quiet');
    expect(spy).not.toHaveBeenCalled();
  });
});
