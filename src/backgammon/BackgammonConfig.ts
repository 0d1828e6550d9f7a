/**
 * BackgammonConfig - Validated configuration
 *
 * Partial user input is checked against the schemas, merged over the
 * defaults and checked again. Anything invalid is rejected with CONFIG_INVALID.
 */

import { z } from 'zod';
import { BackgammonError, BackgammonErrorCode } from './BackgammonErrors.js';
import {
  AIConfig,
  DEFAULT_AI_CONFIG,
  DEFAULT_ENGINE_CONFIG,
  DEFAULT_EVALUATOR_CONFIG,
  DEFAULT_UNDO_CONFIG,
  EngineConfig,
  EvaluatorConfig,
  UndoConfig,
} from './types.js';

// =============================================================================
// Schemas
// =============================================================================

export const EvaluatorConfigSchema = z.object({
  weightBearOff: z.number().finite(),
  weightHome: z.number().finite(),
  weightBlots: z.number().finite(),
  weightBlockades: z.number().finite(),
  weightPip: z.number().finite(),
  normalization: z.number().positive(),
});

export const AIConfigSchema = z.object({
  iterations: z.number().int().nonnegative(),
  minRolloutDepth: z.number().int().nonnegative(),
  maxRolloutDepth: z.number().int().nonnegative(),
  depthScale: z.number().positive(),
  exploration: z.number().nonnegative(),
  seed: z.number().int().optional(),
});

export const UndoConfigSchema = z.object({
  maxMoves: z.number().int().positive(),
  maxSnapshots: z.number().int().positive(),
});

export const EngineConfigSchema = z.object({
  enableCube: z.boolean(),
  maxTurns: z.number().int().nonnegative(),
  startRoll: z.boolean(),
});

/** Options of the self-play command */
export const SelfPlayConfigSchema = z.object({
  games: z.number().int().positive().default(1),
  iterations: z.number().int().nonnegative().default(DEFAULT_AI_CONFIG.iterations),
  seed: z.number().int().optional(),
  opponent: z.enum(['ai', 'random']).default('random'),
  cube: z.boolean().default(false),
  maxTurns: z.number().int().nonnegative().default(0),
  verbose: z.boolean().default(false),
  debug: z.boolean().default(false),
});

export type SelfPlayConfig = z.infer<typeof SelfPlayConfigSchema>;

// =============================================================================
// Parsing
// =============================================================================

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

/** Validate `input` against `schema` or throw CONFIG_INVALID */
function check<S extends z.ZodTypeAny>(name: string, schema: S, input: unknown): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new BackgammonError(
      BackgammonErrorCode.CONFIG_INVALID,
      `Invalid ${name} config: ${formatIssues(parsed.error)}`,
      { issues: parsed.error.issues }
    );
  }
  return parsed.data;
}

export function parseEvaluatorConfig(input: unknown): EvaluatorConfig {
  const partial = check('evaluator', EvaluatorConfigSchema.partial().strict(), input ?? {});
  return check('evaluator', EvaluatorConfigSchema, { ...DEFAULT_EVALUATOR_CONFIG, ...partial });
}

/** Also checks that the rollout depth range is ordered */
export function parseAIConfig(input: unknown): AIConfig {
  const partial = check('AI', AIConfigSchema.partial().strict(), input ?? {});
  const config = check('AI', AIConfigSchema, { ...DEFAULT_AI_CONFIG, ...partial });
  if (config.minRolloutDepth > config.maxRolloutDepth) {
    throw new BackgammonError(
      BackgammonErrorCode.CONFIG_INVALID,
      `Invalid AI config: minRolloutDepth ${config.minRolloutDepth} exceeds maxRolloutDepth ${config.maxRolloutDepth}`,
      { minRolloutDepth: config.minRolloutDepth, maxRolloutDepth: config.maxRolloutDepth }
    );
  }
  return config;
}

export function parseUndoConfig(input: unknown): UndoConfig {
  const partial = check('undo', UndoConfigSchema.partial().strict(), input ?? {});
  return check('undo', UndoConfigSchema, { ...DEFAULT_UNDO_CONFIG, ...partial });
}

export function parseEngineConfig(input: unknown): EngineConfig {
  const partial = check('engine', EngineConfigSchema.partial().strict(), input ?? {});
  return check('engine', EngineConfigSchema, { ...DEFAULT_ENGINE_CONFIG, ...partial });
}

export function parseSelfPlayConfig(input: unknown): SelfPlayConfig {
  return check('self-play', SelfPlayConfigSchema.strict(), input ?? {});
}
