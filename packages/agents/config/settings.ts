// Runtime settings. Every value can be overridden via env (or a .env file
// loaded by the entry point through dotenv)

import { z } from 'zod';
import type { WeightMap } from '../types/orchestration.js';
import type { LogLevel } from '../utils/logger.js';
import { ConfigurationError } from '../utils/errors.js';
import {
  DEFAULT_WEIGHTS, DEFAULT_WEIGHT_TOLERANCE, assertValidWeights, parseWeightSpec,
} from './weights.js';

export type OverflowPolicy = 'block' | 'drop';

export interface Settings {
  readonly pillarTimeoutMs: number;      // 0 disables the per-pillar deadline
  readonly scenarioMinLength: number;
  readonly scenarioMaxLength: number;
  readonly defaultWeights: Readonly<WeightMap>;
  readonly weightTolerance: number;
  readonly streamBufferSize: number;
  readonly streamOverflow: OverflowPolicy;
  readonly logLevel: LogLevel;
}

const EnvSchema = z.object({
  PILLAR_TIMEOUT_MS: z.coerce.number().int().min(0).default(30_000),
  SCENARIO_MIN_LENGTH: z.coerce.number().int().min(1).default(50),
  SCENARIO_MAX_LENGTH: z.coerce.number().int().min(1).default(5000),
  PILLAR_WEIGHTS: z.string().optional(),
  WEIGHT_TOLERANCE: z.coerce.number().positive().max(0.1).default(DEFAULT_WEIGHT_TOLERANCE),
  STREAM_BUFFER_SIZE: z.coerce.number().int().min(1).max(10_000).default(16),
  STREAM_OVERFLOW: z.enum(['block', 'drop']).default('block'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
}).refine(env => env.SCENARIO_MIN_LENGTH <= env.SCENARIO_MAX_LENGTH, {
  message: 'SCENARIO_MIN_LENGTH must not exceed SCENARIO_MAX_LENGTH',
  path: ['SCENARIO_MIN_LENGTH'],
});

export const DEFAULT_SETTINGS: Settings = Object.freeze<Settings>({
  pillarTimeoutMs: 30_000,
  scenarioMinLength: 50,
  scenarioMaxLength: 5000,
  defaultWeights: DEFAULT_WEIGHTS,
  weightTolerance: DEFAULT_WEIGHT_TOLERANCE,
  streamBufferSize: 16,
  streamOverflow: 'block',
  logLevel: 'info',
});

/**
 * Build Settings from environment variables. Empty strings count as unset.
 * Throws ConfigurationError listing every invalid variable.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const raw: Record<string, string> = {};
  for (const key of Object.keys(EnvSchema.innerType().shape)) {
    const value = env[key];
    if (value !== undefined && value.trim() !== '') raw[key] = value.trim();
  }

  const parsed = EnvSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map(issue => `${issue.path.join('.') || 'env'}: ${issue.message}`),
    );
  }

  const vars = parsed.data;
  const defaultWeights = vars.PILLAR_WEIGHTS
    ? assertValidWeights(parseWeightSpec(vars.PILLAR_WEIGHTS), vars.WEIGHT_TOLERANCE)
    : DEFAULT_WEIGHTS;

  return Object.freeze({
    pillarTimeoutMs: vars.PILLAR_TIMEOUT_MS,
    scenarioMinLength: vars.SCENARIO_MIN_LENGTH,
    scenarioMaxLength: vars.SCENARIO_MAX_LENGTH,
    defaultWeights,
    weightTolerance: vars.WEIGHT_TOLERANCE,
    streamBufferSize: vars.STREAM_BUFFER_SIZE,
    streamOverflow: vars.STREAM_OVERFLOW,
    logLevel: vars.LOG_LEVEL,
  });
}
