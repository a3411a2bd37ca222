// Weight map validation shared by request validation, settings and the Decision Engine

import { isPillarName, type PillarName } from '../types/pillars.js';
import type { WeightMap } from '../types/orchestration.js';
import { ConfigurationError } from '../utils/errors.js';

export const DEFAULT_WEIGHTS: Readonly<Record<PillarName, number>> = Object.freeze({
  finance: 0.3,
  risk: 0.25,
  compliance: 0.2,
  market: 0.25,
});

export const DEFAULT_WEIGHT_TOLERANCE = 1e-3;

/**
 * Collect every problem with a weight map. Keys must be known pillars, values
 * finite and non-negative, and the values must sum to 1.0 within `tolerance`.
 */
export function validateWeights(
  weights: Readonly<Record<string, number | undefined>>,
  tolerance = DEFAULT_WEIGHT_TOLERANCE,
): string[] {
  const issues: string[] = [];
  let sum = 0;

  for (const [key, value] of Object.entries(weights)) {
    if (!isPillarName(key)) {
      issues.push(`unknown pillar "${key}" in weights`);
      continue;
    }
    // An absent weight counts as 0
    if (value === undefined) continue;
    if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
      issues.push(`weight for ${key} must be a non-negative number`);
      continue;
    }
    sum += value;
  }

  if (issues.length === 0 && Math.abs(sum - 1) > tolerance) {
    issues.push(`weights must sum to 1.0 (got ${Number(sum.toFixed(6))})`);
  }
  return issues;
}

export function assertValidWeights(
  weights: Readonly<Record<string, number | undefined>>,
  tolerance = DEFAULT_WEIGHT_TOLERANCE,
): WeightMap {
  const issues = validateWeights(weights, tolerance);
  if (issues.length > 0) throw new ConfigurationError(issues);

  const map: WeightMap = {};
  for (const [key, value] of Object.entries(weights)) {
    if (isPillarName(key) && typeof value === 'number') map[key] = value;
  }
  return map;
}

/**
 * Parse `finance=0.3,risk=0.25,...` as used by PILLAR_WEIGHTS and the CLI.
 * Only the syntax is checked here; run the result through assertValidWeights.
 */
export function parseWeightSpec(spec: string): Record<string, number> {
  const weights: Record<string, number> = {};
  const issues: string[] = [];

  for (const part of spec.split(',').map(p => p.trim()).filter(Boolean)) {
    const match = /^([a-z_-]+)\s*[=:]\s*(-?\d*\.?\d+(?:e-?\d+)?)$/i.exec(part);
    if (!match) {
      issues.push(`malformed weight entry "${part}"`);
      continue;
    }
    weights[match[1].toLowerCase()] = Number(match[2]);
  }

  if (issues.length > 0) throw new ConfigurationError(issues);
  return weights;
}
