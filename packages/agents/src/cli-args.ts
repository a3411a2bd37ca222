// Argument parsing for `pillars analyze`

import type { PillarName } from '../types/pillars.js';
import { isPillarName } from '../types/pillars.js';
import type { WeightMap } from '../types/orchestration.js';
import { DEFAULT_WEIGHT_TOLERANCE, assertValidWeights, parseWeightSpec } from '../config/weights.js';
import { ConfigurationError } from '../utils/errors.js';

export interface AnalyzeArgs {
  scenario: string;
  stream: boolean;
  json: boolean;
  interactive: boolean;
  help: boolean;
  weights?: WeightMap;
  pillars?: PillarName[];
  timeoutMs?: number;
}

const VALUE_FLAGS = new Set(['--weights', '--pillars', '--timeout']);

export function parseAnalyzeArgs(args: readonly string[], tolerance = DEFAULT_WEIGHT_TOLERANCE): AnalyzeArgs {
  const parsed: AnalyzeArgs = { scenario: '', stream: false, json: false, interactive: false, help: false };
  const issues: string[] = [];
  const scenarioParts: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (VALUE_FLAGS.has(arg)) {
      const value = args[i + 1];
      if (value === undefined || value.startsWith('--')) {
        issues.push(`${arg} requires a value`);
        continue;
      }
      i++;
      try {
        applyValue(parsed, arg, value, tolerance);
      } catch (err) {
        if (!(err instanceof ConfigurationError)) throw err;
        issues.push(...err.issues);
      }
      continue;
    }

    switch (arg) {
      case '--stream': parsed.stream = true; break;
      case '--json': parsed.json = true; break;
      case '-i':
      case '--interactive': parsed.interactive = true; break;
      case '-h':
      case '--help': parsed.help = true; break;
      default:
        if (arg.startsWith('--')) {
          issues.push(`unknown option "${arg}"`);
        } else {
          scenarioParts.push(arg);
        }
    }
  }

  if (issues.length > 0) throw new ConfigurationError(issues);
  parsed.scenario = scenarioParts.join(' ').trim();
  return parsed;
}

function applyValue(parsed: AnalyzeArgs, flag: string, value: string, tolerance: number): void {
  switch (flag) {
    case '--weights':
      parsed.weights = assertValidWeights(parseWeightSpec(value), tolerance);
      return;
    case '--pillars': {
      const names = value.split(',').map(p => p.trim().toLowerCase()).filter(Boolean);
      const unknown = names.filter(name => !isPillarName(name));
      if (unknown.length > 0) {
        throw new ConfigurationError(unknown.map(name => `unknown pillar "${name}"`));
      }
      parsed.pillars = names.filter(isPillarName);
      return;
    }
    case '--timeout': {
      const ms = Number(value);
      if (!Number.isInteger(ms) || ms < 0) {
        throw new ConfigurationError(`--timeout must be a non-negative integer (got "${value}")`);
      }
      parsed.timeoutMs = ms;
      return;
    }
  }
}
