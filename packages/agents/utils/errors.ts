// Error taxonomy for failures that reach the caller.
// Pillar faults are not here: they travel as PillarError values inside outcomes.

import type { OrchestrationRun } from '../types/orchestration.js';

export type PillarDecisionErrorCode = 'CONFIGURATION_ERROR' | 'ORCHESTRATION_EXHAUSTED';

export abstract class PillarDecisionError extends Error {
  abstract readonly code: PillarDecisionErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Invalid weights, unknown pillar, out-of-bounds scenario or bad settings. Raised before dispatch. */
export class ConfigurationError extends PillarDecisionError {
  readonly code = 'CONFIGURATION_ERROR' as const;
  readonly issues: string[];

  constructor(issues: string[] | string) {
    const list = Array.isArray(issues) ? issues : [issues];
    super(`Invalid configuration: ${list.join('; ')}`);
    this.issues = list;
  }
}

/** Zero pillars could be dispatched */
export class OrchestrationExhaustionError extends PillarDecisionError {
  readonly code = 'ORCHESTRATION_EXHAUSTED' as const;

  constructor(readonly run: OrchestrationRun) {
    super(`No pillar could be dispatched for run ${run.runId}`);
  }
}

export function toErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  try {
    return JSON.stringify(err) ?? String(err);
  } catch {
    return String(err);
  }
}
