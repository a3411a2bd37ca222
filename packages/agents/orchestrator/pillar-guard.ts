// Pillar Guard
// Wraps every agent call so that thrown faults, malformed outcomes, deadline
// expiry and caller cancellation all come back as a failed AgentResult.
// The returned promise never rejects.

import type {
  PillarAgent, PillarErrorCode, PillarName, PillarOutcome,
} from '../types/pillars.js';
import { failure } from '../types/pillars.js';
import type { AgentResult } from '../types/orchestration.js';
import { toErrorMessage } from '../utils/errors.js';

export interface GuardOptions {
  runId: string;
  /** 0 disables the deadline */
  timeoutMs: number;
  /** Caller cancellation */
  signal?: AbortSignal;
}

const ERROR_CODES: readonly PillarErrorCode[] = ['PILLAR_ERROR', 'TIMEOUT', 'CANCELLED', 'INVALID_OUTCOME'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isErrorCode(value: unknown): value is PillarErrorCode {
  return typeof value === 'string' && ERROR_CODES.some(code => code === value);
}

/**
 * Re-check an outcome at run time. Agents written outside this codebase are
 * not bound by the type system.
 */
export function checkOutcome(pillar: PillarName, outcome: PillarOutcome): PillarOutcome {
  const value: unknown = outcome;
  if (!isRecord(value)) {
    return failure('INVALID_OUTCOME', `${pillar} returned ${value === null ? 'null' : typeof value} instead of an outcome`);
  }
  if (outcome.ok === true) {
    const payload: unknown = outcome.payload;
    if (!isRecord(payload) || payload.kind !== pillar) {
      const kind = isRecord(payload) ? String(payload.kind) : typeof payload;
      return failure('INVALID_OUTCOME', `${pillar} returned a payload of kind ${kind}`);
    }
    return outcome;
  }
  if (outcome.ok === false) {
    const error: unknown = outcome.error;
    if (isRecord(error) && isErrorCode(error.code) && typeof error.message === 'string') {
      return failure(error.code, error.message);
    }
    return failure('INVALID_OUTCOME', `${pillar} reported a failure without a valid error`);
  }
  return failure('INVALID_OUTCOME', `${pillar} returned an outcome without an ok flag`);
}

function toResult(
  pillar: PillarName,
  outcome: PillarOutcome,
  startedAt: Date,
  completedAt: Date,
): AgentResult {
  const durationMs = completedAt.getTime() - startedAt.getTime();
  return outcome.ok
    ? { pillar, status: 'success', payload: outcome.payload, durationMs, startedAt, completedAt }
    : { pillar, status: 'failed', error: outcome.error, durationMs, startedAt, completedAt };
}

/** Result for a pillar that was never invoked because the run was cancelled first */
export function cancelledResult(pillar: PillarName, message = `${pillar} cancelled before dispatch`): AgentResult {
  const now = new Date();
  return toResult(pillar, failure('CANCELLED', message), now, now);
}

export async function guardPillar(
  agent: PillarAgent,
  scenario: string,
  options: GuardOptions,
): Promise<AgentResult> {
  const { pillar } = agent;
  const { runId, timeoutMs, signal } = options;

  if (signal?.aborted) return cancelledResult(pillar);

  const controller = new AbortController();
  const startedAt = new Date();
  let timer: ReturnType<typeof setTimeout> | undefined;
  let onAbort: (() => void) | undefined;

  const interrupted = new Promise<PillarOutcome>(resolve => {
    if (timeoutMs > 0) {
      timer = setTimeout(() => {
        controller.abort();
        resolve(failure('TIMEOUT', `${pillar} exceeded the ${timeoutMs}ms deadline`));
      }, timeoutMs);
    }
    if (signal) {
      onAbort = () => {
        controller.abort();
        resolve(failure('CANCELLED', `${pillar} cancelled by caller`));
      };
      signal.addEventListener('abort', onAbort, { once: true });
    }
  });

  const invocation = (async (): Promise<PillarOutcome> => {
    try {
      const outcome = await agent.analyze(scenario, { runId, signal: controller.signal });
      return checkOutcome(pillar, outcome);
    } catch (err) {
      return failure('PILLAR_ERROR', `${pillar} threw: ${toErrorMessage(err)}`);
    }
  })();

  try {
    const outcome = await Promise.race([invocation, interrupted]);
    return toResult(pillar, outcome, startedAt, new Date());
  } finally {
    if (timer !== undefined) clearTimeout(timer);
    if (signal && onAbort) signal.removeEventListener('abort', onAbort);
  }
}
