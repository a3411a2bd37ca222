// Scripted pillar agents and payload builders shared by the orchestration
// and decision tests. Everything runs in process.

import type {
  ComplianceOutcome, FinanceOutcome, MarketMetrics, MarketOutcome, PillarAgent, PillarContext,
  PillarName, PillarOutcome, PillarPayload, RiskLevel, RiskOutcome,
} from '../types/pillars.js';
import { PILLAR_ORDER, failure, success } from '../types/pillars.js';
import type { AgentResult, OrchestrationRun } from '../types/orchestration.js';
import { DEFAULT_SETTINGS, type Settings } from '../config/settings.js';
import type { Logger, LogLevel } from '../utils/logger.js';

export const SCENARIO = 'Launch a subscription analytics product for mid-sized retailers in Europe.';

export function testSettings(overrides: Partial<Settings> = {}): Settings {
  return { ...DEFAULT_SETTINGS, logLevel: 'silent', ...overrides };
}

// ── Payload builders ────────────────────────────────────────────────

export function financePayload(metrics: FinanceOutcome['metrics'] = {
  revenuePotential: 0.8, costEfficiency: 0.8, roiProjection: 0.8, fundingRequirement: 0.8,
}): FinanceOutcome {
  return { kind: 'finance', metrics, confidence: 0.85, analysis: 'scripted finance' };
}

export function riskPayload(
  overallRiskScore = 0.3,
  riskCategories: Record<string, RiskLevel> = {},
): RiskOutcome {
  return {
    kind: 'risk',
    overallRiskScore,
    riskCategories,
    mitigationPriority: ['General Risk Monitoring'],
    analysis: 'scripted risk',
  };
}

export function compliancePayload(overallComplianceScore = 0.9, complianceGaps: string[] = []): ComplianceOutcome {
  return {
    kind: 'compliance',
    overallComplianceScore,
    areaScores: {},
    regulatoryRequirements: ['General Business Regulations'],
    complianceGaps,
    recommendedActions: [],
    analysis: 'scripted compliance',
  };
}

export function marketPayload(overallMarketScore = 0.7, metrics: Partial<MarketMetrics> = {}): MarketOutcome {
  return {
    kind: 'market',
    overallMarketScore,
    marketMetrics: {
      marketSizePotential: 'MEDIUM',
      competitiveIntensity: 'MEDIUM',
      growthOpportunity: 0.5,
      marketEntryDifficulty: 'MEDIUM',
      customerDemand: 0.5,
      ...metrics,
    },
    keyCompetitors: [],
    growthDrivers: [],
    marketChallenges: [],
    analysis: 'scripted market',
  };
}

/** Scores after extraction: finance 0.8, risk 0.7, compliance 0.9, market 0.7 */
export function defaultPayload(pillar: PillarName): PillarPayload {
  switch (pillar) {
    case 'finance': return financePayload();
    case 'risk': return riskPayload();
    case 'compliance': return compliancePayload();
    case 'market': return marketPayload();
  }
}

// ── Scripted agents ─────────────────────────────────────────────────

type Behaviour = (ctx: PillarContext) => Promise<PillarOutcome>;

export class ScriptedPillar implements PillarAgent {
  readonly description: string;
  readonly calls: PillarContext[] = [];

  constructor(readonly pillar: PillarName, private readonly behaviour: Behaviour) {
    this.description = `scripted ${pillar} pillar`;
  }

  analyze(_scenario: string, ctx: PillarContext): Promise<PillarOutcome> {
    this.calls.push(ctx);
    return this.behaviour(ctx);
  }
}

export function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>(r => {
    resolve = r;
  });
  return { promise, resolve };
}

export function succeeding(pillar: PillarName, payload: PillarPayload = defaultPayload(pillar), delayMs = 0): ScriptedPillar {
  return new ScriptedPillar(pillar, async () => {
    if (delayMs > 0) await delay(delayMs);
    return success(payload);
  });
}

export function failing(pillar: PillarName, message = `${pillar} unavailable`): ScriptedPillar {
  return new ScriptedPillar(pillar, async () => failure('PILLAR_ERROR', message));
}

export function throwing(pillar: PillarName, message = 'boom'): ScriptedPillar {
  return new ScriptedPillar(pillar, async () => {
    throw new Error(message);
  });
}

/** Settles only once its signal aborts */
export function hanging(pillar: PillarName): ScriptedPillar {
  return new ScriptedPillar(pillar, ctx => new Promise(resolve => {
    ctx.signal.addEventListener('abort', () => resolve(failure('CANCELLED', `${pillar} saw abort`)), { once: true });
  }));
}

/** Ignores its signal and never settles */
export function stuck(pillar: PillarName): ScriptedPillar {
  return new ScriptedPillar(pillar, () => new Promise<PillarOutcome>(() => {}));
}

/** Outcome as an agent outside the type system might return it */
export function untypedOutcome(json: string): PillarOutcome {
  return JSON.parse(json);
}

export function allSucceeding(): ScriptedPillar[] {
  return PILLAR_ORDER.map(pillar => succeeding(pillar));
}

// ── Runs built by hand for the Decision Engine ──────────────────────

export function resultFor(pillar: PillarName, outcome: PillarOutcome, durationMs = 12): AgentResult {
  const startedAt = new Date('2026-01-05T10:00:00.000Z');
  const completedAt = new Date(startedAt.getTime() + durationMs);
  return outcome.ok
    ? { pillar, status: 'success', payload: outcome.payload, durationMs, startedAt, completedAt }
    : { pillar, status: 'failed', error: outcome.error, durationMs, startedAt, completedAt };
}

export function makeRun(
  outcomes: Partial<Record<PillarName, PillarOutcome>>,
  pillars: readonly PillarName[] = PILLAR_ORDER,
): OrchestrationRun {
  const results: Partial<Record<PillarName, AgentResult>> = {};
  let succeeded = 0;
  for (const pillar of pillars) {
    const outcome = outcomes[pillar];
    if (!outcome) continue;
    results[pillar] = resultFor(pillar, outcome);
    if (outcome.ok) succeeded++;
  }
  return {
    runId: 'run-test-1',
    request: { scenario: SCENARIO },
    pillars,
    results,
    status: 'aggregating',
    startedAt: new Date('2026-01-05T10:00:00.000Z'),
    completedAt: new Date('2026-01-05T10:00:00.050Z'),
    succeeded,
    total: pillars.length,
    cancelled: false,
  };
}

/** Scores after extraction: finance 0.90, risk 0.80, compliance 0.70, market 0.60 */
export function referenceRun(): OrchestrationRun {
  return makeRun({
    finance: success(financePayload({ revenuePotential: 0.9 })),
    risk: success(riskPayload(0.2)),
    compliance: success(compliancePayload(0.7)),
    market: success(marketPayload(0.6)),
  });
}

// ── Logging ─────────────────────────────────────────────────────────

export interface LogEntry {
  level: Exclude<LogLevel, 'silent'>;
  message: string;
  data?: Record<string, unknown>;
}

export function recordingLogger(): Logger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  return {
    entries,
    debug: (message, data) => entries.push({ level: 'debug', message, data }),
    info: (message, data) => entries.push({ level: 'info', message, data }),
    warn: (message, data) => entries.push({ level: 'warn', message, data }),
    error: (message, data) => entries.push({ level: 'error', message, data }),
  };
}
