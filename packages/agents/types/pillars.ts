// Pillar capability contract: one tagged payload variant per pillar,
// and an explicit Success | Failure outcome instead of thrown errors

export type PillarName = 'finance' | 'risk' | 'compliance' | 'market';

/** Fixed iteration order used for dispatch, streaming and tie-breaking */
export const PILLAR_ORDER: readonly PillarName[] = ['finance', 'risk', 'compliance', 'market'];

export function isPillarName(value: string): value is PillarName {
  return PILLAR_ORDER.some(name => name === value);
}

export type RiskLevel = 'LOW' | 'MEDIUM' | 'HIGH';
export type MarketSize = 'LARGE' | 'MEDIUM' | 'SMALL';

export type FinanceMetric = 'revenuePotential' | 'costEfficiency' | 'roiProjection' | 'fundingRequirement';

export const FINANCE_METRICS: readonly FinanceMetric[] = [
  'revenuePotential', 'costEfficiency', 'roiProjection', 'fundingRequirement',
];

export interface FinanceOutcome {
  readonly kind: 'finance';
  readonly metrics: Partial<Record<FinanceMetric, number>>;  // each expected in 0-1
  readonly confidence?: number;
  readonly analysis: string;
}

export interface RiskOutcome {
  readonly kind: 'risk';
  readonly overallRiskScore?: number;   // 0-1, 1 = maximal risk
  readonly riskCategories: Record<string, RiskLevel>;
  readonly mitigationPriority: string[];
  readonly confidence?: number;
  readonly analysis: string;
}

export interface ComplianceOutcome {
  readonly kind: 'compliance';
  readonly overallComplianceScore?: number;  // 0-1, higher = more compliant
  readonly areaScores: Record<string, number>;  // per-area risk, higher = more exposure
  readonly regulatoryRequirements: string[];
  readonly complianceGaps: string[];
  readonly recommendedActions: string[];
  readonly confidence?: number;
  readonly analysis: string;
}

export interface MarketMetrics {
  readonly marketSizePotential: MarketSize;
  readonly competitiveIntensity: RiskLevel;
  readonly growthOpportunity: number;
  readonly marketEntryDifficulty: RiskLevel;
  readonly customerDemand: number;
}

export interface MarketOutcome {
  readonly kind: 'market';
  readonly overallMarketScore?: number;  // 0-1, higher = more attractive
  readonly marketMetrics: MarketMetrics;
  readonly keyCompetitors: string[];
  readonly growthDrivers: string[];
  readonly marketChallenges: string[];
  readonly confidence?: number;
  readonly analysis: string;
}

export interface PillarPayloads {
  finance: FinanceOutcome;
  risk: RiskOutcome;
  compliance: ComplianceOutcome;
  market: MarketOutcome;
}

export type PillarPayload = PillarPayloads[PillarName];

export type PillarErrorCode = 'PILLAR_ERROR' | 'TIMEOUT' | 'CANCELLED' | 'INVALID_OUTCOME';

export interface PillarError {
  readonly code: PillarErrorCode;
  readonly message: string;
}

export type PillarOutcome<T extends PillarPayload = PillarPayload> =
  | { readonly ok: true; readonly payload: T }
  | { readonly ok: false; readonly error: PillarError };

export function success<T extends PillarPayload>(payload: T): PillarOutcome<T> {
  return { ok: true, payload };
}

export function failure(code: PillarErrorCode, message: string): PillarOutcome<never> {
  return { ok: false, error: { code, message } };
}

export interface PillarContext {
  readonly runId: string;
  /** Aborted on deadline expiry or caller cancellation */
  readonly signal: AbortSignal;
}

/**
 * What the Orchestrator needs from a pillar. Implementations must be safe to
 * run concurrently with other pillars and should resolve with a Failure rather
 * than throw; the Orchestrator guards every call regardless.
 */
export interface PillarAgent {
  readonly pillar: PillarName;
  readonly description: string;
  analyze(scenario: string, ctx: PillarContext): Promise<PillarOutcome>;
}
