// Pillar Decision
// Runs independent pillar analyses of one business scenario and synthesizes
// them into a weighted, classified and explained recommendation

export { Orchestrator, createPillar, createDefaultPillars } from './orchestrator/index.js';
export type { OrchestratorConfig, AnalysisResponse } from './orchestrator/index.js';
export { guardPillar, checkOutcome, cancelledResult, EventChannel } from './orchestrator/index.js';
export type { GuardOptions } from './orchestrator/index.js';

export {
  DecisionEngine, classify, weightedScore, computeConfidence,
  collectInsights, buildActionItems, assessRisk,
  extractPillarScore, extractScores, NEUTRAL_SCORE,
} from './decision/index.js';
export type { DecisionEngineConfig } from './decision/index.js';

export { BasePillarAgent } from './agents/base-pillar.js';
export { FinancePillar } from './agents/finance-pillar.js';
export { RiskPillar } from './agents/risk-pillar.js';
export { CompliancePillar } from './agents/compliance-pillar.js';
export { MarketPillar } from './agents/market-pillar.js';

export * from './config/index.js';
export * from './types/index.js';

export {
  PillarDecisionError, ConfigurationError, OrchestrationExhaustionError, toErrorMessage,
} from './utils/errors.js';
export type { PillarDecisionErrorCode } from './utils/errors.js';
export { createLogger, silentLogger, isLogLevel } from './utils/logger.js';
export type { Logger, LogLevel } from './utils/logger.js';
export { renderReport, formatPercent, formatCategory } from './utils/report.js';
