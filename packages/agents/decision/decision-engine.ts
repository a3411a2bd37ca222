// Decision Engine
// Turns a finished OrchestrationRun into a weighted, classified and explained
// Recommendation. Holds only its default weight map between calls.

import type { FinanceMetric, PillarName, PillarPayloads, RiskLevel } from '../types/pillars.js';
import { FINANCE_METRICS, PILLAR_ORDER } from '../types/pillars.js';
import type { OrchestrationRun, WeightMap } from '../types/orchestration.js';
import type {
  ActionItem, DegradedCategory, Insight, Recommendation, RecommendationCategory, RiskAssessment,
} from '../types/decision.js';
import { createDomainEvent, type EventBus } from '../types/events.js';
import { DEFAULT_WEIGHTS, DEFAULT_WEIGHT_TOLERANCE, assertValidWeights } from '../config/weights.js';
import { PILLAR_LABELS } from '../config/pillar-mappings.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { clamp, isFiniteNumber, mean, sampleStdev } from '../utils/scoring.js';
import { NEUTRAL_SCORE, extractScores } from './score-extractor.js';

export interface DecisionEngineConfig {
  weights?: Readonly<Record<string, number | undefined>>;
  tolerance?: number;
  logger?: Logger;
  eventBus?: EventBus;
}

// Lower bounds, inclusive, checked top down
const CATEGORY_BANDS: ReadonlyArray<readonly [number, RecommendationCategory]> = [
  [0.8, 'STRONGLY_RECOMMEND'],
  [0.65, 'RECOMMEND'],
  [0.5, 'CONDITIONAL'],
  [0.35, 'CAUTION'],
];

const RATIONALE: Record<RecommendationCategory | DegradedCategory, string> = {
  STRONGLY_RECOMMEND: 'Strong performance across all four pillars with minimal risks identified.',
  RECOMMEND: 'Good overall assessment with manageable risks and strong opportunities.',
  CONDITIONAL: 'Mixed assessment requiring careful consideration and risk mitigation.',
  CAUTION: 'Significant concerns identified requiring major improvements before proceeding.',
  NOT_RECOMMENDED: 'Multiple critical issues identified across pillars - not recommended without major changes.',
  REVIEW_REQUIRED: 'No pillar produced a usable result, so the scenario needs manual review.',
};

const NEXT_STEPS: Record<RecommendationCategory | DegradedCategory, readonly string[]> = {
  STRONGLY_RECOMMEND: [
    'Proceed with implementation planning',
    'Secure funding and resources',
    'Begin stakeholder communication',
    'Establish project timeline',
  ],
  RECOMMEND: [
    'Address minor concerns identified',
    'Finalize implementation strategy',
    'Secure necessary approvals',
    'Begin pilot or phased rollout',
  ],
  CONDITIONAL: [
    'Address key concerns before proceeding',
    'Conduct additional analysis in weak areas',
    'Develop risk mitigation strategies',
    'Seek expert consultation',
  ],
  CAUTION: [
    'Major improvements required before proceeding',
    'Conduct comprehensive review',
    'Address critical risk factors',
    'Consider alternative approaches',
  ],
  NOT_RECOMMENDED: [
    'Significant restructuring required',
    'Address fundamental issues',
    'Consider alternative strategies',
    'Conduct thorough reassessment',
  ],
  REVIEW_REQUIRED: ['Review analysis and seek expert guidance'],
};

const TARGETED_ACTIONS: Record<PillarName, string> = {
  finance: 'Conduct detailed financial modeling and projections',
  risk: 'Develop comprehensive risk mitigation strategies',
  compliance: 'Complete compliance assessment and gap analysis',
  market: 'Perform thorough market research and validation',
};

const GENERAL_ACTIONS = [
  'Develop detailed implementation timeline',
  'Secure stakeholder alignment and approval',
  'Establish monitoring and review processes',
];

const WEAK_FINANCE_LABELS: Record<FinanceMetric, string> = {
  revenuePotential: 'revenue potential',
  costEfficiency: 'cost efficiency',
  roiProjection: 'ROI projection',
  fundingRequirement: 'funding requirement',
};

const MAX_INSIGHTS = 5;
const MAX_ACTIONS = 5;
const TARGETED_PILLARS = 2;
const SINGLE_PILLAR_CONFIDENCE = 0.5;

// Insight ranks: problems before opportunities
const PRIORITY = {
  highRisk: 100,
  complianceGap: 90,
  weakFinance: 80,
  entryBarrier: 70,
  competition: 60,
  opportunity: 40,
} as const;

export function classify(score: number): RecommendationCategory {
  for (const [bound, category] of CATEGORY_BANDS) {
    if (score >= bound) return category;
  }
  return 'NOT_RECOMMENDED';
}

/**
 * Weighted mean over `pillars`. A pillar missing from the map weighs 0;
 * when no pillar carries weight the plain mean is used.
 */
export function weightedScore(
  pillars: readonly PillarName[],
  scores: Partial<Record<PillarName, number>>,
  weights: Readonly<WeightMap>,
): number {
  if (pillars.length === 0) return NEUTRAL_SCORE;

  let total = 0;
  let weightSum = 0;
  for (const pillar of pillars) {
    const w = weights[pillar];
    if (!isFiniteNumber(w) || w <= 0) continue;
    total += (scores[pillar] ?? NEUTRAL_SCORE) * w;
    weightSum += w;
  }
  if (weightSum > 0) return clamp(total / weightSum);
  return clamp(mean(pillars.map(p => scores[p] ?? NEUTRAL_SCORE)));
}

/**
 * 0.6 x consistency (1 - 2 x sample stdev, floored at 0) + 0.4 x mean score,
 * scaled by coverage (succeeded / total). A lone pillar starts from 0.5.
 */
export function computeConfidence(values: readonly number[], coverage: number): number {
  if (values.length === 0) return 0;
  const stdev = sampleStdev(values);
  const base = stdev === undefined
    ? SINGLE_PILLAR_CONFIDENCE
    : 0.6 * Math.max(0, 1 - 2 * stdev) + 0.4 * mean(values);
  return clamp(base * clamp(coverage));
}

/** Payloads of successful results whose kind matches their pillar */
function usablePayloads(run: OrchestrationRun): Partial<PillarPayloads> {
  const usable: Partial<PillarPayloads> = {};
  for (const pillar of run.pillars) {
    const result = run.results[pillar];
    if (result?.status !== 'success' || result.payload.kind !== pillar) continue;
    const payload = result.payload;
    switch (payload.kind) {
      case 'finance': usable.finance = payload; break;
      case 'risk': usable.risk = payload; break;
      case 'compliance': usable.compliance = payload; break;
      case 'market': usable.market = payload; break;
    }
  }
  return usable;
}

function pillarRank(pillar: PillarName): number {
  return PILLAR_ORDER.indexOf(pillar);
}

export function collectInsights(payloads: Partial<PillarPayloads>): Insight[] {
  const candidates: Insight[] = [];
  const add = (pillar: PillarName, kind: Insight['kind'], priority: number, message: string): void => {
    candidates.push({ pillar, kind, priority, message });
  };

  const { finance, risk, compliance, market } = payloads;

  if (finance) {
    const weak = FINANCE_METRICS
      .filter(metric => {
        const value = finance.metrics[metric];
        return isFiniteNumber(value) && value < 0.4;
      })
      .map(metric => WEAK_FINANCE_LABELS[metric]);
    if (weak.length > 0) add('finance', 'concern', PRIORITY.weakFinance, `Weak financial signals: ${weak.join(', ')}`);

    const revenue = finance.metrics.revenuePotential;
    if (isFiniteNumber(revenue) && revenue > 0.7) {
      add('finance', 'opportunity', PRIORITY.opportunity, 'Strong revenue potential identified');
    }
    const roi = finance.metrics.roiProjection;
    if (isFiniteNumber(roi) && roi > 0.7) {
      add('finance', 'opportunity', PRIORITY.opportunity, 'Positive ROI projections');
    }
  }

  if (risk) {
    const high = Object.entries(risk.riskCategories)
      .filter(([, level]) => level === 'HIGH')
      .map(([category]) => category);
    if (high.length > 0) add('risk', 'risk', PRIORITY.highRisk, `High risk areas: ${high.join(', ')}`);
  }

  if (compliance && compliance.complianceGaps.length > 0) {
    add('compliance', 'gap', PRIORITY.complianceGap,
      `Compliance attention needed: ${compliance.complianceGaps.length} areas`);
  }

  if (market) {
    const metrics = market.marketMetrics;
    if (metrics.marketEntryDifficulty === 'HIGH') {
      add('market', 'concern', PRIORITY.entryBarrier, 'High market entry barriers');
    }
    if (metrics.competitiveIntensity === 'HIGH') {
      add('market', 'concern', PRIORITY.competition, 'Intense competition in the target market');
    }
    if (metrics.marketSizePotential === 'LARGE') {
      add('market', 'opportunity', PRIORITY.opportunity, 'Large market opportunity identified');
    }
    if (metrics.competitiveIntensity === 'LOW') {
      add('market', 'opportunity', PRIORITY.opportunity, 'Low competitive intensity - favorable entry conditions');
    }
  }

  // Array.prototype.sort is stable, so equal ranks keep insertion order
  return candidates
    .sort((a, b) => b.priority - a.priority || pillarRank(a.pillar) - pillarRank(b.pillar))
    .slice(0, MAX_INSIGHTS);
}

export function buildActionItems(
  run: OrchestrationRun,
  scores: Partial<Record<PillarName, number>>,
): ActionItem[] {
  const ranked = [...run.pillars].sort((a, b) =>
    (scores[a] ?? NEUTRAL_SCORE) - (scores[b] ?? NEUTRAL_SCORE) || pillarRank(a) - pillarRank(b));

  const targeted = ranked.slice(0, TARGETED_PILLARS).map(pillar => {
    const result = run.results[pillar];
    const action = result?.status === 'failed'
      ? `Re-run the ${PILLAR_LABELS[pillar].toLowerCase()} analysis (last attempt failed: ${result.error.code})`
      : TARGETED_ACTIONS[pillar];
    return { pillar, action };
  });

  return [...targeted, ...GENERAL_ACTIONS.map(action => ({ pillar: undefined, action }))]
    .slice(0, MAX_ACTIONS)
    .map(({ pillar, action }, i) => (pillar ? { priority: i + 1, pillar, action } : { priority: i + 1, action }));
}

export function assessRisk(
  payloads: Partial<PillarPayloads>,
  complianceScore: number | undefined,
): RiskAssessment {
  let level: RiskLevel = 'MEDIUM';
  const factors: string[] = [];
  const risk = payloads.risk;

  if (risk && isFiniteNumber(risk.overallRiskScore)) {
    const raw = clamp(risk.overallRiskScore);
    if (raw > 0.7) {
      level = 'HIGH';
      factors.push('High risk score from risk analysis');
    } else if (raw < 0.3) {
      level = 'LOW';
    }
  } else {
    factors.push('Risk analysis unavailable');
  }

  if (risk) {
    for (const [category, categoryLevel] of Object.entries(risk.riskCategories)) {
      if (categoryLevel === 'HIGH') factors.push(`${category} risk rated HIGH`);
    }
  }

  if (payloads.compliance && complianceScore !== undefined && complianceScore < 0.4) {
    level = 'HIGH';
    factors.push('Low compliance score');
  }

  return { level, factors, mitigationRequired: level !== 'LOW' };
}

export class DecisionEngine {
  private weights: Readonly<WeightMap>;
  private readonly tolerance: number;
  private readonly logger: Logger;
  private readonly eventBus?: EventBus;

  constructor(config: DecisionEngineConfig = {}) {
    this.tolerance = config.tolerance ?? DEFAULT_WEIGHT_TOLERANCE;
    this.weights = Object.freeze(assertValidWeights(config.weights ?? DEFAULT_WEIGHTS, this.tolerance));
    this.logger = config.logger ?? createLogger('DecisionEngine');
    this.eventBus = config.eventBus;
  }

  getWeights(): Readonly<WeightMap> {
    return this.weights;
  }

  /** Replace the default weight map. Throws ConfigurationError unless the values sum to 1.0. */
  updateWeights(weights: Readonly<Record<string, number | undefined>>): void {
    const next = Object.freeze(assertValidWeights(weights, this.tolerance));
    this.weights = next;
    this.logger.info('Weights updated', { weights: next });
    this.eventBus?.emit(createDomainEvent('WeightsUpdated', 'DecisionSynthesis', { weights: next }));
  }

  /**
   * Build the Recommendation for a run whose dispatched pillars have all
   * settled. Never throws: a run without any usable result yields a degraded
   * REVIEW_REQUIRED recommendation.
   */
  synthesize(run: OrchestrationRun, weights: Readonly<WeightMap> = this.weights): Recommendation {
    const scores = extractScores(run);
    const payloads = usablePayloads(run);
    const total = run.pillars.length;
    const succeeded = run.pillars.filter(p => run.results[p]?.status === 'success').length;
    const degraded = succeeded === 0;

    const overallScore = degraded ? NEUTRAL_SCORE : weightedScore(run.pillars, scores, weights);
    const category = degraded ? 'REVIEW_REQUIRED' : classify(overallScore);
    const confidence = degraded
      ? 0
      : computeConfidence(run.pillars.map(p => scores[p] ?? NEUTRAL_SCORE), succeeded / total);

    const recommendation: Recommendation = {
      overallScore,
      category,
      confidence,
      pillarScores: scores,
      insights: collectInsights(payloads),
      actionItems: buildActionItems(run, scores),
      riskAssessment: assessRisk(payloads, scores.compliance),
      rationale: RATIONALE[category],
      nextSteps: [...NEXT_STEPS[category]],
      degraded,
      basis: { succeeded, total },
      createdAt: new Date(),
    };

    const summary = {
      runId: run.runId,
      category,
      overallScore: Number(overallScore.toFixed(4)),
      confidence: Number(confidence.toFixed(4)),
      succeeded,
      total,
    };
    if (degraded) {
      this.logger.warn('No usable pillar results; issuing degraded recommendation', summary);
    } else {
      this.logger.info('Recommendation issued', summary);
    }
    this.eventBus?.emit(createDomainEvent('RecommendationIssued', 'DecisionSynthesis', summary));

    return recommendation;
  }
}
