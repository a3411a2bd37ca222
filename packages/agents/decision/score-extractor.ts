// Score Extractor
// One normalized [0,1] score per pillar. Anything unreadable scores neutral.

import type { PillarName, PillarPayload } from '../types/pillars.js';
import type { AgentResult, OrchestrationRun } from '../types/orchestration.js';
import { clamp, isFiniteNumber, mean } from '../utils/scoring.js';

export const NEUTRAL_SCORE = 0.5;

function scorePayload(payload: PillarPayload): number {
  switch (payload.kind) {
    case 'finance': {
      const metrics = Object.values(payload.metrics).filter(isFiniteNumber);
      if (metrics.length > 0) return mean(metrics);
      return isFiniteNumber(payload.confidence) ? payload.confidence : NEUTRAL_SCORE;
    }
    case 'risk':
      // Inverted: high risk is a low score
      return isFiniteNumber(payload.overallRiskScore) ? 1 - clamp(payload.overallRiskScore) : NEUTRAL_SCORE;
    case 'compliance':
      return isFiniteNumber(payload.overallComplianceScore) ? payload.overallComplianceScore : NEUTRAL_SCORE;
    case 'market':
      return isFiniteNumber(payload.overallMarketScore) ? payload.overallMarketScore : NEUTRAL_SCORE;
    default:
      return NEUTRAL_SCORE;
  }
}

/** Failed, missing or wrong-kind results score NEUTRAL_SCORE */
export function extractPillarScore(pillar: PillarName, result: AgentResult | undefined): number {
  if (!result || result.status !== 'success' || result.payload.kind !== pillar) return NEUTRAL_SCORE;
  return clamp(scorePayload(result.payload));
}

export function extractScores(run: OrchestrationRun): Partial<Record<PillarName, number>> {
  const scores: Partial<Record<PillarName, number>> = {};
  for (const pillar of run.pillars) {
    scores[pillar] = extractPillarScore(pillar, run.results[pillar]);
  }
  return scores;
}
