// Recommendation value object, derived purely from an OrchestrationRun

import type { PillarName, RiskLevel } from './pillars.js';

export type RecommendationCategory =
  | 'STRONGLY_RECOMMEND'
  | 'RECOMMEND'
  | 'CONDITIONAL'
  | 'CAUTION'
  | 'NOT_RECOMMENDED';

/** Degraded outcome when no pillar produced a usable result */
export type DegradedCategory = 'REVIEW_REQUIRED';

export type InsightKind = 'risk' | 'gap' | 'concern' | 'opportunity';

export interface Insight {
  readonly pillar: PillarName;
  readonly kind: InsightKind;
  readonly message: string;
  readonly priority: number;   // higher ranks first
}

export interface ActionItem {
  readonly priority: number;   // 1 = most urgent
  readonly pillar?: PillarName;
  readonly action: string;
}

export interface RiskAssessment {
  readonly level: RiskLevel;
  readonly factors: string[];
  readonly mitigationRequired: boolean;
}

export interface Recommendation {
  readonly overallScore: number;
  readonly category: RecommendationCategory | DegradedCategory;
  readonly confidence: number;
  readonly pillarScores: Partial<Record<PillarName, number>>;
  readonly insights: Insight[];
  readonly actionItems: ActionItem[];
  readonly riskAssessment: RiskAssessment;
  readonly rationale: string;
  readonly nextSteps: string[];
  readonly degraded: boolean;
  readonly basis: { readonly succeeded: number; readonly total: number };
  readonly createdAt: Date;
}
