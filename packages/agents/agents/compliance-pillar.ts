// Compliance pillar: keyword density per regulatory area, overall
// compliance posture, gaps and applicable regulations

import type { PillarLexicon } from '../config/lexicon.js';
import type { ComplianceOutcome } from '../types/pillars.js';
import { BasePillarAgent } from './base-pillar.js';
import { mentionsAny, presentTerms } from '../utils/text-signals.js';
import { mean, round2 } from '../utils/scoring.js';

const GAP_THRESHOLD = 0.6;
const MAX_ACTIONS = 5;

const GENERAL_ACTIONS = [
  'Establish a compliance monitoring framework',
  'Schedule regular compliance audits',
  'Train staff on applicable regulations',
];

export class CompliancePillar extends BasePillarAgent<'compliance'> {
  constructor(lexicon?: PillarLexicon) {
    super('compliance', lexicon);
  }

  protected evaluate(text: string): ComplianceOutcome {
    const { areas, regulations } = this.lexicon.compliance;

    const areaScores: Record<string, number> = {};
    const complianceGaps: string[] = [];
    const targeted: string[] = [];

    for (const area of areas) {
      const score = round2(Math.min(presentTerms(text, area.keywords) / area.keywords.length, 1));
      areaScores[area.key] = score;
      if (score > GAP_THRESHOLD) complianceGaps.push(`${area.label} (risk ${score.toFixed(2)})`);
      if (score > 0.7) {
        targeted.push(`Immediate compliance review required for ${area.label}`);
      } else if (score > 0.5) {
        targeted.push(`Monitor ${area.label} compliance closely`);
      }
    }

    const scores = Object.values(areaScores);
    const overallComplianceScore = round2(Math.max(1 - mean(scores.map(s => s * s)), 0.1));

    const matched = Object.entries(regulations)
      .filter(([, triggers]) => mentionsAny(text, triggers))
      .map(([label]) => label);
    const regulatoryRequirements = matched.length > 0 ? matched : ['General Business Regulations'];

    return {
      kind: 'compliance',
      overallComplianceScore,
      areaScores,
      regulatoryRequirements,
      complianceGaps,
      recommendedActions: [...targeted, ...GENERAL_ACTIONS].slice(0, MAX_ACTIONS),
      confidence: 0.8,
      analysis: `Compliance posture ${overallComplianceScore.toFixed(2)} across ${areas.length} areas; ` +
        `${complianceGaps.length} gap(s) above ${GAP_THRESHOLD} risk.`,
    };
  }
}
