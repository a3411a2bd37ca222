// Risk pillar: per-category exposure levels, overall risk balance between
// risk and mitigation language, and the top mitigation priorities

import type { PillarLexicon } from '../config/lexicon.js';
import type { RiskLevel, RiskOutcome } from '../types/pillars.js';
import { BasePillarAgent } from './base-pillar.js';
import { countTerms, dominantLevel, mentionsAny, splitSentences } from '../utils/text-signals.js';
import { clamp, round2 } from '../utils/scoring.js';

const RISK_LEVELS = ['HIGH', 'MEDIUM', 'LOW'] as const;
const MAX_PRIORITIES = 3;

export class RiskPillar extends BasePillarAgent<'risk'> {
  constructor(lexicon?: PillarLexicon) {
    super('risk', lexicon);
  }

  protected evaluate(text: string): RiskOutcome {
    const { categories, levels, riskTerms, mitigationTerms, priorities } = this.lexicon.risk;
    const sentences = splitSentences(text);

    // A category nobody mentions is LOW; mentioned without severity language, MEDIUM
    const riskCategories: Record<string, RiskLevel> = {};
    for (const [category, keywords] of Object.entries(categories)) {
      const relevant = sentences.filter(s => mentionsAny(s, keywords));
      riskCategories[category] = relevant.length === 0
        ? 'LOW'
        : dominantLevel(relevant.join('. '), RISK_LEVELS, levels, 'MEDIUM');
    }

    const riskMentions = countTerms(text, riskTerms);
    const mitigationMentions = countTerms(text, mitigationTerms);
    const overallRiskScore = riskMentions + mitigationMentions === 0
      ? 0.5
      : round2(clamp(riskMentions / (riskMentions + mitigationMentions), 0.1, 0.9));

    const matched = Object.entries(priorities)
      .filter(([, triggers]) => mentionsAny(text, triggers))
      .map(([label]) => label)
      .slice(0, MAX_PRIORITIES);
    const mitigationPriority = matched.length > 0 ? matched : ['General Risk Monitoring'];

    const high = Object.entries(riskCategories)
      .filter(([, level]) => level === 'HIGH')
      .map(([category]) => category);

    return {
      kind: 'risk',
      overallRiskScore,
      riskCategories,
      mitigationPriority,
      confidence: 0.88,
      analysis: `Overall risk ${overallRiskScore.toFixed(2)} from ${riskMentions} risk and ` +
        `${mitigationMentions} mitigation mentions. High exposure: ${high.length > 0 ? high.join(', ') : 'none'}.`,
    };
  }
}
