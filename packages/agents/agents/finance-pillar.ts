// Finance pillar: revenue potential, cost efficiency, ROI and funding
// scored from positive vs negative indicator balance

import type { FinanceMetric, FinanceOutcome } from '../types/pillars.js';
import { FINANCE_METRICS } from '../types/pillars.js';
import type { PillarLexicon } from '../config/lexicon.js';
import { BasePillarAgent } from './base-pillar.js';
import { mentionsAny, presentTerms } from '../utils/text-signals.js';
import { round2 } from '../utils/scoring.js';

const METRIC_LABELS: Record<FinanceMetric, string> = {
  revenuePotential: 'revenue potential',
  costEfficiency: 'cost efficiency',
  roiProjection: 'ROI projection',
  fundingRequirement: 'funding requirement',
};

export class FinancePillar extends BasePillarAgent<'finance'> {
  constructor(lexicon?: PillarLexicon) {
    super('finance', lexicon);
  }

  protected evaluate(text: string): FinanceOutcome {
    const { metricTriggers, positive, negative } = this.lexicon.finance;
    const pos = presentTerms(text, positive);
    const neg = presentTerms(text, negative);

    const indicatorScore = pos > neg
      ? Math.min(0.8 + 0.05 * pos, 1)
      : Math.max(0.3 - 0.05 * neg, 0.1);

    const metrics: Record<FinanceMetric, number> = {
      revenuePotential: 0.5,
      costEfficiency: 0.5,
      roiProjection: 0.5,
      fundingRequirement: 0.5,
    };
    for (const metric of FINANCE_METRICS) {
      if (mentionsAny(text, metricTriggers[metric])) metrics[metric] = round2(indicatorScore);
    }

    const summary = FINANCE_METRICS
      .map(metric => `${METRIC_LABELS[metric]} ${metrics[metric].toFixed(2)}`)
      .join(', ');

    return {
      kind: 'finance',
      metrics,
      confidence: 0.85,
      analysis: `Financial assessment: ${summary} (${pos} positive, ${neg} negative indicators).`,
    };
  }
}
