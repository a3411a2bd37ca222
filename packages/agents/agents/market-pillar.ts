// Market pillar: size, competitive intensity, entry barriers, growth,
// demand and overall attractiveness

import type { PillarLexicon } from '../config/lexicon.js';
import type { MarketOutcome } from '../types/pillars.js';
import { BasePillarAgent } from './base-pillar.js';
import { dominantLevel, mentionsAny, presentTerms } from '../utils/text-signals.js';
import { clamp, round2 } from '../utils/scoring.js';

const LEVELS = ['HIGH', 'MEDIUM', 'LOW'] as const;
const SIZES = ['LARGE', 'MEDIUM', 'SMALL'] as const;
const MAX_LISTED = 3;

function ratio(favourable: number, unfavourable: number): number {
  const total = favourable + unfavourable;
  return total === 0 ? 0.5 : round2(favourable / total);
}

function triggeredLabels(text: string, map: Record<string, string[]>, fallback: string[]): string[] {
  const labels = Object.entries(map)
    .filter(([, triggers]) => mentionsAny(text, triggers))
    .map(([label]) => label)
    .slice(0, MAX_LISTED);
  return labels.length > 0 ? labels : fallback;
}

export class MarketPillar extends BasePillarAgent<'market'> {
  constructor(lexicon?: PillarLexicon) {
    super('market', lexicon);
  }

  protected evaluate(text: string): MarketOutcome {
    const lex = this.lexicon.market;

    const marketMetrics = {
      marketSizePotential: dominantLevel(text, SIZES, lex.size, 'MEDIUM'),
      competitiveIntensity: dominantLevel(text, LEVELS, lex.competition, 'MEDIUM'),
      growthOpportunity: ratio(presentTerms(text, lex.growth), presentTerms(text, lex.decline)),
      marketEntryDifficulty: dominantLevel(text, LEVELS, lex.entryBarriers, 'MEDIUM'),
      customerDemand: ratio(presentTerms(text, lex.strongDemand), presentTerms(text, lex.weakDemand)),
    };

    const positive = presentTerms(text, lex.attractive);
    const negative = presentTerms(text, lex.unattractive);
    const overallMarketScore = positive + negative === 0
      ? 0.5
      : round2(clamp(positive / (positive + negative), 0.1, 0.9));

    // Competitor keys are themselves the trigger; their values are the competitor names
    const keyCompetitors = Object.entries(lex.competitors)
      .filter(([trigger]) => mentionsAny(text, [trigger]))
      .flatMap(([, names]) => names);
    const competitors = [...new Set(keyCompetitors)].slice(0, MAX_LISTED);

    return {
      kind: 'market',
      overallMarketScore,
      marketMetrics,
      keyCompetitors: competitors.length > 0
        ? competitors
        : ['Established Players', 'New Entrants', 'Substitute Products'],
      growthDrivers: triggeredLabels(text, lex.growthDrivers, ['Market Expansion', 'Customer Adoption']),
      marketChallenges: triggeredLabels(text, lex.challenges, ['Market Competition', 'Customer Acquisition']),
      confidence: 0.87,
      analysis: `Market attractiveness ${overallMarketScore.toFixed(2)}: ${marketMetrics.marketSizePotential} size, ` +
        `${marketMetrics.competitiveIntensity} competition, ${marketMetrics.marketEntryDifficulty} entry barriers.`,
    };
  }
}
