// Factory for creating the default heuristic pillar agents by name

import type { PillarAgent, PillarName } from '../types/pillars.js';
import { PILLAR_ORDER } from '../types/pillars.js';
import type { PillarLexicon } from '../config/lexicon.js';
import { FinancePillar } from '../agents/finance-pillar.js';
import { RiskPillar } from '../agents/risk-pillar.js';
import { CompliancePillar } from '../agents/compliance-pillar.js';
import { MarketPillar } from '../agents/market-pillar.js';

const FACTORY: Record<PillarName, (lexicon?: PillarLexicon) => PillarAgent> = {
  finance: (lexicon) => new FinancePillar(lexicon),
  risk: (lexicon) => new RiskPillar(lexicon),
  compliance: (lexicon) => new CompliancePillar(lexicon),
  market: (lexicon) => new MarketPillar(lexicon),
};

export function createPillar(name: PillarName, lexicon?: PillarLexicon): PillarAgent {
  return FACTORY[name](lexicon);
}

export function createDefaultPillars(lexicon?: PillarLexicon): PillarAgent[] {
  return PILLAR_ORDER.map(name => createPillar(name, lexicon));
}
