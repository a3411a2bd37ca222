// Display metadata for the four pillars

import type { PillarName } from '../types/pillars.js';

export const PILLAR_LABELS: Record<PillarName, string> = {
  finance: 'Finance',
  risk: 'Risk',
  compliance: 'Compliance',
  market: 'Market',
};

export const PILLAR_DESCRIPTIONS: Record<PillarName, string> = {
  finance: 'Financial viability: revenue potential, cost structure, ROI and funding requirements',
  risk: 'Identifies and quantifies financial, operational, market, technical and strategic risks',
  compliance: 'Regulatory and legal landscape: data protection, financial regulation, AML, IP and labour law',
  market: 'Market dynamics: size, competitive intensity, entry barriers, growth and demand',
};

export const PILLAR_ICONS: Record<PillarName, string> = {
  finance: '💰',
  risk: '🛡️',
  compliance: '⚖️',
  market: '📈',
};
