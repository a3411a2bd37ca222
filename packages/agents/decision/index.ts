export {
  DecisionEngine, classify, weightedScore, computeConfidence,
  collectInsights, buildActionItems, assessRisk,
} from './decision-engine.js';
export type { DecisionEngineConfig } from './decision-engine.js';
export { extractPillarScore, extractScores, NEUTRAL_SCORE } from './score-extractor.js';
