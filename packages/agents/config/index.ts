export { DEFAULT_SETTINGS, loadSettings } from './settings.js';
export type { Settings, OverflowPolicy } from './settings.js';
export {
  DEFAULT_WEIGHTS, DEFAULT_WEIGHT_TOLERANCE, validateWeights, assertValidWeights, parseWeightSpec,
} from './weights.js';
export { PILLAR_LABELS, PILLAR_DESCRIPTIONS, PILLAR_ICONS } from './pillar-mappings.js';
export { loadLexicon, parseLexicon } from './lexicon.js';
export type { PillarLexicon } from './lexicon.js';
