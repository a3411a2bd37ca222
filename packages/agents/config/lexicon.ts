// Keyword lexicon for the default heuristic pillars, loaded from
// pillar-lexicon.json beside this module and validated once at first use

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ConfigurationError } from '../utils/errors.js';

const Terms = z.array(z.string().min(1)).min(1);
const LevelTerms = z.object({ HIGH: Terms, MEDIUM: Terms, LOW: Terms });
const SizeTerms = z.object({ LARGE: Terms, MEDIUM: Terms, SMALL: Terms });
const TriggerMap = z.record(z.string(), Terms);

const LexiconSchema = z.object({
  finance: z.object({
    metricTriggers: z.object({
      revenuePotential: Terms,
      costEfficiency: Terms,
      roiProjection: Terms,
      fundingRequirement: Terms,
    }),
    positive: Terms,
    negative: Terms,
  }),
  risk: z.object({
    categories: TriggerMap,
    levels: LevelTerms,
    riskTerms: Terms,
    mitigationTerms: Terms,
    priorities: TriggerMap,
  }),
  compliance: z.object({
    areas: z.array(z.object({
      key: z.string().min(1),
      label: z.string().min(1),
      keywords: Terms,
    })).min(1),
    regulations: TriggerMap,
  }),
  market: z.object({
    size: SizeTerms,
    competition: LevelTerms,
    entryBarriers: LevelTerms,
    growth: Terms,
    decline: Terms,
    strongDemand: Terms,
    weakDemand: Terms,
    attractive: Terms,
    unattractive: Terms,
    competitors: TriggerMap,
    growthDrivers: TriggerMap,
    challenges: TriggerMap,
  }),
});

export type PillarLexicon = z.infer<typeof LexiconSchema>;

export function parseLexicon(raw: unknown): PillarLexicon {
  const parsed = LexiconSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map(issue => `lexicon ${issue.path.join('.')}: ${issue.message}`),
    );
  }
  return parsed.data;
}

let cached: PillarLexicon | undefined;

export function loadLexicon(): PillarLexicon {
  if (!cached) {
    const path = fileURLToPath(new URL('./pillar-lexicon.json', import.meta.url));
    cached = parseLexicon(JSON.parse(readFileSync(path, 'utf-8')));
  }
  return cached;
}
