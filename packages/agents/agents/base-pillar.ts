// Base pillar agent
// All default pillars extend this class and implement evaluate()

import { randomUUID } from 'node:crypto';
import type {
  PillarAgent, PillarContext, PillarName, PillarOutcome, PillarPayloads,
} from '../types/pillars.js';
import { failure, success } from '../types/pillars.js';
import { PILLAR_DESCRIPTIONS } from '../config/pillar-mappings.js';
import { loadLexicon, type PillarLexicon } from '../config/lexicon.js';
import { toErrorMessage } from '../utils/errors.js';

export abstract class BasePillarAgent<P extends PillarName> implements PillarAgent {
  readonly agentId: string;
  readonly pillar: P;
  readonly description: string;
  protected readonly lexicon: PillarLexicon;

  constructor(pillar: P, lexicon: PillarLexicon = loadLexicon()) {
    this.agentId = randomUUID();
    this.pillar = pillar;
    this.description = PILLAR_DESCRIPTIONS[pillar];
    this.lexicon = lexicon;
  }

  async analyze(scenario: string, ctx: PillarContext): Promise<PillarOutcome<PillarPayloads[P]>> {
    if (ctx.signal.aborted) {
      return failure('CANCELLED', `${this.pillar} analysis cancelled before start`);
    }
    try {
      const payload = await this.evaluate(scenario.toLowerCase(), ctx);
      if (ctx.signal.aborted) {
        return failure('CANCELLED', `${this.pillar} analysis cancelled`);
      }
      return success(payload);
    } catch (err) {
      return failure('PILLAR_ERROR', `${this.pillar} analysis failed: ${toErrorMessage(err)}`);
    }
  }

  /** Score lowercased scenario text into this pillar's payload */
  protected abstract evaluate(
    text: string,
    ctx: PillarContext,
  ): PillarPayloads[P] | Promise<PillarPayloads[P]>;
}
