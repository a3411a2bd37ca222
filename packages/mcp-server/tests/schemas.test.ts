import { describe, it, expect } from 'vitest';
import {
  AnalyzeScenarioSchema, PillarNameSchema, ValidateWeightsSchema, WeightsSchema,
} from '../src/schemas/scenario.js';

describe('Scenario schemas', () => {
  it('coerces numeric strings in weights and timeout', () => {
    const parsed = AnalyzeScenarioSchema.parse({
      scenario: 'Open a bakery',
      weights: { finance: '0.5', risk: 0.5 },
      timeout_ms: '250',
    });
    expect(parsed.weights).toEqual({ finance: 0.5, risk: 0.5 });
    expect(parsed.timeout_ms).toBe(250);
  });

  it('leaves absent weights out', () => {
    expect(WeightsSchema.parse({ market: 1 })).toEqual({ market: 1 });
  });

  it('rejects unknown weight keys and pillar names', () => {
    expect(WeightsSchema.safeParse({ profit: 1 }).success).toBe(false);
    expect(PillarNameSchema.safeParse('legal').success).toBe(false);
    expect(AnalyzeScenarioSchema.safeParse({ scenario: 'x', pillars: ['finance', 'legal'] }).success).toBe(false);
  });

  it('rejects negative weights and timeouts', () => {
    expect(WeightsSchema.safeParse({ finance: -0.1 }).success).toBe(false);
    expect(AnalyzeScenarioSchema.safeParse({ scenario: 'x', timeout_ms: -1 }).success).toBe(false);
  });

  it('requires a boolean apply flag', () => {
    expect(ValidateWeightsSchema.safeParse({ weights: { finance: 1 }, apply: 'yes' }).success).toBe(false);
    expect(ValidateWeightsSchema.parse({ weights: { finance: 1 }, apply: true }).apply).toBe(true);
  });
});
