import { z } from "zod";

export const PillarNameSchema = z
  .enum(["finance", "risk", "compliance", "market"])
  .describe("Pillar name");

export const WeightsSchema = z
  .object({
    finance: z.coerce.number().min(0).optional().describe("Finance pillar weight (0-1)"),
    risk: z.coerce.number().min(0).optional().describe("Risk pillar weight (0-1)"),
    compliance: z.coerce.number().min(0).optional().describe("Compliance pillar weight (0-1)"),
    market: z.coerce.number().min(0).optional().describe("Market pillar weight (0-1)"),
  })
  .strict()
  .describe("Per-pillar weights; values must sum to 1.0");

export const AnalyzeScenarioSchema = z.object({
  scenario: z.string().describe("Business scenario to assess (50-5000 characters by default)"),
  weights: WeightsSchema.optional(),
  pillars: z.array(PillarNameSchema).optional().describe("Only run these pillars"),
  timeout_ms: z.coerce.number().int().min(0).optional().describe("Per-pillar deadline in ms; 0 disables"),
});

export const StreamScenarioSchema = AnalyzeScenarioSchema;

export const ListPillarsSchema = z.object({});

export const ValidateWeightsSchema = z.object({
  weights: WeightsSchema,
  apply: z.boolean().optional().describe("Replace the server's default weights when valid"),
});

export type AnalyzeScenarioInput = z.infer<typeof AnalyzeScenarioSchema>;
export type ValidateWeightsInput = z.infer<typeof ValidateWeightsSchema>;
