import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import {
  ConfigurationError,
  OrchestrationExhaustionError,
  PILLAR_DESCRIPTIONS,
  PILLAR_LABELS,
  renderReport,
  validateWeights,
  type Orchestrator,
  type RunEvent,
  type ScenarioRequest,
} from "@pillar-decision/agents";
import {
  AnalyzeScenarioSchema,
  ListPillarsSchema,
  StreamScenarioSchema,
  ValidateWeightsSchema,
  type AnalyzeScenarioInput,
} from "../schemas/scenario.js";
import { wrapResponse, type ToolResponse } from "../formatters/response.js";

export interface ScenarioToolDeps {
  orchestrator: Orchestrator;
  /** Tolerance used when validating weight sums */
  weightTolerance: number;
}

function toRequest(input: AnalyzeScenarioInput): ScenarioRequest {
  return { scenario: input.scenario, weights: input.weights, pillars: input.pillars };
}

/** Configuration and exhaustion errors become isError responses; anything else propagates */
async function guarded(fn: () => Promise<unknown>): Promise<ToolResponse> {
  try {
    return wrapResponse(await fn());
  } catch (err) {
    if (err instanceof ConfigurationError || err instanceof OrchestrationExhaustionError) {
      return wrapResponse(err);
    }
    throw err;
  }
}

export function handleAnalyzeScenario(deps: ScenarioToolDeps, params: unknown): Promise<ToolResponse> {
  return guarded(async () => {
    const input = AnalyzeScenarioSchema.parse(params);
    const { run, recommendation } = await deps.orchestrator.analyze(toRequest(input), {
      pillarTimeoutMs: input.timeout_ms,
    });
    return { run, recommendation, report: renderReport(run, recommendation) };
  });
}

export function handleStreamScenario(deps: ScenarioToolDeps, params: unknown): Promise<ToolResponse> {
  return guarded(async () => {
    const input = StreamScenarioSchema.parse(params);
    const events: RunEvent[] = [];
    for await (const event of deps.orchestrator.runWithUpdates(toRequest(input), {
      pillarTimeoutMs: input.timeout_ms,
    })) {
      events.push(event);
    }
    return { events };
  });
}

export function handleListPillars(deps: ScenarioToolDeps): Promise<ToolResponse> {
  return guarded(async () => {
    const weights = deps.orchestrator.decisionEngine.getWeights();
    return {
      pillars: deps.orchestrator.pillars.map(name => ({
        name,
        label: PILLAR_LABELS[name],
        description: PILLAR_DESCRIPTIONS[name],
        weight: weights[name] ?? 0,
      })),
    };
  });
}

export function handleValidateWeights(deps: ScenarioToolDeps, params: unknown): Promise<ToolResponse> {
  return guarded(async () => {
    const input = ValidateWeightsSchema.parse(params);
    const issues = validateWeights(input.weights, deps.weightTolerance);
    const valid = issues.length === 0;
    if (valid && input.apply) {
      deps.orchestrator.decisionEngine.updateWeights(input.weights);
    }
    return { valid, issues, applied: valid && input.apply === true };
  });
}

export function registerScenarioTools(server: McpServer, deps: ScenarioToolDeps) {
  server.tool(
    "analyze_scenario",
    "Assess a business scenario across the finance, risk, compliance and market pillars. Runs all requested pillars concurrently, tolerates individual pillar failures, and returns the run record, a weighted recommendation (score, category, confidence, insights, action items, risk rollup, rationale, next steps) and a markdown report.",
    AnalyzeScenarioSchema.shape,
    async (params) => handleAnalyzeScenario(deps, params)
  );

  server.tool(
    "stream_scenario",
    "Assess a business scenario one pillar at a time and return the ordered progress events: run_started, pillar_started and pillar_completed or pillar_failed per pillar, then run_completed with the recommendation.",
    StreamScenarioSchema.shape,
    async (params) => handleStreamScenario(deps, params)
  );

  server.tool(
    "list_pillars",
    "List the configured pillars with their descriptions and current default weights.",
    ListPillarsSchema.shape,
    async () => handleListPillars(deps)
  );

  server.tool(
    "validate_weights",
    "Check a per-pillar weight map: known pillars only, non-negative values, sum of 1.0 within tolerance. With apply=true a valid map replaces the server's default weights.",
    ValidateWeightsSchema.shape,
    async (params) => handleValidateWeights(deps, params)
  );
}
