import { ConfigurationError, PillarDecisionError } from "@pillar-decision/agents";

export interface ToolResponse {
  [key: string]: unknown;
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
}

function errorBody(err: Error): Record<string, unknown> {
  if (err instanceof PillarDecisionError) {
    return {
      error: err.message,
      code: err.code,
      ...(err instanceof ConfigurationError ? { issues: err.issues } : {}),
    };
  }
  return { error: err.message };
}

export function wrapResponse(result: unknown): ToolResponse {
  if (result instanceof Error) {
    return {
      content: [{ type: "text" as const, text: JSON.stringify(errorBody(result)) }],
      isError: true,
    };
  }
  const text = typeof result === "string" ? result : JSON.stringify(result, null, 2);
  return {
    content: [{ type: "text" as const, text }],
  };
}
