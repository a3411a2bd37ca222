// Orchestration Run aggregate
// One scenario dispatched across the requested pillars

import type { PillarError, PillarName, PillarPayload } from './pillars.js';

export type WeightMap = Partial<Record<PillarName, number>>;

export interface ScenarioRequest {
  readonly scenario: string;
  readonly weights?: Readonly<WeightMap>;
  readonly pillars?: readonly PillarName[];   // focus filter; all configured pillars when omitted
}

export type RunStatus = 'pending' | 'running' | 'aggregating' | 'done' | 'failed';

interface AgentResultBase {
  readonly pillar: PillarName;
  readonly durationMs: number;
  readonly startedAt: Date;
  readonly completedAt: Date;
}

export interface SucceededAgentResult extends AgentResultBase {
  readonly status: 'success';
  readonly payload: PillarPayload;
}

export interface FailedAgentResult extends AgentResultBase {
  readonly status: 'failed';
  readonly error: PillarError;
}

export type AgentResult = SucceededAgentResult | FailedAgentResult;

export interface OrchestrationRun {
  readonly runId: string;
  readonly request: ScenarioRequest;
  readonly pillars: readonly PillarName[];
  results: Partial<Record<PillarName, AgentResult>>;
  status: RunStatus;
  startedAt: Date;
  completedAt?: Date;
  succeeded: number;
  total: number;
  cancelled: boolean;
}

export interface RunOptions {
  /** Caller-initiated cancellation, propagated to every running pillar */
  signal?: AbortSignal;
  /** Per-pillar deadline override in ms; 0 disables */
  pillarTimeoutMs?: number;
}
