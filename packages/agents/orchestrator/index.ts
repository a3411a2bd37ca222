export { Orchestrator } from './coordinator.js';
export type { OrchestratorConfig, AnalysisResponse } from './coordinator.js';
export { createPillar, createDefaultPillars } from './pillar-factory.js';
export { guardPillar, checkOutcome, cancelledResult } from './pillar-guard.js';
export type { GuardOptions } from './pillar-guard.js';
export { EventChannel } from './event-channel.js';
