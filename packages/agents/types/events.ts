// Domain events for observers, and the progress events a streaming run emits

import { randomUUID } from 'node:crypto';
import type { PillarError, PillarName } from './pillars.js';
import type { AgentResult, OrchestrationRun } from './orchestration.js';
import type { Recommendation } from './decision.js';

export type DomainEventType =
  // Orchestration
  | 'RunRequested'
  | 'RunStarted'
  | 'PillarDispatched'
  | 'PillarSucceeded'
  | 'PillarFailed'
  | 'RunAggregated'
  | 'RunCompleted'
  | 'RunFailed'
  | 'StreamEventDropped'
  // Decision
  | 'RecommendationIssued'
  | 'WeightsUpdated';

export const DOMAIN_EVENT_TYPES: readonly DomainEventType[] = [
  'RunRequested', 'RunStarted', 'PillarDispatched', 'PillarSucceeded', 'PillarFailed',
  'RunAggregated', 'RunCompleted', 'RunFailed', 'StreamEventDropped',
  'RecommendationIssued', 'WeightsUpdated',
];

export interface DomainEvent<T = unknown> {
  eventId: string;
  type: DomainEventType;
  timestamp: Date;
  sourceContext: 'Orchestration' | 'DecisionSynthesis';
  payload: T;
}

export function createDomainEvent<T>(
  type: DomainEventType,
  sourceContext: DomainEvent['sourceContext'],
  payload: T,
): DomainEvent<T> {
  return { eventId: randomUUID(), type, timestamp: new Date(), sourceContext, payload };
}

export interface EventBus {
  emit(event: DomainEvent): void;
  on(type: DomainEventType, handler: (event: DomainEvent) => void): void;
  off(type: DomainEventType, handler: (event: DomainEvent) => void): void;
}

// Simple in-process event bus implementation
export class SimpleEventBus implements EventBus {
  private handlers = new Map<DomainEventType, Set<(event: DomainEvent) => void>>();

  constructor(private readonly onHandlerError?: (err: unknown, event: DomainEvent) => void) {}

  emit(event: DomainEvent): void {
    const typeHandlers = this.handlers.get(event.type);
    if (!typeHandlers) return;
    for (const handler of typeHandlers) {
      try {
        handler(event);
      } catch (err) {
        this.onHandlerError?.(err, event);
      }
    }
  }

  on(type: DomainEventType, handler: (event: DomainEvent) => void): void {
    let typeHandlers = this.handlers.get(type);
    if (!typeHandlers) {
      typeHandlers = new Set();
      this.handlers.set(type, typeHandlers);
    }
    typeHandlers.add(handler);
  }

  off(type: DomainEventType, handler: (event: DomainEvent) => void): void {
    this.handlers.get(type)?.delete(handler);
  }
}

// ── Streaming progress events ───────────────────────────────────────

export type RunEventKind =
  | 'run_started'
  | 'pillar_started'
  | 'pillar_completed'
  | 'pillar_failed'
  | 'run_completed';

interface RunEventBase {
  readonly runId: string;
  readonly timestamp: Date;
}

export interface RunStartedEvent extends RunEventBase {
  readonly kind: 'run_started';
  readonly pillars: readonly PillarName[];
}

export interface PillarStartedEvent extends RunEventBase {
  readonly kind: 'pillar_started';
  readonly pillar: PillarName;
}

export interface PillarCompletedEvent extends RunEventBase {
  readonly kind: 'pillar_completed';
  readonly pillar: PillarName;
  readonly result: AgentResult;
}

export interface PillarFailedEvent extends RunEventBase {
  readonly kind: 'pillar_failed';
  readonly pillar: PillarName;
  readonly error: PillarError;
  readonly result: AgentResult;
}

export interface RunCompletedEvent extends RunEventBase {
  readonly kind: 'run_completed';
  readonly run: OrchestrationRun;
  readonly recommendation: Recommendation;
}

export type RunEvent =
  | RunStartedEvent
  | PillarStartedEvent
  | PillarCompletedEvent
  | PillarFailedEvent
  | RunCompletedEvent;
