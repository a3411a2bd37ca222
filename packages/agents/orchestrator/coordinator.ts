// Orchestrator: dispatches one scenario to the pillar agents, isolates
// their failures, and assembles the run record the Decision Engine reads.
// Batch mode runs pillars concurrently; streaming mode runs them in order
// and reports progress as events.

import { randomUUID } from 'node:crypto';
import type { PillarAgent, PillarName } from '../types/pillars.js';
import { PILLAR_ORDER, isPillarName } from '../types/pillars.js';
import type {
  AgentResult, OrchestrationRun, RunOptions, ScenarioRequest, WeightMap,
} from '../types/orchestration.js';
import type { Recommendation } from '../types/decision.js';
import {
  DOMAIN_EVENT_TYPES, SimpleEventBus, createDomainEvent,
  type DomainEventType, type EventBus, type RunEvent,
} from '../types/events.js';
import { DEFAULT_SETTINGS, type Settings } from '../config/settings.js';
import { validateWeights } from '../config/weights.js';
import { DecisionEngine } from '../decision/decision-engine.js';
import { ConfigurationError, OrchestrationExhaustionError, toErrorMessage } from '../utils/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { createDefaultPillars } from './pillar-factory.js';
import { EventChannel } from './event-channel.js';
import { guardPillar } from './pillar-guard.js';

export interface OrchestratorConfig {
  /** Defaults to the four heuristic pillars */
  agents?: readonly PillarAgent[];
  decisionEngine?: DecisionEngine;
  settings?: Settings;
  logger?: Logger;
  onEvent?: (event: { type: DomainEventType; payload: unknown }) => void;
}

export interface AnalysisResponse {
  run: OrchestrationRun;
  recommendation: Recommendation;
}

interface Dispatch {
  request: ScenarioRequest;
  agents: PillarAgent[];
}

export class Orchestrator {
  private readonly agents: ReadonlyMap<PillarName, PillarAgent>;
  private readonly engine: DecisionEngine;
  private readonly settings: Settings;
  private readonly logger: Logger;
  private readonly eventBus: EventBus;

  constructor(config: OrchestratorConfig = {}) {
    this.settings = config.settings ?? DEFAULT_SETTINGS;
    this.logger = config.logger ?? createLogger('Orchestrator', this.settings.logLevel);
    this.eventBus = new SimpleEventBus((err, event) => {
      this.logger.warn('Event observer failed', { type: event.type, error: toErrorMessage(err) });
    });

    const agents = new Map<PillarName, PillarAgent>();
    const duplicates: string[] = [];
    for (const agent of config.agents ?? createDefaultPillars()) {
      if (agents.has(agent.pillar)) duplicates.push(`pillar "${agent.pillar}" is configured more than once`);
      agents.set(agent.pillar, agent);
    }
    if (duplicates.length > 0) throw new ConfigurationError(duplicates);
    this.agents = agents;

    this.engine = config.decisionEngine ?? new DecisionEngine({
      weights: this.settings.defaultWeights,
      tolerance: this.settings.weightTolerance,
      logger: createLogger('DecisionEngine', this.settings.logLevel),
      eventBus: this.eventBus,
    });

    if (config.onEvent) {
      const handler = config.onEvent;
      for (const type of DOMAIN_EVENT_TYPES) {
        this.eventBus.on(type, (e) => handler({ type: e.type, payload: e.payload }));
      }
    }
  }

  /** Configured pillars in iteration order */
  get pillars(): PillarName[] {
    return PILLAR_ORDER.filter(p => this.agents.has(p));
  }

  get decisionEngine(): DecisionEngine {
    return this.engine;
  }

  /**
   * Check a request against the configured pillars and settings. Returns a
   * frozen copy with the focus filter normalized to iteration order.
   * Throws ConfigurationError listing every problem.
   */
  validateRequest(input: ScenarioRequest): ScenarioRequest {
    const issues: string[] = [];
    const { scenarioMinLength: min, scenarioMaxLength: max } = this.settings;

    if (typeof input.scenario !== 'string') {
      issues.push('scenario must be a string');
    } else if (input.scenario.length < min || input.scenario.length > max) {
      issues.push(`scenario must be between ${min} and ${max} characters (got ${input.scenario.length})`);
    }

    let weights: WeightMap | undefined;
    if (input.weights !== undefined) {
      const weightIssues = validateWeights(input.weights, this.settings.weightTolerance);
      issues.push(...weightIssues);
      if (weightIssues.length === 0) weights = Object.freeze({ ...input.weights });
    }

    let pillars: PillarName[] | undefined;
    if (input.pillars !== undefined) {
      const requested = new Set<PillarName>();
      for (const name of input.pillars) {
        if (!isPillarName(name)) {
          issues.push(`unknown pillar "${name}"`);
        } else if (!this.agents.has(name)) {
          issues.push(`pillar "${name}" is not configured`);
        } else {
          requested.add(name);
        }
      }
      pillars = PILLAR_ORDER.filter(p => requested.has(p));
    }

    if (issues.length > 0) throw new ConfigurationError(issues);

    return Object.freeze({
      scenario: input.scenario,
      ...(weights ? { weights } : {}),
      ...(pillars ? { pillars: Object.freeze(pillars) } : {}),
    });
  }

  /** Run every requested pillar concurrently and wait for all of them to settle */
  async run(input: ScenarioRequest, options: RunOptions = {}): Promise<OrchestrationRun> {
    const { request, agents } = this.prepare(input);
    const run = this.createRun(request, agents);
    const timeoutMs = options.pillarTimeoutMs ?? this.settings.pillarTimeoutMs;

    this.start(run);
    const results = await Promise.all(agents.map(agent => {
      this.emit('PillarDispatched', { runId: run.runId, pillar: agent.pillar });
      return guardPillar(agent, request.scenario, { runId: run.runId, timeoutMs, signal: options.signal });
    }));
    for (const result of results) this.record(run, result);

    this.finish(run, options.signal?.aborted ?? false);
    this.complete(run);
    return run;
  }

  /** Batch run followed by synthesis with the request's weights (or the engine defaults) */
  async analyze(input: ScenarioRequest, options: RunOptions = {}): Promise<AnalysisResponse> {
    const run = await this.run(input, options);
    const recommendation = this.engine.synthesize(run, run.request.weights ?? this.engine.getWeights());
    return { run, recommendation };
  }

  /**
   * Stream a run as progress events: run_started, then pillar_started and
   * pillar_completed or pillar_failed for each pillar in iteration order,
   * then run_completed. Pillars run one at a time.
   *
   * Validation and exhaustion errors are thrown here, synchronously. The
   * pipeline itself starts when the first event is pulled; leaving the loop
   * early aborts it.
   */
  runWithUpdates(input: ScenarioRequest, options: RunOptions = {}): AsyncGenerator<RunEvent, void, undefined> {
    const dispatch = this.prepare(input);
    return this.stream(dispatch, options);
  }

  // ── internals ─────────────────────────────────────────────────────

  private prepare(input: ScenarioRequest): Dispatch {
    const request = this.validateRequest(input);
    const names = request.pillars ?? this.pillars;
    const agents = names.flatMap(name => {
      const agent = this.agents.get(name);
      return agent ? [agent] : [];
    });

    this.emit('RunRequested', { pillars: names, weights: request.weights });

    if (agents.length === 0) {
      const run = this.createRun(request, agents);
      run.status = 'failed';
      run.completedAt = new Date();
      this.logger.error('No pillar could be dispatched', { runId: run.runId });
      this.emit('RunFailed', { runId: run.runId, reason: 'no pillars to dispatch' });
      throw new OrchestrationExhaustionError(run);
    }
    return { request, agents };
  }

  private createRun(request: ScenarioRequest, agents: readonly PillarAgent[]): OrchestrationRun {
    return {
      runId: randomUUID(),
      request,
      pillars: agents.map(a => a.pillar),
      results: {},
      status: 'pending',
      startedAt: new Date(),
      succeeded: 0,
      total: agents.length,
      cancelled: false,
    };
  }

  private start(run: OrchestrationRun): void {
    run.status = 'running';
    this.logger.info('Dispatching scenario', { runId: run.runId, pillars: run.pillars });
    this.emit('RunStarted', { runId: run.runId, pillars: run.pillars });
  }

  private record(run: OrchestrationRun, result: AgentResult): void {
    run.results[result.pillar] = result;
    if (result.status === 'success') {
      run.succeeded++;
      this.emit('PillarSucceeded', { runId: run.runId, pillar: result.pillar, durationMs: result.durationMs });
      return;
    }
    this.logger.warn(`Pillar ${result.pillar} failed`, {
      runId: run.runId,
      code: result.error.code,
      message: result.error.message,
    });
    this.emit('PillarFailed', { runId: run.runId, pillar: result.pillar, error: result.error });
  }

  /** Move to aggregating once every dispatched pillar has a terminal result */
  private finish(run: OrchestrationRun, cancelled: boolean): void {
    run.status = 'aggregating';
    run.cancelled = cancelled;
    run.completedAt = new Date();
    this.emit('RunAggregated', { runId: run.runId, succeeded: run.succeeded, total: run.total });
  }

  private complete(run: OrchestrationRun): void {
    run.status = 'done';
    const summary = {
      runId: run.runId,
      succeeded: run.succeeded,
      total: run.total,
      cancelled: run.cancelled,
      durationMs: (run.completedAt ?? new Date()).getTime() - run.startedAt.getTime(),
    };
    this.logger.info('Run completed', summary);
    this.emit('RunCompleted', summary);
  }

  private async *stream(
    { request, agents }: Dispatch,
    options: RunOptions,
  ): AsyncGenerator<RunEvent, void, undefined> {
    const channel = new EventChannel<RunEvent>(this.settings.streamBufferSize, this.settings.streamOverflow);
    const abort = new AbortController();
    const onCallerAbort = (): void => abort.abort();
    options.signal?.addEventListener('abort', onCallerAbort, { once: true });
    if (options.signal?.aborted) abort.abort();

    const producer = this.produce(request, agents, channel, abort.signal, options)
      .then(() => channel.close(), (err: unknown) => channel.fail(err));

    try {
      for await (const event of channel) yield event;
    } finally {
      abort.abort();
      channel.close();
      await producer;
      options.signal?.removeEventListener('abort', onCallerAbort);
    }
  }

  private async produce(
    request: ScenarioRequest,
    agents: readonly PillarAgent[],
    channel: EventChannel<RunEvent>,
    signal: AbortSignal,
    options: RunOptions,
  ): Promise<void> {
    const run = this.createRun(request, agents);
    const timeoutMs = options.pillarTimeoutMs ?? this.settings.pillarTimeoutMs;
    const { runId } = run;

    const send = async (event: RunEvent): Promise<void> => {
      const accepted = await channel.send(event);
      if (!accepted && !channel.isClosed) {
        this.logger.warn('Stream event dropped', { runId, kind: event.kind });
        this.emit('StreamEventDropped', { runId, kind: event.kind });
      }
    };

    this.start(run);
    await send({ kind: 'run_started', runId, timestamp: new Date(), pillars: run.pillars });

    for (const agent of agents) {
      const { pillar } = agent;
      await send({ kind: 'pillar_started', runId, timestamp: new Date(), pillar });
      this.emit('PillarDispatched', { runId, pillar });

      // An aborted signal makes the guard report CANCELLED without invoking the agent
      const result = await guardPillar(agent, request.scenario, { runId, timeoutMs, signal });
      this.record(run, result);

      await send(result.status === 'success'
        ? { kind: 'pillar_completed', runId, timestamp: new Date(), pillar, result }
        : { kind: 'pillar_failed', runId, timestamp: new Date(), pillar, error: result.error, result });
    }

    this.finish(run, signal.aborted);
    const recommendation = this.engine.synthesize(run, request.weights ?? this.engine.getWeights());
    this.complete(run);

    // The final event is never dropped
    await channel.send({ kind: 'run_completed', runId, timestamp: new Date(), run, recommendation }, 'block');
  }

  private emit(type: DomainEventType, payload: Record<string, unknown>): void {
    this.eventBus.emit(createDomainEvent(type, 'Orchestration', payload));
  }
}
