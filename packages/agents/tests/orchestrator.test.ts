import { describe, it, expect } from 'vitest';
import { Orchestrator } from '../orchestrator/coordinator.js';
import type { ScenarioRequest } from '../types/orchestration.js';
import type { DomainEventType } from '../types/events.js';
import { PILLAR_ORDER, success } from '../types/pillars.js';
import { ConfigurationError, OrchestrationExhaustionError } from '../utils/errors.js';
import { silentLogger } from '../utils/logger.js';
import {
  SCENARIO, ScriptedPillar, allSucceeding, defaultPayload, deferred, failing, hanging,
  recordingLogger, stuck, succeeding, testSettings, throwing,
} from './helpers.js';

function request(overrides: Partial<ScenarioRequest> = {}): ScenarioRequest {
  return { scenario: SCENARIO, ...overrides };
}

describe('Orchestrator.run', () => {
  it('collects a success result from every pillar', async () => {
    const orchestrator = new Orchestrator({ agents: allSucceeding(), logger: silentLogger, settings: testSettings() });
    const run = await orchestrator.run(request());

    expect(run.status).toBe('done');
    expect(run.pillars).toEqual(['finance', 'risk', 'compliance', 'market']);
    expect(run.succeeded).toBe(4);
    expect(run.total).toBe(4);
    expect(run.cancelled).toBe(false);
    expect(run.completedAt).toBeInstanceOf(Date);
    expect(PILLAR_ORDER.map(p => run.results[p]?.status)).toEqual(['success', 'success', 'success', 'success']);
  });

  it('dispatches every pillar before any of them settles', async () => {
    const gate = deferred<void>();
    const agents = PILLAR_ORDER.map(pillar => new ScriptedPillar(pillar, async () => {
      await gate.promise;
      return success(defaultPayload(pillar));
    }));
    const orchestrator = new Orchestrator({ agents, logger: silentLogger, settings: testSettings() });

    const pending = orchestrator.run(request());
    expect(agents.map(a => a.calls.length)).toEqual([1, 1, 1, 1]);

    gate.resolve();
    expect((await pending).succeeded).toBe(4);
  });

  it('isolates a failing pillar and logs it', async () => {
    const logger = recordingLogger();
    const agents = [failing('finance'), succeeding('risk'), succeeding('compliance'), succeeding('market')];
    const orchestrator = new Orchestrator({ agents, logger, settings: testSettings() });

    const { run, recommendation } = await orchestrator.analyze(request());

    expect(run.status).toBe('done');
    expect(run.succeeded).toBe(3);
    const finance = run.results.finance;
    expect(finance?.status === 'failed' && finance.error).toEqual({ code: 'PILLAR_ERROR', message: 'finance unavailable' });
    expect(recommendation.pillarScores.finance).toBe(0.5);
    expect(recommendation.basis).toEqual({ succeeded: 3, total: 4 });
    expect(logger.entries.find(e => e.level === 'warn')).toEqual({
      level: 'warn',
      message: 'Pillar finance failed',
      data: { runId: run.runId, code: 'PILLAR_ERROR', message: 'finance unavailable' },
    });
  });

  it('turns a thrown error into a failed result', async () => {
    const agents = [succeeding('finance'), throwing('risk')];
    const orchestrator = new Orchestrator({ agents, logger: silentLogger, settings: testSettings() });
    const run = await orchestrator.run(request());

    const risk = run.results.risk;
    expect(risk?.status === 'failed' && risk.error).toEqual({ code: 'PILLAR_ERROR', message: 'risk threw: boom' });
    expect(run.succeeded).toBe(1);
  });

  it('times out a stuck pillar while the others succeed', async () => {
    const agents = [succeeding('finance'), succeeding('risk'), stuck('compliance'), succeeding('market')];
    const orchestrator = new Orchestrator({ agents, logger: silentLogger, settings: testSettings({ pillarTimeoutMs: 30 }) });
    const run = await orchestrator.run(request());

    const compliance = run.results.compliance;
    expect(compliance?.status === 'failed' && compliance.error).toEqual({
      code: 'TIMEOUT',
      message: 'compliance exceeded the 30ms deadline',
    });
    expect(run.succeeded).toBe(3);
    expect(run.status).toBe('done');
  });

  it('lets a run option override the deadline', async () => {
    const orchestrator = new Orchestrator({ agents: [stuck('market')], logger: silentLogger, settings: testSettings() });
    const run = await orchestrator.run(request(), { pillarTimeoutMs: 10 });

    const market = run.results.market;
    expect(market?.status === 'failed' && market.error.message).toBe('market exceeded the 10ms deadline');
  });

  it('completes a cancelled run with CANCELLED results', async () => {
    const agents = PILLAR_ORDER.map(pillar => hanging(pillar));
    const orchestrator = new Orchestrator({ agents, logger: silentLogger, settings: testSettings() });
    const controller = new AbortController();

    const pending = orchestrator.analyze(request(), { signal: controller.signal });
    controller.abort();
    const { run, recommendation } = await pending;

    expect(run.status).toBe('done');
    expect(run.cancelled).toBe(true);
    expect(run.succeeded).toBe(0);
    expect(PILLAR_ORDER.map(p => {
      const result = run.results[p];
      return result?.status === 'failed' ? result.error.message : undefined;
    })).toEqual([
      'finance cancelled by caller',
      'risk cancelled by caller',
      'compliance cancelled by caller',
      'market cancelled by caller',
    ]);
    expect(recommendation.category).toBe('REVIEW_REQUIRED');
  });

  it('never invokes agents for an already aborted signal', async () => {
    const agents = allSucceeding();
    const orchestrator = new Orchestrator({ agents, logger: silentLogger, settings: testSettings() });
    const controller = new AbortController();
    controller.abort();

    const run = await orchestrator.run(request(), { signal: controller.signal });

    expect(agents.every(a => a.calls.length === 0)).toBe(true);
    expect(run.cancelled).toBe(true);
    const finance = run.results.finance;
    expect(finance?.status === 'failed' && finance.error.code).toBe('CANCELLED');
  });

  it('runs only the focus pillars, in iteration order', async () => {
    const agents = allSucceeding();
    const orchestrator = new Orchestrator({ agents, logger: silentLogger, settings: testSettings() });
    const run = await orchestrator.run(request({ pillars: ['market', 'finance'] }));

    expect(run.pillars).toEqual(['finance', 'market']);
    expect(run.total).toBe(2);
    expect(agents.map(a => a.calls.length)).toEqual([1, 0, 0, 1]);
  });
});

describe('Orchestrator request validation', () => {
  it('rejects invalid weights before dispatching anything', async () => {
    const agents = allSucceeding();
    const orchestrator = new Orchestrator({ agents, logger: silentLogger, settings: testSettings() });

    await expect(orchestrator.run(request({ weights: { finance: 0.9 } }))).rejects.toThrow(ConfigurationError);
    expect(agents.every(a => a.calls.length === 0)).toBe(true);
  });

  it('reports every problem at once', () => {
    const orchestrator = new Orchestrator({ agents: [succeeding('finance')], logger: silentLogger, settings: testSettings() });
    const input: ScenarioRequest = JSON.parse('{"scenario": "too short", "weights": {"finance": 2}, "pillars": ["legal", "market"]}');

    try {
      orchestrator.validateRequest(input);
      expect.fail('expected ConfigurationError');
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigurationError);
      if (err instanceof ConfigurationError) {
        expect(err.issues).toEqual([
          'scenario must be between 50 and 5000 characters (got 9)',
          'weights must sum to 1.0 (got 2)',
          'unknown pillar "legal"',
          'pillar "market" is not configured',
        ]);
      }
    }
  });

  it('accepts a scenario exactly at the minimum length', async () => {
    const orchestrator = new Orchestrator({ agents: allSucceeding(), logger: silentLogger, settings: testSettings() });

    await expect(orchestrator.run(request({ scenario: 'x'.repeat(49) }))).rejects.toThrow(
      'scenario must be between 50 and 5000 characters (got 49)',
    );
    const run = await orchestrator.run(request({ scenario: 'x'.repeat(50) }));
    expect(run.status).toBe('done');
  });

  it('rejects a pillar configured twice', () => {
    expect(() => new Orchestrator({ agents: [succeeding('finance'), failing('finance')], logger: silentLogger }))
      .toThrow('pillar "finance" is configured more than once');
  });

  it('fails with exhaustion when no pillar can be dispatched', async () => {
    const logger = recordingLogger();
    const orchestrator = new Orchestrator({ agents: [], logger, settings: testSettings() });

    const error = await orchestrator.run(request()).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(OrchestrationExhaustionError);
    if (error instanceof OrchestrationExhaustionError) {
      expect(error.run.status).toBe('failed');
      expect(error.run.total).toBe(0);
    }
    expect(logger.entries.map(e => [e.level, e.message])).toEqual([['error', 'No pillar could be dispatched']]);
  });
});

describe('Orchestrator domain events', () => {
  it('reports the run lifecycle to an observer', async () => {
    const types: DomainEventType[] = [];
    const orchestrator = new Orchestrator({
      agents: allSucceeding(),
      logger: silentLogger,
      settings: testSettings(),
      onEvent: event => types.push(event.type),
    });

    await orchestrator.analyze(request());

    expect(types).toEqual([
      'RunRequested',
      'RunStarted',
      'PillarDispatched', 'PillarDispatched', 'PillarDispatched', 'PillarDispatched',
      'PillarSucceeded', 'PillarSucceeded', 'PillarSucceeded', 'PillarSucceeded',
      'RunAggregated',
      'RunCompleted',
      'RecommendationIssued',
    ]);
  });

  it('keeps running when an observer throws', async () => {
    const logger = recordingLogger();
    const orchestrator = new Orchestrator({
      agents: [succeeding('finance')],
      logger,
      settings: testSettings(),
      onEvent: () => {
        throw new Error('observer broke');
      },
    });

    const run = await orchestrator.run(request());

    expect(run.status).toBe('done');
    expect(logger.entries.some(e => e.message === 'Event observer failed' && e.data?.error === 'observer broke')).toBe(true);
  });
});
