import { describe, it, expect } from 'vitest';
import { Orchestrator } from '../orchestrator/coordinator.js';
import type { RunEvent } from '../types/events.js';
import { PILLAR_ORDER, success } from '../types/pillars.js';
import { ConfigurationError, OrchestrationExhaustionError } from '../utils/errors.js';
import { silentLogger } from '../utils/logger.js';
import {
  SCENARIO, ScriptedPillar, allSucceeding, defaultPayload, delay, failing, hanging,
  recordingLogger, succeeding, testSettings,
} from './helpers.js';

async function collect(events: AsyncIterable<RunEvent>): Promise<RunEvent[]> {
  const out: RunEvent[] = [];
  for await (const event of events) out.push(event);
  return out;
}

function describeEvent(event: RunEvent): string {
  return 'pillar' in event ? `${event.kind}:${event.pillar}` : event.kind;
}

describe('Orchestrator.runWithUpdates', () => {
  it('emits 2 x pillars + 2 events in fixed order', async () => {
    const orchestrator = new Orchestrator({ agents: allSucceeding(), logger: silentLogger, settings: testSettings() });
    const events = await collect(orchestrator.runWithUpdates({ scenario: SCENARIO }));

    expect(events.map(describeEvent)).toEqual([
      'run_started',
      'pillar_started:finance', 'pillar_completed:finance',
      'pillar_started:risk', 'pillar_completed:risk',
      'pillar_started:compliance', 'pillar_completed:compliance',
      'pillar_started:market', 'pillar_completed:market',
      'run_completed',
    ]);
    expect(new Set(events.map(e => e.runId)).size).toBe(1);

    const last = events[events.length - 1];
    expect(last.kind).toBe('run_completed');
    if (last.kind === 'run_completed') {
      expect(last.run.status).toBe('done');
      expect(last.run.succeeded).toBe(4);
      expect(last.recommendation.category).toBe('RECOMMEND');
      expect(last.recommendation.overallScore).toBeCloseTo(0.77, 10);
    }
  });

  it('reports a failed pillar and carries on', async () => {
    const agents = [succeeding('finance'), failing('risk'), succeeding('compliance'), succeeding('market')];
    const orchestrator = new Orchestrator({ agents, logger: silentLogger, settings: testSettings() });
    const events = await collect(orchestrator.runWithUpdates({ scenario: SCENARIO }));

    expect(events.map(describeEvent)).toEqual([
      'run_started',
      'pillar_started:finance', 'pillar_completed:finance',
      'pillar_started:risk', 'pillar_failed:risk',
      'pillar_started:compliance', 'pillar_completed:compliance',
      'pillar_started:market', 'pillar_completed:market',
      'run_completed',
    ]);
    const failed = events[4];
    expect(failed.kind === 'pillar_failed' && failed.error).toEqual({ code: 'PILLAR_ERROR', message: 'risk unavailable' });
  });

  it('runs one pillar at a time', async () => {
    let active = 0;
    let peak = 0;
    const agents = PILLAR_ORDER.map(pillar => new ScriptedPillar(pillar, async () => {
      active++;
      peak = Math.max(peak, active);
      await delay(5);
      active--;
      return success(defaultPayload(pillar));
    }));
    const orchestrator = new Orchestrator({ agents, logger: silentLogger, settings: testSettings() });

    await collect(orchestrator.runWithUpdates({ scenario: SCENARIO }));
    expect(peak).toBe(1);
  });

  it('throws configuration errors synchronously', () => {
    const orchestrator = new Orchestrator({ agents: allSucceeding(), logger: silentLogger, settings: testSettings() });
    expect(() => orchestrator.runWithUpdates({ scenario: 'short' })).toThrow(ConfigurationError);
  });

  it('throws exhaustion synchronously', () => {
    const orchestrator = new Orchestrator({ agents: [], logger: silentLogger, settings: testSettings() });
    expect(() => orchestrator.runWithUpdates({ scenario: SCENARIO })).toThrow(OrchestrationExhaustionError);
  });

  it('aborts the producer when the consumer stops early', async () => {
    const agents = [succeeding('finance'), hanging('risk'), succeeding('compliance'), succeeding('market')];
    const orchestrator = new Orchestrator({ agents, logger: silentLogger, settings: testSettings() });

    const seen: string[] = [];
    for await (const event of orchestrator.runWithUpdates({ scenario: SCENARIO })) {
      seen.push(describeEvent(event));
      if (event.kind === 'pillar_started' && event.pillar === 'risk') {
        // let the producer reach the hanging risk agent first
        await delay(5);
        break;
      }
    }

    expect(seen).toEqual(['run_started', 'pillar_started:finance', 'pillar_completed:finance', 'pillar_started:risk']);
    expect(agents[1].calls[0].signal.aborted).toBe(true);
    expect(agents[2].calls).toHaveLength(0);
    expect(agents[3].calls).toHaveLength(0);
  });

  it('completes a cancelled stream with CANCELLED pillars', async () => {
    const agents = allSucceeding();
    const orchestrator = new Orchestrator({ agents, logger: silentLogger, settings: testSettings() });
    const controller = new AbortController();
    controller.abort();

    const events = await collect(orchestrator.runWithUpdates({ scenario: SCENARIO }, { signal: controller.signal }));

    expect(events).toHaveLength(10);
    expect(events.filter(e => e.kind === 'pillar_failed')).toHaveLength(4);
    const last = events[9];
    expect(last.kind === 'run_completed' && last.run.cancelled).toBe(true);
    expect(agents.every(a => a.calls.length === 0)).toBe(true);
  });

  it('keeps every event under backpressure with a one-slot buffer', async () => {
    const orchestrator = new Orchestrator({
      agents: allSucceeding(),
      logger: silentLogger,
      settings: testSettings({ streamBufferSize: 1, streamOverflow: 'block' }),
    });
    const stream = orchestrator.runWithUpdates({ scenario: SCENARIO });

    const events: RunEvent[] = [];
    for await (const event of stream) {
      events.push(event);
      await delay(1);
    }
    expect(events).toHaveLength(10);
  });

  it('drops progress events for a slow consumer but never the final event', async () => {
    const logger = recordingLogger();
    const orchestrator = new Orchestrator({
      agents: allSucceeding(),
      logger,
      settings: testSettings({ streamBufferSize: 1, streamOverflow: 'drop' }),
    });
    const stream = orchestrator.runWithUpdates({ scenario: SCENARIO });

    const first = await stream.next();
    await delay(20);
    const rest = await collect(stream);

    expect(first.done).toBe(false);
    expect(rest.map(describeEvent)).toEqual(['pillar_started:finance', 'run_completed']);
    expect(logger.entries.filter(e => e.message === 'Stream event dropped')).toHaveLength(7);
  });
});
