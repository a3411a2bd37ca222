#!/usr/bin/env node
// Pillar decision CLI
//
// Usage:
//   pillars analyze "<scenario>"                                   # batch run + recommendation
//   pillars analyze --stream "<scenario>"                          # progress events, one pillar at a time
//   pillars analyze --weights finance=0.4,risk=0.2,compliance=0.2,market=0.2 "<scenario>"
//   pillars analyze --pillars finance,market --json "<scenario>"
//   pillars analyze -i                                             # interactive REPL
//   pillars list                                                   # list pillars and default weights
//   pillars --help                                                 # usage

import 'dotenv/config';
import { createInterface } from 'node:readline';
import { Orchestrator } from '../orchestrator/coordinator.js';
import { loadSettings, type Settings } from '../config/settings.js';
import { PILLAR_DESCRIPTIONS, PILLAR_ICONS, PILLAR_LABELS } from '../config/pillar-mappings.js';
import type { ScenarioRequest } from '../types/orchestration.js';
import type { RunEvent } from '../types/events.js';
import { ConfigurationError, OrchestrationExhaustionError, toErrorMessage } from '../utils/errors.js';
import { formatCategory, formatPercent, renderReport } from '../utils/report.js';
import { parseAnalyzeArgs, type AnalyzeArgs } from './cli-args.js';

// ── ANSI helpers ────────────────────────────────────────────────────

const isTTY = process.stdout.isTTY ?? false;

const ansi = {
  reset: isTTY ? '\x1b[0m' : '',
  bold: isTTY ? '\x1b[1m' : '',
  dim: isTTY ? '\x1b[2m' : '',
  cyan: isTTY ? '\x1b[36m' : '',
  green: isTTY ? '\x1b[32m' : '',
  yellow: isTTY ? '\x1b[33m' : '',
  red: isTTY ? '\x1b[31m' : '',
  magenta: isTTY ? '\x1b[35m' : '',
};

function c(color: keyof typeof ansi, text: string): string {
  return `${ansi[color]}${text}${ansi.reset}`;
}

// ── CLI class ───────────────────────────────────────────────────────

class PillarCli {
  private settings: Settings | null = null;
  private orchestrator: Orchestrator | null = null;

  async start(): Promise<void> {
    const rawArgs = process.argv.slice(2);

    if (rawArgs.length === 0 || rawArgs[0] === '--help' || rawArgs[0] === '-h') {
      this.printHelp();
      return;
    }

    const command = rawArgs[0];
    const rest = rawArgs.slice(1);

    try {
      switch (command) {
        case 'analyze':
          await this.handleAnalyze(rest);
          break;
        case 'list':
          this.listPillars();
          break;
        case 'help':
          this.printHelp();
          break;
        default:
          console.error(`Unknown command: ${command}\n`);
          this.printHelp();
          process.exitCode = 1;
      }
    } catch (err) {
      if (err instanceof ConfigurationError) {
        console.error(`  ${c('red', 'Configuration error:')}`);
        for (const issue of err.issues) console.error(`    - ${issue}`);
        console.error();
        process.exitCode = 1;
        return;
      }
      if (err instanceof OrchestrationExhaustionError) {
        console.error(`  ${c('red', 'Error:')} ${err.message}\n`);
        process.exitCode = 1;
        return;
      }
      throw err;
    }
  }

  private getSettings(): Settings {
    this.settings ??= loadSettings();
    return this.settings;
  }

  private getOrchestrator(): Orchestrator {
    this.orchestrator ??= new Orchestrator({ settings: this.getSettings() });
    return this.orchestrator;
  }

  // ── Subcommand: analyze ─────────────────────────────────────────

  private async handleAnalyze(args: string[]): Promise<void> {
    const parsed = parseAnalyzeArgs(args, this.getSettings().weightTolerance);

    if (parsed.help) {
      this.printAnalyzeHelp();
      return;
    }

    if (parsed.interactive) {
      await this.startRepl(parsed);
      return;
    }

    if (!parsed.scenario) {
      console.error('Error: No scenario provided. Use "pillars analyze --help" for usage.\n');
      process.exitCode = 1;
      return;
    }

    await this.runOnce(parsed.scenario, parsed);
  }

  private async runOnce(scenario: string, opts: AnalyzeArgs): Promise<void> {
    const request: ScenarioRequest = { scenario, weights: opts.weights, pillars: opts.pillars };

    // Ctrl+C cancels the running pillars; the run still completes with CANCELLED results
    const controller = new AbortController();
    const onSigint = (): void => controller.abort();
    process.once('SIGINT', onSigint);

    try {
      if (opts.stream) {
        await this.runStreaming(request, opts, controller.signal);
      } else {
        await this.runBatch(request, opts, controller.signal);
      }
    } finally {
      process.removeListener('SIGINT', onSigint);
    }
  }

  private async runBatch(request: ScenarioRequest, opts: AnalyzeArgs, signal: AbortSignal): Promise<void> {
    const startTime = Date.now();
    const { run, recommendation } = await this.getOrchestrator().analyze(request, {
      signal,
      pillarTimeoutMs: opts.timeoutMs,
    });

    if (opts.json) {
      console.log(JSON.stringify({ run, recommendation }, null, 2));
      return;
    }

    console.log(renderReport(run, recommendation));
    const duration = ((Date.now() - startTime) / 1000).toFixed(1);
    console.log(`\n  ${c('green', '✓')} ${c('bold', formatCategory(recommendation.category))} ${c('dim', `(${duration}s)`)}\n`);
  }

  private async runStreaming(request: ScenarioRequest, opts: AnalyzeArgs, signal: AbortSignal): Promise<void> {
    const events = this.getOrchestrator().runWithUpdates(request, { signal, pillarTimeoutMs: opts.timeoutMs });

    for await (const event of events) {
      if (opts.json) {
        console.log(JSON.stringify(event));
        continue;
      }
      this.printEvent(event);
    }
  }

  private printEvent(event: RunEvent): void {
    switch (event.kind) {
      case 'run_started':
        process.stderr.write(`  ${c('magenta', '[run]')} ${c('dim', `${event.runId} · ${event.pillars.join(', ')}`)}\n`);
        break;
      case 'pillar_started':
        process.stderr.write(`  ${c('cyan', `[${event.pillar}]`)} ${c('dim', 'analyzing...')}\n`);
        break;
      case 'pillar_completed':
        process.stderr.write(`  ${c('green', `[${event.pillar}]`)} done ${c('dim', `(${event.result.durationMs} ms)`)}\n`);
        break;
      case 'pillar_failed':
        process.stderr.write(`  ${c('red', `[${event.pillar}]`)} ${event.error.code}: ${c('dim', event.error.message)}\n`);
        break;
      case 'run_completed':
        console.log(`\n${renderReport(event.run, event.recommendation)}`);
        console.log(`\n  ${c('green', '✓')} ${c('bold', formatCategory(event.recommendation.category))} ` +
          c('dim', `score ${formatPercent(event.recommendation.overallScore)}, confidence ${formatPercent(event.recommendation.confidence)}`) + '\n');
        break;
    }
  }

  // ── Interactive REPL ────────────────────────────────────────────

  private async startRepl(initial: AnalyzeArgs): Promise<void> {
    const opts: AnalyzeArgs = { ...initial };

    console.log(`\n  ${c('bold', 'Pillar Decision')} ${c('dim', '- interactive mode')}`);
    console.log(`  ${c('dim', 'Type a scenario, or /help for commands.')}\n`);

    const rl = createInterface({
      input: process.stdin,
      output: process.stdout,
      prompt: `${c('cyan', 'pillars>')} `,
    });

    rl.prompt();

    for await (const line of rl) {
      const input = line.trim();

      if (input === 'exit' || input === 'quit') break;

      if (input === '/help') {
        this.printReplHelp();
      } else if (input === '/stream') {
        opts.stream = !opts.stream;
        console.log(`  ${c('green', '✓')} Streaming ${c('bold', opts.stream ? 'enabled' : 'disabled')}\n`);
      } else if (input === '/pillars') {
        this.listPillars();
      } else if (input.startsWith('/weights ')) {
        try {
          const next = parseAnalyzeArgs(['--weights', input.slice(9).trim()], this.getSettings().weightTolerance);
          opts.weights = next.weights;
          console.log(`  ${c('green', '✓')} Weights set\n`);
        } catch (err) {
          console.error(`  ${c('red', 'Error:')} ${toErrorMessage(err)}\n`);
        }
      } else if (input) {
        try {
          await this.runOnce(input, opts);
        } catch (err) {
          console.error(`  ${c('red', 'Error:')} ${toErrorMessage(err)}\n`);
        }
      }

      rl.prompt();
    }

    rl.close();
    console.log(`  ${c('dim', 'Goodbye.')}\n`);
  }

  // ── Subcommand: list ────────────────────────────────────────────

  listPillars(): void {
    const orchestrator = this.getOrchestrator();
    const weights = orchestrator.decisionEngine.getWeights();

    console.log(`\n  ${c('bold', `${orchestrator.pillars.length} pillars configured:`)}\n`);
    for (const pillar of orchestrator.pillars) {
      const label = `${PILLAR_ICONS[pillar]} ${PILLAR_LABELS[pillar]}`.padEnd(16, ' ');
      const weight = formatPercent(weights[pillar] ?? 0).padStart(6, ' ');
      console.log(`    ${c('cyan', label)} ${c('yellow', weight)}  ${c('dim', PILLAR_DESCRIPTIONS[pillar])}`);
    }
    console.log();
  }

  // ── Help screens ────────────────────────────────────────────────

  printHelp(): void {
    console.log(`
  ${c('bold', 'Pillar Decision')} - multi-pillar scenario assessment

  ${c('bold', 'Usage:')}
    pillars analyze "<scenario>"      Assess a scenario across all pillars
    pillars analyze --stream ...      Stream per-pillar progress
    pillars analyze -i                Start interactive REPL
    pillars list                      List pillars and default weights
    pillars --help                    Show this help

  ${c('bold', 'Examples:')}
    pillars analyze "Launch a fintech payments app in a growing market with strong demand..."
    pillars analyze --weights finance=0.4,risk=0.2,compliance=0.2,market=0.2 "..."
    pillars analyze --pillars finance,market --json "..."
`);
  }

  private printAnalyzeHelp(): void {
    console.log(`
  ${c('bold', 'pillars analyze')} - Assess a business scenario

  ${c('bold', 'Usage:')}
    pillars analyze [options] "<scenario>"
    pillars analyze -i

  ${c('bold', 'Options:')}
    --stream                      Run pillars one at a time and print progress
    --weights <spec>              Weight map, e.g. finance=0.4,risk=0.2,compliance=0.2,market=0.2
    --pillars <list>              Only run these pillars (comma separated)
    --timeout <ms>                Per-pillar deadline in ms (0 disables)
    --json                        Print JSON (NDJSON events with --stream)
    -i, --interactive             Start interactive REPL mode
    -h, --help                    Show this help

  ${c('bold', 'Environment:')}
    PILLAR_TIMEOUT_MS             Default per-pillar deadline (30000)
    PILLAR_WEIGHTS                Default weight map
    SCENARIO_MIN_LENGTH           Minimum scenario length (50)
    SCENARIO_MAX_LENGTH           Maximum scenario length (5000)
    STREAM_BUFFER_SIZE            Streaming buffer capacity (16)
    STREAM_OVERFLOW               block | drop (block)
    LOG_LEVEL                     debug | info | warn | error | silent (info)
`);
  }

  private printReplHelp(): void {
    console.log(`
  ${c('bold', 'REPL commands:')}
    /help              Show this help
    /pillars           List pillars and default weights
    /stream            Toggle streaming mode
    /weights <spec>    Set the weight map for following runs
    exit               Exit REPL
`);
  }
}

// ── Entry point ─────────────────────────────────────────────────────

const cli = new PillarCli();
cli.start().catch((err: unknown) => {
  console.error(`${c('red', 'Fatal:')} ${toErrorMessage(err)}`);
  process.exit(1);
});
