#!/usr/bin/env node
/**
 * Drillsense Engine CLI
 *
 * Runs the detection engine against the telemetry simulator and inspects
 * alert history and configuration.
 *
 * Usage:
 *   drillsense [command] [options]
 *
 * Commands:
 *   run                    Replay simulated windows back to back
 *   watch                  Run the engine loop at the configured interval
 *   alerts [list|summary]  View alert history
 *   alerts shared [limit]  View alerts mirrored from every rig
 *   stats                  Show history database statistics
 *   config                 Show or change configuration
 *
 * Environment Variables:
 *   DRILLSENSE_HOME        Config and history directory (default: ~/.drillsense)
 *   DRILLSENSE_HISTORY_DB  PostgreSQL connection string for the alert mirror
 *
 * @packageDocumentation
 */

import { readFileSync } from 'fs';
import { pathToFileURL } from 'url';
import { OnlineAdaptationController } from './adaptation/controller.js';
import { createDefaultAgents } from './agents/registry.js';
import {
  getConfigPath,
  loadConfig,
  setCycleInterval,
  setThreshold,
  toEngineSettings,
  toggleAgent,
  type DrillsenseConfig,
} from './config.js';
import { ConsensusAggregator } from './consensus/aggregator.js';
import { DetectionEngine } from './engine/detection-engine.js';
import { errorMessage } from './errors.js';
import { AlertPublisher, type AlertSink } from './publisher/alert-publisher.js';
import { TelemetrySimulator, isScenario, SCENARIOS, type Scenario } from './simulation/simulator.js';
import { closePg, getAlertsPg, initPgHistory, isPgActive } from './store/history-pg.js';
import { openHistoryStore, type HistoryStore } from './store/history-store.js';
import { isAnomalyCategory, type Alert } from './types.js';

function readVersion(): string {
  try {
    const pkg: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
    return '0.0.0';
  } catch {
    return '0.0.0';
  }
}

const VERSION = readVersion();

const SEVERITY_ICON: Record<Alert['severity'], string> = {
  high: '🔴',
  medium: '🟡',
  low: 'ℹ️',
};

function printHelp(): void {
  console.log(`
Drillsense Engine - Multi-agent drilling anomaly detection

Usage:
  drillsense [command] [options]

Commands:
  run                    Replay simulated telemetry windows back to back
  watch                  Run the engine loop at the configured cycle interval
  alerts [list|summary]  View alert history
  alerts shared [limit]  View alerts mirrored from every rig
  stats                  Show history database statistics
  config                 Show configuration
  config threshold <category> <value>   Set a consensus threshold (0-1)
  config interval <ms>                  Set the cycle interval (>= 1000)
  config agent <type> on|off            Enable or disable an agent

Options (run / watch):
  --cycles <number>    Windows to process (run default: 10, watch default: endless)
  --scenario <name>    ${SCENARIOS.join(' | ')} (default: normal)
  --seed <number>      Simulator seed (default: from config)
  -h, --help           Show this help message
  --version            Show version

Environment Variables:
  DRILLSENSE_HOME        Config and history directory (default: ~/.drillsense)
  DRILLSENSE_HISTORY_DB  PostgreSQL connection string for the alert mirror
`);
}

function printVersion(): void {
  console.log(`Drillsense Engine v${VERSION}`);
}

function formatAlert(alert: Alert): string {
  const time = new Date(alert.updatedAt).toISOString().slice(0, 19);
  return `  ${SEVERITY_ICON[alert.severity]} [${time}] ${alert.category} (${alert.status}, rev ${alert.revision}): ${alert.message}`;
}

// ─── Option parsing ──────────────────────────────────────────────────

interface RunOptions {
  cycles: number | null;
  scenario: Scenario;
  seed: number | null;
}

function optionValue(args: string[], name: string): string | undefined {
  const idx = args.indexOf(name);
  return idx >= 0 ? args[idx + 1] : undefined;
}

function parseRunOptions(args: string[], defaultCycles: number | null): RunOptions | string {
  const cyclesArg = optionValue(args, '--cycles');
  const cycles = cyclesArg === undefined ? defaultCycles : parseInt(cyclesArg, 10);
  if (cycles !== null && (!Number.isInteger(cycles) || cycles < 1)) {
    return `Invalid --cycles value: ${cyclesArg ?? ''}`;
  }

  const scenarioArg = optionValue(args, '--scenario') ?? 'normal';
  if (!isScenario(scenarioArg)) {
    return `Unknown scenario: ${scenarioArg} (expected ${SCENARIOS.join(', ')})`;
  }

  const seedArg = optionValue(args, '--seed');
  const seed = seedArg === undefined ? null : parseInt(seedArg, 10);
  if (seed !== null && !Number.isInteger(seed)) {
    return `Invalid --seed value: ${seedArg ?? ''}`;
  }
  return { cycles, scenario: scenarioArg, seed };
}

// ─── Engine assembly ─────────────────────────────────────────────────

interface Runtime {
  engine: DetectionEngine;
  simulator: TelemetrySimulator;
  store: HistoryStore;
}

function buildRuntime(config: DrillsenseConfig, options: RunOptions, sinks: AlertSink[]): Runtime {
  const settings = toEngineSettings(config);
  const store = openHistoryStore(settings.databasePath);
  if (settings.autoClean) {
    store.pruneOlderThan(settings.retentionDays);
  }

  const registry = createDefaultAgents({
    disabled: settings.disabledAgents,
    paramOverrides: settings.paramOverrides,
  });
  const simulator = new TelemetrySimulator({
    ...settings.simulation,
    scenario: options.scenario,
    maxWindows: options.cycles,
    ...(options.seed !== null ? { seed: options.seed } : {}),
  });
  const publisher = new AlertPublisher(settings.publisher, {
    store,
    sinks,
    wellId: simulator.getConfig().wellId,
  });
  const engine = new DetectionEngine(
    {
      registry,
      aggregator: new ConsensusAggregator(settings.consensus),
      controller: new OnlineAdaptationController(settings.adaptation),
      publisher,
      store,
    },
    settings.engine,
  );
  return { engine, simulator, store };
}

const consoleSink: AlertSink = {
  name: 'console',
  deliver: async alert => {
    console.log(formatAlert(alert));
  },
};

async function shutdown(runtime: Runtime): Promise<void> {
  await runtime.engine.close();
  runtime.engine.publisher.close();
  runtime.store.close();
  await closePg();
}

function printRunSummary(runtime: Runtime): void {
  const status = runtime.engine.getStatus();
  const health = runtime.engine.publisher.getHealth();
  const pending = runtime.engine.aggregator.getPending();
  console.log('');
  console.log('📊 Run Summary');
  console.log('══════════════');
  console.log(`  Cycles:          ${status.cycles}`);
  console.log(`  Pending alerts:  ${pending.length}`);
  console.log(`  Degraded:        ${health.degradedCategories.length > 0 ? health.degradedCategories.join(', ') : 'none'}`);
  console.log(`  Diverged agents: ${health.divergence.length > 0 ? health.divergence.map(d => d.agentType).join(', ') : 'none'}`);
  for (const agent of status.agents) {
    const params = Object.entries(agent.params).map(([k, v]) => `${k}=${v.toFixed(3)}`).join(' ');
    console.log(`  ${agent.agentType} v${agent.version}: ${params}`);
  }
  console.log('');
}

async function handleRunCommand(args: string[]): Promise<number> {
  const options = parseRunOptions(args, 10);
  if (typeof options === 'string') {
    console.error(options);
    return 1;
  }

  const config = loadConfig();
  await initPgHistory();
  const runtime = buildRuntime(config, options, [consoleSink]);
  console.log(`[Drillsense Engine] Replaying ${options.cycles ?? 0} windows (scenario: ${options.scenario})`);

  try {
    let window = runtime.simulator.next();
    while (window !== null) {
      await runtime.engine.runCycle(window);
      await runtime.engine.expireStale();
      window = runtime.simulator.next();
    }
    printRunSummary(runtime);
    return 0;
  } finally {
    await shutdown(runtime);
  }
}

async function handleWatchCommand(args: string[]): Promise<number> {
  const options = parseRunOptions(args, null);
  if (typeof options === 'string') {
    console.error(options);
    return 1;
  }

  const config = loadConfig();
  await initPgHistory();
  const runtime = buildRuntime(config, options, [consoleSink]);

  const onSignal = (): void => {
    runtime.engine.stop().catch(err => console.error('[Drillsense Engine] Stop failed:', errorMessage(err)));
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  try {
    await runtime.engine.start(runtime.simulator);
    printRunSummary(runtime);
    return 0;
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
    await shutdown(runtime);
  }
}

function parseLimit(value: string | undefined, fallback: number): number {
  const limit = parseInt(value ?? String(fallback), 10);
  return Number.isInteger(limit) && limit > 0 ? limit : fallback;
}

/** Alerts mirrored to PostgreSQL from every rig */
async function handleSharedAlerts(args: string[]): Promise<number> {
  try {
    await initPgHistory();
    if (!isPgActive()) {
      console.error('Shared alert history needs DRILLSENSE_HISTORY_DB');
      return 1;
    }
    const alerts = await getAlertsPg(parseLimit(args[0], 20));
    console.log('');
    console.log('🌐 Shared Alerts');
    console.log('═════════════════');
    if (alerts.length === 0) {
      console.log('  No alerts yet.');
    } else {
      for (const alert of alerts) console.log(formatAlert(alert));
    }
    console.log('');
    return 0;
  } finally {
    await closePg();
  }
}

async function handleAlertsCommand(args: string[]): Promise<number> {
  const sub = args[0] ?? 'list';
  if (sub === 'shared') return handleSharedAlerts(args.slice(1));
  const settings = toEngineSettings(loadConfig());
  const store = openHistoryStore(settings.databasePath);

  try {
    if (sub === 'list' || sub === 'recent') {
      const recent = store.getRecentAlerts(parseLimit(args[1], 20));
      console.log('');
      console.log('🔔 Recent Alerts');
      console.log('═════════════════');
      if (recent.length === 0) {
        console.log('  No alerts yet.');
      } else {
        for (const alert of recent) console.log(formatAlert(alert));
      }
      console.log('');
      return 0;
    }

    if (sub === 'summary') {
      const summary = store.getAlertSummary();
      console.log('');
      console.log('🔔 Alert Summary');
      console.log(`   Total: ${summary.total}`);
      for (const [category, count] of Object.entries(summary.byCategory)) {
        console.log(`   ${category}: ${count}`);
      }
      console.log(`   Severity: high ${summary.bySeverity.high}, medium ${summary.bySeverity.medium}, low ${summary.bySeverity.low}`);
      console.log(
        `   Status: pending ${summary.byStatus.pending}, confirmed ${summary.byStatus.confirmed}, ` +
          `dismissed ${summary.byStatus.dismissed}, expired ${summary.byStatus.expired}`,
      );
      console.log('');
      return 0;
    }

    console.log('Usage: drillsense alerts [list [limit]|summary|shared [limit]]');
    return 1;
  } finally {
    store.close();
  }
}

function handleStatsCommand(): number {
  const settings = toEngineSettings(loadConfig());
  const store = openHistoryStore(settings.databasePath);
  try {
    const stats = store.getStatistics();
    console.log('');
    console.log('📊 History Statistics');
    console.log('═════════════════════');
    console.log(`  Predictions:  ${stats.predictions}`);
    console.log(`  Alerts:       ${stats.alerts}`);
    console.log(`  Feedback:     ${stats.feedback}`);
    console.log(`  Model states: ${stats.modelStates}`);
    if (stats.oldestPrediction !== null) {
      console.log(`  Oldest:       ${new Date(stats.oldestPrediction).toISOString()}`);
    }
    console.log(`  Database:     ${settings.databasePath}`);
    console.log('');
    return 0;
  } finally {
    store.close();
  }
}

function handleConfigCommand(args: string[]): number {
  const sub = args[0];

  if (sub === 'threshold') {
    const category = args[1] ?? '';
    const value = Number(args[2]);
    if (!isAnomalyCategory(category)) {
      console.error(`Unknown category: ${category}`);
      return 1;
    }
    setThreshold(category, value);
    console.log(`✅ ${category} threshold set to ${value}`);
    return 0;
  }

  if (sub === 'interval') {
    const ms = Number(args[1]);
    setCycleInterval(ms);
    console.log(`✅ Cycle interval set to ${ms}ms`);
    return 0;
  }

  if (sub === 'agent') {
    const agentType = args[1] ?? '';
    const state = args[2];
    if (state !== 'on' && state !== 'off') {
      console.error('Usage: drillsense config agent <type> on|off');
      return 1;
    }
    toggleAgent(agentType, state === 'on');
    console.log(`✅ ${agentType} ${state === 'on' ? 'enabled' : 'disabled'}`);
    return 0;
  }

  if (sub !== undefined && sub !== 'show') {
    console.error(`Unknown config command: ${sub}`);
    return 1;
  }

  const config = loadConfig();
  console.log('');
  console.log('⚙️  Configuration');
  console.log(`   File: ${getConfigPath()}`);
  console.log('');
  console.log(JSON.stringify(config, null, 2));
  console.log('');
  return 0;
}

// ─── Entry ───────────────────────────────────────────────────────────

const COMMANDS = new Set(['run', 'watch', 'alerts', 'stats', 'config']);

/** Execute one CLI invocation and return its exit code. */
export async function runCommand(args: string[]): Promise<number> {
  if (args.includes('-h') || args.includes('--help')) {
    printHelp();
    return 0;
  }
  if (args.includes('--version')) {
    printVersion();
    return 0;
  }

  // Bare options run the default command
  const first = args[0];
  const command = first === undefined || first.startsWith('-') ? 'run' : first;
  const rest = command === first ? args.slice(1) : args;
  if (!COMMANDS.has(command)) {
    console.error(`Unknown command: ${command}`);
    console.error('Run drillsense --help to see available commands.');
    return 1;
  }

  try {
    switch (command) {
      case 'run':
        return await handleRunCommand(rest);
      case 'watch':
        return await handleWatchCommand(rest);
      case 'alerts':
        return await handleAlertsCommand(rest);
      case 'stats':
        return handleStatsCommand();
      default:
        return handleConfigCommand(rest);
    }
  } catch (err) {
    console.error(`❌ ${errorMessage(err)}`);
    return 1;
  }
}

const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(entry).href) {
  runCommand(process.argv.slice(2)).then(
    code => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error('Fatal:', errorMessage(err));
      process.exitCode = 1;
    },
  );
}
