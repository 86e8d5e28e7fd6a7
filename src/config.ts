/**
 * Drillsense Configuration
 *
 * Persistent engine settings in `~/.drillsense/config.json` (directory
 * overridable with DRILLSENSE_HOME). Writes are atomic (.tmp then rename)
 * and keep the previous file as config.json.bak; a corrupt file falls back
 * to the backup, then to defaults.
 *
 * @packageDocumentation
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { z } from 'zod';
import type { AdaptationConfig, AgentAdaptationConfig } from './adaptation/controller.js';
import type { ConsensusConfig } from './consensus/aggregator.js';
import type { EngineConfig } from './engine/detection-engine.js';
import type { PublisherConfig } from './publisher/alert-publisher.js';
import type { SimulatorConfig } from './simulation/simulator.js';
import { BUILTIN_AGENT_TYPES, type AgentType, type AnomalyCategory } from './types.js';

// ─── Schema ──────────────────────────────────────────────────────────

const probability = z.number().min(0).max(1);

const agentSectionSchema = z.object({
  enabled: z.boolean().default(true),
  step_size: z.number().positive().max(1).default(0.05),
  divergence_trip_count: z.number().int().min(1).default(5),
  /** Initial sensitivity override */
  sensitivity: z.number().min(0.1).max(1.5).optional(),
});

const configSchema = z.object({
  config_version: z.number().int().default(1),
  created_at: z.string().default(() => new Date().toISOString()),
  updated_at: z.string().default(() => new Date().toISOString()),
  cycle: z.object({
    interval_ms: z.number().int().min(1000).default(5000),
    deadline_ms: z.number().int().min(50).default(2000),
  }).default({}),
  consensus: z.object({
    thresholds: z.object({
      sticking: probability.default(0.6),
      washout_mud_loss: probability.default(0.7),
      hole_cleaning: probability.default(0.65),
      rop_optimization: probability.default(0.7),
    }).default({}),
    corroboration_window: z.number().int().min(1).default(2),
    min_signals: z.number().int().min(1).default(2),
    recency_half_life_ms: z.number().int().min(0).default(60_000),
    alert_expiry_ms: z.number().int().min(1000).default(900_000),
  }).default({}),
  agents: z.record(agentSectionSchema).default({}),
  alerts: z.object({
    webhook_url: z.string().url().optional(),
    max_history: z.number().int().min(1).default(500),
    max_delivery_attempts: z.number().int().min(1).default(3),
  }).default({}),
  database: z.object({
    /** SQLite file; defaults to history.db in the config directory */
    path: z.string().optional(),
    retention_days: z.number().int().min(1).default(30),
    auto_clean: z.boolean().default(true),
  }).default({}),
  simulation: z.object({
    volatility: probability.default(0.5),
    trending: z.boolean().default(true),
    seed: z.number().int().default(42),
  }).default({}),
});

export type DrillsenseConfig = z.infer<typeof configSchema>;
export type AgentSection = z.infer<typeof agentSectionSchema>;

const CONFIG_VERSION = 1;

// ─── Paths ───────────────────────────────────────────────────────────

/** Resolved on each call so DRILLSENSE_HOME can change between runs */
export function getConfigDir(): string {
  return process.env['DRILLSENSE_HOME'] ?? path.join(os.homedir(), '.drillsense');
}

export function getConfigPath(): string {
  return path.join(getConfigDir(), 'config.json');
}

function backupPath(): string {
  return path.join(getConfigDir(), 'config.json.bak');
}

function tmpPath(): string {
  return path.join(getConfigDir(), 'config.json.tmp');
}

export function getDatabasePath(config: DrillsenseConfig): string {
  return config.database.path ?? path.join(getConfigDir(), 'history.db');
}

function ensureConfigDir(): void {
  const dir = getConfigDir();
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

// ─── Load / save ─────────────────────────────────────────────────────

function withBuiltinAgents(config: DrillsenseConfig): DrillsenseConfig {
  const agents: Record<string, AgentSection> = { ...config.agents };
  for (const type of BUILTIN_AGENT_TYPES) {
    agents[type] ??= agentSectionSchema.parse({});
  }
  return { ...config, agents };
}

export function createDefaultConfig(): DrillsenseConfig {
  return withBuiltinAgents(configSchema.parse({ config_version: CONFIG_VERSION }));
}

function readConfigFile(file: string): DrillsenseConfig | null {
  if (!fs.existsSync(file)) return null;
  try {
    const parsed = configSchema.safeParse(JSON.parse(fs.readFileSync(file, 'utf-8')));
    return parsed.success ? withBuiltinAgents(parsed.data) : null;
  } catch {
    // Unparseable JSON is handled like an invalid file
    return null;
  }
}

/**
 * Load configuration from disk.
 * Falls back to the backup if the primary file is missing or invalid,
 * then creates defaults as last resort.
 */
export function loadConfig(): DrillsenseConfig {
  ensureConfigDir();

  const primary = readConfigFile(getConfigPath());
  if (primary) return primary;
  if (fs.existsSync(getConfigPath())) {
    console.warn('[Drillsense Engine] config.json is corrupt, trying backup...');
  }

  const backup = readConfigFile(backupPath());
  if (backup) {
    console.warn('[Drillsense Engine] WARNING: config.json missing or corrupt, restored from config.json.bak');
    saveConfig(backup);
    return backup;
  }

  const config = createDefaultConfig();
  saveConfig(config);
  return config;
}

/**
 * Save configuration using an atomic write (write to .tmp, then rename).
 * The current file is copied to config.json.bak first.
 */
export function saveConfig(config: DrillsenseConfig): void {
  ensureConfigDir();
  config.updated_at = new Date().toISOString();

  if (fs.existsSync(getConfigPath())) {
    try {
      fs.copyFileSync(getConfigPath(), backupPath());
    } catch (err) {
      console.warn('[Drillsense Engine] Could not back up config.json:', err instanceof Error ? err.message : String(err));
    }
  }

  fs.writeFileSync(tmpPath(), JSON.stringify(config, null, 2));
  fs.renameSync(tmpPath(), getConfigPath());
}

export interface ConfigUpdates {
  cycle?: Partial<DrillsenseConfig['cycle']>;
  consensus?: Partial<Omit<DrillsenseConfig['consensus'], 'thresholds'>> & {
    thresholds?: Partial<DrillsenseConfig['consensus']['thresholds']>;
  };
  agents?: Record<AgentType, Partial<AgentSection>>;
  alerts?: Partial<DrillsenseConfig['alerts']>;
  database?: Partial<DrillsenseConfig['database']>;
  simulation?: Partial<DrillsenseConfig['simulation']>;
}

/**
 * Merge updates section by section and save. The merged result is validated;
 * an invalid update throws and leaves the file untouched.
 */
export function updateConfig(updates: ConfigUpdates): DrillsenseConfig {
  const config = loadConfig();
  const agents: Record<string, AgentSection> = { ...config.agents };
  for (const [type, section] of Object.entries(updates.agents ?? {})) {
    agents[type] = { ...agentSectionSchema.parse({}), ...agents[type], ...section };
  }

  const merged = configSchema.parse({
    ...config,
    cycle: { ...config.cycle, ...updates.cycle },
    consensus: {
      ...config.consensus,
      ...updates.consensus,
      thresholds: { ...config.consensus.thresholds, ...updates.consensus?.thresholds },
    },
    agents,
    alerts: { ...config.alerts, ...updates.alerts },
    database: { ...config.database, ...updates.database },
    simulation: { ...config.simulation, ...updates.simulation },
  });
  saveConfig(merged);
  return merged;
}

// ─── Setters ─────────────────────────────────────────────────────────

export function setThreshold(category: AnomalyCategory, value: number): DrillsenseConfig {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new RangeError(`Threshold must be between 0 and 1, got ${value}`);
  }
  const thresholds: Partial<Record<AnomalyCategory, number>> = {};
  thresholds[category] = value;
  return updateConfig({ consensus: { thresholds } });
}

export function setCycleInterval(ms: number): DrillsenseConfig {
  if (!Number.isInteger(ms) || ms < 1000) {
    throw new RangeError(`Cycle interval must be a whole number of milliseconds >= 1000, got ${ms}`);
  }
  return updateConfig({ cycle: { interval_ms: ms } });
}

export function toggleAgent(agentType: AgentType, enabled: boolean): DrillsenseConfig {
  const config = loadConfig();
  if (!(agentType in config.agents)) {
    throw new Error(`Unknown agent type: ${agentType}`);
  }
  return updateConfig({ agents: { [agentType]: { enabled } } });
}

// ─── Mapping to engine options ───────────────────────────────────────

export interface EngineSettings {
  engine: Partial<EngineConfig>;
  consensus: Partial<ConsensusConfig>;
  adaptation: Partial<AdaptationConfig>;
  publisher: Partial<PublisherConfig>;
  simulation: Partial<SimulatorConfig>;
  disabledAgents: AgentType[];
  paramOverrides: Record<AgentType, Record<string, number>>;
  databasePath: string;
  retentionDays: number;
  autoClean: boolean;
}

export function toEngineSettings(config: DrillsenseConfig): EngineSettings {
  const perAgent: Record<AgentType, Partial<AgentAdaptationConfig>> = {};
  const paramOverrides: Record<AgentType, Record<string, number>> = {};
  const disabledAgents: AgentType[] = [];
  for (const [type, section] of Object.entries(config.agents)) {
    if (!section.enabled) disabledAgents.push(type);
    perAgent[type] = { stepSize: section.step_size, divergenceTripCount: section.divergence_trip_count };
    if (section.sensitivity !== undefined) paramOverrides[type] = { sensitivity: section.sensitivity };
  }

  return {
    engine: {
      cycleIntervalMs: config.cycle.interval_ms,
      cycleDeadlineMs: config.cycle.deadline_ms,
    },
    consensus: {
      thresholds: { ...config.consensus.thresholds },
      corroborationWindow: config.consensus.corroboration_window,
      minCorroboratingSignals: config.consensus.min_signals,
      recencyHalfLifeMs: config.consensus.recency_half_life_ms,
      alertExpiryMs: config.consensus.alert_expiry_ms,
    },
    adaptation: { perAgent },
    publisher: {
      maxHistory: config.alerts.max_history,
      maxDeliveryAttempts: config.alerts.max_delivery_attempts,
      ...(config.alerts.webhook_url ? { webhookUrl: config.alerts.webhook_url } : {}),
    },
    simulation: {
      volatility: config.simulation.volatility,
      trending: config.simulation.trending,
      seed: config.simulation.seed,
    },
    disabledAgents,
    paramOverrides,
    databasePath: getDatabasePath(config),
    retentionDays: config.database.retention_days,
    autoClean: config.database.auto_clean,
  };
}
