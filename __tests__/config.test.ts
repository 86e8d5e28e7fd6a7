/**
 * Tests for configuration persistence
 * - Defaults and agent sections
 * - Backup/restore
 * - Atomic writes
 * - Setters and engine mapping
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import {
  createDefaultConfig,
  getConfigPath,
  getDatabasePath,
  loadConfig,
  saveConfig,
  setCycleInterval,
  setThreshold,
  toEngineSettings,
  toggleAgent,
  updateConfig,
} from '../src/config.js';

describe('Config', () => {
  let configDir: string;
  let configFile: string;
  let backupFile: string;
  let tmpFile: string;

  beforeEach(() => {
    configDir = fs.mkdtempSync(path.join(os.tmpdir(), 'drillsense-config-'));
    process.env['DRILLSENSE_HOME'] = configDir;
    configFile = path.join(configDir, 'config.json');
    backupFile = path.join(configDir, 'config.json.bak');
    tmpFile = path.join(configDir, 'config.json.tmp');
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    delete process.env['DRILLSENSE_HOME'];
    fs.rmSync(configDir, { recursive: true, force: true });
  });

  it('creates config with defaults on first load', () => {
    const config = loadConfig();

    expect(fs.existsSync(configFile)).toBe(true);
    expect(getConfigPath()).toBe(configFile);
    expect(config.cycle).toEqual({ interval_ms: 5000, deadline_ms: 2000 });
    expect(config.consensus.thresholds).toEqual({
      sticking: 0.6,
      washout_mud_loss: 0.7,
      hole_cleaning: 0.65,
      rop_optimization: 0.7,
    });
    expect(Object.keys(config.agents)).toEqual([
      'mechanical_sticking',
      'differential_sticking',
      'hole_cleaning',
      'washout_mud_loss',
      'rop_optimization',
    ]);
    expect(config.agents['hole_cleaning']).toEqual({ enabled: true, step_size: 0.05, divergence_trip_count: 5 });
  });

  it('puts the history database in the config directory by default', () => {
    const config = createDefaultConfig();
    expect(getDatabasePath(config)).toBe(path.join(configDir, 'history.db'));
    expect(getDatabasePath({ ...config, database: { ...config.database, path: '/data/rig.db' } })).toBe('/data/rig.db');
  });

  it('keeps a backup of the previous file on save', () => {
    const config = loadConfig();
    config.cycle.interval_ms = 7000;
    saveConfig(config);

    const backup: unknown = JSON.parse(fs.readFileSync(backupFile, 'utf-8'));
    expect(backup).toMatchObject({ cycle: { interval_ms: 5000 } });
    expect(loadConfig().cycle.interval_ms).toBe(7000);
    expect(fs.existsSync(tmpFile)).toBe(false);
  });

  it('restores from the backup when config.json is corrupt', () => {
    const config = loadConfig();
    config.cycle.interval_ms = 9000;
    saveConfig(config);
    saveConfig(config);
    fs.writeFileSync(configFile, '{ not json');

    const restored = loadConfig();

    expect(restored.cycle.interval_ms).toBe(9000);
    expect(console.warn).toHaveBeenCalledWith(
      '[Drillsense Engine] WARNING: config.json missing or corrupt, restored from config.json.bak',
    );
    expect(JSON.parse(fs.readFileSync(configFile, 'utf-8'))).toMatchObject({ cycle: { interval_ms: 9000 } });
  });

  it('falls back to defaults when both files are invalid', () => {
    fs.writeFileSync(configFile, JSON.stringify({ cycle: { interval_ms: 10 } }));
    fs.writeFileSync(backupFile, 'garbage');

    expect(loadConfig().cycle.interval_ms).toBe(5000);
  });

  it('merges updates section by section', () => {
    loadConfig();
    const updated = updateConfig({
      consensus: { thresholds: { hole_cleaning: 0.5 }, min_signals: 3 },
      agents: { hole_cleaning: { step_size: 0.02 } },
    });

    expect(updated.consensus.thresholds.hole_cleaning).toBe(0.5);
    expect(updated.consensus.thresholds.sticking).toBe(0.6);
    expect(updated.consensus.min_signals).toBe(3);
    expect(updated.agents['hole_cleaning']).toEqual({ enabled: true, step_size: 0.02, divergence_trip_count: 5 });
    expect(loadConfig().consensus.min_signals).toBe(3);
  });

  it('rejects an invalid update without touching the file', () => {
    loadConfig();
    const before = fs.readFileSync(configFile, 'utf-8');
    expect(() => updateConfig({ alerts: { max_history: 0 } })).toThrow();
    expect(fs.readFileSync(configFile, 'utf-8')).toBe(before);
  });

  describe('setters', () => {
    it('validates thresholds', () => {
      expect(setThreshold('sticking', 0.55).consensus.thresholds.sticking).toBe(0.55);
      expect(() => setThreshold('sticking', 1.2)).toThrow('Threshold must be between 0 and 1, got 1.2');
      expect(() => setThreshold('sticking', Number.NaN)).toThrow(RangeError);
    });

    it('validates the cycle interval', () => {
      expect(setCycleInterval(2000).cycle.interval_ms).toBe(2000);
      expect(() => setCycleInterval(999)).toThrow(RangeError);
      expect(() => setCycleInterval(1500.5)).toThrow(RangeError);
    });

    it('toggles known agents only', () => {
      expect(toggleAgent('rop_optimization', false).agents['rop_optimization']?.enabled).toBe(false);
      expect(() => toggleAgent('seismic', true)).toThrow('Unknown agent type: seismic');
    });
  });

  describe('toEngineSettings', () => {
    it('maps config sections to component options', () => {
      loadConfig();
      updateConfig({
        agents: { washout_mud_loss: { enabled: false }, hole_cleaning: { sensitivity: 0.8, divergence_trip_count: 3 } },
        alerts: { webhook_url: 'https://hooks.example.test/drill' },
      });
      const settings = toEngineSettings(loadConfig());

      expect(settings.engine).toEqual({ cycleIntervalMs: 5000, cycleDeadlineMs: 2000 });
      expect(settings.consensus).toMatchObject({ corroborationWindow: 2, minCorroboratingSignals: 2, alertExpiryMs: 900_000 });
      expect(settings.disabledAgents).toEqual(['washout_mud_loss']);
      expect(settings.paramOverrides).toEqual({ hole_cleaning: { sensitivity: 0.8 } });
      expect(settings.adaptation.perAgent?.['hole_cleaning']).toEqual({ stepSize: 0.05, divergenceTripCount: 3 });
      expect(settings.publisher).toEqual({
        maxHistory: 500,
        maxDeliveryAttempts: 3,
        webhookUrl: 'https://hooks.example.test/drill',
      });
      expect(settings.databasePath).toBe(path.join(configDir, 'history.db'));
      expect(settings).toMatchObject({ retentionDays: 30, autoClean: true });
    });
  });
});
