/**
 * Seeded telemetry simulator.
 *
 * Generates 10-second drilling samples around typical set points (10,000 ft,
 * 25 klbs WOB, 120 RPM, 600 gpm, 12.5 ppg ECD) with noise and slow sinusoidal
 * trends, grouped into windows. A scenario biases the channels toward one
 * anomaly, ramping in over the first few windows after it is set.
 */

import type { TelemetrySample, TelemetryWindow } from '../types.js';
import type { WindowSource } from '../engine/detection-engine.js';

export const SCENARIOS = ['normal', 'sticking', 'washout', 'mud_loss', 'pack_off'] as const;
export type Scenario = typeof SCENARIOS[number];

export function isScenario(value: string): value is Scenario {
  return (SCENARIOS as readonly string[]).includes(value);
}

export interface SimulatorConfig {
  seed: number;
  /** Noise scale, 0 (none) to 1 (default: 0.5) */
  volatility: number;
  /** Slow sinusoidal drift on every channel */
  trending: boolean;
  sampleIntervalMs: number;
  samplesPerWindow: number;
  /** First sample time (default: now) */
  startTime: number;
  wellId: string;
  scenario: Scenario;
  /** Windows until a scenario reaches full intensity */
  rampWindows: number;
  /** Stop after this many windows; null for an endless source */
  maxWindows: number | null;
}

export const DEFAULT_SIMULATOR_CONFIG: Omit<SimulatorConfig, 'startTime'> = {
  seed: 42,
  volatility: 0.5,
  trending: true,
  sampleIntervalMs: 10_000,
  samplesPerWindow: 12,
  wellId: 'sim-well-1',
  scenario: 'normal',
  rampWindows: 3,
  maxWindows: null,
};

const BASE = {
  depth: 10_000,
  wob: 25,
  rop: 60,
  rpm: 120,
  torque: 8,
  spp: 3_500,
  flowRate: 600,
  ecd: 12.5,
  mudDensity: 12.0,
  hookLoad: 200,
};

/** mulberry32: small, fast, deterministic */
export function createRng(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export class TelemetrySimulator implements WindowSource {
  private config: SimulatorConfig;
  private rng: () => number;
  private sampleIndex = 0;
  private windowIndex = 0;
  private scenarioStartWindow = 0;

  constructor(config?: Partial<SimulatorConfig>) {
    this.config = { ...DEFAULT_SIMULATOR_CONFIG, startTime: Date.now(), ...config };
    this.rng = createRng(this.config.seed);
  }

  getConfig(): SimulatorConfig {
    return { ...this.config };
  }

  get scenario(): Scenario {
    return this.config.scenario;
  }

  setScenario(scenario: Scenario): void {
    if (scenario === this.config.scenario) return;
    this.config.scenario = scenario;
    this.scenarioStartWindow = this.windowIndex;
  }

  next(): TelemetryWindow | null {
    if (this.config.maxWindows !== null && this.windowIndex >= this.config.maxWindows) return null;
    return this.nextWindow();
  }

  nextWindow(): TelemetryWindow {
    const { samplesPerWindow, rampWindows } = this.config;
    const intensity = this.config.scenario === 'normal'
      ? 0
      : Math.min(1, (this.windowIndex - this.scenarioStartWindow + 1) / Math.max(1, rampWindows));

    const samples: TelemetrySample[] = [];
    for (let i = 0; i < samplesPerWindow; i++) {
      // 0 → 1 across the window, for in-window trends
      const progress = samplesPerWindow > 1 ? i / (samplesPerWindow - 1) : 1;
      samples.push(this.sample(intensity, progress));
      this.sampleIndex++;
    }

    const first = samples[0];
    const last = samples[samples.length - 1];
    const window: TelemetryWindow = {
      id: `${this.config.wellId}-w${this.windowIndex}`,
      wellId: this.config.wellId,
      startTime: first?.timestamp ?? this.config.startTime,
      endTime: last?.timestamp ?? this.config.startTime,
      samples,
    };
    this.windowIndex++;
    return window;
  }

  // ─── Private ──────────────────────────────────────────────────────

  private noise(amplitude: number): number {
    return (this.rng() * 2 - 1) * amplitude * this.config.volatility * 2;
  }

  private trend(scale: number, frequency: number): number {
    if (!this.config.trending) return 0;
    // One full period every 360 samples (one hour)
    return scale * Math.sin((2 * Math.PI * this.sampleIndex * frequency) / 360);
  }

  private sample(k: number, progress: number): TelemetrySample {
    const idx = this.sampleIndex;
    const depth = BASE.depth + idx * 0.2 + this.noise(0.1);
    const wob = BASE.wob + this.trend(3, 1) + this.noise(1);
    let rop = BASE.rop + this.trend(10, 0.7) + this.noise(5);
    let rpm = BASE.rpm + this.trend(15, 0.5) + this.noise(5);
    let torque = BASE.torque + this.trend(1, 1.3) + this.noise(0.3);
    let spp = BASE.spp + this.trend(200, 0.9) + this.noise(50);
    let flowRate = BASE.flowRate + this.trend(40, 1.1) + this.noise(10);
    let ecd = BASE.ecd + this.trend(0.3, 0.8) + this.noise(0.1);
    let hookLoad = BASE.hookLoad + this.trend(15, 0.6) + this.noise(5);

    switch (this.config.scenario) {
      case 'sticking':
        torque *= 1 + 0.6 * k * progress;
        rpm -= 40 * k * progress + this.noise(10 * k);
        hookLoad -= 60 * k;
        flowRate -= 200 * k;
        ecd += 1.5 * k;
        rop *= 1 - 0.5 * k;
        break;
      case 'washout':
        spp *= 1 - 0.25 * k * progress;
        flowRate += 40 * k * progress;
        torque += this.noise(2 * k);
        break;
      case 'mud_loss':
        flowRate *= 1 - 0.3 * k * progress;
        spp *= 1 - 0.1 * k * progress;
        ecd += 1.5 * k;
        break;
      case 'pack_off':
        rop *= 1 + 0.8 * k;
        flowRate -= 250 * k;
        rpm -= 50 * k;
        spp += 300 * k * progress;
        break;
      case 'normal':
        break;
    }

    return {
      timestamp: this.config.startTime + idx * this.config.sampleIntervalMs,
      depth: Math.max(0, depth),
      wob: Math.max(0, wob),
      rpm: Math.max(0, rpm),
      torque: Math.max(0, torque),
      standpipePressure: Math.max(0, spp),
      flowRate: Math.max(0, flowRate),
      mudDensity: BASE.mudDensity,
      rop: Math.max(0, rop),
      hookLoad: Math.max(0, hookLoad),
      ecd: Math.max(0, ecd),
    };
  }
}
