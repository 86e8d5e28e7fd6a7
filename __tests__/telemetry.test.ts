import { describe, it, expect } from 'vitest';
import { freezeWindow, validateWindow } from '../src/telemetry/window.js';
import {
  BIT_DIAMETER_IN,
  computeStats,
  differentialPressure,
  dragFactor,
  extractFeatures,
  holeCleaningIndex,
  mechanicalSpecificEnergy,
} from '../src/telemetry/features.js';
import { makeSample, makeWindow, T0 } from './helpers/fixtures.js';

describe('Telemetry window', () => {
  describe('validateWindow', () => {
    it('accepts a well-formed window', () => {
      const result = validateWindow(makeWindow('w1', T0));
      expect(result.ok).toBe(true);
    });

    it('rejects a window without samples', () => {
      const result = validateWindow({ id: 'w1', startTime: T0, endTime: T0, samples: [] });
      expect(result).toEqual({ ok: false, issues: ['samples: window has no samples'] });
    });

    it('rejects decreasing sample timestamps', () => {
      const window = {
        id: 'w1',
        startTime: T0,
        endTime: T0 + 20_000,
        samples: [makeSample(T0 + 20_000), makeSample(T0 + 10_000)],
      };
      const result = validateWindow(window);
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.issues).toContain('samples.1.timestamp: sample timestamps decrease');
    });

    it('rejects samples outside the window bounds', () => {
      const window = { id: 'w1', startTime: T0, endTime: T0 + 10_000, samples: [makeSample(T0 + 20_000)] };
      const result = validateWindow(window);
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.issues).toEqual(['samples.0.timestamp: sample outside window bounds']);
    });

    it('rejects negative sensor values', () => {
      const window = { id: 'w1', startTime: T0, endTime: T0, samples: [makeSample(T0, { flowRate: -5 })] };
      const result = validateWindow(window);
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.issues[0]).toMatch(/^samples\.0\.flowRate: /);
    });

    it('rejects an empty id', () => {
      const result = validateWindow({ ...makeWindow('w1', T0), id: '' });
      expect(result.ok).toBe(false);
    });
  });

  describe('freezeWindow', () => {
    it('freezes the window, its sample list and every sample', () => {
      const frozen = freezeWindow(makeWindow('w1', T0, 3));
      expect(Object.isFrozen(frozen)).toBe(true);
      expect(Object.isFrozen(frozen.samples)).toBe(true);
      expect(frozen.samples.every(s => Object.isFrozen(s))).toBe(true);
    });

    it('returns an already frozen window as is', () => {
      const frozen = freezeWindow(makeWindow('w1', T0, 3));
      expect(freezeWindow(frozen)).toBe(frozen);
    });
  });
});

describe('Feature extraction', () => {
  const area = Math.PI * BIT_DIAMETER_IN ** 2;

  it('computes mean, population std and per-minute change', () => {
    const stats = computeStats([1, 2, 3], 120_000);
    expect(stats.avg).toBe(2);
    expect(stats.std).toBeCloseTo(Math.sqrt(2 / 3), 10);
    expect(stats.change).toBe(1);
  });

  it('reports zero change for a zero-length window', () => {
    expect(computeStats([5], 0)).toEqual({ avg: 5, std: 0, change: 0 });
    expect(computeStats([], 60_000)).toEqual({ avg: 0, std: 0, change: 0 });
  });

  it('computes mechanical specific energy', () => {
    expect(mechanicalSpecificEnergy(25, 120, 8, 60)).toBeCloseTo(100_000 / area + 460_800 / (area * 60), 8);
    expect(mechanicalSpecificEnergy(25, 120, 8, 0)).toBe(0);
  });

  it('computes hole cleaning index within [0.1, 1]', () => {
    expect(holeCleaningIndex(600, 120, 60)).toBeCloseTo(0.765, 10);
    expect(holeCleaningIndex(0, 120, 60)).toBe(0);
    expect(holeCleaningIndex(100, 10, 400)).toBe(0.1);
  });

  it('computes overbalance from ECD and depth', () => {
    expect(differentialPressure(12.5, 10_000)).toBeCloseTo(2_000, 6);
    // Underbalanced: no positive differential
    expect(differentialPressure(8, 10_000)).toBe(0);
  });

  it('computes drag factor from hook load against string weight', () => {
    expect(dragFactor(100, 10_000)).toBeCloseTo(0.5, 10);
    expect(dragFactor(300, 10_000)).toBe(1);
    expect(dragFactor(0, 10_000)).toBe(0);
  });

  it('extracts latest values and derived quantities from a window', () => {
    const window = makeWindow('w1', T0 + 50_000, 6, i => ({ torque: 8 + i }));
    const f = extractFeatures(window);
    expect(f.sampleCount).toBe(6);
    expect(f.durationMs).toBe(50_000);
    expect(f.channelCoverage).toBe(1);
    expect(f.torque).toBe(13);
    expect(f.stats.torque.avg).toBe(10.5);
    expect(f.stats.torque.change).toBeCloseTo(5 / (50_000 / 60_000), 10);
    expect(f.differentialPressure).toBeCloseTo(2_000, 6);
    expect(f.holeCleaningIndex).toBeCloseTo(0.765, 10);
  });

  it('falls back to mud density when ECD is missing', () => {
    const window = {
      id: 'w1',
      startTime: T0,
      endTime: T0,
      samples: [{ timestamp: T0, depth: 10_000, wob: 25, rpm: 120, torque: 8, standpipePressure: 3_500, flowRate: 600, mudDensity: 11 }],
    };
    const f = extractFeatures(window);
    expect(f.ecd).toBe(11);
    expect(f.rop).toBe(0);
    expect(f.channelCoverage).toBe(0);
    expect(f.mse).toBe(0);
  });
});
