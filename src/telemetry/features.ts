/**
 * Feature extraction from a telemetry window.
 *
 * Latest-sample values, per-channel window statistics, and the derived
 * drilling quantities the reference agents consume (MSE, hole cleaning index,
 * differential pressure, drag factor).
 */

import type { TelemetrySample, TelemetryWindow } from '../types.js';

export const BIT_DIAMETER_IN = 8.5;
/** Assumed string weight, klbs per ft (20 lbs/ft) */
export const STRING_WEIGHT_KLBS_PER_FT = 0.02;
export const PORE_PRESSURE_GRADIENT_PSI_FT = 0.45;
export const MUD_GRADIENT_FACTOR = 0.052;

export type Channel = 'wob' | 'rop' | 'rpm' | 'torque' | 'spp' | 'flowRate';

export interface ChannelStats {
  avg: number;
  std: number;
  /** Change per minute between first and last sample */
  change: number;
}

export interface DrillingFeatures {
  sampleCount: number;
  durationMs: number;
  /** Fraction of optional channels (rop, hookLoad, ecd) reported by the latest sample */
  channelCoverage: number;
  depth: number;
  wob: number;
  rop: number;
  rpm: number;
  torque: number;
  spp: number;
  flowRate: number;
  ecd: number;
  hookLoad: number;
  mse: number;
  dragFactor: number;
  differentialPressure: number;
  holeCleaningIndex: number;
  stats: Record<Channel, ChannelStats>;
}

const clamp = (v: number, lo: number, hi: number): number => Math.min(hi, Math.max(lo, v));

function channelValue(s: TelemetrySample, channel: Channel): number {
  switch (channel) {
    case 'spp': return s.standpipePressure;
    case 'rop': return s.rop ?? 0;
    default: return s[channel];
  }
}

export function computeStats(values: readonly number[], durationMs: number): ChannelStats {
  if (values.length === 0) return { avg: 0, std: 0, change: 0 };
  const avg = values.reduce((a, b) => a + b, 0) / values.length;
  const variance = values.reduce((a, v) => a + (v - avg) ** 2, 0) / values.length;
  const first = values[0] ?? 0;
  const last = values[values.length - 1] ?? 0;
  const minutes = durationMs / 60_000;
  return {
    avg,
    std: Math.sqrt(variance),
    change: minutes > 0 ? (last - first) / minutes : 0,
  };
}

/** MSE (psi) from WOB, RPM, torque and ROP; 0 when ROP/RPM/WOB is missing. */
export function mechanicalSpecificEnergy(wob: number, rpm: number, torque: number, rop: number): number {
  if (wob <= 0 || rpm <= 0 || rop <= 0) return 0;
  const area = Math.PI * BIT_DIAMETER_IN ** 2;
  return (4 * wob * 1000) / area + (480 * rpm * torque) / (area * rop);
}

export function holeCleaningIndex(flowRate: number, rpm: number, rop: number): number {
  if (flowRate <= 0 || rpm <= 0) return 0;
  return clamp(0.5 + 0.3 * (flowRate / 800) + 0.2 * (rpm / 150) - 0.1 * (rop / 50), 0.1, 1);
}

export function differentialPressure(ecd: number, depth: number): number {
  if (ecd <= 0 || depth <= 0) return 0;
  const hydrostatic = MUD_GRADIENT_FACTOR * ecd * depth;
  return Math.max(0, hydrostatic - PORE_PRESSURE_GRADIENT_PSI_FT * depth);
}

export function dragFactor(hookLoad: number, depth: number): number {
  if (hookLoad <= 0 || depth <= 0) return 0;
  return clamp(hookLoad / (depth * STRING_WEIGHT_KLBS_PER_FT), 0.1, 1);
}

export function extractFeatures(window: TelemetryWindow): DrillingFeatures {
  const samples = window.samples;
  const latest = samples[samples.length - 1];
  if (!latest) {
    throw new Error(`window ${window.id} has no samples`);
  }
  const first = samples[0] ?? latest;
  const durationMs = latest.timestamp - first.timestamp;

  const stat = (c: Channel): ChannelStats => computeStats(samples.map(s => channelValue(s, c)), durationMs);
  const stats: Record<Channel, ChannelStats> = {
    wob: stat('wob'),
    rop: stat('rop'),
    rpm: stat('rpm'),
    torque: stat('torque'),
    spp: stat('spp'),
    flowRate: stat('flowRate'),
  };

  const optional = [latest.rop, latest.hookLoad, latest.ecd];
  const channelCoverage = optional.filter(v => v !== undefined).length / optional.length;

  const rop = latest.rop ?? 0;
  const ecd = latest.ecd ?? latest.mudDensity;
  const hookLoad = latest.hookLoad ?? 0;

  return {
    sampleCount: samples.length,
    durationMs,
    channelCoverage,
    depth: latest.depth,
    wob: latest.wob,
    rop,
    rpm: latest.rpm,
    torque: latest.torque,
    spp: latest.standpipePressure,
    flowRate: latest.flowRate,
    ecd,
    hookLoad,
    mse: mechanicalSpecificEnergy(latest.wob, latest.rpm, latest.torque, rop),
    dragFactor: dragFactor(hookLoad, latest.depth),
    differentialPressure: differentialPressure(ecd, latest.depth),
    holeCleaningIndex: holeCleaningIndex(latest.flowRate, latest.rpm, rop),
    stats,
  };
}
