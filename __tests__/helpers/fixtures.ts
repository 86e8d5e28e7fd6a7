import { createAgentAdapter, type AgentAdapter, type AgentDefinition, type InferenceResult } from '../../src/agents/adapter.js';
import type { AnomalyCategory, Prediction, TelemetrySample, TelemetryWindow } from '../../src/types.js';

export const T0 = 1_700_000_000_000;

export function makeSample(timestamp: number, overrides: Partial<TelemetrySample> = {}): TelemetrySample {
  return {
    timestamp,
    depth: 10_000,
    wob: 25,
    rpm: 120,
    torque: 8,
    standpipePressure: 3_500,
    flowRate: 600,
    mudDensity: 12,
    rop: 60,
    hookLoad: 200,
    ecd: 12.5,
    ...overrides,
  };
}

/** `count` samples 10s apart ending at `endTime`; `shape(i)` overrides per sample. */
export function makeWindow(
  id: string,
  endTime: number,
  count = 6,
  shape: (i: number) => Partial<TelemetrySample> = () => ({}),
): TelemetryWindow {
  const startTime = endTime - (count - 1) * 10_000;
  const samples: TelemetrySample[] = [];
  for (let i = 0; i < count; i++) {
    samples.push(makeSample(startTime + i * 10_000, shape(i)));
  }
  return { id, startTime, endTime, samples };
}

export function makePrediction(overrides: Partial<Prediction> = {}): Prediction {
  return {
    id: 'pred-1',
    agentType: 'mechanical_sticking',
    category: 'sticking',
    score: 0.5,
    confidence: 1,
    evidence: { residuals: {}, metrics: {}, factors: [], recommendations: [] },
    windowId: 'w1',
    windowTimestamp: T0,
    timestamp: T0,
    modelVersion: 1,
    ...overrides,
  };
}

export interface ScriptedAgent {
  definition: AgentDefinition;
  /** Score returned before calibration; change it between cycles */
  setScore(score: number): void;
  setResult(patch: Partial<InferenceResult>): void;
}

/**
 * Agent whose raw score is set by the test. Calibration is `raw + bias` so
 * adaptation steps are visible in the output.
 */
export function scriptedAgent(agentType: string, category: AnomalyCategory, initial = 0): ScriptedAgent {
  let score = initial;
  let patch: Partial<InferenceResult> = {};
  const definition: AgentDefinition = {
    agentType,
    category,
    description: `scripted ${agentType}`,
    defaultParams: { sensitivity: 0.5, bias: 0 },
    parameterBounds: { sensitivity: [0.1, 1.5], bias: [-0.3, 0.3] },
    infer: (_features, params) => ({
      score: Math.min(1, Math.max(0, score + (params['bias'] ?? 0))),
      confidence: 1,
      residuals: {},
      metrics: {},
      factors: [],
      recommendations: [`Check ${agentType}`],
      ...patch,
    }),
  };
  return {
    definition,
    setScore: (s: number) => {
      score = s;
    },
    setResult: (p: Partial<InferenceResult>) => {
      patch = p;
    },
  };
}

export function scriptedAdapter(agentType: string, category: AnomalyCategory, initial = 0): ScriptedAgent & { adapter: AgentAdapter } {
  const agent = scriptedAgent(agentType, category, initial);
  return { ...agent, adapter: createAgentAdapter(agent.definition, { now: () => T0 }) };
}

/** Adapter that never answers on its own; settles only when its signal aborts. */
export function hangingAdapter(agentType: string, category: AnomalyCategory): AgentAdapter {
  const base = scriptedAdapter(agentType, category).adapter;
  return {
    ...base,
    predict: (_window, signal) =>
      new Promise<Prediction>((_resolve, reject) => {
        signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
      }),
  };
}
