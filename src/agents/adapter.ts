/**
 * Drillsense Agent Adapters
 *
 * Uniform `predict(window) → Prediction` contract over heterogeneous agent
 * models. An adapter is assembled from an AgentDefinition (pure inference
 * function + parameter defaults and bounds) rather than subclassed, so a new
 * agent type is a registration, not a change to the consensus code.
 *
 * @packageDocumentation
 */

import { randomUUID } from 'node:crypto';
import { AgentUnavailableError, InvalidWindowError, errorMessage } from '../errors.js';
import { extractFeatures, type DrillingFeatures } from '../telemetry/features.js';
import { freezeWindow, validateWindow } from '../telemetry/window.js';
import type {
  AgentModelState,
  AgentType,
  AnomalyCategory,
  ContributingFactor,
  ParameterBounds,
  Prediction,
  TelemetryWindow,
} from '../types.js';
import { ModelStateCell } from './model-state.js';

// ─── Types ───────────────────────────────────────────────────────────

export interface InferenceResult {
  /** Calibrated risk in [0,1] */
  score: number;
  /** Overrides the data-coverage confidence when the model knows better */
  confidence?: number;
  residuals: Record<string, number>;
  metrics: Record<string, number>;
  factors: ContributingFactor[];
  recommendations: string[];
  issueType?: string;
}

export interface AgentDefinition {
  agentType: AgentType;
  category: AnomalyCategory;
  description: string;
  /** Physics-derived starting point for a new well */
  defaultParams: Readonly<Record<string, number>>;
  parameterBounds: ParameterBounds;
  infer(features: DrillingFeatures, params: Readonly<Record<string, number>>): InferenceResult;
}

export interface AgentAdapter {
  readonly agentType: AgentType;
  readonly category: AnomalyCategory;
  readonly defaultParams: Readonly<Record<string, number>>;
  readonly parameterBounds: ParameterBounds;
  /** The adapter's own model state; only the adaptation controller swaps it */
  readonly model: ModelStateCell;
  predict(window: TelemetryWindow, signal?: AbortSignal): Promise<Prediction>;
}

export interface AdapterOptions {
  /** Start from these parameters instead of the definition defaults */
  initialParams?: Readonly<Record<string, number>>;
  now?: () => number;
}

// ─── Helpers ─────────────────────────────────────────────────────────

export const clamp01 = (v: number): number => Math.min(1, Math.max(0, v));

/**
 * Apply the adaptable calibration parameters to a raw model output:
 * `raw × (1 + (sensitivity − 0.5)) + bias`, clamped to [0,1].
 */
export function calibrate(raw: number, params: Readonly<Record<string, number>>): number {
  const sensitivity = params['sensitivity'] ?? 0.5;
  const bias = params['bias'] ?? 0;
  return clamp01(raw * (1 + (sensitivity - 0.5)) + bias);
}

/** Confidence from data coverage: more samples and more optional channels → higher. */
export function dataConfidence(features: DrillingFeatures): number {
  const depth = Math.min(1, features.sampleCount / 10);
  return clamp01(0.5 + 0.3 * depth + 0.2 * features.channelCoverage);
}

function throwIfAborted(agentType: AgentType, signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new AgentUnavailableError(agentType, 'cancelled at cycle deadline', { timedOut: true });
  }
}

// ─── Factory ─────────────────────────────────────────────────────────

export function createAgentAdapter(definition: AgentDefinition, options: AdapterOptions = {}): AgentAdapter {
  const now = options.now ?? Date.now;
  const model = new ModelStateCell(definition.agentType, options.initialParams ?? definition.defaultParams, now());

  async function predict(window: TelemetryWindow, signal?: AbortSignal): Promise<Prediction> {
    throwIfAborted(definition.agentType, signal);

    const validation = validateWindow(window);
    if (!validation.ok) {
      throw new InvalidWindowError(window.id, validation.issues);
    }
    const frozen = freezeWindow(validation.window);

    // One snapshot per call; a concurrent swap does not affect this prediction
    const snapshot: AgentModelState = model.snapshot();

    let features: DrillingFeatures;
    let result: InferenceResult;
    try {
      features = extractFeatures(frozen);
      result = definition.infer(features, snapshot.params);
    } catch (err) {
      throw new AgentUnavailableError(definition.agentType, `inference failed: ${errorMessage(err)}`, { cause: err });
    }
    throwIfAborted(definition.agentType, signal);

    const confidence = result.confidence ?? dataConfidence(features);
    const prediction: Prediction = {
      id: randomUUID(),
      agentType: definition.agentType,
      category: definition.category,
      score: result.score,
      confidence,
      evidence: Object.freeze({
        residuals: Object.freeze({ ...result.residuals }),
        metrics: Object.freeze({ ...result.metrics }),
        factors: Object.freeze(result.factors.map(f => Object.freeze({ ...f }))),
        recommendations: Object.freeze([...result.recommendations]),
        ...(result.issueType !== undefined ? { issueType: result.issueType } : {}),
      }),
      windowId: frozen.id,
      windowTimestamp: frozen.endTime,
      timestamp: Math.max(now(), frozen.endTime),
      modelVersion: snapshot.version,
    };
    return Object.freeze(prediction);
  }

  return {
    agentType: definition.agentType,
    category: definition.category,
    defaultParams: Object.freeze({ ...definition.defaultParams }),
    parameterBounds: definition.parameterBounds,
    model,
    predict,
  };
}
