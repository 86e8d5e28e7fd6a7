/**
 * Drillsense Physics Constraint Checker
 *
 * Stateless validation of every Prediction before it may vote and of every
 * parameter delta before it may be applied. Pure functions: a verdict, never
 * a thrown error; callers decide whether to drop, log or escalate.
 *
 * @packageDocumentation
 */

import type {
  AgentModelState,
  ConstraintReason,
  ConstraintVerdict,
  ParameterBounds,
  ParameterDelta,
  Prediction,
} from '../types.js';

// ─── Limits ──────────────────────────────────────────────────────────

export interface PhysicsLimits {
  /** Max |residual| per residual name */
  maxResidual: Readonly<Record<string, number>>;
  /** Bound for residual names not listed above */
  defaultResidualBound: number;
  /** Upper limit per rate-like metric (ft/hr, klbs, rpm, gpm) */
  maxRate: Readonly<Record<string, number>>;
}

export const DEFAULT_PHYSICS_LIMITS: PhysicsLimits = {
  maxResidual: {
    massBalance: 1.5,
    pressureBalance: 1.5,
    energyBalance: 1.0,
    torqueBalance: 10,
  },
  defaultResidualBound: 5,
  maxRate: {
    rop: 500,
    expectedRop: 500,
    recommendedWob: 100,
    recommendedRpm: 300,
    recommendedFlowRate: 1500,
  },
};

// ─── Helpers ─────────────────────────────────────────────────────────

const OK: ConstraintVerdict = Object.freeze({ ok: true });

function fail(reason: ConstraintReason, detail: string): ConstraintVerdict {
  return { ok: false, reason, detail };
}

function firstNonFinite(values: Readonly<Record<string, number>>): string | null {
  for (const [name, value] of Object.entries(values)) {
    if (!Number.isFinite(value)) return name;
  }
  return null;
}

// ─── Predictions ─────────────────────────────────────────────────────

export function checkPrediction(prediction: Prediction, limits: PhysicsLimits = DEFAULT_PHYSICS_LIMITS): ConstraintVerdict {
  if (!prediction.windowId || !Number.isFinite(prediction.windowTimestamp)) {
    return fail('MISSING_WINDOW', `prediction ${prediction.id} has no source window`);
  }

  const scalars: Record<string, number> = {
    score: prediction.score,
    confidence: prediction.confidence,
    timestamp: prediction.timestamp,
  };
  const nonFinite =
    firstNonFinite(scalars) ??
    firstNonFinite(prediction.evidence.residuals) ??
    firstNonFinite(prediction.evidence.metrics);
  if (nonFinite !== null) {
    return fail('NON_FINITE_VALUE', `${nonFinite} is not a finite number`);
  }

  if (prediction.score < 0 || prediction.score > 1) {
    return fail('SCORE_OUT_OF_RANGE', `score ${prediction.score} outside [0,1]`);
  }
  if (prediction.confidence < 0 || prediction.confidence > 1) {
    return fail('CONFIDENCE_OUT_OF_RANGE', `confidence ${prediction.confidence} outside [0,1]`);
  }

  for (const [name, value] of Object.entries(prediction.evidence.residuals)) {
    const bound = limits.maxResidual[name] ?? limits.defaultResidualBound;
    if (Math.abs(value) > bound) {
      return fail('RESIDUAL_EXCEEDS_BOUND', `|${name}| = ${Math.abs(value).toFixed(3)} exceeds ${bound}`);
    }
  }

  const metrics = prediction.evidence.metrics;
  const wear = metrics['impliedBitWearRate'];
  if (wear !== undefined && wear < 0) {
    return fail('NEGATIVE_BIT_WEAR', `implied bit wear rate ${wear} is negative`);
  }

  for (const [name, max] of Object.entries(limits.maxRate)) {
    const value = metrics[name];
    if (value === undefined) continue;
    if (value < 0 || value > max) {
      return fail('IMPLAUSIBLE_RATE', `${name} = ${value} outside [0, ${max}]`);
    }
  }

  if (prediction.timestamp < prediction.windowTimestamp) {
    return fail('TIMESTAMP_BEFORE_WINDOW', `prediction at ${prediction.timestamp} precedes window end ${prediction.windowTimestamp}`);
  }

  return OK;
}

// ─── Parameter updates ───────────────────────────────────────────────

/**
 * Validate a candidate delta against the snapshot it was computed from.
 * `baseVersion` is the version the delta was derived against; it must still
 * be the live version.
 */
export function checkParameterUpdate(
  state: AgentModelState,
  delta: ParameterDelta,
  bounds: ParameterBounds,
  maxStep: number,
  baseVersion: number = state.version,
): ConstraintVerdict {
  if (baseVersion !== state.version) {
    return fail('STALE_BASE_VERSION', `delta based on v${baseVersion}, live state is v${state.version}`);
  }

  for (const [name, step] of Object.entries(delta)) {
    const current = state.params[name];
    const range = bounds[name];
    if (current === undefined || range === undefined) {
      return fail('UNKNOWN_PARAMETER', `${state.agentType} has no adaptable parameter "${name}"`);
    }
    if (!Number.isFinite(step)) {
      return fail('NON_FINITE_VALUE', `delta for ${name} is not a finite number`);
    }
    if (Math.abs(step) > maxStep) {
      return fail('STEP_TOO_LARGE', `|Δ${name}| = ${Math.abs(step).toFixed(4)} exceeds max step ${maxStep}`);
    }
    const next = current + step;
    const [min, max] = range;
    if (next < min || next > max) {
      return fail('PARAMETER_OUT_OF_BOUNDS', `${name} would become ${next.toFixed(4)}, outside [${min}, ${max}]`);
    }
  }

  return OK;
}

/** Apply a delta that has already passed `checkParameterUpdate`. */
export function applyDelta(params: Readonly<Record<string, number>>, delta: ParameterDelta): Record<string, number> {
  const next: Record<string, number> = { ...params };
  for (const [name, step] of Object.entries(delta)) {
    next[name] = (params[name] ?? 0) + step;
  }
  return next;
}
