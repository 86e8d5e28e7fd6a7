import { describe, it, expect } from 'vitest';
import { applyDelta, checkParameterUpdate, checkPrediction, DEFAULT_PHYSICS_LIMITS } from '../src/physics/constraints.js';
import type { AgentModelState } from '../src/types.js';
import { makePrediction, T0 } from './helpers/fixtures.js';

const withEvidence = (residuals: Record<string, number>, metrics: Record<string, number> = {}) =>
  makePrediction({ evidence: { residuals, metrics, factors: [], recommendations: [] } });

describe('checkPrediction', () => {
  it('accepts a consistent prediction', () => {
    expect(checkPrediction(withEvidence({ massBalance: 0.2 }, { rop: 80 }))).toEqual({ ok: true });
  });

  it('rejects a prediction without a source window', () => {
    const verdict = checkPrediction(makePrediction({ windowId: '' }));
    expect(verdict.ok === false && verdict.reason).toBe('MISSING_WINDOW');
  });

  it('rejects non-finite scores and evidence', () => {
    expect(checkPrediction(makePrediction({ score: Number.NaN }))).toMatchObject({ ok: false, reason: 'NON_FINITE_VALUE' });
    expect(checkPrediction(withEvidence({ massBalance: Infinity }))).toEqual({
      ok: false,
      reason: 'NON_FINITE_VALUE',
      detail: 'massBalance is not a finite number',
    });
  });

  it('rejects score and confidence outside [0,1]', () => {
    expect(checkPrediction(makePrediction({ score: 1.2 }))).toMatchObject({ reason: 'SCORE_OUT_OF_RANGE' });
    expect(checkPrediction(makePrediction({ confidence: -0.1 }))).toMatchObject({ reason: 'CONFIDENCE_OUT_OF_RANGE' });
  });

  it('bounds residuals by name, with a default for unlisted ones', () => {
    expect(checkPrediction(withEvidence({ massBalance: -1.6 }))).toEqual({
      ok: false,
      reason: 'RESIDUAL_EXCEEDS_BOUND',
      detail: '|massBalance| = 1.600 exceeds 1.5',
    });
    expect(checkPrediction(withEvidence({ somethingElse: 4.9 })).ok).toBe(true);
    expect(checkPrediction(withEvidence({ somethingElse: 5.1 }))).toMatchObject({ reason: 'RESIDUAL_EXCEEDS_BOUND' });
  });

  it('rejects negative implied bit wear', () => {
    expect(checkPrediction(withEvidence({}, { impliedBitWearRate: -0.01 }))).toMatchObject({ reason: 'NEGATIVE_BIT_WEAR' });
  });

  it('rejects implausible rates', () => {
    expect(checkPrediction(withEvidence({}, { rop: 650 }))).toEqual({
      ok: false,
      reason: 'IMPLAUSIBLE_RATE',
      detail: 'rop = 650 outside [0, 500]',
    });
    expect(checkPrediction(withEvidence({}, { recommendedWob: -1 }))).toMatchObject({ reason: 'IMPLAUSIBLE_RATE' });
  });

  it('rejects a prediction stamped before its window ended', () => {
    const verdict = checkPrediction(makePrediction({ windowTimestamp: T0, timestamp: T0 - 1 }));
    expect(verdict).toMatchObject({ ok: false, reason: 'TIMESTAMP_BEFORE_WINDOW' });
  });

  it('uses custom limits when given', () => {
    const limits = { ...DEFAULT_PHYSICS_LIMITS, maxResidual: { massBalance: 0.1 } };
    expect(checkPrediction(withEvidence({ massBalance: 0.2 }), limits)).toMatchObject({ reason: 'RESIDUAL_EXCEEDS_BOUND' });
  });
});

describe('checkParameterUpdate', () => {
  const state: AgentModelState = { agentType: 'a', version: 3, params: { sensitivity: 0.5, bias: 0.25 }, updatedAt: T0 };
  const bounds = { sensitivity: [0.1, 1.5], bias: [-0.3, 0.3] } as const;

  it('accepts an in-bounds small step', () => {
    expect(checkParameterUpdate(state, { sensitivity: 0.05, bias: 0.04 }, bounds, 0.1)).toEqual({ ok: true });
  });

  it('rejects a delta computed against an older version', () => {
    expect(checkParameterUpdate(state, { sensitivity: 0.01 }, bounds, 0.1, 2)).toEqual({
      ok: false,
      reason: 'STALE_BASE_VERSION',
      detail: 'delta based on v2, live state is v3',
    });
  });

  it('rejects unknown parameters', () => {
    expect(checkParameterUpdate(state, { gain: 0.01 }, bounds, 0.1)).toMatchObject({ reason: 'UNKNOWN_PARAMETER' });
  });

  it('rejects non-finite and oversized steps', () => {
    expect(checkParameterUpdate(state, { sensitivity: Number.NaN }, bounds, 0.1)).toMatchObject({ reason: 'NON_FINITE_VALUE' });
    expect(checkParameterUpdate(state, { sensitivity: 0.2 }, bounds, 0.1)).toMatchObject({ reason: 'STEP_TOO_LARGE' });
  });

  it('rejects a step that leaves the bounds', () => {
    expect(checkParameterUpdate(state, { bias: 0.06 }, bounds, 0.1)).toEqual({
      ok: false,
      reason: 'PARAMETER_OUT_OF_BOUNDS',
      detail: 'bias would become 0.3100, outside [-0.3, 0.3]',
    });
  });

  it('applies a delta without touching other parameters', () => {
    const next = applyDelta(state.params, { sensitivity: 0.05 });
    expect(next['sensitivity']).toBeCloseTo(0.55, 10);
    expect(next['bias']).toBe(0.25);
    expect(state.params['sensitivity']).toBe(0.5);
  });
});
