import { describe, it, expect, vi, beforeEach } from 'vitest';
import { OnlineAdaptationController } from '../src/adaptation/controller.js';
import type { Alert, FeedbackEvent } from '../src/types.js';
import { scriptedAdapter, T0 } from './helpers/fixtures.js';

function makeAlert(evidence: Record<string, number>, overrides: Partial<Alert> = {}): Alert {
  return {
    id: 'alert-1',
    revision: 1,
    category: 'sticking',
    severity: 'high',
    vote: 0.8,
    supportingAgents: Object.keys(evidence),
    supportingPredictionIds: [],
    windowTimestamp: T0,
    createdAt: T0,
    updatedAt: T0,
    status: 'pending',
    message: 'Stuck pipe risk 80% from Stub',
    recommendation: 'Work pipe',
    evidence,
    ...overrides,
  };
}

let seq = 0;
function feedback(kind: FeedbackEvent['kind'], overrides: Partial<FeedbackEvent> = {}): FeedbackEvent {
  return { id: `fb-${++seq}`, alertId: 'alert-1', kind, source: 'operator', timestamp: T0, ...overrides };
}

function setup(config?: ConstructorParameters<typeof OnlineAdaptationController>[0]) {
  const stub = scriptedAdapter('stub', 'sticking');
  const controller = new OnlineAdaptationController(config, {}, () => T0);
  controller.attach(stub.adapter);
  return { controller, adapter: stub.adapter };
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
});

describe('OnlineAdaptationController', () => {
  it('moves calibration toward a confirmed alert', () => {
    const { controller, adapter } = setup();
    const result = controller.applyFeedback(feedback('confirmed'), { alert: makeAlert({ stub: 0.8 }), categoryAgents: ['stub'] });

    expect(result.duplicate).toBe(false);
    expect(result.updates).toHaveLength(1);
    expect(result.updates[0]?.status).toBe('applied');
    const state = adapter.model.snapshot();
    expect(state.version).toBe(2);
    // step = 0.05 · (1 − 0.8)
    expect(state.params['sensitivity']).toBeCloseTo(0.51, 10);
    expect(state.params['bias']).toBeCloseTo(0.01, 10);
  });

  it('moves calibration away from a false positive', () => {
    const { controller, adapter } = setup();
    controller.applyFeedback(feedback('false_positive'), { alert: makeAlert({ stub: 0.8 }), categoryAgents: ['stub'] });
    expect(adapter.model.snapshot().params['bias']).toBeCloseTo(-0.04, 10);
  });

  it('applies an event id only once', () => {
    const { controller, adapter } = setup();
    const event = feedback('confirmed');
    const context = { alert: makeAlert({ stub: 0.8 }), categoryAgents: ['stub'] };

    controller.applyFeedback(event, context);
    const again = controller.applyFeedback(event, context);

    expect(again).toEqual({ eventId: event.id, duplicate: true, updates: [], diverged: [] });
    expect(adapter.model.snapshot().version).toBe(2);
    expect(controller.hasApplied(event.id)).toBe(true);
    expect(controller.lastEventForAlert('alert-1')).toBe(event.id);
  });

  it('keeps ignoring the last event of an alert after its id leaves the tracked set', () => {
    const { controller, adapter } = setup({ maxTrackedEvents: 2 });
    const context = { alert: makeAlert({ stub: 0.8 }), categoryAgents: ['stub'] };
    const first = feedback('confirmed', { alertId: 'alert-a' });

    controller.applyFeedback(first, context);
    controller.applyFeedback(feedback('confirmed', { alertId: 'alert-b' }), context);
    controller.applyFeedback(feedback('confirmed', { alertId: 'alert-c' }), context);
    expect(controller.hasApplied(first.id)).toBe(false);
    expect(adapter.model.snapshot().version).toBe(4);

    expect(controller.applyFeedback(first, context).duplicate).toBe(true);
    expect(adapter.model.snapshot().version).toBe(4);
  });

  it('bounds the per-alert tracker, dropping the least recently used alert', () => {
    const { controller } = setup({ maxTrackedAlerts: 2 });
    const context = { alert: makeAlert({ stub: 0.8 }), categoryAgents: ['stub'] };
    const latestForA = feedback('confirmed', { alertId: 'alert-a' });

    controller.applyFeedback(feedback('confirmed', { alertId: 'alert-a' }), context);
    controller.applyFeedback(feedback('confirmed', { alertId: 'alert-b' }), context);
    controller.applyFeedback(latestForA, context);
    controller.applyFeedback(feedback('confirmed', { alertId: 'alert-c' }), context);

    expect(controller.lastEventForAlert('alert-b')).toBeNull();
    expect(controller.lastEventForAlert('alert-a')).toBe(latestForA.id);
  });

  it('steps every category agent from the midpoint for a missed anomaly', () => {
    const { controller, adapter } = setup();
    const result = controller.applyFeedback(feedback('missed', { alertId: undefined, category: 'sticking' }), {
      alert: null,
      categoryAgents: ['stub'],
    });
    expect(result.updates[0]?.status).toBe('applied');
    expect(adapter.model.snapshot().params['bias']).toBeCloseTo(0.025, 10);
  });

  it('uses an outcome-derived observed score as the target', () => {
    const { controller, adapter } = setup();
    controller.applyFeedback(feedback('confirmed', { source: 'outcome', observedScore: 0.6 }), {
      alert: makeAlert({ stub: 0.8 }),
      categoryAgents: ['stub'],
    });
    expect(adapter.model.snapshot().params['bias']).toBeCloseTo(-0.01, 10);
  });

  it('applies an outcome residual directly', () => {
    const { controller, adapter } = setup();
    const outcome = controller.applyOutcome('stub', 0.2, 0.6);
    expect(outcome?.status).toBe('applied');
    expect(adapter.model.snapshot().params['bias']).toBeCloseTo(0.02, 10);
    expect(controller.applyOutcome('unknown', 0.2, 0.6)).toBeNull();
  });

  it('leaves the model unchanged when a step is rejected', () => {
    const { controller, adapter } = setup({ perAgent: { stub: { stepSize: 1 } } });
    const before = adapter.model.snapshot();
    const result = controller.applyFeedback(feedback('confirmed'), { alert: makeAlert({ stub: 0 }), categoryAgents: ['stub'] });

    expect(result.updates[0]).toMatchObject({ agentType: 'stub', status: 'rejected', reason: 'STEP_TOO_LARGE' });
    expect(adapter.model.snapshot()).toBe(before);
  });

  it('raises divergence after repeated rejections and blocks the agent', () => {
    const onDivergence = vi.fn();
    const { controller, adapter } = setup({ divergenceTripCount: 3, perAgent: { stub: { stepSize: 1 } } });
    controller.setHooks({ onDivergence });
    const context = { alert: makeAlert({ stub: 0 }), categoryAgents: ['stub'] };

    controller.applyFeedback(feedback('confirmed'), context);
    controller.applyFeedback(feedback('confirmed'), context);
    expect(controller.isBlocked('stub')).toBe(false);

    const third = controller.applyFeedback(feedback('confirmed'), context);
    expect(third.diverged).toEqual([{ agentType: 'stub', consecutiveRejections: 3, lastReason: 'STEP_TOO_LARGE', raisedAt: T0 }]);
    expect(controller.isBlocked('stub')).toBe(true);
    expect(onDivergence).toHaveBeenCalledTimes(1);

    const fourth = controller.applyFeedback(feedback('confirmed'), context);
    expect(fourth.updates).toEqual([{ agentType: 'stub', status: 'blocked' }]);
    expect(adapter.model.snapshot().version).toBe(1);
  });

  it('resets the rejection count after an accepted step', () => {
    const { controller } = setup({ divergenceTripCount: 2 });
    const bad = { alert: makeAlert({ stub: 0 }), categoryAgents: ['stub'] };
    controller.updateConfig({ perAgent: { stub: { stepSize: 1 } } });
    controller.applyFeedback(feedback('confirmed'), bad);
    controller.updateConfig({ perAgent: {} });
    controller.applyFeedback(feedback('confirmed'), { alert: makeAlert({ stub: 0.8 }), categoryAgents: ['stub'] });
    controller.updateConfig({ perAgent: { stub: { stepSize: 1 } } });
    controller.applyFeedback(feedback('confirmed'), bad);
    expect(controller.isBlocked('stub')).toBe(false);
  });

  it('counts saturation against the parameter bounds toward divergence', () => {
    const { controller } = setup({ divergenceTripCount: 3 });
    const context = { alert: makeAlert({ stub: 0 }), categoryAgents: ['stub'] };
    const reasons: string[] = [];
    for (let i = 0; i < 12; i++) {
      const result = controller.applyFeedback(feedback('confirmed'), context);
      const update = result.updates[0];
      if (update?.status === 'rejected') reasons.push(update.reason);
    }
    expect(reasons[0]).toBe('PARAMETER_OUT_OF_BOUNDS');
    expect(reasons).toHaveLength(3);
    expect(controller.isBlocked('stub')).toBe(true);
  });

  it('unblocks and optionally resets on recalibration', () => {
    const onStateChange = vi.fn();
    const { controller, adapter } = setup({ divergenceTripCount: 1, perAgent: { stub: { stepSize: 1 } } });
    controller.setHooks({ onStateChange });
    controller.applyOutcome('stub', 0.1, 0.9);
    adapter.model.swap(adapter.model.snapshot().version, { sensitivity: 0.9, bias: 0.2 });
    expect(controller.isBlocked('stub')).toBe(true);

    const state = controller.acknowledgeRecalibration('stub', { reset: true });
    expect(controller.isBlocked('stub')).toBe(false);
    expect(controller.getDivergence()).toEqual([]);
    expect(state?.params).toEqual({ sensitivity: 0.5, bias: 0 });
    expect(state?.version).toBe(3);
    expect(onStateChange).toHaveBeenCalledWith(state);
    expect(controller.acknowledgeRecalibration('unknown')).toBeNull();
  });

  it('notifies state changes for applied updates', () => {
    const onStateChange = vi.fn();
    const { controller, adapter } = setup();
    controller.setHooks({ onStateChange });
    controller.applyOutcome('stub', 0.5, 0.7);
    expect(onStateChange).toHaveBeenCalledWith(adapter.model.snapshot());
  });
});
