/**
 * Drillsense Online Adaptation Controller
 *
 * Turns operator feedback and observed outcomes into small calibration steps
 * on each agent's `sensitivity` and `bias`. Every step is validated by the
 * physics checker and published with a compare-and-swap on the model version;
 * predictions in flight keep the snapshot they started with.
 *
 * Repeatedly rejected steps mean the model is drifting out of its physical
 * envelope: the agent is marked diverged and adaptation stops for it until an
 * operator acknowledges a recalibration.
 *
 * @packageDocumentation
 */

import { ModelDivergenceError } from '../errors.js';
import { applyDelta, checkParameterUpdate } from '../physics/constraints.js';
import type { AgentAdapter } from '../agents/adapter.js';
import type {
  AgentModelState,
  AgentType,
  Alert,
  ConstraintReason,
  DivergenceCondition,
  FeedbackEvent,
  FeedbackKind,
  ParameterDelta,
} from '../types.js';

// ─── Types ───────────────────────────────────────────────────────────

export interface AgentAdaptationConfig {
  /** Learning rate applied to (target − score) (default: 0.05) */
  stepSize: number;
  /** Max |Δ| per parameter per update (default: 0.1) */
  maxStep: number;
  /** Consecutive rejections before divergence is raised (default: 5) */
  divergenceTripCount: number;
}

export interface AdaptationConfig extends AgentAdaptationConfig {
  /** Per-agent overrides of the defaults above */
  perAgent: Record<AgentType, Partial<AgentAdaptationConfig>>;
  /** Applied event ids remembered for idempotence (default: 10000) */
  maxTrackedEvents: number;
  /** Alerts whose last applied event id is remembered (default: 10000) */
  maxTrackedAlerts: number;
}

/** What the controller needs to know about the alert a feedback event refers to */
export interface FeedbackContext {
  alert: Alert | null;
  /** Agents serving the event's category, for missed events without an alert */
  categoryAgents: readonly AgentType[];
}

export type UpdateOutcome =
  | { agentType: AgentType; status: 'applied'; state: AgentModelState; delta: ParameterDelta }
  | { agentType: AgentType; status: 'rejected'; reason: ConstraintReason; detail: string }
  | { agentType: AgentType; status: 'blocked' };

export interface FeedbackResult {
  eventId: string;
  duplicate: boolean;
  updates: UpdateOutcome[];
  /** Divergence raised by this event */
  diverged: DivergenceCondition[];
}

export interface AdaptationHooks {
  onDivergence?: (condition: DivergenceCondition, error: ModelDivergenceError) => void;
  onStateChange?: (state: AgentModelState) => void;
}

// ─── Defaults ────────────────────────────────────────────────────────

export const DEFAULT_ADAPTATION_CONFIG: AdaptationConfig = {
  stepSize: 0.05,
  maxStep: 0.1,
  divergenceTripCount: 5,
  perAgent: {},
  maxTrackedEvents: 10_000,
  maxTrackedAlerts: 10_000,
};

/** Parameters the controller is allowed to move */
export const ADAPTABLE_PARAMETERS = ['sensitivity', 'bias'] as const;

const FEEDBACK_TARGET: Record<FeedbackKind, number> = {
  confirmed: 1,
  missed: 1,
  false_positive: 0,
};

// ─── OnlineAdaptationController ──────────────────────────────────────

export class OnlineAdaptationController {
  private config: AdaptationConfig;
  private adapters = new Map<AgentType, AgentAdapter>();
  private appliedEvents = new Set<string>();
  /** alertId → last applied feedback event id */
  private lastEventByAlert = new Map<string, string>();
  private rejections = new Map<AgentType, { count: number; reason: ConstraintReason }>();
  private diverged = new Map<AgentType, DivergenceCondition>();
  private hooks: AdaptationHooks;
  private now: () => number;

  constructor(config?: Partial<AdaptationConfig>, hooks: AdaptationHooks = {}, now: () => number = Date.now) {
    this.config = { ...DEFAULT_ADAPTATION_CONFIG, ...config };
    this.hooks = hooks;
    this.now = now;
  }

  updateConfig(config: Partial<AdaptationConfig>): void {
    this.config = { ...this.config, ...config };
  }

  getConfig(): AdaptationConfig {
    return { ...this.config, perAgent: { ...this.config.perAgent } };
  }

  setHooks(hooks: AdaptationHooks): void {
    this.hooks = { ...this.hooks, ...hooks };
  }

  attach(adapter: AgentAdapter): void {
    this.adapters.set(adapter.agentType, adapter);
  }

  agentConfig(agentType: AgentType): AgentAdaptationConfig {
    const { stepSize, maxStep, divergenceTripCount } = this.config;
    return { stepSize, maxStep, divergenceTripCount, ...this.config.perAgent[agentType] };
  }

  /**
   * Apply one feedback event. Events are expected from a single ordered
   * consumer; an event id already applied is a no-op.
   */
  applyFeedback(event: FeedbackEvent, context: FeedbackContext): FeedbackResult {
    const result: FeedbackResult = { eventId: event.id, duplicate: false, updates: [], diverged: [] };
    if (this.isDuplicate(event)) {
      return { ...result, duplicate: true };
    }

    const target = event.observedScore ?? FEEDBACK_TARGET[event.kind];
    const scores = this.scoresFor(event, context);
    if (scores.size === 0) {
      console.warn(`[Drillsense Adaptation] Feedback ${event.id} (${event.kind}) matches no agent, ignored`);
    }

    for (const [agentType, score] of scores) {
      const outcome = this.adjust(agentType, target, score, result);
      if (outcome) result.updates.push(outcome);
    }

    this.markApplied(event);
    return result;
  }

  /**
   * Outcome residual for one agent: move calibration toward the observed
   * ground-truth score. Not event-tracked; callers pass each outcome once.
   */
  applyOutcome(agentType: AgentType, predictedScore: number, observedScore: number): UpdateOutcome | null {
    const result: FeedbackResult = { eventId: `outcome:${agentType}`, duplicate: false, updates: [], diverged: [] };
    return this.adjust(agentType, observedScore, predictedScore, result);
  }

  isBlocked(agentType: AgentType): boolean {
    return this.diverged.has(agentType);
  }

  getDivergence(): DivergenceCondition[] {
    return [...this.diverged.values()];
  }

  /**
   * Operator acknowledgement after a manual recalibration. Unblocks the agent;
   * with `reset` its parameters return to the physics-derived defaults.
   */
  acknowledgeRecalibration(agentType: AgentType, options: { reset?: boolean } = {}): AgentModelState | null {
    const adapter = this.adapters.get(agentType);
    if (!adapter) return null;
    this.diverged.delete(agentType);
    this.rejections.delete(agentType);
    if (options.reset) {
      const state = adapter.model.reset(adapter.defaultParams, this.now());
      this.hooks.onStateChange?.(state);
      console.log(`[Drillsense Adaptation] ${agentType} recalibrated to defaults (v${state.version})`);
      return state;
    }
    console.log(`[Drillsense Adaptation] ${agentType} recalibration acknowledged`);
    return adapter.model.snapshot();
  }

  hasApplied(eventId: string): boolean {
    return this.appliedEvents.has(eventId);
  }

  /** Already applied, or the last event applied to its alert */
  isDuplicate(event: FeedbackEvent): boolean {
    if (this.appliedEvents.has(event.id)) return true;
    return event.alertId !== undefined && this.lastEventByAlert.get(event.alertId) === event.id;
  }

  lastEventForAlert(alertId: string): string | null {
    return this.lastEventByAlert.get(alertId) ?? null;
  }

  // ─── Private ──────────────────────────────────────────────────────

  /** Agent type → the score it contributed to what the feedback judges */
  private scoresFor(event: FeedbackEvent, context: FeedbackContext): Map<AgentType, number> {
    const scores = new Map<AgentType, number>();
    if (context.alert) {
      for (const [agentType, score] of Object.entries(context.alert.evidence)) {
        scores.set(agentType, score);
      }
      return scores;
    }
    // Missed anomaly with no alert: every agent of the category under-called it.
    // Score unknown, so step from the neutral midpoint.
    if (event.kind === 'missed') {
      for (const agentType of context.categoryAgents) scores.set(agentType, 0.5);
    }
    return scores;
  }

  private adjust(agentType: AgentType, target: number, score: number, result: FeedbackResult): UpdateOutcome | null {
    const adapter = this.adapters.get(agentType);
    if (!adapter) return null;
    if (this.diverged.has(agentType)) {
      return { agentType, status: 'blocked' };
    }

    const cfg = this.agentConfig(agentType);
    const base = adapter.model.snapshot();
    const step = cfg.stepSize * (target - score);
    const delta: ParameterDelta = Object.fromEntries(
      ADAPTABLE_PARAMETERS.filter(name => name in base.params).map((name): [string, number] => [name, step]),
    );

    const verdict = checkParameterUpdate(base, delta, adapter.parameterBounds, cfg.maxStep, base.version);
    if (!verdict.ok) {
      console.warn(`[Drillsense Adaptation] Rejected update for ${agentType}: ${verdict.reason} (${verdict.detail})`);
      this.recordRejection(agentType, verdict.reason, cfg.divergenceTripCount, result);
      return { agentType, status: 'rejected', reason: verdict.reason, detail: verdict.detail };
    }

    const next = adapter.model.swap(base.version, applyDelta(base.params, delta), this.now());
    if (!next) {
      const detail = `model changed while the update for v${base.version} was computed`;
      console.warn(`[Drillsense Adaptation] Rejected update for ${agentType}: STALE_BASE_VERSION (${detail})`);
      this.recordRejection(agentType, 'STALE_BASE_VERSION', cfg.divergenceTripCount, result);
      return { agentType, status: 'rejected', reason: 'STALE_BASE_VERSION', detail };
    }

    this.rejections.delete(agentType);
    this.hooks.onStateChange?.(next);
    return { agentType, status: 'applied', state: next, delta };
  }

  private recordRejection(agentType: AgentType, reason: ConstraintReason, tripCount: number, result: FeedbackResult): void {
    const count = (this.rejections.get(agentType)?.count ?? 0) + 1;
    this.rejections.set(agentType, { count, reason });
    if (count < tripCount || this.diverged.has(agentType)) return;

    const condition: DivergenceCondition = Object.freeze({
      agentType,
      consecutiveRejections: count,
      lastReason: reason,
      raisedAt: this.now(),
    });
    this.diverged.set(agentType, condition);
    result.diverged.push(condition);
    const error = new ModelDivergenceError(agentType, count);
    console.error(`[Drillsense Adaptation] ${error.message}`);
    this.hooks.onDivergence?.(condition, error);
  }

  private markApplied(event: FeedbackEvent): void {
    this.appliedEvents.add(event.id);
    if (this.appliedEvents.size > this.config.maxTrackedEvents) {
      const oldest = this.appliedEvents.values().next();
      if (!oldest.done) this.appliedEvents.delete(oldest.value);
    }
    if (event.alertId) {
      // Re-insert so the map stays ordered by last use
      this.lastEventByAlert.delete(event.alertId);
      this.lastEventByAlert.set(event.alertId, event.id);
      if (this.lastEventByAlert.size > this.config.maxTrackedAlerts) {
        const oldest = this.lastEventByAlert.keys().next();
        if (!oldest.done) this.lastEventByAlert.delete(oldest.value);
      }
    }
  }
}
