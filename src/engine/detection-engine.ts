/**
 * Drillsense Detection Engine
 *
 * Process-wide cycle state machine wiring the components together:
 *
 *   idle → fan_out → aggregate → publish → idle
 *
 * - fan_out: every registered agent predicts on the window concurrently,
 *   under the cycle deadline
 * - aggregate: physics-checked predictions go to consensus, strictly in
 *   cycle order even when fan-outs overlap
 * - publish: alerts and coverage go to the publisher
 *
 * Feedback from the publisher resolves alerts and drives adaptation.
 * No cycle error stops the loop.
 *
 * @packageDocumentation
 */

import { OnlineAdaptationController, type FeedbackResult, type UpdateOutcome } from '../adaptation/controller.js';
import type { AgentRegistry } from '../agents/registry.js';
import { ConsensusAggregator } from '../consensus/aggregator.js';
import { ConstraintViolationError, errorMessage } from '../errors.js';
import { checkPrediction, DEFAULT_PHYSICS_LIMITS, type PhysicsLimits } from '../physics/constraints.js';
import { AlertPublisher } from '../publisher/alert-publisher.js';
import type { HistoryStore } from '../store/history-store.js';
import type {
  AgentModelState,
  AgentType,
  Alert,
  ConstraintReason,
  CoverageReport,
  FeedbackEvent,
  Prediction,
  TelemetryWindow,
} from '../types.js';
import { fanOut, type AgentOutcome } from './fan-out.js';

// ─── Types ───────────────────────────────────────────────────────────

export type EnginePhase = 'idle' | 'fan_out' | 'aggregate' | 'publish';

export interface EngineConfig {
  /** Interval between cycles when driven by `start()` (default: 5000ms) */
  cycleIntervalMs: number;
  /** Budget for all agents to respond within a cycle (default: 2000ms) */
  cycleDeadlineMs: number;
  physicsLimits: PhysicsLimits;
  /** Persist every accepted prediction to the history store */
  recordPredictions: boolean;
}

export interface DroppedPrediction {
  prediction: Prediction;
  reason: ConstraintReason;
  detail: string;
  error: ConstraintViolationError;
}

export interface CycleReport {
  cycleId: number;
  windowId: string;
  timestamp: number;
  /** Set when the window was not processed */
  skipped: 'out_of_order' | null;
  outcomes: AgentOutcome[];
  accepted: Prediction[];
  dropped: DroppedPrediction[];
  alerts: Alert[];
  coverage: CoverageReport;
  durationMs: number;
}

/** Pull-based window stream; null means the source is exhausted. */
export interface WindowSource {
  next(): Promise<TelemetryWindow | null> | TelemetryWindow | null;
}

export interface EngineComponents {
  registry: AgentRegistry;
  aggregator?: ConsensusAggregator;
  controller?: OnlineAdaptationController;
  publisher?: AlertPublisher;
  store?: HistoryStore;
}

export interface EngineStatus {
  phase: EnginePhase;
  running: boolean;
  cycles: number;
  lastWindowEnd: number | null;
  agents: AgentModelState[];
}

// ─── Defaults ────────────────────────────────────────────────────────

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  cycleIntervalMs: 5_000,
  cycleDeadlineMs: 2_000,
  physicsLimits: DEFAULT_PHYSICS_LIMITS,
  recordPredictions: true,
};

// ─── DetectionEngine ─────────────────────────────────────────────────

export class DetectionEngine {
  readonly registry: AgentRegistry;
  readonly aggregator: ConsensusAggregator;
  readonly controller: OnlineAdaptationController;
  readonly publisher: AlertPublisher;
  private store: HistoryStore | null;
  private config: EngineConfig;
  private now: () => number;

  private _phase: EnginePhase = 'idle';
  private cycleCounter = 0;
  private lastWindowEnd: number | null = null;
  /** Tail of the aggregation chain; each cycle waits for its predecessor */
  private aggregationTail: Promise<void> = Promise.resolve();

  private running = false;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private loopAbort: AbortController | null = null;
  private inFlight: Promise<void> | null = null;
  private loopDone: (() => void) | null = null;
  private unsubscribeFeedback: (() => void) | null = null;

  constructor(components: EngineComponents, config?: Partial<EngineConfig>, now: () => number = Date.now) {
    this.config = { ...DEFAULT_ENGINE_CONFIG, ...config };
    this.now = now;
    this.registry = components.registry;
    this.store = components.store ?? null;
    this.aggregator = components.aggregator ?? new ConsensusAggregator();
    this.controller = components.controller ?? new OnlineAdaptationController(undefined, {}, now);
    this.publisher = components.publisher ?? new AlertPublisher(undefined, this.store ? { store: this.store } : {});

    this.controller.setHooks({
      onDivergence: condition => this.publisher.reportDivergence(condition),
      onStateChange: state => this.persistModelState(state),
    });
    for (const adapter of this.registry.all()) {
      this.restoreModelState(adapter.agentType);
      this.controller.attach(adapter);
    }
    this.unsubscribeFeedback = this.publisher.onFeedback(event => this.handleFeedback(event).then(() => undefined));
  }

  updateConfig(config: Partial<EngineConfig>): void {
    this.config = { ...this.config, ...config };
  }

  getConfig(): EngineConfig {
    return { ...this.config };
  }

  get phase(): EnginePhase {
    return this._phase;
  }

  getStatus(): EngineStatus {
    return {
      phase: this._phase,
      running: this.running,
      cycles: this.cycleCounter,
      lastWindowEnd: this.lastWindowEnd,
      agents: this.registry.all().map(a => a.model.snapshot()),
    };
  }

  // ─── Cycle ────────────────────────────────────────────────────────

  /**
   * Run one detection cycle on a window. Windows must arrive with
   * non-decreasing end time; an older one is skipped.
   */
  async runCycle(window: TelemetryWindow, signal?: AbortSignal): Promise<CycleReport> {
    const cycleId = ++this.cycleCounter;
    const started = this.now();
    const agents = this.registry.all();
    const expectedAgents = agents.map(a => ({ agentType: a.agentType, category: a.category }));

    if (this.lastWindowEnd !== null && window.endTime < this.lastWindowEnd) {
      console.warn(
        `[Drillsense Engine] Window ${window.id} ends at ${window.endTime}, before last processed ${this.lastWindowEnd}; skipped`,
      );
      return {
        cycleId,
        windowId: window.id,
        timestamp: window.endTime,
        skipped: 'out_of_order',
        outcomes: [],
        accepted: [],
        dropped: [],
        alerts: [],
        coverage: { cycleId, degradedCategories: [], globalDegraded: false, timestamp: window.endTime },
        durationMs: this.now() - started,
      };
    }
    this.lastWindowEnd = window.endTime;

    // Reserve this cycle's slot in the aggregation order before any await
    const predecessor = this.aggregationTail;
    let release: () => void = () => undefined;
    this.aggregationTail = new Promise<void>(resolve => {
      release = resolve;
    });

    try {
      this._phase = 'fan_out';
      const outcomes = await fanOut(agents, window, {
        deadlineMs: this.config.cycleDeadlineMs,
        now: this.now,
        ...(signal ? { signal } : {}),
      });

      const accepted: Prediction[] = [];
      const dropped: DroppedPrediction[] = [];
      const failedAgents: AgentType[] = [];
      for (const outcome of outcomes) {
        if (outcome.status === 'failed') {
          failedAgents.push(outcome.agentType);
          console.warn(`[Drillsense Engine] ${outcome.error.message}`);
          continue;
        }
        const verdict = checkPrediction(outcome.prediction, this.config.physicsLimits);
        if (verdict.ok) {
          accepted.push(outcome.prediction);
        } else {
          const error = new ConstraintViolationError(`${outcome.agentType} prediction`, verdict);
          dropped.push({ prediction: outcome.prediction, reason: verdict.reason, detail: verdict.detail, error });
          console.warn(`[Drillsense Physics] Dropped ${error.message}`);
        }
      }
      this.recordPredictions(accepted);

      await predecessor;

      this._phase = 'aggregate';
      const result = this.aggregator.aggregate({
        cycleId,
        timestamp: window.endTime,
        predictions: accepted,
        expectedAgents,
        failedAgents,
      });

      this._phase = 'publish';
      this.publisher.setCoverage(result.coverage);
      for (const alert of result.alerts) {
        await this.publisher.publish(alert);
      }

      return {
        cycleId,
        windowId: window.id,
        timestamp: window.endTime,
        skipped: null,
        outcomes,
        accepted,
        dropped,
        alerts: result.alerts,
        coverage: result.coverage,
        durationMs: this.now() - started,
      };
    } finally {
      this._phase = 'idle';
      release();
    }
  }

  // ─── Feedback & lifecycle ─────────────────────────────────────────

  /**
   * Apply a feedback event: resolve the alert it judges and adapt the agents
   * that supported it. A repeated event id changes nothing.
   */
  async handleFeedback(event: FeedbackEvent): Promise<FeedbackResult> {
    if (this.controller.isDuplicate(event)) {
      return { eventId: event.id, duplicate: true, updates: [], diverged: [] };
    }

    let alert = event.alertId ? this.aggregator.getAlert(event.alertId) ?? this.store?.getAlert(event.alertId) ?? null : null;
    if (event.alertId && !alert) {
      console.warn(`[Drillsense Engine] Feedback ${event.id} references unknown alert ${event.alertId}`);
    }

    if (alert && alert.status === 'pending' && event.kind !== 'missed') {
      const resolved = this.aggregator.resolve(alert.id, event.kind === 'confirmed' ? 'confirmed' : 'dismissed', this.now());
      if (resolved) {
        alert = resolved;
        await this.publisher.publish(resolved);
      }
    }

    const category = event.category ?? alert?.category;
    const categoryAgents = category ? this.registry.byCategory(category).map(a => a.agentType) : [];
    const result = this.controller.applyFeedback(event, { alert, categoryAgents });

    const applied = result.updates.filter(u => u.status === 'applied').length;
    console.log(`[Drillsense Adaptation] Feedback ${event.id} (${event.kind}): ${applied}/${result.updates.length} agents updated`);
    return result;
  }

  /**
   * Apply an observed outcome for one agent's prediction, such as a
   * confirmed downhole condition scored after the fact.
   */
  applyOutcome(agentType: AgentType, predictedScore: number, observedScore: number): UpdateOutcome | null {
    const outcome = this.controller.applyOutcome(agentType, predictedScore, observedScore);
    if (!outcome) {
      console.warn(`[Drillsense Engine] Outcome for unknown agent ${agentType} ignored`);
      return null;
    }
    console.log(`[Drillsense Adaptation] Outcome for ${agentType} (${predictedScore} → ${observedScore}): ${outcome.status}`);
    return outcome;
  }

  /** Expire pending alerts; defaults to the data clock (last window end). */
  async expireStale(now: number = this.lastWindowEnd ?? this.now()): Promise<Alert[]> {
    const expired = this.aggregator.expireStale(now);
    for (const alert of expired) {
      await this.publisher.publish(alert);
    }
    return expired;
  }

  acknowledgeRecalibration(agentType: AgentType, options: { reset?: boolean } = {}): AgentModelState | null {
    const state = this.controller.acknowledgeRecalibration(agentType, options);
    if (state) this.publisher.clearDivergence(agentType);
    return state;
  }

  // ─── Loop ─────────────────────────────────────────────────────────

  /**
   * Drive cycles from a source every `cycleIntervalMs` until `stop()` or the
   * source is exhausted. Resolves when the loop has ended.
   */
  start(source: WindowSource): Promise<void> {
    if (this.running) {
      return Promise.reject(new Error('Detection engine already running'));
    }
    this.running = true;
    this.loopAbort = new AbortController();
    console.log(
      `[Drillsense Engine] Started: ${this.registry.size} agents, ${this.config.cycleIntervalMs}ms interval, ${this.config.cycleDeadlineMs}ms deadline`,
    );

    return new Promise<void>(resolve => {
      this.loopDone = resolve;
      const tick = async (): Promise<void> => {
        if (!this.running) return resolve();
        try {
          const window = await source.next();
          if (window === null) {
            console.log('[Drillsense Engine] Window source exhausted');
            this.running = false;
            return resolve();
          }
          await this.runCycle(window, this.loopAbort?.signal);
          await this.expireStale();
          await this.publisher.redeliverPending();
        } catch (err) {
          console.error('[Drillsense Engine] Cycle failed:', errorMessage(err));
        }
        if (!this.running) return resolve();
        this.timer = setTimeout(() => {
          this.inFlight = tick();
        }, this.config.cycleIntervalMs);
      };
      this.inFlight = tick();
    });
  }

  /** Stop the loop and wait for the cycle in flight. */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.loopAbort?.abort();
    await this.inFlight;
    this.inFlight = null;
    this.loopAbort = null;
    this.loopDone?.();
    this.loopDone = null;
    console.log(`[Drillsense Engine] Stopped after ${this.cycleCounter} cycles`);
  }

  /** Stop and detach from the publisher. */
  async close(): Promise<void> {
    await this.stop();
    this.unsubscribeFeedback?.();
    this.unsubscribeFeedback = null;
  }

  // ─── Private ──────────────────────────────────────────────────────

  private recordPredictions(predictions: readonly Prediction[]): void {
    if (!this.store || !this.config.recordPredictions) return;
    try {
      for (const p of predictions) this.store.recordPrediction(p);
    } catch (err) {
      console.warn('[Drillsense Store] Prediction write failed:', errorMessage(err));
    }
  }

  private persistModelState(state: AgentModelState): void {
    if (!this.store) return;
    try {
      this.store.saveModelState(state);
    } catch (err) {
      console.warn('[Drillsense Store] Model state write failed:', errorMessage(err));
    }
  }

  private restoreModelState(agentType: AgentType): void {
    const adapter = this.registry.get(agentType);
    const saved = this.store?.loadModelState(agentType) ?? null;
    if (!adapter || !saved) return;
    const params: Record<string, number> = { ...adapter.model.snapshot().params };
    for (const [name, value] of Object.entries(saved.params)) {
      const range = adapter.parameterBounds[name];
      if (range && value >= range[0] && value <= range[1]) params[name] = value;
    }
    adapter.model.reset(params, saved.updatedAt, saved.version);
    console.log(`[Drillsense Engine] Restored ${agentType} model state v${saved.version}`);
  }
}
