/**
 * Drillsense Alert Publisher
 *
 * Boundary to the dashboard / notification side:
 * - Alert feed: every new revision goes to each sink (webhook, in-process),
 *   retried up to `maxDeliveryAttempts`; undelivered revisions stay queued
 *   for `redeliverPending()` (at-least-once).
 * - Health: degraded coverage and model divergence flags.
 * - Feedback: operator and outcome events come in through `submitFeedback`
 *   and fan out to `onFeedback` handlers and `subscribeFeedback` iterators.
 * - History: alerts and feedback go to the SQLite store when one is attached,
 *   and to the PostgreSQL mirror when it is active.
 *
 * @packageDocumentation
 */

import { setTimeout as sleep } from 'node:timers/promises';
import { errorMessage } from '../errors.js';
import { recordAlertPg } from '../store/history-pg.js';
import type { HistoryStore } from '../store/history-store.js';
import type {
  AgentType,
  Alert,
  AnomalyCategory,
  CoverageReport,
  DivergenceCondition,
  FeedbackEvent,
} from '../types.js';

// ─── Types ───────────────────────────────────────────────────────────

export interface PublisherConfig {
  /** Webhook URL for alert delivery */
  webhookUrl?: string;
  /** Attempts per sink before a revision is left for redelivery (default: 3) */
  maxDeliveryAttempts: number;
  /** Linear back-off between attempts (default: 500ms) */
  retryDelayMs: number;
  /** Alerts kept in memory when no store is attached */
  maxHistory: number;
  /** Per-subscriber feedback buffer; oldest events are dropped beyond it */
  feedbackBufferSize: number;
}

export interface AlertSink {
  readonly name: string;
  deliver(alert: Alert): Promise<void>;
}

export interface PublishResult {
  alertId: string;
  revision: number;
  delivered: boolean;
  /** Sinks that exhausted their attempts */
  failedSinks: string[];
}

export interface PublisherHealth {
  coverage: CoverageReport | null;
  degradedCategories: readonly AnomalyCategory[];
  globalDegraded: boolean;
  divergence: DivergenceCondition[];
  undelivered: number;
  lastPublishedAt: number | null;
}

export type FeedbackHandler = (event: FeedbackEvent) => void | Promise<void>;

export interface PublisherOptions {
  store?: HistoryStore;
  sinks?: AlertSink[];
  /** Tagged on mirrored rows */
  wellId?: string;
}

interface FeedbackSubscriber {
  queue: FeedbackEvent[];
  wake: (() => void) | null;
  closed: boolean;
}

// ─── Defaults ────────────────────────────────────────────────────────

export const DEFAULT_PUBLISHER_CONFIG: PublisherConfig = {
  maxDeliveryAttempts: 3,
  retryDelayMs: 500,
  maxHistory: 500,
  feedbackBufferSize: 1000,
};

// ─── Sinks ───────────────────────────────────────────────────────────

export class WebhookSink implements AlertSink {
  readonly name: string;

  constructor(private readonly url: string, private readonly timeoutMs: number = 5_000) {
    this.name = `webhook:${url}`;
  }

  async deliver(alert: Alert): Promise<void> {
    const res = await fetch(this.url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      signal: AbortSignal.timeout(this.timeoutMs),
      body: JSON.stringify({
        source: 'drillsense',
        alert: {
          id: alert.id,
          revision: alert.revision,
          category: alert.category,
          severity: alert.severity,
          status: alert.status,
          vote: alert.vote,
          message: alert.message,
          recommendation: alert.recommendation,
          supportingAgents: alert.supportingAgents,
          evidence: alert.evidence,
          timestamp: new Date(alert.updatedAt).toISOString(),
        },
      }),
    });
    if (!res.ok) {
      throw new Error(`webhook responded ${res.status}`);
    }
  }
}

/** In-process sink; keeps the latest revision per alert id. */
export class MemorySink implements AlertSink {
  readonly name = 'memory';
  private alerts = new Map<string, Alert>();

  async deliver(alert: Alert): Promise<void> {
    this.alerts.set(alert.id, alert);
  }

  list(): Alert[] {
    return [...this.alerts.values()];
  }

  clear(): void {
    this.alerts.clear();
  }
}

// ─── AlertPublisher ──────────────────────────────────────────────────

export class AlertPublisher {
  private config: PublisherConfig;
  private store: HistoryStore | null;
  private sinks: AlertSink[];
  private wellId: string | undefined;

  /** alertId → latest revision still owed to at least one sink */
  private undelivered = new Map<string, Alert>();
  // In-memory alert history for when no store is attached
  private memoryAlerts: Alert[] = [];
  private coverage: CoverageReport | null = null;
  private divergence = new Map<AgentType, DivergenceCondition>();
  private lastPublishedAt: number | null = null;

  private handlers = new Set<FeedbackHandler>();
  private subscribers = new Set<FeedbackSubscriber>();

  constructor(config?: Partial<PublisherConfig>, options: PublisherOptions = {}) {
    this.config = { ...DEFAULT_PUBLISHER_CONFIG, ...config };
    this.store = options.store ?? null;
    this.wellId = options.wellId;
    this.sinks = [...(options.sinks ?? [])];
    if (this.config.webhookUrl) {
      this.sinks.push(new WebhookSink(this.config.webhookUrl));
    }
  }

  updateConfig(config: Partial<PublisherConfig>): void {
    const previousUrl = this.config.webhookUrl;
    this.config = { ...this.config, ...config };
    if (this.config.webhookUrl !== previousUrl) {
      this.sinks = this.sinks.filter(s => !(s instanceof WebhookSink));
      if (this.config.webhookUrl) this.sinks.push(new WebhookSink(this.config.webhookUrl));
    }
  }

  getConfig(): PublisherConfig {
    return { ...this.config };
  }

  addSink(sink: AlertSink): void {
    this.sinks.push(sink);
  }

  // ─── Alert feed ───────────────────────────────────────────────────

  async publish(alert: Alert): Promise<PublishResult> {
    this.storeAlert(alert);
    recordAlertPg(alert, this.wellId);
    this.lastPublishedAt = alert.updatedAt;
    return this.deliver(alert);
  }

  /** Retry every revision still owed to a sink. Returns how many got through. */
  async redeliverPending(): Promise<number> {
    const owed = new Map(this.undelivered);
    if (this.store) {
      for (const alert of this.store.getUndelivered()) {
        const known = owed.get(alert.id);
        if (!known || known.revision < alert.revision) owed.set(alert.id, alert);
      }
    }

    let delivered = 0;
    for (const alert of owed.values()) {
      const result = await this.deliver(alert);
      if (result.delivered) delivered++;
    }
    return delivered;
  }

  getRecent(limit: number = 20): Alert[] {
    if (this.store) return this.store.getRecentAlerts(limit);
    return this.memoryAlerts.slice(-limit).reverse();
  }

  // ─── Health ───────────────────────────────────────────────────────

  setCoverage(report: CoverageReport): void {
    const before = this.coverage;
    this.coverage = report;
    const changed =
      before === null ||
      before.globalDegraded !== report.globalDegraded ||
      before.degradedCategories.join(',') !== report.degradedCategories.join(',');
    if (!changed) return;
    if (report.globalDegraded) {
      console.error('[Drillsense Alerts] Global degraded coverage: no agent responded');
    } else if (report.degradedCategories.length > 0) {
      console.warn(`[Drillsense Alerts] Degraded coverage: ${report.degradedCategories.join(', ')}`);
    } else if (before !== null) {
      console.log('[Drillsense Alerts] Coverage restored');
    }
  }

  reportDivergence(condition: DivergenceCondition): void {
    this.divergence.set(condition.agentType, condition);
    console.error(
      `[Drillsense Alerts] Model divergence: ${condition.agentType} (${condition.consecutiveRejections} rejected updates, last ${condition.lastReason})`,
    );
  }

  clearDivergence(agentType: AgentType): void {
    this.divergence.delete(agentType);
  }

  getHealth(): PublisherHealth {
    return {
      coverage: this.coverage,
      degradedCategories: this.coverage?.degradedCategories ?? [],
      globalDegraded: this.coverage?.globalDegraded ?? false,
      divergence: [...this.divergence.values()],
      undelivered: this.undelivered.size,
      lastPublishedAt: this.lastPublishedAt,
    };
  }

  // ─── Feedback ─────────────────────────────────────────────────────

  /**
   * Entry point for operator / outcome feedback. Returns false for an event
   * that references nothing. Duplicates are forwarded; consumers are idempotent.
   */
  async submitFeedback(event: FeedbackEvent): Promise<boolean> {
    const needsAlert = event.kind === 'confirmed' || event.kind === 'false_positive';
    if ((needsAlert && !event.alertId) || (!event.alertId && !event.category)) {
      console.warn(`[Drillsense Alerts] Feedback ${event.id} (${event.kind}) has no alert or category, ignored`);
      return false;
    }

    this.store?.recordFeedback(event);

    for (const sub of this.subscribers) {
      sub.queue.push(event);
      if (sub.queue.length > this.config.feedbackBufferSize) {
        const dropped = sub.queue.shift();
        console.warn(`[Drillsense Alerts] Feedback buffer full, dropped ${dropped?.id ?? 'event'}`);
      }
      const wake = sub.wake;
      sub.wake = null;
      wake?.();
    }

    for (const handler of this.handlers) {
      try {
        await handler(event);
      } catch (err) {
        console.error(`[Drillsense Alerts] Feedback handler failed for ${event.id}:`, errorMessage(err));
      }
    }
    return true;
  }

  onFeedback(handler: FeedbackHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  /** Ordered feedback stream; events are buffered from the moment of the call. */
  subscribeFeedback(): AsyncIterable<FeedbackEvent> {
    const sub: FeedbackSubscriber = { queue: [], wake: null, closed: false };
    this.subscribers.add(sub);
    const subscribers = this.subscribers;

    async function* iterate(): AsyncGenerator<FeedbackEvent> {
      try {
        while (true) {
          const next = sub.queue.shift();
          if (next !== undefined) {
            yield next;
            continue;
          }
          if (sub.closed) return;
          await new Promise<void>(resolve => {
            sub.wake = resolve;
          });
        }
      } finally {
        subscribers.delete(sub);
      }
    }
    return iterate();
  }

  /** End every feedback subscription and drop handlers. */
  close(): void {
    for (const sub of this.subscribers) {
      sub.closed = true;
      const wake = sub.wake;
      sub.wake = null;
      wake?.();
    }
    this.handlers.clear();
  }

  // ─── Private ──────────────────────────────────────────────────────

  private storeAlert(alert: Alert): void {
    if (this.store) {
      try {
        this.store.recordAlert(alert);
      } catch (err) {
        console.warn('[Drillsense Alerts] History write failed:', errorMessage(err));
      }
    }
    const idx = this.memoryAlerts.findIndex(a => a.id === alert.id);
    if (idx >= 0) this.memoryAlerts.splice(idx, 1);
    this.memoryAlerts.push(alert);
    if (this.memoryAlerts.length > this.config.maxHistory) {
      this.memoryAlerts.shift();
    }
  }

  private async deliver(alert: Alert): Promise<PublishResult> {
    const failedSinks: string[] = [];
    for (const sink of this.sinks) {
      const ok = await this.deliverWithRetry(sink, alert);
      if (!ok) failedSinks.push(sink.name);
    }

    const delivered = failedSinks.length === 0;
    if (delivered) {
      const owed = this.undelivered.get(alert.id);
      if (!owed || owed.revision <= alert.revision) this.undelivered.delete(alert.id);
      this.store?.markDelivered(alert.id, alert.revision);
    } else {
      this.undelivered.set(alert.id, alert);
      console.error(`[Drillsense Alerts] Alert ${alert.id} r${alert.revision} undelivered to ${failedSinks.join(', ')}`);
    }
    return { alertId: alert.id, revision: alert.revision, delivered, failedSinks };
  }

  private async deliverWithRetry(sink: AlertSink, alert: Alert): Promise<boolean> {
    const attempts = Math.max(1, this.config.maxDeliveryAttempts);
    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        await sink.deliver(alert);
        return true;
      } catch (err) {
        console.warn(`[Drillsense Alerts] ${sink.name} attempt ${attempt}/${attempts} failed: ${errorMessage(err)}`);
        if (attempt < attempts && this.config.retryDelayMs > 0) {
          await sleep(this.config.retryDelayMs * attempt);
        }
      }
    }
    return false;
  }
}

// ─── Singleton ──────────────────────────────────────────────────────

let _instance: AlertPublisher | null = null;

export function getAlertPublisher(config?: Partial<PublisherConfig>, options?: PublisherOptions): AlertPublisher {
  if (!_instance) {
    _instance = new AlertPublisher(config, options);
  }
  return _instance;
}

export function resetAlertPublisher(): void {
  if (_instance) { _instance.close(); _instance = null; }
}
