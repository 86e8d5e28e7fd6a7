/**
 * Drillsense Consensus Aggregator
 *
 * Combines one cycle's constraint-passed predictions into at most one Alert
 * per anomaly category:
 * - Confidence × recency weighted vote per category over the corroboration
 *   window, so earlier cycles count with decayed weight
 * - Corroboration across agents and across consecutive cycles
 * - Deduplication: a pending alert is refreshed, never re-raised
 * - Degraded coverage when every agent of a category failed to respond
 *
 * @packageDocumentation
 */

import { randomUUID } from 'node:crypto';
import {
  CATEGORY_PRIORITY,
  type AgentType,
  type Alert,
  type AlertStatus,
  type AnomalyCategory,
  type CoverageReport,
  type Prediction,
} from '../types.js';
import { agentLabel, prioritizedRecommendations, severityFor } from './recommendations.js';

// ─── Types ───────────────────────────────────────────────────────────

export interface ConsensusConfig {
  /** Minimum weighted vote per category (default 0.6 – 0.7) */
  thresholds: Record<AnomalyCategory, number>;
  /** Number of consecutive cycles signals are counted over (default: 2) */
  corroborationWindow: number;
  /** Independent signals needed to raise an alert (default: 2) */
  minCorroboratingSignals: number;
  /** Age at which a prediction's weight halves (default: 60s) */
  recencyHalfLifeMs: number;
  /** Pending alerts not refreshed for this long expire (default: 15 min) */
  alertExpiryMs: number;
  /** Resolved alerts kept for feedback lookup */
  maxResolved: number;
}

export interface ExpectedAgent {
  agentType: AgentType;
  category: AnomalyCategory;
}

export interface CycleInput {
  cycleId: number;
  /** Cycle reference time, normally the window end */
  timestamp: number;
  /** Only predictions that passed the physics checker */
  predictions: readonly Prediction[];
  /** Every agent dispatched this cycle */
  expectedAgents: readonly ExpectedAgent[];
  /** Agents that timed out, crashed or rejected the window */
  failedAgents: readonly AgentType[];
}

export interface CategoryDecision {
  category: AnomalyCategory;
  vote: number;
  threshold: number;
  /** Signals counted over the corroboration window */
  signals: number;
  /** Signals from this cycle alone */
  currentSignals: number;
  qualified: boolean;
  /** Every prediction the vote was taken over */
  predictions: readonly Prediction[];
  /** Predictions at or above threshold within the corroboration window */
  supporting: readonly Prediction[];
}

export interface AggregationResult {
  cycleId: number;
  /** New or refreshed alerts, in presentation order */
  alerts: Alert[];
  decisions: CategoryDecision[];
  coverage: CoverageReport;
}

export type ResolvedStatus = Exclude<AlertStatus, 'pending'>;

// ─── Defaults ────────────────────────────────────────────────────────

export const DEFAULT_CONSENSUS_CONFIG: ConsensusConfig = {
  thresholds: {
    sticking: 0.6,
    washout_mud_loss: 0.7,
    hole_cleaning: 0.65,
    rop_optimization: 0.7,
  },
  corroborationWindow: 2,
  minCorroboratingSignals: 2,
  recencyHalfLifeMs: 60_000,
  alertExpiryMs: 900_000,
  maxResolved: 500,
};

const CATEGORY_LABEL: Record<AnomalyCategory, string> = {
  sticking: 'Stuck pipe',
  washout_mud_loss: 'Washout / mud loss',
  hole_cleaning: 'Hole cleaning',
  rop_optimization: 'ROP optimization',
};

const FALLBACK_RECOMMENDATION: Record<AnomalyCategory, string> = {
  sticking: 'Perform slack-off and pick-up tests to check for potential sticking points',
  washout_mud_loss: 'Perform flow check to confirm washout or losses',
  hole_cleaning: 'Perform wiper trips to clean the hole',
  rop_optimization: 'Review drilling parameters against formation strength',
};

// ─── Vote ────────────────────────────────────────────────────────────

export function recencyFactor(ageMs: number, halfLifeMs: number): number {
  if (halfLifeMs <= 0 || ageMs <= 0) return 1;
  return Math.pow(0.5, ageMs / halfLifeMs);
}

/**
 * `Σ(score·w) / Σw` with `w = confidence × recency`.
 * Zero total weight (all confidences 0) yields 0: nobody vouches for the scores.
 */
export function weightedVote(predictions: readonly Prediction[], cycleTimestamp: number, halfLifeMs: number): number {
  let num = 0;
  let den = 0;
  for (const p of predictions) {
    const w = p.confidence * recencyFactor(cycleTimestamp - p.windowTimestamp, halfLifeMs);
    num += p.score * w;
    den += w;
  }
  return den > 0 ? num / den : 0;
}

// ─── ConsensusAggregator ─────────────────────────────────────────────

export class ConsensusAggregator {
  private config: ConsensusConfig;
  /** cycleId → category → agent types that scored at or above threshold */
  private signalHistory = new Map<number, Map<AnomalyCategory, Set<AgentType>>>();
  /** cycleId → accepted predictions, over the same window as signalHistory */
  private predictionHistory = new Map<number, readonly Prediction[]>();
  private pending = new Map<AnomalyCategory, Alert>();
  private resolved = new Map<string, Alert>();
  private lastCycleId: number | null = null;

  constructor(config?: Partial<ConsensusConfig>) {
    this.config = {
      ...DEFAULT_CONSENSUS_CONFIG,
      ...config,
      thresholds: { ...DEFAULT_CONSENSUS_CONFIG.thresholds, ...config?.thresholds },
    };
  }

  updateConfig(config: Partial<ConsensusConfig>): void {
    this.config = {
      ...this.config,
      ...config,
      thresholds: { ...this.config.thresholds, ...config.thresholds },
    };
  }

  getConfig(): ConsensusConfig {
    return { ...this.config, thresholds: { ...this.config.thresholds } };
  }

  threshold(category: AnomalyCategory): number {
    return this.config.thresholds[category];
  }

  /**
   * Run consensus for one cycle. Cycles must arrive in increasing id order;
   * a repeated or older id produces no alerts.
   */
  aggregate(input: CycleInput): AggregationResult {
    const coverage = this.computeCoverage(input);

    if (this.lastCycleId !== null && input.cycleId <= this.lastCycleId) {
      console.warn(`[Drillsense Consensus] Cycle ${input.cycleId} arrived after ${this.lastCycleId}, ignored`);
      return { cycleId: input.cycleId, alerts: [], decisions: [], coverage };
    }
    this.lastCycleId = input.cycleId;

    const byCategory = new Map<AnomalyCategory, Prediction[]>();
    for (const p of input.predictions) {
      const list = byCategory.get(p.category);
      if (list) list.push(p);
      else byCategory.set(p.category, [p]);
    }

    const cycleSignals = new Map<AnomalyCategory, Set<AgentType>>();
    for (const [category, preds] of byCategory) {
      const threshold = this.threshold(category);
      const agents = new Set(preds.filter(p => p.score >= threshold).map(p => p.agentType));
      if (agents.size > 0) cycleSignals.set(category, agents);
    }
    this.recordSignals(input.cycleId, cycleSignals, input.predictions);

    const decisions: CategoryDecision[] = [];
    for (const category of byCategory.keys()) {
      if (coverage.degradedCategories.includes(category)) continue;
      const threshold = this.threshold(category);
      const windowed = this.windowPredictions(category, input.cycleId);
      const vote = weightedVote(windowed, input.timestamp, this.config.recencyHalfLifeMs);
      const signals = this.countSignals(category, input.cycleId);
      const currentSignals = cycleSignals.get(category)?.size ?? 0;
      decisions.push({
        category,
        vote,
        threshold,
        signals,
        currentSignals,
        qualified: vote >= threshold && signals >= this.config.minCorroboratingSignals && currentSignals > 0,
        predictions: windowed,
        supporting: windowed.filter(p => p.score >= threshold),
      });
    }

    const alerts = decisions
      .filter(d => d.qualified)
      .sort((a, b) => b.vote - a.vote || CATEGORY_PRIORITY[a.category] - CATEGORY_PRIORITY[b.category])
      .map(d => this.raiseOrRefresh(d, input.timestamp));

    return { cycleId: input.cycleId, alerts, decisions, coverage };
  }

  /** Move a pending alert to a terminal status. Null when it is not pending. */
  resolve(alertId: string, status: ResolvedStatus, now: number = Date.now()): Alert | null {
    for (const [category, alert] of this.pending) {
      if (alert.id !== alertId) continue;
      const next = freezeAlert({ ...alert, revision: alert.revision + 1, status, updatedAt: now });
      this.pending.delete(category);
      this.remember(next);
      console.log(`[Drillsense Consensus] Alert ${alertId} (${category}) → ${status}`);
      return next;
    }
    return null;
  }

  /** Expire pending alerts that were not refreshed within `alertExpiryMs`. */
  expireStale(now: number = Date.now()): Alert[] {
    const expired: Alert[] = [];
    for (const alert of [...this.pending.values()]) {
      if (now - alert.updatedAt >= this.config.alertExpiryMs) {
        const next = this.resolve(alert.id, 'expired', now);
        if (next) expired.push(next);
      }
    }
    return expired;
  }

  getAlert(alertId: string): Alert | null {
    for (const alert of this.pending.values()) {
      if (alert.id === alertId) return alert;
    }
    return this.resolved.get(alertId) ?? null;
  }

  getPending(): Alert[] {
    return [...this.pending.values()];
  }

  /** Clear cycle history and alerts */
  clear(): void {
    this.signalHistory.clear();
    this.predictionHistory.clear();
    this.pending.clear();
    this.resolved.clear();
    this.lastCycleId = null;
  }

  // ─── Private ──────────────────────────────────────────────────────

  private computeCoverage(input: CycleInput): CoverageReport {
    const failed = new Set(input.failedAgents);
    const perCategory = new Map<AnomalyCategory, { total: number; failed: number }>();
    for (const agent of input.expectedAgents) {
      const entry = perCategory.get(agent.category) ?? { total: 0, failed: 0 };
      entry.total++;
      if (failed.has(agent.agentType)) entry.failed++;
      perCategory.set(agent.category, entry);
    }

    const degradedCategories: AnomalyCategory[] = [];
    for (const [category, { total, failed: n }] of perCategory) {
      if (total > 0 && n === total) degradedCategories.push(category);
    }
    degradedCategories.sort((a, b) => CATEGORY_PRIORITY[a] - CATEGORY_PRIORITY[b]);

    return {
      cycleId: input.cycleId,
      degradedCategories,
      globalDegraded: input.expectedAgents.length > 0 && input.expectedAgents.every(a => failed.has(a.agentType)),
      timestamp: input.timestamp,
    };
  }

  private recordSignals(
    cycleId: number,
    signals: Map<AnomalyCategory, Set<AgentType>>,
    predictions: readonly Prediction[],
  ): void {
    this.signalHistory.set(cycleId, signals);
    this.predictionHistory.set(cycleId, predictions);
    const oldest = cycleId - this.config.corroborationWindow;
    for (const id of this.signalHistory.keys()) {
      if (id <= oldest) this.signalHistory.delete(id);
    }
    for (const id of this.predictionHistory.keys()) {
      if (id <= oldest) this.predictionHistory.delete(id);
    }
  }

  /** Predictions of a category from the cycles the corroboration window covers, oldest first */
  private windowPredictions(category: AnomalyCategory, cycleId: number): Prediction[] {
    const oldest = cycleId - this.config.corroborationWindow;
    const out: Prediction[] = [];
    for (const [id, predictions] of this.predictionHistory) {
      if (id <= oldest || id > cycleId) continue;
      for (const p of predictions) {
        if (p.category === category) out.push(p);
      }
    }
    return out;
  }

  /** Each (cycle, agent type) pair scoring at threshold is one independent signal. */
  private countSignals(category: AnomalyCategory, cycleId: number): number {
    const oldest = cycleId - this.config.corroborationWindow;
    let count = 0;
    for (const [id, signals] of this.signalHistory) {
      if (id <= oldest || id > cycleId) continue;
      count += signals.get(category)?.size ?? 0;
    }
    return count;
  }

  private raiseOrRefresh(decision: CategoryDecision, timestamp: number): Alert {
    const { category, vote, supporting } = decision;
    const severity = severityFor(vote);
    const supportingAgents = [...new Set(supporting.map(p => p.agentType))];
    const evidence: Record<AgentType, number> = {};
    for (const p of supporting) {
      evidence[p.agentType] = Math.max(evidence[p.agentType] ?? 0, p.score);
    }
    const issue = supporting.find(p => p.evidence.issueType !== undefined)?.evidence.issueType;
    const label = issue ?? CATEGORY_LABEL[category];
    const message = `${label} risk ${(vote * 100).toFixed(0)}% from ${supportingAgents.map(agentLabel).join(', ')}`;
    const recommendation = prioritizedRecommendations(supporting)[0]?.recommendation ?? FALLBACK_RECOMMENDATION[category];

    const fields = {
      category,
      severity,
      vote,
      supportingAgents,
      supportingPredictionIds: supporting.map(p => p.id),
      windowTimestamp: Math.max(...supporting.map(p => p.windowTimestamp)),
      message,
      recommendation,
      evidence,
    };

    const existing = this.pending.get(category);
    const alert = existing
      ? freezeAlert({ ...existing, ...fields, revision: existing.revision + 1, updatedAt: timestamp })
      : freezeAlert({ ...fields, id: randomUUID(), revision: 1, createdAt: timestamp, updatedAt: timestamp, status: 'pending' });

    this.pending.set(category, alert);
    console.log(
      `[Drillsense Consensus] ${existing ? 'Refreshed' : 'Raised'} ${severity} ${category} alert ${alert.id} r${alert.revision} (vote ${vote.toFixed(2)})`,
    );
    return alert;
  }

  private remember(alert: Alert): void {
    this.resolved.set(alert.id, alert);
    if (this.resolved.size > this.config.maxResolved) {
      const oldest = this.resolved.keys().next();
      if (!oldest.done) this.resolved.delete(oldest.value);
    }
  }
}

function freezeAlert(alert: Alert): Alert {
  return Object.freeze({
    ...alert,
    supportingAgents: Object.freeze([...alert.supportingAgents]),
    supportingPredictionIds: Object.freeze([...alert.supportingPredictionIds]),
    evidence: Object.freeze({ ...alert.evidence }),
  });
}
