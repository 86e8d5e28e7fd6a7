/**
 * Drillsense History Store: local SQLite persistence
 *
 * Predictions, alert revisions, feedback events and model states, with the
 * query side the CLI and dashboards read from (recent alerts, summaries,
 * risk trends, statistics) and a retention clean-up.
 */

import Database from 'better-sqlite3';
import { z } from 'zod';
import {
  ANOMALY_CATEGORIES,
  type AgentModelState,
  type AgentType,
  type Alert,
  type AlertSeverity,
  type AlertStatus,
  type AnomalyCategory,
  type FeedbackEvent,
  type Prediction,
} from '../types.js';

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS predictions (
  id TEXT PRIMARY KEY,
  agent_type TEXT NOT NULL,
  category TEXT NOT NULL,
  score REAL NOT NULL,
  confidence REAL NOT NULL,
  window_id TEXT NOT NULL,
  window_timestamp INTEGER NOT NULL,
  timestamp INTEGER NOT NULL,
  model_version INTEGER NOT NULL,
  evidence TEXT NOT NULL DEFAULT '{}'
);

CREATE TABLE IF NOT EXISTS alerts (
  id TEXT PRIMARY KEY,
  revision INTEGER NOT NULL,
  category TEXT NOT NULL,
  severity TEXT NOT NULL,
  vote REAL NOT NULL,
  status TEXT NOT NULL,
  message TEXT NOT NULL,
  recommendation TEXT NOT NULL,
  supporting_agents TEXT NOT NULL,
  supporting_prediction_ids TEXT NOT NULL,
  evidence TEXT NOT NULL,
  window_timestamp INTEGER NOT NULL,
  created_at INTEGER NOT NULL,
  updated_at INTEGER NOT NULL,
  delivered INTEGER NOT NULL DEFAULT 0
);

CREATE TABLE IF NOT EXISTS feedback (
  id TEXT PRIMARY KEY,
  alert_id TEXT,
  category TEXT,
  kind TEXT NOT NULL,
  source TEXT NOT NULL,
  timestamp INTEGER NOT NULL,
  observed_score REAL
);

CREATE TABLE IF NOT EXISTS model_states (
  agent_type TEXT PRIMARY KEY,
  version INTEGER NOT NULL,
  params TEXT NOT NULL,
  updated_at INTEGER NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_predictions_agent_ts ON predictions(agent_type, timestamp);
CREATE INDEX IF NOT EXISTS idx_alerts_updated_at ON alerts(updated_at);
CREATE INDEX IF NOT EXISTS idx_alerts_delivered ON alerts(delivered);
CREATE INDEX IF NOT EXISTS idx_feedback_alert ON feedback(alert_id);
`;

// ─── Row schemas ─────────────────────────────────────────────────────

const numberRecord = z.record(z.number());
const stringList = z.array(z.string());

const alertRowSchema = z.object({
  id: z.string(),
  revision: z.number(),
  category: z.enum(ANOMALY_CATEGORIES),
  severity: z.enum(['low', 'medium', 'high']),
  vote: z.number(),
  status: z.enum(['pending', 'confirmed', 'dismissed', 'expired']),
  message: z.string(),
  recommendation: z.string(),
  supporting_agents: z.string(),
  supporting_prediction_ids: z.string(),
  evidence: z.string(),
  window_timestamp: z.number(),
  created_at: z.number(),
  updated_at: z.number(),
});

const modelStateRowSchema = z.object({
  agent_type: z.string(),
  version: z.number(),
  params: z.string(),
  updated_at: z.number(),
});

const countRowSchema = z.object({ c: z.number() });

function parseJson<T>(schema: z.ZodType<T>, text: string): T {
  return schema.parse(JSON.parse(text));
}

function rowToAlert(row: unknown): Alert {
  const r = alertRowSchema.parse(row);
  return {
    id: r.id,
    revision: r.revision,
    category: r.category,
    severity: r.severity,
    vote: r.vote,
    status: r.status,
    message: r.message,
    recommendation: r.recommendation,
    supportingAgents: parseJson(stringList, r.supporting_agents),
    supportingPredictionIds: parseJson(stringList, r.supporting_prediction_ids),
    evidence: parseJson(numberRecord, r.evidence),
    windowTimestamp: r.window_timestamp,
    createdAt: r.created_at,
    updatedAt: r.updated_at,
  };
}

// ─── Result shapes ───────────────────────────────────────────────────

export interface AlertSummary {
  total: number;
  byCategory: Record<AnomalyCategory, number>;
  bySeverity: Record<AlertSeverity, number>;
  byStatus: Record<AlertStatus, number>;
}

export interface RiskTrendPoint {
  bucketStart: number;
  avgScore: number;
  maxScore: number;
  count: number;
}

export interface HistoryStatistics {
  predictions: number;
  alerts: number;
  feedback: number;
  modelStates: number;
  oldestPrediction: number | null;
}

const DAY_MS = 86_400_000;

// ─── HistoryStore ────────────────────────────────────────────────────

export class HistoryStore {
  private db: Database.Database;

  constructor(dbPath: string = ':memory:') {
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');
    this.db.exec(SCHEMA_SQL);
  }

  recordPrediction(p: Prediction): void {
    this.db.prepare(`
      INSERT OR IGNORE INTO predictions (id, agent_type, category, score, confidence,
        window_id, window_timestamp, timestamp, model_version, evidence)
      VALUES (@id, @agentType, @category, @score, @confidence,
        @windowId, @windowTimestamp, @timestamp, @modelVersion, @evidence)
    `).run({
      id: p.id,
      agentType: p.agentType,
      category: p.category,
      score: p.score,
      confidence: p.confidence,
      windowId: p.windowId,
      windowTimestamp: p.windowTimestamp,
      timestamp: p.timestamp,
      modelVersion: p.modelVersion,
      evidence: JSON.stringify(p.evidence),
    });
  }

  /**
   * Store an alert revision. Only the latest revision per id is kept; an
   * older revision arriving late is ignored. A new revision is undelivered.
   */
  recordAlert(alert: Alert): void {
    this.db.prepare(`
      INSERT INTO alerts (id, revision, category, severity, vote, status, message, recommendation,
        supporting_agents, supporting_prediction_ids, evidence, window_timestamp, created_at, updated_at, delivered)
      VALUES (@id, @revision, @category, @severity, @vote, @status, @message, @recommendation,
        @supportingAgents, @supportingPredictionIds, @evidence, @windowTimestamp, @createdAt, @updatedAt, 0)
      ON CONFLICT(id) DO UPDATE SET
        revision = excluded.revision, severity = excluded.severity, vote = excluded.vote,
        status = excluded.status, message = excluded.message, recommendation = excluded.recommendation,
        supporting_agents = excluded.supporting_agents, supporting_prediction_ids = excluded.supporting_prediction_ids,
        evidence = excluded.evidence, window_timestamp = excluded.window_timestamp,
        updated_at = excluded.updated_at, delivered = 0
      WHERE excluded.revision > alerts.revision
    `).run({
      id: alert.id,
      revision: alert.revision,
      category: alert.category,
      severity: alert.severity,
      vote: alert.vote,
      status: alert.status,
      message: alert.message,
      recommendation: alert.recommendation,
      supportingAgents: JSON.stringify(alert.supportingAgents),
      supportingPredictionIds: JSON.stringify(alert.supportingPredictionIds),
      evidence: JSON.stringify(alert.evidence),
      windowTimestamp: alert.windowTimestamp,
      createdAt: alert.createdAt,
      updatedAt: alert.updatedAt,
    });
  }

  /** Mark a revision delivered; a newer stored revision stays undelivered. */
  markDelivered(alertId: string, revision: number): void {
    this.db.prepare('UPDATE alerts SET delivered = 1 WHERE id = ? AND revision = ?').run(alertId, revision);
  }

  getUndelivered(): Alert[] {
    return this.db.prepare('SELECT * FROM alerts WHERE delivered = 0 ORDER BY updated_at ASC').all().map(rowToAlert);
  }

  getAlert(alertId: string): Alert | null {
    const row = this.db.prepare('SELECT * FROM alerts WHERE id = ?').get(alertId);
    return row === undefined ? null : rowToAlert(row);
  }

  getRecentAlerts(limit: number = 20, includeResolved: boolean = true): Alert[] {
    const sql = includeResolved
      ? 'SELECT * FROM alerts ORDER BY updated_at DESC LIMIT ?'
      : "SELECT * FROM alerts WHERE status = 'pending' ORDER BY updated_at DESC LIMIT ?";
    return this.db.prepare(sql).all(limit).map(rowToAlert);
  }

  /** Status change without a new revision (e.g. an operator acting on the stored alert). */
  updateAlertStatus(alertId: string, status: AlertStatus, updatedAt: number = Date.now()): boolean {
    const info = this.db.prepare('UPDATE alerts SET status = ?, updated_at = ? WHERE id = ?').run(status, updatedAt, alertId);
    return info.changes > 0;
  }

  /** Returns false when the event id was already stored. */
  recordFeedback(event: FeedbackEvent): boolean {
    const info = this.db.prepare(`
      INSERT OR IGNORE INTO feedback (id, alert_id, category, kind, source, timestamp, observed_score)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `).run(
      event.id,
      event.alertId ?? null,
      event.category ?? null,
      event.kind,
      event.source,
      event.timestamp,
      event.observedScore ?? null,
    );
    return info.changes > 0;
  }

  hasFeedback(eventId: string): boolean {
    return this.db.prepare('SELECT 1 FROM feedback WHERE id = ?').get(eventId) !== undefined;
  }

  saveModelState(state: AgentModelState): void {
    this.db.prepare(`
      INSERT INTO model_states (agent_type, version, params, updated_at) VALUES (?, ?, ?, ?)
      ON CONFLICT(agent_type) DO UPDATE SET
        version = excluded.version, params = excluded.params, updated_at = excluded.updated_at
    `).run(state.agentType, state.version, JSON.stringify(state.params), state.updatedAt);
  }

  loadModelState(agentType: AgentType): AgentModelState | null {
    const row = this.db.prepare('SELECT * FROM model_states WHERE agent_type = ?').get(agentType);
    if (row === undefined) return null;
    const r = modelStateRowSchema.parse(row);
    return {
      agentType: r.agent_type,
      version: r.version,
      params: parseJson(numberRecord, r.params),
      updatedAt: r.updated_at,
    };
  }

  getAlertSummary(sinceMs: number = 0): AlertSummary {
    const summary: AlertSummary = {
      total: 0,
      byCategory: { sticking: 0, washout_mud_loss: 0, hole_cleaning: 0, rop_optimization: 0 },
      bySeverity: { low: 0, medium: 0, high: 0 },
      byStatus: { pending: 0, confirmed: 0, dismissed: 0, expired: 0 },
    };
    const rows = this.db.prepare('SELECT * FROM alerts WHERE updated_at >= ?').all(sinceMs).map(rowToAlert);
    for (const a of rows) {
      summary.total++;
      summary.byCategory[a.category]++;
      summary.bySeverity[a.severity]++;
      summary.byStatus[a.status]++;
    }
    return summary;
  }

  /** Score trend for one agent, bucketed by prediction time. */
  getRiskTrend(agentType: AgentType, sinceMs: number, bucketMs: number = 60_000): RiskTrendPoint[] {
    const rows = this.db.prepare(`
      SELECT CAST(timestamp / @bucket AS INTEGER) * @bucket AS bucket_start,
             AVG(score) AS avg_score, MAX(score) AS max_score, COUNT(*) AS c
      FROM predictions
      WHERE agent_type = @agentType AND timestamp >= @since
      GROUP BY bucket_start
      ORDER BY bucket_start ASC
    `).all({ bucket: Math.max(1, Math.floor(bucketMs)), agentType, since: sinceMs });

    const trendRow = z.object({ bucket_start: z.number(), avg_score: z.number(), max_score: z.number(), c: z.number() });
    return rows.map(row => {
      const r = trendRow.parse(row);
      return { bucketStart: r.bucket_start, avgScore: r.avg_score, maxScore: r.max_score, count: r.c };
    });
  }

  getStatistics(): HistoryStatistics {
    const count = (table: string): number =>
      countRowSchema.parse(this.db.prepare(`SELECT COUNT(*) AS c FROM ${table}`).get()).c;
    const oldest = z.object({ ts: z.number().nullable() })
      .parse(this.db.prepare('SELECT MIN(timestamp) AS ts FROM predictions').get());
    return {
      predictions: count('predictions'),
      alerts: count('alerts'),
      feedback: count('feedback'),
      modelStates: count('model_states'),
      oldestPrediction: oldest.ts,
    };
  }

  /**
   * Retention clean-up. Pending alerts are kept regardless of age.
   * Returns the number of rows deleted.
   */
  pruneOlderThan(days: number, now: number = Date.now()): number {
    const cutoff = now - days * DAY_MS;
    const tx = this.db.transaction(() => {
      let deleted = 0;
      deleted += this.db.prepare('DELETE FROM predictions WHERE timestamp < ?').run(cutoff).changes;
      deleted += this.db.prepare("DELETE FROM alerts WHERE updated_at < ? AND status != 'pending'").run(cutoff).changes;
      deleted += this.db.prepare('DELETE FROM feedback WHERE timestamp < ?').run(cutoff).changes;
      return deleted;
    });
    const deleted = tx();
    if (deleted > 0) {
      console.log(`[Drillsense Store] Pruned ${deleted} records older than ${days} days`);
    }
    return deleted;
  }

  close(): void {
    this.db.close();
  }
}

/**
 * Open a file-backed store, falling back to an in-memory one when the file
 * cannot be opened.
 */
export function openHistoryStore(dbPath: string): HistoryStore {
  try {
    return new HistoryStore(dbPath);
  } catch (err) {
    console.warn('[Drillsense Store] SQLite unavailable, memory-only mode:', err instanceof Error ? err.message : String(err));
    return new HistoryStore(':memory:');
  }
}
