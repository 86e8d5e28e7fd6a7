/**
 * PostgreSQL mirror of the alert history.
 *
 * When DRILLSENSE_HISTORY_DB is set, every published alert revision is also
 * written to a shared PostgreSQL table so several rigs can feed one office
 * dashboard. The local SQLite store stays the source of truth.
 *
 * The `pg` package is loaded on first use; if the connection or the table
 * set-up fails the mirror is silently unavailable.
 *
 * @packageDocumentation
 */

import type { Pool } from 'pg';
import { z } from 'zod';
import { ANOMALY_CATEGORIES, type Alert } from '../types.js';

let pool: Pool | null = null;
let initialized = false;

const CREATE_TABLE_SQL = `
CREATE TABLE IF NOT EXISTS drillsense_alerts (
  id                TEXT PRIMARY KEY,
  revision          INTEGER NOT NULL,
  well_id           TEXT,
  category          TEXT NOT NULL,
  severity          TEXT NOT NULL,
  vote              DOUBLE PRECISION NOT NULL,
  status            TEXT NOT NULL,
  message           TEXT NOT NULL,
  recommendation    TEXT NOT NULL,
  supporting_agents JSONB NOT NULL DEFAULT '[]',
  evidence          JSONB NOT NULL DEFAULT '{}',
  window_timestamp  TIMESTAMPTZ NOT NULL,
  created_at        TIMESTAMPTZ NOT NULL,
  updated_at        TIMESTAMPTZ NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_drillsense_alerts_updated_at ON drillsense_alerts(updated_at);
CREATE INDEX IF NOT EXISTS idx_drillsense_alerts_category ON drillsense_alerts(category);
`;

/**
 * Initialize the mirror. Returns true if the pool is ready.
 * Safe to call multiple times; later calls are no-ops.
 */
export async function initPgHistory(): Promise<boolean> {
  if (initialized) return pool !== null;

  const connString = process.env['DRILLSENSE_HISTORY_DB'];
  if (!connString) {
    initialized = true;
    return false;
  }

  try {
    const pg = await import('pg');
    pool = new pg.default.Pool({ connectionString: connString, max: 5 });
    await pool.query(CREATE_TABLE_SQL);
    initialized = true;
    console.log('[Drillsense Store] PostgreSQL alert mirror connected');
    return true;
  } catch (err) {
    console.error('[Drillsense Store] PostgreSQL mirror unavailable:', err instanceof Error ? err.message : String(err));
    pool = null;
    initialized = true;
    return false;
  }
}

export function isPgActive(): boolean {
  return pool !== null;
}

/**
 * Upsert the latest revision of an alert. Fire-and-forget: errors are
 * logged, never thrown.
 */
export function recordAlertPg(alert: Alert, wellId?: string): void {
  if (!pool) return;
  pool.query(
    `INSERT INTO drillsense_alerts
       (id, revision, well_id, category, severity, vote, status, message, recommendation,
        supporting_agents, evidence, window_timestamp, created_at, updated_at)
     VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10,$11,$12,$13,$14)
     ON CONFLICT (id) DO UPDATE SET
       revision = EXCLUDED.revision, severity = EXCLUDED.severity, vote = EXCLUDED.vote,
       status = EXCLUDED.status, message = EXCLUDED.message, recommendation = EXCLUDED.recommendation,
       supporting_agents = EXCLUDED.supporting_agents, evidence = EXCLUDED.evidence,
       window_timestamp = EXCLUDED.window_timestamp, updated_at = EXCLUDED.updated_at
     WHERE EXCLUDED.revision > drillsense_alerts.revision`,
    [
      alert.id,
      alert.revision,
      wellId ?? null,
      alert.category,
      alert.severity,
      alert.vote,
      alert.status,
      alert.message,
      alert.recommendation,
      JSON.stringify(alert.supportingAgents),
      JSON.stringify(alert.evidence),
      new Date(alert.windowTimestamp).toISOString(),
      new Date(alert.createdAt).toISOString(),
      new Date(alert.updatedAt).toISOString(),
    ],
  ).catch((err: unknown) => {
    console.error('[Drillsense Store] pg write error:', err instanceof Error ? err.message : String(err));
  });
}

const timestampColumn = z.union([z.date(), z.string()]).transform(v => new Date(v).getTime());

const pgAlertRow = z.object({
  id: z.string(),
  revision: z.number(),
  category: z.enum(ANOMALY_CATEGORIES),
  severity: z.enum(['low', 'medium', 'high']),
  vote: z.coerce.number(),
  status: z.enum(['pending', 'confirmed', 'dismissed', 'expired']),
  message: z.string(),
  recommendation: z.string(),
  supporting_agents: z.array(z.string()),
  evidence: z.record(z.number()),
  window_timestamp: timestampColumn,
  created_at: timestampColumn,
  updated_at: timestampColumn,
});

/** Recent alerts across all mirrored rigs, newest first. */
export async function getAlertsPg(limit = 50, offset = 0): Promise<Alert[]> {
  if (!pool) return [];
  try {
    const { rows } = await pool.query(
      `SELECT id, revision, category, severity, vote, status, message, recommendation,
              supporting_agents, evidence, window_timestamp, created_at, updated_at
       FROM drillsense_alerts
       ORDER BY updated_at DESC
       LIMIT $1 OFFSET $2`,
      [limit, offset],
    );
    return rows.map((row: unknown): Alert => {
      const r = pgAlertRow.parse(row);
      return {
        id: r.id,
        revision: r.revision,
        category: r.category,
        severity: r.severity,
        vote: r.vote,
        status: r.status,
        message: r.message,
        recommendation: r.recommendation,
        supportingAgents: r.supporting_agents,
        // Prediction ids stay in the local store
        supportingPredictionIds: [],
        evidence: r.evidence,
        windowTimestamp: r.window_timestamp,
        createdAt: r.created_at,
        updatedAt: r.updated_at,
      };
    });
  } catch (err) {
    console.error('[Drillsense Store] pg read error:', err instanceof Error ? err.message : String(err));
    return [];
  }
}

/**
 * Gracefully close the pool.
 */
export async function closePg(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
  initialized = false;
}
