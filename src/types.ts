/**
 * Drillsense Core Domain Types
 *
 * Data contract shared by the agents, the physics checker, the consensus
 * aggregator, the adaptation controller and the alert publisher.
 *
 * @packageDocumentation
 */

// ─── Telemetry ───────────────────────────────────────────────────────

/** One canonical timestamped sensor record (units: ft, klbs, kft-lbs, psi, gpm, ppg, ft/hr). */
export interface TelemetrySample {
  /** Epoch milliseconds */
  timestamp: number;
  depth: number;
  /** Weight on bit */
  wob: number;
  rpm: number;
  torque: number;
  standpipePressure: number;
  flowRate: number;
  mudDensity: number;
  /** Rate of penetration */
  rop?: number;
  hookLoad?: number;
  /** Equivalent circulating density; falls back to mud density when absent */
  ecd?: number;
}

/**
 * Ordered samples covering a bounded recent interval.
 * Frozen before it is handed to agents.
 */
export interface TelemetryWindow {
  id: string;
  wellId?: string;
  startTime: number;
  endTime: number;
  samples: readonly TelemetrySample[];
}

// ─── Agents ──────────────────────────────────────────────────────────

export const BUILTIN_AGENT_TYPES = [
  'mechanical_sticking',
  'differential_sticking',
  'hole_cleaning',
  'washout_mud_loss',
  'rop_optimization',
] as const;

export type BuiltinAgentType = typeof BUILTIN_AGENT_TYPES[number];

/** Open set: built-ins plus any registered agent type */
export type AgentType = string;

export const ANOMALY_CATEGORIES = ['sticking', 'washout_mud_loss', 'hole_cleaning', 'rop_optimization'] as const;

export type AnomalyCategory = typeof ANOMALY_CATEGORIES[number];

/** Presentation priority when several categories qualify in one cycle (lower = first) */
export const CATEGORY_PRIORITY: Record<AnomalyCategory, number> = {
  sticking: 0,
  washout_mud_loss: 1,
  hole_cleaning: 2,
  rop_optimization: 3,
};

export function isAnomalyCategory(value: string): value is AnomalyCategory {
  return (ANOMALY_CATEGORIES as readonly string[]).includes(value);
}

export interface ContributingFactor {
  factor: string;
  value: string;
}

export interface PredictionEvidence {
  /** Normalized physics residuals (conservation checks), ideally near 0 */
  residuals: Readonly<Record<string, number>>;
  /** Physical quantities implied by the model (rates, recommended set points) */
  metrics: Readonly<Record<string, number>>;
  factors: readonly ContributingFactor[];
  recommendations: readonly string[];
  /** Washout vs mud losses, when the agent distinguishes them */
  issueType?: string;
}

export interface Prediction {
  id: string;
  agentType: AgentType;
  category: AnomalyCategory;
  /** Risk measure in [0,1] */
  score: number;
  /** Model self-reported certainty in [0,1] */
  confidence: number;
  evidence: PredictionEvidence;
  windowId: string;
  /** endTime of the window the prediction was computed from */
  windowTimestamp: number;
  timestamp: number;
  /** AgentModelState version the prediction was computed against */
  modelVersion: number;
}

export interface AgentModelState {
  agentType: AgentType;
  version: number;
  params: Readonly<Record<string, number>>;
  updatedAt: number;
}

/** Inclusive [min, max] per parameter name */
export type ParameterBounds = Readonly<Record<string, readonly [number, number]>>;

export type ParameterDelta = Readonly<Record<string, number>>;

// ─── Physics verdicts ────────────────────────────────────────────────

export type ConstraintReason =
  | 'MISSING_WINDOW'
  | 'NON_FINITE_VALUE'
  | 'SCORE_OUT_OF_RANGE'
  | 'CONFIDENCE_OUT_OF_RANGE'
  | 'RESIDUAL_EXCEEDS_BOUND'
  | 'NEGATIVE_BIT_WEAR'
  | 'IMPLAUSIBLE_RATE'
  | 'TIMESTAMP_BEFORE_WINDOW'
  | 'UNKNOWN_PARAMETER'
  | 'PARAMETER_OUT_OF_BOUNDS'
  | 'STEP_TOO_LARGE'
  | 'STALE_BASE_VERSION';

export type ConstraintVerdict =
  | { ok: true }
  | { ok: false; reason: ConstraintReason; detail: string };

// ─── Alerts & feedback ───────────────────────────────────────────────

export type AlertSeverity = 'low' | 'medium' | 'high';

export type AlertStatus = 'pending' | 'confirmed' | 'dismissed' | 'expired';

export interface Alert {
  id: string;
  /** Increments each time a pending alert is refreshed */
  revision: number;
  category: AnomalyCategory;
  severity: AlertSeverity;
  /** Weighted vote that qualified the alert */
  vote: number;
  supportingAgents: readonly AgentType[];
  supportingPredictionIds: readonly string[];
  windowTimestamp: number;
  createdAt: number;
  updatedAt: number;
  status: AlertStatus;
  message: string;
  recommendation: string;
  /** Per supporting agent: the score it contributed this revision */
  evidence: Readonly<Record<AgentType, number>>;
}

export type FeedbackKind = 'confirmed' | 'false_positive' | 'missed';

export interface FeedbackEvent {
  id: string;
  /** Required for confirmed / false_positive */
  alertId?: string;
  /** Required for missed events that reference no alert */
  category?: AnomalyCategory;
  kind: FeedbackKind;
  source: 'operator' | 'outcome';
  timestamp: number;
  /** Outcome-derived ground truth in [0,1], when known */
  observedScore?: number;
}

// ─── Health ──────────────────────────────────────────────────────────

export interface CoverageReport {
  cycleId: number;
  degradedCategories: readonly AnomalyCategory[];
  /** Every registered agent failed this cycle */
  globalDegraded: boolean;
  timestamp: number;
}

export interface DivergenceCondition {
  agentType: AgentType;
  consecutiveRejections: number;
  lastReason: ConstraintReason;
  raisedAt: number;
}
