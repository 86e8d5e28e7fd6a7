/**
 * Cross-agent recommendation ranking.
 *
 * Hazard agents contribute their own recommendation texts at a priority taken
 * from their score; the ROP agent contributes one set-point recommendation
 * assembled from its recommended parameters.
 */

import type { AgentType, AlertSeverity, Prediction } from '../types.js';

export interface RankedRecommendation {
  recommendation: string;
  /** Human-readable agent name */
  source: string;
  agentType: AgentType;
  score: number;
  priority: AlertSeverity;
}

const PRIORITY_RANK: Record<AlertSeverity, number> = { high: 3, medium: 2, low: 1 };

export function severityFor(value: number): AlertSeverity {
  if (value >= 0.8) return 'high';
  if (value >= 0.6) return 'medium';
  return 'low';
}

/** `mechanical_sticking` → `Mechanical Sticking` */
export function agentLabel(agentType: AgentType): string {
  return agentType
    .split('_')
    .filter(Boolean)
    .map(w => w.charAt(0).toUpperCase() + w.slice(1))
    .join(' ');
}

const SET_POINT_LABELS: ReadonlyArray<[metric: string, label: string]> = [
  ['recommendedWob', 'WOB'],
  ['recommendedRpm', 'RPM'],
  ['recommendedFlowRate', 'Flow Rate'],
];

function setPointRecommendation(prediction: Prediction): RankedRecommendation | null {
  const metrics = prediction.evidence.metrics;
  const parts: string[] = [];
  for (const [metric, label] of SET_POINT_LABELS) {
    const value = metrics[metric];
    if (value !== undefined) parts.push(`${label}: ${value.toFixed(1)}`);
  }
  if (parts.length === 0) return null;

  let text = `Optimize drilling parameters: ${parts.join(', ')}`;
  const rop = metrics['rop'];
  const expected = metrics['expectedRop'];
  if (rop !== undefined && expected !== undefined && rop > 0) {
    text += ` (Expected ROP improvement: ${(((expected - rop) / rop) * 100).toFixed(1)}%)`;
  }
  return {
    recommendation: text,
    source: agentLabel(prediction.agentType),
    agentType: prediction.agentType,
    // Set-point advice always leads the medium tier
    score: 1,
    priority: 'medium',
  };
}

/**
 * Rank recommendations from all predictions: priority tier first, then score.
 * Duplicate texts keep their highest-ranked occurrence.
 */
export function prioritizedRecommendations(predictions: readonly Prediction[]): RankedRecommendation[] {
  const all: RankedRecommendation[] = [];

  for (const p of predictions) {
    if (p.category === 'rop_optimization') {
      const rec = setPointRecommendation(p);
      if (rec) all.push(rec);
      continue;
    }
    for (const text of p.evidence.recommendations) {
      all.push({
        recommendation: text,
        source: agentLabel(p.agentType),
        agentType: p.agentType,
        score: p.score,
        priority: severityFor(p.score),
      });
    }
  }

  all.sort((a, b) => PRIORITY_RANK[b.priority] - PRIORITY_RANK[a.priority] || b.score - a.score);

  const seen = new Set<string>();
  return all.filter(r => {
    if (seen.has(r.recommendation)) return false;
    seen.add(r.recommendation);
    return true;
  });
}
