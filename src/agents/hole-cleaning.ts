/**
 * Hole cleaning inefficiency: cuttings generation (ROP) against transport
 * capacity (flow, rotation, mud), worsening with hole angle.
 */

import type { ContributingFactor } from '../types.js';
import { calibrate, clamp01, type AgentDefinition } from './adapter.js';

export const holeCleaningAgent: AgentDefinition = {
  agentType: 'hole_cleaning',
  category: 'hole_cleaning',
  description: 'Cuttings transport model for hole cleaning inefficiency',
  defaultParams: { sensitivity: 0.75, bias: 0, highRiskRop: 100 },
  parameterBounds: {
    sensitivity: [0.1, 1.5],
    bias: [-0.3, 0.3],
    highRiskRop: [30, 300],
  },

  infer(f, params) {
    const hci = f.holeCleaningIndex;
    const base = hci > 0 ? clamp01(1 - hci) : 0.5;
    const ropFactor = f.rop > 0 ? clamp01(f.rop / (params['highRiskRop'] ?? 100)) : 0;
    const rpmFactor = f.rpm > 0 ? clamp01(1 - f.rpm / 150) : 0;
    const flowRateFactor = f.flowRate > 0 ? clamp01(1 - f.flowRate / 800) : 0;
    const ecdFactor = f.ecd > 0 ? clamp01(Math.abs(f.ecd - 11.5) / 3) : 0;
    // No inclination channel: treat deep sections as high-angle
    const holeAngleFactor = f.depth > 8000 ? 0.8 : Math.min(0.6, Math.max(0.1, f.depth / 10000));

    const raw = 0.3 * base + 0.2 * ropFactor + 0.1 * rpmFactor + 0.2 * flowRateFactor + 0.1 * ecdFactor + 0.1 * holeAngleFactor;
    let score = calibrate(raw, params);
    if (f.stats.rop.change > 5) score = Math.min(1, score + 0.1);
    if (f.stats.flowRate.change < -20) score = Math.min(1, score + 0.1);

    const factors: ContributingFactor[] = [];
    const recommendations: string[] = [];

    if (hci > 0 && hci < 0.6) {
      factors.push({ factor: 'Low Hole Cleaning Index', value: hci.toFixed(2) });
      recommendations.push('Increase flow rate and pipe rotation to improve hole cleaning');
    }
    if (ropFactor > 0.7) {
      factors.push({ factor: 'High ROP', value: `${f.rop.toFixed(1)} ft/hr` });
      recommendations.push('Reduce ROP to prevent excess cuttings generation');
    }
    if (flowRateFactor > 0.6) {
      factors.push({ factor: 'Low Flow Rate', value: `${f.flowRate.toFixed(0)} gpm` });
      recommendations.push('Increase flow rate to improve cuttings removal');
    }
    if (rpmFactor > 0.6) {
      factors.push({ factor: 'Low RPM', value: `${f.rpm.toFixed(0)} rpm` });
      recommendations.push('Increase rotary speed to improve hole cleaning');
    }
    if (ecdFactor > 0.6) {
      factors.push({ factor: 'Non-optimal ECD', value: `${f.ecd.toFixed(2)} ppg` });
      recommendations.push('Adjust mud properties to optimize ECD');
    }
    if (holeAngleFactor > 0.7) {
      factors.push({ factor: 'High Hole Angle/Depth', value: `${f.depth.toFixed(0)} ft` });
      recommendations.push('Increase flowrate and RPM in high-angle sections');
    }
    if (score > 0.7 && recommendations.length === 0) {
      recommendations.push('Perform wiper trips to clean the hole');
      recommendations.push('Consider optimizing mud properties for better cuttings transport');
    }

    return {
      score,
      residuals: {
        // Cuttings generated vs carried away, both normalized to [0,1]
        massBalance: ropFactor - (f.flowRate > 0 ? Math.min(1, f.flowRate / 800) : 0),
      },
      metrics: { holeCleaningIndex: hci, rop: f.rop },
      factors,
      recommendations,
    };
  },
};
