/**
 * Washouts (pressure loss through damaged string) and mud losses (fluid lost
 * to formation). The agent scores both and reports the likelier one.
 */

import type { ContributingFactor } from '../types.js';
import { calibrate, clamp01, type AgentDefinition } from './adapter.js';

export const washoutMudLossAgent: AgentDefinition = {
  agentType: 'washout_mud_loss',
  category: 'washout_mud_loss',
  description: 'Standpipe pressure / flow balance model for washouts and mud losses',
  defaultParams: { sensitivity: 0.8, bias: 0, lossEcdPpg: 12 },
  parameterBounds: {
    sensitivity: [0.1, 1.5],
    bias: [-0.3, 0.3],
    lossEcdPpg: [9, 18],
  },

  infer(f, params) {
    const spp = f.stats.spp;
    const flow = f.stats.flowRate;
    const torque = f.stats.torque;

    // Washout: pressure falls, or falls while flow rises
    const sppDropFactor = spp.change < 0 && spp.avg > 0 ? clamp01(Math.abs(spp.change) / (spp.avg * 0.1)) : 0;
    const flowPressureAnomaly = spp.change < 0 && flow.change > 0
      ? clamp01((flow.change / 20) * Math.abs(spp.change / 100))
      : 0;
    const torqueInstability = torque.avg > 0 ? clamp01(Math.abs(torque.change) / (torque.avg * 0.2 + 0.1)) : 0;
    const washout = calibrate(0.5 * sppDropFactor + 0.3 * flowPressureAnomaly + 0.2 * torqueInstability, params);

    // Mud loss: returns fall, with pressure, at high ECD
    const flowLossFactor = flow.change < 0 && flow.avg > 0 ? clamp01(Math.abs(flow.change) / (flow.avg * 0.1)) : 0;
    const pressureFlowCorrelation = spp.change < 0 && flow.change < 0
      ? clamp01((Math.abs(flow.change) / (flow.avg * 0.1 + 0.1)) * Math.abs(spp.change / 100))
      : 0;
    const lossEcd = params['lossEcdPpg'] ?? 12;
    const ecdFactor = f.ecd > lossEcd ? clamp01((f.ecd - lossEcd) / 3) : 0;
    const mudLoss = calibrate(0.4 * flowLossFactor + 0.3 * pressureFlowCorrelation + 0.3 * ecdFactor, params);

    const issueType = washout > mudLoss ? 'Washout' : 'Mud Losses';
    const score = Math.max(washout, mudLoss);

    const factors: ContributingFactor[] = [];
    const recommendations: string[] = [];

    if (issueType === 'Washout') {
      if (sppDropFactor > 0.5) {
        factors.push({ factor: 'Standpipe Pressure Drop', value: `${spp.change.toFixed(0)} psi/min` });
        recommendations.push('Monitor for surface pressure fluctuations');
      }
      if (flowPressureAnomaly > 0.5) {
        factors.push({ factor: 'Flow-Pressure Anomaly', value: 'Detected' });
        recommendations.push('Check for inconsistent flow and pressure relationships');
      }
      if (torqueInstability > 0.5) {
        factors.push({ factor: 'Torque Instability', value: `${torque.change.toFixed(2)} kft-lbs/min` });
        recommendations.push('Watch for erratic torque behavior');
      }
      if (recommendations.length === 0) {
        recommendations.push('Perform flow check to confirm washout');
        recommendations.push('Prepare to pull out of hole if washout confirmed');
      }
    } else {
      if (flowLossFactor > 0.5) {
        factors.push({ factor: 'Flow Return Decrease', value: `${flow.change.toFixed(0)} gpm/min` });
        recommendations.push('Monitor pit volume and flow returns closely');
      }
      if (pressureFlowCorrelation > 0.5) {
        factors.push({ factor: 'Pressure-Flow Correlation', value: 'Detected' });
        recommendations.push('Check for simultaneous pressure and flow decreases');
      }
      if (ecdFactor > 0.5) {
        factors.push({ factor: 'High ECD', value: `${f.ecd.toFixed(2)} ppg` });
        recommendations.push('Consider reducing mud weight or ECD');
      }
      if (recommendations.length === 0) {
        recommendations.push('Perform flow check to confirm losses');
        recommendations.push('Prepare loss circulation material (LCM) if losses confirmed');
      }
    }

    return {
      score,
      residuals: {
        // Relative per-minute drift of circulating volume and pressure
        massBalance: flow.avg > 0 ? flow.change / flow.avg : 0,
        pressureBalance: spp.avg > 0 ? spp.change / spp.avg : 0,
      },
      metrics: { washoutScore: washout, mudLossScore: mudLoss },
      factors,
      recommendations,
      issueType,
    };
  },
};
