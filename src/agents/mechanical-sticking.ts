/**
 * Mechanical sticking: drag, torque excursions and torque/RPM instability
 * (undergauge hole, keyseats, ledges, wellbore instability).
 */

import type { ContributingFactor } from '../types.js';
import { calibrate, clamp01, type AgentDefinition } from './adapter.js';

export const mechanicalStickingAgent: AgentDefinition = {
  agentType: 'mechanical_sticking',
  category: 'sticking',
  description: 'Drag factor and torque/RPM signature model for mechanical sticking',
  defaultParams: { sensitivity: 0.8, bias: 0, dragGain: 0.8 },
  parameterBounds: {
    sensitivity: [0.1, 1.5],
    bias: [-0.3, 0.3],
    dragGain: [0.2, 1.5],
  },

  infer(f, params) {
    const torque = f.stats.torque;
    const rpm = f.stats.rpm;

    const base = clamp01(f.dragFactor * (params['dragGain'] ?? 0.8));

    const torqueExcursion = torque.avg > 0 && torque.std > 0 ? (f.torque - torque.avg) / (torque.std + 1) : 0;
    const torqueRisk = clamp01(0.3 + 0.7 * Math.max(0, torqueExcursion));
    const torqueInstability = Math.min(1, Math.abs(torque.change) / (torque.avg * 0.2 + 0.1));
    const rpmInstability = rpm.avg > 0 && rpm.std > 0
      ? Math.min(1, Math.abs(rpm.change) / (rpm.avg * 0.2 + 0.1))
      : 0;

    const raw = 0.35 * base + 0.25 * torqueRisk + 0.25 * torqueInstability + 0.15 * rpmInstability;
    const score = calibrate(raw, params);

    const factors: ContributingFactor[] = [];
    const recommendations: string[] = [];

    if (f.dragFactor > 0.6) {
      factors.push({ factor: 'High Drag Factor', value: f.dragFactor.toFixed(2) });
      recommendations.push('Work pipe to reduce drag and consider lubricant additives to mud');
    }
    if (torqueRisk > 0.5) {
      factors.push({ factor: 'Elevated Torque', value: `${f.torque.toFixed(1)} kft-lbs` });
      recommendations.push('Reduce weight on bit (WOB) to decrease torque');
    }
    if (torqueInstability > 0.6) {
      factors.push({ factor: 'Torque Instability', value: `${torque.change.toFixed(2)} kft-lbs/min` });
      recommendations.push('Stabilize drilling parameters and check for formation changes');
    }
    if (rpmInstability > 0.6) {
      factors.push({ factor: 'RPM Instability', value: `${rpm.change.toFixed(1)} RPM/min` });
      recommendations.push('Stabilize rotary speed and check for possible vibrations');
    }
    if (f.flowRate < 400 && score > 0.4) {
      factors.push({ factor: 'Low Flow Rate', value: `${f.flowRate.toFixed(0)} gpm` });
      recommendations.push('Increase flow rate to improve hole cleaning');
    }
    if (f.wob > 30 && score > 0.4) {
      factors.push({ factor: 'High WOB', value: `${f.wob.toFixed(1)} klbs` });
      recommendations.push('Reduce weight on bit (WOB) to decrease mechanical sticking risk');
    }
    if (score > 0.7 && recommendations.length === 0) {
      recommendations.push('Perform slack-off and pick-up tests to check for potential sticking points');
      recommendations.push('Consider working the pipe and reaming to clean the hole');
    }

    return {
      score,
      residuals: {
        // Torque excursion in standard deviations; large values are not physical for a rotating string
        torqueBalance: torqueExcursion,
      },
      metrics: { dragFactor: f.dragFactor, torqueInstability, rpmInstability },
      factors,
      recommendations,
    };
  },
};
