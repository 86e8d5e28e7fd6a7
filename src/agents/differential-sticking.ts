/**
 * Differential sticking: overbalance against permeable formations, ECD,
 * filter-cake management and stationary pipe.
 */

import { MUD_GRADIENT_FACTOR, STRING_WEIGHT_KLBS_PER_FT } from '../telemetry/features.js';
import type { ContributingFactor } from '../types.js';
import { calibrate, clamp01, type AgentDefinition } from './adapter.js';

export const differentialStickingAgent: AgentDefinition = {
  agentType: 'differential_sticking',
  category: 'sticking',
  description: 'Overbalance, ECD and stationary-pipe model for differential sticking',
  defaultParams: { sensitivity: 0.7, bias: 0, highRiskOverbalancePsi: 1000 },
  parameterBounds: {
    sensitivity: [0.1, 1.5],
    bias: [-0.3, 0.3],
    highRiskOverbalancePsi: [300, 3000],
  },

  infer(f, params) {
    const reference = params['highRiskOverbalancePsi'] ?? 1000;
    const base = clamp01(Math.min(1, f.differentialPressure / reference) * 0.8);
    const ecdFactor = f.ecd > 0 ? clamp01((f.ecd - 10) / 3) : 0;
    const flowRateFactor = f.flowRate > 0 ? clamp01(1 - f.flowRate / 800) : 0;

    let stationaryFactor = 0;
    const theoreticalWeight = f.depth * STRING_WEIGHT_KLBS_PER_FT;
    if (f.depth > 0 && f.hookLoad > 0 && theoreticalWeight > 0) {
      stationaryFactor = clamp01(1 - f.hookLoad / theoreticalWeight);
    }

    const raw = 0.4 * base + 0.3 * ecdFactor + 0.2 * flowRateFactor + 0.1 * stationaryFactor;
    const score = calibrate(raw, params);

    const factors: ContributingFactor[] = [];
    const recommendations: string[] = [];

    if (f.differentialPressure > 500) {
      factors.push({ factor: 'High Differential Pressure', value: `${f.differentialPressure.toFixed(0)} psi` });
      recommendations.push('Reduce mud weight to decrease differential pressure');
    }
    if (ecdFactor > 0.5) {
      factors.push({ factor: 'High ECD', value: `${f.ecd.toFixed(2)} ppg` });
      recommendations.push('Reduce ECD by adjusting mud properties or reducing pump rate');
    }
    if (flowRateFactor > 0.6) {
      factors.push({ factor: 'Low Flow Rate', value: `${f.flowRate.toFixed(0)} gpm` });
      recommendations.push('Increase flow rate to improve filter cake management');
    }
    if (stationaryFactor > 0.5) {
      factors.push({ factor: 'Extended Stationary Time', value: 'Detected' });
      recommendations.push('Keep pipe moving to prevent embedment in filter cake');
    }
    if (score > 0.7 && recommendations.length === 0) {
      recommendations.push('Monitor for signs of differential sticking: overpull, high torque, no reciprocation');
      recommendations.push('Consider reducing mud weight and keeping pipe moving');
    }

    const hydrostatic = MUD_GRADIENT_FACTOR * f.ecd * f.depth;
    return {
      score,
      residuals: {
        // Overbalance can never exceed the hydrostatic column that produces it
        pressureBalance: hydrostatic > 0 ? f.differentialPressure / hydrostatic : 0,
      },
      metrics: { differentialPressure: f.differentialPressure, ecdFactor, stationaryFactor },
      factors,
      recommendations,
    };
  },
};
