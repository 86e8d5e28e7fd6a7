/**
 * ROP optimization: drilling efficiency from MSE against formation strength,
 * and the set-point changes (WOB, RPM, flow) that would recover it.
 * The score is the size of the optimization opportunity, not a hazard.
 */

import type { ContributingFactor } from '../types.js';
import { calibrate, clamp01, type AgentDefinition } from './adapter.js';

/** Torque that counts as "near limit" for the RPM rule, kft-lbs */
const MAX_TORQUE = 100;

export const ropOptimizationAgent: AgentDefinition = {
  agentType: 'rop_optimization',
  category: 'rop_optimization',
  description: 'MSE efficiency model recommending WOB/RPM/flow set points',
  defaultParams: { sensitivity: 0.5, bias: 0, aggressiveness: 0.3, ucsPsi: 20_000 },
  parameterBounds: {
    sensitivity: [0.1, 1.5],
    bias: [-0.3, 0.3],
    aggressiveness: [0, 1],
    ucsPsi: [1_000, 60_000],
  },

  infer(f, params) {
    const aggressiveness = params['aggressiveness'] ?? 0.3;
    const optimalMse = (params['ucsPsi'] ?? 20_000) * 0.35;

    let efficiency = 1;
    if (f.mse > 0 && optimalMse > 0) {
      efficiency = Math.min(1, Math.max(0.1, optimalMse / f.mse));
    }
    const lowEfficiency = efficiency < 0.7;

    let optimalWob = f.wob;
    let wobAdjust = false;
    const torquePerWob = f.torque / (f.wob + 0.1);
    if (lowEfficiency && torquePerWob < 0.3) {
      optimalWob = f.wob * 1.2;
      wobAdjust = true;
    } else if (lowEfficiency && torquePerWob > 0.7) {
      optimalWob = f.wob * 0.85;
      wobAdjust = true;
    }

    let optimalRpm = f.rpm;
    let rpmAdjust = false;
    if (lowEfficiency && f.torque > 0.8 * MAX_TORQUE) {
      optimalRpm = f.rpm * 0.85;
      rpmAdjust = true;
    } else if (lowEfficiency && f.torque < 0.4 * MAX_TORQUE) {
      optimalRpm = f.rpm * 1.15;
      rpmAdjust = true;
    }

    let optimalFlow = f.flowRate;
    const flowAdjust = f.holeCleaningIndex > 0 && f.holeCleaningIndex < 0.7;
    if (flowAdjust) optimalFlow = f.flowRate * 1.15;

    let wobGain = 0;
    if (wobAdjust) wobGain = optimalWob > f.wob && f.wob > 0 ? (optimalWob / f.wob - 1) * 0.7 : -0.05;
    let rpmGain = 0;
    if (rpmAdjust) rpmGain = optimalRpm > f.rpm && f.rpm > 0 ? (optimalRpm / f.rpm - 1) * 0.5 : -0.03;
    const flowGain = flowAdjust && optimalFlow > f.flowRate ? 0.05 : 0;
    const improvement = (1 + wobGain) * (1 + rpmGain) * (1 + flowGain) - 1;

    const scale = 0.5 + 0.5 * aggressiveness;
    if (wobAdjust) optimalWob = f.wob + (optimalWob - f.wob) * scale;
    if (rpmAdjust) optimalRpm = f.rpm + (optimalRpm - f.rpm) * scale;
    if (flowAdjust) optimalFlow = f.flowRate + (optimalFlow - f.flowRate) * scale;

    const expectedRop = f.rop + improvement * f.rop;
    const score = calibrate(clamp01(1 - efficiency), params);

    const factors: ContributingFactor[] = [];
    const recommendations: string[] = [];
    if (lowEfficiency) {
      factors.push({ factor: 'Low Drilling Efficiency', value: `${efficiency.toFixed(2)} ratio` });
      if (f.mse > optimalMse * 1.5) {
        recommendations.push('Adjust parameters to reduce MSE and improve drilling efficiency');
      }
    }
    if (wobAdjust) {
      const dir = optimalWob > f.wob ? 'Increase' : 'Decrease';
      factors.push({ factor: 'WOB Adjustment', value: `${dir} to ${optimalWob.toFixed(1)} klbs` });
      recommendations.push(`Gradually ${dir.toLowerCase()} WOB to ${optimalWob.toFixed(1)} klbs`);
    }
    if (rpmAdjust) {
      const dir = optimalRpm > f.rpm ? 'Increase' : 'Decrease';
      factors.push({ factor: 'RPM Adjustment', value: `${dir} to ${optimalRpm.toFixed(0)} rpm` });
      recommendations.push(`Gradually ${dir.toLowerCase()} RPM to ${optimalRpm.toFixed(0)}`);
    }
    if (flowAdjust) {
      factors.push({ factor: 'Flow Rate Adjustment', value: `Increase to ${optimalFlow.toFixed(0)} gpm` });
      recommendations.push(`Increase flow rate to ${optimalFlow.toFixed(0)} gpm for better hole cleaning`);
    }

    const metrics: Record<string, number> = {
      mse: f.mse,
      efficiency,
      rop: f.rop,
      expectedRop,
      // Wear proxy: kpsi of energy spent above the optimum per foot
      impliedBitWearRate: Math.max(0, f.mse - optimalMse) / 1000,
    };
    if (wobAdjust) metrics['recommendedWob'] = Math.round(optimalWob * 10) / 10;
    if (rpmAdjust) metrics['recommendedRpm'] = Math.round(optimalRpm);
    if (flowAdjust) metrics['recommendedFlowRate'] = Math.round(optimalFlow);

    return {
      score,
      residuals: {
        // Relative MSE excess over the formation-strength optimum
        energyBalance: f.mse > 0 ? Math.max(0, f.mse - optimalMse) / f.mse : 0,
      },
      metrics,
      factors,
      recommendations,
    };
  },
};
