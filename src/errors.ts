/**
 * Drillsense error taxonomy.
 *
 * Every error here is recovered locally by the detection engine; none of them
 * is allowed to stop the cycle loop.
 *
 * @packageDocumentation
 */

import type { AgentType, ConstraintVerdict } from './types.js';

export type EngineErrorCode =
  | 'AGENT_UNAVAILABLE'
  | 'INVALID_WINDOW'
  | 'CONSTRAINT_VIOLATION'
  | 'MODEL_DIVERGENCE';

export abstract class EngineError extends Error {
  abstract readonly code: EngineErrorCode;
}

/** Adapter timed out, crashed or was cancelled. Degrades coverage for its category this cycle only. */
export class AgentUnavailableError extends EngineError {
  readonly code = 'AGENT_UNAVAILABLE' as const;
  public readonly agentType: AgentType;
  public readonly timedOut: boolean;

  constructor(agentType: AgentType, message: string, options: { timedOut?: boolean; cause?: unknown } = {}) {
    super(`Agent ${agentType} unavailable: ${message}`, { cause: options.cause });
    this.name = 'AgentUnavailableError';
    this.agentType = agentType;
    this.timedOut = options.timedOut ?? false;
  }
}

/** Malformed telemetry. The window is skipped for the agent that rejected it. */
export class InvalidWindowError extends EngineError {
  readonly code = 'INVALID_WINDOW' as const;
  public readonly windowId: string;
  public readonly issues: string[];

  constructor(windowId: string, issues: string[]) {
    super(`Invalid telemetry window ${windowId}: ${issues.join('; ')}`);
    this.name = 'InvalidWindowError';
    this.windowId = windowId;
    this.issues = issues;
  }
}

export class ConstraintViolationError extends EngineError {
  readonly code = 'CONSTRAINT_VIOLATION' as const;
  public readonly verdict: Extract<ConstraintVerdict, { ok: false }>;

  constructor(subject: string, verdict: Extract<ConstraintVerdict, { ok: false }>) {
    super(`${subject} violates ${verdict.reason}: ${verdict.detail}`);
    this.name = 'ConstraintViolationError';
    this.verdict = verdict;
  }
}

/** Repeated rejection of adaptation updates. Needs manual recalibration. */
export class ModelDivergenceError extends EngineError {
  readonly code = 'MODEL_DIVERGENCE' as const;
  public readonly agentType: AgentType;
  public readonly consecutiveRejections: number;

  constructor(agentType: AgentType, consecutiveRejections: number) {
    super(`Model for ${agentType} diverged after ${consecutiveRejections} rejected updates; recalibration required`);
    this.name = 'ModelDivergenceError';
    this.agentType = agentType;
    this.consecutiveRejections = consecutiveRejections;
  }
}

export function isEngineError(err: unknown): err is EngineError {
  return err instanceof EngineError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
