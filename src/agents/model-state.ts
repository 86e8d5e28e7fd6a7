/**
 * Copy-on-write holder for an agent's model parameters.
 *
 * Readers take `snapshot()` once and keep using that frozen object; the
 * adaptation controller publishes a new frozen object with `swap()`. The
 * reference assignment is the only write, so a reader can never observe a
 * half-written parameter set.
 */

import type { AgentModelState, AgentType } from '../types.js';

function freezeState(state: AgentModelState): AgentModelState {
  return Object.freeze({ ...state, params: Object.freeze({ ...state.params }) });
}

export class ModelStateCell {
  private current: AgentModelState;

  constructor(agentType: AgentType, params: Readonly<Record<string, number>>, now: number = Date.now()) {
    this.current = freezeState({ agentType, version: 1, params, updatedAt: now });
  }

  get agentType(): AgentType {
    return this.current.agentType;
  }

  snapshot(): AgentModelState {
    return this.current;
  }

  /**
   * Publish new parameters if nobody swapped since `baseVersion` was read.
   * Returns the new snapshot, or null when the base is stale.
   */
  swap(baseVersion: number, params: Readonly<Record<string, number>>, now: number = Date.now()): AgentModelState | null {
    if (baseVersion !== this.current.version) return null;
    this.current = freezeState({
      agentType: this.current.agentType,
      version: this.current.version + 1,
      params,
      updatedAt: now,
    });
    return this.current;
  }

  /** Unconditional replacement (recalibration, restore from store). */
  reset(params: Readonly<Record<string, number>>, now: number = Date.now(), version?: number): AgentModelState {
    this.current = freezeState({
      agentType: this.current.agentType,
      version: version ?? this.current.version + 1,
      params,
      updatedAt: now,
    });
    return this.current;
  }
}
