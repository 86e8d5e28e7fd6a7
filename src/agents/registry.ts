/**
 * Agent registry: the set of adapters taking part in each detection cycle.
 *
 * Consensus code only ever sees adapters through this registry, so adding an
 * agent type is `register(createAgentAdapter(def))` and nothing else.
 */

import type { AgentType, AnomalyCategory } from '../types.js';
import { createAgentAdapter, type AdapterOptions, type AgentAdapter, type AgentDefinition } from './adapter.js';
import { differentialStickingAgent } from './differential-sticking.js';
import { holeCleaningAgent } from './hole-cleaning.js';
import { mechanicalStickingAgent } from './mechanical-sticking.js';
import { ropOptimizationAgent } from './rop-optimization.js';
import { washoutMudLossAgent } from './washout-mud-loss.js';

export const REFERENCE_AGENTS: readonly AgentDefinition[] = [
  mechanicalStickingAgent,
  differentialStickingAgent,
  holeCleaningAgent,
  washoutMudLossAgent,
  ropOptimizationAgent,
];

export class AgentRegistry {
  private adapters = new Map<AgentType, AgentAdapter>();

  /** Throws if the agent type is already registered: one model state per type. */
  register(adapter: AgentAdapter): void {
    if (this.adapters.has(adapter.agentType)) {
      throw new Error(`Agent type already registered: ${adapter.agentType}`);
    }
    this.adapters.set(adapter.agentType, adapter);
    console.log(`[Drillsense Agents] Registered ${adapter.agentType} → ${adapter.category}`);
  }

  unregister(agentType: AgentType): boolean {
    return this.adapters.delete(agentType);
  }

  get(agentType: AgentType): AgentAdapter | null {
    return this.adapters.get(agentType) ?? null;
  }

  has(agentType: AgentType): boolean {
    return this.adapters.has(agentType);
  }

  all(): AgentAdapter[] {
    return [...this.adapters.values()];
  }

  byCategory(category: AnomalyCategory): AgentAdapter[] {
    return this.all().filter(a => a.category === category);
  }

  /** Categories with at least one registered agent */
  categories(): AnomalyCategory[] {
    return [...new Set(this.all().map(a => a.category))];
  }

  get size(): number {
    return this.adapters.size;
  }
}

export interface DefaultAgentsOptions extends Pick<AdapterOptions, 'now'> {
  /** Agent types to leave out (disabled in config) */
  disabled?: readonly AgentType[];
  /** Per-agent parameter overrides merged over the definition defaults */
  paramOverrides?: Readonly<Record<AgentType, Readonly<Record<string, number>>>>;
}

/** Registry populated with the reference agents. */
export function createDefaultAgents(options: DefaultAgentsOptions = {}): AgentRegistry {
  const registry = new AgentRegistry();
  const disabled = new Set(options.disabled ?? []);
  for (const def of REFERENCE_AGENTS) {
    if (disabled.has(def.agentType)) continue;
    const overrides = options.paramOverrides?.[def.agentType];
    registry.register(createAgentAdapter(def, {
      ...(overrides ? { initialParams: { ...def.defaultParams, ...overrides } } : {}),
      ...(options.now ? { now: options.now } : {}),
    }));
  }
  return registry;
}
