/**
 * Drillsense Engine
 *
 * Orchestration and consensus layer for multi-agent drilling anomaly
 * detection: concurrent agent fan-out under a cycle deadline, physics
 * validation, corroborated consensus alerts and online model adaptation.
 *
 * @example
 * ```typescript
 * import { DetectionEngine, createDefaultAgents, TelemetrySimulator } from 'drillsense-engine';
 *
 * const engine = new DetectionEngine({ registry: createDefaultAgents() });
 * const sim = new TelemetrySimulator({ scenario: 'sticking', maxWindows: 5 });
 * for (let w = sim.next(); w; w = sim.next()) {
 *   const report = await engine.runCycle(w);
 *   report.alerts.forEach(a => console.log(a.message));
 * }
 * ```
 *
 * @packageDocumentation
 */

// Domain types
export * from './types.js';
export * from './errors.js';

// Telemetry
export { validateWindow, freezeWindow, telemetrySampleSchema, telemetryWindowSchema } from './telemetry/window.js';
export type { WindowValidation } from './telemetry/window.js';
export {
  extractFeatures,
  computeStats,
  mechanicalSpecificEnergy,
  holeCleaningIndex,
  differentialPressure,
  dragFactor,
} from './telemetry/features.js';
export type { DrillingFeatures, ChannelStats, Channel } from './telemetry/features.js';

// Agents
export { ModelStateCell } from './agents/model-state.js';
export { createAgentAdapter, calibrate, clamp01, dataConfidence } from './agents/adapter.js';
export type { AgentAdapter, AgentDefinition, AdapterOptions, InferenceResult } from './agents/adapter.js';
export { AgentRegistry, createDefaultAgents, REFERENCE_AGENTS } from './agents/registry.js';
export type { DefaultAgentsOptions } from './agents/registry.js';
export { mechanicalStickingAgent } from './agents/mechanical-sticking.js';
export { differentialStickingAgent } from './agents/differential-sticking.js';
export { holeCleaningAgent } from './agents/hole-cleaning.js';
export { washoutMudLossAgent } from './agents/washout-mud-loss.js';
export { ropOptimizationAgent } from './agents/rop-optimization.js';

// Physics
export { checkPrediction, checkParameterUpdate, applyDelta, DEFAULT_PHYSICS_LIMITS } from './physics/constraints.js';
export type { PhysicsLimits } from './physics/constraints.js';

// Consensus
export { ConsensusAggregator, DEFAULT_CONSENSUS_CONFIG, weightedVote, recencyFactor } from './consensus/aggregator.js';
export type {
  ConsensusConfig,
  CycleInput,
  CategoryDecision,
  AggregationResult,
  ExpectedAgent,
  ResolvedStatus,
} from './consensus/aggregator.js';
export { prioritizedRecommendations, severityFor, agentLabel } from './consensus/recommendations.js';
export type { RankedRecommendation } from './consensus/recommendations.js';

// Adaptation
export { OnlineAdaptationController, DEFAULT_ADAPTATION_CONFIG, ADAPTABLE_PARAMETERS } from './adaptation/controller.js';
export type {
  AdaptationConfig,
  AgentAdaptationConfig,
  AdaptationHooks,
  FeedbackContext,
  FeedbackResult,
  UpdateOutcome,
} from './adaptation/controller.js';

// Engine
export { DetectionEngine, DEFAULT_ENGINE_CONFIG } from './engine/detection-engine.js';
export type {
  EngineConfig,
  EngineComponents,
  EnginePhase,
  EngineStatus,
  CycleReport,
  DroppedPrediction,
  WindowSource,
} from './engine/detection-engine.js';
export { fanOut } from './engine/fan-out.js';
export type { AgentOutcome, FanOutOptions } from './engine/fan-out.js';

// Publisher
export {
  AlertPublisher,
  WebhookSink,
  MemorySink,
  getAlertPublisher,
  resetAlertPublisher,
  DEFAULT_PUBLISHER_CONFIG,
} from './publisher/alert-publisher.js';
export type {
  AlertSink,
  PublisherConfig,
  PublisherHealth,
  PublishResult,
  PublisherOptions,
  FeedbackHandler,
} from './publisher/alert-publisher.js';

// History
export { HistoryStore, openHistoryStore } from './store/history-store.js';
export type { AlertSummary, RiskTrendPoint, HistoryStatistics } from './store/history-store.js';
export { initPgHistory, isPgActive, recordAlertPg, getAlertsPg, closePg } from './store/history-pg.js';

// Simulation
export { TelemetrySimulator, SCENARIOS, isScenario, createRng, DEFAULT_SIMULATOR_CONFIG } from './simulation/simulator.js';
export type { Scenario, SimulatorConfig } from './simulation/simulator.js';

// Configuration
export {
  loadConfig,
  saveConfig,
  updateConfig,
  setThreshold,
  setCycleInterval,
  toggleAgent,
  toEngineSettings,
  createDefaultConfig,
  getConfigDir,
  getConfigPath,
  getDatabasePath,
} from './config.js';
export type { DrillsenseConfig, AgentSection, ConfigUpdates, EngineSettings } from './config.js';
