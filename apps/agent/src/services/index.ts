/**
 * Effect services for the BandPilot agent.
 *
 * This module exports all service layers that can be composed
 * together for dependency injection using Effect's Layer system.
 */

export * from "./RouterClient.js"
export * from "./SimulatedRouter.js"
export * from "./BandCatalog.js"
export * from "./BandAnalyzer.js"
export * from "./MetricStore.js"
export * from "./DecisionEngine.js"
export * from "./MonitorService.js"
export * from "./OptimizationScheduler.js"
