export { Orchestrator } from "./orchestrator.js";
export type { OrchestratorOptions, OrchestratorEvents } from "./types.js";
export { UnitGraph } from "./graph.js";
export { DependencyGate } from "./gate.js";
export type { GateEntry, GateEvents, GateVerdict } from "./gate.js";
export { calculateBackoff } from "./backoff.js";
export type { RunContext, UnitHandle, UnitRunner } from "./runner.js";
export { ProcessRunner } from "./process-runner.js";
export type { ProcessRunnerOptions } from "./process-runner.js";
export { ExtractRunner } from "./extract-runner.js";
export { buildUnitEnv } from "./env.js";
export {
  DEFAULT_STORE_DIR,
  interpolate,
  parseTopology,
  loadTopologyFile,
} from "./topology-loader.js";
export type {
  LoadTopologyOptions,
  LoadedTopology,
  TopologyVars,
} from "./topology-loader.js";
