export type {
  UnitKind,
  CompletionCondition,
  RestartPolicy,
  MissingArtifactPolicy,
  ProcessRunSpec,
  ExtractField,
  ExtractRunSpec,
  UnitRunSpec,
  UnitDefinition,
  Topology,
} from "./unit.js";
export type {
  UnitState,
  GateState,
  GateResult,
  UnitExit,
  UnitStatus,
  HealthReport,
} from "./state.js";
export type {
  ArtifactValue,
  EnvironmentEntry,
  EnvironmentRecord,
  ReadErrorCode,
  ReadResult,
  WriteErrorCode,
  WriteResult,
} from "./artifact.js";
export {
  ENV_KEY_PATTERN,
  UNIT_NAME_PATTERN,
  unitSchema,
  topologyFileSchema,
  resolveUnit,
  resolveTopology,
} from "./topology.js";
export type { UnitInput, TopologyFile } from "./topology.js";
