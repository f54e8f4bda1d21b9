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
  UnitState,
  GateState,
  GateResult,
  UnitExit,
  UnitStatus,
  HealthReport,
  ArtifactValue,
  EnvironmentEntry,
  EnvironmentRecord,
  ReadErrorCode,
  ReadResult,
  WriteErrorCode,
  WriteResult,
  UnitInput,
  TopologyFile,
} from "./types/index.js";
export {
  ENV_KEY_PATTERN,
  UNIT_NAME_PATTERN,
  unitSchema,
  topologyFileSchema,
  resolveUnit,
  resolveTopology,
} from "./types/index.js";

export type { StackgateErrorCode } from "./errors.js";
export { StackgateError, isStackgateError, errorMessage } from "./errors.js";
