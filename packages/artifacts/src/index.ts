export type { ArtifactStore } from "./types.js";
export { normalizeArtifactPath } from "./paths.js";
export { MemoryArtifactStore } from "./memory-store.js";
export { FileArtifactStore } from "./file-store.js";
export { parseFieldPath, selectField, toArtifactValue } from "./field-path.js";
export type { FieldStep } from "./field-path.js";
export { StructuredArtifactReader } from "./reader.js";
export {
  EnvironmentFileWriter,
  renderEnvFile,
  parseEnvFile,
  formatEnvValue,
  validateEnvironmentRecord,
} from "./env-file.js";
export { runExtraction } from "./extractor.js";
export type {
  ExtractionPlan,
  ExtractionReport,
  ExtractionErrorCode,
} from "./extractor.js";
export {
  createDeploymentsPlan,
  deploymentsManifestPath,
  declarationsPath,
  DEFAULT_NETWORK,
  DEPLOYMENTS_ENV_FILE,
} from "./deployments.js";
export type { DeploymentsPlanOptions } from "./deployments.js";
