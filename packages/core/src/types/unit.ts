/** A long-running service, or a task expected to run to completion. */
export type UnitKind = "service" | "task";

/**
 * What a unit offers to the units that depend on it:
 * - `started`: satisfied once the unit's process is up.
 * - `exited-zero`: satisfied only once the unit has exited with status 0.
 */
export type CompletionCondition = "started" | "exited-zero";

export type RestartPolicy = "never" | "on-failure" | "always";

export type MissingArtifactPolicy = "null" | "fail";

export interface ProcessRunSpec {
  type: "process";
  command: string;
  args: string[];
  env: Record<string, string>;
  /** Store-relative env files merged into the child environment at launch. */
  envFiles: string[];
  cwd?: string;
}

export interface ExtractField {
  /** Environment key written to the output file. */
  key: string;
  /** Store-relative path of the structured document. */
  artifact: string;
  /** Dotted field path, e.g. `.kakarot.address` or `accounts[0]`. */
  field: string;
}

export interface ExtractRunSpec {
  type: "extract";
  /** Store-relative path of the environment file to produce. */
  output: string;
  fields: ExtractField[];
  onMissingArtifact: MissingArtifactPolicy;
}

export type UnitRunSpec = ProcessRunSpec | ExtractRunSpec;

/** A fully resolved unit, with kind defaults applied. Immutable once loaded. */
export interface UnitDefinition {
  readonly name: string;
  readonly description?: string;
  readonly kind: UnitKind;
  readonly condition: CompletionCondition;
  readonly restart: RestartPolicy;
  readonly dependsOn: readonly string[];
  readonly run: UnitRunSpec;
  /** Bound on the gate wait in ms. 0 waits forever. */
  readonly gateTimeoutMs?: number;
  /** Restart attempts before giving up. 0 = unlimited. */
  readonly maxRestarts?: number;
  /** Delay before restarting after a successful exit (policy `always`). */
  readonly restartDelayMs?: number;
}

export interface Topology {
  name: string;
  units: UnitDefinition[];
}
