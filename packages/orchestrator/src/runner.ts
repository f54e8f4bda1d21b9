import type { UnitDefinition, UnitExit } from "@stackgate/core";
import type { ArtifactStore } from "@stackgate/artifacts";

export interface RunContext {
  store: ArtifactStore;
  /** 1 for the first launch, incremented on every restart. */
  attempt: number;
}

/** A launched unit. */
export interface UnitHandle {
  readonly pid: number | null;
  /** Settles once, when the unit has exited. Never rejects. */
  readonly exited: Promise<UnitExit>;
  /** Ask the unit to exit; force it after `graceMs`. Resolves after exit. */
  stop(graceMs: number): Promise<void>;
}

export interface UnitRunner {
  /** Start `unit`. Resolves once it is up, rejects if it could not be started. */
  launch(unit: UnitDefinition, context: RunContext): Promise<UnitHandle>;
}
