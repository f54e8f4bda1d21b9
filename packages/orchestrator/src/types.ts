import type { UnitExit, UnitRunSpec, UnitState } from "@stackgate/core";
import type { ArtifactStore } from "@stackgate/artifacts";
import type { UnitRunner } from "./runner.js";

export interface OrchestratorOptions {
  /** Shared store for artifacts produced and consumed by units. */
  store: ArtifactStore;
  /** Runner per run type. Defaults: ProcessRunner and ExtractRunner. */
  runners?: Partial<Record<UnitRunSpec["type"], UnitRunner>>;
  /** Default bound on a unit's gate wait in ms (0 = unbounded). Default: 0 */
  gateTimeoutMs?: number;
  /** Grace period before running units are killed on stop. Default: 5000 */
  stopGraceMs?: number;
  /** Default restart limit after failures (0 = unlimited). Default: 0 */
  maxRestarts?: number;
  /** Initial backoff delay in ms. Default: 1000 */
  initialBackoffMs?: number;
  /** Maximum backoff delay in ms. Default: 30000 */
  maxBackoffMs?: number;
  /** Run time in ms after which a unit's backoff resets. Default: 60000 */
  healthyThresholdMs?: number;
  /**
   * Delay before an `always` unit is restarted after exiting 0.
   * Default: initialBackoffMs
   */
  restartDelayMs?: number;
}

export interface OrchestratorEvents {
  "unit-state": [name: string, state: UnitState, previous: UnitState];
  "unit-exit": [name: string, exit: UnitExit];
  restarting: [name: string, attempt: number, delayMs: number];
  settled: [];
}
