/**
 * Orchestrator-side lifecycle of a unit.
 * `stopped` is reached only through an orchestrator shutdown.
 */
export type UnitState =
  | "pending"
  | "waiting"
  | "running"
  | "succeeded"
  | "failed"
  | "stopped";

/** Completion state as observed by dependents through the gate. */
export type GateState = "pending" | "running" | "completed" | "failed";

export type GateResult =
  | { status: "ready" }
  | { status: "timed-out"; waitedMs: number }
  | { status: "failed"; reason: string }
  | { status: "aborted" };

export interface UnitExit {
  code: number | null;
  signal: string | null;
  error?: string;
}

export interface UnitStatus {
  name: string;
  state: UnitState;
  gate: GateState;
  pid: number | null;
  attempts: number;
  restartCount: number;
  lastExitCode: number | null;
  lastStartedAt: Date | null;
  lastError: string | null;
}

export interface HealthReport {
  healthy: boolean;
  /** Units whose state keeps the deployment from being healthy. */
  blocking: {
    name: string;
    state: UnitState;
    expected: "succeeded" | "running";
  }[];
}
