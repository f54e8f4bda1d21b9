import { EventEmitter } from "node:events";
import type {
  CompletionCondition,
  GateResult,
  HealthReport,
  Topology,
  UnitDefinition,
  UnitExit,
  UnitRunSpec,
  UnitState,
  UnitStatus,
} from "@stackgate/core";
import { errorMessage } from "@stackgate/core";
import type { ArtifactStore } from "@stackgate/artifacts";
import { createLogger } from "@stackgate/logger";
import { calculateBackoff } from "./backoff.js";
import { UnitGraph } from "./graph.js";
import { DependencyGate } from "./gate.js";
import { ProcessRunner } from "./process-runner.js";
import { ExtractRunner } from "./extract-runner.js";
import type { UnitHandle, UnitRunner } from "./runner.js";
import type { OrchestratorEvents, OrchestratorOptions } from "./types.js";

const log = createLogger("orchestrator");

const DEFAULT_STOP_GRACE_MS = 5000;
const DEFAULT_INITIAL_BACKOFF_MS = 1000;
const DEFAULT_MAX_BACKOFF_MS = 30_000;
const DEFAULT_HEALTHY_THRESHOLD_MS = 60_000;

interface UnitRuntime {
  readonly index: number;
  readonly unit: UnitDefinition;
  state: UnitState;
  handle: UnitHandle | null;
  /** A launch has been issued and has not resolved yet. */
  launching: boolean;
  attempts: number;
  /** Consecutive restarts after failures; drives the backoff. */
  restartCount: number;
  lastExitCode: number | null;
  lastStartedAt: Date | null;
  lastError: string | null;
  waitTimer: ReturnType<typeof setTimeout> | null;
  restartTimer: ReturnType<typeof setTimeout> | null;
}

type DependencyVerdict =
  | { status: "ready" }
  | { status: "pending"; waitingOn: string[] }
  | { status: "failed"; unit: string };

function describeExit(exit: UnitExit): string {
  if (exit.error) return exit.error;
  if (exit.signal) return `killed by ${exit.signal}`;
  return `exited with code ${exit.code}`;
}

/**
 * Starts the units of a topology in dependency order and keeps them
 * running according to their restart policies.
 *
 * Per unit: pending -> waiting -> running -> succeeded | failed, with
 * restart-eligible units returning to pending after a delay. A unit is
 * launched only once every upstream gate is satisfied. All decisions are
 * made in `evaluate()`, which runs after every transition; evaluating
 * again without a state change does nothing.
 */
export class Orchestrator extends EventEmitter<OrchestratorEvents> {
  readonly name: string;
  readonly graph: UnitGraph;
  readonly gate = new DependencyGate();

  private readonly store: ArtifactStore;
  private readonly runners: Record<UnitRunSpec["type"], UnitRunner>;
  private readonly settings: Required<
    Omit<OrchestratorOptions, "store" | "runners">
  >;
  private readonly runtimes: UnitRuntime[];
  private readonly inflight = new Set<Promise<void>>();

  private started = false;
  private stopRequested = false;
  private activeGraceMs: number;
  private evaluating = false;
  private dirty = false;

  /** Throws StackgateError (e.g. CYCLE_DETECTED) before anything runs. */
  constructor(topology: Topology, options: OrchestratorOptions) {
    super();
    this.name = topology.name;
    this.graph = UnitGraph.build(topology.units);
    this.store = options.store;
    this.runners = {
      process: options.runners?.process ?? new ProcessRunner(),
      extract: options.runners?.extract ?? new ExtractRunner(),
    };
    const initialBackoffMs =
      options.initialBackoffMs ?? DEFAULT_INITIAL_BACKOFF_MS;
    this.settings = {
      gateTimeoutMs: options.gateTimeoutMs ?? 0,
      stopGraceMs: options.stopGraceMs ?? DEFAULT_STOP_GRACE_MS,
      maxRestarts: options.maxRestarts ?? 0,
      initialBackoffMs,
      maxBackoffMs: options.maxBackoffMs ?? DEFAULT_MAX_BACKOFF_MS,
      healthyThresholdMs:
        options.healthyThresholdMs ?? DEFAULT_HEALTHY_THRESHOLD_MS,
      restartDelayMs: options.restartDelayMs ?? initialBackoffMs,
    };
    this.activeGraceMs = this.settings.stopGraceMs;

    this.runtimes = this.graph.units.map((unit, index) => {
      this.gate.register(unit.name);
      return {
        index,
        unit,
        state: "pending",
        handle: null,
        launching: false,
        attempts: 0,
        restartCount: 0,
        lastExitCode: null,
        lastStartedAt: null,
        lastError: null,
        waitTimer: null,
        restartTimer: null,
      };
    });
  }

  /** Begin launching units. Calling it again has no effect. */
  start(): void {
    if (this.started) {
      log.warn(`${this.name} is already started, ignoring start()`);
      return;
    }
    this.started = true;
    log.info(`Starting ${this.name}: ${this.graph.orderedNames().join(", ")}`);
    this.evaluate();
  }

  /**
   * Stop running units one at a time, latest in start order first, so a
   * unit is stopped only after everything started after it has exited.
   * Each gets `graceMs` to exit before it is killed. Units that never ran
   * end in `stopped`; no further restarts happen.
   */
  async stop(graceMs: number = this.settings.stopGraceMs): Promise<void> {
    if (this.stopRequested) {
      await this.drain();
      return;
    }
    this.stopRequested = true;
    this.activeGraceMs = graceMs;
    log.info(`Stopping ${this.name} (grace ${graceMs}ms)`);

    for (const rt of this.runtimes) {
      this.clearWaitTimer(rt);
      if (rt.restartTimer) {
        clearTimeout(rt.restartTimer);
        rt.restartTimer = null;
      }
      if ((rt.state === "pending" || rt.state === "waiting") && !rt.launching) {
        this.setState(rt, "stopped");
      }
    }

    for (const index of [...this.graph.order].reverse()) {
      const handle = this.runtimes[index].handle;
      if (handle) {
        await handle.stop(graceMs);
      }
    }
    await this.drain();

    log.info(`${this.name} stopped`);
    this.checkSettled();
  }

  getStatus(): UnitStatus[] {
    return this.runtimes.map((rt) => this.statusOf(rt));
  }

  getUnitStatus(name: string): UnitStatus {
    return this.statusOf(this.runtimes[this.graph.indexOf(name)]);
  }

  /**
   * Healthy when every `exited-zero` unit something depends on has
   * succeeded, and every service (or `started` unit something depends
   * on) is running.
   */
  getHealth(): HealthReport {
    const blocking: HealthReport["blocking"] = [];
    for (const rt of this.runtimes) {
      const required = this.graph.dependents[rt.index].length > 0;
      if (required && rt.unit.condition === "exited-zero") {
        if (rt.state !== "succeeded") {
          blocking.push({
            name: rt.unit.name,
            state: rt.state,
            expected: "succeeded",
          });
        }
      } else if (rt.unit.kind === "service" || required) {
        if (rt.state !== "running") {
          blocking.push({
            name: rt.unit.name,
            state: rt.state,
            expected: "running",
          });
        }
      }
    }
    return { healthy: blocking.length === 0, blocking };
  }

  /** Wait for `name` to satisfy a condition (its own by default). */
  waitForUnit(
    name: string,
    condition?: CompletionCondition,
    timeoutMs = 0,
    signal?: AbortSignal,
  ): Promise<GateResult> {
    const unit = this.graph.units[this.graph.indexOf(name)];
    return this.gate.wait(name, condition ?? unit.condition, timeoutMs, signal);
  }

  /** True when no unit is active or scheduled to restart. */
  isSettled(): boolean {
    return this.runtimes.every(
      (rt) =>
        !rt.launching &&
        rt.restartTimer === null &&
        rt.state !== "pending" &&
        rt.state !== "waiting" &&
        rt.state !== "running",
    );
  }

  /** Resolves once settled after `start()`, or after `stop()`. */
  whenSettled(): Promise<void> {
    if (this.canSettle() && this.isSettled()) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this.once("settled", () => resolve());
    });
  }

  // ── Decision loop ──

  private evaluate(): void {
    if (!this.started || this.stopRequested) return;
    if (this.evaluating) {
      this.dirty = true;
      return;
    }
    this.evaluating = true;
    try {
      do {
        this.dirty = false;
        for (const index of this.graph.order) {
          this.evaluateUnit(this.runtimes[index]);
        }
      } while (this.dirty);
    } finally {
      this.evaluating = false;
    }
    this.checkSettled();
  }

  private evaluateUnit(rt: UnitRuntime): void {
    if (rt.state === "pending") {
      this.enterWaiting(rt);
    }
    if (rt.state !== "waiting" || rt.launching) return;

    const verdict = this.dependencyVerdict(rt);
    if (verdict.status === "pending") return;

    this.clearWaitTimer(rt);
    if (verdict.status === "failed") {
      this.failUnit(rt, `dependency ${verdict.unit} failed`, {
        terminal: true,
      });
      return;
    }
    this.track(this.launch(rt));
  }

  private dependencyVerdict(rt: UnitRuntime): DependencyVerdict {
    const waitingOn: string[] = [];
    for (const upstream of this.graph.dependencies[rt.index]) {
      const dep = this.graph.units[upstream];
      const verdict = this.gate.check(dep.name, dep.condition);
      if (verdict === "failed") return { status: "failed", unit: dep.name };
      if (verdict === "pending") waitingOn.push(dep.name);
    }
    return waitingOn.length > 0
      ? { status: "pending", waitingOn }
      : { status: "ready" };
  }

  private enterWaiting(rt: UnitRuntime): void {
    this.setState(rt, "waiting");
    const timeoutMs = rt.unit.gateTimeoutMs ?? this.settings.gateTimeoutMs;
    if (timeoutMs <= 0 || this.graph.dependencies[rt.index].length === 0) {
      return;
    }

    rt.waitTimer = setTimeout(() => {
      rt.waitTimer = null;
      if (rt.state !== "waiting" || rt.launching || this.stopRequested) return;
      const verdict = this.dependencyVerdict(rt);
      const waitingOn =
        verdict.status === "pending"
          ? verdict.waitingOn.join(", ")
          : "dependencies";
      this.failUnit(
        rt,
        `timed out after ${timeoutMs}ms waiting for ${waitingOn}`,
      );
      this.evaluate();
    }, timeoutMs);
  }

  // ── Unit lifecycle ──

  private async launch(rt: UnitRuntime): Promise<void> {
    const name = rt.unit.name;
    rt.launching = true;
    rt.attempts += 1;

    let handle: UnitHandle;
    try {
      handle = await this.runners[rt.unit.run.type].launch(rt.unit, {
        store: this.store,
        attempt: rt.attempts,
      });
    } catch (err) {
      rt.launching = false;
      if (this.stopRequested) {
        this.setState(rt, "stopped");
        return;
      }
      this.failUnit(rt, `failed to start: ${errorMessage(err)}`);
      this.evaluate();
      return;
    }
    rt.launching = false;

    if (this.stopRequested) {
      await handle.stop(this.activeGraceMs);
      this.setState(rt, "stopped");
      return;
    }

    rt.handle = handle;
    rt.lastStartedAt = new Date();
    log.info(`${name} is running (attempt ${rt.attempts})`);
    this.gate.record(name, "running");
    this.setState(rt, "running");
    this.evaluate();

    const exit = await handle.exited;
    this.onExit(rt, exit);
  }

  private onExit(rt: UnitRuntime, exit: UnitExit): void {
    const name = rt.unit.name;
    rt.handle = null;
    rt.lastExitCode = exit.code;
    this.emit("unit-exit", name, exit);

    if (this.stopRequested) {
      this.gate.record(name, exit.code === 0 ? "completed" : "failed", {
        exitCode: exit.code,
        terminal: true,
        reason: `${name} was stopped`,
      });
      this.setState(rt, "stopped");
      return;
    }

    if (exit.code === 0) {
      rt.restartCount = 0;
      rt.lastError = null;
      log.info(`${name} exited successfully`);
      this.gate.record(name, "completed", { exitCode: 0 });
      this.setState(rt, "succeeded");
      if (rt.unit.restart === "always") {
        this.scheduleRestart(
          rt,
          rt.unit.restartDelayMs ?? this.settings.restartDelayMs,
        );
      }
    } else {
      const ranForMs = rt.lastStartedAt
        ? Date.now() - rt.lastStartedAt.getTime()
        : 0;
      this.failUnit(rt, describeExit(exit), { exitCode: exit.code, ranForMs });
    }
    this.evaluate();
  }

  private failUnit(
    rt: UnitRuntime,
    reason: string,
    opts: {
      terminal?: boolean;
      exitCode?: number | null;
      ranForMs?: number;
    } = {},
  ): void {
    const name = rt.unit.name;
    rt.lastError = reason;
    const restart = !opts.terminal && this.mayRestart(rt);

    log.error(`${name} failed: ${reason}`);
    this.gate.record(name, "failed", {
      exitCode: opts.exitCode,
      terminal: !restart,
      reason: `${name}: ${reason}`,
    });
    this.setState(rt, "failed");

    if (!restart) return;

    rt.restartCount += 1;
    if ((opts.ranForMs ?? 0) >= this.settings.healthyThresholdMs) {
      log.info(
        `${name} ran long enough to be considered healthy, resetting backoff`,
      );
      rt.restartCount = 1;
    }
    this.scheduleRestart(
      rt,
      calculateBackoff(
        rt.restartCount,
        this.settings.initialBackoffMs,
        this.settings.maxBackoffMs,
      ),
    );
  }

  private mayRestart(rt: UnitRuntime): boolean {
    if (rt.unit.restart === "never") return false;
    const maxRestarts = rt.unit.maxRestarts ?? this.settings.maxRestarts;
    if (maxRestarts > 0 && rt.restartCount >= maxRestarts) {
      log.error(`${rt.unit.name} exceeded max restarts (${maxRestarts})`);
      return false;
    }
    return true;
  }

  private scheduleRestart(rt: UnitRuntime, delayMs: number): void {
    const name = rt.unit.name;
    log.info(`Restarting ${name} in ${delayMs}ms (attempt ${rt.attempts + 1})`);
    this.emit("restarting", name, rt.attempts + 1, delayMs);

    rt.restartTimer = setTimeout(() => {
      rt.restartTimer = null;
      if (this.stopRequested) return;
      this.gate.record(name, "pending");
      this.setState(rt, "pending");
      this.evaluate();
    }, delayMs);
  }

  // ── Helpers ──

  private track(task: Promise<void>): void {
    const tracked: Promise<void> = task
      .catch((err: unknown) => {
        log.error(`Unexpected orchestrator error: ${errorMessage(err)}`);
      })
      .then(() => {
        this.inflight.delete(tracked);
        this.checkSettled();
      });
    this.inflight.add(tracked);
  }

  private async drain(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.all([...this.inflight]);
    }
  }

  private canSettle(): boolean {
    return this.started || this.stopRequested;
  }

  private checkSettled(): void {
    if (this.canSettle() && this.isSettled()) {
      this.emit("settled");
    }
  }

  private clearWaitTimer(rt: UnitRuntime): void {
    if (rt.waitTimer) {
      clearTimeout(rt.waitTimer);
      rt.waitTimer = null;
    }
  }

  private setState(rt: UnitRuntime, state: UnitState): void {
    const previous = rt.state;
    if (previous === state) return;
    rt.state = state;
    log.debug(`${rt.unit.name}: ${previous} -> ${state}`);
    this.emit("unit-state", rt.unit.name, state, previous);
  }

  private statusOf(rt: UnitRuntime): UnitStatus {
    return {
      name: rt.unit.name,
      state: rt.state,
      gate: this.gate.get(rt.unit.name).state,
      pid: rt.handle?.pid ?? null,
      attempts: rt.attempts,
      restartCount: rt.restartCount,
      lastExitCode: rt.lastExitCode,
      lastStartedAt: rt.lastStartedAt,
      lastError: rt.lastError,
    };
  }
}
