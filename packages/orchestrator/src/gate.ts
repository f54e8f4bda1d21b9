import { EventEmitter } from "node:events";
import type {
  CompletionCondition,
  GateResult,
  GateState,
} from "@stackgate/core";

export interface GateEntry {
  state: GateState;
  exitCode: number | null;
  /** A failure that no restart will recover from. */
  terminal: boolean;
  reason: string | null;
  /** The unit has been running at least once. Never reset. */
  started: boolean;
}

export type GateVerdict = "ready" | "pending" | "failed";

export interface GateEvents {
  transition: [unit: string, entry: GateEntry];
}

/**
 * Tracks the completion state of every unit as seen by its dependents.
 *
 * `started` is satisfied as soon as the unit has been running once, and
 * stays satisfied whatever happens to the unit afterwards. `exited-zero`
 * is satisfied only by `completed`, which is recorded for a zero exit
 * status. A terminal failure fails `exited-zero` waits, and `started`
 * waits on a unit that never ran; a failure followed by a restart does
 * not, and the wait continues.
 */
export class DependencyGate extends EventEmitter<GateEvents> {
  private readonly entries = new Map<string, GateEntry>();

  register(unit: string): void {
    this.entries.set(unit, {
      state: "pending",
      exitCode: null,
      terminal: false,
      reason: null,
      started: false,
    });
  }

  record(
    unit: string,
    state: GateState,
    details: {
      exitCode?: number | null;
      terminal?: boolean;
      reason?: string | null;
    } = {},
  ): void {
    const previous = this.entry(unit);
    const entry: GateEntry = {
      state,
      exitCode:
        details.exitCode === undefined ? previous.exitCode : details.exitCode,
      terminal: state === "failed" ? details.terminal ?? false : false,
      reason: state === "failed" ? details.reason ?? null : null,
      started: previous.started || state === "running" || state === "completed",
    };
    this.entries.set(unit, entry);
    this.emit("transition", unit, { ...entry });
  }

  get(unit: string): GateEntry {
    return { ...this.entry(unit) };
  }

  check(unit: string, condition: CompletionCondition): GateVerdict {
    const { state, terminal, started } = this.entry(unit);
    if (state === "completed") return "ready";
    if (condition === "started" && started) return "ready";
    if (state === "failed" && terminal) return "failed";
    return "pending";
  }

  /**
   * Wait until `unit` satisfies `condition`.
   * A `timeoutMs` of 0 waits without bound.
   */
  wait(
    unit: string,
    condition: CompletionCondition,
    timeoutMs = 0,
    signal?: AbortSignal,
  ): Promise<GateResult> {
    const immediate = this.verdictResult(unit, condition);
    if (immediate) return Promise.resolve(immediate);
    if (signal?.aborted) return Promise.resolve({ status: "aborted" });

    const startedAt = Date.now();
    return new Promise<GateResult>((resolve) => {
      let timer: ReturnType<typeof setTimeout> | null = null;

      const finish = (result: GateResult): void => {
        if (timer) clearTimeout(timer);
        this.off("transition", onTransition);
        signal?.removeEventListener("abort", onAbort);
        resolve(result);
      };

      const onTransition = (name: string): void => {
        if (name !== unit) return;
        const result = this.verdictResult(unit, condition);
        if (result) finish(result);
      };

      const onAbort = (): void => finish({ status: "aborted" });

      this.on("transition", onTransition);
      signal?.addEventListener("abort", onAbort, { once: true });
      if (timeoutMs > 0) {
        timer = setTimeout(
          () =>
            finish({ status: "timed-out", waitedMs: Date.now() - startedAt }),
          timeoutMs,
        );
      }
    });
  }

  private verdictResult(
    unit: string,
    condition: CompletionCondition,
  ): GateResult | null {
    const verdict = this.check(unit, condition);
    if (verdict === "ready") return { status: "ready" };
    if (verdict === "failed") {
      return {
        status: "failed",
        reason: this.entry(unit).reason ?? `${unit} failed`,
      };
    }
    return null;
  }

  private entry(unit: string): GateEntry {
    const entry = this.entries.get(unit);
    if (!entry) {
      throw new Error(`Unknown unit: ${unit}`);
    }
    return entry;
  }
}
