import { spawn } from "node:child_process";
import type { ChildProcess } from "node:child_process";
import type { UnitDefinition, UnitExit } from "@stackgate/core";
import { createLogger } from "@stackgate/logger";
import type { RunContext, UnitHandle, UnitRunner } from "./runner.js";
import { buildUnitEnv } from "./env.js";

const log = createLogger("orchestrator:process");

function forwardLines(data: Buffer, emit: (line: string) => void): void {
  for (const line of data.toString().trim().split("\n")) {
    if (line !== "") emit(line);
  }
}

class ProcessHandle implements UnitHandle {
  readonly pid: number | null;
  readonly exited: Promise<UnitExit>;
  private exitedFlag = false;

  constructor(
    private readonly name: string,
    private readonly child: ChildProcess,
  ) {
    this.pid = child.pid ?? null;
    this.exited = new Promise<UnitExit>((resolve) => {
      const settle = (exit: UnitExit): void => {
        if (this.exitedFlag) return;
        this.exitedFlag = true;
        resolve(exit);
      };
      child.once("exit", (code, signal) => {
        log.info(`${name} exited (code=${code}, signal=${signal})`);
        settle({ code, signal });
      });
      child.once("error", (err: Error) => {
        log.error(`${name} process error: ${err.message}`);
        settle({ code: null, signal: null, error: err.message });
      });
    });
  }

  async stop(graceMs: number): Promise<void> {
    if (this.exitedFlag) return;

    const pid = this.pid;
    const killTimeout = setTimeout(() => {
      log.warn(
        `${this.name} did not exit within ${graceMs}ms, sending SIGKILL to process group`,
      );
      this.signal(pid, "SIGKILL");
    }, graceMs);

    this.signal(pid, "SIGTERM");
    await this.exited;
    clearTimeout(killTimeout);
  }

  /** Signal the whole process group, children of the unit included. */
  private signal(pid: number | null, signal: NodeJS.Signals): void {
    if (pid) {
      try {
        process.kill(-pid, signal);
        return;
      } catch (err) {
        log.debug(
          `Group signal ${signal} to ${this.name} failed, signalling the process: ${err}`,
        );
      }
    }
    this.child.kill(signal);
  }
}

export interface ProcessRunnerOptions {
  /** Environment every unit starts from. Default: process.env */
  baseEnv?: NodeJS.ProcessEnv;
}

/** Runs `process` units as child processes in their own process group. */
export class ProcessRunner implements UnitRunner {
  constructor(private readonly options: ProcessRunnerOptions = {}) {}

  async launch(unit: UnitDefinition, context: RunContext): Promise<UnitHandle> {
    const run = unit.run;
    if (run.type !== "process") {
      throw new Error(`ProcessRunner cannot run ${run.type} unit ${unit.name}`);
    }

    const env = await buildUnitEnv(run, context.store, this.options.baseEnv);
    const child = spawn(run.command, run.args, {
      env,
      cwd: run.cwd,
      stdio: ["ignore", "pipe", "pipe"],
      detached: true,
    });

    if (child.pid == null) {
      return new Promise<UnitHandle>((_, reject) => {
        child.once("error", (err: Error) => reject(err));
      });
    }

    log.info(
      `${unit.name} started with PID ${child.pid} (attempt ${context.attempt})`,
    );

    const unitLog = createLogger(`unit:${unit.name}`);
    child.stdout?.on("data", (data: Buffer) =>
      forwardLines(data, (line) => unitLog.info(`[${unit.name} stdout] ${line}`)),
    );
    child.stderr?.on("data", (data: Buffer) =>
      forwardLines(data, (line) => unitLog.warn(`[${unit.name} stderr] ${line}`)),
    );

    return new ProcessHandle(unit.name, child);
  }
}
