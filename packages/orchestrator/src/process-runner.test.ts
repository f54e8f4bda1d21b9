import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { EventEmitter } from "node:events";
import type { ProcessRunSpec, UnitDefinition } from "@stackgate/core";
import { MemoryArtifactStore } from "@stackgate/artifacts";
import { ProcessRunner } from "./process-runner.js";
import { buildUnitEnv } from "./env.js";

// ─── Mock child_process ────────────────────────────────────────────────────

class MockChildProcess extends EventEmitter {
  pid: number | undefined = 12345;
  stdout = new EventEmitter();
  stderr = new EventEmitter();
  killSignals: string[] = [];

  kill(signal?: string): boolean {
    this.killSignals.push(signal ?? "SIGTERM");
    return true;
  }
}

let mockChild: MockChildProcess;
let nextPid: number | undefined = 12345;

vi.mock("node:child_process", () => ({
  spawn: vi.fn(() => {
    mockChild = new MockChildProcess();
    mockChild.pid = nextPid;
    return mockChild;
  }),
}));

function processUnit(overrides: Partial<ProcessRunSpec> = {}): UnitDefinition {
  return {
    name: "kakarot-rpc",
    kind: "service",
    condition: "started",
    restart: "on-failure",
    dependsOn: [],
    run: {
      command: "docker",
      args: ["run", "--rm", "kakarot-rpc"],
      env: { STARKNET_NETWORK: "http://starknet:5050" },
      envFiles: [],
      ...overrides,
      type: "process",
    },
  };
}

describe("buildUnitEnv", () => {
  it("layers base env, env files and unit env in that order", async () => {
    const store = new MemoryArtifactStore();
    await store.write(".env", "KAKAROT_ADDRESS=0xABC\nSTARKNET_NETWORK=from-file\nSHARED=file\n");

    const env = await buildUnitEnv(
      {
        type: "process",
        command: "x",
        args: [],
        env: { STARKNET_NETWORK: "http://starknet:5050" },
        envFiles: [".env"],
      },
      store,
      { SHARED: "base", HOME: "/home/test", UNSET: undefined },
    );

    expect(env).toEqual({
      HOME: "/home/test",
      SHARED: "file",
      KAKAROT_ADDRESS: "0xABC",
      STARKNET_NETWORK: "http://starknet:5050",
    });
  });

  it("skips env files that do not exist yet", async () => {
    const env = await buildUnitEnv(
      { type: "process", command: "x", args: [], env: {}, envFiles: ["missing.env"] },
      new MemoryArtifactStore(),
      { A: "1" },
    );
    expect(env).toEqual({ A: "1" });
  });
});

describe("ProcessRunner", () => {
  const store = new MemoryArtifactStore();
  const context = { store, attempt: 1 };

  beforeEach(() => {
    nextPid = 12345;
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
    vi.clearAllMocks();
  });

  it("spawns the command detached with the merged environment", async () => {
    const { spawn } = await import("node:child_process");
    await store.write("deployments/.env", "KAKAROT_ADDRESS=0x1\n");
    const runner = new ProcessRunner({ baseEnv: { PATH: "/usr/bin" } });

    const handle = await runner.launch(processUnit({ envFiles: ["deployments/.env"], cwd: "/srv" }), context);

    expect(handle.pid).toBe(12345);
    expect(spawn).toHaveBeenCalledWith(
      "docker",
      ["run", "--rm", "kakarot-rpc"],
      expect.objectContaining({
        cwd: "/srv",
        detached: true,
        stdio: ["ignore", "pipe", "pipe"],
        env: {
          PATH: "/usr/bin",
          KAKAROT_ADDRESS: "0x1",
          STARKNET_NETWORK: "http://starknet:5050",
        },
      }),
    );
  });

  it("reports the exit code and signal", async () => {
    const handle = await new ProcessRunner({ baseEnv: {} }).launch(processUnit(), context);
    mockChild.emit("exit", 3, null);
    await expect(handle.exited).resolves.toEqual({ code: 3, signal: null });
  });

  it("reports a process error as an exit without a code", async () => {
    const handle = await new ProcessRunner({ baseEnv: {} }).launch(processUnit(), context);
    mockChild.emit("error", new Error("EPIPE"));
    mockChild.emit("exit", 1, null);
    await expect(handle.exited).resolves.toEqual({ code: null, signal: null, error: "EPIPE" });
  });

  it("rejects when the command cannot be spawned", async () => {
    const { spawn } = await import("node:child_process");
    nextPid = undefined;
    const launched = new ProcessRunner({ baseEnv: {} }).launch(processUnit(), context);
    await vi.waitFor(() => expect(spawn).toHaveBeenCalledTimes(1));
    mockChild.emit("error", new Error("spawn docker ENOENT"));
    await expect(launched).rejects.toThrow("spawn docker ENOENT");
  });

  it("refuses units of another run type", async () => {
    const unit: UnitDefinition = {
      ...processUnit(),
      run: { type: "extract", output: ".env", fields: [], onMissingArtifact: "null" },
    };
    await expect(new ProcessRunner().launch(unit, context)).rejects.toThrow(
      "ProcessRunner cannot run extract unit kakarot-rpc",
    );
  });

  describe("stop()", () => {
    it("sends SIGTERM to the process group and waits for exit", async () => {
      const kill = vi.spyOn(process, "kill").mockImplementation(() => true);
      const handle = await new ProcessRunner({ baseEnv: {} }).launch(processUnit(), context);

      const stopped = handle.stop(1000);
      expect(kill).toHaveBeenCalledWith(-12345, "SIGTERM");
      mockChild.emit("exit", null, "SIGTERM");
      await stopped;

      await expect(handle.exited).resolves.toEqual({ code: null, signal: "SIGTERM" });
    });

    it("escalates to SIGKILL after the grace period", async () => {
      vi.useFakeTimers();
      const kill = vi.spyOn(process, "kill").mockImplementation(() => true);
      const handle = await new ProcessRunner({ baseEnv: {} }).launch(processUnit(), context);

      const stopped = handle.stop(1000);
      vi.advanceTimersByTime(999);
      expect(kill).not.toHaveBeenCalledWith(-12345, "SIGKILL");
      vi.advanceTimersByTime(1);
      expect(kill).toHaveBeenCalledWith(-12345, "SIGKILL");

      mockChild.emit("exit", null, "SIGKILL");
      await stopped;
    });

    it("falls back to signalling the child when the group is gone", async () => {
      vi.spyOn(process, "kill").mockImplementation(() => {
        throw new Error("ESRCH");
      });
      const handle = await new ProcessRunner({ baseEnv: {} }).launch(processUnit(), context);

      const stopped = handle.stop(1000);
      expect(mockChild.killSignals).toEqual(["SIGTERM"]);
      mockChild.emit("exit", null, "SIGTERM");
      await stopped;
    });

    it("returns at once when the process already exited", async () => {
      const kill = vi.spyOn(process, "kill").mockImplementation(() => true);
      const handle = await new ProcessRunner({ baseEnv: {} }).launch(processUnit(), context);
      mockChild.emit("exit", 0, null);
      await handle.exited;

      await handle.stop(1000);
      expect(kill).not.toHaveBeenCalled();
    });
  });
});
