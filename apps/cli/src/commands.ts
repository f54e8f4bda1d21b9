import type { Topology, UnitStatus } from "@stackgate/core";
import { errorMessage, isStackgateError } from "@stackgate/core";
import {
  FileArtifactStore,
  createDeploymentsPlan,
  runExtraction,
  DEFAULT_NETWORK,
} from "@stackgate/artifacts";
import {
  Orchestrator,
  UnitGraph,
  loadTopologyFile,
} from "@stackgate/orchestrator";
import type { OrchestratorOptions } from "@stackgate/orchestrator";
import { createLogger } from "@stackgate/logger";
import type { CliConfig } from "./config.js";

const log = createLogger("cli");

/** Line-oriented output for command results. */
export type Print = (line: string) => void;

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;

function describeTopology(
  topology: Topology,
  graph: UnitGraph,
  storeDir: string,
): string[] {
  const lines = [`${topology.name}: ${graph.size} unit(s), store ${storeDir}`];
  graph.order.forEach((index, position) => {
    const unit = graph.units[index];
    const deps =
      unit.dependsOn.length > 0 ? ` <- ${unit.dependsOn.join(", ")}` : "";
    const traits = `${unit.kind}, ${unit.condition}, restart ${unit.restart}`;
    lines.push(`${position + 1}. ${unit.name} [${traits}]${deps}`);
  });
  return lines;
}

function describeStatus(status: UnitStatus): string {
  const exit =
    status.lastExitCode === null ? "" : ` exit=${status.lastExitCode}`;
  const error = status.lastError ? ` (${status.lastError})` : "";
  return `${status.name}: ${status.state}${exit}${error}`;
}

/** Validate a topology and print its start order. */
export async function checkCommand(
  topologyPath: string,
  config: CliConfig,
  print: Print,
): Promise<number> {
  try {
    const { topology, storeDir } = await loadTopologyFile(topologyPath, {
      storeDir: config.STACKGATE_STORE_DIR,
    });
    const graph = UnitGraph.build(topology.units);
    for (const line of describeTopology(topology, graph, storeDir)) print(line);
    return EXIT_OK;
  } catch (err) {
    if (!isStackgateError(err)) throw err;
    log.error(`${err.code}: ${err.message}`);
    return EXIT_FAILURE;
  }
}

export interface UpOptions {
  /** Return once every unit has settled instead of running until aborted. */
  exitWhenSettled: boolean;
  /** Aborted on SIGINT/SIGTERM. */
  signal: AbortSignal;
  runners?: OrchestratorOptions["runners"];
}

function untilAborted(signal: AbortSignal): Promise<void> {
  if (signal.aborted) return Promise.resolve();
  return new Promise<void>((resolve) => {
    signal.addEventListener("abort", () => resolve(), { once: true });
  });
}

/**
 * Run a topology until aborted (or until settled with `exitWhenSettled`),
 * then stop it. Exits 1 when any unit ended in `failed`.
 */
export async function upCommand(
  topologyPath: string,
  config: CliConfig,
  options: UpOptions,
  print: Print,
): Promise<number> {
  let orchestrator: Orchestrator;
  try {
    const { topology, storeDir } = await loadTopologyFile(topologyPath, {
      storeDir: config.STACKGATE_STORE_DIR,
    });
    orchestrator = new Orchestrator(topology, {
      store: new FileArtifactStore(storeDir),
      runners: options.runners,
      gateTimeoutMs: config.STACKGATE_GATE_TIMEOUT_MS,
      stopGraceMs: config.STACKGATE_STOP_GRACE_MS,
      initialBackoffMs: config.STACKGATE_INITIAL_BACKOFF_MS,
      maxBackoffMs: config.STACKGATE_MAX_BACKOFF_MS,
    });
  } catch (err) {
    if (!isStackgateError(err)) throw err;
    log.error(`${err.code}: ${err.message}`);
    return EXIT_FAILURE;
  }

  orchestrator.on("unit-state", (name, state, previous) => {
    log.info(`${name}: ${previous} -> ${state}`);
  });
  orchestrator.on("restarting", (name, attempt, delayMs) => {
    log.warn(`${name} restarts in ${delayMs}ms (attempt ${attempt})`);
  });

  orchestrator.start();
  if (options.exitWhenSettled) {
    await Promise.race([
      orchestrator.whenSettled(),
      untilAborted(options.signal),
    ]);
  } else {
    await untilAborted(options.signal);
  }
  await orchestrator.stop();

  const statuses = orchestrator.getStatus();
  for (const status of statuses) print(describeStatus(status));
  return statuses.some((s) => s.state === "failed") ? EXIT_FAILURE : EXIT_OK;
}

export interface ExtractOptions {
  store: string;
  network?: string;
}

/** Run the deployments extraction once against a store directory. */
export async function extractCommand(
  options: ExtractOptions,
  print: Print,
): Promise<number> {
  const store = new FileArtifactStore(options.store);
  const plan = createDeploymentsPlan({
    network: options.network ?? DEFAULT_NETWORK,
  });
  try {
    const report = await runExtraction(store, plan);
    if (!report.ok) {
      log.error(`Extraction failed (${report.error}): ${report.message}`);
      return EXIT_FAILURE;
    }
    const keys = report.record.map((entry) => entry.key).join(", ");
    print(`Wrote ${report.output}: ${keys}`);
    if (report.missingArtifacts.length > 0) {
      print(`Missing: ${report.missingArtifacts.join(", ")}`);
    }
    return EXIT_OK;
  } catch (err) {
    log.error(`Extraction failed: ${errorMessage(err)}`);
    return EXIT_FAILURE;
  }
}
