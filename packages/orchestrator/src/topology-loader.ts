import { readFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import type { Topology } from "@stackgate/core";
import {
  StackgateError,
  errorMessage,
  resolveTopology,
  topologyFileSchema,
} from "@stackgate/core";
import { parseFieldPath } from "@stackgate/artifacts";
import { createLogger } from "@stackgate/logger";

const log = createLogger("orchestrator:topology");

/** Store directory used when neither the file nor the caller names one. */
export const DEFAULT_STORE_DIR = ".stackgate";

export type TopologyVars = Readonly<Record<string, string | undefined>>;

const VAR_PATTERN = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/** Replace `${NAME}` references. Unknown names render as "". */
export function interpolate(text: string, vars: TopologyVars): string {
  return text.replace(VAR_PATTERN, (_match, name: string) => vars[name] ?? "");
}

function interpolateValue(value: unknown, vars: TopologyVars): unknown {
  if (typeof value === "string") return interpolate(value, vars);
  if (Array.isArray(value)) {
    return value.map((item) => interpolateValue(item, vars));
  }
  if (value !== null && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]) => [
        key,
        interpolateValue(item, vars),
      ]),
    );
  }
  return value;
}

/**
 * Validate a parsed topology document and apply unit defaults.
 * String values are interpolated from `vars` first.
 */
export function parseTopology(
  document: unknown,
  vars: TopologyVars = {},
): Topology {
  const result = topologyFileSchema.safeParse(interpolateValue(document, vars));
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${where}: ${issue.message}`;
    });
    throw invalidTopology(issues);
  }

  const issues: string[] = [];
  result.data.units.forEach((unit, index) => {
    if (unit.run.type !== "extract") return;
    unit.run.fields.forEach((field, fieldIndex) => {
      try {
        parseFieldPath(field.field);
      } catch (err) {
        issues.push(
          `units.${index}.run.fields.${fieldIndex}.field: ${errorMessage(err)}`,
        );
      }
    });
  });
  if (issues.length > 0) throw invalidTopology(issues);

  return resolveTopology(result.data);
}

function invalidTopology(issues: string[]): StackgateError {
  return new StackgateError(
    "INVALID_TOPOLOGY",
    `Invalid topology: ${issues.join("; ")}`,
    { issues },
  );
}

export interface LoadTopologyOptions {
  /** Overrides the store directory named in the file. */
  storeDir?: string;
  /** Variables available to `${VAR}`. Default: process.env */
  env?: NodeJS.ProcessEnv;
}

export interface LoadedTopology {
  topology: Topology;
  /** Absolute artifact store directory. */
  storeDir: string;
  path: string;
}

/**
 * Load a topology JSON file. Besides the environment, `${TOPOLOGY_DIR}`
 * (the file's directory) and `${STORE_DIR}` (the resolved store
 * directory) are available for interpolation.
 */
export async function loadTopologyFile(
  filePath: string,
  options: LoadTopologyOptions = {},
): Promise<LoadedTopology> {
  const path = resolve(filePath);
  const topologyDir = dirname(path);

  let document: unknown;
  try {
    document = JSON.parse(await readFile(path, "utf-8"));
  } catch (err) {
    throw new StackgateError(
      "INVALID_TOPOLOGY",
      `Cannot load topology ${path}: ${errorMessage(err)}`,
      { path },
    );
  }

  const baseVars: TopologyVars = {
    ...(options.env ?? process.env),
    TOPOLOGY_DIR: topologyDir,
  };
  const declaredStore = readStoreField(document);
  const storeDir = options.storeDir
    ? resolve(options.storeDir)
    : resolve(
        topologyDir,
        interpolate(declaredStore ?? DEFAULT_STORE_DIR, baseVars),
      );

  const topology = parseTopology(document, {
    ...baseVars,
    STORE_DIR: storeDir,
  });
  log.debug(
    `Loaded topology ${topology.name} (${topology.units.length} units) from ${path}`,
  );
  return { topology, storeDir, path };
}

function readStoreField(document: unknown): string | null {
  if (
    document === null ||
    typeof document !== "object" ||
    !("store" in document)
  ) {
    return null;
  }
  return typeof document.store === "string" ? document.store : null;
}
