import type { ProcessRunSpec } from "@stackgate/core";
import { parseEnvFile, type ArtifactStore } from "@stackgate/artifacts";
import { createLogger } from "@stackgate/logger";

const log = createLogger("orchestrator:env");

/**
 * Build the environment for a process unit.
 *
 * Precedence, lowest first: the base environment, each env file in
 * declaration order, then the unit's explicit `env`. Env files that do
 * not exist yet are skipped with a warning.
 */
export async function buildUnitEnv(
  run: ProcessRunSpec,
  store: ArtifactStore,
  baseEnv: NodeJS.ProcessEnv = process.env,
): Promise<Record<string, string>> {
  const merged: Record<string, string> = {};

  for (const [k, v] of Object.entries(baseEnv)) {
    if (v !== undefined) {
      merged[k] = v;
    }
  }

  for (const envFile of run.envFiles) {
    const text = await store.read(envFile);
    if (text === null) {
      log.warn(`Env file ${envFile} not found in ${store.location}, skipping`);
      continue;
    }
    const values = parseEnvFile(text);
    Object.assign(merged, values);
    log.debug(`Loaded ${Object.keys(values).length} variable(s) from ${envFile}`);
  }

  Object.assign(merged, run.env);
  return merged;
}
