import { z } from "zod";
import { StackgateError } from "@stackgate/core";

const configSchema = z.object({
  /** Overrides the store directory named in the topology file. */
  STACKGATE_STORE_DIR: z.string().min(1).optional(),
  STACKGATE_GATE_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(0),
  STACKGATE_STOP_GRACE_MS: z.coerce.number().int().nonnegative().default(5000),
  STACKGATE_INITIAL_BACKOFF_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(1000),
  STACKGATE_MAX_BACKOFF_MS: z.coerce.number().int().positive().default(30_000),
});

export type CliConfig = z.infer<typeof configSchema>;

export function loadCliConfig(env: NodeJS.ProcessEnv = process.env): CliConfig {
  const result = configSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`,
    );
    throw new StackgateError(
      "INVALID_CONFIG",
      `Invalid configuration: ${issues.join("; ")}`,
      { issues },
    );
  }
  return result.data;
}
