import { Logger } from "tslog";

export type LogFormat = "pretty" | "json" | "hidden";

/** tslog numeric levels, keyed by the names accepted in STACKGATE_LOG_LEVEL. */
export const LOG_LEVELS: Readonly<Record<string, number>> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

/**
 * Resolve the minimum level from the environment.
 * Unknown names fall back to info (debug in development).
 */
export function resolveMinLevel(env: NodeJS.ProcessEnv = process.env): number {
  const name = env.STACKGATE_LOG_LEVEL?.trim().toLowerCase();
  if (name && Object.hasOwn(LOG_LEVELS, name)) {
    return LOG_LEVELS[name];
  }
  return env.NODE_ENV === "development" ? LOG_LEVELS.debug : LOG_LEVELS.info;
}

export function resolveLogFormat(
  env: NodeJS.ProcessEnv = process.env,
): LogFormat {
  const format = env.STACKGATE_LOG_FORMAT?.trim().toLowerCase();
  if (format === "json" || format === "hidden") {
    return format;
  }
  return "pretty";
}

export function createLogger(name: string): Logger<unknown> {
  return new Logger({
    name,
    type: resolveLogFormat(),
    minLevel: resolveMinLevel(),
  });
}
