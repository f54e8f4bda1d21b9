import type {
  ArtifactValue,
  EnvironmentRecord,
  WriteResult,
} from "@stackgate/core";
import { ENV_KEY_PATTERN, errorMessage } from "@stackgate/core";
import { createLogger } from "@stackgate/logger";
import type { ArtifactStore } from "./types.js";

const log = createLogger("artifacts:env-file");

function isQuoted(text: string): boolean {
  return (
    text.length >= 2 &&
    (text[0] === '"' || text[0] === "'") &&
    text.endsWith(text[0])
  );
}

/**
 * `null` renders as the literal text `null`. A value that is itself
 * wrapped in matching quotes gets one more pair, which `parseEnvFile`
 * strips again.
 */
export function formatEnvValue(value: ArtifactValue): string {
  const text = value === null ? "null" : String(value);
  return isQuoted(text) ? `"${text}"` : text;
}

export function renderEnvFile(record: EnvironmentRecord): string {
  return record
    .map(({ key, value }) => `${key}=${formatEnvValue(value)}\n`)
    .join("");
}

/**
 * Check a record before it is written.
 * Returns an error message, or null when the record is valid.
 */
export function validateEnvironmentRecord(
  record: EnvironmentRecord,
): string | null {
  const seen = new Set<string>();
  for (const { key, value } of record) {
    if (!ENV_KEY_PATTERN.test(key)) {
      return `Invalid environment key: ${JSON.stringify(key)}`;
    }
    if (seen.has(key)) {
      return `Duplicate environment key: ${key}`;
    }
    seen.add(key);
    if (/[\r\n]/.test(formatEnvValue(value))) {
      return `Value for ${key} contains a line break`;
    }
  }
  return null;
}

/**
 * Parse `KEY=VALUE` lines.
 *
 * Blank lines and `#` comments are skipped, an `export ` prefix is
 * tolerated and one pair of surrounding quotes is stripped. Values are
 * otherwise kept verbatim. When a key repeats, the last one wins.
 */
export function parseEnvFile(text: string): Record<string, string> {
  const env: Record<string, string> = {};
  for (const rawLine of text.split("\n")) {
    const line = rawLine.replace(/\r$/, "");
    const trimmed = line.trim();
    if (trimmed === "" || trimmed.startsWith("#")) continue;

    const body = trimmed.startsWith("export ")
      ? line.trimStart().slice("export ".length)
      : line.trimStart();
    const eq = body.indexOf("=");
    if (eq <= 0) continue;

    const key = body.slice(0, eq).trim();
    if (!ENV_KEY_PATTERN.test(key)) continue;

    let value = body.slice(eq + 1);
    if (isQuoted(value)) {
      value = value.slice(1, -1);
    }
    env[key] = value;
  }
  return env;
}

/**
 * Writes environment records into an artifact store.
 *
 * Each write replaces the destination in full; keys from an earlier
 * write never survive into the next one.
 */
export class EnvironmentFileWriter {
  constructor(private readonly store: ArtifactStore) {}

  async write(path: string, record: EnvironmentRecord): Promise<WriteResult> {
    const invalid = validateEnvironmentRecord(record);
    if (invalid) {
      log.error(`Refusing to write ${path}: ${invalid}`);
      return { ok: false, error: "invalid-record", path, message: invalid };
    }

    const content = renderEnvFile(record);
    try {
      await this.store.write(path, content);
    } catch (err) {
      const message = errorMessage(err);
      log.error(`Failed to write environment file ${path}: ${message}`);
      return { ok: false, error: "write-error", path, message };
    }

    // Values are never logged.
    const keys = record.map((e) => e.key).join(", ");
    log.info(`Wrote ${record.length} key(s) to ${path}: ${keys}`);
    return { ok: true, path, bytes: Buffer.byteLength(content) };
  }
}
