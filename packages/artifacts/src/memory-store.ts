import { createLogger } from "@stackgate/logger";
import type { ArtifactStore } from "./types.js";
import { isUnderPrefix, normalizeArtifactPath } from "./paths.js";

const log = createLogger("artifacts:memory");

/**
 * In-memory implementation of ArtifactStore.
 *
 * Useful for unit tests. Artifacts are lost when the process exits.
 */
export class MemoryArtifactStore implements ArtifactStore {
  readonly location = "memory";
  private readonly files = new Map<string, string>();

  async read(path: string): Promise<string | null> {
    const key = normalizeArtifactPath(path);
    const content = this.files.get(key) ?? null;
    log.debug(`read artifact: path=${key} found=${content !== null}`);
    return content;
  }

  async write(path: string, content: string): Promise<void> {
    const key = normalizeArtifactPath(path);
    this.files.set(key, content);
    log.debug(`write artifact: path=${key} bytes=${content.length}`);
  }

  async exists(path: string): Promise<boolean> {
    return this.files.has(normalizeArtifactPath(path));
  }

  async remove(path: string): Promise<boolean> {
    return this.files.delete(normalizeArtifactPath(path));
  }

  async list(prefix?: string): Promise<string[]> {
    const keys = [...this.files.keys()].sort();
    if (prefix === undefined) return keys;
    const base = normalizeArtifactPath(prefix);
    return keys.filter((key) => isUnderPrefix(key, base));
  }
}
