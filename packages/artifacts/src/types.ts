/**
 * Shared location holding files written by one unit and read by others.
 *
 * Writes replace the whole artifact; readers never observe a partially
 * written file. Paths are relative to the store root.
 */
export interface ArtifactStore {
  /** Human-readable root (directory path, or "memory"). */
  readonly location: string;

  /** Read an artifact. Returns null if it does not exist. */
  read(path: string): Promise<string | null>;

  /** Create or fully replace an artifact. */
  write(path: string, content: string): Promise<void>;

  exists(path: string): Promise<boolean>;

  /** Delete an artifact. Returns true if it existed. */
  remove(path: string): Promise<boolean>;

  /** List artifact paths, optionally restricted to a directory prefix. */
  list(prefix?: string): Promise<string[]>;
}
