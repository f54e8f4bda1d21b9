import { posix } from "node:path";

/**
 * Normalize a store-relative artifact path to forward slashes.
 * Throws for empty paths, absolute paths and paths escaping the root.
 */
export function normalizeArtifactPath(path: string): string {
  const trimmed = path.trim().replace(/\\/g, "/");
  if (trimmed === "") {
    throw new Error("Artifact path is empty");
  }
  if (posix.isAbsolute(trimmed) || /^[A-Za-z]:\//.test(trimmed)) {
    throw new Error(`Artifact path must be relative to the store: ${path}`);
  }
  const normalized = posix.normalize(trimmed);
  if (
    normalized === "." ||
    normalized === ".." ||
    normalized.startsWith("../")
  ) {
    throw new Error(`Artifact path escapes the store: ${path}`);
  }
  return normalized.replace(/\/+$/, "");
}

/** True if `path` equals `prefix` or lies beneath it. */
export function isUnderPrefix(path: string, prefix: string): boolean {
  return path === prefix || path.startsWith(prefix + "/");
}
