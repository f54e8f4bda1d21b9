import {
  mkdir,
  readFile,
  readdir,
  rename,
  rm,
  stat,
  unlink,
  writeFile,
} from "node:fs/promises";
import { dirname, join, relative, resolve, sep } from "node:path";
import { randomBytes } from "node:crypto";
import { createLogger } from "@stackgate/logger";
import type { ArtifactStore } from "./types.js";
import { isUnderPrefix, normalizeArtifactPath } from "./paths.js";

const log = createLogger("artifacts:file");

/** Marker in the names of in-flight temporary files. Never listed. */
const TMP_MARKER = ".tmp.";
/** Suffix of the in-flight files written by `write`. */
const TMP_SUFFIX = /\.tmp\.[0-9a-f]{8}$/;

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

function isMissing(err: unknown): boolean {
  return (
    isErrnoException(err) && (err.code === "ENOENT" || err.code === "ENOTDIR")
  );
}

/**
 * Directory-backed artifact store (the shared volume).
 *
 * Writes go to `<file>.tmp.<random>` in the destination directory and are
 * renamed over the destination, so a reader sees either the previous
 * content or the new content in full.
 */
export class FileArtifactStore implements ArtifactStore {
  readonly location: string;

  constructor(rootDir: string) {
    this.location = resolve(rootDir);
  }

  private filePath(path: string): string {
    return join(this.location, ...normalizeArtifactPath(path).split("/"));
  }

  async read(path: string): Promise<string | null> {
    const fp = this.filePath(path);
    try {
      const content = await readFile(fp, "utf8");
      log.debug(`read artifact: path=${path} found=true`);
      return content;
    } catch (err) {
      if (isMissing(err)) {
        log.debug(`read artifact: path=${path} found=false`);
        return null;
      }
      throw err;
    }
  }

  async write(path: string, content: string): Promise<void> {
    const fp = this.filePath(path);
    const tmp = `${fp}${TMP_MARKER}${randomBytes(4).toString("hex")}`;
    await mkdir(dirname(fp), { recursive: true });
    try {
      await writeFile(tmp, content, "utf8");
      await rename(tmp, fp);
    } catch (err) {
      await rm(tmp, { force: true });
      throw err;
    }
    log.debug(
      `write artifact: path=${path} bytes=${Buffer.byteLength(content)}`,
    );
  }

  async exists(path: string): Promise<boolean> {
    try {
      const info = await stat(this.filePath(path));
      return info.isFile();
    } catch (err) {
      if (isMissing(err)) return false;
      throw err;
    }
  }

  async remove(path: string): Promise<boolean> {
    try {
      await unlink(this.filePath(path));
      return true;
    } catch (err) {
      if (isMissing(err)) return false;
      throw err;
    }
  }

  async list(prefix?: string): Promise<string[]> {
    const files = await this.walk(this.location);
    const paths = files
      .map((fp) => relative(this.location, fp).split(sep).join("/"))
      .filter((p) => !TMP_SUFFIX.test(p))
      .sort();
    if (prefix === undefined) return paths;
    const base = normalizeArtifactPath(prefix);
    return paths.filter((p) => isUnderPrefix(p, base));
  }

  private async walk(dir: string): Promise<string[]> {
    const entries = await readdir(dir, { withFileTypes: true }).catch(
      (err: unknown) => {
        if (isMissing(err)) return [];
        throw err;
      },
    );
    const files: string[] = [];
    for (const entry of entries) {
      const fp = join(dir, entry.name);
      if (entry.isDirectory()) {
        files.push(...(await this.walk(fp)));
      } else if (entry.isFile()) {
        files.push(fp);
      }
    }
    return files;
  }
}
