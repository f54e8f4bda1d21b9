import type { ArtifactValue, ReadResult } from "@stackgate/core";
import { errorMessage } from "@stackgate/core";
import { createLogger } from "@stackgate/logger";
import type { ArtifactStore } from "./types.js";
import { parseFieldPath, selectField, type FieldStep } from "./field-path.js";

const log = createLogger("artifacts:reader");

/**
 * Reads JSON artifacts from a store and extracts fields by path.
 *
 * An absent artifact is `not-found`, not an exception: the caller decides
 * whether to substitute null. A present but unparsable artifact is
 * `parse-failure`.
 */
export class StructuredArtifactReader {
  constructor(private readonly store: ArtifactStore) {}

  async readDocument(path: string): Promise<ReadResult<unknown>> {
    let text: string | null;
    try {
      text = await this.store.read(path);
    } catch (err) {
      log.warn(`Failed to read artifact ${path}: ${errorMessage(err)}`);
      return {
        ok: false,
        error: "parse-failure",
        path,
        message: `Unreadable artifact: ${errorMessage(err)}`,
      };
    }

    if (text === null) {
      log.debug(`Artifact not found: ${path}`);
      return {
        ok: false,
        error: "not-found",
        path,
        message: `Artifact not found: ${path}`,
      };
    }

    try {
      const document: unknown = JSON.parse(text);
      return { ok: true, value: document };
    } catch (err) {
      log.warn(`Malformed artifact ${path}: ${errorMessage(err)}`);
      return {
        ok: false,
        error: "parse-failure",
        path,
        message: `Malformed JSON in ${path}: ${errorMessage(err)}`,
      };
    }
  }

  /** Read one field. A missing intermediate key yields a null value. */
  async read(
    path: string,
    fieldPath: string | readonly FieldStep[],
  ): Promise<ReadResult<ArtifactValue>> {
    const steps =
      typeof fieldPath === "string" ? parseFieldPath(fieldPath) : fieldPath;
    const document = await this.readDocument(path);
    if (!document.ok) {
      return document;
    }
    return { ok: true, value: selectField(document.value, steps) };
  }
}
