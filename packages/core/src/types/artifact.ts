/** A scalar selected from a structured artifact. Absent fields are `null`. */
export type ArtifactValue = string | number | boolean | null;

export interface EnvironmentEntry {
  key: string;
  value: ArtifactValue;
}

/** Ordered key/value pairs; keys are unique within one record. */
export type EnvironmentRecord = EnvironmentEntry[];

export type ReadErrorCode = "not-found" | "parse-failure";

export type ReadResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: ReadErrorCode; path: string; message: string };

export type WriteErrorCode = "write-error" | "invalid-record";

export type WriteResult =
  | { ok: true; path: string; bytes: number }
  | { ok: false; error: WriteErrorCode; path: string; message: string };
