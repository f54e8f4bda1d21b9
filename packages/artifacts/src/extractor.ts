import type {
  EnvironmentRecord,
  ExtractRunSpec,
  ReadErrorCode,
  WriteErrorCode,
} from "@stackgate/core";
import { errorMessage } from "@stackgate/core";
import { createLogger } from "@stackgate/logger";
import type { ArtifactStore } from "./types.js";
import { StructuredArtifactReader } from "./reader.js";
import { EnvironmentFileWriter } from "./env-file.js";
import { parseFieldPath, selectField, type FieldStep } from "./field-path.js";

const log = createLogger("artifacts:extractor");

export type ExtractionPlan = Omit<ExtractRunSpec, "type">;

export type ExtractionErrorCode =
  | ReadErrorCode
  | WriteErrorCode
  | "invalid-plan";

export type ExtractionReport =
  | {
      ok: true;
      output: string;
      record: EnvironmentRecord;
      /** Artifacts that were absent; their fields were written as null. */
      missingArtifacts: string[];
    }
  | {
      ok: false;
      output: string;
      error: ExtractionErrorCode;
      message: string;
      missingArtifacts: string[];
    };

/**
 * Read every field of `plan` from its structured artifact and write the
 * result as one environment file.
 *
 * Each artifact is parsed once. An absent artifact contributes null
 * values unless `onMissingArtifact` is "fail"; a malformed artifact or a
 * failed write aborts the extraction without touching the output.
 */
export async function runExtraction(
  store: ArtifactStore,
  plan: ExtractionPlan,
): Promise<ExtractionReport> {
  const missingArtifacts: string[] = [];
  const fail = (
    error: ExtractionErrorCode,
    message: string,
  ): ExtractionReport => ({
    ok: false,
    output: plan.output,
    error,
    message,
    missingArtifacts,
  });

  let steps: FieldStep[][];
  try {
    steps = plan.fields.map((field) => parseFieldPath(field.field));
  } catch (err) {
    return fail("invalid-plan", errorMessage(err));
  }

  const reader = new StructuredArtifactReader(store);
  const documents = new Map<string, unknown>();

  for (const artifact of new Set(plan.fields.map((f) => f.artifact))) {
    const result = await reader.readDocument(artifact);
    if (result.ok) {
      documents.set(artifact, result.value);
      continue;
    }
    if (result.error === "not-found" && plan.onMissingArtifact === "null") {
      log.warn(`Artifact ${artifact} not found, its fields will be null`);
      missingArtifacts.push(artifact);
      continue;
    }
    return fail(result.error, result.message);
  }

  const record: EnvironmentRecord = plan.fields.map((field, i) => ({
    key: field.key,
    value: documents.has(field.artifact)
      ? selectField(documents.get(field.artifact), steps[i])
      : null,
  }));

  const nullKeys = record.filter((e) => e.value === null).map((e) => e.key);
  if (nullKeys.length > 0) {
    log.warn(`Null values for: ${nullKeys.join(", ")}`);
  }

  const writer = new EnvironmentFileWriter(store);
  const written = await writer.write(plan.output, record);
  if (!written.ok) {
    return fail(written.error, written.message);
  }

  return { ok: true, output: plan.output, record, missingArtifacts };
}
