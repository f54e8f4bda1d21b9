import type { ArtifactValue } from "@stackgate/core";

/** Object key (string) or array index (number). */
export type FieldStep = string | number;

/**
 * Parse a dotted field path into steps.
 *
 *   ".kakarot.address"     -> ["kakarot", "address"]
 *   "accounts[0].address"  -> ["accounts", 0, "address"]
 *   '["odd.key"]'          -> ["odd.key"]
 *   "" or "."              -> [] (the whole document)
 *
 * Throws on unbalanced brackets or non-numeric, unquoted bracket contents.
 */
export function parseFieldPath(path: string): FieldStep[] {
  const text = path.trim();
  const steps: FieldStep[] = [];
  let segment = "";

  const flush = (): void => {
    if (segment !== "") {
      steps.push(segment);
      segment = "";
    }
  };

  let i = 0;
  while (i < text.length) {
    const ch = text[i];
    if (ch === ".") {
      flush();
      i++;
    } else if (ch === "[") {
      flush();
      const end = text.indexOf("]", i);
      if (end === -1) {
        throw new Error(`Unclosed bracket in field path: ${path}`);
      }
      const inner = text.slice(i + 1, end).trim();
      if (/^\d+$/.test(inner)) {
        steps.push(Number(inner));
      } else if (/^"[^"]*"$/.test(inner) || /^'[^']*'$/.test(inner)) {
        steps.push(inner.slice(1, -1));
      } else {
        throw new Error(`Invalid bracket step "${inner}" in field path: ${path}`);
      }
      i = end + 1;
    } else if (ch === "]") {
      throw new Error(`Unexpected "]" in field path: ${path}`);
    } else {
      segment += ch;
      i++;
    }
  }
  flush();
  return steps;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Objects and arrays come back as compact JSON text, like `jq -r`. */
export function toArtifactValue(value: unknown): ArtifactValue {
  if (value === undefined || value === null) return null;
  if (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return value;
  }
  return JSON.stringify(value);
}

/**
 * Navigate `steps` through a parsed document.
 * Any step that cannot be taken (missing key, out-of-range index,
 * indexing into a scalar) yields null.
 */
export function selectField(
  document: unknown,
  steps: readonly FieldStep[],
): ArtifactValue {
  let current: unknown = document;
  for (const step of steps) {
    if (Array.isArray(current)) {
      const index =
        typeof step === "number"
          ? step
          : /^\d+$/.test(step)
            ? Number(step)
            : -1;
      if (index < 0 || index >= current.length) return null;
      current = current[index];
    } else if (isRecord(current)) {
      const key = String(step);
      if (!Object.hasOwn(current, key)) return null;
      current = current[key];
    } else {
      return null;
    }
  }
  return toArtifactValue(current);
}
