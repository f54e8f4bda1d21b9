import { z } from "zod";
import type {
  CompletionCondition,
  RestartPolicy,
  Topology,
  UnitDefinition,
  UnitKind,
} from "./unit.js";

export const ENV_KEY_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;
export const UNIT_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;

const processRunSchema = z.object({
  type: z.literal("process"),
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  env: z.record(z.string()).default({}),
  envFiles: z.array(z.string().min(1)).default([]),
  cwd: z.string().optional(),
});

const extractFieldSchema = z.object({
  key: z
    .string()
    .regex(ENV_KEY_PATTERN, "must be a valid environment variable name"),
  artifact: z.string().min(1),
  field: z.string(),
});

const extractRunSchema = z.object({
  type: z.literal("extract"),
  output: z.string().min(1),
  fields: z.array(extractFieldSchema).min(1),
  onMissingArtifact: z.enum(["null", "fail"]).default("null"),
});

export const unitSchema = z
  .object({
    name: z
      .string()
      .regex(UNIT_NAME_PATTERN, "must start with a letter or digit"),
    description: z.string().optional(),
    kind: z.enum(["service", "task"]),
    condition: z.enum(["started", "exited-zero"]).optional(),
    restart: z.enum(["never", "on-failure", "always"]).optional(),
    dependsOn: z.array(z.string()).default([]),
    run: z.discriminatedUnion("type", [processRunSchema, extractRunSchema]),
    gateTimeoutMs: z.number().int().nonnegative().optional(),
    maxRestarts: z.number().int().nonnegative().optional(),
    restartDelayMs: z.number().int().nonnegative().optional(),
  })
  .superRefine((unit, ctx) => {
    if (unit.run.type === "extract" && unit.kind !== "task") {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["kind"],
        message: "extract units must be of kind task",
      });
    }
    const keys = new Set<string>();
    if (unit.run.type === "extract") {
      for (const field of unit.run.fields) {
        if (keys.has(field.key)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["run", "fields"],
            message: `duplicate key ${field.key}`,
          });
        }
        keys.add(field.key);
      }
    }
  });

export const topologyFileSchema = z.object({
  name: z.string().min(1),
  /** Artifact store directory, relative to the topology file. */
  store: z.string().optional(),
  units: z.array(unitSchema).min(1),
});

export type UnitInput = z.infer<typeof unitSchema>;
export type TopologyFile = z.infer<typeof topologyFileSchema>;

const DEFAULT_CONDITION: Record<UnitKind, CompletionCondition> = {
  service: "started",
  task: "exited-zero",
};

const DEFAULT_RESTART: Record<UnitKind, RestartPolicy> = {
  service: "on-failure",
  task: "on-failure",
};

/** Apply kind-dependent defaults to a parsed unit. */
export function resolveUnit(input: UnitInput): UnitDefinition {
  return {
    name: input.name,
    description: input.description,
    kind: input.kind,
    condition: input.condition ?? DEFAULT_CONDITION[input.kind],
    restart: input.restart ?? DEFAULT_RESTART[input.kind],
    dependsOn: [...input.dependsOn],
    run: input.run,
    gateTimeoutMs: input.gateTimeoutMs,
    maxRestarts: input.maxRestarts,
    restartDelayMs: input.restartDelayMs,
  };
}

export function resolveTopology(file: TopologyFile): Topology {
  return {
    name: file.name,
    units: file.units.map(resolveUnit),
  };
}
