import { z } from "zod";
import type { WorkerRole } from "../planner/types.js";

export const ArtifactSchema = z.object({
  path: z.string().min(1),
  action: z.enum(["create", "modify", "delete"]),
  content: z.string().optional(),
  summary: z.string().optional(),
});

export type Artifact = z.infer<typeof ArtifactSchema>;

const common = {
  summary: z.string().optional(),
  artifacts: z.array(ArtifactSchema).optional(),
};

/**
 * Output contract per role. Extra keys pass through untouched; only the
 * fields the orchestrator reads are checked.
 */
export const ROLE_OUTPUT_SCHEMAS = {
  researcher: z.object({ ...common, findings: z.array(z.string()).optional() }).passthrough(),
  coder: z.object({ ...common, files: z.array(z.string()).optional() }).passthrough(),
  tester: z
    .object({
      ...common,
      passed: z.number().int().nonnegative().optional(),
      failed: z.number().int().nonnegative().optional(),
    })
    .passthrough(),
  writer: z.object({ ...common, documents: z.array(z.string()).optional() }).passthrough(),
  reviewer: z
    .object({
      ...common,
      approved: z.boolean().optional(),
      comments: z.array(z.string()).optional(),
    })
    .passthrough(),
} satisfies Record<WorkerRole, z.ZodTypeAny>;

export type RoleOutput<R extends WorkerRole> = z.infer<(typeof ROLE_OUTPUT_SCHEMAS)[R]>;

export function outputSchemaFor(role: WorkerRole): z.ZodTypeAny {
  return ROLE_OUTPUT_SCHEMAS[role];
}
