import { readFileSync } from "node:fs";
import { z, type ZodIssue } from "zod";

/** Name the simulator gives the world pseudo-instance. */
export const WORLD_MODEL_INSTANCE_NAME = "WorldModelInstance";
/** Name of the single body in the world pseudo-instance. */
export const WORLD_BODY_NAME = "world";

/** Velocity DOFs of a body attached to the world by a floating joint. */
export const FLOATING_BODY_VELOCITIES = 6;

const BodyDescriptionSchema = z
  .object({
    name: z.string().min(1),
    /** Orientation parameterization when the body floats freely. */
    freeBase: z.enum(["quaternion", "roll-pitch-yaw"]).optional(),
  })
  .strict();

const ModelInstanceDescriptionSchema = z
  .object({
    name: z.string().min(1),
    /** Bodies in the simulator's intrinsic order. */
    bodies: z.array(BodyDescriptionSchema),
    numVelocities: z.number().int().min(0),
  })
  .strict()
  .superRefine((instance, ctx) => {
    const floating = instance.bodies.filter((b) => b.freeBase !== undefined).length;
    if (instance.numVelocities < floating * FLOATING_BODY_VELOCITIES) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["numVelocities"],
        message: `${floating} free body(ies) need at least ${floating * FLOATING_BODY_VELOCITIES} velocities`,
      });
    }
  });

/**
 * Plain, JSON-compatible description of a multibody topology. The first
 * model instance must be the world pseudo-instance, with no velocities and
 * no free bodies.
 */
export const TopologyDescriptionSchema = z
  .object({
    modelInstances: z.array(ModelInstanceDescriptionSchema).min(1),
  })
  .strict()
  .superRefine((description, ctx) => {
    const [world] = description.modelInstances;
    if (world !== undefined) {
      if (world.name !== WORLD_MODEL_INSTANCE_NAME) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["modelInstances", 0, "name"],
          message: `first model instance must be "${WORLD_MODEL_INSTANCE_NAME}", got "${world.name}"`,
        });
      }
      if (world.numVelocities !== 0) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["modelInstances", 0, "numVelocities"],
          message: "the world model instance has no velocities",
        });
      }
      if (world.bodies.some((b) => b.freeBase !== undefined)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["modelInstances", 0, "bodies"],
          message: "the world model instance has no free bodies",
        });
      }
    }

    const seen = new Set<string>();
    description.modelInstances.forEach((instance, index) => {
      if (seen.has(instance.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["modelInstances", index, "name"],
          message: `duplicate model instance name "${instance.name}"`,
        });
      }
      seen.add(instance.name);
    });
  });

export type BodyDescription = z.infer<typeof BodyDescriptionSchema>;
export type ModelInstanceDescription = z.infer<typeof ModelInstanceDescriptionSchema>;
export type TopologyDescription = z.infer<typeof TopologyDescriptionSchema>;

/**
 * Individual validation issue.
 */
export interface DescriptionIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  message: string;
}

/**
 * Structured validation error for topology descriptions.
 */
export class TopologyDescriptionError extends Error {
  readonly issues: DescriptionIssue[];

  constructor(message: string, issues: DescriptionIssue[]) {
    super(message);
    this.name = "TopologyDescriptionError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = ["Topology description validation failed:"];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

function toIssues(zodIssues: ZodIssue[]): DescriptionIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number",
    ),
    message: issue.message,
  }));
}

/**
 * Validate an untyped topology description.
 *
 * @throws {TopologyDescriptionError} listing every schema violation.
 */
export function parseTopologyDescription(input: unknown): TopologyDescription {
  const result = TopologyDescriptionSchema.safeParse(input);
  if (!result.success) {
    const issues = toIssues(result.error.issues);
    throw new TopologyDescriptionError(
      `Invalid topology description: ${issues.length} validation error(s)`,
      issues,
    );
  }
  return result.data;
}

/**
 * Read and validate a topology description from a JSON file.
 */
export function readTopologyDescription(path: string): TopologyDescription {
  const raw: unknown = JSON.parse(readFileSync(path, "utf-8"));
  return parseTopologyDescription(raw);
}
