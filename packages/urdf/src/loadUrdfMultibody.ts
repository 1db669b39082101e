import {
  box,
  FLOATING_BODY_VELOCITIES,
  silentLogger,
  sphere,
  StaticTopology,
  uniqueBodyIdentifier,
  WORLD_BODY_NAME,
  WORLD_MODEL_INSTANCE_NAME,
  type BodyDescription,
  type CollisionGeometry,
  type Logger,
  type ModelInstanceDescription,
} from "@multibody-urdf/core";
import { UrdfParseError } from "./UrdfParseError.js";
import { attrValue, childElements, parseTriple, parseUrdfDocument } from "./parseUrdf.js";

// ── internal types ────────────────────────────────────────────────────────────

interface ParsedJoint {
  name: string;
  type: string;
  parentLink: string;
  childLink: string;
}

/** Velocity DOFs contributed by each URDF joint type. */
const JOINT_VELOCITIES: Readonly<Record<string, number>> = {
  fixed: 0,
  revolute: 1,
  continuous: 1,
  prismatic: 1,
  planar: 3,
  floating: 6,
};

// ── public types ──────────────────────────────────────────────────────────────

/**
 * Topology and collision geometry of a multibody system assembled from URDF
 * models, in the layout the serializer consumes.
 */
export interface UrdfMultibody {
  readonly topology: StaticTopology;
  readonly geometries: CollisionGeometry[];
  /** Indices into `geometries` per body identifier. */
  readonly geometryBodyAssignment: Map<string, number[]>;
}

export interface UrdfMultibodyOptions {
  logger?: Logger;
}

interface ParsedModel {
  readonly instance: ModelInstanceDescription;
  readonly collisions: { bodyName: string; geometry: CollisionGeometry }[];
}

// ── joint parsing ─────────────────────────────────────────────────────────────

function parseJoint(element: Element): ParsedJoint {
  const name = attrValue(element, "name") ?? "";
  const type = attrValue(element, "type") ?? "unknown";
  const [parent] = childElements(element, "parent");
  const [child] = childElements(element, "child");
  const parentLink = parent !== undefined ? attrValue(parent, "link") ?? "" : "";
  const childLink = child !== undefined ? attrValue(child, "link") ?? "" : "";

  if (!parentLink || !childLink) {
    throw new UrdfParseError(`joint "${name}" needs both <parent link> and <child link>.`);
  }
  return { name, type, parentLink, childLink };
}

// ── collision parsing ─────────────────────────────────────────────────────────

function parseCollisionGeometry(
  modelName: string,
  linkName: string,
  collision: Element,
  logger: Logger,
): CollisionGeometry | undefined {
  const [geometry] = childElements(collision, "geometry");
  const [shape] = geometry !== undefined ? childElements(geometry) : [];
  if (shape === undefined) {
    logger.warn("Collision without a shape", { model: modelName, link: linkName });
    return undefined;
  }
  switch (shape.tagName) {
    case "box": {
      const [x, y, z] = parseTriple(attrValue(shape, "size"));
      return box([x / 2, y / 2, z / 2]);
    }
    case "sphere":
      return sphere(parseFloat(attrValue(shape, "radius") ?? "0") || 0);
    default:
      logger.warn("Ignoring collision shape with no geometry model", {
        model: modelName,
        link: linkName,
        shape: shape.tagName,
      });
      return undefined;
  }
}

// ── model parsing ─────────────────────────────────────────────────────────────

/**
 * Describe one URDF as a model instance.
 *
 * Links become bodies in document order, except a link named `world`, which
 * refers to the world body. A link that is no joint's child and is not the
 * world floats freely (quaternion base, six velocities), as does the child
 * of a `floating` joint to the world. A `floating` joint between two links
 * adds six velocities but no free base.
 */
function parseModel(modelName: string, xml: string, logger: Logger): ParsedModel {
  const robot = parseUrdfDocument(xml).documentElement;

  const linkElements = childElements(robot, "link");
  const declared = new Set<string>();
  for (const link of linkElements) {
    const name = attrValue(link, "name");
    if (name === undefined) {
      throw new UrdfParseError(`model "${modelName}" has a <link> without a name.`);
    }
    declared.add(name);
  }

  const joints = childElements(robot, "joint").map(parseJoint);
  for (const joint of joints) {
    for (const link of [joint.parentLink, joint.childLink]) {
      if (link !== WORLD_BODY_NAME && !declared.has(link)) {
        throw new UrdfParseError(`joint "${joint.name}" references undeclared link "${link}".`);
      }
    }
  }

  let numVelocities = 0;
  const floatingChildren = new Set<string>();
  for (const joint of joints) {
    const velocities = JOINT_VELOCITIES[joint.type];
    if (velocities === undefined) {
      throw new UrdfParseError(`joint "${joint.name}" has unsupported type "${joint.type}".`);
    }
    numVelocities += velocities;
    // Only a body floating relative to the world is a free base.
    if (joint.type === "floating" && joint.parentLink === WORLD_BODY_NAME) {
      floatingChildren.add(joint.childLink);
    }
  }

  const childLinks = new Set(joints.map((j) => j.childLink));
  const bodies: BodyDescription[] = [];
  const collisions: ParsedModel["collisions"] = [];

  for (const link of linkElements) {
    const name = attrValue(link, "name") ?? "";
    if (name === WORLD_BODY_NAME) continue;

    if (!childLinks.has(name)) {
      numVelocities += FLOATING_BODY_VELOCITIES;
      bodies.push({ name, freeBase: "quaternion" });
    } else if (floatingChildren.has(name)) {
      bodies.push({ name, freeBase: "quaternion" });
    } else {
      bodies.push({ name });
    }

    for (const collision of childElements(link, "collision")) {
      const geometry = parseCollisionGeometry(modelName, name, collision, logger);
      if (geometry !== undefined) collisions.push({ bodyName: name, geometry });
    }
  }

  return { instance: { name: modelName, bodies, numVelocities }, collisions };
}

// ── public API ────────────────────────────────────────────────────────────────

/**
 * Assemble a multibody system from URDF models, one model instance per
 * entry, named by its key. The world pseudo-instance comes first, then the
 * models in key order, matching the simulator's state layout.
 *
 * @example
 * ```ts
 * const { topology, geometries, geometryBodyAssignment } = loadUrdfMultibody({
 *   cube: `<robot name="cube"><link name="body">…</link></robot>`,
 * });
 * buildStateSpace(topology).nq; // 7
 * ```
 *
 * @throws {UrdfParseError} for malformed documents, undeclared links or
 *   unknown joint types.
 */
export function loadUrdfMultibody(
  urdfs: Readonly<Record<string, string>>,
  options: UrdfMultibodyOptions = {},
): UrdfMultibody {
  const { logger = silentLogger } = options;

  const modelInstances: ModelInstanceDescription[] = [
    { name: WORLD_MODEL_INSTANCE_NAME, bodies: [{ name: WORLD_BODY_NAME }], numVelocities: 0 },
  ];
  const geometries: CollisionGeometry[] = [];
  const geometryBodyAssignment = new Map<string, number[]>();

  for (const [modelName, xml] of Object.entries(urdfs)) {
    const { instance, collisions } = parseModel(modelName, xml, logger);
    modelInstances.push(instance);

    for (const { bodyName, geometry } of collisions) {
      const bodyId = uniqueBodyIdentifier(modelName, bodyName);
      const indices = geometryBodyAssignment.get(bodyId) ?? [];
      indices.push(geometries.length);
      geometryBodyAssignment.set(bodyId, indices);
      geometries.push(geometry);
    }
    logger.debug("Loaded URDF model", {
      model: modelName,
      bodies: instance.bodies.length,
      velocities: instance.numVelocities,
    });
  }

  return {
    topology: StaticTopology.fromDescription({ modelInstances }),
    geometries,
    geometryBodyAssignment,
  };
}
