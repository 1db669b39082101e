import type { IdentifiedBody, ModelInstanceIndex, MultibodyTopology } from "./types.js";
import { ConfigurationError } from "./ConfigurationError.js";

/**
 * System-wide identifier of a body: `"{modelInstanceName}_{bodyName}"`.
 */
export function uniqueBodyIdentifier(modelInstanceName: string, bodyName: string): string {
  return `${modelInstanceName}_${bodyName}`;
}

/**
 * Enumerate the bodies of the given model instances (all of them by default)
 * in instance order, then each instance's intrinsic body order. Parameter
 * rows are aligned to this sequence by position.
 *
 * @throws {ConfigurationError} if two bodies map to the same identifier,
 *   e.g. instance `"a_b"` body `"c"` and instance `"a"` body `"b_c"`.
 */
export function enumerateBodies(
  topology: MultibodyTopology,
  instances: readonly ModelInstanceIndex[] = topology.modelInstances(),
): IdentifiedBody[] {
  const out: IdentifiedBody[] = [];
  const seen = new Set<string>();

  for (const instance of instances) {
    const instanceName = topology.modelInstanceName(instance);
    for (const body of topology.bodies(instance)) {
      const identifier = uniqueBodyIdentifier(instanceName, body.name);
      if (seen.has(identifier)) {
        throw new ConfigurationError(identifier, "body identifier is not unique.");
      }
      seen.add(identifier);
      out.push({ body, identifier });
    }
  }
  return out;
}

/**
 * Bodies that carry inertial parameters: every body outside the world
 * pseudo-instance.
 */
export function enumerateInertialBodies(topology: MultibodyTopology): IdentifiedBody[] {
  const world = topology.worldModelInstance();
  return enumerateBodies(
    topology,
    topology.modelInstances().filter((instance) => instance !== world),
  );
}

/** Identifiers of {@link enumerateInertialBodies}, in order. */
export function inertialBodyIdentifiers(topology: MultibodyTopology): string[] {
  return enumerateInertialBodies(topology).map((entry) => entry.identifier);
}
