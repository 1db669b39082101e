import type { Body, MultibodyTopology } from "./types.js";
import { ConfigurationError } from "./ConfigurationError.js";
import { FLOATING_BODY_VELOCITIES } from "./topologyDescription.js";
import { FixedBaseSpace, FloatingBaseSpace, ProductSpace, type StateSpace } from "./StateSpace.js";

/**
 * Per-instance degrees-of-freedom summary the builder works from.
 */
export interface InstanceDofs {
  readonly name: string;
  /** Candidate free-floating base bodies of the instance. */
  readonly freeBaseBodies: readonly Body[];
  readonly numVelocities: number;
}

function instanceSpace(instance: InstanceDofs): StateSpace {
  const { name, freeBaseBodies, numVelocities } = instance;

  if (freeBaseBodies.length === 0) {
    return new FixedBaseSpace(numVelocities);
  }
  if (freeBaseBodies.length > 1) {
    const names = freeBaseBodies.map((b) => b.name).join(", ");
    throw new ConfigurationError(name, `expected at most one free base body, found ${freeBaseBodies.length} (${names}).`);
  }

  const [freeBody] = freeBaseBodies;
  if (freeBody.freeBase !== "quaternion") {
    throw new ConfigurationError(
      name,
      `free base body "${freeBody.name}" must use quaternion rotation, got "${freeBody.freeBase ?? "none"}".`,
    );
  }
  if (numVelocities < FLOATING_BODY_VELOCITIES) {
    throw new ConfigurationError(
      name,
      `free base body "${freeBody.name}" needs at least ${FLOATING_BODY_VELOCITIES} velocities, got ${numVelocities}.`,
    );
  }
  return new FloatingBaseSpace(numVelocities - FLOATING_BODY_VELOCITIES);
}

/**
 * Build the product state space of an ordered list of model instances.
 *
 * The caller supplies the instances in exactly the order the simulator uses
 * for its state vector; the factors keep that order.
 *
 * @throws {ConfigurationError} naming the instance if it has several free
 *   base bodies, or its free base body is not quaternion-parameterized or
 *   has fewer than six velocities.
 */
export function stateSpaceFromInstances(instances: readonly InstanceDofs[]): ProductSpace {
  return new ProductSpace(instances.map(instanceSpace));
}

/**
 * Infer the state space of every model instance of `topology`, world first.
 *
 * @example
 * ```ts
 * const space = buildStateSpace(topology);
 * space.factors.map((f) => f.kind); // ["fixed-base", "floating-base", ...]
 * ```
 */
export function buildStateSpace(topology: MultibodyTopology): ProductSpace {
  return stateSpaceFromInstances(
    topology.modelInstances().map((instance) => ({
      name: topology.modelInstanceName(instance),
      freeBaseBodies: topology.freeBaseBodies(instance),
      numVelocities: topology.numVelocities(instance),
    })),
  );
}
