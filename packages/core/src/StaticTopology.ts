import type { Body, ModelInstanceIndex, MultibodyTopology } from "./types.js";
import { LookupError } from "./LookupError.js";
import {
  parseTopologyDescription,
  type TopologyDescription,
  type ModelInstanceDescription,
} from "./topologyDescription.js";

/**
 * In-memory {@link MultibodyTopology} built from a validated
 * {@link TopologyDescription}.
 *
 * Model instance indices are positions in the description, so the first
 * instance (index 0) is the world pseudo-instance.
 *
 * @example
 * ```ts
 * const topology = StaticTopology.fromDescription({
 *   modelInstances: [
 *     { name: "WorldModelInstance", bodies: [{ name: "world" }], numVelocities: 0 },
 *     { name: "cube", bodies: [{ name: "body", freeBase: "quaternion" }], numVelocities: 6 },
 *   ],
 * });
 * topology.numPositions(1); // 7
 * ```
 */
export class StaticTopology implements MultibodyTopology {
  private readonly description: TopologyDescription;
  private readonly indexByName = new Map<string, ModelInstanceIndex>();
  private readonly bodyLists: readonly (readonly Body[])[];

  private constructor(description: TopologyDescription) {
    this.description = description;
    description.modelInstances.forEach((instance, index) => {
      this.indexByName.set(instance.name, index);
    });
    this.bodyLists = description.modelInstances.map((instance, index) =>
      instance.bodies.map((body): Body =>
        body.freeBase !== undefined
          ? { name: body.name, modelInstance: index, freeBase: body.freeBase }
          : { name: body.name, modelInstance: index },
      ),
    );
  }

  /**
   * Validate `input` and build a topology from it.
   *
   * @throws {TopologyDescriptionError} if `input` does not match the schema.
   */
  static fromDescription(input: unknown): StaticTopology {
    return new StaticTopology(parseTopologyDescription(input));
  }

  /** Plain description this topology was built from. */
  toDescription(): TopologyDescription {
    return this.description;
  }

  worldModelInstance(): ModelInstanceIndex {
    return 0;
  }

  modelInstances(): readonly ModelInstanceIndex[] {
    return this.description.modelInstances.map((_, index) => index);
  }

  modelInstanceName(instance: ModelInstanceIndex): string {
    return this.instance(instance).name;
  }

  getModelInstanceByName(name: string): ModelInstanceIndex {
    const index = this.indexByName.get(name);
    if (index === undefined) {
      throw new LookupError("Model instance", name);
    }
    return index;
  }

  bodies(instance: ModelInstanceIndex): readonly Body[] {
    this.instance(instance);
    return this.bodyLists[instance];
  }

  freeBaseBodies(instance: ModelInstanceIndex): readonly Body[] {
    return this.bodies(instance).filter((body) => body.freeBase !== undefined);
  }

  numVelocities(instance: ModelInstanceIndex): number {
    return this.instance(instance).numVelocities;
  }

  /** Velocities plus one extra coordinate per quaternion-parameterized free body. */
  numPositions(instance: ModelInstanceIndex): number {
    const quaternions = this.freeBaseBodies(instance).filter(
      (body) => body.freeBase === "quaternion",
    ).length;
    return this.numVelocities(instance) + quaternions;
  }

  private instance(index: ModelInstanceIndex): ModelInstanceDescription {
    const instance = this.description.modelInstances[index];
    if (instance === undefined) {
      throw new LookupError("Model instance index", String(index));
    }
    return instance;
  }
}
