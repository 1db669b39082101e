/** Opaque index of a model instance within a topology. */
export type ModelInstanceIndex = number;

/** How a free-floating body parameterizes its orientation. */
export type RotationParameterization = "quaternion" | "roll-pitch-yaw";

/**
 * A rigid body as the topology reports it.
 */
export interface Body {
  readonly name: string;
  readonly modelInstance: ModelInstanceIndex;
  /**
   * Set when the body is connected to the world by a 6-DOF floating joint;
   * absent for bodies attached through ordinary joints.
   */
  readonly freeBase?: RotationParameterization;
}

/**
 * A body paired with its system-wide unique identifier.
 */
export interface IdentifiedBody {
  readonly body: Body;
  readonly identifier: string;
}

/**
 * Read-only view of a multibody system's structure, supplied by the physics
 * layer. Every ordering it returns is the ordering the simulator uses for its
 * state and parameter vectors.
 */
export interface MultibodyTopology {
  /** The zero-DOF pseudo-instance holding the world body. */
  worldModelInstance(): ModelInstanceIndex;

  /** All model instances, world first, in state-vector order. */
  modelInstances(): readonly ModelInstanceIndex[];

  modelInstanceName(instance: ModelInstanceIndex): string;

  /**
   * Resolve a model instance by exact name.
   *
   * @throws {LookupError} if no instance has that name.
   */
  getModelInstanceByName(name: string): ModelInstanceIndex;

  /** Bodies of an instance in the simulator's intrinsic order. */
  bodies(instance: ModelInstanceIndex): readonly Body[];

  /** Bodies of an instance that float freely relative to the world. */
  freeBaseBodies(instance: ModelInstanceIndex): readonly Body[];

  /** Total velocity degrees of freedom of an instance. */
  numVelocities(instance: ModelInstanceIndex): number;

  /** Total position degrees of freedom of an instance. */
  numPositions(instance: ModelInstanceIndex): number;
}
