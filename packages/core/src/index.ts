export { Vec3 } from "./math/Vec3.js";
export type { Vec3Tuple } from "./math/Vec3.js";
export { ConfigurationError } from "./ConfigurationError.js";
export { LookupError } from "./LookupError.js";
export { UnsupportedGeometryError, UnsupportedOperationError } from "./UnsupportedGeometryError.js";
export { UnsupportedConfigurationError } from "./UnsupportedConfigurationError.js";
export { silentLogger, createConsoleLogger, formatLogEntry } from "./logging/logger.js";
export type { Logger, LogLevel, ConsoleLoggerOptions } from "./logging/logger.js";
export { box, sphere, polygon, describeGeometryVariant } from "./geometry.js";
export type { Box, Sphere, Polygon, CollisionGeometry, GeometryKind } from "./geometry.js";
export { PI_DIMENSION, piToUrdf, urdfToPi } from "./inertia.js";
export type { InertiaEntries, UrdfInertial } from "./inertia.js";
export { ParameterRowSchema, validateParameterMatrix } from "./parameters.js";
export type { ParameterRow } from "./parameters.js";
export {
  WORLD_MODEL_INSTANCE_NAME,
  WORLD_BODY_NAME,
  FLOATING_BODY_VELOCITIES,
  TopologyDescriptionSchema,
  TopologyDescriptionError,
  parseTopologyDescription,
  readTopologyDescription,
} from "./topologyDescription.js";
export type {
  BodyDescription,
  ModelInstanceDescription,
  TopologyDescription,
  DescriptionIssue,
} from "./topologyDescription.js";
export { StaticTopology } from "./StaticTopology.js";
export { FloatingBaseSpace, FixedBaseSpace, ProductSpace } from "./StateSpace.js";
export type { StateSpace, Slice } from "./StateSpace.js";
export { stateSpaceFromInstances, buildStateSpace } from "./buildStateSpace.js";
export type { InstanceDofs } from "./buildStateSpace.js";
export {
  uniqueBodyIdentifier,
  enumerateBodies,
  enumerateInertialBodies,
  inertialBodyIdentifiers,
} from "./bodyIdentity.js";
export type {
  ModelInstanceIndex,
  RotationParameterization,
  Body,
  IdentifiedBody,
  MultibodyTopology,
} from "./types.js";
