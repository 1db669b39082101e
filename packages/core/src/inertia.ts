import { mat3 as glMat3 } from "gl-matrix";
import { Vec3 } from "./math/Vec3.js";
import { ConfigurationError } from "./ConfigurationError.js";

/** Number of entries in a body's inertial parameter vector. */
export const PI_DIMENSION = 10;

/**
 * The six independent entries of a symmetric inertia tensor, in URDF
 * attribute order: `[ixx, iyy, izz, ixy, ixz, iyz]`.
 */
export type InertiaEntries = [number, number, number, number, number, number];

/** Inertial properties in the form a URDF `<inertial>` element stores them. */
export interface UrdfInertial {
  readonly mass: number;
  /** Center of mass, expressed in the body frame. */
  readonly centerOfMass: Vec3;
  /** Inertia tensor about the center of mass, in the body frame. */
  readonly inertia: InertiaEntries;
}

type Mat3Tuple = [number, number, number, number, number, number, number, number, number];

function symmetric([ixx, iyy, izz, ixy, ixz, iyz]: readonly number[]): Mat3Tuple {
  return [ixx, ixy, ixz, ixy, iyy, iyz, ixz, iyz, izz];
}

function entries(m: Mat3Tuple): InertiaEntries {
  return [m[0], m[4], m[8], m[1], m[2], m[5]];
}

/**
 * Tensor added to a body's inertia when moving the reference point from the
 * center of mass to an offset `p`:  m · (|p|² E − p pᵀ).
 */
function parallelAxisShift(mass: number, p: Vec3): Mat3Tuple {
  const d = p.dot(p);
  return [
    mass * (d - p.x * p.x), -mass * p.x * p.y, -mass * p.x * p.z,
    -mass * p.y * p.x, mass * (d - p.y * p.y), -mass * p.y * p.z,
    -mass * p.z * p.x, -mass * p.z * p.y, mass * (d - p.z * p.z),
  ];
}

/**
 * Convert a `pi` vector to URDF inertial properties.
 *
 * `pi = [m, m·px, m·py, m·pz, Ixx, Iyy, Izz, Ixy, Ixz, Iyz]`, where the
 * inertia is taken about the body origin. URDF stores the inertia about the
 * center of mass, so the parallel-axis shift is removed.
 *
 * @param bodyId Named in errors.
 * @throws {ConfigurationError} if `pi` does not have ten entries or the mass
 *   is not strictly positive.
 */
export function piToUrdf(pi: readonly number[], bodyId = "pi"): UrdfInertial {
  if (pi.length !== PI_DIMENSION) {
    throw new ConfigurationError(bodyId, `expected ${PI_DIMENSION} inertial parameters, got ${pi.length}.`);
  }
  const mass = pi[0];
  if (!(mass > 0)) {
    throw new ConfigurationError(bodyId, `mass must be positive, got ${mass}.`);
  }

  const centerOfMass = new Vec3(pi[1], pi[2], pi[3]).scale(1 / mass);
  const aboutCom: Mat3Tuple = [0, 0, 0, 0, 0, 0, 0, 0, 0];
  glMat3.subtract(aboutCom, symmetric(pi.slice(4)), parallelAxisShift(mass, centerOfMass));

  return { mass, centerOfMass, inertia: entries(aboutCom) };
}

/**
 * Inverse of {@link piToUrdf}: build the `pi` vector from URDF inertial
 * properties. Exact up to floating-point rounding.
 */
export function urdfToPi(mass: number, centerOfMass: Vec3, inertia: Readonly<InertiaEntries>): number[] {
  const firstMoment = centerOfMass.scale(mass);
  const aboutOrigin: Mat3Tuple = [0, 0, 0, 0, 0, 0, 0, 0, 0];
  glMat3.add(aboutOrigin, symmetric(inertia), parallelAxisShift(mass, centerOfMass));
  return [mass, ...firstMoment.toArray(), ...entries(aboutOrigin)];
}
