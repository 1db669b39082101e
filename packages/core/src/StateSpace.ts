import { ConfigurationError } from "./ConfigurationError.js";

/** Position coordinates of a floating base: unit quaternion + translation. */
const FLOATING_BASE_POSITIONS = 7;
/** Velocity coordinates of a floating base: angular + linear velocity. */
const FLOATING_BASE_VELOCITIES = 6;

/** Half-open `[start, end)` range into a state vector. */
export interface Slice {
  readonly start: number;
  readonly end: number;
}

function checkJointCount(nJoints: number): number {
  if (!Number.isInteger(nJoints) || nJoints < 0) {
    throw new ConfigurationError("state space", `joint count must be a non-negative integer, got ${nJoints}.`);
  }
  return nJoints;
}

/**
 * State space of a chain whose base moves freely: the base pose is a
 * quaternion plus translation, followed by `nJoints` joint coordinates.
 */
export class FloatingBaseSpace {
  readonly kind = "floating-base" as const;
  readonly nJoints: number;

  constructor(nJoints: number) {
    this.nJoints = checkJointCount(nJoints);
  }

  get nq(): number {
    return this.nJoints + FLOATING_BASE_POSITIONS;
  }

  get nv(): number {
    return this.nJoints + FLOATING_BASE_VELOCITIES;
  }

  get nx(): number {
    return this.nq + this.nv;
  }
}

/** State space of a chain welded to the world: joint coordinates only. */
export class FixedBaseSpace {
  readonly kind = "fixed-base" as const;
  readonly nJoints: number;

  constructor(nJoints: number) {
    this.nJoints = checkJointCount(nJoints);
  }

  get nq(): number {
    return this.nJoints;
  }

  get nv(): number {
    return this.nJoints;
  }

  get nx(): number {
    return this.nq + this.nv;
  }
}

/**
 * Concatenation of independent factor spaces. Factor order is the order in
 * which the simulator lays out its position and velocity vectors.
 */
export class ProductSpace {
  readonly kind = "product" as const;
  readonly factors: readonly StateSpace[];

  constructor(factors: readonly StateSpace[]) {
    this.factors = Object.freeze([...factors]);
  }

  get nq(): number {
    return this.factors.reduce((sum, f) => sum + f.nq, 0);
  }

  get nv(): number {
    return this.factors.reduce((sum, f) => sum + f.nv, 0);
  }

  get nx(): number {
    return this.nq + this.nv;
  }

  /** Range of each factor within the position vector. */
  positionSlices(): Slice[] {
    return slices(this.factors.map((f) => f.nq));
  }

  /** Range of each factor within the velocity vector. */
  velocitySlices(): Slice[] {
    return slices(this.factors.map((f) => f.nv));
  }
}

export type StateSpace = FloatingBaseSpace | FixedBaseSpace | ProductSpace;

function slices(sizes: readonly number[]): Slice[] {
  const out: Slice[] = [];
  let start = 0;
  for (const size of sizes) {
    out.push({ start, end: start + size });
    start += size;
  }
  return out;
}
