import { vec3 as glVec3 } from "gl-matrix";

export type Vec3Tuple = [number, number, number];

/**
 * Immutable 3-component vector (X, Y, Z).
 * Arithmetic goes through gl-matrix with plain-array outputs, so results keep
 * double precision (gl-matrix's own `create()` allocates a Float32Array).
 */
export class Vec3 {
  readonly x: number;
  readonly y: number;
  readonly z: number;

  constructor(x = 0, y = 0, z = 0) {
    this.x = x;
    this.y = y;
    this.z = z;
  }

  // ── factory helpers ────────────────────────────────────────────────────────

  static zero(): Vec3 {
    return new Vec3(0, 0, 0);
  }

  static fromArray(arr: readonly [number, number, number]): Vec3 {
    return new Vec3(arr[0], arr[1], arr[2]);
  }

  // ── arithmetic ─────────────────────────────────────────────────────────────

  add(other: Vec3): Vec3 {
    const out: Vec3Tuple = [0, 0, 0];
    glVec3.add(out, this.toArray(), other.toArray());
    return Vec3.fromArray(out);
  }

  subtract(other: Vec3): Vec3 {
    const out: Vec3Tuple = [0, 0, 0];
    glVec3.subtract(out, this.toArray(), other.toArray());
    return Vec3.fromArray(out);
  }

  scale(s: number): Vec3 {
    const out: Vec3Tuple = [0, 0, 0];
    glVec3.scale(out, this.toArray(), s);
    return Vec3.fromArray(out);
  }

  dot(other: Vec3): number {
    return glVec3.dot(this.toArray(), other.toArray());
  }

  // ── utility ────────────────────────────────────────────────────────────────

  equals(other: Vec3, epsilon = 1e-6): boolean {
    return (
      Math.abs(this.x - other.x) <= epsilon &&
      Math.abs(this.y - other.y) <= epsilon &&
      Math.abs(this.z - other.z) <= epsilon
    );
  }

  toArray(): Vec3Tuple {
    return [this.x, this.y, this.z];
  }

  toString(): string {
    return `Vec3(${this.x}, ${this.y}, ${this.z})`;
  }
}
