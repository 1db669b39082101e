import type { Vec3Tuple } from "./math/Vec3.js";

/** Axis-aligned box, described by its half edge lengths. */
export interface Box {
  readonly kind: "box";
  readonly halfLengths: Readonly<Vec3Tuple>;
}

export interface Sphere {
  readonly kind: "sphere";
  readonly radius: number;
}

/**
 * Convex polygon given by its vertices in the body frame. Used for contact
 * computation only; there is no URDF encoding for it.
 */
export interface Polygon {
  readonly kind: "polygon";
  readonly vertices: readonly Readonly<Vec3Tuple>[];
}

/**
 * Closed set of collision geometries a body can carry. Consumers switch on
 * `kind` exhaustively, so adding a variant is a compile error at every site
 * that does not handle it.
 */
export type CollisionGeometry = Box | Sphere | Polygon;

export type GeometryKind = CollisionGeometry["kind"];

export function box(halfLengths: Readonly<Vec3Tuple>): Box {
  return { kind: "box", halfLengths };
}

export function sphere(radius: number): Sphere {
  return { kind: "sphere", radius };
}

export function polygon(vertices: readonly Readonly<Vec3Tuple>[]): Polygon {
  return { kind: "polygon", vertices };
}

/**
 * Best-effort name for a value that failed exhaustive matching, for use in
 * error messages. Values arriving from untyped callers may carry any `kind`.
 */
export function describeGeometryVariant(value: unknown): string {
  if (typeof value === "object" && value !== null && "kind" in value) {
    return String(value.kind);
  }
  if (typeof value === "object" && value !== null) {
    return value.constructor.name;
  }
  return typeof value;
}
