import {
  describeGeometryVariant,
  UnsupportedGeometryError,
  UnsupportedOperationError,
  type CollisionGeometry,
} from "@multibody-urdf/core";
import type { ShapeElementType } from "./defaultTree.js";
import { formatFloat, formatVector } from "./parseUrdf.js";

/** URDF tag and attributes describing one collision geometry. */
export interface GeometryRepresentation {
  readonly tag: ShapeElementType;
  readonly attributes: Readonly<Record<string, string>>;
}

function unsupported(geometry: never): never {
  throw new UnsupportedGeometryError(describeGeometryVariant(geometry));
}

/**
 * URDF representation of a collision geometry, to be placed inside a
 * `<collision><geometry>` element.
 *
 * @example
 * ```ts
 * urdfRepresentation(sphere(5.1)); // { tag: "sphere", attributes: { radius: "5.1" } }
 * urdfRepresentation(box([1, 2, 3])); // { tag: "box", attributes: { size: "2.0 4.0 6.0" } }
 * ```
 *
 * @throws {UnsupportedOperationError} for polygons.
 * @throws {UnsupportedGeometryError} for any value outside the known variants.
 */
export function urdfRepresentation(geometry: CollisionGeometry): GeometryRepresentation {
  switch (geometry.kind) {
    case "box":
      // URDF sizes are full edge lengths.
      return { tag: "box", attributes: { size: formatVector(geometry.halfLengths.map((h) => 2 * h)) } };
    case "sphere":
      return { tag: "sphere", attributes: { radius: formatFloat(geometry.radius) } };
    case "polygon":
      throw new UnsupportedOperationError("polygon");
    default:
      return unsupported(geometry);
  }
}
