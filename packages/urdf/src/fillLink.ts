import {
  piToUrdf,
  UnsupportedConfigurationError,
  type CollisionGeometry,
} from "@multibody-urdf/core";
import { findOrDefault, INERTIA_ATTRIBUTES } from "./defaultTree.js";
import { urdfRepresentation } from "./geometryRepresentation.js";
import { attrValue, formatFloat, formatVector, replaceAttributes } from "./parseUrdf.js";

/**
 * Write one body's inertial parameters and collision geometry into its
 * `<link>` element, creating any missing `<inertial>` / `<collision>`
 * structure with defaults.
 *
 * - `inertial/mass@value` ← mass
 * - `inertial/origin@xyz` ← center of mass
 * - `inertial/inertia` ← exactly `ixx iyy izz ixy ixz iyz`
 * - `collision/geometry/<shape>` ← the geometry's attributes, replacing any
 *   existing ones
 *
 * @param link       The `<link>` element; mutated in place.
 * @param pi         The body's 10-entry `pi` vector.
 * @param geometries All collision geometries attached to the body.
 * @throws {UnsupportedConfigurationError} if more than one geometry is given.
 */
export function fillLinkWithParameterization(
  link: Element,
  pi: readonly number[],
  geometries: readonly CollisionGeometry[],
): void {
  const linkName = attrValue(link, "name") ?? "<unnamed link>";
  if (geometries.length > 1) {
    throw new UnsupportedConfigurationError(
      linkName,
      `${geometries.length} geometries attached; URDF export supports one geometry per link.`,
    );
  }
  const shapes = geometries.map(urdfRepresentation);
  const { mass, centerOfMass, inertia } = piToUrdf(pi, linkName);

  const inertial = findOrDefault(link, "inertial");
  findOrDefault(inertial, "mass").setAttribute("value", formatFloat(mass));
  findOrDefault(inertial, "origin").setAttribute("xyz", formatVector(centerOfMass.toArray()));
  replaceAttributes(
    findOrDefault(inertial, "inertia"),
    Object.fromEntries(INERTIA_ATTRIBUTES.map((name, i) => [name, formatFloat(inertia[i])])),
  );

  for (const { tag, attributes } of shapes) {
    const geometry = findOrDefault(findOrDefault(link, "collision"), "geometry");
    replaceAttributes(findOrDefault(geometry, tag), attributes);
  }
}
