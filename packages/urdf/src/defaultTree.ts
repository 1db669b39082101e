import { childElements } from "./parseUrdf.js";

/** URDF element types the exporter may need to synthesize. */
export type UrdfElementType =
  | "inertial"
  | "origin"
  | "mass"
  | "inertia"
  | "collision"
  | "geometry"
  | "box"
  | "sphere"
  | "cylinder";

/** Shape elements that sit inside `<geometry>`. */
export type ShapeElementType = Extract<UrdfElementType, "box" | "sphere" | "cylinder">;

/** Attribute names of `<inertia>`, in the order their values are written. */
export const INERTIA_ATTRIBUTES = ["ixx", "iyy", "izz", "ixy", "ixz", "iyz"] as const;

export interface ElementDefaults {
  readonly attributes: Readonly<Record<string, string>>;
  /** Required child types, appended in this order. */
  readonly children: readonly UrdfElementType[];
}

const ZERO = "0";
const ZERO_3 = "0 0 0";

/**
 * Default content of every synthesizable URDF element. A `<inertial>` holds
 * `<origin>`, `<mass>` and `<inertia>`; a `<sphere>` has a zero `radius`.
 */
export const URDF_DEFAULT_SCHEMA: { readonly [T in UrdfElementType]: ElementDefaults } = {
  inertial: { attributes: {}, children: ["origin", "mass", "inertia"] },
  origin: { attributes: { xyz: ZERO_3, rpy: ZERO_3 }, children: [] },
  mass: { attributes: { value: ZERO }, children: [] },
  inertia: {
    attributes: Object.fromEntries(INERTIA_ATTRIBUTES.map((name) => [name, ZERO])),
    children: [],
  },
  collision: { attributes: {}, children: ["geometry", "origin"] },
  geometry: { attributes: {}, children: [] },
  box: { attributes: { size: ZERO_3 }, children: [] },
  sphere: { attributes: { radius: ZERO }, children: [] },
  cylinder: { attributes: { radius: ZERO, length: ZERO }, children: [] },
};

export interface ResolvedChild {
  readonly element: Element;
  /** True when `element` is a new, detached default subtree. */
  readonly synthesized: boolean;
}

/**
 * Build a detached default subtree of `type`, children appended depth-first.
 */
export function createDefaultElement(document: Document, type: UrdfElementType): Element {
  const { attributes, children } = URDF_DEFAULT_SCHEMA[type];
  const element = document.createElement(type);
  for (const [name, value] of Object.entries(attributes)) {
    element.setAttribute(name, value);
  }
  for (const childType of children) {
    element.appendChild(createDefaultElement(document, childType));
  }
  return element;
}

/**
 * Find the first direct child of `parent` of the given type, or build a
 * default one. Does not modify `parent`; the caller decides whether a
 * synthesized subtree gets attached.
 *
 * Duplicate children of the same type are not reconciled: the first wins.
 */
export function resolveChild(parent: Element, type: UrdfElementType): ResolvedChild {
  const [existing] = childElements(parent, type);
  if (existing !== undefined) {
    return { element: existing, synthesized: false };
  }
  return { element: createDefaultElement(parent.ownerDocument, type), synthesized: true };
}

/**
 * Find the first direct child of `parent` of the given type, appending a
 * default subtree first if there is none. Calling it twice returns the same
 * element.
 *
 * @example
 * ```ts
 * // link is <link name="body"/>
 * const mass = findOrDefault(findOrDefault(link, "inertial"), "mass");
 * // link is now <link name="body"><inertial><origin …/><mass value="0"/><inertia …/></inertial></link>
 * ```
 */
export function findOrDefault(parent: Element, type: UrdfElementType): Element {
  const { element, synthesized } = resolveChild(parent, type);
  if (synthesized) {
    parent.appendChild(element);
  }
  return element;
}
