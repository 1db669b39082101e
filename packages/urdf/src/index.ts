export { UrdfParseError } from "./UrdfParseError.js";
export {
  parseUrdfDocument,
  serializeElement,
  childElements,
  elementsByTagName,
  attrValue,
  attributeNames,
  replaceAttributes,
  formatFloat,
  formatVector,
  parseTriple,
} from "./parseUrdf.js";
export {
  URDF_DEFAULT_SCHEMA,
  INERTIA_ATTRIBUTES,
  createDefaultElement,
  resolveChild,
  findOrDefault,
} from "./defaultTree.js";
export type { UrdfElementType, ShapeElementType, ElementDefaults, ResolvedChild } from "./defaultTree.js";
export { urdfRepresentation } from "./geometryRepresentation.js";
export type { GeometryRepresentation } from "./geometryRepresentation.js";
export { fillLinkWithParameterization } from "./fillLink.js";
export { URDF_XML_DECLARATION, representMultibodyAsUrdfs } from "./representMultibodyAsUrdfs.js";
export type { MultibodyUrdfInput, RepresentOptions } from "./representMultibodyAsUrdfs.js";
export { loadUrdfMultibody } from "./loadUrdfMultibody.js";
export type { UrdfMultibody, UrdfMultibodyOptions } from "./loadUrdfMultibody.js";
export { readUrdfTemplates, writeUrdfs } from "./templates.js";
