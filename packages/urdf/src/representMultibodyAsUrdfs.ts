import {
  ConfigurationError,
  LookupError,
  silentLogger,
  uniqueBodyIdentifier,
  validateParameterMatrix,
  WORLD_BODY_NAME,
  type CollisionGeometry,
  type Logger,
  type MultibodyTopology,
  type ParameterRow,
} from "@multibody-urdf/core";
import { fillLinkWithParameterization } from "./fillLink.js";
import { attrValue, elementsByTagName, parseUrdfDocument, serializeElement } from "./parseUrdf.js";

/** Declaration every exported document starts with. */
export const URDF_XML_DECLARATION = '<?xml version="1.0"?>';

/**
 * Everything one export needs. All fields are read, never written.
 */
export interface MultibodyUrdfInput {
  /** Template URDF text per model name; each name is a model instance name. */
  readonly urdfs: Readonly<Record<string, string>>;
  /** Inertial body identifiers, in parameter-row order. */
  readonly inertialBodyIds: readonly string[];
  /** Indices into `geometries` per body identifier. */
  readonly geometryBodyAssignment: ReadonlyMap<string, readonly number[]>;
  readonly geometries: readonly CollisionGeometry[];
  /** One `pi` row per entry of `inertialBodyIds`. */
  readonly parameters: readonly ParameterRow[];
  readonly topology: MultibodyTopology;
}

export interface RepresentOptions {
  logger?: Logger;
  /**
   * When `true`, every inertial body of a model must be matched by exactly
   * one `<link>` and every named link must be a body of the model (or the
   * world); otherwise the export fails instead of leaving bodies unwritten.
   * Defaults to `false`.
   */
  verifyLinkBijection?: boolean;
}

interface ExportContext {
  readonly input: MultibodyUrdfInput;
  readonly rowIndex: ReadonlyMap<string, number>;
  readonly logger: Logger;
  readonly verifyLinkBijection: boolean;
}

function bodyGeometries(ctx: ExportContext, bodyId: string): CollisionGeometry[] {
  const indices = ctx.input.geometryBodyAssignment.get(bodyId) ?? [];
  return indices.map((index) => {
    const geometry = ctx.input.geometries[index];
    if (geometry === undefined) {
      throw new LookupError(`Geometry for body "${bodyId}" at index`, String(index));
    }
    return geometry;
  });
}

function verifyBijection(
  ctx: ExportContext,
  modelName: string,
  bodyIds: readonly string[],
  linkCounts: ReadonlyMap<string, number>,
): void {
  const problems: string[] = [];
  for (const bodyId of bodyIds) {
    const count = linkCounts.get(bodyId) ?? 0;
    if (count !== 1) {
      problems.push(`body "${bodyId}" matched by ${count} links`);
    }
  }
  for (const bodyId of linkCounts.keys()) {
    if (!bodyIds.includes(bodyId)) {
      problems.push(`link "${bodyId}" has no body`);
    }
  }
  if (problems.length > 0) {
    ctx.logger.error("Link/body mismatch", { model: modelName, problems });
    throw new ConfigurationError(modelName, `links do not match bodies one-to-one: ${problems.join("; ")}.`);
  }
}

function representModel(ctx: ExportContext, modelName: string, template: string): string {
  const { topology, parameters } = ctx.input;
  const instance = topology.getModelInstanceByName(modelName);
  const instanceName = topology.modelInstanceName(instance);
  const doc = parseUrdfDocument(template);

  // Links of this model keyed by body identifier; the world link is not a body.
  const linkCounts = new Map<string, number>();
  let written = 0;

  for (const link of elementsByTagName(doc, "link")) {
    const linkName = attrValue(link, "name");
    if (linkName === undefined) {
      ctx.logger.warn("Skipping <link> without a name", { model: modelName });
      continue;
    }
    const bodyId = uniqueBodyIdentifier(instanceName, linkName);
    if (linkName !== WORLD_BODY_NAME) {
      linkCounts.set(bodyId, (linkCounts.get(bodyId) ?? 0) + 1);
    }

    const row = ctx.rowIndex.get(bodyId);
    if (row === undefined) {
      ctx.logger.debug("Leaving non-inertial link unchanged", { model: modelName, bodyId });
      continue;
    }
    fillLinkWithParameterization(link, parameters[row], bodyGeometries(ctx, bodyId));
    written++;
  }

  if (ctx.verifyLinkBijection) {
    const bodyIds = topology
      .bodies(instance)
      .map((body) => uniqueBodyIdentifier(instanceName, body.name))
      .filter((bodyId) => ctx.rowIndex.has(bodyId));
    verifyBijection(ctx, modelName, bodyIds, linkCounts);
  }

  ctx.logger.debug("Rendered URDF", { model: modelName, links: written });
  return `${URDF_XML_DECLARATION}\n${serializeElement(doc.documentElement)}`;
}

/**
 * Render the current inertial parameters and collision geometry of a
 * multibody system as one URDF document per model.
 *
 * Each template is parsed afresh, so repeated exports never see each
 * other's edits. Every `<link>` whose `"{instance}_{name}"` identifier is an
 * inertial body gets that body's parameter row; all other links (the world,
 * for one) are left exactly as written.
 *
 * The link `name` is assumed to equal the simulator's body name. Pass
 * `verifyLinkBijection` to fail on templates where that does not hold.
 *
 * @returns URDF text per model name, each starting with
 *   {@link URDF_XML_DECLARATION}.
 * @throws {LookupError} if a model name is not a model instance.
 * @throws {ConfigurationError} if the parameter matrix does not match the
 *   body list.
 * @throws {UnsupportedConfigurationError} if a body has several geometries.
 * @throws {UnsupportedGeometryError} if a geometry cannot be written.
 */
export function representMultibodyAsUrdfs(
  input: MultibodyUrdfInput,
  options: RepresentOptions = {},
): Record<string, string> {
  const { logger = silentLogger, verifyLinkBijection = false } = options;
  validateParameterMatrix(input.parameters, input.inertialBodyIds);

  const ctx: ExportContext = {
    input,
    rowIndex: new Map(input.inertialBodyIds.map((bodyId, index) => [bodyId, index])),
    logger,
    verifyLinkBijection,
  };

  const out: Record<string, string> = {};
  for (const [modelName, template] of Object.entries(input.urdfs)) {
    out[modelName] = representModel(ctx, modelName, template);
  }
  logger.info("Exported URDFs", { models: Object.keys(out) });
  return out;
}
