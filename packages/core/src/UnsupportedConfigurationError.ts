/**
 * Thrown when a body carries more collision geometries than a URDF link
 * export can hold (currently one).
 */
export class UnsupportedConfigurationError extends Error {
  /** Identifier of the offending body or link. */
  readonly bodyId: string;

  constructor(bodyId: string, detail: string) {
    super(`Unsupported configuration for "${bodyId}": ${detail}`);
    this.name = "UnsupportedConfigurationError";
    this.bodyId = bodyId;
  }
}
