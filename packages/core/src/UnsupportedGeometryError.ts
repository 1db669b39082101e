/**
 * Thrown when a collision geometry has no URDF encoding.
 */
export class UnsupportedGeometryError extends Error {
  /** Name of the geometry variant, e.g. `"polygon"`. */
  readonly variant: string;

  constructor(variant: string, message = `Unsupported geometry "${variant}" for URDF representation.`) {
    super(message);
    this.name = "UnsupportedGeometryError";
    this.variant = variant;
  }
}

/**
 * Thrown for a known geometry variant whose export is not implemented.
 * Polygons are usable for contact computation but cannot be written to URDF.
 */
export class UnsupportedOperationError extends UnsupportedGeometryError {
  constructor(variant: string) {
    super(variant, `URDF representation of "${variant}" geometry is not implemented.`);
    this.name = "UnsupportedOperationError";
  }
}
