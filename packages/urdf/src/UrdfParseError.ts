/**
 * Thrown when a URDF document cannot be parsed or lacks the structure every
 * URDF must have (a `<robot>` root, declared links for every joint).
 */
export class UrdfParseError extends Error {
  constructor(detail: string) {
    super(`Invalid URDF: ${detail}`);
    this.name = "UrdfParseError";
  }
}
