/**
 * Thrown when a name or index does not resolve against the live topology or
 * the geometry table, e.g. a URDF template whose model name was never
 * registered as a model instance.
 */
export class LookupError extends Error {
  /** The key that failed to resolve. */
  readonly key: string;

  constructor(kind: string, key: string) {
    super(`${kind} "${key}" not found.`);
    this.name = "LookupError";
    this.key = key;
  }
}
