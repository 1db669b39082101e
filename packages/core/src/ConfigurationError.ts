/**
 * Thrown when the multibody topology or the data aligned to it cannot be
 * interpreted: an ambiguous free-base body, a floating joint that is not
 * quaternion-parameterized, a duplicate body identifier, or a parameter
 * matrix that does not line up with the body list.
 *
 * @example
 * ```ts
 * try {
 *   buildStateSpace(topology);
 * } catch (err) {
 *   if (err instanceof ConfigurationError) {
 *     console.error(`Bad model: ${err.subject}`);
 *   }
 * }
 * ```
 */
export class ConfigurationError extends Error {
  /** Identifier of the model instance, body or row at fault. */
  readonly subject: string;

  constructor(subject: string, detail: string) {
    super(`Invalid configuration for "${subject}": ${detail}`);
    this.name = "ConfigurationError";
    this.subject = subject;
  }
}
