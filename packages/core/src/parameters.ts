import { z } from "zod";
import { ConfigurationError } from "./ConfigurationError.js";
import { PI_DIMENSION } from "./inertia.js";

/** One body's `pi` vector: ten finite numbers. */
export const ParameterRowSchema = z.array(z.number().finite()).length(PI_DIMENSION);

export type ParameterRow = readonly number[];

/**
 * Check that `matrix` has one valid row per body identifier.
 *
 * @throws {ConfigurationError} naming the first offending body (a bad row or
 *   a repeated identifier), or the row count when it does not match.
 */
export function validateParameterMatrix(
  matrix: readonly ParameterRow[],
  bodyIds: readonly string[],
): void {
  if (matrix.length !== bodyIds.length) {
    throw new ConfigurationError(
      "parameter matrix",
      `expected ${bodyIds.length} rows (one per inertial body), got ${matrix.length}.`,
    );
  }
  const seen = new Set<string>();
  for (const bodyId of bodyIds) {
    if (seen.has(bodyId)) {
      throw new ConfigurationError(bodyId, "body identifier appears more than once in the body list.");
    }
    seen.add(bodyId);
  }
  matrix.forEach((row, index) => {
    const result = ParameterRowSchema.safeParse(row);
    if (!result.success) {
      const reason = result.error.issues.map((issue) => issue.message).join("; ");
      throw new ConfigurationError(bodyIds[index], `invalid parameter row: ${reason}`);
    }
  });
}
