import { InvalidArgumentError, assertNever, assertNonNegative } from "@floatcmp/core";

/** IEEE-754 binary formats a tolerance can be derived for. */
export type Precision = "float64" | "float32";

export const FLOAT64_EPSILON = Number.EPSILON; // 2^-52
export const FLOAT32_EPSILON = 2 ** -23;

/** Multiple of machine epsilon used when no tolerance is given. */
export const DEFAULT_EPSILON_MULTIPLE = 10;

/** `10 * Number.EPSILON`, roughly `2.22e-15`. */
export const DEFAULT_TOLERANCE = DEFAULT_EPSILON_MULTIPLE * FLOAT64_EPSILON;

export function isPrecision(value: unknown): value is Precision {
  return value === "float64" || value === "float32";
}

/**
 * Smallest `eps` such that `1 + eps !== 1` at the given precision.
 */
export function machineEpsilon(precision: Precision = "float64"): number {
  if (!isPrecision(precision)) {
    throw new InvalidArgumentError(`unknown precision: ${String(precision)}`);
  }

  switch (precision) {
    case "float64":
      return FLOAT64_EPSILON;
    case "float32":
      return FLOAT32_EPSILON;
    default:
      return assertNever(precision);
  }
}

/**
 * Tolerance derived as `multiple * machineEpsilon(precision)`.
 */
export function epsilonTolerance(
  multiple: number = DEFAULT_EPSILON_MULTIPLE,
  precision: Precision = "float64",
): number {
  if (!Number.isFinite(multiple)) {
    throw new InvalidArgumentError(`multiple must be finite (got ${String(multiple)})`);
  }
  assertNonNegative(multiple, "multiple");
  return multiple * machineEpsilon(precision);
}
