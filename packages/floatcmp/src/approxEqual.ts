import { InvalidArgumentError, assertNonNegative } from "@floatcmp/core";

import { DEFAULT_TOLERANCE } from "./epsilon.js";

/**
 * `true` iff `Math.abs(a - b) < tol`.
 *
 * - The inequality is strict, so `tol = 0` never matches.
 * - `NaN` on either side yields `false`.
 * - Equal infinities yield `false` (`Infinity - Infinity` is `NaN`); see
 *   {@link isClose} with `infinities: "identical"` when they should match.
 *
 * Throws {@link InvalidArgumentError} for a negative or `NaN` tolerance.
 */
export function approxEqual(a: number, b: number, tol: number = DEFAULT_TOLERANCE): boolean {
  assertNonNegative(tol, "tol");
  return Math.abs(a - b) < tol;
}

export type InfinityMode = "distinct" | "identical";

export type CloseOptions = {
  /** Absolute tolerance (defaults to {@link DEFAULT_TOLERANCE}). */
  abs?: number;

  /**
   * Relative tolerance, scaled by `max(|a|, |b|)` (defaults to 0).
   *
   * The larger magnitude is used so the result does not depend on argument order.
   */
  rel?: number;

  /** `"identical"` treats two same-signed infinities as close. Defaults to `"distinct"`. */
  infinities?: InfinityMode;
};

/**
 * Combined absolute/relative comparison.
 *
 * Close when `diff < abs` or `diff < rel * max(|a|, |b|)`.
 */
export function isClose(a: number, b: number, opts: CloseOptions = {}): boolean {
  const abs = opts.abs ?? DEFAULT_TOLERANCE;
  const rel = opts.rel ?? 0;
  const infinities = opts.infinities ?? "distinct";

  assertNonNegative(abs, "abs");
  assertNonNegative(rel, "rel");
  if (infinities !== "distinct" && infinities !== "identical") {
    throw new InvalidArgumentError(`infinities must be "distinct" or "identical" (got ${String(infinities)})`);
  }

  if (infinities === "identical" && !Number.isFinite(a) && !Number.isNaN(a) && Object.is(a, b)) {
    return true;
  }

  const diff = Math.abs(a - b);
  if (diff < abs) return true;

  const scale = Math.max(Math.abs(a), Math.abs(b));
  return diff < rel * scale;
}
