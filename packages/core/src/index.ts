/** Error thrown when a caller passes an argument outside a function's domain. */
export class InvalidArgumentError extends Error {
  override name = "InvalidArgumentError";
}

/**
* Exhaustiveness helper for `switch` statements.
*
* Throws an error if called.
*/
export function assertNever(value: never, message = "Unexpected value"): never {
  throw new Error(`${message}: ${String(value)}`);
}

/**
* Throw {@link InvalidArgumentError} naming `label` unless `value` is an integer.
*
* Any magnitude is accepted, including exact integers beyond 2^53.
*/
export function assertInteger(value: number, label: string): void {
  if (!Number.isInteger(value)) {
    throw new InvalidArgumentError(`${label} must be an integer (got ${String(value)})`);
  }
}

/**
* Throw {@link InvalidArgumentError} naming `label` unless `value` is a safe
* integer (no fractional values, no `NaN`, no `Infinity`, at most 2^53 - 1).
*/
export function assertSafeInteger(value: number, label: string): void {
  if (!Number.isSafeInteger(value)) {
    throw new InvalidArgumentError(`${label} must be a safe integer (got ${String(value)})`);
  }
}

/**
* Throw {@link InvalidArgumentError} unless `value` is non-negative. `Infinity` is allowed; `NaN` is not.
*/
export function assertNonNegative(value: number, label: string): void {
  if (Number.isNaN(value) || value < 0) {
    throw new InvalidArgumentError(`${label} must be >= 0 (got ${String(value)})`);
  }
}
