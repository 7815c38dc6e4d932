import { InvalidArgumentError, assertInteger, assertSafeInteger } from "@floatcmp/core";

/**
 * The `index`-th sample of a sequence spaced by `step`: `index * step`.
 *
 * Each sample comes from one multiplication of exact inputs, so it never
 * carries rounding error from earlier samples. `linspaceByIndex(10, 0.1)` is
 * the same bits no matter how many samples were produced before it.
 *
 * Throws {@link InvalidArgumentError} when `index` is not an integer.
 */
export function linspaceByIndex(index: number, step: number): number {
  assertInteger(index, "index");
  return index * step;
}

/**
 * Samples for every integer index from `first` to `last` inclusive.
 *
 * Counts down when `last < first`.
 */
export function samplesByIndex(first: number, last: number, step: number): number[] {
  assertSafeInteger(first, "first");
  assertSafeInteger(last, "last");

  const out: number[] = [];
  const dir = last >= first ? 1 : -1;
  for (let i = first; dir > 0 ? i <= last : i >= last; i += dir) {
    out.push(linspaceByIndex(i, step));
  }
  return out;
}

function assertCount(count: number): void {
  assertSafeInteger(count, "count");
  if (count < 0) {
    throw new InvalidArgumentError(`count must be >= 0 (got ${count})`);
  }
}

/**
 * `count` evenly spaced samples over `[start, stop]`.
 *
 * Samples are `start + i * delta`; the final sample is pinned to `stop`.
 * When `stop - start` overflows, the step is taken per endpoint instead.
 */
export function linspace(start: number, stop: number, count: number): number[] {
  if (!Number.isFinite(start) || !Number.isFinite(stop)) {
    throw new InvalidArgumentError(`start and stop must be finite (got ${start}, ${stop})`);
  }
  assertCount(count);

  if (count === 0) return [];
  if (count === 1) return [start];

  const intervals = count - 1;
  const delta = (stop - start) / intervals;
  const out: number[] = [];
  if (Number.isFinite(delta)) {
    for (let i = 0; i < intervals; i++) {
      out.push(start + linspaceByIndex(i, delta));
    }
  } else {
    const stopStep = stop / intervals;
    const startStep = start / intervals;
    for (let i = 0; i < intervals; i++) {
      out.push(start + linspaceByIndex(i, stopStep) - linspaceByIndex(i, startStep));
    }
  }
  out.push(stop);
  return out;
}

/**
 * Largest absolute gap, over indices `0..count`, between a running sum of
 * `step` and {@link linspaceByIndex}.
 */
export function cumulativeDrift(count: number, step: number): number {
  assertCount(count);

  let running = 0;
  let worst = 0;
  for (let i = 1; i <= count; i++) {
    running += step;
    worst = Math.max(worst, Math.abs(running - linspaceByIndex(i, step)));
  }
  return worst;
}
