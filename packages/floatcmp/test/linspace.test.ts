import { describe, expect, it } from "vitest";

import { InvalidArgumentError } from "@floatcmp/core";

import { approxEqual } from "../src/approxEqual.js";
import { cumulativeDrift, linspace, linspaceByIndex, samplesByIndex } from "../src/linspace.js";

describe("linspaceByIndex", () => {
  it("is a single multiplication", () => {
    expect(linspaceByIndex(3, 0.1)).toBe(3 * 0.1);
    expect(linspaceByIndex(3, 0.1)).toBe(0.30000000000000004);
    expect(linspaceByIndex(-4, 0.25)).toBe(-1);
  });

  it("yields zeros for a zero step", () => {
    expect(samplesByIndex(1, 4, 0)).toEqual([0, 0, 0, 0]);
  });

  it("descends for a negative step", () => {
    expect(samplesByIndex(1, 3, -0.5)).toEqual([-0.5, -1, -1.5]);
  });

  it("rejects non-integer indices", () => {
    expect(() => linspaceByIndex(1.5, 0.1)).toThrow(InvalidArgumentError);
    expect(() => linspaceByIndex(Number.NaN, 0.1)).toThrow("index must be an integer (got NaN)");
  });

  it("accepts exact integers beyond 2^53", () => {
    expect(linspaceByIndex(2 ** 60, 0.5)).toBe(2 ** 59);
    expect(linspaceByIndex(-(2 ** 60), 2)).toBe(-(2 ** 61));
  });

  it("produces 0.0 .. 1.0 for i = 0..10 without drift", () => {
    const samples: number[] = [];
    for (let i = 0; i <= 10; i++) {
      samples.push(linspaceByIndex(i, 0.1));
    }

    expect(samples).toHaveLength(11);
    samples.forEach((v, i) => {
      expect(approxEqual(v, i * 0.1, 1e-10)).toBe(true);
    });

    // Same bits whether or not the earlier samples were computed.
    expect(samples[10]).toBe(linspaceByIndex(10, 0.1));
    expect(samples[10]).toBe(1);
  });

  it("differs from a running sum that accumulates rounding error", () => {
    let running = 0;
    for (let i = 0; i < 10; i++) {
      running += 0.1;
    }

    expect(running).toBe(0.9999999999999999);
    expect(linspaceByIndex(10, 0.1)).toBe(1);
  });

  it("is independent of call history", () => {
    const fresh = linspaceByIndex(7, 0.3);
    samplesByIndex(-1000, 1000, 0.3);
    expect(linspaceByIndex(7, 0.3)).toBe(fresh);
  });
});

describe("samplesByIndex", () => {
  it("includes both bounds", () => {
    expect(samplesByIndex(0, 4, 0.25)).toEqual([0, 0.25, 0.5, 0.75, 1]);
  });

  it("counts down when last < first", () => {
    expect(samplesByIndex(3, 1, 0.5)).toEqual([1.5, 1, 0.5]);
  });

  it("returns a single sample for equal bounds", () => {
    expect(samplesByIndex(2, 2, 0.5)).toEqual([1]);
  });

  it("rejects non-integer bounds", () => {
    expect(() => samplesByIndex(0, 2.5, 1)).toThrow("last must be a safe integer (got 2.5)");
  });
});

describe("linspace", () => {
  it("spaces samples evenly over [start, stop]", () => {
    expect(linspace(0, 1, 5)).toEqual([0, 0.25, 0.5, 0.75, 1]);
    expect(linspace(1, 0, 3)).toEqual([1, 0.5, 0]);
  });

  it("derives each sample from its index and pins the endpoint", () => {
    const samples = linspace(0, 1, 11);
    expect(samples).toHaveLength(11);
    expect(samples[3]).toBe(3 * 0.1);
    expect(samples[10]).toBe(1);
  });

  it("stays finite when the span overflows", () => {
    expect(linspace(-1e308, 1e308, 3)).toEqual([-1e308, 0, 1e308]);

    const wide = linspace(-1.5e308, 1.5e308, 7);
    expect(wide).toHaveLength(7);
    expect(wide.every(Number.isFinite)).toBe(true);
    expect(wide[0]).toBe(-1.5e308);
    expect(wide[6]).toBe(1.5e308);
  });

  it("handles degenerate counts", () => {
    expect(linspace(2, 5, 0)).toEqual([]);
    expect(linspace(2, 5, 1)).toEqual([2]);
  });

  it("rejects invalid arguments", () => {
    expect(() => linspace(0, 1, -1)).toThrow("count must be >= 0 (got -1)");
    expect(() => linspace(0, 1, 2.5)).toThrow(InvalidArgumentError);
    expect(() => linspace(0, Infinity, 3)).toThrow(InvalidArgumentError);
  });
});

describe("cumulativeDrift", () => {
  it("reports the error a running sum accumulates", () => {
    const drift = cumulativeDrift(10, 0.1);
    expect(drift).toBeGreaterThan(0);
    expect(drift).toBeLessThan(1e-10);
    expect(cumulativeDrift(1000, 0.1)).toBeGreaterThanOrEqual(drift);
  });

  it("is zero when every partial sum is exact", () => {
    expect(cumulativeDrift(64, 0.5)).toBe(0);
    expect(cumulativeDrift(0, 0.1)).toBe(0);
  });

  it("rejects negative counts", () => {
    expect(() => cumulativeDrift(-1, 0.1)).toThrow(InvalidArgumentError);
  });
});
