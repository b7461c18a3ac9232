import { describe, expect, it } from "vitest";
import {
  ConfigurationError,
  createBeam,
  createLoad,
  extractCriticalPoints,
  sortUnique,
} from "../src/distribution/index.js";

const load = (name: string, yStart: number, yEnd: number, intensity = -1) =>
  createLoad({ name, intensity, yStart, yEnd });
const beam = (name: string, position: number) => createBeam({ name, position });

describe("sortUnique", () => {
  it("sorts and merges values closer than the tolerance", () => {
    expect(sortUnique([3, 1, 1 + 5e-10, 2], 1e-9)).toEqual([1, 2, 3]);
  });

  it("keeps values just outside the tolerance", () => {
    expect(sortUnique([0, 2e-9], 1e-9)).toEqual([0, 2e-9]);
  });
});

describe("extractCriticalPoints", () => {
  it("rejects an empty model", () => {
    expect(() => extractCriticalPoints([], [], 1e-9)).toThrow(ConfigurationError);
  });

  it("collects load edges and beam positions", () => {
    const cp = extractCriticalPoints(
      [load("F", 0, 0.2), load("G", 0.2, 1.0)],
      [beam("B1", 0), beam("B2", 1)],
      1e-9,
    );
    expect(cp.points).toEqual([0, 0.2, 1]);
    expect(cp.boundaries).toEqual([0, 1]);
  });

  it("falls back to the beam extremes without loads", () => {
    const cp = extractCriticalPoints([], [beam("B2", 3), beam("B1", 1)], 1e-9);
    expect(cp.points).toEqual([1, 3]);
    expect(cp.boundaries).toEqual([1, 3]);
  });

  it("uses the load extremes without beams", () => {
    const cp = extractCriticalPoints([load("A", 2, 5)], [], 1e-9);
    expect(cp.boundaries).toEqual([2, 5]);
    expect(cp.points).toEqual([2, 5]);
  });

  it("extends the boundary to beams outside the loaded region", () => {
    const cp = extractCriticalPoints([load("A", 0, 1)], [beam("B", 2)], 1e-9);
    expect(cp.boundaries).toEqual([0, 1, 2]);
    expect(cp.points).toEqual([0, 1, 2]);
  });

  it("deduplicates coordinates within the tolerance", () => {
    const cp = extractCriticalPoints([load("A", 0, 0.5)], [beam("B", 0.5 + 1e-10)], 1e-9);
    expect(cp.points).toHaveLength(2);
    expect(cp.points[0]).toBe(0);
  });
});
