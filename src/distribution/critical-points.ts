import { ConfigurationError } from "./errors.js";
import type { Beam, CriticalPoints, RegionalLoad } from "./types.js";

/** Sort ascending and drop values within `tolerance` of the last kept value. */
export function sortUnique(values: readonly number[], tolerance: number): number[] {
  const out: number[] = [];
  for (const v of [...values].sort((a, b) => a - b)) {
    const last = out[out.length - 1];
    if (last === undefined || v - last > tolerance) out.push(v);
  }
  return out;
}

export function adjacentPairs(values: readonly number[]): Array<[number, number]> {
  const pairs: Array<[number, number]> = [];
  let prev: number | undefined;
  for (const v of values) {
    if (prev !== undefined) pairs.push([prev, v]);
    prev = v;
  }
  return pairs;
}

function extent(values: readonly number[]): [number, number] {
  let min = Infinity;
  let max = -Infinity;
  for (const v of values) {
    if (v < min) min = v;
    if (v > max) max = v;
  }
  return [min, max];
}

export function extractCriticalPoints(
  loads: readonly RegionalLoad[],
  beams: readonly Beam[],
  tolerance: number,
): CriticalPoints {
  if (loads.length === 0 && beams.length === 0) {
    throw new ConfigurationError(
      "Nothing to distribute: at least one load or one beam is required.",
    );
  }

  const positions = beams.map((b) => b.position);
  const loadEdges = loads.flatMap((l) => [l.yStart, l.yEnd]);

  // Loaded-region extremes, falling back to the beam extremes
  const edges = extent(loads.length > 0 ? loadEdges : positions);
  const boundaries = sortUnique([...positions, ...edges], tolerance);

  return {
    points: sortUnique([...positions, ...boundaries, ...loadEdges], tolerance),
    boundaries,
  };
}
