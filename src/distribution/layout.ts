/**
 * Layout helpers for the common "adjacent strips between two edge beams" case:
 * loads given only by their widths are laid end to end, and beams are placed
 * on the outer edges of the loaded region.
 */
import { ConfigurationError } from "./errors.js";
import { createBeam, createLoad } from "./model.js";
import type { Beam, RegionalLoad } from "./types.js";

export interface StripSpec {
  name: string;
  intensity: number;
  width: number;
  length?: number;
  color?: string;
}

export function stackLoads(specs: readonly StripSpec[], origin = 0): RegionalLoad[] {
  let cursor = origin;
  return specs.map((spec) => {
    if (!Number.isFinite(spec.width) || spec.width < 0) {
      throw new ConfigurationError(`Load "${spec.name}" width must be a non-negative number.`);
    }
    const load = createLoad({
      name: spec.name,
      intensity: spec.intensity,
      yStart: cursor,
      yEnd: cursor + spec.width,
      length: spec.length,
      color: spec.color,
    });
    cursor = load.yEnd;
    return load;
  });
}

export function edgeBeams(
  loads: readonly RegionalLoad[],
  names: readonly [string, string],
  length?: number,
): [Beam, Beam] {
  if (loads.length === 0) {
    throw new ConfigurationError("Edge beams need at least one load to locate the edges.");
  }
  const min = loads.reduce((m, l) => Math.min(m, l.yStart), Infinity);
  const max = loads.reduce((m, l) => Math.max(m, l.yEnd), -Infinity);
  return [
    createBeam({ name: names[0], position: min, length }),
    createBeam({ name: names[1], position: max, length }),
  ];
}
