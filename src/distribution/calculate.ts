/**
 * Tributary-width load distribution: critical points, segments, zones,
 * contributions. Inputs are never touched and results are frozen.
 */
import { computeContributions } from "./contributions.js";
import { extractCriticalPoints } from "./critical-points.js";
import { ConfigurationError } from "./errors.js";
import { loadWidth, resolveTolerance } from "./model.js";
import { buildSegments } from "./segments.js";
import { assignTributaryZones, sortBeams } from "./tributary.js";
import type {
  Beam,
  BeamResult,
  CalculationOptions,
  DistributionResult,
  Interval,
  RegionalLoad,
} from "./types.js";

function fmt({ start, end }: Interval): string {
  const r = (n: number) => Math.round(n * 1e6) / 1e6;
  return `[${r(start)}, ${r(end)})`;
}

export function calculate(
  loads: readonly RegionalLoad[],
  beams: readonly Beam[],
  options: CalculationOptions = {},
): DistributionResult {
  const tolerance = resolveTolerance(options.tolerance);

  const { points, boundaries } = extractCriticalPoints(loads, beams, tolerance);
  const systemMin = boundaries[0] ?? 0;
  const systemMax = boundaries[boundaries.length - 1] ?? systemMin;

  const { segments, gaps, overlaps } = buildSegments(points, loads, tolerance);

  const overlap = overlaps[0];
  if (options.overlapPolicy === "error" && overlap) {
    throw new ConfigurationError(`Loads ${overlap.loadNames.join(", ")} overlap on ${fmt(overlap)}.`);
  }
  const gap = gaps[0];
  if (options.gapPolicy === "error" && gap) {
    throw new ConfigurationError(`No load covers ${fmt(gap)}.`);
  }

  const ordered = sortBeams(beams);
  const zones = assignTributaryZones(ordered, systemMin, systemMax);
  const zoneLoads = computeContributions(zones, segments, tolerance);

  const results: BeamResult[] = ordered.map((beam, i) => {
    const zone = zones[i];
    const zoneLoad = zoneLoads[i];
    if (!zone || !zoneLoad) {
      throw new Error(`Missing tributary zone for beam "${beam.name}".`);
    }
    return Object.freeze({
      name: beam.name,
      position: beam.position,
      length: beam.length,
      zone: Object.freeze({ start: zone.lower, end: zone.upper }),
      contributions: Object.freeze(zoneLoad.contributions.map((c) => Object.freeze(c))),
      total: zoneLoad.total,
    });
  });

  return Object.freeze({
    beams: Object.freeze(results),
    details: Object.freeze({
      points,
      boundaries,
      systemMin,
      systemMax,
      segments,
      zones,
      gaps,
      overlaps,
      loadedWidth: loads.reduce((sum, l) => sum + loadWidth(l), 0),
      tolerance,
    }),
    totalLoad: results.reduce((sum, b) => sum + b.total, 0),
    appliedLoad: loads.reduce((sum, l) => sum + l.intensity * loadWidth(l), 0),
  });
}
