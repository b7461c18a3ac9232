/**
 * Contribution calculator: intersects each tributary zone with the segments.
 * One contribution per segment, so a report can show where each value came from.
 */
import type { Contribution, Segment, TributaryZone } from "./types.js";

export interface ZoneLoad {
  contributions: Contribution[];
  total: number;
}

/** `from` lets callers skip segments known to end before the zone. */
export function computeZoneLoad(
  zone: TributaryZone,
  segments: readonly Segment[],
  tolerance: number,
  from = 0,
): ZoneLoad {
  const contributions: Contribution[] = [];
  let total = 0;

  for (let i = from; i < segments.length; i++) {
    const seg = segments[i];
    // Segments are ascending, nothing past the zone can intersect it
    if (!seg || seg.start >= zone.upper) break;
    const start = Math.max(zone.lower, seg.start);
    const end = Math.min(zone.upper, seg.end);
    const width = end - start;
    if (width <= tolerance) continue;

    const value = seg.intensity * width;
    contributions.push({ loadName: seg.loadName, start, end, width, value });
    total += value;
  }

  return { contributions, total };
}

/** Zones must be ascending, as `assignTributaryZones` returns them. */
export function computeContributions(
  zones: readonly TributaryZone[],
  segments: readonly Segment[],
  tolerance: number,
): ZoneLoad[] {
  let first = 0;
  return zones.map((zone) => {
    for (let seg = segments[first]; seg && seg.end <= zone.lower; seg = segments[first]) first++;
    return computeZoneLoad(zone, segments, tolerance, first);
  });
}
