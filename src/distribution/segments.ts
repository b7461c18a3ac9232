/**
 * Segment builder: tags each interval between consecutive critical points
 * with the load that fully covers it. Overlaps resolve first-match-wins in
 * ascending y_start order; uncovered intervals come back as gaps.
 */
import { adjacentPairs } from "./critical-points.js";
import type { Interval, Overlap, RegionalLoad, Segment } from "./types.js";

export interface SegmentBuild {
  segments: Segment[];
  gaps: Interval[];
  overlaps: Overlap[];
}

export function buildSegments(
  points: readonly number[],
  loads: readonly RegionalLoad[],
  tolerance: number,
): SegmentBuild {
  // Stable sort: equal y_start keeps input order
  const ordered = [...loads].sort((a, b) => a.yStart - b.yStart);
  const out: SegmentBuild = { segments: [], gaps: [], overlaps: [] };

  // Loads that have started, in tie-break order. Points only grow, so a load
  // that ends before an interval can never cover a later one.
  let active: RegionalLoad[] = [];
  let next = 0;

  for (const [y1, y2] of adjacentPairs(points)) {
    if (y2 - y1 <= tolerance) continue;

    for (let load = ordered[next]; load && load.yStart <= y1 + tolerance; load = ordered[next]) {
      active.push(load);
      next++;
    }
    active = active.filter((l) => l.yEnd >= y2 - tolerance);

    const winner = active[0];
    if (!winner) {
      const prev = out.gaps[out.gaps.length - 1];
      if (prev && prev.end === y1) {
        out.gaps[out.gaps.length - 1] = { start: prev.start, end: y2 };
      } else {
        out.gaps.push({ start: y1, end: y2 });
      }
      continue;
    }

    if (active.length > 1) {
      out.overlaps.push({ start: y1, end: y2, loadNames: active.map((l) => l.name) });
    }
    out.segments.push({ start: y1, end: y2, loadName: winner.name, intensity: winner.intensity });
  }

  return out;
}
