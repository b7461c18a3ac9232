/**
 * Each beam takes the axis up to the midpoint with its neighbours; the first
 * and last beams reach out to the system boundary.
 */
import type { Beam, TributaryZone } from "./types.js";

export function sortBeams(beams: readonly Beam[]): Beam[] {
  return [...beams].sort((a, b) => a.position - b.position);
}

export function assignTributaryZones(
  beams: readonly Beam[],
  systemMin: number,
  systemMax: number,
): TributaryZone[] {
  const ordered = sortBeams(beams);
  return ordered.map((beam, i) => {
    const prev = ordered[i - 1];
    const next = ordered[i + 1];
    return {
      beamName: beam.name,
      position: beam.position,
      lower: prev ? (prev.position + beam.position) / 2 : systemMin,
      upper: next ? (beam.position + next.position) / 2 : systemMax,
    };
  });
}
