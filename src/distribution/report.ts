/**
 * Plain-text report of a distribution result.
 */
import type { BeamResult, DistributionResult } from "./types.js";

const MISMATCH_THRESHOLD = 1e-6;

export interface ReportOptions {
  /** Decimal places for every number (default 3) */
  decimals?: number;
}

function formatBeam(beam: BeamResult, f: (n: number) => string): string[] {
  const lines: string[] = [];
  const zoneWidth = beam.zone.end - beam.zone.start;
  lines.push(`Beam ${beam.name} @ y = ${f(beam.position)} m`);
  lines.push(
    `  Tributary zone: [${f(beam.zone.start)}, ${f(beam.zone.end)}) m (${f(zoneWidth)} m)`,
  );
  if (beam.contributions.length === 0) {
    lines.push("  (no load in tributary zone)");
  }
  for (const c of beam.contributions) {
    lines.push(
      `  ${c.loadName}: ${f(c.value)} kN/m over [${f(c.start)}, ${f(c.end)}) (w = ${f(c.width)} m)`,
    );
  }
  lines.push(`  Total: ${f(beam.total)} kN/m`);
  return lines;
}

export function formatReport(result: DistributionResult, options: ReportOptions = {}): string {
  const decimals = options.decimals ?? 3;
  const f = (n: number) => n.toFixed(decimals);
  const { details } = result;

  const lines: string[] = [];
  lines.push("=== Load Distribution ===");
  lines.push(
    `System: [${f(details.systemMin)}, ${f(details.systemMax)}] m, ` +
      `loaded width ${f(details.loadedWidth)} m, ${result.beams.length} beam(s)`,
  );

  for (const beam of result.beams) {
    lines.push("");
    lines.push(...formatBeam(beam, f));
  }

  lines.push("");
  lines.push(`Applied load: ${f(result.appliedLoad)} kN/m`);
  lines.push(`Distributed load: ${f(result.totalLoad)} kN/m`);

  if (result.beams.length === 0) {
    lines.push("WARNING: no beams, nothing carries the load");
  }
  for (const gap of details.gaps) {
    lines.push(`WARNING: no load covers [${f(gap.start)}, ${f(gap.end)}) m`);
  }
  for (const overlap of details.overlaps) {
    const [governing] = overlap.loadNames;
    lines.push(
      `WARNING: loads ${overlap.loadNames.join(", ")} overlap on ` +
        `[${f(overlap.start)}, ${f(overlap.end)}) m; ${governing ?? "?"} governs`,
    );
  }
  const mismatch = result.totalLoad - result.appliedLoad;
  if (result.beams.length > 0 && Math.abs(mismatch) > MISMATCH_THRESHOLD) {
    lines.push(`WARNING: distributed load differs from applied load by ${f(mismatch)} kN/m`);
  }

  return lines.join("\n");
}
