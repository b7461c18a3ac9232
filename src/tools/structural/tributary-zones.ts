/**
 * Tributary zone tool for loadshare.
 *
 * Lists the strip of the transverse axis each beam is responsible for, without
 * evaluating any load. Loads, when given, only extend the system boundary.
 */
import {
  assignTributaryZones,
  ConfigurationError,
  extractCriticalPoints,
  parseModel,
  resolveTolerance,
} from "../../distribution/index.js";
import type { ToolDefinition, ToolResult } from "../types.js";
import { BEAM_SCHEMA, LOAD_SCHEMA } from "./load-distribution.js";

function round4(n: number): number {
  return Math.round(n * 10000) / 10000;
}

export function createTributaryZonesToolDefinition(): ToolDefinition {
  return {
    name: "structural_tributary_zones",
    label: "Tributary Zones",
    description:
      "Compute the tributary zone of each beam along the transverse axis: from the midpoint with " +
      "the previous beam to the midpoint with the next one, with the first and last beams reaching " +
      "out to the system boundary (the loaded region, or the outermost beams when no loads are given).",
    parameters: {
      type: "object",
      properties: {
        beams: {
          type: "array",
          description: "Beams (supports) on the transverse axis.",
          items: BEAM_SCHEMA,
        },
        loads: {
          type: "array",
          description: "Optional regional loads; they widen the system boundary to the loaded region.",
          items: LOAD_SCHEMA,
        },
        tolerance: {
          type: "number",
          description: "Coordinate tolerance in metres (default 1e-9).",
          minimum: 0,
        },
      },
      required: ["beams"],
    },
    execute: async (_toolCallId: string, args: unknown): Promise<ToolResult> => {
      const { loads, beams, options } = parseModel(args ?? {});
      if (beams.length === 0) {
        throw new ConfigurationError("beams must be a non-empty array.");
      }
      if (options.gapPolicy || options.overlapPolicy) {
        throw new ConfigurationError(
          "gap_policy and overlap_policy apply to load distribution, not to tributary zones.",
        );
      }
      const tolerance = resolveTolerance(options.tolerance);

      const { boundaries } = extractCriticalPoints(loads, beams, tolerance);
      const systemMin = boundaries[0] ?? 0;
      const systemMax = boundaries[boundaries.length - 1] ?? systemMin;
      const zones = assignTributaryZones(beams, systemMin, systemMax);

      const rows = zones.map((z) => ({
        beam: z.beamName,
        position_m: z.position,
        lower_m: round4(z.lower),
        upper_m: round4(z.upper),
        width_m: round4(z.upper - z.lower),
      }));

      const summary = [
        `Tributary zones over [${round4(systemMin)}, ${round4(systemMax)}] m:`,
        ...rows.map(
          (r) => `  ${r.beam} @ ${r.position_m} m: [${r.lower_m}, ${r.upper_m}) m, width ${r.width_m} m`,
        ),
      ];

      return {
        content: [
          { type: "text", text: summary.join("\n") },
          { type: "text", text: JSON.stringify({ system_m: [systemMin, systemMax], zones: rows }, null, 2) },
        ],
        details: { beam_count: zones.length },
      };
    },
  };
}
