/**
 * Tributary load distribution tool for loadshare.
 *
 * Distributes regional (area) loads onto parallel beams by the tributary-width
 * rule: every beam carries the load up to halfway to its neighbours, and the
 * outermost beams carry everything out to the edge of the system. Returns the
 * itemized line load on each beam and can draw the layout as SVG.
 */
import {
  calculate,
  formatReport,
  parseModel,
  renderDiagram,
  writeDiagram,
} from "../../distribution/index.js";
import type { DistributionResult } from "../../distribution/index.js";
import type { ToolDefinition, ToolResult } from "../types.js";

// ─── Parameter schemas ───────────────────────────────────────────────────────

export const LOAD_SCHEMA = {
  type: "object",
  properties: {
    name: { type: "string", description: "Load identifier (e.g. 'F_0_L')." },
    intensity: {
      type: "number",
      description: "Area load intensity in kN/m². Negative = downward.",
    },
    y_start: {
      type: "number",
      description: "Start of the load strip on the transverse axis (m).",
    },
    y_end: {
      type: "number",
      description: "End of the load strip on the transverse axis (m). Must be >= y_start.",
    },
    width: {
      type: "number",
      description:
        "Strip width (m). Used instead of y_start/y_end: the strip starts where the previous load ends.",
      minimum: 0,
    },
    length: {
      type: "number",
      description: "Extent along the beams (m). Only used for the diagram.",
    },
    color: { type: "string", description: "Fill colour in the diagram." },
  },
  required: ["name", "intensity"],
} as const;

export const BEAM_SCHEMA = {
  type: "object",
  properties: {
    name: { type: "string", description: "Beam identifier (e.g. 'P_L0_S0')." },
    position: { type: "number", description: "Beam position on the transverse axis (m)." },
    length: { type: "number", description: "Beam length (m). Only used for the diagram." },
  },
  required: ["name", "position"],
} as const;

// ─── Utility ─────────────────────────────────────────────────────────────────

function round4(n: number): number {
  return Math.round(n * 10000) / 10000;
}

function summarize(result: DistributionResult, outputPath: string | undefined) {
  return {
    system_m: [round4(result.details.systemMin), round4(result.details.systemMax)],
    loaded_width_m: round4(result.details.loadedWidth),
    applied_load_kn_per_m: round4(result.appliedLoad),
    distributed_load_kn_per_m: round4(result.totalLoad),
    beams: result.beams.map((b) => ({
      name: b.name,
      position_m: b.position,
      tributary_zone_m: [round4(b.zone.start), round4(b.zone.end)],
      contributions: b.contributions.map((c) => ({
        load: c.loadName,
        start_m: round4(c.start),
        end_m: round4(c.end),
        width_m: round4(c.width),
        value_kn_per_m: round4(c.value),
      })),
      total_kn_per_m: round4(b.total),
    })),
    gaps_m: result.details.gaps.map((g) => [round4(g.start), round4(g.end)]),
    overlaps: result.details.overlaps.map((o) => ({
      loads: o.loadNames,
      interval_m: [round4(o.start), round4(o.end)],
    })),
    output_path: outputPath,
  };
}

// ─── Tool definition ─────────────────────────────────────────────────────────

export function createLoadDistributionToolDefinition(): ToolDefinition {
  return {
    name: "structural_load_distribution",
    label: "Load Distribution",
    description:
      "Distribute regional (area) loads onto parallel beams using tributary widths. " +
      "Each beam takes the load up to the midpoint with its neighbours; edge beams take the load " +
      "out to the edge of the loaded region. Returns per-beam line loads (kN/m) itemized by load " +
      "and interval, and can save a plan-view SVG of loads, beams and tributary zones.",
    parameters: {
      type: "object",
      properties: {
        loads: {
          type: "array",
          description: "Regional loads. Give each either y_start/y_end or width.",
          items: LOAD_SCHEMA,
        },
        beams: {
          type: "array",
          description: "Beams (supports) running perpendicular to the transverse axis.",
          items: BEAM_SCHEMA,
        },
        tolerance: {
          type: "number",
          description: "Coordinate tolerance in metres (default 1e-9).",
          minimum: 0,
        },
        gap_policy: {
          type: "string",
          enum: ["ignore", "error"],
          description:
            "'ignore' (default) lets intervals without load carry zero; 'error' rejects them.",
        },
        overlap_policy: {
          type: "string",
          enum: ["first-match", "error"],
          description:
            "'first-match' (default) lets the load with the smallest y_start govern; 'error' rejects overlaps.",
        },
        output_path: {
          type: "string",
          description: "File path to save the layout diagram as SVG. If not provided, no SVG is generated.",
        },
      },
      required: ["loads", "beams"],
    },
    execute: async (_toolCallId: string, args: unknown): Promise<ToolResult> => {
      const { loads, beams, options } = parseModel(args ?? {});

      const rawPath =
        typeof args === "object" && args !== null && "output_path" in args
          ? args.output_path
          : undefined;
      const outputPath = typeof rawPath === "string" ? rawPath.trim() || undefined : undefined;

      const result = calculate(loads, beams, options);

      let savedPath: string | undefined;
      if (outputPath) {
        savedPath = writeDiagram(outputPath, renderDiagram(result, loads));
      }

      const report = formatReport(result);
      const text = savedPath ? `${report}\nDiagram saved to: ${savedPath}` : report;

      return {
        content: [
          { type: "text", text },
          { type: "text", text: JSON.stringify(summarize(result, savedPath), null, 2) },
        ],
        details: {
          beam_count: result.beams.length,
          applied_load_kn_per_m: round4(result.appliedLoad),
          distributed_load_kn_per_m: round4(result.totalLoad),
          gap_count: result.details.gaps.length,
          overlap_count: result.details.overlaps.length,
        },
      };
    },
  };
}
