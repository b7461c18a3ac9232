import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import {
  createAllToolDefinitions,
  createLoadDistributionToolDefinition,
  createTributaryZonesToolDefinition,
  findToolDefinition,
} from "../src/tools/index.js";

const stripModel = {
  loads: [
    { name: "F_0_L", intensity: -0.72, width: 0.2 },
    { name: "G_0_L", intensity: -0.72, width: 0.8 },
  ],
  beams: [
    { name: "P_L0_S0", position: 0 },
    { name: "P_L1_S0", position: 1 },
  ],
};

describe("tool registry", () => {
  it("lists every tool once", () => {
    expect(createAllToolDefinitions().map((t) => t.name)).toEqual([
      "structural_load_distribution",
      "structural_tributary_zones",
    ]);
  });

  it("finds tools by name", () => {
    expect(findToolDefinition("structural_tributary_zones")?.label).toBe("Tributary Zones");
    expect(findToolDefinition("structural_beam_analysis")).toBeUndefined();
  });
});

describe("structural_load_distribution", () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it("returns the report, a JSON summary and details", async () => {
    const tool = createLoadDistributionToolDefinition();
    const result = await tool.execute("call-1", stripModel);

    expect(result.content).toHaveLength(2);
    expect(result.content[0]?.text.split("\n")[0]).toBe("=== Load Distribution ===");

    const summary: unknown = JSON.parse(result.content[1]?.text ?? "null");
    expect(summary).toMatchObject({
      system_m: [0, 1],
      loaded_width_m: 1,
      applied_load_kn_per_m: -0.72,
      distributed_load_kn_per_m: -0.72,
      beams: [
        {
          name: "P_L0_S0",
          tributary_zone_m: [0, 0.5],
          contributions: [
            { load: "F_0_L", start_m: 0, end_m: 0.2, value_kn_per_m: -0.144 },
            { load: "G_0_L", start_m: 0.2, end_m: 0.5, value_kn_per_m: -0.216 },
          ],
          total_kn_per_m: -0.36,
        },
        { name: "P_L1_S0", tributary_zone_m: [0.5, 1], total_kn_per_m: -0.36 },
      ],
      gaps_m: [],
      overlaps: [],
    });
    expect(summary).not.toHaveProperty("output_path");
    expect(result.details).toEqual({
      beam_count: 2,
      applied_load_kn_per_m: -0.72,
      distributed_load_kn_per_m: -0.72,
      gap_count: 0,
      overlap_count: 0,
    });
  });

  it("saves the diagram when given an output path", async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "loadshare-tool-"));
    const target = path.join(dir, "plan.svg");
    const tool = createLoadDistributionToolDefinition();
    const result = await tool.execute("call-2", { ...stripModel, output_path: target });

    expect(result.content[0]?.text.endsWith(`\nDiagram saved to: ${target}`)).toBe(true);
    expect(fs.readFileSync(target, "utf-8").startsWith("<svg")).toBe(true);
    expect(JSON.parse(result.content[1]?.text ?? "null")).toHaveProperty("output_path", target);
  });

  it("applies the model's policies", async () => {
    const tool = createLoadDistributionToolDefinition();
    await expect(
      tool.execute("call-3", {
        loads: [
          { name: "A", intensity: -1, y_start: 0, y_end: 1 },
          { name: "B", intensity: -1, y_start: 2, y_end: 3 },
        ],
        beams: [{ name: "B1", position: 0 }],
        gap_policy: "error",
      }),
    ).rejects.toThrow("No load covers [1, 2).");
  });

  it("rejects malformed arguments", async () => {
    const tool = createLoadDistributionToolDefinition();
    await expect(tool.execute("call-4", { loads: "none" })).rejects.toThrow("loads: must be an array.");
  });
});

describe("structural_tributary_zones", () => {
  it("lists each beam's zone", async () => {
    const tool = createTributaryZonesToolDefinition();
    const result = await tool.execute("call-5", {
      beams: [
        { name: "B3", position: 6 },
        { name: "B1", position: 0 },
        { name: "B2", position: 2 },
      ],
    });

    expect(result.content[0]?.text).toBe(
      [
        "Tributary zones over [0, 6] m:",
        "  B1 @ 0 m: [0, 1) m, width 1 m",
        "  B2 @ 2 m: [1, 4) m, width 3 m",
        "  B3 @ 6 m: [4, 6) m, width 2 m",
      ].join("\n"),
    );
    expect(result.details).toEqual({ beam_count: 3 });
  });

  it("widens the outer zones to the loaded region", async () => {
    const tool = createTributaryZonesToolDefinition();
    const result = await tool.execute("call-6", {
      beams: [{ name: "B1", position: 1 }, { name: "B2", position: 3 }],
      loads: [{ name: "A", intensity: -1, y_start: 0, y_end: 5 }],
    });
    expect(JSON.parse(result.content[1]?.text ?? "null")).toEqual({
      system_m: [0, 5],
      zones: [
        { beam: "B1", position_m: 1, lower_m: 0, upper_m: 2, width_m: 2 },
        { beam: "B2", position_m: 3, lower_m: 2, upper_m: 5, width_m: 3 },
      ],
    });
  });

  it("refuses distribution policies it cannot apply", async () => {
    const tool = createTributaryZonesToolDefinition();
    await expect(
      tool.execute("call-8", { beams: [{ name: "B1", position: 0 }], gap_policy: "error" }),
    ).rejects.toThrow("gap_policy and overlap_policy apply to load distribution, not to tributary zones.");
  });

  it("needs at least one beam", async () => {
    const tool = createTributaryZonesToolDefinition();
    await expect(tool.execute("call-7", { beams: [] })).rejects.toThrow(
      "beams must be a non-empty array.",
    );
  });
});
