import { describe, expect, it } from "vitest";
import { InputError, parseModel, parseModelJson } from "../src/distribution/index.js";

describe("parseModel", () => {
  it("reads loads, beams and options", () => {
    const model = parseModel({
      loads: [{ name: " F ", intensity: -0.72, y_start: 0, y_end: 0.2, length: 2.5, color: "red" }],
      beams: [{ name: "B1", position: 0 }],
      tolerance: 1e-6,
      gap_policy: "error",
      overlap_policy: "first-match",
    });
    expect(model.loads).toEqual([
      { name: "F", intensity: -0.72, yStart: 0, yEnd: 0.2, length: 2.5, color: "red" },
    ]);
    expect(model.beams).toEqual([{ name: "B1", position: 0, length: 1 }]);
    expect(model.options).toEqual({ tolerance: 1e-6, gapPolicy: "error", overlapPolicy: "first-match" });
  });

  it("leaves unset options out", () => {
    expect(parseModel({ beams: [{ name: "B1", position: 0 }] }).options).toEqual({});
  });

  it("stacks width-only loads after the previous load", () => {
    const model = parseModel({
      loads: [
        { name: "A", intensity: -1, width: 2 },
        { name: "B", intensity: -1, y_start: 5, y_end: 6 },
        { name: "C", intensity: -1, width: 1.5 },
      ],
    });
    expect(model.loads.map((l) => [l.yStart, l.yEnd])).toEqual([[0, 2], [5, 6], [6, 7.5]]);
  });

  it("treats missing arrays as empty", () => {
    expect(parseModel({})).toEqual({ loads: [], beams: [], options: {} });
  });

  it("rejects a non-object model", () => {
    expect(() => parseModel([])).toThrow("model: must be a JSON object with loads and beams.");
  });

  it("rejects non-array loads", () => {
    expect(() => parseModel({ loads: {} })).toThrow("loads: must be an array.");
  });

  it("points at the bad field", () => {
    const bad = () => parseModel({ loads: [{ name: "F", intensity: "heavy", width: 1 }] });
    expect(bad).toThrow(InputError);
    expect(bad).toThrow("loads[0].intensity: must be a finite number.");
    expect(() => parseModel({ beams: [{ name: "", position: 0 }] })).toThrow(
      "beams[0].name: must be a non-empty string.",
    );
  });

  it("needs either edges or a width", () => {
    expect(() => parseModel({ loads: [{ name: "F", intensity: -1 }] })).toThrow(
      "loads[0]: needs either y_start and y_end, or width.",
    );
    expect(() => parseModel({ loads: [{ name: "F", intensity: -1, y_start: 0 }] })).toThrow(
      "loads[0].y_end: must be a finite number.",
    );
  });

  it("rejects a negative width", () => {
    expect(() => parseModel({ loads: [{ name: "F", intensity: -1, width: -1 }] })).toThrow(
      "loads[0].width: must be non-negative.",
    );
  });

  it("re-tags construction errors with the entry path", () => {
    let caught: unknown;
    try {
      parseModel({ loads: [{ name: "F", intensity: -1, y_start: 3, y_end: 1 }] });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(InputError);
    expect(caught).toHaveProperty("path", "loads[0]");
    expect(caught).toHaveProperty(
      "message",
      'loads[0]: Load "F" has negative width (y_start 3 > y_end 1).',
    );
  });

  it("rejects an unknown policy", () => {
    expect(() => parseModel({ gap_policy: "warn" })).toThrow(
      'gap_policy: must be one of "ignore", "error".',
    );
    expect(() => parseModel({ overlap_policy: "sum" })).toThrow(
      'overlap_policy: must be one of "first-match", "error".',
    );
  });

  it("rejects a non-numeric tolerance", () => {
    expect(() => parseModel({ tolerance: "tiny" })).toThrow("model.tolerance: must be a finite number.");
  });
});

describe("parseModelJson", () => {
  it("parses a JSON document", () => {
    const model = parseModelJson('{"beams":[{"name":"B1","position":2}]}');
    expect(model.beams[0]?.position).toBe(2);
  });

  it("wraps invalid JSON", () => {
    expect(() => parseModelJson("{ loads: ")).toThrow(/^model: is not valid JSON \(/);
  });
});
