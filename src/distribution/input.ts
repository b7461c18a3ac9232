/**
 * Model document parsing.
 *
 * A model is the JSON shape accepted by the tools, the terminal entry and the
 * HTTP API:
 *
 *   {
 *     "loads": [{ "name": "F", "intensity": -0.72, "y_start": 0, "y_end": 0.2 },
 *               { "name": "G", "intensity": -0.72, "width": 0.8 }],
 *     "beams": [{ "name": "B1", "position": 0 }, { "name": "B2", "position": 1 }],
 *     "tolerance": 1e-9,
 *     "gap_policy": "ignore",
 *     "overlap_policy": "first-match"
 *   }
 *
 * A load given by `width` alone starts where the previous load ended (or at 0
 * for the first load).
 */
import { InputError, LoadshareError } from "./errors.js";
import { createBeam, createLoad } from "./model.js";
import type {
  Beam,
  CalculationOptions,
  GapPolicy,
  OverlapPolicy,
  RegionalLoad,
} from "./types.js";

export interface Model {
  loads: RegionalLoad[];
  beams: Beam[];
  options: CalculationOptions;
}

const GAP_POLICIES: readonly GapPolicy[] = ["ignore", "error"];
const OVERLAP_POLICIES: readonly OverlapPolicy[] = ["first-match", "error"];

// ─── Field readers ───────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readNumber(obj: Record<string, unknown>, key: string, path: string): number {
  const raw = obj[key];
  if (typeof raw !== "number" || !Number.isFinite(raw)) {
    throw new InputError(`${path}.${key}`, "must be a finite number.");
  }
  return raw;
}

function readOptionalNumber(
  obj: Record<string, unknown>,
  key: string,
  path: string,
): number | undefined {
  if (obj[key] === undefined || obj[key] === null) return undefined;
  return readNumber(obj, key, path);
}

function readName(obj: Record<string, unknown>, path: string): string {
  const raw = obj.name;
  if (typeof raw !== "string" || !raw.trim()) {
    throw new InputError(`${path}.name`, "must be a non-empty string.");
  }
  return raw.trim();
}

function readArray(obj: Record<string, unknown>, key: string): unknown[] {
  const raw = obj[key];
  if (raw === undefined || raw === null) return [];
  if (!Array.isArray(raw)) {
    throw new InputError(key, "must be an array.");
  }
  return raw;
}

function readChoice<T extends string>(
  obj: Record<string, unknown>,
  key: string,
  choices: readonly T[],
): T | undefined {
  const raw = obj[key];
  if (raw === undefined || raw === null) return undefined;
  const match = choices.find((c) => c === raw);
  if (match === undefined) {
    throw new InputError(key, `must be one of ${choices.map((c) => `"${c}"`).join(", ")}.`);
  }
  return match;
}

// Re-tag construction errors with the offending entry's path
function withPath<T>(path: string, build: () => T): T {
  try {
    return build();
  } catch (err) {
    if (err instanceof LoadshareError && !(err instanceof InputError)) {
      throw new InputError(path, err.message);
    }
    throw err;
  }
}

// ─── Entries ─────────────────────────────────────────────────────────────────

function parseLoads(rawLoads: unknown[]): RegionalLoad[] {
  const loads: RegionalLoad[] = [];
  let cursor = 0;

  rawLoads.forEach((raw, i) => {
    const path = `loads[${i}]`;
    if (!isRecord(raw)) {
      throw new InputError(path, "must be an object.");
    }
    const name = readName(raw, path);
    const intensity = readNumber(raw, "intensity", path);
    const length = readOptionalNumber(raw, "length", path);
    const color = typeof raw.color === "string" ? raw.color : undefined;

    let yStart: number;
    let yEnd: number;
    if (raw.y_start !== undefined || raw.y_end !== undefined) {
      yStart = readNumber(raw, "y_start", path);
      yEnd = readNumber(raw, "y_end", path);
    } else if (raw.width !== undefined) {
      const width = readNumber(raw, "width", path);
      if (width < 0) {
        throw new InputError(`${path}.width`, "must be non-negative.");
      }
      yStart = cursor;
      yEnd = cursor + width;
    } else {
      throw new InputError(path, "needs either y_start and y_end, or width.");
    }

    const load = withPath(path, () =>
      createLoad({ name, intensity, yStart, yEnd, length, color }),
    );
    cursor = load.yEnd;
    loads.push(load);
  });

  return loads;
}

function parseBeams(rawBeams: unknown[]): Beam[] {
  return rawBeams.map((raw, i) => {
    const path = `beams[${i}]`;
    if (!isRecord(raw)) {
      throw new InputError(path, "must be an object.");
    }
    const name = readName(raw, path);
    const position = readNumber(raw, "position", path);
    const length = readOptionalNumber(raw, "length", path);
    return withPath(path, () => createBeam({ name, position, length }));
  });
}

// ─── Public API ──────────────────────────────────────────────────────────────

export function parseModel(raw: unknown): Model {
  if (!isRecord(raw)) {
    throw new InputError("model", "must be a JSON object with loads and beams.");
  }

  const loads = parseLoads(readArray(raw, "loads"));
  const beams = parseBeams(readArray(raw, "beams"));

  const options: CalculationOptions = {};
  const tolerance = readOptionalNumber(raw, "tolerance", "model");
  if (tolerance !== undefined) options.tolerance = tolerance;
  const gapPolicy = readChoice(raw, "gap_policy", GAP_POLICIES);
  if (gapPolicy) options.gapPolicy = gapPolicy;
  const overlapPolicy = readChoice(raw, "overlap_policy", OVERLAP_POLICIES);
  if (overlapPolicy) options.overlapPolicy = overlapPolicy;

  return { loads, beams, options };
}

export function parseModelJson(text: string): Model {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InputError("model", `is not valid JSON (${reason}).`);
  }
  return parseModel(raw);
}
