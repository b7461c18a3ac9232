/**
 * Constructors for the immutable pipeline inputs.
 */
import { ConfigurationError } from "./errors.js";
import { DEFAULT_TOLERANCE } from "./types.js";
import type { Beam, RegionalLoad } from "./types.js";

const DEFAULT_LOAD_COLOR = "#1565c0";
const DEFAULT_LENGTH = 1;

function requireFinite(value: number, what: string): number {
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`${what} must be a finite number.`);
  }
  return value;
}

export function createLoad(params: {
  name: string;
  intensity: number;
  yStart: number;
  yEnd: number;
  length?: number;
  color?: string;
}): RegionalLoad {
  const label = `Load "${params.name}"`;
  const yStart = requireFinite(params.yStart, `${label} y_start`);
  const yEnd = requireFinite(params.yEnd, `${label} y_end`);
  if (yEnd < yStart) {
    throw new ConfigurationError(
      `${label} has negative width (y_start ${yStart} > y_end ${yEnd}).`,
    );
  }
  const length = requireFinite(params.length ?? DEFAULT_LENGTH, `${label} length`);
  if (length < 0) {
    throw new ConfigurationError(`${label} length must be non-negative.`);
  }

  return Object.freeze({
    name: params.name,
    intensity: requireFinite(params.intensity, `${label} intensity`),
    yStart,
    yEnd,
    length,
    color: params.color ?? DEFAULT_LOAD_COLOR,
  });
}

export function createBeam(params: { name: string; position: number; length?: number }): Beam {
  const label = `Beam "${params.name}"`;
  const length = requireFinite(params.length ?? DEFAULT_LENGTH, `${label} length`);
  if (length < 0) {
    throw new ConfigurationError(`${label} length must be non-negative.`);
  }
  return Object.freeze({
    name: params.name,
    position: requireFinite(params.position, `${label} position`),
    length,
  });
}

export function loadWidth(load: RegionalLoad): number {
  return load.yEnd - load.yStart;
}

export function resolveTolerance(tolerance: number | undefined): number {
  if (tolerance === undefined) return DEFAULT_TOLERANCE;
  if (!Number.isFinite(tolerance) || tolerance < 0) {
    throw new ConfigurationError("tolerance must be a finite, non-negative number.");
  }
  return tolerance;
}
