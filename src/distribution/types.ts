/**
 * Data model for tributary load distribution.
 *
 * Coordinates run along the transverse axis (perpendicular to the beams) in
 * metres. Intensities are kN/m², so contributions come out in kN/m.
 */

export const DEFAULT_TOLERANCE = 1e-9;

export interface RegionalLoad {
  readonly name: string;
  /** kN/m², negative = downward */
  readonly intensity: number;
  readonly yStart: number;
  readonly yEnd: number;
  /** Drawing only */
  readonly length: number;
  readonly color: string;
}

export interface Beam {
  readonly name: string;
  readonly position: number;
  /** Drawing only */
  readonly length: number;
}

export type GapPolicy = "ignore" | "error";
export type OverlapPolicy = "first-match" | "error";

export interface CalculationOptions {
  tolerance?: number;
  gapPolicy?: GapPolicy;
  overlapPolicy?: OverlapPolicy;
}

export interface Interval {
  readonly start: number;
  readonly end: number;
}

export interface Segment extends Interval {
  readonly loadName: string;
  readonly intensity: number;
}

/** `loadNames` in tie-break order */
export interface Overlap extends Interval {
  readonly loadNames: readonly string[];
}

export interface TributaryZone {
  readonly beamName: string;
  readonly position: number;
  readonly lower: number;
  readonly upper: number;
}

export interface CriticalPoints {
  readonly points: readonly number[];
  readonly boundaries: readonly number[];
}

export interface CalculationDetails extends CriticalPoints {
  readonly systemMin: number;
  readonly systemMax: number;
  readonly segments: readonly Segment[];
  readonly zones: readonly TributaryZone[];
  readonly gaps: readonly Interval[];
  readonly overlaps: readonly Overlap[];
  readonly loadedWidth: number;
  readonly tolerance: number;
}

export interface Contribution extends Interval {
  readonly loadName: string;
  readonly width: number;
  readonly value: number;
}

export interface BeamResult {
  readonly name: string;
  readonly position: number;
  readonly length: number;
  readonly zone: Interval;
  readonly contributions: readonly Contribution[];
  readonly total: number;
}

export interface DistributionResult {
  readonly beams: readonly BeamResult[];
  readonly details: CalculationDetails;
  /** Σ beam totals */
  readonly totalLoad: number;
  /** Σ intensity × width over all loads */
  readonly appliedLoad: number;
}
