/**
 * Public surface of the tributary load distribution package.
 */
export { calculate } from "./calculate.js";
export { computeContributions, computeZoneLoad } from "./contributions.js";
export { adjacentPairs, extractCriticalPoints, sortUnique } from "./critical-points.js";
export { renderDiagram, writeDiagram } from "./diagram.js";
export { ConfigurationError, InputError, LoadshareError } from "./errors.js";
export { parseModel, parseModelJson } from "./input.js";
export type { Model } from "./input.js";
export { edgeBeams, stackLoads } from "./layout.js";
export type { StripSpec } from "./layout.js";
export { createBeam, createLoad, loadWidth, resolveTolerance } from "./model.js";
export { formatReport } from "./report.js";
export type { ReportOptions } from "./report.js";
export { buildSegments } from "./segments.js";
export type { SegmentBuild } from "./segments.js";
export { assignTributaryZones, sortBeams } from "./tributary.js";
export { DEFAULT_TOLERANCE } from "./types.js";
export type {
  Beam,
  BeamResult,
  CalculationDetails,
  CalculationOptions,
  Contribution,
  CriticalPoints,
  DistributionResult,
  GapPolicy,
  Interval,
  Overlap,
  OverlapPolicy,
  RegionalLoad,
  Segment,
  TributaryZone,
} from "./types.js";
