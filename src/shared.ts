/**
 * Shared setup code used by both the CLI (entry.ts) and the web server (server.ts).
 */
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { fileURLToPath } from "node:url";
import { calculate, DEFAULT_TOLERANCE, formatReport } from "./distribution/index.js";
import type { DistributionResult, Model } from "./distribution/index.js";

// ─── .env loading ────────────────────────────────────────────────────────────

export function loadDotEnv(dir: string = process.cwd()) {
  let content: string;
  try {
    content = fs.readFileSync(path.join(dir, ".env"), "utf-8");
  } catch {
    // No .env file
    return;
  }
  for (const line of content.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const eqIdx = trimmed.indexOf("=");
    if (eqIdx === -1) continue;
    const key = trimmed.slice(0, eqIdx).trim();
    const value = trimmed.slice(eqIdx + 1).trim();
    if (key && !(key in process.env)) {
      process.env[key] = value;
    }
  }
}

// Load .env immediately so env vars are available for module-level constants
loadDotEnv();

// ─── Configuration ───────────────────────────────────────────────────────────

export const LOADSHARE_HOME = process.env.LOADSHARE_HOME ?? path.join(os.homedir(), ".loadshare");
export const DEFAULT_PORT = 3001;

/** Coordinate tolerance used when a model does not set its own */
export function resolveEnvTolerance(env: NodeJS.ProcessEnv = process.env): number {
  const raw = env.LOADSHARE_TOLERANCE;
  if (raw === undefined || raw.trim() === "") return DEFAULT_TOLERANCE;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`LOADSHARE_TOLERANCE must be a non-negative number, got "${raw}".`);
  }
  return value;
}

export function resolvePort(env: NodeJS.ProcessEnv = process.env): number {
  const port = parseInt(env.PORT ?? String(DEFAULT_PORT), 10);
  return Number.isFinite(port) && port > 0 ? port : DEFAULT_PORT;
}

// ─── Ensure directories ─────────────────────────────────────────────────────

export function ensureDirs() {
  fs.mkdirSync(LOADSHARE_HOME, { recursive: true });
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

/** True when the module at `metaUrl` is the script node was started with */
export function isMainModule(metaUrl: string): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return fs.realpathSync(entry) === fs.realpathSync(fileURLToPath(metaUrl));
  } catch {
    return false;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ─── Model evaluation ────────────────────────────────────────────────────────

export interface Evaluation {
  result: DistributionResult;
  report: string;
}

/** Run a parsed model, falling back to the configured tolerance. */
export function evaluateModel(model: Model, defaultTolerance: number = resolveEnvTolerance()): Evaluation {
  const result = calculate(model.loads, model.beams, {
    tolerance: defaultTolerance,
    ...model.options,
  });
  return { result, report: formatReport(result) };
}
