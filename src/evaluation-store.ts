/**
 * Evaluation store for loadshare.
 *
 * Every model the server evaluates is kept on disk together with what was
 * derived from it, so results can be listed, re-read and downloaded later:
 *
 *   <baseDir>/_index.json
 *   <baseDir>/<id>/model.json
 *   <baseDir>/<id>/report.txt
 *   <baseDir>/<id>/diagram.svg
 *
 * Ids are only ever resolved through the index, never joined onto a path
 * straight from a request.
 */
import fs from "node:fs";
import path from "node:path";
import type { Model } from "./distribution/index.js";
import { LOADSHARE_HOME } from "./shared.js";
import type { Evaluation } from "./shared.js";

// ─── Types ──────────────────────────────────────────────────────────────────

export const ARTIFACTS = {
  model: { filename: "model.json", mimeType: "application/json" },
  report: { filename: "report.txt", mimeType: "text/plain; charset=utf-8" },
  diagram: { filename: "diagram.svg", mimeType: "image/svg+xml" },
} as const;

export type ArtifactKind = keyof typeof ARTIFACTS;

const ARTIFACT_KINDS: readonly ArtifactKind[] = ["model", "report", "diagram"];

export interface EvaluationRecord {
  id: string;
  name: string;
  source: "posted" | "upload";
  createdAt: string;
  loadCount: number;
  beamCount: number;
  /** kN/m */
  appliedLoad: number;
  /** kN/m */
  totalLoad: number;
  gapCount: number;
  overlapCount: number;
}

interface StoreIndex {
  nextSeq: number;
  evaluations: EvaluationRecord[];
}

interface EvaluationStoreConfig {
  baseDir: string;
}

const INDEX_NAME = "_index.json";

// ─── EvaluationStore ────────────────────────────────────────────────────────

export class EvaluationStore {
  private config: EvaluationStoreConfig;

  constructor(config: EvaluationStoreConfig) {
    this.config = config;
  }

  get baseDir(): string {
    return this.config.baseDir;
  }

  private indexPath(): string {
    return path.join(this.config.baseDir, INDEX_NAME);
  }

  private readIndex(): StoreIndex {
    const file = this.indexPath();
    if (!fs.existsSync(file)) {
      return { nextSeq: 1, evaluations: [] };
    }
    return JSON.parse(fs.readFileSync(file, "utf-8")) as StoreIndex;
  }

  private writeIndex(index: StoreIndex): void {
    fs.mkdirSync(this.config.baseDir, { recursive: true });
    fs.writeFileSync(this.indexPath(), JSON.stringify(index, null, 2), "utf-8");
  }

  /** Store an evaluated model and the artifacts rendered from it. */
  save(params: {
    name: string;
    source: EvaluationRecord["source"];
    model: Model;
    evaluation: Evaluation;
    artifacts: Record<ArtifactKind, string>;
  }): EvaluationRecord {
    const { name, source, model, evaluation, artifacts } = params;
    const { result } = evaluation;
    const index = this.readIndex();

    const record: EvaluationRecord = {
      id: `${slugify(name)}-${index.nextSeq}`,
      name,
      source,
      createdAt: new Date().toISOString(),
      loadCount: model.loads.length,
      beamCount: result.beams.length,
      appliedLoad: result.appliedLoad,
      totalLoad: result.totalLoad,
      gapCount: result.details.gaps.length,
      overlapCount: result.details.overlaps.length,
    };

    const dir = path.join(this.config.baseDir, record.id);
    fs.mkdirSync(dir, { recursive: true });
    for (const kind of ARTIFACT_KINDS) {
      fs.writeFileSync(path.join(dir, ARTIFACTS[kind].filename), artifacts[kind], "utf-8");
    }

    index.nextSeq++;
    index.evaluations.push(record);
    this.writeIndex(index);
    return record;
  }

  /** Oldest first */
  list(): EvaluationRecord[] {
    return this.readIndex().evaluations;
  }

  get(id: string): EvaluationRecord | undefined {
    return this.readIndex().evaluations.find((e) => e.id === id);
  }

  readArtifact(id: string, kind: ArtifactKind): Buffer | undefined {
    const record = this.get(id);
    if (!record) return undefined;
    return fs.readFileSync(path.join(this.config.baseDir, record.id, ARTIFACTS[kind].filename));
  }

  delete(id: string): boolean {
    const index = this.readIndex();
    const record = index.evaluations.find((e) => e.id === id);
    if (!record) return false;

    fs.rmSync(path.join(this.config.baseDir, record.id), { recursive: true, force: true });
    index.evaluations = index.evaluations.filter((e) => e !== record);
    this.writeIndex(index);
    return true;
  }
}

// ─── Utilities ──────────────────────────────────────────────────────────────

/** Lower-case letters and digits joined by dashes; any script is kept. */
export function slugify(name: string): string {
  const slug = name
    .normalize("NFC")
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, "-")
    .replace(/^-+|-+$/g, "");
  return slug || "model";
}

export function artifactKindFor(filename: string): ArtifactKind | undefined {
  return ARTIFACT_KINDS.find((kind) => ARTIFACTS[kind].filename === filename);
}

/** Resolve the store directory from environment */
export function resolveStoreDir(env: NodeJS.ProcessEnv = process.env): string {
  if (env.LOADSHARE_STORE_DIR) {
    return env.LOADSHARE_STORE_DIR;
  }
  return path.join(LOADSHARE_HOME, "evaluations");
}

export function createEvaluationStore(): EvaluationStore {
  return new EvaluationStore({ baseDir: resolveStoreDir() });
}
