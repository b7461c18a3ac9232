#!/usr/bin/env node
/**
 * loadshare web server: JSON HTTP API over the distribution tools.
 *
 * Models can be posted directly or uploaded as JSON files. Every evaluation is
 * kept in the evaluation store with its model, report and diagram.
 */
import {
  loadDotEnv,
  ensureDirs,
  errorMessage,
  evaluateModel,
  isMainModule,
  resolveEnvTolerance,
  resolvePort,
} from "./shared.js";

// Load env before anything reads configuration
loadDotEnv();

import http from "node:http";
import path from "node:path";
import type { Readable } from "node:stream";
import { Busboy } from "@fastify/busboy";
import { LoadshareError, parseModelJson, renderDiagram } from "./distribution/index.js";
import { ARTIFACTS, artifactKindFor, createEvaluationStore } from "./evaluation-store.js";
import type { EvaluationRecord, EvaluationStore } from "./evaluation-store.js";
import { createAllToolDefinitions, findToolDefinition } from "./tools/index.js";

// ─── Types ───────────────────────────────────────────────────────────────────

export interface ServerOptions {
  store: EvaluationStore;
  tolerance?: number;
}

interface UploadEvaluation {
  file: string;
  evaluation?: EvaluationRecord;
  report?: string;
  error?: string;
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

function corsHeaders(): Record<string, string> {
  return {
    "Access-Control-Allow-Origin": "*",
    "Access-Control-Allow-Methods": "GET, POST, DELETE, OPTIONS",
    "Access-Control-Allow-Headers": "Content-Type",
  };
}

function jsonResponse(res: http.ServerResponse, status: number, data: unknown) {
  res.writeHead(status, { ...corsHeaders(), "Content-Type": "application/json" });
  res.end(JSON.stringify(data));
}

function errorResponse(res: http.ServerResponse, err: unknown) {
  const status = err instanceof LoadshareError ? 400 : 500;
  jsonResponse(res, status, { error: errorMessage(err) });
}

function readBody(req: http.IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    let body = "";
    req.on("data", (chunk: Buffer) => (body += chunk.toString()));
    req.on("end", () => resolve(body));
    req.on("error", reject);
  });
}

/** RFC 6266 / 5987 header value; names may carry any script */
export function contentDisposition(filename: string): string {
  const encoded = encodeURIComponent(filename).replace(
    /['()*]/g,
    (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`,
  );
  const fallback = filename.replace(/[^\x20-\x7e]|["\\]/g, "_");
  return `inline; filename="${fallback}"; filename*=UTF-8''${encoded}`;
}

function pathParts(pathname: string): string[] | undefined {
  try {
    return pathname.split("/").filter(Boolean).map(decodeURIComponent);
  } catch {
    return undefined; // malformed percent-encoding
  }
}

// ─── Server ──────────────────────────────────────────────────────────────────

export function createLoadshareServer(options: ServerOptions): http.Server {
  const { store } = options;
  const tolerance = options.tolerance ?? resolveEnvTolerance();
  const toolNames = createAllToolDefinitions().map((t) => t.name);

  /** Evaluate a model and keep it with its report and diagram */
  function evaluateAndStore(modelJson: string, name: string, source: EvaluationRecord["source"]) {
    const model = parseModelJson(modelJson);
    const evaluation = evaluateModel(model, tolerance);
    const record = store.save({
      name,
      source,
      model,
      evaluation,
      artifacts: {
        model: modelJson,
        report: evaluation.report,
        diagram: renderDiagram(evaluation.result, model.loads),
      },
    });
    return { record, evaluation };
  }

  // ─── Routes ────────────────────────────────────────────────────────────

  async function handleDistribute(req: http.IncomingMessage, res: http.ServerResponse, url: URL) {
    const body = await readBody(req);
    try {
      const name = url.searchParams.get("name")?.trim() || "distribution";
      const { record, evaluation } = evaluateAndStore(body, name, "posted");
      jsonResponse(res, 200, { evaluation: record, report: evaluation.report, result: evaluation.result });
    } catch (err) {
      errorResponse(res, err);
    }
  }

  async function handleTool(req: http.IncomingMessage, res: http.ServerResponse, name: string) {
    const tool = findToolDefinition(name);
    if (!tool) {
      jsonResponse(res, 404, { error: `Unknown tool: ${name}` });
      return;
    }
    const body = await readBody(req);
    try {
      const args: unknown = body.trim() ? JSON.parse(body) : {};
      const result = await tool.execute(`http-${Date.now()}`, args);
      jsonResponse(res, 200, result);
    } catch (err) {
      if (err instanceof SyntaxError) {
        jsonResponse(res, 400, { error: `Invalid JSON: ${err.message}` });
        return;
      }
      errorResponse(res, err);
    }
  }

  function handleStatus(_req: http.IncomingMessage, res: http.ServerResponse) {
    jsonResponse(res, 200, {
      tools: toolNames,
      tolerance,
      storeDir: store.baseDir,
      evaluations: store.list().length,
    });
  }

  async function handleUpload(req: http.IncomingMessage, res: http.ServerResponse) {
    const contentType = req.headers["content-type"] ?? "";
    if (!contentType.includes("multipart/form-data")) {
      jsonResponse(res, 400, { error: "Expected multipart/form-data" });
      return;
    }

    return new Promise<void>((resolve) => {
      const busboy = Busboy({ headers: { ...req.headers, "content-type": contentType } });
      const uploads: Array<{ filename: string; data: Buffer }> = [];

      busboy.on(
        "file",
        (_fieldname: string, stream: Readable, filename: string, _encoding: string, _mimeType: string) => {
          const chunks: Buffer[] = [];
          stream.on("data", (chunk: Buffer) => chunks.push(chunk));
          stream.on("end", () => {
            uploads.push({ filename: path.basename(filename || "model.json"), data: Buffer.concat(chunks) });
          });
        },
      );

      busboy.on("finish", () => {
        const evaluations: UploadEvaluation[] = uploads.map(({ filename, data }) => {
          const ext = path.extname(filename);
          if (ext.toLowerCase() !== ".json") {
            return { file: filename, error: "Only .json model files are evaluated" };
          }
          try {
            const { record, evaluation } = evaluateAndStore(
              data.toString("utf-8"),
              path.basename(filename, ext),
              "upload",
            );
            return { file: filename, evaluation: record, report: evaluation.report };
          } catch (err) {
            return { file: filename, error: errorMessage(err) };
          }
        });
        jsonResponse(res, 200, { evaluations });
        resolve();
      });

      busboy.on("error", (err: Error) => {
        jsonResponse(res, 500, { error: err.message });
        resolve();
      });

      req.pipe(busboy);
    });
  }

  // ─── Evaluation routes ─────────────────────────────────────────────────

  function handleList(_req: http.IncomingMessage, res: http.ServerResponse) {
    jsonResponse(res, 200, { evaluations: store.list() });
  }

  function handleGet(_req: http.IncomingMessage, res: http.ServerResponse, id: string) {
    const record = store.get(id);
    const report = store.readArtifact(id, "report");
    if (!record || !report) {
      jsonResponse(res, 404, { error: `Unknown evaluation: ${id}` });
      return;
    }
    jsonResponse(res, 200, { evaluation: record, report: report.toString("utf-8") });
  }

  function handleArtifact(_req: http.IncomingMessage, res: http.ServerResponse, id: string, file: string) {
    const kind = artifactKindFor(file);
    const record = store.get(id);
    const data = kind && store.readArtifact(id, kind);
    if (!kind || !record || !data) {
      jsonResponse(res, 404, { error: "File not found" });
      return;
    }
    res.writeHead(200, {
      ...corsHeaders(),
      "Content-Type": ARTIFACTS[kind].mimeType,
      "Content-Length": data.length.toString(),
      "Content-Disposition": contentDisposition(`${record.name}-${ARTIFACTS[kind].filename}`),
    });
    res.end(data);
  }

  function handleDelete(_req: http.IncomingMessage, res: http.ServerResponse, id: string) {
    if (!store.delete(id)) {
      jsonResponse(res, 404, { error: `Unknown evaluation: ${id}` });
      return;
    }
    jsonResponse(res, 200, { deleted: true, id });
  }

  // ─── Dispatch ──────────────────────────────────────────────────────────

  async function route(req: http.IncomingMessage, res: http.ServerResponse) {
    const url = new URL(req.url ?? "/", "http://localhost");
    const method = req.method?.toUpperCase();

    // CORS preflight
    if (method === "OPTIONS") {
      res.writeHead(204, corsHeaders());
      res.end();
      return;
    }

    const parts = pathParts(url.pathname);
    if (!parts) {
      jsonResponse(res, 400, { error: "Malformed path" });
      return;
    }
    const [api, resource, id, file, ...extra] = parts;

    if (api !== "api" || extra.length > 0) {
      jsonResponse(res, 404, { error: "Not found" });
    } else if (method === "POST" && resource === "distribute" && !id) {
      await handleDistribute(req, res, url);
    } else if (method === "POST" && resource === "tools" && id && !file) {
      await handleTool(req, res, id);
    } else if (method === "POST" && resource === "models" && id === "upload" && !file) {
      await handleUpload(req, res);
    } else if (method === "GET" && resource === "status" && !id) {
      handleStatus(req, res);
    } else if (method === "GET" && resource === "evaluations" && !id) {
      handleList(req, res);
    } else if (method === "GET" && resource === "evaluations" && id && !file) {
      handleGet(req, res, id);
    } else if (method === "GET" && resource === "evaluations" && id && file) {
      handleArtifact(req, res, id, file);
    } else if (method === "DELETE" && resource === "evaluations" && id && !file) {
      handleDelete(req, res, id);
    } else {
      jsonResponse(res, 404, { error: "Not found" });
    }
  }

  return http.createServer((req, res) => {
    route(req, res).catch((err: unknown) => {
      console.error(`\x1b[31mRequest failed: ${errorMessage(err)}\x1b[0m`);
      if (!res.headersSent) {
        errorResponse(res, err);
      } else {
        res.end();
      }
    });
  });
}

// ─── Main ────────────────────────────────────────────────────────────────────

if (isMainModule(import.meta.url)) {
  ensureDirs();
  const port = resolvePort();
  const store = createEvaluationStore();
  const server = createLoadshareServer({ store });

  server.listen(port, () => {
    console.log(`\x1b[2m┌ loadshare web server\x1b[0m`);
    console.log(`\x1b[2m│ http://localhost:${port}\x1b[0m`);
    console.log(`\x1b[2m│ evaluations: ${store.baseDir}\x1b[0m`);
    console.log(`\x1b[2m└ tolerance: ${resolveEnvTolerance()}\x1b[0m`);
  });
}
