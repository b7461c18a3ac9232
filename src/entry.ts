#!/usr/bin/env node
/**
 * loadshare: terminal front end for tributary load distribution.
 *
 *   loadshare model.json [--svg out.svg] [--json]   evaluate once and exit
 *   loadshare                                       interactive prompt
 */
import {
  loadDotEnv,
  errorMessage,
  evaluateModel,
  isMainModule,
  resolveEnvTolerance,
} from "./shared.js";
import type { Evaluation } from "./shared.js";

// Load env before anything reads configuration
loadDotEnv();

import fs from "node:fs";
import path from "node:path";
import readline from "node:readline/promises";
import { stdin, stdout } from "node:process";
import { parseModelJson, renderDiagram, writeDiagram } from "./distribution/index.js";
import type { Model } from "./distribution/index.js";

// ─── Arguments ───────────────────────────────────────────────────────────────

export interface CliArgs {
  modelPath?: string;
  svgPath?: string;
  json: boolean;
}

export function parseArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { json: false };
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--json") {
      args.json = true;
    } else if (arg === "--svg") {
      const next = argv[i + 1];
      if (!next || next.startsWith("--")) {
        throw new Error("--svg needs an output path.");
      }
      args.svgPath = next;
      i++;
    } else if (arg !== undefined && arg.startsWith("--")) {
      throw new Error(`Unknown option: ${arg}`);
    } else if (arg !== undefined) {
      if (args.modelPath) {
        throw new Error(`Only one model file can be given (got "${args.modelPath}" and "${arg}").`);
      }
      args.modelPath = arg;
    }
  }
  return args;
}

function readModel(filePath: string): Model {
  return parseModelJson(fs.readFileSync(path.resolve(filePath), "utf-8"));
}

// ─── One-shot ────────────────────────────────────────────────────────────────

function runOnce(args: CliArgs & { modelPath: string }) {
  const model = readModel(args.modelPath);
  const { result, report } = evaluateModel(model);

  if (args.json) {
    console.log(JSON.stringify(result, null, 2));
  } else {
    console.log(report);
  }

  if (args.svgPath) {
    const saved = writeDiagram(args.svgPath, renderDiagram(result, model.loads));
    console.error(`\x1b[2mDiagram saved to: ${saved}\x1b[0m`);
  }
}

// ─── REPL ────────────────────────────────────────────────────────────────────

async function repl() {
  let modelPath: string | undefined;
  let model: Model | undefined;
  let last: Evaluation | undefined;

  console.log(`\x1b[2m┌ loadshare\x1b[0m`);
  console.log(`\x1b[2m│ workspace: ${process.cwd()}\x1b[0m`);
  console.log(`\x1b[2m│ tolerance: ${resolveEnvTolerance()}\x1b[0m`);
  console.log(`\x1b[2m└ /open <file> /run /report /svg <path> /status /quit\x1b[0m`);
  console.log();

  const rl = readline.createInterface({ input: stdin, output: stdout });

  while (true) {
    let input: string;
    try {
      input = await rl.question("\x1b[1m> \x1b[0m");
    } catch {
      break; // EOF
    }

    const trimmed = input.trim();
    if (!trimmed) continue;
    const [command = "", ...rest] = trimmed.split(/\s+/);
    const arg = rest.join(" ");

    try {
      if (command === "/quit" || command === "/exit") {
        break;
      } else if (command === "/open") {
        if (!arg) throw new Error("Usage: /open <model.json>");
        model = readModel(arg);
        modelPath = path.resolve(arg);
        last = undefined;
        console.log(
          `\x1b[2mLoaded ${model.loads.length} load(s), ${model.beams.length} beam(s) from ${modelPath}\x1b[0m\n`,
        );
      } else if (command === "/run" || command === "/report") {
        if (!model) throw new Error("No model loaded. Use /open <model.json> first.");
        if (command === "/run" || !last) {
          last = evaluateModel(model);
        }
        console.log(last.report);
        console.log();
      } else if (command === "/svg") {
        if (!model) throw new Error("No model loaded. Use /open <model.json> first.");
        if (!arg) throw new Error("Usage: /svg <output.svg>");
        last = last ?? evaluateModel(model);
        const saved = writeDiagram(arg, renderDiagram(last.result, model.loads));
        console.log(`\x1b[2mDiagram saved to: ${saved}\x1b[0m\n`);
      } else if (command === "/status") {
        console.log(`\x1b[2mModel: ${modelPath ?? "none"}\x1b[0m`);
        console.log(`\x1b[2mEvaluated: ${last ? "yes" : "no"}\x1b[0m`);
        console.log(`\x1b[2mTolerance: ${resolveEnvTolerance()}\x1b[0m\n`);
      } else {
        console.log(`\x1b[2mUnknown command: ${command}\x1b[0m\n`);
      }
    } catch (err) {
      console.error(`\x1b[31mError: ${errorMessage(err)}\x1b[0m\n`);
    }
  }

  rl.close();
  console.log("\x1b[2mBye.\x1b[0m");
}

// ─── Main ────────────────────────────────────────────────────────────────────

async function main() {
  const args = parseArgs(process.argv.slice(2));
  if (args.modelPath) {
    runOnce({ ...args, modelPath: args.modelPath });
  } else {
    await repl();
  }
}

if (isMainModule(import.meta.url)) {
  main().catch((err: unknown) => {
    console.error(`\x1b[31mFatal: ${errorMessage(err)}\x1b[0m`);
    process.exit(1);
  });
}
