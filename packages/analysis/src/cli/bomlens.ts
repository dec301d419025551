#!/usr/bin/env node
// packages/analysis/src/cli/bomlens.ts
/* eslint-disable no-console */

import * as fs from "node:fs";
import * as path from "node:path";
import { ZodError } from "zod";

import { isBomAnalysisError } from "../../../bom/src/errors.js";
import { createBomBatch, normalizeStockRows } from "../../../bom/src/normalize.js";
import { readBomFile } from "../../../bom/src/read.js";
import { parseAnalysisConfig, type AnalysisConfig } from "../../../bom/src/config.js";
import type { StockLevel } from "../../../bom/src/schema.js";
import { computeRequirements, type RequirementRow } from "../../../compute/src/requirements.js";
import { analyzeBatch, type AnalysisResult } from "../analyze.js";
import { writeAnalysisWorkbook } from "../export.js";

export type CliIo = {
  out: (s: string) => void;
  err: (s: string) => void;
};

const defaultIo: CliIo = {
  out: (s) => process.stdout.write(s),
  err: (s) => console.error(s),
};

class UsageError extends Error {}

export function usage(): string {
  return `bomlens - Bill-of-Materials analytics

Usage:
  bomlens --help
  bomlens analyze <file...> [--json] [--out <report.xlsx>] [--config <config.json>]
                            [--buckets <n>] [--top <n>]
  bomlens requirements <file...> --product <id> --qty <n> [--stock <stock.csv>]
                                 [--config <config.json>] [--json]

Files may be .csv, .xlsx or .xls. Several files are analyzed as one batch.

Examples:
  bomlens analyze boms-a-l.csv boms-m-z.csv
  bomlens analyze boms.xlsx --json --top 5
  bomlens analyze boms.xlsx --out bom_analysis_results.xlsx
  bomlens requirements boms.csv --product FG-100 --qty 250 --stock stock.csv
`;
}

// -------------------- file helpers --------------------

function readJsonFile(filePath: string): unknown {
  const abs = path.resolve(process.cwd(), filePath);
  let raw: string;
  try {
    raw = fs.readFileSync(abs, "utf8");
  } catch {
    throw new UsageError(`file not found: ${filePath}`);
  }
  try {
    return JSON.parse(raw);
  } catch {
    throw new UsageError(`"${filePath}" is not valid JSON.`);
  }
}

function readInput(filePath: string) {
  if (!fs.existsSync(path.resolve(process.cwd(), filePath))) {
    throw new UsageError(`file not found: ${filePath}`);
  }
  return readBomFile(filePath);
}

function writeJsonPretty(io: CliIo, obj: unknown): void {
  io.out(JSON.stringify(obj, null, 2) + "\n");
}

// -------------------- output --------------------

function money(n: number | null): string {
  return n == null ? "n/a" : n.toFixed(2);
}

function printSummary(io: CliIo, r: AnalysisResult): void {
  const o = r.overview;
  io.out(`batch: ${r.batch_id}\n`);
  io.out(`files: ${r.files.join(", ")}\n`);
  io.out(`products: ${o.product_count}  components: ${o.component_count}  records: ${o.record_count}\n`);
  io.out(`total BOM cost: ${money(o.total_bom_cost)}\n`);
  io.out(`average product cost: ${money(o.average_product_cost)}\n`);
  io.out(`median product cost: ${money(o.median_product_cost)}\n`);

  if (r.complexity_ranking.length) {
    io.out(`\nmost complex products:\n`);
    r.complexity_ranking.forEach((p, i) => {
      io.out(`  ${i + 1}. ${p.product_id}  score=${p.complexity_score.toFixed(2)}  components=${p.component_count}  cost=${money(p.total_cost)}\n`);
    });
  }

  if (r.top_components.length) {
    io.out(`\nmost used components:\n`);
    r.top_components.forEach((c, i) => {
      io.out(`  ${i + 1}. ${c.component_id}  products=${c.usage_count}  quantity=${c.total_quantity}\n`);
    });
  }

  if (r.insights.length) {
    io.out(`\ninsights:\n`);
    for (const x of r.insights) io.out(`  - ${x.text}\n`);
  }

  for (const n of r.notices) io.out(`\nnote: ${n.message}\n`);
}

function printRequirements(io: CliIo, product: string, qty: number, rows: RequirementRow[]): void {
  io.out(`requirements for ${qty} x ${product}:\n`);
  for (const r of rows) {
    const status = r.sufficient ? "ok" : `SHORT ${r.shortfall}`;
    io.out(`  ${r.component_id}  need=${r.required_quantity}  stock=${r.stock_on_hand}  ${status}\n`);
  }
}

// -------------------- commands --------------------

// --config file first, then the --buckets / --top overrides.
function loadConfig(args: string[]): AnalysisConfig {
  const configFile = getFlagValue(args, "--config");
  const buckets = getIntFlag(args, "--buckets");
  const top = getIntFlag(args, "--top");

  const fromFile = configFile ? readJsonFile(configFile) : {};
  if (!isRecord(fromFile)) throw new UsageError(`"${configFile}" must hold a JSON object.`);

  return parseAnalysisConfig({
    ...fromFile,
    ...(buckets != null ? { histogram_buckets: buckets } : {}),
    ...(top != null ? { top_n: top } : {}),
  });
}

function cmdAnalyze(io: CliIo, args: string[]): void {
  const files = positionals(args);
  if (files.length === 0) throw new UsageError("Missing BOM file(s).");

  const outFile = getFlagValue(args, "--out");
  const config = loadConfig(args);

  const batch = createBomBatch(files.map(readInput), config.columns);
  io.err(`[bomlens] normalized ${batch.records.length} records from ${batch.files.length} file(s)`);

  const result = analyzeBatch(batch, config);

  if (outFile) {
    const abs = path.resolve(process.cwd(), outFile);
    fs.writeFileSync(abs, writeAnalysisWorkbook(result));
    io.err(`[bomlens] wrote ${outFile}`);
  }

  if (args.includes("--json")) writeJsonPretty(io, result);
  else printSummary(io, result);
}

function cmdRequirements(io: CliIo, args: string[]): void {
  const files = positionals(args);
  if (files.length === 0) throw new UsageError("Missing BOM file(s).");

  const product = getFlagValue(args, "--product");
  if (!product) throw new UsageError("Missing --product <id>");

  const qty = getIntFlag(args, "--qty");
  if (qty == null) throw new UsageError("Missing --qty <n>");

  const config = loadConfig(args);
  const stockFile = getFlagValue(args, "--stock");
  const stock: StockLevel[] = stockFile ? normalizeStockRows(readInput(stockFile)) : [];

  const batch = createBomBatch(files.map(readInput), config.columns);
  const rows = computeRequirements(batch.records, product, qty, stock);

  if (args.includes("--json")) writeJsonPretty(io, rows);
  else printRequirements(io, product, qty, rows);
}

// -------------------- argv parsing --------------------

const VALUE_FLAGS = new Set(["--out", "--config", "--buckets", "--top", "--product", "--qty", "--stock"]);

function getFlagValue(args: string[], flag: string): string | null {
  const i = args.indexOf(flag);
  if (i === -1) return null;
  const v = args[i + 1];
  if (!v || v.startsWith("--")) throw new UsageError(`Missing value for ${flag}`);
  return v;
}

function getIntFlag(args: string[], flag: string): number | null {
  const v = getFlagValue(args, flag);
  if (v == null) return null;
  const n = Number(v);
  if (!Number.isInteger(n)) throw new UsageError(`${flag} expects a whole number (got "${v}")`);
  return n;
}

// Arguments after the command that are neither flags nor flag values.
function positionals(args: string[]): string[] {
  const out: string[] = [];
  for (let i = 1; i < args.length; i++) {
    const a = args[i];
    if (VALUE_FLAGS.has(a)) {
      i++;
      continue;
    }
    if (a.startsWith("--")) continue;
    out.push(a);
  }
  return out;
}

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

/** Returns the process exit code. */
export function run(argv: string[] = process.argv, io: CliIo = defaultIo): number {
  const args = argv.slice(2);
  const cmd = args[0];

  if (!cmd || cmd === "--help" || cmd === "-h" || cmd === "help") {
    io.out(usage());
    return 0;
  }

  try {
    if (cmd === "analyze") {
      cmdAnalyze(io, args);
      return 0;
    }
    if (cmd === "requirements") {
      cmdRequirements(io, args);
      return 0;
    }
    io.err(`Unknown command: ${cmd}\n`);
    io.err(usage());
    return 1;
  } catch (e) {
    if (e instanceof UsageError) {
      io.err(`[bomlens] ${e.message}\n`);
      io.err(usage());
      return 1;
    }
    if (isBomAnalysisError(e)) {
      io.err(`[bomlens] ${e.code}: ${e.message}`);
      return 1;
    }
    if (e instanceof ZodError) {
      const first = e.issues[0];
      const where = first ? first.path.map(String).join(".") : "";
      io.err(`[bomlens] invalid config${where ? ` at ${where}` : ""}: ${first?.message ?? e.message}`);
      return 1;
    }
    throw e;
  }
}

// Entrypoint: execute when this file is the invoked script
const argv1 = process.argv[1] ?? "";
if (argv1.endsWith("bomlens.ts") || argv1.endsWith("bomlens.js") || argv1.endsWith("bomlens")) {
  process.exitCode = run(process.argv);
}
