#!/usr/bin/env node
/**
 * EffMap CLI
 *
 * Reads motor test workbooks (.xls/.xlsx, every sheet), builds efficiency /
 * power maps and area-ratio tables, and writes them to an output directory.
 *
 * Usage:
 *   npx tsx engine/effmap.ts --ini EffMap.ini --out results data/*.xlsx
 *
 * Environment variables (or .env file):
 *   EFFMAP_INI      (alternative to --ini, default: EffMap.ini)
 *   EFFMAP_OUT_DIR  (alternative to --out, default: output)
 *   LOG_LEVEL       (debug|info|warn|error, default: info)
 */
import "dotenv/config";
import { existsSync } from "fs";
import { BatchRunner } from "./src/batch-runner.js";
import { ConfigResolver } from "./src/config.js";
import { loadIniFile } from "./src/ini-config.js";
import logger from "./src/logger.js";

const DEFAULT_INI = "EffMap.ini";

// ── Parse CLI args ──────────────────────────────────────────
interface CliArgs {
  iniPath: string;
  iniExplicit: boolean;
  outDir: string;
  files: string[];
}

function parseArgs(): CliArgs {
  const args = process.argv.slice(2);
  let iniPath = process.env.EFFMAP_INI || "";
  let outDir = process.env.EFFMAP_OUT_DIR || "output";
  const files: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if ((arg === "--ini" || arg === "-c") && args[i + 1]) {
      iniPath = args[++i];
    } else if ((arg === "--out" || arg === "-o") && args[i + 1]) {
      outDir = args[++i];
    } else if (arg === "--help" || arg === "-h") {
      console.log(`
EffMap — motor efficiency maps and area ratios from test workbooks

Usage:
  npx tsx engine/effmap.ts [--ini EffMap.ini] [--out output] <workbook.xlsx> [...]

Options:
  --ini, -c <path>   INI file with column names, grid steps and output flags
  --out, -o <dir>    Output directory (created if missing)
  --help, -h         Show this help

Environment:
  EFFMAP_INI         Alternative to --ini (default: ${DEFAULT_INI})
  EFFMAP_OUT_DIR     Alternative to --out (default: output)
  LOG_LEVEL          debug | info | warn | error (default: info)
`);
      process.exit(0);
    } else {
      files.push(arg);
    }
  }

  if (!files.length) {
    console.error("Error: at least one workbook is required. See --help.");
    process.exit(1);
  }

  return { iniPath: iniPath || DEFAULT_INI, iniExplicit: Boolean(iniPath), outDir, files };
}

// ── Main ────────────────────────────────────────────────────
function main() {
  const { iniPath, iniExplicit, outDir, files } = parseArgs();

  let values: Record<string, string> = {};
  if (existsSync(iniPath)) {
    values = loadIniFile(iniPath).values;
  } else if (iniExplicit) {
    console.error(`Error: config file not found: ${iniPath}`);
    process.exit(1);
  } else {
    logger.warn(`${iniPath} not found, using built-in defaults`, { module: "Config" });
  }

  const runner = new BatchRunner(new ConfigResolver(values), outDir);
  const summary = runner.run(files);

  logger.info("═══════════════════════════════════════════");
  logger.info(`✅ Processed ${summary.sheets.length} sheet(s) in ${(summary.durationMs / 1000).toFixed(1)}s`);
  for (const s of summary.sheets) {
    const label = `${s.file} › ${s.sheet}`;
    if (s.status === "failed") {
      logger.error(`   ✗ ${label}: ${s.error?.message ?? "failed"}`);
      continue;
    }
    logger.info(`   ✓ ${label}: ${s.runName} (${s.direction}, ${s.state}, ${s.envelopeFit} envelope)`);
    for (const out of s.outputs) logger.info(`       → ${out}`);
    for (const err of s.operationErrors) logger.warn(`       ! ${err.operation}: ${err.message}`);
  }
  if (summary.failed) logger.warn(`   Failed:       ${summary.failed}`);
  logger.info("═══════════════════════════════════════════");

  process.exit(summary.failed ? 1 : 0);
}

try {
  main();
} catch (e) {
  console.error("Fatal error:", e);
  process.exit(1);
}
