/**
 * BatchRunner — processes every sheet of every workbook and writes the outputs
 * enabled in the config:
 *
 *   <run>-<sheet>-<channel>-map.json   for channels with <MCU|Motor|SYS>MAP = 1
 *   <run>-<sheet>-area-ratio.xlsx      for channels with <…>AreaRatioCalculation = 1
 *
 * A structural failure stops only the sheet it occurs in; a config error stops
 * only the operation that needed the value.
 */
import { mkdirSync, writeFileSync } from "node:fs";
import path from "node:path";
import type { ConfigResolver } from "./config.js";
import { isStructuralError, type OperationError, toOperationError } from "./errors.js";
import logger from "./logger.js";
import { MapSession } from "./map-session.js";
import { buildRatioTable, contourLevels, runName, serializeMap, slug } from "./report.js";
import { type AreaRatioEntry, CHANNEL_LABEL, EFF_CHANNELS, type EffChannel, type SheetTable } from "./types.js";
import { loadWorkbook, writeRatioWorkbook } from "./workbook.js";

export interface SheetOutcome {
  file: string;
  sheet: string;
  status: "ok" | "failed";
  runName?: string;
  direction?: string;
  state?: string;
  envelopeFit?: string;
  /** Set when the whole sheet failed */
  error?: OperationError;
  operationErrors: OperationError[];
  warnings: string[];
  outputs: string[];
}

export interface BatchSummary {
  sheets: SheetOutcome[];
  failed: number;
  durationMs: number;
}

/** Thrown inside a sheet run to stop it after a structural failure. */
class SheetAborted extends Error {
  constructor(readonly detail: OperationError) {
    super(detail.message);
  }
}

export class BatchRunner {
  constructor(
    private readonly config: ConfigResolver,
    private readonly outDir: string,
  ) {}

  run(files: readonly string[]): BatchSummary {
    const start = Date.now();
    const sheets: SheetOutcome[] = [];
    mkdirSync(this.outDir, { recursive: true });

    for (const file of files) {
      let tables: SheetTable[];
      try {
        tables = loadWorkbook(file);
      } catch (e) {
        const error = toOperationError("load", e);
        logger.error(error.message, { module: "Batch" });
        sheets.push({ file, sheet: "*", status: "failed", error, operationErrors: [], warnings: [], outputs: [] });
        continue;
      }
      logger.info(`Loaded ${path.basename(file)}: ${tables.length} sheet(s)`, { module: "Batch" });
      for (const table of tables) sheets.push(this.processSheet(file, table));
    }

    return { sheets, failed: sheets.filter(s => s.status === "failed").length, durationMs: Date.now() - start };
  }

  processSheet(file: string, table: SheetTable): SheetOutcome {
    const outcome: SheetOutcome = { file, sheet: table.name, status: "ok", operationErrors: [], warnings: [], outputs: [] };
    const session = new MapSession(table, this.config);

    /** Run one operation; config errors are recorded, structural errors end the sheet. */
    const attempt = <T>(operation: string, fn: () => T): T | undefined => {
      try {
        return fn();
      } catch (e) {
        const detail = toOperationError(operation, e);
        if (isStructuralError(e)) throw new SheetAborted(detail);
        logger.warn(`${operation} failed: ${detail.message}`, { module: "Batch", sheet: table.name });
        outcome.operationErrors.push(detail);
        return undefined;
      }
    };

    try {
      const mapped = attempt("map", () => session.map());
      if (!mapped) throw new SheetAborted({ operation: "map", code: "INTERNAL", message: "column mapping failed" });
      outcome.warnings = mapped.warnings;
      outcome.direction = mapped.direction;
      outcome.state = mapped.state;
      outcome.envelopeFit = session.envelope().fit;

      const name = `${runName(this.config.vehicleCode, session.meanUdc(), mapped.direction, mapped.state)}-${slug(table.name)}`;
      outcome.runName = name;

      for (const channel of EFF_CHANNELS) {
        if (!this.config.getFlag(`${CHANNEL_LABEL[channel]}MAP`)) continue;
        attempt(`map:${channel}`, () => {
          const target = path.join(this.outDir, `${name}-${channel}-map.json`);
          writeFileSync(target, JSON.stringify(serializeMap(session.buildMap(channel), contourLevels(this.config))));
          outcome.outputs.push(target);
        });
      }

      const ratios: Partial<Record<EffChannel, AreaRatioEntry[]>> = {};
      for (const channel of EFF_CHANNELS) {
        if (!this.config.getFlag(`${CHANNEL_LABEL[channel]}AreaRatioCalculation`)) continue;
        const list = attempt(`ratio:${channel}`, () => session.areaRatios(channel));
        if (list) ratios[channel] = list;
      }

      const ratioTable = buildRatioTable(ratios);
      if (ratioTable) {
        attempt("ratio:write", () => {
          const target = path.join(this.outDir, `${name}-area-ratio.xlsx`);
          writeRatioWorkbook(target, ratioTable);
          outcome.outputs.push(target);
        });
      }
    } catch (e) {
      if (!(e instanceof SheetAborted)) throw e;
      outcome.status = "failed";
      outcome.error = e.detail;
      logger.error(`Sheet failed: ${e.detail.message}`, { module: "Batch", sheet: table.name });
    }

    return outcome;
  }
}
