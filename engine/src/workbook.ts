/**
 * Workbook I/O — reads measurement sheets and writes area-ratio tables (.xls/.xlsx).
 */
import { readFileSync, writeFileSync } from "node:fs";
import * as XLSX from "xlsx";
import { errorMessage, WorkbookError } from "./errors.js";
import type { RatioTable } from "./report.js";
import type { CellValue, SheetTable } from "./types.js";

export const RATIO_SHEET = "AreaRatio";

export function sheetToTable(name: string, ws: XLSX.WorkSheet): SheetTable {
  const aoa = XLSX.utils.sheet_to_json<CellValue[]>(ws, { header: 1, defval: null, blankrows: false, raw: true });
  const [header = [], ...rows] = aoa;
  return { name, columns: header.map(c => String(c ?? "").trim()), rows };
}

/** Every sheet of a workbook, in workbook order. */
export function readWorkbook(data: Buffer, source = "<buffer>"): SheetTable[] {
  let wb: XLSX.WorkBook;
  try {
    wb = XLSX.read(data, { type: "buffer" });
  } catch (e) {
    throw new WorkbookError(`Cannot parse workbook ${source}: ${errorMessage(e)}`, { cause: e });
  }
  return wb.SheetNames.map(name => sheetToTable(name, wb.Sheets[name]));
}

export function loadWorkbook(path: string): SheetTable[] {
  let data: Buffer;
  try {
    data = readFileSync(path);
  } catch (e) {
    throw new WorkbookError(`Cannot read ${path}: ${errorMessage(e)}`, { cause: e });
  }
  return readWorkbook(data, path);
}

/** Area-ratio table as an .xlsx buffer: header row, then one "≥level" row per threshold. */
export function buildRatioWorkbook(table: RatioTable): Buffer {
  const header = ["Efficiency band", ...table.columns.map(c => c.label)];
  const body = table.levels.map((level, i) => [`≥${level}`, ...table.columns.map(c => c.ratios[i] ?? null)]);
  const wb = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(wb, XLSX.utils.aoa_to_sheet([header, ...body]), RATIO_SHEET);
  const out: Buffer = XLSX.write(wb, { type: "buffer", bookType: "xlsx" });
  return out;
}

export function writeRatioWorkbook(path: string, table: RatioTable): void {
  try {
    writeFileSync(path, buildRatioWorkbook(table));
  } catch (e) {
    throw new WorkbookError(`Cannot write ${path}: ${errorMessage(e)}`, { cause: e });
  }
}
