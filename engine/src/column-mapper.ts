/**
 * Column mapper — pulls the measurement channels out of a raw sheet using the
 * configured column aliases.
 *
 * Missing columns degrade to all-zero channels with a warning; only a sheet
 * where no alias matches at all is rejected.
 */
import { COLUMN_FIELDS, COLUMN_KEYS, type ColumnField, type ConfigResolver, parseDecimal } from "./config.js";
import { NoColumnsMatchedError } from "./errors.js";
import logger from "./logger.js";
import { mean } from "./numeric.js";
import type { CellValue, MeasurementRow, MotionState, SheetTable, SpeedDirection } from "./types.js";

export interface MappedDataset {
  rows: MeasurementRow[];
  direction: SpeedDirection;
  state: MotionState;
  /** Fields whose alias matched a source column */
  matched: ColumnField[];
  /** Constant DC-bus voltage used instead of the U_dc column, if any */
  customUdc: number | null;
  warnings: string[];
}

/** Numeric value of a cell, NaN when it holds no number. */
export function toNumber(cell: CellValue): number {
  if (typeof cell === "number") return cell;
  if (typeof cell === "boolean") return cell ? 1 : 0;
  if (typeof cell === "string") return parseDecimal(cell);
  return Number.NaN;
}

function findColumn(table: SheetTable, alias: string): number {
  if (!alias) return -1;
  return table.columns.findIndex(c => c.trim() === alias);
}

export function mapColumns(table: SheetTable, config: ConfigResolver): MappedDataset {
  const warnings: string[] = [];
  const warn = (msg: string) => {
    warnings.push(msg);
    logger.warn(msg, { module: "ColumnMapper", sheet: table.name });
  };

  const index = new Map(COLUMN_FIELDS.map(f => [f, findColumn(table, config.getAlias(f))]));
  const columnOf = (field: ColumnField) => index.get(field) ?? -1;
  const matched = COLUMN_FIELDS.filter(f => columnOf(f) >= 0);
  if (!matched.length) {
    throw new NoColumnsMatchedError(COLUMN_FIELDS.map(f => `${COLUMN_KEYS[f]}=${config.getAlias(f) || "(blank)"}`));
  }

  logger.debug(`Columns: ${table.columns.join(", ")}`, { module: "ColumnMapper", sheet: table.name });

  const n = table.rows.length;
  const series = (field: ColumnField): number[] => {
    const key = COLUMN_KEYS[field];
    const alias = config.getAlias(field);
    const col = columnOf(field);
    if (col < 0) {
      warn(`Column "${alias}" (mapped from ${key}) not found`);
      return new Array<number>(n).fill(0);
    }
    const values = table.rows.map(r => {
      const v = toNumber(r[col]);
      return Number.isNaN(v) ? 0 : v;
    });
    if (values.every(v => v === 0)) warn(`Column "${alias}" (mapped from ${key}) is all zero or non-numeric`);
    return values;
  };

  const speed = series("speed");
  const torque = series("torque");
  const power = series("power");
  const effMcu = series("effMcu");
  const effMotor = series("effMotor");
  const effSys = series("effSys");

  let uDc: number[];
  const customUdc = config.getCustomUdc();
  if (customUdc !== null) {
    uDc = new Array<number>(n).fill(customUdc);
    logger.info(`Using customUdc = ${customUdc}`, { module: "ColumnMapper", sheet: table.name });
  } else {
    if (config.has("customUdc")) {
      warn(`customUdc "${config.getString("customUdc")}" is not a valid number, using the ${COLUMN_KEYS.uDc} column`);
    }
    uDc = series("uDc");
  }

  // Sign is read from the raw columns, before magnitudes are taken
  const rawMean = (field: ColumnField): number | null => {
    const col = columnOf(field);
    if (col < 0) return null;
    return mean(table.rows.map(r => toNumber(r[col])).filter(Number.isFinite));
  };
  const speedMean = rawMean("speed");
  const powerMean = rawMean("power");
  const direction: SpeedDirection = speedMean === null ? "unknown" : speedMean > 0 ? "forward" : "reverse";
  const state: MotionState = powerMean === null ? "unknown" : powerMean > 0 ? "motoring" : "generating";

  const rows: MeasurementRow[] = speed.map((s, i) => ({
    speed: Math.abs(s),
    torque: Math.abs(torque[i]),
    power: Math.abs(power[i]),
    effMcu: effMcu[i],
    effMotor: effMotor[i],
    effSys: effSys[i],
    uDc: uDc[i],
  }));

  return { rows, direction, state, matched, customUdc, warnings };
}
