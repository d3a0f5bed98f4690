/**
 * Shared types for the efficiency-map pipeline
 */

export type CellValue = string | number | boolean | Date | null | undefined;

/** One sheet of a workbook: trimmed header names and the data rows under them. */
export interface SheetTable {
  name: string;
  columns: string[];
  rows: CellValue[][];
}

export interface MeasurementRow {
  speed: number;
  torque: number;
  power: number;
  effMcu: number;
  effMotor: number;
  effSys: number;
  uDc: number;
}

export type SpeedDirection = "forward" | "reverse" | "unknown";
export type MotionState = "motoring" | "generating" | "unknown";

/** Efficiency channel names, as used in config keys and outputs. */
export const EFF_CHANNELS = ["Eff_MCU", "Eff_Motor", "Eff_SYS"] as const;
export type EffChannel = (typeof EFF_CHANNELS)[number];

export const CHANNEL_FIELD: Record<EffChannel, "effMcu" | "effMotor" | "effSys"> = {
  Eff_MCU: "effMcu",
  Eff_Motor: "effMotor",
  Eff_SYS: "effSys",
};

/** Short labels used in config flag names (MCUMAP, MotorAreaRatioCalculation, …). */
export const CHANNEL_LABEL: Record<EffChannel, "MCU" | "Motor" | "SYS"> = {
  Eff_MCU: "MCU",
  Eff_Motor: "Motor",
  Eff_SYS: "SYS",
};

export interface AreaRatioEntry {
  level: number;
  ratio: number;
}
