/**
 * Shared test data: column aliases and a small bench table
 */
import type { CellValue, SheetTable } from "../src/types.js";

export const HEADER = ["Speed", "Torque", "P_Motor", "Eff_MCU", "Eff_Motor", "Eff_SYS", "U_dc"];

/** Aliases matching HEADER one-to-one */
export const ALIASES: Record<string, string> = {
  Speed: "Speed",
  Toqrue: "Torque",
  P_Motor: "P_Motor",
  Eff_MCU: "Eff_MCU",
  Eff_Motor: "Eff_Motor",
  Eff_SYS: "Eff_SYS",
  U_dc: "U_dc",
};

/**
 * Two speed points: 900/903 rpm (grouped to 902) up to 60 Nm and 1500 rpm up
 * to 100 Nm, every efficiency 85 %, bus at 350 V.
 */
export const BENCH_ROWS: CellValue[][] = [
  [900, 0, 0, 85, 85, 85, 350],
  [900, 50, 5, 85, 85, 85, 350],
  [903, 0, 0, 85, 85, 85, 350],
  [903, 60, 6, 85, 85, 85, 350],
  [1500, 0, 0, 85, 85, 85, 350],
  [1500, 100, 16, 85, 85, 85, 350],
];

export function benchTable(name = "bench", rows: CellValue[][] = BENCH_ROWS): SheetTable {
  return { name, columns: [...HEADER], rows };
}
