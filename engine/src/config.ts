/**
 * Configuration resolver — typed access to the flat key→value mapping
 * read from the INI file (or sent over the API).
 *
 * Missing or blank keys fall back to defaults. A malformed value raises a
 * ConfigError only when the operation that needs it asks for it.
 */
import { ConfigError } from "./errors.js";
import { arange } from "./numeric.js";

export type FlatConfig = Readonly<Record<string, string | undefined>>;

/** Column-alias keys. `Toqrue` is the historical spelling used by existing INI files. */
export const COLUMN_KEYS = {
  speed: "Speed",
  torque: "Toqrue",
  power: "P_Motor",
  effMcu: "Eff_MCU",
  effMotor: "Eff_Motor",
  effSys: "Eff_SYS",
  uDc: "U_dc",
} as const;

export type ColumnField = keyof typeof COLUMN_KEYS;

export const COLUMN_FIELDS: readonly ColumnField[] = ["speed", "torque", "power", "effMcu", "effMotor", "effSys", "uDc"];

export const DEFAULTS = {
  SpeedGrid: 50,
  TorqueGrid: 5,
  StartSpeed: 0,
  StartTorque: 0,
  EffMAPStep: "90 85 80 70",
  PowerMAPStep: "",
} as const;

const NUMBER_RE = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/** Strict decimal parse; NaN for anything that is not a plain number. */
export function parseDecimal(text: string): number {
  const s = text.trim();
  return NUMBER_RE.test(s) ? Number(s) : Number.NaN;
}

/** Strip surrounding whitespace and quote characters from a configured column alias. */
export function cleanAlias(raw: string | undefined): string {
  return (raw ?? "").replace(/^[\s'"]+|[\s'"]+$/g, "");
}

/**
 * Parse a level list: "90 85 80", "90,85;80", "70:5:95" or "90:-5:70"
 * (start:step:end, end included) or "80:90" (step 1). Order is preserved; callers sort.
 */
export function parseLevels(text: string, key = "EffMAPStep"): number[] {
  const s = text.trim();
  if (!s) return [];

  if (s.includes(":")) {
    const parts = s.split(":").map(parseDecimal);
    if ((parts.length !== 2 && parts.length !== 3) || parts.some(Number.isNaN)) {
      throw new ConfigError(key, `${key}: malformed range "${s}" (expected start:step:end or start:end)`);
    }
    const [start, step, end] = parts.length === 3 ? parts : [parts[0], 1, parts[1]];
    if (step === 0) throw new ConfigError(key, `${key}: range step must not be zero`);
    return arange(start, end + step / 1000, step);
  }

  const tokens = s.split(/[\s,;]+/).filter(Boolean);
  const levels = tokens.map(parseDecimal);
  const bad = tokens.find((_, i) => Number.isNaN(levels[i]));
  if (bad !== undefined) throw new ConfigError(key, `${key}: "${bad}" is not a number`);
  return levels;
}

export class ConfigResolver {
  constructor(private readonly values: FlatConfig = {}) {}

  get raw(): FlatConfig {
    return this.values;
  }

  has(key: string): boolean {
    const v = this.values[key];
    return v !== undefined && v.trim() !== "";
  }

  getString(key: string, fallback = ""): string {
    const v = this.values[key];
    return v === undefined ? fallback : v.trim();
  }

  /** Column alias for a measurement field, cleaned of quotes and whitespace. */
  getAlias(field: ColumnField): string {
    return cleanAlias(this.values[COLUMN_KEYS[field]]);
  }

  getNumber(key: string, fallback: number): number {
    if (!this.has(key)) return fallback;
    const text = this.getString(key);
    const n = parseDecimal(text);
    if (!Number.isFinite(n)) throw new ConfigError(key, `${key}: "${text}" is not a valid number`);
    return n;
  }

  getPositiveNumber(key: string, fallback: number): number {
    const n = this.getNumber(key, fallback);
    if (n <= 0) throw new ConfigError(key, `${key} must be positive, got ${n}`);
    return n;
  }

  /** "1" enables a flag; anything else (or absence) disables it. */
  getFlag(key: string): boolean {
    return this.getString(key) === "1";
  }

  /** Level list under `key`; a missing key reads as `fallback`, a blank one as no levels. */
  getLevels(key: string, fallback = ""): number[] {
    return parseLevels(this.values[key] ?? fallback, key);
  }

  /** Constant DC-bus voltage override, or null when blank or not a finite number. */
  getCustomUdc(): number | null {
    if (!this.has("customUdc")) return null;
    const n = parseDecimal(this.getString("customUdc"));
    return Number.isFinite(n) ? n : null;
  }

  get speedGrid(): number {
    return this.getPositiveNumber("SpeedGrid", DEFAULTS.SpeedGrid);
  }

  get torqueGrid(): number {
    return this.getPositiveNumber("TorqueGrid", DEFAULTS.TorqueGrid);
  }

  get startSpeed(): number {
    return this.getNumber("StartSpeed", DEFAULTS.StartSpeed);
  }

  get startTorque(): number {
    return this.getNumber("StartTorque", DEFAULTS.StartTorque);
  }

  /** Area-ratio thresholds, highest first. */
  get effLevels(): number[] {
    return this.getLevels("EffMAPStep", DEFAULTS.EffMAPStep).sort((a, b) => b - a);
  }

  /** Filled-contour levels: unique, ascending, closed at 100 so the top band is drawn. */
  get effContourLevels(): number[] {
    const levels = [...new Set(this.effLevels)].sort((a, b) => a - b);
    if (levels.length && levels[levels.length - 1] < 100) levels.push(100);
    return levels;
  }

  /** Power contour levels ascending, or null to let the renderer pick. */
  get powerLevels(): number[] | null {
    const levels = this.getLevels("PowerMAPStep", DEFAULTS.PowerMAPStep);
    return levels.length ? levels.sort((a, b) => a - b) : null;
  }

  get vehicleCode(): string {
    return this.getString("VehicleCode");
  }
}
