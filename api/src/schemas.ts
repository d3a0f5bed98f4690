/**
 * EffMap API - Zod schemas & pure helpers
 *
 * Kept in a standalone module so tests can import them without starting the
 * server or touching the logger.
 */
import { z } from "zod";
import { EFF_CHANNELS } from "../../engine/src/types.js";

// ── Query param coercers ──────────────────────────────────

/** Coerce Express query param (string | string[] | undefined) → string | undefined */
export const qStr = z.preprocess(v => (Array.isArray(v) ? v[0] : v) || undefined, z.string().optional());

export const FormatQuery = z.object({ format: qStr }).passthrough();

// ── Body schemas ──────────────────────────────────────────

/** A sheet cell as sent in JSON: number, text, boolean or empty. */
export const Cell = z.union([z.number(), z.string(), z.boolean(), z.null()]);

/** Config values are strings in the INI file; numbers and booleans are accepted and stringified. */
export const ConfigValue = z.union([z.string(), z.number(), z.boolean()]).transform(v => String(v));

export const Channel = z.enum(EFF_CHANNELS);

export const MapRequest = (maxRows: number) => z.object({
  sheet: z.string().default("sheet"),
  columns: z.array(z.string()).min(1, "columns must list at least one header"),
  rows: z.array(z.array(Cell)).max(maxRows, `at most ${maxRows} rows per request`),
  config: z.record(ConfigValue).default({}),
  channels: z.array(Channel).min(1).default([...EFF_CHANNELS]),
});

export type MapRequestBody = z.infer<ReturnType<typeof MapRequest>>;

// ── Pure helpers ──────────────────────────────────────────

export function arrayToCsv(data: Record<string, unknown>[]): string {
  if (!data.length) return "";
  const headers = Object.keys(data[0]);
  const lines = [headers.join(",")];
  for (const row of data) {
    lines.push(headers.map(h => {
      const val = row[h];
      if (val === null || val === undefined) return "";
      const str = typeof val === "object" ? JSON.stringify(val) : String(val);
      return str.includes(",") || str.includes('"') || str.includes("\n") ? `"${str.replace(/"/g, '""')}"` : str;
    }).join(","));
  }
  return lines.join("\n");
}
