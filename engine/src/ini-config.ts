/**
 * INI loader — turns an EffMap.ini file into the flat key→value mapping the
 * ConfigResolver reads.
 *
 * Files written by older tooling are often GB18030 rather than UTF-8, and may
 * list keys before any [section] header; both are accepted. All sections are
 * flattened into one mapping, later sections overriding earlier ones.
 */
import { readFileSync } from "node:fs";
import ini from "ini";
import { ConfigError, errorMessage } from "./errors.js";
import logger from "./logger.js";

export type IniEncoding = "utf-8" | "gb18030";

export interface LoadedIni {
  path: string;
  encoding: IniEncoding;
  values: Record<string, string>;
}

export function decodeIniBytes(bytes: Uint8Array): { text: string; encoding: IniEncoding } {
  try {
    return { text: new TextDecoder("utf-8", { fatal: true }).decode(bytes), encoding: "utf-8" };
  } catch {
    return { text: new TextDecoder("gb18030").decode(bytes), encoding: "gb18030" };
  }
}

function flatten(node: Record<string, unknown>, out: Record<string, string>, sections: Record<string, unknown>[]): void {
  for (const [key, value] of Object.entries(node)) {
    if (value !== null && typeof value === "object" && !Array.isArray(value)) {
      sections.push(Object.fromEntries(Object.entries(value)));
    } else if (value !== null && value !== undefined) {
      out[key] = Array.isArray(value) ? value.map(String).join(" ") : String(value);
    }
  }
}

/** Flat mapping of every key in the INI text; case-sensitive, inline comments removed. */
export function parseIni(text: string): Record<string, string> {
  const parsed: Record<string, unknown> = ini.parse(text);
  const values: Record<string, string> = {};
  const sections: Record<string, unknown>[] = [];
  flatten(parsed, values, sections);
  // Sections nested by dotted names are flattened breadth-first
  for (let i = 0; i < sections.length; i++) flatten(sections[i], values, sections);
  return values;
}

export function loadIniFile(path: string): LoadedIni {
  let bytes: Buffer;
  try {
    bytes = readFileSync(path);
  } catch (e) {
    throw new ConfigError("ini", `Cannot read config file ${path}: ${errorMessage(e)}`);
  }
  const { text, encoding } = decodeIniBytes(bytes);
  const values = parseIni(text);
  logger.info(`Loaded ${Object.keys(values).length} settings from ${path} (${encoding})`, { module: "Config" });
  return { path, encoding, values };
}
