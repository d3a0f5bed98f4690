/**
 * API logger — the engine's console line plus JSON log files for deployed servers.
 *
 * Files go to LOG_DIR (default ./logs) in production, or anywhere LOG_DIR is set.
 * Console output is muted under vitest.
 */
import { existsSync, mkdirSync } from "fs";
import path from "path";
import winston from "winston";
import { baseFormat, consoleFormat } from "../../../engine/src/logger.js";

const LOG_DIR = process.env.LOG_DIR || "logs";
const writeFiles = process.env.NODE_ENV === "production" || Boolean(process.env.LOG_DIR);

function fileTransports(): winston.transport[] {
  if (!existsSync(LOG_DIR)) {
    try { mkdirSync(LOG_DIR, { recursive: true }); }
    catch (e) {
      // Keep serving with console logging only
      console.warn(`[logger] Could not create log dir "${LOG_DIR}": ${e instanceof Error ? e.message : String(e)}`);
      return [];
    }
  }
  const json = winston.format.combine(winston.format.uncolorize(), winston.format.json());
  return [
    // Errors only, kept longest
    new winston.transports.File({ filename: path.join(LOG_DIR, "api-error.log"), level: "error", format: json, maxsize: 5 * 1024 * 1024, maxFiles: 3 }),
    // Every request and pipeline stage
    new winston.transports.File({ filename: path.join(LOG_DIR, "api.log"), format: json, maxsize: 10 * 1024 * 1024, maxFiles: 5 }),
  ];
}

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || "info",
  format: baseFormat,
  defaultMeta: { service: "effmap-api" },
  transports: [
    new winston.transports.Console({ format: consoleFormat, silent: process.env.NODE_ENV === "test" }),
    ...(writeFiles ? fileTransports() : []),
  ],
});

export default logger;
