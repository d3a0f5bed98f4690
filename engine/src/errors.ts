/**
 * Error taxonomy for the efficiency-map engine.
 *
 *   ConfigError      — a config value needed by one operation is malformed
 *   StructuralError  — the dataset cannot be processed at all (fatal for that sheet)
 *   WorkbookError    — a workbook could not be read or written
 *
 * Data problems (bad cells, empty datasets, degenerate clouds) are not errors:
 * they degrade to sentinel values, empty lists and warnings.
 */

export type EffMapErrorCode = "CONFIG" | "NO_SPEED_RANGE" | "NO_COLUMNS_MATCHED" | "WORKBOOK";

export class EffMapError extends Error {
  constructor(
    public readonly code: EffMapErrorCode,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ConfigError extends EffMapError {
  constructor(
    public readonly key: string,
    message: string,
  ) {
    super("CONFIG", message);
  }
}

export abstract class StructuralError extends EffMapError {}

export class NoSpeedRangeError extends StructuralError {
  constructor(maxSpeed: number) {
    super("NO_SPEED_RANGE", `No valid speed range (max speed = ${maxSpeed})`);
  }
}

export class NoColumnsMatchedError extends StructuralError {
  constructor(aliases: string[]) {
    super("NO_COLUMNS_MATCHED", `None of the configured columns were found: ${aliases.join(", ")}`);
  }
}

export class WorkbookError extends EffMapError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("WORKBOOK", message);
    if (options?.cause !== undefined) this.cause = options.cause;
  }
}

export function isStructuralError(e: unknown): e is StructuralError {
  return e instanceof StructuralError;
}

/** Message of a caught value, whatever was thrown. */
export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/** A failed operation as reported in run summaries and API responses. */
export interface OperationError {
  operation: string;
  code: string;
  message: string;
}

export function toOperationError(operation: string, e: unknown): OperationError {
  if (e instanceof EffMapError) return { operation, code: e.code, message: e.message };
  return { operation, code: "INTERNAL", message: errorMessage(e) };
}
