/**
 * EffMap API - Routes
 *
 * Public (2): maps(1), area-ratios(1)
 * System (1): health
 *
 * Features: Zod validation, CSV export of area ratios, typed error mapping
 */
import type { NextFunction, Request, Response } from "express";
import { Router } from "express";
import { ZodError } from "zod";
import { ConfigError, EffMapError, StructuralError } from "../../engine/src/errors.js";
import { arrayToCsv, FormatQuery, MapRequest } from "./schemas.js";
import type { MapService } from "./services/index.js";
import { API_CONFIG, logger } from "./utils/index.js";

// ── Helpers ───────────────────────────────────────────────

/**
 * Wrap async route handler — maps errors to responses:
 * ZodError / ConfigError → 400, StructuralError → 422, anything else → 500
 */
export function asyncHandler(fn: (req: Request, res: Response) => Promise<void>) {
  return (req: Request, res: Response, _next: NextFunction) => {
    fn(req, res).catch((e: unknown) => {
      if (e instanceof ZodError) {
        return res.status(400).json({
          success: false,
          error: "Validation error",
          details: e.issues.map(err => ({ path: err.path.join("."), message: err.message })),
        });
      }
      if (e instanceof ConfigError) {
        return res.status(400).json({ success: false, error: e.message, code: e.code, key: e.key });
      }
      if (e instanceof StructuralError) {
        logger.warn(`${req.method} ${req.path} rejected: ${e.message}`, { module: "HTTP" });
        return res.status(422).json({ success: false, error: e.message, code: e.code });
      }
      const err = e instanceof Error ? e : new Error(String(e));
      logger.error(`${req.method} ${req.path} error`, err);
      res.status(500).json({ success: false, error: err.message, code: e instanceof EffMapError ? e.code : undefined });
    });
  };
}

// ── Routes factory ────────────────────────────────────────

export interface RouteDependencies {
  mapService: MapService;
  maxRows?: number;
}

export function createRoutes(deps: RouteDependencies): Router {
  const router = Router();
  const { mapService } = deps;
  const Body = MapRequest(deps.maxRows ?? API_CONFIG.maxRows);

  // ── MAPS ────────────────────────────────────────────────

  router.post("/api/v1/maps", asyncHandler(async (req, res) => {
    const t = Date.now();
    const body = Body.parse(req.body);
    const data = mapService.computeMaps(body);
    res.json({ success: true, data, meta: { responseTime: `${Date.now() - t}ms` } });
  }));

  // ── AREA RATIOS ─────────────────────────────────────────

  router.post("/api/v1/area-ratios", asyncHandler(async (req, res) => {
    const t = Date.now();
    const { format } = FormatQuery.parse(req.query);
    const body = Body.parse(req.body);
    const data = mapService.computeRatios(body);

    if (format === "csv") {
      const rows = Object.entries(data.areaRatios).flatMap(([channel, list]) =>
        (list ?? []).map(r => ({ channel, level: r.level, ratio: r.ratio })),
      );
      res.setHeader("Content-Type", "text/csv; charset=utf-8");
      res.setHeader("Content-Disposition", "attachment; filename=area-ratios.csv");
      return void res.send(arrayToCsv(rows));
    }
    res.json({ success: true, data, meta: { responseTime: `${Date.now() - t}ms` } });
  }));

  // ── HEALTH ──────────────────────────────────────────────

  router.get("/health", (_req, res) => {
    res.json({ status: "ok", uptime: Math.round(process.uptime()) });
  });

  return router;
}
