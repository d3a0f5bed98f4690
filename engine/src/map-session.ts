/**
 * MapSession — one pipeline run over one sheet.
 *
 *   map → normalize → envelope → grid → buildMap(channel) → areaRatios(channel)
 *
 * Each stage is computed on first use and cached; the session owns its dataset
 * and shares nothing with other sessions.
 */
import { computeAreaRatios } from "./area-ratio.js";
import { mapColumns, type MappedDataset } from "./column-mapper.js";
import type { ConfigResolver } from "./config.js";
import { type EnvelopeCurve, extractEnvelope } from "./envelope.js";
import { emptyGrid, type Grid, type Matrix, synthesizeGrid } from "./grid.js";
import { type Cutoff, type GeometryMask, type InterpolationStatus, interpolateGrid } from "./interpolator.js";
import logger from "./logger.js";
import { normalizeRows } from "./normalizer.js";
import { mean, roundHalfEven } from "./numeric.js";
import { Triangulation } from "./triangulation.js";
import { type AreaRatioEntry, CHANNEL_FIELD, type EffChannel, type MeasurementRow, type SheetTable } from "./types.js";

export interface ChannelMap {
  channel: EffChannel;
  status: InterpolationStatus;
  grid: Grid;
  eff: Matrix;
  power: Matrix;
  mask: GeometryMask;
  cutoff: Cutoff;
}

export class MapSession {
  private mapped: MappedDataset | null = null;
  private normalized: MeasurementRow[] | null = null;
  private curve: EnvelopeCurve | null = null;
  private gridCache: Grid | null = null;
  private tri: Triangulation | null = null;
  private readonly maps = new Map<EffChannel, ChannelMap>();

  constructor(
    readonly table: SheetTable,
    readonly config: ConfigResolver,
  ) {}

  private get meta() {
    return { module: "MapSession", sheet: this.table.name };
  }

  map(): MappedDataset {
    if (!this.mapped) {
      this.mapped = mapColumns(this.table, this.config);
      logger.info(`Mapped ${this.mapped.rows.length} rows (${this.mapped.direction}, ${this.mapped.state})`, this.meta);
    }
    return this.mapped;
  }

  normalize(): MeasurementRow[] {
    if (!this.normalized) {
      this.normalized = normalizeRows(this.map().rows);
      logger.info(`Normalized: ${this.normalized.length} valid rows`, this.meta);
    }
    return this.normalized;
  }

  envelope(): EnvelopeCurve {
    if (!this.curve) {
      this.curve = extractEnvelope(this.normalize());
      logger.info(`Envelope: ${this.curve.samples.length} speed points, ${this.curve.fit} fit`, this.meta);
    }
    return this.curve;
  }

  /** Envelope-bounded grid; a grid with no columns when filtering left no rows. */
  grid(): Grid {
    if (this.gridCache) return this.gridCache;
    const rows = this.normalize();
    if (!rows.length) {
      logger.warn("No valid rows left after filtering, maps will be empty", this.meta);
      this.gridCache = emptyGrid();
    } else {
      this.gridCache = synthesizeGrid(rows, this.envelope(), this.config.speedGrid, this.config.torqueGrid);
      logger.info(`Grid: ${this.gridCache.cols} speed columns × ${this.gridCache.rows} torque rows`, this.meta);
    }
    return this.gridCache;
  }

  triangulation(): Triangulation {
    if (!this.tri) {
      const rows = this.normalize();
      this.tri = Triangulation.build(rows.map(r => r.speed), rows.map(r => r.torque));
      if (rows.length && this.tri.isDegenerate) logger.warn("Measurement cloud cannot be triangulated, maps will be empty", this.meta);
    }
    return this.tri;
  }

  buildMap(channel: EffChannel): ChannelMap {
    const cached = this.maps.get(channel);
    if (cached) return cached;

    const grid = this.grid();
    const cutoff: Cutoff = { startSpeed: this.config.startSpeed, startTorque: this.config.startTorque };
    const rows = this.normalize();
    const field = CHANNEL_FIELD[channel];
    const layers = interpolateGrid(grid, this.triangulation(), rows.map(r => r[field]), rows.map(r => r.power), cutoff);

    const result: ChannelMap = { channel, grid, cutoff, ...layers };
    this.maps.set(channel, result);
    return result;
  }

  areaRatios(channel: EffChannel): AreaRatioEntry[] {
    const levels = this.config.effLevels;
    const { eff, mask } = this.buildMap(channel);
    return computeAreaRatios(eff, mask, levels);
  }

  /** Mean DC-bus voltage, rounded half to even; 0 when there are no rows. */
  meanUdc(): number {
    const m = mean(this.map().rows.map(r => r.uDc));
    return Number.isFinite(m) ? roundHalfEven(m) : 0;
  }
}
