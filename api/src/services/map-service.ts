/**
 * MapService — runs the efficiency-map pipeline on a table posted to the API.
 */
import { ConfigResolver } from "../../../engine/src/config.js";
import { ConfigError, type OperationError, toOperationError } from "../../../engine/src/errors.js";
import { MapSession } from "../../../engine/src/map-session.js";
import { contourLevels, type EnvelopePayload, type MapPayload, serializeEnvelope, serializeMap } from "../../../engine/src/report.js";
import type { AreaRatioEntry, EffChannel, MotionState, SpeedDirection } from "../../../engine/src/types.js";
import type { MapRequestBody } from "../schemas.js";

export interface SessionInfo {
  sheet: string;
  direction: SpeedDirection;
  state: MotionState;
  udc: number;
  rows: { raw: number; valid: number };
  warnings: string[];
  envelope: EnvelopePayload;
}

export interface MapsResult extends SessionInfo {
  /** `areaRatios` is null when the efficiency levels could not be read */
  maps: Partial<Record<EffChannel, MapPayload & { areaRatios: AreaRatioEntry[] | null }>>;
  /** Level or ratio operations that failed on config; the maps are returned without them */
  errors: OperationError[];
}

export interface RatiosResult extends SessionInfo {
  areaRatios: Partial<Record<EffChannel, AreaRatioEntry[]>>;
}

export class MapService {
  private open(body: MapRequestBody): { session: MapSession; config: ConfigResolver; info: SessionInfo } {
    const config = new ConfigResolver(body.config);
    const session = new MapSession({ name: body.sheet, columns: body.columns, rows: body.rows }, config);
    const mapped = session.map();
    const info: SessionInfo = {
      sheet: body.sheet,
      direction: mapped.direction,
      state: mapped.state,
      udc: session.meanUdc(),
      rows: { raw: mapped.rows.length, valid: session.normalize().length },
      warnings: mapped.warnings,
      envelope: serializeEnvelope(session.envelope()),
    };
    return { session, config, info };
  }

  /**
   * Grids, layers, mask and area ratios for each requested channel. A malformed
   * level list costs only the levels and ratios; grid settings still fail the request.
   */
  computeMaps(body: MapRequestBody): MapsResult {
    const { session, config, info } = this.open(body);
    const errors: OperationError[] = [];
    const recover = <T>(operation: string, fn: () => T): T | null => {
      try {
        return fn();
      } catch (e) {
        if (!(e instanceof ConfigError)) throw e;
        errors.push(toOperationError(operation, e));
        return null;
      }
    };

    const levels = recover("levels", () => contourLevels(config));
    const maps: MapsResult["maps"] = {};
    for (const channel of body.channels) {
      const map = serializeMap(session.buildMap(channel), levels);
      maps[channel] = { ...map, areaRatios: recover(`ratio:${channel}`, () => session.areaRatios(channel)) };
    }
    return { ...info, maps, errors };
  }

  /** Area ratios only. */
  computeRatios(body: MapRequestBody): RatiosResult {
    const { session, info } = this.open(body);
    const areaRatios: RatiosResult["areaRatios"] = {};
    for (const channel of body.channels) areaRatios[channel] = session.areaRatios(channel);
    return { ...info, areaRatios };
  }
}
