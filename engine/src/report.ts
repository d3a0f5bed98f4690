/**
 * Report helpers — run naming, ratio tables and JSON-ready map payloads.
 */
import type { ConfigResolver } from "./config.js";
import type { EnvelopeCurve } from "./envelope.js";
import type { ChannelMap } from "./map-session.js";
import { type AreaRatioEntry, EFF_CHANNELS, type EffChannel, type MotionState, type SpeedDirection } from "./types.js";

export const CHANNEL_TITLE: Record<EffChannel, string> = {
  Eff_MCU: "MCU",
  Eff_Motor: "Motor",
  Eff_SYS: "System",
};

export interface RatioTable {
  levels: number[];
  columns: { label: string; ratios: (number | null)[] }[];
}

export interface MapPayload {
  channel: EffChannel;
  status: ChannelMap["status"];
  cutoff: ChannelMap["cutoff"];
  speedAxis: number[];
  edgeTorques: number[];
  heights: number[];
  x: (number | null)[][];
  y: (number | null)[][];
  eff: (number | null)[][];
  power: (number | null)[][];
  mask: boolean[][];
  /** Null when the level configuration could not be read */
  levels: MapLevels | null;
}

export interface MapLevels {
  efficiency: number[];
  power: number[] | null;
}

export interface EnvelopePayload {
  fit: EnvelopeCurve["fit"];
  fallbackReason?: string;
  samples: EnvelopeCurve["samples"];
}

/** "<VehicleCode>-<Udc>V-<direction>-<state>", skipping a blank vehicle code. */
export function runName(vehicleCode: string, udc: number, direction: SpeedDirection, state: MotionState): string {
  return [vehicleCode, `${udc}V`, direction, state].filter(Boolean).join("-");
}

/** File-system friendly form of a sheet or run name. */
export function slug(text: string): string {
  return text.trim().replace(/[\\/:*?"<>|\s]+/g, "_") || "sheet";
}

/**
 * One column per channel that was computed; rows follow the first non-empty
 * channel's levels. A channel with an empty list gets null cells. Null when
 * no channel has data.
 */
export function buildRatioTable(ratios: Partial<Record<EffChannel, AreaRatioEntry[]>>): RatioTable | null {
  const entries = EFF_CHANNELS.flatMap(channel => {
    const list = ratios[channel];
    return list ? [{ label: CHANNEL_TITLE[channel], list }] : [];
  });
  const levels = entries.find(e => e.list.length)?.list.map(r => r.level);
  if (!levels) return null;
  return {
    levels,
    columns: entries.map(({ label, list }) => ({
      label,
      ratios: levels.map((_, i) => list[i]?.ratio ?? null),
    })),
  };
}

export function serializeEnvelope(curve: EnvelopeCurve): EnvelopePayload {
  return { fit: curve.fit, fallbackReason: curve.fallbackReason, samples: curve.samples };
}

/** Contour levels for rendering: efficiency ascending and closed at 100, power ascending or automatic. */
export function contourLevels(config: ConfigResolver): MapLevels {
  return { efficiency: config.effContourLevels, power: config.powerLevels };
}

export function serializeMap(map: ChannelMap, levels: MapLevels | null): MapPayload {
  const { grid } = map;
  return {
    channel: map.channel,
    status: map.status,
    cutoff: map.cutoff,
    speedAxis: grid.speedAxis,
    edgeTorques: grid.edgeTorques,
    heights: grid.heights,
    x: grid.x.toRows(),
    y: grid.y.toRows(),
    eff: map.eff.toRows(),
    power: map.power.toRows(),
    mask: map.mask.toRows(),
    levels,
  };
}
