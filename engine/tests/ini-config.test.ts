import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterAll, describe, expect, it } from "vitest";
import { ConfigError } from "../src/errors.js";
import { decodeIniBytes, loadIniFile, parseIni } from "../src/ini-config.js";

const SAMPLE = `VehicleCode = EV1

[Columns]
Speed = Motor Speed
Toqrue = Torque ; bench spelling

[Grid]
SpeedGrid = 100
TorqueGrid = 10
`;

describe("parseIni", () => {
  it("flattens keys before and inside sections", () => {
    expect(parseIni(SAMPLE)).toEqual({
      VehicleCode: "EV1",
      Speed: "Motor Speed",
      Toqrue: "Torque",
      SpeedGrid: "100",
      TorqueGrid: "10",
    });
  });

  it("lets a later section override an earlier one", () => {
    expect(parseIni("[a]\nSpeedGrid = 10\n[b]\nSpeedGrid = 20\n")).toEqual({ SpeedGrid: "20" });
  });
});

describe("decodeIniBytes", () => {
  it("reads UTF-8 text", () => {
    expect(decodeIniBytes(Buffer.from("Speed = 转速", "utf-8"))).toEqual({ text: "Speed = 转速", encoding: "utf-8" });
  });

  it("falls back to GB18030 for bytes that are not UTF-8", () => {
    expect(decodeIniBytes(Uint8Array.from([0xc4, 0xe3]))).toEqual({ text: "你", encoding: "gb18030" });
  });
});

describe("loadIniFile", () => {
  const dir = mkdtempSync(path.join(tmpdir(), "effmap-ini-"));
  afterAll(() => rmSync(dir, { recursive: true, force: true }));

  it("loads a file into flat values", () => {
    const file = path.join(dir, "EffMap.ini");
    writeFileSync(file, SAMPLE);
    const loaded = loadIniFile(file);
    expect(loaded.encoding).toBe("utf-8");
    expect(loaded.values.SpeedGrid).toBe("100");
  });

  it("raises ConfigError for a missing file", () => {
    expect(() => loadIniFile(path.join(dir, "missing.ini"))).toThrow(ConfigError);
  });
});
