import { describe, expect, it } from "vitest";
import { ConfigResolver, parseLevels } from "../src/config.js";
import { ConfigError } from "../src/errors.js";

describe("parseLevels", () => {
  it("splits on whitespace, commas and semicolons", () => {
    expect(parseLevels("90 85 80")).toEqual([90, 85, 80]);
    expect(parseLevels("90,85;80")).toEqual([90, 85, 80]);
  });

  it("expands start:step:end with the end included", () => {
    expect(parseLevels("70:10:90")).toEqual([70, 80, 90]);
  });

  it("expands a descending range", () => {
    expect(parseLevels("90:-5:70")).toEqual([90, 85, 80, 75, 70]);
  });

  it("is empty when the step points away from the end", () => {
    expect(parseLevels("70:-5:90")).toEqual([]);
  });

  it("expands start:end with a unit step", () => {
    expect(parseLevels("80:82")).toEqual([80, 81, 82]);
  });

  it("returns no levels for blank text", () => {
    expect(parseLevels("   ")).toEqual([]);
  });

  it("rejects a non-numeric token with the key name", () => {
    try {
      parseLevels("90 abc", "PowerMAPStep");
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(ConfigError);
      if (e instanceof ConfigError) {
        expect(e.key).toBe("PowerMAPStep");
        expect(e.message).toBe('PowerMAPStep: "abc" is not a number');
      }
    }
  });

  it("rejects a zero step and a malformed range", () => {
    expect(() => parseLevels("90:0:100")).toThrow("EffMAPStep: range step must not be zero");
    expect(() => parseLevels("1:2:3:4")).toThrow(ConfigError);
  });
});

describe("ConfigResolver", () => {
  it("falls back to defaults for missing or blank keys", () => {
    const config = new ConfigResolver({ TorqueGrid: "  " });
    expect(config.speedGrid).toBe(50);
    expect(config.torqueGrid).toBe(5);
    expect(config.startSpeed).toBe(0);
    expect(config.startTorque).toBe(0);
    expect(config.effLevels).toEqual([90, 85, 80, 70]);
    expect(config.powerLevels).toBeNull();
  });

  it("raises ConfigError only when a malformed value is read", () => {
    const config = new ConfigResolver({ SpeedGrid: "fifty", TorqueGrid: "-5" });
    expect(config.startSpeed).toBe(0);
    expect(() => config.speedGrid).toThrow(ConfigError);
    expect(() => config.torqueGrid).toThrow("TorqueGrid must be positive, got -5");
  });

  it("sorts area-ratio levels highest first", () => {
    expect(new ConfigResolver({ EffMAPStep: "80 90 85" }).effLevels).toEqual([90, 85, 80]);
  });

  it("closes contour levels at 100", () => {
    expect(new ConfigResolver({ EffMAPStep: "80 90 80" }).effContourLevels).toEqual([80, 90, 100]);
    expect(new ConfigResolver({ EffMAPStep: "90 100" }).effContourLevels).toEqual([90, 100]);
  });

  it("sorts power levels ascending", () => {
    expect(new ConfigResolver({ PowerMAPStep: "20 10 30" }).powerLevels).toEqual([10, 20, 30]);
  });

  it("cleans quotes and whitespace from column aliases", () => {
    expect(new ConfigResolver({ Speed: ` "Motor Speed" ` }).getAlias("speed")).toBe("Motor Speed");
    expect(new ConfigResolver({}).getAlias("torque")).toBe("");
  });

  it("treats only \"1\" as an enabled flag", () => {
    const config = new ConfigResolver({ MCUMAP: "1", MotorMAP: "0", SYSMAP: "yes" });
    expect(config.getFlag("MCUMAP")).toBe(true);
    expect(config.getFlag("MotorMAP")).toBe(false);
    expect(config.getFlag("SYSMAP")).toBe(false);
    expect(config.getFlag("MCUAreaRatioCalculation")).toBe(false);
  });

  it("reads customUdc as a number or null", () => {
    expect(new ConfigResolver({ customUdc: "400" }).getCustomUdc()).toBe(400);
    expect(new ConfigResolver({ customUdc: "abc" }).getCustomUdc()).toBeNull();
    expect(new ConfigResolver({ customUdc: "" }).getCustomUdc()).toBeNull();
  });
});
