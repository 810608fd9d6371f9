import { describe, it, expect } from "vitest";
import { DEFAULT_SETTINGS } from "../../shared/constants.js";
import { sanitizeSettings, sanitizeSpeed, sanitizeVolume } from "./settings-utils.js";

describe("sanitizeSettings", () => {
  it("returns the defaults for anything that is not an object", () => {
    expect(sanitizeSettings(null)).toEqual(DEFAULT_SETTINGS);
    expect(sanitizeSettings(["repeat"])).toEqual(DEFAULT_SETTINGS);
  });

  it("clamps numbers into their ranges", () => {
    const settings = sanitizeSettings({
      speed: 9,
      volumePercent: -12,
      dsp: { crossfadeSec: 120, bassBoost: 2, trebleBoost: -1, equalizer: { "60": 40, "1k": -3, bad: "x" } }
    });

    expect(settings.speed).toBe(3);
    expect(settings.volumePercent).toBe(0);
    expect(settings.dsp.crossfadeSec).toBe(30);
    expect(settings.dsp.bassBoost).toBe(1);
    expect(settings.dsp.trebleBoost).toBe(0);
    expect(settings.dsp.equalizer).toEqual({ "60": 24, "1k": -3 });
  });

  it("maps the legacy repeat value and rejects unknown ones", () => {
    expect(sanitizeSettings({ repeatMode: "off" }).repeatMode).toBe("none");
    expect(sanitizeSettings({ repeatMode: "all" }).repeatMode).toBe("all");
    expect(sanitizeSettings({ repeatMode: "forever" }).repeatMode).toBe("none");
  });

  it("accepts numeric strings", () => {
    expect(sanitizeSettings({ volumePercent: "45" }).volumePercent).toBe(45);
  });

  it("only keeps a sleep timer that has an arm time", () => {
    expect(sanitizeSettings({ sleepTimer: { enabled: true, durationMinutes: 20 } }).sleepTimer).toEqual({
      enabled: false,
      durationMinutes: 20,
      armedAt: null
    });
    expect(sanitizeSettings({ sleepTimer: { enabled: true, durationMinutes: -5, armedAt: 1000 } }).sleepTimer).toEqual({
      enabled: true,
      durationMinutes: 30,
      armedAt: 1000
    });
  });
});

describe("sanitizeSpeed", () => {
  it("rounds to the nearest 0.05 step inside the supported range", () => {
    expect(sanitizeSpeed(1.33)).toBe(1.35);
    expect(sanitizeSpeed(0.1)).toBe(0.25);
  });
});

describe("sanitizeVolume", () => {
  it("rounds and clamps to 0-100", () => {
    expect(sanitizeVolume(49.6)).toBe(50);
    expect(sanitizeVolume(180)).toBe(100);
  });
});
