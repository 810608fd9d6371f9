import { clamp } from "../../shared/format.js";
import { DEFAULT_SETTINGS, MAX_CROSSFADE_SEC, MAX_SPEED, MIN_SPEED } from "../../shared/constants.js";
import type { DspSettings, PlaybackSettings, RepeatMode, SleepTimerSettings } from "../../shared/types.js";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function asFiniteNumber(value: unknown, fallback: number): number {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }

  if (typeof value === "string" && value.trim().length > 0) {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }

  return fallback;
}

function asBoolean(value: unknown, fallback: boolean): boolean {
  return typeof value === "boolean" ? value : fallback;
}

function asRepeatMode(value: unknown, fallback: RepeatMode): RepeatMode {
  // "off" is what older settings files stored for no repeat.
  if (value === "off") {
    return "none";
  }
  return value === "none" || value === "one" || value === "all" ? value : fallback;
}

function roundTo(value: number, step: number): number {
  const factor = Math.round(1 / step);
  return Math.round(value * factor) / factor;
}

function sanitizeEqualizer(value: unknown, fallback: Record<string, number>): Record<string, number> {
  if (!isRecord(value)) {
    return { ...fallback };
  }

  const bands: Record<string, number> = {};
  for (const [band, gain] of Object.entries(value)) {
    if (typeof gain === "number" && Number.isFinite(gain)) {
      bands[band] = clamp(gain, -24, 24);
    }
  }
  return bands;
}

function sanitizeSleepTimer(value: unknown, defaults: SleepTimerSettings): SleepTimerSettings {
  const candidate = isRecord(value) ? value : {};
  const durationMinutes = asFiniteNumber(candidate.durationMinutes, defaults.durationMinutes);
  const armedAt = asFiniteNumber(candidate.armedAt, Number.NaN);
  const enabled = asBoolean(candidate.enabled, defaults.enabled) && Number.isFinite(armedAt);

  return {
    enabled,
    durationMinutes: durationMinutes > 0 ? durationMinutes : defaults.durationMinutes,
    armedAt: enabled ? armedAt : null
  };
}

function sanitizeDsp(value: unknown, defaults: DspSettings): DspSettings {
  const candidate = isRecord(value) ? value : {};

  return {
    crossfadeSec: clamp(asFiniteNumber(candidate.crossfadeSec, defaults.crossfadeSec), 0, MAX_CROSSFADE_SEC),
    gapless: asBoolean(candidate.gapless, defaults.gapless),
    equalizer: sanitizeEqualizer(candidate.equalizer, defaults.equalizer),
    bassBoost: clamp(asFiniteNumber(candidate.bassBoost, defaults.bassBoost), 0, 1),
    trebleBoost: clamp(asFiniteNumber(candidate.trebleBoost, defaults.trebleBoost), 0, 1),
    skipSilence: asBoolean(candidate.skipSilence, defaults.skipSilence)
  };
}

export function sanitizeSpeed(value: number): number {
  return roundTo(clamp(value, MIN_SPEED, MAX_SPEED), 0.05);
}

export function sanitizeVolume(value: number): number {
  return clamp(Math.round(value), 0, 100);
}

export function sanitizeSettings(candidate: unknown, defaults: PlaybackSettings = DEFAULT_SETTINGS): PlaybackSettings {
  const source = isRecord(candidate) ? candidate : {};

  return {
    repeatMode: asRepeatMode(source.repeatMode, defaults.repeatMode),
    shuffleEnabled: asBoolean(source.shuffleEnabled, defaults.shuffleEnabled),
    speed: sanitizeSpeed(asFiniteNumber(source.speed, defaults.speed)),
    volumePercent: sanitizeVolume(asFiniteNumber(source.volumePercent, defaults.volumePercent)),
    resumeOnStartup: asBoolean(source.resumeOnStartup, defaults.resumeOnStartup),
    sleepTimer: sanitizeSleepTimer(source.sleepTimer, defaults.sleepTimer),
    dsp: sanitizeDsp(source.dsp, defaults.dsp)
  };
}
