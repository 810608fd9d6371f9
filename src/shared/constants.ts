import type { PlaybackSettings } from "./types.js";

export const SUPPORTED_AUDIO_EXTENSIONS = new Set([
  ".aac",
  ".aif",
  ".aiff",
  ".alac",
  ".ape",
  ".flac",
  ".m4a",
  ".mka",
  ".mp3",
  ".ogg",
  ".opus",
  ".wav",
  ".wv",
  ".wma"
]);

export const APP_NAME = "Tonearm";
export const APP_ID = "tonearm";

export const MIN_SPEED = 0.25;
export const MAX_SPEED = 3;
export const MAX_CROSSFADE_SEC = 30;

export const FAILURE_THRESHOLD = 5;
export const PLAYING_TICK_MS = 100;
export const PAUSED_TICK_MS = 500;

export const CONTINUATION_BATCH_SIZE = 10;
export const CONTINUATION_LOOKAHEAD = 2;

export const RECENTLY_PLAYED_LIMIT = 100;

export const DEFAULT_SETTINGS: PlaybackSettings = {
  repeatMode: "none",
  shuffleEnabled: false,
  speed: 1,
  volumePercent: 100,
  resumeOnStartup: true,
  sleepTimer: {
    enabled: false,
    durationMinutes: 30,
    armedAt: null
  },
  dsp: {
    crossfadeSec: 0,
    gapless: true,
    equalizer: {},
    bassBoost: 0,
    trebleBoost: 0,
    skipSilence: false
  }
};
