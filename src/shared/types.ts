export type RepeatMode = "none" | "one" | "all";

export type ProcessingState = "idle" | "loading" | "buffering" | "ready" | "completed";

export type MediaControl = "skipToPrevious" | "play" | "pause" | "stop" | "skipToNext";

export interface Track {
  id: string;
  title: string;
  artist: string;
  album: string;
  filePath: string;
  durationSec: number;
  artworkPath: string | null;
  trackNumber: number | null;
  year: number | null;
  genre: string | null;
  isFavorite: boolean;
  rating: number | null;
}

export interface LibraryEntry {
  track: Track;
  playCount: number;
  lastPlayedAt: string | null;
  addedAt: string;
}

export interface PlaybackSnapshot {
  currentTrack: Track | null;
  queueIndex: number | null;
  playing: boolean;
  processingState: ProcessingState;
  positionSec: number;
  durationSec: number | null;
  bufferedPositionSec: number;
  speed: number;
  volumePercent: number;
  repeatMode: RepeatMode;
  shuffleEnabled: boolean;
  controls: MediaControl[];
  /** False while an optimistic guess has not been reconciled with the decoder. */
  confirmed: boolean;
  updatedAt: number;
}

export interface QueueSnapshot {
  trackIds: string[];
  currentIndex: number | null;
  positionSec: number;
}

export interface QueueView {
  tracks: Track[];
  currentIndex: number | null;
}

export interface SleepTimerSettings {
  enabled: boolean;
  durationMinutes: number;
  /** Epoch milliseconds at which the active timer was armed. */
  armedAt: number | null;
}

export interface DspSettings {
  crossfadeSec: number;
  gapless: boolean;
  equalizer: Record<string, number>;
  bassBoost: number;
  trebleBoost: number;
  skipSilence: boolean;
}

export interface PlaybackSettings {
  repeatMode: RepeatMode;
  shuffleEnabled: boolean;
  speed: number;
  volumePercent: number;
  resumeOnStartup: boolean;
  sleepTimer: SleepTimerSettings;
  dsp: DspSettings;
}

export type EngineEvent =
  | { type: "playback.snapshot"; payload: PlaybackSnapshot }
  | { type: "track.changed"; payload: { track: Track | null; index: number | null } }
  | { type: "queue.snapshot"; payload: QueueView }
  | { type: "position"; payload: { positionSec: number; durationSec: number | null; bufferedPositionSec: number } }
  | { type: "settings.updated"; payload: PlaybackSettings }
  | { type: "engine.error"; payload: { code: string; message: string } }
  | { type: "engine.reinitialized"; payload: { ok: boolean } };

export type EngineCommand =
  | { type: "play" }
  | { type: "pause" }
  | { type: "playPause" }
  | { type: "stop" }
  | { type: "next" }
  | { type: "previous" }
  | { type: "seekAbsolute"; seconds: number }
  | { type: "seekRelative"; seconds: number }
  | { type: "skipToIndex"; index: number }
  | { type: "setQueue"; trackIds: string[]; autoplay?: boolean }
  | { type: "addQueueItems"; trackIds: string[] }
  | { type: "removeQueueItem"; trackId: string }
  | { type: "clearQueue" }
  | { type: "setRepeatMode"; mode: RepeatMode }
  | { type: "cycleRepeat" }
  | { type: "setShuffle"; enabled: boolean }
  | { type: "toggleShuffle" }
  | { type: "setSpeed"; speed: number }
  | { type: "setVolume"; percent: number }
  | { type: "updateDsp"; dsp: Partial<DspSettings> }
  | { type: "startSleepTimer"; minutes: number }
  | { type: "cancelSleepTimer" };
