import type { ProcessingState } from "../../../shared/types.js";

export type LoopMode = "off" | "one" | "all";

export interface PlaybackSource {
  id: string;
  filePath: string;
}

export interface PlaybackBackendStatus {
  playing: boolean;
  processingState: ProcessingState;
  positionSec: number;
  durationSec: number | null;
  bufferedPositionSec: number;
  /** Index into the loaded source list, null while nothing is loaded. */
  currentIndex: number | null;
  speed: number;
  volumePercent: number;
}

export type PlaybackBackendEvent =
  | { type: "position"; positionSec: number; discontinuity: boolean }
  | { type: "duration"; durationSec: number | null }
  | { type: "processingState"; state: ProcessingState }
  | { type: "playing"; playing: boolean }
  | { type: "indexAdvanced"; index: number }
  /** End of the playback order with looping off; the decoder will not advance on its own. */
  | { type: "trackFinished"; index: number }
  /** `fatal` marks failures the decoder cannot continue from, such as its process exiting. */
  | { type: "error"; message: string; fatal?: boolean };

export interface PlaybackBackend {
  start(): Promise<void>;
  shutdown(): Promise<void>;
  open(sources: PlaybackSource[], startIndex: number): Promise<void>;
  append(sources: PlaybackSource[]): Promise<void>;
  remove(index: number): Promise<void>;
  play(): Promise<void>;
  pause(): Promise<void>;
  stop(): Promise<void>;
  seek(positionSec: number, index?: number): Promise<void>;
  setSpeed(speed: number): Promise<void>;
  setVolume(percent: number): Promise<void>;
  setShuffle(enabled: boolean): Promise<void>;
  setLoopMode(mode: LoopMode): Promise<void>;
  getStatus(): PlaybackBackendStatus;
  /** Source indices in the order the decoder will visit them. */
  getPlaybackOrder(): number[];
  subscribe(listener: (event: PlaybackBackendEvent) => void): () => void;
}
