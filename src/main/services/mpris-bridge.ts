import path from "node:path";
import { createRequire } from "node:module";
import { pathToFileURL } from "node:url";
import { APP_ID, APP_NAME, MAX_SPEED, MIN_SPEED } from "../../shared/constants.js";
import type {
  EngineCommand,
  EngineEvent,
  PlaybackSnapshot,
  RepeatMode,
  Track
} from "../../shared/types.js";
import type { Logger } from "./logger.js";

export interface MprisPlayer {
  playbackStatus: "Playing" | "Paused" | "Stopped";
  loopStatus: "None" | "Track" | "Playlist";
  shuffle: boolean;
  volume: number;
  rate: number;
  minimumRate: number;
  maximumRate: number;
  metadata: Record<string, unknown>;
  canGoNext: boolean;
  canGoPrevious: boolean;
  canPlay: boolean;
  canPause: boolean;
  canSeek: boolean;
  canControl: boolean;
  getPosition: () => number;
  seeked(positionUs: number): void;
  objectPath(subpath?: string): string;
  on(eventName: string, listener: (...args: unknown[]) => void): void;
  removeAllListeners?(eventName?: string): void;
  _bus?: {
    disconnect?: () => void;
  };
}

export type MprisFactory = (options: {
  name: string;
  identity: string;
  desktopEntry?: string;
  supportedUriSchemes?: string[];
  supportedMimeTypes?: string[];
  supportedInterfaces?: string[];
}) => MprisPlayer;

export interface MprisBridgeOptions {
  dispatch(command: EngineCommand): Promise<void>;
  quit(): void;
  logger: Logger;
  /** Defaults to loading mpris-service; `null` turns the bridge into a no-op. */
  createPlayer?: MprisFactory | null;
}

const NO_TRACK = "/org/mpris/MediaPlayer2/TrackList/NoTrack";
const SEEKED_THRESHOLD_US = 2_000_000;

export function toMicroseconds(seconds: number): number {
  return Math.max(0, Math.floor(seconds * 1000000));
}

export function repeatModeToLoopStatus(mode: RepeatMode): "None" | "Track" | "Playlist" {
  switch (mode) {
    case "one":
      return "Track";
    case "all":
      return "Playlist";
    default:
      return "None";
  }
}

export function loopStatusToRepeatMode(value: unknown): RepeatMode | null {
  if (value === "Track") {
    return "one";
  }
  if (value === "Playlist") {
    return "all";
  }
  if (value === "None") {
    return "none";
  }
  return null;
}

export function toPlaybackStatus(snapshot: PlaybackSnapshot): "Playing" | "Paused" | "Stopped" {
  if (!snapshot.currentTrack || snapshot.processingState === "idle") {
    return "Stopped";
  }
  return snapshot.playing ? "Playing" : "Paused";
}

function toFiniteNumber(value: unknown): number | null {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === "bigint") {
    return Number(value);
  }
  if (typeof value === "string") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function sanitizePathSegment(input: string): string {
  const sanitized = input.replace(/[^A-Za-z0-9_]/g, "_");
  return sanitized || "track";
}

export function buildTrackMetadata(track: Track, trackObjectPath: string): Record<string, unknown> {
  const metadata: Record<string, unknown> = {
    "mpris:trackid": trackObjectPath,
    "xesam:url": pathToFileURL(track.filePath).toString(),
    "xesam:title": track.title || path.basename(track.filePath),
    "xesam:album": track.album,
    "xesam:artist": [track.artist]
  };

  if (track.trackNumber != null) {
    metadata["xesam:trackNumber"] = track.trackNumber;
  }
  if (track.genre) {
    metadata["xesam:genre"] = [track.genre];
  }
  if (track.durationSec > 0) {
    metadata["mpris:length"] = toMicroseconds(track.durationSec);
  }
  if (track.artworkPath) {
    metadata["mpris:artUrl"] = pathToFileURL(track.artworkPath).toString();
  }

  return metadata;
}

export function loadMprisFactory(logger: Logger): MprisFactory | null {
  const require = createRequire(import.meta.url);
  try {
    return require("mpris-service") as MprisFactory;
  } catch (error) {
    logger.warn(`MPRIS disabled: unable to load mpris-service (${(error as Error).message}).`);
    return null;
  }
}

/** Mirrors engine snapshots onto the desktop media-control interface and relays its requests back as commands. */
export class MprisBridge {
  private readonly options: MprisBridgeOptions;
  private readonly logger: Logger;
  private readonly player: MprisPlayer | null;
  private currentTrackId: string | null = null;
  private positionSec = 0;
  private lastPositionUs = 0;

  public constructor(options: MprisBridgeOptions) {
    this.options = options;
    this.logger = options.logger;
    const factory = options.createPlayer === undefined ? loadMprisFactory(options.logger) : options.createPlayer;
    this.player = factory ? this.createPlayer(factory) : null;
    if (!this.player) {
      return;
    }

    this.player.getPosition = () => toMicroseconds(this.positionSec);
    this.bindControlEvents(this.player);
    this.player.metadata = { "mpris:trackid": NO_TRACK };
  }

  public get enabled(): boolean {
    return this.player !== null;
  }

  public handleEvent(event: EngineEvent): void {
    if (!this.player) {
      return;
    }

    switch (event.type) {
      case "playback.snapshot":
        this.syncCoreProperties(this.player, event.payload);
        this.syncPosition(this.player, event.payload.positionSec);
        return;
      case "track.changed":
        this.syncTrackMetadata(this.player, event.payload.track);
        return;
      case "position":
        this.syncPosition(this.player, event.payload.positionSec);
        return;
      default:
        return;
    }
  }

  public shutdown(): void {
    if (!this.player) {
      return;
    }

    this.player.removeAllListeners?.();
    this.player._bus?.disconnect?.();
  }

  private createPlayer(factory: MprisFactory): MprisPlayer | null {
    try {
      const player = factory({
        name: APP_ID,
        identity: APP_NAME,
        desktopEntry: APP_ID,
        supportedUriSchemes: ["file"],
        supportedMimeTypes: ["audio/mpeg", "audio/flac", "audio/ogg", "audio/mp4", "audio/x-wav"],
        supportedInterfaces: ["player"]
      });
      player.minimumRate = MIN_SPEED;
      player.maximumRate = MAX_SPEED;

      player.on("error", (error) => {
        this.logger.error(`MPRIS bridge error: ${String(error)}`);
      });

      return player;
    } catch (error) {
      this.logger.warn(`MPRIS disabled: ${(error as Error).message}`);
      return null;
    }
  }

  private send(command: EngineCommand): void {
    void this.options.dispatch(command).catch((error: unknown) => {
      this.logger.error(`MPRIS command "${command.type}" failed: ${(error as Error).message}`);
    });
  }

  private bindControlEvents(player: MprisPlayer): void {
    player.on("quit", () => {
      this.options.quit();
    });

    player.on("play", () => {
      this.send({ type: "play" });
    });
    player.on("pause", () => {
      this.send({ type: "pause" });
    });
    player.on("playpause", () => {
      this.send({ type: "playPause" });
    });
    player.on("stop", () => {
      this.send({ type: "stop" });
    });
    player.on("next", () => {
      this.send({ type: "next" });
    });
    player.on("previous", () => {
      this.send({ type: "previous" });
    });

    player.on("seek", (offsetUs: unknown) => {
      const offset = toFiniteNumber(offsetUs);
      if (offset == null) {
        return;
      }
      this.send({ type: "seekRelative", seconds: offset / 1000000 });
    });

    player.on("position", (event: unknown) => {
      if (!event || typeof event !== "object") {
        return;
      }

      const trackId = "trackId" in event && typeof event.trackId === "string" ? event.trackId : null;
      const position = "position" in event ? toFiniteNumber(event.position) : null;
      if (!trackId || position == null || !this.currentTrackId) {
        return;
      }
      if (trackId !== this.getTrackObjectPath(player, this.currentTrackId)) {
        return;
      }

      this.send({ type: "seekAbsolute", seconds: Math.max(0, position / 1000000) });
    });

    player.on("shuffle", (enabled: unknown) => {
      if (typeof enabled !== "boolean") {
        return;
      }
      this.send({ type: "setShuffle", enabled });
    });

    player.on("loopStatus", (value: unknown) => {
      const repeatMode = loopStatusToRepeatMode(value);
      if (!repeatMode) {
        return;
      }
      this.send({ type: "setRepeatMode", mode: repeatMode });
    });

    player.on("volume", (value: unknown) => {
      const volume = toFiniteNumber(value);
      if (volume == null) {
        return;
      }
      this.send({ type: "setVolume", percent: Math.max(0, Math.round(volume * 100)) });
    });

    player.on("rate", (value: unknown) => {
      const rate = toFiniteNumber(value);
      if (rate == null || rate <= 0) {
        return;
      }
      this.send({ type: "setSpeed", speed: rate });
    });
  }

  private syncCoreProperties(player: MprisPlayer, snapshot: PlaybackSnapshot): void {
    player.playbackStatus = toPlaybackStatus(snapshot);
    player.loopStatus = repeatModeToLoopStatus(snapshot.repeatMode);
    player.shuffle = snapshot.shuffleEnabled;
    player.volume = Math.max(0, snapshot.volumePercent / 100);
    player.rate = snapshot.speed;

    const hasTrack = snapshot.currentTrack !== null;
    player.canControl = true;
    player.canPlay = hasTrack;
    player.canPause = hasTrack;
    player.canGoNext = snapshot.controls.includes("skipToNext");
    player.canGoPrevious = snapshot.controls.includes("skipToPrevious");
    player.canSeek = hasTrack && (snapshot.durationSec ?? 0) > 0;

    if ((snapshot.currentTrack?.id ?? null) !== this.currentTrackId) {
      this.syncTrackMetadata(player, snapshot.currentTrack);
    }
  }

  private syncTrackMetadata(player: MprisPlayer, track: Track | null): void {
    this.currentTrackId = track?.id ?? null;
    player.metadata = track
      ? buildTrackMetadata(track, this.getTrackObjectPath(player, track.id))
      : { "mpris:trackid": NO_TRACK };
  }

  private syncPosition(player: MprisPlayer, positionSec: number): void {
    this.positionSec = positionSec;
    const positionUs = toMicroseconds(positionSec);

    // Emit Seeked only for discrete jumps to avoid flooding DBus with position updates.
    if (this.currentTrackId && Math.abs(positionUs - this.lastPositionUs) > SEEKED_THRESHOLD_US) {
      player.seeked(positionUs);
    }

    this.lastPositionUs = positionUs;
  }

  private getTrackObjectPath(player: MprisPlayer, trackId: string): string {
    return player.objectPath(`track/${sanitizePathSegment(trackId)}`);
  }
}
