import {
  CONTINUATION_BATCH_SIZE,
  CONTINUATION_LOOKAHEAD,
  DEFAULT_SETTINGS,
  PAUSED_TICK_MS,
  PLAYING_TICK_MS
} from "../../shared/constants.js";
import { DecoderUnavailableError, EmptyQueueError, NoCurrentTrackError, TrackNotFoundError } from "../../shared/errors.js";
import { clamp } from "../../shared/format.js";
import type {
  DspSettings,
  MediaControl,
  PlaybackSettings,
  PlaybackSnapshot,
  QueueSnapshot,
  QueueView,
  RepeatMode,
  Track
} from "../../shared/types.js";
import { CommandQueue } from "./command-queue.js";
import type { EventTarget } from "./event-hub.js";
import type { FailureSupervisor } from "./failure-supervisor.js";
import type { Logger } from "./logger.js";
import {
  planContinuation,
  resolveCompletion,
  resolveSkipNext,
  resolveSkipPrevious,
  toLoopMode,
  type SkipAction
} from "./mode-controller.js";
import type { PersistenceGateway } from "./persistence.js";
import { PlayQueue } from "./play-queue.js";
import type {
  PlaybackBackend,
  PlaybackBackendEvent,
  PlaybackBackendStatus,
  PlaybackSource
} from "./playback/backend.js";
import { PositionTicker, type TickerIntervals } from "./position-ticker.js";
import type { QueueBuilder, QueuePlan } from "./queue-builder.js";
import { sanitizeSettings, sanitizeSpeed, sanitizeVolume } from "./settings-utils.js";
import { SleepTimer } from "./sleep-timer.js";

export interface SynchronizerOptions {
  persistence: PersistenceGateway;
  builder: QueueBuilder;
  supervisor: FailureSupervisor;
  events: EventTarget;
  logger: Logger;
  tickIntervals?: TickerIntervals;
  continuation?: { batchSize: number; lookahead: number };
  now?: () => number;
}

export interface SetQueueOptions {
  /** Order a single selected track expands into; defaults to the full catalog. */
  catalogOrder?: readonly Track[];
  autoplay?: boolean;
}

type SnapshotChanges = Partial<Pick<
  PlaybackSnapshot,
  "currentTrack" | "queueIndex" | "playing" | "processingState" | "positionSec" | "durationSec" | "bufferedPositionSec"
>>;

const IDLE_STATUS: PlaybackBackendStatus = {
  playing: false,
  processingState: "idle",
  positionSec: 0,
  durationSec: null,
  bufferedPositionSec: 0,
  currentIndex: null,
  speed: 1,
  volumePercent: 100
};

export function deriveControls(playing: boolean, hasTrack: boolean): MediaControl[] {
  if (!hasTrack) {
    return [];
  }
  return ["skipToPrevious", playing ? "pause" : "play", "skipToNext"];
}

function toSource(track: Track): PlaybackSource {
  return { id: track.id, filePath: track.filePath };
}

function knownDuration(track: Track | null): number | null {
  return track && track.durationSec > 0 ? track.durationSec : null;
}

/**
 * Sole owner of the playback state and of the decoder. Commands, decoder
 * signals, ticker ticks and timer expiry all run one at a time on a single
 * command queue, and every change is published as a complete snapshot.
 */
export class PlaybackSynchronizer {
  private readonly persistence: PersistenceGateway;
  private readonly builder: QueueBuilder;
  private readonly supervisor: FailureSupervisor;
  private readonly events: EventTarget;
  private readonly logger: Logger;
  private readonly continuation: { batchSize: number; lookahead: number };
  private readonly now: () => number;
  private readonly commands = new CommandQueue();
  private readonly queue = new PlayQueue();
  private readonly ticker: PositionTicker;
  private readonly sleepTimer: SleepTimer;
  private readonly sideEffects = new Set<Promise<void>>();
  private backend: PlaybackBackend | null = null;
  private settings: PlaybackSettings = sanitizeSettings(DEFAULT_SETTINGS);
  private snapshot: PlaybackSnapshot;
  private positionReset = true;
  private tickQueued = false;

  public constructor(options: SynchronizerOptions) {
    this.persistence = options.persistence;
    this.builder = options.builder;
    this.supervisor = options.supervisor;
    this.events = options.events;
    this.logger = options.logger;
    this.continuation = options.continuation ?? {
      batchSize: CONTINUATION_BATCH_SIZE,
      lookahead: CONTINUATION_LOOKAHEAD
    };
    this.now = options.now ?? Date.now;
    this.ticker = new PositionTicker({
      intervals: options.tickIntervals ?? { playingMs: PLAYING_TICK_MS, pausedMs: PAUSED_TICK_MS },
      onTick: () => {
        this.scheduleTick();
      }
    });
    this.sleepTimer = new SleepTimer({
      now: this.now,
      onExpire: () => {
        this.handleSleepTimerExpired();
      }
    });
    this.snapshot = this.compose();
  }

  public getSnapshot(): PlaybackSnapshot {
    return this.snapshot;
  }

  public getQueue(): QueueView {
    return this.queue.toView();
  }

  public getSettings(): PlaybackSettings {
    return sanitizeSettings(this.settings);
  }

  public get tickerMode(): PositionTicker["mode"] {
    return this.ticker.mode;
  }

  public captureQueueSnapshot(): QueueSnapshot {
    return this.queue.toSnapshot(this.snapshot.positionSec);
  }

  /** Resolves once every queued mutation and pending statistics update has finished. */
  public async whenIdle(): Promise<void> {
    await this.commands.drain();
    await Promise.all([...this.sideEffects]);
  }

  public attachBackend(backend: PlaybackBackend): void {
    this.backend = backend;
    this.supervisor.attach(backend, (event) => this.handleDecoderSignal(event));
  }

  public detachBackend(): PlaybackBackend | null {
    this.supervisor.detach();
    this.ticker.stop();
    const backend = this.backend;
    this.backend = null;
    return backend;
  }

  /** Applies settings to the decoder and optionally reloads a saved queue, without starting playback. */
  public initialize(settings: PlaybackSettings, restore: QueueSnapshot | null): Promise<void> {
    return this.commands.run(async () => {
      const backend = this.requireBackend();
      this.settings = sanitizeSettings(settings);

      await backend.setSpeed(this.settings.speed);
      await backend.setVolume(this.settings.volumePercent);
      await backend.setShuffle(this.settings.shuffleEnabled);
      await backend.setLoopMode(toLoopMode(this.settings.repeatMode));
      this.events.emit({ type: "settings.updated", payload: this.getSettings() });

      if (restore) {
        await this.restoreQueue(backend, restore);
      }

      await this.restoreSleepTimer();
      this.publish(this.compose());
    });
  }

  /** Drops the queue and publishes a plain idle state; used when the decoder could not be brought back. */
  public resetToIdle(): Promise<void> {
    return this.commands.run(() => {
      this.queue.clear();
      this.positionReset = true;
      this.emitQueue();
      this.announceCurrentTrack(false);
    });
  }

  public dispose(): void {
    this.ticker.stop();
    this.sleepTimer.cancel();
  }

  public handleDecoderSignal(event: PlaybackBackendEvent): Promise<void> {
    return this.commands.run(async () => {
      switch (event.type) {
        case "position":
          if (event.discontinuity) {
            this.positionReset = true;
          }
          this.publish(this.compose());
          return;
        case "duration":
        case "processingState":
        case "playing":
          this.publish(this.compose());
          return;
        case "indexAdvanced":
          await this.applyIndexAdvanced(event.index);
          return;
        case "trackFinished":
          await this.applyTrackFinished(event.index);
          return;
        case "error":
          this.logger.warn(`Decoder error reached the synchronizer: ${event.message}`);
          return;
      }
    });
  }

  public onIndexAdvanced(index: number): Promise<void> {
    return this.commands.run(async () => {
      await this.applyIndexAdvanced(index);
    });
  }

  public setQueue(selection: readonly Track[], options: SetQueueOptions = {}): Promise<QueuePlan> {
    return this.commands.run(async () => {
      const backend = this.requireBackend();
      const catalog = options.catalogOrder
        ?? (selection.length === 1 ? await this.persistence.getAllTracks() : []);
      const plan = await this.builder.build(selection, catalog);
      const autoplay = options.autoplay ?? true;

      try {
        await backend.stop();
        await backend.open(plan.tracks.map(toSource), plan.initialIndex);
      } catch (error) {
        this.logger.error(`Loading the new queue failed: ${(error as Error).message}`);
        this.queue.clear();
        this.positionReset = true;
        this.emitQueue();
        this.announceCurrentTrack(false);
        throw error;
      }

      // The decoder now holds the new list, so the queue follows it even if
      // starting playback fails below; only the play itself is not counted.
      this.queue.replace(plan.tracks, plan.initialIndex);
      this.positionReset = true;
      this.emitQueue();
      this.announceCurrentTrack(false);
      await this.extendIfNeeded();

      if (autoplay) {
        try {
          await backend.play();
        } catch (error) {
          this.logger.warn(`Starting the new queue failed: ${(error as Error).message}`);
          this.publish(this.compose());
          await this.persistQueue();
          throw error;
        }
        this.publish(this.compose());
        this.recordCurrentPlay();
      }

      await this.persistQueue();
      return plan;
    });
  }

  public addQueueItems(tracks: readonly Track[]): Promise<number> {
    return this.commands.run(async () => {
      const backend = this.requireBackend();
      if (tracks.length === 0) {
        return 0;
      }

      const { valid } = await this.builder.validate(tracks);
      if (valid.length === 0) {
        throw new EmptyQueueError();
      }

      if (this.queue.length === 0) {
        await backend.open(valid.map(toSource), 0);
        this.queue.replace(valid, 0);
        this.positionReset = true;
        this.emitQueue();
        this.announceCurrentTrack(false);
      } else {
        await backend.append(valid.map(toSource));
        this.queue.append(valid);
        this.emitQueue();
        this.publish(this.compose());
      }

      await this.persistQueue();
      return valid.length;
    });
  }

  public removeQueueItem(trackId: string): Promise<void> {
    return this.commands.run(async () => {
      const backend = this.requireBackend();
      const position = this.queue.indexOf(trackId);
      if (position < 0) {
        throw new TrackNotFoundError(trackId);
      }

      const wasPlaying = this.snapshot.playing;
      await backend.remove(position);
      const { wasCurrent } = this.queue.removeAt(position);
      this.emitQueue();

      if (wasCurrent) {
        this.positionReset = true;
        this.announceCurrentTrack(wasPlaying && this.queue.length > 0);
      } else {
        this.publish(this.compose());
      }

      await this.persistQueue();
    });
  }

  public clearQueue(): Promise<void> {
    return this.commands.run(async () => {
      const backend = this.requireBackend();
      await backend.stop();
      await backend.open([], 0);
      this.queue.clear();
      this.positionReset = true;
      this.emitQueue();
      this.announceCurrentTrack(false);
      await this.persistQueue();
    });
  }

  public play(): Promise<void> {
    return this.commands.run(() => this.applyPlay());
  }

  public pause(): Promise<void> {
    return this.commands.run(() => this.applyPause());
  }

  /** Decides between play and pause from the state at the moment the command runs. */
  public togglePlayPause(): Promise<void> {
    return this.commands.run(async () => {
      if (this.snapshot.playing) {
        await this.applyPause();
      } else {
        await this.applyPlay();
      }
    });
  }

  /** Halts playback but keeps the current track; the next play starts it from the top. */
  public stop(): Promise<void> {
    return this.commands.run(async () => {
      const backend = this.requireBackend();
      if (!this.queue.current()) {
        this.logger.warn("Stop requested with nothing queued.");
        return;
      }

      this.positionReset = true;
      await this.applyOptimistic({ playing: false, positionSec: 0, processingState: "idle" }, async () => {
        await backend.stop();
      });
      await this.persistQueue();
    });
  }

  public seek(positionSec: number): Promise<void> {
    return this.commands.run(() => this.applySeek(positionSec));
  }

  /** Offsets from the position the previous command left behind, not the one seen when queueing. */
  public seekBy(offsetSec: number): Promise<void> {
    return this.commands.run(async () => {
      if (!Number.isFinite(offsetSec)) {
        throw new RangeError("Seek offset must be a finite number of seconds.");
      }
      await this.applySeek(this.snapshot.positionSec + offsetSec);
    });
  }

  public skipToNext(): Promise<void> {
    return this.commands.run(async () => {
      const backend = this.requireBackend();
      if (this.queue.length === 0) {
        this.logger.warn("Skip to next requested with an empty queue.");
        return;
      }

      await this.extendIfNeeded();
      const action = resolveSkipNext(this.settings.repeatMode, backend.getPlaybackOrder(), this.queue.currentIndex);
      await this.applySkip(backend, action);
    });
  }

  public skipToPrevious(): Promise<void> {
    return this.commands.run(async () => {
      const backend = this.requireBackend();
      if (this.queue.length === 0) {
        this.logger.warn("Skip to previous requested with an empty queue.");
        return;
      }

      const action = resolveSkipPrevious(this.settings.repeatMode, backend.getPlaybackOrder(), this.queue.currentIndex);
      await this.applySkip(backend, action);
    });
  }

  public skipToIndex(index: number): Promise<void> {
    return this.commands.run(async () => {
      const backend = this.requireBackend();
      if (!Number.isInteger(index) || index < 0 || index >= this.queue.length) {
        throw new RangeError(`Queue position ${index} is out of range (queue has ${this.queue.length}).`);
      }

      if (index === this.queue.currentIndex) {
        await this.seekCurrent(backend, 0);
        return;
      }

      await this.switchTo(backend, index, true);
    });
  }

  public setRepeatMode(mode: RepeatMode): Promise<void> {
    return this.commands.run(async () => {
      await this.backend?.setLoopMode(toLoopMode(mode));
      this.settings = { ...this.settings, repeatMode: mode };
      await this.commitSettings();
      this.publish(this.compose());
      await this.extendIfNeeded();
    });
  }

  public setShuffle(enabled: boolean): Promise<void> {
    return this.commands.run(async () => {
      await this.backend?.setShuffle(enabled);
      this.settings = { ...this.settings, shuffleEnabled: enabled };
      await this.commitSettings();
      this.publish(this.compose());
    });
  }

  public setSpeed(speed: number): Promise<void> {
    return this.commands.run(async () => {
      if (!Number.isFinite(speed)) {
        throw new RangeError("Playback speed must be a finite number.");
      }

      const next = sanitizeSpeed(speed);
      await this.backend?.setSpeed(next);
      this.settings = { ...this.settings, speed: next };
      await this.commitSettings();
      this.publish(this.compose());
    });
  }

  public setVolume(percent: number): Promise<void> {
    return this.commands.run(async () => {
      if (!Number.isFinite(percent)) {
        throw new RangeError("Volume must be a finite percentage.");
      }

      const next = sanitizeVolume(percent);
      await this.backend?.setVolume(next);
      this.settings = { ...this.settings, volumePercent: next };
      await this.commitSettings();
      this.publish(this.compose());
    });
  }

  /** DSP knobs are stored and reported only; nothing is applied to the decoder. */
  public updateDspSettings(changes: Partial<DspSettings>): Promise<void> {
    return this.commands.run(async () => {
      this.settings = sanitizeSettings({
        ...this.settings,
        dsp: { ...this.settings.dsp, ...changes }
      });
      await this.commitSettings();
    });
  }

  public startSleepTimer(minutes: number): Promise<void> {
    return this.commands.run(async () => {
      const armed = this.sleepTimer.start(minutes);
      this.settings = {
        ...this.settings,
        sleepTimer: { enabled: true, durationMinutes: armed.durationMinutes, armedAt: armed.armedAt }
      };
      this.logger.info(`Sleep timer armed for ${minutes} minute(s).`);
      await this.commitSettings();
    });
  }

  public cancelSleepTimer(): Promise<boolean> {
    return this.commands.run(async () => {
      const wasActive = this.sleepTimer.cancel();
      this.settings = {
        ...this.settings,
        sleepTimer: { ...this.settings.sleepTimer, enabled: false, armedAt: null }
      };
      await this.commitSettings();
      return wasActive;
    });
  }

  public getSleepTimerRemainingMs(): number {
    return this.sleepTimer.remainingMs();
  }

  private requireBackend(): PlaybackBackend {
    if (!this.backend) {
      throw new DecoderUnavailableError();
    }
    return this.backend;
  }

  /** Rebuilds the whole snapshot from the decoder status, the queue and the settings. */
  private compose(): PlaybackSnapshot {
    const status = this.backend?.getStatus() ?? IDLE_STATUS;
    const track = this.queue.current();
    const playing = track !== null && status.playing && status.processingState !== "completed";
    const durationSec = track ? status.durationSec ?? knownDuration(track) : null;

    let positionSec = track ? Math.max(0, status.positionSec) : 0;
    if (durationSec != null) {
      positionSec = Math.min(positionSec, durationSec);
    }

    // Between two emissions for the same track the position only moves forward,
    // unless something deliberately moved it back.
    const previous = this.snapshot;
    if (
      !this.positionReset
      && track
      && previous
      && previous.currentTrack?.id === track.id
      && positionSec < previous.positionSec
    ) {
      positionSec = previous.positionSec;
    }
    this.positionReset = false;

    return {
      currentTrack: track,
      queueIndex: this.queue.currentIndex,
      playing,
      processingState: track ? status.processingState : "idle",
      positionSec,
      durationSec,
      bufferedPositionSec: track ? Math.max(0, status.bufferedPositionSec) : 0,
      speed: this.settings.speed,
      volumePercent: this.settings.volumePercent,
      repeatMode: this.settings.repeatMode,
      shuffleEnabled: this.settings.shuffleEnabled,
      controls: deriveControls(playing, track !== null),
      confirmed: true,
      updatedAt: this.now()
    };
  }

  private optimisticSnapshot(changes: SnapshotChanges): PlaybackSnapshot {
    const next = { ...this.snapshot, ...changes };
    const playing = next.playing && next.currentTrack !== null;
    return {
      ...next,
      playing,
      controls: deriveControls(playing, next.currentTrack !== null),
      confirmed: false,
      updatedAt: this.now()
    };
  }

  /**
   * Publishes the expected outcome first, then runs the decoder call. On success
   * the guess is replaced by a freshly composed snapshot; on failure the
   * snapshot from before the command is restored and the error rethrown.
   */
  private async applyOptimistic(changes: SnapshotChanges, action: () => Promise<void>): Promise<void> {
    const previous = this.snapshot;
    this.publish(this.optimisticSnapshot(changes));

    try {
      await action();
    } catch (error) {
      this.logger.warn(`Decoder rejected command, rolling back: ${(error as Error).message}`);
      this.publish({ ...previous, updatedAt: this.now() });
      throw error;
    }

    this.publish(this.compose());
  }

  private publish(snapshot: PlaybackSnapshot): void {
    this.snapshot = snapshot;
    this.events.emit({ type: "playback.snapshot", payload: snapshot });
    this.ticker.update(snapshot.playing ? "playing" : snapshot.currentTrack ? "paused" : "idle");
  }

  private emitQueue(): void {
    this.events.emit({ type: "queue.snapshot", payload: this.queue.toView() });
  }

  private announceCurrentTrack(countAsPlayed: boolean): void {
    this.publish(this.compose());
    this.events.emit({ type: "track.changed", payload: { track: this.queue.current(), index: this.queue.currentIndex } });

    if (countAsPlayed) {
      this.recordCurrentPlay();
    }
  }

  private recordCurrentPlay(): void {
    const track = this.queue.current();
    if (track) {
      this.trackSideEffect(this.recordPlayback(track));
    }
  }

  private async applyIndexAdvanced(index: number): Promise<void> {
    if (index === this.queue.currentIndex) {
      this.logger.debug(`Ignoring repeated index ${index}.`);
      return;
    }

    if (!this.queue.setIndex(index)) {
      this.logger.warn(`Decoder reported index ${index} outside a queue of ${this.queue.length}.`);
      return;
    }

    this.positionReset = true;
    this.announceCurrentTrack(true);
    await this.extendIfNeeded();
    await this.persistQueue();
  }

  private async applyTrackFinished(index: number): Promise<void> {
    if (index !== this.queue.currentIndex && !this.queue.setIndex(index)) {
      this.logger.warn(`Decoder finished unknown index ${index}.`);
      return;
    }

    const backend = this.requireBackend();
    await this.extendIfNeeded();
    const action = resolveCompletion(this.settings.repeatMode, backend.getPlaybackOrder(), this.queue.currentIndex);

    switch (action.type) {
      case "advance":
      case "wrap":
        await this.switchTo(backend, action.index, true);
        return;
      case "loopInPlace":
        this.positionReset = true;
        this.publish(this.compose());
        return;
      case "stopAtEnd":
        this.logger.info("Reached the end of the queue.");
        this.publish(this.compose());
        await this.persistQueue();
        return;
    }
  }

  private async applySkip(backend: PlaybackBackend, action: SkipAction | null): Promise<void> {
    if (!action) {
      this.logger.warn("Nothing to skip to.");
      return;
    }

    switch (action.type) {
      case "jump":
        await this.switchTo(backend, action.index, this.snapshot.playing);
        return;
      case "restart":
        await this.seekCurrent(backend, 0);
        return;
      case "stay":
        this.logger.debug("Repeat one keeps the current track.");
        return;
    }
  }

  private async applyPlay(): Promise<void> {
    const backend = this.requireBackend();
    const index = this.queue.currentIndex;
    if (index == null) {
      this.logger.warn("Play requested with nothing queued.");
      return;
    }

    const { processingState } = backend.getStatus();
    await this.applyOptimistic({ playing: true }, async () => {
      // After a natural end or a stop the decoder has nothing to resume, so start over.
      if (processingState === "completed" || processingState === "idle") {
        this.positionReset = true;
        await backend.seek(0, index);
      }
      await backend.play();
    });
  }

  private async applyPause(): Promise<void> {
    const backend = this.requireBackend();
    if (!this.queue.current()) {
      this.logger.warn("Pause requested with nothing queued.");
      return;
    }

    await this.applyOptimistic({ playing: false }, async () => {
      await backend.pause();
    });
    await this.persistQueue();
  }

  private async applySeek(positionSec: number): Promise<void> {
    if (!Number.isFinite(positionSec)) {
      throw new RangeError("Seek position must be a finite number of seconds.");
    }

    const backend = this.requireBackend();
    if (!this.queue.current()) {
      throw new NoCurrentTrackError("seek");
    }

    await this.seekCurrent(backend, positionSec);
  }

  private async seekCurrent(backend: PlaybackBackend, positionSec: number): Promise<void> {
    const target = clamp(positionSec, 0, this.snapshot.durationSec ?? Number.POSITIVE_INFINITY);
    this.positionReset = true;
    await this.applyOptimistic({ positionSec: target }, async () => {
      await backend.seek(target);
    });
  }

  private async switchTo(backend: PlaybackBackend, index: number, resume: boolean): Promise<void> {
    const previousIndex = this.queue.currentIndex;
    const previous = this.snapshot;
    if (!this.queue.setIndex(index)) {
      throw new RangeError(`Queue position ${index} is out of range.`);
    }

    const track = this.queue.current();
    this.publish(this.optimisticSnapshot({
      currentTrack: track,
      queueIndex: index,
      playing: resume,
      positionSec: 0,
      bufferedPositionSec: 0,
      durationSec: knownDuration(track)
    }));

    try {
      await backend.seek(0, index);
      if (resume) {
        await backend.play();
      }
    } catch (error) {
      if (previousIndex != null) {
        this.queue.setIndex(previousIndex);
      }
      this.logger.warn(`Switching to queue position ${index} failed: ${(error as Error).message}`);
      this.publish({ ...previous, updatedAt: this.now() });
      throw error;
    }

    this.positionReset = true;
    this.announceCurrentTrack(true);
    await this.extendIfNeeded();
    await this.persistQueue();
  }

  /**
   * Keeps a non-repeating queue from running dry by appending more catalog
   * tracks once playback gets close to its end.
   */
  private async extendIfNeeded(): Promise<void> {
    const backend = this.backend;
    const currentIndex = this.queue.currentIndex;
    if (
      !backend
      || this.settings.repeatMode !== "none"
      || currentIndex == null
      || this.queue.length - 1 - currentIndex > this.continuation.lookahead
    ) {
      return;
    }

    try {
      const batch = planContinuation({
        repeatMode: this.settings.repeatMode,
        queued: this.queue.getTracks(),
        currentIndex,
        catalog: await this.persistence.getAllTracks(),
        lookahead: this.continuation.lookahead,
        batchSize: this.continuation.batchSize
      });
      if (batch.length === 0) {
        return;
      }

      const { valid } = await this.builder.validate(batch);
      if (valid.length === 0) {
        return;
      }

      await backend.append(valid.map(toSource));
      this.queue.append(valid);
      this.emitQueue();
      this.logger.info(`Queue extended with ${valid.length} track(s).`);
    } catch (error) {
      this.logger.warn(`Extending the queue failed: ${(error as Error).message}`);
    }
  }

  private async restoreQueue(backend: PlaybackBackend, saved: QueueSnapshot): Promise<void> {
    if (saved.trackIds.length === 0) {
      return;
    }

    const found = await this.persistence.getTracksByIds(saved.trackIds);
    const byId = new Map(found.map((track) => [track.id, track]));
    const ordered = saved.trackIds.flatMap((id) => {
      const track = byId.get(id);
      return track ? [track] : [];
    });

    const { valid } = await this.builder.validate(ordered);
    if (valid.length === 0) {
      this.logger.warn("Saved queue has no playable tracks left.");
      if (this.queue.length > 0) {
        this.queue.clear();
        this.emitQueue();
      }
      return;
    }

    const currentId = saved.currentIndex == null ? null : saved.trackIds[saved.currentIndex] ?? null;
    const located = currentId == null ? -1 : valid.findIndex((track) => track.id === currentId);
    const index = Math.max(0, located);

    await backend.open(valid.map(toSource), index);
    if (located >= 0 && saved.positionSec > 0) {
      await backend.seek(saved.positionSec);
    }

    this.queue.replace(valid, index);
    this.positionReset = true;
    this.emitQueue();
    this.events.emit({ type: "track.changed", payload: { track: this.queue.current(), index } });
    this.logger.info(`Restored a queue of ${valid.length} track(s) at position ${index + 1}.`);
  }

  private async restoreSleepTimer(): Promise<void> {
    const { sleepTimer } = this.settings;
    if (!sleepTimer.enabled || sleepTimer.armedAt == null) {
      this.sleepTimer.cancel();
      return;
    }

    if (this.sleepTimer.resume(sleepTimer.durationMinutes, sleepTimer.armedAt)) {
      this.logger.info(`Sleep timer restored, ${Math.ceil(this.sleepTimer.remainingMs() / 60_000)} minute(s) left.`);
      return;
    }

    this.settings = { ...this.settings, sleepTimer: { ...sleepTimer, enabled: false, armedAt: null } };
    await this.commitSettings();
  }

  private handleSleepTimerExpired(): void {
    void this.commands.run(async () => {
      this.logger.info("Sleep timer expired, pausing playback.");
      this.settings = {
        ...this.settings,
        sleepTimer: { ...this.settings.sleepTimer, enabled: false, armedAt: null }
      };
      await this.commitSettings();

      const backend = this.backend;
      if (!backend || !this.snapshot.playing) {
        return;
      }

      await this.applyOptimistic({ playing: false }, async () => {
        await backend.pause();
      });
      await this.persistQueue();
    }).catch((error: unknown) => {
      this.logger.error(`Sleep timer pause failed: ${(error as Error).message}`);
    });
  }

  private scheduleTick(): void {
    if (this.tickQueued) {
      return;
    }

    this.tickQueued = true;
    void this.commands.run(() => {
      this.tickQueued = false;
      if (!this.backend || !this.queue.current()) {
        return;
      }

      const snapshot = this.compose();
      this.publish(snapshot);
      this.events.emit({
        type: "position",
        payload: {
          positionSec: snapshot.positionSec,
          durationSec: snapshot.durationSec,
          bufferedPositionSec: snapshot.bufferedPositionSec
        }
      });
    }).catch((error: unknown) => {
      this.logger.error(`Position tick failed: ${(error as Error).message}`);
    });
  }

  private async commitSettings(): Promise<void> {
    const settings = this.getSettings();
    this.events.emit({ type: "settings.updated", payload: settings });
    try {
      await this.persistence.saveSettings(settings);
    } catch (error) {
      this.logger.warn(`Saving settings failed: ${(error as Error).message}`);
    }
  }

  private async persistQueue(): Promise<void> {
    try {
      await this.persistence.saveQueueSnapshot(this.captureQueueSnapshot());
    } catch (error) {
      this.logger.warn(`Saving the queue failed: ${(error as Error).message}`);
    }
  }

  private async recordPlayback(track: Track): Promise<void> {
    try {
      await this.persistence.incrementPlayCount(track.id);
      await this.persistence.recordRecentlyPlayed(track.id);
    } catch (error) {
      this.logger.warn(`Updating play statistics for "${track.title}" failed: ${(error as Error).message}`);
    }
  }

  private trackSideEffect(task: Promise<void>): void {
    this.sideEffects.add(task);
    void task.finally(() => {
      this.sideEffects.delete(task);
    });
  }
}
