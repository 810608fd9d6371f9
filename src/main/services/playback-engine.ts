import { CONTINUATION_BATCH_SIZE, CONTINUATION_LOOKAHEAD, FAILURE_THRESHOLD, PAUSED_TICK_MS, PLAYING_TICK_MS } from "../../shared/constants.js";
import { describeError, TrackNotFoundError } from "../../shared/errors.js";
import { nextRepeatMode } from "../../shared/format.js";
import type {
  EngineCommand,
  PlaybackSettings,
  PlaybackSnapshot,
  QueueSnapshot,
  QueueView,
  Track
} from "../../shared/types.js";
import { EventHub, type EngineListener } from "./event-hub.js";
import { FailureSupervisor } from "./failure-supervisor.js";
import type { Logger } from "./logger.js";
import type { PersistenceGateway } from "./persistence.js";
import type { PlaybackBackend } from "./playback/backend.js";
import type { TickerIntervals } from "./position-ticker.js";
import { QueueBuilder, type FileProbe } from "./queue-builder.js";
import { PlaybackSynchronizer } from "./playback-synchronizer.js";

export interface EngineOptions {
  createBackend(): PlaybackBackend;
  persistence: PersistenceGateway;
  logger: Logger;
  probe?: FileProbe;
  failureThreshold?: number;
  tickIntervals?: TickerIntervals;
  continuationBatchSize?: number;
  continuationLookahead?: number;
  now?: () => number;
}

/**
 * Wires the decoder, the synchronizer and the failure supervisor together and
 * owns their lifecycle: startup, recovery after repeated decoder failures and
 * shutdown.
 */
export class PlaybackEngine {
  private readonly createBackend: () => PlaybackBackend;
  private readonly persistence: PersistenceGateway;
  private readonly logger: Logger;
  private readonly hub: EventHub;
  private readonly supervisor: FailureSupervisor;
  private readonly synchronizer: PlaybackSynchronizer;
  private initPromise: Promise<void> | null = null;
  private shutdownPromise: Promise<void> | null = null;
  private reinitializeCount = 0;

  public constructor(options: EngineOptions) {
    this.createBackend = options.createBackend;
    this.persistence = options.persistence;
    this.logger = options.logger;
    this.hub = new EventHub(options.logger.child("events"));
    this.supervisor = new FailureSupervisor({
      threshold: options.failureThreshold ?? FAILURE_THRESHOLD,
      logger: options.logger.child("supervisor"),
      reinitialize: async () => {
        await this.rebuild();
      }
    });
    this.synchronizer = new PlaybackSynchronizer({
      persistence: options.persistence,
      builder: new QueueBuilder({ logger: options.logger.child("queue"), probe: options.probe }),
      supervisor: this.supervisor,
      events: this.hub,
      logger: options.logger.child("synchronizer"),
      tickIntervals: options.tickIntervals ?? { playingMs: PLAYING_TICK_MS, pausedMs: PAUSED_TICK_MS },
      continuation: {
        batchSize: options.continuationBatchSize ?? CONTINUATION_BATCH_SIZE,
        lookahead: options.continuationLookahead ?? CONTINUATION_LOOKAHEAD
      },
      now: options.now
    });
  }

  public get playback(): PlaybackSynchronizer {
    return this.synchronizer;
  }

  public get reinitializations(): number {
    return this.reinitializeCount;
  }

  public async init(): Promise<void> {
    if (!this.initPromise) {
      this.initPromise = this.startBackend(null);
    }
    await this.initPromise;
  }

  /** Tears the decoder down and brings everything back; concurrent calls share one run. */
  public async reinitialize(): Promise<void> {
    await this.supervisor.reinitialize();
  }

  public async shutdown(): Promise<void> {
    if (this.shutdownPromise) {
      return this.shutdownPromise;
    }

    this.shutdownPromise = (async () => {
      if (this.initPromise) {
        await this.initPromise.catch((error: unknown) => {
          this.logger.warn(`Shutting down after a failed start: ${(error as Error).message}`);
        });
      }

      await this.synchronizer.whenIdle();
      this.synchronizer.dispose();

      try {
        await this.persistence.saveQueueSnapshot(this.synchronizer.captureQueueSnapshot());
      } catch (error) {
        this.logger.warn(`Saving the queue on shutdown failed: ${(error as Error).message}`);
      }

      const backend = this.synchronizer.detachBackend();
      if (backend) {
        await backend.shutdown();
      }
    })();

    await this.shutdownPromise;
  }

  public subscribe(listener: EngineListener): () => void {
    return this.hub.subscribe(listener);
  }

  public getSnapshot(): PlaybackSnapshot {
    return this.synchronizer.getSnapshot();
  }

  public getQueue(): QueueView {
    return this.synchronizer.getQueue();
  }

  public getSettings(): PlaybackSettings {
    return this.synchronizer.getSettings();
  }

  /**
   * Entry point for loosely typed callers (command line, media keys). Errors are
   * logged and reported as `engine.error` events instead of being thrown.
   */
  public async dispatch(command: EngineCommand): Promise<void> {
    try {
      await this.execute(command);
    } catch (error) {
      const described = describeError(error);
      this.logger.error(`Command "${command.type}" failed: ${described.message}`);
      this.hub.emit({ type: "engine.error", payload: described });
    }
  }

  private async execute(command: EngineCommand): Promise<void> {
    const playback = this.synchronizer;

    switch (command.type) {
      case "play":
        await playback.play();
        return;
      case "pause":
        await playback.pause();
        return;
      case "playPause":
        await playback.togglePlayPause();
        return;
      case "stop":
        await playback.stop();
        return;
      case "next":
        await playback.skipToNext();
        return;
      case "previous":
        await playback.skipToPrevious();
        return;
      case "seekAbsolute":
        await playback.seek(command.seconds);
        return;
      case "seekRelative":
        await playback.seekBy(command.seconds);
        return;
      case "skipToIndex":
        await playback.skipToIndex(command.index);
        return;
      case "setQueue": {
        const selection = await this.resolveTracks(command.trackIds);
        await playback.setQueue(selection, { autoplay: command.autoplay ?? true });
        return;
      }
      case "addQueueItems":
        await playback.addQueueItems(await this.resolveTracks(command.trackIds));
        return;
      case "removeQueueItem":
        await playback.removeQueueItem(command.trackId);
        return;
      case "clearQueue":
        await playback.clearQueue();
        return;
      case "setRepeatMode":
        await playback.setRepeatMode(command.mode);
        return;
      case "cycleRepeat":
        await playback.setRepeatMode(nextRepeatMode(playback.getSettings().repeatMode));
        return;
      case "setShuffle":
        await playback.setShuffle(command.enabled);
        return;
      case "toggleShuffle":
        await playback.setShuffle(!playback.getSettings().shuffleEnabled);
        return;
      case "setSpeed":
        await playback.setSpeed(command.speed);
        return;
      case "setVolume":
        await playback.setVolume(command.percent);
        return;
      case "updateDsp":
        await playback.updateDspSettings(command.dsp);
        return;
      case "startSleepTimer":
        await playback.startSleepTimer(command.minutes);
        return;
      case "cancelSleepTimer":
        await playback.cancelSleepTimer();
        return;
    }
  }

  private async resolveTracks(trackIds: readonly string[]): Promise<Track[]> {
    const found = await this.persistence.getTracksByIds(trackIds);
    const byId = new Map(found.map((track) => [track.id, track]));

    return trackIds.map((id) => {
      const track = byId.get(id);
      if (!track) {
        throw new TrackNotFoundError(id);
      }
      return track;
    });
  }

  private async startBackend(restoreOverride: QueueSnapshot | null): Promise<void> {
    const backend = this.createBackend();
    await backend.start();
    this.synchronizer.attachBackend(backend);

    const settings = await this.persistence.loadSettings();
    const restore = restoreOverride
      ?? (settings.resumeOnStartup ? await this.persistence.loadQueueSnapshot() : null);
    await this.synchronizer.initialize(settings, restore);
  }

  private async rebuild(): Promise<void> {
    this.reinitializeCount += 1;
    // Commands already queued finish on the old decoder first, so the queue captured below is the one they left.
    await this.synchronizer.whenIdle();
    const lastQueue = this.synchronizer.captureQueueSnapshot();
    const wasPlaying = this.synchronizer.getSnapshot().playing;
    const previous = this.synchronizer.detachBackend();
    this.logger.warn("Reinitializing the playback decoder.");

    if (previous) {
      try {
        await previous.shutdown();
      } catch (error) {
        this.logger.warn(`Old decoder did not shut down cleanly: ${(error as Error).message}`);
      }
    }

    try {
      await this.startBackend(lastQueue.trackIds.length > 0 ? lastQueue : null);
      if (wasPlaying) {
        await this.synchronizer.play();
      }
      this.hub.emit({ type: "engine.reinitialized", payload: { ok: true } });
    } catch (error) {
      this.logger.fatal(`Decoder could not be restarted: ${(error as Error).message}`);
      const failed = this.synchronizer.detachBackend();
      if (failed) {
        await failed.shutdown().catch((shutdownError: unknown) => {
          this.logger.warn(`Discarding the failed decoder: ${(shutdownError as Error).message}`);
        });
      }
      await this.synchronizer.resetToIdle();
      this.hub.emit({ type: "engine.reinitialized", payload: { ok: false } });
    }
  }
}
