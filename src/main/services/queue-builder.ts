import type { Track } from "../../shared/types.js";
import { EmptyQueueError, TrackNotFoundError } from "../../shared/errors.js";
import type { Logger } from "./logger.js";
import { hasAudioContent } from "./path-utils.js";

export type FileProbe = (filePath: string) => Promise<boolean>;

export type QueuePolicy = "circular" | "explicit";

export interface QueuePlan {
  tracks: Track[];
  initialIndex: number;
  policy: QueuePolicy;
  dropped: Track[];
}

interface QueueBuilderOptions {
  logger: Logger;
  probe?: FileProbe;
}

export class QueueBuilder {
  private readonly logger: Logger;
  private readonly probe: FileProbe;

  public constructor(options: QueueBuilderOptions) {
    this.logger = options.logger;
    this.probe = options.probe ?? hasAudioContent;
  }

  /**
   * A single selected track expands to the whole catalog in the order it was
   * shown, starting at that track. Anything larger is taken as-is from index 0.
   */
  public async build(selection: readonly Track[], catalogOrder: readonly Track[]): Promise<QueuePlan> {
    if (selection.length === 0) {
      throw new EmptyQueueError("Selection is empty.");
    }

    if (selection.length === 1) {
      return await this.buildCircular(selection[0], catalogOrder);
    }

    const { valid, dropped } = await this.validate(selection);
    if (valid.length === 0) {
      throw new EmptyQueueError();
    }

    return {
      tracks: valid,
      initialIndex: 0,
      policy: "explicit",
      dropped
    };
  }

  public async validate(candidates: readonly Track[]): Promise<{ valid: Track[]; dropped: Track[] }> {
    const checks = await Promise.all(candidates.map(async (track) => await this.isPlayable(track)));
    const valid: Track[] = [];
    const dropped: Track[] = [];

    candidates.forEach((track, index) => {
      if (checks[index]) {
        valid.push(track);
        return;
      }
      dropped.push(track);
      this.logger.warn(`Skipping unplayable track "${track.title}" (${track.filePath}).`);
    });

    return { valid, dropped };
  }

  private async buildCircular(selected: Track, catalogOrder: readonly Track[]): Promise<QueuePlan> {
    if (!catalogOrder.some((track) => track.id === selected.id)) {
      throw new TrackNotFoundError(selected.id);
    }

    const { valid, dropped } = await this.validate(catalogOrder);
    if (valid.length === 0) {
      throw new EmptyQueueError();
    }

    const initialIndex = valid.findIndex((track) => track.id === selected.id);
    if (initialIndex < 0) {
      throw new TrackNotFoundError(selected.id);
    }

    return {
      tracks: valid,
      initialIndex,
      policy: "circular",
      dropped
    };
  }

  private async isPlayable(track: Track): Promise<boolean> {
    try {
      return await this.probe(track.filePath);
    } catch (error) {
      this.logger.warn(`File check failed for ${track.filePath}: ${(error as Error).message}`);
      return false;
    }
  }
}
