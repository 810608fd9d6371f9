import type { PlaybackSettings, QueueSnapshot, Track } from "../../shared/types.js";
import { ConfigStore } from "./config-store.js";
import { CoverArtService } from "./cover-art-service.js";
import { LibraryStore } from "./library-store.js";
import type { Logger } from "./logger.js";
import { MetadataService, toTrack } from "./metadata-service.js";
import { isAudioFile, isDirectory, listAudioFilesRecursive, normalizePath } from "./path-utils.js";
import { SessionStore } from "./session-store.js";

/** Catalog, queue and settings storage as the playback engine sees it. */
export interface PersistenceGateway {
  getAllTracks(): Promise<Track[]>;
  getTracksByIds(ids: readonly string[]): Promise<Track[]>;
  saveQueueSnapshot(snapshot: QueueSnapshot): Promise<void>;
  loadQueueSnapshot(): Promise<QueueSnapshot | null>;
  incrementPlayCount(trackId: string): Promise<void>;
  recordRecentlyPlayed(trackId: string): Promise<void>;
  loadSettings(): Promise<PlaybackSettings>;
  saveSettings(settings: PlaybackSettings): Promise<void>;
}

export interface ImportResult {
  added: Track[];
  skipped: number;
  failed: string[];
}

interface FilePersistenceOptions {
  dataDir: string;
  logger: Logger;
  metadataService?: MetadataService;
  coverArtService?: CoverArtService;
}

export class FilePersistence implements PersistenceGateway {
  private readonly logger: Logger;
  private readonly library: LibraryStore;
  private readonly sessions: SessionStore;
  private readonly config: ConfigStore;
  private readonly metadataService: MetadataService;
  private readonly coverArtService: CoverArtService;

  public constructor(options: FilePersistenceOptions) {
    this.logger = options.logger;
    this.library = new LibraryStore(options.dataDir, options.logger.child("library"));
    this.sessions = new SessionStore(options.dataDir, options.logger.child("session"));
    this.config = new ConfigStore(options.dataDir, options.logger.child("config"));
    this.metadataService = options.metadataService ?? new MetadataService(options.logger.child("metadata"));
    this.coverArtService = options.coverArtService ?? new CoverArtService();
  }

  public async getAllTracks(): Promise<Track[]> {
    return await this.library.getAllTracks();
  }

  public async getTracksByIds(ids: readonly string[]): Promise<Track[]> {
    return await this.library.getTracksByIds(ids);
  }

  public async saveQueueSnapshot(snapshot: QueueSnapshot): Promise<void> {
    await this.sessions.save(snapshot);
  }

  public async loadQueueSnapshot(): Promise<QueueSnapshot | null> {
    return await this.sessions.load();
  }

  public async incrementPlayCount(trackId: string): Promise<void> {
    await this.library.incrementPlayCount(trackId);
  }

  public async recordRecentlyPlayed(trackId: string): Promise<void> {
    await this.library.recordRecentlyPlayed(trackId);
  }

  public async loadSettings(): Promise<PlaybackSettings> {
    return await this.config.load();
  }

  public async saveSettings(settings: PlaybackSettings): Promise<void> {
    await this.config.save(settings);
  }

  public async getRecentlyPlayed(): Promise<Track[]> {
    return await this.library.getTracksByIds(await this.library.getRecentlyPlayed());
  }

  /** Reads tags for the given files (directories are walked) and adds new tracks to the catalog. */
  public async importFiles(paths: readonly string[]): Promise<ImportResult> {
    const files: string[] = [];
    for (const candidate of paths) {
      const normalized = normalizePath(candidate);
      if (await isDirectory(normalized)) {
        files.push(...(await listAudioFilesRecursive(normalized)));
      } else if (isAudioFile(normalized)) {
        files.push(normalized);
      } else {
        this.logger.warn(`Not an audio file: ${normalized}`);
      }
    }

    const tracks: Track[] = [];
    const failed: string[] = [];
    for (const filePath of files) {
      try {
        const tags = await this.metadataService.readTags(filePath);
        const artworkPath = await this.coverArtService.resolveForTrack(filePath);
        tracks.push(toTrack(filePath, tags, artworkPath));
      } catch (error) {
        failed.push(filePath);
        this.logger.warn(`Unable to read tags from ${filePath}: ${(error as Error).message}`);
      }
    }

    const added = await this.library.addTracks(tracks);
    return {
      added,
      skipped: tracks.length - added.length,
      failed
    };
  }
}
