import path from "node:path";
import { RECENTLY_PLAYED_LIMIT } from "../../shared/constants.js";
import type { LibraryEntry, Track } from "../../shared/types.js";
import { JsonFile } from "./json-file.js";
import type { Logger } from "./logger.js";
import { isRecord } from "./settings-utils.js";

const LIBRARY_FILE = "library.json";

interface PersistedLibraryV1 {
  version: 1;
  entries: LibraryEntry[];
  recentlyPlayed: string[];
}

function optionalNumber(value: unknown): number | null {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

function optionalString(value: unknown): string | null {
  return typeof value === "string" && value.length > 0 ? value : null;
}

export function parseTrack(value: unknown): Track | null {
  if (!isRecord(value)) {
    return null;
  }

  const { id, title, filePath } = value;
  if (typeof id !== "string" || !id || typeof title !== "string" || typeof filePath !== "string" || !filePath) {
    return null;
  }

  const rating = optionalNumber(value.rating);

  return {
    id,
    title,
    artist: typeof value.artist === "string" ? value.artist : "",
    album: typeof value.album === "string" ? value.album : "",
    filePath,
    durationSec: Math.max(0, optionalNumber(value.durationSec) ?? 0),
    artworkPath: optionalString(value.artworkPath),
    trackNumber: optionalNumber(value.trackNumber),
    year: optionalNumber(value.year),
    genre: optionalString(value.genre),
    isFavorite: value.isFavorite === true,
    rating: rating == null ? null : Math.min(5, Math.max(0, Math.round(rating)))
  };
}

function parseEntry(value: unknown): LibraryEntry | null {
  if (!isRecord(value)) {
    return null;
  }

  const track = parseTrack(value.track);
  if (!track) {
    return null;
  }

  return {
    track,
    playCount: Math.max(0, Math.trunc(optionalNumber(value.playCount) ?? 0)),
    lastPlayedAt: optionalString(value.lastPlayedAt),
    addedAt: optionalString(value.addedAt) ?? new Date(0).toISOString()
  };
}

function compareCatalogOrder(a: Track, b: Track): number {
  return a.artist.localeCompare(b.artist)
    || a.album.localeCompare(b.album)
    || (a.trackNumber ?? 0) - (b.trackNumber ?? 0)
    || a.title.localeCompare(b.title);
}

/**
 * The track catalog with its play statistics. Catalog order (artist, album,
 * track number) is the order listings show and circular queues follow.
 */
export class LibraryStore {
  private readonly file: JsonFile;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private entries: LibraryEntry[] = [];
  private recentlyPlayed: string[] = [];
  private loadPromise: Promise<void> | null = null;

  public constructor(dataDir: string, logger: Logger, now: () => Date = () => new Date()) {
    this.file = new JsonFile(path.join(dataDir, LIBRARY_FILE), logger);
    this.logger = logger;
    this.now = now;
  }

  public async getAllTracks(): Promise<Track[]> {
    await this.ensureLoaded();
    return this.entries.map((entry) => entry.track);
  }

  public async getTracksByIds(ids: readonly string[]): Promise<Track[]> {
    await this.ensureLoaded();
    const byId = new Map(this.entries.map((entry) => [entry.track.id, entry.track]));
    return ids.flatMap((id) => {
      const track = byId.get(id);
      return track ? [track] : [];
    });
  }

  public async getEntry(trackId: string): Promise<LibraryEntry | null> {
    await this.ensureLoaded();
    const entry = this.entries.find((candidate) => candidate.track.id === trackId);
    return entry ? { ...entry } : null;
  }

  public async getRecentlyPlayed(): Promise<string[]> {
    await this.ensureLoaded();
    return [...this.recentlyPlayed];
  }

  /** Adds tracks not already present (by id), keeping catalog order. Returns the ones added. */
  public async addTracks(tracks: readonly Track[]): Promise<Track[]> {
    await this.ensureLoaded();
    const known = new Set(this.entries.map((entry) => entry.track.id));
    const addedAt = this.now().toISOString();
    const added: Track[] = [];

    for (const track of tracks) {
      if (known.has(track.id)) {
        continue;
      }
      known.add(track.id);
      added.push(track);
      this.entries.push({ track, playCount: 0, lastPlayedAt: null, addedAt });
    }

    if (added.length > 0) {
      this.entries.sort((a, b) => compareCatalogOrder(a.track, b.track));
      await this.persist();
    }

    return added;
  }

  public async incrementPlayCount(trackId: string): Promise<void> {
    await this.ensureLoaded();
    const entry = this.entries.find((candidate) => candidate.track.id === trackId);
    if (!entry) {
      this.logger.debug(`Play count skipped for unknown track ${trackId}.`);
      return;
    }

    entry.playCount += 1;
    entry.lastPlayedAt = this.now().toISOString();
    await this.persist();
  }

  public async recordRecentlyPlayed(trackId: string): Promise<void> {
    await this.ensureLoaded();
    this.recentlyPlayed = [trackId, ...this.recentlyPlayed.filter((id) => id !== trackId)]
      .slice(0, RECENTLY_PLAYED_LIMIT);
    await this.persist();
  }

  private async ensureLoaded(): Promise<void> {
    if (!this.loadPromise) {
      this.loadPromise = this.load();
    }
    await this.loadPromise;
  }

  private async load(): Promise<void> {
    const parsed = await this.file.read();
    if (!isRecord(parsed)) {
      return;
    }

    const rawEntries = Array.isArray(parsed.entries) ? parsed.entries : [];
    this.entries = rawEntries.flatMap((value) => {
      const entry = parseEntry(value);
      return entry ? [entry] : [];
    });

    const rawRecent = Array.isArray(parsed.recentlyPlayed) ? parsed.recentlyPlayed : [];
    this.recentlyPlayed = rawRecent
      .filter((id): id is string => typeof id === "string")
      .slice(0, RECENTLY_PLAYED_LIMIT);
  }

  private async persist(): Promise<void> {
    const payload: PersistedLibraryV1 = {
      version: 1,
      entries: this.entries,
      recentlyPlayed: this.recentlyPlayed
    };
    await this.file.write(payload);
  }
}
