import path from "node:path";
import { createHash } from "node:crypto";
import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { parseFile, type IAudioMetadata } from "music-metadata";
import type { Track } from "../../shared/types.js";
import type { Logger } from "./logger.js";
import { isRecord } from "./settings-utils.js";

const execFileAsync = promisify(execFile);

export const UNKNOWN_ARTIST = "Unknown Artist";
export const UNKNOWN_ALBUM = "Unknown Album";

export interface ExtractedTags {
  title: string | null;
  artist: string | null;
  album: string | null;
  trackNumber: number | null;
  year: number | null;
  genre: string | null;
  durationSec: number | null;
  /** Normalized 0..1, as tag readers report it. */
  rating: number | null;
}

function parseString(value: unknown): string | null {
  if (typeof value !== "string") {
    return null;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

function parsePositiveInteger(value: unknown): number | null {
  if (typeof value !== "number" || !Number.isFinite(value) || value <= 0) {
    return null;
  }

  return Math.floor(value);
}

function parseDuration(value: unknown): number | null {
  const parsed = typeof value === "string" ? Number(value) : value;
  if (typeof parsed !== "number" || !Number.isFinite(parsed) || parsed <= 0) {
    return null;
  }
  return parsed;
}

export function createTrackId(filePath: string): string {
  return createHash("sha1").update(path.resolve(filePath)).digest("hex").slice(0, 16);
}

export function extractTags(metadata: IAudioMetadata): ExtractedTags {
  const { common, format } = metadata;
  const rating = common.rating?.find((entry) => typeof entry.rating === "number")?.rating ?? null;

  return {
    title: parseString(common.title),
    artist: parseString(common.artist) ?? parseString(common.albumartist),
    album: parseString(common.album),
    trackNumber: parsePositiveInteger(common.track.no),
    year: parsePositiveInteger(common.year),
    genre: parseString(common.genre?.[0]),
    durationSec: parseDuration(format.duration),
    rating
  };
}

export function toTrack(filePath: string, tags: ExtractedTags, artworkPath: string | null): Track {
  const resolved = path.resolve(filePath);

  return {
    id: createTrackId(resolved),
    title: tags.title ?? path.basename(resolved, path.extname(resolved)),
    artist: tags.artist ?? UNKNOWN_ARTIST,
    album: tags.album ?? UNKNOWN_ALBUM,
    filePath: resolved,
    durationSec: tags.durationSec ?? 0,
    artworkPath,
    trackNumber: tags.trackNumber,
    year: tags.year,
    genre: tags.genre,
    isFavorite: false,
    rating: tags.rating == null ? null : Math.round(Math.min(1, Math.max(0, tags.rating)) * 5)
  };
}

export class MetadataService {
  private readonly logger: Logger;
  private readonly useFfprobe: boolean;
  private readonly inFlight = new Map<string, Promise<ExtractedTags>>();

  public constructor(logger: Logger, options: { useFfprobe?: boolean } = {}) {
    this.logger = logger;
    this.useFfprobe = options.useFfprobe ?? true;
  }

  public async readTags(filePath: string): Promise<ExtractedTags> {
    const pending = this.inFlight.get(filePath);
    if (pending) {
      return await pending;
    }

    const loader = (async () => {
      const metadata = await parseFile(filePath, { skipCovers: true, duration: true });
      const tags = extractTags(metadata);
      if (tags.durationSec == null && this.useFfprobe) {
        tags.durationSec = await this.probeDuration(filePath);
      }
      return tags;
    })();

    this.inFlight.set(filePath, loader);
    try {
      return await loader;
    } finally {
      this.inFlight.delete(filePath);
    }
  }

  private async probeDuration(filePath: string): Promise<number | null> {
    try {
      const { stdout } = await execFileAsync("ffprobe", [
        "-v",
        "error",
        "-show_format",
        "-of",
        "json",
        filePath
      ], {
        timeout: 8000
      });
      const parsed: unknown = JSON.parse(stdout);
      if (!isRecord(parsed) || !isRecord(parsed.format)) {
        return null;
      }
      return parseDuration(parsed.format.duration);
    } catch (error) {
      this.logger.debug(`ffprobe could not read ${filePath}: ${(error as Error).message}`);
      return null;
    }
  }
}
