import path from "node:path";
import { promises as fs, type Dirent } from "node:fs";

const SUPPORTED_IMAGE_EXTENSIONS = new Set([
  ".jpg",
  ".jpeg",
  ".png",
  ".webp",
  ".bmp",
  ".gif"
]);

const PRIORITIZED_BASENAMES = [
  "cover",
  "folder",
  "front",
  "album",
  "artwork"
];

export function scoreImageName(fileName: string): number {
  const extension = path.extname(fileName).toLowerCase();
  if (!SUPPORTED_IMAGE_EXTENSIONS.has(extension)) {
    return Number.POSITIVE_INFINITY;
  }

  const baseName = path.basename(fileName, extension).toLowerCase();
  const exactPriority = PRIORITIZED_BASENAMES.indexOf(baseName);
  if (exactPriority >= 0) {
    return exactPriority;
  }

  for (const [index, token] of PRIORITIZED_BASENAMES.entries()) {
    if (baseName.includes(token)) {
      return 100 + index;
    }
  }

  return 1000;
}

/** Finds the image sitting next to a track that best looks like its album cover. */
export class CoverArtService {
  private readonly directoryCache = new Map<string, string | null>();

  public async resolveForTrack(trackPath: string): Promise<string | null> {
    const directory = path.dirname(trackPath);

    const cached = this.directoryCache.get(directory);
    if (cached !== undefined) {
      return cached;
    }

    let entries: Dirent[];
    try {
      entries = await fs.readdir(directory, { withFileTypes: true });
    } catch {
      this.directoryCache.set(directory, null);
      return null;
    }

    const best = entries
      .filter((entry) => entry.isFile())
      .map((entry) => ({ name: entry.name, score: scoreImageName(entry.name) }))
      .filter((candidate) => Number.isFinite(candidate.score))
      .sort((a, b) => (a.score !== b.score ? a.score - b.score : a.name.localeCompare(b.name)))[0];

    const resolved = best ? path.join(directory, best.name) : null;
    this.directoryCache.set(directory, resolved);
    return resolved;
  }

  public clearCache(): void {
    this.directoryCache.clear();
  }
}
