import path from "node:path";
import type { QueueSnapshot } from "../../shared/types.js";
import { JsonFile } from "./json-file.js";
import type { Logger } from "./logger.js";
import { asFiniteNumber, isRecord } from "./settings-utils.js";

const QUEUE_FILE = "queue.json";

export function parseQueueSnapshot(value: unknown): QueueSnapshot | null {
  if (!isRecord(value) || !Array.isArray(value.trackIds)) {
    return null;
  }

  const trackIds = value.trackIds.filter((id): id is string => typeof id === "string" && id.length > 0);
  const rawIndex = value.currentIndex;
  const currentIndex = typeof rawIndex === "number"
    && Number.isInteger(rawIndex)
    && rawIndex >= 0
    && rawIndex < trackIds.length
    ? rawIndex
    : null;

  return {
    trackIds,
    currentIndex: trackIds.length === 0 ? null : currentIndex ?? 0,
    positionSec: Math.max(0, asFiniteNumber(value.positionSec, 0))
  };
}

export class SessionStore {
  private readonly file: JsonFile;

  public constructor(dataDir: string, logger: Logger) {
    this.file = new JsonFile(path.join(dataDir, QUEUE_FILE), logger);
  }

  public async load(): Promise<QueueSnapshot | null> {
    return parseQueueSnapshot(await this.file.read());
  }

  public async save(snapshot: QueueSnapshot): Promise<void> {
    await this.file.write(snapshot);
  }
}
