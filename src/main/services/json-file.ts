import path from "node:path";
import { promises as fs } from "node:fs";
import type { Logger } from "./logger.js";

/**
 * Reads and writes one JSON document. Writes are serialized and land through a
 * temp file plus rename, so readers never see a half-written file.
 */
export class JsonFile {
  private readonly filePath: string;
  private readonly logger: Logger;
  private writeQueue: Promise<void> = Promise.resolve();

  public constructor(filePath: string, logger: Logger) {
    this.filePath = filePath;
    this.logger = logger;
  }

  public getPath(): string {
    return this.filePath;
  }

  /** Resolves to null when the file is missing or not valid JSON. */
  public async read(): Promise<unknown> {
    let data: string;
    try {
      data = await fs.readFile(this.filePath, "utf8");
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== "ENOENT") {
        this.logger.warn(`Unable to read ${this.filePath}: ${(error as Error).message}`);
      }
      return null;
    }

    try {
      const parsed: unknown = JSON.parse(data);
      return parsed;
    } catch (error) {
      this.logger.warn(`Ignoring corrupt ${path.basename(this.filePath)}: ${(error as Error).message}`);
      return null;
    }
  }

  public async write(value: unknown): Promise<void> {
    const next = this.writeQueue.then(async () => {
      const dir = path.dirname(this.filePath);
      const tempPath = `${this.filePath}.${process.pid}.${Date.now()}.tmp`;

      await fs.mkdir(dir, { recursive: true });

      try {
        await fs.writeFile(tempPath, JSON.stringify(value, null, 2), "utf8");
        await fs.rename(tempPath, this.filePath);
      } catch (error) {
        await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
          this.logger.warn(`Unable to remove ${tempPath}: ${(cleanupError as Error).message}`);
        });
        throw error;
      }
    });

    // Keep the chain alive; this caller still gets the rejection below.
    this.writeQueue = next.catch(() => undefined);
    await next;
  }
}
