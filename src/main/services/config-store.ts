import path from "node:path";
import { DEFAULT_SETTINGS } from "../../shared/constants.js";
import type { PlaybackSettings } from "../../shared/types.js";
import { JsonFile } from "./json-file.js";
import type { Logger } from "./logger.js";
import { sanitizeSettings } from "./settings-utils.js";

const SETTINGS_FILE = "settings.json";

export class ConfigStore {
  private readonly file: JsonFile;
  private readonly defaults: PlaybackSettings;

  public constructor(dataDir: string, logger: Logger, defaults: PlaybackSettings = DEFAULT_SETTINGS) {
    this.file = new JsonFile(path.join(dataDir, SETTINGS_FILE), logger);
    this.defaults = sanitizeSettings(defaults, DEFAULT_SETTINGS);
  }

  public getDefaults(): PlaybackSettings {
    return sanitizeSettings(this.defaults, this.defaults);
  }

  public async load(): Promise<PlaybackSettings> {
    const parsed = await this.file.read();
    return parsed == null ? this.getDefaults() : sanitizeSettings(parsed, this.defaults);
  }

  public async save(next: PlaybackSettings): Promise<void> {
    await this.file.write(sanitizeSettings(next, this.defaults));
  }

  public getPath(): string {
    return this.file.getPath();
  }
}
