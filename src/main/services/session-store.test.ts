import os from "node:os";
import path from "node:path";
import { promises as fs } from "node:fs";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { silentLogger } from "./logger.js";
import { parseQueueSnapshot, SessionStore } from "./session-store.js";

describe("parseQueueSnapshot", () => {
  it("rejects values without a track id list", () => {
    expect(parseQueueSnapshot(null)).toBeNull();
    expect(parseQueueSnapshot({ trackIds: "a,b" })).toBeNull();
  });

  it("drops bad ids and repairs the index and position", () => {
    expect(parseQueueSnapshot({ trackIds: ["a", 4, "", "b"], currentIndex: 7, positionSec: -3 })).toEqual({
      trackIds: ["a", "b"],
      currentIndex: 0,
      positionSec: 0
    });
  });

  it("has no index for an empty list", () => {
    expect(parseQueueSnapshot({ trackIds: [], currentIndex: 0, positionSec: 12 })).toEqual({
      trackIds: [],
      currentIndex: null,
      positionSec: 12
    });
  });
});

describe("SessionStore", () => {
  let dataDir: string;

  beforeEach(async () => {
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), "tonearm-session-"));
  });

  afterEach(async () => {
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  it("loads nothing before the first save", async () => {
    const store = new SessionStore(dataDir, silentLogger);
    expect(await store.load()).toBeNull();
  });

  it("reads back what it saved", async () => {
    const store = new SessionStore(dataDir, silentLogger);
    await store.save({ trackIds: ["a", "b", "c"], currentIndex: 2, positionSec: 41.5 });

    const reloaded = new SessionStore(dataDir, silentLogger);
    expect(await reloaded.load()).toEqual({ trackIds: ["a", "b", "c"], currentIndex: 2, positionSec: 41.5 });
  });
});
