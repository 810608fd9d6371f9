import os from "node:os";
import path from "node:path";
import { promises as fs } from "node:fs";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { makeTrack } from "../../test/fakes.js";
import { LibraryStore, parseTrack } from "./library-store.js";
import { silentLogger } from "./logger.js";

const fixedNow = (): Date => new Date("2026-04-02T10:30:00.000Z");

describe("parseTrack", () => {
  it("requires an id, a title and a file path", () => {
    expect(parseTrack({ id: "a", title: "A" })).toBeNull();
    expect(parseTrack("a")).toBeNull();
  });

  it("fills optional fields and clamps the rating", () => {
    expect(parseTrack({ id: "a", title: "A", filePath: "/m/a.mp3", rating: 7.2, durationSec: -1 })).toEqual({
      id: "a",
      title: "A",
      artist: "",
      album: "",
      filePath: "/m/a.mp3",
      durationSec: 0,
      artworkPath: null,
      trackNumber: null,
      year: null,
      genre: null,
      isFavorite: false,
      rating: 5
    });
  });
});

describe("LibraryStore", () => {
  let dataDir: string;

  beforeEach(async () => {
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), "tonearm-library-"));
  });

  afterEach(async () => {
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  it("keeps tracks in artist, album, track number order and skips known ids", async () => {
    const store = new LibraryStore(dataDir, silentLogger, fixedNow);

    const added = await store.addTracks([
      makeTrack("b2", { artist: "Brook", album: "One", trackNumber: 2 }),
      makeTrack("a1", { artist: "Alder", album: "Two", trackNumber: 1 }),
      makeTrack("b1", { artist: "Brook", album: "One", trackNumber: 1 })
    ]);
    const again = await store.addTracks([makeTrack("a1", { artist: "Alder" })]);

    expect(added.map((track) => track.id)).toEqual(["b2", "a1", "b1"]);
    expect(again).toEqual([]);
    expect((await store.getAllTracks()).map((track) => track.id)).toEqual(["a1", "b1", "b2"]);
  });

  it("returns tracks in the order the ids were asked for", async () => {
    const store = new LibraryStore(dataDir, silentLogger, fixedNow);
    await store.addTracks([makeTrack("x"), makeTrack("y"), makeTrack("z")]);

    const found = await store.getTracksByIds(["z", "missing", "x"]);
    expect(found.map((track) => track.id)).toEqual(["z", "x"]);
  });

  it("records play counts and recently played tracks on disk", async () => {
    const store = new LibraryStore(dataDir, silentLogger, fixedNow);
    await store.addTracks([makeTrack("x"), makeTrack("y")]);

    await store.incrementPlayCount("x");
    await store.incrementPlayCount("x");
    await store.recordRecentlyPlayed("x");
    await store.recordRecentlyPlayed("y");
    await store.recordRecentlyPlayed("x");

    const reloaded = new LibraryStore(dataDir, silentLogger, fixedNow);
    expect(await reloaded.getEntry("x")).toEqual({
      track: makeTrack("x"),
      playCount: 2,
      lastPlayedAt: "2026-04-02T10:30:00.000Z",
      addedAt: "2026-04-02T10:30:00.000Z"
    });
    expect(await reloaded.getRecentlyPlayed()).toEqual(["x", "y"]);
  });

  it("ignores play counts for unknown tracks", async () => {
    const store = new LibraryStore(dataDir, silentLogger, fixedNow);
    await store.incrementPlayCount("ghost");
    expect(await store.getEntry("ghost")).toBeNull();
  });
});
