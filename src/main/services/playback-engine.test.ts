import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type { EngineEvent, PlaybackSettings, Track } from "../../shared/types.js";
import { FakeBackend, MemoryPersistence, makeTrack } from "../../test/fakes.js";
import { silentLogger } from "./logger.js";
import { PlaybackEngine } from "./playback-engine.js";

const catalog = ["a", "b", "c", "d", "e"].map((id) => makeTrack(id));

function makeEngine(options: { tracks?: Track[]; settings?: Partial<PlaybackSettings>; failStartFrom?: number } = {}) {
  const persistence = new MemoryPersistence(options.tracks ?? catalog, options.settings);
  const backends: FakeBackend[] = [];
  const events: EngineEvent[] = [];
  const engine = new PlaybackEngine({
    persistence,
    logger: silentLogger,
    probe: async () => true,
    createBackend: () => {
      const backend = new FakeBackend();
      if (options.failStartFrom !== undefined && backends.length >= options.failStartFrom) {
        backend.failNext("start", new Error("mpv missing"));
      }
      backends.push(backend);
      return backend;
    }
  });
  engine.subscribe((event) => {
    events.push(event);
  });
  return { engine, persistence, backends, events };
}

function ofType<T extends EngineEvent["type"]>(events: readonly EngineEvent[], type: T) {
  return events.filter((event): event is Extract<EngineEvent, { type: T }> => event.type === type);
}

describe("PlaybackEngine", () => {
  let engine: PlaybackEngine | null = null;

  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(async () => {
    await engine?.shutdown();
    engine = null;
    vi.useRealTimers();
  });

  describe("init", () => {
    it("starts one decoder and restores the saved queue paused", async () => {
      const harness = makeEngine();
      engine = harness.engine;
      harness.persistence.queueSnapshot = { trackIds: ["b", "c"], currentIndex: 1, positionSec: 20 };

      await Promise.all([harness.engine.init(), harness.engine.init()]);

      expect(harness.backends).toHaveLength(1);
      expect(harness.backends[0].started).toBe(true);
      expect(harness.backends[0].callsTo("open")).toEqual([[["b", "c"], 1]]);
      expect(harness.engine.getSnapshot()).toMatchObject({ currentTrack: catalog[2], positionSec: 20, playing: false });
      expect(ofType(harness.events, "settings.updated")).toHaveLength(1);
    });

    it("starts empty when resuming is turned off", async () => {
      const harness = makeEngine({ settings: { resumeOnStartup: false } });
      engine = harness.engine;
      harness.persistence.queueSnapshot = { trackIds: ["b"], currentIndex: 0, positionSec: 0 };

      await harness.engine.init();

      expect(harness.backends[0].callsTo("open")).toEqual([]);
      expect(harness.engine.getQueue()).toEqual({ tracks: [], currentIndex: null });
    });
  });

  describe("dispatch", () => {
    it("reports failures as engine errors instead of throwing", async () => {
      const harness = makeEngine();
      engine = harness.engine;
      await harness.engine.init();

      await harness.engine.dispatch({ type: "setQueue", trackIds: ["nope"] });

      expect(ofType(harness.events, "engine.error").map((event) => event.payload)).toEqual([
        { code: "TRACK_NOT_FOUND", message: "Track nope is not in the catalog." }
      ]);
    });

    it("rejects commands before the decoder is up", async () => {
      const harness = makeEngine();
      engine = harness.engine;

      await harness.engine.dispatch({ type: "play" });

      expect(ofType(harness.events, "engine.error").map((event) => event.payload.code)).toEqual(["DECODER_UNAVAILABLE"]);
    });

    it("cycles repeat and toggles shuffle from the current settings", async () => {
      const harness = makeEngine();
      engine = harness.engine;
      await harness.engine.init();

      await harness.engine.dispatch({ type: "cycleRepeat" });
      await harness.engine.dispatch({ type: "cycleRepeat" });
      await harness.engine.dispatch({ type: "toggleShuffle" });

      expect(harness.engine.getSettings()).toMatchObject({ repeatMode: "one", shuffleEnabled: true });
      expect(harness.backends[0].loopMode).toBe("one");
    });

    it("keeps the requested order for an explicit selection", async () => {
      const harness = makeEngine({ settings: { repeatMode: "all" } });
      engine = harness.engine;
      await harness.engine.init();

      await harness.engine.dispatch({ type: "setQueue", trackIds: ["d", "a"] });

      expect(harness.engine.getQueue().tracks.map((track) => track.id)).toEqual(["d", "a"]);
      expect(harness.engine.getSnapshot()).toMatchObject({ currentTrack: catalog[3], playing: true });
    });
  });

  describe("recovery", () => {
    it("rebuilds the decoder after a fatal error and resumes the queue", async () => {
      const harness = makeEngine();
      engine = harness.engine;
      await harness.engine.init();
      await harness.engine.dispatch({ type: "setQueue", trackIds: ["a"] });

      harness.backends[0].emit({ type: "error", message: "mpv exited", fatal: true });
      await harness.engine.reinitialize();

      expect(harness.backends).toHaveLength(2);
      expect(harness.backends[0].shutdownCount).toBe(1);
      expect(harness.backends[0].listenerCount).toBe(0);
      expect(harness.backends[1].callsTo("open")).toEqual([[["a", "b", "c", "d", "e"], 0]]);
      expect(harness.engine.getSnapshot()).toMatchObject({ currentTrack: catalog[0], playing: true });
      expect(harness.engine.reinitializations).toBe(1);
      expect(ofType(harness.events, "engine.reinitialized").map((event) => event.payload)).toEqual([{ ok: true }]);
    });

    it("lets a queue rebuild already in flight finish before restarting the decoder", async () => {
      const harness = makeEngine();
      engine = harness.engine;
      await harness.engine.init();

      const rebuilding = harness.engine.playback.setQueue([catalog[2]]);
      harness.backends[0].emit({ type: "error", message: "mpv exited", fatal: true });
      await rebuilding;
      await harness.engine.reinitialize();

      expect(harness.backends[0].callsTo("open")).toEqual([[["a", "b", "c", "d", "e"], 2]]);
      expect(harness.backends[1].callsTo("open")).toEqual([[["a", "b", "c", "d", "e"], 2]]);
      expect(harness.engine.getSnapshot()).toMatchObject({ currentTrack: catalog[2], playing: true });
    });

    it("falls back to idle when the decoder cannot be restarted", async () => {
      const harness = makeEngine({ failStartFrom: 1 });
      engine = harness.engine;
      await harness.engine.init();
      await harness.engine.dispatch({ type: "setQueue", trackIds: ["b"] });

      for (let attempt = 0; attempt < 5; attempt += 1) {
        harness.backends[0].emit({ type: "error", message: "decoder hiccup" });
      }
      await harness.engine.reinitialize();

      expect(harness.engine.getQueue()).toEqual({ tracks: [], currentIndex: null });
      expect(harness.engine.getSnapshot()).toMatchObject({ currentTrack: null, playing: false });
      expect(ofType(harness.events, "engine.reinitialized").map((event) => event.payload)).toEqual([{ ok: false }]);

      await harness.engine.dispatch({ type: "play" });
      expect(ofType(harness.events, "engine.error").at(-1)?.payload.code).toBe("DECODER_UNAVAILABLE");
    });
  });

  describe("shutdown", () => {
    it("saves the queue with the last position and stops the decoder once", async () => {
      const harness = makeEngine();
      await harness.engine.init();
      await harness.engine.dispatch({ type: "setQueue", trackIds: ["c"] });
      harness.backends[0].progress(12);

      await Promise.all([harness.engine.shutdown(), harness.engine.shutdown()]);

      expect(harness.persistence.queueSnapshot).toEqual({
        trackIds: ["a", "b", "c", "d", "e"],
        currentIndex: 2,
        positionSec: 12
      });
      expect(harness.backends[0].shutdownCount).toBe(1);
    });
  });
});
