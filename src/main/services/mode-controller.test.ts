import { describe, it, expect } from "vitest";
import { makeTrack } from "../../test/fakes.js";
import {
  planContinuation,
  resolveCompletion,
  resolveSkipNext,
  resolveSkipPrevious,
  toLoopMode
} from "./mode-controller.js";

describe("toLoopMode", () => {
  it("maps repeat modes onto decoder loop modes", () => {
    expect(toLoopMode("none")).toBe("off");
    expect(toLoopMode("one")).toBe("one");
    expect(toLoopMode("all")).toBe("all");
  });
});

describe("resolveCompletion", () => {
  it("advances along the playback order", () => {
    expect(resolveCompletion("none", [2, 0, 1], 0)).toEqual({ type: "advance", index: 1 });
  });

  it("stops at the end without repeat", () => {
    expect(resolveCompletion("none", [0, 1, 2], 2)).toEqual({ type: "stopAtEnd" });
  });

  it("wraps to the head of the order with repeat all", () => {
    expect(resolveCompletion("all", [2, 0, 1], 1)).toEqual({ type: "wrap", index: 2 });
  });

  it("loops the same entry with repeat one", () => {
    expect(resolveCompletion("one", [0, 1], 1)).toEqual({ type: "loopInPlace" });
  });
});

describe("resolveSkipNext", () => {
  it("has nothing to do with an empty order", () => {
    expect(resolveSkipNext("all", [], null)).toBeNull();
  });

  it("jumps to the next entry in order", () => {
    expect(resolveSkipNext("none", [0, 1, 2], 0)).toEqual({ type: "jump", index: 1 });
  });

  it("decides by repeat mode at the end of the order", () => {
    expect(resolveSkipNext("all", [0, 1, 2], 2)).toEqual({ type: "jump", index: 0 });
    expect(resolveSkipNext("one", [0, 1, 2], 2)).toEqual({ type: "stay" });
    expect(resolveSkipNext("none", [0, 1, 2], 2)).toEqual({ type: "restart" });
  });
});

describe("resolveSkipPrevious", () => {
  it("restarts the first entry without repeat", () => {
    expect(resolveSkipPrevious("none", [0, 1, 2], 0)).toEqual({ type: "restart" });
  });

  it("wraps to the last entry with repeat all", () => {
    expect(resolveSkipPrevious("all", [0, 1, 2], 0)).toEqual({ type: "jump", index: 2 });
  });

  it("steps back through a shuffled order", () => {
    expect(resolveSkipPrevious("none", [3, 1, 0, 2], 0)).toEqual({ type: "jump", index: 1 });
  });

  it("falls back to the head when the current entry is unknown", () => {
    expect(resolveSkipPrevious("none", [3, 1], null)).toEqual({ type: "jump", index: 3 });
  });
});

describe("planContinuation", () => {
  const queued = [
    makeTrack("q1", { artist: "Mira Vale" }),
    makeTrack("q2", { artist: "Mira Vale" })
  ];
  const catalog = [
    ...queued,
    makeTrack("x1", { artist: "Aster", album: "B", trackNumber: 1 }),
    makeTrack("x2", { artist: "Aster", album: "A", trackNumber: 2 }),
    makeTrack("x3", { artist: "mira vale", album: "Z", trackNumber: 5 }),
    makeTrack("x4", { artist: "Aster", album: "A", trackNumber: 1 }),
    makeTrack("x5", { artist: "Mira Vale", album: "Z", trackNumber: 2 })
  ];

  it("prefers the last queued artist, then sorts by artist, album and track number", () => {
    const batch = planContinuation({
      repeatMode: "none",
      queued,
      currentIndex: 1,
      catalog,
      lookahead: 2,
      batchSize: 10
    });

    expect(batch.map((track) => track.id)).toEqual(["x5", "x3", "x4", "x2", "x1"]);
  });

  it("limits the batch size", () => {
    const batch = planContinuation({
      repeatMode: "none",
      queued,
      currentIndex: 1,
      catalog,
      lookahead: 2,
      batchSize: 2
    });
    expect(batch.map((track) => track.id)).toEqual(["x5", "x3"]);
  });

  it("does nothing while far from the end or when repeating", () => {
    const base = { queued, catalog, lookahead: 0, batchSize: 10 };
    expect(planContinuation({ ...base, repeatMode: "none", currentIndex: 0 })).toEqual([]);
    expect(planContinuation({ ...base, repeatMode: "all", currentIndex: 1 })).toEqual([]);
  });
});
