import { describe, it, expect, vi } from "vitest";
import { EmptyQueueError, TrackNotFoundError } from "../../shared/errors.js";
import { makeTrack, probeRejecting } from "../../test/fakes.js";
import { silentLogger } from "./logger.js";
import { QueueBuilder } from "./queue-builder.js";

const catalog = ["a", "b", "c", "d", "e"].map((id) => makeTrack(id));

describe("QueueBuilder", () => {
  it("expands a single track into the whole catalog starting at it", async () => {
    const builder = new QueueBuilder({ logger: silentLogger, probe: async () => true });

    const plan = await builder.build([catalog[2]], catalog);

    expect(plan.policy).toBe("circular");
    expect(plan.tracks.map((track) => track.id)).toEqual(["a", "b", "c", "d", "e"]);
    expect(plan.initialIndex).toBe(2);
    expect(plan.dropped).toEqual([]);
  });

  it("takes a multi-track selection as-is from index 0", async () => {
    const builder = new QueueBuilder({ logger: silentLogger, probe: async () => true });

    const plan = await builder.build([catalog[4], catalog[1]], catalog);

    expect(plan.policy).toBe("explicit");
    expect(plan.tracks.map((track) => track.id)).toEqual(["e", "b"]);
    expect(plan.initialIndex).toBe(0);
  });

  it("drops unplayable files and recomputes the start index", async () => {
    const warn = vi.fn();
    const builder = new QueueBuilder({
      logger: { ...silentLogger, warn },
      probe: probeRejecting("/music/a.flac", "/music/b.flac")
    });

    const plan = await builder.build([catalog[3]], catalog);

    expect(plan.tracks.map((track) => track.id)).toEqual(["c", "d", "e"]);
    expect(plan.initialIndex).toBe(1);
    expect(plan.dropped.map((track) => track.id)).toEqual(["a", "b"]);
    expect(warn).toHaveBeenCalledWith("Skipping unplayable track \"Title a\" (/music/a.flac).");
  });

  it("rejects an empty selection", async () => {
    const builder = new QueueBuilder({ logger: silentLogger, probe: async () => true });
    await expect(builder.build([], catalog)).rejects.toBeInstanceOf(EmptyQueueError);
  });

  it("rejects a single track that is not in the catalog", async () => {
    const builder = new QueueBuilder({ logger: silentLogger, probe: async () => true });
    await expect(builder.build([makeTrack("zz")], catalog)).rejects.toBeInstanceOf(TrackNotFoundError);
  });

  it("rejects a selected track whose own file is unplayable", async () => {
    const builder = new QueueBuilder({ logger: silentLogger, probe: probeRejecting("/music/c.flac") });
    await expect(builder.build([catalog[2]], catalog)).rejects.toBeInstanceOf(TrackNotFoundError);
  });

  it("rejects a selection with nothing playable", async () => {
    const builder = new QueueBuilder({ logger: silentLogger, probe: async () => false });
    await expect(builder.build([catalog[0], catalog[1]], catalog)).rejects.toBeInstanceOf(EmptyQueueError);
  });

  it("treats a probe that throws as unplayable", async () => {
    const builder = new QueueBuilder({
      logger: silentLogger,
      probe: async (filePath) => {
        if (filePath.endsWith("b.flac")) {
          throw new Error("EACCES");
        }
        return true;
      }
    });

    const result = await builder.validate([catalog[0], catalog[1]]);
    expect(result.valid.map((track) => track.id)).toEqual(["a"]);
    expect(result.dropped.map((track) => track.id)).toEqual(["b"]);
  });
});
