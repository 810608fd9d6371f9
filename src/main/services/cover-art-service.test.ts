import os from "node:os";
import path from "node:path";
import { promises as fs } from "node:fs";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { CoverArtService, scoreImageName } from "./cover-art-service.js";

describe("scoreImageName", () => {
  it("ranks exact names, then partial matches, then anything else", () => {
    expect(scoreImageName("Cover.JPG")).toBe(0);
    expect(scoreImageName("folder.png")).toBe(1);
    expect(scoreImageName("album-front.jpg")).toBe(102);
    expect(scoreImageName("scan.png")).toBe(1000);
    expect(scoreImageName("notes.txt")).toBe(Number.POSITIVE_INFINITY);
  });
});

describe("CoverArtService", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "tonearm-art-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("picks the best image next to the track", async () => {
    await fs.writeFile(path.join(dir, "back.jpg"), "");
    await fs.writeFile(path.join(dir, "folder.jpg"), "");
    await fs.writeFile(path.join(dir, "01.flac"), "");

    const service = new CoverArtService();
    expect(await service.resolveForTrack(path.join(dir, "01.flac"))).toBe(path.join(dir, "folder.jpg"));
  });

  it("caches the answer per directory until cleared", async () => {
    const service = new CoverArtService();
    expect(await service.resolveForTrack(path.join(dir, "01.flac"))).toBeNull();

    await fs.writeFile(path.join(dir, "cover.png"), "");
    expect(await service.resolveForTrack(path.join(dir, "02.flac"))).toBeNull();

    service.clearCache();
    expect(await service.resolveForTrack(path.join(dir, "02.flac"))).toBe(path.join(dir, "cover.png"));
  });
});
