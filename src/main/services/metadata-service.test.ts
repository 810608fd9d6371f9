import path from "node:path";
import { describe, it, expect } from "vitest";
import { createTrackId, toTrack, UNKNOWN_ALBUM, UNKNOWN_ARTIST, type ExtractedTags } from "./metadata-service.js";

const emptyTags: ExtractedTags = {
  title: null,
  artist: null,
  album: null,
  trackNumber: null,
  year: null,
  genre: null,
  durationSec: null,
  rating: null
};

describe("createTrackId", () => {
  it("derives a stable short id from the resolved path", () => {
    const id = createTrackId("/music/Side A/01 Opening.flac");
    expect(id).toMatch(/^[0-9a-f]{16}$/);
    expect(createTrackId("/music/Side A/../Side A/01 Opening.flac")).toBe(id);
    expect(createTrackId("/music/Side A/02 Second.flac")).not.toBe(id);
  });
});

describe("toTrack", () => {
  it("falls back to the file name and placeholder artist and album", () => {
    const track = toTrack("/music/loose/Night Drive.mp3", emptyTags, null);

    expect(track).toEqual({
      id: createTrackId("/music/loose/Night Drive.mp3"),
      title: "Night Drive",
      artist: UNKNOWN_ARTIST,
      album: UNKNOWN_ALBUM,
      filePath: path.resolve("/music/loose/Night Drive.mp3"),
      durationSec: 0,
      artworkPath: null,
      trackNumber: null,
      year: null,
      genre: null,
      isFavorite: false,
      rating: null
    });
  });

  it("keeps tags and scales the rating to five stars", () => {
    const track = toTrack(
      "/music/album/03.ogg",
      { ...emptyTags, title: "Tide", artist: "Harbor", album: "Low Water", trackNumber: 3, durationSec: 201.4, rating: 0.8 },
      "/music/album/cover.jpg"
    );

    expect(track.title).toBe("Tide");
    expect(track.artist).toBe("Harbor");
    expect(track.trackNumber).toBe(3);
    expect(track.durationSec).toBe(201.4);
    expect(track.rating).toBe(4);
    expect(track.artworkPath).toBe("/music/album/cover.jpg");
  });
});
