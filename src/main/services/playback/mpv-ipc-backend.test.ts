import { describe, it, expect } from "vitest";
import { parseMpvMessage, toPropertyUpdate } from "./mpv-ipc-backend.js";

describe("parseMpvMessage", () => {
  it("reads command replies", () => {
    expect(parseMpvMessage("{\"request_id\":7,\"error\":\"success\",\"data\":12.5}")).toEqual({
      request_id: 7,
      error: "success",
      data: 12.5
    });
  });

  it("reads end-file events with their reason", () => {
    expect(parseMpvMessage("{\"event\":\"end-file\",\"reason\":\"error\",\"file_error\":\"unrecognized file format\",\"playlist_entry_id\":3}"))
      .toEqual({ event: "end-file", reason: "error", file_error: "unrecognized file format" });
  });

  it("drops fields with unexpected types", () => {
    expect(parseMpvMessage("{\"request_id\":\"7\",\"event\":\"seek\"}")).toEqual({ event: "seek" });
  });

  it("returns null for anything that is not a JSON object", () => {
    expect(parseMpvMessage("not json")).toBeNull();
    expect(parseMpvMessage("[1,2]")).toBeNull();
    expect(parseMpvMessage("null")).toBeNull();
  });
});

describe("toPropertyUpdate", () => {
  it("translates observed properties", () => {
    expect(toPropertyUpdate("pause", true)).toEqual({ kind: "paused", value: true });
    expect(toPropertyUpdate("time-pos", 42.25)).toEqual({ kind: "position", value: 42.25 });
    expect(toPropertyUpdate("duration", 180)).toEqual({ kind: "duration", value: 180 });
    expect(toPropertyUpdate("demuxer-cache-time", 60)).toEqual({ kind: "buffered", value: 60 });
  });

  it("clears the duration and ignores missing positions", () => {
    expect(toPropertyUpdate("duration", null)).toEqual({ kind: "duration", value: null });
    expect(toPropertyUpdate("time-pos", null)).toBeNull();
    expect(toPropertyUpdate("time-pos", -0.02)).toEqual({ kind: "position", value: 0 });
  });

  it("ignores properties it does not observe", () => {
    expect(toPropertyUpdate("volume", 50)).toBeNull();
    expect(toPropertyUpdate(undefined, 1)).toBeNull();
  });
});
