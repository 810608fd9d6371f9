import { describe, it, expect } from "vitest";
import { parseCommandLine, tokenize } from "./command-line.js";

describe("tokenize", () => {
  it("keeps quoted paths together", () => {
    expect(tokenize("import \"/music/Side A\" /music/b.flac")).toEqual(["import", "/music/Side A", "/music/b.flac"]);
  });
});

describe("parseCommandLine", () => {
  it("maps transport words onto engine commands", () => {
    expect(parseCommandLine("toggle")).toEqual({ kind: "engine", command: { type: "playPause" } });
    expect(parseCommandLine("  PREV ")).toEqual({ kind: "engine", command: { type: "previous" } });
  });

  it("treats signed seek offsets as relative", () => {
    expect(parseCommandLine("seek 90")).toEqual({ kind: "engine", command: { type: "seekAbsolute", seconds: 90 } });
    expect(parseCommandLine("seek -15")).toEqual({ kind: "engine", command: { type: "seekRelative", seconds: -15 } });
    expect(parseCommandLine("seek +5")).toEqual({ kind: "engine", command: { type: "seekRelative", seconds: 5 } });
  });

  it("counts jump positions from one", () => {
    expect(parseCommandLine("jump 3")).toEqual({ kind: "engine", command: { type: "skipToIndex", index: 2 } });
    expect(parseCommandLine("jump 0").kind).toBe("invalid");
  });

  it("cycles or sets repeat and shuffle", () => {
    expect(parseCommandLine("repeat")).toEqual({ kind: "engine", command: { type: "cycleRepeat" } });
    expect(parseCommandLine("repeat off")).toEqual({ kind: "engine", command: { type: "setRepeatMode", mode: "none" } });
    expect(parseCommandLine("shuffle on")).toEqual({ kind: "engine", command: { type: "setShuffle", enabled: true } });
    expect(parseCommandLine("shuffle")).toEqual({ kind: "engine", command: { type: "toggleShuffle" } });
  });

  it("arms and cancels the sleep timer", () => {
    expect(parseCommandLine("sleep 20")).toEqual({ kind: "engine", command: { type: "startSleepTimer", minutes: 20 } });
    expect(parseCommandLine("sleep off")).toEqual({ kind: "engine", command: { type: "cancelSleepTimer" } });
    expect(parseCommandLine("sleep -1").kind).toBe("invalid");
  });

  it("passes DSP changes through as partial updates", () => {
    expect(parseCommandLine("crossfade 4")).toEqual({
      kind: "engine",
      command: { type: "updateDsp", dsp: { crossfadeSec: 4 } }
    });
    expect(parseCommandLine("gapless no")).toEqual({
      kind: "engine",
      command: { type: "updateDsp", dsp: { gapless: false } }
    });
  });

  it("builds queue commands from track ids", () => {
    expect(parseCommandLine("queue t1 t2")).toEqual({
      kind: "engine",
      command: { type: "setQueue", trackIds: ["t1", "t2"], autoplay: true }
    });
    expect(parseCommandLine("remove t2")).toEqual({ kind: "engine", command: { type: "removeQueueItem", trackId: "t2" } });
    expect(parseCommandLine("add").kind).toBe("invalid");
  });

  it("recognizes host commands", () => {
    expect(parseCommandLine("import ~/Music")).toEqual({ kind: "import", paths: ["~/Music"] });
    expect(parseCommandLine("status")).toEqual({ kind: "status" });
    expect(parseCommandLine("exit")).toEqual({ kind: "quit" });
    expect(parseCommandLine("   ")).toEqual({ kind: "empty" });
  });

  it("reports unknown commands", () => {
    expect(parseCommandLine("dance")).toEqual({
      kind: "invalid",
      message: "Unknown command \"dance\". Type \"help\" for a list."
    });
  });
});
