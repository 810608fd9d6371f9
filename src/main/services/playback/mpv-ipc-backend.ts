import net from "node:net";
import os from "node:os";
import path from "node:path";
import { EventEmitter } from "node:events";
import { spawn, type ChildProcessWithoutNullStreams } from "node:child_process";
import { randomUUID } from "node:crypto";
import { promises as fs } from "node:fs";
import { APP_ID } from "../../../shared/constants.js";
import type { ProcessingState } from "../../../shared/types.js";
import type { Logger } from "../logger.js";
import type {
  LoopMode,
  PlaybackBackend,
  PlaybackBackendEvent,
  PlaybackBackendStatus,
  PlaybackSource
} from "./backend.js";
import { SourceCursor } from "./source-cursor.js";

export interface MpvMessage {
  request_id?: number;
  error?: string;
  data?: unknown;
  event?: string;
  name?: string;
  reason?: string;
  file_error?: string;
}

interface PendingRequestHandlers {
  resolve: (value: unknown) => void;
  reject: (reason: Error) => void;
  timeout: NodeJS.Timeout;
}

export type MpvPropertyUpdate =
  | { kind: "paused"; value: boolean }
  | { kind: "position"; value: number }
  | { kind: "duration"; value: number | null }
  | { kind: "buffered"; value: number }
  | { kind: "idle"; value: boolean };

const MPV_COMMAND_TIMEOUT_MS = 5000;

const OBSERVE_PROPERTIES: Array<{ id: number; name: string }> = [
  { id: 1, name: "pause" },
  { id: 2, name: "time-pos" },
  { id: 3, name: "duration" },
  { id: 4, name: "demuxer-cache-time" },
  { id: 5, name: "idle-active" }
];

function parseFiniteNumber(value: unknown): number | null {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

export function parseMpvMessage(line: string): MpvMessage | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return null;
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    return null;
  }

  const message: MpvMessage = {};
  for (const [key, value] of Object.entries(parsed)) {
    switch (key) {
      case "request_id":
        if (typeof value === "number") {
          message.request_id = value;
        }
        break;
      case "error":
      case "event":
      case "name":
      case "reason":
      case "file_error":
        if (typeof value === "string") {
          message[key] = value;
        }
        break;
      case "data":
        message.data = value;
        break;
      default:
        break;
    }
  }
  return message;
}

export function toPropertyUpdate(name: string | undefined, data: unknown): MpvPropertyUpdate | null {
  switch (name) {
    case "pause":
      return { kind: "paused", value: data === true };
    case "time-pos": {
      const value = parseFiniteNumber(data);
      return value == null ? null : { kind: "position", value: Math.max(0, value) };
    }
    case "duration": {
      const value = parseFiniteNumber(data);
      return { kind: "duration", value: value != null && value > 0 ? value : null };
    }
    case "demuxer-cache-time": {
      const value = parseFiniteNumber(data);
      return value == null ? null : { kind: "buffered", value: Math.max(0, value) };
    }
    case "idle-active":
      return { kind: "idle", value: data === true };
    default:
      return null;
  }
}

/**
 * Drives an `mpv --idle` process over its JSON IPC socket. mpv holds one file
 * at a time; the source list, playback order and looping live in a
 * SourceCursor and the next file is loaded here whenever one ends.
 */
export class MpvIpcBackend implements PlaybackBackend {
  private readonly events = new EventEmitter();
  private readonly socketPath: string;
  private readonly logger: Logger;
  private readonly cursor = new SourceCursor();
  private mpvProcess: ChildProcessWithoutNullStreams | null = null;
  private socket: net.Socket | null = null;
  private connected = false;
  private responseBuffer = "";
  private nextRequestId = 1;
  private pending = new Map<number, PendingRequestHandlers>();
  private shuttingDown = false;
  private pendingStartSec: number | null = null;
  private seekDiscontinuity = false;
  private status: PlaybackBackendStatus = {
    playing: false,
    processingState: "idle",
    positionSec: 0,
    durationSec: null,
    bufferedPositionSec: 0,
    currentIndex: null,
    speed: 1,
    volumePercent: 100
  };

  public constructor(logger: Logger, socketDir: string = os.tmpdir()) {
    this.logger = logger;
    this.socketPath = path.join(socketDir, `${APP_ID}-mpv-${randomUUID()}.sock`);
  }

  public async start(): Promise<void> {
    this.shuttingDown = false;
    await this.removeSocketIfNeeded();

    this.mpvProcess = spawn("mpv", [
      "--idle=yes",
      "--no-terminal",
      "--no-video",
      "--force-window=no",
      "--audio-display=no",
      "--msg-level=all=warn",
      "--really-quiet",
      `--input-ipc-server=${this.socketPath}`
    ]);

    this.mpvProcess.on("error", (error) => {
      this.rejectAllPending(new Error(`mpv process error: ${error.message}`));
      this.emit({ type: "error", message: `mpv process error: ${error.message}`, fatal: true });
    });

    this.mpvProcess.on("exit", (code, signal) => {
      this.connected = false;
      this.rejectAllPending(new Error("mpv exited before replying to pending command(s)."));
      if (this.shuttingDown) {
        return;
      }
      this.emit({
        type: "error",
        message: `mpv exited unexpectedly (code=${code ?? "n/a"}, signal=${signal ?? "n/a"})`,
        fatal: true
      });
    });

    await this.connectSocketWithRetry();
    await this.observeProperties();
  }

  public async shutdown(): Promise<void> {
    this.shuttingDown = true;

    if (this.connected) {
      await Promise.race([
        this.sendCommand(["quit"]).catch((error: unknown) => {
          this.logger.debug(`mpv quit request failed: ${(error as Error).message}`);
        }),
        new Promise<void>((resolve) => setTimeout(resolve, 500))
      ]);
    }

    this.rejectAllPending(new Error("mpv request canceled during shutdown."));

    if (this.socket) {
      this.socket.destroy();
      this.socket = null;
    }
    this.connected = false;

    if (this.mpvProcess) {
      this.mpvProcess.kill("SIGTERM");
      this.mpvProcess = null;
    }

    await this.removeSocketIfNeeded();
  }

  public async open(sources: PlaybackSource[], startIndex: number): Promise<void> {
    this.cursor.load(sources, startIndex);
    await this.sendCommand(["set_property", "pause", true]);
    this.status = { ...this.status, playing: false, positionSec: 0, durationSec: null, bufferedPositionSec: 0 };

    if (this.cursor.currentIndex == null) {
      await this.sendCommand(["stop"]);
      this.status = { ...this.status, processingState: "idle", currentIndex: null };
      return;
    }

    await this.loadCurrent(0);
  }

  public async append(sources: PlaybackSource[]): Promise<void> {
    const wasEmpty = this.cursor.currentIndex == null;
    this.cursor.append(sources);
    if (wasEmpty && this.cursor.currentIndex != null) {
      await this.loadCurrent(0);
    }
  }

  public async remove(index: number): Promise<void> {
    const { wasCurrent } = this.cursor.remove(index);
    this.status = { ...this.status, currentIndex: this.cursor.currentIndex };
    if (!wasCurrent) {
      return;
    }

    if (this.cursor.currentIndex == null) {
      await this.sendCommand(["stop"]);
      this.status = { ...this.status, playing: false, processingState: "idle", positionSec: 0, durationSec: null };
      return;
    }

    await this.loadCurrent(0);
  }

  public async play(): Promise<void> {
    if (this.status.processingState === "idle" || this.status.processingState === "completed") {
      if (this.cursor.currentIndex == null) {
        return;
      }
      await this.loadCurrent(0);
    }

    await this.sendCommand(["set_property", "pause", false]);
    this.status = { ...this.status, playing: true };
  }

  public async pause(): Promise<void> {
    await this.sendCommand(["set_property", "pause", true]);
    this.status = { ...this.status, playing: false };
  }

  public async stop(): Promise<void> {
    await this.sendCommand(["set_property", "pause", true]);
    if (this.status.processingState === "ready") {
      await this.sendCommand(["seek", 0, "absolute"]);
    }
    this.status = { ...this.status, playing: false, positionSec: 0, processingState: "idle" };
  }

  public async seek(positionSec: number, index?: number): Promise<void> {
    const target = Math.max(0, positionSec);
    if (index !== undefined && index !== this.cursor.currentIndex) {
      if (!this.cursor.jump(index)) {
        throw new Error(`No source at position ${index}.`);
      }
      await this.loadCurrent(target);
      return;
    }

    if (this.status.processingState !== "ready") {
      await this.loadCurrent(target);
      return;
    }

    this.seekDiscontinuity = true;
    await this.sendCommand(["seek", target, "absolute"]);
    this.status = { ...this.status, positionSec: target };
  }

  public async setSpeed(speed: number): Promise<void> {
    await this.sendCommand(["set_property", "speed", speed]);
    this.status = { ...this.status, speed };
  }

  public async setVolume(percent: number): Promise<void> {
    await this.sendCommand(["set_property", "volume", percent]);
    this.status = { ...this.status, volumePercent: percent };
  }

  public async setShuffle(enabled: boolean): Promise<void> {
    this.cursor.setShuffle(enabled);
  }

  public async setLoopMode(mode: LoopMode): Promise<void> {
    // mpv loops the current file on its own; list looping is handled in advance().
    await this.sendCommand(["set_property", "loop-file", mode === "one" ? "inf" : "no"]);
    this.cursor.loopMode = mode;
  }

  public getStatus(): PlaybackBackendStatus {
    return { ...this.status };
  }

  public getPlaybackOrder(): number[] {
    return this.cursor.getOrder();
  }

  public subscribe(listener: (event: PlaybackBackendEvent) => void): () => void {
    this.events.on("event", listener);
    return () => {
      this.events.off("event", listener);
    };
  }

  private emit(event: PlaybackBackendEvent): void {
    this.events.emit("event", event);
  }

  private setProcessingState(state: ProcessingState): void {
    if (this.status.processingState === state) {
      return;
    }
    this.status = { ...this.status, processingState: state };
    this.emit({ type: "processingState", state });
  }

  private async loadCurrent(startSec: number): Promise<void> {
    const source = this.cursor.currentSource();
    if (!source) {
      return;
    }

    this.pendingStartSec = startSec > 0 ? startSec : null;
    this.seekDiscontinuity = true;
    this.status = {
      ...this.status,
      currentIndex: this.cursor.currentIndex,
      positionSec: startSec,
      durationSec: null,
      bufferedPositionSec: 0
    };
    this.setProcessingState("loading");
    await this.sendCommand(["loadfile", source.filePath, "replace"]);
  }

  private handleEndOfFile(reason: string, fileError: string | undefined): void {
    // "stop" and "redirect" come from our own loadfile/stop commands.
    if (reason !== "eof" && reason !== "error") {
      return;
    }

    const finished = this.cursor.currentIndex;
    if (reason === "error") {
      const source = this.cursor.currentSource();
      this.emit({
        type: "error",
        message: `mpv could not play ${source?.filePath ?? "the current file"}: ${fileError ?? "unknown error"}`
      });
    }

    const next = this.cursor.advance();
    if (next != null) {
      void this.loadCurrent(0).then(
        () => {
          this.emit({ type: "indexAdvanced", index: next });
        },
        (error: unknown) => {
          this.emit({ type: "error", message: `Loading the next file failed: ${(error as Error).message}` });
        }
      );
      return;
    }

    this.status = { ...this.status, playing: false };
    this.setProcessingState("completed");
    if (finished != null) {
      this.emit({ type: "trackFinished", index: finished });
    }
  }

  private applyPropertyUpdate(update: MpvPropertyUpdate): void {
    switch (update.kind) {
      case "paused":
        if (this.status.processingState === "completed" || this.status.processingState === "idle") {
          return;
        }
        this.status = { ...this.status, playing: !update.value };
        this.emit({ type: "playing", playing: !update.value });
        return;
      case "position": {
        const discontinuity = this.seekDiscontinuity;
        this.seekDiscontinuity = false;
        this.status = { ...this.status, positionSec: update.value };
        this.emit({ type: "position", positionSec: update.value, discontinuity });
        return;
      }
      case "duration":
        this.status = { ...this.status, durationSec: update.value };
        this.emit({ type: "duration", durationSec: update.value });
        return;
      case "buffered":
        this.status = { ...this.status, bufferedPositionSec: update.value };
        return;
      case "idle":
        return;
    }
  }

  private handleMessage(line: string): void {
    const parsed = parseMpvMessage(line);
    if (!parsed) {
      this.logger.debug(`Ignoring unparsable mpv message: ${line}`);
      return;
    }

    if (typeof parsed.request_id === "number") {
      const handlers = this.pending.get(parsed.request_id);
      if (handlers) {
        this.pending.delete(parsed.request_id);
        clearTimeout(handlers.timeout);
        if (parsed.error && parsed.error !== "success") {
          handlers.reject(new Error(parsed.error));
        } else {
          handlers.resolve(parsed.data);
        }
      }
      return;
    }

    switch (parsed.event) {
      case "property-change": {
        const update = toPropertyUpdate(parsed.name, parsed.data);
        if (update) {
          this.applyPropertyUpdate(update);
        }
        return;
      }
      case "file-loaded":
        this.setProcessingState("ready");
        if (this.pendingStartSec != null) {
          const start = this.pendingStartSec;
          this.pendingStartSec = null;
          void this.sendCommand(["seek", start, "absolute"]).catch((error: unknown) => {
            this.emit({ type: "error", message: `Seeking to ${start}s failed: ${(error as Error).message}` });
          });
        }
        return;
      case "seek":
        this.seekDiscontinuity = true;
        return;
      case "playback-restart":
        if (this.status.processingState === "buffering") {
          this.setProcessingState("ready");
        }
        return;
      case "end-file":
        this.handleEndOfFile(parsed.reason ?? "unknown", parsed.file_error);
        return;
      default:
        return;
    }
  }

  private async connectSocketWithRetry(): Promise<void> {
    const maxAttempts = 100;
    let lastError: Error | null = null;
    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      try {
        await this.tryConnectSocket();
        this.connected = true;
        return;
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));
        await new Promise((resolve) => setTimeout(resolve, 50));
      }
    }

    throw new Error(`Failed to connect to mpv IPC socket: ${lastError?.message ?? "timed out"}`);
  }

  private async tryConnectSocket(): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      const socket = net.createConnection(this.socketPath);

      socket.once("error", (error) => {
        socket.destroy();
        reject(error);
      });

      socket.once("connect", () => {
        this.socket = socket;
        socket.setEncoding("utf8");

        socket.on("data", (chunk) => {
          this.onSocketData(chunk.toString());
        });

        socket.on("close", () => {
          this.connected = false;
          this.rejectAllPending(new Error("mpv IPC socket closed."));
        });

        socket.on("error", (error) => {
          this.rejectAllPending(new Error(`mpv socket error: ${error.message}`));
          this.emit({ type: "error", message: `mpv socket error: ${error.message}` });
        });

        resolve();
      });
    });
  }

  private onSocketData(chunk: string): void {
    this.responseBuffer += chunk;

    while (true) {
      const newlineIndex = this.responseBuffer.indexOf("\n");
      if (newlineIndex === -1) {
        break;
      }

      const line = this.responseBuffer.slice(0, newlineIndex).trim();
      this.responseBuffer = this.responseBuffer.slice(newlineIndex + 1);

      if (!line) {
        continue;
      }

      this.handleMessage(line);
    }
  }

  private async observeProperties(): Promise<void> {
    for (const property of OBSERVE_PROPERTIES) {
      await this.sendCommand(["observe_property", property.id, property.name]);
    }
  }

  private async sendCommand(command: unknown[]): Promise<unknown> {
    const socket = this.socket;
    if (!this.connected || !socket) {
      throw new Error("mpv IPC socket is not connected.");
    }

    const requestId = this.nextRequestId;
    this.nextRequestId += 1;

    const payload = JSON.stringify({ command, request_id: requestId }) + "\n";

    await new Promise<void>((resolve, reject) => {
      socket.write(payload, (error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });

    const commandLabel = typeof command[0] === "string" ? command[0] : "unknown";
    return await new Promise((resolve, reject) => {
      const timeout = setTimeout(() => {
        const pending = this.pending.get(requestId);
        if (!pending) {
          return;
        }
        this.pending.delete(requestId);
        pending.reject(new Error(`mpv command timed out: ${commandLabel}`));
      }, MPV_COMMAND_TIMEOUT_MS);

      this.pending.set(requestId, { resolve, reject, timeout });
    });
  }

  private rejectAllPending(reason: Error): void {
    for (const handlers of this.pending.values()) {
      clearTimeout(handlers.timeout);
      handlers.reject(reason);
    }
    this.pending.clear();
  }

  private async removeSocketIfNeeded(): Promise<void> {
    await fs.rm(this.socketPath, { force: true });
  }
}
