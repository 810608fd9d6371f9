#!/usr/bin/env node
import os from "node:os";
import readline from "node:readline";
import { parseArgs } from "node:util";
import { APP_NAME } from "../shared/constants.js";
import { formatDuration, formatStatusLine, formatTrackLabel } from "../shared/format.js";
import type { EngineEvent } from "../shared/types.js";
import { HELP_TEXT, parseCommandLine } from "./services/command-line.js";
import { ConsoleLogger } from "./services/logger.js";
import { MprisBridge } from "./services/mpris-bridge.js";
import { hasAudioContent, resolveDataDir } from "./services/path-utils.js";
import { FilePersistence } from "./services/persistence.js";
import { MpvIpcBackend } from "./services/playback/mpv-ipc-backend.js";
import { PlaybackEngine } from "./services/playback-engine.js";
import { checkRuntimeDependencies } from "./services/runtime-dependencies.js";

const logger = new ConsoleLogger();

let engine: PlaybackEngine | null = null;
let persistence: FilePersistence | null = null;
let mprisBridge: MprisBridge | null = null;
let prompt: readline.Interface | null = null;
let shutdownPromise: Promise<void> | null = null;

function printEvent(event: EngineEvent): void {
  switch (event.type) {
    case "track.changed":
      if (event.payload.track) {
        console.log(`> ${formatTrackLabel(event.payload.track)}`);
      }
      return;
    case "engine.error":
      console.log(`! ${event.payload.message}`);
      return;
    case "engine.reinitialized":
      console.log(event.payload.ok ? "! decoder restarted" : "! decoder could not be restarted");
      return;
    default:
      return;
  }
}

async function printLibrary(target: FilePersistence): Promise<void> {
  const tracks = await target.getAllTracks();
  if (tracks.length === 0) {
    console.log("Library is empty. Use \"import <path>\" to add music.");
    return;
  }

  for (const track of tracks) {
    console.log(`${track.id}  ${formatTrackLabel(track)}  ${formatDuration(track.durationSec)}`);
  }
}

function printStatus(target: PlaybackEngine): void {
  console.log(formatStatusLine(target.getSnapshot()));
  const queue = target.getQueue();
  queue.tracks.forEach((track, index) => {
    const marker = index === queue.currentIndex ? "*" : " ";
    console.log(`${marker}${String(index + 1).padStart(3)}  ${track.id}  ${formatTrackLabel(track)}`);
  });

  const remainingMs = target.playback.getSleepTimerRemainingMs();
  if (remainingMs > 0) {
    console.log(`sleep timer: ${formatDuration(remainingMs / 1000)} left`);
  }
}

async function importPaths(target: FilePersistence, paths: string[]): Promise<void> {
  const result = await target.importFiles(paths);
  console.log(`Imported ${result.added.length} track(s), ${result.skipped} already known, ${result.failed.length} failed.`);
}

async function handleLine(line: string): Promise<void> {
  if (!engine || !persistence) {
    return;
  }

  const action = parseCommandLine(line);
  switch (action.kind) {
    case "engine":
      await engine.dispatch(action.command);
      return;
    case "import":
      await importPaths(persistence, action.paths);
      return;
    case "library":
      await printLibrary(persistence);
      return;
    case "status":
      printStatus(engine);
      return;
    case "help":
      console.log(HELP_TEXT);
      return;
    case "quit":
      await shutdown();
      return;
    case "invalid":
      console.log(action.message);
      return;
    case "empty":
      return;
  }
}

async function shutdown(): Promise<void> {
  if (shutdownPromise) {
    return shutdownPromise;
  }

  shutdownPromise = (async () => {
    prompt?.close();
    prompt = null;

    if (engine) {
      try {
        await engine.shutdown();
      } catch (error) {
        logger.error(`Engine shutdown failed: ${(error as Error).message}`);
      }
    }

    mprisBridge?.shutdown();
    mprisBridge = null;
  })();

  await shutdownPromise;
}

async function bootstrap(): Promise<void> {
  const { values } = parseArgs({
    options: {
      "data-dir": { type: "string" },
      "no-mpris": { type: "boolean", default: false }
    },
    allowPositionals: false
  });

  const report = await checkRuntimeDependencies();
  if (report.missingOptional.length > 0) {
    logger.warn(`Optional tools not found: ${report.missingOptional.join(", ")}`);
  }
  if (report.missingRequired.length > 0) {
    logger.fatal(`${APP_NAME} cannot start without: ${report.missingRequired.join(", ")}`);
    process.exitCode = 1;
    return;
  }

  const dataDir = resolveDataDir(values["data-dir"], process.env, os.homedir());
  logger.info(`Using data directory ${dataDir}`);

  persistence = new FilePersistence({ dataDir, logger: logger.child("persistence") });
  const activeEngine = new PlaybackEngine({
    createBackend: () => new MpvIpcBackend(logger.child("mpv")),
    persistence,
    logger: logger.child("engine"),
    probe: hasAudioContent
  });
  engine = activeEngine;

  if (!values["no-mpris"]) {
    mprisBridge = new MprisBridge({
      logger: logger.child("mpris"),
      dispatch: (command) => activeEngine.dispatch(command),
      quit() {
        void shutdown();
      }
    });
  }

  activeEngine.subscribe((event) => {
    mprisBridge?.handleEvent(event);
    printEvent(event);
  });

  await activeEngine.init();
  printStatus(activeEngine);

  const lines = readline.createInterface({ input: process.stdin, terminal: false });
  prompt = lines;
  lines.on("line", (line) => {
    void handleLine(line).catch((error: unknown) => {
      logger.error(`Command failed: ${(error as Error).message}`);
    });
  });
  lines.on("close", () => {
    void shutdown();
  });
}

process.on("SIGINT", () => {
  void shutdown();
});

process.on("SIGTERM", () => {
  void shutdown();
});

void bootstrap().catch((error: unknown) => {
  logger.fatal(`Fatal bootstrap failure: ${(error as Error).message}`);
  process.exitCode = 1;
  void shutdown();
});
