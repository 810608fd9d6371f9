import type { EngineCommand, RepeatMode } from "../../shared/types.js";

export type CommandLineAction =
  | { kind: "engine"; command: EngineCommand }
  | { kind: "import"; paths: string[] }
  | { kind: "library" }
  | { kind: "status" }
  | { kind: "help" }
  | { kind: "quit" }
  | { kind: "empty" }
  | { kind: "invalid"; message: string };

export const HELP_TEXT = [
  "play | pause | toggle | stop | next | prev",
  "seek <sec|+sec|-sec>      jump <position>",
  "repeat [none|one|all]     shuffle [on|off]",
  "speed <x>                 volume <0-100>",
  "sleep <minutes|off>       crossfade <sec>     gapless <on|off>",
  "queue <trackId...>        add <trackId...>    remove <trackId>    clear",
  "import <path...>          library             status              quit"
].join("\n");

/** Splits on whitespace; double quotes group a token so paths with spaces survive. */
export function tokenize(line: string): string[] {
  const tokens: string[] = [];
  const pattern = /"([^"]*)"|(\S+)/g;
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(line)) !== null) {
    tokens.push(match[1] ?? match[2] ?? "");
  }
  return tokens;
}

function engine(command: EngineCommand): CommandLineAction {
  return { kind: "engine", command };
}

function invalid(message: string): CommandLineAction {
  return { kind: "invalid", message };
}

function parseNumber(value: string | undefined): number | null {
  if (value === undefined || value.trim() === "") {
    return null;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

function parseSwitch(value: string | undefined): boolean | null {
  switch (value?.toLowerCase()) {
    case "on":
    case "true":
    case "yes":
      return true;
    case "off":
    case "false":
    case "no":
      return false;
    default:
      return null;
  }
}

function parseRepeatMode(value: string): RepeatMode | null {
  switch (value.toLowerCase()) {
    case "none":
    case "off":
      return "none";
    case "one":
    case "track":
      return "one";
    case "all":
    case "queue":
      return "all";
    default:
      return null;
  }
}

export function parseCommandLine(line: string): CommandLineAction {
  const [name, ...args] = tokenize(line.trim());
  if (name === undefined) {
    return { kind: "empty" };
  }

  const first = args[0];
  switch (name.toLowerCase()) {
    case "play":
      return engine({ type: "play" });
    case "pause":
      return engine({ type: "pause" });
    case "toggle":
      return engine({ type: "playPause" });
    case "stop":
      return engine({ type: "stop" });
    case "next":
      return engine({ type: "next" });
    case "prev":
    case "previous":
      return engine({ type: "previous" });
    case "seek": {
      const seconds = parseNumber(first);
      if (first === undefined || seconds == null) {
        return invalid("Usage: seek <seconds>, or +seconds / -seconds to move relative.");
      }
      return first.startsWith("+") || first.startsWith("-")
        ? engine({ type: "seekRelative", seconds })
        : engine({ type: "seekAbsolute", seconds });
    }
    case "jump": {
      const position = parseNumber(first);
      if (position == null || !Number.isInteger(position) || position < 1) {
        return invalid("Usage: jump <position>, counting from 1.");
      }
      return engine({ type: "skipToIndex", index: position - 1 });
    }
    case "repeat": {
      if (first === undefined) {
        return engine({ type: "cycleRepeat" });
      }
      const mode = parseRepeatMode(first);
      return mode ? engine({ type: "setRepeatMode", mode }) : invalid("Usage: repeat [none|one|all]");
    }
    case "shuffle": {
      if (first === undefined) {
        return engine({ type: "toggleShuffle" });
      }
      const enabled = parseSwitch(first);
      return enabled == null ? invalid("Usage: shuffle [on|off]") : engine({ type: "setShuffle", enabled });
    }
    case "speed": {
      const speed = parseNumber(first);
      return speed == null || speed <= 0 ? invalid("Usage: speed <multiplier>") : engine({ type: "setSpeed", speed });
    }
    case "volume": {
      const percent = parseNumber(first);
      return percent == null ? invalid("Usage: volume <0-100>") : engine({ type: "setVolume", percent });
    }
    case "sleep": {
      if (first?.toLowerCase() === "off") {
        return engine({ type: "cancelSleepTimer" });
      }
      const minutes = parseNumber(first);
      return minutes == null || minutes <= 0
        ? invalid("Usage: sleep <minutes|off>")
        : engine({ type: "startSleepTimer", minutes });
    }
    case "crossfade": {
      const crossfadeSec = parseNumber(first);
      return crossfadeSec == null
        ? invalid("Usage: crossfade <seconds>")
        : engine({ type: "updateDsp", dsp: { crossfadeSec } });
    }
    case "gapless": {
      const gapless = parseSwitch(first);
      return gapless == null ? invalid("Usage: gapless <on|off>") : engine({ type: "updateDsp", dsp: { gapless } });
    }
    case "queue":
      return args.length === 0
        ? invalid("Usage: queue <trackId...>")
        : engine({ type: "setQueue", trackIds: args, autoplay: true });
    case "add":
      return args.length === 0 ? invalid("Usage: add <trackId...>") : engine({ type: "addQueueItems", trackIds: args });
    case "remove":
      return first === undefined ? invalid("Usage: remove <trackId>") : engine({ type: "removeQueueItem", trackId: first });
    case "clear":
      return engine({ type: "clearQueue" });
    case "import":
      return args.length === 0 ? invalid("Usage: import <path...>") : { kind: "import", paths: args };
    case "library":
      return { kind: "library" };
    case "status":
      return { kind: "status" };
    case "help":
    case "?":
      return { kind: "help" };
    case "quit":
    case "exit":
      return { kind: "quit" };
    default:
      return invalid(`Unknown command "${name}". Type "help" for a list.`);
  }
}
