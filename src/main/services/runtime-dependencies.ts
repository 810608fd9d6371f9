import { execFile } from "node:child_process";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);

interface RuntimeDependency {
  command: string;
  args: string[];
  required: boolean;
  label: string;
}

export interface RuntimeDependencyReport {
  missingRequired: string[];
  missingOptional: string[];
}

export type CommandProbe = (command: string, args: string[]) => Promise<boolean>;

export const RUNTIME_DEPENDENCIES: readonly RuntimeDependency[] = [
  {
    command: "mpv",
    args: ["--version"],
    required: true,
    label: "mpv (audio decoding and output)"
  },
  {
    command: "ffprobe",
    args: ["-version"],
    required: false,
    label: "ffprobe (duration fallback during import)"
  }
];

export async function isCommandAvailable(command: string, args: string[]): Promise<boolean> {
  try {
    await execFileAsync(command, args, { timeout: 3_000 });
    return true;
  } catch (error) {
    const candidate = error as NodeJS.ErrnoException;
    if (candidate.code === "ENOENT") {
      return false;
    }

    // The binary exists; a non-zero exit from the version flag is not our concern.
    return true;
  }
}

export async function checkRuntimeDependencies(
  probe: CommandProbe = isCommandAvailable,
  dependencies: readonly RuntimeDependency[] = RUNTIME_DEPENDENCIES
): Promise<RuntimeDependencyReport> {
  const report: RuntimeDependencyReport = {
    missingRequired: [],
    missingOptional: []
  };

  for (const dependency of dependencies) {
    const available = await probe(dependency.command, dependency.args);
    if (available) {
      continue;
    }

    if (dependency.required) {
      report.missingRequired.push(dependency.label);
    } else {
      report.missingOptional.push(dependency.label);
    }
  }

  return report;
}
