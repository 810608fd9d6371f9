import type { PlaybackSnapshot, RepeatMode, Track } from "./types.js";

export function formatDuration(totalSeconds: number | null): string {
  if (totalSeconds == null || !Number.isFinite(totalSeconds) || totalSeconds < 0) {
    return "--:--";
  }

  const seconds = Math.floor(totalSeconds);
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const remaining = seconds % 60;

  if (hours > 0) {
    return `${hours}:${String(minutes).padStart(2, "0")}:${String(remaining).padStart(2, "0")}`;
  }

  return `${String(minutes).padStart(2, "0")}:${String(remaining).padStart(2, "0")}`;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function nextRepeatMode(mode: RepeatMode): RepeatMode {
  switch (mode) {
    case "none":
      return "all";
    case "all":
      return "one";
    default:
      return "none";
  }
}

export function formatTrackLabel(track: Track): string {
  const artist = track.artist.trim();
  return artist ? `${artist} - ${track.title}` : track.title;
}

export function formatStatusLine(snapshot: PlaybackSnapshot): string {
  if (!snapshot.currentTrack) {
    return "[idle] nothing queued";
  }

  const state = snapshot.playing ? "playing" : snapshot.processingState === "completed" ? "ended" : "paused";
  const position = `${formatDuration(snapshot.positionSec)}/${formatDuration(snapshot.durationSec)}`;
  const flags = [`repeat=${snapshot.repeatMode}`, `shuffle=${snapshot.shuffleEnabled ? "on" : "off"}`];
  if (snapshot.speed !== 1) {
    flags.push(`speed=${snapshot.speed}x`);
  }

  return `[${state}] #${(snapshot.queueIndex ?? 0) + 1} ${formatTrackLabel(snapshot.currentTrack)} ${position} ${flags.join(" ")}`;
}
