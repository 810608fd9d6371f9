import type { RepeatMode, Track } from "../../shared/types.js";
import type { LoopMode } from "./playback/backend.js";

export type CompletionAction =
  | { type: "advance"; index: number }
  | { type: "wrap"; index: number }
  | { type: "loopInPlace" }
  | { type: "stopAtEnd" };

export type SkipAction =
  | { type: "jump"; index: number }
  | { type: "restart" }
  | { type: "stay" };

export function toLoopMode(mode: RepeatMode): LoopMode {
  switch (mode) {
    case "one":
      return "one";
    case "all":
      return "all";
    default:
      return "off";
  }
}

function locate(order: readonly number[], currentIndex: number | null): number {
  return currentIndex == null ? -1 : order.indexOf(currentIndex);
}

/**
 * What happens once the current entry has played to its end. `order` is the
 * decoder's playback order, so shuffle is already accounted for.
 */
export function resolveCompletion(
  repeatMode: RepeatMode,
  order: readonly number[],
  currentIndex: number | null
): CompletionAction {
  if (repeatMode === "one") {
    return { type: "loopInPlace" };
  }

  const position = locate(order, currentIndex);
  const next = position >= 0 ? order[position + 1] : undefined;
  if (next != null) {
    return { type: "advance", index: next };
  }

  const first = order[0];
  if (repeatMode === "all" && first != null) {
    return { type: "wrap", index: first };
  }

  return { type: "stopAtEnd" };
}

export function resolveSkipNext(
  repeatMode: RepeatMode,
  order: readonly number[],
  currentIndex: number | null
): SkipAction | null {
  if (order.length === 0) {
    return null;
  }

  const position = locate(order, currentIndex);
  if (position < 0) {
    return { type: "jump", index: order[0] };
  }

  if (position < order.length - 1) {
    return { type: "jump", index: order[position + 1] };
  }

  switch (repeatMode) {
    case "all":
      return { type: "jump", index: order[0] };
    case "one":
      return { type: "stay" };
    default:
      return { type: "restart" };
  }
}

export function resolveSkipPrevious(
  repeatMode: RepeatMode,
  order: readonly number[],
  currentIndex: number | null
): SkipAction | null {
  if (order.length === 0) {
    return null;
  }

  const position = locate(order, currentIndex);
  if (position < 0) {
    return { type: "jump", index: order[0] };
  }

  if (position > 0) {
    return { type: "jump", index: order[position - 1] };
  }

  switch (repeatMode) {
    case "all":
      return { type: "jump", index: order[order.length - 1] };
    case "one":
      return { type: "stay" };
    default:
      return { type: "restart" };
  }
}

export interface ContinuationInput {
  repeatMode: RepeatMode;
  queued: readonly Track[];
  currentIndex: number | null;
  catalog: readonly Track[];
  lookahead: number;
  batchSize: number;
}

function compareText(a: string, b: string): number {
  return a.localeCompare(b, undefined, { sensitivity: "base" });
}

/**
 * Picks catalog tracks to append when a non-repeating queue is about to run
 * dry. Tracks by the artist of the last queued track come first, the rest
 * follow by artist, album and track number.
 */
export function planContinuation(input: ContinuationInput): Track[] {
  const { queued, currentIndex } = input;
  if (input.repeatMode !== "none" || currentIndex == null || queued.length === 0) {
    return [];
  }

  if (queued.length - 1 - currentIndex > input.lookahead) {
    return [];
  }

  const queuedIds = new Set(queued.map((track) => track.id));
  const candidates = input.catalog.filter((track) => !queuedIds.has(track.id));
  if (candidates.length === 0) {
    return [];
  }

  const referenceArtist = queued[queued.length - 1].artist;
  const sorted = [...candidates].sort((a, b) => {
    const aSame = compareText(a.artist, referenceArtist) === 0 ? 0 : 1;
    const bSame = compareText(b.artist, referenceArtist) === 0 ? 0 : 1;
    if (aSame !== bSame) {
      return aSame - bSame;
    }

    const byArtist = compareText(a.artist, b.artist);
    if (byArtist !== 0) {
      return byArtist;
    }

    const byAlbum = compareText(a.album, b.album);
    if (byAlbum !== 0) {
      return byAlbum;
    }

    return (a.trackNumber ?? 0) - (b.trackNumber ?? 0);
  });

  return sorted.slice(0, Math.max(0, input.batchSize));
}
