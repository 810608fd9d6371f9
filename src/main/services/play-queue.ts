import type { QueueSnapshot, QueueView, Track } from "../../shared/types.js";

function clampIndex(index: number, max: number): number {
  return Math.min(Math.max(index, 0), max);
}

/**
 * Ordered tracks plus the current index. `index` is null exactly when the
 * queue is empty, otherwise it always points at an existing entry.
 */
export class PlayQueue {
  private tracks: Track[] = [];
  private index: number | null = null;

  public get length(): number {
    return this.tracks.length;
  }

  public get currentIndex(): number | null {
    return this.index;
  }

  public getTracks(): readonly Track[] {
    return this.tracks;
  }

  public current(): Track | null {
    return this.index == null ? null : this.tracks[this.index] ?? null;
  }

  public indexOf(trackId: string): number {
    return this.tracks.findIndex((track) => track.id === trackId);
  }

  public replace(tracks: readonly Track[], initialIndex: number): void {
    this.tracks = [...tracks];
    if (this.tracks.length === 0) {
      this.index = null;
      return;
    }
    this.index = clampIndex(Math.trunc(initialIndex), this.tracks.length - 1);
  }

  public append(tracks: readonly Track[]): void {
    if (tracks.length === 0) {
      return;
    }
    this.tracks.push(...tracks);
    if (this.index == null) {
      this.index = 0;
    }
  }

  /**
   * Removes one entry and keeps the index on the same track where possible.
   * When the current track itself is removed the index stays on the position
   * it occupied, clamped to the new end.
   */
  public removeAt(position: number): { removed: Track | null; wasCurrent: boolean } {
    const removed = this.tracks[position];
    if (!removed) {
      return { removed: null, wasCurrent: false };
    }

    const wasCurrent = this.index === position;
    this.tracks.splice(position, 1);

    if (this.tracks.length === 0) {
      this.index = null;
    } else if (this.index != null && position < this.index) {
      this.index -= 1;
    } else if (this.index != null) {
      this.index = clampIndex(this.index, this.tracks.length - 1);
    }

    return { removed, wasCurrent };
  }

  public setIndex(index: number): boolean {
    if (!Number.isInteger(index) || index < 0 || index >= this.tracks.length) {
      return false;
    }
    this.index = index;
    return true;
  }

  public clear(): void {
    this.tracks = [];
    this.index = null;
  }

  public toView(): QueueView {
    return {
      tracks: [...this.tracks],
      currentIndex: this.index
    };
  }

  public toSnapshot(positionSec: number): QueueSnapshot {
    return {
      trackIds: this.tracks.map((track) => track.id),
      currentIndex: this.index,
      positionSec: Math.max(0, positionSec)
    };
  }
}
