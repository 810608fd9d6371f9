import type { LoopMode, PlaybackSource } from "./backend.js";

export type RandomSource = () => number;

function shuffleInPlace<T>(items: T[], random: RandomSource): void {
  for (let i = items.length - 1; i > 0; i -= 1) {
    const j = Math.floor(random() * (i + 1));
    const swap = items[i];
    items[i] = items[j];
    items[j] = swap;
  }
}

function identityOrder(length: number): number[] {
  return Array.from({ length }, (_, index) => index);
}

/**
 * Decoder-side view of a loaded source list: which entry is current and the
 * order entries are visited in. With shuffle on, the current entry always
 * heads the order and the rest are permuted behind it.
 */
export class SourceCursor {
  private sources: PlaybackSource[] = [];
  private order: number[] = [];
  private current: number | null = null;
  private shuffleEnabled = false;
  private loop: LoopMode = "off";
  private readonly random: RandomSource;

  public constructor(random: RandomSource = Math.random) {
    this.random = random;
  }

  public get length(): number {
    return this.sources.length;
  }

  public get currentIndex(): number | null {
    return this.current;
  }

  public get loopMode(): LoopMode {
    return this.loop;
  }

  public set loopMode(mode: LoopMode) {
    this.loop = mode;
  }

  public get shuffled(): boolean {
    return this.shuffleEnabled;
  }

  public currentSource(): PlaybackSource | null {
    return this.current == null ? null : this.sources[this.current] ?? null;
  }

  public getOrder(): number[] {
    return [...this.order];
  }

  public load(sources: PlaybackSource[], startIndex: number): void {
    this.sources = [...sources];
    this.current = this.sources.length === 0
      ? null
      : Math.min(Math.max(Math.trunc(startIndex), 0), this.sources.length - 1);
    this.rebuildOrder();
  }

  public append(sources: PlaybackSource[]): void {
    if (sources.length === 0) {
      return;
    }

    const firstNew = this.sources.length;
    this.sources.push(...sources);
    const added = identityOrder(sources.length).map((offset) => firstNew + offset);
    if (this.shuffleEnabled) {
      shuffleInPlace(added, this.random);
    }
    this.order.push(...added);

    if (this.current == null) {
      this.current = firstNew;
    }
  }

  /** Removes a source; if it was current, the entry that slides into its place becomes current. */
  public remove(index: number): { wasCurrent: boolean } {
    if (index < 0 || index >= this.sources.length) {
      return { wasCurrent: false };
    }

    const wasCurrent = this.current === index;
    this.sources.splice(index, 1);
    this.order = this.order
      .filter((entry) => entry !== index)
      .map((entry) => (entry > index ? entry - 1 : entry));

    if (this.sources.length === 0) {
      this.current = null;
    } else if (this.current != null && index < this.current) {
      this.current -= 1;
    } else if (this.current != null && this.current >= this.sources.length) {
      this.current = this.sources.length - 1;
    }

    return { wasCurrent };
  }

  public jump(index: number): boolean {
    if (!Number.isInteger(index) || index < 0 || index >= this.sources.length) {
      return false;
    }
    this.current = index;
    return true;
  }

  public setShuffle(enabled: boolean): void {
    if (this.shuffleEnabled === enabled) {
      return;
    }
    this.shuffleEnabled = enabled;
    this.rebuildOrder();
  }

  /** Index the decoder moves to once the current entry ends, or null when playback stops there. */
  public peekNext(): number | null {
    if (this.current == null) {
      return null;
    }

    if (this.loop === "one") {
      return this.current;
    }

    const position = this.order.indexOf(this.current);
    const next = this.order[position + 1];
    if (next != null) {
      return next;
    }

    return this.loop === "all" ? this.order[0] ?? null : null;
  }

  public advance(): number | null {
    const next = this.peekNext();
    if (next != null) {
      this.current = next;
    }
    return next;
  }

  public clear(): void {
    this.sources = [];
    this.order = [];
    this.current = null;
  }

  private rebuildOrder(): void {
    const order = identityOrder(this.sources.length);
    if (!this.shuffleEnabled) {
      this.order = order;
      return;
    }

    const current = this.current;
    if (current == null) {
      shuffleInPlace(order, this.random);
      this.order = order;
      return;
    }

    const others = order.filter((index) => index !== current);
    shuffleInPlace(others, this.random);
    this.order = [current, ...others];
  }
}
