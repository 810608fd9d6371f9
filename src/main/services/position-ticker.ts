export type TickerMode = "playing" | "paused" | "idle";

export interface TickerIntervals {
  playingMs: number;
  pausedMs: number;
}

interface PositionTickerOptions {
  intervals: TickerIntervals;
  onTick(): void;
}

/** One periodic timer at most; switching cadence always clears the previous one first. */
export class PositionTicker {
  private readonly intervals: TickerIntervals;
  private readonly onTick: () => void;
  private timer: NodeJS.Timeout | null = null;
  private currentMode: TickerMode = "idle";

  public constructor(options: PositionTickerOptions) {
    this.intervals = options.intervals;
    this.onTick = options.onTick;
  }

  public get mode(): TickerMode {
    return this.currentMode;
  }

  public get active(): boolean {
    return this.timer !== null;
  }

  public update(mode: TickerMode): void {
    if (mode === this.currentMode) {
      return;
    }

    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }

    this.currentMode = mode;
    if (mode === "idle") {
      return;
    }

    const intervalMs = mode === "playing" ? this.intervals.playingMs : this.intervals.pausedMs;
    this.timer = setInterval(() => {
      this.onTick();
    }, intervalMs);
  }

  public stop(): void {
    this.update("idle");
  }
}
