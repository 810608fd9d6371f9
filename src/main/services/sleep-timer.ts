interface SleepTimerOptions {
  onExpire(): void;
  now?: () => number;
}

export interface SleepTimerState {
  durationMinutes: number;
  armedAt: number;
  expiresAt: number;
}

export class SleepTimer {
  private readonly onExpire: () => void;
  private readonly now: () => number;
  private timer: NodeJS.Timeout | null = null;
  private state: SleepTimerState | null = null;

  public constructor(options: SleepTimerOptions) {
    this.onExpire = options.onExpire;
    this.now = options.now ?? Date.now;
  }

  public get active(): SleepTimerState | null {
    return this.state;
  }

  public start(minutes: number): SleepTimerState {
    if (!Number.isFinite(minutes) || minutes <= 0) {
      throw new RangeError("Sleep timer duration must be a positive number of minutes.");
    }

    const armedAt = this.now();
    return this.arm({
      durationMinutes: minutes,
      armedAt,
      expiresAt: armedAt + minutes * 60_000
    });
  }

  /**
   * Re-arms a timer that was started earlier, e.g. before a restart. Returns
   * null when the deadline has already passed.
   */
  public resume(durationMinutes: number, armedAt: number): SleepTimerState | null {
    const expiresAt = armedAt + durationMinutes * 60_000;
    if (expiresAt <= this.now()) {
      this.cancel();
      return null;
    }

    return this.arm({ durationMinutes, armedAt, expiresAt });
  }

  public cancel(): boolean {
    const wasActive = this.state !== null;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.state = null;
    return wasActive;
  }

  public remainingMs(): number {
    return this.state ? Math.max(0, this.state.expiresAt - this.now()) : 0;
  }

  private arm(state: SleepTimerState): SleepTimerState {
    this.cancel();
    this.state = state;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.state = null;
      this.onExpire();
    }, Math.max(0, state.expiresAt - this.now()));
    return state;
  }
}
