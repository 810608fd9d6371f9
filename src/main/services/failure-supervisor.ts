import { DecoderSignalError, TooManyConsecutiveErrorsError } from "../../shared/errors.js";
import type { Logger } from "./logger.js";
import type { PlaybackBackend, PlaybackBackendEvent } from "./playback/backend.js";

export type SignalHandler = (event: PlaybackBackendEvent) => Promise<void>;

interface FailureSupervisorOptions {
  threshold: number;
  logger: Logger;
  reinitialize(): Promise<void>;
}

/**
 * Sits between the decoder and whoever handles its signals. Consecutive
 * failures are counted and any successfully handled signal resets the count;
 * reaching the threshold tears the subscription down and asks for a full
 * reinitialization.
 */
export class FailureSupervisor {
  private readonly threshold: number;
  private readonly logger: Logger;
  private readonly runReinitialize: () => Promise<void>;
  private consecutiveErrors = 0;
  private unsubscribe: (() => void) | null = null;
  private reinitializing: Promise<void> | null = null;
  private outcomes: Promise<void> = Promise.resolve();
  private pendingOutcomes = 0;
  private generation = 0;

  public constructor(options: FailureSupervisorOptions) {
    this.threshold = Math.max(1, Math.trunc(options.threshold));
    this.logger = options.logger;
    this.runReinitialize = options.reinitialize;
  }

  public get errorCount(): number {
    return this.consecutiveErrors;
  }

  public get isReinitializing(): boolean {
    return this.reinitializing !== null;
  }

  public attach(backend: PlaybackBackend, handler: SignalHandler): void {
    this.detach();
    this.consecutiveErrors = 0;
    const generation = this.generation;
    this.unsubscribe = backend.subscribe((event) => {
      if (event.type === "error") {
        const failure = new DecoderSignalError(event.message);
        // Nothing handled is outstanding, so the error is already in arrival order.
        if (event.fatal === true || this.pendingOutcomes === 0) {
          this.recordFailure(failure, event.fatal === true);
          return;
        }
        this.settleInOrder(generation, Promise.resolve(failure));
        return;
      }

      this.settleInOrder(
        generation,
        handler(event).then(
          () => null,
          (error: unknown) =>
            new DecoderSignalError(`Handling "${event.type}" signal failed: ${(error as Error).message}`, error)
        )
      );
    });
  }

  public detach(): void {
    this.generation += 1;
    if (this.unsubscribe) {
      this.unsubscribe();
      this.unsubscribe = null;
    }
  }

  /** Concurrent callers share the run already in flight. */
  public reinitialize(): Promise<void> {
    if (this.reinitializing) {
      return this.reinitializing;
    }

    this.reinitializing = (async () => {
      try {
        await this.runReinitialize();
      } catch (error) {
        this.logger.fatal(`Reinitialization failed: ${(error as Error).message}`);
      } finally {
        this.reinitializing = null;
      }
    })();

    return this.reinitializing;
  }

  /**
   * Outcomes are recorded in the order their signals arrived, however long
   * each handler takes. Outcomes from a detached decoder are dropped.
   */
  private settleInOrder(generation: number, outcome: Promise<DecoderSignalError | null>): void {
    this.pendingOutcomes += 1;
    this.outcomes = this.outcomes.then(async () => {
      const failure = await outcome;
      this.pendingOutcomes -= 1;
      if (generation !== this.generation) {
        return;
      }
      if (failure) {
        this.recordFailure(failure, false);
      } else {
        this.recordSuccess();
      }
    });
  }

  private recordSuccess(): void {
    if (this.consecutiveErrors > 0) {
      this.logger.debug(`Decoder recovered after ${this.consecutiveErrors} error(s).`);
    }
    this.consecutiveErrors = 0;
  }

  private recordFailure(error: DecoderSignalError, fatal: boolean): void {
    this.consecutiveErrors = fatal ? this.threshold : this.consecutiveErrors + 1;
    this.logger.warn(`${error.message} (${this.consecutiveErrors}/${this.threshold})`);

    if (this.consecutiveErrors < this.threshold) {
      return;
    }

    this.logger.fatal(new TooManyConsecutiveErrorsError(this.consecutiveErrors).message);
    this.consecutiveErrors = 0;
    this.detach();
    void this.reinitialize();
  }
}
