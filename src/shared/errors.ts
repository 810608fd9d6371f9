export type EngineErrorCode =
  | "TRACK_NOT_FOUND"
  | "EMPTY_QUEUE"
  | "NO_CURRENT_TRACK"
  | "DECODER_UNAVAILABLE"
  | "DECODER_SIGNAL_ERROR"
  | "TOO_MANY_CONSECUTIVE_ERRORS";

export class EngineError extends Error {
  public readonly code: EngineErrorCode;
  public readonly recoverable: boolean;

  public constructor(code: EngineErrorCode, message: string, recoverable: boolean, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.recoverable = recoverable;
  }
}

export class TrackNotFoundError extends EngineError {
  public readonly trackId: string;

  public constructor(trackId: string) {
    super("TRACK_NOT_FOUND", `Track ${trackId} is not in the catalog.`, false);
    this.trackId = trackId;
  }
}

export class EmptyQueueError extends EngineError {
  public constructor(message = "No playable tracks in selection.") {
    super("EMPTY_QUEUE", message, false);
  }
}

export class NoCurrentTrackError extends EngineError {
  public constructor(operation: string) {
    super("NO_CURRENT_TRACK", `Cannot ${operation}: nothing is loaded.`, true);
  }
}

export class DecoderUnavailableError extends EngineError {
  public constructor() {
    super("DECODER_UNAVAILABLE", "Playback decoder is not initialized.", true);
  }
}

export class DecoderSignalError extends EngineError {
  public constructor(message: string, cause?: unknown) {
    super("DECODER_SIGNAL_ERROR", message, true, { cause });
  }
}

export class TooManyConsecutiveErrorsError extends EngineError {
  public readonly count: number;

  public constructor(count: number) {
    super("TOO_MANY_CONSECUTIVE_ERRORS", `Decoder failed ${count} times in a row.`, false);
    this.count = count;
  }
}

export function describeError(error: unknown): { code: string; message: string } {
  if (error instanceof EngineError) {
    return { code: error.code, message: error.message };
  }
  if (error instanceof Error) {
    return { code: "UNEXPECTED", message: error.message };
  }
  return { code: "UNEXPECTED", message: String(error) };
}
