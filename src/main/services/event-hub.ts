import { EventEmitter } from "node:events";
import type { EngineEvent } from "../../shared/types.js";
import type { Logger } from "./logger.js";

export type EngineListener = (event: EngineEvent) => void;

export interface EventTarget {
  emit(event: EngineEvent): void;
}

/** Fan-out to subscribers. A listener that throws is logged and does not affect the others. */
export class EventHub implements EventTarget {
  private readonly events = new EventEmitter();
  private readonly logger: Logger;

  public constructor(logger: Logger) {
    this.logger = logger;
    this.events.setMaxListeners(0);
  }

  public emit(event: EngineEvent): void {
    this.events.emit("event", event);
  }

  public subscribe(listener: EngineListener): () => void {
    const guarded = (event: EngineEvent): void => {
      try {
        listener(event);
      } catch (error) {
        this.logger.error(`Subscriber failed on "${event.type}": ${(error as Error).message}`);
      }
    };

    this.events.on("event", guarded);
    return () => {
      this.events.off("event", guarded);
    };
  }

  public get listenerCount(): number {
    return this.events.listenerCount("event");
  }
}
