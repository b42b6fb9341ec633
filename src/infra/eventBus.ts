import { EngineEvent, EngineEventListener } from "../dtos/events.dto";
import { IEventPublisher } from "../interfaces/eventPublisher";
import { Logger } from "./logger";

export class InMemoryEventBus implements IEventPublisher {
  private listeners = new Set<EngineEventListener>();

  constructor(private logger: Logger) {}

  subscribe(listener: EngineEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  publish(event: EngineEvent): void {
    // delivered on a later turn; a slow or throwing subscriber never reaches the caller
    for (const listener of [...this.listeners]) {
      setImmediate(() => {
        try {
          listener(event);
        } catch (err) {
          this.logger.error(`Subscriber failed on ${event.type} for ticket ${event.ticketId}`, err);
        }
      });
    }
  }

  get subscriberCount(): number {
    return this.listeners.size;
  }
}
