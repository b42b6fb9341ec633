import { EngineEvent, EngineEventListener } from "../dtos/events.dto";

export interface IEventPublisher {
  /** Must return without waiting for subscribers. */
  publish(event: EngineEvent): void;
  subscribe(listener: EngineEventListener): () => void;
}
