import type { EventType, EventPayload, DomainEvent } from '../domain/events/DomainEvents.js';
import { getDefaultLogger } from '../infrastructure/logging/Logger.js';
import type { Logger } from '../infrastructure/logging/Logger.js';

type EventHandler<T extends EventType> = (event: EventPayload<T>) => void;

type WildcardHandler = (event: DomainEvent) => void;

type HandlerSets = { [T in EventType]: Set<EventHandler<T>> };

/** Typed event bus for domain events. Subscribe with `on()`, publish with `emit()`. */
export class EventBus {
  private readonly handlers: HandlerSets = {
    'load:completed': new Set(),
    'save:completed': new Set(),
    'operation:failed': new Set(),
  };
  private readonly wildcardHandlers = new Set<WildcardHandler>();
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? getDefaultLogger();
  }

  /** Subscribe to events of the given type. */
  on<T extends EventType>(type: T, handler: EventHandler<T>): void {
    this.handlers[type].add(handler);
  }

  /** Subscribe to all events regardless of type. */
  onAny(handler: WildcardHandler): void {
    this.wildcardHandlers.add(handler);
  }

  /** Unsubscribe a previously registered handler. */
  off<T extends EventType>(type: T, handler: EventHandler<T>): void {
    this.handlers[type].delete(handler);
  }

  /** Unsubscribe a wildcard handler. */
  offAny(handler: WildcardHandler): void {
    this.wildcardHandlers.delete(handler);
  }

  /**
   * Emit a domain event to all registered handlers. A throwing handler is
   * logged and does not prevent others from executing.
   */
  emit(event: DomainEvent): void {
    this.dispatch(event.type, event);

    for (const handler of this.wildcardHandlers) {
      this.invoke(event, () => {
        handler(event);
      });
    }
  }

  private dispatch<T extends EventType>(type: T, event: EventPayload<T>): void {
    for (const handler of this.handlers[type]) {
      this.invoke(event, () => {
        handler(event);
      });
    }
  }

  private invoke(event: DomainEvent, call: () => void): void {
    try {
      call();
    } catch (error) {
      this.logger.warn('Event handler threw', {
        event: event.type,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
