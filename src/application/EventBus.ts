import type { Logger } from 'pino';
import type { EventType, EventPayload, DomainEvent } from '../domain/events/DomainEvents.js';
import { createLogger } from '../infrastructure/logging/logger.js';

type EventHandler<T extends EventType> = (event: EventPayload<T>) => void;

type WildcardHandler = (event: DomainEvent) => void;

/** Typed event bus for domain events. Subscribe with `on()`, publish with `emit()`. */
export class EventBus {
  private readonly handlers = new Map<EventType, Map<unknown, WildcardHandler>>();
  private readonly wildcardHandlers = new Set<WildcardHandler>();

  constructor(private readonly logger: Logger = createLogger('event-bus')) {}

  /** Subscribe to events of the given type. */
  on<T extends EventType>(type: T, handler: EventHandler<T>): void {
    const existing = this.handlers.get(type) ?? new Map<unknown, WildcardHandler>();
    existing.set(handler, (event) => handler(event as EventPayload<T>));
    this.handlers.set(type, existing);
  }

  /** Subscribe to all events regardless of type. */
  onAny(handler: WildcardHandler): void {
    this.wildcardHandlers.add(handler);
  }

  /** Unsubscribe a previously registered handler. */
  off<T extends EventType>(type: T, handler: EventHandler<T>): void {
    this.handlers.get(type)?.delete(handler);
  }

  /** Unsubscribe a wildcard handler. */
  offAny(handler: WildcardHandler): void {
    this.wildcardHandlers.delete(handler);
  }

  /** Emit a domain event to all registered handlers. A throwing handler is logged and does not prevent others from executing. */
  emit(event: DomainEvent): void {
    const handlers = [...(this.handlers.get(event.type)?.values() ?? []), ...this.wildcardHandlers];
    for (const handler of handlers) {
      try {
        handler(event);
      } catch (error) {
        this.logger.error({ err: error, event: event.type }, 'Event handler threw');
      }
    }
  }
}
