import type { EventType, EventPayload, DomainEvent } from '../domain/events/DomainEvents.js';

type EventHandler<T extends EventType> = (event: EventPayload<T>) => void;

type WildcardHandler = (event: DomainEvent) => void;

/**
 * Typed event bus for domain events. Subscribe with `on()`, publish with `emit()`.
 *
 * Handlers run in registration order, typed handlers first, then wildcard ones.
 */
export class EventBus {
  // Typed handlers are stored behind a narrowing wrapper, keyed by the original handler.
  private readonly handlers = new Map<EventType, Map<unknown, WildcardHandler>>();
  private readonly wildcardHandlers = new Set<WildcardHandler>();

  /** Subscribe to events of the given type. */
  on<T extends EventType>(type: T, handler: EventHandler<T>): void {
    const existing = this.handlers.get(type) ?? new Map<unknown, WildcardHandler>();
    if (!existing.has(handler)) {
      existing.set(handler, (event) => {
        if (isEventOfType(event, type)) handler(event);
      });
    }
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

  /**
   * Emit a domain event to all registered handlers.
   *
   * A throwing handler does not prevent others from executing; the first error
   * is rethrown once every handler has run.
   */
  emit(event: DomainEvent): void {
    let failure: { error: unknown } | null = null;
    const listeners = [...(this.handlers.get(event.type)?.values() ?? []), ...this.wildcardHandlers];

    for (const handler of listeners) {
      try {
        handler(event);
      } catch (error) {
        failure ??= { error };
      }
    }

    if (failure) {
      throw failure.error;
    }
  }
}

function isEventOfType<T extends EventType>(event: DomainEvent, type: T): event is EventPayload<T> {
  return event.type === type;
}
