import type {
  SynthesisEvent,
  SynthesisEventPayload,
  SynthesisEventType,
} from '../domain/events/SynthesisEvents.js';
import type { Logger } from '../domain/ports/Logger.js';
import { defaultLogger } from '../infrastructure/logging/StderrLogger.js';

type EventHandler<T extends SynthesisEventType> = (event: SynthesisEventPayload<T>) => void;

type WildcardHandler = (event: SynthesisEvent) => void;

/** Typed event bus for synthesis events. Subscribe with `on()`, publish with `emit()`. */
export class EventBus {
  // Keyed by the subscriber's own handler so `off()` can find the wrapper.
  private readonly handlers = new Map<SynthesisEventType, Map<object, WildcardHandler>>();
  private readonly wildcardHandlers = new Set<WildcardHandler>();

  constructor(private readonly logger: Logger = defaultLogger) {}

  /** Subscribe to events of the given type. */
  on<T extends SynthesisEventType>(type: T, handler: EventHandler<T>): void {
    const wrapped: WildcardHandler = (event) => {
      if (isEventOf(type, event)) handler(event);
    };
    const existing = this.handlers.get(type) ?? new Map<object, WildcardHandler>();
    existing.set(handler, wrapped);
    this.handlers.set(type, existing);
  }

  /** Subscribe to all events regardless of type. */
  onAny(handler: WildcardHandler): void {
    this.wildcardHandlers.add(handler);
  }

  /** Unsubscribe a previously registered handler. */
  off<T extends SynthesisEventType>(type: T, handler: EventHandler<T>): void {
    this.handlers.get(type)?.delete(handler);
  }

  /** Unsubscribe a wildcard handler. */
  offAny(handler: WildcardHandler): void {
    this.wildcardHandlers.delete(handler);
  }

  /** Emit an event to all registered handlers. A throwing handler is logged and does not stop the others. */
  emit(event: SynthesisEvent): void {
    const handlers = [...(this.handlers.get(event.type)?.values() ?? []), ...this.wildcardHandlers];
    for (const handler of handlers) {
      try {
        handler(event);
      } catch (error) {
        this.logger.warn(`Event handler for '${event.type}' threw`, {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }
}

function isEventOf<T extends SynthesisEventType>(type: T, event: SynthesisEvent): event is SynthesisEventPayload<T> {
  return event.type === type;
}
