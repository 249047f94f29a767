import type { EventSink, OracleEvent, OracleEventType } from '@epo/types';
import { createLogger, type Logger } from '@epo/shared';

export type EventListener = (event: OracleEvent) => void;

export interface EventLogOptions {
  /** Oldest events are dropped past this count */
  maxEvents?: number;
  logger?: Logger;
}

/**
 * In-memory sink for registry and oracle notifications.
 * Keeps a bounded history and fans events out to subscribers.
 */
export class EventLog implements EventSink {
  private readonly events: OracleEvent[] = [];
  private readonly listeners = new Set<EventListener>();
  private readonly maxEvents: number;
  private readonly logger: Logger;

  constructor(options: EventLogOptions = {}) {
    this.maxEvents = options.maxEvents ?? 1000;
    this.logger = options.logger ?? createLogger('events');
  }

  emit(event: OracleEvent): void {
    this.events.push(event);
    if (this.events.length > this.maxEvents) {
      this.events.splice(0, this.events.length - this.maxEvents);
    }

    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        this.logger.error('Event listener failed', {
          type: event.type,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }
  }

  subscribe(listener: EventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  list(type?: OracleEventType): OracleEvent[] {
    return type ? this.events.filter((e) => e.type === type) : [...this.events];
  }
}
