/**
 * Event Log — committed bridge events, in order, with subscribers.
 *
 * Operations stage events while they run and publish them only after
 * they commit, so a rolled-back operation never announces anything.
 *
 * Subscribers are dispatched synchronously on publish. A subscriber
 * that throws is logged and skipped; it cannot undo a committed
 * operation.
 */

import { randomUUID } from "node:crypto";
import type { Logger } from "pino";
import type {
  BridgeEventType,
  DomainEvent,
  EventSource,
  LedgerId,
} from "@relaymint/types";

/**
 * An event staged by a running operation.
 */
export interface StagedEvent {
  readonly type: BridgeEventType;
  readonly actor: string;
  readonly correlationId: string;
  readonly payload: DomainEvent["payload"];
}

export type EventListener = (event: DomainEvent) => void;

export class EventLog {
  private readonly _events: DomainEvent[] = [];
  private readonly _listeners = new Set<EventListener>();

  constructor(
    private readonly source: EventSource,
    private readonly ledgerId: LedgerId,
    private readonly logger: Logger,
  ) {}

  /**
   * Subscribe to future events. Returns an unsubscribe function.
   */
  subscribe(listener: EventListener): () => void {
    this._listeners.add(listener);
    return () => {
      this._listeners.delete(listener);
    };
  }

  all(): readonly DomainEvent[] {
    return [...this._events];
  }

  ofType(type: BridgeEventType): readonly DomainEvent[] {
    return this._events.filter((e) => e.type === type);
  }

  get count(): number {
    return this._events.length;
  }

  publish(staged: readonly StagedEvent[]): void {
    for (const event of staged) {
      const published: DomainEvent = {
        type: event.type,
        metadata: {
          eventId: randomUUID(),
          timestamp: new Date().toISOString(),
          actor: event.actor,
          correlationId: event.correlationId,
          ledgerId: this.ledgerId,
          source: this.source,
        },
        payload: event.payload,
      };
      this._events.push(published);

      for (const listener of this._listeners) {
        try {
          listener(published);
        } catch (err) {
          this.logger.error(
            { err, eventType: published.type, eventId: published.metadata.eventId },
            "Event subscriber failed",
          );
        }
      }
    }
  }
}
