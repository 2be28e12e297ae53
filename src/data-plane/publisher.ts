/**
 * Outbox event publisher.
 *
 * `publish` writes the event to the outbox store and returns once it is
 * persisted; it never waits on the bus. Inside a store transaction,
 * `within(tx.outbox)` enqueues as part of that unit of work, so the event
 * commits or rolls back with the state it describes. `relay` drains pending entries in
 * enqueue order to in-process subscribers and the configured sink. An
 * entry is marked delivered only after the sink accepts it, so a crash
 * between enqueue and delivery re-sends rather than drops (at-least-once).
 */

import { v4 as uuid } from 'uuid';
import {
  EVENT_SCHEMA_VERSION,
  EventSubscription,
  EventTopic,
  OutboxEntry,
  SovereigntyEvent,
  SovereigntyEventType,
} from '../domain/events';
import { toSovereigntyError } from '../domain/errors';
import { OutboxStore } from '../storage/store';
import { logger } from '../logger';

const log = logger.child({ component: 'outbox' });

/** Message-bus delivery collaborator (Kafka producer, webhook, ...). */
export interface EventSink {
  deliver(event: SovereigntyEvent): Promise<void>;
}

/** What the rest of the core needs from event publication. */
export interface EventPublisher {
  publish(
    topic: EventTopic,
    type: SovereigntyEventType,
    tenantId: string,
    key: string,
    payload: Record<string, unknown>,
  ): Promise<SovereigntyEvent>;
  /** The same publisher, enqueueing through `outbox`. */
  within(outbox: OutboxStore): EventPublisher;
}

/** Outcome of one relay pass. */
export interface RelayResult {
  delivered: number;
  failed: number;
  /** Sequences left pending because of a failure. */
  failedSequences: number[];
}

export class OutboxEventPublisher implements EventPublisher {
  private subscriptions: EventSubscription[] = [];

  constructor(
    private outbox: OutboxStore,
    private sink?: EventSink,
  ) {}

  async publish(
    topic: EventTopic,
    type: SovereigntyEventType,
    tenantId: string,
    key: string,
    payload: Record<string, unknown>,
  ): Promise<SovereigntyEvent> {
    return this.enqueue(this.outbox, topic, type, tenantId, key, payload);
  }

  within(outbox: OutboxStore): EventPublisher {
    return {
      publish: (topic, type, tenantId, key, payload) => this.enqueue(outbox, topic, type, tenantId, key, payload),
      within: (other) => this.within(other),
    };
  }

  private async enqueue(
    outbox: OutboxStore,
    topic: EventTopic,
    type: SovereigntyEventType,
    tenantId: string,
    key: string,
    payload: Record<string, unknown>,
  ): Promise<SovereigntyEvent> {
    const event: SovereigntyEvent = {
      id: `evt_${uuid()}`,
      topic,
      type,
      key,
      schemaVersion: EVENT_SCHEMA_VERSION,
      timestamp: new Date().toISOString(),
      tenantId,
      payload,
    };

    try {
      await outbox.enqueue(event);
    } catch (err) {
      throw toSovereigntyError(err, 'outbox');
    }

    log.debug('Event enqueued', { type, topic, key, tenantId, eventId: event.id });
    return event;
  }

  /** Subscribe to relayed events. Returns an unsubscribe function. */
  subscribe(subscription: EventSubscription): () => void {
    this.subscriptions.push(subscription);
    return () => {
      this.subscriptions = this.subscriptions.filter((s) => s.id !== subscription.id);
    };
  }

  /**
   * Deliver pending outbox entries. Once an entry for a (topic, key) pair
   * fails, later entries for the same pair are held back in this pass so
   * per-key ordering survives a partial failure.
   */
  async relay(batchSize = 100): Promise<RelayResult> {
    const pending = await this.outbox.listPending({ limit: batchSize });
    const blockedKeys = new Set<string>();
    const result: RelayResult = { delivered: 0, failed: 0, failedSequences: [] };

    for (const entry of pending) {
      const orderingKey = `${entry.event.topic}\u0000${entry.event.key}`;
      if (blockedKeys.has(orderingKey)) continue;

      try {
        await this.deliver(entry);
        await this.outbox.markDelivered(entry.sequence);
        result.delivered++;
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        await this.outbox.markFailed(entry.sequence, message);
        blockedKeys.add(orderingKey);
        result.failed++;
        result.failedSequences.push(entry.sequence);
        log.error('Event delivery failed; left pending', {
          sequence: entry.sequence,
          eventId: entry.event.id,
          type: entry.event.type,
          error: message,
        });
      }
    }

    return result;
  }

  private async deliver(entry: OutboxEntry): Promise<void> {
    if (this.sink) {
      await this.sink.deliver(entry.event);
    }
    for (const sub of this.subscriptions) {
      if (!this.matchesSubscription(entry.event, sub)) continue;
      try {
        sub.callback(entry.event);
      } catch (err) {
        // A faulty in-process listener must not hold back bus delivery.
        log.warn('Subscriber callback threw', {
          subscriptionId: sub.id,
          eventId: entry.event.id,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }
  }

  private matchesSubscription(event: SovereigntyEvent, sub: EventSubscription): boolean {
    if (sub.tenantId && event.tenantId !== sub.tenantId) return false;
    if (sub.eventTypes?.length && !sub.eventTypes.includes(event.type)) return false;
    return true;
  }
}
