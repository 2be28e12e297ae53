/**
 * Domain event model.
 *
 * Events are versioned, tenant-scoped and keyed. Ordering is only
 * guaranteed within one (topic, key) pair.
 */

/** Topics events are published to. */
export const EventTopics = {
  Residency: 'sovereign.residency',
  Deployment: 'sovereign.deployment',
  Routing: 'sovereign.routing',
  Compliance: 'sovereign.compliance',
  Registry: 'sovereign.registry',
} as const;

export type EventTopic = (typeof EventTopics)[keyof typeof EventTopics];

/** Event types emitted by the policy core. */
export type SovereigntyEventType =
  | 'residency.violation'
  | 'residency.evaluated'
  | 'residency.rule_created'
  | 'deployment.initiated'
  | 'deployment.active'
  | 'routing.decision'
  | 'compliance.mapping_created'
  | 'model.registered'
  | 'model.approved';

export const EVENT_SCHEMA_VERSION = '1.0.0';

export interface SovereigntyEvent {
  id: string;
  topic: EventTopic;
  type: SovereigntyEventType;
  /** Partition key; ordering holds per (topic, key). */
  key: string;
  schemaVersion: string;
  timestamp: string;
  tenantId: string;
  payload: Record<string, unknown>;
}

/** Outbox delivery state. */
export type OutboxStatus = 'pending' | 'delivered';

export interface OutboxEntry {
  /** Monotonic position in the outbox; relay order. */
  sequence: number;
  event: SovereigntyEvent;
  status: OutboxStatus;
  attempts: number;
  lastError?: string;
  enqueuedAt: string;
  deliveredAt?: string;
}

/** In-process subscription to relayed events. */
export interface EventSubscription {
  id: string;
  /** Omit to receive every tenant's events. */
  tenantId?: string;
  eventTypes?: SovereigntyEventType[];
  callback: (event: SovereigntyEvent) => void;
}
