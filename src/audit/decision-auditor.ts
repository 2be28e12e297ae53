/**
 * Decision Auditor.
 *
 * Wraps every residency and routing decision in an immutable audit record,
 * persists it, and enqueues the matching event in the outbox before the
 * decision goes back to the caller. Record and event are one unit of work. Any failure on that path throws
 * AuditEnqueueError: an unaudited sovereignty decision must not be acted on.
 */

import { v4 as uuid } from 'uuid';
import {
  AuditKind,
  AuditRecord,
  DecisionContext,
  ResidencyAuditRecord,
  RoutingAuditRecord,
} from '../domain/audit';
import { AuditEnqueueError } from '../domain/errors';
import { EventTopics, SovereigntyEventType } from '../domain/events';
import { ResidencyDecision } from '../domain/residency';
import { RoutingDecision } from '../domain/routing';
import { ListOptions, Store } from '../storage/store';
import { EventPublisher } from '../data-plane/publisher';
import { logger } from '../logger';

const log = logger.child({ component: 'decision-auditor' });

/** Audit query options. */
export interface AuditQueryOptions extends ListOptions {
  tenantId: string;
  kind?: AuditKind;
  jurisdiction?: string;
}

/** Deep-freeze a record in place. */
function freeze(value: unknown): void {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) freeze(child);
    Object.freeze(value);
  }
}

export class DecisionAuditor {
  constructor(
    private store: Store,
    private publisher: EventPublisher,
  ) {}

  async recordResidency(context: DecisionContext, decision: ResidencyDecision): Promise<ResidencyAuditRecord> {
    const record: ResidencyAuditRecord = {
      ...this.base(context),
      kind: 'residency',
      decision: { ...decision },
    };
    freeze(record);
    const eventType: SovereigntyEventType =
      decision.action === 'allow' ? 'residency.evaluated' : 'residency.violation';

    await this.persist(record, eventType, {
      auditId: record.id,
      correlationId: record.correlationId,
      jurisdiction: record.jurisdiction,
      ruleId: decision.ruleId,
      action: decision.action,
      redirectTarget: decision.redirectTarget,
      evaluatedAt: decision.evaluatedAt,
      ...record.attributes,
    });
    return record;
  }

  async recordRouting(context: DecisionContext, decision: RoutingDecision): Promise<RoutingAuditRecord> {
    const record: RoutingAuditRecord = {
      ...this.base(context),
      kind: 'routing',
      decision: { ...decision },
    };
    freeze(record);

    await this.persist(record, 'routing.decision', {
      auditId: record.id,
      correlationId: record.correlationId,
      jurisdiction: record.jurisdiction,
      selectedDeploymentId: decision.selectedDeploymentId,
      strategyUsed: decision.strategyUsed,
      reason: decision.reason,
      ...record.attributes,
    });
    return record;
  }

  /** Query audit records within a tenant. */
  async query(options: AuditQueryOptions): Promise<AuditRecord[]> {
    return this.store.audit.listByTenant(options.tenantId, {
      kind: options.kind,
      jurisdiction: options.jurisdiction,
      limit: options.limit,
      offset: options.offset,
    });
  }

  private base(context: DecisionContext) {
    return {
      id: `aud_${uuid()}`,
      timestamp: new Date().toISOString(),
      tenantId: context.tenantId,
      jurisdiction: context.jurisdiction,
      correlationId: context.correlationId ?? uuid(),
      attributes: { ...context.attributes },
    };
  }

  private async persist(
    record: AuditRecord,
    eventType: SovereigntyEventType,
    payload: Record<string, unknown>,
  ): Promise<void> {
    const topic = record.kind === 'residency' ? EventTopics.Residency : EventTopics.Routing;
    try {
      await this.store.transaction(async (tx) => {
        await tx.audit.create(record);
        await this.publisher.within(tx.outbox).publish(topic, eventType, record.tenantId, record.jurisdiction, payload);
      });
    } catch (err) {
      log.error('Audit enqueue failed', {
        auditId: record.id,
        kind: record.kind,
        tenantId: record.tenantId,
        error: err instanceof Error ? err.message : String(err),
      });
      throw new AuditEnqueueError(record.kind, err);
    }
  }
}
