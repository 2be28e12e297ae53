/**
 * Decision audit domain model.
 *
 * Every residency and routing decision is captured as an immutable audit
 * record before the decision is handed back to the caller.
 */

import { Jurisdiction } from './jurisdiction';
import { ResidencyDecision } from './residency';
import { RoutingDecision } from './routing';

/** Which decision a record captures. */
export type AuditKind = 'residency' | 'routing';

/** Request context attached to a decision. */
export interface DecisionContext {
  tenantId: string;
  jurisdiction: Jurisdiction;
  /** Caller-supplied correlation id; generated when absent. */
  correlationId?: string;
  /** Free-form request attributes (classification, model ref, policy id). */
  attributes?: Record<string, unknown>;
}

interface AuditRecordBase {
  id: string;
  timestamp: string;
  tenantId: string;
  jurisdiction: Jurisdiction;
  correlationId: string;
  attributes: Record<string, unknown>;
}

export interface ResidencyAuditRecord extends AuditRecordBase {
  kind: 'residency';
  decision: ResidencyDecision;
}

export interface RoutingAuditRecord extends AuditRecordBase {
  kind: 'routing';
  decision: RoutingDecision;
}

/** An immutable audit record. */
export type AuditRecord = ResidencyAuditRecord | RoutingAuditRecord;
