/**
 * Storage layer interfaces.
 *
 * The policy core is written against these contracts, not a database.
 * Every lookup is tenant-scoped: a record owned by another tenant is
 * indistinguishable from a missing one. Mutable entities carry a `version`
 * and updates take the version the caller read; a mismatch throws
 * ConflictError so the caller can re-read and re-evaluate.
 */

import { AuditKind, AuditRecord } from '../domain/audit';
import { ComplianceMap } from '../domain/compliance';
import { RegionalDeployment } from '../domain/deployment';
import { OutboxEntry, SovereigntyEvent } from '../domain/events';
import { Jurisdiction } from '../domain/jurisdiction';
import { ResidencyRule } from '../domain/residency';
import { RoutingPolicy } from '../domain/routing';
import { SovereignModel } from '../domain/sovereign-model';

/** Generic list query options. */
export interface ListOptions {
  limit?: number;
  offset?: number;
}

/** Paginated list result with metadata. */
export interface ListResult<T> {
  items: T[];
  total: number;
  limit: number;
  offset: number;
  hasMore: boolean;
}

/** Store interface for residency rules. */
export interface RuleStore {
  /** Rejects with LimitExceededError once the tenant's active-rule ceiling is reached. */
  create(rule: ResidencyRule): Promise<ResidencyRule>;
  getById(id: string, tenantId: string): Promise<ResidencyRule | null>;
  /** Active rules of one tenant in one jurisdiction, in no particular order. */
  listActive(tenantId: string, jurisdiction: Jurisdiction): Promise<ResidencyRule[]>;
  listByTenant(
    tenantId: string,
    options?: ListOptions & { jurisdiction?: Jurisdiction; includeInactive?: boolean },
  ): Promise<ResidencyRule[]>;
  /** The only mutation rules allow. Returns null when the rule does not exist. */
  setActive(id: string, tenantId: string, active: boolean, expectedVersion: number): Promise<ResidencyRule | null>;
}

/** Store interface for regional deployments. */
export interface DeploymentStore {
  create(deployment: RegionalDeployment): Promise<RegionalDeployment>;
  getById(id: string, tenantId: string): Promise<RegionalDeployment | null>;
  listByTenant(
    tenantId: string,
    options?: ListOptions & { jurisdiction?: Jurisdiction },
  ): Promise<RegionalDeployment[]>;
  update(
    id: string,
    tenantId: string,
    updates: Partial<Pick<RegionalDeployment, 'status' | 'endpointUrl' | 'healthCheckedAt'>>,
    expectedVersion: number,
  ): Promise<RegionalDeployment | null>;
}

/** Store interface for routing policies. */
export interface PolicyStore {
  create(policy: RoutingPolicy): Promise<RoutingPolicy>;
  getById(id: string, tenantId: string): Promise<RoutingPolicy | null>;
  listByTenant(
    tenantId: string,
    options?: ListOptions & { jurisdiction?: Jurisdiction },
  ): Promise<RoutingPolicy[]>;
}

/** Store interface for sovereign model registrations. */
export interface ModelStore {
  /** Rejects with ValidationError when (tenant, model ref, jurisdiction) is already registered. */
  create(model: SovereignModel): Promise<SovereignModel>;
  /** Lookup by the natural key (tenant, model ref, jurisdiction). */
  get(tenantId: string, modelRef: string, jurisdiction: Jurisdiction): Promise<SovereignModel | null>;
  listByTenant(
    tenantId: string,
    options?: ListOptions & { jurisdiction?: Jurisdiction },
  ): Promise<SovereignModel[]>;
  update(
    id: string,
    tenantId: string,
    updates: Partial<Pick<SovereignModel, 'status' | 'approvedBy' | 'approvedAt'>>,
    expectedVersion: number,
  ): Promise<SovereignModel | null>;
}

/** Store interface for compliance mappings. */
export interface ComplianceStore {
  create(map: ComplianceMap): Promise<ComplianceMap>;
  getById(id: string, tenantId: string): Promise<ComplianceMap | null>;
  listByJurisdiction(tenantId: string, jurisdiction: Jurisdiction): Promise<ComplianceMap[]>;
  update(
    id: string,
    tenantId: string,
    updates: Partial<Pick<ComplianceMap, 'status' | 'verifiedBy' | 'lastVerifiedAt'>>,
  ): Promise<ComplianceMap | null>;
}

/** Store interface for audit records. Append-only. */
export interface AuditStore {
  create(record: AuditRecord): Promise<AuditRecord>;
  listByTenant(
    tenantId: string,
    options?: ListOptions & { kind?: AuditKind; jurisdiction?: Jurisdiction },
  ): Promise<AuditRecord[]>;
}

/** Transactional outbox for domain events. */
export interface OutboxStore {
  enqueue(event: SovereigntyEvent): Promise<OutboxEntry>;
  /** Pending entries in enqueue order. */
  listPending(options?: ListOptions): Promise<OutboxEntry[]>;
  listByTenant(tenantId: string, options?: ListOptions): Promise<OutboxEntry[]>;
  markDelivered(sequence: number): Promise<void>;
  markFailed(sequence: number, error: string): Promise<void>;
}

/** Build a paginated ListResult from items and total count. */
export function toListResult<T>(items: T[], total: number, options?: ListOptions): ListResult<T> {
  const limit = options?.limit ?? 100;
  const offset = options?.offset ?? 0;
  return {
    items,
    total,
    limit,
    offset,
    hasMore: offset + items.length < total,
  };
}

/** Composite store interface. */
export interface Store {
  rules: RuleStore;
  deployments: DeploymentStore;
  policies: PolicyStore;
  models: ModelStore;
  compliance: ComplianceStore;
  audit: AuditStore;
  outbox: OutboxStore;
  /**
   * Run `work` as one unit of work. Writes made through `tx` are undone
   * when `work` rejects, so state and the outbox events describing it are
   * committed together. Nested calls join the enclosing unit.
   */
  transaction<T>(work: (tx: Store) => Promise<T>): Promise<T>;
}
