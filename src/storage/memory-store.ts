/**
 * In-memory storage implementation.
 *
 * Reference implementation for development and testing. Every read and
 * write goes through deepCopy so callers can never alias the store's
 * internal records, and versioned updates behave like a conditional
 * UPDATE ... WHERE version = ? in a relational backend.
 *
 * Transactions keep an undo journal instead of staging writes: a write is
 * visible as soon as it is made, and a failed unit of work is reverted by
 * replaying its journal backwards. A revert never overwrites a record that
 * someone else has changed since.
 */

import { AuditKind, AuditRecord } from '../domain/audit';
import { ComplianceMap } from '../domain/compliance';
import { RegionalDeployment } from '../domain/deployment';
import { ConflictError, LimitExceededError, ValidationError } from '../domain/errors';
import { OutboxEntry, SovereigntyEvent } from '../domain/events';
import { Jurisdiction } from '../domain/jurisdiction';
import { ResidencyRule } from '../domain/residency';
import { RoutingPolicy } from '../domain/routing';
import { SovereignModel } from '../domain/sovereign-model';
import {
  Store,
  RuleStore,
  DeploymentStore,
  PolicyStore,
  ModelStore,
  ComplianceStore,
  AuditStore,
  OutboxStore,
  ListOptions,
} from './store';

/** Default per-tenant ceiling on active residency rules. */
export const DEFAULT_MAX_RULES_PER_TENANT = 100;

export interface MemoryStoreOptions {
  maxRulesPerTenant?: number;
}

function applyListOptions<T>(items: T[], options?: ListOptions): T[] {
  const offset = options?.offset ?? 0;
  const limit = options?.limit ?? 100;
  return items.slice(offset, offset + limit);
}

function deepCopy<T>(obj: T): T {
  return structuredClone(obj);
}

function now(): string {
  return new Date().toISOString();
}

/**
 * Apply a versioned update to a record held in `data`.
 * Returns null when the record is missing or owned by another tenant.
 */
function versionedUpdate<T extends { id: string; tenantId: string; version: number; updatedAt: string }>(
  data: Map<string, T>,
  resourceType: string,
  id: string,
  tenantId: string,
  updates: Partial<T>,
  expectedVersion: number,
): T | null {
  const existing = data.get(id);
  if (!existing || existing.tenantId !== tenantId) return null;
  if (existing.version !== expectedVersion) {
    throw new ConflictError(resourceType, id, expectedVersion, existing.version);
  }
  const updated: T = {
    ...deepCopy(existing),
    ...deepCopy(updates),
    version: existing.version + 1,
    updatedAt: now(),
  };
  data.set(id, updated);
  return deepCopy(updated);
}

type Undo = () => void;

/** Record map plus the primitives the undo journal needs. */
abstract class MemoryCollection<T extends { id: string }> {
  protected data = new Map<string, T>();

  peek(id: string): T | undefined {
    const record = this.data.get(id);
    return record ? deepCopy(record) : undefined;
  }

  discard(id: string): void {
    this.data.delete(id);
  }

  /** Put `previous` back while the stored record still matches the write being undone. */
  restore(previous: T, isUnchanged: (current: T) => boolean): void {
    const current = this.data.get(previous.id);
    if (current && isUnchanged(current)) this.data.set(previous.id, deepCopy(previous));
  }
}

class MemoryRuleStore extends MemoryCollection<ResidencyRule> implements RuleStore {
  constructor(private maxRulesPerTenant: number) {
    super();
  }

  async create(rule: ResidencyRule): Promise<ResidencyRule> {
    if (rule.active) {
      const activeCount = [...this.data.values()].filter(
        (r) => r.tenantId === rule.tenantId && r.active,
      ).length;
      if (activeCount >= this.maxRulesPerTenant) {
        throw new LimitExceededError('ResidencyRule', this.maxRulesPerTenant, rule.tenantId);
      }
    }
    this.data.set(rule.id, deepCopy(rule));
    return deepCopy(rule);
  }

  async getById(id: string, tenantId: string): Promise<ResidencyRule | null> {
    const rule = this.data.get(id);
    if (!rule || rule.tenantId !== tenantId) return null;
    return deepCopy(rule);
  }

  async listActive(tenantId: string, jurisdiction: Jurisdiction): Promise<ResidencyRule[]> {
    return [...this.data.values()]
      .filter((r) => r.tenantId === tenantId && r.jurisdiction === jurisdiction && r.active)
      .map(deepCopy);
  }

  async listByTenant(
    tenantId: string,
    options?: ListOptions & { jurisdiction?: Jurisdiction; includeInactive?: boolean },
  ): Promise<ResidencyRule[]> {
    const items = [...this.data.values()].filter((r) => {
      if (r.tenantId !== tenantId) return false;
      if (options?.jurisdiction && r.jurisdiction !== options.jurisdiction) return false;
      if (!options?.includeInactive && !r.active) return false;
      return true;
    });
    return applyListOptions(items.map(deepCopy), options);
  }

  async setActive(
    id: string,
    tenantId: string,
    active: boolean,
    expectedVersion: number,
  ): Promise<ResidencyRule | null> {
    return versionedUpdate<ResidencyRule>(this.data, 'ResidencyRule', id, tenantId, { active }, expectedVersion);
  }
}

class MemoryDeploymentStore extends MemoryCollection<RegionalDeployment> implements DeploymentStore {
  async create(deployment: RegionalDeployment): Promise<RegionalDeployment> {
    this.data.set(deployment.id, deepCopy(deployment));
    return deepCopy(deployment);
  }

  async getById(id: string, tenantId: string): Promise<RegionalDeployment | null> {
    const deployment = this.data.get(id);
    if (!deployment || deployment.tenantId !== tenantId) return null;
    return deepCopy(deployment);
  }

  async listByTenant(
    tenantId: string,
    options?: ListOptions & { jurisdiction?: Jurisdiction },
  ): Promise<RegionalDeployment[]> {
    const items = [...this.data.values()].filter(
      (d) => d.tenantId === tenantId && (!options?.jurisdiction || d.jurisdiction === options.jurisdiction),
    );
    return applyListOptions(items.map(deepCopy), options);
  }

  async update(
    id: string,
    tenantId: string,
    updates: Partial<Pick<RegionalDeployment, 'status' | 'endpointUrl' | 'healthCheckedAt'>>,
    expectedVersion: number,
  ): Promise<RegionalDeployment | null> {
    return versionedUpdate<RegionalDeployment>(this.data, 'RegionalDeployment', id, tenantId, updates, expectedVersion);
  }
}

class MemoryPolicyStore extends MemoryCollection<RoutingPolicy> implements PolicyStore {
  async create(policy: RoutingPolicy): Promise<RoutingPolicy> {
    this.data.set(policy.id, deepCopy(policy));
    return deepCopy(policy);
  }

  async getById(id: string, tenantId: string): Promise<RoutingPolicy | null> {
    const policy = this.data.get(id);
    if (!policy || policy.tenantId !== tenantId) return null;
    return deepCopy(policy);
  }

  async listByTenant(
    tenantId: string,
    options?: ListOptions & { jurisdiction?: Jurisdiction },
  ): Promise<RoutingPolicy[]> {
    const items = [...this.data.values()].filter(
      (p) => p.tenantId === tenantId && (!options?.jurisdiction || p.jurisdiction === options.jurisdiction),
    );
    return applyListOptions(items.map(deepCopy), options);
  }
}

/**
 * Models are indexed by their natural key so approval checks on the
 * routing path are a single map lookup. The index is also the uniqueness
 * constraint on (tenant, model ref, jurisdiction).
 */
class MemoryModelStore extends MemoryCollection<SovereignModel> implements ModelStore {
  private keyIndex = new Map<string, string>();

  private static key(tenantId: string, modelRef: string, jurisdiction: Jurisdiction): string {
    return `${tenantId}\u0000${modelRef}\u0000${jurisdiction}`;
  }

  async create(model: SovereignModel): Promise<SovereignModel> {
    const key = MemoryModelStore.key(model.tenantId, model.modelRef, model.jurisdiction);
    if (this.keyIndex.has(key)) {
      throw new ValidationError(`Model ${model.modelRef} is already registered in ${model.jurisdiction}`, {
        modelRef: model.modelRef,
        jurisdiction: model.jurisdiction,
      });
    }
    this.data.set(model.id, deepCopy(model));
    this.keyIndex.set(key, model.id);
    return deepCopy(model);
  }

  discard(id: string): void {
    const model = this.data.get(id);
    if (!model) return;
    const key = MemoryModelStore.key(model.tenantId, model.modelRef, model.jurisdiction);
    if (this.keyIndex.get(key) === id) this.keyIndex.delete(key);
    super.discard(id);
  }

  async get(tenantId: string, modelRef: string, jurisdiction: Jurisdiction): Promise<SovereignModel | null> {
    const id = this.keyIndex.get(MemoryModelStore.key(tenantId, modelRef, jurisdiction));
    if (!id) return null;
    const model = this.data.get(id);
    return model ? deepCopy(model) : null;
  }

  async listByTenant(
    tenantId: string,
    options?: ListOptions & { jurisdiction?: Jurisdiction },
  ): Promise<SovereignModel[]> {
    const items = [...this.data.values()].filter(
      (m) => m.tenantId === tenantId && (!options?.jurisdiction || m.jurisdiction === options.jurisdiction),
    );
    return applyListOptions(items.map(deepCopy), options);
  }

  async update(
    id: string,
    tenantId: string,
    updates: Partial<Pick<SovereignModel, 'status' | 'approvedBy' | 'approvedAt'>>,
    expectedVersion: number,
  ): Promise<SovereignModel | null> {
    return versionedUpdate<SovereignModel>(this.data, 'SovereignModel', id, tenantId, updates, expectedVersion);
  }
}

class MemoryComplianceStore extends MemoryCollection<ComplianceMap> implements ComplianceStore {
  async create(map: ComplianceMap): Promise<ComplianceMap> {
    this.data.set(map.id, deepCopy(map));
    return deepCopy(map);
  }

  async getById(id: string, tenantId: string): Promise<ComplianceMap | null> {
    const map = this.data.get(id);
    if (!map || map.tenantId !== tenantId) return null;
    return deepCopy(map);
  }

  async listByJurisdiction(tenantId: string, jurisdiction: Jurisdiction): Promise<ComplianceMap[]> {
    return [...this.data.values()]
      .filter((m) => m.tenantId === tenantId && m.jurisdiction === jurisdiction)
      .map(deepCopy);
  }

  async update(
    id: string,
    tenantId: string,
    updates: Partial<Pick<ComplianceMap, 'status' | 'verifiedBy' | 'lastVerifiedAt'>>,
  ): Promise<ComplianceMap | null> {
    const existing = this.data.get(id);
    if (!existing || existing.tenantId !== tenantId) return null;
    const updated = { ...deepCopy(existing), ...deepCopy(updates) };
    this.data.set(id, updated);
    return deepCopy(updated);
  }
}

class MemoryAuditStore implements AuditStore {
  private data: AuditRecord[] = [];

  async create(record: AuditRecord): Promise<AuditRecord> {
    this.data.push(deepCopy(record));
    return deepCopy(record);
  }

  async listByTenant(
    tenantId: string,
    options?: ListOptions & { kind?: AuditKind; jurisdiction?: Jurisdiction },
  ): Promise<AuditRecord[]> {
    let items = this.data.filter((r) => r.tenantId === tenantId);
    if (options?.kind) items = items.filter((r) => r.kind === options.kind);
    if (options?.jurisdiction) items = items.filter((r) => r.jurisdiction === options.jurisdiction);
    return applyListOptions(items.map(deepCopy), options);
  }

  discard(id: string): void {
    this.data = this.data.filter((r) => r.id !== id);
  }
}

class MemoryOutboxStore implements OutboxStore {
  private entries: OutboxEntry[] = [];
  private nextSequence = 1;

  async enqueue(event: SovereigntyEvent): Promise<OutboxEntry> {
    const entry: OutboxEntry = {
      sequence: this.nextSequence++,
      event: deepCopy(event),
      status: 'pending',
      attempts: 0,
      enqueuedAt: now(),
    };
    this.entries.push(entry);
    return deepCopy(entry);
  }

  async listPending(options?: ListOptions): Promise<OutboxEntry[]> {
    const items = this.entries.filter((e) => e.status === 'pending');
    return applyListOptions(items.map(deepCopy), options);
  }

  async listByTenant(tenantId: string, options?: ListOptions): Promise<OutboxEntry[]> {
    const items = this.entries.filter((e) => e.event.tenantId === tenantId);
    return applyListOptions(items.map(deepCopy), options);
  }

  async markDelivered(sequence: number): Promise<void> {
    const entry = this.entries.find((e) => e.sequence === sequence);
    if (!entry) return;
    entry.status = 'delivered';
    entry.attempts += 1;
    entry.deliveredAt = now();
    entry.lastError = undefined;
  }

  async markFailed(sequence: number, error: string): Promise<void> {
    const entry = this.entries.find((e) => e.sequence === sequence);
    if (!entry) return;
    entry.attempts += 1;
    entry.lastError = error;
  }

  /** Drop an entry that has not been delivered yet. */
  discard(sequence: number): void {
    this.entries = this.entries.filter((e) => e.sequence !== sequence || e.status !== 'pending');
  }
}

class MemoryStore implements Store {
  readonly rules: MemoryRuleStore;
  readonly deployments = new MemoryDeploymentStore();
  readonly policies = new MemoryPolicyStore();
  readonly models = new MemoryModelStore();
  readonly compliance = new MemoryComplianceStore();
  readonly audit = new MemoryAuditStore();
  readonly outbox = new MemoryOutboxStore();

  constructor(options?: MemoryStoreOptions) {
    this.rules = new MemoryRuleStore(options?.maxRulesPerTenant ?? DEFAULT_MAX_RULES_PER_TENANT);
  }

  async transaction<T>(work: (tx: Store) => Promise<T>): Promise<T> {
    const journal: Undo[] = [];
    try {
      return await work(this.journaled(journal));
    } catch (err) {
      for (const undo of journal.reverse()) undo();
      throw err;
    }
  }

  /** A view over the same records that logs an undo step for every write. */
  private journaled(journal: Undo[]): Store {
    const { rules, deployments, policies, models, compliance, audit, outbox } = this;
    const sameVersion = (version: number) => (current: { version: number }) => current.version === version;

    const tx: Store = {
      rules: {
        create: async (rule) => {
          const created = await rules.create(rule);
          journal.push(() => rules.discard(created.id));
          return created;
        },
        getById: (id, tenantId) => rules.getById(id, tenantId),
        listActive: (tenantId, jurisdiction) => rules.listActive(tenantId, jurisdiction),
        listByTenant: (tenantId, options) => rules.listByTenant(tenantId, options),
        setActive: async (id, tenantId, active, expectedVersion) => {
          const before = rules.peek(id);
          const updated = await rules.setActive(id, tenantId, active, expectedVersion);
          if (before && updated) journal.push(() => rules.restore(before, sameVersion(updated.version)));
          return updated;
        },
      },
      deployments: {
        create: async (deployment) => {
          const created = await deployments.create(deployment);
          journal.push(() => deployments.discard(created.id));
          return created;
        },
        getById: (id, tenantId) => deployments.getById(id, tenantId),
        listByTenant: (tenantId, options) => deployments.listByTenant(tenantId, options),
        update: async (id, tenantId, updates, expectedVersion) => {
          const before = deployments.peek(id);
          const updated = await deployments.update(id, tenantId, updates, expectedVersion);
          if (before && updated) journal.push(() => deployments.restore(before, sameVersion(updated.version)));
          return updated;
        },
      },
      policies: {
        create: async (policy) => {
          const created = await policies.create(policy);
          journal.push(() => policies.discard(created.id));
          return created;
        },
        getById: (id, tenantId) => policies.getById(id, tenantId),
        listByTenant: (tenantId, options) => policies.listByTenant(tenantId, options),
      },
      models: {
        create: async (model) => {
          const created = await models.create(model);
          journal.push(() => models.discard(created.id));
          return created;
        },
        get: (tenantId, modelRef, jurisdiction) => models.get(tenantId, modelRef, jurisdiction),
        listByTenant: (tenantId, options) => models.listByTenant(tenantId, options),
        update: async (id, tenantId, updates, expectedVersion) => {
          const before = models.peek(id);
          const updated = await models.update(id, tenantId, updates, expectedVersion);
          if (before && updated) journal.push(() => models.restore(before, sameVersion(updated.version)));
          return updated;
        },
      },
      compliance: {
        create: async (map) => {
          const created = await compliance.create(map);
          journal.push(() => compliance.discard(created.id));
          return created;
        },
        getById: (id, tenantId) => compliance.getById(id, tenantId),
        listByJurisdiction: (tenantId, jurisdiction) => compliance.listByJurisdiction(tenantId, jurisdiction),
        update: async (id, tenantId, updates) => {
          const before = compliance.peek(id);
          const updated = await compliance.update(id, tenantId, updates);
          if (before && updated) {
            journal.push(() =>
              compliance.restore(
                before,
                (current) => current.status === updated.status && current.lastVerifiedAt === updated.lastVerifiedAt,
              ),
            );
          }
          return updated;
        },
      },
      audit: {
        create: async (record) => {
          const created = await audit.create(record);
          journal.push(() => audit.discard(created.id));
          return created;
        },
        listByTenant: (tenantId, options) => audit.listByTenant(tenantId, options),
      },
      outbox: {
        enqueue: async (event) => {
          const entry = await outbox.enqueue(event);
          journal.push(() => outbox.discard(entry.sequence));
          return entry;
        },
        listPending: (options) => outbox.listPending(options),
        listByTenant: (tenantId, options) => outbox.listByTenant(tenantId, options),
        markDelivered: (sequence) => outbox.markDelivered(sequence),
        markFailed: (sequence, error) => outbox.markFailed(sequence, error),
      },
      transaction: <T>(work: (inner: Store) => Promise<T>) => work(tx),
    };
    return tx;
  }
}

/** Create a new in-memory store instance. */
export function createMemoryStore(options?: MemoryStoreOptions): Store {
  return new MemoryStore(options);
}
