/**
 * Compliance Service.
 *
 * Jurisdiction-to-regulation mappings, read through a TTL cache keyed by
 * tenant and jurisdiction. Writes through this service invalidate the
 * affected key.
 */

import { v4 as uuid } from 'uuid';
import { ComplianceMap, ComplianceStatus, CreateComplianceMapInput } from '../domain/compliance';
import { Jurisdiction, isJurisdiction } from '../domain/jurisdiction';
import { NotFoundError, ValidationError, toSovereigntyError } from '../domain/errors';
import { EventTopics } from '../domain/events';
import { Store } from '../storage/store';
import { EventPublisher } from '../data-plane/publisher';
import { NowFn, TtlCache } from '../cache/ttl-cache';
import { logger } from '../logger';

const log = logger.child({ component: 'compliance-service' });

const STATUSES = new Set<string>(Object.values(ComplianceStatus));

export interface ComplianceServiceOptions {
  cacheTtlSeconds?: number;
  now?: NowFn;
}

function cacheKey(tenantId: string, jurisdiction: Jurisdiction): string {
  return `${tenantId}\u0000${jurisdiction}`;
}

export class ComplianceService {
  private cache: TtlCache<ComplianceMap[]>;

  constructor(
    private store: Store,
    private publisher: EventPublisher,
    options: ComplianceServiceOptions = {},
  ) {
    this.cache = new TtlCache<ComplianceMap[]>((options.cacheTtlSeconds ?? 3600) * 1000, options.now);
  }

  async createMapping(input: CreateComplianceMapInput): Promise<ComplianceMap> {
    if (!isJurisdiction(input.jurisdiction)) {
      throw new ValidationError(`Invalid jurisdiction: ${String(input.jurisdiction)}`, { field: 'jurisdiction' });
    }
    if (!input.regulationName) {
      throw new ValidationError('regulationName is required', { field: 'regulationName' });
    }

    const map: ComplianceMap = {
      id: `cmap_${uuid()}`,
      tenantId: input.tenantId,
      jurisdiction: input.jurisdiction,
      regulationName: input.regulationName,
      regulationReference: input.regulationReference,
      requirementCategories: [...(input.requirementCategories ?? [])],
      deploymentConfig: { ...input.deploymentConfig },
      status: ComplianceStatus.PendingReview,
      createdAt: new Date().toISOString(),
    };

    const created = await this.store.transaction(async (tx) => {
      let stored: ComplianceMap;
      try {
        stored = await tx.compliance.create(map);
      } catch (err) {
        throw toSovereigntyError(err, 'compliance-repository');
      }
      await this.publisher
        .within(tx.outbox)
        .publish(EventTopics.Compliance, 'compliance.mapping_created', stored.tenantId, stored.jurisdiction, {
          mappingId: stored.id,
          jurisdiction: stored.jurisdiction,
          regulationName: stored.regulationName,
          requirementCategories: stored.requirementCategories,
        });
      return stored;
    });
    this.cache.delete(cacheKey(created.tenantId, created.jurisdiction));

    log.info('Compliance mapping created', {
      tenantId: created.tenantId,
      mappingId: created.id,
      jurisdiction: created.jurisdiction,
      regulationName: created.regulationName,
    });
    return created;
  }

  /** Mappings for a jurisdiction, served from cache within the TTL. */
  async getMappings(tenantId: string, jurisdiction: Jurisdiction): Promise<ComplianceMap[]> {
    if (!isJurisdiction(jurisdiction)) {
      throw new ValidationError(`Invalid jurisdiction: ${String(jurisdiction)}`, { field: 'jurisdiction' });
    }
    const maps = await this.cache.getOrLoad(cacheKey(tenantId, jurisdiction), async () => {
      try {
        return await this.store.compliance.listByJurisdiction(tenantId, jurisdiction);
      } catch (err) {
        throw toSovereigntyError(err, 'compliance-repository');
      }
    });
    return maps.map((m) => ({ ...m }));
  }

  /** Record a verification outcome for a mapping. */
  async verify(
    tenantId: string,
    mappingId: string,
    status: ComplianceStatus,
    verifiedBy?: string,
  ): Promise<ComplianceMap> {
    if (!STATUSES.has(status)) {
      throw new ValidationError(`Invalid compliance status: ${String(status)}`, { field: 'status' });
    }

    let updated: ComplianceMap | null;
    try {
      updated = await this.store.compliance.update(mappingId, tenantId, {
        status,
        verifiedBy,
        lastVerifiedAt: new Date().toISOString(),
      });
    } catch (err) {
      throw toSovereigntyError(err, 'compliance-repository');
    }
    if (!updated) throw new NotFoundError('ComplianceMap', mappingId);

    this.cache.delete(cacheKey(tenantId, updated.jurisdiction));
    log.info('Compliance mapping verified', { tenantId, mappingId, status, verifiedBy });
    return updated;
  }
}
