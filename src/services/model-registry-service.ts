/**
 * Model Registry Service.
 *
 * Registers models per jurisdiction and moves them through the approval
 * lifecycle. Approval state itself is owned by the ApprovalRegistry.
 */

import { v4 as uuid } from 'uuid';
import { ModelApprovalStatus, RegisterModelInput, SovereignModel } from '../domain/sovereign-model';
import { Jurisdiction, isJurisdiction, isOpaqueRef } from '../domain/jurisdiction';
import { ValidationError, toSovereigntyError } from '../domain/errors';
import { EventTopics } from '../domain/events';
import { Store } from '../storage/store';
import { ApprovalRegistry } from '../engine/approval-registry';
import { EventPublisher } from '../data-plane/publisher';
import { logger } from '../logger';

const log = logger.child({ component: 'model-registry' });

export const DEFAULT_MODEL_VERSION = 'latest';

export class ModelRegistryService {
  constructor(
    private store: Store,
    private registry: ApprovalRegistry,
    private publisher: EventPublisher,
  ) {}

  /** Register a model for a jurisdiction in `pending`. */
  async register(input: RegisterModelInput): Promise<SovereignModel> {
    if (!isOpaqueRef(input.modelRef)) {
      throw new ValidationError('modelRef must be a non-empty opaque reference', { field: 'modelRef' });
    }
    if (!input.modelName) {
      throw new ValidationError('modelName is required', { field: 'modelName' });
    }
    if (!isJurisdiction(input.jurisdiction)) {
      throw new ValidationError(`Invalid jurisdiction: ${String(input.jurisdiction)}`, { field: 'jurisdiction' });
    }

    const existing = await this.registry.get(input.tenantId, input.modelRef, input.jurisdiction);
    if (existing) {
      throw new ValidationError(`Model ${input.modelRef} is already registered in ${input.jurisdiction}`, {
        modelRef: input.modelRef,
        jurisdiction: input.jurisdiction,
        status: existing.status,
      });
    }

    const now = new Date().toISOString();
    const model: SovereignModel = {
      id: `smod_${uuid()}`,
      tenantId: input.tenantId,
      modelRef: input.modelRef,
      modelName: input.modelName,
      modelVersion: input.modelVersion ?? DEFAULT_MODEL_VERSION,
      jurisdiction: input.jurisdiction,
      status: ModelApprovalStatus.Pending,
      createdAt: now,
      updatedAt: now,
      version: 1,
    };

    // Uniqueness is enforced by the store; the lookup above adds the current status to the error.
    const created = await this.store.transaction(async (tx) => {
      let stored: SovereignModel;
      try {
        stored = await tx.models.create(model);
      } catch (err) {
        throw toSovereigntyError(err, 'approval-repository');
      }
      await this.publisher
        .within(tx.outbox)
        .publish(EventTopics.Registry, 'model.registered', stored.tenantId, stored.modelRef, {
          modelId: stored.id,
          modelRef: stored.modelRef,
          modelName: stored.modelName,
          modelVersion: stored.modelVersion,
          jurisdiction: stored.jurisdiction,
        });
      return stored;
    });

    log.info('Model registered', {
      tenantId: created.tenantId,
      modelRef: created.modelRef,
      jurisdiction: created.jurisdiction,
    });
    return created;
  }

  async approve(tenantId: string, modelRef: string, jurisdiction: Jurisdiction, approvedBy?: string): Promise<SovereignModel> {
    return this.store.transaction(async (tx) => {
      const model = await this.registry
        .within(tx.models)
        .transition(tenantId, modelRef, jurisdiction, ModelApprovalStatus.Approved, approvedBy);
      await this.publisher.within(tx.outbox).publish(EventTopics.Registry, 'model.approved', tenantId, modelRef, {
        modelId: model.id,
        modelRef,
        jurisdiction,
        approvedBy: model.approvedBy,
        approvedAt: model.approvedAt,
      });
      return model;
    });
  }

  async reject(tenantId: string, modelRef: string, jurisdiction: Jurisdiction, actor?: string): Promise<SovereignModel> {
    return this.registry.transition(tenantId, modelRef, jurisdiction, ModelApprovalStatus.Rejected, actor);
  }

  async revoke(tenantId: string, modelRef: string, jurisdiction: Jurisdiction, actor?: string): Promise<SovereignModel> {
    return this.registry.transition(tenantId, modelRef, jurisdiction, ModelApprovalStatus.Revoked, actor);
  }

  /** Dispatch to the operation for a target status. */
  async transition(
    tenantId: string,
    modelRef: string,
    jurisdiction: Jurisdiction,
    target: ModelApprovalStatus,
    actor?: string,
  ): Promise<SovereignModel> {
    switch (target) {
      case ModelApprovalStatus.Approved:
        return this.approve(tenantId, modelRef, jurisdiction, actor);
      case ModelApprovalStatus.Rejected:
        return this.reject(tenantId, modelRef, jurisdiction, actor);
      case ModelApprovalStatus.Revoked:
        return this.revoke(tenantId, modelRef, jurisdiction, actor);
      case ModelApprovalStatus.Pending:
        return this.registry.transition(tenantId, modelRef, jurisdiction, target, actor);
    }
  }

  async list(tenantId: string, jurisdiction?: Jurisdiction): Promise<SovereignModel[]> {
    return this.store.models.listByTenant(tenantId, { jurisdiction, limit: Number.MAX_SAFE_INTEGER });
  }
}
