/**
 * Sovereign model approval registry.
 *
 * Answers whether a model may be routed to in a jurisdiction and applies
 * approval transitions through the central state machine. Lookups fail
 * closed: a missing registration is never treated as approved.
 */

import { ModelApprovalStatus, SovereignModel } from '../domain/sovereign-model';
import { Jurisdiction } from '../domain/jurisdiction';
import { NotFoundError, toSovereigntyError } from '../domain/errors';
import { ModelStore } from '../storage/store';
import { assertApprovalTransition } from './state-machine';
import { withConflictRetry } from './conflict-retry';
import { logger } from '../logger';

const log = logger.child({ component: 'approval-registry' });

export interface ApprovalRegistryOptions {
  conflictRetryAttempts?: number;
  conflictRetryBaseMs?: number;
}

export class ApprovalRegistry {
  private maxAttempts: number;
  private baseDelayMs: number;

  constructor(
    private models: ModelStore,
    options: ApprovalRegistryOptions = {},
  ) {
    this.maxAttempts = options.conflictRetryAttempts ?? 3;
    this.baseDelayMs = options.conflictRetryBaseMs ?? 10;
  }

  /** The same registry over another model store, such as a transaction's. */
  within(models: ModelStore): ApprovalRegistry {
    return new ApprovalRegistry(models, {
      conflictRetryAttempts: this.maxAttempts,
      conflictRetryBaseMs: this.baseDelayMs,
    });
  }

  /** True iff the registration exists and is exactly approved. */
  async isUsable(tenantId: string, modelRef: string, jurisdiction: Jurisdiction): Promise<boolean> {
    const model = await this.get(tenantId, modelRef, jurisdiction);
    return model?.status === ModelApprovalStatus.Approved;
  }

  async get(tenantId: string, modelRef: string, jurisdiction: Jurisdiction): Promise<SovereignModel | null> {
    try {
      return await this.models.get(tenantId, modelRef, jurisdiction);
    } catch (err) {
      throw toSovereigntyError(err, 'approval-repository');
    }
  }

  /**
   * Move a registration to `toStatus`. Illegal transitions throw
   * InvalidStateTransitionError with state unchanged; a concurrent update
   * causes a fresh read and a new legality check.
   */
  async transition(
    tenantId: string,
    modelRef: string,
    jurisdiction: Jurisdiction,
    toStatus: ModelApprovalStatus,
    actor?: string,
  ): Promise<SovereignModel> {
    return withConflictRetry(
      async () => {
        const current = await this.get(tenantId, modelRef, jurisdiction);
        if (!current) {
          throw new NotFoundError('SovereignModel', `${modelRef}@${jurisdiction}`);
        }

        assertApprovalTransition(current.status, toStatus);

        const updates: Partial<Pick<SovereignModel, 'status' | 'approvedBy' | 'approvedAt'>> = { status: toStatus };
        if (toStatus === ModelApprovalStatus.Approved) {
          updates.approvedBy = actor;
          updates.approvedAt = new Date().toISOString();
        }

        let updated: SovereignModel | null;
        try {
          updated = await this.models.update(current.id, tenantId, updates, current.version);
        } catch (err) {
          throw toSovereigntyError(err, 'approval-repository');
        }
        if (!updated) {
          throw new NotFoundError('SovereignModel', `${modelRef}@${jurisdiction}`);
        }

        log.info('Model approval transitioned', {
          tenantId,
          modelRef,
          jurisdiction,
          from: current.status,
          to: toStatus,
          actor,
        });
        return updated;
      },
      {
        maxAttempts: this.maxAttempts,
        baseDelayMs: this.baseDelayMs,
        operation: 'approval.transition',
        logger: log,
      },
    );
  }
}
