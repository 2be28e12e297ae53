/**
 * Deployment Service.
 *
 * Records regional deployment initiation and drives the deployment
 * lifecycle. Cluster orchestration happens outside the core: this service
 * only tracks status, and every status change goes through the central
 * transition table.
 */

import { v4 as uuid } from 'uuid';
import { CreateDeploymentInput, DeploymentStatus, RegionalDeployment } from '../domain/deployment';
import { Jurisdiction, isJurisdiction } from '../domain/jurisdiction';
import { ConfigurationError, NotFoundError, ValidationError, toSovereigntyError } from '../domain/errors';
import { EventTopics } from '../domain/events';
import { Store } from '../storage/store';
import { assertDeploymentTransition } from '../engine/state-machine';
import { withConflictRetry } from '../engine/conflict-retry';
import { EventPublisher } from '../data-plane/publisher';
import { logger } from '../logger';

const log = logger.child({ component: 'deployment-service' });

/** Prefix for generated deployment namespaces. */
export const NAMESPACE_PREFIX = 'sovereign';

export interface DeploymentServiceOptions {
  /** Regions deployments may target. Empty accepts any region. */
  supportedRegions?: string[];
  conflictRetryAttempts?: number;
  conflictRetryBaseMs?: number;
}

export interface TransitionOptions {
  endpointUrl?: string;
}

type DeploymentUpdates = Partial<Pick<RegionalDeployment, 'status' | 'endpointUrl' | 'healthCheckedAt'>>;

/** Status a health check moves a deployment to, if any. */
function healthTarget(status: DeploymentStatus, healthy: boolean): DeploymentStatus | undefined {
  if (healthy && (status === DeploymentStatus.Provisioning || status === DeploymentStatus.Degraded)) {
    return DeploymentStatus.Active;
  }
  if (!healthy && status === DeploymentStatus.Active) return DeploymentStatus.Degraded;
  return undefined;
}

/** Default namespace for a jurisdiction/region pair. */
export function defaultNamespace(jurisdiction: Jurisdiction, region: string): string {
  return `${NAMESPACE_PREFIX}-${jurisdiction.toLowerCase()}-${region.toLowerCase()}`;
}

export class DeploymentService {
  private supportedRegions: string[];
  private maxAttempts: number;
  private baseDelayMs: number;

  constructor(
    private store: Store,
    private publisher: EventPublisher,
    options: DeploymentServiceOptions = {},
  ) {
    this.supportedRegions = options.supportedRegions ?? [];
    this.maxAttempts = options.conflictRetryAttempts ?? 3;
    this.baseDelayMs = options.conflictRetryBaseMs ?? 10;
  }

  /** Record a new deployment in `provisioning`. */
  async deploy(input: CreateDeploymentInput): Promise<RegionalDeployment> {
    if (!isJurisdiction(input.jurisdiction)) {
      throw new ValidationError(`Invalid jurisdiction: ${String(input.jurisdiction)}`, { field: 'jurisdiction' });
    }
    if (!input.region) {
      throw new ValidationError('region is required', { field: 'region' });
    }
    if (!input.clusterName) {
      throw new ValidationError('clusterName is required', { field: 'clusterName' });
    }
    if (this.supportedRegions.length > 0 && !this.supportedRegions.includes(input.region)) {
      throw new ConfigurationError(`Region ${input.region} is not supported`, 'UNSUPPORTED_REGION', {
        region: input.region,
        supportedRegions: this.supportedRegions,
      });
    }

    const now = new Date().toISOString();
    const deployment: RegionalDeployment = {
      id: `dep_${uuid()}`,
      tenantId: input.tenantId,
      jurisdiction: input.jurisdiction,
      region: input.region,
      namespace: input.namespace ?? defaultNamespace(input.jurisdiction, input.region),
      clusterName: input.clusterName,
      status: DeploymentStatus.Provisioning,
      createdAt: now,
      updatedAt: now,
      version: 1,
    };

    const created = await this.store.transaction(async (tx) => {
      let stored: RegionalDeployment;
      try {
        stored = await tx.deployments.create(deployment);
      } catch (err) {
        throw toSovereigntyError(err, 'deployment-repository');
      }
      await this.publisher
        .within(tx.outbox)
        .publish(EventTopics.Deployment, 'deployment.initiated', stored.tenantId, stored.id, {
          deploymentId: stored.id,
          jurisdiction: stored.jurisdiction,
          region: stored.region,
          namespace: stored.namespace,
          clusterName: stored.clusterName,
        });
      return stored;
    });

    log.info('Deployment initiated', {
      tenantId: created.tenantId,
      deploymentId: created.id,
      jurisdiction: created.jurisdiction,
      region: created.region,
    });
    return created;
  }

  async get(tenantId: string, deploymentId: string): Promise<RegionalDeployment> {
    let deployment: RegionalDeployment | null;
    try {
      deployment = await this.store.deployments.getById(deploymentId, tenantId);
    } catch (err) {
      throw toSovereigntyError(err, 'deployment-repository');
    }
    if (!deployment) throw new NotFoundError('RegionalDeployment', deploymentId);
    return deployment;
  }

  async list(
    tenantId: string,
    options?: { jurisdiction?: Jurisdiction; limit?: number; offset?: number },
  ): Promise<RegionalDeployment[]> {
    return this.store.deployments.listByTenant(tenantId, options);
  }

  /**
   * Move a deployment to `target`. Illegal transitions throw
   * InvalidStateTransitionError and leave the deployment unchanged.
   */
  async transition(
    tenantId: string,
    deploymentId: string,
    target: DeploymentStatus,
    options: TransitionOptions = {},
  ): Promise<RegionalDeployment> {
    return this.apply(tenantId, deploymentId, 'deployment.transition', (current) => {
      assertDeploymentTransition(current.status, target);
      const updates: DeploymentUpdates = { status: target };
      if (options.endpointUrl !== undefined) updates.endpointUrl = options.endpointUrl;
      return updates;
    });
  }

  /**
   * Apply a health check result. A healthy check activates a provisioning
   * or degraded deployment; an unhealthy one degrades an active deployment.
   * Other combinations only refresh `healthCheckedAt`.
   */
  async recordHealthCheck(tenantId: string, deploymentId: string, healthy: boolean): Promise<RegionalDeployment> {
    return this.apply(tenantId, deploymentId, 'deployment.health_check', (current) => {
      const updates: DeploymentUpdates = { healthCheckedAt: new Date().toISOString() };
      const target = healthTarget(current.status, healthy);
      if (target) {
        assertDeploymentTransition(current.status, target);
        updates.status = target;
      }
      return updates;
    });
  }

  /**
   * Read, plan and write under conflict retry, so `plan` always sees the
   * latest state. Becoming active publishes `deployment.active` in the same
   * unit of work as the status change.
   */
  private async apply(
    tenantId: string,
    deploymentId: string,
    operation: string,
    plan: (current: RegionalDeployment) => DeploymentUpdates,
  ): Promise<RegionalDeployment> {
    return this.store.transaction(async (tx) => {
      const { from, updated } = await withConflictRetry(
        async () => {
          const current = await this.get(tenantId, deploymentId);
          const updates = plan(current);

          let result: RegionalDeployment | null;
          try {
            result = await tx.deployments.update(deploymentId, tenantId, updates, current.version);
          } catch (err) {
            throw toSovereigntyError(err, 'deployment-repository');
          }
          if (!result) throw new NotFoundError('RegionalDeployment', deploymentId);
          return { from: current.status, updated: result };
        },
        { maxAttempts: this.maxAttempts, baseDelayMs: this.baseDelayMs, operation, logger: log },
      );

      if (updated.status === from) return updated;
      log.info('Deployment transitioned', { tenantId, deploymentId, from, to: updated.status });

      if (updated.status === DeploymentStatus.Active) {
        await this.publisher
          .within(tx.outbox)
          .publish(EventTopics.Deployment, 'deployment.active', tenantId, deploymentId, {
            deploymentId,
            jurisdiction: updated.jurisdiction,
            region: updated.region,
            endpointUrl: updated.endpointUrl,
            previousStatus: from,
          });
      }
      return updated;
    });
  }
}
