/**
 * Routing Service.
 *
 * Owns routing policy administration and the audited routing entry point:
 * select the governing policy for a jurisdiction, resolve it against the
 * current health and approval picture, record the decision.
 */

import { v4 as uuid } from 'uuid';
import { RegionalDeployment } from '../domain/deployment';
import { Jurisdiction, isJurisdiction, isOpaqueRef } from '../domain/jurisdiction';
import { ConfigurationError, NotFoundError, ValidationError, toSovereigntyError } from '../domain/errors';
import { CreateRoutingPolicyInput, RoutingDecision, RoutingPolicy, RoutingStrategy } from '../domain/routing';
import { Store } from '../storage/store';
import { RoutingResolver } from '../engine/routing-resolver';
import { DecisionAuditor } from '../audit/decision-auditor';
import { logger } from '../logger';

const log = logger.child({ component: 'routing-service' });

const STRATEGIES = new Set<string>(Object.values(RoutingStrategy));

export const DEFAULT_POLICY_PRIORITY = 100;

export interface RoutingOutcome {
  decision: RoutingDecision;
  policyId: string;
  auditId: string;
  /** The selected deployment, when there is one. */
  deployment: RegionalDeployment | null;
}

/** Order policies so the governing one comes first: priority, then id. */
export function comparePolicies(a: RoutingPolicy, b: RoutingPolicy): number {
  if (a.priority !== b.priority) return a.priority - b.priority;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

export class RoutingService {
  constructor(
    private store: Store,
    private resolver: RoutingResolver,
    private auditor: DecisionAuditor,
  ) {}

  async createPolicy(input: CreateRoutingPolicyInput): Promise<RoutingPolicy> {
    if (!input.name) {
      throw new ValidationError('name is required', { field: 'name' });
    }
    if (!isJurisdiction(input.jurisdiction)) {
      throw new ValidationError(`Invalid jurisdiction: ${String(input.jurisdiction)}`, { field: 'jurisdiction' });
    }
    if (!STRATEGIES.has(input.strategy)) {
      throw new ValidationError(`Invalid strategy: ${String(input.strategy)}`, { field: 'strategy' });
    }
    if (!input.primaryDeploymentId) {
      throw new ValidationError('primaryDeploymentId is required', { field: 'primaryDeploymentId' });
    }

    const fallbacks = input.fallbackDeploymentIds ?? [];
    if (input.strategy === RoutingStrategy.Strict && fallbacks.length > 0) {
      throw new ConfigurationError('Strict routing policies cannot declare fallbacks', 'STRICT_WITH_FALLBACKS', {
        fallbackDeploymentIds: fallbacks,
      });
    }
    if (new Set([input.primaryDeploymentId, ...fallbacks]).size !== fallbacks.length + 1) {
      throw new ConfigurationError('Routing policy lists a deployment more than once', 'DUPLICATE_DEPLOYMENT');
    }

    await this.requireDeployment(input.tenantId, input.jurisdiction, input.primaryDeploymentId, 'Primary');
    for (const fallbackId of fallbacks) {
      await this.requireDeployment(input.tenantId, input.jurisdiction, fallbackId, 'Fallback');
    }

    const policy: RoutingPolicy = {
      id: `pol_${uuid()}`,
      tenantId: input.tenantId,
      name: input.name,
      jurisdiction: input.jurisdiction,
      strategy: input.strategy,
      primaryDeploymentId: input.primaryDeploymentId,
      fallbackDeploymentIds: [...fallbacks],
      priority: input.priority ?? DEFAULT_POLICY_PRIORITY,
      active: true,
      createdAt: new Date().toISOString(),
    };

    let created: RoutingPolicy;
    try {
      created = await this.store.policies.create(policy);
    } catch (err) {
      throw toSovereigntyError(err, 'policy-repository');
    }

    log.info('Routing policy created', {
      tenantId: created.tenantId,
      policyId: created.id,
      jurisdiction: created.jurisdiction,
      strategy: created.strategy,
    });
    return created;
  }

  /** A policy may only name deployments of its own tenant and jurisdiction. */
  private async requireDeployment(
    tenantId: string,
    jurisdiction: Jurisdiction,
    deploymentId: string,
    role: 'Primary' | 'Fallback',
  ): Promise<void> {
    let deployment: RegionalDeployment | null;
    try {
      deployment = await this.store.deployments.getById(deploymentId, tenantId);
    } catch (err) {
      throw toSovereigntyError(err, 'deployment-repository');
    }
    if (!deployment) {
      throw new ConfigurationError(`${role} deployment ${deploymentId} does not exist`, 'UNKNOWN_DEPLOYMENT', {
        deploymentId,
      });
    }
    if (deployment.jurisdiction !== jurisdiction) {
      throw new ConfigurationError(
        `${role} deployment ${deployment.id} serves ${deployment.jurisdiction}, not ${jurisdiction}`,
        'JURISDICTION_MISMATCH',
        { deploymentId: deployment.id },
      );
    }
  }

  async listPolicies(tenantId: string, jurisdiction?: Jurisdiction): Promise<RoutingPolicy[]> {
    return this.store.policies.listByTenant(tenantId, { jurisdiction, limit: Number.MAX_SAFE_INTEGER });
  }

  /** The active policy governing a jurisdiction. */
  async selectPolicy(tenantId: string, jurisdiction: Jurisdiction): Promise<RoutingPolicy> {
    const policies = (await this.listPolicies(tenantId, jurisdiction)).filter((p) => p.active);
    const [governing] = policies.sort(comparePolicies);
    if (!governing) {
      throw new NotFoundError('RoutingPolicy', `jurisdiction=${jurisdiction}`);
    }
    return governing;
  }

  /** Resolve and audit a routing decision for a model in a jurisdiction. */
  async route(
    tenantId: string,
    jurisdiction: Jurisdiction,
    modelRef: string,
    correlationId?: string,
  ): Promise<RoutingOutcome> {
    if (!isJurisdiction(jurisdiction)) {
      throw new ValidationError(`Invalid jurisdiction: ${String(jurisdiction)}`, { field: 'jurisdiction' });
    }
    if (!isOpaqueRef(modelRef)) {
      throw new ValidationError('modelRef must be a non-empty opaque reference', { field: 'modelRef' });
    }

    const policy = await this.selectPolicy(tenantId, jurisdiction);
    const decision = await this.resolver.route(jurisdiction, policy, modelRef);
    const record = await this.auditor.recordRouting(
      { tenantId, jurisdiction, correlationId, attributes: { policyId: policy.id, modelRef } },
      decision,
    );

    const deployment = decision.selectedDeploymentId
      ? await this.store.deployments.getById(decision.selectedDeploymentId, tenantId)
      : null;

    if (!decision.selectedDeploymentId) {
      log.warn('No compliant deployment', { tenantId, jurisdiction, policyId: policy.id, modelRef });
    }

    return { decision, policyId: policy.id, auditId: record.id, deployment };
  }
}
