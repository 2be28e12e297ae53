/**
 * Jurisdiction routing resolver.
 *
 * Turns a routing policy, a deployment health snapshot and an approval
 * snapshot into one routing decision:
 *
 *   1. primary, if active in the jurisdiction and the model is approved there
 *   2. strict: nothing else is tried
 *   3. preferred / fallback: declared fallbacks, in order
 *   4. nothing qualifies: selectedDeploymentId = null
 *
 * Given the same snapshots the result is always the same. The resolver
 * records nothing; auditing is the DecisionAuditor's job.
 */

import { DeploymentStatus, RegionalDeployment } from '../domain/deployment';
import { Jurisdiction } from '../domain/jurisdiction';
import {
  ROUTING_REASON_NO_COMPLIANT,
  ROUTING_REASON_PRIMARY,
  RoutingDecision,
  RoutingPolicy,
  allowsFallback,
  fallbackReason,
} from '../domain/routing';
import { ConfigurationError } from '../domain/errors';
import { ApprovalRegistry } from './approval-registry';
import { DeploymentHealthView } from './health-view';
import { logger } from '../logger';

const log = logger.child({ component: 'routing-resolver' });

export class RoutingResolver {
  constructor(
    private health: DeploymentHealthView,
    private approvals: ApprovalRegistry,
  ) {}

  async route(jurisdiction: Jurisdiction, policy: RoutingPolicy, modelRef: string): Promise<RoutingDecision> {
    if (policy.jurisdiction !== jurisdiction) {
      throw new ConfigurationError(
        `Routing policy ${policy.id} governs ${policy.jurisdiction}, not ${jurisdiction}`,
        'POLICY_JURISDICTION_MISMATCH',
        { policyId: policy.id, policyJurisdiction: policy.jurisdiction, jurisdiction },
      );
    }

    const tenantId = policy.tenantId;

    // One read of each collaborator: the decision is made against a single snapshot.
    const [candidates, modelApproved] = await Promise.all([
      this.health.listCandidates(tenantId, jurisdiction),
      this.approvals.isUsable(tenantId, modelRef, jurisdiction),
    ]);
    const snapshot = new Map(candidates.map((d) => [d.id, d] as const));

    const decision = resolve(jurisdiction, policy, snapshot, modelApproved);

    log.info('Routing resolved', {
      tenantId,
      jurisdiction,
      policyId: policy.id,
      modelRef,
      strategy: policy.strategy,
      selectedDeploymentId: decision.selectedDeploymentId,
      reason: decision.reason,
    });

    return decision;
  }
}

function isEligible(
  deployment: RegionalDeployment | undefined,
  jurisdiction: Jurisdiction,
  modelApproved: boolean,
): deployment is RegionalDeployment {
  return (
    deployment !== undefined &&
    deployment.status === DeploymentStatus.Active &&
    deployment.jurisdiction === jurisdiction &&
    modelApproved
  );
}

/** Pure decision over an already-fetched snapshot. */
export function resolve(
  jurisdiction: Jurisdiction,
  policy: RoutingPolicy,
  snapshot: ReadonlyMap<string, RegionalDeployment>,
  modelApproved: boolean,
): RoutingDecision {
  const base = { jurisdiction, strategyUsed: policy.strategy };

  if (isEligible(snapshot.get(policy.primaryDeploymentId), jurisdiction, modelApproved)) {
    return { ...base, selectedDeploymentId: policy.primaryDeploymentId, reason: ROUTING_REASON_PRIMARY };
  }

  if (allowsFallback(policy.strategy)) {
    const index = policy.fallbackDeploymentIds.findIndex((id) =>
      isEligible(snapshot.get(id), jurisdiction, modelApproved),
    );
    if (index >= 0) {
      return {
        ...base,
        selectedDeploymentId: policy.fallbackDeploymentIds[index],
        reason: fallbackReason(index),
      };
    }
  }

  return { ...base, selectedDeploymentId: null, reason: ROUTING_REASON_NO_COMPLIANT };
}
