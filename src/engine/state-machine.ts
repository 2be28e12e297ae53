/**
 * Deployment and approval state machines.
 *
 * Both lifecycles are checked against their transition tables here and
 * nowhere else, so invariants such as "revoked is reachable only from
 * approved" hold at every call site.
 */

import { DeploymentStatus, VALID_DEPLOYMENT_TRANSITIONS } from '../domain/deployment';
import { ModelApprovalStatus, VALID_APPROVAL_TRANSITIONS } from '../domain/sovereign-model';
import { InvalidStateTransitionError } from '../domain/errors';

function assertTransition<S extends string>(entity: string, table: Record<S, S[]>, current: S, target: S): void {
  const validTargets = table[current];
  if (!validTargets.includes(target)) {
    throw new InvalidStateTransitionError(entity, current, target, validTargets);
  }
}

/** Used by the deployment service. */
export function assertDeploymentTransition(current: DeploymentStatus, target: DeploymentStatus): void {
  assertTransition('deployment', VALID_DEPLOYMENT_TRANSITIONS, current, target);
}

/** Used by the approval registry. */
export function assertApprovalTransition(current: ModelApprovalStatus, target: ModelApprovalStatus): void {
  assertTransition('model approval', VALID_APPROVAL_TRANSITIONS, current, target);
}

export function isTerminalDeploymentStatus(status: DeploymentStatus): boolean {
  return VALID_DEPLOYMENT_TRANSITIONS[status].length === 0;
}
