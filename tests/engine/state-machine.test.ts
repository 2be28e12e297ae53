import {
  assertApprovalTransition,
  assertDeploymentTransition,
  isTerminalDeploymentStatus,
} from '../../src/engine/state-machine';
import { DeploymentStatus } from '../../src/domain/deployment';
import { ModelApprovalStatus } from '../../src/domain/sovereign-model';
import { InvalidStateTransitionError } from '../../src/domain/errors';

function caught(fn: () => void): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

describe('Deployment State Machine', () => {
  test('valid transition: provisioning -> active', () => {
    expect(() => assertDeploymentTransition(DeploymentStatus.Provisioning, DeploymentStatus.Active)).not.toThrow();
  });

  test('valid transition: active -> degraded -> active', () => {
    expect(() => assertDeploymentTransition(DeploymentStatus.Active, DeploymentStatus.Degraded)).not.toThrow();
    expect(() => assertDeploymentTransition(DeploymentStatus.Degraded, DeploymentStatus.Active)).not.toThrow();
  });

  test('valid transition: provisioning -> terminating', () => {
    expect(() => assertDeploymentTransition(DeploymentStatus.Provisioning, DeploymentStatus.Terminating)).not.toThrow();
  });

  test('valid transition: terminating -> terminated', () => {
    expect(() => assertDeploymentTransition(DeploymentStatus.Terminating, DeploymentStatus.Terminated)).not.toThrow();
  });

  test('invalid transition: terminated -> active', () => {
    const err = caught(() => assertDeploymentTransition(DeploymentStatus.Terminated, DeploymentStatus.Active));
    expect(err).toBeInstanceOf(InvalidStateTransitionError);
    if (!(err instanceof InvalidStateTransitionError)) return;
    expect(err.typedError.code).toBe('STATE.INVALID_TRANSITION');
    expect(err.typedError.details).toEqual({
      entity: 'deployment',
      from: 'terminated',
      to: 'active',
      validTargets: [],
    });
  });

  test('invalid transition: provisioning -> degraded', () => {
    expect(() => assertDeploymentTransition(DeploymentStatus.Provisioning, DeploymentStatus.Degraded)).toThrow(
      InvalidStateTransitionError,
    );
  });

  test('invalid transition: terminating -> active', () => {
    expect(() => assertDeploymentTransition(DeploymentStatus.Terminating, DeploymentStatus.Active)).toThrow(
      InvalidStateTransitionError,
    );
  });

  test('terminal status detection', () => {
    expect(isTerminalDeploymentStatus(DeploymentStatus.Terminated)).toBe(true);
    expect(isTerminalDeploymentStatus(DeploymentStatus.Terminating)).toBe(false);
    expect(isTerminalDeploymentStatus(DeploymentStatus.Degraded)).toBe(false);
  });
});

describe('Approval State Machine', () => {
  test('valid transitions from pending and approved', () => {
    expect(() => assertApprovalTransition(ModelApprovalStatus.Pending, ModelApprovalStatus.Approved)).not.toThrow();
    expect(() => assertApprovalTransition(ModelApprovalStatus.Pending, ModelApprovalStatus.Rejected)).not.toThrow();
    expect(() => assertApprovalTransition(ModelApprovalStatus.Approved, ModelApprovalStatus.Revoked)).not.toThrow();
  });

  test('invalid transition: pending -> revoked', () => {
    expect(() => assertApprovalTransition(ModelApprovalStatus.Pending, ModelApprovalStatus.Revoked)).toThrow(
      'Invalid model approval state transition: pending -> revoked',
    );
  });

  test('invalid transition: rejected -> revoked', () => {
    expect(() => assertApprovalTransition(ModelApprovalStatus.Rejected, ModelApprovalStatus.Revoked)).toThrow(
      InvalidStateTransitionError,
    );
  });

  test('invalid transition: revoked -> approved', () => {
    expect(() => assertApprovalTransition(ModelApprovalStatus.Revoked, ModelApprovalStatus.Approved)).toThrow(
      InvalidStateTransitionError,
    );
  });
});
