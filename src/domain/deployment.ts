/**
 * Regional deployment domain model.
 *
 * A regional deployment is the model-serving stack for one jurisdiction in
 * one cloud region. The core only tracks its lifecycle status; cluster
 * orchestration lives elsewhere.
 */

import { Jurisdiction } from './jurisdiction';

/** Deployment lifecycle states. */
export enum DeploymentStatus {
  Provisioning = 'provisioning',
  Active = 'active',
  Degraded = 'degraded',
  Terminating = 'terminating',
  Terminated = 'terminated',
}

/** Valid state transitions for deployments. */
export const VALID_DEPLOYMENT_TRANSITIONS: Record<DeploymentStatus, DeploymentStatus[]> = {
  [DeploymentStatus.Provisioning]: [DeploymentStatus.Active, DeploymentStatus.Terminating],
  [DeploymentStatus.Active]: [DeploymentStatus.Degraded, DeploymentStatus.Terminating],
  [DeploymentStatus.Degraded]: [DeploymentStatus.Active, DeploymentStatus.Terminating],
  [DeploymentStatus.Terminating]: [DeploymentStatus.Terminated],
  [DeploymentStatus.Terminated]: [],
};

export interface RegionalDeployment {
  id: string;
  tenantId: string;
  jurisdiction: Jurisdiction;
  /** Cloud region identifier (e.g. eu-central-1). */
  region: string;
  namespace: string;
  clusterName: string;
  /** Service endpoint once the deployment is active. */
  endpointUrl?: string;
  status: DeploymentStatus;
  healthCheckedAt?: string;
  createdAt: string;
  updatedAt: string;
  version: number;
}

/** Input for initiating a deployment. */
export interface CreateDeploymentInput {
  tenantId: string;
  jurisdiction: Jurisdiction;
  region: string;
  namespace?: string;
  clusterName: string;
}
