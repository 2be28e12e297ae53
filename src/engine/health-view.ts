/**
 * Deployment health read model consumed by the routing resolver.
 *
 * Candidates come back in no guaranteed order; the resolver treats only
 * `active` as eligible and breaks ties by the policy's declared fallback
 * order, never by health-check freshness.
 */

import { DeploymentStatus, RegionalDeployment } from '../domain/deployment';
import { Jurisdiction } from '../domain/jurisdiction';
import { toSovereigntyError } from '../domain/errors';
import { DeploymentStore } from '../storage/store';
import { isTerminalDeploymentStatus } from './state-machine';

export interface DeploymentHealthView {
  /** Non-terminal deployments serving the jurisdiction. */
  listCandidates(tenantId: string, jurisdiction: Jurisdiction): Promise<RegionalDeployment[]>;
  get(tenantId: string, deploymentId: string): Promise<RegionalDeployment | null>;
}

/** Health view backed by the deployment store. */
export class StoreDeploymentHealthView implements DeploymentHealthView {
  constructor(private deployments: DeploymentStore) {}

  async listCandidates(tenantId: string, jurisdiction: Jurisdiction): Promise<RegionalDeployment[]> {
    try {
      const all = await this.deployments.listByTenant(tenantId, { jurisdiction, limit: Number.MAX_SAFE_INTEGER });
      return all.filter((d) => !isTerminalDeploymentStatus(d.status));
    } catch (err) {
      throw toSovereigntyError(err, 'deployment-health-view');
    }
  }

  async get(tenantId: string, deploymentId: string): Promise<RegionalDeployment | null> {
    try {
      return await this.deployments.getById(deploymentId, tenantId);
    } catch (err) {
      throw toSovereigntyError(err, 'deployment-health-view');
    }
  }
}

/**
 * Fixed snapshot of deployments. Used to evaluate routing against a known
 * health picture (tests, dry runs, replay of an audited decision).
 */
export class StaticDeploymentHealthView implements DeploymentHealthView {
  private byId = new Map<string, RegionalDeployment>();

  constructor(deployments: RegionalDeployment[] = []) {
    for (const d of deployments) this.byId.set(d.id, d);
  }

  /** Replace or add a deployment in the snapshot. */
  set(deployment: RegionalDeployment): void {
    this.byId.set(deployment.id, deployment);
  }

  setStatus(deploymentId: string, status: DeploymentStatus): void {
    const existing = this.byId.get(deploymentId);
    if (existing) this.byId.set(deploymentId, { ...existing, status });
  }

  async listCandidates(tenantId: string, jurisdiction: Jurisdiction): Promise<RegionalDeployment[]> {
    return [...this.byId.values()].filter(
      (d) => d.tenantId === tenantId && d.jurisdiction === jurisdiction && !isTerminalDeploymentStatus(d.status),
    );
  }

  async get(tenantId: string, deploymentId: string): Promise<RegionalDeployment | null> {
    const d = this.byId.get(deploymentId);
    return d && d.tenantId === tenantId ? d : null;
  }
}
