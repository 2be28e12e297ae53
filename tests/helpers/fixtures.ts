import { DataClassification } from '../../src/domain/jurisdiction';
import { ResidencyAction, ResidencyRule } from '../../src/domain/residency';
import { DeploymentStatus, RegionalDeployment } from '../../src/domain/deployment';
import { RoutingPolicy, RoutingStrategy } from '../../src/domain/routing';
import { ModelApprovalStatus, SovereignModel } from '../../src/domain/sovereign-model';
import { Clock } from '../../src/engine/rule-engine';

export const TENANT = 'tenant_a';
export const OTHER_TENANT = 'tenant_b';
export const MODEL_REF = 'model-registry:llm-7b';
export const FIXED_TIME = '2024-05-01T12:00:00.000Z';

export const fixedClock: Clock = () => new Date(FIXED_TIME);

export function makeRule(overrides: Partial<ResidencyRule> = {}): ResidencyRule {
  return {
    id: 'rule_1',
    tenantId: TENANT,
    jurisdiction: 'DE',
    dataClassification: DataClassification.Pii,
    action: ResidencyAction.Block,
    priority: 1,
    active: true,
    createdAt: '2024-01-01T00:00:00Z',
    updatedAt: '2024-01-01T00:00:00Z',
    version: 1,
    ...overrides,
  };
}

export function makeDeployment(overrides: Partial<RegionalDeployment> = {}): RegionalDeployment {
  return {
    id: 'dep_1',
    tenantId: TENANT,
    jurisdiction: 'DE',
    region: 'eu-central-1',
    namespace: 'sovereign-de-eu-central-1',
    clusterName: 'cluster-de',
    status: DeploymentStatus.Active,
    createdAt: '2024-01-01T00:00:00Z',
    updatedAt: '2024-01-01T00:00:00Z',
    version: 1,
    ...overrides,
  };
}

export function makePolicy(overrides: Partial<RoutingPolicy> = {}): RoutingPolicy {
  return {
    id: 'pol_1',
    tenantId: TENANT,
    name: 'DE inference',
    jurisdiction: 'DE',
    strategy: RoutingStrategy.Preferred,
    primaryDeploymentId: 'dep_1',
    fallbackDeploymentIds: [],
    priority: 100,
    active: true,
    createdAt: '2024-01-01T00:00:00Z',
    ...overrides,
  };
}

export function makeModel(overrides: Partial<SovereignModel> = {}): SovereignModel {
  return {
    id: 'smod_1',
    tenantId: TENANT,
    modelRef: MODEL_REF,
    modelName: 'llm-7b',
    modelVersion: '1.0',
    jurisdiction: 'DE',
    status: ModelApprovalStatus.Approved,
    createdAt: '2024-01-01T00:00:00Z',
    updatedAt: '2024-01-01T00:00:00Z',
    version: 1,
    ...overrides,
  };
}
