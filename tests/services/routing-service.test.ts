import { createAppContext, AppContext } from '../../src/server';
import { createConfig } from '../../src/config';
import { DeploymentStatus, RegionalDeployment } from '../../src/domain/deployment';
import { RoutingStrategy } from '../../src/domain/routing';
import { NotFoundError, ValidationError } from '../../src/domain/errors';
import { MODEL_REF, TENANT, makePolicy } from '../helpers/fixtures';
import { comparePolicies } from '../../src/services/routing-service';

function setup(): AppContext {
  return createAppContext({ config: createConfig({ conflictRetryBaseMs: 0 }) });
}

async function activeDeployment(ctx: AppContext, jurisdiction = 'DE', region = 'eu-central-1'): Promise<RegionalDeployment> {
  const deployment = await ctx.deployments.deploy({
    tenantId: TENANT,
    jurisdiction,
    region,
    clusterName: `cluster-${region}`,
  });
  return ctx.deployments.transition(TENANT, deployment.id, DeploymentStatus.Active);
}

async function approveModel(ctx: AppContext, jurisdiction = 'DE'): Promise<void> {
  await ctx.models.register({ tenantId: TENANT, modelRef: MODEL_REF, modelName: 'llm-7b', jurisdiction });
  await ctx.models.approve(TENANT, MODEL_REF, jurisdiction, 'reviewer');
}

describe('comparePolicies', () => {
  test('orders by priority then id', () => {
    const policies = [
      makePolicy({ id: 'pol_b', priority: 10 }),
      makePolicy({ id: 'pol_c', priority: 5 }),
      makePolicy({ id: 'pol_a', priority: 10 }),
    ];
    expect(policies.sort(comparePolicies).map((p) => p.id)).toEqual(['pol_c', 'pol_a', 'pol_b']);
  });
});

describe('RoutingService.createPolicy', () => {
  test('creates a policy with defaults', async () => {
    const ctx = setup();
    const primary = await activeDeployment(ctx);

    const policy = await ctx.routing.createPolicy({
      tenantId: TENANT,
      name: 'DE inference',
      jurisdiction: 'DE',
      strategy: RoutingStrategy.Strict,
      primaryDeploymentId: primary.id,
    });

    expect(policy.id).toMatch(/^pol_/);
    expect(policy.priority).toBe(100);
    expect(policy.fallbackDeploymentIds).toEqual([]);
    expect(policy.active).toBe(true);
  });

  test('strict policies cannot declare fallbacks', async () => {
    const ctx = setup();
    const primary = await activeDeployment(ctx);
    const other = await activeDeployment(ctx, 'DE', 'eu-west-1');

    await expect(
      ctx.routing.createPolicy({
        tenantId: TENANT,
        name: 'strict',
        jurisdiction: 'DE',
        strategy: RoutingStrategy.Strict,
        primaryDeploymentId: primary.id,
        fallbackDeploymentIds: [other.id],
      }),
    ).rejects.toMatchObject({ code: 'CONFIGURATION.STRICT_WITH_FALLBACKS' });
  });

  test('rejects duplicate deployments, unknown primaries and jurisdiction mismatches', async () => {
    const ctx = setup();
    const de = await activeDeployment(ctx);
    const fr = await activeDeployment(ctx, 'FR', 'eu-west-1');
    const base = { tenantId: TENANT, name: 'p', jurisdiction: 'DE', strategy: RoutingStrategy.Preferred };

    await expect(
      ctx.routing.createPolicy({ ...base, primaryDeploymentId: de.id, fallbackDeploymentIds: [de.id] }),
    ).rejects.toMatchObject({ code: 'CONFIGURATION.DUPLICATE_DEPLOYMENT' });
    await expect(ctx.routing.createPolicy({ ...base, primaryDeploymentId: 'dep_missing' })).rejects.toMatchObject({
      code: 'CONFIGURATION.UNKNOWN_DEPLOYMENT',
    });
    await expect(ctx.routing.createPolicy({ ...base, primaryDeploymentId: fr.id })).rejects.toMatchObject({
      code: 'CONFIGURATION.JURISDICTION_MISMATCH',
    });
  });

  test('fallbacks must exist and serve the policy jurisdiction', async () => {
    const ctx = setup();
    const de = await activeDeployment(ctx);
    const fr = await activeDeployment(ctx, 'FR', 'eu-west-1');
    const base = {
      tenantId: TENANT,
      name: 'p',
      jurisdiction: 'DE',
      strategy: RoutingStrategy.Preferred,
      primaryDeploymentId: de.id,
    };

    await expect(ctx.routing.createPolicy({ ...base, fallbackDeploymentIds: [fr.id] })).rejects.toMatchObject({
      code: 'CONFIGURATION.JURISDICTION_MISMATCH',
      message: `Fallback deployment ${fr.id} serves FR, not DE`,
    });
    await expect(
      ctx.routing.createPolicy({ ...base, fallbackDeploymentIds: ['dep_does_not_exist'] }),
    ).rejects.toMatchObject({
      code: 'CONFIGURATION.UNKNOWN_DEPLOYMENT',
      message: 'Fallback deployment dep_does_not_exist does not exist',
    });
    expect(await ctx.routing.listPolicies(TENANT, 'DE')).toEqual([]);
  });
});

describe('RoutingService.route', () => {
  test('routes to the primary and audits the decision', async () => {
    const ctx = setup();
    const primary = await activeDeployment(ctx);
    await approveModel(ctx);
    const policy = await ctx.routing.createPolicy({
      tenantId: TENANT,
      name: 'DE',
      jurisdiction: 'DE',
      strategy: RoutingStrategy.Preferred,
      primaryDeploymentId: primary.id,
    });

    const outcome = await ctx.routing.route(TENANT, 'DE', MODEL_REF, 'corr-1');

    expect(outcome.policyId).toBe(policy.id);
    expect(outcome.decision).toEqual({
      jurisdiction: 'DE',
      selectedDeploymentId: primary.id,
      strategyUsed: RoutingStrategy.Preferred,
      reason: 'primary',
    });
    expect(outcome.deployment?.id).toBe(primary.id);

    const [record] = await ctx.auditor.query({ tenantId: TENANT, kind: 'routing' });
    expect(record.id).toBe(outcome.auditId);
    expect(record.attributes).toEqual({ policyId: policy.id, modelRef: MODEL_REF });
  });

  test('falls back when the primary degrades', async () => {
    const ctx = setup();
    const primary = await activeDeployment(ctx);
    const backup = await activeDeployment(ctx, 'DE', 'eu-west-1');
    await approveModel(ctx);
    await ctx.routing.createPolicy({
      tenantId: TENANT,
      name: 'DE',
      jurisdiction: 'DE',
      strategy: RoutingStrategy.Fallback,
      primaryDeploymentId: primary.id,
      fallbackDeploymentIds: [backup.id],
    });
    await ctx.deployments.transition(TENANT, primary.id, DeploymentStatus.Degraded);

    const outcome = await ctx.routing.route(TENANT, 'DE', MODEL_REF);
    expect(outcome.decision.selectedDeploymentId).toBe(backup.id);
    expect(outcome.decision.reason).toBe('fallback:0');
  });

  test('selects nothing when the model is not approved', async () => {
    const ctx = setup();
    const primary = await activeDeployment(ctx);
    await ctx.routing.createPolicy({
      tenantId: TENANT,
      name: 'DE',
      jurisdiction: 'DE',
      strategy: RoutingStrategy.Preferred,
      primaryDeploymentId: primary.id,
    });

    const outcome = await ctx.routing.route(TENANT, 'DE', MODEL_REF);
    expect(outcome.decision.selectedDeploymentId).toBeNull();
    expect(outcome.decision.reason).toBe('no_compliant_deployment');
    expect(outcome.deployment).toBeNull();
    expect(await ctx.auditor.query({ tenantId: TENANT, kind: 'routing' })).toHaveLength(1);
  });

  test('the lowest-priority-number policy governs', async () => {
    const ctx = setup();
    const first = await activeDeployment(ctx);
    const second = await activeDeployment(ctx, 'DE', 'eu-west-1');
    await approveModel(ctx);
    await ctx.routing.createPolicy({
      tenantId: TENANT,
      name: 'general',
      jurisdiction: 'DE',
      strategy: RoutingStrategy.Preferred,
      primaryDeploymentId: first.id,
      priority: 50,
    });
    const governing = await ctx.routing.createPolicy({
      tenantId: TENANT,
      name: 'specific',
      jurisdiction: 'DE',
      strategy: RoutingStrategy.Preferred,
      primaryDeploymentId: second.id,
      priority: 10,
    });

    const outcome = await ctx.routing.route(TENANT, 'DE', MODEL_REF);
    expect(outcome.policyId).toBe(governing.id);
    expect(outcome.decision.selectedDeploymentId).toBe(second.id);
  });

  test('a jurisdiction without a policy is not found', async () => {
    const ctx = setup();
    await expect(ctx.routing.route(TENANT, 'JP', MODEL_REF)).rejects.toThrow(NotFoundError);
  });

  test('rejects malformed model references', async () => {
    const ctx = setup();
    await expect(ctx.routing.route(TENANT, 'DE', ' spaced ref')).rejects.toThrow(ValidationError);
  });
});
