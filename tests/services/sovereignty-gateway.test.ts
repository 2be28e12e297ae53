import { createAppContext, AppContext } from '../../src/server';
import { createConfig } from '../../src/config';
import { DataClassification } from '../../src/domain/jurisdiction';
import { ResidencyAction } from '../../src/domain/residency';
import { DeploymentStatus } from '../../src/domain/deployment';
import { RoutingStrategy } from '../../src/domain/routing';
import { MODEL_REF, TENANT } from '../helpers/fixtures';

async function setupJurisdiction(ctx: AppContext, jurisdiction: string, region: string): Promise<string> {
  const deployment = await ctx.deployments.deploy({
    tenantId: TENANT,
    jurisdiction,
    region,
    clusterName: `cluster-${jurisdiction.toLowerCase()}`,
  });
  await ctx.deployments.transition(TENANT, deployment.id, DeploymentStatus.Active);
  await ctx.models.register({ tenantId: TENANT, modelRef: MODEL_REF, modelName: 'llm-7b', jurisdiction });
  await ctx.models.approve(TENANT, MODEL_REF, jurisdiction);
  await ctx.routing.createPolicy({
    tenantId: TENANT,
    name: `${jurisdiction} inference`,
    jurisdiction,
    strategy: RoutingStrategy.Strict,
    primaryDeploymentId: deployment.id,
  });
  return deployment.id;
}

function request(dataClassification: DataClassification) {
  return { tenantId: TENANT, jurisdiction: 'DE', dataClassification, payloadRef: 'blob-1' };
}

describe('SovereigntyGateway', () => {
  let ctx: AppContext;
  let deId: string;
  let frId: string;

  beforeEach(async () => {
    ctx = createAppContext({ config: createConfig({ conflictRetryBaseMs: 0 }) });
    deId = await setupJurisdiction(ctx, 'DE', 'eu-central-1');
    frId = await setupJurisdiction(ctx, 'FR', 'eu-west-1');
  });

  test('a blocked request is never routed', async () => {
    await ctx.residency.createRule({
      tenantId: TENANT,
      jurisdiction: 'DE',
      dataClassification: DataClassification.Pii,
      action: ResidencyAction.Block,
    });

    const result = await ctx.gateway.handle(request(DataClassification.Pii), MODEL_REF);

    expect(result.residency.action).toBe('block');
    expect(result.routing).toBeNull();
    expect(await ctx.auditor.query({ tenantId: TENANT, kind: 'routing' })).toHaveLength(0);
  });

  test('an allowed request routes in its own jurisdiction', async () => {
    const result = await ctx.gateway.handle(request(DataClassification.Financial), MODEL_REF, 'corr-9');

    expect(result.residency.action).toBe('allow');
    expect(result.effectiveJurisdiction).toBe('DE');
    expect(result.routing?.decision.selectedDeploymentId).toBe(deId);

    const records = await ctx.auditor.query({ tenantId: TENANT });
    expect(records.map((r) => r.kind)).toEqual(['residency', 'routing']);
    expect(records.every((r) => r.correlationId === 'corr-9')).toBe(true);
  });

  test('a redirect routes in the target jurisdiction without re-evaluating its rules', async () => {
    await ctx.residency.createRule({
      tenantId: TENANT,
      jurisdiction: 'DE',
      dataClassification: DataClassification.Health,
      action: ResidencyAction.Redirect,
      redirectTarget: 'FR',
    });
    await ctx.residency.createRule({
      tenantId: TENANT,
      jurisdiction: 'FR',
      dataClassification: DataClassification.Health,
      action: ResidencyAction.Block,
    });

    const result = await ctx.gateway.handle(request(DataClassification.Health), MODEL_REF);

    expect(result.residency.action).toBe('redirect');
    expect(result.effectiveJurisdiction).toBe('FR');
    expect(result.routing?.decision.jurisdiction).toBe('FR');
    expect(result.routing?.decision.selectedDeploymentId).toBe(frId);
  });

  test('encrypt decisions are routed; the caller applies the transform', async () => {
    await ctx.residency.createRule({
      tenantId: TENANT,
      jurisdiction: 'DE',
      dataClassification: DataClassification.All,
      action: ResidencyAction.Encrypt,
    });

    const result = await ctx.gateway.handle(request(DataClassification.Biometric), MODEL_REF);

    expect(result.residency.action).toBe('encrypt');
    expect(result.routing?.decision.selectedDeploymentId).toBe(deId);
  });
});
