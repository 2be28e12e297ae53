import { createMemoryStore } from '../../src/storage/memory-store';
import { ConflictError, LimitExceededError, ValidationError } from '../../src/domain/errors';
import { DeploymentStatus } from '../../src/domain/deployment';
import { SovereigntyEvent } from '../../src/domain/events';
import { MODEL_REF, OTHER_TENANT, TENANT, makeDeployment, makeModel, makeRule } from '../helpers/fixtures';

function event(id: string, tenantId = TENANT): SovereigntyEvent {
  return {
    id,
    topic: 'sovereign.residency',
    type: 'residency.evaluated',
    key: 'DE',
    schemaVersion: '1.0.0',
    timestamp: '2024-01-01T00:00:00Z',
    tenantId,
    payload: {},
  };
}

describe('MemoryRuleStore', () => {
  test('enforces the per-tenant ceiling on active rules', async () => {
    const store = createMemoryStore({ maxRulesPerTenant: 2 });
    await store.rules.create(makeRule({ id: 'rule_1' }));
    await store.rules.create(makeRule({ id: 'rule_2' }));

    await expect(store.rules.create(makeRule({ id: 'rule_3' }))).rejects.toThrow(LimitExceededError);
    await expect(store.rules.create(makeRule({ id: 'rule_4', tenantId: OTHER_TENANT }))).resolves.toBeDefined();
  });

  test('deactivated rules free a slot under the ceiling', async () => {
    const store = createMemoryStore({ maxRulesPerTenant: 1 });
    await store.rules.create(makeRule({ id: 'rule_1' }));
    await store.rules.setActive('rule_1', TENANT, false, 1);

    await expect(store.rules.create(makeRule({ id: 'rule_2' }))).resolves.toBeDefined();
  });

  test('setActive bumps the version and rejects stale versions', async () => {
    const store = createMemoryStore();
    await store.rules.create(makeRule());

    const updated = await store.rules.setActive('rule_1', TENANT, false, 1);
    expect(updated?.active).toBe(false);
    expect(updated?.version).toBe(2);

    await expect(store.rules.setActive('rule_1', TENANT, true, 1)).rejects.toThrow(ConflictError);
  });

  test('records of another tenant look missing', async () => {
    const store = createMemoryStore();
    await store.rules.create(makeRule());

    expect(await store.rules.getById('rule_1', OTHER_TENANT)).toBeNull();
    expect(await store.rules.setActive('rule_1', OTHER_TENANT, false, 1)).toBeNull();
  });

  test('listByTenant hides inactive rules unless asked', async () => {
    const store = createMemoryStore();
    await store.rules.create(makeRule({ id: 'rule_1' }));
    await store.rules.create(makeRule({ id: 'rule_2', active: false }));

    expect((await store.rules.listByTenant(TENANT)).map((r) => r.id)).toEqual(['rule_1']);
    expect((await store.rules.listByTenant(TENANT, { includeInactive: true })).map((r) => r.id)).toEqual([
      'rule_1',
      'rule_2',
    ]);
  });
});

describe('MemoryDeploymentStore', () => {
  test('versioned update applies once per version', async () => {
    const store = createMemoryStore();
    await store.deployments.create(makeDeployment({ status: DeploymentStatus.Provisioning }));

    const updated = await store.deployments.update('dep_1', TENANT, { status: DeploymentStatus.Active }, 1);
    expect(updated?.status).toBe(DeploymentStatus.Active);
    expect(updated?.version).toBe(2);

    await expect(
      store.deployments.update('dep_1', TENANT, { status: DeploymentStatus.Degraded }, 1),
    ).rejects.toThrow(ConflictError);
  });
});

describe('MemoryModelStore', () => {
  test('looks registrations up by tenant, model and jurisdiction', async () => {
    const store = createMemoryStore();
    await store.models.create(makeModel({ id: 'smod_de', jurisdiction: 'DE' }));
    await store.models.create(makeModel({ id: 'smod_fr', jurisdiction: 'FR' }));

    expect((await store.models.get(TENANT, 'model-registry:llm-7b', 'FR'))?.id).toBe('smod_fr');
    expect(await store.models.get(OTHER_TENANT, 'model-registry:llm-7b', 'FR')).toBeNull();
  });

  test('a second registration of the same natural key is rejected', async () => {
    const store = createMemoryStore();
    await store.models.create(makeModel({ id: 'smod_1' }));

    await expect(store.models.create(makeModel({ id: 'smod_2' }))).rejects.toThrow(ValidationError);
    expect((await store.models.get(TENANT, MODEL_REF, 'DE'))?.id).toBe('smod_1');
    expect(await store.models.listByTenant(TENANT)).toHaveLength(1);
  });
});

describe('MemoryOutboxStore', () => {
  test('pending entries come back in enqueue order with increasing sequences', async () => {
    const store = createMemoryStore();
    const first = await store.outbox.enqueue(event('evt_1'));
    const second = await store.outbox.enqueue(event('evt_2'));

    expect(first.sequence).toBe(1);
    expect(second.sequence).toBe(2);
    expect((await store.outbox.listPending()).map((e) => e.event.id)).toEqual(['evt_1', 'evt_2']);
  });

  test('delivered entries leave the pending list; failed ones stay', async () => {
    const store = createMemoryStore();
    await store.outbox.enqueue(event('evt_1'));
    await store.outbox.enqueue(event('evt_2'));

    await store.outbox.markDelivered(1);
    await store.outbox.markFailed(2, 'broker down');

    const pending = await store.outbox.listPending();
    expect(pending).toHaveLength(1);
    expect(pending[0].event.id).toBe('evt_2');
    expect(pending[0].attempts).toBe(1);
    expect(pending[0].lastError).toBe('broker down');
  });

  test('listByTenant filters on the event tenant', async () => {
    const store = createMemoryStore();
    await store.outbox.enqueue(event('evt_1'));
    await store.outbox.enqueue(event('evt_2', OTHER_TENANT));

    expect((await store.outbox.listByTenant(OTHER_TENANT)).map((e) => e.event.id)).toEqual(['evt_2']);
  });
});

describe('MemoryStore.transaction', () => {
  test('commits every write when the work succeeds', async () => {
    const store = createMemoryStore();

    const result = await store.transaction(async (tx) => {
      await tx.rules.create(makeRule());
      await tx.outbox.enqueue(event('evt_1'));
      return 'done';
    });

    expect(result).toBe('done');
    expect(await store.rules.getById('rule_1', TENANT)).not.toBeNull();
    expect(await store.outbox.listPending()).toHaveLength(1);
  });

  test('undoes creates, updates and enqueues when the work fails', async () => {
    const store = createMemoryStore();
    await store.deployments.create(makeDeployment({ status: DeploymentStatus.Provisioning }));

    await expect(
      store.transaction(async (tx) => {
        await tx.rules.create(makeRule());
        await tx.deployments.update('dep_1', TENANT, { status: DeploymentStatus.Active }, 1);
        await tx.outbox.enqueue(event('evt_1'));
        throw new Error('abort');
      }),
    ).rejects.toThrow('abort');

    expect(await store.rules.getById('rule_1', TENANT)).toBeNull();
    const deployment = await store.deployments.getById('dep_1', TENANT);
    expect(deployment?.status).toBe(DeploymentStatus.Provisioning);
    expect(deployment?.version).toBe(1);
    expect(await store.outbox.listPending()).toEqual([]);
  });

  test('an undo leaves alone a record changed outside the unit of work', async () => {
    const store = createMemoryStore();
    await store.deployments.create(makeDeployment({ status: DeploymentStatus.Provisioning }));

    await expect(
      store.transaction(async (tx) => {
        await tx.deployments.update('dep_1', TENANT, { status: DeploymentStatus.Active }, 1);
        await store.deployments.update('dep_1', TENANT, { status: DeploymentStatus.Degraded }, 2);
        throw new Error('abort');
      }),
    ).rejects.toThrow('abort');

    const deployment = await store.deployments.getById('dep_1', TENANT);
    expect(deployment?.status).toBe(DeploymentStatus.Degraded);
    expect(deployment?.version).toBe(3);
  });

  test('a rolled-back registration frees its natural key', async () => {
    const store = createMemoryStore();

    await expect(
      store.transaction(async (tx) => {
        await tx.models.create(makeModel({ id: 'smod_1' }));
        throw new Error('abort');
      }),
    ).rejects.toThrow('abort');

    await expect(store.models.create(makeModel({ id: 'smod_2' }))).resolves.toMatchObject({ id: 'smod_2' });
    expect((await store.models.get(TENANT, MODEL_REF, 'DE'))?.id).toBe('smod_2');
  });

  test('nested transactions join the enclosing one', async () => {
    const store = createMemoryStore();

    await expect(
      store.transaction(async (tx) => {
        await tx.transaction((inner) => inner.rules.create(makeRule()));
        throw new Error('abort');
      }),
    ).rejects.toThrow('abort');

    expect(await store.rules.getById('rule_1', TENANT)).toBeNull();
  });
});
