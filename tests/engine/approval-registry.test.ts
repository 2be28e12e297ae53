import { ApprovalRegistry } from '../../src/engine/approval-registry';
import { createMemoryStore } from '../../src/storage/memory-store';
import { ModelApprovalStatus } from '../../src/domain/sovereign-model';
import { InvalidStateTransitionError, NotFoundError } from '../../src/domain/errors';
import { ModelStore } from '../../src/storage/store';
import { MODEL_REF, TENANT, makeModel } from '../helpers/fixtures';

describe('ApprovalRegistry', () => {
  test('only an approved registration is usable', async () => {
    const store = createMemoryStore();
    await store.models.create(makeModel({ id: 'smod_de', jurisdiction: 'DE', status: ModelApprovalStatus.Approved }));
    await store.models.create(makeModel({ id: 'smod_fr', jurisdiction: 'FR', status: ModelApprovalStatus.Pending }));
    const registry = new ApprovalRegistry(store.models);

    expect(await registry.isUsable(TENANT, MODEL_REF, 'DE')).toBe(true);
    expect(await registry.isUsable(TENANT, MODEL_REF, 'FR')).toBe(false);
    expect(await registry.isUsable(TENANT, MODEL_REF, 'IT')).toBe(false);
    expect(await registry.isUsable('tenant_other', MODEL_REF, 'DE')).toBe(false);
  });

  test('pending -> revoked fails and leaves the state unchanged', async () => {
    const store = createMemoryStore();
    await store.models.create(makeModel({ status: ModelApprovalStatus.Pending }));
    const registry = new ApprovalRegistry(store.models);

    await expect(
      registry.transition(TENANT, MODEL_REF, 'DE', ModelApprovalStatus.Revoked),
    ).rejects.toThrow(InvalidStateTransitionError);

    const model = await registry.get(TENANT, MODEL_REF, 'DE');
    expect(model?.status).toBe(ModelApprovalStatus.Pending);
    expect(model?.version).toBe(1);
  });

  test('approved -> revoked succeeds and the model stops being usable', async () => {
    const store = createMemoryStore();
    await store.models.create(makeModel({ status: ModelApprovalStatus.Approved }));
    const registry = new ApprovalRegistry(store.models);

    const revoked = await registry.transition(TENANT, MODEL_REF, 'DE', ModelApprovalStatus.Revoked, 'officer-1');
    expect(revoked.status).toBe(ModelApprovalStatus.Revoked);
    expect(revoked.version).toBe(2);
    expect(await registry.isUsable(TENANT, MODEL_REF, 'DE')).toBe(false);
  });

  test('approving records the approver', async () => {
    const store = createMemoryStore();
    await store.models.create(makeModel({ status: ModelApprovalStatus.Pending }));
    const registry = new ApprovalRegistry(store.models);

    const approved = await registry.transition(TENANT, MODEL_REF, 'DE', ModelApprovalStatus.Approved, 'officer-1');
    expect(approved.approvedBy).toBe('officer-1');
    expect(approved.approvedAt).toBeDefined();
  });

  test('transition of an unknown registration is not found', async () => {
    const registry = new ApprovalRegistry(createMemoryStore().models);
    await expect(
      registry.transition(TENANT, MODEL_REF, 'DE', ModelApprovalStatus.Approved),
    ).rejects.toThrow(NotFoundError);
  });

  test('a concurrent update causes a re-read and a fresh legality check', async () => {
    const store = createMemoryStore();
    await store.models.create(makeModel({ status: ModelApprovalStatus.Pending }));
    const models = store.models;

    // The first read sees pending; before the write lands another writer rejects the model.
    let interfered = false;
    const racing: ModelStore = {
      create: (model) => models.create(model),
      listByTenant: (tenantId, options) => models.listByTenant(tenantId, options),
      update: (id, tenantId, updates, version) => models.update(id, tenantId, updates, version),
      get: async (tenantId, modelRef, jurisdiction) => {
        const current = await models.get(tenantId, modelRef, jurisdiction);
        if (!interfered && current) {
          interfered = true;
          await models.update(current.id, tenantId, { status: ModelApprovalStatus.Rejected }, current.version);
        }
        return current;
      },
    };
    const registry = new ApprovalRegistry(racing, { conflictRetryAttempts: 3, conflictRetryBaseMs: 0 });

    await expect(
      registry.transition(TENANT, MODEL_REF, 'DE', ModelApprovalStatus.Approved),
    ).rejects.toThrow(InvalidStateTransitionError);

    const model = await models.get(TENANT, MODEL_REF, 'DE');
    expect(model?.status).toBe(ModelApprovalStatus.Rejected);
  });
});
