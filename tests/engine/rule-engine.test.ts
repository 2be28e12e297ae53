import { RuleEngine, decide } from '../../src/engine/rule-engine';
import { createMemoryStore } from '../../src/storage/memory-store';
import { DataClassification } from '../../src/domain/jurisdiction';
import { DataAccessRequest, ResidencyAction } from '../../src/domain/residency';
import { ConfigurationError, DependencyUnavailableError } from '../../src/domain/errors';
import { RuleStore } from '../../src/storage/store';
import { FIXED_TIME, TENANT, fixedClock, makeRule } from '../helpers/fixtures';

function request(overrides: Partial<DataAccessRequest> = {}): DataAccessRequest {
  return {
    tenantId: TENANT,
    jurisdiction: 'DE',
    dataClassification: DataClassification.Pii,
    payloadRef: 'payload-1',
    ...overrides,
  };
}

describe('decide', () => {
  test('no matching rule yields allow with no rule id', () => {
    expect(decide([], request(), FIXED_TIME)).toEqual({
      ruleId: null,
      action: 'allow',
      redirectTarget: null,
      evaluatedAt: FIXED_TIME,
    });
  });

  test('first match wins by priority', () => {
    const rules = [
      makeRule({ id: 'rule_b', priority: 2, action: ResidencyAction.Encrypt }),
      makeRule({ id: 'rule_a', priority: 1, action: ResidencyAction.Block }),
    ];
    const decision = decide(rules, request(), FIXED_TIME);
    expect(decision.action).toBe(ResidencyAction.Block);
    expect(decision.ruleId).toBe('rule_a');
  });

  test('equal priorities are ordered by id, independent of input order', () => {
    const first = makeRule({ id: 'rule_a', priority: 5, action: ResidencyAction.Anonymize });
    const second = makeRule({ id: 'rule_b', priority: 5, action: ResidencyAction.Block });

    expect(decide([second, first], request(), FIXED_TIME).ruleId).toBe('rule_a');
    expect(decide([first, second], request(), FIXED_TIME).ruleId).toBe('rule_a');
  });

  test('an all-classification rule matches every classification', () => {
    const rules = [makeRule({ dataClassification: DataClassification.All, action: ResidencyAction.Encrypt })];
    for (const classification of Object.values(DataClassification)) {
      const decision = decide(rules, request({ dataClassification: classification }), FIXED_TIME);
      expect(decision.action).toBe(ResidencyAction.Encrypt);
    }
  });

  test('a pii rule never matches a financial request', () => {
    const rules = [makeRule({ dataClassification: DataClassification.Pii })];
    const decision = decide(rules, request({ dataClassification: DataClassification.Financial }), FIXED_TIME);
    expect(decision.action).toBe('allow');
    expect(decision.ruleId).toBeNull();
  });

  test('inactive rules and other jurisdictions are ignored', () => {
    const rules = [makeRule({ id: 'rule_1', active: false }), makeRule({ id: 'rule_2', jurisdiction: 'FR' })];
    expect(decide(rules, request(), FIXED_TIME).action).toBe('allow');
  });

  test('redirect carries its target', () => {
    const rules = [makeRule({ action: ResidencyAction.Redirect, redirectTarget: 'EU' })];
    expect(decide(rules, request(), FIXED_TIME)).toEqual({
      ruleId: 'rule_1',
      action: ResidencyAction.Redirect,
      redirectTarget: 'EU',
      evaluatedAt: FIXED_TIME,
    });
  });

  test('redirect without a target is a configuration error', () => {
    const rules = [makeRule({ action: ResidencyAction.Redirect })];
    expect(() => decide(rules, request(), FIXED_TIME)).toThrow(ConfigurationError);
  });

  test('redirect to its own jurisdiction is a configuration error', () => {
    const rules = [makeRule({ action: ResidencyAction.Redirect, redirectTarget: 'DE' })];
    try {
      decide(rules, request(), FIXED_TIME);
      throw new Error('expected decide to throw');
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigurationError);
      expect(err instanceof ConfigurationError && err.code).toBe('CONFIGURATION.REDIRECT_LOOP');
    }
  });
});

describe('RuleEngine', () => {
  test('blocks pii in DE and allows financial for the same tenant', async () => {
    const store = createMemoryStore();
    await store.rules.create(makeRule({ id: 'rule_de', jurisdiction: 'DE', priority: 1 }));
    const engine = new RuleEngine(store.rules, fixedClock);

    const blocked = await engine.evaluate(TENANT, request());
    expect(blocked.action).toBe(ResidencyAction.Block);
    expect(blocked.ruleId).toBe('rule_de');

    const allowed = await engine.evaluate(TENANT, request({ dataClassification: DataClassification.Financial }));
    expect(allowed).toEqual({ ruleId: null, action: 'allow', redirectTarget: null, evaluatedAt: FIXED_TIME });
  });

  test('evaluating twice against an unchanged snapshot is identical', async () => {
    const store = createMemoryStore();
    await store.rules.create(makeRule({ id: 'rule_1', priority: 3, action: ResidencyAction.Encrypt }));
    await store.rules.create(makeRule({ id: 'rule_2', priority: 3, action: ResidencyAction.Block }));
    const engine = new RuleEngine(store.rules, fixedClock);

    const first = await engine.evaluate(TENANT, request());
    const second = await engine.evaluate(TENANT, request());
    expect(JSON.stringify(second)).toBe(JSON.stringify(first));
  });

  test('rules of another tenant are never consulted', async () => {
    const store = createMemoryStore();
    await store.rules.create(makeRule({ tenantId: 'tenant_other' }));
    const engine = new RuleEngine(store.rules, fixedClock);

    expect((await engine.evaluate(TENANT, request())).action).toBe('allow');
  });

  test('a request for another tenant is rejected', async () => {
    const engine = new RuleEngine(createMemoryStore().rules, fixedClock);
    await expect(engine.evaluate('tenant_other', request())).rejects.toThrow(ConfigurationError);
  });

  test('an unreachable rule repository fails closed', async () => {
    const base = createMemoryStore().rules;
    const failing: RuleStore = {
      create: (rule) => base.create(rule),
      getById: (id, tenantId) => base.getById(id, tenantId),
      listByTenant: (tenantId, options) => base.listByTenant(tenantId, options),
      setActive: (id, tenantId, active, version) => base.setActive(id, tenantId, active, version),
      listActive: async () => {
        throw new Error('connection refused');
      },
    };
    const engine = new RuleEngine(failing, fixedClock);

    await expect(engine.evaluate(TENANT, request())).rejects.toThrow(DependencyUnavailableError);
  });
});
