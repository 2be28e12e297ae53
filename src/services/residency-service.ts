/**
 * Residency Service.
 *
 * Tenant-facing operations around residency rules: administration
 * (create, deactivate, replace), status summaries, and enforcement, which
 * runs the rule engine and audits the decision before returning it.
 */

import { v4 as uuid } from 'uuid';
import {
  CreateResidencyRuleInput,
  DEFAULT_RULE_PRIORITY,
  DataAccessRequest,
  ResidencyAction,
  ResidencyDecision,
  ResidencyRule,
} from '../domain/residency';
import { DataClassification, Jurisdiction, isDataClassification, isJurisdiction } from '../domain/jurisdiction';
import { ConfigurationError, NotFoundError, ValidationError, toSovereigntyError } from '../domain/errors';
import { EventTopics } from '../domain/events';
import { Store } from '../storage/store';
import { RuleEngine } from '../engine/rule-engine';
import { withConflictRetry } from '../engine/conflict-retry';
import { DecisionAuditor } from '../audit/decision-auditor';
import { EventPublisher } from '../data-plane/publisher';
import { logger } from '../logger';

const log = logger.child({ component: 'residency-service' });

const RULE_ACTIONS = new Set<string>(Object.values(ResidencyAction));

export interface ResidencyServiceOptions {
  conflictRetryAttempts?: number;
  conflictRetryBaseMs?: number;
}

/** Decision plus the id of the audit record that captured it. */
export interface EnforcementResult {
  decision: ResidencyDecision;
  auditId: string;
}

export interface ResidencyStatus {
  jurisdiction: Jurisdiction;
  totalRules: number;
  activeRules: number;
  /** Active rule count per action. */
  actions: Record<ResidencyAction, number>;
  /** Classifications covered by at least one active rule. */
  classifications: DataClassification[];
}

/** Fields a replacement may change. */
export type RuleChanges = Partial<Omit<CreateResidencyRuleInput, 'tenantId'>>;

/** Validate a rule definition. Throws on the first problem. */
export function validateRuleInput(input: CreateResidencyRuleInput): void {
  if (!input.tenantId) {
    throw new ValidationError('tenantId is required');
  }
  if (!isJurisdiction(input.jurisdiction)) {
    throw new ValidationError(`Invalid jurisdiction: ${String(input.jurisdiction)}`, { field: 'jurisdiction' });
  }
  if (!isDataClassification(input.dataClassification)) {
    throw new ValidationError(`Invalid data classification: ${String(input.dataClassification)}`, {
      field: 'dataClassification',
    });
  }
  if (!RULE_ACTIONS.has(input.action)) {
    throw new ValidationError(`Invalid action: ${String(input.action)}`, { field: 'action' });
  }
  if (input.priority !== undefined && !Number.isInteger(input.priority)) {
    throw new ValidationError('priority must be an integer', { field: 'priority' });
  }

  if (input.action === ResidencyAction.Redirect) {
    if (!input.redirectTarget) {
      throw new ConfigurationError('Redirect rules require a redirectTarget', 'REDIRECT_TARGET_MISSING');
    }
    if (!isJurisdiction(input.redirectTarget)) {
      throw new ValidationError(`Invalid redirect target: ${String(input.redirectTarget)}`, {
        field: 'redirectTarget',
      });
    }
    if (input.redirectTarget === input.jurisdiction) {
      throw new ConfigurationError(
        `Redirect rule cannot target its own jurisdiction ${input.jurisdiction}`,
        'REDIRECT_LOOP',
      );
    }
  } else if (input.redirectTarget !== undefined) {
    throw new ConfigurationError('redirectTarget is only allowed on redirect rules', 'REDIRECT_TARGET_UNEXPECTED');
  }
}

export class ResidencyService {
  private maxAttempts: number;
  private baseDelayMs: number;

  constructor(
    private store: Store,
    private engine: RuleEngine,
    private auditor: DecisionAuditor,
    private publisher: EventPublisher,
    options: ResidencyServiceOptions = {},
  ) {
    this.maxAttempts = options.conflictRetryAttempts ?? 3;
    this.baseDelayMs = options.conflictRetryBaseMs ?? 10;
  }

  async createRule(input: CreateResidencyRuleInput): Promise<ResidencyRule> {
    validateRuleInput(input);
    return this.store.transaction((tx) => this.insertRule(tx, input));
  }

  /** Soft-deactivate a rule. Deactivating an inactive rule is a no-op. */
  async deactivateRule(tenantId: string, ruleId: string): Promise<ResidencyRule> {
    return this.deactivateIn(this.store, tenantId, ruleId);
  }

  /**
   * Change a rule by creating its successor and deactivating the original,
   * so the history of what was enforced stays intact. Both writes commit
   * together.
   */
  async replaceRule(
    tenantId: string,
    ruleId: string,
    changes: RuleChanges,
  ): Promise<{ previous: ResidencyRule; current: ResidencyRule }> {
    const existing = await this.getRule(tenantId, ruleId);
    if (!existing.active) {
      throw new ValidationError(`Residency rule ${ruleId} is inactive and cannot be replaced`, { ruleId });
    }

    const action = changes.action ?? existing.action;
    const successor: CreateResidencyRuleInput = {
      tenantId,
      jurisdiction: changes.jurisdiction ?? existing.jurisdiction,
      dataClassification: changes.dataClassification ?? existing.dataClassification,
      action,
      redirectTarget:
        action === ResidencyAction.Redirect ? changes.redirectTarget ?? existing.redirectTarget : undefined,
      priority: changes.priority ?? existing.priority,
      metadata: changes.metadata ?? existing.metadata,
    };
    validateRuleInput(successor);

    return this.store.transaction(async (tx) => {
      const current = await this.insertRule(tx, successor, existing.id);
      const previous = await this.deactivateIn(tx, tenantId, ruleId);
      return { previous, current };
    });
  }

  private async insertRule(tx: Store, input: CreateResidencyRuleInput, supersedes?: string): Promise<ResidencyRule> {
    const now = new Date().toISOString();
    const rule: ResidencyRule = {
      id: `rule_${uuid()}`,
      tenantId: input.tenantId,
      jurisdiction: input.jurisdiction,
      dataClassification: input.dataClassification,
      action: input.action,
      redirectTarget: input.action === ResidencyAction.Redirect ? input.redirectTarget : undefined,
      priority: input.priority ?? DEFAULT_RULE_PRIORITY,
      active: true,
      supersedes,
      metadata: input.metadata,
      createdAt: now,
      updatedAt: now,
      version: 1,
    };

    let created: ResidencyRule;
    try {
      created = await tx.rules.create(rule);
    } catch (err) {
      throw toSovereigntyError(err, 'rule-repository');
    }

    await this.publisher
      .within(tx.outbox)
      .publish(EventTopics.Residency, 'residency.rule_created', created.tenantId, created.jurisdiction, {
        ruleId: created.id,
        jurisdiction: created.jurisdiction,
        dataClassification: created.dataClassification,
        action: created.action,
        priority: created.priority,
        supersedes: created.supersedes,
      });

    log.info('Residency rule created', {
      tenantId: created.tenantId,
      ruleId: created.id,
      jurisdiction: created.jurisdiction,
      action: created.action,
    });
    return created;
  }

  private async deactivateIn(store: Store, tenantId: string, ruleId: string): Promise<ResidencyRule> {
    return withConflictRetry(
      async () => {
        const rule = await this.getRule(tenantId, ruleId);
        if (!rule.active) return rule;

        let updated: ResidencyRule | null;
        try {
          updated = await store.rules.setActive(ruleId, tenantId, false, rule.version);
        } catch (err) {
          throw toSovereigntyError(err, 'rule-repository');
        }
        if (!updated) throw new NotFoundError('ResidencyRule', ruleId);

        log.info('Residency rule deactivated', { tenantId, ruleId });
        return updated;
      },
      { maxAttempts: this.maxAttempts, baseDelayMs: this.baseDelayMs, operation: 'rule.deactivate', logger: log },
    );
  }

  async getRule(tenantId: string, ruleId: string): Promise<ResidencyRule> {
    let rule: ResidencyRule | null;
    try {
      rule = await this.store.rules.getById(ruleId, tenantId);
    } catch (err) {
      throw toSovereigntyError(err, 'rule-repository');
    }
    if (!rule) throw new NotFoundError('ResidencyRule', ruleId);
    return rule;
  }

  async listRules(
    tenantId: string,
    options?: { jurisdiction?: Jurisdiction; includeInactive?: boolean; limit?: number; offset?: number },
  ): Promise<ResidencyRule[]> {
    return this.store.rules.listByTenant(tenantId, options);
  }

  async getResidencyStatus(tenantId: string, jurisdiction: Jurisdiction): Promise<ResidencyStatus> {
    const rules = await this.store.rules.listByTenant(tenantId, {
      jurisdiction,
      includeInactive: true,
      limit: Number.MAX_SAFE_INTEGER,
    });
    const active = rules.filter((r) => r.active);

    const actions: Record<ResidencyAction, number> = {
      [ResidencyAction.Block]: 0,
      [ResidencyAction.Encrypt]: 0,
      [ResidencyAction.Anonymize]: 0,
      [ResidencyAction.Redirect]: 0,
    };
    for (const rule of active) actions[rule.action]++;

    return {
      jurisdiction,
      totalRules: rules.length,
      activeRules: active.length,
      actions,
      classifications: [...new Set(active.map((r) => r.dataClassification))].sort(),
    };
  }

  /** Evaluate a request and audit the decision before returning it. */
  async enforce(request: DataAccessRequest, correlationId?: string): Promise<EnforcementResult> {
    if (!isJurisdiction(request.jurisdiction)) {
      throw new ValidationError(`Invalid jurisdiction: ${String(request.jurisdiction)}`, { field: 'jurisdiction' });
    }
    if (!isDataClassification(request.dataClassification)) {
      throw new ValidationError(`Invalid data classification: ${String(request.dataClassification)}`, {
        field: 'dataClassification',
      });
    }

    const decision = await this.engine.evaluate(request.tenantId, request);
    const record = await this.auditor.recordResidency(
      {
        tenantId: request.tenantId,
        jurisdiction: request.jurisdiction,
        correlationId,
        attributes: { dataClassification: request.dataClassification, payloadRef: request.payloadRef },
      },
      decision,
    );

    if (decision.action !== 'allow') {
      log.warn('Residency rule matched', {
        tenantId: request.tenantId,
        jurisdiction: request.jurisdiction,
        ruleId: decision.ruleId,
        action: decision.action,
      });
    }

    return { decision, auditId: record.id };
  }
}
