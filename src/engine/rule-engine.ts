/**
 * Residency rule engine.
 *
 * Evaluates a tenant's residency rules against one data-access request and
 * returns a single decision. Evaluation is a sort-then-scan over a snapshot
 * fetched per call: rules are ordered by (priority, id) and the first rule
 * whose classification covers the request decides. There is no aggregation
 * and no "most restrictive wins".
 *
 * The engine only decides. Encrypting, anonymizing or redirecting the
 * payload is the caller's job.
 */

import {
  DataAccessRequest,
  ResidencyAction,
  ResidencyDecision,
  ResidencyRule,
  classificationMatches,
  compareRules,
} from '../domain/residency';
import { ConfigurationError, toSovereigntyError } from '../domain/errors';
import { RuleStore } from '../storage/store';
import { logger } from '../logger';

const log = logger.child({ component: 'rule-engine' });

/** Clock injection point so decisions can be reproduced exactly. */
export type Clock = () => Date;

const systemClock: Clock = () => new Date();

export class RuleEngine {
  constructor(
    private rules: RuleStore,
    private clock: Clock = systemClock,
  ) {}

  async evaluate(tenantId: string, request: DataAccessRequest): Promise<ResidencyDecision> {
    if (request.tenantId !== tenantId) {
      throw new ConfigurationError(
        'Residency request tenant does not match the evaluating tenant',
        'TENANT_MISMATCH',
        { tenantId, requestTenantId: request.tenantId },
      );
    }

    let snapshot: ResidencyRule[];
    try {
      snapshot = await this.rules.listActive(tenantId, request.jurisdiction);
    } catch (err) {
      // Fail closed: an unreachable rule repository never yields allow.
      throw toSovereigntyError(err, 'rule-repository');
    }

    const decision = decide(snapshot, request, this.clock().toISOString());

    log.debug('Residency evaluated', {
      tenantId,
      jurisdiction: request.jurisdiction,
      dataClassification: request.dataClassification,
      ruleId: decision.ruleId,
      action: decision.action,
      candidates: snapshot.length,
    });

    return decision;
  }
}

/**
 * First-match-wins over an in-memory rule snapshot. Exported for callers
 * that already hold the rules (and for tests).
 */
export function decide(
  snapshot: ResidencyRule[],
  request: DataAccessRequest,
  evaluatedAt: string,
): ResidencyDecision {
  const ordered = snapshot
    .filter(
      (rule) =>
        rule.active &&
        rule.tenantId === request.tenantId &&
        rule.jurisdiction === request.jurisdiction &&
        classificationMatches(rule.dataClassification, request.dataClassification),
    )
    .sort(compareRules);

  const match = ordered[0];
  if (!match) {
    return { ruleId: null, action: 'allow', redirectTarget: null, evaluatedAt };
  }

  if (match.action === ResidencyAction.Redirect) {
    if (!match.redirectTarget) {
      throw new ConfigurationError(
        `Redirect rule ${match.id} has no redirect target`,
        'REDIRECT_TARGET_MISSING',
        { ruleId: match.id },
        [{ type: 'SET_REDIRECT_TARGET', params: { ruleId: match.id } }],
      );
    }
    if (match.redirectTarget === request.jurisdiction) {
      throw new ConfigurationError(
        `Redirect rule ${match.id} targets its own jurisdiction ${match.redirectTarget}`,
        'REDIRECT_LOOP',
        { ruleId: match.id, jurisdiction: match.redirectTarget },
      );
    }
    return {
      ruleId: match.id,
      action: match.action,
      redirectTarget: match.redirectTarget,
      evaluatedAt,
    };
  }

  return { ruleId: match.id, action: match.action, redirectTarget: null, evaluatedAt };
}
