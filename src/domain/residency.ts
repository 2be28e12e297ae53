/**
 * Residency rule domain model.
 *
 * A residency rule tells the engine what to do with data of a given
 * classification in a given jurisdiction. Rules are immutable once created
 * apart from the `active` flag; edits are modeled as create-new plus
 * deactivate-old so the audit history stays intact.
 */

import { DataClassification, Jurisdiction } from './jurisdiction';

/** Enforcement action a rule prescribes. */
export enum ResidencyAction {
  Block = 'block',
  Encrypt = 'encrypt',
  Anonymize = 'anonymize',
  Redirect = 'redirect',
}

/** Action carried by a decision: a rule action, or the implicit allow. */
export type DecisionAction = ResidencyAction | 'allow';

export interface ResidencyRule {
  id: string;
  tenantId: string;
  jurisdiction: Jurisdiction;
  dataClassification: DataClassification;
  action: ResidencyAction;
  /** Present iff action is redirect. */
  redirectTarget?: Jurisdiction;
  /** Lower is evaluated first; ties broken by id. */
  priority: number;
  active: boolean;
  /** Id of the rule this one replaced, if any. */
  supersedes?: string;
  /** Regulatory references and audit notes. */
  metadata?: Record<string, unknown>;
  createdAt: string;
  updatedAt: string;
  version: number;
}

/** Input for creating a rule. */
export interface CreateResidencyRuleInput {
  tenantId: string;
  jurisdiction: Jurisdiction;
  dataClassification: DataClassification;
  action: ResidencyAction;
  redirectTarget?: Jurisdiction;
  priority?: number;
  metadata?: Record<string, unknown>;
}

/** Default priority when none is given. */
export const DEFAULT_RULE_PRIORITY = 100;

/** A transient decision input. Not persisted. */
export interface DataAccessRequest {
  tenantId: string;
  jurisdiction: Jurisdiction;
  dataClassification: DataClassification;
  payloadRef: string;
}

export interface ResidencyDecision {
  /** null when no rule matched. */
  ruleId: string | null;
  action: DecisionAction;
  redirectTarget: Jurisdiction | null;
  evaluatedAt: string;
}

/** Total evaluation order: priority ascending, then id ascending. */
export function compareRules(a: ResidencyRule, b: ResidencyRule): number {
  if (a.priority !== b.priority) return a.priority - b.priority;
  if (a.id < b.id) return -1;
  if (a.id > b.id) return 1;
  return 0;
}

/** Whether a rule's classification covers the request's. */
export function classificationMatches(
  rule: DataClassification,
  request: DataClassification,
): boolean {
  return rule === DataClassification.All || rule === request;
}
