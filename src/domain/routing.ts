/**
 * Routing policy domain model.
 */

import { Jurisdiction } from './jurisdiction';

/** Routing strategies. `fallback` behaves exactly like `preferred`. */
export enum RoutingStrategy {
  Strict = 'strict',
  Preferred = 'preferred',
  Fallback = 'fallback',
}

export interface RoutingPolicy {
  id: string;
  tenantId: string;
  name: string;
  jurisdiction: Jurisdiction;
  strategy: RoutingStrategy;
  primaryDeploymentId: string;
  /** Tried in declared order. Ignored for strict policies. */
  fallbackDeploymentIds: string[];
  /** Lower wins when several active policies cover a jurisdiction. */
  priority: number;
  active: boolean;
  createdAt: string;
}

export interface CreateRoutingPolicyInput {
  tenantId: string;
  name: string;
  jurisdiction: Jurisdiction;
  strategy: RoutingStrategy;
  primaryDeploymentId: string;
  fallbackDeploymentIds?: string[];
  priority?: number;
}

export const ROUTING_REASON_PRIMARY = 'primary';
export const ROUTING_REASON_NO_COMPLIANT = 'no_compliant_deployment';

export function fallbackReason(index: number): string {
  return `fallback:${index}`;
}

export interface RoutingDecision {
  jurisdiction: Jurisdiction;
  /** null only when nothing qualifies: a hard routing failure. */
  selectedDeploymentId: string | null;
  strategyUsed: RoutingStrategy;
  reason: string;
}

/** Whether a strategy may fall back past its primary. */
export function allowsFallback(strategy: RoutingStrategy): boolean {
  return strategy === RoutingStrategy.Preferred || strategy === RoutingStrategy.Fallback;
}
