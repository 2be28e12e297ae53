/**
 * Sovereignty Gateway.
 *
 * Single entry point for an inbound inference request: residency first,
 * then routing in whichever jurisdiction the residency decision leaves the
 * request in. A blocked request is never routed. Redirects are single-hop:
 * the target jurisdiction's residency rules are not evaluated again.
 */

import { DataAccessRequest, ResidencyAction, ResidencyDecision } from '../domain/residency';
import { Jurisdiction } from '../domain/jurisdiction';
import { ResidencyService } from './residency-service';
import { RoutingOutcome, RoutingService } from './routing-service';
import { logger } from '../logger';

const log = logger.child({ component: 'gateway' });

export interface GatewayResult {
  residency: ResidencyDecision;
  residencyAuditId: string;
  /** Jurisdiction the request was routed in, after any redirect. */
  effectiveJurisdiction: Jurisdiction;
  /** null when residency blocked the request. */
  routing: RoutingOutcome | null;
}

export class SovereigntyGateway {
  constructor(
    private residency: ResidencyService,
    private routing: RoutingService,
  ) {}

  async handle(request: DataAccessRequest, modelRef: string, correlationId?: string): Promise<GatewayResult> {
    const { decision, auditId } = await this.residency.enforce(request, correlationId);

    if (decision.action === ResidencyAction.Block) {
      log.info('Request blocked by residency', {
        tenantId: request.tenantId,
        jurisdiction: request.jurisdiction,
        ruleId: decision.ruleId,
      });
      return {
        residency: decision,
        residencyAuditId: auditId,
        effectiveJurisdiction: request.jurisdiction,
        routing: null,
      };
    }

    const effectiveJurisdiction =
      decision.action === ResidencyAction.Redirect && decision.redirectTarget
        ? decision.redirectTarget
        : request.jurisdiction;

    const routing = await this.routing.route(request.tenantId, effectiveJurisdiction, modelRef, correlationId);
    return { residency: decision, residencyAuditId: auditId, effectiveJurisdiction, routing };
  }
}
