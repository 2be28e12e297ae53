/**
 * Routing API routes.
 *
 * POST /routing/policies — Create a routing policy
 * GET /routing/policies — List policies
 * POST /routing/route — Resolve and audit a routing decision
 */

import { Router } from 'express';
import { SovereignConfig } from '../config';
import { apiError, noCompliantTargetError } from '../domain/errors';
import { RoutingService } from '../services/routing-service';
import { CreatePolicySchema, JurisdictionQuerySchema, RouteSchema } from './schemas';
import { TenantRequest, correlationIdOf, parseWith, sendError, tenantOf } from './middleware';

export function createRoutingRoutes(routing: RoutingService, config: SovereignConfig): Router {
  const router = Router();

  router.post('/policies', async (req: TenantRequest, res) => {
    try {
      const body = parseWith(CreatePolicySchema, req.body);
      const policy = await routing.createPolicy({ tenantId: tenantOf(req), ...body });
      res.status(201).json({ policy });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/policies', async (req: TenantRequest, res) => {
    try {
      const query = parseWith(JurisdictionQuerySchema, req.query);
      const policies = await routing.listPolicies(tenantOf(req), query.jurisdiction);
      res.json({ policies, total: policies.length });
    } catch (err) {
      sendError(res, err);
    }
  });

  /**
   * POST /routing/route
   * A decision with no selected deployment is still audited; it answers 422
   * with the decision next to the typed error.
   */
  router.post('/route', async (req: TenantRequest, res) => {
    try {
      const body = parseWith(RouteSchema, req.body);
      const outcome = await routing.route(
        tenantOf(req),
        body.jurisdiction ?? config.defaultJurisdiction,
        body.modelRef,
        correlationIdOf(req),
      );

      if (outcome.decision.selectedDeploymentId === null) {
        res.status(422).json({
          ...apiError(noCompliantTargetError(outcome.decision.jurisdiction, outcome.decision.strategyUsed)),
          ...outcome,
        });
        return;
      }
      res.json(outcome);
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
