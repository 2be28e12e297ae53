/**
 * Gateway API route.
 *
 * POST /gateway/requests — Residency check followed by routing
 */

import { Router } from 'express';
import { SovereignConfig } from '../config';
import { apiError, noCompliantTargetError } from '../domain/errors';
import { SovereigntyGateway } from '../services/sovereignty-gateway';
import { GatewayRequestSchema } from './schemas';
import { TenantRequest, correlationIdOf, parseWith, sendError, tenantOf } from './middleware';

export function createGatewayRoutes(gateway: SovereigntyGateway, config: SovereignConfig): Router {
  const router = Router();

  router.post('/requests', async (req: TenantRequest, res) => {
    try {
      const body = parseWith(GatewayRequestSchema, req.body);
      const result = await gateway.handle(
        {
          tenantId: tenantOf(req),
          jurisdiction: body.jurisdiction ?? config.defaultJurisdiction,
          dataClassification: body.dataClassification,
          payloadRef: body.payloadRef,
        },
        body.modelRef,
        correlationIdOf(req),
      );

      const routed = result.routing?.decision;
      if (routed && routed.selectedDeploymentId === null) {
        res.status(422).json({
          ...apiError(noCompliantTargetError(routed.jurisdiction, routed.strategyUsed)),
          ...result,
        });
        return;
      }
      res.json(result);
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
