/**
 * Sovereign model API routes.
 *
 * POST /models — Register a model for a jurisdiction
 * GET /models — List registrations
 * POST /models/transition — Approve, reject or revoke a registration
 */

import { Router } from 'express';
import { ModelRegistryService } from '../services/model-registry-service';
import { JurisdictionQuerySchema, RegisterModelSchema, TransitionModelSchema } from './schemas';
import { TenantRequest, parseWith, sendError, tenantOf } from './middleware';

export function createModelRoutes(models: ModelRegistryService): Router {
  const router = Router();

  router.post('/', async (req: TenantRequest, res) => {
    try {
      const body = parseWith(RegisterModelSchema, req.body);
      const model = await models.register({ tenantId: tenantOf(req), ...body });
      res.status(201).json({ model });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/', async (req: TenantRequest, res) => {
    try {
      const query = parseWith(JurisdictionQuerySchema, req.query);
      const items = await models.list(tenantOf(req), query.jurisdiction);
      res.json({ models: items, total: items.length });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.post('/transition', async (req: TenantRequest, res) => {
    try {
      const body = parseWith(TransitionModelSchema, req.body);
      const model = await models.transition(tenantOf(req), body.modelRef, body.jurisdiction, body.status, body.actor);
      res.json({ model });
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
