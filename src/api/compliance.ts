/**
 * Compliance mapping API routes.
 *
 * POST /compliance — Create a mapping
 * GET /compliance/:jurisdiction — Mappings for a jurisdiction
 * POST /compliance/:mappingId/verify — Record a verification outcome
 */

import { Router } from 'express';
import { ComplianceService } from '../services/compliance-service';
import { CreateMappingSchema, VerifyMappingSchema } from './schemas';
import { TenantRequest, parseWith, sendError, tenantOf } from './middleware';

export function createComplianceRoutes(compliance: ComplianceService): Router {
  const router = Router();

  router.post('/', async (req: TenantRequest, res) => {
    try {
      const body = parseWith(CreateMappingSchema, req.body);
      const mapping = await compliance.createMapping({ tenantId: tenantOf(req), ...body });
      res.status(201).json({ mapping });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/:jurisdiction', async (req: TenantRequest, res) => {
    try {
      const mappings = await compliance.getMappings(tenantOf(req), req.params.jurisdiction);
      res.json({ jurisdiction: req.params.jurisdiction, mappings, total: mappings.length });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.post('/:mappingId/verify', async (req: TenantRequest, res) => {
    try {
      const body = parseWith(VerifyMappingSchema, req.body);
      const mapping = await compliance.verify(tenantOf(req), req.params.mappingId, body.status, body.verifiedBy);
      res.json({ mapping });
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
