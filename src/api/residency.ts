/**
 * Residency API routes.
 *
 * POST /residency/rules — Create a residency rule
 * GET /residency/rules — List rules
 * POST /residency/rules/:ruleId/deactivate — Soft-deactivate a rule
 * POST /residency/rules/:ruleId/replace — Replace a rule with a successor
 * POST /residency/enforce — Evaluate a data-access request
 * GET /residency/status — Rule summary for a jurisdiction
 */

import { Router } from 'express';
import { SovereignConfig } from '../config';
import { ResidencyService } from '../services/residency-service';
import {
  CreateRuleSchema,
  EnforceSchema,
  ListRulesQuerySchema,
  ReplaceRuleSchema,
  StatusQuerySchema,
} from './schemas';
import { TenantRequest, correlationIdOf, parseWith, sendError, tenantOf } from './middleware';

export function createResidencyRoutes(residency: ResidencyService, config: SovereignConfig): Router {
  const router = Router();

  router.post('/rules', async (req: TenantRequest, res) => {
    try {
      const body = parseWith(CreateRuleSchema, req.body);
      const rule = await residency.createRule({ tenantId: tenantOf(req), ...body });
      res.status(201).json({ rule });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/rules', async (req: TenantRequest, res) => {
    try {
      const query = parseWith(ListRulesQuerySchema, req.query);
      const rules = await residency.listRules(tenantOf(req), query);
      res.json({ rules, total: rules.length });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.post('/rules/:ruleId/deactivate', async (req: TenantRequest, res) => {
    try {
      const rule = await residency.deactivateRule(tenantOf(req), req.params.ruleId);
      res.json({ rule });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.post('/rules/:ruleId/replace', async (req: TenantRequest, res) => {
    try {
      const changes = parseWith(ReplaceRuleSchema, req.body);
      const result = await residency.replaceRule(tenantOf(req), req.params.ruleId, changes);
      res.status(201).json(result);
    } catch (err) {
      sendError(res, err);
    }
  });

  /**
   * POST /residency/enforce
   * The decision is audited before it is returned.
   */
  router.post('/enforce', async (req: TenantRequest, res) => {
    try {
      const body = parseWith(EnforceSchema, req.body);
      const result = await residency.enforce(
        {
          tenantId: tenantOf(req),
          jurisdiction: body.jurisdiction ?? config.defaultJurisdiction,
          dataClassification: body.dataClassification,
          payloadRef: body.payloadRef,
        },
        correlationIdOf(req),
      );
      res.json(result);
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/status', async (req: TenantRequest, res) => {
    try {
      const query = parseWith(StatusQuerySchema, req.query);
      const status = await residency.getResidencyStatus(
        tenantOf(req),
        query.jurisdiction ?? config.defaultJurisdiction,
      );
      res.json({ status });
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
