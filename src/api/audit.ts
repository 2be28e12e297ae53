/**
 * Audit and event API routes.
 *
 * GET /audit — Decision audit records for the tenant
 * GET /events — Outbox entries for the tenant (with pagination metadata)
 * POST /events/relay — Run one outbox relay pass
 */

import { Router } from 'express';
import { Store, toListResult } from '../storage/store';
import { DecisionAuditor } from '../audit/decision-auditor';
import { OutboxEventPublisher } from '../data-plane/publisher';
import { AuditQuerySchema, EventsQuerySchema, RelaySchema } from './schemas';
import { TenantRequest, parseWith, sendError, tenantOf } from './middleware';

export function createAuditRoutes(auditor: DecisionAuditor, store: Store, publisher: OutboxEventPublisher): Router {
  const router = Router();

  router.get('/audit', async (req: TenantRequest, res) => {
    try {
      const query = parseWith(AuditQuerySchema, req.query);
      const records = await auditor.query({ tenantId: tenantOf(req), ...query });
      res.json({ records, total: records.length });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/events', async (req: TenantRequest, res) => {
    try {
      const query = parseWith(EventsQuerySchema, req.query);
      const all = await store.outbox.listByTenant(tenantOf(req), { limit: Number.MAX_SAFE_INTEGER });
      const limit = query.limit ?? 100;
      const offset = query.offset ?? 0;
      res.json(toListResult(all.slice(offset, offset + limit), all.length, { limit, offset }));
    } catch (err) {
      sendError(res, err);
    }
  });

  /**
   * POST /events/relay
   * Relays pending entries of every tenant; the header only authenticates.
   */
  router.post('/events/relay', async (req: TenantRequest, res) => {
    try {
      tenantOf(req);
      const body = parseWith(RelaySchema, req.body ?? {});
      const result = await publisher.relay(body.batchSize);
      res.json(result);
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
