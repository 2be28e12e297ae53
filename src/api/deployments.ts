/**
 * Deployment API routes.
 *
 * POST /deployments — Initiate a regional deployment
 * GET /deployments — List deployments
 * GET /deployments/:deploymentId — Fetch one deployment
 * POST /deployments/:deploymentId/transition — Move to another lifecycle status
 * POST /deployments/:deploymentId/health — Record a health check result
 */

import { Router } from 'express';
import { DeploymentService } from '../services/deployment-service';
import {
  CreateDeploymentSchema,
  HealthCheckSchema,
  ListDeploymentsQuerySchema,
  TransitionDeploymentSchema,
} from './schemas';
import { TenantRequest, parseWith, sendError, tenantOf } from './middleware';

export function createDeploymentRoutes(deployments: DeploymentService): Router {
  const router = Router();

  router.post('/', async (req: TenantRequest, res) => {
    try {
      const body = parseWith(CreateDeploymentSchema, req.body);
      const deployment = await deployments.deploy({ tenantId: tenantOf(req), ...body });
      res.status(201).json({ deployment });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/', async (req: TenantRequest, res) => {
    try {
      const query = parseWith(ListDeploymentsQuerySchema, req.query);
      const items = await deployments.list(tenantOf(req), query);
      res.json({ deployments: items, total: items.length });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/:deploymentId', async (req: TenantRequest, res) => {
    try {
      const deployment = await deployments.get(tenantOf(req), req.params.deploymentId);
      res.json({ deployment });
    } catch (err) {
      sendError(res, err);
    }
  });

  /**
   * POST /deployments/:deploymentId/transition
   * Illegal transitions answer 409 and leave the deployment unchanged.
   */
  router.post('/:deploymentId/transition', async (req: TenantRequest, res) => {
    try {
      const body = parseWith(TransitionDeploymentSchema, req.body);
      const deployment = await deployments.transition(tenantOf(req), req.params.deploymentId, body.status, {
        endpointUrl: body.endpointUrl,
      });
      res.json({ deployment });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.post('/:deploymentId/health', async (req: TenantRequest, res) => {
    try {
      const body = parseWith(HealthCheckSchema, req.body);
      const deployment = await deployments.recordHealthCheck(tenantOf(req), req.params.deploymentId, body.healthy);
      res.json({ deployment });
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
