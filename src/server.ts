/**
 * Express server configuration.
 *
 * Assembles the policy core, its services and the API surface with
 * dependency injection.
 */

import express from 'express';
import { SovereignConfig, createConfig } from './config';
import { Store } from './storage/store';
import { createMemoryStore } from './storage/memory-store';
import { EventSink, OutboxEventPublisher } from './data-plane/publisher';
import { DecisionAuditor } from './audit/decision-auditor';
import { Clock, RuleEngine } from './engine/rule-engine';
import { ApprovalRegistry } from './engine/approval-registry';
import { DeploymentHealthView, StoreDeploymentHealthView } from './engine/health-view';
import { RoutingResolver } from './engine/routing-resolver';
import { ResidencyService } from './services/residency-service';
import { DeploymentService } from './services/deployment-service';
import { RoutingService } from './services/routing-service';
import { ModelRegistryService } from './services/model-registry-service';
import { ComplianceService } from './services/compliance-service';
import { SovereigntyGateway } from './services/sovereignty-gateway';
import { errorHandler, tenantMiddleware } from './api/middleware';
import { createResidencyRoutes } from './api/residency';
import { createDeploymentRoutes } from './api/deployments';
import { createRoutingRoutes } from './api/routing';
import { createModelRoutes } from './api/models';
import { createComplianceRoutes } from './api/compliance';
import { createAuditRoutes } from './api/audit';
import { createGatewayRoutes } from './api/gateway';

export const VERSION = '0.1.0';

const startTime = Date.now();

/** Application context containing all services. */
export interface AppContext {
  config: SovereignConfig;
  store: Store;
  publisher: OutboxEventPublisher;
  auditor: DecisionAuditor;
  engine: RuleEngine;
  approvals: ApprovalRegistry;
  resolver: RoutingResolver;
  residency: ResidencyService;
  deployments: DeploymentService;
  routing: RoutingService;
  models: ModelRegistryService;
  compliance: ComplianceService;
  gateway: SovereigntyGateway;
}

export interface AppContextOptions {
  config?: SovereignConfig;
  store?: Store;
  sink?: EventSink;
  clock?: Clock;
  health?: DeploymentHealthView;
}

/** Create the application context with all services. */
export function createAppContext(options: AppContextOptions = {}): AppContext {
  const config = options.config ?? createConfig();
  const store = options.store ?? createMemoryStore({ maxRulesPerTenant: config.maxResidencyRulesPerTenant });
  const retry = {
    conflictRetryAttempts: config.conflictRetryAttempts,
    conflictRetryBaseMs: config.conflictRetryBaseMs,
  };

  const publisher = new OutboxEventPublisher(store.outbox, options.sink);
  const auditor = new DecisionAuditor(store, publisher);
  const engine = new RuleEngine(store.rules, options.clock);
  const approvals = new ApprovalRegistry(store.models, retry);
  const resolver = new RoutingResolver(options.health ?? new StoreDeploymentHealthView(store.deployments), approvals);

  const residency = new ResidencyService(store, engine, auditor, publisher, retry);
  const deployments = new DeploymentService(store, publisher, {
    ...retry,
    supportedRegions: config.supportedRegions,
  });
  const routing = new RoutingService(store, resolver, auditor);
  const models = new ModelRegistryService(store, approvals, publisher);
  const compliance = new ComplianceService(store, publisher, { cacheTtlSeconds: config.complianceCacheTtlSeconds });
  const gateway = new SovereigntyGateway(residency, routing);

  return {
    config,
    store,
    publisher,
    auditor,
    engine,
    approvals,
    resolver,
    residency,
    deployments,
    routing,
    models,
    compliance,
    gateway,
  };
}

/** Create and configure the Express application. */
export function createApp(context?: AppContext): express.Application {
  const ctx = context ?? createAppContext();
  const app = express();

  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      version: VERSION,
      uptimeMs: Date.now() - startTime,
      storage: 'memory',
      defaultJurisdiction: ctx.config.defaultJurisdiction,
    });
  });

  // Versioned API routes — /api/v1 prefix, tenant required
  const v1 = express.Router();
  v1.use(tenantMiddleware());
  v1.use('/residency', createResidencyRoutes(ctx.residency, ctx.config));
  v1.use('/deployments', createDeploymentRoutes(ctx.deployments));
  v1.use('/routing', createRoutingRoutes(ctx.routing, ctx.config));
  v1.use('/models', createModelRoutes(ctx.models));
  v1.use('/compliance', createComplianceRoutes(ctx.compliance));
  v1.use('/gateway', createGatewayRoutes(ctx.gateway, ctx.config));
  v1.use('/', createAuditRoutes(ctx.auditor, ctx.store, ctx.publisher));
  app.use('/api/v1', v1);

  app.use(errorHandler);

  return app;
}
