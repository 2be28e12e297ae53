/**
 * Sovereign Policy Core
 *
 * Data-residency enforcement and jurisdiction-aware inference routing for
 * a multi-tenant AI platform. Running this module starts the HTTP server;
 * importing it exposes the library surface.
 */

import { createApp, createAppContext } from './server';
import { loadConfigFromEnv, validateConfig } from './config';
import { logger, setLogLevel } from './logger';

export function main(): void {
  const config = loadConfigFromEnv();
  const validation = validateConfig(config);
  if (!validation.valid) {
    logger.error('Invalid configuration', { errors: validation.errors });
    process.exitCode = 1;
    return;
  }

  setLogLevel(config.logLevel);
  const app = createApp(createAppContext({ config }));
  app.listen(config.port, () => {
    logger.info('Sovereign policy core listening', {
      port: config.port,
      defaultJurisdiction: config.defaultJurisdiction,
    });
  });
}

if (require.main === module) {
  main();
}

// Public exports for programmatic use
export { createApp, createAppContext, AppContext, AppContextOptions } from './server';
export * from './config';
export * from './logger';
export * from './domain';
export * from './storage/store';
export * from './storage/memory-store';
export * from './engine/rule-engine';
export * from './engine/approval-registry';
export * from './engine/health-view';
export * from './engine/routing-resolver';
export * from './engine/state-machine';
export * from './engine/conflict-retry';
export * from './data-plane/publisher';
export * from './audit/decision-auditor';
export * from './cache/ttl-cache';
export * from './services/residency-service';
export * from './services/deployment-service';
export * from './services/routing-service';
export * from './services/model-registry-service';
export * from './services/compliance-service';
export * from './services/sovereignty-gateway';
