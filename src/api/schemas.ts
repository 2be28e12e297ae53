/**
 * Request schemas for the HTTP API.
 *
 * Shape and type checks only. Domain rules (jurisdiction format, redirect
 * pairing, strict policies without fallbacks) are enforced by the services
 * so every entry point shares them.
 */

import { z } from 'zod';
import { DataClassification } from '../domain/jurisdiction';
import { ResidencyAction } from '../domain/residency';
import { DeploymentStatus } from '../domain/deployment';
import { RoutingStrategy } from '../domain/routing';
import { ModelApprovalStatus } from '../domain/sovereign-model';
import { ComplianceStatus } from '../domain/compliance';

const Jurisdiction = z.string().min(1);

const Pagination = {
  limit: z.coerce.number().int().min(1).max(1000).optional(),
  offset: z.coerce.number().int().min(0).optional(),
};

// ============================================
// Residency
// ============================================

export const CreateRuleSchema = z.object({
  jurisdiction: Jurisdiction,
  dataClassification: z.nativeEnum(DataClassification),
  action: z.nativeEnum(ResidencyAction),
  redirectTarget: z.string().min(1).optional(),
  priority: z.number().int().optional(),
  metadata: z.record(z.unknown()).optional(),
});

export const ReplaceRuleSchema = CreateRuleSchema.partial();

export const ListRulesQuerySchema = z.object({
  jurisdiction: Jurisdiction.optional(),
  includeInactive: z
    .enum(['true', 'false'])
    .optional()
    .transform((v) => v === 'true'),
  ...Pagination,
});

export const EnforceSchema = z.object({
  jurisdiction: Jurisdiction.optional(),
  dataClassification: z.nativeEnum(DataClassification),
  payloadRef: z.string().min(1),
});

export const StatusQuerySchema = z.object({
  jurisdiction: Jurisdiction.optional(),
});

// ============================================
// Deployments
// ============================================

export const CreateDeploymentSchema = z.object({
  jurisdiction: Jurisdiction,
  region: z.string().min(1),
  namespace: z.string().min(1).optional(),
  clusterName: z.string().min(1),
});

export const ListDeploymentsQuerySchema = z.object({
  jurisdiction: Jurisdiction.optional(),
  ...Pagination,
});

export const TransitionDeploymentSchema = z.object({
  status: z.nativeEnum(DeploymentStatus),
  endpointUrl: z.string().url().optional(),
});

export const HealthCheckSchema = z.object({
  healthy: z.boolean(),
});

// ============================================
// Routing
// ============================================

export const CreatePolicySchema = z.object({
  name: z.string().min(1),
  jurisdiction: Jurisdiction,
  strategy: z.nativeEnum(RoutingStrategy),
  primaryDeploymentId: z.string().min(1),
  fallbackDeploymentIds: z.array(z.string().min(1)).optional(),
  priority: z.number().int().optional(),
});

export const JurisdictionQuerySchema = z.object({
  jurisdiction: Jurisdiction.optional(),
});

export const RouteSchema = z.object({
  jurisdiction: Jurisdiction.optional(),
  modelRef: z.string().min(1),
});

export const GatewayRequestSchema = z.object({
  jurisdiction: Jurisdiction.optional(),
  dataClassification: z.nativeEnum(DataClassification),
  payloadRef: z.string().min(1),
  modelRef: z.string().min(1),
});

// ============================================
// Models
// ============================================

export const RegisterModelSchema = z.object({
  modelRef: z.string().min(1),
  modelName: z.string().min(1),
  modelVersion: z.string().min(1).optional(),
  jurisdiction: Jurisdiction,
});

export const TransitionModelSchema = z.object({
  modelRef: z.string().min(1),
  jurisdiction: Jurisdiction,
  status: z.nativeEnum(ModelApprovalStatus),
  actor: z.string().min(1).optional(),
});

// ============================================
// Compliance
// ============================================

export const CreateMappingSchema = z.object({
  jurisdiction: Jurisdiction,
  regulationName: z.string().min(1),
  regulationReference: z.string().optional(),
  requirementCategories: z.array(z.string().min(1)).optional(),
  deploymentConfig: z.record(z.unknown()).optional(),
});

export const VerifyMappingSchema = z.object({
  status: z.nativeEnum(ComplianceStatus),
  verifiedBy: z.string().min(1).optional(),
});

// ============================================
// Audit and events
// ============================================

export const AuditQuerySchema = z.object({
  kind: z.enum(['residency', 'routing']).optional(),
  jurisdiction: Jurisdiction.optional(),
  ...Pagination,
});

export const EventsQuerySchema = z.object({
  ...Pagination,
});

export const RelaySchema = z.object({
  batchSize: z.number().int().min(1).max(1000).optional(),
});
