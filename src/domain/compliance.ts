/**
 * Compliance mapping domain model.
 *
 * Maps a jurisdiction's regulatory requirements to the deployment
 * configuration they imply.
 */

import { Jurisdiction } from './jurisdiction';

export enum ComplianceStatus {
  Compliant = 'compliant',
  NonCompliant = 'non_compliant',
  PendingReview = 'pending_review',
  Exempted = 'exempted',
}

export interface ComplianceMap {
  id: string;
  tenantId: string;
  jurisdiction: Jurisdiction;
  /** e.g. GDPR, PIPL, DPDP. */
  regulationName: string;
  regulationReference?: string;
  requirementCategories: string[];
  deploymentConfig: Record<string, unknown>;
  status: ComplianceStatus;
  verifiedBy?: string;
  lastVerifiedAt?: string;
  createdAt: string;
}

export interface CreateComplianceMapInput {
  tenantId: string;
  jurisdiction: Jurisdiction;
  regulationName: string;
  regulationReference?: string;
  requirementCategories?: string[];
  deploymentConfig?: Record<string, unknown>;
}
