/**
 * Sovereign model domain model.
 *
 * A sovereign model registration records whether a model (referenced by an
 * opaque registry id) may serve traffic inside one jurisdiction.
 */

import { Jurisdiction } from './jurisdiction';

/** Approval lifecycle states. */
export enum ModelApprovalStatus {
  Pending = 'pending',
  Approved = 'approved',
  Rejected = 'rejected',
  Revoked = 'revoked',
}

/**
 * Valid approval transitions. Revoked is reachable only from Approved, so a
 * rejected model can never be revoked.
 */
export const VALID_APPROVAL_TRANSITIONS: Record<ModelApprovalStatus, ModelApprovalStatus[]> = {
  [ModelApprovalStatus.Pending]: [ModelApprovalStatus.Approved, ModelApprovalStatus.Rejected],
  [ModelApprovalStatus.Approved]: [ModelApprovalStatus.Revoked],
  [ModelApprovalStatus.Rejected]: [],
  [ModelApprovalStatus.Revoked]: [],
};

export interface SovereignModel {
  id: string;
  tenantId: string;
  /** Cross-service reference, opaque to the core. */
  modelRef: string;
  modelName: string;
  modelVersion: string;
  jurisdiction: Jurisdiction;
  status: ModelApprovalStatus;
  approvedBy?: string;
  approvedAt?: string;
  createdAt: string;
  updatedAt: string;
  version: number;
}

export interface RegisterModelInput {
  tenantId: string;
  modelRef: string;
  modelName: string;
  modelVersion?: string;
  jurisdiction: Jurisdiction;
}
