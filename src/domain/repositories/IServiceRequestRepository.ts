// ============================================================================
// src/domain/repositories/IServiceRequestRepository.ts
// ============================================================================

import type { ServiceRequest } from '@/domain/entities/ServiceRequest';
import type { Transactional } from '@/domain/repositories/transaction';
import type { RequestStatus } from '@/domain/value-objects/RequestStatus';

export interface NewServiceRequest {
  readonly clientUserId: string;
  readonly clientName: string;
  readonly contact: string;
  readonly category: string;
  readonly address: string;
  readonly description: string;
  readonly desiredTime: string;
}

export interface RequestCounts {
  readonly total: number;
  readonly byStatus: Readonly<Record<RequestStatus, number>>;
}

export interface IServiceRequestRepository extends Transactional<IServiceRequestRepository> {
  create(data: NewServiceRequest): Promise<ServiceRequest>;
  findById(id: number): Promise<ServiceRequest | null>;
  /** Compare-and-set `new → assigned`. Resolves `false` when another claim got there first. */
  assignIfNew(requestId: number, masterId: number): Promise<boolean>;
  /**
   * Compare-and-set of the status column. Entering `pending_confirmation` stamps
   * `pending_since`; entering `completed` stamps `completed_at`; going back to
   * `assigned` clears `pending_since`.
   */
  transitionStatus(requestId: number, from: RequestStatus, to: RequestStatus, at: Date): Promise<boolean>;
  /** Sets the one-shot review flag. Resolves `true` only for the caller that flipped it. */
  markReviewRequested(requestId: number): Promise<boolean>;
  listPendingConfirmationSince(cutoff: Date): Promise<ServiceRequest[]>;
  listByMaster(masterId: number, limit: number): Promise<ServiceRequest[]>;
  /** Newest first. */
  listByClient(clientUserId: string, limit: number): Promise<ServiceRequest[]>;
  countByStatus(): Promise<RequestCounts>;
}
