// ============================================================================
// src/domain/repositories/IComplaintRepository.ts
// ============================================================================

import type { Complaint } from '@/domain/entities/Complaint';
import type { Transactional } from '@/domain/repositories/transaction';
import type { ComplaintRole } from '@/domain/value-objects/ComplaintRole';

export interface NewComplaint {
  readonly reporterUserId: string;
  readonly reporterRole: ComplaintRole;
  readonly requestId: number | null;
  readonly masterId: number | null;
  readonly text: string;
}

export interface IComplaintRepository extends Transactional<IComplaintRepository> {
  create(data: NewComplaint): Promise<Complaint>;
  count(): Promise<number>;
}
