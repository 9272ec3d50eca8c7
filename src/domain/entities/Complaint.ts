// ============================================================================
// src/domain/entities/Complaint.ts
// ============================================================================

import type { ComplaintRole } from '@/domain/value-objects/ComplaintRole';

/** Free-form report sent to the administrator. Order and master references are optional hints. */
export class Complaint {
  public constructor(
    public readonly id: number,
    public readonly reporterUserId: string,
    public readonly reporterRole: ComplaintRole,
    public readonly requestId: number | null,
    public readonly masterId: number | null,
    public readonly text: string,
    public readonly createdAt: Date,
  ) {}
}
