// ============================================================================
// src/application/usecases/complaints/FileComplaintUseCase.ts
// ============================================================================

import type { Logger } from 'pino';

import { type FileComplaintDTO, FileComplaintSchema } from '@/application/dto/complaint.dto';
import type { MarketplaceNotifier } from '@/application/ports/MarketplaceNotifier';
import type { RateLimitPolicy } from '@/application/ports/RateLimitPolicy';
import { enforceRateLimit } from '@/application/services/rateLimit';
import type { Complaint } from '@/domain/entities/Complaint';
import type { IComplaintRepository } from '@/domain/repositories/IComplaintRepository';
import { RATE_LIMITS } from '@/shared/config/constants';

export class FileComplaintUseCase {
  public constructor(
    private readonly complaintRepo: IComplaintRepository,
    private readonly rateLimiter: RateLimitPolicy,
    private readonly notifier: MarketplaceNotifier,
    private readonly logger: Logger,
  ) {}

  public async execute(dto: FileComplaintDTO): Promise<Complaint> {
    const payload = FileComplaintSchema.parse(dto);
    enforceRateLimit(this.rateLimiter, RATE_LIMITS.complaint, payload.reporterUserId);

    const complaint = await this.complaintRepo.create({
      reporterUserId: payload.reporterUserId,
      reporterRole: payload.role,
      requestId: payload.requestId,
      masterId: payload.masterId,
      text: payload.text,
    });

    this.logger.info(
      { complaintId: complaint.id, reporterUserId: complaint.reporterUserId, requestId: complaint.requestId },
      'Жалоба принята.',
    );

    const outcome = await this.notifier.notifyAdmin({ kind: 'complaint_filed', complaint });
    if (outcome !== 'delivered') {
      this.logger.warn({ complaintId: complaint.id, outcome }, 'Администратор не получил жалобу.');
    }

    return complaint;
  }
}
