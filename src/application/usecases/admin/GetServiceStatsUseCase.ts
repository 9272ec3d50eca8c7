// ============================================================================
// src/application/usecases/admin/GetServiceStatsUseCase.ts
// ============================================================================

import type { IComplaintRepository } from '@/domain/repositories/IComplaintRepository';
import type { IMasterRepository, MasterStats } from '@/domain/repositories/IMasterRepository';
import type { IReviewRepository } from '@/domain/repositories/IReviewRepository';
import type { IServiceRequestRepository, RequestCounts } from '@/domain/repositories/IServiceRequestRepository';

export interface ServiceStats {
  readonly masters: MasterStats;
  readonly requests: RequestCounts;
  readonly reviews: number;
  readonly complaints: number;
}

export class GetServiceStatsUseCase {
  public constructor(
    private readonly masterRepo: IMasterRepository,
    private readonly requestRepo: IServiceRequestRepository,
    private readonly reviewRepo: IReviewRepository,
    private readonly complaintRepo: IComplaintRepository,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  public async execute(): Promise<ServiceStats> {
    const [masters, requests, reviews, complaints] = await Promise.all([
      this.masterRepo.getStats(this.clock()),
      this.requestRepo.countByStatus(),
      this.reviewRepo.count(),
      this.complaintRepo.count(),
    ]);

    return { masters, requests, reviews, complaints };
  }
}
