// ============================================================================
// src/application/usecases/masters/GetMasterCabinetUseCase.ts
// ============================================================================

import { type MasterLookupDTO, MasterLookupSchema } from '@/application/dto/master.dto';
import type { Master } from '@/domain/entities/Master';
import type { ServiceRequest } from '@/domain/entities/ServiceRequest';
import type { IMasterRepository } from '@/domain/repositories/IMasterRepository';
import type { IOfferRepository, OfferCounts } from '@/domain/repositories/IOfferRepository';
import type { IServiceRequestRepository } from '@/domain/repositories/IServiceRequestRepository';
import { ENTITLEMENTS } from '@/shared/config/constants';
import { MasterNotFoundError } from '@/shared/errors/domain.errors';

const RECENT_ORDERS = 5;

export interface EntitlementStatus {
  readonly active: boolean;
  readonly until: Date | null;
}

export interface MasterCabinet {
  readonly master: Master;
  readonly subscription: EntitlementStatus;
  readonly priority: EntitlementStatus;
  readonly pin: EntitlementStatus;
  readonly freeOrdersLeft: number;
  readonly freeOrdersStart: number;
  readonly offers: OfferCounts;
  readonly recentOrders: ReadonlyArray<ServiceRequest>;
}

export class GetMasterCabinetUseCase {
  public constructor(
    private readonly masterRepo: IMasterRepository,
    private readonly offerRepo: IOfferRepository,
    private readonly requestRepo: IServiceRequestRepository,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  public async execute(dto: MasterLookupDTO): Promise<MasterCabinet> {
    const { userId } = MasterLookupSchema.parse(dto);

    const master = await this.masterRepo.findByUserId(userId);
    if (!master) {
      throw new MasterNotFoundError(userId);
    }

    const now = this.clock();
    const [offers, recentOrders] = await Promise.all([
      this.offerRepo.countByMaster(master.id),
      this.requestRepo.listByMaster(master.id, RECENT_ORDERS),
    ]);

    return {
      master,
      subscription: { active: master.hasActiveSubscription(now), until: master.subUntil },
      priority: { active: master.hasActivePriority(now), until: master.priorityUntil },
      pin: { active: master.hasActivePin(now), until: master.pinUntil },
      freeOrdersLeft: master.freeOrdersLeft,
      freeOrdersStart: ENTITLEMENTS.freeOrdersStart,
      offers,
      recentOrders,
    };
  }
}
