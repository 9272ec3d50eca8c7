// ============================================================================
// src/application/usecases/billing/GrantEntitlementUseCase.ts
// ============================================================================

import type { Logger } from 'pino';

import { type GrantEntitlementDTO, GrantEntitlementSchema } from '@/application/dto/payment.dto';
import type { MarketplaceNotifier } from '@/application/ports/MarketplaceNotifier';
import type { IMasterRepository } from '@/domain/repositories/IMasterRepository';
import {
  ENTITLEMENT_PRODUCTS,
  type EntitlementKind,
  grantExpiry,
  isPaymentPayload,
  type PaymentPayload,
} from '@/domain/value-objects/Entitlement';
import { MasterNotFoundError, UnknownPaymentPayloadError } from '@/shared/errors/domain.errors';

export interface GrantEntitlementResult {
  readonly masterId: number;
  readonly payload: PaymentPayload;
  readonly kind: EntitlementKind;
  readonly until: Date;
}

/** Applies a confirmed payment to the master profile. */
export class GrantEntitlementUseCase {
  public constructor(
    private readonly masterRepo: IMasterRepository,
    private readonly notifier: MarketplaceNotifier,
    private readonly logger: Logger,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  public async execute(dto: GrantEntitlementDTO): Promise<GrantEntitlementResult> {
    const payload = GrantEntitlementSchema.parse(dto);

    if (!isPaymentPayload(payload.payload)) {
      throw new UnknownPaymentPayloadError(payload.payload);
    }

    const master = await this.masterRepo.findByUserId(payload.masterUserId);
    if (!master) {
      throw new MasterNotFoundError(payload.masterUserId);
    }

    const product = ENTITLEMENT_PRODUCTS[payload.payload];
    const until = grantExpiry(product, this.clock());

    await this.masterRepo.setEntitlement(master.id, product.kind, until);

    this.logger.info(
      { masterId: master.id, payload: product.payload, until: until.toISOString(), chargeId: payload.providerChargeId },
      'Платная опция активирована.',
    );

    const outcome = await this.notifier.notifyAdmin({
      kind: 'entitlement_granted',
      master,
      payload: product.payload,
      until,
      providerChargeId: payload.providerChargeId,
    });
    if (outcome !== 'delivered') {
      this.logger.warn({ masterId: master.id, outcome }, 'Администратор не получил уведомление об оплате.');
    }

    return { masterId: master.id, payload: product.payload, kind: product.kind, until };
  }
}
