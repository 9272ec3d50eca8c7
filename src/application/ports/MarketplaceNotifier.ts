// ============================================================================
// src/application/ports/MarketplaceNotifier.ts
// ============================================================================

import type { Complaint } from '@/domain/entities/Complaint';
import type { Master } from '@/domain/entities/Master';
import type { ServiceRequest } from '@/domain/entities/ServiceRequest';
import type { PaymentPayload } from '@/domain/value-objects/Entitlement';

/**
 * `unreachable` means the recipient can never be messaged again (blocked the
 * bot, deleted account). `failed` covers everything transient.
 */
export type DeliveryOutcome = 'delivered' | 'unreachable' | 'failed';

export type CompletionReason = 'client_confirmed' | 'auto_timeout';

export type AdminNotice =
  | { readonly kind: 'request_created'; readonly request: ServiceRequest }
  | { readonly kind: 'request_assigned'; readonly request: ServiceRequest; readonly master: Master }
  | { readonly kind: 'completion_disputed'; readonly request: ServiceRequest; readonly master: Master | null }
  | { readonly kind: 'master_registered'; readonly master: Master }
  | {
      readonly kind: 'entitlement_granted';
      readonly master: Master;
      readonly payload: PaymentPayload;
      readonly until: Date;
      readonly providerChargeId: string | null;
    }
  | { readonly kind: 'complaint_filed'; readonly complaint: Complaint }
  | { readonly kind: 'sweep_report'; readonly text: string };

export interface MarketplaceNotifier {
  sendOffer(master: Master, offerId: number, request: ServiceRequest): Promise<DeliveryOutcome>;
  sendAssignment(master: Master, request: ServiceRequest): Promise<DeliveryOutcome>;
  notifyClientAssigned(request: ServiceRequest, master: Master): Promise<DeliveryOutcome>;
  sendCompletionPrompt(request: ServiceRequest, master: Master): Promise<DeliveryOutcome>;
  notifyMasterCompleted(master: Master, request: ServiceRequest, reason: CompletionReason): Promise<DeliveryOutcome>;
  notifyMasterDisputed(master: Master, request: ServiceRequest): Promise<DeliveryOutcome>;
  notifyClientAutoCompleted(request: ServiceRequest): Promise<DeliveryOutcome>;
  sendReviewPrompt(request: ServiceRequest, master: Master | null): Promise<DeliveryOutcome>;
  notifyAdmin(notice: AdminNotice): Promise<DeliveryOutcome>;
}
