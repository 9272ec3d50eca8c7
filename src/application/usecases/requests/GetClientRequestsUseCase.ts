// ============================================================================
// src/application/usecases/requests/GetClientRequestsUseCase.ts
// ============================================================================

import { type ClientLookupDTO, ClientLookupSchema } from '@/application/dto/request.dto';
import type { ServiceRequest } from '@/domain/entities/ServiceRequest';
import type { IServiceRequestRepository } from '@/domain/repositories/IServiceRequestRepository';
import { RequestStatus } from '@/domain/value-objects/RequestStatus';
import { CLIENT_REQUESTS } from '@/shared/config/constants';

export interface RequestGroup {
  readonly total: number;
  readonly shown: ReadonlyArray<ServiceRequest>;
}

export interface ClientRequestsOverview {
  readonly active: RequestGroup;
  readonly completed: RequestGroup;
}

const toGroup = (requests: ReadonlyArray<ServiceRequest>): RequestGroup => ({
  total: requests.length,
  shown: requests.slice(0, CLIENT_REQUESTS.shownPerGroup),
});

/** The client's latest requests, newest first, split into open and finished ones. */
export class GetClientRequestsUseCase {
  public constructor(private readonly requestRepo: IServiceRequestRepository) {}

  public async execute(dto: ClientLookupDTO): Promise<ClientRequestsOverview> {
    const { userId } = ClientLookupSchema.parse(dto);
    const requests = await this.requestRepo.listByClient(userId, CLIENT_REQUESTS.fetchLimit);

    return {
      active: toGroup(requests.filter((request) => request.status !== RequestStatus.COMPLETED)),
      completed: toGroup(requests.filter((request) => request.status === RequestStatus.COMPLETED)),
    };
  }
}
