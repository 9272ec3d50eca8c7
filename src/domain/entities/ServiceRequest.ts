// ============================================================================
// src/domain/entities/ServiceRequest.ts
// ============================================================================

import { RequestStatus, RequestStatusVO } from '@/domain/value-objects/RequestStatus';
import { InvalidRequestStateError } from '@/shared/errors/domain.errors';

export interface ServiceRequestProps {
  readonly id: number;
  readonly clientUserId: string;
  readonly clientName: string;
  readonly contact: string;
  readonly category: string;
  readonly address: string;
  readonly description: string;
  readonly desiredTime: string;
  readonly status: RequestStatus;
  readonly masterId: number | null;
  readonly reviewRequested: boolean;
  readonly createdAt: Date;
  readonly pendingSince: Date | null;
  readonly completedAt: Date | null;
}

export class ServiceRequest {
  public readonly id: number;
  public readonly clientUserId: string;
  public readonly clientName: string;
  public readonly contact: string;
  public readonly category: string;
  public readonly address: string;
  public readonly description: string;
  public readonly desiredTime: string;
  public readonly status: RequestStatus;
  public readonly masterId: number | null;
  public readonly reviewRequested: boolean;
  public readonly createdAt: Date;
  public readonly pendingSince: Date | null;
  public readonly completedAt: Date | null;

  public constructor(props: ServiceRequestProps) {
    this.id = props.id;
    this.clientUserId = props.clientUserId;
    this.clientName = props.clientName;
    this.contact = props.contact;
    this.category = props.category;
    this.address = props.address;
    this.description = props.description;
    this.desiredTime = props.desiredTime;
    this.status = props.status;
    this.masterId = props.masterId;
    this.reviewRequested = props.reviewRequested;
    this.createdAt = props.createdAt;
    this.pendingSince = props.pendingSince;
    this.completedAt = props.completedAt;
  }

  public isOpenForClaims(): boolean {
    return this.status === RequestStatus.NEW;
  }

  public isAssignedTo(masterId: number): boolean {
    return this.masterId === masterId;
  }

  public isOwnedBy(userId: string): boolean {
    return this.clientUserId === userId;
  }

  public canTransitionTo(next: RequestStatus): boolean {
    return RequestStatusVO.canTransitionTo(this.status, next);
  }

  public assertCanTransitionTo(next: RequestStatus): void {
    if (!this.canTransitionTo(next)) {
      throw new InvalidRequestStateError(this.status, next);
    }
  }

  public with(changes: Partial<Omit<ServiceRequestProps, 'id' | 'clientUserId' | 'createdAt'>>): ServiceRequest {
    return new ServiceRequest({ ...this.toProps(), ...changes });
  }

  public toProps(): ServiceRequestProps {
    return {
      id: this.id,
      clientUserId: this.clientUserId,
      clientName: this.clientName,
      contact: this.contact,
      category: this.category,
      address: this.address,
      description: this.description,
      desiredTime: this.desiredTime,
      status: this.status,
      masterId: this.masterId,
      reviewRequested: this.reviewRequested,
      createdAt: this.createdAt,
      pendingSince: this.pendingSince,
      completedAt: this.completedAt,
    };
  }
}
