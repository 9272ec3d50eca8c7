// ============================================================================
// src/domain/value-objects/RequestStatus.ts
// ============================================================================

export enum RequestStatus {
  NEW = 'new',
  ASSIGNED = 'assigned',
  PENDING_CONFIRMATION = 'pending_confirmation',
  COMPLETED = 'completed',
}

const TRANSITIONS: Record<RequestStatus, ReadonlyArray<RequestStatus>> = {
  [RequestStatus.NEW]: [RequestStatus.ASSIGNED],
  [RequestStatus.ASSIGNED]: [RequestStatus.PENDING_CONFIRMATION],
  // the only backward edge: the client reports a problem
  [RequestStatus.PENDING_CONFIRMATION]: [RequestStatus.COMPLETED, RequestStatus.ASSIGNED],
  [RequestStatus.COMPLETED]: [],
};

const STATUS_LABELS: Record<RequestStatus, string> = {
  [RequestStatus.NEW]: 'новая',
  [RequestStatus.ASSIGNED]: 'в работе',
  [RequestStatus.PENDING_CONFIRMATION]: 'ждём подтверждения',
  [RequestStatus.COMPLETED]: 'завершена',
};

const isRequestStatus = (value: string): value is RequestStatus =>
  Object.values<string>(RequestStatus).includes(value);

export const RequestStatusVO = {
  canTransitionTo(from: RequestStatus, to: RequestStatus): boolean {
    return TRANSITIONS[from].includes(to);
  },

  isTerminal(status: RequestStatus): boolean {
    return TRANSITIONS[status].length === 0;
  },

  label(status: RequestStatus): string {
    return STATUS_LABELS[status];
  },

  parse(value: string): RequestStatus {
    if (!isRequestStatus(value)) {
      throw new Error(`Unknown request status: ${value}`);
    }

    return value;
  },
} as const;
