export type RequestStatus = 'Pending' | 'InProgress' | 'Completed' | 'Refunded';

export interface StatusMetadata {
  status: RequestStatus;
  isTerminal: boolean;
  canTransitionTo: RequestStatus[];
  holdsEscrow: boolean;
  description: string;
}

const STATUS_DEFINITIONS: Record<RequestStatus, Omit<StatusMetadata, 'status'>> = {
  Pending: {
    isTerminal: false,
    canTransitionTo: ['InProgress', 'Completed', 'Refunded'],
    holdsEscrow: true,
    description: 'Deposit held, waiting for the auditor',
  },

  InProgress: {
    isTerminal: false,
    canTransitionTo: ['Completed'],
    holdsEscrow: true,
    description: 'Claimed by the auditor; can only be completed',
  },

  Completed: {
    isTerminal: true,
    canTransitionTo: [],
    holdsEscrow: false,
    description: 'Report delivered, deposit earned',
  },

  Refunded: {
    isTerminal: true,
    canTransitionTo: [],
    holdsEscrow: false,
    description: 'Deposit returned to the requester',
  },
};

export const REQUEST_STATUSES: readonly RequestStatus[] = ['Pending', 'InProgress', 'Completed', 'Refunded'];

export function getStatusMetadata(status: RequestStatus): StatusMetadata {
  return {
    status,
    ...STATUS_DEFINITIONS[status],
  };
}

export function isTerminalStatus(status: RequestStatus): boolean {
  return STATUS_DEFINITIONS[status].isTerminal;
}

export function holdsEscrow(status: RequestStatus): boolean {
  return STATUS_DEFINITIONS[status].holdsEscrow;
}

export function canTransition(from: RequestStatus, to: RequestStatus): boolean {
  return STATUS_DEFINITIONS[from].canTransitionTo.includes(to);
}

export function isRequestStatus(value: unknown): value is RequestStatus {
  return typeof value === 'string' && REQUEST_STATUSES.some((status) => status === value);
}
