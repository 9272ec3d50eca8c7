// ============================================================================
// src/domain/value-objects/ComplaintRole.ts
// ============================================================================

export enum ComplaintRole {
  CLIENT = 'client',
  MASTER = 'master',
  OTHER = 'other',
}

const ROLE_LABELS: Record<ComplaintRole, string> = {
  [ComplaintRole.CLIENT]: 'клиент',
  [ComplaintRole.MASTER]: 'мастер',
  [ComplaintRole.OTHER]: 'другое',
};

export const complaintRoleLabel = (role: ComplaintRole): string => ROLE_LABELS[role];

export const isComplaintRole = (value: string): value is ComplaintRole =>
  Object.values<string>(ComplaintRole).includes(value);

export const parseComplaintRole = (value: string): ComplaintRole =>
  isComplaintRole(value) ? value : ComplaintRole.OTHER;
