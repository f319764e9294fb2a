import {
  InvalidResumeStatusError,
  InvalidStatusTransitionError,
} from '../errors/domain.errors';
import { isResumeStatus, ResumeStatus } from '../types/profile.types';

/**
 * Resume lifecycle. Every legal edge lives in this table; anything absent is
 * rejected.
 */
export const RESUME_STATUS_TRANSITIONS: Readonly<Record<ResumeStatus, readonly ResumeStatus[]>> = {
  [ResumeStatus.DRAFT]: [ResumeStatus.GENERATED],
  [ResumeStatus.GENERATED]: [ResumeStatus.REVIEWED, ResumeStatus.DRAFT],
  [ResumeStatus.REVIEWED]: [ResumeStatus.SUBMITTED, ResumeStatus.GENERATED],
  [ResumeStatus.SUBMITTED]: [ResumeStatus.INTERVIEW, ResumeStatus.REJECTED],
  [ResumeStatus.INTERVIEW]: [ResumeStatus.ACCEPTED, ResumeStatus.REJECTED],
  [ResumeStatus.REJECTED]: [],
  [ResumeStatus.ACCEPTED]: [],
};

/** Statuses from which a tailoring run may (re)generate content. */
export const GENERATABLE_STATUSES: readonly ResumeStatus[] = [
  ResumeStatus.DRAFT,
  ResumeStatus.GENERATED,
];

export function parseResumeStatus(value: string): ResumeStatus {
  const normalized = value.trim().toLowerCase();
  if (!isResumeStatus(normalized)) {
    throw new InvalidResumeStatusError(value);
  }
  return normalized;
}

export function canTransition(from: ResumeStatus, to: ResumeStatus): boolean {
  return RESUME_STATUS_TRANSITIONS[from].includes(to);
}

export function assertTransition(from: ResumeStatus, to: ResumeStatus): void {
  if (!canTransition(from, to)) {
    throw new InvalidStatusTransitionError(from, to);
  }
}

export function isTerminal(status: ResumeStatus): boolean {
  return RESUME_STATUS_TRANSITIONS[status].length === 0;
}

export function canGenerate(status: ResumeStatus): boolean {
  return GENERATABLE_STATUSES.includes(status);
}
