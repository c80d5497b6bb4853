import type { DonorEligibilityPolicy } from '../../config/donorEligibility';
import { toIsoDate } from '../../lib/dates';
import { canDonateTo, type BloodType } from '../blood/compatibility';
import type { FulfillmentStatus } from '../blood/fulfillmentPlanner';
import { isEligibleDonor, type Donor } from '../donors/eligibility';

export const REQUEST_STATUSES = ['active', 'fulfilled', 'cancelled', 'expired'] as const;
export type BloodRequestStatus = (typeof REQUEST_STATUSES)[number];

export const REQUEST_URGENCIES = ['low', 'medium', 'high', 'critical'] as const;
export type BloodRequestUrgency = (typeof REQUEST_URGENCIES)[number];

export const RESPONSE_KINDS = ['accepted', 'declined', 'completed'] as const;
export type RequestResponseKind = (typeof RESPONSE_KINDS)[number];

export type BloodRequestRecord = {
  id: string;
  requesterId: string;
  patientName: string;
  hospitalName: string;
  description: string;
  bloodTypeNeeded: BloodType;
  unitsNeeded: number;
  urgency: BloodRequestUrgency;
  neededBy: string | null;
  status: BloodRequestStatus;
  isPublic: boolean;
  createdAt: string;
};

export type RequestResponse = {
  requestId: string;
  donorId: string;
  response: RequestResponseKind;
};

const allowedTransitions: Record<BloodRequestStatus, readonly BloodRequestStatus[]> = {
  active: ['fulfilled', 'cancelled', 'expired'],
  fulfilled: [],
  cancelled: [],
  expired: []
};

export function isRequestExpired(request: Pick<BloodRequestRecord, 'neededBy'>, now: Date): boolean {
  if (request.neededBy === null) return false;
  return now.getTime() > new Date(request.neededBy).getTime();
}

// A deadline equal to now already counts as past.
export function assertNeededByInFuture(neededBy: string | null, now: Date): void {
  if (neededBy !== null && new Date(neededBy).getTime() <= now.getTime()) {
    throw new Error('REQUEST_NEEDED_BY_NOT_FUTURE');
  }
}

export function assertRequestStatusTransition(from: BloodRequestStatus, to: BloodRequestStatus): void {
  if (from === to) {
    throw new Error('REQUEST_STATUS_UNCHANGED');
  }
  if (!allowedTransitions[from].includes(to)) {
    throw new Error('REQUEST_STATUS_INVALID_TRANSITION');
  }
}

// Partial and empty plans leave the request open for further stock or donors.
export function statusAfterFulfillment(status: FulfillmentStatus): BloodRequestStatus {
  return status === 'fulfilled' ? 'fulfilled' : 'active';
}

export function canAcceptRequest(
  request: BloodRequestRecord,
  donor: Donor,
  now: Date,
  policy: DonorEligibilityPolicy
): boolean {
  if (donor.id === request.requesterId || donor.bloodType === null) {
    return false;
  }
  return (
    request.status === 'active'
    && !isRequestExpired(request, now)
    && canDonateTo(donor.bloodType, request.bloodTypeNeeded)
    && isEligibleDonor(donor, toIsoDate(now), policy)
  );
}

export function assertCanRespond(
  request: BloodRequestRecord,
  donor: Donor,
  existingResponses: readonly RequestResponse[],
  now: Date,
  policy: DonorEligibilityPolicy
): void {
  if (!canAcceptRequest(request, donor, now, policy)) {
    throw new Error('REQUEST_NOT_ACCEPTABLE');
  }
  const duplicate = existingResponses.some(
    (response) => response.requestId === request.id && response.donorId === donor.id
  );
  if (duplicate) {
    throw new Error('REQUEST_RESPONSE_DUPLICATE');
  }
}
