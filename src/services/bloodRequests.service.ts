import { v4 as uuidv4 } from 'uuid';
import type { z } from 'zod';
import { getDonorEligibilityPolicy, type DonorEligibilityPolicy } from '../config/donorEligibility';
import type { Donor } from '../domains/donors/eligibility';
import { findCompatibleDonors, searchDonors } from '../domains/donors/matching';
import {
  assertCanRespond,
  assertNeededByInFuture,
  assertRequestStatusTransition,
  isRequestExpired,
  type BloodRequestRecord,
  type BloodRequestStatus,
  type RequestResponse
} from '../domains/requests/lifecycle';
import { filterPublicRequests, summarizeRequests, type RequestSummary } from '../domains/requests/listing';
import { InvalidInputError } from '../lib/errors';
import {
  bloodRequestCreateSchema,
  bloodRequestRecordSchema,
  donorMatchSchema,
  donorSearchSchema,
  publicRequestListSchema,
  respondToRequestSchema
} from '../schemas/bloodRequests.schema';

export type BloodRequestServiceOptions = {
  now?: Date;
  policy?: DonorEligibilityPolicy;
  generateId?: () => string;
};

function resolveOptions(options: BloodRequestServiceOptions) {
  return {
    now: options.now ?? new Date(),
    policy: options.policy ?? getDonorEligibilityPolicy()
  };
}

function parseOrThrow<T extends z.ZodTypeAny>(schema: T, input: unknown): z.infer<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new InvalidInputError(result.error.flatten());
  }
  return result.data;
}

/**
 * Builds the record for a new request. Persisting it is up to the caller.
 */
export function createBloodRequest(input: unknown, options: BloodRequestServiceOptions = {}): BloodRequestRecord {
  const data = parseOrThrow(bloodRequestCreateSchema, input);
  const { now } = resolveOptions(options);
  assertNeededByInFuture(data.neededBy, now);
  return {
    ...data,
    id: (options.generateId ?? uuidv4)(),
    status: 'active',
    createdAt: now.toISOString()
  };
}

export function listPublicRequests(input: unknown): { requests: BloodRequestRecord[]; summary: RequestSummary } {
  const { requests, filters } = parseOrThrow(publicRequestListSchema, input);
  return {
    requests: filterPublicRequests(requests, filters),
    summary: summarizeRequests(requests)
  };
}

export function searchDonorRoster(input: unknown): Donor[] {
  const { donors, filters } = parseOrThrow(donorSearchSchema, input);
  return searchDonors(donors, filters);
}

export function matchDonorsForRequest(input: unknown, options: BloodRequestServiceOptions = {}): Donor[] {
  const { request, donors } = parseOrThrow(donorMatchSchema, input);
  const { now, policy } = resolveOptions(options);
  return findCompatibleDonors(request, donors, now, policy);
}

export function respondToRequest(input: unknown, options: BloodRequestServiceOptions = {}): RequestResponse {
  const { request, donor, existingResponses, response } = parseOrThrow(respondToRequestSchema, input);
  const { now, policy } = resolveOptions(options);
  assertCanRespond(request, donor, existingResponses, now, policy);
  return { requestId: request.id, donorId: donor.id, response };
}

/**
 * Applies a status change. An active request past its deadline may only move
 * to expired.
 */
export function transitionRequestStatus(
  input: unknown,
  nextStatus: BloodRequestStatus,
  options: BloodRequestServiceOptions = {}
): BloodRequestRecord {
  const request = parseOrThrow(bloodRequestRecordSchema, input);
  const { now } = resolveOptions(options);
  if (request.status === nextStatus) {
    throw new Error('REQUEST_STATUS_UNCHANGED');
  }
  if (request.status === 'active' && nextStatus !== 'expired' && isRequestExpired(request, now)) {
    throw new Error('REQUEST_EXPIRED');
  }
  assertRequestStatusTransition(request.status, nextStatus);
  return { ...request, status: nextStatus };
}
