import { describe, expect, it } from 'vitest';
import { DEFAULT_DONOR_ELIGIBILITY_POLICY } from '../config/donorEligibility';
import { InvalidInputError } from '../lib/errors';
import {
  createBloodRequest,
  listPublicRequests,
  matchDonorsForRequest,
  respondToRequest,
  searchDonorRoster,
  transitionRequestStatus
} from './bloodRequests.service';

const now = new Date('2026-06-15T10:00:00Z');
const options = { now, policy: DEFAULT_DONOR_ELIGIBILITY_POLICY };

const request = {
  id: 'request-1',
  requesterId: 'requester-1',
  patientName: 'M. Silva',
  hospitalName: 'City Clinic',
  description: 'Post-operative transfusion',
  bloodTypeNeeded: 'AB-',
  unitsNeeded: 2,
  urgency: 'medium',
  neededBy: '2026-06-18T12:00:00Z',
  status: 'active',
  isPublic: true,
  createdAt: '2026-06-15T07:30:00Z'
};

const donor = {
  id: 'donor-1',
  bloodType: 'A-',
  dateOfBirth: '1992-11-03',
  weightKg: 61,
  lastDonationDate: '2026-01-04',
  address: '21 Park Avenue, Cardiff',
  isDonor: true,
  isAvailableForDonation: true,
  isEmailVerified: true
};

describe('matchDonorsForRequest', () => {
  it('returns compatible donors from a roster', () => {
    const donors = [donor, { ...donor, id: 'donor-2', bloodType: 'A+' }];
    expect(matchDonorsForRequest({ request, donors }, options).map((match) => match.id)).toEqual(['donor-1']);
  });

  it('rejects a malformed roster', () => {
    try {
      matchDonorsForRequest({ request, donors: [{ ...donor, weightKg: 'sixty' }] }, options);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidInputError);
      if (error instanceof InvalidInputError) {
        expect(Object.keys(error.details?.fieldErrors ?? {})).toEqual(['donors']);
      }
    }
  });
});

describe('respondToRequest', () => {
  it('records a response from an eligible donor', () => {
    expect(respondToRequest({ request, donor, existingResponses: [], response: 'accepted' }, options)).toEqual({
      requestId: 'request-1',
      donorId: 'donor-1',
      response: 'accepted'
    });
  });

  it('refuses a duplicate response', () => {
    const existingResponses = [{ requestId: 'request-1', donorId: 'donor-1', response: 'declined' }];
    expect(() => respondToRequest({ request, donor, existingResponses, response: 'accepted' }, options)).toThrow(
      'REQUEST_RESPONSE_DUPLICATE'
    );
  });
});

describe('transitionRequestStatus', () => {
  it('closes an active request', () => {
    expect(transitionRequestStatus(request, 'fulfilled', options).status).toBe('fulfilled');
  });

  it('only lets an overdue request expire', () => {
    const overdue = { ...request, neededBy: '2026-06-14T00:00:00Z' };
    expect(() => transitionRequestStatus(overdue, 'fulfilled', options)).toThrow('REQUEST_EXPIRED');
    expect(transitionRequestStatus(overdue, 'expired', options).status).toBe('expired');
  });

  it('reports an unchanged status before checking the deadline', () => {
    const overdue = { ...request, neededBy: '2026-06-14T00:00:00Z' };
    expect(() => transitionRequestStatus(overdue, 'active', options)).toThrow('REQUEST_STATUS_UNCHANGED');
  });

  it('refuses to reopen a cancelled request', () => {
    expect(() => transitionRequestStatus({ ...request, status: 'cancelled' }, 'active', options)).toThrow(
      'REQUEST_STATUS_INVALID_TRANSITION'
    );
  });
});

describe('createBloodRequest', () => {
  const draft = {
    requesterId: 'requester-1',
    patientName: 'M. Silva',
    hospitalName: 'City Clinic',
    description: '',
    bloodTypeNeeded: 'O-',
    unitsNeeded: 3,
    neededBy: '2026-06-16T08:00:00Z'
  };

  it('opens an active public request with default urgency', () => {
    expect(createBloodRequest(draft, { now, generateId: () => 'request-9' })).toEqual({
      ...draft,
      id: 'request-9',
      urgency: 'medium',
      isPublic: true,
      status: 'active',
      createdAt: '2026-06-15T10:00:00.000Z'
    });
  });

  it('refuses a deadline that has already passed', () => {
    expect(() => createBloodRequest({ ...draft, neededBy: '2026-06-15T09:00:00Z' }, { now })).toThrow(
      'REQUEST_NEEDED_BY_NOT_FUTURE'
    );
  });

  it('rejects a request without a hospital', () => {
    expect(() => createBloodRequest({ ...draft, hospitalName: '' }, { now })).toThrow(InvalidInputError);
  });
});

describe('listPublicRequests', () => {
  it('filters the list and summarises every public request', () => {
    const requests = [
      request,
      { ...request, id: 'request-2', bloodTypeNeeded: 'B+', urgency: 'critical' },
      { ...request, id: 'request-3', status: 'fulfilled' }
    ];
    const result = listPublicRequests({ requests, filters: { bloodType: 'B+' } });
    expect(result.requests.map((row) => row.id)).toEqual(['request-2']);
    expect(result.summary).toEqual({ total: 3, active: 2, urgent: 1, fulfilled: 1 });
  });
});

describe('searchDonorRoster', () => {
  it('finds donors by location', () => {
    const donors = [donor, { ...donor, id: 'donor-2', address: '5 High Street, Swansea' }];
    expect(searchDonorRoster({ donors, filters: { location: 'cardiff' } }).map((row) => row.id)).toEqual(['donor-1']);
  });

  it('rejects an unknown blood type filter', () => {
    expect(() => searchDonorRoster({ donors: [donor], filters: { bloodType: 'C+' } })).toThrow(InvalidInputError);
  });
});
