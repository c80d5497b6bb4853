import type { DonorEligibilityPolicy } from '../../config/donorEligibility';
import { toIsoDate } from '../../lib/dates';
import { canDonateTo, type BloodType } from '../blood/compatibility';
import type { BloodRequestRecord } from '../requests/lifecycle';
import { isEligibleDonor, type Donor } from './eligibility';

/**
 * Donors who could answer a request today: verified, opted in, eligible and
 * type-compatible. Exact type matches come first; ids order the rest.
 */
export function findCompatibleDonors(
  request: BloodRequestRecord,
  donors: readonly Donor[],
  now: Date,
  policy: DonorEligibilityPolicy
): Donor[] {
  const asOfDate = toIsoDate(now);
  return donors
    .filter((donor) => {
      if (donor.id === request.requesterId || donor.bloodType === null) return false;
      return (
        donor.isEmailVerified
        && donor.isDonor
        && donor.isAvailableForDonation
        && canDonateTo(donor.bloodType, request.bloodTypeNeeded)
        && isEligibleDonor(donor, asOfDate, policy)
      );
    })
    .sort((a, b) => {
      const aExact = a.bloodType === request.bloodTypeNeeded;
      const bExact = b.bloodType === request.bloodTypeNeeded;
      if (aExact !== bExact) return aExact ? -1 : 1;
      if (a.id === b.id) return 0;
      return a.id < b.id ? -1 : 1;
    });
}

export type DonorSearchFilters = {
  bloodType?: BloodType;
  location?: string;
};

// Roster search for staff: an exact blood type and a case-insensitive address match.
export function searchDonors(donors: readonly Donor[], filters: DonorSearchFilters = {}): Donor[] {
  const location = filters.location?.trim().toLowerCase() ?? '';
  return donors
    .filter((donor) => donor.isEmailVerified && donor.isDonor && donor.isAvailableForDonation)
    .filter((donor) => !filters.bloodType || donor.bloodType === filters.bloodType)
    .filter((donor) => !location || donor.address.toLowerCase().includes(location))
    .sort((a, b) => (a.id === b.id ? 0 : a.id < b.id ? -1 : 1));
}
