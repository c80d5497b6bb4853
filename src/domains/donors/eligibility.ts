import type { DonorEligibilityPolicy } from '../../config/donorEligibility';
import { addDays, daysBetween, parseIsoDate, type IsoDate } from '../../lib/dates';
import type { BloodType } from '../blood/compatibility';

export type Donor = {
  id: string;
  bloodType: BloodType | null;
  dateOfBirth: IsoDate | null;
  weightKg: number | null;
  lastDonationDate: IsoDate | null;
  address: string;
  isDonor: boolean;
  isAvailableForDonation: boolean;
  isEmailVerified: boolean;
};

export function ageOn(dateOfBirth: IsoDate, asOfDate: IsoDate): number {
  const born = parseIsoDate(dateOfBirth);
  const asOf = parseIsoDate(asOfDate);
  const years = asOf.getUTCFullYear() - born.getUTCFullYear();
  const beforeBirthday =
    asOf.getUTCMonth() < born.getUTCMonth()
    || (asOf.getUTCMonth() === born.getUTCMonth() && asOf.getUTCDate() < born.getUTCDate());
  return beforeBirthday ? years - 1 : years;
}

export function canDonate(donor: Donor, asOfDate: IsoDate, policy: DonorEligibilityPolicy): boolean {
  if (!donor.isDonor || !donor.isAvailableForDonation) {
    return false;
  }
  if (donor.lastDonationDate) {
    return daysBetween(donor.lastDonationDate, asOfDate) >= policy.minDaysBetweenDonations;
  }
  return true;
}

export function nextEligibleDonationDate(donor: Donor, policy: DonorEligibilityPolicy): IsoDate | null {
  if (!donor.lastDonationDate) return null;
  return addDays(donor.lastDonationDate, policy.minDaysBetweenDonations);
}

export function isEligibleDonor(donor: Donor, asOfDate: IsoDate, policy: DonorEligibilityPolicy): boolean {
  if (!donor.dateOfBirth || donor.bloodType === null || donor.weightKg === null) {
    return false;
  }
  const age = ageOn(donor.dateOfBirth, asOfDate);
  return (
    age >= policy.minAge
    && age <= policy.maxAge
    && donor.weightKg >= policy.minWeightKg
    && canDonate(donor, asOfDate, policy)
  );
}
