import { InvalidInputError } from '../../lib/errors';

export const BLOOD_TYPES = ['O-', 'O+', 'A-', 'A+', 'B-', 'B+', 'AB-', 'AB+'] as const;

export type BloodType = (typeof BLOOD_TYPES)[number];

/**
 * Recipient type => donor types whose red cells it may receive.
 *
 * Transfusion safety depends on this table; change it only against a
 * clinical reference.
 */
const DONORS_BY_RECIPIENT: Readonly<Record<BloodType, readonly BloodType[]>> = Object.freeze({
  'O-': ['O-'],
  'O+': ['O-', 'O+'],
  'A-': ['O-', 'A-'],
  'A+': ['O-', 'O+', 'A-', 'A+'],
  'B-': ['O-', 'B-'],
  'B+': ['O-', 'O+', 'B-', 'B+'],
  'AB-': ['O-', 'A-', 'B-', 'AB-'],
  'AB+': ['O-', 'O+', 'A-', 'A+', 'B-', 'B+', 'AB-', 'AB+']
});

export function isBloodType(value: unknown): value is BloodType {
  return BLOOD_TYPES.some((type) => type === value);
}

function assertBloodType(value: unknown): BloodType {
  if (!isBloodType(value)) {
    throw new InvalidInputError({ formErrors: [], fieldErrors: { bloodType: ['BLOOD_TYPE_INVALID'] } });
  }
  return value;
}

// Each call gets its own Set so callers cannot alter the shared table.
export function compatibleDonorsFor(recipientType: BloodType): ReadonlySet<BloodType> {
  return new Set(DONORS_BY_RECIPIENT[assertBloodType(recipientType)]);
}

export function compatibleRecipientsFor(donorType: BloodType): ReadonlySet<BloodType> {
  const donor = assertBloodType(donorType);
  return new Set(BLOOD_TYPES.filter((recipient) => DONORS_BY_RECIPIENT[recipient].includes(donor)));
}

export function canDonateTo(donorType: BloodType, recipientType: BloodType): boolean {
  return DONORS_BY_RECIPIENT[assertBloodType(recipientType)].includes(assertBloodType(donorType));
}
