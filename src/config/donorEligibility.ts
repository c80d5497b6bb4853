export type DonorEligibilityPolicy = {
  minAge: number;
  maxAge: number;
  minWeightKg: number;
  minDaysBetweenDonations: number;
};

export const DEFAULT_DONOR_ELIGIBILITY_POLICY: DonorEligibilityPolicy = {
  minAge: 18,
  maxAge: 65,
  minWeightKg: 50,
  minDaysBetweenDonations: 90
};

// Limits must be finite and non-negative; anything else keeps the default.
function parseLimit(value: string | undefined, fallback: number, options: { integer: boolean }): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) return fallback;
  if (options.integer && !Number.isInteger(parsed)) return fallback;
  return parsed;
}

export function getDonorEligibilityPolicy(env: NodeJS.ProcessEnv = process.env): DonorEligibilityPolicy {
  return {
    minAge: parseLimit(env.DONOR_MIN_AGE, DEFAULT_DONOR_ELIGIBILITY_POLICY.minAge, { integer: true }),
    maxAge: parseLimit(env.DONOR_MAX_AGE, DEFAULT_DONOR_ELIGIBILITY_POLICY.maxAge, { integer: true }),
    minWeightKg: parseLimit(env.DONOR_MIN_WEIGHT_KG, DEFAULT_DONOR_ELIGIBILITY_POLICY.minWeightKg, { integer: false }),
    minDaysBetweenDonations: parseLimit(
      env.DONOR_MIN_DAYS_BETWEEN_DONATIONS,
      DEFAULT_DONOR_ELIGIBILITY_POLICY.minDaysBetweenDonations,
      { integer: true }
    )
  };
}
