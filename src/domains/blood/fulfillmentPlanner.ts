import { compareIsoDates, type IsoDate } from '../../lib/dates';
import { InvalidInputError } from '../../lib/errors';
import { compatibleDonorsFor, isBloodType, type BloodType } from './compatibility';

export type InventoryLot = {
  id: string;
  bloodType: BloodType;
  quantity: number;
  expirationDate: IsoDate;
  location: string;
};

export type FulfillmentRequest = {
  requestedType: BloodType;
  quantity: number;
  requestedAt: string;
};

export type FulfillmentAllocation = {
  lotId: string;
  bloodType: BloodType;
  location: string;
  expirationDate: IsoDate;
  units: number;
};

export type FulfillmentPlan = {
  requestedUnits: number;
  allocatedUnits: number;
  shortfallUnits: number;
  allocations: FulfillmentAllocation[];
};

export type FulfillmentStatus = 'fulfilled' | 'partially_fulfilled' | 'unfulfillable';

export type FulfillmentResult = {
  plan: FulfillmentPlan;
  status: FulfillmentStatus;
};

function assertValidRequest(request: FulfillmentRequest): void {
  if (!isBloodType(request.requestedType)) {
    throw new InvalidInputError({ formErrors: [], fieldErrors: { requestedType: ['BLOOD_TYPE_INVALID'] } });
  }
  if (!Number.isInteger(request.quantity) || request.quantity <= 0) {
    throw new InvalidInputError({ formErrors: [], fieldErrors: { quantity: ['FULFILLMENT_QUANTITY_INVALID'] } });
  }
}

export function isLotExpired(lot: InventoryLot, asOfDate: IsoDate): boolean {
  return compareIsoDates(lot.expirationDate, asOfDate) <= 0;
}

/**
 * Lots a request may draw from, earliest expiry first. Equal expiry prefers the
 * exact requested type so universal-donor stock is held back; beyond that the
 * snapshot order is kept.
 */
export function eligibleLots(
  requestedType: BloodType,
  availableLots: readonly InventoryLot[],
  asOfDate: IsoDate
): InventoryLot[] {
  const donors = compatibleDonorsFor(requestedType);
  return availableLots
    .map((lot, index) => ({ lot, index }))
    .filter(({ lot }) => donors.has(lot.bloodType) && !isLotExpired(lot, asOfDate) && lot.quantity > 0)
    .sort((a, b) => {
      const byExpiry = compareIsoDates(a.lot.expirationDate, b.lot.expirationDate);
      if (byExpiry !== 0) return byExpiry;
      const aExact = a.lot.bloodType === requestedType;
      const bExact = b.lot.bloodType === requestedType;
      if (aExact !== bExact) return aExact ? -1 : 1;
      return a.index - b.index;
    })
    .map(({ lot }) => lot);
}

function statusFor(requested: number, allocated: number): FulfillmentStatus {
  if (allocated === 0) return 'unfulfillable';
  return allocated === requested ? 'fulfilled' : 'partially_fulfilled';
}

/**
 * Plans which lots fulfil a request under first-expire-first-out.
 *
 * Pure: the snapshot is not modified. Callers decrement the allocated lots in
 * their own transaction.
 */
export function planFulfillment(
  request: FulfillmentRequest,
  availableLots: readonly InventoryLot[],
  asOfDate: IsoDate
): FulfillmentResult {
  assertValidRequest(request);

  const allocations: FulfillmentAllocation[] = [];
  let remaining = request.quantity;

  for (const lot of eligibleLots(request.requestedType, availableLots, asOfDate)) {
    if (remaining <= 0) break;
    // Fractional stock never yields a fractional allocation.
    const units = Math.min(remaining, Math.floor(lot.quantity));
    if (units <= 0) continue;
    allocations.push({
      lotId: lot.id,
      bloodType: lot.bloodType,
      location: lot.location,
      expirationDate: lot.expirationDate,
      units
    });
    remaining -= units;
  }

  const allocatedUnits = request.quantity - remaining;
  return {
    plan: {
      requestedUnits: request.quantity,
      allocatedUnits,
      shortfallUnits: remaining,
      allocations
    },
    status: statusFor(request.quantity, allocatedUnits)
  };
}
