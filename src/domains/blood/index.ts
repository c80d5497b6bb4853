export {
  BLOOD_TYPES,
  canDonateTo,
  compatibleDonorsFor,
  compatibleRecipientsFor,
  isBloodType,
  type BloodType
} from './compatibility';

export {
  eligibleLots,
  isLotExpired,
  planFulfillment,
  type FulfillmentAllocation,
  type FulfillmentPlan,
  type FulfillmentRequest,
  type FulfillmentResult,
  type FulfillmentStatus,
  type InventoryLot
} from './fulfillmentPlanner';
