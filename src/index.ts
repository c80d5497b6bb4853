export * from './domains/blood';
export {
  ageOn,
  canDonate,
  isEligibleDonor,
  nextEligibleDonationDate,
  type Donor
} from './domains/donors/eligibility';
export { findCompatibleDonors, searchDonors, type DonorSearchFilters } from './domains/donors/matching';
export {
  assertCanRespond,
  assertNeededByInFuture,
  assertRequestStatusTransition,
  canAcceptRequest,
  isRequestExpired,
  statusAfterFulfillment,
  type BloodRequestRecord,
  type BloodRequestStatus,
  type BloodRequestUrgency,
  type RequestResponse,
  type RequestResponseKind
} from './domains/requests/lifecycle';
export {
  filterPublicRequests,
  summarizeRequests,
  type PublicRequestFilters,
  type RequestSummary
} from './domains/requests/listing';
export {
  DEFAULT_DONOR_ELIGIBILITY_POLICY,
  getDonorEligibilityPolicy,
  type DonorEligibilityPolicy
} from './config/donorEligibility';
export {
  createErrorResponse,
  fulfillmentErrorMap,
  InvalidInputError,
  mapServiceError,
  requestErrorMap,
  type ErrorHandlerMap,
  type ErrorResponse
} from './lib/errors';
export { FULFILLMENT_EVENT, emitFulfillmentEvent, type FulfillmentEventLogger } from './observability/fulfillment.events';
export {
  mapLotRow,
  planFulfillmentFromInput,
  type FulfillmentDecision,
  type FulfillmentServiceOptions
} from './services/fulfillment.service';
export {
  createBloodRequest,
  listPublicRequests,
  matchDonorsForRequest,
  respondToRequest,
  searchDonorRoster,
  transitionRequestStatus,
  type BloodRequestServiceOptions
} from './services/bloodRequests.service';
