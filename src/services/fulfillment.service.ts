import { v4 as uuidv4 } from 'uuid';
import {
  planFulfillment,
  type FulfillmentPlan,
  type FulfillmentStatus,
  type InventoryLot
} from '../domains/blood/fulfillmentPlanner';
import { InvalidInputError } from '../lib/errors';
import { toUnitCount } from '../lib/numbers';
import {
  emitFulfillmentEvent,
  eventForStatus,
  FULFILLMENT_EVENT,
  type FulfillmentEventLogger
} from '../observability/fulfillment.events';
import { lotRowSchema, planFulfillmentSchema } from '../schemas/fulfillment.schema';

export type FulfillmentDecision = {
  decisionId: string;
  status: FulfillmentStatus;
  plan: FulfillmentPlan;
};

export type FulfillmentServiceOptions = {
  logger?: FulfillmentEventLogger;
  generateId?: () => string;
};

/**
 * Maps a persisted lot row into the planner's record. Quantities from NUMERIC
 * columns arrive as strings.
 */
export function mapLotRow(row: unknown): InventoryLot {
  const result = lotRowSchema.safeParse(row);
  if (!result.success) {
    throw new InvalidInputError(result.error.flatten());
  }
  const quantity = toUnitCount(result.data.quantity);
  if (quantity === null) {
    throw new InvalidInputError({ formErrors: [], fieldErrors: { quantity: ['Expected a whole number of units'] } });
  }
  return {
    id: result.data.id,
    bloodType: result.data.blood_type,
    quantity,
    expirationDate: result.data.expiration_date,
    location: result.data.location
  };
}

export function planFulfillmentFromInput(
  input: unknown,
  options: FulfillmentServiceOptions = {}
): FulfillmentDecision {
  const decisionId = (options.generateId ?? uuidv4)();
  const parsed = planFulfillmentSchema.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.flatten();
    emitFulfillmentEvent(
      FULFILLMENT_EVENT.INPUT_REJECTED,
      {
        decisionId,
        formErrors: details.formErrors,
        fieldErrorKeys: Object.keys(details.fieldErrors)
      },
      options.logger
    );
    throw new InvalidInputError(details);
  }

  const { request, lots, asOfDate } = parsed.data;
  const { plan, status } = planFulfillment(request, lots, asOfDate);

  emitFulfillmentEvent(
    eventForStatus(status),
    {
      decisionId,
      requestedType: request.requestedType,
      requestedUnits: plan.requestedUnits,
      allocatedUnits: plan.allocatedUnits,
      shortfallUnits: plan.shortfallUnits,
      status,
      asOfDate,
      lotsConsidered: lots.length,
      lotIds: plan.allocations.map((allocation) => allocation.lotId)
    },
    options.logger
  );

  return { decisionId, status, plan };
}
