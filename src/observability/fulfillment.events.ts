import type { BloodType } from '../domains/blood/compatibility';
import type { FulfillmentStatus } from '../domains/blood/fulfillmentPlanner';

export const FULFILLMENT_EVENT = {
  PLANNED: 'FULFILLMENT_PLANNED',
  SHORTFALL: 'FULFILLMENT_SHORTFALL',
  UNFULFILLABLE: 'FULFILLMENT_UNFULFILLABLE',
  INPUT_REJECTED: 'FULFILLMENT_INPUT_REJECTED'
} as const;

export type FulfillmentEventName = (typeof FULFILLMENT_EVENT)[keyof typeof FULFILLMENT_EVENT];

export type FulfillmentDecisionPayload = {
  decisionId: string;
  requestedType: BloodType;
  requestedUnits: number;
  allocatedUnits: number;
  shortfallUnits: number;
  status: FulfillmentStatus;
  asOfDate: string;
  lotsConsidered: number;
  lotIds: string[];
};

export type FulfillmentInputRejectedPayload = {
  decisionId: string;
  formErrors: string[];
  fieldErrorKeys: string[];
};

export type FulfillmentEventPayloadMap = {
  [FULFILLMENT_EVENT.PLANNED]: FulfillmentDecisionPayload;
  [FULFILLMENT_EVENT.SHORTFALL]: FulfillmentDecisionPayload;
  [FULFILLMENT_EVENT.UNFULFILLABLE]: FulfillmentDecisionPayload;
  [FULFILLMENT_EVENT.INPUT_REJECTED]: FulfillmentInputRejectedPayload;
};

export type FulfillmentEventLogger = (eventName: string, payload: unknown) => void;

function isObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object';
}

function hasString(value: Record<string, unknown>, key: string): boolean {
  return typeof value[key] === 'string' && value[key] !== '';
}

function hasCount(value: Record<string, unknown>, key: string): boolean {
  const candidate = value[key];
  return typeof candidate === 'number' && Number.isInteger(candidate) && candidate >= 0;
}

function hasStringArray(value: Record<string, unknown>, key: string): boolean {
  const candidate = value[key];
  return Array.isArray(candidate) && candidate.every((row) => typeof row === 'string');
}

export function isFulfillmentDecisionPayload(payload: unknown): payload is FulfillmentDecisionPayload {
  if (!isObject(payload)) return false;
  return (
    hasString(payload, 'decisionId')
    && hasString(payload, 'requestedType')
    && hasCount(payload, 'requestedUnits')
    && hasCount(payload, 'allocatedUnits')
    && hasCount(payload, 'shortfallUnits')
    && hasString(payload, 'status')
    && hasString(payload, 'asOfDate')
    && hasCount(payload, 'lotsConsidered')
    && hasStringArray(payload, 'lotIds')
  );
}

export function isFulfillmentInputRejectedPayload(payload: unknown): payload is FulfillmentInputRejectedPayload {
  if (!isObject(payload)) return false;
  return (
    hasString(payload, 'decisionId')
    && hasStringArray(payload, 'formErrors')
    && hasStringArray(payload, 'fieldErrorKeys')
  );
}

export function isFulfillmentEventPayload<T extends FulfillmentEventName>(
  event: T,
  payload: unknown
): payload is FulfillmentEventPayloadMap[T] {
  if (event === FULFILLMENT_EVENT.INPUT_REJECTED) {
    return isFulfillmentInputRejectedPayload(payload);
  }
  return isFulfillmentDecisionPayload(payload);
}

export function eventForStatus(status: FulfillmentStatus): Exclude<FulfillmentEventName, 'FULFILLMENT_INPUT_REJECTED'> {
  switch (status) {
    case 'fulfilled':
      return FULFILLMENT_EVENT.PLANNED;
    case 'partially_fulfilled':
      return FULFILLMENT_EVENT.SHORTFALL;
    case 'unfulfillable':
      return FULFILLMENT_EVENT.UNFULFILLABLE;
  }
}

export const jsonLineLogger: FulfillmentEventLogger = (eventName, payload) => {
  console.log(
    JSON.stringify({
      ...(isObject(payload) ? payload : { payload }),
      event: eventName,
      timestamp: new Date().toISOString()
    })
  );
};

export function emitFulfillmentEvent<T extends FulfillmentEventName>(
  event: T,
  payload: FulfillmentEventPayloadMap[T],
  logger: FulfillmentEventLogger = jsonLineLogger
): void {
  if (!isFulfillmentEventPayload(event, payload)) {
    logger('FULFILLMENT_EVENT_PAYLOAD_INVALID', { rejectedEvent: event });
  }
  logger(event, payload);
}
