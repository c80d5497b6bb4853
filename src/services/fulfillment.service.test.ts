import { describe, expect, it, vi } from 'vitest';
import { InvalidInputError } from '../lib/errors';
import { mapLotRow, planFulfillmentFromInput } from './fulfillment.service';

const input = {
  request: { requestedType: 'O+', quantity: 3, requestedAt: '2026-03-01T08:30:00Z' },
  lots: [
    { id: 'late', bloodType: 'O+', quantity: 2, expirationDate: '2026-03-11', location: 'cold-room-1' },
    { id: 'early', bloodType: 'O+', quantity: 2, expirationDate: '2026-03-06', location: 'cold-room-2' }
  ],
  asOfDate: '2026-03-01'
};

describe('planFulfillmentFromInput', () => {
  it('returns the plan and logs the decision', () => {
    const logger = vi.fn();
    const decision = planFulfillmentFromInput(input, { logger, generateId: () => 'decision-1' });

    expect(decision.decisionId).toBe('decision-1');
    expect(decision.status).toBe('fulfilled');
    expect(decision.plan.allocations.map((allocation) => [allocation.lotId, allocation.units])).toEqual([
      ['early', 2],
      ['late', 1]
    ]);
    expect(logger).toHaveBeenCalledTimes(1);
    expect(logger).toHaveBeenCalledWith('FULFILLMENT_PLANNED', {
      decisionId: 'decision-1',
      requestedType: 'O+',
      requestedUnits: 3,
      allocatedUnits: 3,
      shortfallUnits: 0,
      status: 'fulfilled',
      asOfDate: '2026-03-01',
      lotsConsidered: 2,
      lotIds: ['early', 'late']
    });
  });

  it('logs a shortfall when stock runs out', () => {
    const logger = vi.fn();
    const decision = planFulfillmentFromInput(
      { ...input, request: { ...input.request, quantity: 6 } },
      { logger, generateId: () => 'decision-2' }
    );

    expect(decision.status).toBe('partially_fulfilled');
    expect(decision.plan.shortfallUnits).toBe(2);
    expect(logger.mock.calls[0]?.[0]).toBe('FULFILLMENT_SHORTFALL');
  });

  it('rejects a zero quantity before planning', () => {
    const logger = vi.fn();
    const invalid = { ...input, request: { ...input.request, quantity: 0 } };

    expect(() => planFulfillmentFromInput(invalid, { logger, generateId: () => 'decision-3' })).toThrow(InvalidInputError);
    expect(logger).toHaveBeenCalledWith('FULFILLMENT_INPUT_REJECTED', {
      decisionId: 'decision-3',
      formErrors: [],
      fieldErrorKeys: ['request']
    });
  });

  it('rejects blood types outside the enumeration', () => {
    const invalid = { ...input, lots: [{ ...input.lots[0], bloodType: 'C+' }] };
    expect(() => planFulfillmentFromInput(invalid, { logger: vi.fn() })).toThrow('INVALID_INPUT');
  });

  it('generates a uuid decision id by default', () => {
    const decision = planFulfillmentFromInput(input, { logger: vi.fn() });
    expect(decision.decisionId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
  });
});

describe('mapLotRow', () => {
  it('maps a persisted row with a numeric string quantity', () => {
    expect(
      mapLotRow({ id: 'lot-7', blood_type: 'AB-', quantity: '12', expiration_date: '2026-04-02', location: 'fridge-b' })
    ).toEqual({ id: 'lot-7', bloodType: 'AB-', quantity: 12, expirationDate: '2026-04-02', location: 'fridge-b' });
  });

  it('rejects fractional stock', () => {
    expect(() =>
      mapLotRow({ id: 'lot-8', blood_type: 'A-', quantity: '2.5', expiration_date: '2026-04-02', location: 'fridge-b' })
    ).toThrow(InvalidInputError);
  });

  it('rejects rows missing a blood type', () => {
    expect(() => mapLotRow({ id: 'lot-9', quantity: 1, expiration_date: '2026-04-02', location: 'fridge-b' })).toThrow(
      'INVALID_INPUT'
    );
  });
});
