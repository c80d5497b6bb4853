import { z } from 'zod';
import { bloodTypeSchema, isoDateString, isoDateTimeString } from './common.schema';

export const inventoryLotSchema = z.object({
  id: z.string().min(1).max(255),
  bloodType: bloodTypeSchema,
  quantity: z.number().int().nonnegative(),
  expirationDate: isoDateString,
  location: z.string().min(1).max(255)
});

export const fulfillmentRequestSchema = z.object({
  requestedType: bloodTypeSchema,
  quantity: z.number().int().positive(),
  requestedAt: isoDateTimeString
});

export const planFulfillmentSchema = z.object({
  request: fulfillmentRequestSchema,
  lots: z.array(inventoryLotSchema),
  asOfDate: isoDateString
});

export const lotRowSchema = z.object({
  id: z.string().min(1),
  blood_type: bloodTypeSchema,
  quantity: z.union([z.number(), z.string()]),
  expiration_date: isoDateString,
  location: z.string().min(1)
});
