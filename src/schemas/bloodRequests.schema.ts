import { z } from 'zod';
import { REQUEST_STATUSES, REQUEST_URGENCIES, RESPONSE_KINDS } from '../domains/requests/lifecycle';
import { bloodTypeSchema, isoDateString, isoDateTimeString } from './common.schema';

export const donorSchema = z.object({
  id: z.string().min(1),
  bloodType: bloodTypeSchema.nullable(),
  dateOfBirth: isoDateString.nullable(),
  weightKg: z.number().positive().nullable(),
  lastDonationDate: isoDateString.nullable(),
  address: z.string().max(2000),
  isDonor: z.boolean(),
  isAvailableForDonation: z.boolean(),
  isEmailVerified: z.boolean()
});

export const bloodRequestCreateSchema = z.object({
  requesterId: z.string().min(1),
  patientName: z.string().min(1).max(200),
  hospitalName: z.string().min(1).max(200),
  description: z.string().max(2000),
  bloodTypeNeeded: bloodTypeSchema,
  unitsNeeded: z.number().int().positive(),
  urgency: z.enum(REQUEST_URGENCIES).default('medium'),
  neededBy: isoDateTimeString.nullable(),
  isPublic: z.boolean().default(true)
});

export const bloodRequestRecordSchema = bloodRequestCreateSchema.extend({
  id: z.string().min(1),
  urgency: z.enum(REQUEST_URGENCIES),
  status: z.enum(REQUEST_STATUSES),
  isPublic: z.boolean(),
  createdAt: isoDateTimeString
});

export const publicRequestListSchema = z.object({
  requests: z.array(bloodRequestRecordSchema),
  filters: z
    .object({
      bloodType: bloodTypeSchema.optional(),
      urgency: z.enum(REQUEST_URGENCIES).optional(),
      search: z.string().max(200).optional()
    })
    .default({})
});

export const donorSearchSchema = z.object({
  donors: z.array(donorSchema),
  filters: z
    .object({
      bloodType: bloodTypeSchema.optional(),
      location: z.string().max(200).optional()
    })
    .default({})
});

export const requestResponseSchema = z.object({
  requestId: z.string().min(1),
  donorId: z.string().min(1),
  response: z.enum(RESPONSE_KINDS)
});

export const donorMatchSchema = z.object({
  request: bloodRequestRecordSchema,
  donors: z.array(donorSchema)
});

export const respondToRequestSchema = z.object({
  request: bloodRequestRecordSchema,
  donor: donorSchema,
  existingResponses: z.array(requestResponseSchema),
  response: z.enum(RESPONSE_KINDS)
});
