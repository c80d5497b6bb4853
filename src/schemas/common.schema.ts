import { z } from 'zod';
import { BLOOD_TYPES } from '../domains/blood/compatibility';
import { isIsoDate } from '../lib/dates';

export const isoDateString = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Use YYYY-MM-DD')
  .refine(isIsoDate, 'Use a real calendar date');

export const isoDateTimeString = z
  .string()
  .regex(
    /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d+)?(?:Z|[+-]\d{2}:\d{2})$/,
    'Use ISO timestamp'
  );

export const bloodTypeSchema = z.enum(BLOOD_TYPES);
