import { z } from 'zod';
import { parseIsoDate } from '../engine/calendar';

const isoDate = z.string().refine(
  (value) => {
    try {
      parseIsoDate(value);
      return true;
    } catch {
      return false;
    }
  },
  { message: 'Expected a calendar date as YYYY-MM-DD' },
);

/**
 * Inputs for one batch run, as handed over by the caller (GUI or CLI).
 * Dates are ISO strings, so lexical order is calendar order.
 */
export const BatchRequestSchema = z
  .object({
    url: z.string().url(),
    accountId: z.string().trim().min(1, 'Account identifier is required'),
    secret: z.string().min(1, 'Secret is required'),
    category: z.string().trim().min(1, 'Category identifier is required'),
    start: isoDate,
    end: isoDate,
    content: z.string().trim().min(1, 'Entry content must not be empty'),
    delaySeconds: z.number().int().positive(),
  })
  .refine((data) => data.start <= data.end, {
    message: 'Start date must not be after end date',
    path: ['end'],
  });

export type BatchRequest = z.infer<typeof BatchRequestSchema>;
export type BatchRequestInput = z.input<typeof BatchRequestSchema>;

export function parseBatchRequest(input: unknown): BatchRequest {
  return BatchRequestSchema.parse(input);
}
