import { z } from 'zod';
import { voucherSourceRecordSchema } from '@/services/indexing/voucher-cleaner';
import { PRICE_BRACKETS, SERVICE_TYPES } from '@/types/core';

/**
 * Request body schemas for the voucher API, with the same
 * `{ success, data } | { success: false, error: [{ path, message }] }` result shape everywhere.
 */

const filtersSchema = z
  .object({
    location: z.string().trim().min(1).optional(),
    serviceType: z.enum(SERVICE_TYPES).optional(),
    priceBracket: z.enum(PRICE_BRACKETS).optional(),
  })
  .strict();

export const searchRequestSchema = z.object({
  query: z.string().max(500, 'Query is too long'),
  topK: z.coerce.number().int().min(1).max(50).optional().default(5),
  filters: filtersSchema.optional().default({}),
  strictLocation: z.boolean().optional().default(false),
  allowLexicalFallback: z.boolean().optional().default(false),
  withAnswer: z.boolean().optional().default(false),
});

export const explainRequestSchema = z.object({
  query: z.string().max(500, 'Query is too long'),
});

export const ingestRequestSchema = z.object({
  vouchers: z.array(voucherSourceRecordSchema).min(1, 'At least one voucher is required').max(1000),
});

export type SearchRequestBody = z.infer<typeof searchRequestSchema>;
export type ExplainRequestBody = z.infer<typeof explainRequestSchema>;
export type IngestRequestBody = z.infer<typeof ingestRequestSchema>;

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: Array<{ path: string; message: string }> };

function validate<S extends z.ZodTypeAny>(schema: S, data: unknown): ValidationResult<z.infer<S>> {
  const result = schema.safeParse(data);
  if (!result.success) {
    return {
      success: false,
      error: result.error.errors.map((e) => ({
        path: e.path.join('.') || 'root',
        message: e.message,
      })),
    };
  }
  return { success: true, data: result.data };
}

export const validateSearchRequest = (data: unknown): ValidationResult<SearchRequestBody> =>
  validate(searchRequestSchema, data);

export const validateExplainRequest = (data: unknown): ValidationResult<ExplainRequestBody> =>
  validate(explainRequestSchema, data);

export const validateIngestRequest = (data: unknown): ValidationResult<IngestRequestBody> =>
  validate(ingestRequestSchema, data);
