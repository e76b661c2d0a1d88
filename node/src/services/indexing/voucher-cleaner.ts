// src/services/indexing/voucher-cleaner.ts: boundary coercion of ingestion records into CleanVoucher
import { createHash } from 'crypto';
import { z } from 'zod';
import { parsePrice } from '@/services/facets/facet-extractor';
import type { CleanVoucher, VoucherSourceRecord } from '@/types/core';

const isMissing = (v: unknown): boolean =>
  v === null || v === undefined || (typeof v === 'string' && ['', 'nan', 'null', 'none'].includes(v.trim().toLowerCase()));

const text = z.preprocess((v) => (isMissing(v) ? '' : v), z.union([z.string(), z.number()]).transform((v) => String(v).trim()));

const price = z.preprocess(
  (v) => (isMissing(v) ? 0 : v),
  z.union([z.number(), z.string()]).transform((v) => {
    const n = parsePrice(v);
    return Number.isFinite(n) ? n : 0;
  }),
);

export const voucherSourceRecordSchema = z.object({
  name: text,
  description: text,
  usageInstructions: text,
  termsOfUse: text,
  tags: text,
  location: text,
  price,
  unit: text,
  merchant: text,
});

export type VoucherSourceInput = z.input<typeof voucherSourceRecordSchema>;

/** Coerces missing, `null` and `"nan"` fields to `""` / `0`; throws a ZodError on wrong types. */
export function coerceSourceRecord(input: unknown): VoucherSourceRecord {
  return voucherSourceRecordSchema.parse(input);
}

/** `voucher_` + first 8 hex chars of md5(`<name>_<merchant>`). */
export function voucherId(name: string, merchant: string): string {
  return `voucher_${createHash('md5').update(`${name}_${merchant}`).digest('hex').slice(0, 8)}`;
}

export function buildRawText(record: VoucherSourceRecord): string {
  const parts = [
    record.name,
    record.merchant && `- Merchant: ${record.merchant}`,
    record.price > 0 && `- Giá đổi voucher: ${record.price} ${record.unit}`.trimEnd(),
    record.description,
    record.termsOfUse && `- Điều kiện sử dụng: ${record.termsOfUse}`,
    record.usageInstructions && `- Cách sử dụng: ${record.usageInstructions}`,
    record.tags && `- Tags: ${record.tags}`,
    record.location && `- Địa điểm: ${record.location}`,
  ];
  return parts.filter((p): p is string => typeof p === 'string' && p.length > 0).join('\n');
}

export function cleanVoucher(record: VoucherSourceRecord, now: Date = new Date()): CleanVoucher {
  return {
    id: voucherId(record.name, record.merchant),
    name: record.name,
    merchant: record.merchant,
    price: record.price,
    rawText: buildRawText(record),
    locationHint: record.location,
    createdAt: now.toISOString(),
  };
}
