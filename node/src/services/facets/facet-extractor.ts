// src/services/facets/facet-extractor.ts: rule-based facets (location, service, audience, keywords, price) from voucher text
import { z } from 'zod';
import facetPatterns from '@/data/facet-patterns.json';
import type { Gazetteer } from '@/services/geo/gazetteer';
import type { Facets, PriceBracket, ServiceType, TargetAudience } from '@/types/core';
import { SERVICE_TYPES, TARGET_AUDIENCES } from '@/types/core';
import { compilePattern, compilePhrase, hasMatch, normalizeText } from '@/utils/text';

const serviceTypeSchema = z.enum(SERVICE_TYPES);
const targetSchema = z.enum(TARGET_AUDIENCES);

const facetPatternsSchema = z.object({
  serviceTypes: z.array(z.object({ label: serviceTypeSchema, patterns: z.array(z.string().min(1)).min(1) })),
  targetAudiences: z.array(z.object({ label: targetSchema, patterns: z.array(z.string().min(1)).min(1) })),
  keywords: z.array(z.string().min(1)),
});

export type FacetPatternTable = z.infer<typeof facetPatternsSchema>;

interface CompiledCategory<L extends string> {
  label: L;
  patterns: RegExp[];
}

export const UNKNOWN_LOCATION = 'Unknown';

export const PRICE_THRESHOLDS = {
  budget: 100_000,
  midRange: 500_000,
  premium: 1_000_000,
} as const;

/** Accepts numbers or strings such as `"150,000"` / `"150.000 VND"`; anything else is NaN. */
export function parsePrice(price: number | string | null | undefined): number {
  if (typeof price === 'number') return price;
  if (typeof price !== 'string') return Number.NaN;
  const digits = price.replace(/[.,\s]/g, '').replace(/(vnd|đ|d)$/i, '');
  return /^\d+$/.test(digits) ? Number.parseInt(digits, 10) : Number.NaN;
}

export function priceBracketFor(price: number | string | null | undefined): PriceBracket {
  const value = parsePrice(price);
  if (!Number.isFinite(value) || value <= 0) return 'Unknown';
  if (value < PRICE_THRESHOLDS.budget) return 'Budget';
  if (value < PRICE_THRESHOLDS.midRange) return 'MidRange';
  if (value < PRICE_THRESHOLDS.premium) return 'Premium';
  return 'Luxury';
}

export interface ExtractHints {
  /** Location column from the source record; wins over text scanning when it resolves. */
  location?: string;
  price?: number | string;
}

/**
 * Deterministic facet extraction. Never throws on content: an unmatched category
 * degrades to its default label.
 */
export class FacetExtractor {
  private readonly serviceTypes: CompiledCategory<ServiceType>[];
  private readonly targets: CompiledCategory<TargetAudience>[];
  private readonly keywords: Array<{ phrase: string; re: RegExp }>;

  constructor(
    private readonly gazetteer: Gazetteer,
    table: unknown = facetPatterns,
  ) {
    const parsed = facetPatternsSchema.parse(table);
    this.serviceTypes = parsed.serviceTypes.map((c) => ({ label: c.label, patterns: c.patterns.map(compilePattern) }));
    this.targets = parsed.targetAudiences.map((c) => ({ label: c.label, patterns: c.patterns.map(compilePattern) }));
    this.keywords = parsed.keywords.map((k) => ({ phrase: normalizeText(k), re: compilePhrase(k) }));
  }

  extract(voucherText: string, voucherName: string, hints: ExtractHints = {}): Facets {
    const text = normalizeText(`${voucherName} ${voucherText}`);
    const keywords = this.extractKeywords(text);
    const serviceType = this.firstMatch(this.serviceTypes, text) ?? 'General';
    return {
      location: this.extractLocation(text, hints.location),
      serviceType,
      targetAudience: this.firstMatch(this.targets, text) ?? 'General',
      keywords,
      priceBracket: priceBracketFor(hints.price),
      kidsFriendly: serviceType === 'Kids' || keywords.includes('trẻ em'),
    };
  }

  extractLocation(normalizedText: string, hint?: string): string {
    if (hint) {
      const fromHint = this.gazetteer.normalizePlace(hint);
      if (fromHint) return fromHint.name;
    }
    return this.gazetteer.findInText(normalizedText)?.name ?? UNKNOWN_LOCATION;
  }

  extractKeywords(normalizedText: string): string[] {
    const found: string[] = [];
    for (const { phrase, re } of this.keywords) {
      if (!found.includes(phrase) && hasMatch(re, normalizedText)) found.push(phrase);
    }
    return found;
  }

  private firstMatch<L extends string>(categories: CompiledCategory<L>[], text: string): L | null {
    for (const c of categories) {
      if (c.patterns.some((re) => hasMatch(re, text))) return c.label;
    }
    return null;
  }
}
