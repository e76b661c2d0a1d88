// src/services/query-understanding.ts
// Deterministic query parsing: intent by pattern-hit counting, location via gazetteer then prepositions,
// service/target/time/modifier tags, free keywords and an overall confidence. Never throws.
import { z } from 'zod';
import queryPatterns from '@/data/query-patterns.json';
import type { Gazetteer } from '@/services/geo/gazetteer';
import type {
  PriceBracket,
  QueryComponents,
  QueryIntent,
  QueryModifier,
  ServiceRequirement,
  SubConfidences,
  TargetSignal,
  TimeSignal,
} from '@/types/core';
import { charLength, compilePattern, countMatches, hasMatch, normalizeText, words } from '@/utils/text';

const patternGroup = <U extends string, L extends [U, ...U[]]>(labels: L) =>
  z.array(z.object({ label: z.enum(labels), patterns: z.array(z.string().min(1)).min(1) }));

const queryPatternsSchema = z.object({
  intents: patternGroup(['restaurant', 'hotel', 'entertainment', 'shopping', 'beauty', 'travel', 'kids']),
  serviceRequirements: patternGroup(['kids_friendly', 'romantic', 'group_dining', 'luxury', 'budget', 'outdoor', 'indoor']),
  targets: patternGroup(['family', 'couple', 'friends', 'business', 'solo']),
  times: patternGroup(['weekend', 'weekday', 'evening', 'lunch', 'morning', 'holiday']),
  modifiers: patternGroup(['urgent', 'flexible', 'specific', 'recommendation']),
  locationPrepositions: z.array(z.string().min(1)).min(1),
  stopWords: z.array(z.string()),
});

interface CompiledGroup<L extends string> {
  label: L;
  patterns: RegExp[];
}

/** Sub-confidence weights: intent, location, service, target. */
export const CONFIDENCE_WEIGHTS = { intent: 0.3, location: 0.3, service: 0.2, target: 0.2 } as const;

export const LOCATION_CONFIDENCE = { direct: 0.9, region: 0.7, preposition: 0.6 } as const;

const NO_INTENT_CONFIDENCE = 0.5;
const MAX_KEYWORDS = 10;
const MAX_LOCATION_WORDS = 3;

function compileGroups<L extends string>(groups: Array<{ label: L; patterns: string[] }>): CompiledGroup<L>[] {
  return groups.map((g) => ({ label: g.label, patterns: g.patterns.map(compilePattern) }));
}

export class QueryParser {
  private readonly intents: CompiledGroup<Exclude<QueryIntent, 'general'>>[];
  private readonly serviceRequirements: CompiledGroup<ServiceRequirement>[];
  private readonly targets: CompiledGroup<TargetSignal>[];
  private readonly times: CompiledGroup<TimeSignal>[];
  private readonly modifiers: CompiledGroup<QueryModifier>[];
  private readonly prepositionRe: RegExp;
  private readonly stopWords: Set<string>;

  constructor(
    private readonly gazetteer: Gazetteer,
    table: unknown = queryPatterns,
  ) {
    const parsed = queryPatternsSchema.parse(table);
    this.intents = compileGroups(parsed.intents);
    this.serviceRequirements = compileGroups(parsed.serviceRequirements);
    this.targets = compileGroups(parsed.targets);
    this.times = compileGroups(parsed.times);
    this.modifiers = compileGroups(parsed.modifiers);
    this.stopWords = new Set(parsed.stopWords.map(normalizeText));
    const preps = parsed.locationPrepositions.map(normalizeText).join('|');
    this.prepositionRe = new RegExp(
      `(?<![\\p{L}\\p{N}])(?:${preps})\\s+([\\p{L}\\p{N}]+(?:\\s+[\\p{L}\\p{N}]+){0,${MAX_LOCATION_WORDS - 1}})`,
      'gu',
    );
  }

  parse(queryText: string): QueryComponents {
    const query = normalizeText(queryText);

    const { intent, confidence: intentConfidence } = this.extractIntent(query);
    const location = this.extractLocation(query);
    const serviceRequirements = this.tagsPresent(this.serviceRequirements, query);
    const { target, confidence: targetConfidence } = this.extractTarget(query);

    const subConfidences: SubConfidences = {
      intent: intentConfidence,
      location: location.confidence,
      service: serviceRequirements.length > 0 ? Math.min(serviceRequirements.length / 3, 1) : 0,
      target: targetConfidence,
    };

    return {
      originalQuery: queryText,
      intent,
      location: location.placeKey,
      locationMatch: location.match,
      region: location.region,
      serviceRequirements,
      targetAudience: target,
      timeRequirements: this.tagsPresent(this.times, query),
      modifiers: this.tagsPresent(this.modifiers, query),
      pricePreference: pricePreferenceFor(serviceRequirements),
      keywords: this.extractKeywords(query),
      subConfidences,
      confidence: overallConfidence(subConfidences),
    };
  }

  /** Highest hit count wins; ties go to the earlier intent. */
  extractIntent(query: string): { intent: QueryIntent; confidence: number } {
    let best: Exclude<QueryIntent, 'general'> | null = null;
    let bestHits = 0;
    for (const group of this.intents) {
      const hits = group.patterns.reduce((sum, re) => sum + countMatches(re, query), 0);
      if (hits > bestHits) {
        best = group.label;
        bestHits = hits;
      }
    }
    if (!best) return { intent: 'general', confidence: NO_INTENT_CONFIDENCE };
    const wordCount = query.split(' ').filter(Boolean).length;
    return { intent: best, confidence: Math.min(bestHits / Math.max(wordCount, 1), 1) };
  }

  extractLocation(query: string): {
    placeKey: string | null;
    match: 'direct' | 'preposition' | null;
    region: string | null;
    confidence: number;
  } {
    const direct = this.gazetteer.findInText(query);
    if (direct) {
      return { placeKey: direct.key, match: 'direct', region: direct.region, confidence: LOCATION_CONFIDENCE.direct };
    }

    const region = this.gazetteer.findRegionInText(query);
    if (region) {
      return { placeKey: null, match: null, region, confidence: LOCATION_CONFIDENCE.region };
    }

    this.prepositionRe.lastIndex = 0;
    for (const m of query.matchAll(this.prepositionRe)) {
      const captured = m[1]?.split(' ') ?? [];
      // longest span first so "ha noi" beats "ha"
      for (let n = captured.length; n >= 1; n--) {
        const place = this.gazetteer.normalizePlace(captured.slice(0, n).join(' '));
        if (place) {
          return {
            placeKey: place.key,
            match: 'preposition',
            region: place.region,
            confidence: LOCATION_CONFIDENCE.preposition,
          };
        }
      }
    }
    return { placeKey: null, match: null, region: null, confidence: 0 };
  }

  extractTarget(query: string): { target: TargetSignal | null; confidence: number } {
    let best: TargetSignal | null = null;
    let bestScore = 0;
    for (const group of this.targets) {
      const score = group.patterns.filter((re) => hasMatch(re, query)).length;
      if (score > bestScore) {
        best = group.label;
        bestScore = score;
      }
    }
    return { target: best, confidence: best ? Math.min(bestScore / 2, 1) : 0 };
  }

  /** Up to ten non-stop-words longer than two characters, first-seen order, no duplicates. */
  extractKeywords(query: string): string[] {
    const out: string[] = [];
    for (const w of words(query)) {
      if (charLength(w) <= 2 || this.stopWords.has(w) || out.includes(w)) continue;
      out.push(w);
      if (out.length === MAX_KEYWORDS) break;
    }
    return out;
  }

  private tagsPresent<L extends string>(groups: CompiledGroup<L>[], query: string): L[] {
    return groups.filter((g) => g.patterns.some((re) => hasMatch(re, query))).map((g) => g.label);
  }
}

export function overallConfidence(c: SubConfidences): number {
  const sum =
    CONFIDENCE_WEIGHTS.intent * c.intent +
    CONFIDENCE_WEIGHTS.location * c.location +
    CONFIDENCE_WEIGHTS.service * c.service +
    CONFIDENCE_WEIGHTS.target * c.target;
  return Math.min(sum, 1);
}

export function pricePreferenceFor(requirements: ServiceRequirement[]): PriceBracket[] {
  if (requirements.includes('luxury')) return ['Premium', 'Luxury'];
  if (requirements.includes('budget')) return ['Budget', 'MidRange'];
  return [];
}

const INTENT_LABELS: Record<QueryIntent, string> = {
  restaurant: 'nhà hàng / ăn uống',
  hotel: 'khách sạn / lưu trú',
  entertainment: 'giải trí',
  shopping: 'mua sắm',
  beauty: 'làm đẹp',
  travel: 'du lịch',
  kids: 'trẻ em',
  general: 'tìm kiếm chung',
};

/** One-screen Vietnamese summary of a parse, for logs and the explain endpoint. */
export function describeQuery(c: QueryComponents, placeName?: string | null): string {
  const lines = [`Phân tích query: '${c.originalQuery}'`, `- Ý định: ${c.intent} (${INTENT_LABELS[c.intent]})`];
  if (c.location) lines.push(`- Địa điểm: ${placeName ?? c.location} (${c.locationMatch ?? 'direct'})`);
  else if (c.region) lines.push(`- Khu vực: ${c.region}`);
  if (c.serviceRequirements.length) lines.push(`- Yêu cầu dịch vụ: ${c.serviceRequirements.join(', ')}`);
  if (c.targetAudience) lines.push(`- Đối tượng: ${c.targetAudience}`);
  if (c.timeRequirements.length) lines.push(`- Thời gian: ${c.timeRequirements.join(', ')}`);
  lines.push(`- Độ tin cậy: ${c.confidence.toFixed(2)}`);
  return lines.join('\n');
}
