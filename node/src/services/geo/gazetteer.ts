// src/services/geo/gazetteer.ts: static place table, validated once at load
import { z } from 'zod';
import gazetteerData from '@/data/gazetteer.json';
import { compilePhrase, foldDiacritics, normalizeText } from '@/utils/text';

const economicLevelSchema = z.enum(['medium', 'medium_high', 'high', 'very_high']);

const placeSchema = z.object({
  key: z.string().regex(/^[a-z_]+$/),
  name: z.string().min(1),
  aliases: z.array(z.string().min(2)).min(1),
  lon: z.number().min(-180).max(180),
  lat: z.number().min(-90).max(90),
  region: z.string().min(1),
  province: z.string().min(1),
  culturalTags: z.array(z.string()),
  economicLevel: economicLevelSchema,
});

const gazetteerSchema = z
  .object({
    nearbyThresholdKm: z.number().positive(),
    regions: z.array(z.object({ name: z.string().min(1), aliases: z.array(z.string().min(2)) })),
    places: z.array(placeSchema).min(1),
  })
  .superRefine((g, ctx) => {
    const keys = new Set<string>();
    const regionNames = new Set(g.regions.map((r) => r.name));
    g.places.forEach((p, i) => {
      if (keys.has(p.key)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['places', i, 'key'], message: `duplicate key ${p.key}` });
      }
      keys.add(p.key);
      if (!regionNames.has(p.region)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['places', i, 'region'], message: `unknown region ${p.region}` });
      }
    });
  });

export type EconomicLevel = z.infer<typeof economicLevelSchema>;

export interface GeoPlace {
  key: string;
  name: string;
  aliases: string[];
  /** (longitude, latitude) */
  coordinates: readonly [number, number];
  region: string;
  province: string;
  culturalTags: string[];
  economicLevel: EconomicLevel;
}

interface AliasMatcher {
  place: GeoPlace;
  alias: string;
  exact: RegExp;
  folded: RegExp;
}

export interface RegionEntry {
  name: string;
  aliases: string[];
}

/**
 * Read-only place lookup. Alias matching is whole-word; places are tried in table
 * order, so the table order is the precedence order for text that names several cities.
 */
export class Gazetteer {
  readonly places: readonly GeoPlace[];
  readonly regions: readonly RegionEntry[];
  readonly nearbyThresholdKm: number;
  private readonly byKey: Map<string, GeoPlace>;
  private readonly byName: Map<string, GeoPlace>;
  private readonly aliasIndex: Map<string, GeoPlace>;
  private readonly foldedAliasIndex: Map<string, GeoPlace>;
  private readonly matchers: AliasMatcher[];
  private readonly regionMatchers: Array<{ region: string; re: RegExp }>;

  constructor(raw: unknown) {
    const data = gazetteerSchema.parse(raw);
    this.nearbyThresholdKm = data.nearbyThresholdKm;
    this.regions = Object.freeze(data.regions.map((r) => ({ name: r.name, aliases: r.aliases.map(normalizeText) })));
    this.places = Object.freeze(
      data.places.map(
        (p): GeoPlace => ({
          key: p.key,
          name: p.name,
          aliases: p.aliases.map(normalizeText),
          coordinates: [p.lon, p.lat] as const,
          region: p.region,
          province: p.province,
          culturalTags: p.culturalTags,
          economicLevel: p.economicLevel,
        }),
      ),
    );

    this.byKey = new Map(this.places.map((p) => [p.key, p]));
    this.byName = new Map(this.places.map((p) => [normalizeText(p.name), p]));
    this.aliasIndex = new Map();
    this.foldedAliasIndex = new Map();
    this.matchers = [];
    for (const place of this.places) {
      for (const alias of [normalizeText(place.name), ...place.aliases]) {
        if (!this.aliasIndex.has(alias)) this.aliasIndex.set(alias, place);
        const folded = foldDiacritics(alias);
        if (!this.foldedAliasIndex.has(folded)) this.foldedAliasIndex.set(folded, place);
        this.matchers.push({ place, alias, exact: compilePhrase(alias), folded: compilePhrase(folded) });
      }
    }
    this.regionMatchers = this.regions.flatMap((r) =>
      [normalizeText(r.name), ...r.aliases].map((a) => ({ region: r.name, re: compilePhrase(a) })),
    );
  }

  getByKey(key: string): GeoPlace | null {
    return this.byKey.get(key) ?? null;
  }

  getByName(name: string): GeoPlace | null {
    return this.byName.get(normalizeText(name)) ?? null;
  }

  /** Exact alias, then diacritic-insensitive alias, then an alias occurring whole inside the text. */
  normalizePlace(text: string): GeoPlace | null {
    const norm = normalizeText(text);
    if (!norm) return null;
    const exact = this.aliasIndex.get(norm) ?? this.byKey.get(norm);
    if (exact) return exact;
    const folded = foldDiacritics(norm);
    const foldedHit = this.foldedAliasIndex.get(folded);
    if (foldedHit) return foldedHit;
    if (folded.length < 3) return null;
    for (const m of this.matchers) {
      m.folded.lastIndex = 0;
      if (m.folded.test(folded)) return m.place;
    }
    return null;
  }

  /** First place (in table order) whose alias occurs, with diacritics as written, in normalized text. */
  findInText(normalized: string): GeoPlace | null {
    // matchers are grouped by place in table order
    for (const m of this.matchers) {
      m.exact.lastIndex = 0;
      if (m.exact.test(normalized)) return m.place;
    }
    return null;
  }

  findRegionInText(normalized: string): string | null {
    for (const { region, re } of this.regionMatchers) {
      re.lastIndex = 0;
      if (re.test(normalized)) return region;
    }
    return null;
  }
}

let defaultGazetteer: Gazetteer | null = null;

/** Gazetteer built from the bundled place table; parsed on first use and shared read-only. */
export function loadGazetteer(): Gazetteer {
  if (!defaultGazetteer) defaultGazetteer = new Gazetteer(gazetteerData);
  return defaultGazetteer;
}
