// src/services/retrieval/geo-rerank.ts: multiplicative geographic boost applied after scoring
import type { Gazetteer } from '@/services/geo/gazetteer';
import type { GeoContext, GeographyResolver } from '@/services/geo/geography-resolver';
import type { Facets, GeoMatch, SearchResult } from '@/types/core';

export const GEO_BOOST = {
  exact: 1.8,
  nearbyScale: 0.5,
  region: 1.3,
} as const;

export interface GeoBoost {
  multiplier: number;
  match: GeoMatch;
  /** Query place the boost was earned against. */
  matchedPlace: string | null;
}

const NO_BOOST: GeoBoost = { multiplier: 1, match: 'none', matchedPlace: null };

/**
 * Largest applicable multiplier: exact place, nearby place scaled by decay, same region.
 * With only a region (no place) in the query, same-region documents get the region boost.
 */
export function geoBoost(
  facets: Facets,
  gazetteer: Gazetteer,
  context: GeoContext | null,
  queryRegion: string | null = null,
): GeoBoost {
  const docPlace = gazetteer.getByName(facets.location);

  if (!context) {
    if (queryRegion && docPlace?.region === queryRegion) {
      return { multiplier: GEO_BOOST.region, match: 'region', matchedPlace: null };
    }
    return NO_BOOST;
  }

  const matchedPlace = context.primary.name;
  if (docPlace?.key === context.primary.key) {
    return { multiplier: GEO_BOOST.exact, match: 'exact', matchedPlace };
  }
  if (!docPlace) return NO_BOOST;

  let best = NO_BOOST;
  const decay = context.decay.get(docPlace.key);
  if (decay !== undefined) {
    best = { multiplier: 1 + decay * GEO_BOOST.nearbyScale, match: 'nearby', matchedPlace };
  }
  if (docPlace.region === context.primary.region && GEO_BOOST.region > best.multiplier) {
    best = { multiplier: GEO_BOOST.region, match: 'region', matchedPlace };
  }
  return best;
}

const MATCH_LABELS: Record<GeoMatch, string> = {
  exact: 'EXACT MATCH ✅',
  nearby: 'NEARBY 🧭',
  region: 'SAME REGION 🌍',
  none: 'OTHER LOCATION 📍',
};

function truncate(s: string, max: number): string {
  return Array.from(s).length > max ? `${Array.from(s).slice(0, max).join('')}...` : s;
}

/** Vietnamese explanation of how geography shaped a result list. */
export function explainGeoRanking(
  results: Pick<SearchResult, 'name' | 'facets'>[],
  location: string,
  resolver: GeographyResolver,
): string {
  const header = `Kết quả tìm kiếm cho địa điểm: ${location}\n\n`;
  const context = resolver.resolve(location);
  if (!context) return `${header}Không tìm thấy thông tin địa lý cho location này.`;

  const { primary } = context;
  const lines = [
    '📍 Thông tin địa lý:',
    `- Tọa độ: (${primary.coordinates[0]}, ${primary.coordinates[1]})`,
    `- Vùng: ${primary.region}`,
    `- Bối cảnh văn hóa: ${context.culturalTags.join(', ')}`,
    `- Mức kinh tế: ${context.economicLevel}`,
    '',
    '🎯 Ranking factors:',
  ];
  results.slice(0, 5).forEach((r, i) => {
    const { match } = geoBoost(r.facets, resolver.gazetteer, context);
    lines.push(`${i + 1}. ${truncate(r.name, 50)} (${MATCH_LABELS[match]})`);
  });

  if (context.nearby.length > 0) {
    lines.push('', '🗺️ Địa điểm lân cận được xem xét:');
    for (const n of context.nearby.slice(0, 3)) {
      lines.push(`- ${n.place.name} (${n.distanceKm.toFixed(1)}km)`);
    }
  }
  return header + lines.join('\n');
}
