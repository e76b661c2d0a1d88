// src/services/geo/geography-resolver.ts: distances, nearby places and relevance decay over the gazetteer
import type { EconomicLevel, Gazetteer, GeoPlace } from '@/services/geo/gazetteer';

export const EARTH_RADIUS_KM = 6371;

export interface NearbyPlace {
  place: GeoPlace;
  distanceKm: number;
  /** max(0, 1 - distance / threshold) */
  relevance: number;
}

export interface GeoContext {
  primary: GeoPlace;
  /** Ascending by distance from the primary place; the primary itself is not listed. */
  nearby: NearbyPlace[];
  /** Place key → linear relevance decay. */
  decay: Map<string, number>;
  culturalTags: string[];
  economicLevel: EconomicLevel;
}

function toRadians(deg: number): number {
  return (deg * Math.PI) / 180;
}

/** Great-circle distance in km between two (longitude, latitude) pairs. */
export function haversineKm(a: readonly [number, number], b: readonly [number, number]): number {
  const [lon1, lat1] = a;
  const [lon2, lat2] = b;
  const dLat = toRadians(lat2 - lat1);
  const dLon = toRadians(lon2 - lon1);
  const h =
    Math.sin(dLat / 2) * Math.sin(dLat / 2) +
    Math.cos(toRadians(lat1)) * Math.cos(toRadians(lat2)) * Math.sin(dLon / 2) * Math.sin(dLon / 2);
  const c = 2 * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h));
  return EARTH_RADIUS_KM * c;
}

export class GeographyResolver {
  readonly thresholdKm: number;

  constructor(
    readonly gazetteer: Gazetteer,
    thresholdKm?: number,
  ) {
    this.thresholdKm = thresholdKm ?? gazetteer.nearbyThresholdKm;
  }

  distance(a: GeoPlace, b: GeoPlace): number {
    if (a.key === b.key) return 0;
    return haversineKm(a.coordinates, b.coordinates);
  }

  relevance(distanceKm: number): number {
    return Math.max(0, 1 - distanceKm / this.thresholdKm);
  }

  findNearby(primary: GeoPlace): NearbyPlace[] {
    const nearby: NearbyPlace[] = [];
    for (const place of this.gazetteer.places) {
      if (place.key === primary.key) continue;
      const distanceKm = this.distance(primary, place);
      if (distanceKm <= this.thresholdKm) {
        nearby.push({ place, distanceKm, relevance: this.relevance(distanceKm) });
      }
    }
    return nearby.sort((x, y) => x.distanceKm - y.distanceKm);
  }

  resolvePlace(locationName: string): GeoPlace | null {
    return this.gazetteer.normalizePlace(locationName);
  }

  /** Returns null when the name does not resolve; that is not an error. */
  resolve(locationName: string): GeoContext | null {
    const primary = this.resolvePlace(locationName);
    return primary ? this.contextFor(primary) : null;
  }

  contextFor(primary: GeoPlace): GeoContext {
    const nearby = this.findNearby(primary);
    return {
      primary,
      nearby,
      decay: new Map(nearby.map((n) => [n.place.key, n.relevance])),
      culturalTags: [primary.region, ...primary.culturalTags],
      economicLevel: primary.economicLevel,
    };
  }
}
