/**
 * Location Service - turns a courier's spoken whereabouts into a place and
 * a route to the home address.
 *
 * Two implementations behind one interface: Mapbox geocoding/directions
 * when an API key is configured, otherwise a small landmark table with
 * straight-line distances. Both log and return an empty result on failure.
 */

import { z } from 'zod';
import type { LocationMatch, RouteSummary } from '@shared/schema';
import landmarks from '../data/landmarks.json';
import { hasAnyCue } from '../utils/speech-helpers';

export interface GeoPoint {
  lat: number;
  lng: number;
}

export interface LocationService {
  readonly name: string;
  /** Ranked nearest first; empty when nothing matched */
  geocode(text: string): Promise<LocationMatch[]>;
  route(from: GeoPoint, to: GeoPoint): Promise<RouteSummary | null>;
}

const EARTH_RADIUS_KM = 6371;

export function haversineKm(a: GeoPoint, b: GeoPoint): number {
  const toRad = (deg: number) => (deg * Math.PI) / 180;
  const dLat = toRad(b.lat - a.lat);
  const dLng = toRad(b.lng - a.lng);
  const h =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRad(a.lat)) * Math.cos(toRad(b.lat)) * Math.sin(dLng / 2) ** 2;
  return 2 * EARTH_RADIUS_KM * Math.asin(Math.sqrt(h));
}

function roundKm(km: number): number {
  return Math.round(km * 10) / 10;
}

// ═══════════════════════════════════════════════
// Mapbox
// ═══════════════════════════════════════════════

const MAX_RESULT_DISTANCE_KM = 10;

const geocodeResponseSchema = z.object({
  features: z
    .array(
      z.object({
        text: z.string(),
        place_name: z.string(),
        center: z.tuple([z.number(), z.number()]),
      })
    )
    .default([]),
});

const directionsResponseSchema = z.object({
  routes: z
    .array(
      z.object({
        distance: z.number(),
        duration: z.number(),
        legs: z
          .array(
            z.object({
              steps: z.array(z.object({ maneuver: z.object({ instruction: z.string() }) })).default([]),
            })
          )
          .default([]),
      })
    )
    .default([]),
});

export class MapboxLocationService implements LocationService {
  readonly name = 'mapbox';
  private readonly baseUrl = 'https://api.mapbox.com';

  constructor(
    private readonly accessToken: string,
    private readonly home: GeoPoint
  ) {}

  async geocode(text: string): Promise<LocationMatch[]> {
    const query = encodeURIComponent(text.trim());
    if (!query) return [];

    const url =
      `${this.baseUrl}/geocoding/v5/mapbox.places/${query}.json` +
      `?access_token=${this.accessToken}&proximity=${this.home.lng},${this.home.lat}&country=in&limit=5`;

    try {
      const response = await fetch(url);
      if (!response.ok) {
        console.error(`[Location] Geocoding failed with ${response.status}`);
        return [];
      }
      const data = geocodeResponseSchema.parse(await response.json());

      const seen = new Set<string>();
      const matches: LocationMatch[] = [];
      for (const feature of data.features) {
        const [lng, lat] = feature.center;
        const distanceKm = roundKm(haversineKm(this.home, { lat, lng }));
        if (distanceKm > MAX_RESULT_DISTANCE_KM || seen.has(feature.text)) continue;
        seen.add(feature.text);
        matches.push({ name: feature.text, lat, lng, address: feature.place_name, distanceKm });
      }

      matches.sort((a, b) => a.distanceKm - b.distanceKm);
      console.log(`[Location] Mapbox found ${matches.length} places for "${text}"`);
      return matches;
    } catch (error) {
      console.error('[Location] Geocoding error:', error);
      return [];
    }
  }

  async route(from: GeoPoint, to: GeoPoint): Promise<RouteSummary | null> {
    const url =
      `${this.baseUrl}/directions/v5/mapbox/driving/${from.lng},${from.lat};${to.lng},${to.lat}` +
      `?steps=true&overview=false&access_token=${this.accessToken}`;

    try {
      const response = await fetch(url);
      if (!response.ok) {
        console.error(`[Location] Directions failed with ${response.status}`);
        return null;
      }
      const data = directionsResponseSchema.parse(await response.json());
      const best = data.routes[0];
      if (!best) return null;

      return {
        steps: best.legs.flatMap(leg => leg.steps.map(step => step.maneuver.instruction)).slice(0, 5),
        distanceKm: roundKm(best.distance / 1000),
        etaMinutes: Math.max(1, Math.round(best.duration / 60)),
      };
    } catch (error) {
      console.error('[Location] Directions error:', error);
      return null;
    }
  }
}

// ═══════════════════════════════════════════════
// Offline landmark table
// ═══════════════════════════════════════════════

const landmarkSchema = z.object({
  name: z.string(),
  aliases: z.array(z.string()),
  lat: z.number(),
  lng: z.number(),
  address: z.string(),
});
type Landmark = z.infer<typeof landmarkSchema>;

const DEFAULT_LANDMARKS: Landmark[] = z.array(landmarkSchema).parse(landmarks);

const CITY_SPEED_KMH = 25;

const COMPASS = ['north', 'north-east', 'east', 'south-east', 'south', 'south-west', 'west', 'north-west'];

function compassDirection(from: GeoPoint, to: GeoPoint): string {
  const angle = (Math.atan2(to.lng - from.lng, to.lat - from.lat) * 180) / Math.PI;
  const index = Math.round(((angle + 360) % 360) / 45) % COMPASS.length;
  return COMPASS[index] ?? 'north';
}

export class OfflineLocationService implements LocationService {
  readonly name = 'offline';

  constructor(
    private readonly home: GeoPoint,
    private readonly table: Landmark[] = DEFAULT_LANDMARKS
  ) {}

  async geocode(text: string): Promise<LocationMatch[]> {
    return this.table
      .filter(landmark => hasAnyCue(text, landmark.aliases))
      .map(landmark => ({
        name: landmark.name,
        lat: landmark.lat,
        lng: landmark.lng,
        address: landmark.address,
        distanceKm: roundKm(haversineKm(this.home, landmark)),
      }))
      .sort((a, b) => a.distanceKm - b.distanceKm);
  }

  async route(from: GeoPoint, to: GeoPoint): Promise<RouteSummary | null> {
    const distanceKm = roundKm(haversineKm(from, to));
    return {
      steps: [`Head ${compassDirection(from, to)} for about ${distanceKm} km.`],
      distanceKm,
      etaMinutes: Math.max(1, Math.ceil((distanceKm / CITY_SPEED_KMH) * 60)),
    };
  }
}
