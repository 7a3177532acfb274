import { haversineKm, LatLng } from '../common/utils/geo.util';
import { DEFAULT_RATING, PREFERENCE_MATCH_WEIGHT } from './recommendations.constants';
import { Destination } from './schemas/destination.schema';

type Scorable = Pick<Destination, 'tags' | 'rating'>;

export interface Scored<T> {
  destination: T;
  score: number;
}

export function preferenceMatches(tags: readonly string[], preferences: readonly string[]): number {
  const wanted = new Set(preferences);
  return new Set(tags.filter((tag) => wanted.has(tag))).size;
}

export function scoreDestination(destination: Scorable, preferences: readonly string[]): number {
  const base = destination.rating ?? DEFAULT_RATING;
  return base + PREFERENCE_MATCH_WEIGHT * preferenceMatches(destination.tags, preferences);
}

/**
 * Highest score first; equal scores keep their input order.
 */
export function rankDestinations<T extends Scorable>(destinations: readonly T[], preferences: readonly string[]): Scored<T>[] {
  return destinations
    .map((destination) => ({ destination, score: scoreDestination(destination, preferences) }))
    .sort((a, b) => b.score - a.score);
}

/**
 * Distance in km to a destination, or null when it has no coordinates.
 */
export function distanceTo(origin: LatLng, destination: Pick<Destination, 'latitude' | 'longitude'>): number | null {
  if (destination.latitude == null || destination.longitude == null) {
    return null;
  }
  return haversineKm(origin, { lat: destination.latitude, lon: destination.longitude });
}
