import { DateTime } from 'luxon';
import { haversineKm, LatLng, roundTo } from '../common/utils/geo.util';
import { TravelMode } from '../map/map.constants';

export const DEFAULT_VISIT_MINUTES = 120;
export const DEFAULT_START_TIME = '09:00';
export const DAY_END_MINUTES = 21 * 60;

const WALKING_LIMIT_KM = 1.5;
const WALKING_MINUTES_PER_KM = 15;
const ROAD_FACTOR = 1.3;
const LOW_PRIORITY_PENALTY_MINUTES = 30;

export interface OptimizablePlace {
  id: string;
  name: string;
  lat: number;
  lon: number;
  duration_minutes?: number;
  priority?: number;
  opening_hours?: { open: string; close: string };
}

export interface LegEstimate {
  mode: TravelMode;
  distance_km: number;
  duration_minutes: number;
}

export interface RouteSegment extends LegEstimate {
  from_place_id: string;
  to_place_id: string;
  departure_time: string;
  arrival_time: string;
}

export interface OptimizedDay {
  day: number;
  places: OptimizablePlace[];
  skipped: OptimizablePlace[];
  segments: RouteSegment[];
  statistics: {
    places_count: number;
    total_distance_km: number;
    total_travel_minutes: number;
    total_visit_minutes: number;
    efficiency_score: number;
  };
}

export interface OptimizeOptions {
  start?: LatLng;
  startTime?: string;
  mode?: TravelMode;
}

export const START_PLACE_ID = 'start';

/**
 * Road estimate between two points. Short hops are walked when walking is
 * requested; everything else uses an average speed on a road-adjusted distance.
 */
export function estimateLeg(from: LatLng, to: LatLng, mode: TravelMode): LegEstimate {
  const straightKm = haversineKm(from, to);
  if (mode === 'walking' && straightKm <= WALKING_LIMIT_KM) {
    return {
      mode,
      distance_km: roundTo(straightKm, 2),
      duration_minutes: Math.floor(straightKm * WALKING_MINUTES_PER_KM),
    };
  }
  const speedKmh = mode === 'transit' ? 25 : 30;
  return {
    mode,
    distance_km: roundTo(straightKm * ROAD_FACTOR, 2),
    duration_minutes: Math.floor(((straightKm * 60) / speedKmh) * ROAD_FACTOR),
  };
}

export function parseClock(value: string): number {
  const time = DateTime.fromFormat(value, 'HH:mm', { zone: 'utc' });
  return time.hour * 60 + time.minute;
}

export function formatClock(minutes: number): string {
  return DateTime.fromObject({ hour: 0 }, { zone: 'utc' }).plus({ minutes }).toFormat('HH:mm');
}

function isOpen(place: OptimizablePlace, minutes: number): boolean {
  if (!place.opening_hours) {
    return true;
  }
  const clock = formatClock(minutes);
  return place.opening_hours.open <= clock && clock <= place.opening_hours.close;
}

const toPoint = (place: OptimizablePlace): LatLng => ({ lat: place.lat, lon: place.lon });

/**
 * Greedy nearest-neighbour ordering. Each step picks the open place with the
 * lowest travel time plus a penalty for low priority, until the day ends.
 * Without a start point the first place opens the day.
 */
export function optimizeDay(places: OptimizablePlace[], options: OptimizeOptions = {}, day = 1): OptimizedDay {
  const mode = options.mode ?? 'transit';
  const remaining = [...places];
  const ordered: OptimizablePlace[] = [];
  const segments: RouteSegment[] = [];
  let clock = parseClock(options.startTime ?? DEFAULT_START_TIME);

  let current: { id: string; point: LatLng } | undefined = options.start
    ? { id: START_PLACE_ID, point: options.start }
    : undefined;

  if (!current) {
    const first = remaining.shift();
    if (first) {
      ordered.push(first);
      clock += first.duration_minutes ?? DEFAULT_VISIT_MINUTES;
      current = { id: first.id, point: toPoint(first) };
    }
  }

  while (current && remaining.length > 0 && clock < DAY_END_MINUTES) {
    const from: { id: string; point: LatLng } = current;
    let best: { index: number; leg: LegEstimate; score: number } | undefined;

    for (const [index, place] of remaining.entries()) {
      if (!isOpen(place, clock)) {
        continue;
      }
      const leg = estimateLeg(from.point, toPoint(place), mode);
      const score = leg.duration_minutes + (1 - (place.priority ?? 1)) * LOW_PRIORITY_PENALTY_MINUTES;
      if (!best || score < best.score) {
        best = { index, leg, score };
      }
    }

    if (!best) {
      break;
    }

    const [next] = remaining.splice(best.index, 1);
    const arrival = clock + best.leg.duration_minutes;
    segments.push({
      ...best.leg,
      from_place_id: from.id,
      to_place_id: next.id,
      departure_time: formatClock(clock),
      arrival_time: formatClock(arrival),
    });
    ordered.push(next);
    clock = arrival + (next.duration_minutes ?? DEFAULT_VISIT_MINUTES);
    current = { id: next.id, point: toPoint(next) };
  }

  const totalTravel = segments.reduce((sum, segment) => sum + segment.duration_minutes, 0);
  const totalVisit = ordered.reduce((sum, place) => sum + (place.duration_minutes ?? DEFAULT_VISIT_MINUTES), 0);

  return {
    day,
    places: ordered,
    skipped: remaining,
    segments,
    statistics: {
      places_count: ordered.length,
      total_distance_km: roundTo(
        segments.reduce((sum, segment) => sum + segment.distance_km, 0),
        2,
      ),
      total_travel_minutes: totalTravel,
      total_visit_minutes: totalVisit,
      efficiency_score: efficiencyScore(ordered, totalTravel, totalVisit),
    },
  };
}

// share of the day spent visiting, blended with the mean priority
function efficiencyScore(places: OptimizablePlace[], travelMinutes: number, visitMinutes: number): number {
  if (places.length === 0 || travelMinutes + visitMinutes === 0) {
    return 0;
  }
  const visitShare = visitMinutes / (travelMinutes + visitMinutes);
  const meanPriority = places.reduce((sum, place) => sum + (place.priority ?? 1), 0) / places.length;
  return roundTo(Math.min(1, Math.max(0, visitShare * 0.6 + meanPriority * 0.4)), 3);
}

/**
 * Splits places into at most `days` latitude bands, then halves the largest
 * band until every day has something or no band can be split.
 */
export function clusterByLatitude<T extends { lat: number }>(places: T[], days: number): T[][] {
  if (places.length <= days) {
    return places.map((place) => [place]);
  }
  const lats = places.map((place) => place.lat);
  const min = Math.min(...lats);
  const max = Math.max(...lats);

  const bands: T[][] = Array.from({ length: days }, () => []);
  for (const place of places) {
    const ratio = (place.lat - min) / (max - min + 0.0001);
    bands[Math.min(Math.floor(ratio * days), days - 1)].push(place);
  }

  const clusters = bands.filter((band) => band.length > 0);
  while (clusters.length < days) {
    const largest = clusters.reduce((a, b) => (b.length > a.length ? b : a));
    if (largest.length < 2) {
      break;
    }
    const middle = Math.floor(largest.length / 2);
    clusters.push(largest.splice(middle));
  }
  return clusters;
}
