import { haversineKm, LatLng, roundTo } from '../common/utils/geo.util';
import { ROUTE_SPEEDS_KMH, TravelMode } from './map.constants';
import { RouteResult } from './interfaces/map.interface';

export function stripTags(value: string): string {
  return value.replace(/<\/?b>/g, '');
}

/** Naver reports coordinates as integers scaled by 10^7. */
export function fromNaverCoordinate(value: string): number {
  return Number.parseInt(value, 10) / 1e7;
}

/**
 * Straight-line route estimate at an assumed average speed for the mode.
 */
export function estimateRoute(origin: LatLng, destination: LatLng, mode: TravelMode): RouteResult {
  const distanceKm = haversineKm(origin, destination);
  return {
    origin,
    destination,
    mode,
    distance_km: roundTo(distanceKm, 2),
    duration_minutes: Math.round((distanceKm / ROUTE_SPEEDS_KMH[mode]) * 60),
    polyline: null,
    source: 'estimate',
  };
}

export interface MapView {
  latitude: number;
  longitude: number;
  zoom: number;
  width: number;
  height: number;
}

export function buildEmbedUrl({ latitude, longitude, zoom, width, height }: MapView): string {
  return `https://map.naver.com/v5/embed/place/${latitude},${longitude}?zoom=${zoom}&width=${width}&height=${height}`;
}

export function buildStaticUrl({ latitude, longitude, zoom, width, height }: MapView): string {
  return `https://map.naver.com/v5/staticmap?lat=${latitude}&lng=${longitude}&zoom=${zoom}&size=${width}x${height}`;
}
