import { TravelMode } from '../map.constants';

export type PlaceSource = '네이버' | 'google';

export interface Place {
  id: string;
  name: string;
  address: string;
  road_address: string;
  category: string;
  telephone: string;
  link: string;
  description: string;
  latitude: number;
  longitude: number;
  source: PlaceSource;
}

export interface NearbyPlace extends Place {
  // metres from the search centre
  distance: number;
}

export interface GeocodeResult {
  address: string;
  latitude: number;
  longitude: number;
  source: 'google' | 'static';
}

export interface RouteResult {
  origin: { lat: number; lon: number };
  destination: { lat: number; lon: number };
  mode: TravelMode;
  distance_km: number;
  duration_minutes: number;
  polyline: string | null;
  source: 'google' | 'estimate';
}
