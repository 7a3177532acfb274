export interface GoogleLatLng {
  lat: number;
  lng: number;
}

export interface GooglePlaceResult {
  place_id: string;
  name: string;
  formatted_address?: string;
  vicinity?: string;
  types?: string[];
  geometry: { location: GoogleLatLng };
  rating?: number;
}

export interface GooglePlacesResponse {
  results: GooglePlaceResult[];
  status: string;
}

export interface GoogleGeocodingResult {
  formatted_address: string;
  geometry: { location: GoogleLatLng; location_type: string };
  place_id: string;
  types: string[];
}

export interface GoogleGeocodingResponse {
  results: GoogleGeocodingResult[];
  status: string;
}

export interface GoogleDirectionsLeg {
  distance: { text: string; value: number };
  duration: { text: string; value: number };
  start_address: string;
  end_address: string;
  start_location: GoogleLatLng;
  end_location: GoogleLatLng;
}

export interface GoogleDirectionsRoute {
  legs: GoogleDirectionsLeg[];
  overview_polyline: { points: string };
  summary: string;
  warnings: string[];
}

export interface GoogleDirectionsResponse {
  routes: GoogleDirectionsRoute[];
  status: string;
}
