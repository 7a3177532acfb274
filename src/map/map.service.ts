import { Injectable, Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { firstValueFrom } from 'rxjs';
import { ResourceNotFoundException } from '../common/exceptions/app.exception';
import { haversineKm, LatLng, roundTo } from '../common/utils/geo.util';
import { errorMessage, HTTP_TIMEOUT_MS } from '../common/utils/http-error.util';
import { KMA_CITIES } from '../kma/kma.constants';
import {
  GoogleDirectionsResponse,
  GoogleGeocodingResponse,
  GooglePlaceResult,
  GooglePlacesResponse,
} from './interfaces/google-maps-response.interface';
import { GeocodeResult, NearbyPlace, Place, RouteResult } from './interfaces/map.interface';
import { NaverLocalItem, NaverLocalSearchResponse } from './interfaces/naver-search-response.interface';
import { GOOGLE_MAPS_BASE_URL, NAVER_LOCAL_SEARCH_URL, TravelMode } from './map.constants';
import { estimateRoute, fromNaverCoordinate, stripTags } from './map.utils';

/**
 * Place search and routing: Naver first, Google as fallback, static data last.
 */
@Injectable()
export class MapService {
  private readonly logger = new Logger(MapService.name);
  private readonly naverClientId: string;
  private readonly naverClientSecret: string;
  private readonly googleApiKey: string;

  constructor(
    private readonly httpService: HttpService,
    private readonly configService: ConfigService,
  ) {
    this.naverClientId = this.configService.get<string>('NAVER_CLIENT_ID') || '';
    this.naverClientSecret = this.configService.get<string>('NAVER_CLIENT_SECRET') || '';
    this.googleApiKey = this.configService.get<string>('GOOGLE_API_KEY') || '';

    if (!this.naverClientId || !this.naverClientSecret) {
      this.logger.warn('Missing NAVER_CLIENT_ID / NAVER_CLIENT_SECRET in environment variables');
    }
    if (!this.googleApiKey) {
      this.logger.warn('Missing GOOGLE_API_KEY in environment variables');
    }
  }

  get isNaverConfigured(): boolean {
    return this.naverClientId.length > 0 && this.naverClientSecret.length > 0;
  }

  get isGoogleConfigured(): boolean {
    return this.googleApiKey.length > 0;
  }

  async searchPlaces(query: string, display = 10): Promise<Place[]> {
    if (this.isNaverConfigured) {
      try {
        return await this.searchNaver(query, display);
      } catch (error) {
        this.logger.warn(`Naver search failed for "${query}", trying Google: ${errorMessage(error)}`);
      }
    }
    if (this.isGoogleConfigured) {
      try {
        const results = await this.googleGet<GooglePlacesResponse>('place/textsearch/json', {
          query,
          language: 'ko',
        });
        return results.results.slice(0, display).map(fromGooglePlace);
      } catch (error) {
        this.logger.warn(`Google text search failed for "${query}": ${errorMessage(error)}`);
      }
    }
    return [];
  }

  /**
   * Places matching `query` within `radiusMeters` of a point, nearest first.
   */
  async searchNearby(center: LatLng, query: string, radiusMeters: number): Promise<NearbyPlace[]> {
    let places: Place[] = [];
    if (this.isNaverConfigured) {
      places = await this.searchPlaces(query, 30);
    } else if (this.isGoogleConfigured) {
      try {
        const results = await this.googleGet<GooglePlacesResponse>('place/nearbysearch/json', {
          location: `${center.lat},${center.lon}`,
          radius: radiusMeters,
          keyword: query,
          language: 'ko',
        });
        places = results.results.map(fromGooglePlace);
      } catch (error) {
        this.logger.warn(`Google nearby search failed for "${query}": ${errorMessage(error)}`);
      }
    }

    return places
      .map((place) => ({
        ...place,
        distance: Math.round(haversineKm(center, { lat: place.latitude, lon: place.longitude }) * 1000),
      }))
      .filter((place) => place.distance <= radiusMeters)
      .sort((a, b) => a.distance - b.distance);
  }

  getCityCoordinates(city: string): { city: string; latitude: number; longitude: number } {
    const match = KMA_CITIES.find((candidate) => candidate.name === city);
    if (!match) {
      throw new ResourceNotFoundException(`'${city}'의 좌표 정보를 찾을 수 없습니다.`);
    }
    return { city: match.name, latitude: match.lat, longitude: match.lon };
  }

  getSupportedCities(): string[] {
    return KMA_CITIES.map((city) => city.name);
  }

  async geocode(address: string): Promise<GeocodeResult> {
    if (this.isGoogleConfigured) {
      try {
        const data = await this.googleGet<GoogleGeocodingResponse>('geocode/json', { address, language: 'ko' });
        const [first] = data.results;
        if (first) {
          return {
            address: first.formatted_address,
            latitude: first.geometry.location.lat,
            longitude: first.geometry.location.lng,
            source: 'google',
          };
        }
      } catch (error) {
        this.logger.warn(`Geocoding failed for "${address}": ${errorMessage(error)}`);
      }
    }

    const city = KMA_CITIES.find((candidate) => candidate.name === address.trim());
    if (city) {
      return { address: city.name, latitude: city.lat, longitude: city.lon, source: 'static' };
    }
    throw new ResourceNotFoundException(`'${address}'의 좌표를 찾을 수 없습니다.`);
  }

  async getRoute(origin: LatLng, destination: LatLng, mode: TravelMode): Promise<RouteResult> {
    if (this.isGoogleConfigured) {
      try {
        const data = await this.googleGet<GoogleDirectionsResponse>('directions/json', {
          origin: `${origin.lat},${origin.lon}`,
          destination: `${destination.lat},${destination.lon}`,
          mode,
        });
        const [route] = data.routes;
        const leg = route?.legs[0];
        if (route && leg) {
          return {
            origin,
            destination,
            mode,
            distance_km: roundTo(leg.distance.value / 1000, 2),
            duration_minutes: Math.round(leg.duration.value / 60),
            polyline: route.overview_polyline.points,
            source: 'google',
          };
        }
      } catch (error) {
        this.logger.warn(`Google directions failed, estimating: ${errorMessage(error)}`);
      }
    }
    return estimateRoute(origin, destination, mode);
  }

  private async searchNaver(query: string, display: number): Promise<Place[]> {
    const response = await firstValueFrom(
      this.httpService.get<NaverLocalSearchResponse>(NAVER_LOCAL_SEARCH_URL, {
        headers: {
          'X-NCP-APIGW-API-KEY-ID': this.naverClientId,
          'X-NCP-APIGW-API-KEY': this.naverClientSecret,
        },
        params: { query, display, start: 1, sort: 'random' },
        timeout: HTTP_TIMEOUT_MS,
      }),
    );
    return (response.data.items ?? []).map(fromNaverItem);
  }

  // Google answers HTTP 200 with a status field; anything but OK/ZERO_RESULTS is a failure
  private async googleGet<T extends { status: string }>(path: string, params: Record<string, string | number>): Promise<T> {
    const response = await firstValueFrom(
      this.httpService.get<T>(`${GOOGLE_MAPS_BASE_URL}/${path}`, {
        params: { ...params, key: this.googleApiKey },
        timeout: HTTP_TIMEOUT_MS,
      }),
    );
    const { status } = response.data;
    if (status !== 'OK' && status !== 'ZERO_RESULTS') {
      throw new Error(`Google ${path} returned ${status}`);
    }
    return response.data;
  }
}

function fromNaverItem(item: NaverLocalItem): Place {
  return {
    id: `naver:${item.mapx}:${item.mapy}`,
    name: stripTags(item.title),
    address: item.address,
    road_address: item.roadAddress ?? '',
    category: item.category,
    telephone: item.telephone ?? '',
    link: item.link ?? '',
    description: stripTags(item.description ?? ''),
    latitude: fromNaverCoordinate(item.mapy),
    longitude: fromNaverCoordinate(item.mapx),
    source: '네이버',
  };
}

function fromGooglePlace(result: GooglePlaceResult): Place {
  return {
    id: result.place_id,
    name: result.name,
    address: result.formatted_address ?? result.vicinity ?? '',
    road_address: '',
    category: result.types?.[0] ?? '',
    telephone: '',
    link: '',
    description: '',
    latitude: result.geometry.location.lat,
    longitude: result.geometry.location.lng,
    source: 'google',
  };
}
