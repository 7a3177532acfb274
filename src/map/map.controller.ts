import { Controller, Get, Param, Query } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import {
  GeocodeQueryDto,
  MapViewQueryDto,
  NearbyQueryDto,
  NearbySearchQueryDto,
  RouteQueryDto,
  SearchQueryDto,
} from './dto/map-query.dto';
import { MAP_VIEW_DEFAULTS, NEARBY_QUERIES, SEARCH_CATEGORIES } from './map.constants';
import { MapService } from './map.service';
import { buildEmbedUrl, buildStaticUrl, MapView } from './map.utils';

const DEFAULT_NEARBY_RADIUS = 1000;

@ApiTags('map')
@Controller('map')
export class MapController {
  constructor(private readonly mapService: MapService) {}

  @Get('search')
  async search(@Query() { query, display }: SearchQueryDto) {
    const places = await this.mapService.searchPlaces(query, display ?? 10);
    return { places, total: places.length, query };
  }

  @Get('search/coordinates')
  geocode(@Query() { address }: GeocodeQueryDto) {
    return this.mapService.geocode(address);
  }

  @Get('nearby')
  nearby(@Query() dto: NearbySearchQueryDto) {
    return this.nearbyResponse(dto, dto.query, 'places');
  }

  @Get('restaurants/nearby')
  restaurants(@Query() dto: NearbyQueryDto) {
    return this.nearbyResponse(dto, NEARBY_QUERIES.restaurants, 'restaurants');
  }

  @Get('hotels/nearby')
  hotels(@Query() dto: NearbyQueryDto) {
    return this.nearbyResponse(dto, NEARBY_QUERIES.hotels, 'hotels');
  }

  @Get('transportation/nearby')
  transportation(@Query() dto: NearbyQueryDto) {
    return this.nearbyResponse(dto, NEARBY_QUERIES.transportation, 'transportation');
  }

  @Get('coordinates/:city')
  coordinates(@Param('city') city: string) {
    return this.mapService.getCityCoordinates(city);
  }

  @Get('route')
  route(@Query() dto: RouteQueryDto) {
    return this.mapService.getRoute(
      { lat: dto.start_lat, lon: dto.start_lon },
      { lat: dto.end_lat, lon: dto.end_lon },
      dto.mode ?? 'driving',
    );
  }

  @Get('embed')
  embed(@Query() dto: MapViewQueryDto) {
    const view = toView(dto);
    return { embed_url: buildEmbedUrl(view), ...describeView(view) };
  }

  @Get('static')
  staticMap(@Query() dto: MapViewQueryDto) {
    const view = toView(dto);
    return { static_url: buildStaticUrl(view), ...describeView(view) };
  }

  @Get('cities')
  cities() {
    return { cities: this.mapService.getSupportedCities() };
  }

  @Get('categories')
  categories() {
    return { categories: SEARCH_CATEGORIES };
  }

  private async nearbyResponse(dto: NearbyQueryDto, query: string, key: string) {
    const radius = dto.radius ?? DEFAULT_NEARBY_RADIUS;
    const places = await this.mapService.searchNearby({ lat: dto.lat, lon: dto.lon }, query, radius);
    return {
      [key]: places,
      total: places.length,
      center: { latitude: dto.lat, longitude: dto.lon },
      radius,
    };
  }
}

function toView(dto: MapViewQueryDto): MapView {
  return {
    latitude: dto.lat,
    longitude: dto.lon,
    zoom: dto.zoom ?? MAP_VIEW_DEFAULTS.zoom,
    width: dto.width ?? MAP_VIEW_DEFAULTS.width,
    height: dto.height ?? MAP_VIEW_DEFAULTS.height,
  };
}

function describeView(view: MapView) {
  return {
    coordinates: { latitude: view.latitude, longitude: view.longitude },
    zoom: view.zoom,
    size: { width: view.width, height: view.height },
  };
}
