import { Injectable, Logger } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';
import { ResourceNotFoundException } from '../common/exceptions/app.exception';
import { haversineKm, LatLng, roundTo } from '../common/utils/geo.util';
import { RouteResult } from '../map/interfaces/map.interface';
import { TRAVEL_MODES, TravelMode } from '../map/map.constants';
import { MapService } from '../map/map.service';
import { TravelRoute, TravelRouteDocument } from '../travel-plans/schemas/travel-route.schema';
import { TravelPlanAccessService } from '../travel-plans/services/travel-plan-access.service';
import {
  CreateTravelRouteDto,
  RoutePreferencesDto,
  RouteStopDto,
  UpdateTravelRouteDto,
} from './dto/travel-route.dto';
import { clusterByLatitude, OptimizablePlace, OptimizedDay, optimizeDay, OptimizeOptions } from './route.optimizer';

const DEFAULT_MODE: TravelMode = 'driving';

export interface RouteRecommendation {
  distance_km: number;
  recommended: RouteResult;
  reason: string;
  alternatives: RouteResult[];
}

@Injectable()
export class TravelRoutesService {
  private readonly logger = new Logger(TravelRoutesService.name);

  constructor(
    @InjectModel(TravelRoute.name) private routeModel: Model<TravelRoute>,
    private readonly access: TravelPlanAccessService,
    private readonly mapService: MapService,
  ) {}

  calculate(origin: LatLng, destination: LatLng, mode: TravelMode = DEFAULT_MODE): Promise<RouteResult> {
    return this.mapService.getRoute(origin, destination, mode);
  }

  async calculateAllModes(origin: LatLng, destination: LatLng): Promise<Record<TravelMode, RouteResult>> {
    const results = await Promise.all(TRAVEL_MODES.map((mode) => this.mapService.getRoute(origin, destination, mode)));
    return {
      driving: results[0],
      walking: results[1],
      transit: results[2],
      bicycling: results[3],
    };
  }

  /**
   * Picks a mode by straight-line distance: walk up to 1 km, transit up to
   * 10 km, drive beyond. Preferences override the distance rule.
   */
  async recommend(
    origin: LatLng,
    destination: LatLng,
    preferences: RoutePreferencesDto = {},
  ): Promise<RouteRecommendation> {
    const routes = await this.calculateAllModes(origin, destination);
    const distanceKm = haversineKm(origin, destination);

    let mode: TravelMode;
    let reason: string;
    if (preferences.prefer_cost) {
      mode = 'transit';
      reason = '비용 절약을 위한 대중교통 추천';
    } else if (preferences.prefer_speed) {
      mode = 'driving';
      reason = '빠른 이동을 위한 자동차 추천';
    } else if (preferences.prefer_eco && distanceKm <= 2) {
      mode = 'walking';
      reason = '친환경 이동을 위한 도보 추천';
    } else if (distanceKm <= 1) {
      mode = 'walking';
      reason = '1km 이하 거리로 도보 이동 추천';
    } else if (distanceKm <= 10) {
      mode = 'transit';
      reason = '중거리 이동으로 대중교통 추천';
    } else {
      mode = 'driving';
      reason = '장거리 이동으로 자동차 이동 추천';
    }

    return {
      distance_km: roundTo(distanceKm, 2),
      recommended: routes[mode],
      reason,
      alternatives: TRAVEL_MODES.filter((candidate) => candidate !== mode).map((candidate) => routes[candidate]),
    };
  }

  optimizeDaily(places: OptimizablePlace[], options: OptimizeOptions): OptimizedDay {
    return optimizeDay(places, options);
  }

  optimizeMultiDay(places: OptimizablePlace[], days: number, options: OptimizeOptions): OptimizedDay[] {
    const plans = clusterByLatitude(places, days).map((cluster, index) => optimizeDay(cluster, options, index + 1));
    this.logger.log(`Optimized ${places.length} places over ${plans.length} days`);
    return plans;
  }

  async create(userId: string, dto: CreateTravelRouteDto): Promise<TravelRouteDocument> {
    const { plan } = await this.access.requireWrite(dto.planId, userId);
    return this.routeModel.create({ ...dto, planId: plan._id });
  }

  async listForPlan(planId: string, userId: string): Promise<TravelRouteDocument[]> {
    await this.access.requireRead(planId, userId);
    return this.routeModel.find({ planId }).sort({ routeOrder: 1 }).exec();
  }

  async get(routeId: string, userId: string): Promise<TravelRouteDocument> {
    const route = await this.findRoute(routeId);
    await this.access.requireRead(route.planId.toString(), userId);
    return route;
  }

  async update(routeId: string, userId: string, dto: UpdateTravelRouteDto): Promise<TravelRouteDocument> {
    const route = await this.findRoute(routeId);
    await this.access.requireWrite(route.planId.toString(), userId);
    route.set(dto);
    return route.save();
  }

  async remove(routeId: string, userId: string): Promise<void> {
    const route = await this.findRoute(routeId);
    await this.access.requireWrite(route.planId.toString(), userId);
    await this.routeModel.deleteOne({ _id: route._id }).exec();
  }

  /**
   * Replaces the plan's routes with one leg per consecutive pair of stops.
   */
  async autoGenerate(
    planId: string,
    userId: string,
    stops: RouteStopDto[],
    mode: TravelMode = DEFAULT_MODE,
  ): Promise<TravelRouteDocument[]> {
    const { plan } = await this.access.requireWrite(planId, userId);

    const legs = await Promise.all(
      stops.slice(1).map((stop, index) => {
        const from = stops[index];
        return this.mapService.getRoute({ lat: from.lat, lon: from.lon }, { lat: stop.lat, lon: stop.lon }, mode);
      }),
    );

    await this.routeModel.deleteMany({ planId: plan._id }).exec();
    const routes = await Promise.all(
      legs.map((leg, index) =>
        this.routeModel.create({
          planId: plan._id,
          originPlaceId: stops[index].place_id,
          destinationPlaceId: stops[index + 1].place_id,
          routeOrder: index + 1,
          transportMode: mode,
          durationMinutes: leg.duration_minutes,
          distanceKm: leg.distance_km,
          routeData: { polyline: leg.polyline, source: leg.source },
        }),
      ),
    );
    this.logger.log(`Generated ${routes.length} routes for plan ${planId}`);
    return routes;
  }

  private async findRoute(routeId: string): Promise<TravelRouteDocument> {
    const route = await this.routeModel.findById(routeId).exec();
    if (!route) {
      throw new ResourceNotFoundException('경로를 찾을 수 없습니다.');
    }
    return route;
  }
}
