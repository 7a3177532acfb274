import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { FilterQuery, isValidObjectId, Model } from 'mongoose';
import { LatLng } from '../common/utils/geo.util';
import { KmaCurrentWeather } from '../kma/interfaces/kma-weather.interface';
import { KmaService } from '../kma/kma.service';
import { UserService } from '../user/user.service';
import { CreateDestinationDto, DestinationListQueryDto, PopularDestinationsQueryDto } from './dto/destination.dto';
import { distanceTo, rankDestinations, Scored } from './recommendation.scorer';
import { NEARBY_RESULT_LIMIT, tagsForWeather } from './recommendations.constants';
import { Destination, DestinationDocument } from './schemas/destination.schema';

export interface WeatherRecommendation {
  weather: KmaCurrentWeather;
  tags: string[];
  destinations: Scored<DestinationDocument>[];
}

export interface NearbyDestination extends Scored<DestinationDocument> {
  distanceKm: number;
}

const escapeRegex = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

@Injectable()
export class RecommendationsService {
  private readonly logger = new Logger(RecommendationsService.name);

  constructor(
    @InjectModel(Destination.name) private destinationModel: Model<Destination>,
    private readonly kmaService: KmaService,
    private readonly userService: UserService,
  ) {}

  /**
   * Destinations in `province` suited to the current sky over `cityName`,
   * ranked by rating plus the user's matching preference tags.
   */
  async recommendByWeather(
    province: string,
    cityName: string,
    userId: string,
    now: Date = new Date(),
  ): Promise<WeatherRecommendation> {
    const city = this.kmaService.getSupportedCity(cityName);
    const weather = await this.kmaService.getCurrentWeather(city.nx, city.ny, now);
    const tags = tagsForWeather(weather.sky_condition);

    const filter: FilterQuery<Destination> = { province, status: 'active' };
    if (tags.length > 0) {
      filter.tags = { $in: tags };
    }
    const [candidates, user] = await Promise.all([
      this.destinationModel.find(filter).exec(),
      this.userService.findOneById(userId),
    ]);
    this.logger.log(`${cityName} is ${weather.sky_condition}: ${candidates.length} candidates in ${province}`);

    return { weather, tags, destinations: rankDestinations(candidates, user?.preferences ?? []) };
  }

  async list(query: DestinationListQueryDto): Promise<{ items: DestinationDocument[]; total: number }> {
    const filter = this.activeFilter(query.region);
    if (query.category) {
      filter.category = query.category;
    }
    const [items, total] = await Promise.all([
      this.destinationModel
        .find(filter)
        .sort({ popularityScore: -1 })
        .skip((query.page - 1) * query.limit)
        .limit(query.limit)
        .exec(),
      this.destinationModel.countDocuments(filter).exec(),
    ]);
    return { items, total };
  }

  async get(id: string): Promise<DestinationDocument> {
    const destination = isValidObjectId(id)
      ? await this.destinationModel.findOne({ _id: id, status: 'active' }).exec()
      : null;
    if (!destination) {
      throw new NotFoundException('여행지를 찾을 수 없습니다.');
    }
    return destination;
  }

  async create(dto: CreateDestinationDto): Promise<DestinationDocument> {
    const destination = await this.destinationModel.create(dto);
    this.logger.log(`Destination created: ${destination.name} (${destination.province})`);
    return destination;
  }

  /**
   * Inserts or refreshes a destination keyed by name and province.
   */
  async upsert(dto: CreateDestinationDto): Promise<'created' | 'updated'> {
    const result = await this.destinationModel
      .updateOne({ name: dto.name, province: dto.province }, { $set: dto }, { upsert: true })
      .exec();
    return result.upsertedCount > 0 ? 'created' : 'updated';
  }

  async popular(query: PopularDestinationsQueryDto): Promise<DestinationDocument[]> {
    return this.destinationModel.find(this.activeFilter(query.region)).sort({ popularityScore: -1 }).limit(query.limit).exec();
  }

  async nearby(origin: LatLng, maxDistanceKm: number, preferences: readonly string[] = []): Promise<NearbyDestination[]> {
    const candidates = await this.destinationModel
      .find({ status: 'active', latitude: { $ne: null }, longitude: { $ne: null } })
      .exec();

    const distances = new Map<DestinationDocument, number>();
    for (const destination of candidates) {
      const distance = distanceTo(origin, destination);
      if (distance !== null && distance <= maxDistanceKm) {
        distances.set(destination, distance);
      }
    }

    return rankDestinations([...distances.keys()], preferences)
      .slice(0, NEARBY_RESULT_LIMIT)
      .map((scored) => ({ ...scored, distanceKm: distances.get(scored.destination) ?? 0 }));
  }

  private activeFilter(region?: string): FilterQuery<Destination> {
    const filter: FilterQuery<Destination> = { status: 'active' };
    if (region) {
      filter.region = { $regex: escapeRegex(region), $options: 'i' };
    }
    return filter;
  }
}
