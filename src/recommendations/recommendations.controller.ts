import { Body, Controller, Get, HttpCode, HttpStatus, Param, Post, Query, Request, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiTags } from '@nestjs/swagger';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { Roles } from '../common/decorators/roles.decorator';
import { RolesGuard } from '../common/guards/roles.guard';
import { AuthenticatedRequest } from '../common/interfaces/authenticated-request.interface';
import { buildPagination, ok } from '../common/utils/api-response';
import { roundTo } from '../common/utils/geo.util';
import { toDestinationResponse } from './destination.mapper';
import {
  CreateDestinationDto,
  DestinationListQueryDto,
  NearbyDestinationsDto,
  PopularDestinationsQueryDto,
  WeatherRecommendationQueryDto,
} from './dto/destination.dto';
import { RecommendationsService } from './recommendations.service';

@ApiTags('recommendations')
@Controller('recommendations')
export class RecommendationsController {
  constructor(private readonly recommendationsService: RecommendationsService) {}

  @Get('weather')
  @ApiBearerAuth()
  @UseGuards(JwtAuthGuard)
  @ApiOperation({ summary: '현재 날씨와 선호 태그 기반 여행지 추천' })
  async byWeather(@Query() query: WeatherRecommendationQueryDto, @Request() req: AuthenticatedRequest) {
    const result = await this.recommendationsService.recommendByWeather(query.province, query.city, req.user.userId);
    return ok({
      weather: result.weather,
      tags: result.tags,
      destinations: result.destinations.map(({ destination, score }) => ({
        destination: toDestinationResponse(destination),
        score,
      })),
    });
  }

  @Get('destinations')
  async list(@Query() query: DestinationListQueryDto) {
    const { items, total } = await this.recommendationsService.list(query);
    return ok(items.map(toDestinationResponse), buildPagination(query.page, query.limit, total));
  }

  @Get('destinations/:id')
  async get(@Param('id') id: string) {
    return ok(toDestinationResponse(await this.recommendationsService.get(id)));
  }

  @Post('destinations')
  @ApiBearerAuth()
  @UseGuards(JwtAuthGuard, RolesGuard)
  @Roles('ADMIN')
  async create(@Body() dto: CreateDestinationDto) {
    return ok(toDestinationResponse(await this.recommendationsService.create(dto)));
  }

  @Get('popular')
  async popular(@Query() query: PopularDestinationsQueryDto) {
    return ok((await this.recommendationsService.popular(query)).map(toDestinationResponse));
  }

  @Post('nearby')
  @HttpCode(HttpStatus.OK)
  async nearby(@Body() dto: NearbyDestinationsDto) {
    const results = await this.recommendationsService.nearby(
      { lat: dto.latitude, lon: dto.longitude },
      dto.maxDistanceKm,
      dto.preferences,
    );
    return ok(
      results.map(({ destination, score, distanceKm }) => ({
        destination: toDestinationResponse(destination),
        score,
        distance_km: roundTo(distanceKm, 2),
      })),
    );
  }
}
