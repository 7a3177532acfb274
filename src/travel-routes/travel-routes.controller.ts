import { Body, Controller, Delete, Get, HttpCode, HttpStatus, Param, Post, Put, Request, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiTags } from '@nestjs/swagger';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { AuthenticatedRequest } from '../common/interfaces/authenticated-request.interface';
import { ParseObjectIdPipe } from '../common/pipes/parse-object-id.pipe';
import { ok } from '../common/utils/api-response';
import { toRouteResponse } from '../travel-plans/travel-plan.mapper';
import {
  AutoGenerateRoutesDto,
  CalculateRouteDto,
  CreateTravelRouteDto,
  OptimizeDailyRouteDto,
  OptimizeMultiDayRouteDto,
  RecommendRouteDto,
  RouteEndpointsDto,
  UpdateTravelRouteDto,
} from './dto/travel-route.dto';
import { OptimizeOptions } from './route.optimizer';
import { TravelRoutesService } from './travel-routes.service';

function toOptimizeOptions(dto: OptimizeDailyRouteDto): OptimizeOptions {
  return { start: dto.start, startTime: dto.start_time, mode: dto.mode };
}

@ApiTags('routes')
@ApiBearerAuth()
@UseGuards(JwtAuthGuard)
@Controller('routes')
export class TravelRoutesController {
  constructor(private readonly travelRoutesService: TravelRoutesService) {}

  @Post('calculate')
  @HttpCode(HttpStatus.OK)
  calculate(@Body() dto: CalculateRouteDto) {
    return this.travelRoutesService.calculate(dto.origin, dto.destination, dto.mode);
  }

  @Post('calculate/multiple')
  @HttpCode(HttpStatus.OK)
  async calculateAllModes(@Body() dto: RouteEndpointsDto) {
    return ok(await this.travelRoutesService.calculateAllModes(dto.origin, dto.destination));
  }

  @Post('recommend')
  @HttpCode(HttpStatus.OK)
  async recommend(@Body() dto: RecommendRouteDto) {
    return ok(await this.travelRoutesService.recommend(dto.origin, dto.destination, dto.preferences));
  }

  @Post('optimize-daily')
  @HttpCode(HttpStatus.OK)
  optimizeDaily(@Body() dto: OptimizeDailyRouteDto) {
    return ok(this.travelRoutesService.optimizeDaily(dto.places, toOptimizeOptions(dto)));
  }

  @Post('optimize-multi-day')
  @HttpCode(HttpStatus.OK)
  optimizeMultiDay(@Body() dto: OptimizeMultiDayRouteDto) {
    return ok(this.travelRoutesService.optimizeMultiDay(dto.places, dto.days, toOptimizeOptions(dto)));
  }

  @Post()
  async create(@Body() dto: CreateTravelRouteDto, @Request() req: AuthenticatedRequest) {
    return ok(toRouteResponse(await this.travelRoutesService.create(req.user.userId, dto)));
  }

  @Get('plan/:planId')
  async listForPlan(@Param('planId', ParseObjectIdPipe) planId: string, @Request() req: AuthenticatedRequest) {
    const routes = await this.travelRoutesService.listForPlan(planId, req.user.userId);
    return ok(routes.map(toRouteResponse));
  }

  @Post('plan/:planId/auto-generate')
  async autoGenerate(
    @Param('planId', ParseObjectIdPipe) planId: string,
    @Body() dto: AutoGenerateRoutesDto,
    @Request() req: AuthenticatedRequest,
  ) {
    const routes = await this.travelRoutesService.autoGenerate(planId, req.user.userId, dto.stops, dto.mode);
    return ok(routes.map(toRouteResponse));
  }

  @Get(':routeId')
  async get(@Param('routeId', ParseObjectIdPipe) routeId: string, @Request() req: AuthenticatedRequest) {
    return ok(toRouteResponse(await this.travelRoutesService.get(routeId, req.user.userId)));
  }

  @Put(':routeId')
  async update(
    @Param('routeId', ParseObjectIdPipe) routeId: string,
    @Body() dto: UpdateTravelRouteDto,
    @Request() req: AuthenticatedRequest,
  ) {
    return ok(toRouteResponse(await this.travelRoutesService.update(routeId, req.user.userId, dto)));
  }

  @Delete(':routeId')
  async remove(@Param('routeId', ParseObjectIdPipe) routeId: string, @Request() req: AuthenticatedRequest) {
    await this.travelRoutesService.remove(routeId, req.user.userId);
    return ok({ message: '경로가 삭제되었습니다.' });
  }
}
