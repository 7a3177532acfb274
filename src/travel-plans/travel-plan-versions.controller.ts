import { Body, Controller, Get, HttpCode, HttpStatus, Param, ParseIntPipe, Post, Request, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiTags } from '@nestjs/swagger';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { AuthenticatedRequest } from '../common/interfaces/authenticated-request.interface';
import { ParseObjectIdPipe } from '../common/pipes/parse-object-id.pipe';
import { ok } from '../common/utils/api-response';
import { CreateVersionDto } from './dto/version.dto';
import { TravelPlanVersionsService } from './services/travel-plan-versions.service';
import { toPlanResponse, toVersionResponse } from './travel-plan.mapper';

@ApiTags('travel-plan-versions')
@ApiBearerAuth()
@UseGuards(JwtAuthGuard)
@Controller('travel-plans/:planId/versions')
export class TravelPlanVersionsController {
  constructor(private readonly versionsService: TravelPlanVersionsService) {}

  @Get()
  async list(@Param('planId', ParseObjectIdPipe) planId: string, @Request() req: AuthenticatedRequest) {
    const versions = await this.versionsService.list(planId, req.user.userId);
    return ok(versions.map(toVersionResponse));
  }

  @Get(':versionNumber')
  async get(
    @Param('planId', ParseObjectIdPipe) planId: string,
    @Param('versionNumber', ParseIntPipe) versionNumber: number,
    @Request() req: AuthenticatedRequest,
  ) {
    return ok(toVersionResponse(await this.versionsService.get(planId, versionNumber, req.user.userId)));
  }

  @Post()
  async create(
    @Param('planId', ParseObjectIdPipe) planId: string,
    @Body() dto: CreateVersionDto,
    @Request() req: AuthenticatedRequest,
  ) {
    const version = await this.versionsService.create(planId, req.user.userId, dto.changeDescription);
    return ok(toVersionResponse(version));
  }

  @Post(':versionNumber/restore')
  @HttpCode(HttpStatus.OK)
  async restore(
    @Param('planId', ParseObjectIdPipe) planId: string,
    @Param('versionNumber', ParseIntPipe) versionNumber: number,
    @Request() req: AuthenticatedRequest,
  ) {
    return ok(toPlanResponse(await this.versionsService.restore(planId, versionNumber, req.user.userId)));
  }
}
