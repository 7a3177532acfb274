import { Body, Controller, Delete, Get, HttpCode, HttpStatus, Param, Post, Put, Query, Request, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiTags } from '@nestjs/swagger';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { PaginationQueryDto } from '../common/dto/pagination-query.dto';
import { AuthenticatedRequest } from '../common/interfaces/authenticated-request.interface';
import { ParseObjectIdPipe } from '../common/pipes/parse-object-id.pipe';
import { buildPagination, ok } from '../common/utils/api-response';
import { CreateTravelPlanDto, TravelPlanListQueryDto, UpdateTravelPlanDto } from './dto/travel-plan.dto';
import { toPlanResponse } from './travel-plan.mapper';
import { TravelPlansService } from './travel-plans.service';

@ApiTags('travel-plans')
@ApiBearerAuth()
@UseGuards(JwtAuthGuard)
@Controller('travel-plans')
export class TravelPlansController {
  constructor(private readonly travelPlansService: TravelPlansService) {}

  @Post()
  async create(@Body() dto: CreateTravelPlanDto, @Request() req: AuthenticatedRequest) {
    const plan = await this.travelPlansService.create(req.user.userId, dto);
    return ok(toPlanResponse(plan));
  }

  @Get()
  async list(@Query() query: TravelPlanListQueryDto, @Request() req: AuthenticatedRequest) {
    const { items, total } = await this.travelPlansService.list(req.user.userId, query);
    return ok(items.map(toPlanResponse), buildPagination(query.page, query.limit, total));
  }

  // Declared before ':planId' so the literal segment wins
  @Get('bookmarks')
  async listBookmarks(@Query() query: PaginationQueryDto, @Request() req: AuthenticatedRequest) {
    const { items, total } = await this.travelPlansService.listBookmarks(req.user.userId, query.page, query.limit);
    return ok(
      items.map(({ plan, bookmarkedAt }) => ({ ...toPlanResponse(plan), bookmarked_at: bookmarkedAt })),
      buildPagination(query.page, query.limit, total),
    );
  }

  @Get(':planId')
  async get(@Param('planId', ParseObjectIdPipe) planId: string, @Request() req: AuthenticatedRequest) {
    return ok(toPlanResponse(await this.travelPlansService.get(planId, req.user.userId)));
  }

  @Put(':planId')
  async update(
    @Param('planId', ParseObjectIdPipe) planId: string,
    @Body() dto: UpdateTravelPlanDto,
    @Request() req: AuthenticatedRequest,
  ) {
    return ok(toPlanResponse(await this.travelPlansService.update(planId, req.user.userId, dto)));
  }

  @Delete(':planId')
  async remove(@Param('planId', ParseObjectIdPipe) planId: string, @Request() req: AuthenticatedRequest) {
    await this.travelPlansService.remove(planId, req.user.userId);
    return ok({ message: '여행 계획이 삭제되었습니다.' });
  }

  @Post(':planId/bookmark')
  @HttpCode(HttpStatus.OK)
  async toggleBookmark(@Param('planId', ParseObjectIdPipe) planId: string, @Request() req: AuthenticatedRequest) {
    return ok(await this.travelPlansService.toggleBookmark(planId, req.user.userId));
  }

  @Get(':planId/bookmark/status')
  async bookmarkStatus(@Param('planId', ParseObjectIdPipe) planId: string, @Request() req: AuthenticatedRequest) {
    return ok(await this.travelPlansService.isBookmarked(planId, req.user.userId));
  }
}
