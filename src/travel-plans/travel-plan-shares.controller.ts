import { Body, Controller, Delete, Get, Param, Post, Put, Request, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiTags } from '@nestjs/swagger';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { OptionalJwtAuthGuard } from '../auth/guards/optional-jwt-auth.guard';
import { AuthenticatedRequest, OptionalAuthRequest } from '../common/interfaces/authenticated-request.interface';
import { ParseObjectIdPipe } from '../common/pipes/parse-object-id.pipe';
import { ok } from '../common/utils/api-response';
import { CreateShareDto, UpdateShareDto } from './dto/share.dto';
import { TravelPlanSharesService } from './services/travel-plan-shares.service';
import { toPlanResponse } from './travel-plan.mapper';

@ApiTags('travel-plan-shares')
@ApiBearerAuth()
@UseGuards(JwtAuthGuard)
@Controller('travel-plans')
export class TravelPlanSharesController {
  constructor(private readonly sharesService: TravelPlanSharesService) {}

  @Post(':planId/share')
  async create(
    @Param('planId', ParseObjectIdPipe) planId: string,
    @Body() dto: CreateShareDto,
    @Request() req: AuthenticatedRequest,
  ) {
    return ok(this.sharesService.present(await this.sharesService.create(planId, req.user.userId, dto)));
  }

  @Get(':planId/shares')
  async list(@Param('planId', ParseObjectIdPipe) planId: string, @Request() req: AuthenticatedRequest) {
    const shares = await this.sharesService.list(planId, req.user.userId);
    return ok(shares.map((share) => this.sharesService.present(share)));
  }

  @Put(':planId/shares/:shareId')
  async update(
    @Param('planId', ParseObjectIdPipe) planId: string,
    @Param('shareId', ParseObjectIdPipe) shareId: string,
    @Body() dto: UpdateShareDto,
    @Request() req: AuthenticatedRequest,
  ) {
    const share = await this.sharesService.setActive(planId, shareId, req.user.userId, dto.isActive);
    return ok(this.sharesService.present(share));
  }

  @Delete(':planId/shares/:shareId')
  async remove(
    @Param('planId', ParseObjectIdPipe) planId: string,
    @Param('shareId', ParseObjectIdPipe) shareId: string,
    @Request() req: AuthenticatedRequest,
  ) {
    await this.sharesService.remove(planId, shareId, req.user.userId);
    return ok({ message: '공유 링크가 삭제되었습니다.' });
  }
}

@ApiTags('shared-plans')
@Controller('shared')
export class SharedPlansController {
  constructor(private readonly sharesService: TravelPlanSharesService) {}

  @UseGuards(OptionalJwtAuthGuard)
  @Get(':token')
  async open(@Param('token') token: string, @Request() req: OptionalAuthRequest) {
    const { plan, permission, canEdit } = await this.sharesService.open(token, req.user?.userId);
    return ok({ plan: toPlanResponse(plan), share_permission: permission, can_edit: canEdit });
  }
}
