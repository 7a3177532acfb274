import { Body, Controller, Delete, Get, Param, Post, Request, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiTags } from '@nestjs/swagger';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { AuthenticatedRequest } from '../common/interfaces/authenticated-request.interface';
import { ParseObjectIdPipe } from '../common/pipes/parse-object-id.pipe';
import { ok } from '../common/utils/api-response';
import { AddCollaboratorDto } from './dto/collaborator.dto';
import { TravelPlanCollaboratorsService } from './services/travel-plan-collaborators.service';
import { toCollaboratorResponse } from './travel-plan.mapper';

@ApiTags('travel-plan-collaborators')
@ApiBearerAuth()
@UseGuards(JwtAuthGuard)
@Controller('travel-plans/:planId/collaborators')
export class TravelPlanCollaboratorsController {
  constructor(private readonly collaboratorsService: TravelPlanCollaboratorsService) {}

  @Get()
  async list(@Param('planId', ParseObjectIdPipe) planId: string, @Request() req: AuthenticatedRequest) {
    const collaborators = await this.collaboratorsService.list(planId, req.user.userId);
    return ok(collaborators.map(toCollaboratorResponse));
  }

  @Post()
  async add(
    @Param('planId', ParseObjectIdPipe) planId: string,
    @Body() dto: AddCollaboratorDto,
    @Request() req: AuthenticatedRequest,
  ) {
    return ok(toCollaboratorResponse(await this.collaboratorsService.add(planId, req.user.userId, dto)));
  }

  @Delete(':userId')
  async remove(
    @Param('planId', ParseObjectIdPipe) planId: string,
    @Param('userId', ParseObjectIdPipe) userId: string,
    @Request() req: AuthenticatedRequest,
  ) {
    await this.collaboratorsService.remove(planId, userId, req.user.userId);
    return ok({ message: '협업자가 삭제되었습니다.' });
  }
}
