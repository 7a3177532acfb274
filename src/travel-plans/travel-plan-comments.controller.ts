import { Body, Controller, Delete, Get, Param, Post, Put, Request, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiTags } from '@nestjs/swagger';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { AuthenticatedRequest } from '../common/interfaces/authenticated-request.interface';
import { ParseObjectIdPipe } from '../common/pipes/parse-object-id.pipe';
import { ok } from '../common/utils/api-response';
import { CreateCommentDto, UpdateCommentDto } from './dto/comment.dto';
import { TravelPlanCommentsService } from './services/travel-plan-comments.service';
import { toCommentResponse } from './travel-plan.mapper';

@ApiTags('travel-plan-comments')
@ApiBearerAuth()
@UseGuards(JwtAuthGuard)
@Controller('travel-plans/:planId/comments')
export class TravelPlanCommentsController {
  constructor(private readonly commentsService: TravelPlanCommentsService) {}

  @Get()
  async list(@Param('planId', ParseObjectIdPipe) planId: string, @Request() req: AuthenticatedRequest) {
    return ok(await this.commentsService.list(planId, req.user.userId));
  }

  @Post()
  async create(
    @Param('planId', ParseObjectIdPipe) planId: string,
    @Body() dto: CreateCommentDto,
    @Request() req: AuthenticatedRequest,
  ) {
    return ok(toCommentResponse(await this.commentsService.create(planId, req.user.userId, dto)));
  }

  @Put(':commentId')
  async update(
    @Param('planId', ParseObjectIdPipe) planId: string,
    @Param('commentId', ParseObjectIdPipe) commentId: string,
    @Body() dto: UpdateCommentDto,
    @Request() req: AuthenticatedRequest,
  ) {
    return ok(toCommentResponse(await this.commentsService.update(planId, commentId, req.user.userId, dto.content)));
  }

  @Delete(':commentId')
  async remove(
    @Param('planId', ParseObjectIdPipe) planId: string,
    @Param('commentId', ParseObjectIdPipe) commentId: string,
    @Request() req: AuthenticatedRequest,
  ) {
    await this.commentsService.remove(planId, commentId, req.user.userId);
    return ok({ message: '댓글이 삭제되었습니다.' });
  }
}
