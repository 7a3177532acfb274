import { Body, Controller, Get, HttpCode, HttpStatus, Param, Post, Query, Request, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiTags } from '@nestjs/swagger';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { OptionalJwtAuthGuard } from '../auth/guards/optional-jwt-auth.guard';
import { AuthorizationException } from '../common/exceptions/app.exception';
import {
  AuthenticatedRequest,
  OptionalAuthRequest,
} from '../common/interfaces/authenticated-request.interface';
import { ParseObjectIdPipe } from '../common/pipes/parse-object-id.pipe';
import { ChatbotService } from './chatbot.service';
import { ChatHistoryQueryDto, ChatMessageDto } from './dto/chat-message.dto';

@ApiTags('chatbot')
@Controller('chatbot')
export class ChatbotController {
  constructor(private readonly chatbotService: ChatbotService) {}

  @UseGuards(OptionalJwtAuthGuard)
  @Post('message')
  @HttpCode(HttpStatus.OK)
  sendMessage(@Body() dto: ChatMessageDto, @Request() req: OptionalAuthRequest) {
    return this.chatbotService.sendMessage(dto.message, req.user?.userId, dto.context);
  }

  @ApiBearerAuth()
  @UseGuards(JwtAuthGuard)
  @Get('history/:userId')
  getHistory(
    @Param('userId', ParseObjectIdPipe) userId: string,
    @Query() query: ChatHistoryQueryDto,
    @Request() req: AuthenticatedRequest,
  ) {
    if (req.user.userId !== userId && req.user.role !== 'ADMIN') {
      throw new AuthorizationException('대화 히스토리 조회 권한이 없습니다.');
    }
    return this.chatbotService.getHistory(userId, query.limit ?? 50);
  }

  @Get('initial')
  getInitialMessage() {
    return this.chatbotService.getInitialMessage();
  }

  @Get('config')
  getConfig() {
    return this.chatbotService.getConfig();
  }
}
