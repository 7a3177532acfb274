import { ApiPropertyOptional } from '@nestjs/swagger';
import { IsOptional, Matches } from 'class-validator';

export class EventsQueryDto {
  @ApiPropertyOptional({ example: '20240501', description: 'YYYYMMDD, defaults to today in Asia/Seoul' })
  @IsOptional()
  @Matches(/^\d{8}$/, { message: 'start_date는 YYYYMMDD 형식이어야 합니다.' })
  start_date?: string;
}
