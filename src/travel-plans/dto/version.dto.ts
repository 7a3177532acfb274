import { ApiPropertyOptional } from '@nestjs/swagger';
import { IsOptional, IsString, MaxLength } from 'class-validator';

export class CreateVersionDto {
  @ApiPropertyOptional({ example: '2일차 일정 변경 전' })
  @IsOptional()
  @IsString()
  @MaxLength(500)
  changeDescription?: string;
}
